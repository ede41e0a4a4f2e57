/**
 * Analysis Engine
 *
 * Subscribes the analyzers to the bus for one session:
 *   transcript.segment -> transcript context, question detector, summarizer
 *   question.detected  -> answer generator
 * and owns their queues across pause/resume/stop.
 */

import { log } from "../logger";
import { TranscriptContext } from "./transcriptContext";
import { QuestionDetector } from "./questionDetector";
import { AnswerGenerator } from "./answerGenerator";
import { Summarizer } from "./summarizer";
import { SuggestionGenerator } from "./suggestionGenerator";
import { IdeaGenerator } from "./ideaGenerator";
import type { AnalyzerDeps } from "./analyzerContext";
import type { AnalyzerBackend } from "./llmBackend";
import type { AnalysisSettings } from "../config/pipeline";
import type { EventBus, SubscriptionHandle } from "../events/eventBus";
import type { TranscriptSegment } from "@shared/schema";

export interface AnalysisEngineOptions {
  bus: EventBus;
  backend: AnalyzerBackend;
  settings: AnalysisSettings;
}

export class AnalysisEngine {
  readonly transcript = new TranscriptContext();
  readonly questions: QuestionDetector;
  readonly answers: AnswerGenerator;
  readonly summarizer: Summarizer;
  readonly suggestions: SuggestionGenerator;
  readonly ideas: IdeaGenerator;

  private materialsText = "";
  private subscriptions: SubscriptionHandle[] = [];
  private running = false;
  private paused = false;

  constructor(private readonly options: AnalysisEngineOptions) {
    const deps: AnalyzerDeps = {
      bus: options.bus,
      backend: options.backend,
      settings: options.settings,
      transcript: this.transcript,
      materials: () => this.materialsText,
    };

    this.questions = new QuestionDetector(deps);
    this.answers = new AnswerGenerator(deps);
    this.summarizer = new Summarizer(deps);
    this.suggestions = new SuggestionGenerator(deps);
    this.ideas = new IdeaGenerator(deps);
  }

  setMaterials(text: string): void {
    this.materialsText = text;
    if (text) {
      log(`[AnalysisEngine] Loaded course materials (${text.length} chars)`, "analysis");
    }
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    const { bus, settings } = this.options;

    this.subscriptions.push(
      bus.subscribe("transcript.segment", (segment) => this.handleSegment(segment), "analysis.transcript")
    );

    if (settings.autoAnswer) {
      this.subscriptions.push(
        bus.subscribe("question.detected", (question) => this.answers.onQuestion(question), "analysis.answers")
      );
    }

    this.summarizer.startTicker();
    this.suggestions.startTimer();

    log(
      `[AnalysisEngine] Started (questions=${settings.questionDetection}, answers=${settings.autoAnswer}, ` +
        `summaries=${settings.periodicSummary}, suggestions=${settings.periodicSuggestions})`,
      "analysis"
    );
  }

  private handleSegment(segment: TranscriptSegment): void {
    if (!this.transcript.add(segment)) {
      return;
    }

    if (this.options.settings.questionDetection && !this.paused) {
      this.questions.onFinal(segment);
    }
    this.summarizer.onFinal(segment);
  }

  /** Cancels queued work and the periodic timers; cancelled questions are answered with fallbacks */
  pause(): void {
    this.paused = true;
    this.summarizer.stopTicker();
    this.suggestions.stopTimer();
    const cancelled =
      this.questions.cancelPending() +
      this.answers.cancelPending() +
      this.summarizer.cancelPending() +
      this.suggestions.cancelPending() +
      this.ideas.cancelPending();
    log(`[AnalysisEngine] Paused, ${cancelled} pending entr${cancelled === 1 ? "y" : "ies"} cancelled`, "analysis");
  }

  resume(): void {
    this.paused = false;
    if (this.running) {
      this.summarizer.startTicker();
      this.suggestions.startTimer();
    }
    log("[AnalysisEngine] Resumed", "analysis");
  }

  requestSummary(): boolean {
    return this.summarizer.requestSummary();
  }

  requestSuggestion(): boolean {
    return this.suggestions.request();
  }

  requestIdeas(): boolean {
    return this.ideas.request();
  }

  regenerateAnswer(questionEventId: string): boolean {
    return this.answers.regenerate(questionEventId);
  }

  /**
   * Closes intake, cancels queued detection, suggestion and idea work,
   * flushes the open summary window and waits for in-flight calls up to
   * `shutdownTimeoutMs`. Whatever is left after that is halted: queued
   * entries are cancelled, running calls abandoned, and answers and
   * summaries fall back, so every event is published before this resolves.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    const { bus, settings } = this.options;
    const deadline = Date.now() + settings.shutdownTimeoutMs;
    const remaining = () => Math.max(0, deadline - Date.now());

    const transcriptSubscription = this.subscriptions.find(handle => handle.topic === "transcript.segment");
    if (transcriptSubscription) {
      bus.unsubscribe(transcriptSubscription);
    }

    this.suggestions.close();
    this.suggestions.cancelPending();
    this.ideas.close();
    this.ideas.cancelPending();
    this.questions.close();
    this.questions.cancelPending();

    this.summarizer.flush();
    this.summarizer.close();

    // In-flight detection may still publish a question that needs an answer
    await this.questions.drain(remaining());
    await bus.idle();
    this.answers.close();

    const drained = await Promise.all([
      this.answers.drain(remaining()),
      this.summarizer.drain(remaining()),
      this.suggestions.drain(remaining()),
      this.ideas.drain(remaining()),
    ]);

    this.questions.halt();
    this.answers.halt();
    this.summarizer.halt();
    this.suggestions.halt();
    this.ideas.halt();
    await bus.idle();

    for (const handle of this.subscriptions) {
      bus.unsubscribe(handle);
    }
    this.subscriptions = [];

    if (drained.every(Boolean)) {
      log("[AnalysisEngine] Stopped", "analysis");
    } else {
      log("[AnalysisEngine] Shutdown timeout passed, unfinished analyzer work fell back", "analysis", "warn");
    }
  }

  getStats() {
    return {
      finals: this.transcript.finalCount,
      questions: this.questions.getStats(),
      answers: this.answers.getStats(),
      summaries: this.summarizer.getStats(),
    };
  }
}
