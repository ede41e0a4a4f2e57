/**
 * Suggestion Generator
 *
 * Proposes one question the student could ask, on request or (optionally)
 * on a fixed wall-clock interval once the lecture has enough material.
 * Only one request is queued at a time; extra requests are rejected.
 */

import { v4 as uuidv4 } from "uuid";
import { log } from "../logger";
import { AnalyzerQueue } from "./analyzerQueue";
import { callModel, materialsFor, reportAnalysisFailure } from "./analyzerContext";
import { parseJsonResponse } from "./jsonResponse";
import { suggestionPrompt, systemPrompt } from "./prompts";
import { suggestionResponseSchema } from "@shared/schema";
import type { SuggestionEvent } from "@shared/schema";
import type { AnalyzerDeps } from "./analyzerContext";

const ANALYZER = "SuggestionGenerator";

type SuggestionTrigger = SuggestionEvent["trigger"];

export class SuggestionGenerator {
  private readonly queue: AnalyzerQueue<SuggestionTrigger>;
  private timer: NodeJS.Timeout | null = null;
  private finalsAtLastSuggestion = 0;

  constructor(private readonly deps: AnalyzerDeps) {
    this.queue = new AnalyzerQueue<SuggestionTrigger>((trigger, signal) => this.suggest(trigger, signal), {
      name: ANALYZER,
      concurrency: 1,
      capacity: 1,
      overflow: "oldest-wins",
      timeoutMs: deps.settings.callTimeoutMs,
      onError: (trigger, error) => reportAnalysisFailure(deps, ANALYZER, error, { trigger }),
    });
  }

  request(trigger: SuggestionTrigger = "request"): boolean {
    if (this.deps.transcript.finalCount === 0) {
      log(`[${ANALYZER}] Nothing to suggest from yet`, "analysis", "debug");
      return false;
    }
    return this.queue.enqueue(trigger).accepted;
  }

  /** Periodic trigger; fires only when enough new finals arrived since the last suggestion */
  tick(): boolean {
    const count = this.deps.transcript.finalCount;
    if (count <= this.deps.settings.suggestionMinSegments || count === this.finalsAtLastSuggestion) {
      return false;
    }
    return this.request("periodic");
  }

  startTimer(): void {
    if (this.timer || !this.deps.settings.periodicSuggestions) return;
    this.timer = setInterval(() => {
      this.tick();
    }, this.deps.settings.suggestionIntervalMs);
    this.timer.unref();
  }

  stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async suggest(trigger: SuggestionTrigger, signal: AbortSignal): Promise<void> {
    this.finalsAtLastSuggestion = this.deps.transcript.finalCount;

    const raw = await callModel(this.deps, {
      purpose: "suggestion",
      system: systemPrompt(this.deps.settings.outputLanguage),
      user: suggestionPrompt(this.deps.transcript.fullText(), materialsFor(this.deps)),
      temperature: 0.8,
      maxTokens: 512,
      signal,
    });
    if (signal.aborted) return;

    const result = parseJsonResponse(raw, suggestionResponseSchema);
    const event: SuggestionEvent = {
      id: uuidv4(),
      question: result.question,
      rationale: result.rationale,
      timing: result.timing,
      trigger,
      generatedAt: new Date().toISOString(),
    };

    this.deps.bus.publish("suggestion.generated", event);
  }

  cancelPending(): number {
    return this.queue.cancelPending().length;
  }

  drain(timeoutMs: number): Promise<boolean> {
    return this.queue.drain(timeoutMs);
  }

  close(): void {
    this.stopTimer();
    this.queue.close();
  }

  halt(): void {
    this.stopTimer();
    this.queue.halt();
  }
}
