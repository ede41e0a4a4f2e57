/**
 * Answer Generator
 *
 * Produces exactly one answer per detected question. Model failures are
 * retried with backoff; when retries run out, or the question never gets a
 * queue slot, a fallback answer is published so no question is left open.
 */

import { v4 as uuidv4 } from "uuid";
import { log } from "../logger";
import { CircuitOpenError, is4xxAuthError, withRetry } from "../../lib/reliability";
import { AnalyzerQueue } from "./analyzerQueue";
import { callModel, materialsFor, reportAnalysisFailure } from "./analyzerContext";
import { answerPrompt, systemPrompt } from "./prompts";
import type { AnswerEvent, QuestionEvent } from "@shared/schema";
import type { AnalyzerDeps } from "./analyzerContext";
import type { DiscardReason } from "./analyzerQueue";

const ANALYZER = "AnswerGenerator";
export const FALLBACK_ANSWER_TEXT = "Answer unavailable";

interface AnswerJob {
  question: QuestionEvent;
  /** Set for regenerations: the answer being replaced */
  supersedes?: string;
  regenerate: boolean;
}

function shouldRetry(error: unknown): boolean {
  return !(error instanceof CircuitOpenError) && !is4xxAuthError(error);
}

export class AnswerGenerator {
  private readonly questions = new Map<string, QuestionEvent>();
  private readonly answers = new Map<string, string>();
  private readonly queue: AnalyzerQueue<AnswerJob>;

  private stats = {
    answered: 0,
    fallbacks: 0,
    regenerated: 0,
    repeatsIgnored: 0,
  };

  constructor(private readonly deps: AnalyzerDeps) {
    const { callTimeoutMs, answerMaxRetries, retryBaseDelayMs } = deps.settings;
    const backoffBudget = retryBaseDelayMs * (Math.pow(2, answerMaxRetries) - 1);

    this.queue = new AnalyzerQueue<AnswerJob>((job, signal) => this.generate(job, signal), {
      name: ANALYZER,
      concurrency: 1,
      capacity: 8,
      overflow: "oldest-wins",
      timeoutMs: callTimeoutMs * (answerMaxRetries + 1) + backoffBudget,
      onDiscard: (job, reason) => this.handleDiscard(job, reason),
      onError: (job, error) => this.handleFailure(job, error),
    });
  }

  onQuestion(question: QuestionEvent): void {
    if (this.questions.has(question.id)) {
      this.stats.repeatsIgnored++;
      return;
    }
    this.questions.set(question.id, question);
    this.queue.enqueue({ question, regenerate: false });
  }

  /** Queue a replacement answer. Returns false for unknown questions or a full queue. */
  regenerate(questionEventId: string): boolean {
    const question = this.questions.get(questionEventId);
    if (!question) {
      log(`[${ANALYZER}] Cannot regenerate unknown question ${questionEventId}`, "analysis", "warn");
      return false;
    }

    const result = this.queue.enqueue({
      question,
      supersedes: this.answers.get(questionEventId),
      regenerate: true,
    });
    return result.accepted;
  }

  private async generate(job: AnswerJob, signal: AbortSignal): Promise<void> {
    const { question } = job;
    const started = Date.now();
    const settings = this.deps.settings;
    const contextLines = settings.questionWindowSize * 2;

    const text = await withRetry(
      () =>
        callModel(this.deps, {
          purpose: "answer",
          system: systemPrompt(settings.outputLanguage),
          user: answerPrompt(question.questionText, this.deps.transcript.recentText(contextLines), materialsFor(this.deps)),
          temperature: 0.4,
          maxTokens: 768,
          signal,
        }),
      {
        maxRetries: settings.answerMaxRetries,
        baseDelayMs: settings.retryBaseDelayMs,
        maxDelayMs: settings.retryBaseDelayMs * 8,
        jitterFactor: 0,
        retryOn: (error) => !signal.aborted && shouldRetry(error),
        onRetry: (error, attempt, delayMs) => {
          log(`[${ANALYZER}] Retry ${attempt}/${settings.answerMaxRetries} for question ${question.id} in ${delayMs}ms`, "analysis", "debug");
        },
      }
    );

    if (signal.aborted) return;
    this.publish(job, text.trim(), Date.now() - started, false);
  }

  private publish(job: AnswerJob, answerText: string, latencyMs: number, fallback: boolean): void {
    const questionId = job.question.id;

    // A timed-out call may still resolve after its fallback went out
    if (!job.regenerate && this.answers.has(questionId)) {
      log(`[${ANALYZER}] Late answer for ${questionId} discarded`, "analysis", "debug");
      return;
    }

    const event: AnswerEvent = {
      id: uuidv4(),
      questionEventId: questionId,
      answerText,
      generatedAt: new Date().toISOString(),
      modelLatencyMs: latencyMs,
      fallback,
      supersedes: job.regenerate ? job.supersedes : undefined,
    };

    this.answers.set(questionId, event.id);
    if (fallback) {
      this.stats.fallbacks++;
    } else if (job.regenerate) {
      this.stats.regenerated++;
    } else {
      this.stats.answered++;
    }

    this.deps.bus.publish("answer.generated", event);
  }

  private handleFailure(job: AnswerJob, error: unknown): void {
    reportAnalysisFailure(this.deps, ANALYZER, error, { questionEventId: job.question.id });

    // A failed regeneration keeps the answer already published
    if (!job.regenerate) {
      this.publish(job, FALLBACK_ANSWER_TEXT, 0, true);
    }
  }

  private handleDiscard(job: AnswerJob, reason: DiscardReason): void {
    log(`[${ANALYZER}] Question ${job.question.id} ${reason} before answering`, "analysis", "debug");
    if (!job.regenerate) {
      this.publish(job, FALLBACK_ANSWER_TEXT, 0, true);
    }
  }

  hasAnswer(questionEventId: string): boolean {
    return this.answers.has(questionEventId);
  }

  cancelPending(): number {
    return this.queue.cancelPending().length;
  }

  drain(timeoutMs: number): Promise<boolean> {
    return this.queue.drain(timeoutMs);
  }

  close(): void {
    this.queue.close();
  }

  halt(): void {
    this.queue.halt();
  }

  getStats() {
    return { ...this.stats, queue: this.queue.getStats() };
  }
}
