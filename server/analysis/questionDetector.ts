/**
 * Question Detector
 *
 * Evaluates a rolling window of recent finals whenever a new final arrives
 * and publishes `question.detected` when the model is confident the lecturer
 * asked the class something.
 *
 * Duplicate suppression happens at three levels:
 * 1. a segment id already seen is ignored (duplicate delivery)
 * 2. a window whose segment set has not changed is not re-evaluated
 * 3. a question textually similar to a recent one is dropped
 */

import { v4 as uuidv4 } from "uuid";
import { log } from "../logger";
import { AnalyzerQueue } from "./analyzerQueue";
import { callModel, reportAnalysisFailure } from "./analyzerContext";
import { parseJsonResponse } from "./jsonResponse";
import { questionDetectionPrompt, systemPrompt } from "./prompts";
import { questionDetectionResponseSchema } from "@shared/schema";
import type { QuestionEvent, TranscriptSegment } from "@shared/schema";
import type { AnalyzerDeps } from "./analyzerContext";

const ANALYZER = "QuestionDetector";
const RECENT_QUESTION_LIMIT = 20;

interface DetectionWindow {
  segments: TranscriptSegment[];
}

export function normalizeQuestion(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function tokens(text: string): Set<string> {
  const normalized = normalizeQuestion(text);
  return new Set(normalized ? normalized.split(" ") : []);
}

/** Jaccard similarity of the normalized token sets */
export function tokenSimilarity(a: string, b: string): number {
  const left = tokens(a);
  const right = tokens(b);
  if (left.size === 0 && right.size === 0) return 1;

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

/** The window segment whose words overlap the question most; ties go to the latest */
export function originatingSegment(segments: TranscriptSegment[], questionText: string): TranscriptSegment | undefined {
  const questionTokens = tokens(questionText);
  let best: TranscriptSegment | undefined;
  let bestScore = -1;

  for (const segment of segments) {
    let score = 0;
    for (const token of tokens(segment.text)) {
      if (questionTokens.has(token)) score++;
    }
    if (score >= bestScore) {
      best = segment;
      bestScore = score;
    }
  }

  return best;
}

export class QuestionDetector {
  private readonly seenSegments = new Set<string>();
  private lastWindowKey = "";
  private recentQuestions: string[] = [];
  private readonly queue: AnalyzerQueue<DetectionWindow>;

  private stats = {
    windowsEvaluated: 0,
    questionsDetected: 0,
    belowThreshold: 0,
    similarDropped: 0,
  };

  constructor(private readonly deps: AnalyzerDeps) {
    this.queue = new AnalyzerQueue<DetectionWindow>((window, signal) => this.evaluate(window, signal), {
      name: ANALYZER,
      concurrency: 1,
      capacity: 2,
      overflow: "newest-wins",
      timeoutMs: deps.settings.callTimeoutMs,
      onError: (window, error) => {
        reportAnalysisFailure(deps, ANALYZER, error, {
          segmentIds: window.segments.map(segment => segment.id),
        });
      },
    });
  }

  /** Feed a final segment that has already been added to the transcript context */
  onFinal(segment: TranscriptSegment): void {
    if (!segment.isFinal || this.seenSegments.has(segment.id)) {
      return;
    }
    this.seenSegments.add(segment.id);

    const window = this.deps.transcript.recentFinals(this.deps.settings.questionWindowSize);
    const key = window.map(item => item.id).join("|");
    if (key === this.lastWindowKey) {
      return;
    }
    this.lastWindowKey = key;

    this.queue.enqueue({ segments: window });
  }

  private async evaluate(window: DetectionWindow, signal: AbortSignal): Promise<void> {
    if (window.segments.length === 0) return;
    this.stats.windowsEvaluated++;

    const transcript = window.segments.map(segment => segment.text).join("\n");
    const raw = await callModel(this.deps, {
      purpose: "question_detection",
      system: systemPrompt(this.deps.settings.outputLanguage),
      user: questionDetectionPrompt(transcript),
      temperature: 0.3,
      maxTokens: 512,
      signal,
    });
    if (signal.aborted) return;

    const result = parseJsonResponse(raw, questionDetectionResponseSchema);
    if (!result.is_question) return;

    if (result.confidence < this.deps.settings.questionConfidenceThreshold) {
      this.stats.belowThreshold++;
      log(`[${ANALYZER}] Question below threshold (${result.confidence.toFixed(2)})`, "analysis", "debug");
      return;
    }

    const lastSegment = window.segments[window.segments.length - 1];
    const questionText = result.question_text.trim() || lastSegment.text;

    if (this.isRecentQuestion(questionText)) {
      this.stats.similarDropped++;
      log(`[${ANALYZER}] Skipping repeated question: ${questionText.slice(0, 50)}`, "analysis", "debug");
      return;
    }
    this.rememberQuestion(questionText);

    const origin = originatingSegment(window.segments, questionText) ?? lastSegment;
    const event: QuestionEvent = {
      id: uuidv4(),
      segmentId: origin.id,
      questionText,
      detectedAt: new Date().toISOString(),
      confidence: result.confidence,
      kind: result.question_type,
    };

    this.stats.questionsDetected++;
    log(`[${ANALYZER}] Detected ${event.kind} question (${event.confidence.toFixed(2)}): ${questionText.slice(0, 80)}`, "analysis");
    this.deps.bus.publish("question.detected", event);
  }

  private isRecentQuestion(questionText: string): boolean {
    const normalized = normalizeQuestion(questionText);
    return this.recentQuestions.some(previous =>
      previous === normalized ||
      tokenSimilarity(previous, normalized) >= this.deps.settings.questionSimilarityThreshold
    );
  }

  private rememberQuestion(questionText: string): void {
    this.recentQuestions.push(normalizeQuestion(questionText));
    if (this.recentQuestions.length > RECENT_QUESTION_LIMIT) {
      this.recentQuestions.shift();
    }
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
