/**
 * Periodic Summarizer
 *
 * Windows are measured in transcript media time, anchored at the first
 * final's start with a boundary every `summaryIntervalMs`. Every final lands
 * in exactly one window and consecutive windows share their edge, so the
 * summaries cover the whole lecture without gaps or overlap.
 *
 * A window closes when:
 * - a final starts at or past the next boundary (closes at the boundary)
 * - `requestSummary()` is called (closes at the last final's end)
 * - the idle ticker sees no finals for a full interval
 * - `flush()` runs at session end
 * Windows without segments are never emitted; their start carries forward.
 */

import { v4 as uuidv4 } from "uuid";
import { log } from "../logger";
import { AnalyzerQueue } from "./analyzerQueue";
import { callModel, materialsFor, reportAnalysisFailure } from "./analyzerContext";
import { parseJsonResponse } from "./jsonResponse";
import { summaryPrompt, systemPrompt } from "./prompts";
import { summaryResponseSchema } from "@shared/schema";
import type { SummaryEvent, TranscriptSegment } from "@shared/schema";
import type { AnalyzerDeps } from "./analyzerContext";

const ANALYZER = "Summarizer";
const FALLBACK_EXCERPT_CHARS = 400;

export type SummaryTrigger = "boundary" | "request" | "idle" | "flush";

export interface SummaryWindow {
  start: number;
  end: number;
  segments: TranscriptSegment[];
  trigger: SummaryTrigger;
}

function mergeWindows(pending: SummaryWindow, incoming: SummaryWindow): SummaryWindow {
  return {
    start: pending.start,
    end: incoming.end,
    segments: [...pending.segments, ...incoming.segments],
    trigger: incoming.trigger,
  };
}

export class Summarizer {
  private origin: number | null = null;
  private windowStart = 0;
  private nextBoundary = 0;
  private segments: TranscriptSegment[] = [];
  private lastFinalEnd = 0;
  private lastActivityAt = Date.now();
  private ticker: NodeJS.Timeout | null = null;
  private readonly queue: AnalyzerQueue<SummaryWindow>;

  private stats = {
    windowsClosed: 0,
    summariesPublished: 0,
    fallbacks: 0,
  };

  constructor(private readonly deps: AnalyzerDeps) {
    this.queue = new AnalyzerQueue<SummaryWindow>((window, signal) => this.summarize(window, signal), {
      name: ANALYZER,
      concurrency: 1,
      capacity: 16,
      overflow: "coalesce",
      merge: mergeWindows,
      timeoutMs: deps.settings.callTimeoutMs,
      // A window that never runs still gets a summary event over its range
      onDiscard: (window, reason) => {
        log(`[${ANALYZER}] Window [${window.start}, ${window.end}) ${reason}, publishing fallback`, "analysis", "debug");
        this.publishFallback(window);
      },
      onError: (window, error) => {
        reportAnalysisFailure(deps, ANALYZER, error, { windowStart: window.start, windowEnd: window.end });
        this.publishFallback(window);
      },
    });
  }

  private get intervalMs(): number {
    return this.deps.settings.summaryIntervalMs;
  }

  onFinal(segment: TranscriptSegment): void {
    if (!segment.isFinal) return;

    if (this.origin === null) {
      this.origin = segment.startTime;
      this.windowStart = segment.startTime;
      this.nextBoundary = segment.startTime + this.intervalMs;
    }

    if (this.deps.settings.periodicSummary && segment.startTime >= this.nextBoundary) {
      if (this.segments.length > 0) {
        this.closeWindow(Math.max(this.nextBoundary, this.windowStart), "boundary");
      }
      this.advanceBoundaryPast(segment.startTime);
    }

    this.segments.push(segment);
    this.lastFinalEnd = Math.max(this.lastFinalEnd, segment.endTime);
    this.lastActivityAt = Date.now();
  }

  private advanceBoundaryPast(position: number): void {
    if (position < this.nextBoundary) return;
    const steps = Math.floor((position - this.nextBoundary) / this.intervalMs) + 1;
    this.nextBoundary += steps * this.intervalMs;
  }

  private closeWindow(end: number, trigger: SummaryTrigger): void {
    const window: SummaryWindow = {
      start: this.windowStart,
      end,
      segments: this.segments,
      trigger,
    };

    this.segments = [];
    this.windowStart = end;
    this.advanceBoundaryPast(end);
    this.stats.windowsClosed++;

    log(`[${ANALYZER}] Window [${window.start}, ${window.end}) closed by ${trigger} with ${window.segments.length} segment(s)`, "analysis", "debug");
    this.queue.enqueue(window);
  }

  /** Close the open window at the last final's end. Returns false when it is empty. */
  requestSummary(trigger: SummaryTrigger = "request"): boolean {
    if (this.segments.length === 0) {
      return false;
    }
    this.closeWindow(Math.max(this.lastFinalEnd, this.windowStart), trigger);
    return true;
  }

  /** Idle check, normally driven by the ticker */
  tick(now = Date.now()): boolean {
    if (this.segments.length === 0) return false;
    if (now - this.lastActivityAt < this.intervalMs) return false;
    return this.requestSummary("idle");
  }

  startTicker(): void {
    if (this.ticker || !this.deps.settings.periodicSummary) return;
    this.ticker = setInterval(() => {
      this.tick();
    }, this.deps.settings.summaryIdleCheckMs);
    this.ticker.unref();
  }

  stopTicker(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
  }

  flush(): boolean {
    this.stopTicker();
    return this.requestSummary("flush");
  }

  private async summarize(window: SummaryWindow, signal: AbortSignal): Promise<void> {
    const transcript = window.segments.map(segment => segment.text).join("\n");
    const minutes = Math.max(1, Math.round((window.end - window.start) / 60000));

    const raw = await callModel(this.deps, {
      purpose: "summary",
      system: systemPrompt(this.deps.settings.outputLanguage),
      user: summaryPrompt(transcript, minutes, materialsFor(this.deps)),
      temperature: 0.5,
      maxTokens: 1024,
      signal,
    });
    if (signal.aborted) return;

    const result = parseJsonResponse(raw, summaryResponseSchema);
    const keyPoints = result.key_points.length > 0 ? result.key_points : result.important_concepts;

    this.publish(window, {
      title: result.title,
      text: result.summary,
      keyPoints,
      fallback: false,
    });
  }

  private publishFallback(window: SummaryWindow): void {
    const excerpt = window.segments.map(segment => segment.text).join(" ");
    this.publish(window, {
      title: "Summary unavailable",
      text: excerpt.length > FALLBACK_EXCERPT_CHARS ? `${excerpt.slice(0, FALLBACK_EXCERPT_CHARS)}...` : excerpt,
      keyPoints: [],
      fallback: true,
    });
  }

  private publish(
    window: SummaryWindow,
    content: Pick<SummaryEvent, "title" | "text" | "keyPoints" | "fallback">
  ): void {
    const event: SummaryEvent = {
      id: uuidv4(),
      windowStart: window.start,
      windowEnd: window.end,
      segmentCount: window.segments.length,
      generatedAt: new Date().toISOString(),
      ...content,
    };

    if (content.fallback) {
      this.stats.fallbacks++;
    } else {
      this.stats.summariesPublished++;
    }
    this.deps.bus.publish("summary.generated", event);
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
    this.stopTicker();
    this.queue.halt();
  }

  getStats() {
    return { ...this.stats, openSegments: this.segments.length, queue: this.queue.getStats() };
  }
}
