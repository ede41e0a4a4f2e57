/**
 * Idea Generator
 *
 * On request, proposes creative ideas, topics for deeper study and links to
 * other disciplines, based on the transcript to date and the materials.
 */

import { v4 as uuidv4 } from "uuid";
import { log } from "../logger";
import { AnalyzerQueue } from "./analyzerQueue";
import { callModel, materialsFor, reportAnalysisFailure } from "./analyzerContext";
import { parseJsonResponse } from "./jsonResponse";
import { ideasPrompt, systemPrompt } from "./prompts";
import { ideasResponseSchema } from "@shared/schema";
import type { IdeaEvent } from "@shared/schema";
import type { AnalyzerDeps } from "./analyzerContext";

const ANALYZER = "IdeaGenerator";

interface IdeaRequest {
  requestedAt: number;
}

export class IdeaGenerator {
  private readonly queue: AnalyzerQueue<IdeaRequest>;

  constructor(private readonly deps: AnalyzerDeps) {
    this.queue = new AnalyzerQueue<IdeaRequest>((_request, signal) => this.generate(signal), {
      name: ANALYZER,
      concurrency: 1,
      capacity: 1,
      overflow: "oldest-wins",
      timeoutMs: deps.settings.callTimeoutMs,
      onError: (_request, error) => reportAnalysisFailure(deps, ANALYZER, error),
    });
  }

  request(): boolean {
    if (this.deps.transcript.finalCount === 0) {
      log(`[${ANALYZER}] No transcript yet`, "analysis", "debug");
      return false;
    }
    return this.queue.enqueue({ requestedAt: Date.now() }).accepted;
  }

  private async generate(signal: AbortSignal): Promise<void> {
    const raw = await callModel(this.deps, {
      purpose: "ideas",
      system: systemPrompt(this.deps.settings.outputLanguage),
      user: ideasPrompt(this.deps.transcript.fullText(), materialsFor(this.deps)),
      temperature: 0.9,
      maxTokens: 1024,
      signal,
    });
    if (signal.aborted) return;

    const result = parseJsonResponse(raw, ideasResponseSchema);
    const event: IdeaEvent = {
      id: uuidv4(),
      ideas: result.creative_ideas,
      deepLearning: result.deep_learning,
      crossDiscipline: result.cross_discipline,
      generatedAt: new Date().toISOString(),
    };

    this.deps.bus.publish("idea.generated", event);
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
}
