import { log, errorMessage } from "../logger";
import { AnalysisFailure } from "../errors";
import { reportPipelineError } from "../events/reporting";
import { withTimeout } from "./analyzerQueue";
import { materialsSection } from "./prompts";
import type { EventBus } from "../events/eventBus";
import type { AnalysisSettings } from "../config/pipeline";
import type { AnalyzerBackend, CompletionRequest } from "./llmBackend";
import type { TranscriptContext } from "./transcriptContext";

/** Everything an analyzer needs from the engine */
export interface AnalyzerDeps {
  bus: EventBus;
  backend: AnalyzerBackend;
  settings: AnalysisSettings;
  transcript: TranscriptContext;
  materials: () => string;
}

export function callModel(deps: AnalyzerDeps, request: CompletionRequest): Promise<string> {
  return withTimeout(deps.backend.complete(request), deps.settings.callTimeoutMs, `${deps.backend.name}:${request.purpose}`);
}

export function materialsFor(deps: AnalyzerDeps): string {
  return materialsSection(deps.materials(), deps.settings.materialsBudgetChars);
}

export function reportAnalysisFailure(
  deps: AnalyzerDeps,
  analyzer: string,
  error: unknown,
  detail?: Record<string, unknown>
): void {
  const failure = error instanceof AnalysisFailure
    ? error
    : new AnalysisFailure(analyzer, errorMessage(error), { cause: error });
  log(`[${analyzer}] ${failure.message}`, "analysis", "warn");
  reportPipelineError(deps.bus, analyzer, failure, detail);
}
