export { AnalysisEngine } from "./analysisEngine";
export type { AnalysisEngineOptions } from "./analysisEngine";
export { createAnalyzerBackend, OpenAIAnalyzerBackend, AnthropicAnalyzerBackend } from "./llmBackend";
export type { AnalyzerBackend, AnalysisPurpose, CompletionRequest } from "./llmBackend";
export { AnalyzerQueue, withTimeout, QueueTimeoutError } from "./analyzerQueue";
export type { OverflowPolicy, AnalyzerQueueConfig, AnalyzerQueueStats } from "./analyzerQueue";
export { TranscriptContext } from "./transcriptContext";
export { QuestionDetector, normalizeQuestion, tokenSimilarity, originatingSegment } from "./questionDetector";
export { AnswerGenerator, FALLBACK_ANSWER_TEXT } from "./answerGenerator";
export { Summarizer } from "./summarizer";
export type { SummaryWindow, SummaryTrigger } from "./summarizer";
export { SuggestionGenerator } from "./suggestionGenerator";
export { IdeaGenerator } from "./ideaGenerator";
export { parseJsonResponse, extractJson, stripCodeFence, ResponseFormatError } from "./jsonResponse";
