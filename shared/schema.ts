import { z } from "zod";

// Audio

export interface AudioFrame {
  seq: number;
  data: Buffer;
  capturedAt: number;
}

export const END_OF_STREAM = Symbol("end-of-stream");
export type EndOfStream = typeof END_OF_STREAM;

// Transcript

export const transcriptSegmentSchema = z.object({
  id: z.string().min(1),
  startTime: z.number().nonnegative(),
  endTime: z.number().nonnegative(),
  text: z.string(),
  isFinal: z.boolean(),
  language: z.string().default("en"),
});

export type TranscriptSegment = z.infer<typeof transcriptSegmentSchema>;

// Analysis artifacts

export const questionKinds = ["direct", "rhetorical", "implicit"] as const;
export type QuestionKind = (typeof questionKinds)[number];

export const questionEventSchema = z.object({
  id: z.string(),
  segmentId: z.string(),
  questionText: z.string().min(1),
  detectedAt: z.string(),
  confidence: z.number().min(0).max(1),
  kind: z.enum(questionKinds),
});

export type QuestionEvent = z.infer<typeof questionEventSchema>;

export const answerEventSchema = z.object({
  id: z.string(),
  questionEventId: z.string(),
  answerText: z.string(),
  generatedAt: z.string(),
  modelLatencyMs: z.number().nonnegative(),
  fallback: z.boolean(),
  supersedes: z.string().optional(),
});

export type AnswerEvent = z.infer<typeof answerEventSchema>;

export const summaryEventSchema = z.object({
  id: z.string(),
  windowStart: z.number(),
  windowEnd: z.number(),
  title: z.string(),
  text: z.string(),
  keyPoints: z.array(z.string()),
  segmentCount: z.number().int().nonnegative(),
  generatedAt: z.string(),
  fallback: z.boolean(),
});

export type SummaryEvent = z.infer<typeof summaryEventSchema>;

export const suggestionEventSchema = z.object({
  id: z.string(),
  question: z.string(),
  rationale: z.string(),
  timing: z.string(),
  trigger: z.enum(["request", "periodic"]),
  generatedAt: z.string(),
});

export type SuggestionEvent = z.infer<typeof suggestionEventSchema>;

export const ideaEventSchema = z.object({
  id: z.string(),
  ideas: z.array(z.object({ idea: z.string(), detail: z.string() })),
  deepLearning: z.array(z.object({ topic: z.string(), reason: z.string() })),
  crossDiscipline: z.array(z.object({ field: z.string(), connection: z.string() })),
  generatedAt: z.string(),
});

export type IdeaEvent = z.infer<typeof ideaEventSchema>;

// Session

export const sessionStates = ["Created", "Active", "Paused", "Ended"] as const;
export type SessionState = (typeof sessionStates)[number];

export const sessionSchema = z.object({
  id: z.string(),
  name: z.string().min(1),
  description: z.string().default(""),
  createdAt: z.string(),
  materialsRefs: z.array(z.string()),
  state: z.enum(sessionStates),
  endedAt: z.string().optional(),
});

export type Session = z.infer<typeof sessionSchema>;

export const sessionMetaSchema = sessionSchema.extend({
  outputLanguage: z.string(),
  sourceLanguage: z.string(),
  summaryIntervalMs: z.number(),
  dir: z.string().optional(),
});

export type SessionMeta = z.infer<typeof sessionMetaSchema>;

// Bus payloads

export type LifecycleEventType =
  | "created"
  | "started"
  | "paused"
  | "resumed"
  | "ended"
  | "degraded"
  | "recovered"
  | "warning";

export interface LifecycleEvent {
  type: LifecycleEventType;
  sessionId: string;
  at: string;
  reason?: string;
}

export interface PipelineErrorEvent {
  kind: string;
  component: string;
  message: string;
  at: string;
  detail?: Record<string, unknown>;
}

export interface TopicMap {
  "audio.frame": AudioFrame;
  "transcript.segment": TranscriptSegment;
  "question.detected": QuestionEvent;
  "answer.generated": AnswerEvent;
  "summary.generated": SummaryEvent;
  "suggestion.generated": SuggestionEvent;
  "idea.generated": IdeaEvent;
  "session.lifecycle": LifecycleEvent;
  "pipeline.error": PipelineErrorEvent;
}

export type Topic = keyof TopicMap;

export const allTopics: readonly Topic[] = [
  "audio.frame",
  "transcript.segment",
  "question.detected",
  "answer.generated",
  "summary.generated",
  "suggestion.generated",
  "idea.generated",
  "session.lifecycle",
  "pipeline.error",
];

// LLM response shapes

const kindFromModel = z
  .string()
  .transform((value): QuestionKind => {
    const normalized = value.trim().toLowerCase();
    if (normalized === "rhetorical") return "rhetorical";
    if (normalized === "guiding" || normalized === "implicit") return "implicit";
    return "direct";
  });

export const questionDetectionResponseSchema = z.object({
  is_question: z.boolean(),
  question_text: z.string().default(""),
  question_type: kindFromModel.default("direct"),
  confidence: z.coerce.number().min(0).max(1).default(0),
});

export type QuestionDetectionResponse = z.infer<typeof questionDetectionResponseSchema>;

export const summaryResponseSchema = z.object({
  title: z.string().default(""),
  key_points: z.array(z.string()).default([]),
  important_concepts: z.array(z.string()).default([]),
  summary: z.string(),
});

export type SummaryResponse = z.infer<typeof summaryResponseSchema>;

export const suggestionResponseSchema = z.object({
  question: z.string().min(1),
  rationale: z.string().default(""),
  timing: z.string().default(""),
});

export type SuggestionResponse = z.infer<typeof suggestionResponseSchema>;

export const ideasResponseSchema = z.object({
  creative_ideas: z.array(z.object({ idea: z.string(), detail: z.string().default("") })).default([]),
  deep_learning: z.array(z.object({ topic: z.string(), reason: z.string().default("") })).default([]),
  cross_discipline: z.array(z.object({ field: z.string(), connection: z.string().default("") })).default([]),
});

export type IdeasResponse = z.infer<typeof ideasResponseSchema>;
