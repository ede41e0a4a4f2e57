/**
 * Pipeline Configuration
 *
 * Typed settings for one classroom run. Built from the validated env at
 * startup; tests construct it directly with `createPipelineConfig()`.
 */

import type { Env, LlmProvider } from "../src/config/env";

export interface AudioFormat {
  sampleRate: number;
  channels: number;
  frameDurationMs: number;
}

export interface TranscriptionSettings {
  provider: "deepgram";
  apiKey?: string;
  model: string;
  language: string;
  maxReconnectAttempts: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  maxBufferedFrames: number;
}

export interface LlmSettings {
  provider: LlmProvider;
  apiKey?: string;
  baseURL?: string;
  model: string;
}

export interface AnalysisSettings {
  outputLanguage: string;
  questionDetection: boolean;
  autoAnswer: boolean;
  periodicSummary: boolean;
  periodicSuggestions: boolean;
  questionWindowSize: number;
  questionConfidenceThreshold: number;
  questionSimilarityThreshold: number;
  answerMaxRetries: number;
  retryBaseDelayMs: number;
  summaryIntervalMs: number;
  summaryIdleCheckMs: number;
  suggestionIntervalMs: number;
  suggestionMinSegments: number;
  callTimeoutMs: number;
  shutdownTimeoutMs: number;
  materialsBudgetChars: number;
}

export interface StorageSettings {
  dataDir: string;
  persistAudio: boolean;
  writeRetries: number;
  writeRetryDelayMs: number;
}

export interface PipelineConfig {
  audio: AudioFormat;
  transcription: TranscriptionSettings;
  llm: LlmSettings;
  analysis: AnalysisSettings;
  storage: StorageSettings;
}

const MINUTE_MS = 60_000;

const DEFAULT_CONFIG: PipelineConfig = {
  audio: {
    sampleRate: 16000,
    channels: 1,
    frameDurationMs: 100,
  },
  transcription: {
    provider: "deepgram",
    model: "nova-2",
    language: "en",
    maxReconnectAttempts: 5,
    reconnectBaseDelayMs: 1000,
    reconnectMaxDelayMs: 30000,
    maxBufferedFrames: 600,
  },
  llm: {
    provider: "openai",
    model: "gpt-4o-mini",
  },
  analysis: {
    outputLanguage: "en",
    questionDetection: true,
    autoAnswer: true,
    periodicSummary: true,
    periodicSuggestions: false,
    questionWindowSize: 5,
    questionConfidenceThreshold: 0.7,
    questionSimilarityThreshold: 0.8,
    answerMaxRetries: 2,
    retryBaseDelayMs: 1000,
    summaryIntervalMs: 10 * MINUTE_MS,
    summaryIdleCheckMs: 15000,
    suggestionIntervalMs: 5 * MINUTE_MS,
    suggestionMinSegments: 10,
    callTimeoutMs: 30000,
    shutdownTimeoutMs: 30000,
    materialsBudgetChars: 2000,
  },
  storage: {
    dataDir: "./classroom_data",
    persistAudio: false,
    writeRetries: 3,
    writeRetryDelayMs: 100,
  },
};

export interface PipelineConfigOverrides {
  audio?: Partial<AudioFormat>;
  transcription?: Partial<TranscriptionSettings>;
  llm?: Partial<LlmSettings>;
  analysis?: Partial<AnalysisSettings>;
  storage?: Partial<StorageSettings>;
}

export function createPipelineConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  return {
    audio: { ...DEFAULT_CONFIG.audio, ...overrides.audio },
    transcription: { ...DEFAULT_CONFIG.transcription, ...overrides.transcription },
    llm: { ...DEFAULT_CONFIG.llm, ...overrides.llm },
    analysis: { ...DEFAULT_CONFIG.analysis, ...overrides.analysis },
    storage: { ...DEFAULT_CONFIG.storage, ...overrides.storage },
  };
}

export function pipelineConfigFromEnv(env: Env): PipelineConfig {
  const llm: Partial<LlmSettings> =
    env.LLM_PROVIDER === "anthropic"
      ? { provider: "anthropic", apiKey: env.ANTHROPIC_API_KEY, model: env.ANTHROPIC_MODEL }
      : { provider: "openai", apiKey: env.OPENAI_API_KEY, baseURL: env.OPENAI_BASE_URL, model: env.OPENAI_MODEL };

  return createPipelineConfig({
    audio: {
      sampleRate: env.AUDIO_SAMPLE_RATE,
      channels: env.AUDIO_CHANNELS,
      frameDurationMs: env.AUDIO_FRAME_MS,
    },
    transcription: {
      provider: env.STT_PROVIDER,
      apiKey: env.DEEPGRAM_API_KEY,
      model: env.DEEPGRAM_MODEL,
      language: env.STT_LANGUAGE,
      maxReconnectAttempts: env.STT_MAX_RECONNECT_ATTEMPTS,
      maxBufferedFrames: env.STT_MAX_BUFFERED_FRAMES,
    },
    llm,
    analysis: {
      outputLanguage: env.OUTPUT_LANGUAGE,
      questionDetection: env.ENABLE_QUESTION_DETECTION,
      autoAnswer: env.ENABLE_AUTO_ANSWER,
      periodicSummary: env.ENABLE_PERIODIC_SUMMARY,
      periodicSuggestions: env.ENABLE_PERIODIC_SUGGESTIONS,
      summaryIntervalMs: Math.round(env.SUMMARY_INTERVAL_MINUTES * MINUTE_MS),
      suggestionIntervalMs: Math.round(env.SUGGESTION_INTERVAL_MINUTES * MINUTE_MS),
      callTimeoutMs: env.ANALYSIS_TIMEOUT_MS,
    },
    storage: {
      dataDir: env.CLASSROOM_DATA_DIR,
      persistAudio: env.PERSIST_AUDIO,
    },
  });
}
