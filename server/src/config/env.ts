/**
 * Centralized Environment Configuration
 *
 * Fail-fast Zod validation for the environment variables the pipeline reads.
 * Call `getEnv()` once at startup to catch bad config before a session opens.
 */

import { z } from "zod";
import { ConfigError } from "../../errors";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
const LlmProviderSchema = z.enum(["openai", "anthropic"]);
const SttProviderSchema = z.enum(["deepgram"]);

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default(defaultValue ? "true" : "false")
    .transform(value => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default("info"),

  CLASSROOM_DATA_DIR: z.string().min(1).default("./classroom_data"),
  OUTPUT_LANGUAGE: z.string().min(1).default("en"),
  SUMMARY_INTERVAL_MINUTES: z.coerce.number().positive().default(10),
  SUGGESTION_INTERVAL_MINUTES: z.coerce.number().positive().default(5),
  ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  LLM_PROVIDER: LlmProviderSchema.default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default("claude-3-5-haiku-latest"),

  STT_PROVIDER: SttProviderSchema.default("deepgram"),
  DEEPGRAM_API_KEY: z.string().optional(),
  DEEPGRAM_MODEL: z.string().default("nova-2"),
  STT_LANGUAGE: z.string().default("en"),
  STT_MAX_RECONNECT_ATTEMPTS: z.coerce.number().int().nonnegative().default(5),
  STT_MAX_BUFFERED_FRAMES: z.coerce.number().int().positive().default(600),

  AUDIO_SAMPLE_RATE: z.coerce.number().int().positive().default(16000),
  AUDIO_CHANNELS: z.coerce.number().int().positive().default(1),
  AUDIO_FRAME_MS: z.coerce.number().int().positive().default(100),
  PERSIST_AUDIO: booleanFlag(false),

  ENABLE_QUESTION_DETECTION: booleanFlag(true),
  ENABLE_AUTO_ANSWER: booleanFlag(true),
  ENABLE_PERIODIC_SUMMARY: booleanFlag(true),
  ENABLE_PERIODIC_SUGGESTIONS: booleanFlag(false),
});

export type Env = z.infer<typeof EnvSchema>;
export type LlmProvider = z.infer<typeof LlmProviderSchema>;
export type SttProvider = z.infer<typeof SttProviderSchema>;

let _env: Env | null = null;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    const missingVars: string[] = [];
    const invalidVars: string[] = [];

    for (const issue of result.error.issues) {
      const path = issue.path.join(".");
      if (issue.code === "invalid_type" && issue.received === "undefined") {
        missingVars.push(path);
      } else {
        invalidVars.push(`${path}: ${issue.message}`);
      }
    }

    const errorMessages: string[] = [];

    if (missingVars.length > 0) {
      errorMessages.push(`Missing required environment variables:\n  - ${missingVars.join("\n  - ")}`);
    }

    if (invalidVars.length > 0) {
      errorMessages.push(`Invalid environment variables:\n  - ${invalidVars.join("\n  - ")}`);
    }

    throw new ConfigError(`Environment configuration error\n${errorMessages.join("\n\n")}`);
  }

  return result.data;
}

export function getEnv(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

export function requireEnv(key: keyof Env, env: Env = getEnv()): string {
  const value = env[key];
  if (value === undefined || value === "") {
    throw new ConfigError(`Required environment variable ${key} is not set`);
  }
  return String(value);
}
