import { describe, it, expect } from "vitest";
import { parseEnv, requireEnv } from "../../src/config/env";
import { pipelineConfigFromEnv } from "../../config/pipeline";
import { ConfigError } from "../../errors";

describe("requireEnv", () => {
  it("returns a set variable and rejects a missing one", () => {
    const env = parseEnv({ DEEPGRAM_API_KEY: "test-secret" });

    expect(requireEnv("DEEPGRAM_API_KEY", env)).toBe("test-secret");
    expect(() => requireEnv("OPENAI_API_KEY", env)).toThrow(ConfigError);
    expect(() => requireEnv("OPENAI_API_KEY", env)).toThrow("Required environment variable OPENAI_API_KEY is not set");
  });
});

describe("parseEnv", () => {
  it("applies defaults to an empty environment", () => {
    const env = parseEnv({});

    expect(env).toMatchObject({
      LOG_LEVEL: "info",
      CLASSROOM_DATA_DIR: "./classroom_data",
      SUMMARY_INTERVAL_MINUTES: 10,
      LLM_PROVIDER: "openai",
      PERSIST_AUDIO: false,
      ENABLE_AUTO_ANSWER: true,
      ENABLE_PERIODIC_SUGGESTIONS: false,
    });
    expect(env.OPENAI_API_KEY).toBeUndefined();
  });

  it("accepts the usual spellings of boolean flags", () => {
    const env = parseEnv({ PERSIST_AUDIO: "yes", ENABLE_AUTO_ANSWER: "0", ENABLE_PERIODIC_SUMMARY: "1" });

    expect(env.PERSIST_AUDIO).toBe(true);
    expect(env.ENABLE_AUTO_ANSWER).toBe(false);
    expect(env.ENABLE_PERIODIC_SUMMARY).toBe(true);
  });

  it("lists every invalid variable in one ConfigError", () => {
    let failure: unknown;
    try {
      parseEnv({ LOG_LEVEL: "verbose", SUMMARY_INTERVAL_MINUTES: "-1" });
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(ConfigError);
    expect(failure).toMatchObject({ kind: "ConfigError" });
    const message = failure instanceof Error ? failure.message : "";
    expect(message).toContain("Invalid environment variables:");
    expect(message).toContain("  - LOG_LEVEL: Invalid enum value");
    expect(message).toContain("  - SUMMARY_INTERVAL_MINUTES: Number must be greater than 0");
  });
});

describe("pipelineConfigFromEnv", () => {
  it("converts minutes to milliseconds and picks the LLM provider", () => {
    const config = pipelineConfigFromEnv(parseEnv({
      SUMMARY_INTERVAL_MINUTES: "2.5",
      LLM_PROVIDER: "anthropic",
      ANTHROPIC_API_KEY: "test-secret",
      CLASSROOM_DATA_DIR: "/tmp/lectures",
    }));

    expect(config.analysis.summaryIntervalMs).toBe(150_000);
    expect(config.analysis.suggestionIntervalMs).toBe(300_000);
    expect(config.llm).toMatchObject({ provider: "anthropic", apiKey: "test-secret", model: "claude-3-5-haiku-latest" });
    expect(config.storage).toMatchObject({ dataDir: "/tmp/lectures", persistAudio: false, writeRetries: 3 });
  });
});
