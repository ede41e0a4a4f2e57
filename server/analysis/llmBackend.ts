/**
 * Analyzer LLM backends
 *
 * One `complete()` call per analyzer request. The provider is chosen once at
 * startup; every call runs behind a per-provider circuit breaker so a dead
 * provider fails fast instead of stacking timeouts.
 */

import OpenAI from "openai";
import Anthropic from "@anthropic-ai/sdk";
import { log } from "../logger";
import { ConfigError } from "../errors";
import { CircuitState, getCircuitBreaker, withCircuitBreaker } from "../../lib/reliability";
import type { CircuitBreaker } from "../../lib/reliability";
import type { LlmSettings } from "../config/pipeline";

export type AnalysisPurpose =
  | "question_detection"
  | "answer"
  | "summary"
  | "suggestion"
  | "ideas";

export interface CompletionRequest {
  purpose: AnalysisPurpose;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
  /** Aborted when the analyzer no longer wants the result */
  signal?: AbortSignal;
}

export interface AnalyzerBackend {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}

const BREAKER_SETTINGS = {
  failureThreshold: 5,
  openDurationMs: 60000,
  onStateChange: (name: string, from: CircuitState, to: CircuitState) => {
    log(`[AnalyzerBackend] Circuit ${name}: ${from} -> ${to}`, "analysis", to === CircuitState.OPEN ? "warn" : "info");
  },
};

export class OpenAIAnalyzerBackend implements AnalyzerBackend {
  readonly name = "openai";
  private readonly client: OpenAI;
  private readonly breaker: CircuitBreaker;

  constructor(
    private readonly model: string,
    options: { apiKey?: string; baseURL?: string } = {}
  ) {
    this.client = new OpenAI({
      apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
      baseURL: options.baseURL,
    });
    this.breaker = getCircuitBreaker("openai-analysis", BREAKER_SETTINGS);
  }

  complete(request: CompletionRequest): Promise<string> {
    return withCircuitBreaker(async () => {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      }, { signal: request.signal });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error(`Empty ${request.purpose} response from ${this.model}`);
      }
      return content;
    }, this.breaker);
  }
}

export class AnthropicAnalyzerBackend implements AnalyzerBackend {
  readonly name = "anthropic";
  private readonly client: Anthropic;
  private readonly breaker: CircuitBreaker;

  constructor(
    private readonly model: string,
    options: { apiKey?: string } = {}
  ) {
    this.client = new Anthropic({
      apiKey: options.apiKey ?? process.env.ANTHROPIC_API_KEY,
    });
    this.breaker = getCircuitBreaker("anthropic-analysis", BREAKER_SETTINGS);
  }

  complete(request: CompletionRequest): Promise<string> {
    return withCircuitBreaker(async () => {
      const message = await this.client.messages.create({
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: [{ role: "user", content: request.user }],
      }, { signal: request.signal });

      const text = message.content
        .map(block => (block.type === "text" ? block.text : ""))
        .join("")
        .trim();

      if (!text) {
        throw new Error(`Empty ${request.purpose} response from ${this.model}`);
      }
      return text;
    }, this.breaker);
  }
}

export function createAnalyzerBackend(settings: LlmSettings): AnalyzerBackend {
  switch (settings.provider) {
    case "openai":
      if (!settings.apiKey) {
        throw new ConfigError("OPENAI_API_KEY is required when LLM_PROVIDER=openai");
      }
      log(`[LLM] Using OpenAI model ${settings.model}${settings.baseURL ? ` via ${settings.baseURL}` : ""}`, "analysis");
      return new OpenAIAnalyzerBackend(settings.model, { apiKey: settings.apiKey, baseURL: settings.baseURL });

    case "anthropic":
      if (!settings.apiKey) {
        throw new ConfigError("ANTHROPIC_API_KEY is required when LLM_PROVIDER=anthropic");
      }
      log(`[LLM] Using Anthropic model ${settings.model}`, "analysis");
      return new AnthropicAnalyzerBackend(settings.model, { apiKey: settings.apiKey });
  }
}
