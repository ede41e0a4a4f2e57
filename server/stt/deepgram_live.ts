/**
 * Deepgram Live STT Backend
 *
 * Streams binary PCM16LE to Deepgram's WebSocket API and yields interim and
 * final results as backend segments.
 * Requires DEEPGRAM_API_KEY.
 *
 * Features:
 * - Punctuation and smart formatting
 * - Interim results (partials) keyed by utterance start
 * - Configurable endpointing
 * - KeepAlive messages while no audio is sent (paused sessions)
 * - Graceful CloseStream shutdown so trailing finals are delivered
 */

import WebSocket from "ws";
import { z } from "zod";
import { log, errorMessage } from "../logger";
import { ConnectionError } from "../errors";
import { AsyncChannel } from "./asyncChannel";
import type {
  BackendSegment,
  TranscriptionBackend,
  TranscriptionConnection,
  TranscriptionSessionConfig,
} from "./backend";

const DEEPGRAM_WS_URL = "wss://api.deepgram.com/v1/listen";
const CONNECT_TIMEOUT_MS = 10000;
const CLOSE_TIMEOUT_MS = 5000;
// Deepgram closes a stream after about 10s without audio
const KEEP_ALIVE_INTERVAL_MS = 4000;

export interface DeepgramConfig {
  apiKey?: string;
  sampleRate?: number;
  channels?: number;
  encoding?: string;
  punctuate?: boolean;
  smartFormat?: boolean;
  interimResults?: boolean;
  endpointing?: number;
  keepAliveIntervalMs?: number;
  url?: string;
}

const deepgramResultsSchema = z.object({
  type: z.literal("Results"),
  start: z.number().default(0),
  duration: z.number().default(0),
  is_final: z.boolean().default(false),
  channel: z.object({
    alternatives: z.array(
      z.object({
        transcript: z.string(),
        confidence: z.number().optional(),
      })
    ),
  }),
});

/**
 * Convert one Deepgram message into a backend segment.
 * Returns null for metadata, speech-started and utterance-end messages and for
 * results without text.
 */
export function normalizeDeepgramMessage(payload: unknown, language?: string): BackendSegment | null {
  const parsed = deepgramResultsSchema.safeParse(payload);
  if (!parsed.success) return null;

  const response = parsed.data;
  const transcript = response.channel.alternatives[0]?.transcript.trim() ?? "";
  if (!transcript) return null;

  return {
    text: transcript,
    startMs: Math.round(response.start * 1000),
    endMs: Math.round((response.start + response.duration) * 1000),
    isFinal: response.is_final,
    language,
  };
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

class DeepgramConnection implements TranscriptionConnection {
  private readonly segments = new AsyncChannel<BackendSegment>();
  private closeRequested = false;
  private lastAudioAt = Date.now();
  private keepAliveTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly ws: WebSocket,
    private readonly config: TranscriptionSessionConfig,
    keepAliveIntervalMs: number
  ) {
    this.keepAliveTimer = setInterval(() => {
      this.sendKeepAlive(keepAliveIntervalMs);
    }, keepAliveIntervalMs);
    this.keepAliveTimer.unref();

    ws.on("message", (data: WebSocket.RawData) => {
      this.handleMessage(data);
    });

    ws.on("error", (error: Error) => {
      log(`[DeepgramBridge] WebSocket error: ${error.message}`, "stt", "warn");
      this.stopKeepAlive();
      this.segments.fail(new ConnectionError(error.message, undefined, { cause: error }));
    });

    ws.on("close", (code: number, reason: Buffer) => {
      log(`[DeepgramBridge] Connection closed: ${code} - ${reason.toString()}`, "stt", "debug");
      this.stopKeepAlive();
      if (this.closeRequested) {
        this.segments.end();
      } else {
        this.segments.fail(new ConnectionError(`Deepgram connection closed unexpectedly (${code})`));
      }
    });
  }

  private sendKeepAlive(idleMs: number): void {
    if (this.closeRequested || this.ws.readyState !== WebSocket.OPEN) return;
    if (Date.now() - this.lastAudioAt < idleMs) return;
    this.ws.send(JSON.stringify({ type: "KeepAlive" }));
    log(`[DeepgramBridge] KeepAlive sent for session ${this.config.sessionId}`, "stt", "debug");
  }

  private stopKeepAlive(): void {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }

  private handleMessage(data: WebSocket.RawData): void {
    let payload: unknown;
    try {
      payload = JSON.parse(rawDataToString(data));
    } catch (error) {
      log(`[DeepgramBridge] Failed to parse message: ${errorMessage(error)}`, "stt", "warn");
      return;
    }

    const segment = normalizeDeepgramMessage(payload, this.config.language);
    if (segment) {
      this.segments.push(segment);
    }
  }

  send(pcm: Buffer): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new ConnectionError("Deepgram socket is not open");
    }
    this.ws.send(pcm);
    this.lastAudioAt = Date.now();
  }

  receive(): AsyncIterable<BackendSegment> {
    return this.segments;
  }

  async close(): Promise<void> {
    if (this.closeRequested) return;
    this.closeRequested = true;
    this.stopKeepAlive();

    if (this.ws.readyState !== WebSocket.OPEN) {
      this.segments.end();
      return;
    }

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        log(`[DeepgramBridge] Close timed out for session ${this.config.sessionId}, terminating`, "stt", "warn");
        this.ws.terminate();
        this.segments.end();
        resolve();
      }, CLOSE_TIMEOUT_MS);

      this.ws.once("close", () => {
        clearTimeout(timeout);
        resolve();
      });

      // Deepgram flushes remaining finals, then closes the socket itself
      this.ws.send(JSON.stringify({ type: "CloseStream" }));
    });
  }
}

export class DeepgramLiveBackend implements TranscriptionBackend {
  readonly name = "deepgram";
  private readonly config: Required<Omit<DeepgramConfig, "apiKey">> & { apiKey?: string };

  constructor(config: DeepgramConfig = {}) {
    this.config = {
      apiKey: config.apiKey,
      sampleRate: config.sampleRate || 16000,
      channels: config.channels || 1,
      encoding: config.encoding || "linear16",
      punctuate: config.punctuate !== false,
      smartFormat: config.smartFormat !== false,
      interimResults: config.interimResults !== false,
      endpointing: config.endpointing || 300,
      keepAliveIntervalMs: config.keepAliveIntervalMs || KEEP_ALIVE_INTERVAL_MS,
      url: config.url || DEEPGRAM_WS_URL,
    };
  }

  buildUrl(session: TranscriptionSessionConfig): string {
    const params = new URLSearchParams({
      encoding: this.config.encoding,
      sample_rate: session.sampleRate.toString(),
      channels: session.channels.toString(),
      punctuate: this.config.punctuate.toString(),
      smart_format: this.config.smartFormat.toString(),
      interim_results: this.config.interimResults.toString(),
      endpointing: this.config.endpointing.toString(),
      language: session.language,
      model: session.model,
    });

    return `${this.config.url}?${params.toString()}`;
  }

  open(session: TranscriptionSessionConfig): Promise<TranscriptionConnection> {
    const apiKey = this.config.apiKey ?? process.env.DEEPGRAM_API_KEY;

    if (!apiKey) {
      return Promise.reject(new ConnectionError("DEEPGRAM_API_KEY environment variable is not set", 401));
    }

    const ws = new WebSocket(this.buildUrl(session), {
      headers: {
        Authorization: `Token ${apiKey}`,
      },
    });

    return new Promise((resolve, reject) => {
      let settled = false;
      let rejectedStatus: number | undefined;

      const fail = (error: ConnectionError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        ws.terminate();
        reject(error);
      };

      const timeout = setTimeout(() => {
        log(`[DeepgramBridge] Connection timeout for session ${session.sessionId}`, "stt", "warn");
        fail(new ConnectionError("Timed out connecting to Deepgram"));
      }, CONNECT_TIMEOUT_MS);

      ws.once("unexpected-response", (_request, response) => {
        rejectedStatus = response.statusCode;
        fail(new ConnectionError(`Deepgram rejected the connection (HTTP ${rejectedStatus})`, rejectedStatus));
      });

      ws.once("error", (error: Error) => {
        fail(new ConnectionError(`Failed to connect to Deepgram: ${error.message}`, rejectedStatus, { cause: error }));
      });

      ws.once("open", () => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        log(`[DeepgramBridge] Connected for session ${session.sessionId}`, "stt");
        resolve(new DeepgramConnection(ws, session, this.config.keepAliveIntervalMs));
      });
    });
  }
}
