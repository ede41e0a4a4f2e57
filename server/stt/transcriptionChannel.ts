/**
 * Transcription Channel
 *
 * Owns the streaming connection for one classroom session:
 * - forwards audio frames without ever blocking the capture path
 * - runs a receiver task that normalizes backend messages into transcript
 *   segments and publishes them on `transcript.segment`
 * - reconnects with bounded exponential backoff, buffering audio meanwhile
 *
 * Segment rules: partials are replaced by id, finals are immutable and
 * arrive in non-decreasing start order. A duplicate final is dropped; an
 * out-of-order final is dropped and reported as a ProtocolError.
 */

import { log, errorMessage } from "../logger";
import { computeBackoff, is4xxAuthError } from "../../lib/reliability";
import { ChannelClosedError, ConnectionError, ProtocolError } from "../errors";
import { publishLifecycle, reportPipelineError } from "../events/reporting";
import { StreamTimeline } from "./streamTimeline";
import type { EventBus } from "../events/eventBus";
import type { AudioFormat, TranscriptionSettings } from "../config/pipeline";
import type { AudioFrame, TranscriptSegment } from "@shared/schema";
import type { BackendSegment, TranscriptionBackend, TranscriptionConnection } from "./backend";

export type ChannelSettings = Pick<
  TranscriptionSettings,
  "language" | "model" | "maxReconnectAttempts" | "reconnectBaseDelayMs" | "reconnectMaxDelayMs" | "maxBufferedFrames"
>;

export interface TranscriptionChannelOptions {
  sessionId: string;
  bus: EventBus;
  backend: TranscriptionBackend;
  audio: AudioFormat;
  settings: ChannelSettings;
}

export interface ChannelStats {
  connected: boolean;
  degraded: boolean;
  framesSent: number;
  framesBuffered: number;
  framesDropped: number;
  reconnects: number;
  segmentsPublished: number;
  duplicatesDropped: number;
  protocolErrors: number;
}

export class TranscriptionChannel {
  private connection: TranscriptionConnection | null = null;
  private timeline: StreamTimeline = new StreamTimeline(0);
  private pending: AudioFrame[] = [];
  private receiverTask: Promise<void> | null = null;
  private closePromise: Promise<void> | null = null;
  private accepting = false;
  private closing = false;
  private degraded = false;
  private wakeReconnect: (() => void) | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;

  private readonly finalizedIds = new Set<string>();
  private lastFinalStart = -1;
  private mediaCursorMs = 0;

  private stats = {
    framesSent: 0,
    framesDropped: 0,
    reconnects: 0,
    segmentsPublished: 0,
    duplicatesDropped: 0,
    protocolErrors: 0,
  };

  constructor(private readonly options: TranscriptionChannelOptions) {}

  get sessionId(): string {
    return this.options.sessionId;
  }

  /**
   * Opens the first connection. Failure here is not retried: the caller
   * aborts startup.
   */
  async open(): Promise<this> {
    if (this.receiverTask || this.closing) {
      throw new ChannelClosedError(this.sessionId);
    }

    try {
      this.connection = await this.connect();
    } catch (error) {
      const failure = error instanceof ConnectionError
        ? error
        : new ConnectionError(`Failed to open ${this.options.backend.name} stream: ${errorMessage(error)}`, undefined, { cause: error });
      log(`[TranscriptionChannel] ${failure.message}`, "stt", "error");
      throw failure;
    }

    this.accepting = true;
    this.receiverTask = this.runReceiver();
    log(`[TranscriptionChannel] Opened ${this.options.backend.name} stream for session ${this.sessionId}`, "stt");
    return this;
  }

  private connect(): Promise<TranscriptionConnection> {
    const { audio, settings } = this.options;
    return this.options.backend.open({
      sessionId: this.sessionId,
      sampleRate: audio.sampleRate,
      channels: audio.channels,
      language: settings.language,
      model: settings.model,
    });
  }

  /**
   * Hands a frame to the connection, or to the local buffer while
   * disconnected. Never awaits.
   */
  sendAudio(frame: AudioFrame): void {
    if (!this.accepting) {
      throw new ChannelClosedError(this.sessionId);
    }

    if (this.connection && this.pending.length === 0) {
      if (this.transmit(this.connection, frame)) return;
    }

    this.buffer(frame);
  }

  private transmit(connection: TranscriptionConnection, frame: AudioFrame): boolean {
    try {
      connection.send(frame.data);
    } catch (error) {
      log(`[TranscriptionChannel] Send failed, buffering: ${errorMessage(error)}`, "stt", "debug");
      return false;
    }

    const frameMs = this.options.audio.frameDurationMs;
    const mediaStart = frame.seq * frameMs;
    this.timeline.recordSent(mediaStart, frameMs);
    this.mediaCursorMs = mediaStart + frameMs;
    this.stats.framesSent++;
    return true;
  }

  private buffer(frame: AudioFrame): void {
    this.pending.push(frame);

    const max = this.options.settings.maxBufferedFrames;
    if (this.pending.length > max) {
      const overflow = this.pending.length - max;
      this.pending.splice(0, overflow);
      this.stats.framesDropped += overflow;

      if (this.stats.framesDropped === overflow || this.stats.framesDropped % 100 === 0) {
        log(`[TranscriptionChannel] Audio buffer full, ${this.stats.framesDropped} frame(s) dropped so far`, "stt", "warn");
      }
    }
  }

  private flushPending(connection: TranscriptionConnection): void {
    while (this.pending.length > 0) {
      const frame = this.pending[0];
      if (!this.transmit(connection, frame)) return;
      this.pending.shift();
    }
  }

  private async runReceiver(): Promise<void> {
    while (this.connection) {
      const connection = this.connection;

      try {
        for await (const message of connection.receive()) {
          this.handleMessage(message);
        }
        if (this.closing) return;
        throw new ConnectionError("Transcription stream ended unexpectedly");
      } catch (error) {
        if (this.closing) {
          log(`[TranscriptionChannel] Stream ended during close: ${errorMessage(error)}`, "stt", "debug");
          return;
        }

        log(`[TranscriptionChannel] Stream lost: ${errorMessage(error)}`, "stt", "warn");
        this.connection = null;
        this.connection = await this.reconnect();
      }
    }
  }

  private async reconnect(): Promise<TranscriptionConnection | null> {
    const { maxReconnectAttempts, reconnectBaseDelayMs, reconnectMaxDelayMs } = this.options.settings;

    for (let attempt = 0; !this.closing; attempt++) {
      const delayMs = computeBackoff(Math.min(attempt, 30), reconnectBaseDelayMs, reconnectMaxDelayMs);
      await this.waitForRetry(delayMs);
      if (this.closing) return null;

      this.stats.reconnects++;
      try {
        const connection = await this.connect();

        if (this.closing) {
          await connection.close();
          return null;
        }

        // Backend time restarts at zero on every connection
        const baseMs = this.pending.length > 0
          ? this.pending[0].seq * this.options.audio.frameDurationMs
          : this.mediaCursorMs;
        this.timeline = new StreamTimeline(baseMs);
        this.flushPending(connection);

        log(`[TranscriptionChannel] Reconnected after ${attempt + 1} attempt(s)`, "stt");
        if (this.degraded) {
          this.degraded = false;
          publishLifecycle(this.options.bus, this.sessionId, "recovered", "transcription stream restored");
        }
        return connection;
      } catch (error) {
        log(`[TranscriptionChannel] Reconnect attempt ${attempt + 1} failed: ${errorMessage(error)}`, "stt", "warn");

        if (is4xxAuthError(error)) {
          this.markDegraded(`credentials rejected: ${errorMessage(error)}`);
          this.accepting = false;
          this.pending = [];
          return null;
        }

        if (attempt + 1 >= maxReconnectAttempts) {
          this.markDegraded(`reconnect failed after ${maxReconnectAttempts} attempt(s)`);
        }
      }
    }

    return null;
  }

  private markDegraded(reason: string): void {
    if (this.degraded) return;
    this.degraded = true;
    log(`[TranscriptionChannel] Degraded: ${reason}`, "stt", "error");
    publishLifecycle(this.options.bus, this.sessionId, "degraded", reason);
    reportPipelineError(this.options.bus, "transcription", new ConnectionError(reason));
  }

  private waitForRetry(delayMs: number): Promise<void> {
    return new Promise(resolve => {
      this.wakeReconnect = resolve;
      this.reconnectTimer = setTimeout(() => {
        this.wakeReconnect = null;
        this.reconnectTimer = null;
        resolve();
      }, delayMs);
    });
  }

  private handleMessage(message: BackendSegment): void {
    const text = message.text.trim();
    if (!text) return;

    const startTime = this.timeline.toMedia(message.startMs);
    const endTime = Math.max(startTime, this.timeline.toMedia(message.endMs));
    const id = message.id ?? `seg-${startTime}`;

    if (this.finalizedIds.has(id)) {
      if (message.isFinal) {
        this.stats.duplicatesDropped++;
        log(`[TranscriptionChannel] Duplicate final ${id} dropped`, "stt", "debug");
      }
      return;
    }

    if (message.isFinal) {
      if (startTime < this.lastFinalStart) {
        this.stats.protocolErrors++;
        const error = new ProtocolError(
          `Final segment ${id} starts at ${startTime}ms, before previous final at ${this.lastFinalStart}ms`,
          id
        );
        log(`[TranscriptionChannel] ${error.message}`, "stt", "warn");
        reportPipelineError(this.options.bus, "transcription", error, { segmentId: id });
        return;
      }

      this.finalizedIds.add(id);
      this.lastFinalStart = startTime;
    }

    const segment: TranscriptSegment = {
      id,
      startTime,
      endTime,
      text,
      isFinal: message.isFinal,
      language: message.language ?? this.options.settings.language,
    };

    this.stats.segmentsPublished++;
    this.options.bus.publish("transcript.segment", segment);
  }

  /**
   * Flushes buffered audio when connected, lets the backend finish, drains
   * the receiver task and refuses further audio.
   */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.shutdown();
    }
    return this.closePromise;
  }

  private async shutdown(): Promise<void> {
    this.accepting = false;
    this.closing = true;

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.wakeReconnect?.();
    this.wakeReconnect = null;

    const connection = this.connection;
    if (connection) {
      this.flushPending(connection);
      try {
        await connection.close();
      } catch (error) {
        log(`[TranscriptionChannel] Error closing stream: ${errorMessage(error)}`, "stt", "warn");
      }
    }

    if (this.pending.length > 0) {
      log(`[TranscriptionChannel] ${this.pending.length} buffered frame(s) discarded at close`, "stt", "warn");
      this.pending = [];
    }

    await this.receiverTask;
    this.connection = null;
    log(`[TranscriptionChannel] Closed stream for session ${this.sessionId}`, "stt");
  }

  getStats(): ChannelStats {
    return {
      ...this.stats,
      connected: this.connection !== null,
      degraded: this.degraded,
      framesBuffered: this.pending.length,
    };
  }
}
