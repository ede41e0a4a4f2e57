/**
 * Audio Source
 *
 * Pull-based capture interface: the engine's pump awaits `nextFrame()` and
 * forwards each frame to the transcription channel. Device enumeration and
 * raw capture live outside the pipeline; `ReadableAudioSource` frames any
 * Node stream of PCM16LE bytes (for example stdin piped from arecord or sox).
 */

import type { Readable } from "node:stream";
import { log } from "../logger";
import { END_OF_STREAM } from "@shared/schema";
import type { AudioFrame, EndOfStream } from "@shared/schema";
import type { AudioFormat } from "../config/pipeline";

export interface AudioSource {
  nextFrame(): Promise<AudioFrame | EndOfStream>;
  close(): Promise<void>;
}

const BYTES_PER_SAMPLE = 2;

export function frameSizeBytes(format: AudioFormat): number {
  return Math.round((format.sampleRate * format.channels * BYTES_PER_SAMPLE * format.frameDurationMs) / 1000);
}

export class ReadableAudioSource implements AudioSource {
  private readonly frameBytes: number;
  private readonly chunks: AsyncIterator<unknown>;
  private pending: Buffer = Buffer.alloc(0);
  private seq = 0;
  private ended = false;

  constructor(
    private readonly stream: Readable,
    format: AudioFormat
  ) {
    this.frameBytes = frameSizeBytes(format);
    this.chunks = stream[Symbol.asyncIterator]();
  }

  async nextFrame(): Promise<AudioFrame | EndOfStream> {
    while (this.pending.length < this.frameBytes && !this.ended) {
      const result = await this.chunks.next();
      if (result.done) {
        this.ended = true;
        break;
      }
      this.pending = Buffer.concat([this.pending, toBuffer(result.value)]);
    }

    if (this.pending.length === 0) {
      return END_OF_STREAM;
    }

    const size = Math.min(this.frameBytes, this.pending.length);
    // Trailing partial frame is zero-padded so every frame has the same size
    const data = Buffer.alloc(this.frameBytes);
    this.pending.copy(data, 0, 0, size);
    this.pending = this.pending.subarray(size);

    return {
      seq: this.seq++,
      data,
      capturedAt: Date.now(),
    };
  }

  async close(): Promise<void> {
    this.ended = true;
    if (!this.stream.destroyed) {
      this.stream.destroy();
    }
    log(`[AudioSource] Closed after ${this.seq} frame(s)`, "audio", "debug");
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk, "binary");
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.alloc(0);
}
