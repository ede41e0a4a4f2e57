/**
 * Transcription backend capability
 *
 * A backend opens one streaming connection per classroom session. Times on
 * the messages it yields are relative to the start of that connection's
 * audio; the channel maps them onto session media time.
 */

import type { AudioFormat, TranscriptionSettings } from "../config/pipeline";
import { DeepgramLiveBackend } from "./deepgram_live";

export interface BackendSegment {
  /** Present when the vendor assigns stable utterance ids */
  id?: string;
  text: string;
  startMs: number;
  endMs: number;
  isFinal: boolean;
  language?: string;
}

export interface TranscriptionSessionConfig {
  sessionId: string;
  sampleRate: number;
  channels: number;
  language: string;
  model: string;
}

export interface TranscriptionConnection {
  /** Synchronous hand-off to the socket; throws when the connection is gone */
  send(pcm: Buffer): void;
  /** Ends normally after `close()`, throws when the connection drops */
  receive(): AsyncIterable<BackendSegment>;
  /** Ask the backend to finish pending audio and close */
  close(): Promise<void>;
}

export interface TranscriptionBackend {
  readonly name: string;
  open(config: TranscriptionSessionConfig): Promise<TranscriptionConnection>;
}

export function createTranscriptionBackend(
  settings: TranscriptionSettings,
  audio: AudioFormat
): TranscriptionBackend {
  switch (settings.provider) {
    case "deepgram":
      return new DeepgramLiveBackend({
        apiKey: settings.apiKey,
        sampleRate: audio.sampleRate,
        channels: audio.channels,
      });
  }
}
