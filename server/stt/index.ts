/**
 * STT (Speech-to-Text) Pipeline
 *
 * Streams lecture audio to a live transcription backend and publishes
 * normalized transcript segments on the event bus.
 *
 * Architecture:
 * - Audio source yields fixed-size PCM16LE frames
 * - TranscriptionChannel forwards frames to the backend connection
 * - A receiver task maps backend results onto session media time
 * - Finals and partials are published on `transcript.segment`
 *
 * Required Environment Variables:
 * - DEEPGRAM_API_KEY: Deepgram API key for streaming transcription
 */

export { TranscriptionChannel } from "./transcriptionChannel";
export type { ChannelSettings, ChannelStats, TranscriptionChannelOptions } from "./transcriptionChannel";

export { createTranscriptionBackend } from "./backend";
export type {
  BackendSegment,
  TranscriptionBackend,
  TranscriptionConnection,
  TranscriptionSessionConfig,
} from "./backend";

export { DeepgramLiveBackend, normalizeDeepgramMessage } from "./deepgram_live";
export type { DeepgramConfig } from "./deepgram_live";

export { AsyncChannel } from "./asyncChannel";
export { StreamTimeline } from "./streamTimeline";
