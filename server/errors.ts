/**
 * Pipeline error taxonomy
 *
 * Every fault the pipeline reports is one of these kinds. Components retry
 * what is transient and surface the rest as `pipeline.error` events.
 */

export type PipelineErrorKind =
  | "ConnectionError"        // backend unreachable, retried with backoff
  | "ChannelClosed"          // operation after shutdown, surfaced to caller
  | "ProtocolError"          // out-of-order or invalid segment, dropped
  | "AnalysisFailure"        // LLM call failed or timed out
  | "PersistenceError"       // durable write failed
  | "InvalidStateTransition" // rejected control action
  | "ConfigError";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConnectionError extends PipelineError {
  readonly kind = "ConnectionError";

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ChannelClosedError extends PipelineError {
  readonly kind = "ChannelClosed";

  constructor(sessionId: string) {
    super(`Transcription channel for session ${sessionId} is closed`);
  }
}

export class ProtocolError extends PipelineError {
  readonly kind = "ProtocolError";

  constructor(
    message: string,
    public readonly segmentId?: string
  ) {
    super(message);
  }
}

export class AnalysisFailure extends PipelineError {
  readonly kind = "AnalysisFailure";

  constructor(
    public readonly analyzer: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${analyzer}: ${message}`, options);
  }
}

export class PersistenceError extends PipelineError {
  readonly kind = "PersistenceError";

  constructor(
    public readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${filePath}: ${message}`, options);
  }
}

export class InvalidStateTransitionError extends PipelineError {
  readonly kind = "InvalidStateTransition";

  constructor(
    public readonly from: string,
    public readonly action: string
  ) {
    super(`Cannot ${action} a session in state ${from}`);
  }
}

export class ConfigError extends PipelineError {
  readonly kind = "ConfigError";
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
