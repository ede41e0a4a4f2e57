/**
 * Retry + Circuit Breaker Utility
 *
 * Jittered exponential backoff for analyzer calls, transcription reconnects
 * and durable writes, plus a per-provider circuit breaker for the LLM
 * backends.
 */

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half-open',
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
  retryOn: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export interface CircuitBreakerConfig {
  name: string;
  failureThreshold: number;
  successThreshold: number;
  openDurationMs: number;
  onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  consecutiveFailures: number;
  totalRequests: number;
  totalFailures: number;
  openedAt: number | null;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 2,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitterFactor: 0.2,
  retryOn: isRetryableError,
};

const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  name: 'default',
  failureThreshold: 5,
  successThreshold: 1,
  openDurationMs: 60000,
};

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN']);

/** HTTP status carried by SDK and fetch errors, when there is one */
export function errorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export function isRetryableError(error: unknown): boolean {
  const status = errorStatus(error);
  if (status !== undefined) {
    return status === 408 || status === 429 || (status >= 500 && status < 600);
  }

  const code = errorCode(error);
  if (code && TRANSIENT_CODES.has(code)) return true;

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('rate limit') ||
      message.includes('timed out') ||
      message.includes('socket hang up') ||
      message.includes('network')
    );
  }

  return false;
}

export function is4xxAuthError(error: unknown): boolean {
  const status = errorStatus(error);
  return status === 401 || status === 403;
}

/** Delay before retry number `attempt + 1`: base * 2^attempt, capped, +/- jitter */
export function computeBackoff(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterFactor = 0
): number {
  const capped = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
  const jitter = capped * jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private consecutiveFailures = 0;
  private probeSuccesses = 0;
  private probeInFlight = false;
  private openedAt: number | null = null;
  private totalRequests = 0;
  private totalFailures = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_BREAKER_CONFIG, ...config };
  }

  get name(): string {
    return this.config.name;
  }

  get currentState(): CircuitState {
    return this.state;
  }

  get stats(): CircuitBreakerStats {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
      openedAt: this.openedAt,
    };
  }

  /** Milliseconds until an open circuit lets a probe through */
  get retryAfterMs(): number {
    if (this.state !== CircuitState.OPEN || this.openedAt === null) return 0;
    return Math.max(0, this.openedAt + this.config.openDurationMs - Date.now());
  }

  private transitionTo(next: CircuitState): void {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;
    this.probeInFlight = false;
    this.probeSuccesses = 0;

    if (next === CircuitState.OPEN) {
      this.openedAt = Date.now();
    } else if (next === CircuitState.CLOSED) {
      this.openedAt = null;
      this.consecutiveFailures = 0;
    }

    this.config.onStateChange?.(this.config.name, previous, next);
  }

  /** One probe at a time is let through once the open duration has passed */
  canExecute(): boolean {
    if (this.state === CircuitState.CLOSED) return true;

    if (this.state === CircuitState.OPEN) {
      if (this.retryAfterMs > 0) return false;
      this.transitionTo(CircuitState.HALF_OPEN);
    }

    if (this.probeInFlight) return false;
    this.probeInFlight = true;
    return true;
  }

  recordSuccess(): void {
    this.totalRequests++;
    this.consecutiveFailures = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.probeInFlight = false;
      this.probeSuccesses++;
      if (this.probeSuccesses >= this.config.successThreshold) {
        this.transitionTo(CircuitState.CLOSED);
      }
    }
  }

  recordFailure(): void {
    this.totalRequests++;
    this.totalFailures++;
    this.consecutiveFailures++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.OPEN);
    } else if (this.state === CircuitState.CLOSED && this.consecutiveFailures >= this.config.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  reset(): void {
    this.transitionTo(CircuitState.CLOSED);
    this.totalRequests = 0;
    this.totalFailures = 0;
  }
}

export class CircuitOpenError extends Error {
  constructor(
    public readonly circuitName: string,
    public readonly retryAfterMs: number
  ) {
    super(`Circuit '${circuitName}' is open, retry in ${retryAfterMs}ms`);
    this.name = 'CircuitOpenError';
  }
}

/** Runs `fn` until it succeeds, `retryOn` refuses the error, or retries run out */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_CONFIG, ...config };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= opts.maxRetries || !opts.retryOn(error)) {
        throw error;
      }

      const delayMs = computeBackoff(attempt, opts.baseDelayMs, opts.maxDelayMs, opts.jitterFactor);
      opts.onRetry?.(error, attempt + 1, delayMs);
      await sleep(delayMs);
    }
  }
}

export async function withCircuitBreaker<T>(
  fn: () => Promise<T>,
  breaker: CircuitBreaker
): Promise<T> {
  if (!breaker.canExecute()) {
    throw new CircuitOpenError(breaker.name, breaker.retryAfterMs);
  }

  try {
    const result = await fn();
    breaker.recordSuccess();
    return result;
  } catch (error) {
    breaker.recordFailure();
    throw error;
  }
}

const circuitBreakers = new Map<string, CircuitBreaker>();

/** Shared breaker per name; `config` applies only when the breaker is created */
export function getCircuitBreaker(
  name: string,
  config: Partial<Omit<CircuitBreakerConfig, 'name'>> = {}
): CircuitBreaker {
  let breaker = circuitBreakers.get(name);
  if (!breaker) {
    breaker = new CircuitBreaker({ ...config, name });
    circuitBreakers.set(name, breaker);
  }
  return breaker;
}

export function resetAllCircuitBreakers(): void {
  circuitBreakers.forEach(breaker => breaker.reset());
}
