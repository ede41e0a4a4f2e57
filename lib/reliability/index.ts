/**
 * Reliability Utilities
 *
 * Retry with backoff and circuit breaking for calls to external services.
 */

export {
  CircuitState,
  CircuitBreaker,
  CircuitOpenError,
  type RetryConfig,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  withRetry,
  withCircuitBreaker,
  getCircuitBreaker,
  resetAllCircuitBreakers,
  computeBackoff,
  sleep,
  errorStatus,
  isRetryableError,
  is4xxAuthError,
} from './client_wrap';
