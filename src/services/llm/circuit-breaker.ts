/**
 * Circuit breaker for the generative backend
 *
 * - threshold: 5 consecutive server-side failures
 * - recovery: 60 seconds OPEN, then one HALF_OPEN probe
 *
 * Only server-side errors (HTTP 429/5xx, network errors, timeouts) trip the
 * breaker. A malformed or empty reply is the model's fault, not the server's,
 * and is not counted.
 *
 * @module services/llm/circuit-breaker
 */

export enum CircuitState {
  CLOSED = 'CLOSED', // Normal operation
  OPEN = 'OPEN', // Failing, reject requests
  HALF_OPEN = 'HALF_OPEN', // Testing recovery
}

/**
 * Determine whether an error represents a server-side / transient failure
 * that should trip the circuit breaker.
 */
export function isServerError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  const cause: unknown = error.cause;
  const causeMsg = cause instanceof Error ? cause.message : '';
  const causeCode = cause instanceof Error ? String(Reflect.get(cause, 'code') ?? '') : '';
  const combined = `${error.message} ${causeMsg} ${causeCode}`;

  // HTTP status codes indicating server-side issues
  if (/\b(429|500|502|503|504)\b/.test(combined)) {
    return true;
  }

  // Network-level errors
  if (/ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|socket hang up|fetch failed/i.test(combined)) {
    return true;
  }

  return /service.?unavailable|internal.?server|model.*load/i.test(combined);
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
};

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount: number = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Execute a function with circuit breaker protection
   *
   * @throws CircuitBreakerOpenError without calling fn while the circuit is OPEN
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === CircuitState.OPEN) {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isServerError(error)) {
        this.recordFailure();
      } else {
        console.error(
          `[CircuitBreaker] Client-side error (not counted): ${error instanceof Error ? error.message : String(error)}`
        );
      }
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state === CircuitState.OPEN && this.lastFailureTime !== null) {
      const elapsed = Date.now() - this.lastFailureTime;
      if (elapsed >= this.config.recoveryTimeMs) {
        console.error('[CircuitBreaker] Transitioning from OPEN to HALF_OPEN');
        this.state = CircuitState.HALF_OPEN;
      }
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      console.error('[CircuitBreaker] Recovery confirmed, transitioning to CLOSED');
      this.state = CircuitState.CLOSED;
      this.lastFailureTime = null;
    }
    this.failureCount = 0;
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    console.error(
      `[CircuitBreaker] Failure recorded (${this.failureCount}/${this.config.failureThreshold})`
    );

    if (this.state === CircuitState.HALF_OPEN) {
      // Any failure in HALF_OPEN immediately reopens the circuit
      console.error('[CircuitBreaker] Failure in HALF_OPEN, transitioning to OPEN');
      this.state = CircuitState.OPEN;
    } else if (this.failureCount >= this.config.failureThreshold) {
      console.error(
        `[CircuitBreaker] Threshold reached (${this.failureCount}), transitioning to OPEN for ${this.config.recoveryTimeMs}ms`
      );
      this.state = CircuitState.OPEN;
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    const elapsed = Date.now() - this.lastFailureTime;
    return Math.max(0, this.config.recoveryTimeMs - elapsed);
  }

  isOpen(): boolean {
    this.checkRecovery();
    return this.state === CircuitState.OPEN;
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === CircuitState.OPEN ? this.getTimeToRecovery() : null,
    };
  }

  /**
   * Manually reset the circuit breaker
   */
  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.lastFailureTime = null;
    console.error('[CircuitBreaker] Manually reset to CLOSED');
  }
}

/**
 * Error thrown when circuit breaker is open
 */
export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}
