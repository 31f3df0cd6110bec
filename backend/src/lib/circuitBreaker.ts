/**
 * Circuit Breaker
 * Fails fast while an external service keeps failing, and bounds each call with a timeout
 * whose expiry aborts the call itself.
 */

import { createLogger } from './logger.js';
import { toError } from './errors.js';

const cbLogger = createLogger('circuit-breaker');

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half_open',
}

export interface CircuitBreakerOptions {
  name: string;
  /** Consecutive failures before the circuit opens (default: 5) */
  failureThreshold?: number;
  /** Time in ms the circuit stays open before a trial call (default: 30000) */
  resetTimeout?: number;
  /** Successful trial calls needed to close again (default: 2) */
  successThreshold?: number;
  /** Per-call timeout in ms (default: 10000) */
  requestTimeout?: number;
  /** Decides whether an error counts towards opening the circuit */
  isFailure?: (error: Error) => boolean;
  onOpen?: () => void;
  onClose?: () => void;
  now?: () => number;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failures: number;
  successes: number;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
  totalCancelled: number;
}

export class CircuitOpenError extends Error {
  constructor(
    message: string,
    public readonly retryAfterMs: number
  ) {
    super(message);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = 'CircuitTimeoutError';
  }
}

/**
 * A guarded call. It receives a signal that fires on timeout or when the caller's own signal fires.
 */
export type GuardedCall<T> = (signal: AbortSignal) => Promise<T>;

export class CircuitBreaker {
  private state = CircuitState.CLOSED;
  /** Consecutive failures while closed, successful trials while half-open */
  private failures = 0;
  private successes = 0;
  private openUntil = 0;
  private readonly totals = { requests: 0, failures: 0, successes: 0, cancelled: 0 };

  private readonly settings: Required<Omit<CircuitBreakerOptions, 'onOpen' | 'onClose'>>;

  constructor(private readonly options: CircuitBreakerOptions) {
    this.settings = {
      name: options.name,
      failureThreshold: options.failureThreshold ?? 5,
      resetTimeout: options.resetTimeout ?? 30000,
      successThreshold: options.successThreshold ?? 2,
      requestTimeout: options.requestTimeout ?? 10000,
      isFailure: options.isFailure ?? (() => true),
      now: options.now ?? Date.now,
    };
  }

  /**
   * Run `call` under the breaker. A call cancelled through `parent` is not held
   * against the service.
   */
  async execute<T>(call: GuardedCall<T>, parent?: AbortSignal): Promise<T> {
    this.totals.requests++;

    if (this.state === CircuitState.OPEN) {
      const remaining = this.openUntil - this.settings.now();
      if (remaining > 0) {
        throw new CircuitOpenError(`Circuit breaker '${this.settings.name}' is open`, remaining);
      }
      this.transitionTo(CircuitState.HALF_OPEN);
    }

    try {
      const result = await this.runWithTimeout(call, parent);
      this.recordSuccess();
      return result;
    } catch (error) {
      if (parent?.aborted) {
        this.totals.cancelled++;
      } else {
        this.recordFailure(toError(error));
      }
      throw error;
    }
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.settings.name,
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      totalRequests: this.totals.requests,
      totalFailures: this.totals.failures,
      totalSuccesses: this.totals.successes,
      totalCancelled: this.totals.cancelled,
    };
  }

  reset(): void {
    this.transitionTo(CircuitState.CLOSED);
    cbLogger.info({ name: this.settings.name }, 'Circuit breaker manually reset');
  }

  isAvailable(): boolean {
    return this.state !== CircuitState.OPEN || this.settings.now() >= this.openUntil;
  }

  private async runWithTimeout<T>(call: GuardedCall<T>, parent?: AbortSignal): Promise<T> {
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(parent?.reason);
    if (parent?.aborted) {
      forwardAbort();
    } else {
      parent?.addEventListener('abort', forwardAbort, { once: true });
    }

    const ms = this.settings.requestTimeout;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject first so the race settles with the timeout, not with the aborted call's error.
        reject(new CircuitTimeoutError(ms));
        controller.abort();
      }, ms);
    });

    try {
      return await Promise.race([call(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', forwardAbort);
    }
  }

  private recordSuccess(): void {
    this.totals.successes++;

    if (this.state !== CircuitState.HALF_OPEN) {
      this.failures = 0;
      return;
    }
    this.successes++;
    if (this.successes >= this.settings.successThreshold) {
      this.transitionTo(CircuitState.CLOSED);
    }
  }

  private recordFailure(error: Error): void {
    if (!this.settings.isFailure(error)) {
      return;
    }
    this.totals.failures++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.OPEN);
      return;
    }
    this.failures++;
    if (this.failures >= this.settings.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  private transitionTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.failures = 0;
    this.successes = 0;

    if (next === CircuitState.OPEN) {
      this.openUntil = this.settings.now() + this.settings.resetTimeout;
      this.options.onOpen?.();
    } else if (next === CircuitState.CLOSED && previous !== CircuitState.CLOSED) {
      this.options.onClose?.();
    }

    if (previous !== next) {
      cbLogger.info({ name: this.settings.name, from: previous, to: next }, 'Circuit breaker state change');
    }
  }
}

// Preset for the answer-synthesis endpoint
export const SYNTHESIS_BREAKER_DEFAULTS = {
  failureThreshold: 3,
  resetTimeout: 60000,
  successThreshold: 1,
} satisfies Partial<CircuitBreakerOptions>;
