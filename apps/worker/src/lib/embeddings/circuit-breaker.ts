import { createLogger } from "@newsdesk/logger";

const logger = createLogger({ name: "circuit-breaker" });

export enum CircuitState {
  CLOSED = "closed",
  OPEN = "open",
  HALF_OPEN = "half-open"
}

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit. */
  failureThreshold: number;
  /** Consecutive half-open successes that close it again. */
  successThreshold: number;
  /** Milliseconds an open circuit waits before letting a trial request through. */
  timeoutMs: number;
  onStateChange?: (state: CircuitState) => void;
  now?: () => number;
}

const DEFAULT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  successThreshold: 3,
  timeoutMs: 30_000
};

export class CircuitBreakerOpenError extends Error {
  constructor(message = "Circuit breaker is open") {
    super(message);
    this.name = "CircuitBreakerOpenError";
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private consecutiveFailures = 0;
  private consecutiveSuccesses = 0;
  private openedAt: number | null = null;
  private readonly options: CircuitBreakerOptions;
  private readonly now: () => number;

  constructor(options: Partial<CircuitBreakerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.now = this.options.now ?? Date.now;
  }

  getState(): CircuitState {
    return this.state;
  }

  /** Numeric encoding used by the state gauge. */
  getStateValue(): number {
    switch (this.state) {
      case CircuitState.CLOSED:
        return 0;
      case CircuitState.HALF_OPEN:
        return 1;
      case CircuitState.OPEN:
        return 2;
    }
  }

  canExecute(): boolean {
    if (this.state !== CircuitState.OPEN) {
      return true;
    }
    if (
      this.openedAt !== null &&
      this.now() - this.openedAt >= this.options.timeoutMs
    ) {
      this.transitionTo(CircuitState.HALF_OPEN);
      return true;
    }
    return false;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.canExecute()) {
      throw new CircuitBreakerOpenError();
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state !== CircuitState.HALF_OPEN) {
      this.consecutiveSuccesses = 0;
      return;
    }

    this.consecutiveSuccesses++;
    if (this.consecutiveSuccesses >= this.options.successThreshold) {
      this.consecutiveSuccesses = 0;
      this.transitionTo(CircuitState.CLOSED);
    }
  }

  recordFailure(): void {
    this.consecutiveSuccesses = 0;

    if (this.state === CircuitState.HALF_OPEN) {
      this.open();
      return;
    }

    this.consecutiveFailures++;
    if (
      this.state === CircuitState.CLOSED &&
      this.consecutiveFailures >= this.options.failureThreshold
    ) {
      this.open();
    }
  }

  reset(): void {
    this.consecutiveFailures = 0;
    this.consecutiveSuccesses = 0;
    this.openedAt = null;
    this.transitionTo(CircuitState.CLOSED);
  }

  private open(): void {
    this.openedAt = this.now();
    this.transitionTo(CircuitState.OPEN);
  }

  private transitionTo(next: CircuitState): void {
    if (this.state === next) {
      return;
    }
    const previous = this.state;
    this.state = next;
    logger.debug({ from: previous, to: next }, "Circuit breaker state transition");
    this.options.onStateChange?.(next);
  }
}
