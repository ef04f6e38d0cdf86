import { describe, expect, it } from "vitest";

import {
  CircuitBreaker,
  CircuitBreakerOpenError,
  CircuitState
} from "./circuit-breaker.js";

function createClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    }
  };
}

describe("CircuitBreaker", () => {
  it("opens after the configured number of consecutive failures", () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2 });

    breaker.recordFailure();
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    breaker.recordFailure();
    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.canExecute()).toBe(false);
  });

  it("a success in between resets the failure streak", () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2 });

    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it("lets a trial request through after the timeout and closes after enough successes", () => {
    const clock = createClock();
    const breaker = new CircuitBreaker({
      failureThreshold: 1,
      successThreshold: 2,
      timeoutMs: 1000,
      now: clock.now
    });

    breaker.recordFailure();
    clock.advance(999);
    expect(breaker.canExecute()).toBe(false);

    clock.advance(1);
    expect(breaker.canExecute()).toBe(true);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    breaker.recordSuccess();
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
    breaker.recordSuccess();
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it("re-opens when the half-open trial request fails", () => {
    const clock = createClock();
    const breaker = new CircuitBreaker({ failureThreshold: 1, timeoutMs: 10, now: clock.now });

    breaker.recordFailure();
    clock.advance(10);
    breaker.canExecute();
    breaker.recordFailure();

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.getStateValue()).toBe(2);
  });

  it("execute rejects without calling the function while open", async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 });
    await expect(breaker.execute(() => Promise.reject(new Error("boom")))).rejects.toThrow(
      "boom"
    );

    let called = false;
    await expect(
      breaker.execute(async () => {
        called = true;
        return 1;
      })
    ).rejects.toBeInstanceOf(CircuitBreakerOpenError);
    expect(called).toBe(false);
  });

  it("reports state changes", () => {
    const states: CircuitState[] = [];
    const breaker = new CircuitBreaker({
      failureThreshold: 1,
      onStateChange: (state) => states.push(state)
    });

    breaker.recordFailure();
    breaker.reset();

    expect(states).toEqual([CircuitState.OPEN, CircuitState.CLOSED]);
  });
});
