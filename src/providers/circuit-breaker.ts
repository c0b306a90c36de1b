/**
 * Circuit Breaker - per-backend health tracker
 *
 * States:
 * - closed: requests flow; failures are counted
 * - open: requests are refused until the dwell timeout elapses
 * - half_open: trial state; successes accumulate until the breaker closes
 *
 * Every transition is a synchronous section, so interleaved async callers
 * sharing one breaker never observe a half-applied state.
 */

import type { Logger } from "../log.js";

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  /** Failures that open the breaker, and successes that close it from half_open. */
  failureThreshold: number;
  /** Minimum time spent open before a trial request is allowed. */
  timeoutMs: number;
  logger?: Logger;
  /** Label used in log lines. */
  name?: string;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export interface CircuitStateInfo {
  state: CircuitState;
  failures: number;
  success_count: number;
  failure_threshold: number;
  timeout_ms: number;
  last_failure_time: number | null;
  is_open: boolean;
}

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_BREAKER_TIMEOUT_MS = 5 * 60 * 1000;

export class CircuitBreaker {
  private state: CircuitState = "closed";
  private failures = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private readonly failureThreshold: number;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly name: string;
  private readonly onStateChange?: (from: CircuitState, to: CircuitState) => void;

  constructor(options: Partial<CircuitBreakerOptions> = {}) {
    this.failureThreshold = Math.max(1, Math.floor(options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD));
    this.timeoutMs = Math.max(0, options.timeoutMs ?? DEFAULT_BREAKER_TIMEOUT_MS);
    this.logger = options.logger;
    this.name = options.name ?? "default";
    this.onStateChange = options.onStateChange;
  }

  allowRequest(): boolean {
    switch (this.state) {
      case "closed":
      case "half_open":
        return true;
      case "open":
        return this.dwellElapsed();
    }
  }

  recordSuccess(): void {
    switch (this.state) {
      case "closed":
        this.failures = 0;
        return;
      case "open":
        // The first success after the dwell only opens the trial window.
        if (this.dwellElapsed()) {
          this.successCount = 0;
          this.transitionTo("half_open");
        }
        return;
      case "half_open":
        this.successCount += 1;
        if (this.successCount >= this.failureThreshold) {
          this.failures = 0;
          this.successCount = 0;
          this.transitionTo("closed");
        }
        return;
    }
  }

  recordFailure(): void {
    const now = Date.now();
    switch (this.state) {
      case "closed":
        this.failures += 1;
        if (this.failures >= this.failureThreshold) {
          this.lastFailureTime = now;
          this.transitionTo("open");
        }
        return;
      case "open":
        this.lastFailureTime = now;
        return;
      case "half_open":
        this.lastFailureTime = now;
        this.successCount = 0;
        this.transitionTo("open");
        return;
    }
  }

  reset(): void {
    this.failures = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    if (this.state !== "closed") {
      this.transitionTo("closed");
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  isOpen(): boolean {
    return this.state === "open";
  }

  getStateInfo(): CircuitStateInfo {
    return {
      state: this.state,
      failures: this.failures,
      success_count: this.successCount,
      failure_threshold: this.failureThreshold,
      timeout_ms: this.timeoutMs,
      last_failure_time: this.lastFailureTime,
      is_open: this.state === "open",
    };
  }

  private dwellElapsed(): boolean {
    if (this.lastFailureTime === null) return true;
    return Date.now() - this.lastFailureTime >= this.timeoutMs;
  }

  private transitionTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    const details = { breaker: this.name, from: previous, to: next, failures: this.failures };
    if (next === "open") {
      this.logger?.warn(details, "Circuit breaker opened");
    } else {
      this.logger?.info(details, "Circuit breaker state changed");
    }
    this.onStateChange?.(previous, next);
  }
}
