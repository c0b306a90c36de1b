/**
 * Failover Provider - primary backend with an optional fallback
 *
 * Only endpoint-level failures (auth, rate limit, billing) move a request to
 * the fallback and count against the primary's circuit breaker. Timeouts and
 * unclassified errors surface as-is.
 */

import type { Logger } from "../log.js";
import { CircuitBreaker } from "./circuit-breaker.js";
import {
  DefaultErrorClassifier,
  getErrorMessage,
  isFailoverEligible,
  type ErrorClassifier,
  type FailoverReason,
} from "./errors.js";
import type { ChatOptions, ChatResponse, Provider, ProviderMessage, ToolDefinition } from "./types.js";

export interface FailoverProviderOptions {
  classifier?: ErrorClassifier;
  /** Breaker guarding the primary. Defaults to threshold 5, dwell 5 minutes. */
  circuitBreaker?: CircuitBreaker;
  logger?: Logger;
  id?: string;
}

export class FailoverProvider implements Provider {
  readonly id: string;
  private readonly primary: Provider;
  private fallback?: Provider;
  private readonly classifier: ErrorClassifier;
  private readonly breaker: CircuitBreaker;
  private readonly logger?: Logger;

  constructor(primary: Provider, fallback?: Provider, options: FailoverProviderOptions = {}) {
    this.primary = primary;
    this.fallback = fallback;
    this.classifier = options.classifier ?? new DefaultErrorClassifier();
    this.logger = options.logger;
    this.id = options.id ?? `failover(${primary.id})`;
    this.breaker =
      options.circuitBreaker ?? new CircuitBreaker({ name: primary.id, logger: options.logger });
  }

  async chat(messages: ProviderMessage[], tools: ToolDefinition[], options?: ChatOptions): Promise<ChatResponse> {
    // One fallback per request; setFallback() may run while it is in flight.
    const fallback = this.fallback;

    if (fallback && !this.breaker.allowRequest()) {
      this.logger?.debug(
        { primary: this.primary.id, fallback: fallback.id, breaker: this.breaker.getState() },
        "Primary circuit open, routing to fallback"
      );
      return fallback.chat(messages, tools, options);
    }

    let response: ChatResponse;
    try {
      response = await this.primary.chat(messages, tools, options);
    } catch (err) {
      const reason = this.classifier.classify(err);
      if (!fallback || !this.shouldFailover(reason)) {
        this.logger?.debug(
          { primary: this.primary.id, reason, hasFallback: Boolean(fallback) },
          "Primary failed, not failing over"
        );
        throw err;
      }

      this.breaker.recordFailure();
      this.logger?.warn(
        { primary: this.primary.id, fallback: fallback.id, reason, error: getErrorMessage(err) },
        "Primary failed, failing over"
      );
      return fallback.chat(messages, tools, options);
    }

    this.breaker.recordSuccess();
    return response;
  }

  shouldFailover(reason: FailoverReason): boolean {
    return isFailoverEligible(reason);
  }

  setFallback(fallback: Provider | undefined): void {
    this.fallback = fallback;
    this.logger?.info({ primary: this.primary.id, fallback: fallback?.id }, "Fallback provider updated");
  }

  getPrimary(): Provider {
    return this.primary;
  }

  getFallback(): Provider | undefined {
    return this.fallback;
  }

  getCircuitBreaker(): CircuitBreaker {
    return this.breaker;
  }

  async close(): Promise<void> {
    await this.primary.close?.();
    await this.fallback?.close?.();
  }
}
