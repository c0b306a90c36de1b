/**
 * Builds the provider stack described by the `resilience` config section.
 *
 * - direct:   the primary backend as-is
 * - failover: primary guarded by a circuit breaker, optional fallback
 * - rotation: profiles over named backends; with a fallback, the whole
 *             rotation becomes the primary of a failover provider
 */

import { ConfigError, type SteerloopConfig } from "../config.js";
import type { Logger } from "../log.js";
import { CircuitBreaker } from "./circuit-breaker.js";
import type { ErrorClassifier } from "./errors.js";
import { FailoverProvider } from "./failover.js";
import { RotationProvider } from "./rotation.js";
import type { Provider } from "./types.js";

export interface ResilientProviderParams {
  config: SteerloopConfig;
  /** Raw backends keyed by the names the config refers to. */
  backends: Readonly<Record<string, Provider>>;
  logger: Logger;
  classifier?: ErrorClassifier;
}

export function createResilientProvider(params: ResilientProviderParams): Provider {
  const { config, backends, classifier } = params;
  const resilience = config.resilience;
  const logger = params.logger.child({ component: "providers" });

  const backend = (name: string): Provider => {
    const provider = backends[name];
    if (!provider) {
      throw new ConfigError(`Unknown backend: ${name}`, {
        issues: [`resilience: backend ${name} is not registered`],
      });
    }
    return provider;
  };

  const withFallback = (primary: Provider): Provider => {
    const fallback = resilience.fallback ? backend(resilience.fallback) : undefined;
    return new FailoverProvider(primary, fallback, {
      classifier,
      logger,
      circuitBreaker: new CircuitBreaker({
        failureThreshold: resilience.circuitBreaker.failureThreshold,
        timeoutMs: resilience.circuitBreaker.timeoutMs,
        name: primary.id,
        logger,
      }),
    });
  };

  switch (resilience.mode) {
    case "direct": {
      const primary = backend(requirePrimary(resilience.primary));
      logger.info({ mode: "direct", primary: primary.id }, "Provider stack ready");
      return primary;
    }

    case "failover": {
      const provider = withFallback(backend(requirePrimary(resilience.primary)));
      logger.info(
        { mode: "failover", provider: provider.id, fallback: resilience.fallback ?? null },
        "Provider stack ready"
      );
      return provider;
    }

    case "rotation": {
      const rotation = new RotationProvider(resilience.rotation.strategy, resilience.rotation.cooldownMs, {
        classifier,
        logger,
      });
      for (const profile of config.resolved.profiles) {
        rotation.addProfile(profile.name, backend(profile.backend), profile.apiKey, profile.weight);
      }
      const provider = resilience.fallback ? withFallback(rotation) : rotation;
      logger.info(
        {
          mode: "rotation",
          strategy: rotation.getStrategy(),
          profiles: rotation.listProfiles(),
          fallback: resilience.fallback ?? null,
        },
        "Provider stack ready"
      );
      return provider;
    }
  }
}

function requirePrimary(primary: string | undefined): string {
  if (!primary) {
    throw new ConfigError("resilience.primary is required", { issues: ["resilience.primary: Required"] });
  }
  return primary;
}
