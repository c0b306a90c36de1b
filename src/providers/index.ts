/**
 * Provider Module - provider contract and the resilience wrappers
 */

export type {
  ChatOptions,
  ChatResponse,
  JSONSchema,
  Provider,
  ProviderMessage,
  ProviderRole,
  ToolCall,
  ToolDefinition,
} from "./types.js";

export {
  FailoverError,
  NoProfileAvailableError,
  DefaultErrorClassifier,
  FAILOVER_REASONS,
  classifyFailoverReason,
  resolveFailoverReasonFromError,
  isFailoverEligible,
  isFailoverError,
  getErrorMessage,
  type ErrorClassifier,
  type FailoverReason,
} from "./errors.js";

export {
  CircuitBreaker,
  DEFAULT_BREAKER_TIMEOUT_MS,
  DEFAULT_FAILURE_THRESHOLD,
  type CircuitBreakerOptions,
  type CircuitState,
  type CircuitStateInfo,
} from "./circuit-breaker.js";

export { FailoverProvider, type FailoverProviderOptions } from "./failover.js";

export {
  RotationProvider,
  DEFAULT_ROTATION_COOLDOWN_MS,
  ROTATION_STRATEGIES,
  maskApiKey,
  type RotationProfile,
  type RotationProfileStatus,
  type RotationProviderOptions,
  type RotationStrategy,
} from "./rotation.js";

export { createResilientProvider, type ResilientProviderParams } from "./factory.js";
