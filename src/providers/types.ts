/**
 * Provider contract shared by raw backends and the resilience wrappers.
 *
 * The orchestrator only ever sees a {@link Provider}; whether it is a raw
 * backend, a {@link FailoverProvider} or a {@link RotationProvider} is decided
 * when the stack is built.
 */

export type ProviderRole = "system" | "user" | "assistant" | "tool";

/**
 * Tool call requested by the model
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * Message as sent to a backend
 */
export interface ProviderMessage {
  role: ProviderRole;
  content: string;
  /** Base64 payloads or URLs, in message order. */
  images?: string[];
  /** Assistant messages only. */
  toolCalls?: ToolCall[];
  /** Tool messages only. */
  toolCallId?: string;
  toolName?: string;
}

/**
 * JSON Schema type for tool parameters
 */
export interface JSONSchema {
  type: string;
  properties?: Record<string, JSONSchema | { type: string; description?: string; enum?: string[] }>;
  required?: string[];
  items?: JSONSchema | { type: string };
  description?: string;
  enum?: string[];
  default?: unknown;
}

/**
 * Tool definition for the backend
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: JSONSchema;
}

export interface ChatOptions {
  /** Cancels the in-flight call; wrappers pass it through untouched. */
  signal?: AbortSignal;
  /** Override the backend's configured model for this call. */
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ChatResponse {
  content: string;
  toolCalls: ToolCall[];
  /** Backend-specific, e.g. "stop", "tool_calls", "length". */
  finishReason: string;
}

export interface Provider {
  readonly id: string;
  chat(messages: ProviderMessage[], tools: ToolDefinition[], options?: ChatOptions): Promise<ChatResponse>;
  close?(): Promise<void>;
}
