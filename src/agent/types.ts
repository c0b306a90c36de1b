/**
 * Core Types for the agent loop
 *
 * Messages, content blocks, tools and the loop configuration shared by the
 * orchestrator, the agent state and the event stream.
 */

import type { Logger } from "../log.js";
import type { JSONSchema, Provider, ProviderMessage } from "../providers/types.js";

// ============================================================================
// Content Blocks
// ============================================================================

export interface TextContent {
  type: "text";
  text: string;
}

export interface ImageContent {
  type: "image";
  /** Base64 payload; preferred over `url` when both are set. */
  data?: string;
  url?: string;
  mimeType?: string;
}

export interface ToolCallContent {
  type: "tool_call";
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResultContent {
  type: "tool_result";
  toolCallId: string;
  content: string;
  isError?: boolean;
}

export type ContentBlock = TextContent | ImageContent | ToolCallContent | ToolResultContent;

// ============================================================================
// Messages
// ============================================================================

export type MessageRole = "system" | "user" | "assistant" | "tool";

/**
 * Well-known metadata keys. Other keys are allowed and passed through.
 */
export interface AgentMessageMetadata {
  tool_call_id?: string;
  tool_name?: string;
  error?: string;
  stop_reason?: string;
  [key: string]: unknown;
}

export interface AgentMessage {
  role: MessageRole;
  content: ContentBlock[];
  /** Epoch milliseconds. */
  timestamp: number;
  metadata?: AgentMessageMetadata;
}

// ============================================================================
// Tools
// ============================================================================

export interface ToolResult {
  content: ContentBlock[];
  details: Record<string, unknown>;
}

export interface ToolMeta {
  name: string;
  description: string;
  category?: string;
}

/**
 * Context passed to every tool execution
 */
export interface ToolContext {
  toolCallId: string;
  signal: AbortSignal;
  logger: Logger;
  /**
   * Streams progress; each call becomes a `tool_execution_update` event.
   * Resolves once the event is queued, so awaiting it honours backpressure.
   */
  onPartialResult: (partial: ToolResult) => Promise<void>;
}

/**
 * Standard tool interface - all tools implement this
 */
export interface Tool {
  meta: ToolMeta;
  parameters: JSONSchema;
  execute(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult>;
}

// ============================================================================
// Loop Configuration
// ============================================================================

export type MessageSource = () => AgentMessage[] | Promise<AgentMessage[]>;

export interface ContextBuilder {
  buildSystemPrompt(params: { loadedSkills: readonly string[] }): string | Promise<string>;
}

export interface LoopConfig {
  provider: Provider;
  logger: Logger;
  /** Produces the system prompt; when absent the state's static prompt is used. */
  contextBuilder?: ContextBuilder;
  /** Polled between turns and after every tool call, after the state's own queue. */
  getSteeringMessages?: MessageSource;
  /** Polled once the inner loop drains, after the state's own queue. */
  getFollowUpMessages?: MessageSource;
  /** Rewrites history before each backend call; failures keep the original. */
  transformContext?: (messages: readonly AgentMessage[]) => AgentMessage[] | Promise<AgentMessage[]>;
  /** Replaces the default message conversion; failures fail the backend call. */
  convertToLlm?: (messages: readonly AgentMessage[]) => ProviderMessage[] | Promise<ProviderMessage[]>;
  /** Bound on undelivered events; a full queue makes the loop wait. Default 100. */
  eventQueueCapacity?: number;
}

// ============================================================================
// Helpers
// ============================================================================

export function textContent(text: string): TextContent {
  return { type: "text", text };
}

export function createMessage(
  role: MessageRole,
  text: string,
  metadata?: AgentMessageMetadata
): AgentMessage {
  return {
    role,
    content: [textContent(text)],
    timestamp: Date.now(),
    ...(metadata ? { metadata } : {}),
  };
}

export function userMessage(text: string): AgentMessage {
  return createMessage("user", text);
}

/** Joins the text blocks of a message or tool result with newlines. */
export function extractText(content: readonly ContentBlock[]): string {
  return content
    .filter((block): block is TextContent => block.type === "text")
    .map((block) => block.text)
    .join("\n");
}
