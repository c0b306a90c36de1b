import type { AgentMessage, ToolResult } from "./types.js";

export type AgentEventKind =
  | "agent_start"
  | "agent_end"
  | "turn_start"
  | "turn_end"
  | "message_start"
  | "message_end"
  | "tool_execution_start"
  | "tool_execution_update"
  | "tool_execution_end";

type ToolExecutionPayload = {
  toolCallId: string;
  toolName: string;
  arguments: Record<string, unknown>;
};

type EventPayloads = {
  agent_start: Record<never, never>;
  agent_end: { messages: readonly AgentMessage[] };
  turn_start: Record<never, never>;
  /** `stopReason` is only set when the turn was cut short by a backend failure. */
  turn_end: { stopReason?: string };
  /** `message` is absent while an assistant reply is still being requested. */
  message_start: { message?: AgentMessage };
  message_end: { message?: AgentMessage };
  tool_execution_start: ToolExecutionPayload;
  tool_execution_update: ToolExecutionPayload & { partialResult: ToolResult };
  tool_execution_end: ToolExecutionPayload & { result: ToolResult; isError: boolean };
};

export type AgentEventOf<K extends AgentEventKind> = Readonly<
  { kind: K; timestamp: number } & EventPayloads[K]
>;

export type AgentEvent = { [K in AgentEventKind]: AgentEventOf<K> }[AgentEventKind];

export function createEvent<K extends AgentEventKind>(kind: K, payload: EventPayloads[K]): AgentEventOf<K> {
  return Object.freeze<{ kind: K; timestamp: number } & EventPayloads[K]>({ ...payload, kind, timestamp: Date.now() });
}
