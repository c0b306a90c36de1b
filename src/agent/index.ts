/**
 * Agent Module - turn loop, state, events and tool plumbing
 */

// Orchestrator
export {
  Orchestrator,
  AgentRunError,
  DEFAULT_EVENT_QUEUE_CAPACITY,
  USE_SKILL_TOOL,
  type RunOptions,
} from "./orchestrator.js";

// State and events
export { AgentState, type AgentStateInit } from "./state.js";
export { createEvent, type AgentEvent, type AgentEventKind, type AgentEventOf } from "./events.js";
export { EventQueue, type EventQueueSnapshot } from "./event-queue.js";

// Tool System
export { ToolRegistry, defineParams } from "./tool-registry.js";

// Context
export { SkillContextBuilder, type SkillEntry } from "./context-builder.js";
export { toProviderMessages, fromProviderResponse, toToolDefinitions, extractToolCalls } from "./convert.js";

export * from "./types.js";
