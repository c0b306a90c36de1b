import type { AgentMessage, Tool } from "./types.js";

export interface AgentStateInit {
  messages?: AgentMessage[];
  tools?: Tool[];
  loadedSkills?: string[];
  systemPrompt?: string;
}

/**
 * Conversation buffer owned by one orchestrator run.
 *
 * `messages` only ever grows during a run. Long-lived sessions keep their own
 * instance and hand the orchestrator a seed, which it clones before running.
 */
export class AgentState {
  readonly messages: AgentMessage[];
  readonly tools: Tool[];
  readonly loadedSkills: string[];
  systemPrompt: string;
  isStreaming = false;
  private readonly pendingToolCalls = new Set<string>();
  private readonly steeringQueue: AgentMessage[] = [];
  private readonly followUpQueue: AgentMessage[] = [];

  constructor(init: AgentStateInit = {}) {
    this.messages = [...(init.messages ?? [])];
    this.tools = [...(init.tools ?? [])];
    this.loadedSkills = [...(init.loadedSkills ?? [])];
    this.systemPrompt = init.systemPrompt ?? "";
  }

  /**
   * Independent copy of messages, tools, skills and prompt. Queued steering
   * and follow-up messages stay here: the original remains the injection point
   * while a run works on the copy.
   */
  clone(): AgentState {
    return new AgentState({
      messages: this.messages,
      tools: this.tools,
      loadedSkills: this.loadedSkills,
      systemPrompt: this.systemPrompt,
    });
  }

  addMessage(message: AgentMessage): void {
    this.messages.push(message);
  }

  addMessages(messages: readonly AgentMessage[]): void {
    this.messages.push(...messages);
  }

  findTool(name: string): Tool | undefined {
    return this.tools.find((tool) => tool.meta.name === name);
  }

  /** Returns false when the skill was already loaded. */
  loadSkill(name: string): boolean {
    if (this.loadedSkills.includes(name)) return false;
    this.loadedSkills.push(name);
    return true;
  }

  addPendingTool(toolCallId: string): void {
    this.pendingToolCalls.add(toolCallId);
  }

  removePendingTool(toolCallId: string): void {
    this.pendingToolCalls.delete(toolCallId);
  }

  hasPendingTools(): boolean {
    return this.pendingToolCalls.size > 0;
  }

  getPendingTools(): string[] {
    return Array.from(this.pendingToolCalls);
  }

  steer(message: AgentMessage): void {
    this.steeringQueue.push(message);
  }

  followUp(message: AgentMessage): void {
    this.followUpQueue.push(message);
  }

  dequeueSteeringMessages(): AgentMessage[] {
    return this.steeringQueue.splice(0, this.steeringQueue.length);
  }

  dequeueFollowUpMessages(): AgentMessage[] {
    return this.followUpQueue.splice(0, this.followUpQueue.length);
  }
}
