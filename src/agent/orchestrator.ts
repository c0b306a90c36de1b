/**
 * Orchestrator - drives the agent turn loop
 *
 * One run: inject prompts, call the provider, execute requested tools, repeat
 * while the model keeps asking for tools or steering messages arrive, then
 * poll for follow-ups before finishing. Progress is published on a bounded
 * event queue exposed through {@link Orchestrator.subscribe}.
 */

import type { Logger } from "../log.js";
import { getErrorMessage } from "../providers/errors.js";
import type { ProviderMessage } from "../providers/types.js";
import { extractToolCalls, fromProviderResponse, toProviderMessages, toToolDefinitions } from "./convert.js";
import { EventQueue } from "./event-queue.js";
import { createEvent, type AgentEvent } from "./events.js";
import type { AgentState } from "./state.js";
import {
  extractText,
  textContent,
  type AgentMessage,
  type AgentMessageMetadata,
  type LoopConfig,
  type MessageSource,
  type ToolCallContent,
  type ToolResult,
} from "./types.js";

export const DEFAULT_EVENT_QUEUE_CAPACITY = 100;

/** Tool whose successful calls load the skill named by `skill_name`. */
export const USE_SKILL_TOOL = "use_skill";

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * A run ended on a provider failure. `messages` holds the transcript up to
 * the failed call.
 */
export class AgentRunError extends Error {
  readonly messages: AgentMessage[];

  constructor(cause: unknown, messages: readonly AgentMessage[]) {
    super(`agent loop failed: ${getErrorMessage(cause)}`, { cause });
    this.name = "AgentRunError";
    this.messages = [...messages];
  }
}

type ToolCallOutcome = {
  message: AgentMessage;
  result: ToolResult;
  isError: boolean;
};

type ToolBatchOutcome = {
  results: AgentMessage[];
  /** Non-empty when the batch was cut short. */
  steering: AgentMessage[];
};

export class Orchestrator {
  private readonly config: LoopConfig;
  private readonly state: AgentState;
  private readonly logger: Logger;
  private readonly events: EventQueue<AgentEvent>;
  private controller: AbortController | null = null;
  private running = false;

  constructor(config: LoopConfig, initialState: AgentState) {
    this.config = config;
    this.state = initialState;
    this.logger = config.logger.child({ component: "orchestrator" });
    this.events = new EventQueue(config.eventQueueCapacity ?? DEFAULT_EVENT_QUEUE_CAPACITY);
  }

  /**
   * Run the loop on a clone of the seed state and resolve with the full
   * transcript. Rejects with {@link AgentRunError} when a provider call fails.
   *
   * Events are pushed with backpressure: once the queue is full the run waits
   * for the subscriber.
   */
  async run(prompts: readonly AgentMessage[], options: RunOptions = {}): Promise<AgentMessage[]> {
    if (this.running) {
      throw new Error("orchestrator is already running");
    }
    this.running = true;

    const controller = new AbortController();
    this.controller = controller;
    const external = options.signal;
    const forwardAbort = () => controller.abort(external?.reason);
    if (external?.aborted) {
      forwardAbort();
    } else {
      external?.addEventListener("abort", forwardAbort, { once: true });
    }

    const state = this.state.clone();
    state.addMessages(prompts);
    const startTime = Date.now();

    this.logger.info({ prompts: prompts.length, history: state.messages.length }, "Agent run started");

    try {
      await this.emit(createEvent("agent_start", {}));
      await this.emit(createEvent("turn_start", {}));

      const messages = await this.runLoop(state, controller.signal);

      this.logger.info(
        { messages: messages.length, duration: Date.now() - startTime },
        "Agent run finished"
      );
      await this.emit(createEvent("agent_end", { messages }));
      return messages;
    } catch (err) {
      const runError = err instanceof AgentRunError ? err : new AgentRunError(err, state.messages);
      this.logger.error(
        { error: getErrorMessage(runError.cause), duration: Date.now() - startTime },
        "Agent run failed"
      );
      await this.emit(createEvent("agent_end", { messages: runError.messages }));
      throw runError;
    } finally {
      external?.removeEventListener("abort", forwardAbort);
      this.controller = null;
      this.running = false;
    }
  }

  /**
   * Abort the active run and close the event stream. Subscribers still
   * receive events that were already queued.
   */
  stop(): void {
    this.controller?.abort(new Error("agent run stopped"));
    this.events.close();
  }

  /** Read-only view of the event stream; meant for a single consumer. */
  subscribe(): AsyncIterable<AgentEvent> {
    const events = this.events;
    return {
      [Symbol.asyncIterator]: () => events[Symbol.asyncIterator](),
    };
  }

  /** Queue a steering message on the seed state. */
  steer(message: AgentMessage): void {
    this.state.steer(message);
  }

  /** Queue a follow-up message on the seed state. */
  followUp(message: AgentMessage): void {
    this.state.followUp(message);
  }

  /** The seed state. Runs work on a clone, so it never holds run output. */
  getState(): AgentState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  private async runLoop(state: AgentState, signal: AbortSignal): Promise<AgentMessage[]> {
    let firstTurn = true;
    let pending = await this.fetchSteeringMessages();

    for (;;) {
      let hasMoreToolCalls = true;

      while (hasMoreToolCalls || pending.length > 0) {
        if (firstTurn) {
          firstTurn = false;
        } else {
          await this.emit(createEvent("turn_start", {}));
        }

        for (const message of pending) {
          await this.emit(createEvent("message_start", { message }));
          state.addMessage(message);
          await this.emit(createEvent("message_end", { message }));
        }
        pending = [];

        let assistant: AgentMessage;
        try {
          assistant = await this.streamAssistantResponse(state, signal);
        } catch (err) {
          await this.emit(createEvent("turn_end", { stopReason: getErrorMessage(err) }));
          throw new AgentRunError(err, state.messages);
        }
        state.addMessage(assistant);

        const toolCalls = extractToolCalls(assistant);
        hasMoreToolCalls = toolCalls.length > 0;

        if (hasMoreToolCalls) {
          const batch = await this.executeToolCalls(toolCalls, state, signal);
          state.addMessages(batch.results);

          if (batch.steering.length > 0) {
            // The turn stays open; the next iteration starts with the steering messages.
            pending = batch.steering;
            continue;
          }
        }

        await this.emit(createEvent("turn_end", {}));
        pending = await this.fetchSteeringMessages();
      }

      const followUps = await this.fetchFollowUpMessages();
      if (followUps.length === 0) break;

      this.logger.debug({ count: followUps.length }, "Follow-up messages queued, continuing run");
      pending = followUps;
    }

    return [...state.messages];
  }

  private async streamAssistantResponse(state: AgentState, signal: AbortSignal): Promise<AgentMessage> {
    signal.throwIfAborted();

    state.isStreaming = true;
    try {
      let history: readonly AgentMessage[] = state.messages;
      if (this.config.transformContext) {
        try {
          history = await this.config.transformContext(history);
        } catch (err) {
          this.logger.warn({ error: getErrorMessage(err) }, "Context transform failed, using original messages");
        }
      }

      const converted = this.config.convertToLlm
        ? await this.config.convertToLlm(history)
        : toProviderMessages(history);
      const tools = toToolDefinitions(state.tools);

      await this.emit(createEvent("message_start", {}));

      const systemPrompt = this.config.contextBuilder
        ? await this.config.contextBuilder.buildSystemPrompt({ loadedSkills: state.loadedSkills })
        : state.systemPrompt;
      const messages: ProviderMessage[] = systemPrompt
        ? [{ role: "system", content: systemPrompt }, ...converted]
        : converted;

      this.logger.debug(
        {
          provider: this.config.provider.id,
          messages: messages.length,
          tools: tools.length,
          loadedSkills: state.loadedSkills,
        },
        "Calling provider"
      );

      const response = await this.config.provider.chat(messages, tools, { signal });
      const message = fromProviderResponse(response);

      this.logger.debug(
        {
          contentLength: response.content.length,
          toolCalls: response.toolCalls.length,
          finishReason: response.finishReason,
        },
        "Provider response received"
      );

      await this.emit(createEvent("message_end", { message }));
      return message;
    } finally {
      state.isStreaming = false;
    }
  }

  /**
   * Execute one assistant reply's tool calls in order. Steering messages are
   * polled after every call and stop the batch when present.
   */
  private async executeToolCalls(
    toolCalls: readonly ToolCallContent[],
    state: AgentState,
    signal: AbortSignal
  ): Promise<ToolBatchOutcome> {
    const results: AgentMessage[] = [];

    for (const call of toolCalls) {
      const target = { toolCallId: call.id, toolName: call.name, arguments: call.arguments };
      await this.emit(createEvent("tool_execution_start", target));

      const outcome = await this.executeToolCall(call, state, signal);
      results.push(outcome.message);

      await this.emit(
        createEvent("tool_execution_end", { ...target, result: outcome.result, isError: outcome.isError })
      );

      const steering = await this.fetchSteeringMessages();
      if (steering.length > 0) {
        this.logger.info(
          { skipped: toolCalls.length - results.length, steering: steering.length },
          "Steering messages arrived, skipping remaining tool calls"
        );
        return { results, steering };
      }
    }

    return { results, steering: [] };
  }

  private async executeToolCall(
    call: ToolCallContent,
    state: AgentState,
    signal: AbortSignal
  ): Promise<ToolCallOutcome> {
    const metadata: AgentMessageMetadata = { tool_call_id: call.id, tool_name: call.name };
    const tool = state.findTool(call.name);
    let result: ToolResult;
    let error: string | undefined;

    if (!tool) {
      error = `tool ${call.name} not found`;
      result = { content: [textContent(`Tool not found: ${call.name}`)], details: { error } };
      this.logger.error({ tool: call.name, toolCallId: call.id }, "Tool not found");
    } else {
      this.logger.debug({ tool: call.name, toolCallId: call.id, args: call.arguments }, "Executing tool");
      state.addPendingTool(call.id);
      try {
        result = await tool.execute(call.arguments, {
          toolCallId: call.id,
          signal,
          logger: this.logger.child({ tool: call.name }),
          onPartialResult: (partialResult) =>
            this.emit(
              createEvent("tool_execution_update", {
                toolCallId: call.id,
                toolName: call.name,
                arguments: call.arguments,
                partialResult,
              })
            ),
        });
        this.logger.debug(
          { tool: call.name, toolCallId: call.id, resultLength: extractText(result.content).length },
          "Tool execution completed"
        );
      } catch (err) {
        error = getErrorMessage(err);
        result = { content: [textContent(error)], details: { error } };
        this.logger.warn({ tool: call.name, toolCallId: call.id, error }, "Tool execution failed");
      } finally {
        state.removePendingTool(call.id);
      }
    }

    if (error !== undefined) {
      metadata.error = error;
    } else if (call.name === USE_SKILL_TOOL) {
      const skillName = call.arguments.skill_name;
      if (typeof skillName === "string" && skillName && state.loadSkill(skillName)) {
        this.logger.info({ skill: skillName, loadedSkills: state.loadedSkills }, "Skill loaded");
      }
    }

    return {
      message: { role: "tool", content: result.content, timestamp: Date.now(), metadata },
      result,
      isError: error !== undefined,
    };
  }

  private fetchSteeringMessages(): Promise<AgentMessage[]> {
    return this.pollSource("steering", this.config.getSteeringMessages, () =>
      this.state.dequeueSteeringMessages()
    );
  }

  private fetchFollowUpMessages(): Promise<AgentMessage[]> {
    return this.pollSource("follow_up", this.config.getFollowUpMessages, () =>
      this.state.dequeueFollowUpMessages()
    );
  }

  /** Messages queued through steer()/followUp() come first, then the configured source's. */
  private async pollSource(
    name: string,
    source: MessageSource | undefined,
    dequeueQueued: () => AgentMessage[]
  ): Promise<AgentMessage[]> {
    const queued = dequeueQueued();
    if (!source) return queued;
    try {
      return [...queued, ...(await source())];
    } catch (err) {
      this.logger.warn({ source: name, error: getErrorMessage(err) }, "Message source failed, treating as empty");
      return queued;
    }
  }

  private async emit(event: AgentEvent): Promise<void> {
    await this.events.push(event);
  }
}
