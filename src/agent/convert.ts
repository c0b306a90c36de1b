/**
 * Conversion between agent messages and the provider wire shape.
 */

import type { ChatResponse, ProviderMessage, ToolDefinition } from "../providers/types.js";
import type { AgentMessage, ContentBlock, Tool, ToolCallContent } from "./types.js";
import { extractText, textContent } from "./types.js";

/**
 * Default history conversion. System messages are dropped: the system prompt
 * is rebuilt for every call from the state or the context builder.
 */
export function toProviderMessages(messages: readonly AgentMessage[]): ProviderMessage[] {
  const result: ProviderMessage[] = [];

  for (const msg of messages) {
    if (msg.role === "system") continue;

    const converted: ProviderMessage = {
      role: msg.role,
      content: extractText(msg.content),
    };

    const images: string[] = [];
    for (const block of msg.content) {
      if (block.type !== "image") continue;
      const ref = block.data || block.url;
      if (ref) images.push(ref);
    }
    if (images.length > 0) converted.images = images;

    if (msg.role === "assistant") {
      const toolCalls = extractToolCalls(msg);
      if (toolCalls.length > 0) {
        converted.toolCalls = toolCalls.map((call) => ({
          id: call.id,
          name: call.name,
          arguments: call.arguments,
        }));
      }
    }

    if (msg.role === "tool") {
      const toolCallId = msg.metadata?.tool_call_id;
      const toolName = msg.metadata?.tool_name;
      if (typeof toolCallId === "string") converted.toolCallId = toolCallId;
      if (typeof toolName === "string") converted.toolName = toolName;
    }

    result.push(converted);
  }

  return result;
}

export function fromProviderResponse(response: ChatResponse): AgentMessage {
  const content: ContentBlock[] = [];
  if (response.content) {
    content.push(textContent(response.content));
  }
  for (const call of response.toolCalls) {
    content.push({
      type: "tool_call",
      id: call.id,
      name: call.name,
      arguments: call.arguments,
    });
  }

  return {
    role: "assistant",
    content,
    timestamp: Date.now(),
    metadata: { stop_reason: response.finishReason },
  };
}

export function toToolDefinitions(tools: readonly Tool[]): ToolDefinition[] {
  return tools.map((tool) => ({
    name: tool.meta.name,
    description: tool.meta.description,
    parameters: tool.parameters,
  }));
}

export function extractToolCalls(message: AgentMessage): ToolCallContent[] {
  return message.content.filter((block): block is ToolCallContent => block.type === "tool_call");
}
