import { describe, expect, it } from "vitest";

import {
  extractToolCalls,
  fromProviderResponse,
  toProviderMessages,
  toToolDefinitions,
} from "../../../src/agent/convert.js";
import { createMessage, type AgentMessage } from "../../../src/agent/types.js";
import { createTestTool, reply, textResult, toolCall } from "../../../src/testing/harness.js";

describe("toProviderMessages()", () => {
  it("drops system messages and joins text blocks", () => {
    const messages: AgentMessage[] = [
      createMessage("system", "ignored"),
      {
        role: "user",
        content: [
          { type: "text", text: "line one" },
          { type: "text", text: "line two" },
        ],
        timestamp: 1,
      },
    ];

    expect(toProviderMessages(messages)).toEqual([{ role: "user", content: "line one\nline two" }]);
  });

  it("collects image references, preferring inline data", () => {
    const message: AgentMessage = {
      role: "user",
      content: [
        { type: "text", text: "look" },
        { type: "image", data: "aGVsbG8=", url: "https://example.test/a.png" },
        { type: "image", url: "https://example.test/b.png" },
        { type: "image" },
      ],
      timestamp: 1,
    };

    expect(toProviderMessages([message])).toEqual([
      { role: "user", content: "look", images: ["aGVsbG8=", "https://example.test/b.png"] },
    ]);
  });

  it("carries tool calls on assistant messages and ids on tool messages", () => {
    const assistant = fromProviderResponse(reply("checking", [toolCall("call-1", "search", { q: "x" })]));
    const tool: AgentMessage = {
      role: "tool",
      content: [{ type: "text", text: "found" }],
      timestamp: 2,
      metadata: { tool_call_id: "call-1", tool_name: "search" },
    };

    expect(toProviderMessages([assistant, tool])).toEqual([
      {
        role: "assistant",
        content: "checking",
        toolCalls: [{ id: "call-1", name: "search", arguments: { q: "x" } }],
      },
      { role: "tool", content: "found", toolCallId: "call-1", toolName: "search" },
    ]);
  });
});

describe("fromProviderResponse()", () => {
  it("builds an assistant message with text and tool call blocks", () => {
    const message = fromProviderResponse(reply("hi", [toolCall("call-1", "echo")]));

    expect(message.role).toBe("assistant");
    expect(message.content).toEqual([
      { type: "text", text: "hi" },
      { type: "tool_call", id: "call-1", name: "echo", arguments: {} },
    ]);
    expect(message.metadata).toEqual({ stop_reason: "tool_calls" });
  });

  it("omits the text block for empty content", () => {
    const message = fromProviderResponse(reply("", [toolCall("call-1", "echo")]));

    expect(message.content).toHaveLength(1);
    expect(extractToolCalls(message).map((c) => c.id)).toEqual(["call-1"]);
  });
});

describe("toToolDefinitions()", () => {
  it("maps tool metadata and parameters", () => {
    const tool = createTestTool("echo", async () => textResult("ok"), "Echo input");

    expect(toToolDefinitions([tool])).toEqual([
      { name: "echo", description: "Echo input", parameters: { type: "object", properties: {} } },
    ]);
  });
});
