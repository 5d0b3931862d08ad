// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/tests/model/message-converters`
 * Purpose: Conversation ⇄ LangChain message conversion.
 * Scope: Pure converters; no model calls.
 * Side-effects: none
 * Links: src/model/message-converters.ts
 * @internal
 */

import type { Conversation } from "@fathom/ai-core";
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage,
} from "@langchain/core/messages";
import { describe, expect, it } from "vitest";

import {
  contentText,
  renderToolResult,
  toLangChainMessages,
  toModelTurn,
} from "../../src/model/message-converters";

const conversation: Conversation = [
  { kind: "user_text", text: "Find the tallest tower" },
  {
    kind: "tool_invocation",
    requests: [
      { toolName: "web_search", arguments: { query: "tallest tower" }, requestId: "call_1" },
      { toolName: "crawl_webpage", arguments: { url: "https://example.org" }, requestId: "call_2" },
    ],
  },
  {
    kind: "tool_outcome",
    results: [
      { ok: true, requestId: "call_1", toolName: "web_search", value: { results: [] } },
      {
        ok: false,
        requestId: "call_2",
        toolName: "crawl_webpage",
        errorCode: "timeout",
        safeMessage: "Tool 'crawl_webpage' timed out after 10000ms",
        details: { url: "https://example.org" },
      },
    ],
  },
  { kind: "assistant_text", text: "Done." },
];

describe("toLangChainMessages", () => {
  it("maps every message kind and prefixes the system prompt", () => {
    const messages = toLangChainMessages(conversation, "Be brief.");

    expect(messages.map((m) => m.constructor)).toEqual([
      SystemMessage,
      HumanMessage,
      AIMessage,
      ToolMessage,
      ToolMessage,
      AIMessage,
    ]);
    const invocation = messages[2];
    if (!(invocation instanceof AIMessage)) throw new Error("expected AIMessage");
    expect(invocation.tool_calls?.map((c) => [c.id, c.name, c.args])).toEqual([
      ["call_1", "web_search", { query: "tallest tower" }],
      ["call_2", "crawl_webpage", { url: "https://example.org" }],
    ]);
    const failure = messages[4];
    if (!(failure instanceof ToolMessage)) throw new Error("expected ToolMessage");
    expect(failure.tool_call_id).toBe("call_2");
  });

  it("omits the system message when no prompt is given", () => {
    expect(toLangChainMessages(conversation.slice(0, 1))).toHaveLength(1);
  });
});

describe("renderToolResult", () => {
  it("serializes failures with their code and details", () => {
    const failure = conversation[2];
    const result = failure?.kind === "tool_outcome" ? failure.results[1] : undefined;
    if (!result) throw new Error("fixture");
    expect(JSON.parse(renderToolResult(result))).toEqual({
      error: "Tool 'crawl_webpage' timed out after 10000ms",
      errorCode: "timeout",
      url: "https://example.org",
    });
  });
});

describe("toModelTurn", () => {
  it("returns trimmed text when there are no tool calls", () => {
    expect(toModelTurn(new AIMessage({ content: "  answer \n" }), new Set())).toEqual({
      kind: "assistant_text",
      text: "answer",
    });
  });

  it("keeps accompanying text and replaces colliding ids", () => {
    const turn = toModelTurn(
      new AIMessage({
        content: "Let me check.",
        tool_calls: [
          { id: "call_1", name: "web_search", args: { query: "a" }, type: "tool_call" },
          { id: "call_9", name: "web_search", args: { query: "b" }, type: "tool_call" },
        ],
      }),
      new Set(["call_1"])
    );

    if (turn.kind !== "tool_invocation") throw new Error("expected tool_invocation");
    expect(turn.text).toBe("Let me check.");
    expect(turn.requests[0]?.requestId).not.toBe("call_1");
    expect(turn.requests[0]?.requestId).toMatch(/^[A-Za-z0-9]{9}$/);
    expect(turn.requests[1]).toEqual({
      toolName: "web_search",
      arguments: { query: "b" },
      requestId: "call_9",
    });
  });
});

describe("contentText", () => {
  it("joins text parts and skips others", () => {
    expect(
      contentText([
        { type: "text", text: "a" },
        { type: "image_url", image_url: "data:," },
        { type: "text", text: "b" },
      ])
    ).toBe("ab");
  });
});
