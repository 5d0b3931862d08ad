// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/tests/conversation`
 * Purpose: Unit tests for append-only conversation operations.
 * Scope: Tests causal ordering, duplicate rejection and immutability. Does not test the engine.
 * Invariants: APPEND_ONLY, CAUSAL_ORDER, ONE_RESULT_PER_REQUEST.
 * Side-effects: none
 * Links: src/conversation/conversation.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  appendMessages,
  authoredTexts,
  createConversation,
  pendingRequests,
} from "../src/conversation/conversation";
import type { Message, ToolResult } from "../src/conversation/model";

const invocation: Message = {
  kind: "tool_invocation",
  requests: [
    { toolName: "web_search", arguments: { query: "tides" }, requestId: "r1" },
    { toolName: "crawl_webpage", arguments: { url: "https://example.org" }, requestId: "r2" },
  ],
};

function success(requestId: string): ToolResult {
  return { ok: true, requestId, toolName: "web_search", value: { results: [] } };
}

describe("createConversation", () => {
  it("starts with exactly one user message", () => {
    const conversation = createConversation("why are there tides?");
    expect(conversation).toEqual([
      { kind: "user_text", text: "why are there tides?" },
    ]);
    expect(Object.isFrozen(conversation)).toBe(true);
  });
});

describe("appendMessages", () => {
  it("keeps results that answer an earlier request", () => {
    const start = createConversation("q");
    const { conversation, dropped } = appendMessages(start, [
      invocation,
      { kind: "tool_outcome", results: [success("r1"), success("r2")] },
    ]);

    expect(dropped).toEqual([]);
    expect(conversation).toHaveLength(3);
    expect(conversation[2]).toEqual({
      kind: "tool_outcome",
      results: [success("r1"), success("r2")],
    });
  });

  it("drops orphaned results and skips an outcome left empty", () => {
    const start = createConversation("q");
    const { conversation, dropped } = appendMessages(start, [
      { kind: "tool_outcome", results: [success("ghost")] },
    ]);

    expect(conversation).toHaveLength(1);
    expect(dropped.map((r) => r.requestId)).toEqual(["ghost"]);
  });

  it("drops a second result for an already answered request", () => {
    const first = appendMessages(createConversation("q"), [
      invocation,
      { kind: "tool_outcome", results: [success("r1")] },
    ]).conversation;

    const { conversation, dropped } = appendMessages(first, [
      { kind: "tool_outcome", results: [success("r1"), success("r2")] },
    ]);

    expect(dropped.map((r) => r.requestId)).toEqual(["r1"]);
    expect(conversation[3]).toEqual({
      kind: "tool_outcome",
      results: [success("r2")],
    });
  });

  it("never mutates the input conversation", () => {
    const start = createConversation("q");
    appendMessages(start, [invocation]);
    expect(start).toHaveLength(1);
  });

  it("freezes appended messages and their requests", () => {
    const { conversation } = appendMessages(createConversation("q"), [invocation]);
    const appended = conversation[1];

    expect(Object.isFrozen(appended)).toBe(true);
    if (appended?.kind !== "tool_invocation") throw new Error("expected invocation");
    expect(Object.isFrozen(appended.requests[0])).toBe(true);
    expect(Object.isFrozen(appended.requests[0]?.arguments)).toBe(true);
  });
});

describe("pendingRequests", () => {
  it("lists requests of the latest invocation that have no result", () => {
    const { conversation } = appendMessages(createConversation("q"), [
      invocation,
      { kind: "tool_outcome", results: [success("r1")] },
    ]);

    expect(pendingRequests(conversation).map((r) => r.requestId)).toEqual(["r2"]);
  });
});

describe("authoredTexts", () => {
  it("includes prose sent alongside tool calls", () => {
    const { conversation } = appendMessages(createConversation("q"), [
      { ...invocation, text: "Let me look that up." },
      { kind: "tool_outcome", results: [success("r1"), success("r2")] },
      { kind: "assistant_text", text: "Tides follow the moon." },
    ]);

    expect(authoredTexts(conversation)).toEqual([
      { index: 1, text: "Let me look that up.", kind: "tool_invocation" },
      { index: 3, text: "Tides follow the moon.", kind: "assistant_text" },
    ]);
  });
});
