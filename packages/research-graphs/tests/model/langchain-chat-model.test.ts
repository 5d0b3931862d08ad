// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/tests/model/langchain-chat-model`
 * Purpose: ChatModelPort adapter over a LangChain chat model.
 * Scope: In-process BaseChatModel subclass with canned replies. No provider SDK, no network.
 * Invariants:
 *   - THROWS_LLM_ERROR: provider failures surface as LlmError
 * Side-effects: none
 * Links: src/model/langchain-chat-model.ts
 * @internal
 */

import { createConversation, LlmError } from "@fathom/ai-core";
import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import {
  AIMessage,
  type BaseMessage,
  HumanMessage,
  SystemMessage,
} from "@langchain/core/messages";
import type { ChatResult } from "@langchain/core/outputs";
import { describe, expect, it } from "vitest";

import { LangChainChatModel } from "../../src/model/langchain-chat-model";
import { contentText } from "../../src/model/message-converters";

class CannedChatModel extends BaseChatModel {
  readonly received: BaseMessage[][] = [];
  private readonly replies: Array<AIMessage | Error>;

  constructor(replies: Array<AIMessage | Error>) {
    super({});
    this.replies = replies;
  }

  _llmType(): string {
    return "canned";
  }

  async _generate(messages: BaseMessage[]): Promise<ChatResult> {
    this.received.push(messages);
    const reply = this.replies.shift() ?? new AIMessage("");
    if (reply instanceof Error) throw reply;
    return { generations: [{ message: reply, text: contentText(reply.content) }] };
  }
}

describe("LangChainChatModel", () => {
  it("sends the system prompt first and returns a text turn", async () => {
    const inner = new CannedChatModel([new AIMessage("Paris.")]);
    const model = new LangChainChatModel(inner);

    const turn = await model.invoke(createConversation("Capital of France?"), {
      systemPrompt: "Answer briefly.",
    });

    expect(turn).toEqual({ kind: "assistant_text", text: "Paris." });
    const sent = inner.received[0] ?? [];
    expect(sent.map((m) => m.constructor)).toEqual([SystemMessage, HumanMessage]);
    expect(sent[1]?.content).toBe("Capital of France?");
  });

  it("converts tool calls into a tool invocation turn", async () => {
    const inner = new CannedChatModel([
      new AIMessage({
        content: "",
        tool_calls: [
          { id: "call_a", name: "web_search", args: { query: "x" }, type: "tool_call" },
        ],
      }),
    ]);

    const turn = await new LangChainChatModel(inner).invoke(createConversation("q"));

    expect(turn).toEqual({
      kind: "tool_invocation",
      requests: [{ toolName: "web_search", arguments: { query: "x" }, requestId: "call_a" }],
    });
  });

  it("rethrows provider failures as LlmError", async () => {
    const rateLimited = Object.assign(new Error("Too many requests"), { status: 429 });
    const model = new LangChainChatModel(new CannedChatModel([rateLimited]));

    const error = await model.invoke(createConversation("q")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({ kind: "rate_limited", status: 429 });
  });

  it("refuses tools when the chat model cannot bind them", async () => {
    const model = new LangChainChatModel(new CannedChatModel([]));
    await expect(
      model.invoke(createConversation("q"), {
        tools: [
          {
            name: "web_search",
            description: "search",
            inputSchema: { type: "object" },
            effect: "read_only",
            redaction: { mode: "top_level_only", allowlist: [] },
          },
        ],
      })
    ).rejects.toThrow("does not support tool calling");
  });
});
