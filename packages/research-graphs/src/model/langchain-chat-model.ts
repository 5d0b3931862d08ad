// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/model/langchain-chat-model`
 * Purpose: ChatModelPort backed by a LangChain chat model (ChatOpenAI, AzureChatOpenAI, fakes).
 * Scope: Binds ToolSpecs as OpenAI function tools, converts messages both ways, normalizes errors.
 * Invariants:
 *   - THROWS_LLM_ERROR: every provider failure is rethrown as LlmError
 *   - TOOLS_FROM_SPEC: tool parameters are the compiled JSONSchema of the zod contract
 *   - REQUEST_IDS_UNIQUE (see chat-model.port.ts)
 * Side-effects: IO (provider calls)
 * Links: chat-model.port.ts, message-converters.ts
 * @public
 */

import {
  type Conversation,
  type ModelTurn,
  type ToolSpec,
  toLlmError,
  usedRequestIds,
} from "@fathom/ai-core";
import type { BaseLanguageModelInput } from "@langchain/core/language_models/base";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { AIMessageChunk } from "@langchain/core/messages";
import type { Runnable } from "@langchain/core/runnables";

import type { ChatModelInvokeOptions, ChatModelPort } from "./chat-model.port";
import { toLangChainMessages, toModelTurn } from "./message-converters";

function toFunctionTool(spec: ToolSpec): Record<string, unknown> {
  return {
    type: "function",
    function: {
      name: spec.name,
      description: spec.description,
      parameters: spec.inputSchema,
    },
  };
}

export class LangChainChatModel implements ChatModelPort {
  constructor(private readonly model: BaseChatModel) {}

  private withTools(
    tools: readonly ToolSpec[]
  ): Runnable<BaseLanguageModelInput, AIMessageChunk> {
    if (tools.length === 0) return this.model;
    if (typeof this.model.bindTools !== "function") {
      throw new Error(
        `Chat model ${this.model.getName()} does not support tool calling`
      );
    }
    return this.model.bindTools(tools.map(toFunctionTool));
  }

  async invoke(
    conversation: Conversation,
    options?: ChatModelInvokeOptions
  ): Promise<ModelTurn> {
    const runnable = this.withTools(options?.tools ?? []);
    const messages = toLangChainMessages(conversation, options?.systemPrompt);

    let response: AIMessageChunk;
    try {
      response = await runnable.invoke(
        messages,
        options?.signal ? { signal: options.signal } : undefined
      );
    } catch (error) {
      throw toLlmError(error);
    }
    return toModelTurn(response, usedRequestIds(conversation));
  }
}
