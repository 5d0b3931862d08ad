// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/model/chat-model.port`
 * Purpose: Port for the chat-completion endpoint as the engine sees it.
 * Scope: One call in, exactly one ModelTurn out. Does not know about LangChain.
 * Invariants:
 *   - ONE_MESSAGE_PER_CALL: invoke() resolves to a single AssistantText or ToolInvocation
 *   - REQUEST_IDS_UNIQUE: returned requestIds never collide with ids already in the conversation
 *   - Failures reject with LlmError (see @fathom/ai-core execution/llm-errors)
 * Side-effects: IO (implementations call the provider)
 * Links: langchain-chat-model.ts
 * @public
 */

import type { Conversation, ModelTurn, ToolSpec } from "@fathom/ai-core";

export interface ChatModelInvokeOptions {
  /** Tools the model may call this turn; none means a plain completion */
  readonly tools?: readonly ToolSpec[];
  readonly systemPrompt?: string;
  readonly signal?: AbortSignal;
}

export interface ChatModelPort {
  invoke(
    conversation: Conversation,
    options?: ChatModelInvokeOptions
  ): Promise<ModelTurn>;
}
