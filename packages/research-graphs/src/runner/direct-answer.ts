// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/runner/direct-answer`
 * Purpose: Tool-less baseline answer, kept beside the researched report for comparison.
 * Scope: One model call without tools or system prompt.
 * Side-effects: IO (model call)
 * @public
 */

import { createConversation } from "@fathom/ai-core";

import type { ChatModelPort } from "../model/chat-model.port";
import { directAnswerPrompt } from "../presets/prompts";

export async function answerDirectly(
  model: ChatModelPort,
  query: string,
  signal?: AbortSignal
): Promise<string> {
  const turn = await model.invoke(
    createConversation(directAnswerPrompt(query)),
    signal ? { signal } : undefined
  );
  // No tools are bound, so a tool turn only carries whatever text came with it
  return turn.kind === "assistant_text" ? turn.text : (turn.text ?? "");
}
