// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/rewrite/query-rewriter`
 * Purpose: Model-backed rewrite of a natural-language math question into Wolfram Alpha syntax.
 * Scope: One tool-less model call per question. Does NOT validate the math.
 * Invariants:
 *   - SINGLE_CALL: exactly one model invocation, no tools bound
 *   - ONE_LINE: the result is the first non-empty line with wrapping quotes and fences removed
 * Side-effects: IO (model call)
 * Links: presets/prompts.ts (mathRewritePrompt), @fathom/ai-tools rewrite-for-wolfram
 * @public
 */

import { createConversation } from "@fathom/ai-core";
import type { QueryRewriteCapability } from "@fathom/ai-tools";

import type { ChatModelPort } from "../model/chat-model.port";
import { mathRewritePrompt } from "../presets/prompts";

/**
 * Reduce a model reply to a bare query line.
 */
export function cleanRewrite(reply: string): string {
  const line = reply
    .split(/\r?\n/)
    .filter((l) => !l.trim().startsWith("```"))
    .map((l) => l.replace(/`/g, "").trim())
    .find((l) => l.length > 0);
  if (!line) return "";
  return line.replace(/^(?:query\s*:\s*)/i, "").replace(/^["']+|["']+$/g, "").trim();
}

export function createQueryRewriter(model: ChatModelPort): QueryRewriteCapability {
  return {
    async rewriteForMathEngine({ question, signal }) {
      const turn = await model.invoke(
        createConversation(mathRewritePrompt(question)),
        { signal }
      );
      return turn.kind === "assistant_text" ? cleanRewrite(turn.text) : "";
    },
  };
}
