// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tools/rewrite-for-wolfram`
 * Purpose: Research tool that turns a natural-language math question into Wolfram Alpha syntax.
 * Scope: Contract + implementation over QueryRewriteCapability (one model call).
 * Invariants:
 *   - An empty rewrite is a provider_error Failure, never an empty Success
 * Side-effects: IO (model call via capability)
 * Links: capabilities/query-rewrite.ts, wolfram-query.ts
 * @public
 */

import { ToolFailure } from "@fathom/ai-core";
import { z } from "zod";

import type { QueryRewriteCapability } from "../capabilities/query-rewrite";
import { type BoundTool, pickAllowlisted, type ToolContract } from "../types";

export const RewriteForWolframInputSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1)
    .describe("The math question in natural language"),
});
export type RewriteForWolframInput = z.infer<
  typeof RewriteForWolframInputSchema
>;

export const RewriteForWolframOutputSchema = z.object({
  question: z.string(),
  query: z.string().min(1),
});
export type RewriteForWolframOutput = z.infer<
  typeof RewriteForWolframOutputSchema
>;

export const REWRITE_FOR_WOLFRAM_NAME = "rewrite_for_wolfram" as const;

const REWRITE_ALLOWLIST = ["question", "query"] as const;

export const rewriteForWolframContract: ToolContract<
  typeof REWRITE_FOR_WOLFRAM_NAME,
  RewriteForWolframInput,
  RewriteForWolframOutput
> = {
  name: REWRITE_FOR_WOLFRAM_NAME,
  description:
    "Convert a natural-language math question into Wolfram Alpha syntax. " +
    "Always call this BEFORE wolfram_query and pass its `query` on unchanged.",
  effect: "read_only",
  inputSchema: RewriteForWolframInputSchema,
  outputSchema: RewriteForWolframOutputSchema,
  redact: (output) => pickAllowlisted(output, REWRITE_ALLOWLIST),
  allowlist: REWRITE_ALLOWLIST,
};

export interface RewriteForWolframDeps {
  readonly queryRewrite: QueryRewriteCapability;
}

export function createRewriteForWolframTool(
  deps: RewriteForWolframDeps
): BoundTool<
  typeof REWRITE_FOR_WOLFRAM_NAME,
  RewriteForWolframInput,
  RewriteForWolframOutput
> {
  return {
    contract: rewriteForWolframContract,
    implementation: {
      execute: async (input, ctx) => {
        const query = (
          await deps.queryRewrite.rewriteForMathEngine({
            question: input.question,
            signal: ctx.signal,
          })
        ).trim();
        if (query.length === 0) {
          throw new ToolFailure(
            "provider_error",
            "The rewrite produced no Wolfram Alpha query"
          );
        }
        return { question: input.question, query };
      },
    },
  };
}
