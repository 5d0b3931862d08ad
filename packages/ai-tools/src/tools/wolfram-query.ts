// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tools/wolfram-query`
 * Purpose: Research tool that runs a structured query against Wolfram Alpha.
 * Scope: Contract + implementation over MathEngineCapability.
 * Invariants:
 *   - POD_ORDER: pods and `text` lines follow provider order
 *   - UNSUCCESSFUL_IS_FAILURE: provider `success: false` → provider_error
 *   - 30 s deadline
 * Side-effects: IO (via capability)
 * Links: capabilities/math-engine.ts, rewrite-for-wolfram.ts
 * @public
 */

import { ToolFailure } from "@fathom/ai-core";
import { z } from "zod";

import type { MathEngineCapability } from "../capabilities/math-engine";
import { type BoundTool, pickAllowlisted, type ToolContract } from "../types";

export const DEFAULT_WOLFRAM_TIMEOUT_MS = 30_000;
export const NO_PLAINTEXT_RESULTS = "No plaintext results found";

export const WolframQueryInputSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1)
    .describe("Wolfram Alpha query, as returned by rewrite_for_wolfram"),
});
export type WolframQueryInput = z.infer<typeof WolframQueryInputSchema>;

export const WolframQueryOutputSchema = z.object({
  query: z.string(),
  pods: z.array(z.object({ title: z.string(), plaintext: z.string() })),
  text: z.string(),
});
export type WolframQueryOutput = z.infer<typeof WolframQueryOutputSchema>;

export const WOLFRAM_QUERY_NAME = "wolfram_query" as const;

const WOLFRAM_ALLOWLIST = ["query", "pods", "text"] as const;

export const wolframQueryContract: ToolContract<
  typeof WOLFRAM_QUERY_NAME,
  WolframQueryInput,
  WolframQueryOutput
> = {
  name: WOLFRAM_QUERY_NAME,
  description:
    "Run a query on Wolfram Alpha. Only pass output from rewrite_for_wolfram, " +
    "never raw natural language. Returns the plaintext result pods.",
  effect: "read_only",
  inputSchema: WolframQueryInputSchema,
  outputSchema: WolframQueryOutputSchema,
  redact: (output) => pickAllowlisted(output, WOLFRAM_ALLOWLIST),
  allowlist: WOLFRAM_ALLOWLIST,
  timeoutMs: DEFAULT_WOLFRAM_TIMEOUT_MS,
};

export interface WolframQueryDeps {
  readonly mathEngine: MathEngineCapability;
}

export function createWolframQueryTool(
  deps: WolframQueryDeps
): BoundTool<typeof WOLFRAM_QUERY_NAME, WolframQueryInput, WolframQueryOutput> {
  return {
    contract: wolframQueryContract,
    implementation: {
      execute: async (input, ctx) => {
        const result = await deps.mathEngine.query({
          input: input.query,
          signal: ctx.signal,
        });

        if (!result.success) {
          throw new ToolFailure(
            "provider_error",
            `Wolfram Alpha could not understand the query: ${input.query}`,
            result.didYouMean ? { didYouMean: result.didYouMean } : undefined
          );
        }

        const pods = result.pods.flatMap((pod) =>
          pod.plaintexts
            .filter((plaintext) => plaintext.length > 0)
            .map((plaintext) => ({ title: pod.title, plaintext }))
        );
        const text =
          pods.length > 0
            ? pods.map((pod) => `${pod.title}: ${pod.plaintext}`).join("\n")
            : NO_PLAINTEXT_RESULTS;

        return { query: input.query, pods, text };
      },
    },
  };
}
