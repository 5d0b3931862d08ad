// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tools/web-search`
 * Purpose: Research tool that searches the web and returns ranked hits.
 * Scope: Contract + implementation over WebSearchCapability. Does NOT implement transport.
 * Invariants:
 *   - PROVIDER_ORDER: rank follows the provider's order, starting at 1
 *   - EMPTY_IS_SUCCESS: no hits is a Success with `results: []` and a suggestion
 *   - EFFECT_TYPED: effect is `read_only`
 * Side-effects: IO (via capability)
 * Links: capabilities/web-search.ts
 * @public
 */

import { z } from "zod";

import type { WebSearchCapability } from "../capabilities/web-search";
import { type BoundTool, pickAllowlisted, type ToolContract } from "../types";

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const WebSearchInputSchema = z.object({
  query: z.string().trim().min(1).max(400).describe("The search query"),
  maxResults: z
    .number()
    .int()
    .min(1)
    .max(10)
    .default(5)
    .describe("Maximum number of results to return (1-10, default 5)"),
});
export type WebSearchInput = z.infer<typeof WebSearchInputSchema>;

export const WebSearchResultItemSchema = z.object({
  rank: z.number().int().min(1),
  title: z.string(),
  snippet: z.string(),
  url: z.string(),
});
export type WebSearchResultItem = z.infer<typeof WebSearchResultItemSchema>;

export const WebSearchOutputSchema = z.object({
  query: z.string(),
  results: z.array(WebSearchResultItemSchema),
  suggestion: z.string().optional(),
});
export type WebSearchOutput = z.infer<typeof WebSearchOutputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Contract
// ─────────────────────────────────────────────────────────────────────────────

export const WEB_SEARCH_NAME = "web_search" as const;

const WEB_SEARCH_ALLOWLIST = ["query", "results", "suggestion"] as const;

export const webSearchContract: ToolContract<
  typeof WEB_SEARCH_NAME,
  WebSearchInput,
  WebSearchOutput
> = {
  name: WEB_SEARCH_NAME,
  description:
    "Search the web for information. Returns ranked results with titles, URLs " +
    "and snippets. Use it to find sources, then crawl_webpage to read them.",
  effect: "read_only",
  inputSchema: WebSearchInputSchema,
  outputSchema: WebSearchOutputSchema,
  redact: (output) => pickAllowlisted(output, WEB_SEARCH_ALLOWLIST),
  allowlist: WEB_SEARCH_ALLOWLIST,
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export interface WebSearchDeps {
  readonly webSearch: WebSearchCapability;
}

export function noResultsSuggestion(query: string): string {
  return `No results found for: ${query}. Try different keywords or rephrase the search.`;
}

export function createWebSearchTool(
  deps: WebSearchDeps
): BoundTool<typeof WEB_SEARCH_NAME, WebSearchInput, WebSearchOutput> {
  return {
    contract: webSearchContract,
    implementation: {
      execute: async (input, ctx) => {
        const { results } = await deps.webSearch.search({
          query: input.query,
          maxResults: input.maxResults,
          signal: ctx.signal,
        });

        const ranked = results.slice(0, input.maxResults).map((hit, i) => ({
          rank: i + 1,
          title: hit.title,
          snippet: hit.snippet,
          url: hit.url,
        }));

        if (ranked.length === 0) {
          return {
            query: input.query,
            results: [],
            suggestion: noResultsSuggestion(input.query),
          };
        }
        return { query: input.query, results: ranked };
      },
    },
  };
}
