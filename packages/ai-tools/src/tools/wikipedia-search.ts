// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tools/wikipedia-search`
 * Purpose: Research tool that looks up a Wikipedia article summary.
 * Scope: Contract + implementation over EncyclopediaCapability.
 * Invariants:
 *   - NOT_FOUND_IS_SUCCESS: a missing page returns `{ found: false, query, suggestion }`
 *   - sections ≤ 5, relatedTopics ≤ 10, in page order
 * Side-effects: IO (via capability)
 * Links: capabilities/encyclopedia.ts
 * @public
 */

import { z } from "zod";

import type { EncyclopediaCapability } from "../capabilities/encyclopedia";
import { type BoundTool, pickAllowlisted, type ToolContract } from "../types";

export const MAX_SECTIONS = 5;
export const MAX_RELATED_TOPICS = 10;
export const PAGE_NOT_FOUND_SUGGESTION =
  "Page not found. Try rephrasing your search query or search for related terms.";

export const WikipediaSearchInputSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1)
    .describe("The topic to look up (an article title works best)"),
  sentences: z
    .number()
    .int()
    .min(1)
    .max(50)
    .default(10)
    .describe("Number of summary sentences to return (default 10)"),
});
export type WikipediaSearchInput = z.infer<typeof WikipediaSearchInputSchema>;

export const WikipediaSearchOutputSchema = z.discriminatedUnion("found", [
  z.object({
    found: z.literal(true),
    title: z.string(),
    summary: z.string(),
    url: z.string(),
    sections: z.array(z.string()).max(MAX_SECTIONS),
    relatedTopics: z.array(z.string()).max(MAX_RELATED_TOPICS),
  }),
  z.object({
    found: z.literal(false),
    query: z.string(),
    suggestion: z.string(),
  }),
]);
export type WikipediaSearchOutput = z.infer<typeof WikipediaSearchOutputSchema>;

export const WIKIPEDIA_SEARCH_NAME = "wikipedia_search" as const;

const WIKIPEDIA_SEARCH_ALLOWLIST = [
  "found",
  "title",
  "summary",
  "url",
  "sections",
  "relatedTopics",
  "query",
  "suggestion",
] as const;

export const wikipediaSearchContract: ToolContract<
  typeof WIKIPEDIA_SEARCH_NAME,
  WikipediaSearchInput,
  WikipediaSearchOutput
> = {
  name: WIKIPEDIA_SEARCH_NAME,
  description:
    "Look up a topic on Wikipedia. Returns the article summary, URL, its first " +
    "section titles and related topics. Follow up with wikipedia_get_section for detail.",
  effect: "read_only",
  inputSchema: WikipediaSearchInputSchema,
  outputSchema: WikipediaSearchOutputSchema,
  redact: (output) => pickAllowlisted(output, WIKIPEDIA_SEARCH_ALLOWLIST),
  allowlist: WIKIPEDIA_SEARCH_ALLOWLIST,
};

/** First `count` sentences of `text`, split after terminal punctuation. */
export function firstSentences(text: string, count: number): string {
  return text
    .trim()
    .split(/(?<=[.!?])\s+/)
    .filter((sentence) => sentence.length > 0)
    .slice(0, count)
    .join(" ");
}

export interface WikipediaSearchDeps {
  readonly encyclopedia: EncyclopediaCapability;
}

export function createWikipediaSearchTool(
  deps: WikipediaSearchDeps
): BoundTool<
  typeof WIKIPEDIA_SEARCH_NAME,
  WikipediaSearchInput,
  WikipediaSearchOutput
> {
  return {
    contract: wikipediaSearchContract,
    implementation: {
      execute: async (input, ctx) => {
        const page = await deps.encyclopedia.lookup({
          title: input.query,
          signal: ctx.signal,
        });
        if (!page) {
          return {
            found: false,
            query: input.query,
            suggestion: PAGE_NOT_FOUND_SUGGESTION,
          };
        }
        return {
          found: true,
          title: page.title,
          summary: firstSentences(page.summary, input.sentences),
          url: page.url,
          sections: page.sections.slice(0, MAX_SECTIONS),
          relatedTopics: page.links.slice(0, MAX_RELATED_TOPICS),
        };
      },
    },
  };
}
