// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tools/wikipedia-get-section`
 * Purpose: Research tool that reads one section of a Wikipedia article.
 * Scope: Contract + implementation over EncyclopediaCapability.
 * Invariants:
 *   - Missing page → `{ found: false, pageTitle, error }`
 *   - Missing section → same plus `availableSections`
 *   - Content is truncated to maxChars with the truncation marker
 * Side-effects: IO (via capability)
 * Links: capabilities/encyclopedia.ts
 * @public
 */

import { truncateText } from "@fathom/ai-core";
import { z } from "zod";

import type { EncyclopediaCapability } from "../capabilities/encyclopedia";
import { type BoundTool, pickAllowlisted, type ToolContract } from "../types";

export const WikipediaGetSectionInputSchema = z.object({
  pageTitle: z.string().trim().min(1).describe("Title of the Wikipedia page"),
  sectionTitle: z
    .string()
    .trim()
    .min(1)
    .describe("Title of the section to read"),
  maxChars: z
    .number()
    .int()
    .min(100)
    .max(20_000)
    .default(3_000)
    .describe("Maximum characters of section text (default 3000)"),
});
export type WikipediaGetSectionInput = z.infer<
  typeof WikipediaGetSectionInputSchema
>;

export const WikipediaGetSectionOutputSchema = z.discriminatedUnion("found", [
  z.object({
    found: z.literal(true),
    pageTitle: z.string(),
    sectionTitle: z.string(),
    content: z.string(),
  }),
  z.object({
    found: z.literal(false),
    pageTitle: z.string(),
    error: z.string(),
    availableSections: z.array(z.string()).optional(),
  }),
]);
export type WikipediaGetSectionOutput = z.infer<
  typeof WikipediaGetSectionOutputSchema
>;

export const WIKIPEDIA_GET_SECTION_NAME = "wikipedia_get_section" as const;

const GET_SECTION_ALLOWLIST = [
  "found",
  "pageTitle",
  "sectionTitle",
  "content",
  "error",
  "availableSections",
] as const;

export const wikipediaGetSectionContract: ToolContract<
  typeof WIKIPEDIA_GET_SECTION_NAME,
  WikipediaGetSectionInput,
  WikipediaGetSectionOutput
> = {
  name: WIKIPEDIA_GET_SECTION_NAME,
  description:
    "Read the text of one section of a Wikipedia page. When the section does not " +
    "exist the available section titles are returned instead.",
  effect: "read_only",
  inputSchema: WikipediaGetSectionInputSchema,
  outputSchema: WikipediaGetSectionOutputSchema,
  redact: (output) => pickAllowlisted(output, GET_SECTION_ALLOWLIST),
  allowlist: GET_SECTION_ALLOWLIST,
};

export interface WikipediaGetSectionDeps {
  readonly encyclopedia: EncyclopediaCapability;
}

export function createWikipediaGetSectionTool(
  deps: WikipediaGetSectionDeps
): BoundTool<
  typeof WIKIPEDIA_GET_SECTION_NAME,
  WikipediaGetSectionInput,
  WikipediaGetSectionOutput
> {
  return {
    contract: wikipediaGetSectionContract,
    implementation: {
      execute: async (input, ctx) => {
        const lookup = await deps.encyclopedia.readSection({
          pageTitle: input.pageTitle,
          sectionTitle: input.sectionTitle,
          signal: ctx.signal,
        });

        switch (lookup.status) {
          case "found":
            return {
              found: true,
              pageTitle: lookup.pageTitle,
              sectionTitle: lookup.sectionTitle,
              content: truncateText(lookup.content, input.maxChars).text,
            };
          case "page_missing":
            return {
              found: false,
              pageTitle: input.pageTitle,
              error: `Page '${input.pageTitle}' not found`,
            };
          case "section_missing":
            return {
              found: false,
              pageTitle: input.pageTitle,
              error: `Section '${input.sectionTitle}' not found in page '${input.pageTitle}'`,
              availableSections: [...lookup.availableSections],
            };
        }
      },
    },
  };
}
