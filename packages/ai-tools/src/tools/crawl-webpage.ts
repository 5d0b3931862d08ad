// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tools/crawl-webpage`
 * Purpose: Research tool that fetches a page and extracts its readable text.
 * Scope: HTML-to-text extraction over PageFetchCapability. Transport lives in the adapter.
 * Invariants:
 *   - BOILERPLATE_STRIPPED: script, style, nav, footer, header are never part of content
 *   - WHITESPACE_COLLAPSED: content is single-spaced
 *   - TRUNCATION_MARKED: content over maxChars ends with the truncation marker; charCount is the returned length
 *   - SELF_BOUNDED: maxChars is the only cut applied; the runner's result bound does not shorten content
 *   - FAILURE_CARRIES_URL: every failure, timeouts and cancellation included, attaches `{ url }`
 * Side-effects: IO (via capability)
 * Links: capabilities/page-fetch.ts, @fathom/ai-core truncate.ts
 * @public
 */

import { ToolFailure, truncateText } from "@fathom/ai-core";
import { convert, type HtmlToTextOptions } from "html-to-text";
import { z } from "zod";

import type { PageFetchCapability } from "../capabilities/page-fetch";
import { type BoundTool, pickAllowlisted, type ToolContract } from "../types";

export const DEFAULT_CRAWL_TIMEOUT_MS = 10_000;
export const NO_TITLE = "No title";

export const CrawlWebpageInputSchema = z.object({
  url: z.string().url().describe("The URL to crawl"),
  maxChars: z
    .number()
    .int()
    .min(100)
    .max(50_000)
    .default(8_000)
    .describe("Maximum characters of page text to return (default 8000)"),
});
export type CrawlWebpageInput = z.infer<typeof CrawlWebpageInputSchema>;

export const CrawlWebpageOutputSchema = z.object({
  url: z.string(),
  title: z.string(),
  content: z.string(),
  truncated: z.boolean(),
  charCount: z.number().int().min(0),
});
export type CrawlWebpageOutput = z.infer<typeof CrawlWebpageOutputSchema>;

export const CRAWL_WEBPAGE_NAME = "crawl_webpage" as const;

const CRAWL_ALLOWLIST = [
  "url",
  "title",
  "content",
  "truncated",
  "charCount",
] as const;

export const crawlWebpageContract: ToolContract<
  typeof CRAWL_WEBPAGE_NAME,
  CrawlWebpageInput,
  CrawlWebpageOutput
> = {
  name: CRAWL_WEBPAGE_NAME,
  description:
    "Fetch a web page and return its main text content (title, text, character count). " +
    "Use it on URLs found by web_search to read the source itself.",
  effect: "read_only",
  inputSchema: CrawlWebpageInputSchema,
  outputSchema: CrawlWebpageOutputSchema,
  redact: (output) => pickAllowlisted(output, CRAWL_ALLOWLIST),
  allowlist: CRAWL_ALLOWLIST,
  timeoutMs: DEFAULT_CRAWL_TIMEOUT_MS,
  boundsOwnOutput: true,
  failureDetails: (input) => ({ url: input.url }),
};

// ─────────────────────────────────────────────────────────────────────────────
// Extraction
// ─────────────────────────────────────────────────────────────────────────────

const SKIPPED_ELEMENTS = [
  "script",
  "style",
  "nav",
  "footer",
  "header",
  "noscript",
  "svg",
  "iframe",
  "img",
];

const CONVERT_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  baseElements: {
    selectors: ["main", "article", "body"],
    orderBy: "selectors",
    returnDomByDefault: true,
  },
  limits: { maxBaseElements: 1 },
  selectors: [
    ...SKIPPED_ELEMENTS.map((selector) => ({ selector, format: "skip" })),
    { selector: "a", options: { ignoreHref: true } },
    ...["h1", "h2", "h3", "h4", "h5", "h6"].map((selector) => ({
      selector,
      options: { uppercase: false },
    })),
    { selector: "table", format: "dataTable" },
  ],
};

const TITLE_PATTERN = /<title[^>]*>([\s\S]*?)<\/title>/i;

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function extractTitle(html: string): string {
  const match = TITLE_PATTERN.exec(html);
  const raw = match?.[1];
  if (raw === undefined) return NO_TITLE;
  const title = collapseWhitespace(convert(raw, { wordwrap: false }));
  return title.length > 0 ? title : NO_TITLE;
}

export function extractText(html: string): string {
  return collapseWhitespace(convert(html, CONVERT_OPTIONS));
}

function isTextual(contentType: string): boolean {
  return (
    contentType === "" ||
    contentType.startsWith("text/") ||
    contentType === "application/xhtml+xml"
  );
}

export interface CrawlWebpageDeps {
  readonly pageFetch: PageFetchCapability;
}

export function createCrawlWebpageTool(
  deps: CrawlWebpageDeps
): BoundTool<typeof CRAWL_WEBPAGE_NAME, CrawlWebpageInput, CrawlWebpageOutput> {
  return {
    contract: crawlWebpageContract,
    implementation: {
      execute: async (input, ctx) => {
        const page = await deps.pageFetch.fetchPage({
          url: input.url,
          signal: ctx.signal,
        });

        if (!isTextual(page.contentType)) {
          throw new ToolFailure(
            "parse_error",
            `Unsupported content type '${page.contentType}' at ${input.url}`,
            { url: input.url }
          );
        }

        let title: string;
        let text: string;
        try {
          const isPlainText = page.contentType === "text/plain";
          title = isPlainText ? NO_TITLE : extractTitle(page.html);
          text = isPlainText
            ? collapseWhitespace(page.html)
            : extractText(page.html);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          throw new ToolFailure(
            "parse_error",
            `Could not extract text from ${input.url}: ${reason}`,
            { url: input.url }
          );
        }

        const { text: content, truncated } = truncateText(text, input.maxChars);
        return {
          url: input.url,
          title,
          content,
          truncated,
          charCount: content.length,
        };
      },
    },
  };
}
