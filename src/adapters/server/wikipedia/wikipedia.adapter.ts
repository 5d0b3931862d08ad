// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/wikipedia/wikipedia.adapter`
 * Purpose: MediaWiki Action API adapter implementing EncyclopediaCapability.
 * Scope: Page lookup (lead summary, top-level sections, links) and section reads from plain-text extracts.
 *        Does NOT search by keyword; titles resolve through MediaWiki redirects only.
 * Invariants:
 *   - A missing page is `null` / page_missing, never a thrown error
 *   - SECTION_MATCH_CASE_INSENSITIVE: section titles compare trimmed and lower-cased, at any depth
 *   - Section content includes its subsections, with their headings as plain lines
 * Side-effects: IO (HTTP requests to {lang}.wikipedia.org)
 * Links: packages/ai-tools/src/tools/wikipedia-search.ts, wikipedia-get-section.ts
 * @internal
 */

import type {
  EncyclopediaCapability,
  EncyclopediaPage,
  SectionLookup,
} from "@fathom/ai-tools";
import type { Logger } from "pino";
import { z } from "zod";

import { EVENT_NAMES, makeLogger } from "@/shared/observability";

import {
  type ProviderCall,
  providerGet,
  readProviderJson,
} from "../http/provider-fetch";

const QueryResponseSchema = z.object({
  query: z
    .object({
      pages: z
        .array(
          z.object({
            title: z.string(),
            missing: z.boolean().optional(),
            invalid: z.boolean().optional(),
            extract: z.string().optional(),
            fullurl: z.string().optional(),
            links: z
              .array(z.object({ ns: z.number(), title: z.string() }))
              .optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

type QueryPage = NonNullable<
  z.output<typeof QueryResponseSchema>["query"]
>["pages"][number];

// ─────────────────────────────────────────────────────────────────────────────
// Plain-text extract parsing
// ─────────────────────────────────────────────────────────────────────────────

export interface ExtractSection {
  readonly title: string;
  /** 2 for "== Title ==", 3 for "=== Title ===", … */
  readonly level: number;
  readonly content: string;
}

export interface ParsedExtract {
  readonly lead: string;
  readonly sections: readonly ExtractSection[];
}

const HEADING = /^(={2,6})\s*(.+?)\s*\1\s*$/;

function tidy(lines: readonly string[]): string {
  return lines
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Split an `explaintext` + `exsectionformat=wiki` extract into lead and sections.
 */
export function parseExtract(extract: string): ParsedExtract {
  const lines = extract.split("\n");
  const headings: Array<{ title: string; level: number; line: number }> = [];

  lines.forEach((line, index) => {
    const match = HEADING.exec(line);
    const marks = match?.[1];
    const title = match?.[2];
    if (marks && title) {
      headings.push({ title, level: marks.length, line: index });
    }
  });

  const firstHeading = headings[0]?.line ?? lines.length;
  const sections = headings.map((heading, i) => {
    let end = lines.length;
    for (const next of headings.slice(i + 1)) {
      if (next.level <= heading.level) {
        end = next.line;
        break;
      }
    }
    const body = lines.slice(heading.line + 1, end).map((line) => {
      const sub = HEADING.exec(line);
      return sub?.[2] ?? line;
    });
    return { title: heading.title, level: heading.level, content: tidy(body) };
  });

  return { lead: tidy(lines.slice(0, firstHeading)), sections };
}

function topLevelTitles(parsed: ParsedExtract): string[] {
  const top = Math.min(...parsed.sections.map((s) => s.level));
  return parsed.sections.filter((s) => s.level === top).map((s) => s.title);
}

// ─────────────────────────────────────────────────────────────────────────────
// Adapter
// ─────────────────────────────────────────────────────────────────────────────

export interface WikipediaConfig {
  /** Wiki language subdomain, e.g. "en" */
  language: string;
  userAgent: string;
  logger?: Logger;
}

export class WikipediaAdapter implements EncyclopediaCapability {
  private readonly origin: string;
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(config: WikipediaConfig) {
    this.origin = `https://${config.language}.wikipedia.org`;
    this.userAgent = config.userAgent;
    this.logger = config.logger ?? makeLogger({ component: "WikipediaAdapter" });
  }

  async lookup(params: {
    readonly title: string;
    readonly signal: AbortSignal;
  }): Promise<EncyclopediaPage | null> {
    const page = await this.queryPage(
      params.title,
      {
        prop: "extracts|info|links",
        inprop: "url",
        plnamespace: "0",
        pllimit: "max",
      },
      params.signal
    );
    if (!page) return null;

    const parsed = parseExtract(page.extract ?? "");
    return {
      title: page.title,
      summary: parsed.lead,
      url: page.fullurl ?? this.articleUrl(page.title),
      sections: topLevelTitles(parsed),
      links: (page.links ?? [])
        .filter((link) => link.ns === 0)
        .map((link) => link.title),
    };
  }

  async readSection(params: {
    readonly pageTitle: string;
    readonly sectionTitle: string;
    readonly signal: AbortSignal;
  }): Promise<SectionLookup> {
    const page = await this.queryPage(
      params.pageTitle,
      { prop: "extracts" },
      params.signal
    );
    if (!page) return { status: "page_missing", pageTitle: params.pageTitle };

    const parsed = parseExtract(page.extract ?? "");
    const wanted = params.sectionTitle.trim().toLowerCase();
    const section = parsed.sections.find(
      (s) => s.title.trim().toLowerCase() === wanted
    );
    if (!section) {
      return {
        status: "section_missing",
        pageTitle: page.title,
        availableSections: topLevelTitles(parsed),
      };
    }
    return {
      status: "found",
      pageTitle: page.title,
      sectionTitle: section.title,
      content: section.content,
    };
  }

  articleUrl(title: string): string {
    return `${this.origin}/wiki/${encodeURIComponent(title.replaceAll(" ", "_"))}`;
  }

  private async queryPage(
    title: string,
    props: Readonly<Record<string, string>>,
    signal: AbortSignal
  ): Promise<QueryPage | null> {
    const url = new URL("/w/api.php", this.origin);
    const search: Record<string, string> = {
      action: "query",
      format: "json",
      formatversion: "2",
      redirects: "1",
      explaintext: "1",
      exsectionformat: "wiki",
      titles: title,
      ...props,
    };
    for (const [key, value] of Object.entries(search)) {
      url.searchParams.set(key, value);
    }

    const call: ProviderCall = {
      dep: "wikipedia",
      event: EVENT_NAMES.ADAPTER_WIKIPEDIA_ERROR,
      logger: this.logger,
      signal,
      headers: { "User-Agent": this.userAgent, Accept: "application/json" },
      details: { pageTitle: title },
    };
    const response = await providerGet(url.toString(), call);
    const data = await readProviderJson(response, QueryResponseSchema, call);

    const page = data.query?.pages[0];
    if (!page || page.missing || page.invalid) return null;
    return page;
  }
}
