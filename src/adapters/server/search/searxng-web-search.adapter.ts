// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/search/searxng-web-search.adapter`
 * Purpose: SearXNG JSON API adapter implementing WebSearchCapability.
 * Scope: HTTP transport to a SearXNG instance. Does NOT define tool contracts or rank results.
 * Invariants:
 *   - PROVIDER_ORDER: hits keep SearXNG's ranking; only the first maxResults are returned
 *   - Hits without a URL are dropped
 *   - No results is an empty list, not an error
 * Side-effects: IO (HTTP requests to SEARXNG_URL)
 * Links: packages/ai-tools/src/tools/web-search.ts
 * @internal
 */

import type {
  WebSearchCapability,
  WebSearchHit,
  WebSearchParams,
  WebSearchResult,
} from "@fathom/ai-tools";
import type { Logger } from "pino";
import { z } from "zod";

import { EVENT_NAMES, makeLogger } from "@/shared/observability";

import { providerGet, readProviderJson } from "../http/provider-fetch";

const SearxngResponseSchema = z.object({
  results: z
    .array(
      z.object({
        url: z.string().optional(),
        title: z.string().optional(),
        content: z.string().nullish(),
      })
    )
    .default([]),
});

export interface SearxngWebSearchConfig {
  /** Instance base URL, e.g. http://localhost:8080 */
  baseUrl: string;
  userAgent?: string;
  logger?: Logger;
}

export class SearxngWebSearchAdapter implements WebSearchCapability {
  private readonly endpoint: string;
  private readonly userAgent: string | undefined;
  private readonly logger: Logger;

  constructor(config: SearxngWebSearchConfig) {
    this.endpoint = new URL(
      "search",
      `${config.baseUrl.replace(/\/+$/, "")}/`
    ).toString();
    this.userAgent = config.userAgent;
    this.logger =
      config.logger ?? makeLogger({ component: "SearxngWebSearchAdapter" });
  }

  async search(params: WebSearchParams): Promise<WebSearchResult> {
    const url = new URL(this.endpoint);
    url.searchParams.set("q", params.query);
    url.searchParams.set("format", "json");

    const call = {
      dep: "searxng",
      event: EVENT_NAMES.ADAPTER_SEARXNG_ERROR,
      logger: this.logger,
      signal: params.signal,
      headers: {
        Accept: "application/json",
        ...(this.userAgent !== undefined && { "User-Agent": this.userAgent }),
      },
      details: { query: params.query },
    };

    const response = await providerGet(url.toString(), call);
    const data = await readProviderJson(response, SearxngResponseSchema, call);

    const results: WebSearchHit[] = [];
    for (const hit of data.results) {
      if (!hit.url) continue;
      results.push({
        url: hit.url,
        title: hit.title?.trim() || "No title",
        snippet: hit.content?.trim() || "No description",
      });
      if (results.length >= params.maxResults) break;
    }
    return { results };
  }
}
