// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/crawl/http-page-fetch.adapter`
 * Purpose: Plain HTTP GET adapter implementing PageFetchCapability for the crawl tool.
 * Scope: Fetches raw HTML/text. Does NOT strip markup or truncate (the crawl tool does).
 * Invariants:
 *   - FAILURE_CARRIES_URL: every ToolFailure thrown here has `{ url }` in details
 *   - Sends a browser-like User-Agent; some sites refuse unknown agents
 *   - Redirects are followed; the final URL is reported
 * Side-effects: IO (HTTP requests to arbitrary URLs)
 * Links: packages/ai-tools/src/tools/crawl-webpage.ts
 * @internal
 */

import { ToolFailure } from "@fathom/ai-core";
import type {
  FetchedPage,
  PageFetchCapability,
  PageFetchParams,
} from "@fathom/ai-tools";
import type { Logger } from "pino";

import { EVENT_NAMES, makeLogger } from "@/shared/observability";

import { type ProviderCall, providerGet } from "../http/provider-fetch";

export const CRAWL_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

export interface HttpPageFetchConfig {
  userAgent?: string;
  logger?: Logger;
}

/** "Text/HTML; charset=utf-8" → "text/html" */
export function mediaType(header: string | null): string {
  return (header ?? "").split(";")[0]?.trim().toLowerCase() ?? "";
}

export class HttpPageFetchAdapter implements PageFetchCapability {
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(config: HttpPageFetchConfig = {}) {
    this.userAgent = config.userAgent ?? CRAWL_USER_AGENT;
    this.logger =
      config.logger ?? makeLogger({ component: "HttpPageFetchAdapter" });
  }

  async fetchPage(params: PageFetchParams): Promise<FetchedPage> {
    const call: ProviderCall = {
      dep: "crawl",
      event: EVENT_NAMES.ADAPTER_CRAWL_ERROR,
      logger: this.logger,
      signal: params.signal,
      headers: {
        "User-Agent": this.userAgent,
        Accept: "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.8",
      },
      details: { url: params.url },
    };

    const response = await providerGet(params.url, call);

    let html: string;
    try {
      html = await response.text();
    } catch (error) {
      if (params.signal.aborted) throw error;
      this.logger.error(
        {
          event: EVENT_NAMES.ADAPTER_CRAWL_ERROR,
          dep: "crawl",
          reasonCode: "network_error",
          status: response.status,
        },
        EVENT_NAMES.ADAPTER_CRAWL_ERROR
      );
      const reason = error instanceof Error ? error.message : String(error);
      throw new ToolFailure(
        "network_error",
        `Could not read the body of ${params.url}: ${reason}`,
        { url: params.url }
      );
    }

    return {
      url: response.url || params.url,
      status: response.status,
      contentType: mediaType(response.headers.get("content-type")),
      html,
    };
  }
}
