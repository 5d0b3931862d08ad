// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/capabilities/page-fetch`
 * Purpose: Page retrieval capability used by the crawl tool.
 * Scope: Interface only. HTML-to-text conversion happens in the tool, not here.
 * Invariants:
 *   - FAILURE_CARRIES_URL: every thrown ToolFailure includes `{ url }` in details
 *   - Non-2xx responses are network_error; the adapter does not return them
 * Side-effects: none (interface only)
 * Links: tools/crawl-webpage.ts, src/adapters/server/crawl
 * @public
 */

export interface PageFetchParams {
  readonly url: string;
  readonly signal: AbortSignal;
}

export interface FetchedPage {
  /** Final URL after redirects */
  readonly url: string;
  readonly status: number;
  /** Lower-cased media type without parameters, "" when absent */
  readonly contentType: string;
  readonly html: string;
}

export interface PageFetchCapability {
  fetchPage(params: PageFetchParams): Promise<FetchedPage>;
}
