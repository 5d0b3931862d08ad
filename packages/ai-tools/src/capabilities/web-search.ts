// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/capabilities/web-search`
 * Purpose: Web search capability interface for research tools.
 * Scope: Defines WebSearchCapability. Does NOT implement transport.
 * Invariants:
 *   - PROVIDER_ORDER: results come back in the provider's ranking order
 *   - Transport failures surface as ToolFailure (network_error, parse_error)
 * Side-effects: none (interface only)
 * Links: tools/web-search.ts, src/adapters/server/search
 * @public
 */

export interface WebSearchParams {
  readonly query: string;
  readonly maxResults: number;
  readonly signal: AbortSignal;
}

export interface WebSearchHit {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
}

export interface WebSearchResult {
  readonly results: readonly WebSearchHit[];
}

export interface WebSearchCapability {
  /**
   * Execute a web search query.
   * An empty result list is a normal outcome, not an error.
   */
  search(params: WebSearchParams): Promise<WebSearchResult>;
}
