// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export {
  CRAWL_USER_AGENT,
  type HttpPageFetchConfig,
  HttpPageFetchAdapter,
} from "./crawl/http-page-fetch.adapter";
export { FileReportWriter } from "./reports/file-report-writer.adapter";
export {
  type SearxngWebSearchConfig,
  SearxngWebSearchAdapter,
} from "./search/searxng-web-search.adapter";
export {
  type WikipediaConfig,
  WikipediaAdapter,
} from "./wikipedia/wikipedia.adapter";
export {
  type WolframAlphaConfig,
  WolframAlphaAdapter,
} from "./wolfram/wolfram-alpha.adapter";
