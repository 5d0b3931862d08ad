// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools`
 * Purpose: Barrel export for research tool contracts, implementations and capabilities.
 * Scope: Re-exports all public types from submodules. Does NOT import @langchain.
 * Invariants: SINGLE_SOURCE_OF_TRUTH - these are the canonical tool definitions.
 * Side-effects: none
 * Links: catalog.ts
 * @public
 */

export type {
  ClaimValidationCapability,
  EncyclopediaCapability,
  EncyclopediaPage,
  FetchedPage,
  MathEngineCapability,
  MathEngineResult,
  MathPod,
  PageFetchCapability,
  PageFetchParams,
  QueryRewriteCapability,
  SectionLookup,
  WebSearchCapability,
  WebSearchHit,
  WebSearchParams,
  WebSearchResult,
} from "./capabilities";
// Tool catalog
export {
  createResearchToolCatalog,
  createToolCatalog,
  type ResearchToolDeps,
  type ToolCatalog,
} from "./catalog";
// Runtime adapter
export {
  type ToBoundToolRuntimeOptions,
  toBoundToolRuntime,
} from "./runtime-adapter";
// Schema compilation
export { type ToolSpecSource, toToolSpec } from "./schema";
// Tools
export {
  CRAWL_WEBPAGE_NAME,
  type CrawlWebpageInput,
  type CrawlWebpageOutput,
  collapseWhitespace,
  createCrawlWebpageTool,
  crawlWebpageContract,
  DEFAULT_CRAWL_TIMEOUT_MS,
  extractText,
  extractTitle,
} from "./tools/crawl-webpage";
export {
  createRewriteForWolframTool,
  REWRITE_FOR_WOLFRAM_NAME,
  type RewriteForWolframInput,
  type RewriteForWolframOutput,
  rewriteForWolframContract,
} from "./tools/rewrite-for-wolfram";
export {
  createValidateClaimsTool,
  DEFAULT_VALIDATE_CLAIMS_TIMEOUT_MS,
  MAX_CLAIMS_PER_CALL,
  VALIDATE_CLAIMS_NAME,
  type ValidateClaimsInput,
  type ValidateClaimsOutput,
  validateClaimsContract,
} from "./tools/validate-claims";
export {
  createWebSearchTool,
  noResultsSuggestion,
  WEB_SEARCH_NAME,
  type WebSearchInput,
  type WebSearchOutput,
  type WebSearchResultItem,
  webSearchContract,
} from "./tools/web-search";
export {
  createWikipediaGetSectionTool,
  WIKIPEDIA_GET_SECTION_NAME,
  type WikipediaGetSectionInput,
  type WikipediaGetSectionOutput,
  wikipediaGetSectionContract,
} from "./tools/wikipedia-get-section";
export {
  createWikipediaSearchTool,
  firstSentences,
  PAGE_NOT_FOUND_SUGGESTION,
  WIKIPEDIA_SEARCH_NAME,
  type WikipediaSearchInput,
  type WikipediaSearchOutput,
  wikipediaSearchContract,
} from "./tools/wikipedia-search";
export {
  createWolframQueryTool,
  DEFAULT_WOLFRAM_TIMEOUT_MS,
  NO_PLAINTEXT_RESULTS,
  WOLFRAM_QUERY_NAME,
  type WolframQueryInput,
  type WolframQueryOutput,
  wolframQueryContract,
} from "./tools/wolfram-query";
// Tool types
export {
  type AllKeys,
  type BoundTool,
  pickAllowlisted,
  type ToolContract,
  type ToolExecutionContext,
  type ToolImplementation,
} from "./types";
