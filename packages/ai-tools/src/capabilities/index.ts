// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/capabilities`
 * Purpose: Capability interfaces that tool implementations depend on.
 * Scope: Type re-exports only. Capability interfaces live here, NOT in ai-core.
 * Invariants:
 *   - NO_SECRETS_IN_CONTEXT: Capabilities resolve credentials themselves
 * Side-effects: none
 * Links: src/adapters/server (implementations)
 * @public
 */

export type { ClaimValidationCapability } from "./claim-validation";
export type {
  EncyclopediaCapability,
  EncyclopediaPage,
  SectionLookup,
} from "./encyclopedia";
export type {
  MathEngineCapability,
  MathEngineResult,
  MathPod,
} from "./math-engine";
export type {
  FetchedPage,
  PageFetchCapability,
  PageFetchParams,
} from "./page-fetch";
export type { QueryRewriteCapability } from "./query-rewrite";
export type {
  WebSearchCapability,
  WebSearchHit,
  WebSearchParams,
  WebSearchResult,
} from "./web-search";
