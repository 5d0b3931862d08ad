// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/capabilities/query-rewrite`
 * Purpose: Rewrites a natural-language question into math-engine syntax.
 * Scope: Interface only; the model-backed implementation lives in research-graphs.
 * Side-effects: none (interface only)
 * Links: tools/rewrite-for-wolfram.ts
 * @public
 */

export interface QueryRewriteCapability {
  /** Returns a single line of engine syntax; may be empty if the model produced nothing usable */
  rewriteForMathEngine(params: {
    readonly question: string;
    readonly signal: AbortSignal;
  }): Promise<string>;
}
