// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/capabilities/claim-validation`
 * Purpose: Claim validation capability backed by fact-checking sub-conversations.
 * Scope: Interface only; implemented by the claim validator in research-graphs.
 * Invariants:
 *   - ONE_CLAIM_PER_INPUT: result order matches input order
 *   - Cancellation via `signal` reaches every sub-conversation
 * Side-effects: none (interface only)
 * Links: tools/validate-claims.ts
 * @public
 */

import type { Claim } from "@fathom/ai-core";

export interface ClaimValidationCapability {
  validateClaims(params: {
    readonly claims: readonly string[];
    readonly signal: AbortSignal;
  }): Promise<readonly Claim[]>;
}
