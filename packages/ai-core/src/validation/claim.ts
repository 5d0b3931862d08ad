// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/validation/claim`
 * Purpose: Claim and Citation types produced by claim validation.
 * Scope: Types and label constants only. Does NOT implement the verdict policy (see research-graphs validation/).
 * Invariants:
 *   - CITATION_IMMUTABLE: Citations are never edited after creation
 *   - LABELS_CLOSED: confidence and verdict are closed label sets
 * Side-effects: none
 * Links: @fathom/research-graphs validation/claim-validator.ts
 * @public
 */

export const CLAIM_CONFIDENCE_LEVELS = ["HIGH", "MEDIUM", "LOW"] as const;
export type ClaimConfidence = (typeof CLAIM_CONFIDENCE_LEVELS)[number];

export const CLAIM_VERDICTS = [
  "CONFIRMED",
  "LIKELY_TRUE",
  "UNCERTAIN",
  "LIKELY_FALSE",
] as const;
export type ClaimVerdict = (typeof CLAIM_VERDICTS)[number];

export interface Citation {
  readonly sourceUrl: string;
  readonly snippet: string;
}

export interface Claim {
  readonly text: string;
  readonly supportingEvidence: readonly Citation[];
  readonly contradictingEvidence: readonly Citation[];
  readonly confidence: ClaimConfidence;
  readonly verdict: ClaimVerdict;
  readonly needsMoreResearch: boolean;
  /** Validation rounds spent on this claim */
  readonly rounds: number;
  /** Free-form notes from the latest round */
  readonly notes: string;
}
