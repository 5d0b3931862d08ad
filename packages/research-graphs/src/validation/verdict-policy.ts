// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/validation/verdict-policy`
 * Purpose: Decide a claim's confidence and verdict from accumulated evidence after each round.
 * Scope: Pure decision function plus evidence merging. Does NOT run conversations.
 * Invariants:
 *   - NO_EVIDENCE_IS_UNCERTAIN: no citations of either kind → LOW, UNCERTAIN
 *   - CONTRADICTION_CAPS: unresolved contradictions → UNCERTAIN with confidence at most MEDIUM
 *   - CONFIRMED_REQUIRES: supporting evidence, zero contradictions and HIGH confidence
 *   - HIGH_FINALIZES: a HIGH decision ends validation for the claim
 *   - ROUND_BUDGET: the last round without HIGH → LOW with needsMoreResearch
 * Side-effects: none
 * Links: claim-validator.ts, fact-check-parser.ts
 * @public
 */

import type { Citation, ClaimConfidence, ClaimVerdict } from "@fathom/ai-core";

export const CLAIM_MAX_ROUNDS = 3;

export interface VerdictInput {
  /** Evidence accumulated over every round so far */
  readonly supporting: readonly Citation[];
  readonly contradicting: readonly Citation[];
  /** What the fact checker reported in the latest round */
  readonly reportedConfidence: ClaimConfidence | null;
  readonly reportedVerdict: ClaimVerdict | null;
  /** 1-based */
  readonly round: number;
  readonly maxRounds: number;
}

export interface VerdictDecision {
  readonly confidence: ClaimConfidence;
  readonly verdict: ClaimVerdict;
  readonly needsMoreResearch: boolean;
  /** True when no further round should run */
  readonly final: boolean;
}

const CONFIDENCE_RANK: Readonly<Record<ClaimConfidence, number>> = {
  LOW: 0,
  MEDIUM: 1,
  HIGH: 2,
};

function atMost(
  confidence: ClaimConfidence,
  ceiling: ClaimConfidence
): ClaimConfidence {
  return CONFIDENCE_RANK[confidence] > CONFIDENCE_RANK[ceiling]
    ? ceiling
    : confidence;
}

function assess(input: VerdictInput): {
  confidence: ClaimConfidence;
  verdict: ClaimVerdict;
} {
  const reported = input.reportedConfidence ?? "LOW";
  const hasSupport = input.supporting.length > 0;
  const hasContradiction = input.contradicting.length > 0;

  if (!hasSupport && !hasContradiction) {
    return { confidence: "LOW", verdict: "UNCERTAIN" };
  }

  if (hasContradiction) {
    // Contradictions with nothing in support point one way: the claim is likely false
    if (!hasSupport) {
      return { confidence: reported, verdict: "LIKELY_FALSE" };
    }
    return { confidence: atMost(reported, "MEDIUM"), verdict: "UNCERTAIN" };
  }

  switch (input.reportedVerdict) {
    case "CONFIRMED":
      return {
        confidence: reported,
        verdict: reported === "HIGH" ? "CONFIRMED" : "LIKELY_TRUE",
      };
    case "UNCERTAIN":
    case "LIKELY_FALSE":
      // Verdict disagrees with supporting-only evidence
      return { confidence: atMost(reported, "MEDIUM"), verdict: "UNCERTAIN" };
    default:
      return { confidence: reported, verdict: "LIKELY_TRUE" };
  }
}

export function decideVerdict(input: VerdictInput): VerdictDecision {
  const { confidence, verdict } = assess(input);

  if (confidence === "HIGH") {
    return { confidence, verdict, needsMoreResearch: false, final: true };
  }
  if (input.round >= input.maxRounds) {
    return { confidence: "LOW", verdict, needsMoreResearch: true, final: true };
  }
  return { confidence, verdict, needsMoreResearch: true, final: false };
}

/**
 * Append citations whose source URL is not yet present. Order is preserved.
 */
export function mergeEvidence(
  existing: readonly Citation[],
  incoming: readonly Citation[]
): Citation[] {
  const seen = new Set(existing.map((citation) => citation.sourceUrl));
  const merged = [...existing];
  for (const citation of incoming) {
    if (seen.has(citation.sourceUrl)) continue;
    seen.add(citation.sourceUrl);
    merged.push(Object.freeze({ ...citation }));
  }
  return merged;
}
