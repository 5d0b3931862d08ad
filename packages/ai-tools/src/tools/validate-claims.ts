// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tools/validate-claims`
 * Purpose: Research tool that fact-checks key claims through validation sub-conversations.
 * Scope: Contract + delegation to ClaimValidationCapability.
 * Invariants:
 *   - ONE_CLAIM_PER_INPUT: output claims match input order and count
 *   - Long deadline: each claim may run several multi-step rounds
 * Side-effects: IO (sub-conversations via capability)
 * Links: capabilities/claim-validation.ts
 * @public
 */

import { CLAIM_CONFIDENCE_LEVELS, CLAIM_VERDICTS } from "@fathom/ai-core";
import { z } from "zod";

import type { ClaimValidationCapability } from "../capabilities/claim-validation";
import { type BoundTool, pickAllowlisted, type ToolContract } from "../types";

export const DEFAULT_VALIDATE_CLAIMS_TIMEOUT_MS = 600_000;
export const MAX_CLAIMS_PER_CALL = 8;

export const ValidateClaimsInputSchema = z.object({
  claims: z
    .array(z.string().trim().min(1))
    .min(1)
    .max(MAX_CLAIMS_PER_CALL)
    .describe("Key factual claims to verify, one statement per entry"),
});
export type ValidateClaimsInput = z.infer<typeof ValidateClaimsInputSchema>;

const CitationSchema = z.object({ sourceUrl: z.string(), snippet: z.string() });

export const ValidatedClaimSchema = z.object({
  text: z.string(),
  supportingEvidence: z.array(CitationSchema),
  contradictingEvidence: z.array(CitationSchema),
  confidence: z.enum(CLAIM_CONFIDENCE_LEVELS),
  verdict: z.enum(CLAIM_VERDICTS),
  needsMoreResearch: z.boolean(),
  rounds: z.number().int().min(0),
  notes: z.string(),
});

export const ValidateClaimsOutputSchema = z.object({
  claims: z.array(ValidatedClaimSchema),
});
export type ValidateClaimsOutput = z.infer<typeof ValidateClaimsOutputSchema>;

export const VALIDATE_CLAIMS_NAME = "validate_claims" as const;

const VALIDATE_CLAIMS_ALLOWLIST = ["claims"] as const;

export const validateClaimsContract: ToolContract<
  typeof VALIDATE_CLAIMS_NAME,
  ValidateClaimsInput,
  ValidateClaimsOutput
> = {
  name: VALIDATE_CLAIMS_NAME,
  description:
    "Fact-check key claims from your draft. Each claim is researched independently " +
    "and returned with supporting/contradicting sources, a confidence level and a verdict.",
  effect: "read_only",
  inputSchema: ValidateClaimsInputSchema,
  outputSchema: ValidateClaimsOutputSchema,
  redact: (output) => pickAllowlisted(output, VALIDATE_CLAIMS_ALLOWLIST),
  allowlist: VALIDATE_CLAIMS_ALLOWLIST,
  timeoutMs: DEFAULT_VALIDATE_CLAIMS_TIMEOUT_MS,
};

export interface ValidateClaimsDeps {
  readonly claimValidation: ClaimValidationCapability;
}

export function createValidateClaimsTool(
  deps: ValidateClaimsDeps
): BoundTool<
  typeof VALIDATE_CLAIMS_NAME,
  ValidateClaimsInput,
  ValidateClaimsOutput
> {
  return {
    contract: validateClaimsContract,
    implementation: {
      execute: async (input, ctx) => {
        const claims = await deps.claimValidation.validateClaims({
          claims: input.claims,
          signal: ctx.signal,
        });
        return {
          claims: claims.map((claim) => ({
            ...claim,
            supportingEvidence: [...claim.supportingEvidence],
            contradictingEvidence: [...claim.contradictingEvidence],
          })),
        };
      },
    },
  };
}
