// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/validation/claim-validator`
 * Purpose: Validate claims through bounded rounds of fact-checking sub-conversations.
 * Scope: Implements ClaimValidationCapability on top of the conversation engine. Does NOT parse free text itself.
 * Invariants:
 *   - ROUND_IS_SUBCONVERSATION: every round is a fresh engine run with its own conversation and step budget
 *   - FACT_CHECK_TOOLS_ONLY: sub-conversations see web_search and crawl_webpage, nothing else
 *   - EVIDENCE_ACCUMULATES: citations merge across rounds, deduplicated by source URL
 *   - CLAIMS_CONCURRENT: claims validate in parallel; result order matches input order
 *   - CANCELLATION_PROPAGATES: the caller's signal reaches every sub-conversation
 * Side-effects: IO (model and tools via the engine), AiEvent emission, logging
 * Links: verdict-policy.ts, fact-check-parser.ts, engine/conversation-engine.ts
 * @public
 */

import {
  authoredTexts,
  type Citation,
  type Claim,
  type EmitAiEvent,
  ResearchError,
  type StaticToolSource,
} from "@fathom/ai-core";
import {
  type ClaimValidationCapability,
  CRAWL_WEBPAGE_NAME,
  WEB_SEARCH_NAME,
} from "@fathom/ai-tools";

import {
  type ConversationEngine,
  createConversationEngine,
} from "../engine/conversation-engine";
import type { ChatModelPort } from "../model/chat-model.port";
import { FACT_CHECKER_PROMPT } from "../presets/prompts";
import { type LoggerPort, NOOP_LOGGER } from "../runtime/logger.port";
import { parseFactCheck } from "./fact-check-parser";
import {
  CLAIM_MAX_ROUNDS,
  decideVerdict,
  mergeEvidence,
  type VerdictDecision,
} from "./verdict-policy";

export const FACT_CHECK_TOOL_IDS = [WEB_SEARCH_NAME, CRAWL_WEBPAGE_NAME] as const;

export const DEFAULT_FACT_CHECK_MAX_STEPS = 8;

export interface ClaimValidatorDeps {
  readonly model: ChatModelPort;
  /** Must register web_search and crawl_webpage; other tools are hidden from the fact checker */
  readonly tools: StaticToolSource;
  readonly emit?: EmitAiEvent;
  readonly logger?: LoggerPort;
  readonly maxRounds?: number;
  /** Step budget of each round's sub-conversation */
  readonly maxStepsPerRound?: number;
  readonly maxResultChars?: number;
  readonly runId?: string;
}

interface Evidence {
  readonly supporting: readonly Citation[];
  readonly contradicting: readonly Citation[];
}

function formatCitations(citations: readonly Citation[]): string {
  return citations
    .map((c) => (c.snippet ? `- ${c.snippet} (${c.sourceUrl})` : `- ${c.sourceUrl}`))
    .join("\n");
}

/**
 * User turn for one round. Later rounds carry the evidence gathered so far.
 */
export function factCheckQuery(
  claim: string,
  round: number,
  evidence: Evidence,
  notes: string
): string {
  if (round === 1) return `Validate this claim:\n\n${claim}`;

  const sections = [
    `Validate this claim (round ${round}; earlier rounds were inconclusive):\n\n${claim}`,
  ];
  if (evidence.supporting.length > 0) {
    sections.push(`Supporting evidence found so far:\n${formatCitations(evidence.supporting)}`);
  }
  if (evidence.contradicting.length > 0) {
    sections.push(
      `Contradicting evidence found so far:\n${formatCitations(evidence.contradicting)}`
    );
  }
  if (notes) sections.push(`Previous notes:\n${notes}`);
  sections.push("Find additional independent sources to resolve what remains uncertain.");
  return sections.join("\n\n");
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new ResearchError("aborted", "Claim validation was cancelled");
  }
}

export function createClaimValidator(
  deps: ClaimValidatorDeps
): ClaimValidationCapability {
  const emit: EmitAiEvent = deps.emit ?? (() => undefined);
  const logger = deps.logger ?? NOOP_LOGGER;
  const maxRounds = deps.maxRounds ?? CLAIM_MAX_ROUNDS;
  const maxSteps = deps.maxStepsPerRound ?? DEFAULT_FACT_CHECK_MAX_STEPS;
  if (!Number.isInteger(maxRounds) || maxRounds < 1) {
    throw new RangeError(`maxRounds must be a positive integer, got ${maxRounds}`);
  }

  const engine: ConversationEngine = createConversationEngine({
    model: deps.model,
    tools: deps.tools.select(FACT_CHECK_TOOL_IDS),
    emit,
    logger,
  });

  async function validateOne(
    text: string,
    claimNumber: number,
    signal: AbortSignal
  ): Promise<Claim> {
    let evidence: Evidence = { supporting: [], contradicting: [] };
    let notes = "";
    let decision: VerdictDecision = {
      confidence: "LOW",
      verdict: "UNCERTAIN",
      needsMoreResearch: true,
      final: false,
    };
    let rounds = 0;

    while (!decision.final) {
      throwIfAborted(signal);
      rounds += 1;
      const scope = `claim-${claimNumber}/round-${rounds}`;
      emit({
        type: "subconversation_start",
        scope,
        purpose: `validate claim ${claimNumber}`,
      });
      emit({ type: "status", phase: "validating", scope });

      const outcome = await engine.run({
        query: factCheckQuery(text, rounds, evidence, notes),
        systemPrompt: FACT_CHECKER_PROMPT,
        maxSteps,
        signal,
        scope,
        ...(deps.runId !== undefined && { runId: deps.runId }),
        ...(deps.maxResultChars !== undefined && {
          maxResultChars: deps.maxResultChars,
        }),
      });
      throwIfAborted(signal);

      const answer = authoredTexts(outcome.conversation).at(-1)?.text ?? "";
      const block = parseFactCheck(answer);
      evidence = {
        supporting: mergeEvidence(evidence.supporting, block.supporting),
        contradicting: mergeEvidence(evidence.contradicting, block.contradicting),
      };
      if (block.notes) notes = block.notes;

      decision = decideVerdict({
        supporting: evidence.supporting,
        contradicting: evidence.contradicting,
        reportedConfidence: block.confidence,
        reportedVerdict: block.verdict,
        round: rounds,
        maxRounds,
      });

      logger.debug(
        {
          event: "research.claim_round",
          scope,
          termination: outcome.termination,
          confidence: decision.confidence,
          verdict: decision.verdict,
          final: decision.final,
        },
        "claim validation round finished"
      );
    }

    logger.info(
      {
        event: "research.claim_validated",
        claim: claimNumber,
        rounds,
        confidence: decision.confidence,
        verdict: decision.verdict,
        needsMoreResearch: decision.needsMoreResearch,
      },
      "claim validated"
    );

    return Object.freeze({
      text,
      supportingEvidence: Object.freeze(evidence.supporting),
      contradictingEvidence: Object.freeze(evidence.contradicting),
      confidence: decision.confidence,
      verdict: decision.verdict,
      needsMoreResearch: decision.needsMoreResearch,
      rounds,
      notes,
    });
  }

  return {
    async validateClaims({ claims, signal }) {
      return Promise.all(
        claims.map((claim, index) => validateOne(claim, index + 1, signal))
      );
    },
  };
}
