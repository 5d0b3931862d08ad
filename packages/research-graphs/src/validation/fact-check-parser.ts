// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/validation/fact-check-parser`
 * Purpose: Parse the fact checker's labelled answer block into structured fields.
 * Scope: Pure text parsing. Does NOT decide verdicts (see verdict-policy.ts).
 * Invariants:
 *   - FIRST_FIELD_WINS: when a label repeats, the first occurrence is kept
 *   - CITATION_NEEDS_URL: only lines carrying an http(s) URL become citations
 *   - UNKNOWN_LABEL_IS_NULL: unrecognised confidence / verdict / yes-no values parse to null
 * Side-effects: none
 * Links: claim-validator.ts, prompts/fact-checker
 * @public
 */

import {
  type Citation,
  CLAIM_CONFIDENCE_LEVELS,
  CLAIM_VERDICTS,
  type ClaimConfidence,
  type ClaimVerdict,
} from "@fathom/ai-core";

export const FACT_CHECK_FIELDS = [
  "CLAIM",
  "SUPPORTING",
  "CONTRADICTING",
  "CONFIDENCE",
  "VERDICT",
  "NOTES",
  "NEEDS_MORE_RESEARCH",
] as const;

type FactCheckField = (typeof FACT_CHECK_FIELDS)[number];

export interface FactCheckBlock {
  readonly claim: string | null;
  readonly supporting: readonly Citation[];
  readonly contradicting: readonly Citation[];
  readonly confidence: ClaimConfidence | null;
  readonly verdict: ClaimVerdict | null;
  readonly notes: string;
  readonly needsMoreResearch: boolean | null;
}

// Labels may be bolded or bulleted: "**VERDICT:** LIKELY TRUE", "- CONFIDENCE: HIGH"
const FIELD_LINE =
  /^\s*(?:[-*]\s+)?\**\s*(CLAIM|SUPPORTING|CONTRADICTING|CONFIDENCE|VERDICT|NOTES|NEEDS_MORE_RESEARCH)\s*\**\s*:\s*\**\s*(.*)$/i;

const URL_PATTERN = /https?:\/\/[^\s<>"'()[\]]+/;

function isFactCheckField(value: string): value is FactCheckField {
  return FACT_CHECK_FIELDS.some((field) => field === value);
}

function splitFields(text: string): Map<FactCheckField, string> {
  const fields = new Map<FactCheckField, string[]>();
  let current: string[] | undefined;

  for (const line of text.split(/\r?\n/)) {
    const match = FIELD_LINE.exec(line);
    const label = match?.[1]?.toUpperCase();
    if (match && label && isFactCheckField(label)) {
      if (fields.has(label)) {
        // Repeated label: ignore it and everything until the next first-seen label
        current = undefined;
        continue;
      }
      current = [match[2] ?? ""];
      fields.set(label, current);
      continue;
    }
    current?.push(line);
  }

  const joined = new Map<FactCheckField, string>();
  for (const [field, lines] of fields) {
    joined.set(field, lines.join("\n").trim());
  }
  return joined;
}

function stripEmphasis(value: string): string {
  return value.replace(/[*`]/g, "").trim();
}

/**
 * Extract one citation per line that carries a URL.
 */
export function parseCitations(text: string): Citation[] {
  const citations: Citation[] = [];
  for (const line of text.split(/\r?\n/)) {
    const match = URL_PATTERN.exec(line);
    if (!match) continue;
    const sourceUrl = match[0].replace(/[.,;:!?]+$/, "");
    const snippet = stripEmphasis(line.replace(match[0], ""))
      .replace(/\(\s*\)|\[\s*\]/g, "")
      .replace(/^(?:[-•]|\d+[.)])\s*/, "")
      .replace(/[\s:;,.-]+$/, "")
      .trim();
    citations.push({ sourceUrl, snippet });
  }
  return citations;
}

export function parseConfidence(text: string): ClaimConfidence | null {
  const word = stripEmphasis(text).split(/\s+/)[0]?.toUpperCase() ?? "";
  return CLAIM_CONFIDENCE_LEVELS.find((level) => level === word) ?? null;
}

export function parseVerdict(text: string): ClaimVerdict | null {
  const normalized = stripEmphasis(text).toUpperCase().replace(/[\s-]+/g, "_");
  return CLAIM_VERDICTS.find((verdict) => normalized.startsWith(verdict)) ?? null;
}

export function parseYesNo(text: string): boolean | null {
  const match = /^(yes|no)\b/i.exec(stripEmphasis(text));
  if (!match?.[1]) return null;
  return match[1].toLowerCase() === "yes";
}

/**
 * Parse a fact checker answer. Missing fields come back empty or null.
 */
export function parseFactCheck(text: string): FactCheckBlock {
  const fields = splitFields(text);
  const field = (name: FactCheckField): string => fields.get(name) ?? "";
  const claim = stripEmphasis(field("CLAIM"));

  return {
    claim: claim.length > 0 ? claim : null,
    supporting: parseCitations(field("SUPPORTING")),
    contradicting: parseCitations(field("CONTRADICTING")),
    confidence: parseConfidence(field("CONFIDENCE")),
    verdict: parseVerdict(field("VERDICT")),
    notes: field("NOTES"),
    needsMoreResearch: parseYesNo(field("NEEDS_MORE_RESEARCH")),
  };
}
