// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/report/report-extractor`
 * Purpose: Select the single authoritative report from a finished conversation.
 * Scope: Pure scoring + selection over model-authored text; logs when the heuristic fails.
 * Invariants:
 *   - REPORT_SHAPE: a candidate passes with ≥1 structural marker and ≥ REPORT_MIN_LENGTH chars
 *   - CANDIDATES: final answers and text sent alongside tool calls (e.g. a draft submitted to validate_claims)
 *   - ANSWERS_FIRST: text sent alongside a tool call is chosen only when no final answer passes
 *   - LONGEST_WINS: within a tier the longest passing candidate is chosen; ties go to the latest
 *   - FALLBACK_LOGGED: with no passing candidate the last non-empty text is used verbatim and a warning is logged
 *   - NEVER_EMPTY: a conversation with no model text yields a termination notice, not an empty body
 * Side-effects: logging via LoggerPort
 * Links: engine/conversation-engine.ts
 * @public
 */

import {
  type AuthoredText,
  authoredTexts,
  type Conversation,
} from "@fathom/ai-core";

import { type LoggerPort, NOOP_LOGGER } from "../runtime/logger.port";

export const REPORT_MARKERS = [
  "##",
  "Executive Summary",
  "Introduction",
  "Sources",
] as const;

export const REPORT_MIN_LENGTH = 200;

export type ReportSelection = "heuristic" | "fallback" | "notice";

export interface Report {
  readonly query: string;
  /** Non-empty markdown body */
  readonly body: string;
  /** Conversation index the body came from; null for a termination notice */
  readonly extractedFromMessageIndex: number | null;
  readonly selection: ReportSelection;
}

export interface ReportScore {
  readonly markers: number;
  readonly length: number;
  readonly passes: boolean;
}

export function scoreReportCandidate(text: string): ReportScore {
  const markers = REPORT_MARKERS.filter((marker) => text.includes(marker)).length;
  return {
    markers,
    length: text.length,
    passes: markers > 0 && text.length >= REPORT_MIN_LENGTH,
  };
}

export interface ExtractReportOptions {
  readonly logger?: LoggerPort;
  /** Body used when the conversation carries no model text at all */
  readonly notice?: string;
}

export function terminationNotice(query: string, reason: string): string {
  return [
    "## Research incomplete",
    "",
    `The research run for "${query}" ended (${reason}) before the model wrote a report.`,
    "No findings are available; retry with a larger step budget or a narrower query.",
  ].join("\n");
}

function longestPassing(
  candidates: readonly AuthoredText[]
): AuthoredText | undefined {
  let best: AuthoredText | undefined;
  for (const candidate of candidates) {
    if (!scoreReportCandidate(candidate.text).passes) continue;
    // >= so that a later candidate of equal length replaces an earlier one
    if (!best || candidate.text.length >= best.text.length) best = candidate;
  }
  return best;
}

/**
 * Pick the report body from `conversation`.
 */
export function extractReport(
  conversation: Conversation,
  query: string,
  options?: ExtractReportOptions
): Report {
  const logger = options?.logger ?? NOOP_LOGGER;
  const candidates = authoredTexts(conversation).filter(
    (candidate) => candidate.text.trim().length > 0
  );

  const best =
    longestPassing(
      candidates.filter((candidate) => candidate.kind === "assistant_text")
    ) ?? longestPassing(candidates);

  if (best) {
    return {
      query,
      body: best.text,
      extractedFromMessageIndex: best.index,
      selection: "heuristic",
    };
  }

  const last = candidates.at(-1);
  if (last) {
    logger.warn(
      {
        event: "research.report_fallback",
        candidates: candidates.length,
        index: last.index,
        length: last.text.length,
      },
      "no report-shaped message; using last model text"
    );
    return {
      query,
      body: last.text,
      extractedFromMessageIndex: last.index,
      selection: "fallback",
    };
  }

  logger.warn(
    { event: "research.report_notice", messages: conversation.length },
    "conversation has no model text; emitting termination notice"
  );
  return {
    query,
    body: options?.notice ?? terminationNotice(query, "no answer"),
    extractedFromMessageIndex: null,
    selection: "notice",
  };
}
