// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/tests/report/report-extractor`
 * Purpose: Unit tests for report scoring and selection.
 * Scope: Pure conversations built with ai-core helpers.
 * Invariants:
 *   - ANSWERS_FIRST: a passing final answer beats a longer draft sent with a tool call
 *   - LONGEST_WINS with ties to the latest
 *   - FALLBACK_LOGGED / NEVER_EMPTY
 * Side-effects: none
 * Links: src/report/report-extractor.ts
 * @internal
 */

import { appendMessages, type Conversation, createConversation } from "@fathom/ai-core";
import { describe, expect, it } from "vitest";

import {
  extractReport,
  scoreReportCandidate,
  terminationNotice,
} from "../../src/report/report-extractor";
import { captureLogger, logEvents } from "../helpers/fakes";

function build(
  ...steps: Array<{ text: string; withTools?: boolean; toolName?: string }>
): Conversation {
  let conversation = createConversation("query");
  steps.forEach((step, i) => {
    if (step.withTools) {
      const requestId = `r${i}`;
      const toolName = step.toolName ?? "web_search";
      conversation = appendMessages(conversation, [
        {
          kind: "tool_invocation",
          requests: [{ toolName, arguments: {}, requestId }],
          text: step.text,
        },
        {
          kind: "tool_outcome",
          results: [{ ok: true, requestId, toolName, value: {} }],
        },
      ]).conversation;
    } else {
      conversation = appendMessages(conversation, [
        { kind: "assistant_text", text: step.text },
      ]).conversation;
    }
  });
  return conversation;
}

describe("scoreReportCandidate", () => {
  it("passes with one marker at exactly the minimum length", () => {
    const candidate = `## Sources\n${"a".repeat(189)}`;
    expect(scoreReportCandidate(candidate)).toEqual({
      markers: 2,
      length: 200,
      passes: true,
    });
  });

  it("fails one character short of the minimum", () => {
    expect(scoreReportCandidate(`Introduction ${"a".repeat(186)}`)).toEqual({
      markers: 1,
      length: 199,
      passes: false,
    });
  });

  it("fails long text without markers", () => {
    expect(scoreReportCandidate("b".repeat(500)).passes).toBe(false);
  });
});

describe("extractReport", () => {
  const longReport = `# Topic\n\n## Executive Summary\n${"Findings. ".repeat(57)}\n## Sources\n- https://example.org`;

  it("prefers a 600-character report over a later 50-character answer", () => {
    const short = "x".repeat(50);
    expect(longReport.length).toBeGreaterThanOrEqual(600);
    const conversation = build({ text: longReport, withTools: true }, { text: short });

    expect(extractReport(conversation, "query")).toEqual({
      query: "query",
      body: longReport,
      extractedFromMessageIndex: 1,
      selection: "heuristic",
    });
  });

  it("prefers the corrected final report over a longer draft sent for validation", () => {
    const draft = `## Executive Summary\n${"Unchecked claim. ".repeat(40)}`;
    const corrected = `## Executive Summary\n${"Checked. ".repeat(25)}\n## Sources\n- https://example.org`;
    expect(draft.length).toBeGreaterThan(corrected.length);
    const conversation = build(
      { text: draft, withTools: true, toolName: "validate_claims" },
      { text: corrected }
    );

    expect(extractReport(conversation, "query")).toEqual({
      query: "query",
      body: corrected,
      extractedFromMessageIndex: 3,
      selection: "heuristic",
    });
  });

  it("breaks length ties in favour of the latest message", () => {
    const a = `## A\n${"a".repeat(300)}`;
    const b = `## B\n${"b".repeat(300)}`;
    const conversation = build({ text: a, withTools: true }, { text: b });

    const report = extractReport(conversation, "query");
    expect(report.body).toBe(b);
    expect(report.extractedFromMessageIndex).toBe(3);
  });

  it("falls back to the last non-empty text and logs it", () => {
    const { logger, logs } = captureLogger();
    const conversation = build({ text: "Searching now.", withTools: true }, { text: "Paris." });

    const report = extractReport(conversation, "query", { logger });

    expect(report).toEqual({
      query: "query",
      body: "Paris.",
      extractedFromMessageIndex: 3,
      selection: "fallback",
    });
    expect(logs).toHaveLength(1);
    expect(logs[0]?.level).toBe("warn");
    expect(logEvents(logs)).toEqual(["research.report_fallback"]);
  });

  it("ignores whitespace-only answers when falling back", () => {
    const conversation = build({ text: "Real answer" }, { text: "   " });
    const report = extractReport(conversation, "query");
    expect(report.body).toBe("Real answer");
    expect(report.extractedFromMessageIndex).toBe(1);
  });

  it("returns the supplied notice when the model never wrote text", () => {
    const { logger, logs } = captureLogger();
    const notice = terminationNotice("query", "budget_exceeded");

    const report = extractReport(createConversation("query"), "query", { logger, notice });

    expect(report).toEqual({
      query: "query",
      body: notice,
      extractedFromMessageIndex: null,
      selection: "notice",
    });
    expect(logEvents(logs)).toEqual(["research.report_notice"]);
  });

  it("writes the termination reason into the notice", () => {
    expect(terminationNotice("tides", "aborted").split("\n")).toEqual([
      "## Research incomplete",
      "",
      'The research run for "tides" ended (aborted) before the model wrote a report.',
      "No findings are available; retry with a larger step budget or a narrower query.",
    ]);
  });
});
