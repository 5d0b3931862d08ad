// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/tests/validation/verdict-policy`
 * Purpose: Unit tests for the per-round verdict decision and evidence merging.
 * Scope: Pure functions.
 * Side-effects: none
 * Links: src/validation/verdict-policy.ts
 * @internal
 */

import type { Citation } from "@fathom/ai-core";
import { describe, expect, it } from "vitest";

import {
  decideVerdict,
  mergeEvidence,
  type VerdictInput,
} from "../../src/validation/verdict-policy";

const PRO: Citation = { sourceUrl: "https://example.org/pro", snippet: "agrees" };
const CON: Citation = { sourceUrl: "https://example.org/con", snippet: "disagrees" };

function input(overrides: Partial<VerdictInput>): VerdictInput {
  return {
    supporting: [],
    contradicting: [],
    reportedConfidence: null,
    reportedVerdict: null,
    round: 1,
    maxRounds: 3,
    ...overrides,
  };
}

describe("decideVerdict", () => {
  it("marks a claim without evidence LOW and UNCERTAIN, whatever was reported", () => {
    expect(
      decideVerdict(input({ reportedConfidence: "HIGH", reportedVerdict: "CONFIRMED" }))
    ).toEqual({
      confidence: "LOW",
      verdict: "UNCERTAIN",
      needsMoreResearch: true,
      final: false,
    });
  });

  it("confirms only with support, no contradiction and HIGH confidence", () => {
    expect(
      decideVerdict(
        input({ supporting: [PRO], reportedConfidence: "HIGH", reportedVerdict: "CONFIRMED" })
      )
    ).toEqual({
      confidence: "HIGH",
      verdict: "CONFIRMED",
      needsMoreResearch: false,
      final: true,
    });
  });

  it("downgrades CONFIRMED to LIKELY_TRUE below HIGH confidence", () => {
    expect(
      decideVerdict(
        input({ supporting: [PRO], reportedConfidence: "MEDIUM", reportedVerdict: "CONFIRMED" })
      )
    ).toEqual({
      confidence: "MEDIUM",
      verdict: "LIKELY_TRUE",
      needsMoreResearch: true,
      final: false,
    });
  });

  it("caps confidence at MEDIUM while contradictions remain unresolved", () => {
    expect(
      decideVerdict(
        input({
          supporting: [PRO],
          contradicting: [CON],
          reportedConfidence: "HIGH",
          reportedVerdict: "CONFIRMED",
        })
      )
    ).toEqual({
      confidence: "MEDIUM",
      verdict: "UNCERTAIN",
      needsMoreResearch: true,
      final: false,
    });
  });

  it("treats contradictions with no support as LIKELY_FALSE", () => {
    expect(
      decideVerdict(input({ contradicting: [CON], reportedConfidence: "HIGH" }))
    ).toEqual({
      confidence: "HIGH",
      verdict: "LIKELY_FALSE",
      needsMoreResearch: false,
      final: true,
    });
  });

  it("ends with LOW and needsMoreResearch once the round budget is spent", () => {
    expect(
      decideVerdict(
        input({
          supporting: [PRO],
          contradicting: [CON],
          reportedConfidence: "MEDIUM",
          round: 3,
        })
      )
    ).toEqual({
      confidence: "LOW",
      verdict: "UNCERTAIN",
      needsMoreResearch: true,
      final: true,
    });
  });

  it("reads a missing verdict with supporting evidence as LIKELY_TRUE", () => {
    expect(
      decideVerdict(input({ supporting: [PRO], reportedConfidence: "HIGH" })).verdict
    ).toBe("LIKELY_TRUE");
  });
});

describe("mergeEvidence", () => {
  it("appends new sources and drops repeated URLs", () => {
    const repeat: Citation = { sourceUrl: PRO.sourceUrl, snippet: "same source again" };
    expect(mergeEvidence([PRO], [repeat, CON])).toEqual([PRO, CON]);
  });
});
