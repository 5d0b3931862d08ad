// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/tests/metrics/run-tracer`
 * Purpose: Unit tests for the per-run event tally.
 * Side-effects: none
 * Links: src/metrics/run-tracer.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { formatTally, RunTracer } from "../../src/metrics/run-tracer";

describe("RunTracer", () => {
  it("counts tool results per tool, root steps and sub-conversations", () => {
    const tracer = new RunTracer();
    tracer.observe({ type: "step", step: 1, maxSteps: 5 });
    tracer.observe({
      type: "tool_call_start",
      toolCallId: "a",
      toolName: "web_search",
      args: {},
    });
    tracer.observe({
      type: "tool_call_result",
      toolCallId: "a",
      toolName: "web_search",
      result: {},
      durationMs: 3,
    });
    tracer.observe({
      type: "tool_call_result",
      toolCallId: "b",
      toolName: "crawl_webpage",
      result: { error: "boom", errorCode: "timeout" },
      isError: true,
      durationMs: 10_000,
    });
    tracer.observe({ type: "subconversation_start", scope: "claim-1/round-1", purpose: "p" });
    tracer.observe({ type: "step", step: 1, maxSteps: 8, scope: "claim-1/round-1" });
    tracer.observe({ type: "step", step: 2, maxSteps: 5 });
    tracer.observe({ type: "done" });

    expect(tracer.snapshot()).toEqual({
      toolCalls: { web_search: 1, crawl_webpage: 1 },
      totalToolCalls: 2,
      failedToolCalls: 1,
      steps: 2,
      subconversationSteps: 1,
      subconversations: 1,
    });
  });

  it("formats an empty run", () => {
    expect(formatTally(new RunTracer().snapshot())).toBe(
      "no tools (0 total, 0 failed); 0 steps; 0 sub-conversations"
    );
  });
});
