// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/tests/runner/research-runner`
 * Purpose: Contract tests for the research runner's event stream and final result.
 * Scope: Real ai-tools contracts over fake capabilities; scripted models. No network.
 * Invariants:
 *   - ASSISTANT_FINAL_ONCE then DONE_LAST
 *   - SINGLE_QUEUE_PER_RUN: claim sub-conversation events arrive on the run's stream
 *   - RESULT_REFLECTS_OUTCOME: final.ok is false only when the run could not execute
 * Side-effects: none
 * Links: src/runner/research-runner.ts
 * @internal
 */

import {
  type AiEvent,
  ConfigurationError,
  createStaticToolSource,
} from "@fathom/ai-core";
import {
  createResearchToolCatalog,
  type MathEngineCapability,
} from "@fathom/ai-tools";
import { describe, expect, it } from "vitest";

import { MATH_RESEARCH_PROMPT } from "../../src/presets/prompts";
import { createQueryRewriter } from "../../src/rewrite/query-rewriter";
import {
  createResearchRunner,
  describeToolTarget,
} from "../../src/runner/research-runner";
import { createClaimValidator } from "../../src/validation/claim-validator";
import {
  captureLogger,
  collect,
  eventTypes,
  fakeTool,
  invoke,
  logEvents,
  ScriptedChatModel,
  scriptedModel,
  text,
  toolCall,
} from "../helpers/fakes";

describe("createResearchRunner", () => {
  it("answers a math question through rewrite and Wolfram Alpha", async () => {
    const rewriteModel = scriptedModel([text("solve 2x + 10 = 300 for x")]);
    const engineInputs: string[] = [];
    const mathEngine: MathEngineCapability = {
      query: async ({ input }) => {
        engineInputs.push(input);
        return {
          success: true,
          pods: [
            { title: "Input interpretation", plaintexts: ["solve 2 x + 10 = 300 for x"] },
            { title: "Solution", plaintexts: ["x = 145"] },
          ],
        };
      },
    };
    const catalog = createResearchToolCatalog({
      queryRewrite: createQueryRewriter(rewriteModel),
      mathEngine,
    });

    const agent = new ScriptedChatModel((conversation) => {
      const last = conversation.at(-1);
      if (last?.kind === "user_text") {
        return invoke(toolCall("rewrite_for_wolfram", { question: last.text }, "m1"));
      }
      const result = last?.kind === "tool_outcome" ? last.results[0] : undefined;
      if (result?.ok && result.toolName === "rewrite_for_wolfram") {
        return invoke(toolCall("wolfram_query", { query: result.value["query"] }, "m2"));
      }
      if (result?.ok && result.toolName === "wolfram_query") {
        return text(`## Solution\n\n${String(result.value["text"])}`);
      }
      return text("unexpected turn");
    });

    const { stream, final } = createResearchRunner({
      model: agent,
      createTools: () => createStaticToolSource(Object.values(catalog)),
      request: {
        query: "What is X in 2x + 10 = 300",
        systemPrompt: MATH_RESEARCH_PROMPT,
        maxSteps: 6,
      },
    });
    const events = await collect(stream);
    const result = await final;

    const body =
      "## Solution\n\nInput interpretation: solve 2 x + 10 = 300 for x\nSolution: x = 145";
    expect(engineInputs).toEqual(["solve 2x + 10 = 300 for x"]);
    expect(rewriteModel.calls[0]?.toolNames).toEqual([]);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.termination).toBe("final_answer");
    expect(result.report.body).toBe(body);
    expect(result.report.body).toContain("x = 145");
    expect(result.tally).toEqual({
      toolCalls: { rewrite_for_wolfram: 1, wolfram_query: 1 },
      totalToolCalls: 2,
      failedToolCalls: 0,
      steps: 3,
      subconversationSteps: 0,
      subconversations: 0,
    });
    expect(events.slice(-2)).toEqual([
      { type: "assistant_final", content: body },
      { type: "done" },
    ]);
  });

  it("streams claim sub-conversation events on the same queue", async () => {
    const checker = new ScriptedChatModel(() =>
      text(
        [
          "CLAIM: The sky is blue",
          "SUPPORTING:",
          "- Rayleigh scattering (https://example.org/sky)",
          "CONFIDENCE: HIGH",
          "VERDICT: CONFIRMED",
        ].join("\n")
      )
    );
    const agent = scriptedModel([
      invoke(toolCall("validate_claims", { claims: ["The sky is blue"] }, "v1")),
      text("The sky is blue (HIGH confidence)."),
    ]);
    const base = [
      fakeTool("web_search", async () => ({ results: [] })),
      fakeTool("crawl_webpage", async () => ({ content: "" })),
    ];

    const { stream, final } = createResearchRunner({
      model: agent,
      createTools: (emit) => {
        const validator = createClaimValidator({
          model: checker,
          tools: createStaticToolSource(base),
          emit,
        });
        const catalog = createResearchToolCatalog({ claimValidation: validator });
        return createStaticToolSource([...base, ...Object.values(catalog)]);
      },
      request: { query: "Why is the sky blue?", systemPrompt: "validate", maxSteps: 4 },
    });
    const events = await collect(stream);
    const result = await final;

    expect(events).toContainEqual({
      type: "subconversation_start",
      scope: "claim-1/round-1",
      purpose: "validate claim 1",
    });
    expect(events).toContainEqual({
      type: "step",
      step: 1,
      maxSteps: 8,
      scope: "claim-1/round-1",
    });
    expect(result.ok && result.tally).toEqual({
      toolCalls: { validate_claims: 1 },
      totalToolCalls: 1,
      failedToolCalls: 0,
      steps: 2,
      subconversationSteps: 1,
      subconversations: 1,
    });
  });

  it("logs every tool call and a summary when the run completes", async () => {
    const { logger, logs } = captureLogger();
    const observed: AiEvent[] = [];
    const { stream, final } = createResearchRunner({
      model: scriptedModel([
        invoke(toolCall("web_search", { query: "tides" }, "s1")),
        text("Tides follow the moon."),
      ]),
      createTools: () =>
        createStaticToolSource([fakeTool("web_search", async () => ({ results: [] }))]),
      request: { query: "tides", systemPrompt: "s", maxSteps: 3, runId: "run-1" },
      logger,
      observe: (e) => observed.push(e),
    });
    const events = await collect(stream);
    await final;

    expect(observed).toEqual(events);
    expect(logEvents(logs)).toEqual([
      "research.run_started",
      "research.tool_call",
      "research.report_fallback",
      "research.run_completed",
    ]);
    expect(logs[1]?.obj).toEqual({
      event: "research.tool_call",
      tool: "web_search",
      target: "tides",
    });
    expect(logs[3]?.msg).toBe(
      "web_search=1 (1 total, 0 failed); 2 steps; 0 sub-conversations"
    );
  });

  it("emits error then done when the run cannot start", async () => {
    const { stream, final } = createResearchRunner({
      model: scriptedModel([]),
      createTools: () => {
        throw new ConfigurationError("WOLFRAM_ALPHA_APPID is not set", {
          missing: ["WOLFRAM_ALPHA_APPID"],
        });
      },
      request: { query: "q", systemPrompt: "s", maxSteps: 2 },
    });
    const events = await collect(stream);
    const result = await final;

    expect(events).toEqual([
      { type: "error", error: "configuration_error" },
      { type: "done" },
    ]);
    expect(result).toMatchObject({
      ok: false,
      error: "configuration_error",
      errorMessage: "ConfigurationError: WOLFRAM_ALPHA_APPID is not set",
    });
  });

  it("still emits assistant_final and done after a budget overrun", async () => {
    let n = 0;
    const { stream, final } = createResearchRunner({
      model: new ScriptedChatModel(() => {
        n += 1;
        return invoke(toolCall("web_search", { query: `again ${n}` }, `b${n}`));
      }),
      createTools: () =>
        createStaticToolSource([fakeTool("web_search", async () => ({ results: [] }))]),
      request: { query: "q", systemPrompt: "s", maxSteps: 2 },
    });
    const events = await collect(stream);
    const result = await final;

    expect(eventTypes(events).slice(-3)).toEqual(["error", "assistant_final", "done"]);
    expect(result.ok && result.termination).toBe("budget_exceeded");
  });
});

describe("describeToolTarget", () => {
  it("picks the first descriptive argument", () => {
    expect(describeToolTarget({ url: "https://example.org", maxChars: 10 })).toBe(
      "https://example.org"
    );
    expect(describeToolTarget({ pageTitle: "Moon", sectionTitle: "Orbit" })).toBe("Moon");
    expect(describeToolTarget({ claims: ["a", "b"] })).toBe("2 claim(s)");
    expect(describeToolTarget({ other: 1 })).toBeUndefined();
  });
});
