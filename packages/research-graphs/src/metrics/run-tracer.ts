// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/metrics/run-tracer`
 * Purpose: Passive per-run tally of AiEvents (tool calls per tool, steps, sub-conversations).
 * Scope: In-memory counters for one run. Process-wide Prometheus metrics live in the app (src/shared/observability).
 * Invariants:
 *   - PASSIVE: observe() never alters or drops events
 *   - ONE_COUNT_PER_CALL: a tool call is counted on its tool_call_result, which every dispatch emits exactly once
 *   - ROOT_STEPS_ONLY: `steps` counts the root conversation; sub-conversation steps are counted apart
 * Side-effects: none
 * Links: runner/research-runner.ts
 * @public
 */

import type { AiEvent } from "@fathom/ai-core";

export interface RunTally {
  readonly toolCalls: Readonly<Record<string, number>>;
  readonly totalToolCalls: number;
  readonly failedToolCalls: number;
  readonly steps: number;
  readonly subconversationSteps: number;
  readonly subconversations: number;
}

export class RunTracer {
  private readonly perTool = new Map<string, number>();
  private failed = 0;
  private steps = 0;
  private subSteps = 0;
  private subconversations = 0;

  observe(event: AiEvent): void {
    switch (event.type) {
      case "tool_call_result":
        this.perTool.set(event.toolName, (this.perTool.get(event.toolName) ?? 0) + 1);
        if (event.isError) this.failed += 1;
        return;
      case "step":
        if (event.scope === undefined) this.steps += 1;
        else this.subSteps += 1;
        return;
      case "subconversation_start":
        this.subconversations += 1;
        return;
      default:
        return;
    }
  }

  snapshot(): RunTally {
    let total = 0;
    const toolCalls: Record<string, number> = {};
    for (const [name, count] of this.perTool) {
      toolCalls[name] = count;
      total += count;
    }
    return {
      toolCalls,
      totalToolCalls: total,
      failedToolCalls: this.failed,
      steps: this.steps,
      subconversationSteps: this.subSteps,
      subconversations: this.subconversations,
    };
  }
}

/**
 * One-line summary, tools in first-seen order: "web_search=2, crawl_webpage=1 (3 total, 0 failed); 4 steps; 0 sub-conversations"
 */
export function formatTally(tally: RunTally): string {
  const tools = Object.entries(tally.toolCalls)
    .map(([name, count]) => `${name}=${count}`)
    .join(", ");
  return [
    `${tools || "no tools"} (${tally.totalToolCalls} total, ${tally.failedToolCalls} failed)`,
    `${tally.steps} steps`,
    `${tally.subconversations} sub-conversations`,
  ].join("; ");
}
