// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/metrics/research-metrics`
 * Purpose: Prometheus registry and research counters fed by a passive AiEvent observer.
 * Scope: Process-wide counters and the observer that updates them. Does not expose a scrape endpoint.
 * Invariants:
 *   - Labels are low-cardinality: tool name, outcome, error code, conversation kind
 *   - OBSERVER_IS_PASSIVE: observeResearchEvent never throws and never changes the run
 * Side-effects: global (module-scoped registry)
 * Notes: The per-run tally lives in @fathom/research-graphs (RunTracer); these are process totals.
 * Links: src/features/research/run-research.ts, scripts/research.ts
 * @public
 */

import type { AiEvent } from "@fathom/ai-core";
import client from "prom-client";

export const metricsRegistry = new client.Registry();
metricsRegistry.setDefaultLabels({ app: "fathom" });

// =============================================================================
// Research Metrics
// =============================================================================

export const researchToolCallsTotal = new client.Counter({
  name: "research_tool_calls_total",
  help: "Tool calls completed by research runs",
  labelNames: ["tool", "outcome"] as const,
  registers: [metricsRegistry],
});

export const researchToolCallDurationMs = new client.Histogram({
  name: "research_tool_call_duration_ms",
  help: "Tool call duration in milliseconds",
  labelNames: ["tool"] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
  registers: [metricsRegistry],
});

export const researchModelStepsTotal = new client.Counter({
  name: "research_model_steps_total",
  help: "Model calls made by research conversations",
  labelNames: ["conversation"] as const,
  registers: [metricsRegistry],
});

export const researchSubconversationsTotal = new client.Counter({
  name: "research_subconversations_total",
  help: "Claim-validation sub-conversations started",
  registers: [metricsRegistry],
});

export const researchRunErrorsTotal = new client.Counter({
  name: "research_run_errors_total",
  help: "Run-level errors by code",
  labelNames: ["code"] as const,
  registers: [metricsRegistry],
});

// =============================================================================
// Observer
// =============================================================================

function conversationKind(scope: string | undefined): "root" | "claim" {
  return scope === undefined ? "root" : "claim";
}

export function observeResearchEvent(event: AiEvent): void {
  switch (event.type) {
    case "tool_call_result":
      researchToolCallsTotal.inc({
        tool: event.toolName,
        outcome: event.isError ? "failure" : "success",
      });
      researchToolCallDurationMs.observe(
        { tool: event.toolName },
        event.durationMs
      );
      return;
    case "step":
      researchModelStepsTotal.inc({
        conversation: conversationKind(event.scope),
      });
      return;
    case "subconversation_start":
      researchSubconversationsTotal.inc();
      return;
    case "error":
      researchRunErrorsTotal.inc({ code: event.error });
      return;
    default:
      return;
  }
}
