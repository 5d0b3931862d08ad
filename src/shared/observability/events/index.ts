// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define full payload schemas.
 * Invariants: All event names registered here, including the ones emitted by packages through LoggerPort.
 * Side-effects: none
 * Notes: Use EVENT_NAMES.* constants when logging from the app.
 * Links: packages/research-graphs (runner, engine, validator), src/adapters/server
 * @public
 */

// ============================================================================
// Event Name Registry (as const)
// ============================================================================

export const EVENT_NAMES = {
  // Research runs (emitted by @fathom/research-graphs)
  RESEARCH_RUN_STARTED: "research.run_started",
  RESEARCH_RUN_COMPLETED: "research.run_completed",
  RESEARCH_RUN_FAILED: "research.run_failed",
  RESEARCH_TOOL_CALL: "research.tool_call",
  RESEARCH_BUDGET_EXCEEDED: "research.budget_exceeded",
  RESEARCH_MODEL_ERROR: "research.model_error",
  RESEARCH_ENGINE_ERROR: "research.engine_error",
  RESEARCH_ORPHAN_RESULTS_DROPPED: "research.orphan_results_dropped",
  RESEARCH_REPORT_FALLBACK: "research.report_fallback",
  RESEARCH_REPORT_NOTICE: "research.report_notice",
  RESEARCH_CLAIM_ROUND: "research.claim_round",
  RESEARCH_CLAIM_VALIDATED: "research.claim_validated",

  // Research runs (app level)
  RESEARCH_REPORT_WRITTEN: "research.report_written",
  RESEARCH_BASELINE_WRITTEN: "research.baseline_written",

  // Adapter Events
  ADAPTER_SEARXNG_ERROR: "adapter.searxng.error",
  ADAPTER_CRAWL_ERROR: "adapter.crawl.error",
  ADAPTER_WIKIPEDIA_ERROR: "adapter.wikipedia.error",
  ADAPTER_WOLFRAM_ERROR: "adapter.wolfram.error",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/** Low-cardinality failure reasons shared by adapter error logs */
export type AdapterReasonCode =
  | "http_error"
  | "timeout"
  | "aborted"
  | "network_error"
  | "parse_error";
