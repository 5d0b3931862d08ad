// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - event names, logging, metrics.
 * Scope: Unified entry point for observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports.
 * Side-effects: none
 * Links: events/, logging/, metrics/
 * @public
 */

export type { AdapterReasonCode, EventName } from "./events";
export { EVENT_NAMES } from "./events";
export type { Logger } from "./logging";
export { makeLogger, REDACT_PATHS } from "./logging";
export {
  metricsRegistry,
  observeResearchEvent,
  researchModelStepsTotal,
  researchRunErrorsTotal,
  researchSubconversationsTotal,
  researchToolCallDurationMs,
  researchToolCallsTotal,
} from "./metrics/research-metrics";
