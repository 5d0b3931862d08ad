// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging`
 * Purpose: Public API for structured logging.
 * Scope: Re-export logger factory, redaction paths and Logger type. Does not implement logging transport.
 * Invariants: none
 * Side-effects: none
 * Links: logger.ts, redact.ts
 * @public
 */

export type { Logger } from "./logger";
export { makeLogger } from "./logger";
export { REDACT_PATHS } from "./redact";
