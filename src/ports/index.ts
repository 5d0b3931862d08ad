// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for app-level port interfaces.
 * Scope: Re-exports port interfaces. Tool capabilities live in @fathom/ai-tools, not here.
 * Invariants: Named exports only, no runtime coupling, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type {
  ReportWriteRequest,
  ReportWriterPort,
} from "./report-writer.port";
