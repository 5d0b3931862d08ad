// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/report-writer.port`
 * Purpose: Persistence boundary for finished research reports.
 * Scope: Interface only. Rendering happens before the port (renderReportDocument).
 * Invariants: Content is written as UTF-8 and replaces any existing file of the same name.
 * Side-effects: none (interface only)
 * Links: src/adapters/server/reports/file-report-writer.adapter.ts
 * @public
 */

export interface ReportWriteRequest {
  /** Bare file name, e.g. "validated_search_report.md" */
  readonly fileName: string;
  readonly content: string;
}

export interface ReportWriterPort {
  /** @returns The location the report was written to */
  write(request: ReportWriteRequest): Promise<string>;
}
