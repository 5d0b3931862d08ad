// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/reports/file-report-writer.adapter`
 * Purpose: Writes rendered markdown reports into a directory on disk.
 * Scope: Filesystem persistence only. Does not render documents.
 * Invariants:
 *   - File names are bare names; path separators are rejected
 *   - The directory is created on first write
 * Side-effects: IO (filesystem writes)
 * Links: src/ports/report-writer.port.ts
 * @internal
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { ReportWriteRequest, ReportWriterPort } from "@/ports";

export class FileReportWriter implements ReportWriterPort {
  constructor(private readonly directory: string) {}

  async write(request: ReportWriteRequest): Promise<string> {
    if (
      request.fileName.length === 0 ||
      path.basename(request.fileName) !== request.fileName
    ) {
      throw new Error(`Report file name must be a bare name: "${request.fileName}"`);
    }
    await mkdir(this.directory, { recursive: true });
    const target = path.resolve(this.directory, request.fileName);
    await writeFile(target, request.content, "utf8");
    return target;
  }
}
