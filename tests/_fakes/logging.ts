// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/logging`
 * Purpose: Pino logger that records parsed JSON lines in memory.
 * Scope: Test helper for asserting structured log fields.
 * Side-effects: none
 * Links: src/shared/observability/logging/logger.ts
 * @public
 */

import pino, { type Logger } from "pino";

export interface CapturedLogs {
  logger: Logger;
  lines: Array<Record<string, unknown>>;
}

export function captureLogs(): CapturedLogs {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "debug" },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    }
  );
  return { logger, lines };
}

/** `event` field of each captured line, in order */
export function loggedEvents(lines: ReadonlyArray<Record<string, unknown>>): unknown[] {
  return lines.map((line) => line["event"]);
}
