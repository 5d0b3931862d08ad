// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/tooling/tool-failure`
 * Purpose: Typed error thrown by tool implementations and capability adapters to pick a Failure kind.
 * Scope: Error class + guard. Does not catch anything itself (tool-runner converts it to a ToolResult).
 * Invariants:
 *   - FAILURE_NEVER_ESCAPES_RUNNER: tool-runner maps every ToolFailure to {ok:false, errorCode}
 *   - details are model-visible; never put secrets in them
 * Side-effects: none
 * Links: tool-runner.ts, types.ts (ToolErrorCode)
 * @public
 */

import type { ToolErrorCode } from "./types";

export class ToolFailure extends Error {
  readonly errorCode: ToolErrorCode;
  readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    errorCode: ToolErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>
  ) {
    super(message);
    this.name = "ToolFailure";
    this.errorCode = errorCode;
    this.details = details;
  }
}

export function isToolFailure(error: unknown): error is ToolFailure {
  return error instanceof ToolFailure;
}
