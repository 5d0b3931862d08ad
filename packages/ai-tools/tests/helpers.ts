// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tests/helpers`
 * Purpose: Shared fakes for tool tests.
 * Scope: In-memory capabilities and an execution context. Does not touch network.
 * Side-effects: none
 * @internal
 */

import type { ToolExecutionContext } from "../src/types";

export function makeCtx(signal?: AbortSignal): ToolExecutionContext {
  return {
    signal: signal ?? new AbortController().signal,
    toolCallId: "call_test",
  };
}
