// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/tooling/ports/tool-source.port`
 * Purpose: Port interface for tool sources (the tool registry seen by the runner).
 * Scope: Defines ToolSourcePort for tool lookup and spec listing. Does NOT import Zod or execute tools.
 * Invariants:
 *   - TOOL_SOURCE_RETURNS_BOUND_TOOL: getBoundTool returns executable BoundToolRuntime
 *   - UNKNOWN_IS_UNDEFINED: an unresolvable id returns undefined; the runner turns it into an unknown_tool Failure
 * Side-effects: none (types only)
 * Links: sources/static.source.ts, tool-runner.ts
 * @public
 */

import type { BoundToolRuntime, ToolSpec } from "../types";

export interface ToolSourcePort {
  getBoundTool(toolId: string): BoundToolRuntime | undefined;

  /** Specs sent to the model for this source, in registration order */
  listToolSpecs(): readonly ToolSpec[];
}
