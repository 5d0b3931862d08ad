// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/tooling/sources/static.source`
 * Purpose: Static tool source over a fixed set of bound tools.
 * Scope: Implements ToolSourcePort for the research tool registry. Does NOT import Zod or modify tools.
 * Invariants:
 *   - TOOL_ID_STABILITY: Duplicate ids throw at construction; no mutations after
 *   - SELECT_ORDER: select() returns tools in the order the ids were requested
 * Side-effects: none
 * Links: ../ports/tool-source.port.ts
 * @public
 */

import type { ToolSourcePort } from "../ports/tool-source.port";
import type { BoundToolRuntime, ToolSpec } from "../types";

export class StaticToolSource implements ToolSourcePort {
  private readonly toolMap: ReadonlyMap<string, BoundToolRuntime>;
  private readonly specs: readonly ToolSpec[];

  constructor(tools: ReadonlyMap<string, BoundToolRuntime>) {
    this.toolMap = tools;
    this.specs = Array.from(tools.values()).map((t) => t.spec);
  }

  getBoundTool(toolId: string): BoundToolRuntime | undefined {
    return this.toolMap.get(toolId);
  }

  listToolSpecs(): readonly ToolSpec[] {
    return this.specs;
  }

  /**
   * Narrow this source to the given ids (e.g., the fact checker's search + crawl).
   * @throws If an id is not registered
   */
  select(toolIds: readonly string[]): StaticToolSource {
    return createStaticToolSource(
      toolIds.map((id) => {
        const tool = this.toolMap.get(id);
        if (!tool) {
          throw new Error(`Tool "${id}" is not registered in this source`);
        }
        return tool;
      })
    );
  }
}

/**
 * @throws If duplicate tool IDs are detected (per TOOL_ID_STABILITY)
 */
export function createStaticToolSource(
  tools: readonly BoundToolRuntime[]
): StaticToolSource {
  const map = new Map<string, BoundToolRuntime>();

  for (const tool of tools) {
    if (map.has(tool.id)) {
      throw new Error(
        `TOOL_ID_STABILITY violation: Duplicate tool ID "${tool.id}". ` +
          "Tool IDs must be unique within a source."
      );
    }
    map.set(tool.id, tool);
  }

  return new StaticToolSource(map);
}
