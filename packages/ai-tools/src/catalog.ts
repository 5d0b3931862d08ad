// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/catalog`
 * Purpose: Registry of research tools, built from whichever capabilities are configured.
 * Scope: Exports createToolCatalog and createResearchToolCatalog. Does NOT import @langchain.
 * Invariants:
 *   - TOOL_ID_STABILITY: Duplicate IDs throw at construction time
 *   - CAPABILITY_GATED: A tool is registered only when its capability is provided
 * Side-effects: none
 * Links: runtime-adapter.ts, tools/*
 * @public
 */

import type { BoundToolRuntime } from "@fathom/ai-core";

import type { ClaimValidationCapability } from "./capabilities/claim-validation";
import type { EncyclopediaCapability } from "./capabilities/encyclopedia";
import type { MathEngineCapability } from "./capabilities/math-engine";
import type { PageFetchCapability } from "./capabilities/page-fetch";
import type { QueryRewriteCapability } from "./capabilities/query-rewrite";
import type { WebSearchCapability } from "./capabilities/web-search";
import { toBoundToolRuntime } from "./runtime-adapter";
import { createCrawlWebpageTool } from "./tools/crawl-webpage";
import { createRewriteForWolframTool } from "./tools/rewrite-for-wolfram";
import { createValidateClaimsTool } from "./tools/validate-claims";
import { createWebSearchTool } from "./tools/web-search";
import { createWikipediaGetSectionTool } from "./tools/wikipedia-get-section";
import { createWikipediaSearchTool } from "./tools/wikipedia-search";
import { createWolframQueryTool } from "./tools/wolfram-query";

/**
 * Tool catalog type. Maps tool ID → runtime.
 */
export type ToolCatalog = Readonly<Record<string, BoundToolRuntime>>;

/**
 * Create a frozen catalog from runtimes.
 * @throws Error if duplicate tool IDs are detected
 */
export function createToolCatalog(
  tools: readonly BoundToolRuntime[]
): ToolCatalog {
  const catalog: Record<string, BoundToolRuntime> = {};

  for (const tool of tools) {
    if (tool.id in catalog) {
      throw new Error(
        `TOOL_ID_STABILITY violation: Duplicate tool ID "${tool.id}" in catalog.`
      );
    }
    catalog[tool.id] = tool;
  }

  return Object.freeze(catalog);
}

export interface ResearchToolDeps {
  readonly webSearch?: WebSearchCapability;
  readonly pageFetch?: PageFetchCapability;
  readonly encyclopedia?: EncyclopediaCapability;
  readonly mathEngine?: MathEngineCapability;
  readonly queryRewrite?: QueryRewriteCapability;
  readonly claimValidation?: ClaimValidationCapability;
  /** Deadline overrides keyed by tool id */
  readonly timeouts?: Readonly<Record<string, number>>;
}

/**
 * Build the research catalog from the capabilities at hand.
 */
export function createResearchToolCatalog(deps: ResearchToolDeps): ToolCatalog {
  const timeoutFor = (id: string) => {
    const timeoutMs = deps.timeouts?.[id];
    return timeoutMs !== undefined ? { timeoutMs } : undefined;
  };
  const runtimes: BoundToolRuntime[] = [];

  if (deps.webSearch) {
    const tool = createWebSearchTool({ webSearch: deps.webSearch });
    runtimes.push(toBoundToolRuntime(tool, timeoutFor(tool.contract.name)));
  }
  if (deps.pageFetch) {
    const tool = createCrawlWebpageTool({ pageFetch: deps.pageFetch });
    runtimes.push(toBoundToolRuntime(tool, timeoutFor(tool.contract.name)));
  }
  if (deps.encyclopedia) {
    const search = createWikipediaSearchTool({ encyclopedia: deps.encyclopedia });
    const section = createWikipediaGetSectionTool({
      encyclopedia: deps.encyclopedia,
    });
    runtimes.push(toBoundToolRuntime(search, timeoutFor(search.contract.name)));
    runtimes.push(
      toBoundToolRuntime(section, timeoutFor(section.contract.name))
    );
  }
  if (deps.queryRewrite) {
    const tool = createRewriteForWolframTool({ queryRewrite: deps.queryRewrite });
    runtimes.push(toBoundToolRuntime(tool, timeoutFor(tool.contract.name)));
  }
  if (deps.mathEngine) {
    const tool = createWolframQueryTool({ mathEngine: deps.mathEngine });
    runtimes.push(toBoundToolRuntime(tool, timeoutFor(tool.contract.name)));
  }
  if (deps.claimValidation) {
    const tool = createValidateClaimsTool({
      claimValidation: deps.claimValidation,
    });
    runtimes.push(toBoundToolRuntime(tool, timeoutFor(tool.contract.name)));
  }

  return createToolCatalog(runtimes);
}
