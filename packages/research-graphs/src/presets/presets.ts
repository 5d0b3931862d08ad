// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/presets/presets`
 * Purpose: Named research configurations: system prompt, tool ids, report title and output files.
 * Scope: Static registry. Does NOT build tools or models.
 * Invariants:
 *   - PRESET_IDS_CLOSED: ResearchPresetId is a closed union
 *   - TOOL_IDS_REGISTERED: every toolId names a tool exported by @fathom/ai-tools
 * Side-effects: none
 * Links: prompts.ts, runner/research-runner.ts
 * @public
 */

import {
  CRAWL_WEBPAGE_NAME,
  REWRITE_FOR_WOLFRAM_NAME,
  VALIDATE_CLAIMS_NAME,
  WEB_SEARCH_NAME,
  WIKIPEDIA_GET_SECTION_NAME,
  WIKIPEDIA_SEARCH_NAME,
  WOLFRAM_QUERY_NAME,
} from "@fathom/ai-tools";

import {
  MATH_RESEARCH_PROMPT,
  VALIDATED_RESEARCH_PROMPT,
  WEB_RESEARCH_PROMPT,
  WIKIPEDIA_RESEARCH_PROMPT,
} from "./prompts";

export const RESEARCH_PRESET_IDS = ["web", "validated", "wikipedia", "math"] as const;
export type ResearchPresetId = (typeof RESEARCH_PRESET_IDS)[number];

export interface ResearchPreset {
  readonly id: ResearchPresetId;
  readonly description: string;
  readonly systemPrompt: string;
  readonly toolIds: readonly string[];
  /** Heading of the persisted report */
  readonly reportTitle: string;
  readonly outputFile: string;
  /** Label before the query line in persisted files ("Query" or "Question") */
  readonly queryLabel: string;
  readonly baselineTitle: string;
  readonly baselineFile: string;
}

export const RESEARCH_PRESETS: Readonly<Record<ResearchPresetId, ResearchPreset>> = {
  web: {
    id: "web",
    description: "Web search and page crawling with a concise sourced answer",
    systemPrompt: WEB_RESEARCH_PROMPT,
    toolIds: [WEB_SEARCH_NAME, CRAWL_WEBPAGE_NAME],
    reportTitle: "Web Search Report",
    outputFile: "agent_web_search_report.md",
    queryLabel: "Query",
    baselineTitle: "Direct LLM Response (No Web Search)",
    baselineFile: "direct_llm_response.md",
  },
  validated: {
    id: "validated",
    description: "Web research whose claims are fact-checked before reporting",
    systemPrompt: VALIDATED_RESEARCH_PROMPT,
    toolIds: [WEB_SEARCH_NAME, CRAWL_WEBPAGE_NAME, VALIDATE_CLAIMS_NAME],
    reportTitle: "Validated Search Report",
    outputFile: "validated_search_report.md",
    queryLabel: "Query",
    baselineTitle: "Unvalidated LLM Response (No Web Search, No Fact-Checking)",
    baselineFile: "unvalidated_llm_response.md",
  },
  wikipedia: {
    id: "wikipedia",
    description: "Encyclopedia research written up as a structured markdown report",
    systemPrompt: WIKIPEDIA_RESEARCH_PROMPT,
    toolIds: [WIKIPEDIA_SEARCH_NAME, WIKIPEDIA_GET_SECTION_NAME],
    reportTitle: "Wikipedia Research Report",
    outputFile: "research_report.md",
    queryLabel: "Query",
    baselineTitle: "Direct LLM Response (No Wikipedia)",
    baselineFile: "direct_llm_wikipedia_response.md",
  },
  math: {
    id: "math",
    description: "Math questions rewritten for and answered by Wolfram Alpha",
    systemPrompt: MATH_RESEARCH_PROMPT,
    toolIds: [REWRITE_FOR_WOLFRAM_NAME, WOLFRAM_QUERY_NAME],
    reportTitle: "Wolfram Alpha Agent Response",
    outputFile: "wolfram_agent_response.md",
    queryLabel: "Question",
    baselineTitle: "Direct LLM Response (No Wolfram Alpha)",
    baselineFile: "direct_llm_wolfram_response.md",
  },
};

export function isResearchPresetId(value: string): value is ResearchPresetId {
  return RESEARCH_PRESET_IDS.some((id) => id === value);
}

export function getResearchPreset(id: ResearchPresetId): ResearchPreset {
  return RESEARCH_PRESETS[id];
}

/**
 * Markdown file body for a persisted report or baseline answer.
 */
export function renderReportDocument(
  title: string,
  queryLabel: string,
  query: string,
  body: string
): string {
  return `# ${title}\n\n**${queryLabel}:** ${query}\n\n${body}`;
}
