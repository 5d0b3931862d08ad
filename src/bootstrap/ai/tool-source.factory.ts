// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/ai/tool-source.factory`
 * Purpose: Build a preset's tool source from capabilities, including the per-run claim validator.
 * Scope: Factory for tool source ports. Does NOT execute tools.
 * Invariants:
 *   - CONFIG_CHECKED_AT_BUILD: a preset whose tools lack a capability throws ConfigurationError here, before any run
 *   - PRESET_TOOLS_ONLY: the returned source exposes exactly preset.toolIds, in preset order
 *   - VALIDATOR_PER_RUN: validate_claims gets a validator bound to the run's emitter, so its
 *     sub-conversation events land on the run's stream
 * Side-effects: none
 * Links: container.ts, packages/ai-tools/src/catalog.ts, packages/research-graphs/src/validation/claim-validator.ts
 * @internal
 */

import {
  ConfigurationError,
  createStaticToolSource,
  type EmitAiEvent,
  type ToolSourcePort,
} from "@fathom/ai-core";
import {
  CRAWL_WEBPAGE_NAME,
  createResearchToolCatalog,
  type EncyclopediaCapability,
  type MathEngineCapability,
  type PageFetchCapability,
  VALIDATE_CLAIMS_NAME,
  type WebSearchCapability,
  WOLFRAM_QUERY_NAME,
} from "@fathom/ai-tools";
import {
  type ChatModelPort,
  createClaimValidator,
  createQueryRewriter,
  type LoggerPort,
  type ResearchPreset,
} from "@fathom/research-graphs";

export interface ResearchCapabilities {
  readonly webSearch: WebSearchCapability;
  readonly pageFetch: PageFetchCapability;
  readonly encyclopedia: EncyclopediaCapability;
  /** Absent when WOLFRAM_ALPHA_APPID is not configured */
  readonly mathEngine?: MathEngineCapability | undefined;
}

export interface ResearchToolLimits {
  readonly crawlTimeoutMs: number;
  readonly wolframTimeoutMs: number;
  readonly claimMaxRounds: number;
  readonly maxResultChars: number;
}

export interface ResearchToolsOptions {
  readonly preset: ResearchPreset;
  readonly capabilities: ResearchCapabilities;
  readonly chatModel: ChatModelPort;
  readonly limits: ResearchToolLimits;
  readonly logger?: LoggerPort;
}

export type ResearchToolsFactory = (emit: EmitAiEvent) => ToolSourcePort;

/**
 * @throws ConfigurationError if the preset needs a capability that is not configured
 */
export function createResearchToolsFactory(
  opts: ResearchToolsOptions
): ResearchToolsFactory {
  const { preset, capabilities, chatModel, limits } = opts;
  const needs = new Set(preset.toolIds);

  if (needs.has(WOLFRAM_QUERY_NAME) && !capabilities.mathEngine) {
    throw new ConfigurationError(
      `Preset "${preset.id}" needs Wolfram Alpha; set WOLFRAM_ALPHA_APPID`,
      { missing: ["WOLFRAM_ALPHA_APPID"] }
    );
  }

  const retrieval = createResearchToolCatalog({
    webSearch: capabilities.webSearch,
    pageFetch: capabilities.pageFetch,
    encyclopedia: capabilities.encyclopedia,
    ...(capabilities.mathEngine && { mathEngine: capabilities.mathEngine }),
    queryRewrite: createQueryRewriter(chatModel),
    timeouts: {
      [CRAWL_WEBPAGE_NAME]: limits.crawlTimeoutMs,
      [WOLFRAM_QUERY_NAME]: limits.wolframTimeoutMs,
    },
  });
  const retrievalTools = Object.values(retrieval);

  // Fail at build time rather than on the first run
  createStaticToolSource(retrievalTools).select(
    preset.toolIds.filter((id) => id !== VALIDATE_CLAIMS_NAME)
  );

  return (emit) => {
    if (!needs.has(VALIDATE_CLAIMS_NAME)) {
      return createStaticToolSource(retrievalTools).select(preset.toolIds);
    }

    const validator = createClaimValidator({
      model: chatModel,
      tools: createStaticToolSource(retrievalTools),
      emit,
      maxRounds: limits.claimMaxRounds,
      maxResultChars: limits.maxResultChars,
      ...(opts.logger && { logger: opts.logger }),
    });
    const validation = createResearchToolCatalog({ claimValidation: validator });
    return createStaticToolSource([
      ...retrievalTools,
      ...Object.values(validation),
    ]).select(preset.toolIds);
  };
}
