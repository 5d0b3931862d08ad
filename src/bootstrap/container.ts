// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Composition root - wires server adapters to capability and port interfaces for research runs.
 * Scope: Builds the chat model, retrieval capabilities, report writer and per-preset tool factories. Does not run research.
 * Invariants:
 *   - Single container instance per process (getContainer); createContainer for explicit env/overrides
 *   - CONFIG_CHECKED_AT_BUILD: researchToolsFor() throws ConfigurationError before any run starts
 * Side-effects: IO (initializes logger and emits startup log on creation)
 * Links: tool-source.factory.ts, chat-model.factory.ts, src/features/research/run-research.ts
 * @public
 */

import type { ChatModelPort, ResearchPreset } from "@fathom/research-graphs";
import type { Logger } from "pino";

import { FileReportWriter } from "@/adapters/server";
import {
  createChatModel,
  describeChatModel,
} from "@/bootstrap/ai/chat-model.factory";
import {
  createResearchToolsFactory,
  type ResearchCapabilities,
  type ResearchToolsFactory,
} from "@/bootstrap/ai/tool-source.factory";
import { createMathEngineCapability } from "@/bootstrap/capabilities/math-engine";
import {
  createEncyclopediaCapability,
  createPageFetchCapability,
  createWebSearchCapability,
} from "@/bootstrap/capabilities/web-search";
import type { ReportWriterPort } from "@/ports";
import { type ServerEnv, serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export interface Container {
  log: Logger;
  env: ServerEnv;
  chatModel: ChatModelPort;
  capabilities: ResearchCapabilities;
  /** Writer for `directory`, or REPORT_OUTPUT_DIR when omitted */
  reportWriterFor(directory?: string): ReportWriterPort;
  /** @throws ConfigurationError when the preset needs an unconfigured provider */
  researchToolsFor(preset: ResearchPreset): ResearchToolsFactory;
}

/** Test seams: replace providers without touching env */
export interface ContainerOverrides {
  log?: Logger;
  chatModel?: ChatModelPort;
  capabilities?: ResearchCapabilities;
  reportWriterFor?: (directory: string) => ReportWriterPort;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer(serverEnv());
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

export function createContainer(
  env: ServerEnv,
  overrides: ContainerOverrides = {}
): Container {
  const log = overrides.log ?? makeLogger({ service: env.SERVICE_NAME });

  // Startup log - confirm config (no URLs with credentials, no secrets)
  log.info(
    {
      model: describeChatModel(env),
      logLevel: env.PINO_LOG_LEVEL,
      wolfram: env.WOLFRAM_ALPHA_APPID ? "configured" : "missing",
    },
    "container initialized"
  );

  const chatModel = overrides.chatModel ?? createChatModel(env);
  const capabilities: ResearchCapabilities = overrides.capabilities ?? {
    webSearch: createWebSearchCapability(env, log),
    pageFetch: createPageFetchCapability(log),
    encyclopedia: createEncyclopediaCapability(env, log),
    mathEngine: createMathEngineCapability(env, log),
  };
  const makeWriter =
    overrides.reportWriterFor ??
    ((directory: string) => new FileReportWriter(directory));

  return {
    log,
    env,
    chatModel,
    capabilities,
    reportWriterFor: (directory) => makeWriter(directory ?? env.REPORT_OUTPUT_DIR),
    researchToolsFor: (preset) =>
      createResearchToolsFactory({
        preset,
        capabilities,
        chatModel,
        logger: log,
        limits: {
          crawlTimeoutMs: env.CRAWL_TIMEOUT_MS,
          wolframTimeoutMs: env.WOLFRAM_TIMEOUT_MS,
          claimMaxRounds: env.CLAIM_MAX_ROUNDS,
          maxResultChars: env.TOOL_RESULT_MAX_CHARS,
        },
      }),
  };
}
