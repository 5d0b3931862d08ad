// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/capabilities/web-search`
 * Purpose: Factories for the retrieval capabilities (web search, page fetch, encyclopedia) from server env.
 * Scope: Creates capability objects around server adapters. Does not implement transport.
 * Invariants:
 *   - NO_SECRETS_IN_CONTEXT: provider settings resolved from env, never passed to tools
 * Side-effects: none (factory only)
 * Links: Called by bootstrap container; consumed by ai-tools search, crawl and Wikipedia tools.
 * @internal
 */

import type {
  EncyclopediaCapability,
  PageFetchCapability,
  WebSearchCapability,
} from "@fathom/ai-tools";
import type { Logger } from "pino";

import {
  HttpPageFetchAdapter,
  SearxngWebSearchAdapter,
  WikipediaAdapter,
} from "@/adapters/server";
import type { ServerEnv } from "@/shared/env";

export function createWebSearchCapability(
  env: ServerEnv,
  log: Logger
): WebSearchCapability {
  return new SearxngWebSearchAdapter({
    baseUrl: env.SEARXNG_URL,
    userAgent: env.RESEARCH_USER_AGENT,
    logger: log.child({ component: "SearxngWebSearchAdapter" }),
  });
}

export function createPageFetchCapability(log: Logger): PageFetchCapability {
  return new HttpPageFetchAdapter({
    logger: log.child({ component: "HttpPageFetchAdapter" }),
  });
}

export function createEncyclopediaCapability(
  env: ServerEnv,
  log: Logger
): EncyclopediaCapability {
  return new WikipediaAdapter({
    language: env.WIKIPEDIA_LANGUAGE,
    userAgent: env.RESEARCH_USER_AGENT,
    logger: log.child({ component: "WikipediaAdapter" }),
  });
}
