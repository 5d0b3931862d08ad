// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/capabilities/math-engine`
 * Purpose: Factory for MathEngineCapability - bridges ai-tools capability interface to WolframAlphaAdapter.
 * Scope: Creates MathEngineCapability from server environment. Does not implement transport.
 * Invariants:
 *   - NO_SECRETS_IN_CONTEXT: WOLFRAM_ALPHA_APPID resolved from env, never passed to tools
 *   - Unconfigured → undefined; the container refuses presets that need it
 * Side-effects: none (factory only)
 * Links: Called by bootstrap container; consumed by ai-tools wolfram_query tool.
 * @internal
 */

import type { MathEngineCapability } from "@fathom/ai-tools";
import type { Logger } from "pino";

import { WolframAlphaAdapter } from "@/adapters/server";
import type { ServerEnv } from "@/shared/env";

export function createMathEngineCapability(
  env: ServerEnv,
  log: Logger
): MathEngineCapability | undefined {
  const appId = env.WOLFRAM_ALPHA_APPID;
  if (!appId) return undefined;

  return new WolframAlphaAdapter({
    appId,
    logger: log.child({ component: "WolframAlphaAdapter" }),
  });
}
