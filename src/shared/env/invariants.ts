// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/invariants`
 * Purpose: Cross-field env invariants that the Zod schema can't express cleanly.
 * Scope: Provider-selection checks run after schema validation. Does NOT check preset requirements.
 * Invariants: Throws ConfigurationError naming every missing key at once.
 * Side-effects: none
 * Links: src/shared/env/server.ts
 * @public
 */

import { ConfigurationError } from "@fathom/ai-core";

/**
 * Minimal shape for invariant validation.
 * Kept inline to avoid circular imports with server.ts
 */
interface ParsedEnv {
  LLM_PROVIDER: "openai_compatible" | "azure_openai";
  AZURE_OPENAI_API_KEY?: string | undefined;
  AZURE_OPENAI_ENDPOINT?: string | undefined;
}

export function assertEnvInvariants(env: ParsedEnv): void {
  if (env.LLM_PROVIDER !== "azure_openai") return;

  const missing: string[] = [];
  if (!env.AZURE_OPENAI_API_KEY) missing.push("AZURE_OPENAI_API_KEY");
  if (!env.AZURE_OPENAI_ENDPOINT) missing.push("AZURE_OPENAI_ENDPOINT");

  if (missing.length > 0) {
    throw new ConfigurationError(
      `LLM_PROVIDER=azure_openai requires ${missing.join(" and ")}`,
      { missing }
    );
  }
}
