// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Pino redaction paths for provider credentials.
 * Scope: Path list only; pino applies it. Tool arguments and URLs stay visible.
 * Invariants: Covers every credential ServerEnv carries, at top level and one level down.
 * Side-effects: none
 * Links: logger.ts, src/shared/env/server.ts
 * @public
 */

const CREDENTIAL_KEYS = [
  "apiKey",
  "api_key",
  "appid",
  "appId",
  "LLM_API_KEY",
  "AZURE_OPENAI_API_KEY",
  "WOLFRAM_ALPHA_APPID",
] as const;

export const REDACT_PATHS: string[] = [
  ...CREDENTIAL_KEYS,
  ...CREDENTIAL_KEYS.map((key) => `*.${key}`),
  "headers.authorization",
  "headers['api-key']",
];
