// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment validation and type-safe research configuration using Zod.
 * Scope: Validates process.env for the research runtime; provides lazy cached access. Does not pick presets or build adapters.
 * Invariants: All variables validated on first access; fails fast with ConfigurationError listing missing/invalid keys.
 * Side-effects: process.env
 * Notes: LLM_* for the OpenAI-compatible endpoint (LM Studio defaults); AZURE_* when LLM_PROVIDER=azure_openai.
 *        Preset-specific requirements (e.g. WOLFRAM_ALPHA_APPID) are checked by the container, not here.
 * Links: invariants.ts, src/bootstrap/container.ts
 * @public
 */

import { ConfigurationError } from "@fathom/ai-core";
import { ZodError, z } from "zod";

import { assertEnvInvariants } from "./invariants";

const positiveInt = z.coerce.number().int().positive();

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Service identity for log lines
  SERVICE_NAME: z.string().default("fathom"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // Chat model. Defaults point at a local LM Studio server.
  LLM_PROVIDER: z
    .enum(["openai_compatible", "azure_openai"])
    .default("openai_compatible"),
  LLM_BASE_URL: z.string().url().default("http://localhost:1234/v1"),
  LLM_API_KEY: z.string().min(1).default("not-needed"),
  LLM_MODEL: z.string().min(1).default("qwen2.5-14b-instruct"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),

  AZURE_OPENAI_API_KEY: z.string().min(1).optional(),
  AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
  AZURE_OPENAI_DEPLOYMENT_NAME: z.string().min(1).default("gpt-4o"),
  AZURE_OPENAI_API_VERSION: z.string().min(1).default("2024-08-01-preview"),

  // Retrieval providers
  SEARXNG_URL: z.string().url().default("http://localhost:8080"),
  WIKIPEDIA_LANGUAGE: z
    .string()
    .regex(/^[a-z]{2,3}(-[a-z]+)?$/)
    .default("en"),
  RESEARCH_USER_AGENT: z.string().min(1).default("Fathom-Research-Bot/1.0"),
  WOLFRAM_ALPHA_APPID: z.string().min(1).optional(),

  // Run limits
  CRAWL_TIMEOUT_MS: positiveInt.default(10_000),
  WOLFRAM_TIMEOUT_MS: positiveInt.default(30_000),
  RESEARCH_MAX_STEPS: positiveInt.default(25),
  CLAIM_MAX_ROUNDS: positiveInt.default(3),
  TOOL_RESULT_MAX_CHARS: positiveInt.default(8000),

  REPORT_OUTPUT_DIR: z.string().min(1).default("."),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
};

function toConfigurationError(error: ZodError): ConfigurationError {
  const missing = new Set<string>();
  const invalid = new Set<string>();

  for (const issue of error.issues) {
    const key = issue.path[0]?.toString();
    if (!key) continue;
    if (issue.code === "invalid_type" && issue.received === "undefined") {
      missing.add(key);
    } else {
      invalid.add(key);
    }
  }

  const meta = { missing: [...missing], invalid: [...invalid] };
  return new ConfigurationError(
    `Invalid server env: ${JSON.stringify(meta)}`,
    meta
  );
}

/**
 * Validate an environment record without caching.
 * @throws ConfigurationError on schema or cross-field violations
 */
export function parseServerEnv(source: NodeJS.ProcessEnv): ServerEnv {
  let parsed: z.infer<typeof serverSchema>;
  try {
    parsed = serverSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) throw toConfigurationError(error);
    throw error;
  }

  assertEnvInvariants(parsed);

  return {
    ...parsed,
    isDev: parsed.NODE_ENV === "development",
    isTest: parsed.NODE_ENV === "test",
    isProd: parsed.NODE_ENV === "production",
  };
}

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    ENV = parseServerEnv(process.env);
  }
  return ENV;
}

export type { ServerEnv };
