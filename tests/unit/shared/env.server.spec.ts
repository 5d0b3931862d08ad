// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/env.server`
 * Purpose: Validates server env defaults, coercion and ConfigurationError reporting.
 * Scope: parseServerEnv over explicit records. Does NOT touch process.env.
 * Invariants: Defaults target a local LM Studio server; Azure needs key and endpoint.
 * Side-effects: none
 * Links: src/shared/env/server.ts, src/shared/env/invariants.ts
 * @public
 */

import { ConfigurationError } from "@fathom/ai-core";
import { describe, expect, it } from "vitest";

import { parseServerEnv } from "@/shared/env";

describe("parseServerEnv", () => {
  it("applies local defaults to an empty environment", () => {
    const env = parseServerEnv({});

    expect(env).toMatchObject({
      NODE_ENV: "development",
      LLM_PROVIDER: "openai_compatible",
      LLM_BASE_URL: "http://localhost:1234/v1",
      LLM_API_KEY: "not-needed",
      LLM_MODEL: "qwen2.5-14b-instruct",
      LLM_TEMPERATURE: 0.7,
      WIKIPEDIA_LANGUAGE: "en",
      CRAWL_TIMEOUT_MS: 10_000,
      WOLFRAM_TIMEOUT_MS: 30_000,
      RESEARCH_MAX_STEPS: 25,
      CLAIM_MAX_ROUNDS: 3,
      TOOL_RESULT_MAX_CHARS: 8000,
      REPORT_OUTPUT_DIR: ".",
      isDev: true,
      isTest: false,
    });
    expect(env.WOLFRAM_ALPHA_APPID).toBeUndefined();
  });

  it("coerces numeric variables", () => {
    const env = parseServerEnv({
      RESEARCH_MAX_STEPS: "12",
      LLM_TEMPERATURE: "0",
      NODE_ENV: "test",
    });
    expect(env.RESEARCH_MAX_STEPS).toBe(12);
    expect(env.LLM_TEMPERATURE).toBe(0);
    expect(env.isTest).toBe(true);
  });

  it("lists every invalid variable in one ConfigurationError", () => {
    let caught: unknown;
    try {
      parseServerEnv({ LLM_PROVIDER: "bedrock", CRAWL_TIMEOUT_MS: "soon" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      code: "configuration_error",
      meta: { missing: [], invalid: ["LLM_PROVIDER", "CRAWL_TIMEOUT_MS"] },
    });
  });

  it("rejects Azure without key and endpoint", () => {
    expect(() => parseServerEnv({ LLM_PROVIDER: "azure_openai" })).toThrow(
      "LLM_PROVIDER=azure_openai requires AZURE_OPENAI_API_KEY and AZURE_OPENAI_ENDPOINT"
    );
  });

  it("names only the missing Azure setting", () => {
    let caught: unknown;
    try {
      parseServerEnv({
        LLM_PROVIDER: "azure_openai",
        AZURE_OPENAI_API_KEY: "test-secret",
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({
      meta: { missing: ["AZURE_OPENAI_ENDPOINT"], invalid: [] },
    });
  });

  it("accepts a complete Azure configuration with its defaults", () => {
    const env = parseServerEnv({
      LLM_PROVIDER: "azure_openai",
      AZURE_OPENAI_API_KEY: "test-secret",
      AZURE_OPENAI_ENDPOINT: "https://example.openai.azure.com",
    });
    expect(env.AZURE_OPENAI_DEPLOYMENT_NAME).toBe("gpt-4o");
    expect(env.AZURE_OPENAI_API_VERSION).toBe("2024-08-01-preview");
  });
});
