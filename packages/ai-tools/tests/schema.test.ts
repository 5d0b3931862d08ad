// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tests/schema`
 * Purpose: Tests for Zod → JSONSchema7 compilation and runtime validation messages.
 * Scope: toToolSpec and toBoundToolRuntime.validateInput/redact.
 * Invariants: NO_MANUAL_SCHEMA_DUPLICATION - wire schema derives from the Zod contract
 * Side-effects: none
 * Links: src/schema.ts, src/runtime-adapter.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { toBoundToolRuntime } from "../src/runtime-adapter";
import { toToolSpec } from "../src/schema";
import { createWebSearchTool, webSearchContract } from "../src/tools/web-search";

describe("toToolSpec", () => {
  const spec = toToolSpec(webSearchContract);

  it("compiles the input schema to an object schema without $schema", () => {
    expect(spec.inputSchema.type).toBe("object");
    expect(spec.inputSchema.required).toEqual(["query"]);
    expect(spec.inputSchema.$schema).toBeUndefined();
  });

  it("carries bounds and defaults from the Zod contract", () => {
    expect(spec.inputSchema.properties?.maxResults).toMatchObject({
      type: "integer",
      minimum: 1,
      maximum: 10,
      default: 5,
    });
  });

  it("copies name, effect and redaction allowlist", () => {
    expect(spec.name).toBe("web_search");
    expect(spec.effect).toBe("read_only");
    expect(spec.redaction).toEqual({
      mode: "top_level_only",
      allowlist: ["query", "results", "suggestion"],
    });
  });
});

describe("toBoundToolRuntime", () => {
  const runtime = toBoundToolRuntime(
    createWebSearchTool({ webSearch: { search: async () => ({ results: [] }) } })
  );

  it("applies schema defaults during validation", () => {
    expect(runtime.validateInput({ query: "tides" })).toEqual({
      query: "tides",
      maxResults: 5,
    });
  });

  it("names the offending field in validation errors", () => {
    expect(() => runtime.validateInput({ query: "tides", maxResults: 50 })).toThrow(
      /^Invalid arguments for web_search: maxResults: /
    );
  });

  it("redacts to allowlisted keys and drops absent optionals", () => {
    expect(runtime.redact({ query: "q", results: [] })).toEqual({
      query: "q",
      results: [],
    });
  });
});
