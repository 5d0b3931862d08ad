// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/schema`
 * Purpose: Compile ToolContract (Zod) to ToolSpec (JSONSchema7) for wire formats.
 * Scope: Schema compilation only. Does not execute tools or touch IO.
 * Invariants:
 *   - NO_MANUAL_SCHEMA_DUPLICATION: JSONSchema derived from Zod, never hand-written
 *   - Synchronous compilation (no async imports)
 * Side-effects: none
 * Links: runtime-adapter.ts
 * @public
 */

import type { ToolEffect, ToolSpec } from "@fathom/ai-core";
import type { JSONSchema7 } from "json-schema";
import type { ZodTypeAny } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

/** The contract fields a wire spec needs. */
export interface ToolSpecSource {
  readonly name: string;
  readonly description: string;
  readonly effect: ToolEffect;
  readonly inputSchema: ZodTypeAny;
  readonly allowlist: readonly string[];
}

function isJsonSchemaObject(value: unknown): value is JSONSchema7 {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Compile a contract to a ToolSpec. Falls back to an open object schema
 * when the compiler produces something unusable.
 */
export function toToolSpec(contract: ToolSpecSource): ToolSpec {
  const rawSchema = zodToJsonSchema(contract.inputSchema, {
    $refStrategy: "none",
    target: "jsonSchema7",
  });

  const inputSchema: JSONSchema7 = isJsonSchemaObject(rawSchema)
    ? stripMetaKeys(rawSchema)
    : { type: "object" };

  return {
    name: contract.name,
    description: contract.description,
    inputSchema,
    effect: contract.effect,
    redaction: {
      mode: "top_level_only",
      allowlist: [...contract.allowlist],
    },
  };
}

// Providers reject a `$schema` key inside function parameters.
function stripMetaKeys(schema: JSONSchema7): JSONSchema7 {
  const stripped: JSONSchema7 = { ...schema };
  delete stripped.$schema;
  return stripped;
}
