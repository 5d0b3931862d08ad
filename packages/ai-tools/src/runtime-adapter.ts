// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/runtime-adapter`
 * Purpose: Convert BoundTool (ai-tools) to BoundToolRuntime (ai-core interface).
 * Scope: Adapter creation only. Does not execute tools on its own.
 * Invariants:
 *   - TOOL_SOURCE_RETURNS_BOUND_TOOL: Returns executable BoundToolRuntime
 *   - Zod validation stays in this layer; ai-core sees only the interface
 *   - Validation messages name the offending field so the model can correct its call
 *   - boundsOwnOutput and failureDetails pass from the contract to the runtime
 * Side-effects: none
 * Links: @fathom/ai-core tooling/types.ts
 * @public
 */

import type { BoundToolRuntime, ToolInvocationContext } from "@fathom/ai-core";
import { ZodError } from "zod";

import { toToolSpec } from "./schema";
import type { BoundTool } from "./types";

export interface ToBoundToolRuntimeOptions {
  /** Overrides the contract's own deadline (e.g., from configuration) */
  readonly timeoutMs?: number;
}

function describeZodError(toolName: string, error: ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
  return `Invalid arguments for ${toolName}: ${issues.join("; ")}`;
}

/**
 * Convert a BoundTool to the BoundToolRuntime interface.
 *
 * exec() re-parses its arguments: the runner hands back the record that
 * validateInput produced, and parsing is idempotent for these schemas.
 */
export function toBoundToolRuntime<
  TName extends string,
  TInput extends Record<string, unknown>,
  TOutput,
>(
  boundTool: BoundTool<TName, TInput, TOutput>,
  options?: ToBoundToolRuntimeOptions
): BoundToolRuntime {
  const { contract, implementation } = boundTool;
  const spec = toToolSpec({
    name: contract.name,
    description: contract.description,
    effect: contract.effect,
    inputSchema: contract.inputSchema,
    allowlist: contract.allowlist,
  });
  const timeoutMs = options?.timeoutMs ?? contract.timeoutMs;
  const { failureDetails } = contract;

  return {
    id: contract.name,
    spec,
    effect: contract.effect,
    ...(timeoutMs !== undefined && { timeoutMs }),
    ...(contract.boundsOwnOutput === true && { boundsOwnOutput: true }),
    ...(failureDetails && {
      failureDetails: (validatedArgs: Record<string, unknown>) =>
        failureDetails(contract.inputSchema.parse(validatedArgs)),
    }),

    validateInput(rawArgs: unknown): Record<string, unknown> {
      try {
        return contract.inputSchema.parse(rawArgs);
      } catch (error) {
        if (error instanceof ZodError) {
          throw new Error(describeZodError(contract.name, error));
        }
        throw error;
      }
    },

    async exec(
      validatedArgs: Record<string, unknown>,
      ctx: ToolInvocationContext
    ): Promise<unknown> {
      const input = contract.inputSchema.parse(validatedArgs);
      return implementation.execute(input, {
        signal: ctx.signal,
        toolCallId: ctx.toolCallId,
      });
    },

    validateOutput(rawOutput: unknown): unknown {
      return contract.outputSchema.parse(rawOutput);
    },

    redact(validatedOutput: unknown): Record<string, unknown> {
      return contract.redact(contract.outputSchema.parse(validatedOutput));
    },
  };
}
