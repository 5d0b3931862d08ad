// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/types`
 * Purpose: Core type definitions for research tool contracts and implementations.
 * Scope: Defines ToolContract, ToolImplementation, BoundTool. Does NOT import @langchain.
 * Invariants:
 *   - EFFECT_TYPED: ToolContract includes `effect: ToolEffect`
 *   - inputSchema is the source of truth; validateInput and the wire spec derive from it
 *   - REDACTION_REQUIRED: every contract names the top-level keys the model may see
 *   - Implementations receive the invocation signal and pass it to every outbound call
 * Side-effects: none (types only)
 * Links: runtime-adapter.ts, schema.ts
 * @public
 */

import type { ToolEffect } from "@fathom/ai-core";
import type { z } from "zod";

/** Every key of every member of a union (keyof on a union only gives shared keys). */
export type AllKeys<T> = T extends unknown ? keyof T & string : never;

/**
 * Tool contract definition: schemas and redaction, no behavior.
 */
export interface ToolContract<
  TName extends string,
  TInput extends Record<string, unknown>,
  TOutput,
> {
  /** Stable tool id (snake_case) */
  readonly name: TName;
  /** Human-readable description for the model */
  readonly description: string;
  readonly effect: ToolEffect;
  /** Input type may differ from TInput before defaults are applied */
  readonly inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  readonly outputSchema: z.ZodType<TOutput, z.ZodTypeDef, unknown>;
  /** Project validated output onto what the model and events see */
  readonly redact: (output: TOutput) => Record<string, unknown>;
  readonly allowlist: ReadonlyArray<AllKeys<TOutput>>;
  /** Per-call deadline; the runner default applies when absent */
  readonly timeoutMs?: number;
  /** Output text is already cut to a length the input chose */
  readonly boundsOwnOutput?: boolean;
  /** Input-derived details for failures the tool cannot describe itself (timeouts) */
  readonly failureDetails?: (input: TInput) => Record<string, unknown>;
}

export interface ToolExecutionContext {
  readonly signal: AbortSignal;
  readonly toolCallId: string;
}

/**
 * Tool implementation. Adapters are injected at construction; receives validated input.
 */
export interface ToolImplementation<TInput, TOutput> {
  readonly execute: (
    input: TInput,
    ctx: ToolExecutionContext
  ) => Promise<TOutput>;
}

/**
 * Bound tool: contract + implementation together.
 */
export interface BoundTool<
  TName extends string,
  TInput extends Record<string, unknown>,
  TOutput,
> {
  readonly contract: ToolContract<TName, TInput, TOutput>;
  readonly implementation: ToolImplementation<TInput, TOutput>;
}

/**
 * Keep only allowlisted top-level keys of a tool output.
 */
export function pickAllowlisted<T extends object>(
  output: T,
  allowlist: ReadonlyArray<string>
): Record<string, unknown> {
  const picked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(output)) {
    if (allowlist.includes(key) && value !== undefined) picked[key] = value;
  }
  return picked;
}
