// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/tooling/types`
 * Purpose: Canonical semantic types for tool definitions, invocations, and execution.
 * Scope: Framework-agnostic types for the tool registry. Does NOT import Zod; uses JSONSchema7 for wire formats.
 * Invariants:
 *   - TOOL_SEMANTICS_CANONICAL: These are the canonical types; wire formats are adapters
 *   - EFFECT_TYPED: ToolEffect declares side-effect level
 *   - ToolSpec.inputSchema is compiled from Zod by @fathom/ai-tools toToolSpec()
 *   - NO_SECRETS_IN_CONTEXT: ToolInvocationContext carries references and a signal only
 * Side-effects: none (types only)
 * Links: tool-runner.ts, @fathom/ai-tools runtime-adapter
 * @public
 */

import type { JSONSchema7 } from "json-schema";

import type { AiEvent } from "../events/ai-events";

/**
 * Tool effect level. Every research tool is read_only today.
 */
export type ToolEffect = "read_only" | "state_change" | "external_side_effect";

/**
 * Redaction configuration for tool output.
 * top_level_only: keep allowlisted top-level keys.
 */
export interface ToolRedactionConfig {
  readonly mode: "top_level_only";
  readonly allowlist: readonly string[];
}

/**
 * Tool specification sent to the model (compiled form of a ToolContract).
 */
export interface ToolSpec {
  /** Stable tool id (snake_case) */
  readonly name: string;
  /** Human-readable description for the model */
  readonly description: string;
  /** JSONSchema7 for input (compiled from Zod) */
  readonly inputSchema: JSONSchema7;
  readonly effect: ToolEffect;
  readonly redaction: ToolRedactionConfig;
}

/**
 * Failure kinds a ToolResult can carry.
 */
export type ToolErrorCode =
  | "unknown_tool"
  | "validation"
  | "execution"
  | "network_error"
  | "parse_error"
  | "provider_error"
  | "timeout"
  | "aborted"
  | "redaction_failed";

/**
 * Context for one tool invocation. References only, no secrets.
 */
export interface ToolInvocationContext {
  /** Run correlation id */
  readonly runId: string;
  /** Equals the ToolRequest.requestId */
  readonly toolCallId: string;
  /**
   * Fires on caller cancellation or when the tool's own deadline passes.
   * Implementations pass it to every outbound call.
   */
  readonly signal: AbortSignal;
}

/**
 * Minimal schema interface; compatible with Zod without importing it.
 */
export interface ParseableSchema {
  parse(input: unknown): unknown;
}

/**
 * Executable tool as seen by the runner.
 * Implementations live in @fathom/ai-tools (which owns Zod).
 */
export interface BoundToolRuntime {
  readonly id: string;
  readonly spec: ToolSpec;
  readonly effect: ToolEffect;
  /** Deadline for one exec() call; runner default applies when absent */
  readonly timeoutMs?: number;
  /**
   * The tool truncates its own text to a caller-chosen length and reports
   * that length in its output; the runner leaves such payloads unbounded.
   */
  readonly boundsOwnOutput?: boolean;

  /** Details attached to exec failures (timeout, abort, thrown errors) of this call */
  failureDetails?(
    validatedArgs: Record<string, unknown>
  ): Record<string, unknown>;

  /** @throws on invalid arguments */
  validateInput(rawArgs: unknown): Record<string, unknown>;

  exec(
    validatedArgs: Record<string, unknown>,
    ctx: ToolInvocationContext
  ): Promise<unknown>;

  /** @throws on invalid output */
  validateOutput(rawOutput: unknown): unknown;

  /** Allowlist-based redaction; result is what the model and events see */
  redact(validatedOutput: unknown): Record<string, unknown>;
}

/**
 * Callback for emitting AiEvents during execution.
 */
export type EmitAiEvent = (event: AiEvent) => void;

/**
 * Tool execution result shape returned by ToolRunner.exec().
 */
export type ToolExecResult =
  | { readonly ok: true; readonly value: Record<string, unknown> }
  | {
      readonly ok: false;
      readonly errorCode: ToolErrorCode;
      readonly safeMessage: string;
      readonly details?: Readonly<Record<string, unknown>>;
    };
