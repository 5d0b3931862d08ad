// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/events/ai-events`
 * Purpose: Event types streamed out of a research run.
 * Scope: Defines the AiEvent union emitted by the tool runner, conversation engine and runner. Does NOT implement functions.
 * Invariants:
 *   - SINGLE_SOURCE_OF_TRUTH: This is the canonical definition
 *   - toolCallId is stable across start→result and equals the ToolRequest.requestId
 *   - ASSISTANT_FINAL_ONCE: the runner emits at most one assistant_final per run
 *   - `scope` distinguishes the root conversation from claim sub-conversations
 * Side-effects: none (types only)
 * Links: tooling/tool-runner.ts, research-graphs engine and runner
 * @public
 */

import type { ResearchErrorCode } from "../execution/error-codes";

/**
 * Tool call initiated (after argument validation).
 */
export interface ToolCallStartEvent {
  readonly type: "tool_call_start";
  readonly toolCallId: string;
  readonly toolName: string;
  /** Validated arguments */
  readonly args: Record<string, unknown>;
  readonly scope?: string;
}

/**
 * Tool call completed, success or failure.
 * Failure results carry `{ error, errorCode }` and isError=true.
 */
export interface ToolCallResultEvent {
  readonly type: "tool_call_result";
  readonly toolCallId: string;
  readonly toolName: string;
  /** Redacted result (allowlisted fields only) */
  readonly result: Record<string, unknown>;
  readonly isError?: boolean;
  readonly durationMs: number;
  readonly scope?: string;
}

/**
 * One model call started. `step` counts from 1 within its conversation.
 */
export interface StepEvent {
  readonly type: "step";
  readonly step: number;
  readonly maxSteps: number;
  readonly scope?: string;
}

/**
 * A nested conversation (e.g., one claim-validation round) is starting.
 */
export interface SubConversationStartEvent {
  readonly type: "subconversation_start";
  /** Scope label used on that conversation's own events */
  readonly scope: string;
  readonly purpose: string;
}

/**
 * Agent activity status for progress indicators.
 * Label carries at most a tool name.
 */
export interface StatusEvent {
  readonly type: "status";
  readonly phase: "thinking" | "tool_use" | "validating";
  readonly label?: string;
  readonly scope?: string;
}

/**
 * The selected final report body.
 */
export interface AssistantFinalEvent {
  readonly type: "assistant_final";
  readonly content: string;
}

/**
 * Run finished. Always the last event.
 */
export interface DoneEvent {
  readonly type: "done";
}

/**
 * Run-level failure (budget, model, cancellation).
 * Details belong in logs, not in the event stream.
 */
export interface ErrorEvent {
  readonly type: "error";
  readonly error: ResearchErrorCode;
  readonly scope?: string;
}

export type AiEvent =
  | ToolCallStartEvent
  | ToolCallResultEvent
  | StepEvent
  | SubConversationStartEvent
  | StatusEvent
  | AssistantFinalEvent
  | DoneEvent
  | ErrorEvent;
