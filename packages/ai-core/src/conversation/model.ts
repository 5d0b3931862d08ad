// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/conversation/model`
 * Purpose: Canonical message model for one research conversation.
 * Scope: Defines ToolRequest, ToolResult, Message and Conversation types. Does NOT implement append logic (see conversation.ts).
 * Invariants:
 *   - MESSAGE_KINDS_CLOSED: Message is a closed union over user_text, assistant_text, tool_invocation, tool_outcome
 *   - RESULT_CARRIES_REQUEST_ID: Every ToolResult carries the requestId of the ToolRequest it answers
 *   - RESULT_SHAPE: {ok:true, value} | {ok:false, errorCode, safeMessage}
 *   - NO LangChain imports (wire conversion lives in research-graphs)
 * Side-effects: none (types only)
 * Links: conversation.ts, tooling/tool-runner.ts
 * @public
 */

import type { ToolErrorCode } from "../tooling/types";

/**
 * One tool call requested by the model.
 * Frozen by the engine before dispatch.
 */
export interface ToolRequest {
  /** Registered tool id (e.g., "web_search") */
  readonly toolName: string;
  /** Raw model-provided arguments; validated by the tool at dispatch time */
  readonly arguments: Readonly<Record<string, unknown>>;
  /** Opaque correlation token, unique within a conversation */
  readonly requestId: string;
}

export interface ToolSuccess {
  readonly ok: true;
  readonly requestId: string;
  readonly toolName: string;
  readonly value: Readonly<Record<string, unknown>>;
}

export interface ToolFailureResult {
  readonly ok: false;
  readonly requestId: string;
  readonly toolName: string;
  readonly errorCode: ToolErrorCode;
  readonly safeMessage: string;
  /** Structured context for the model (e.g., the URL a crawl failed on) */
  readonly details?: Readonly<Record<string, unknown>>;
}

/**
 * Outcome of one ToolRequest. Callers branch on `ok`, never on payload shape.
 */
export type ToolResult = ToolSuccess | ToolFailureResult;

export interface UserTextMessage {
  readonly kind: "user_text";
  readonly text: string;
}

export interface AssistantTextMessage {
  readonly kind: "assistant_text";
  readonly text: string;
}

/**
 * A batch of tool calls from one model turn.
 * `text` holds any prose the model sent alongside the calls; the turn is still non-terminal.
 */
export interface ToolInvocationMessage {
  readonly kind: "tool_invocation";
  readonly requests: readonly ToolRequest[];
  readonly text?: string;
}

export interface ToolOutcomeMessage {
  readonly kind: "tool_outcome";
  readonly results: readonly ToolResult[];
}

export type Message =
  | UserTextMessage
  | AssistantTextMessage
  | ToolInvocationMessage
  | ToolOutcomeMessage;

/** A single model turn: either a final answer or a tool batch. */
export type ModelTurn = AssistantTextMessage | ToolInvocationMessage;

/**
 * Ordered, append-only message log owned by one engine run.
 */
export type Conversation = readonly Message[];
