// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/conversation/conversation`
 * Purpose: Append-only operations over a Conversation with causal-order enforcement.
 * Scope: Pure functions producing new Conversation values. Does NOT call models or tools.
 * Invariants:
 *   - APPEND_ONLY: Existing messages are never removed, reordered or mutated
 *   - CAUSAL_ORDER: A ToolResult is kept only if an earlier ToolInvocation requested its requestId
 *   - ONE_RESULT_PER_REQUEST: A second result for an answered requestId is dropped
 *   - FROZEN_MESSAGES: Appended messages (and their requests) are frozen
 * Side-effects: none
 * Links: model.ts, research-graphs engine state reducer
 * @public
 */

import type {
  Conversation,
  Message,
  ToolRequest,
  ToolResult,
} from "./model";

export interface AppendOutcome {
  readonly conversation: Conversation;
  /** Results rejected for CAUSAL_ORDER or ONE_RESULT_PER_REQUEST */
  readonly dropped: readonly ToolResult[];
}

/**
 * Start a conversation holding exactly one user message.
 */
export function createConversation(query: string): Conversation {
  return Object.freeze([freezeMessage({ kind: "user_text", text: query })]);
}

function freezeRequest(request: ToolRequest): ToolRequest {
  return Object.freeze({
    toolName: request.toolName,
    requestId: request.requestId,
    arguments: Object.freeze({ ...request.arguments }),
  });
}

function freezeMessage(message: Message): Message {
  switch (message.kind) {
    case "user_text":
    case "assistant_text":
      return Object.freeze({ ...message });
    case "tool_invocation":
      return Object.freeze({
        ...message,
        requests: Object.freeze(message.requests.map(freezeRequest)),
      });
    case "tool_outcome":
      return Object.freeze({
        ...message,
        results: Object.freeze(message.results.map((r) => Object.freeze(r))),
      });
    default: {
      const _exhaustive: never = message;
      throw new Error(`Unknown message kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

function collectRequestState(conversation: Conversation): {
  requested: Set<string>;
  answered: Set<string>;
} {
  const requested = new Set<string>();
  const answered = new Set<string>();
  for (const message of conversation) {
    if (message.kind === "tool_invocation") {
      for (const request of message.requests) requested.add(request.requestId);
    } else if (message.kind === "tool_outcome") {
      for (const result of message.results) answered.add(result.requestId);
    }
  }
  return { requested, answered };
}

/**
 * Append messages in order, dropping orphaned or duplicate tool results.
 * A tool_outcome left with no results after filtering is not appended.
 */
export function appendMessages(
  conversation: Conversation,
  incoming: readonly Message[]
): AppendOutcome {
  const { requested, answered } = collectRequestState(conversation);
  const next: Message[] = [...conversation];
  const dropped: ToolResult[] = [];

  for (const message of incoming) {
    if (message.kind === "tool_invocation") {
      for (const request of message.requests) requested.add(request.requestId);
      next.push(freezeMessage(message));
      continue;
    }

    if (message.kind === "tool_outcome") {
      const kept: ToolResult[] = [];
      for (const result of message.results) {
        if (!requested.has(result.requestId) || answered.has(result.requestId)) {
          dropped.push(result);
          continue;
        }
        answered.add(result.requestId);
        kept.push(result);
      }
      if (kept.length > 0) {
        next.push(freezeMessage({ kind: "tool_outcome", results: kept }));
      }
      continue;
    }

    next.push(freezeMessage(message));
  }

  return { conversation: Object.freeze(next), dropped };
}

/**
 * Reducer form of appendMessages for state containers that only keep the value.
 */
export function conversationReducer(
  left: Conversation,
  right: readonly Message[]
): Conversation {
  return appendMessages(left, right).conversation;
}

/**
 * Requests of the latest tool_invocation that have no result yet.
 */
export function pendingRequests(
  conversation: Conversation
): readonly ToolRequest[] {
  const { answered } = collectRequestState(conversation);
  for (let i = conversation.length - 1; i >= 0; i--) {
    const message = conversation[i];
    if (message?.kind === "tool_invocation") {
      return message.requests.filter((r) => !answered.has(r.requestId));
    }
  }
  return [];
}

/**
 * Every requestId already used in the conversation.
 */
export function usedRequestIds(conversation: Conversation): Set<string> {
  return collectRequestState(conversation).requested;
}

/**
 * Model-authored prose with its position: final answers and text sent alongside tool calls.
 */
export interface AuthoredText {
  readonly index: number;
  readonly text: string;
  readonly kind: "assistant_text" | "tool_invocation";
}

export function authoredTexts(conversation: Conversation): AuthoredText[] {
  const texts: AuthoredText[] = [];
  conversation.forEach((message, index) => {
    if (message.kind === "assistant_text") {
      texts.push({ index, text: message.text, kind: message.kind });
    } else if (message.kind === "tool_invocation" && message.text) {
      texts.push({ index, text: message.text, kind: message.kind });
    }
  });
  return texts;
}
