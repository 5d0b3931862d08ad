// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/engine/state`
 * Purpose: LangGraph state schema for one conversation engine run.
 * Scope: Annotation + reducers. Does NOT execute graph logic.
 * Invariants:
 *   - APPEND_ONLY: `conversation` only grows, through conversationReducer (orphan results dropped)
 *   - REDUCER_SEMANTICS: scalar channels are last-write-wins
 * Side-effects: none
 * Links: conversation-engine.ts, @fathom/ai-core conversation.ts
 * @public
 */

import {
  type Conversation,
  conversationReducer,
  type Message,
  type ResearchErrorCode,
} from "@fathom/ai-core";
import { Annotation } from "@langchain/langgraph";

/**
 * Why a run stopped.
 * - final_answer: the model replied with text and no tool calls
 * - budget_exceeded: the step budget ran out while the model still wanted tools
 * - model_error: the model call failed
 * - aborted: the caller cancelled
 */
export type TerminationReason =
  | "final_answer"
  | "budget_exceeded"
  | "model_error"
  | "aborted";

export const ConversationStateAnnotation = Annotation.Root({
  conversation: Annotation<Conversation, readonly Message[]>({
    reducer: conversationReducer,
    default: () => [],
  }),

  /** Model calls made so far */
  steps: Annotation<number>({
    reducer: (_, right) => right,
    default: () => 0,
  }),

  termination: Annotation<TerminationReason | null>({
    reducer: (_, right) => right,
    default: () => null,
  }),

  /** Error code recorded when termination is not final_answer */
  failure: Annotation<ResearchErrorCode | null>({
    reducer: (_, right) => right,
    default: () => null,
  }),
});

export type ConversationState = typeof ConversationStateAnnotation.State;
export type ConversationUpdate = typeof ConversationStateAnnotation.Update;
