// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/engine/conversation-engine`
 * Purpose: Model ⇄ tools state machine that drives one conversation to a report.
 * Scope: Builds a two-node StateGraph (model, tools) per run and executes it. Does NOT read env or pick tools.
 * Invariants:
 *   - ONE_STEP_ONE_MODEL_CALL: `steps` counts model calls; never exceeds maxSteps
 *   - TURN_SYNCHRONOUS: one outstanding model call or tool batch at a time
 *   - ANY_TOOL_CALL_IS_NON_TERMINAL: only text with no tool calls ends the loop as final_answer
 *   - BUDGET_ENFORCED: a tool request on the last allowed step ends the run as budget_exceeded
 *   - BATCH_COMPLETE: the whole batch settles before the model sees any result
 *   - NEVER_THROWS: model failures and cancellation end the run with a best-effort report
 *   - SUBCONVERSATION_ISOLATION: each run owns its conversation; nothing is shared between runs
 * Side-effects: IO (model and tools via injected ports), AiEvent emission, logging
 * Links: state.ts, report/report-extractor.ts, @fathom/ai-core tool-runner.ts
 * @public
 */

import {
  appendMessages,
  type Conversation,
  createConversation,
  createToolRunner,
  type EmitAiEvent,
  type ModelTurn,
  normalizeErrorToResearchCode,
  pendingRequests,
  type ResearchErrorCode,
  type ToolOutcomeMessage,
  type ToolSourcePort,
} from "@fathom/ai-core";
import { END, GraphRecursionError, START, StateGraph } from "@langchain/langgraph";

import type { ChatModelPort } from "../model/chat-model.port";
import {
  extractReport,
  type Report,
  terminationNotice,
} from "../report/report-extractor";
import { type LoggerPort, NOOP_LOGGER } from "../runtime/logger.port";
import {
  type ConversationState,
  ConversationStateAnnotation,
  type ConversationUpdate,
  type TerminationReason,
} from "./state";

export interface ConversationEngineDeps {
  readonly model: ChatModelPort;
  readonly tools: ToolSourcePort;
  readonly emit?: EmitAiEvent;
  readonly logger?: LoggerPort;
}

export interface ConversationRunInput {
  readonly query: string;
  readonly systemPrompt: string;
  /** Maximum model calls; at least 1 */
  readonly maxSteps: number;
  readonly signal?: AbortSignal;
  /** Label for events of a nested conversation */
  readonly scope?: string;
  readonly runId?: string;
  readonly maxResultChars?: number;
}

export interface ConversationOutcome {
  readonly conversation: Conversation;
  readonly termination: TerminationReason;
  readonly failure: ResearchErrorCode | null;
  readonly steps: number;
  readonly report: Report;
}

export interface ConversationEngine {
  run(input: ConversationRunInput): Promise<ConversationOutcome>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

export function createConversationEngine(
  deps: ConversationEngineDeps
): ConversationEngine {
  const emit: EmitAiEvent = deps.emit ?? (() => undefined);
  const logger = deps.logger ?? NOOP_LOGGER;

  async function run(input: ConversationRunInput): Promise<ConversationOutcome> {
    if (!Number.isInteger(input.maxSteps) || input.maxSteps < 1) {
      throw new RangeError(`maxSteps must be a positive integer, got ${input.maxSteps}`);
    }

    const { query, systemPrompt, maxSteps, signal, scope } = input;
    const scoped = scope !== undefined ? { scope } : {};
    const toolSpecs = deps.tools.listToolSpecs();
    const runner = createToolRunner(deps.tools, emit, {
      ...(input.runId !== undefined && { runId: input.runId }),
      ...(input.maxResultChars !== undefined && {
        maxResultChars: input.maxResultChars,
      }),
      ...scoped,
    });

    // Pre-update state of the latest node, kept for best-effort reports on unexpected graph errors
    let lastSeen: ConversationState | undefined;

    // ─────────────────────────────────────────────────────────────────────
    // Nodes
    // ─────────────────────────────────────────────────────────────────────

    async function callModel(state: ConversationState): Promise<ConversationUpdate> {
      lastSeen = state;
      if (signal?.aborted) {
        return { termination: "aborted", failure: "aborted" };
      }

      const step = state.steps + 1;
      emit({ type: "step", step, maxSteps, ...scoped });
      emit({ type: "status", phase: "thinking", ...scoped });

      let turn: ModelTurn;
      try {
        turn = await deps.model.invoke(state.conversation, {
          tools: toolSpecs,
          systemPrompt,
          ...(signal && { signal }),
        });
      } catch (error) {
        const aborted = signal?.aborted === true;
        const failure = aborted ? "aborted" : normalizeErrorToResearchCode(error);
        logger.error(
          {
            event: "research.model_error",
            ...scoped,
            step,
            errorCode: failure,
            errorMessage: errorMessage(error),
          },
          "model call failed; ending conversation"
        );
        return {
          steps: step,
          termination: aborted ? "aborted" : "model_error",
          failure,
        };
      }

      if (turn.kind === "assistant_text") {
        return { conversation: [turn], steps: step, termination: "final_answer" };
      }

      if (step >= maxSteps) {
        logger.warn(
          {
            event: "research.budget_exceeded",
            ...scoped,
            maxSteps,
            pendingTools: turn.requests.map((r) => r.toolName),
          },
          "step budget exhausted with tool calls pending"
        );
        return {
          conversation: [turn],
          steps: step,
          termination: "budget_exceeded",
          failure: "budget_exceeded",
        };
      }

      return { conversation: [turn], steps: step };
    }

    async function runTools(state: ConversationState): Promise<ConversationUpdate> {
      lastSeen = state;
      const requests = pendingRequests(state.conversation);
      for (const request of requests) {
        emit({ type: "status", phase: "tool_use", label: request.toolName, ...scoped });
      }

      const results = await runner.dispatchBatch(
        requests,
        signal ? { signal } : undefined
      );
      const outcome: ToolOutcomeMessage = { kind: "tool_outcome", results };

      const { dropped } = appendMessages(state.conversation, [outcome]);
      if (dropped.length > 0) {
        logger.warn(
          {
            event: "research.orphan_results_dropped",
            ...scoped,
            requestIds: dropped.map((r) => r.requestId),
          },
          "dropped tool results with no matching request"
        );
      }
      return { conversation: [outcome] };
    }

    function routeAfterModel(state: ConversationState): "tools" | typeof END {
      return state.termination === null ? "tools" : END;
    }

    const graph = new StateGraph(ConversationStateAnnotation)
      .addNode("model", callModel)
      .addNode("tools", runTools)
      .addEdge(START, "model")
      .addConditionalEdges("model", routeAfterModel, ["tools", END])
      .addEdge("tools", "model")
      .compile();

    // ─────────────────────────────────────────────────────────────────────
    // Execute
    // ─────────────────────────────────────────────────────────────────────

    let conversation: Conversation;
    let termination: TerminationReason;
    let failure: ResearchErrorCode | null;
    let steps: number;

    try {
      const finalState = await graph.invoke(
        { conversation: createConversation(query) },
        { recursionLimit: maxSteps * 2 + 4 }
      );
      conversation = finalState.conversation;
      termination = finalState.termination ?? "final_answer";
      failure = finalState.failure;
      steps = finalState.steps;
    } catch (error) {
      conversation = lastSeen?.conversation ?? createConversation(query);
      steps = lastSeen?.steps ?? 0;
      if (signal?.aborted) {
        termination = "aborted";
        failure = "aborted";
      } else if (error instanceof GraphRecursionError) {
        termination = "budget_exceeded";
        failure = "budget_exceeded";
      } else {
        termination = "model_error";
        failure = normalizeErrorToResearchCode(error);
      }
      logger.error(
        {
          event: "research.engine_error",
          ...scoped,
          errorCode: failure,
          errorMessage: errorMessage(error),
        },
        "conversation graph failed"
      );
    }

    if (failure !== null) {
      emit({ type: "error", error: failure, ...scoped });
    }

    const report = extractReport(conversation, query, {
      logger,
      notice: terminationNotice(query, termination),
    });

    return { conversation, termination, failure, steps, report };
  }

  return { run };
}
