// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/runner/research-runner`
 * Purpose: In-process research run: queue, tool wiring, engine execution, event stream and final result.
 * Scope: Creates one queue per run, hands its emit to the tool factory, runs the engine, emits terminal events. Does NOT read env.
 * Invariants:
 *   - SINGLE_QUEUE_PER_RUN: every event of the run (sub-conversations included) flows through one queue
 *   - ASSISTANT_FINAL_ONCE: exactly one assistant_final (the report body) when the engine returns
 *   - DONE_LAST: `done` is always the final event, then the queue closes
 *   - ERROR_NORMALIZATION_ONCE: the catch block uses normalizeErrorToResearchCode()
 *   - TRACER_SEES_ALL: the run tracer observes every event before it is queued
 * Side-effects: IO (engine run), logging
 * Links: engine/conversation-engine.ts, metrics/run-tracer.ts, runtime/async-queue.ts
 * @public
 */

import {
  type AiEvent,
  type Conversation,
  type EmitAiEvent,
  normalizeErrorToResearchCode,
  type ResearchErrorCode,
  type ToolSourcePort,
} from "@fathom/ai-core";

import { createConversationEngine } from "../engine/conversation-engine";
import type { TerminationReason } from "../engine/state";
import { RunTracer, type RunTally, formatTally } from "../metrics/run-tracer";
import type { ChatModelPort } from "../model/chat-model.port";
import type { Report } from "../report/report-extractor";
import { AsyncQueue } from "../runtime/async-queue";
import { type LoggerPort, NOOP_LOGGER } from "../runtime/logger.port";

export interface ResearchRequest {
  readonly query: string;
  readonly systemPrompt: string;
  readonly maxSteps: number;
  readonly signal?: AbortSignal;
  readonly runId?: string;
  readonly maxResultChars?: number;
}

export interface ResearchRunnerOptions {
  readonly model: ChatModelPort;
  /**
   * Builds the run's tools around its emitter, so that nested
   * conversations (claim validation) stream into the same queue.
   */
  readonly createTools: (emit: EmitAiEvent) => ToolSourcePort;
  readonly request: ResearchRequest;
  readonly logger?: LoggerPort;
  /** Additional passive observer, e.g. process metrics */
  readonly observe?: (event: AiEvent) => void;
}

export type ResearchResult =
  | {
      readonly ok: true;
      readonly report: Report;
      readonly conversation: Conversation;
      readonly termination: TerminationReason;
      readonly failure: ResearchErrorCode | null;
      readonly tally: RunTally;
    }
  | {
      readonly ok: false;
      readonly error: ResearchErrorCode;
      readonly errorMessage: string;
      readonly tally: RunTally;
    };

const TARGET_ARGS = ["query", "url", "pageTitle", "question"] as const;

/**
 * Short description of what a tool call targets, for progress logs.
 */
export function describeToolTarget(args: Record<string, unknown>): string | undefined {
  for (const key of TARGET_ARGS) {
    const value = args[key];
    if (typeof value === "string") return value;
  }
  const claims = args["claims"];
  if (Array.isArray(claims)) return `${claims.length} claim(s)`;
  return undefined;
}

export function createResearchRunner(opts: ResearchRunnerOptions): {
  stream: AsyncIterable<AiEvent>;
  final: Promise<ResearchResult>;
} {
  const { request } = opts;
  const logger = opts.logger ?? NOOP_LOGGER;
  const queue = new AsyncQueue<AiEvent>();
  const tracer = new RunTracer();

  const emit: EmitAiEvent = (event) => {
    tracer.observe(event);
    opts.observe?.(event);
    if (event.type === "tool_call_start") {
      logger.info(
        {
          event: "research.tool_call",
          tool: event.toolName,
          target: describeToolTarget(event.args),
          ...(event.scope !== undefined && { scope: event.scope }),
        },
        `calling ${event.toolName}`
      );
    }
    queue.push(event);
  };

  const final = (async (): Promise<ResearchResult> => {
    try {
      logger.info(
        { event: "research.run_started", runId: request.runId, maxSteps: request.maxSteps },
        "research run started"
      );
      const engine = createConversationEngine({
        model: opts.model,
        tools: opts.createTools(emit),
        emit,
        logger,
      });
      const outcome = await engine.run({
        query: request.query,
        systemPrompt: request.systemPrompt,
        maxSteps: request.maxSteps,
        ...(request.signal && { signal: request.signal }),
        ...(request.runId !== undefined && { runId: request.runId }),
        ...(request.maxResultChars !== undefined && {
          maxResultChars: request.maxResultChars,
        }),
      });

      emit({ type: "assistant_final", content: outcome.report.body });
      emit({ type: "done" });

      const tally = tracer.snapshot();
      logger.info(
        {
          event: "research.run_completed",
          runId: request.runId,
          termination: outcome.termination,
          selection: outcome.report.selection,
          ...tally,
        },
        formatTally(tally)
      );

      return {
        ok: true,
        report: outcome.report,
        conversation: outcome.conversation,
        termination: outcome.termination,
        failure: outcome.failure,
        tally,
      };
    } catch (error) {
      const code = normalizeErrorToResearchCode(error);
      const errorMessage =
        error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      logger.error(
        { event: "research.run_failed", runId: request.runId, errorCode: code, errorMessage },
        "research run failed"
      );

      emit({ type: "error", error: code });
      emit({ type: "done" });

      return { ok: false, error: code, errorMessage, tally: tracer.snapshot() };
    } finally {
      queue.close();
    }
  })();

  return { stream: queue, final };
}
