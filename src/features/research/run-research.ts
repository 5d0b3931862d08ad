// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/research/run-research`
 * Purpose: Run one research preset end to end: tools, runner, persisted report and optional direct baseline.
 * Scope: Feature orchestration over container dependencies. Does not parse CLI arguments or read env.
 * Invariants:
 *   - CONFIG_BEFORE_RUN: tool factory is built (and may throw ConfigurationError) before the runner starts
 *   - REPORT_WRITTEN_ON_OK: the report file is written only when the runner resolves ok
 *   - Every streamed event reaches process metrics and the caller's onEvent, in order
 *   - A failed baseline is logged and reported; it never discards the agent report
 * Side-effects: IO (report files via ReportWriterPort, logging, metrics)
 * Links: src/bootstrap/container.ts, scripts/research.ts, packages/research-graphs/src/runner/research-runner.ts
 * @public
 */

import {
  type AiEvent,
  normalizeErrorToResearchCode,
  type ResearchErrorCode,
} from "@fathom/ai-core";
import {
  answerDirectly,
  createResearchRunner,
  getResearchPreset,
  renderReportDocument,
  type ResearchPresetId,
  type ResearchResult,
} from "@fathom/research-graphs";

import type { Container } from "@/bootstrap/container";
import { EVENT_NAMES, observeResearchEvent } from "@/shared/observability";

export type RunResearchDeps = Pick<
  Container,
  "log" | "chatModel" | "researchToolsFor"
> & {
  reportWriter: ReturnType<Container["reportWriterFor"]>;
};

export interface RunResearchInput {
  presetId: ResearchPresetId;
  query: string;
  maxSteps: number;
  maxResultChars?: number;
  /** Also save a tool-less answer for comparison */
  baseline?: boolean;
  signal?: AbortSignal;
  runId?: string;
  onEvent?: (event: AiEvent) => void;
}

export type BaselineOutcome =
  | { ok: true; path: string }
  | { ok: false; error: ResearchErrorCode };

export interface RunResearchOutcome {
  result: ResearchResult;
  /** null when the run failed and nothing was written */
  reportPath: string | null;
  /** null when no baseline was requested */
  baseline: BaselineOutcome | null;
}

export async function runResearch(
  deps: RunResearchDeps,
  input: RunResearchInput
): Promise<RunResearchOutcome> {
  const preset = getResearchPreset(input.presetId);
  const createTools = deps.researchToolsFor(preset);
  const log = deps.log.child({
    preset: preset.id,
    ...(input.runId !== undefined && { runId: input.runId }),
  });

  const { stream, final } = createResearchRunner({
    model: deps.chatModel,
    createTools,
    request: {
      query: input.query,
      systemPrompt: preset.systemPrompt,
      maxSteps: input.maxSteps,
      ...(input.signal && { signal: input.signal }),
      ...(input.runId !== undefined && { runId: input.runId }),
      ...(input.maxResultChars !== undefined && {
        maxResultChars: input.maxResultChars,
      }),
    },
    logger: log,
    observe: observeResearchEvent,
  });

  for await (const event of stream) {
    input.onEvent?.(event);
  }
  const result = await final;

  let reportPath: string | null = null;
  if (result.ok) {
    reportPath = await deps.reportWriter.write({
      fileName: preset.outputFile,
      content: renderReportDocument(
        preset.reportTitle,
        preset.queryLabel,
        input.query,
        result.report.body
      ),
    });
    log.info(
      {
        event: EVENT_NAMES.RESEARCH_REPORT_WRITTEN,
        file: preset.outputFile,
        selection: result.report.selection,
      },
      EVENT_NAMES.RESEARCH_REPORT_WRITTEN
    );
  }

  const baseline = input.baseline
    ? await writeBaseline(deps, input, log)
    : null;

  return { result, reportPath, baseline };
}

async function writeBaseline(
  deps: RunResearchDeps,
  input: RunResearchInput,
  log: RunResearchDeps["log"]
): Promise<BaselineOutcome> {
  const preset = getResearchPreset(input.presetId);
  try {
    const answer = await answerDirectly(deps.chatModel, input.query, input.signal);
    const path = await deps.reportWriter.write({
      fileName: preset.baselineFile,
      content: renderReportDocument(
        preset.baselineTitle,
        preset.queryLabel,
        input.query,
        answer
      ),
    });
    log.info(
      {
        event: EVENT_NAMES.RESEARCH_BASELINE_WRITTEN,
        file: preset.baselineFile,
      },
      EVENT_NAMES.RESEARCH_BASELINE_WRITTEN
    );
    return { ok: true, path };
  } catch (error) {
    const code = normalizeErrorToResearchCode(error);
    log.error(
      { event: EVENT_NAMES.RESEARCH_RUN_FAILED, errorCode: code, err: error },
      "baseline answer failed"
    );
    return { ok: false, error: code };
  }
}
