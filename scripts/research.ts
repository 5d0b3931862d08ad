#!/usr/bin/env tsx
// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@scripts/research`
 * Purpose: Command-line entry point for running a research preset and saving its report.
 * Scope: Argument handling, process signals and exit codes. Research logic lives in features/research.
 * Invariants: Exit 0 when a report was written; 1 on configuration or run failure; 2 on bad arguments.
 * Side-effects: IO (stdout/stderr, report files, network via the container's adapters)
 * Notes: Ctrl-C aborts the run; the partial conversation still yields a report where possible.
 * Links: src/features/research/run-research.ts, src/features/research/cli-args.ts
 * @internal
 */

import { isConfigurationError } from "@fathom/ai-core";
import { formatTally } from "@fathom/research-graphs";

import { getContainer } from "@/bootstrap/container";
import { parseResearchArgs, RESEARCH_USAGE } from "@/features/research/cli-args";
import { runResearch } from "@/features/research/run-research";

async function main(): Promise<number> {
  const parsed = parseResearchArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(`❌ ${parsed.error}`);
    console.error(RESEARCH_USAGE);
    return 2;
  }
  const { args } = parsed;

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  try {
    const container = getContainer();
    const outcome = await runResearch(
      {
        log: container.log,
        chatModel: container.chatModel,
        researchToolsFor: container.researchToolsFor,
        reportWriter: container.reportWriterFor(args.outDir),
      },
      {
        presetId: args.presetId,
        query: args.query,
        maxSteps: args.maxSteps ?? container.env.RESEARCH_MAX_STEPS,
        maxResultChars: container.env.TOOL_RESULT_MAX_CHARS,
        baseline: args.baseline,
        signal: controller.signal,
      }
    );

    const { result } = outcome;
    if (!result.ok) {
      console.error(`❌ Research run failed (${result.error}): ${result.errorMessage}`);
      console.error(`   ${formatTally(result.tally)}`);
      return 1;
    }

    console.log(`✅ Report saved to ${outcome.reportPath}`);
    console.log(`   Ended: ${result.termination}`);
    console.log(`   ${formatTally(result.tally)}`);
    if (outcome.baseline?.ok) {
      console.log(`   Baseline saved to ${outcome.baseline.path}`);
    } else if (outcome.baseline) {
      console.error(`   Baseline failed (${outcome.baseline.error})`);
    }
    return 0;
  } catch (error) {
    if (isConfigurationError(error)) {
      console.error("❌ Configuration error");
      console.error(`   ${error.message}`);
      if (error.meta.missing.length > 0) {
        console.error(`   Missing variables: ${error.meta.missing.join(", ")}`);
      }
      if (error.meta.invalid.length > 0) {
        console.error(`   Invalid variables: ${error.meta.invalid.join(", ")}`);
      }
      return 1;
    }
    throw error;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("❌ Unexpected error during research run");
    console.error(error);
    process.exitCode = 1;
  }
);
