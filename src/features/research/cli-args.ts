// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/research/cli-args`
 * Purpose: Parse `research <preset> <query…> [--baseline] [--out dir] [--max-steps n]`.
 * Scope: Pure argv parsing. Does not read env or print.
 * Invariants: Remaining positionals after the preset are joined with single spaces into the query.
 * Side-effects: none
 * Links: scripts/research.ts
 * @public
 */

import {
  isResearchPresetId,
  RESEARCH_PRESET_IDS,
  type ResearchPresetId,
} from "@fathom/research-graphs";

export const RESEARCH_USAGE = `Usage: research <${RESEARCH_PRESET_IDS.join("|")}> "<query>" [--baseline] [--out <dir>] [--max-steps <n>]`;

export interface ResearchArgs {
  presetId: ResearchPresetId;
  query: string;
  baseline: boolean;
  outDir: string | undefined;
  maxSteps: number | undefined;
}

export type ParsedResearchArgs =
  | { ok: true; args: ResearchArgs }
  | { ok: false; error: string };

export function parseResearchArgs(argv: readonly string[]): ParsedResearchArgs {
  const positionals: string[] = [];
  let baseline = false;
  let outDir: string | undefined;
  let maxSteps: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--baseline") {
      baseline = true;
    } else if (arg === "--out" || arg === "--max-steps") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        return { ok: false, error: `${arg} needs a value` };
      }
      i++;
      if (arg === "--out") {
        outDir = value;
      } else {
        const n = Number(value);
        if (!Number.isInteger(n) || n < 1) {
          return { ok: false, error: `--max-steps must be a positive integer, got "${value}"` };
        }
        maxSteps = n;
      }
    } else if (arg.startsWith("--")) {
      return { ok: false, error: `Unknown option ${arg}` };
    } else {
      positionals.push(arg);
    }
  }

  const [preset, ...rest] = positionals;
  if (preset === undefined) return { ok: false, error: "Missing preset" };
  if (!isResearchPresetId(preset)) {
    return { ok: false, error: `Unknown preset "${preset}"` };
  }
  const query = rest.join(" ").trim();
  if (query.length === 0) return { ok: false, error: "Missing query" };

  return { ok: true, args: { presetId: preset, query, baseline, outDir, maxSteps } };
}
