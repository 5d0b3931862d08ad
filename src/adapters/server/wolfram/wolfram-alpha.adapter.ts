// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/wolfram/wolfram-alpha.adapter`
 * Purpose: Wolfram|Alpha Full Results API adapter implementing MathEngineCapability.
 * Scope: One GET per query with JSON output. Does NOT rewrite input (rewrite_for_wolfram does).
 * Invariants:
 *   - AUTH_VIA_ADAPTER: appid resolved from config; never logged, never in failure details
 *   - POD_ORDER: pods and subpod plaintexts keep provider order; empty plaintexts dropped
 *   - success=false is returned as a value; the wolfram_query tool maps it to provider_error
 * Side-effects: IO (HTTP requests to api.wolframalpha.com)
 * Links: packages/ai-tools/src/tools/wolfram-query.ts
 * @internal
 */

import type {
  MathEngineCapability,
  MathEngineResult,
  MathPod,
} from "@fathom/ai-tools";
import type { Logger } from "pino";
import { z } from "zod";

import { EVENT_NAMES, makeLogger } from "@/shared/observability";

import {
  type ProviderCall,
  providerGet,
  readProviderJson,
} from "../http/provider-fetch";

export const WOLFRAM_QUERY_ENDPOINT = "https://api.wolframalpha.com/v2/query";

const DidYouMeanSchema = z.object({ val: z.string() });

const WolframResponseSchema = z.object({
  queryresult: z.object({
    success: z.boolean(),
    // false when fine, an object with a message otherwise
    error: z
      .union([z.boolean(), z.object({ msg: z.string().optional() })])
      .optional(),
    pods: z
      .array(
        z.object({
          title: z.string().default(""),
          subpods: z
            .array(z.object({ plaintext: z.string().nullish() }))
            .default([]),
        })
      )
      .default([]),
    didyoumeans: z
      .union([DidYouMeanSchema, z.array(DidYouMeanSchema)])
      .optional(),
  }),
});

type QueryResult = z.output<typeof WolframResponseSchema>["queryresult"];

function firstSuggestion(result: QueryResult): string | undefined {
  const dym = result.didyoumeans;
  if (dym === undefined) return undefined;
  return Array.isArray(dym) ? dym[0]?.val : dym.val;
}

function errorMessage(result: QueryResult): string | undefined {
  if (typeof result.error === "object") {
    return result.error.msg ?? "Wolfram Alpha reported an error";
  }
  return undefined;
}

export function toMathEngineResult(result: QueryResult): MathEngineResult {
  const pods: MathPod[] = result.pods.map((pod) => ({
    title: pod.title,
    plaintexts: pod.subpods
      .map((subpod) => subpod.plaintext?.trim() ?? "")
      .filter((text) => text.length > 0),
  }));
  const error = errorMessage(result);
  const didYouMean = firstSuggestion(result);
  return {
    success: result.success,
    pods,
    ...(error !== undefined && { error }),
    ...(didYouMean !== undefined && { didYouMean }),
  };
}

export interface WolframAlphaConfig {
  appId: string;
  logger?: Logger;
}

export class WolframAlphaAdapter implements MathEngineCapability {
  private readonly appId: string;
  private readonly logger: Logger;

  constructor(config: WolframAlphaConfig) {
    this.appId = config.appId;
    this.logger =
      config.logger ?? makeLogger({ component: "WolframAlphaAdapter" });
  }

  async query(params: {
    readonly input: string;
    readonly signal: AbortSignal;
  }): Promise<MathEngineResult> {
    const url = new URL(WOLFRAM_QUERY_ENDPOINT);
    url.searchParams.set("input", params.input);
    url.searchParams.set("appid", this.appId);
    url.searchParams.set("output", "json");
    url.searchParams.set("format", "plaintext");

    const call: ProviderCall = {
      dep: "wolfram",
      event: EVENT_NAMES.ADAPTER_WOLFRAM_ERROR,
      logger: this.logger,
      signal: params.signal,
      headers: { Accept: "application/json" },
      details: { query: params.input },
    };
    const response = await providerGet(url.toString(), call);
    const data = await readProviderJson(response, WolframResponseSchema, call);
    return toMathEngineResult(data.queryresult);
  }
}
