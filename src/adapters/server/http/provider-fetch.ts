// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/http/provider-fetch`
 * Purpose: Shared GET + JSON decoding for retrieval provider adapters, with one error log per failure.
 * Scope: Transport and response decoding only. Does not retry and does not own deadlines (the tool runner does).
 * Invariants:
 *   - LOG_ONCE: each failure is logged once with { event, dep, reasonCode, status? } and rethrown
 *   - Non-2xx and transport failures become ToolFailure("network_error"); bad bodies ToolFailure("parse_error")
 *   - Caller-supplied `details` ride on every ToolFailure (model-visible, so never put secrets in them)
 *   - Aborts are rethrown untouched so the runner classifies them as timeout/aborted
 * Side-effects: IO (HTTP requests, logging)
 * Links: searxng, page-fetch, wikipedia, wolfram adapters
 * @internal
 */

import { ToolFailure } from "@fathom/ai-core";
import type { Logger } from "pino";
import type { z } from "zod";

import type { AdapterReasonCode, EventName } from "@/shared/observability";

export interface ProviderCall {
  /** Low-cardinality dependency label, e.g. "searxng" */
  readonly dep: string;
  readonly event: EventName;
  readonly logger: Logger;
  readonly signal: AbortSignal;
  readonly headers?: Readonly<Record<string, string>>;
  readonly details?: Readonly<Record<string, unknown>>;
}

function reason(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error
      ? `${error.message} (${error.cause.message})`
      : error.message;
  }
  return String(error);
}

function logFailure(
  call: ProviderCall,
  reasonCode: AdapterReasonCode,
  status?: number
): void {
  call.logger.error(
    {
      event: call.event,
      dep: call.dep,
      reasonCode,
      ...(status !== undefined && { status }),
    },
    call.event
  );
}

/**
 * GET `url`, returning the response only when it is 2xx.
 * Pass `expect` to let specific statuses through (e.g. 404 meaning "absent").
 */
export async function providerGet(
  url: string,
  call: ProviderCall,
  expect: readonly number[] = []
): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      headers: { ...call.headers },
      signal: call.signal,
    });
  } catch (error) {
    if (call.signal.aborted) {
      logFailure(call, "aborted");
      throw error;
    }
    logFailure(call, "network_error");
    throw new ToolFailure(
      "network_error",
      `Request to ${call.dep} failed: ${reason(error)}`,
      call.details
    );
  }

  if (!response.ok && !expect.includes(response.status)) {
    logFailure(call, "http_error", response.status);
    throw new ToolFailure(
      "network_error",
      `${call.dep} responded with HTTP ${response.status}`,
      { ...call.details, status: response.status }
    );
  }
  return response;
}

/**
 * Read the body as JSON and validate it against `schema`.
 */
export async function readProviderJson<S extends z.ZodTypeAny>(
  response: Response,
  schema: S,
  call: ProviderCall
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    if (call.signal.aborted) throw error;
    logFailure(call, "parse_error", response.status);
    throw new ToolFailure(
      "parse_error",
      `${call.dep} returned a body that is not JSON: ${reason(error)}`,
      call.details
    );
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    logFailure(call, "parse_error", response.status);
    const first = parsed.error.issues[0];
    const where = first ? ` at ${first.path.join(".") || "<root>"}` : "";
    throw new ToolFailure(
      "parse_error",
      `${call.dep} returned an unexpected payload${where}`,
      call.details
    );
  }
  return parsed.data;
}
