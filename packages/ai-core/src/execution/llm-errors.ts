// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/execution/llm-errors`
 * Purpose: Chat-model adapter error types.
 * Scope: Defines LlmError and helpers. Does not implement normalization (see error-codes.ts).
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at throw site (adapter boundary)
 *   - classifyLlmErrorFromStatus maps HTTP codes to LlmErrorKind
 *   - readHttpStatus reads `.status` off provider SDK errors without trusting their class
 * Side-effects: none
 * Links: error-codes.ts (normalizeErrorToResearchCode)
 * @public
 */

/**
 * Error classification kinds for chat-model failures.
 */
export type LlmErrorKind =
  | "timeout"
  | "rate_limited"
  | "provider_4xx"
  | "provider_5xx"
  | "network"
  | "aborted"
  | "unknown";

/**
 * Typed error for chat-model adapter failures.
 */
export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

/**
 * Classify LlmError kind from HTTP status code.
 */
export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}

/**
 * HTTP status carried by an SDK error, if any.
 */
export function readHttpStatus(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  ) {
    return error.status;
  }
  return undefined;
}

/**
 * Wrap any error thrown by a chat-model client into an LlmError.
 */
export function toLlmError(error: unknown): LlmError {
  if (isLlmError(error)) return error;

  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof Error && error.name === "AbortError") {
    return new LlmError(message, "aborted");
  }

  const status = readHttpStatus(error);
  if (status !== undefined) {
    return new LlmError(message, classifyLlmErrorFromStatus(status), status);
  }

  const connectionFailure =
    message === "fetch failed" ||
    /ECONNREFUSED|ENOTFOUND|ECONNRESET|Connection error/i.test(message);
  return new LlmError(message, connectionFailure ? "network" : "unknown");
}
