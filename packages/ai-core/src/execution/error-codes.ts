// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/execution/error-codes`
 * Purpose: Canonical error codes, error classes, and normalization for research runs.
 * Scope: Single source of truth for the error taxonomy. Does NOT define business logic.
 * Invariants:
 *   - SINGLE_SOURCE_OF_TRUTH: All error codes defined here, imported everywhere else
 *   - ERROR_NORMALIZATION_ONCE: normalizeErrorToResearchCode() is the canonical normalizer
 *   - CONFIGURATION_IS_FATAL: ConfigurationError is thrown before a run starts, never mid-run
 *   - Recognizes ResearchError (.code), ToolFailure (.errorCode) and LlmError (.kind, .status)
 * Side-effects: none
 * Links: llm-errors.ts, tooling/tool-failure.ts
 * @public
 */

import { isToolFailure } from "../tooling/tool-failure";
import { isLlmError } from "./llm-errors";

/**
 * Canonical error codes.
 * - network_error: timeout at transport level, DNS, connection refused, non-2xx status
 * - parse_error: malformed HTML/JSON from a provider
 * - provider_error: upstream reported an unsuccessful or unsupported query
 * - unknown_tool: dispatch could not resolve a requested tool
 * - budget_exceeded: step or round cap reached
 * - configuration_error: missing or invalid configuration (startup only)
 * - timeout: a call exceeded its own deadline
 * - aborted: caller cancelled the run
 * - validation: arguments or outputs failed schema validation
 * - execution: a tool failed for an unclassified reason
 * - rate_limit: provider rate limit (HTTP 429)
 * - internal: anything else
 */
export const RESEARCH_ERROR_CODES = [
  "network_error",
  "parse_error",
  "provider_error",
  "unknown_tool",
  "budget_exceeded",
  "configuration_error",
  "timeout",
  "aborted",
  "validation",
  "execution",
  "rate_limit",
  "internal",
] as const;

export type ResearchErrorCode = (typeof RESEARCH_ERROR_CODES)[number];

export function isResearchErrorCode(x: unknown): x is ResearchErrorCode {
  return RESEARCH_ERROR_CODES.some((code) => code === x);
}

/**
 * Error carrying a structured ResearchErrorCode through call chains.
 */
export class ResearchError extends Error {
  readonly code: ResearchErrorCode;

  constructor(code: ResearchErrorCode, message?: string) {
    super(message ?? `Research run failed: ${code}`);
    this.name = "ResearchError";
    this.code = code;
  }
}

export function isResearchError(error: unknown): error is ResearchError {
  return error instanceof ResearchError;
}

export interface ConfigurationErrorMeta {
  readonly missing: readonly string[];
  readonly invalid: readonly string[];
}

/**
 * Missing or invalid configuration. The only error class that stops a run from starting.
 */
export class ConfigurationError extends ResearchError {
  readonly meta: ConfigurationErrorMeta;

  constructor(message: string, meta?: Partial<ConfigurationErrorMeta>) {
    super("configuration_error", message);
    this.name = "ConfigurationError";
    this.meta = { missing: meta?.missing ?? [], invalid: meta?.invalid ?? [] };
  }
}

export function isConfigurationError(
  error: unknown
): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/**
 * Normalize any error to a stable ResearchErrorCode.
 *
 * Priority:
 * 1. AbortError → "aborted", TimeoutError → "timeout"
 * 2. ResearchError / ToolFailure → carried code
 * 3. LlmError → status first, then kind
 * 4. Default → "internal"
 */
export function normalizeErrorToResearchCode(
  error: unknown
): ResearchErrorCode {
  if (error instanceof Error && error.name === "AbortError") return "aborted";
  if (error instanceof Error && error.name === "TimeoutError") return "timeout";

  if (isResearchError(error)) return error.code;

  if (isToolFailure(error)) {
    return isResearchErrorCode(error.errorCode) ? error.errorCode : "execution";
  }

  if (isLlmError(error)) {
    if (error.status === 429) return "rate_limit";
    if (error.status === 408) return "timeout";

    switch (error.kind) {
      case "rate_limited":
        return "rate_limit";
      case "timeout":
        return "timeout";
      case "aborted":
        return "aborted";
      case "network":
        return "network_error";
      case "provider_4xx":
      case "provider_5xx":
        return "provider_error";
      default:
        return "internal";
    }
  }

  return "internal";
}
