// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core/tooling/tool-runner`
 * Purpose: Tool execution and batch dispatch with AiEvent emission, deadlines, and payload bounding.
 * Scope: Sole owner of toolCallId generation and the exec pipeline. Does not import Zod or LangChain.
 * Invariants:
 *   - ENGINE_USES_TOOLRUNNER_ONLY: The conversation engine invokes tools exclusively through this runner
 *   - TOOLCALL_ID_STABLE: Same toolCallId across start→result (= ToolRequest.requestId)
 *   - TOOLRUNNER_RESULT_SHAPE: Returns {ok:true, value} | {ok:false, errorCode, safeMessage}
 *   - TOOLRUNNER_PIPELINE_ORDER: lookup → validate args → emit start → exec (deadline + signal) → validate result → redact → bound text → emit result → return
 *   - SELF_BOUNDED_UNTOUCHED: tools with boundsOwnOutput skip the text bound, so their reported lengths stay true
 *   - EXEC_FAILURE_DETAILS: a tool's failureDetails are merged under the details of every exec failure, timeouts included
 *   - NEVER_THROWS: Every failure, including unknown tools and timeouts, becomes a Failure result
 *   - BATCH_BIJECTION: dispatchBatch returns exactly one result per request, matched by requestId
 *   - BATCH_COMPLETE: dispatchBatch resolves only after every member has settled or timed out
 * Side-effects: none (AiEvent emission via injected callback)
 * Links: @fathom/ai-tools, conversation/model.ts
 * @public
 */

import type { ToolRequest, ToolResult } from "../conversation/model";
import type {
  ToolCallResultEvent,
  ToolCallStartEvent,
} from "../events/ai-events";
import type { ToolSourcePort } from "./ports/tool-source.port";
import { isToolFailure } from "./tool-failure";
import { boundRecordText } from "./truncate";
import type { EmitAiEvent, ToolErrorCode, ToolExecResult } from "./types";

/** Charset for provider-compatible tool call IDs */
const TOOL_ID_CHARS =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

/** Generate 9-char alphanumeric tool call ID (provider-compatible) */
export function generateToolCallId(): string {
  const bytes = new Uint8Array(9);
  crypto.getRandomValues(bytes);
  let id = "";
  for (const b of bytes) id += TOOL_ID_CHARS[b % TOOL_ID_CHARS.length];
  return id;
}

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;
export const DEFAULT_TOOL_RESULT_MAX_CHARS = 8_000;

export interface ToolExecOptions {
  /** Model-provided tool call ID (generated when absent) */
  readonly modelToolCallId?: string;
  /** Caller cancellation; combined with the tool's own deadline */
  readonly signal?: AbortSignal;
}

export interface ToolRunnerConfig {
  /** Run correlation id passed to tools */
  readonly runId?: string;
  /** Deadline for tools that declare none */
  readonly defaultTimeoutMs?: number;
  /** Upper bound on every string in a successful payload (unless the tool bounds its own) */
  readonly maxResultChars?: number;
  /** Label attached to emitted events (sub-conversations) */
  readonly scope?: string;
}

class DeadlineExceeded extends Error {
  constructor(toolName: string, timeoutMs: number) {
    super(`Tool '${toolName}' timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

class CallerAborted extends Error {
  constructor(toolName: string) {
    super(`Tool '${toolName}' was cancelled`);
    this.name = "AbortError";
  }
}

/**
 * Run `task` until it settles, the deadline passes, or the caller aborts.
 * The controller handed to `task` is aborted in the latter two cases.
 */
async function withDeadline<T>(
  toolName: string,
  timeoutMs: number,
  callerSignal: AbortSignal | undefined,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let rejectInterruption: (reason: Error) => void = () => undefined;
  const interruption = new Promise<never>((_, reject) => {
    rejectInterruption = reject;
  });
  const interrupt = (error: Error): void => {
    controller.abort(error);
    rejectInterruption(error);
  };

  const timer = setTimeout(
    () => interrupt(new DeadlineExceeded(toolName, timeoutMs)),
    timeoutMs
  );
  const onCallerAbort = (): void => interrupt(new CallerAborted(toolName));
  if (callerSignal?.aborted) onCallerAbort();
  else callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    return await Promise.race([task(controller.signal), interruption]);
  } finally {
    clearTimeout(timer);
    callerSignal?.removeEventListener("abort", onCallerAbort);
  }
}

function classifyExecError(error: unknown): {
  errorCode: ToolErrorCode;
  details?: Readonly<Record<string, unknown>>;
} {
  if (isToolFailure(error)) {
    return error.details
      ? { errorCode: error.errorCode, details: error.details }
      : { errorCode: error.errorCode };
  }
  if (error instanceof Error && error.name === "TimeoutError") {
    return { errorCode: "timeout" };
  }
  if (error instanceof Error && error.name === "AbortError") {
    return { errorCode: "aborted" };
  }
  return { errorCode: "execution" };
}

/**
 * Create a tool runner over the given tool source.
 * The runner executes tools and emits AiEvents via the provided callback.
 */
export function createToolRunner(
  source: ToolSourcePort,
  emit: EmitAiEvent,
  config?: ToolRunnerConfig
) {
  const runId = config?.runId ?? "toolrunner_default";
  const defaultTimeoutMs = config?.defaultTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  const maxResultChars =
    config?.maxResultChars ?? DEFAULT_TOOL_RESULT_MAX_CHARS;
  const scope = config?.scope;

  /**
   * Execute one tool by name. Follows TOOLRUNNER_PIPELINE_ORDER; never throws.
   */
  async function exec(
    toolName: string,
    rawArgs: unknown,
    options?: ToolExecOptions
  ): Promise<ToolExecResult> {
    const toolCallId = options?.modelToolCallId ?? generateToolCallId();
    const startedAt = performance.now();

    const fail = (
      errorCode: ToolErrorCode,
      safeMessage: string,
      details?: Readonly<Record<string, unknown>>
    ): ToolExecResult => {
      const errorEvent: ToolCallResultEvent = {
        type: "tool_call_result",
        toolCallId,
        toolName,
        result: { error: safeMessage, errorCode },
        isError: true,
        durationMs: performance.now() - startedAt,
        ...(scope !== undefined && { scope }),
      };
      emit(errorEvent);
      return details
        ? { ok: false, errorCode, safeMessage, details }
        : { ok: false, errorCode, safeMessage };
    };

    // 1. Lookup
    const boundTool = source.getBoundTool(toolName);
    if (!boundTool) {
      return fail("unknown_tool", `Tool '${toolName}' is not available`);
    }

    // 2. Validate args
    let validatedInput: Record<string, unknown>;
    try {
      validatedInput = boundTool.validateInput(rawArgs);
    } catch (err) {
      const safeMessage =
        err instanceof Error ? err.message : "Invalid tool arguments";
      return fail("validation", safeMessage);
    }

    // 3. Emit start
    const startEvent: ToolCallStartEvent = {
      type: "tool_call_start",
      toolCallId,
      toolName,
      args: validatedInput,
      ...(scope !== undefined && { scope }),
    };
    emit(startEvent);

    // 4. Execute under deadline + caller signal
    const timeoutMs = boundTool.timeoutMs ?? defaultTimeoutMs;
    let rawOutput: unknown;
    try {
      rawOutput = await withDeadline(
        toolName,
        timeoutMs,
        options?.signal,
        (signal) =>
          boundTool.exec(validatedInput, { runId, toolCallId, signal })
      );
    } catch (err) {
      const safeMessage =
        err instanceof Error ? err.message : "Tool execution failed";
      const { errorCode, details } = classifyExecError(err);
      const inputDetails = boundTool.failureDetails?.(validatedInput);
      return fail(
        errorCode,
        safeMessage,
        inputDetails ? { ...inputDetails, ...details } : details
      );
    }

    // 5. Validate result
    let validatedOutput: unknown;
    try {
      validatedOutput = boundTool.validateOutput(rawOutput);
    } catch (err) {
      const safeMessage =
        err instanceof Error ? err.message : "Invalid tool output";
      return fail("validation", safeMessage);
    }

    // 6. Redact
    let redactedOutput: Record<string, unknown>;
    try {
      redactedOutput = boundTool.redact(validatedOutput);
    } catch (err) {
      const safeMessage =
        err instanceof Error ? err.message : "Redaction failed";
      return fail("redaction_failed", safeMessage);
    }

    // 7. Bound text size
    const safeResult = boundTool.boundsOwnOutput
      ? redactedOutput
      : boundRecordText(redactedOutput, maxResultChars);

    // 8. Emit result
    const resultEvent: ToolCallResultEvent = {
      type: "tool_call_result",
      toolCallId,
      toolName,
      result: safeResult,
      durationMs: performance.now() - startedAt,
      ...(scope !== undefined && { scope }),
    };
    emit(resultEvent);

    return { ok: true, value: safeResult };
  }

  /**
   * Execute every request of one model turn concurrently.
   * Results come back in request order, each matched by requestId.
   */
  async function dispatchBatch(
    requests: readonly ToolRequest[],
    options?: { readonly signal?: AbortSignal }
  ): Promise<ToolResult[]> {
    const settled = await Promise.all(
      requests.map(async (request) => {
        const result = await exec(request.toolName, request.arguments, {
          modelToolCallId: request.requestId,
          ...(options?.signal && { signal: options.signal }),
        });
        return { requestId: request.requestId, result };
      })
    );

    const byRequestId = new Map<string, ToolExecResult>();
    for (const { requestId, result } of settled) {
      byRequestId.set(requestId, result);
    }

    return requests.map((request): ToolResult => {
      const result = byRequestId.get(request.requestId);
      if (!result) {
        return {
          ok: false,
          requestId: request.requestId,
          toolName: request.toolName,
          errorCode: "execution",
          safeMessage: `No result recorded for request ${request.requestId}`,
        };
      }
      return result.ok
        ? {
            ok: true,
            requestId: request.requestId,
            toolName: request.toolName,
            value: result.value,
          }
        : {
            ok: false,
            requestId: request.requestId,
            toolName: request.toolName,
            errorCode: result.errorCode,
            safeMessage: result.safeMessage,
            ...(result.details && { details: result.details }),
          };
    });
  }

  return { exec, dispatchBatch };
}

export type ToolRunner = ReturnType<typeof createToolRunner>;
