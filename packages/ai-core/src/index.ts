// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-core`
 * Purpose: Barrel export for framework-agnostic research primitives.
 * Scope: Re-exports all public types from submodules. Does NOT implement logic.
 * Invariants: SINGLE_SOURCE_OF_TRUTH - these are the canonical definitions.
 * Side-effects: none
 * Links: conversation/, tooling/, execution/
 * @public
 */

// Conversation model
export {
  type AppendOutcome,
  type AuthoredText,
  appendMessages,
  authoredTexts,
  conversationReducer,
  createConversation,
  pendingRequests,
  usedRequestIds,
} from "./conversation/conversation";
export type {
  AssistantTextMessage,
  Conversation,
  Message,
  ModelTurn,
  ToolFailureResult,
  ToolInvocationMessage,
  ToolOutcomeMessage,
  ToolRequest,
  ToolResult,
  ToolSuccess,
  UserTextMessage,
} from "./conversation/model";
// Event types
export type {
  AiEvent,
  AssistantFinalEvent,
  DoneEvent,
  ErrorEvent,
  StatusEvent,
  StepEvent,
  SubConversationStartEvent,
  ToolCallResultEvent,
  ToolCallStartEvent,
} from "./events/ai-events";
// Error taxonomy
export {
  ConfigurationError,
  type ConfigurationErrorMeta,
  isConfigurationError,
  isResearchError,
  isResearchErrorCode,
  normalizeErrorToResearchCode,
  RESEARCH_ERROR_CODES,
  ResearchError,
  type ResearchErrorCode,
} from "./execution/error-codes";
export {
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  type LlmErrorKind,
  readHttpStatus,
  toLlmError,
} from "./execution/llm-errors";
// Tool registry
export type { ToolSourcePort } from "./tooling/ports/tool-source.port";
export {
  createStaticToolSource,
  StaticToolSource,
} from "./tooling/sources/static.source";
export { isToolFailure, ToolFailure } from "./tooling/tool-failure";
export {
  createToolRunner,
  DEFAULT_TOOL_RESULT_MAX_CHARS,
  DEFAULT_TOOL_TIMEOUT_MS,
  generateToolCallId,
  type ToolExecOptions,
  type ToolRunner,
  type ToolRunnerConfig,
} from "./tooling/tool-runner";
export {
  boundPayloadText,
  boundRecordText,
  isTruncated,
  TRUNCATION_MARKER,
  type TruncatedText,
  truncateText,
} from "./tooling/truncate";
export type {
  BoundToolRuntime,
  EmitAiEvent,
  ParseableSchema,
  ToolEffect,
  ToolErrorCode,
  ToolExecResult,
  ToolInvocationContext,
  ToolRedactionConfig,
  ToolSpec,
} from "./tooling/types";
// Claim validation model
export {
  CLAIM_CONFIDENCE_LEVELS,
  CLAIM_VERDICTS,
  type Citation,
  type Claim,
  type ClaimConfidence,
  type ClaimVerdict,
} from "./validation/claim";
