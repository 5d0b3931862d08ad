// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs`
 * Purpose: Research orchestration on LangGraph: conversation engine, claim validator, report extraction, runner.
 * Scope: Barrel export. Does NOT read env or construct providers (the app bootstrap does).
 * Invariants:
 *   - Packages depend on LoggerPort, never on the app logger
 * Side-effects: none
 * Links: engine/, validation/, report/, runner/
 * @public
 */

// Engine
export {
  type ConversationEngine,
  type ConversationEngineDeps,
  type ConversationOutcome,
  type ConversationRunInput,
  createConversationEngine,
} from "./engine/conversation-engine";
export {
  type ConversationState,
  ConversationStateAnnotation,
  type ConversationUpdate,
  type TerminationReason,
} from "./engine/state";
// Metrics
export { formatTally, type RunTally, RunTracer } from "./metrics/run-tracer";
// Model
export type { ChatModelInvokeOptions, ChatModelPort } from "./model/chat-model.port";
export { LangChainChatModel } from "./model/langchain-chat-model";
export {
  contentText,
  renderToolResult,
  toLangChainMessages,
  toModelTurn,
} from "./model/message-converters";
// Presets
export {
  getResearchPreset,
  isResearchPresetId,
  RESEARCH_PRESET_IDS,
  RESEARCH_PRESETS,
  renderReportDocument,
  type ResearchPreset,
  type ResearchPresetId,
} from "./presets/presets";
export {
  directAnswerPrompt,
  FACT_CHECKER_PROMPT,
  MATH_RESEARCH_PROMPT,
  mathRewritePrompt,
  VALIDATED_RESEARCH_PROMPT,
  WEB_RESEARCH_PROMPT,
  WIKIPEDIA_RESEARCH_PROMPT,
} from "./presets/prompts";
// Report
export {
  type ExtractReportOptions,
  extractReport,
  REPORT_MARKERS,
  REPORT_MIN_LENGTH,
  type Report,
  type ReportScore,
  type ReportSelection,
  scoreReportCandidate,
  terminationNotice,
} from "./report/report-extractor";
// Rewrite
export { cleanRewrite, createQueryRewriter } from "./rewrite/query-rewriter";
// Runner
export { answerDirectly } from "./runner/direct-answer";
export {
  createResearchRunner,
  describeToolTarget,
  type ResearchRequest,
  type ResearchResult,
  type ResearchRunnerOptions,
} from "./runner/research-runner";
// Runtime
export { AsyncQueue } from "./runtime/async-queue";
export { type LoggerPort, NOOP_LOGGER } from "./runtime/logger.port";
// Validation
export {
  type ClaimValidatorDeps,
  createClaimValidator,
  DEFAULT_FACT_CHECK_MAX_STEPS,
  FACT_CHECK_TOOL_IDS,
  factCheckQuery,
} from "./validation/claim-validator";
export {
  FACT_CHECK_FIELDS,
  type FactCheckBlock,
  parseCitations,
  parseConfidence,
  parseFactCheck,
  parseVerdict,
  parseYesNo,
} from "./validation/fact-check-parser";
export {
  CLAIM_MAX_ROUNDS,
  decideVerdict,
  mergeEvidence,
  type VerdictDecision,
  type VerdictInput,
} from "./validation/verdict-policy";
