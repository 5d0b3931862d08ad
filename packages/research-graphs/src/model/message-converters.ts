// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/model/message-converters`
 * Purpose: Convert between the domain Conversation and LangChain BaseMessages.
 * Scope: Pure converters. Does not call models.
 * Invariants:
 *   - A tool_invocation maps to one AIMessage carrying every tool call
 *   - A tool_outcome maps to one ToolMessage per result, keyed by requestId
 *   - Failures are serialized as `{ error, errorCode, ...details }` so the model can react
 * Side-effects: none
 * Links: langchain-chat-model.ts
 * @public
 */

import type {
  Conversation,
  Message,
  ModelTurn,
  ToolRequest,
  ToolResult,
} from "@fathom/ai-core";
import { generateToolCallId } from "@fathom/ai-core";
import {
  AIMessage,
  type AIMessageChunk,
  type BaseMessage,
  HumanMessage,
  type MessageContent,
  SystemMessage,
  ToolMessage,
} from "@langchain/core/messages";

/**
 * Serialize a ToolResult into the text a ToolMessage carries.
 */
export function renderToolResult(result: ToolResult): string {
  if (result.ok) return JSON.stringify(result.value);
  return JSON.stringify({
    error: result.safeMessage,
    errorCode: result.errorCode,
    ...(result.details ?? {}),
  });
}

function toBaseMessages(message: Message): BaseMessage[] {
  switch (message.kind) {
    case "user_text":
      return [new HumanMessage({ content: message.text })];
    case "assistant_text":
      return [new AIMessage({ content: message.text })];
    case "tool_invocation":
      return [
        new AIMessage({
          content: message.text ?? "",
          tool_calls: message.requests.map((request) => ({
            id: request.requestId,
            name: request.toolName,
            args: { ...request.arguments },
            type: "tool_call" as const,
          })),
        }),
      ];
    case "tool_outcome":
      return message.results.map(
        (result) =>
          new ToolMessage({
            content: renderToolResult(result),
            tool_call_id: result.requestId,
            name: result.toolName,
          })
      );
    default: {
      const _exhaustive: never = message;
      throw new Error(`Unknown message kind: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/**
 * Convert a conversation to LangChain messages, optionally led by a system prompt.
 */
export function toLangChainMessages(
  conversation: Conversation,
  systemPrompt?: string
): BaseMessage[] {
  const messages = conversation.flatMap(toBaseMessages);
  return systemPrompt
    ? [new SystemMessage({ content: systemPrompt }), ...messages]
    : messages;
}

/**
 * Flatten LangChain message content to plain text (text parts only).
 */
export function contentText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .filter(
      (part): part is { type: "text"; text: string } =>
        typeof part === "object" &&
        part !== null &&
        "type" in part &&
        part.type === "text" &&
        "text" in part &&
        typeof part.text === "string"
    )
    .map((part) => part.text)
    .join("");
}

function toArguments(args: unknown): Readonly<Record<string, unknown>> {
  if (typeof args !== "object" || args === null || Array.isArray(args)) {
    return {};
  }
  return Object.fromEntries(Object.entries(args));
}

/**
 * Convert a model response to one ModelTurn.
 * Missing or repeated tool-call ids are replaced so requestIds stay unique
 * across the conversation.
 */
export function toModelTurn(
  response: AIMessage | AIMessageChunk,
  usedIds: ReadonlySet<string>
): ModelTurn {
  const text = contentText(response.content).trim();
  const toolCalls = response.tool_calls ?? [];

  if (toolCalls.length === 0) {
    return { kind: "assistant_text", text };
  }

  const seen = new Set(usedIds);
  const requests: ToolRequest[] = toolCalls.map((call) => {
    let requestId = call.id ?? "";
    while (requestId === "" || seen.has(requestId)) {
      requestId = generateToolCallId();
    }
    seen.add(requestId);
    return {
      toolName: call.name,
      arguments: toArguments(call.args),
      requestId,
    };
  });

  return text.length > 0
    ? { kind: "tool_invocation", requests, text }
    : { kind: "tool_invocation", requests };
}
