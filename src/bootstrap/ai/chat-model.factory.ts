// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/ai/chat-model.factory`
 * Purpose: Build the run's ChatModelPort from server env (OpenAI-compatible endpoint or Azure OpenAI).
 * Scope: Provider selection and construction only. Does NOT invoke the model.
 * Invariants:
 *   - NO_SECRETS_IN_CONTEXT: keys go to the LangChain client, never into prompts, events or logs
 *   - Azure credentials are validated by serverEnv() before this runs
 * Side-effects: none (construction only)
 * Links: packages/research-graphs/src/model/langchain-chat-model.ts, src/shared/env/server.ts
 * @internal
 */

import { ConfigurationError } from "@fathom/ai-core";
import { type ChatModelPort, LangChainChatModel } from "@fathom/research-graphs";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { AzureChatOpenAI, ChatOpenAI } from "@langchain/openai";

import type { ServerEnv } from "@/shared/env";

export function createLangChainModel(env: ServerEnv): BaseChatModel {
  if (env.LLM_PROVIDER === "azure_openai") {
    const { AZURE_OPENAI_API_KEY: apiKey, AZURE_OPENAI_ENDPOINT: endpoint } =
      env;
    if (!apiKey || !endpoint) {
      throw new ConfigurationError(
        "Azure OpenAI requires AZURE_OPENAI_API_KEY and AZURE_OPENAI_ENDPOINT",
        {
          missing: [
            ...(apiKey ? [] : ["AZURE_OPENAI_API_KEY"]),
            ...(endpoint ? [] : ["AZURE_OPENAI_ENDPOINT"]),
          ],
        }
      );
    }
    return new AzureChatOpenAI({
      azureOpenAIApiKey: apiKey,
      azureOpenAIEndpoint: endpoint,
      azureOpenAIApiDeploymentName: env.AZURE_OPENAI_DEPLOYMENT_NAME,
      azureOpenAIApiVersion: env.AZURE_OPENAI_API_VERSION,
      temperature: env.LLM_TEMPERATURE,
    });
  }

  return new ChatOpenAI({
    model: env.LLM_MODEL,
    temperature: env.LLM_TEMPERATURE,
    configuration: { baseURL: env.LLM_BASE_URL },
    apiKey: env.LLM_API_KEY,
  });
}

export function createChatModel(env: ServerEnv): ChatModelPort {
  return new LangChainChatModel(createLangChainModel(env));
}

/** Human-readable model label for startup logs. Never includes credentials. */
export function describeChatModel(env: ServerEnv): string {
  return env.LLM_PROVIDER === "azure_openai"
    ? `azure_openai:${env.AZURE_OPENAI_DEPLOYMENT_NAME}`
    : `openai_compatible:${env.LLM_MODEL}@${env.LLM_BASE_URL}`;
}
