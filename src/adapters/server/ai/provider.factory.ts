// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/provider.factory`
 * Purpose: Select and configure the ChatProvider named by AI_PROVIDER.
 * Scope: Reads the validated env; checks the selected provider's secrets. Does not perform IO.
 * Invariants: Missing credentials for the selected provider fail here, before any request.
 * Side-effects: none
 * Links: bootstrap/container.ts, shared/env
 * @internal
 */

import type { ChatProvider } from "@/ports";
import {
  assertProviderSecrets,
  EnvValidationError,
  type ServerEnv,
} from "@/shared/env";
import type { Logger } from "@/shared/observability";

import { AnthropicChatAdapter } from "./anthropic.adapter";
import { OllamaChatAdapter } from "./ollama.adapter";
import { OpenAiChatAdapter } from "./openai.adapter";

export type ChatProviderEnv = Pick<
  ServerEnv,
  | "AI_PROVIDER"
  | "OPENAI_API_KEY"
  | "OPENAI_BASE_URL"
  | "OPENAI_MODEL"
  | "ANTHROPIC_API_KEY"
  | "ANTHROPIC_BASE_URL"
  | "ANTHROPIC_MODEL"
  | "OLLAMA_URL"
  | "OLLAMA_MODEL"
  | "LLM_TIMEOUT_MS"
  | "AGENT_MAX_TOOL_ROUNDS"
>;

function requireKey(name: string, value: string | undefined): string {
  if (!value) {
    throw new EnvValidationError({
      code: "INVALID_ENV",
      missing: [name],
      invalid: [],
    });
  }
  return value;
}

export function createChatProvider(
  env: ChatProviderEnv,
  logger: Logger
): ChatProvider {
  // Validate runtime secrets at adapter boundary (not in serverEnv)
  assertProviderSecrets(env);

  const shared = {
    timeoutMs: env.LLM_TIMEOUT_MS,
    maxToolRounds: env.AGENT_MAX_TOOL_ROUNDS,
  };

  switch (env.AI_PROVIDER) {
    case "openai":
      return new OpenAiChatAdapter({
        ...shared,
        apiKey: requireKey("OPENAI_API_KEY", env.OPENAI_API_KEY),
        baseUrl: env.OPENAI_BASE_URL,
        model: env.OPENAI_MODEL,
        logger: logger.child({ component: "OpenAiChatAdapter" }),
      });
    case "anthropic":
      return new AnthropicChatAdapter({
        ...shared,
        apiKey: requireKey("ANTHROPIC_API_KEY", env.ANTHROPIC_API_KEY),
        baseUrl: env.ANTHROPIC_BASE_URL,
        model: env.ANTHROPIC_MODEL,
        logger: logger.child({ component: "AnthropicChatAdapter" }),
      });
    case "ollama":
      return new OllamaChatAdapter({
        ...shared,
        baseUrl: env.OLLAMA_URL,
        model: env.OLLAMA_MODEL,
        logger: logger.child({ component: "OllamaChatAdapter" }),
      });
  }
}
