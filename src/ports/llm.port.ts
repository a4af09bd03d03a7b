// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/llm.port`
 * Purpose: Chat provider abstraction for hexagonal architecture.
 * Scope: One implementation per model backend. Each owns its own tool-calling loop. Does not handle sessions.
 * Invariants:
 *   - Only depends on core domain types and the action catalog wire contract
 *   - `turns` holds every intermediate assistant tool request and tool result, in order
 *   - Tool calls within one round run sequentially through the executor
 *   - Transport failures throw LlmError; exceeding the round cap throws ToolLoopLimitError
 * Side-effects: none (interface only)
 * Links: Implemented by adapters/server/ai, used by features/ai/chat-agent
 * @public
 */

import type {
  AssistantMessage,
  Message,
  ToolArgs,
  ToolMessage,
  ToolResult,
} from "@/core";
import type { ActionDefinition } from "@ledgerchat/ai-tools";

export type { Message } from "@/core";

export type ChatProviderId = "openai" | "anthropic" | "ollama" | "fake";

/**
 * Executes one requested action. Never rejects for tool-level failures:
 * those come back as `{success: false}` results for the model to read.
 */
export type ToolExecutor = (name: string, args: ToolArgs) => Promise<ToolResult>;

/** Normalized record of one tool round, appended to history by the agent */
export type ProviderTurn = AssistantMessage | ToolMessage;

export interface ProviderReply {
  /** Terminal answer text */
  readonly text: string;
  readonly turns: readonly ProviderTurn[];
}

export interface ChatProvider {
  readonly providerId: ChatProviderId;
  readonly model: string;

  /**
   * Run the tool-calling loop until the model answers without requesting tools.
   */
  send(
    history: readonly Message[],
    catalog: readonly ActionDefinition[],
    executor: ToolExecutor
  ): Promise<ProviderReply>;
}
