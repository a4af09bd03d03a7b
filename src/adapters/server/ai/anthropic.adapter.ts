// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/anthropic`
 * Purpose: Anthropic Messages API implementation of ChatProvider with its own tool-calling loop.
 * Scope: Translates history and catalog to the Messages wire format, executes tool_use blocks, resubmits. Does not manage sessions.
 * Invariants:
 *   - System messages are concatenated into the top-level `system` field
 *   - All tool results of one round go back as a single user message of tool_result blocks
 *   - Terminal text is the response's text blocks joined with "\n"
 *   - Never logs prompts/keys/tool payloads
 * Side-effects: IO (HTTP calls to /v1/messages)
 * Links: ChatProvider port, llm-http.ts
 * @internal
 */

import { z } from "zod";

import {
  type Message,
  type ToolArgs,
  type ToolCallRequest,
  ToolLoopLimitError,
} from "@/core";
import type {
  ChatProvider,
  ProviderReply,
  ProviderTurn,
  ToolExecutor,
} from "@/ports";
import { EVENT_NAMES } from "@/shared/observability";
import type { ActionDefinition } from "@ledgerchat/ai-tools";

import {
  type ChatAdapterConfig,
  decodeToolArgs,
  isRoundCapReached,
  postForJson,
  serializeToolResult,
} from "./llm-http";

export const ANTHROPIC_VERSION = "2023-06-01";
export const ANTHROPIC_MAX_TOKENS = 4096;

// ─────────────────────────────────────────────────────────────────────────────
// Wire schemas
// ─────────────────────────────────────────────────────────────────────────────

const ContentBlockSchema = z.object({ type: z.string() }).passthrough();

const TextBlockSchema = z.object({
  type: z.literal("text"),
  text: z.string(),
});

const ToolUseBlockSchema = z.object({
  type: z.literal("tool_use"),
  id: z.string(),
  name: z.string(),
  input: z.unknown(),
});

const AnthropicResponseSchema = z.object({
  content: z.array(ContentBlockSchema),
  stop_reason: z.string().nullable().optional(),
});

type ResponseBlock = z.infer<typeof ContentBlockSchema>;

interface ToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content: string;
}

type RequestBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: ToolArgs }
  | ToolResultBlock
  | ResponseBlock;

interface AnthropicWireMessage {
  role: "user" | "assistant";
  content: string | RequestBlock[];
}

interface AnthropicToolDefinition {
  name: string;
  description: string;
  input_schema: ActionDefinition["parameters"];
}

// ─────────────────────────────────────────────────────────────────────────────
// Translation
// ─────────────────────────────────────────────────────────────────────────────

function toWireRequest(history: readonly Message[]): {
  system: string;
  messages: AnthropicWireMessage[];
} {
  const systemParts: string[] = [];
  const messages: AnthropicWireMessage[] = [];
  let pendingResults: ToolResultBlock[] = [];

  const flushResults = (): void => {
    if (pendingResults.length > 0) {
      messages.push({ role: "user", content: pendingResults });
      pendingResults = [];
    }
  };

  for (const message of history) {
    switch (message.role) {
      case "system":
        systemParts.push(message.content);
        break;
      case "tool":
        pendingResults.push({
          type: "tool_result",
          tool_use_id: message.toolCallId,
          content: serializeToolResult(message.content),
        });
        break;
      case "user":
        flushResults();
        messages.push({ role: "user", content: message.content });
        break;
      case "assistant": {
        flushResults();
        const calls = message.toolCalls ?? [];
        if (calls.length > 0) {
          const blocks: RequestBlock[] = [];
          if (message.content !== "") {
            blocks.push({ type: "text", text: message.content });
          }
          for (const call of calls) {
            blocks.push({
              type: "tool_use",
              id: call.id,
              name: call.name,
              input: call.args,
            });
          }
          messages.push({ role: "assistant", content: blocks });
        } else if (message.content !== "") {
          // Empty text blocks are rejected by the API
          messages.push({ role: "assistant", content: message.content });
        }
        break;
      }
    }
  }
  flushResults();

  return { system: systemParts.join("\n\n"), messages };
}

function toWireTool(definition: ActionDefinition): AnthropicToolDefinition {
  return {
    name: definition.name,
    description: definition.description,
    input_schema: definition.parameters,
  };
}

function collectText(blocks: readonly ResponseBlock[]): string {
  const texts: string[] = [];
  for (const block of blocks) {
    const parsed = TextBlockSchema.safeParse(block);
    if (parsed.success) texts.push(parsed.data.text);
  }
  return texts.join("\n");
}

function collectToolUses(
  blocks: readonly ResponseBlock[]
): z.infer<typeof ToolUseBlockSchema>[] {
  const uses: z.infer<typeof ToolUseBlockSchema>[] = [];
  for (const block of blocks) {
    const parsed = ToolUseBlockSchema.safeParse(block);
    if (parsed.success) uses.push(parsed.data);
  }
  return uses;
}

export interface AnthropicAdapterConfig extends ChatAdapterConfig {
  readonly apiKey: string;
}

export class AnthropicChatAdapter implements ChatProvider {
  readonly providerId = "anthropic" as const;
  readonly model: string;

  constructor(private readonly config: AnthropicAdapterConfig) {
    this.model = config.model;
  }

  async send(
    history: readonly Message[],
    catalog: readonly ActionDefinition[],
    executor: ToolExecutor
  ): Promise<ProviderReply> {
    const { logger, maxToolRounds } = this.config;
    const { system, messages } = toWireRequest(history);
    const tools = catalog.map(toWireTool);
    const turns: ProviderTurn[] = [];
    let rounds = 0;

    for (;;) {
      const startedAt = Date.now();
      const data = await postForJson({
        provider: "Anthropic",
        url: `${this.config.baseUrl}/v1/messages`,
        headers: {
          "x-api-key": this.config.apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
        },
        body: {
          model: this.model,
          max_tokens: ANTHROPIC_MAX_TOKENS,
          ...(system !== "" ? { system } : {}),
          messages,
          ...(tools.length > 0 ? { tools } : {}),
        },
        timeoutMs: this.config.timeoutMs,
        schema: AnthropicResponseSchema,
      });

      const toolUses = collectToolUses(data.content);
      const text = collectText(data.content);

      logger.info(
        {
          model: this.model,
          round: rounds,
          stopReason: data.stop_reason ?? undefined,
          toolCalls: toolUses.length,
          durationMs: Date.now() - startedAt,
        },
        EVENT_NAMES.ADAPTER_ANTHROPIC_ROUND
      );

      // stop_reason is only logged; blocks decide whether the turn continues
      if (toolUses.length === 0) {
        return { text, turns };
      }
      if (isRoundCapReached(rounds, maxToolRounds)) {
        throw new ToolLoopLimitError(this.providerId, maxToolRounds);
      }
      rounds += 1;

      // The backend-native content blocks go back verbatim
      messages.push({ role: "assistant", content: data.content });

      const requests: ToolCallRequest[] = toolUses.map((use) => {
        const { args, ok } = decodeToolArgs(use.input);
        if (!ok) {
          logger.warn({ tool: use.name }, EVENT_NAMES.ADAPTER_LLM_ARGS_UNPARSABLE);
        }
        return { id: use.id, name: use.name, args };
      });
      turns.push({ role: "assistant", content: text, toolCalls: requests });

      const results: ToolResultBlock[] = [];
      for (const request of requests) {
        const result = await executor(request.name, request.args);
        results.push({
          type: "tool_result",
          tool_use_id: request.id,
          content: serializeToolResult(result),
        });
        turns.push({
          role: "tool",
          toolCallId: request.id,
          name: request.name,
          content: result,
        });
      }
      messages.push({ role: "user", content: results });
    }
  }
}
