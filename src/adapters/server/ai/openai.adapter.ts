// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/openai`
 * Purpose: OpenAI chat-completions implementation of ChatProvider with its own tool-calling loop.
 * Scope: Translates history and catalog to the chat-completions wire format, executes requested tools, resubmits. Does not manage sessions.
 * Invariants:
 *   - Never logs prompts/keys/tool payloads; only bounded metadata (round, counts, duration)
 *   - tool_calls[].function.arguments is a JSON string; unparsable or non-object → {} with a warning
 *   - A response with no tool calls is terminal
 * Side-effects: IO (HTTP calls to /v1/chat/completions)
 * Links: ChatProvider port, llm-http.ts
 * @internal
 */

import { z } from "zod";

import {
  type Message,
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

// ─────────────────────────────────────────────────────────────────────────────
// Wire schemas
// ─────────────────────────────────────────────────────────────────────────────

const OpenAiToolCallSchema = z
  .object({
    id: z.string(),
    type: z.literal("function").optional(),
    function: z.object({
      name: z.string(),
      arguments: z.string().default(""),
    }),
  })
  .passthrough();

const OpenAiAssistantMessageSchema = z
  .object({
    role: z.literal("assistant"),
    content: z.string().nullable().optional(),
    tool_calls: z.array(OpenAiToolCallSchema).nullable().optional(),
  })
  .passthrough();

const OpenAiResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: OpenAiAssistantMessageSchema,
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
});

type OpenAiAssistantMessage = z.infer<typeof OpenAiAssistantMessageSchema>;

type OpenAiWireMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: {
        id: string;
        type: "function";
        function: { name: string; arguments: string };
      }[];
    }
  | { role: "tool"; tool_call_id: string; content: string }
  | OpenAiAssistantMessage;

interface OpenAiToolDefinition {
  type: "function";
  function: ActionDefinition;
}

// ─────────────────────────────────────────────────────────────────────────────
// Translation
// ─────────────────────────────────────────────────────────────────────────────

function toWireMessage(message: Message): OpenAiWireMessage {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: message.content };
    case "assistant":
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: message.content === "" ? null : message.content,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: JSON.stringify(call.args) },
          })),
        };
      }
      return { role: "assistant", content: message.content };
    case "tool":
      return {
        role: "tool",
        tool_call_id: message.toolCallId,
        content: serializeToolResult(message.content),
      };
  }
}

function toWireTool(definition: ActionDefinition): OpenAiToolDefinition {
  return {
    type: "function",
    function: {
      name: definition.name,
      description: definition.description,
      parameters: definition.parameters,
    },
  };
}

export interface OpenAiAdapterConfig extends ChatAdapterConfig {
  readonly apiKey: string;
}

export class OpenAiChatAdapter implements ChatProvider {
  readonly providerId = "openai" as const;
  readonly model: string;

  constructor(private readonly config: OpenAiAdapterConfig) {
    this.model = config.model;
  }

  async send(
    history: readonly Message[],
    catalog: readonly ActionDefinition[],
    executor: ToolExecutor
  ): Promise<ProviderReply> {
    const { logger, maxToolRounds } = this.config;
    const messages: OpenAiWireMessage[] = history.map(toWireMessage);
    const tools = catalog.map(toWireTool);
    const turns: ProviderTurn[] = [];
    let rounds = 0;

    for (;;) {
      const startedAt = Date.now();
      const data = await postForJson({
        provider: "OpenAI",
        url: `${this.config.baseUrl}/v1/chat/completions`,
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        body: {
          model: this.model,
          messages,
          ...(tools.length > 0 ? { tools, tool_choice: "auto" } : {}),
        },
        timeoutMs: this.config.timeoutMs,
        schema: OpenAiResponseSchema,
      });

      const [choice] = data.choices;
      const reply = choice?.message;
      const toolCalls = reply?.tool_calls ?? [];
      const text = reply?.content ?? "";

      logger.info(
        {
          model: this.model,
          round: rounds,
          finishReason: choice?.finish_reason ?? undefined,
          toolCalls: toolCalls.length,
          durationMs: Date.now() - startedAt,
        },
        EVENT_NAMES.ADAPTER_OPENAI_ROUND
      );

      if (!reply || toolCalls.length === 0) {
        return { text, turns };
      }
      if (isRoundCapReached(rounds, maxToolRounds)) {
        throw new ToolLoopLimitError(this.providerId, maxToolRounds);
      }
      rounds += 1;

      // The backend-native assistant turn goes back verbatim
      messages.push(reply);

      const requests: ToolCallRequest[] = toolCalls.map((call) => {
        const { args, ok } = decodeToolArgs(call.function.arguments);
        if (!ok) {
          logger.warn(
            { tool: call.function.name, argsLength: call.function.arguments.length },
            EVENT_NAMES.ADAPTER_LLM_ARGS_UNPARSABLE
          );
        }
        return { id: call.id, name: call.function.name, args };
      });
      turns.push({ role: "assistant", content: text, toolCalls: requests });

      for (const request of requests) {
        const result = await executor(request.name, request.args);
        messages.push({
          role: "tool",
          tool_call_id: request.id,
          content: serializeToolResult(result),
        });
        turns.push({
          role: "tool",
          toolCallId: request.id,
          name: request.name,
          content: result,
        });
      }
    }
  }
}
