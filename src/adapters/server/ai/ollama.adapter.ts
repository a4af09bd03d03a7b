// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/ollama`
 * Purpose: Ollama native /api/chat implementation of ChatProvider with its own tool-calling loop.
 * Scope: Non-streaming requests; tools in function shape; synthesizes call ids. Does not manage sessions.
 * Invariants:
 *   - Ollama assigns no call ids; each call gets a 9-char alphanumeric id
 *   - Tool results go back as {role:"tool", tool_name, content}
 *   - No credentials; never logs prompts or tool payloads
 * Side-effects: IO (HTTP calls to the Ollama server)
 * Links: ChatProvider port, llm-http.ts, shared/ai/tool-call-id.ts
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
import { generateToolCallId } from "@/shared/ai/tool-call-id";
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

const OllamaToolCallSchema = z
  .object({
    function: z.object({
      name: z.string(),
      arguments: z.unknown(),
    }),
  })
  .passthrough();

const OllamaMessageSchema = z
  .object({
    role: z.string(),
    content: z.string().default(""),
    tool_calls: z.array(OllamaToolCallSchema).nullable().optional(),
  })
  .passthrough();

const OllamaResponseSchema = z.object({
  message: OllamaMessageSchema,
  done_reason: z.string().optional(),
});

type OllamaResponseMessage = z.infer<typeof OllamaMessageSchema>;

type OllamaWireMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string;
      tool_calls?: { function: { name: string; arguments: ToolArgs } }[];
    }
  | { role: "tool"; tool_name: string; content: string }
  | OllamaResponseMessage;

// ─────────────────────────────────────────────────────────────────────────────
// Translation
// ─────────────────────────────────────────────────────────────────────────────

function toWireMessage(message: Message): OllamaWireMessage {
  switch (message.role) {
    case "system":
    case "user":
      return { role: message.role, content: message.content };
    case "assistant":
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: message.content,
          tool_calls: message.toolCalls.map((call) => ({
            function: { name: call.name, arguments: call.args },
          })),
        };
      }
      return { role: "assistant", content: message.content };
    case "tool":
      return {
        role: "tool",
        tool_name: message.name,
        content: serializeToolResult(message.content),
      };
  }
}

export class OllamaChatAdapter implements ChatProvider {
  readonly providerId = "ollama" as const;
  readonly model: string;

  constructor(
    private readonly config: ChatAdapterConfig,
    private readonly newToolCallId: () => string = generateToolCallId
  ) {
    this.model = config.model;
  }

  async send(
    history: readonly Message[],
    catalog: readonly ActionDefinition[],
    executor: ToolExecutor
  ): Promise<ProviderReply> {
    const { logger, maxToolRounds } = this.config;
    const messages: OllamaWireMessage[] = history.map(toWireMessage);
    const tools = catalog.map((definition) => ({
      type: "function" as const,
      function: definition,
    }));
    const turns: ProviderTurn[] = [];
    let rounds = 0;

    for (;;) {
      const startedAt = Date.now();
      const data = await postForJson({
        provider: "Ollama",
        url: `${this.config.baseUrl}/api/chat`,
        headers: {},
        body: {
          model: this.model,
          messages,
          stream: false,
          ...(tools.length > 0 ? { tools } : {}),
        },
        timeoutMs: this.config.timeoutMs,
        schema: OllamaResponseSchema,
      });

      const reply = data.message;
      const toolCalls = reply.tool_calls ?? [];

      logger.info(
        {
          model: this.model,
          round: rounds,
          doneReason: data.done_reason,
          toolCalls: toolCalls.length,
          durationMs: Date.now() - startedAt,
        },
        EVENT_NAMES.ADAPTER_OLLAMA_ROUND
      );

      if (toolCalls.length === 0) {
        return { text: reply.content, turns };
      }
      if (isRoundCapReached(rounds, maxToolRounds)) {
        throw new ToolLoopLimitError(this.providerId, maxToolRounds);
      }
      rounds += 1;

      messages.push(reply);

      const requests: ToolCallRequest[] = toolCalls.map((call) => {
        const { args, ok } = decodeToolArgs(call.function.arguments);
        if (!ok) {
          logger.warn(
            { tool: call.function.name },
            EVENT_NAMES.ADAPTER_LLM_ARGS_UNPARSABLE
          );
        }
        return { id: this.newToolCallId(), name: call.function.name, args };
      });
      turns.push({
        role: "assistant",
        content: reply.content,
        toolCalls: requests,
      });

      for (const request of requests) {
        const result = await executor(request.name, request.args);
        messages.push({
          role: "tool",
          tool_name: request.name,
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
