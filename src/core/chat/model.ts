// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/model`
 * Purpose: Domain entities and value objects for the conversation history.
 * Scope: Pure domain types. Does not handle I/O or provider wire shapes.
 * Invariants:
 *   - Message is discriminated on `role`
 *   - A tool message always carries the id of the assistant tool call it answers
 * Side-effects: none
 * Notes: Provider adapters translate these to and from their native formats
 * Links: Used by ports, features, and adapters
 * @public
 */

/**
 * Open structured arguments decoded from a model tool call.
 * Validation happens at execution, not here.
 */
export type ToolArgs = Readonly<Record<string, unknown>>;

/**
 * Tool call embedded in an assistant message.
 * Represents a request from the model to invoke a catalog action.
 */
export interface ToolCallRequest {
  /** Provider-assigned id, synthesized when the provider assigns none */
  readonly id: string;
  /** Action name (snake_case) */
  readonly name: string;
  readonly args: ToolArgs;
}

/**
 * Outcome of one tool call as handed back to the model.
 */
export type ToolResult =
  | { readonly success: true; readonly data: unknown }
  | {
      readonly success: false;
      readonly error: unknown;
      /** HTTP status from the document store, 0 for network failure */
      readonly status?: number;
      /** Diagnostic (stack trace or stringified error) */
      readonly detail?: string;
    };

export interface SystemMessage {
  readonly role: "system";
  readonly content: string;
}

export interface UserMessage {
  readonly role: "user";
  readonly content: string;
}

export interface AssistantMessage {
  readonly role: "assistant";
  readonly content: string;
  /** Present when the model requested actions in this turn */
  readonly toolCalls?: readonly ToolCallRequest[];
}

export interface ToolMessage {
  readonly role: "tool";
  readonly toolCallId: string;
  readonly name: string;
  readonly content: ToolResult;
}

export type Message =
  | SystemMessage
  | UserMessage
  | AssistantMessage
  | ToolMessage;

/** Non-system messages, as shown to the user */
export type ConversationMessage = Exclude<Message, SystemMessage>;
