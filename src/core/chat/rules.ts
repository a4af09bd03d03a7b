// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/rules`
 * Purpose: Pure business rules and validation for chat input and history.
 * Scope: Deterministic validation with actionable errors. Does not handle I/O or time dependencies.
 * Invariants: All functions are pure, deterministic, and idempotent
 * Side-effects: none (throws on validation failure)
 * Notes: Length is counted in code points, so multi-byte chars count once
 * Links: Used by features/ai/chat-agent
 * @public
 */

import type { ConversationMessage, Message } from "./model";

export enum ChatErrorCode {
  MESSAGE_TOO_LONG = "MESSAGE_TOO_LONG",
  INVALID_CONTENT = "INVALID_CONTENT",
}

export class ChatValidationError extends Error {
  constructor(
    public code: ChatErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ChatValidationError";
  }
}

export function isChatValidationError(
  error: unknown
): error is ChatValidationError {
  return error instanceof ChatValidationError;
}

/**
 * Parameterized validation - throws ChatValidationError on failure
 * @param content - Message content to validate
 * @param maxChars - Maximum allowed character count
 * @throws ChatValidationError when content exceeds limit
 */
export function assertMessageLength(content: string, maxChars: number): void {
  const actualLength = Array.from(content).length;

  if (actualLength > maxChars) {
    throw new ChatValidationError(
      ChatErrorCode.MESSAGE_TOO_LONG,
      `Message length ${actualLength} exceeds maximum ${maxChars} characters`
    );
  }
}

/**
 * @throws ChatValidationError when content is empty or whitespace only
 */
export function assertMessageContent(content: string): void {
  if (content.trim().length === 0) {
    throw new ChatValidationError(
      ChatErrorCode.INVALID_CONTENT,
      "Message must not be empty"
    );
  }
}

/**
 * Full user-input check applied before anything is stored.
 * @param maxChars - Optional cap in code points; no cap when omitted
 */
export function assertValidUserMessage(
  content: string,
  maxChars?: number
): void {
  assertMessageContent(content);
  if (maxChars !== undefined) assertMessageLength(content, maxChars);
}

/**
 * System message filtering
 * @returns Messages with system messages removed, in original order
 */
export function filterSystemMessages(
  messages: readonly Message[]
): ConversationMessage[] {
  const visible: ConversationMessage[] = [];
  for (const message of messages) {
    if (message.role !== "system") visible.push(message);
  }
  return visible;
}
