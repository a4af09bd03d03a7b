// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by ports, features and adapters via \@/core alias
 * @public
 */

export {
  classifyLlmErrorFromStatus,
  isLlmError,
  isToolLoopLimitError,
  LlmError,
  type LlmErrorKind,
  ToolLoopLimitError,
} from "./ai/errors";
export {
  buildSystemMessage,
  buildSystemPrompt,
  SYSTEM_PROMPT_TEMPLATE,
} from "./ai/system-prompt.server";
export type {
  AssistantMessage,
  ConversationMessage,
  Message,
  SystemMessage,
  ToolArgs,
  ToolCallRequest,
  ToolMessage,
  ToolResult,
  UserMessage,
} from "./chat/public";
export {
  assertMessageContent,
  assertMessageLength,
  assertValidUserMessage,
  ChatErrorCode,
  ChatValidationError,
  filterSystemMessages,
  isChatValidationError,
} from "./chat/public";
export type {
  ContextSection,
  ContextSnapshot,
  SnapshotRow,
} from "./erp/public";
export {
  ACCOUNT_ROOT_ORDER,
  CONTEXT_UNAVAILABLE_TEXT,
  contextFailureText,
  EMPTY_CONTEXT_SNAPSHOT,
  formatContextSnapshot,
} from "./erp/public";
