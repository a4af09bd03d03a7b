// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (sessionId always).
 * Side-effects: none
 * Notes: Use EVENT_NAMES.* constants when logging.
 * Links: Used by logEvent() and adapters; consumed by all logging callsites.
 * @public
 */

// ============================================================================
// Event Name Registry (as const)
// ============================================================================

export const EVENT_NAMES = {
  // Conversation loop
  AI_CHAT_RECEIVED: "ai.chat_received",
  AI_CHAT_COMPLETED: "ai.chat_completed",
  AI_CHAT_FAILED: "ai.chat_failed",
  AI_SESSION_CREATED: "ai.session_created",
  AI_SESSION_CLEARED: "ai.session_cleared",
  AI_CONTEXT_LOADED: "ai.context_loaded",
  AI_CONTEXT_FAILED: "ai.context_failed",
  AI_CONTEXT_INVALIDATED: "ai.context_invalidated",
  AI_SYSTEM_PROMPT_REBUILT: "ai.system_prompt_rebuilt",

  // Tool execution
  AI_TOOL_CALL: "ai.tool_call",
  AI_TOOL_RESULT: "ai.tool_result",
  AI_TOOL_UNKNOWN: "ai.tool_unknown",

  // Adapter Events
  ADAPTER_OPENAI_ROUND: "adapter.openai.round",
  ADAPTER_ANTHROPIC_ROUND: "adapter.anthropic.round",
  ADAPTER_OLLAMA_ROUND: "adapter.ollama.round",
  ADAPTER_LLM_ARGS_UNPARSABLE: "adapter.llm.args_unparsable",
  ADAPTER_FRAPPE_REQUEST_FAILED: "adapter.frappe.request_failed",
  ADAPTER_FRAPPE_SECTION_FAILED: "adapter.frappe.context_section_failed",
  ADAPTER_FRAPPE_LOGIN: "adapter.frappe.login",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Base fields every conversation event carries.
 * sessionId is a truncated session key, never the full value.
 */
export interface EventBase {
  sessionId: string;
}
