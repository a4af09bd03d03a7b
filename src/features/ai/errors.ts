// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/errors`
 * Purpose: Classify a failed chat call for the outer caller.
 * Scope: Maps thrown errors to a small set of kinds. Does not log or rethrow.
 * Invariants: auth_expired wins over provider when a provider error carries 401/403.
 * Side-effects: none
 * Notes: The front end re-prompts for login on auth_expired.
 * @public
 */

import { isChatValidationError, isLlmError, isToolLoopLimitError } from "@/core";
import { isDocumentStoreAuthError } from "@/ports";

export type ChatFailureKind =
  | "validation"
  | "auth_expired"
  | "tool_loop_limit"
  | "provider"
  | "unknown";

const AUTH_STATUSES: ReadonlySet<number> = new Set([401, 403]);
const AUTH_MESSAGE_PATTERN = /\b(401|403)\b|Forbidden/;

export function classifyChatFailure(error: unknown): ChatFailureKind {
  if (isChatValidationError(error)) return "validation";
  if (isDocumentStoreAuthError(error)) return "auth_expired";
  if (isToolLoopLimitError(error)) return "tool_loop_limit";
  if (isLlmError(error)) {
    return error.status !== undefined && AUTH_STATUSES.has(error.status)
      ? "auth_expired"
      : "provider";
  }
  if (error instanceof Error && AUTH_MESSAGE_PATTERN.test(error.message)) {
    return "auth_expired";
  }
  return "unknown";
}
