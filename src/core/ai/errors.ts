// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/ai/errors`
 * Purpose: Domain error types for model-provider failures and runaway tool loops.
 * Scope: Defines LlmError, ToolLoopLimitError and classification helpers. Does not perform IO or logging.
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at throw site (adapter boundary)
 *   - Both errors propagate out of chat; neither becomes a tool result
 * Side-effects: none
 * Links: Used by adapters (throw), features/ai/errors (classify)
 * @public
 */

// ─────────────────────────────────────────────────────────────────────────────
// LLM Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Error classification kinds for LLM failures.
 * Derived from HTTP status codes at adapter boundary.
 */
export type LlmErrorKind =
  | "timeout"
  | "rate_limited"
  | "provider_4xx"
  | "provider_5xx"
  | "unknown";

/**
 * Typed error for LLM adapter failures.
 * Thrown by adapters on HTTP errors and malformed response bodies.
 */
export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

/**
 * Type guard for LlmError.
 */
export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

/**
 * Classify LlmError kind from HTTP status code.
 */
export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}

// ─────────────────────────────────────────────────────────────────────────────
// Tool loop
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Thrown when the model still requests tools after `maxRounds` tool rounds.
 */
export class ToolLoopLimitError extends Error {
  readonly maxRounds: number;
  readonly provider: string;

  constructor(provider: string, maxRounds: number) {
    super(
      `${provider} requested tools for more than ${maxRounds} consecutive rounds`
    );
    this.name = "ToolLoopLimitError";
    this.provider = provider;
    this.maxRounds = maxRounds;
  }
}

export function isToolLoopLimitError(
  error: unknown
): error is ToolLoopLimitError {
  return error instanceof ToolLoopLimitError;
}
