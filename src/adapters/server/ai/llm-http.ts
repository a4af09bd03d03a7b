// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/llm-http`
 * Purpose: One JSON POST to a model backend with timeout, typed errors and response validation.
 * Scope: Transport plus shared argument decoding. Does not build requests or run the tool loop.
 * Invariants:
 *   - Network failure → LlmError(kind=unknown); timeout/abort → LlmError(kind=timeout, 408)
 *   - Non-2xx → LlmError(kind from status, status)
 *   - Body that fails the schema → LlmError(kind=unknown, status)
 *   - Never logs request or response bodies
 * Side-effects: IO (HTTP)
 * Links: openai.adapter.ts, anthropic.adapter.ts, ollama.adapter.ts
 * @internal
 */

import type { z } from "zod";

import { classifyLlmErrorFromStatus, LlmError, type ToolArgs } from "@/core";
import type { Logger } from "@/shared/observability";
import { isPlainObject, tryParseJson } from "@/shared/util";

export interface JsonPostRequest<T> {
  /** Provider label used in error messages */
  readonly provider: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
  readonly timeoutMs: number;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export async function postForJson<T>(request: JsonPostRequest<T>): Promise<T> {
  const { provider } = request;

  let response: Response;
  try {
    response = await fetch(request.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...request.headers },
      body: JSON.stringify(request.body),
      signal: AbortSignal.timeout(request.timeoutMs),
    });
  } catch (error) {
    // Handle fetch errors (network, timeout, abort)
    if (error instanceof Error) {
      if (error.name === "AbortError" || error.name === "TimeoutError") {
        throw new LlmError(`${provider} request timed out`, "timeout", 408);
      }
      throw new LlmError(`${provider} network error: ${error.message}`, "unknown");
    }
    throw new LlmError(`${provider} request failed: Unknown error`, "unknown");
  }

  if (!response.ok) {
    const kind = classifyLlmErrorFromStatus(response.status);
    throw new LlmError(
      `${provider} API error: ${response.status} ${response.statusText}`,
      kind,
      response.status
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch {
    throw new LlmError(
      `${provider} returned a non-JSON body`,
      "unknown",
      response.status
    );
  }

  const parsed = request.schema.safeParse(payload);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? ` at ${first.path.join(".") || "<root>"}` : "";
    throw new LlmError(
      `${provider} returned an unexpected response shape${where}`,
      "unknown",
      response.status
    );
  }
  return parsed.data;
}

/**
 * Decode tool-call arguments. JSON strings are parsed; anything that is not an
 * object afterwards yields `{}` and `ok: false` so the caller can log it.
 */
export function decodeToolArgs(raw: unknown): {
  readonly args: ToolArgs;
  readonly ok: boolean;
} {
  if (isPlainObject(raw)) return { args: raw, ok: true };
  if (typeof raw === "string") {
    if (raw.trim() === "") return { args: {}, ok: true };
    const parsed = tryParseJson(raw);
    if (parsed.ok && isPlainObject(parsed.value)) {
      return { args: parsed.value, ok: true };
    }
  }
  return { args: {}, ok: false };
}

/**
 * Tool results are sent to every backend as JSON text.
 */
export function serializeToolResult(result: unknown): string {
  return JSON.stringify(result) ?? "null";
}

/**
 * Settings every provider adapter takes.
 */
export interface ChatAdapterConfig {
  readonly baseUrl: string;
  readonly model: string;
  readonly timeoutMs: number;
  /** Tool rounds allowed per send; 0 = unbounded */
  readonly maxToolRounds: number;
  readonly logger: Logger;
}

/**
 * True when another tool round would exceed the cap.
 */
export function isRoundCapReached(
  completedRounds: number,
  maxToolRounds: number
): boolean {
  return maxToolRounds > 0 && completedRounds >= maxToolRounds;
}
