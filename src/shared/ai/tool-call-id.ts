// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/ai/tool-call-id`
 * Purpose: Provider-compatible tool call ids for backends that assign none.
 * Scope: Id generation only.
 * Invariants: 9 alphanumeric characters
 * Side-effects: none (reads the CSPRNG)
 * Links: adapters/server/ai/ollama.adapter.ts
 * @public
 */

import { webcrypto } from "node:crypto";

/** Charset for provider-compatible tool call IDs */
const TOOL_ID_CHARS =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

export const TOOL_CALL_ID_LENGTH = 9;

/** Generate 9-char alphanumeric tool call ID */
export function generateToolCallId(): string {
  const bytes = new Uint8Array(TOOL_CALL_ID_LENGTH);
  webcrypto.getRandomValues(bytes);
  let id = "";
  for (const b of bytes) id += TOOL_ID_CHARS[b % TOOL_ID_CHARS.length];
  return id;
}
