// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/session-store.port`
 * Purpose: Per-session conversation state: ordered history plus cached context text.
 * Scope: Keyed by an opaque session string. Does not build messages or fetch context.
 * Invariants:
 *   - Insert on first use, explicit delete, context invalidated independently of history
 *   - getMessages returns a copy; callers never mutate stored state in place
 * Side-effects: none (interface only)
 * Links: Implemented by adapters/server/session/in-memory-session.store.ts
 * @public
 */

import type { Message } from "@/core";

export interface SessionStore {
  /** Empty array when the session does not exist */
  getMessages(sessionKey: string): Message[];
  setMessages(sessionKey: string, messages: readonly Message[]): void;
  appendMessages(sessionKey: string, messages: readonly Message[]): void;

  getContext(sessionKey: string): string | undefined;
  setContext(sessionKey: string, contextText: string): void;
  dropContext(sessionKey: string): void;

  /** Drops history and cached context */
  delete(sessionKey: string): void;
}
