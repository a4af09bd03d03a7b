// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/session/in-memory-session.store`
 * Purpose: Process-local SessionStore keyed by opaque session key.
 * Scope: Holds message history and the cached context text. Does not persist across restarts.
 * Invariants:
 *   - getMessages returns a copy; callers never mutate stored history
 *   - Context can be dropped without touching history
 * Side-effects: none (in-memory state)
 * Links: Implements SessionStore port
 * @internal
 */

import type { Message } from "@/core";
import type { SessionStore } from "@/ports";

interface SessionEntry {
  messages: Message[];
  context?: string | undefined;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();

  getMessages(sessionKey: string): Message[] {
    return [...(this.sessions.get(sessionKey)?.messages ?? [])];
  }

  setMessages(sessionKey: string, messages: readonly Message[]): void {
    this.entry(sessionKey).messages = [...messages];
  }

  appendMessages(sessionKey: string, messages: readonly Message[]): void {
    this.entry(sessionKey).messages.push(...messages);
  }

  getContext(sessionKey: string): string | undefined {
    return this.sessions.get(sessionKey)?.context;
  }

  setContext(sessionKey: string, contextText: string): void {
    this.entry(sessionKey).context = contextText;
  }

  dropContext(sessionKey: string): void {
    const entry = this.sessions.get(sessionKey);
    if (entry) entry.context = undefined;
  }

  delete(sessionKey: string): void {
    this.sessions.delete(sessionKey);
  }

  private entry(sessionKey: string): SessionEntry {
    let entry = this.sessions.get(sessionKey);
    if (!entry) {
      entry = { messages: [] };
      this.sessions.set(sessionKey, entry);
    }
    return entry;
  }
}
