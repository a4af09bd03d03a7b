// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/session/in-memory-session.store`
 * Purpose: Unit tests for the in-memory session store.
 * Scope: Copy semantics, context caching, deletion.
 * Invariants: Callers never alias stored arrays.
 * Side-effects: none
 * Links: src/adapters/server/session/in-memory-session.store.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import { InMemorySessionStore } from "@/adapters/server";
import type { Message } from "@/core";

const SYSTEM: Message = { role: "system", content: "sys" };
const USER: Message = { role: "user", content: "hi" };

describe("InMemorySessionStore", () => {
  it("returns an empty history for an unknown key", () => {
    const store = new InMemorySessionStore();

    expect(store.getMessages("nope")).toEqual([]);
    expect(store.getContext("nope")).toBeUndefined();
  });

  it("copies messages in and out", () => {
    const store = new InMemorySessionStore();
    const input: Message[] = [SYSTEM];

    store.setMessages("k", input);
    input.push(USER);
    const read = store.getMessages("k");
    read.push(USER);

    expect(store.getMessages("k")).toEqual([SYSTEM]);
  });

  it("appends in order", () => {
    const store = new InMemorySessionStore();
    store.setMessages("k", [SYSTEM]);

    store.appendMessages("k", [USER, { role: "assistant", content: "yo" }]);

    expect(store.getMessages("k").map((m) => m.role)).toEqual([
      "system",
      "user",
      "assistant",
    ]);
  });

  it("caches and drops context without touching messages", () => {
    const store = new InMemorySessionStore();
    store.setMessages("k", [SYSTEM, USER]);
    store.setContext("k", "ctx");

    expect(store.getContext("k")).toBe("ctx");

    store.dropContext("k");

    expect(store.getContext("k")).toBeUndefined();
    expect(store.getMessages("k")).toHaveLength(2);
  });

  it("leaves an unknown key empty when dropping its context", () => {
    const store = new InMemorySessionStore();

    store.dropContext("ghost");

    expect(store.getMessages("ghost")).toEqual([]);
    expect(store.getContext("ghost")).toBeUndefined();
  });

  it("deletes messages and context together", () => {
    const store = new InMemorySessionStore();
    store.setMessages("a", [SYSTEM]);
    store.setContext("a", "ctx");
    store.setMessages("b", [SYSTEM]);

    store.delete("a");

    expect(store.getMessages("a")).toEqual([]);
    expect(store.getContext("a")).toBeUndefined();
    expect(store.getMessages("b")).toEqual([SYSTEM]);
  });
});
