// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/time/system.adapter`
 * Purpose: Unit tests for the system clock.
 * Scope: ISO timestamps and local calendar dates.
 * Invariants: Uses fake timers; restores real timers after each test.
 * Side-effects: none
 * Links: src/adapters/server/time/system.adapter.ts
 * @public
 */

import { afterEach, describe, expect, it, vi } from "vitest";

import { SystemClock } from "@/adapters/server";

describe("SystemClock", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the current instant as ISO", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-15T10:20:30.000Z"));

    expect(new SystemClock().now()).toBe("2024-03-15T10:20:30.000Z");
  });

  it("returns the local date with zero padding", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 4, 7, 12, 0, 0));

    expect(new SystemClock().today()).toBe("2024-05-07");
  });
});
