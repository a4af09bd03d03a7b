// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/time/system`
 * Purpose: System clock for timestamps and the date stamped into system prompts.
 * Scope: Reads the wall clock. Does not format for display.
 * Invariants: now() is ISO 8601; today() is the local calendar date as YYYY-MM-DD
 * Side-effects: IO (reads system time)
 * Links: Implements Clock port
 * @internal
 */

import type { Clock } from "@/ports";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export class SystemClock implements Clock {
  now(): string {
    return new Date().toISOString();
  }

  today(): string {
    const date = new Date();
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  }
}
