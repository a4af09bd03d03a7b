// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time abstraction for deterministic testing.
 * Scope: Current instant and calendar date. Does not do date arithmetic.
 * Invariants: now() is ISO 8601 (UTC, `Z` suffix); today() is YYYY-MM-DD
 * Side-effects: none (interface only)
 * Notes: The agent stamps today() into each new system prompt
 * Links: Implemented by adapters/server/time, tests/_fakes/fake-clock
 * @public
 */

export interface Clock {
  /** Current timestamp in ISO format */
  now(): string;
  /** Current local calendar date as YYYY-MM-DD */
  today(): string;
}
