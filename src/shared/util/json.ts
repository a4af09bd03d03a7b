// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util/json`
 * Purpose: Narrowing helpers for untyped JSON coming off the wire.
 * Scope: Type guards and a non-throwing parse. Does not validate shapes (use zod for that).
 * Side-effects: none (pure functions)
 * @public
 */

export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * JSON.parse that reports failure as `{ ok: false }` instead of throwing.
 */
export function tryParseJson(
  text: string
): { readonly ok: true; readonly value: unknown } | { readonly ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}
