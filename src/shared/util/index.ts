// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util`
 * Purpose: Public surface for shared utilities via re-exports.
 * Scope: Re-exports utility functions. Does not implement logic.
 * Side-effects: none
 * @public
 */

export { isPlainObject, tryParseJson } from "./json";
