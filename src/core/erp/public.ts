// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/erp/public`
 * Purpose: Public API for the ERP context domain.
 * Scope: Re-exports snapshot types and formatting. Does not expose section renderers.
 * Side-effects: none
 * @public
 */

export type { ContextSection, ContextSnapshot, SnapshotRow } from "./context";
export {
  ACCOUNT_ROOT_ORDER,
  CONTEXT_UNAVAILABLE_TEXT,
  contextFailureText,
  EMPTY_CONTEXT_SNAPSHOT,
  formatContextSnapshot,
} from "./context";
