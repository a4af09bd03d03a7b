// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/document-store.port`
 * Purpose: Authenticated handle on the remote document store, as handed to each chat call.
 * Scope: Extends the action capability with context snapshot reads. Does not manage login state.
 * Invariants:
 *   - Every capability method resolves to an ActionEnvelope, never throws for HTTP or network failure
 *   - fetchContextSnapshot never rejects for a failing section; that section is empty instead
 * Side-effects: none (interface only)
 * Links: Implemented by adapters/server/erp/frappe-rest.adapter.ts, tests/_fakes
 * @public
 */

import type { ContextSnapshot } from "@/core";
import type {
  ActionEnvelope,
  DocumentStoreCapability,
} from "@ledgerchat/ai-tools";

export type {
  ActionEnvelope,
  DocumentStoreCapability,
  ListDocumentsParams,
} from "@ledgerchat/ai-tools";

/**
 * Port-level error thrown when the document store rejects credentials or the session has expired
 */
export class DocumentStoreAuthError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = "DocumentStoreAuthError";
  }
}

export function isDocumentStoreAuthError(
  error: unknown
): error is DocumentStoreAuthError {
  return error instanceof Error && error.name === "DocumentStoreAuthError";
}

export interface CostCenterQuery {
  readonly company?: string | undefined;
}

export interface DocumentStoreClient extends DocumentStoreCapability {
  getCostCenters(query?: CostCenterQuery): Promise<ActionEnvelope>;
  /** Current user id, or "" when unknown */
  getLoggedInUser(): Promise<string>;
  /** Independent read-only sections for the system prompt */
  fetchContextSnapshot(): Promise<ContextSnapshot>;
}
