// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ledgerchat/ai-tools/catalog`
 * Purpose: Canonical registry of all action definitions. Single source of truth.
 * Scope: Exports ACTION_CATALOG and createActionCatalog helper. Does not execute actions.
 * Invariants:
 *   - ACTION_NAME_STABILITY: Duplicate names throw at construction time
 *   - Catalog order is the order handed to providers
 * Side-effects: none
 * Links: schema.ts, actions/
 * @public
 */

import {
  cancelDocumentAction,
  createDocumentAction,
  deleteDocumentAction,
  getDocumentAction,
  listDocumentsAction,
  searchLinkAction,
  submitDocumentAction,
  updateDocumentAction,
} from "./actions/documents";
import {
  getAccountsAction,
  getCompaniesAction,
  getCustomersAction,
  getItemsAction,
  getSuppliersAction,
} from "./actions/master-data";
import { callMethodAction } from "./actions/remote-method";
import {
  getBalanceSheetAction,
  getGeneralLedgerAction,
  getProfitAndLossAction,
} from "./actions/reports";
import type { BoundAction } from "./types";

/**
 * Action catalog type.
 * Maps action name → BoundAction, in registration order.
 */
export type ActionCatalog = Readonly<Record<string, BoundAction>>;

/**
 * Create an action catalog from an array of bound actions.
 * Validates uniqueness of names at construction time.
 *
 * @throws Error if duplicate action names are detected
 */
export function createActionCatalog(
  actions: readonly BoundAction[]
): ActionCatalog {
  const catalog: Record<string, BoundAction> = {};

  for (const action of actions) {
    // ACTION_NAME_STABILITY: Throw on duplicate, never silently overwrite
    if (Object.hasOwn(catalog, action.name)) {
      throw new Error(
        `ACTION_NAME_STABILITY violation: Duplicate action name "${action.name}" in catalog. ` +
          "Action names must be unique. Check for duplicate registrations."
      );
    }

    catalog[action.name] = action;
  }

  return Object.freeze(catalog);
}

/**
 * ACTION_CATALOG: every action the model may request.
 *
 * To add an action:
 * 1. Create contract + handler with bindAction in actions/<group>.ts
 * 2. Add it here
 * 3. If it needs a new backend call, extend DocumentStoreCapability
 */
export const ACTION_CATALOG: ActionCatalog = createActionCatalog([
  // Generic documents
  listDocumentsAction,
  getDocumentAction,
  createDocumentAction,
  updateDocumentAction,
  deleteDocumentAction,
  submitDocumentAction,
  cancelDocumentAction,
  searchLinkAction,
  // Master data
  getAccountsAction,
  getCompaniesAction,
  getCustomersAction,
  getSuppliersAction,
  getItemsAction,
  // Reports
  getBalanceSheetAction,
  getProfitAndLossAction,
  getGeneralLedgerAction,
  // Escape hatch
  callMethodAction,
]);

/**
 * Get all action names in catalog order.
 */
export function getActionNames(
  catalog: ActionCatalog = ACTION_CATALOG
): readonly string[] {
  return Object.keys(catalog);
}

/**
 * Get an action by name. Returns undefined if not found.
 * Inherited keys (toString, constructor) never resolve.
 */
export function getActionByName(
  name: string,
  catalog: ActionCatalog = ACTION_CATALOG
): BoundAction | undefined {
  return Object.hasOwn(catalog, name) ? catalog[name] : undefined;
}

export function hasAction(
  name: string,
  catalog: ActionCatalog = ACTION_CATALOG
): boolean {
  return Object.hasOwn(catalog, name);
}
