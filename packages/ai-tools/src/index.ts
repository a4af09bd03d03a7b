// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ledgerchat/ai-tools`
 * Purpose: Barrel export for the action catalog, its contracts and the document-store capability.
 * Scope: Re-exports all public types from submodules. Does not perform IO.
 * Invariants: SINGLE_SOURCE_OF_TRUTH - these are the canonical action definitions.
 * Side-effects: none
 * @public
 */

// Actions
export {
  CreateDocumentInputSchema,
  cancelDocumentAction,
  createDocumentAction,
  DocumentRefInputSchema,
  deleteDocumentAction,
  getDocumentAction,
  ListDocumentsInputSchema,
  listDocumentsAction,
  SearchLinkInputSchema,
  searchLinkAction,
  submitDocumentAction,
  UpdateDocumentInputSchema,
  updateDocumentAction,
} from "./actions/documents";
export {
  EmptyInputSchema,
  GetAccountsInputSchema,
  getAccountsAction,
  getCompaniesAction,
  getCustomersAction,
  getItemsAction,
  getSuppliersAction,
  LimitInputSchema,
} from "./actions/master-data";
export {
  CallMethodInputSchema,
  callMethodAction,
} from "./actions/remote-method";
export {
  FinancialReportInputSchema,
  GeneralLedgerInputSchema,
  getBalanceSheetAction,
  getGeneralLedgerAction,
  getProfitAndLossAction,
} from "./actions/reports";
// Capabilities
export type {
  AccountQuery,
  AccountRootType,
  ActionEnvelope,
  DocumentData,
  DocumentFilters,
  DocumentStoreCapability,
  FinancialReportQuery,
  GeneralLedgerQuery,
  ListDocumentsParams,
} from "./capabilities/document-store";
// Catalog
export {
  ACTION_CATALOG,
  type ActionCatalog,
  createActionCatalog,
  getActionByName,
  getActionNames,
  hasAction,
} from "./catalog";
// Schema compilation
export {
  catalogToDefinitions,
  toActionDefinition,
} from "./schema";
// Types
export type {
  ActionContract,
  ActionDefinition,
  ActionEffect,
  ActionHandler,
  BoundAction,
  JsonSchemaObject,
} from "./types";
export { bindAction } from "./types";
