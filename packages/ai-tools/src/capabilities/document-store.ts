// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ledgerchat/ai-tools/capabilities/document-store`
 * Purpose: Capability interface the catalog actions execute against.
 * Scope: Defines DocumentStoreCapability and the uniform ActionEnvelope. Does not implement transport.
 * Invariants:
 *   - ENVELOPE_UNIFORM: every method resolves to ActionEnvelope; HTTP and network failures are envelopes, not throws
 *   - status is the HTTP status, or 0 when no response was received
 * Side-effects: none (interface only)
 * Links: src/adapters/server/erp/frappe-rest.adapter.ts implements this
 * @public
 */

export type ActionEnvelope =
  | { readonly success: true; readonly data: unknown }
  | {
      readonly success: false;
      readonly status: number;
      readonly error: unknown;
    };

/** Filters as `{field: value}` / `{field: [op, value]}`, or a list of filter tuples */
export type DocumentFilters =
  | Readonly<Record<string, unknown>>
  | readonly unknown[];

export type DocumentData = Readonly<Record<string, unknown>>;

export interface ListDocumentsParams {
  readonly fields?: readonly string[] | undefined;
  readonly filters?: DocumentFilters | undefined;
  readonly orderBy?: string | undefined;
  /** Default 20 */
  readonly limit?: number | undefined;
  readonly offset?: number | undefined;
}

export type AccountRootType =
  | "Asset"
  | "Liability"
  | "Equity"
  | "Income"
  | "Expense";

export interface AccountQuery {
  readonly company?: string | undefined;
  readonly rootType?: AccountRootType | undefined;
}

export interface FinancialReportQuery {
  readonly fiscalYear?: string | undefined;
  readonly company?: string | undefined;
}

export interface GeneralLedgerQuery {
  readonly account?: string | undefined;
  readonly fromDate?: string | undefined;
  readonly toDate?: string | undefined;
  readonly company?: string | undefined;
  readonly limit?: number | undefined;
}

export interface DocumentStoreCapability {
  list(doctype: string, params?: ListDocumentsParams): Promise<ActionEnvelope>;
  get(doctype: string, name: string): Promise<ActionEnvelope>;
  create(doctype: string, data: DocumentData): Promise<ActionEnvelope>;
  update(
    doctype: string,
    name: string,
    data: DocumentData
  ): Promise<ActionEnvelope>;
  delete(doctype: string, name: string): Promise<ActionEnvelope>;
  /** update(doctype, name, {docstatus: 1}) */
  submit(doctype: string, name: string): Promise<ActionEnvelope>;
  /** update(doctype, name, {docstatus: 2}) */
  cancel(doctype: string, name: string): Promise<ActionEnvelope>;
  /** Top 10 names containing `text` */
  searchByNamePrefix(doctype: string, text: string): Promise<ActionEnvelope>;
  callRemoteMethod(
    method: string,
    kwargs?: Readonly<Record<string, unknown>>
  ): Promise<ActionEnvelope>;

  getAccounts(query?: AccountQuery): Promise<ActionEnvelope>;
  getCompanies(): Promise<ActionEnvelope>;
  getCustomers(limit?: number): Promise<ActionEnvelope>;
  getSuppliers(limit?: number): Promise<ActionEnvelope>;
  getItems(limit?: number): Promise<ActionEnvelope>;
  getBalanceSheet(query?: FinancialReportQuery): Promise<ActionEnvelope>;
  getProfitAndLoss(query?: FinancialReportQuery): Promise<ActionEnvelope>;
  getGeneralLedger(query?: GeneralLedgerQuery): Promise<ActionEnvelope>;
}
