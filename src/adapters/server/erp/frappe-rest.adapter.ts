// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/erp/frappe-rest.adapter`
 * Purpose: Frappe/ERPNext REST implementation of DocumentStoreClient with cookie-session auth.
 * Scope: One HTTP call per method, uniform envelopes, context snapshot, login. Does not retry or cache.
 * Invariants:
 *   - HTTP and network failures become envelopes (status 0 = no response); only login throws
 *   - Doctypes, document names and method paths are URL-encoded
 *   - Set-Cookie responses update the session cookie sent on every later request
 *   - A failing snapshot section yields [] for that section only
 *   - Never logs document bodies, credentials or cookies
 * Side-effects: IO (HTTP requests to the document store)
 * Links: ports/document-store.port.ts, core/erp/context.ts
 * @internal
 */

import type { ContextSection, ContextSnapshot, SnapshotRow } from "@/core";
import {
  type ActionEnvelope,
  type CostCenterQuery,
  DocumentStoreAuthError,
  type DocumentStoreClient,
  type ListDocumentsParams,
} from "@/ports";
import { EVENT_NAMES, type Logger } from "@/shared/observability";
import { isPlainObject, tryParseJson } from "@/shared/util";
import type {
  AccountQuery,
  DocumentData,
  FinancialReportQuery,
  GeneralLedgerQuery,
} from "@ledgerchat/ai-tools";

export const DEFAULT_LIST_LIMIT = 20;
export const DEFAULT_MASTER_DATA_LIMIT = 50;
export const SEARCH_LINK_LIMIT = 10;

export const REPORT_METHODS = {
  balanceSheet: "erpnext.accounts.report.balance_sheet.balance_sheet.execute",
  profitAndLoss:
    "erpnext.accounts.report.profit_and_loss_statement.profit_and_loss_statement.execute",
  generalLedger:
    "erpnext.accounts.report.general_ledger.general_ledger.execute",
} as const;

const CONTEXT_LIMITS = {
  fiscalYears: 5,
  leafAccounts: 200,
  masterData: 30,
  recentDocuments: 10,
  modesOfPayment: 20,
} as const;

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

interface RequestOptions {
  readonly query?: Readonly<Record<string, string | number>>;
  readonly body?: unknown;
}

export interface FrappeClientConfig {
  /** Base URL without trailing slash */
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
  /** Cookie header value carried over from an earlier login */
  readonly cookie?: string | undefined;
}

function resourcePath(doctype: string, name?: string): string {
  const base = `resource/${encodeURIComponent(doctype)}`;
  return name === undefined ? base : `${base}/${encodeURIComponent(name)}`;
}

function hasEntries(value: ListDocumentsParams["filters"]): boolean {
  if (value === undefined) return false;
  return Array.isArray(value)
    ? value.length > 0
    : Object.keys(value).length > 0;
}

/** Keep only the keyword arguments that carry a value */
function definedEntries(
  entries: Readonly<Record<string, string | number | undefined>>
): Record<string, string | number> {
  const kwargs: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined && value !== "") kwargs[key] = value;
  }
  return kwargs;
}

function toRows(data: unknown): SnapshotRow[] {
  return Array.isArray(data) ? data.filter(isPlainObject) : [];
}

function loginFailureMessage(error: unknown): string {
  if (isPlainObject(error) && typeof error.message === "string") {
    return error.message;
  }
  if (typeof error === "string" && error.trim() !== "") return error;
  return "Login failed";
}

export class FrappeRestClient implements DocumentStoreClient {
  private readonly cookies = new Map<string, string>();

  constructor(private readonly config: FrappeClientConfig) {
    if (config.cookie) this.absorbCookieHeader(config.cookie);
  }

  /**
   * Authenticate with username/password.
   * @throws DocumentStoreAuthError when the store rejects the credentials
   */
  static async login(
    config: Omit<FrappeClientConfig, "cookie">,
    username: string,
    password: string
  ): Promise<FrappeRestClient> {
    const client = new FrappeRestClient(config);
    const result = await client.request("POST", "method/login", {
      body: { usr: username, pwd: password },
    });

    if (!result.success) {
      if (result.status === 0) {
        throw new Error(
          `Could not reach the document store: ${loginFailureMessage(result.error)}`
        );
      }
      throw new DocumentStoreAuthError(
        loginFailureMessage(result.error),
        result.status
      );
    }

    config.logger.info(
      { cookies: client.cookies.size },
      EVENT_NAMES.ADAPTER_FRAPPE_LOGIN
    );
    return client;
  }

  /** Cookie header value to persist between requests of the outer front end */
  get sessionCookie(): string {
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
  }

  async getLoggedInUser(): Promise<string> {
    const result = await this.request(
      "GET",
      "method/frappe.auth.get_logged_user"
    );
    return result.success && typeof result.data === "string" ? result.data : "";
  }

  // ── CRUD ─────────────────────────────────────────────────────────

  list(doctype: string, params: ListDocumentsParams = {}): Promise<ActionEnvelope> {
    const query: Record<string, string | number> = {
      limit_page_length: params.limit ?? DEFAULT_LIST_LIMIT,
      limit_start: params.offset ?? 0,
    };
    if (params.fields && params.fields.length > 0) {
      query.fields = JSON.stringify(params.fields);
    }
    if (hasEntries(params.filters)) {
      query.filters = JSON.stringify(params.filters);
    }
    if (params.orderBy) query.order_by = params.orderBy;

    return this.request("GET", resourcePath(doctype), { query });
  }

  get(doctype: string, name: string): Promise<ActionEnvelope> {
    return this.request("GET", resourcePath(doctype, name));
  }

  create(doctype: string, data: DocumentData): Promise<ActionEnvelope> {
    return this.request("POST", resourcePath(doctype), { body: { data } });
  }

  update(
    doctype: string,
    name: string,
    data: DocumentData
  ): Promise<ActionEnvelope> {
    return this.request("PUT", resourcePath(doctype, name), {
      body: { data },
    });
  }

  delete(doctype: string, name: string): Promise<ActionEnvelope> {
    return this.request("DELETE", resourcePath(doctype, name));
  }

  submit(doctype: string, name: string): Promise<ActionEnvelope> {
    return this.update(doctype, name, { docstatus: 1 });
  }

  cancel(doctype: string, name: string): Promise<ActionEnvelope> {
    return this.update(doctype, name, { docstatus: 2 });
  }

  searchByNamePrefix(doctype: string, text: string): Promise<ActionEnvelope> {
    return this.request("GET", "method/frappe.client.get_list", {
      query: {
        doctype,
        filters: JSON.stringify({ name: ["like", `%${text}%`] }),
        fields: JSON.stringify(["name"]),
        limit_page_length: SEARCH_LINK_LIMIT,
      },
    });
  }

  callRemoteMethod(
    method: string,
    kwargs: Readonly<Record<string, unknown>> = {}
  ): Promise<ActionEnvelope> {
    return this.request("POST", `method/${encodeURIComponent(method)}`, {
      body: kwargs,
    });
  }

  // ── Convenience: master data ─────────────────────────────────────

  getAccounts(query: AccountQuery = {}): Promise<ActionEnvelope> {
    return this.list("Account", {
      fields: [
        "name",
        "account_name",
        "root_type",
        "account_type",
        "parent_account",
        "is_group",
      ],
      filters: definedEntries({
        company: query.company,
        root_type: query.rootType,
      }),
      limit: 200,
    });
  }

  getCostCenters(query: CostCenterQuery = {}): Promise<ActionEnvelope> {
    return this.list("Cost Center", {
      fields: ["name", "cost_center_name", "parent_cost_center", "is_group"],
      filters: definedEntries({ company: query.company }),
      limit: 100,
    });
  }

  getCompanies(): Promise<ActionEnvelope> {
    return this.list("Company", {
      fields: ["name", "company_name", "default_currency", "country"],
      limit: 100,
    });
  }

  getCustomers(limit = DEFAULT_MASTER_DATA_LIMIT): Promise<ActionEnvelope> {
    return this.list("Customer", {
      fields: ["name", "customer_name", "customer_group", "territory"],
      limit,
    });
  }

  getSuppliers(limit = DEFAULT_MASTER_DATA_LIMIT): Promise<ActionEnvelope> {
    return this.list("Supplier", {
      fields: ["name", "supplier_name", "supplier_group", "country"],
      limit,
    });
  }

  getItems(limit = DEFAULT_MASTER_DATA_LIMIT): Promise<ActionEnvelope> {
    return this.list("Item", {
      fields: ["name", "item_name", "item_group", "stock_uom", "standard_rate"],
      limit,
    });
  }

  // ── Convenience: reports ─────────────────────────────────────────

  getBalanceSheet(query: FinancialReportQuery = {}): Promise<ActionEnvelope> {
    return this.callRemoteMethod(
      REPORT_METHODS.balanceSheet,
      definedEntries({ fiscal_year: query.fiscalYear, company: query.company })
    );
  }

  getProfitAndLoss(query: FinancialReportQuery = {}): Promise<ActionEnvelope> {
    return this.callRemoteMethod(
      REPORT_METHODS.profitAndLoss,
      definedEntries({ fiscal_year: query.fiscalYear, company: query.company })
    );
  }

  getGeneralLedger(query: GeneralLedgerQuery = {}): Promise<ActionEnvelope> {
    return this.callRemoteMethod(
      REPORT_METHODS.generalLedger,
      definedEntries({
        limit_page_length: query.limit ?? DEFAULT_MASTER_DATA_LIMIT,
        account: query.account,
        from_date: query.fromDate,
        to_date: query.toDate,
        company: query.company,
      })
    );
  }

  // ── Context snapshot ─────────────────────────────────────────────

  async fetchContextSnapshot(): Promise<ContextSnapshot> {
    const companies = await this.section("companies", () =>
      this.getCompanies()
    );
    const fiscalYears = await this.section("fiscalYears", () =>
      this.list("Fiscal Year", {
        fields: ["name", "year_start_date", "year_end_date"],
        orderBy: "year_start_date desc",
        limit: CONTEXT_LIMITS.fiscalYears,
      })
    );
    const accounts = await this.section("accounts", () =>
      this.list("Account", {
        fields: [
          "name",
          "account_name",
          "root_type",
          "account_type",
          "parent_account",
          "is_group",
        ],
        filters: { is_group: 0 },
        limit: CONTEXT_LIMITS.leafAccounts,
      })
    );
    const costCenters = await this.section("costCenters", () =>
      this.getCostCenters()
    );
    const customers = await this.section("customers", () =>
      this.getCustomers(CONTEXT_LIMITS.masterData)
    );
    const suppliers = await this.section("suppliers", () =>
      this.getSuppliers(CONTEXT_LIMITS.masterData)
    );
    const items = await this.section("items", () =>
      this.getItems(CONTEXT_LIMITS.masterData)
    );
    const recentSalesInvoices = await this.section("recentSalesInvoices", () =>
      this.list("Sales Invoice", {
        fields: ["name", "customer", "grand_total", "status", "posting_date"],
        orderBy: "posting_date desc",
        limit: CONTEXT_LIMITS.recentDocuments,
      })
    );
    const recentPurchaseInvoices = await this.section(
      "recentPurchaseInvoices",
      () =>
        this.list("Purchase Invoice", {
          fields: ["name", "supplier", "grand_total", "status", "posting_date"],
          orderBy: "posting_date desc",
          limit: CONTEXT_LIMITS.recentDocuments,
        })
    );
    const recentJournalEntries = await this.section(
      "recentJournalEntries",
      () =>
        this.list("Journal Entry", {
          fields: [
            "name",
            "title",
            "total_debit",
            "posting_date",
            "voucher_type",
          ],
          orderBy: "posting_date desc",
          limit: CONTEXT_LIMITS.recentDocuments,
        })
    );
    const modesOfPayment = await this.section("modesOfPayment", () =>
      this.list("Mode of Payment", {
        fields: ["name", "type"],
        limit: CONTEXT_LIMITS.modesOfPayment,
      })
    );

    return {
      companies,
      fiscalYears,
      accounts,
      costCenters,
      customers,
      suppliers,
      items,
      recentSalesInvoices,
      recentPurchaseInvoices,
      recentJournalEntries,
      modesOfPayment,
    };
  }

  private async section(
    name: ContextSection,
    load: () => Promise<ActionEnvelope>
  ): Promise<SnapshotRow[]> {
    try {
      const result = await load();
      if (result.success) return toRows(result.data);
      this.config.logger.warn(
        { section: name, status: result.status },
        EVENT_NAMES.ADAPTER_FRAPPE_SECTION_FAILED
      );
    } catch (error) {
      this.config.logger.warn(
        { section: name, err: error },
        EVENT_NAMES.ADAPTER_FRAPPE_SECTION_FAILED
      );
    }
    return [];
  }

  // ── Transport ────────────────────────────────────────────────────

  private async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<ActionEnvelope> {
    const url = new URL(`${this.config.baseUrl}/api/${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const headers: Record<string, string> = { Accept: "application/json" };
    if (options.body !== undefined) headers["Content-Type"] = "application/json";
    const cookie = this.sessionCookie;
    if (cookie !== "") headers.Cookie = cookie;

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers,
        ...(options.body !== undefined
          ? { body: JSON.stringify(options.body) }
          : {}),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      const message =
        error instanceof Error && error.name === "TimeoutError"
          ? `Request timed out after ${this.config.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      this.config.logger.warn(
        { method, endpoint: path.split("/")[0], status: 0 },
        EVENT_NAMES.ADAPTER_FRAPPE_REQUEST_FAILED
      );
      return { success: false, status: 0, error: message };
    }

    this.absorbSetCookies(response.headers.getSetCookie());

    const parsed = tryParseJson(text);
    if (!response.ok) {
      this.config.logger.warn(
        { method, endpoint: path.split("/")[0], status: response.status },
        EVENT_NAMES.ADAPTER_FRAPPE_REQUEST_FAILED
      );
      return {
        success: false,
        status: response.status,
        error: parsed.ok ? parsed.value : text,
      };
    }

    if (!parsed.ok) return { success: true, data: text };
    const body = parsed.value;
    if (isPlainObject(body)) {
      return { success: true, data: body.data ?? body.message ?? body };
    }
    return { success: true, data: body };
  }

  private absorbCookieHeader(header: string): void {
    for (const pair of header.split(";")) {
      this.absorbCookiePair(pair);
    }
  }

  private absorbSetCookies(setCookies: readonly string[]): void {
    for (const line of setCookies) {
      // Attributes (Path, Expires, HttpOnly) follow the first ";"
      this.absorbCookiePair(line.split(";")[0] ?? "");
    }
  }

  private absorbCookiePair(pair: string): void {
    const separator = pair.indexOf("=");
    if (separator <= 0) return;
    const name = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (name !== "") this.cookies.set(name, value);
  }
}
