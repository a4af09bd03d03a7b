// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/erp/context`
 * Purpose: Context snapshot model and its rendering into prompt markdown.
 * Scope: Pure data-to-text transform. Does not fetch anything.
 * Invariants:
 *   - Empty sections are omitted; an entirely empty snapshot renders CONTEXT_UNAVAILABLE_TEXT
 *   - Account groups render in ACCOUNT_ROOT_ORDER; unknown root types are skipped
 * Side-effects: none
 * Links: adapters/server/erp/frappe-rest.adapter.ts (fetchContextSnapshot)
 * @public
 */

export type SnapshotRow = Readonly<Record<string, unknown>>;

export interface ContextSnapshot {
  readonly companies: readonly SnapshotRow[];
  readonly fiscalYears: readonly SnapshotRow[];
  readonly accounts: readonly SnapshotRow[];
  readonly costCenters: readonly SnapshotRow[];
  readonly customers: readonly SnapshotRow[];
  readonly suppliers: readonly SnapshotRow[];
  readonly items: readonly SnapshotRow[];
  readonly recentSalesInvoices: readonly SnapshotRow[];
  readonly recentPurchaseInvoices: readonly SnapshotRow[];
  readonly recentJournalEntries: readonly SnapshotRow[];
  readonly modesOfPayment: readonly SnapshotRow[];
}

export type ContextSection = keyof ContextSnapshot;

export const EMPTY_CONTEXT_SNAPSHOT: ContextSnapshot = Object.freeze({
  companies: [],
  fiscalYears: [],
  accounts: [],
  costCenters: [],
  customers: [],
  suppliers: [],
  items: [],
  recentSalesInvoices: [],
  recentPurchaseInvoices: [],
  recentJournalEntries: [],
  modesOfPayment: [],
});

export const CONTEXT_UNAVAILABLE_TEXT =
  "(Could not fetch ERPNext context — the AI will query as needed.)";

export const ACCOUNT_ROOT_ORDER = [
  "Asset",
  "Liability",
  "Equity",
  "Income",
  "Expense",
  "Other",
] as const;

/** Text cached in place of the snapshot when fetching or rendering throws */
export function contextFailureText(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `(Failed to fetch ERPNext context: ${message})`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Field helpers
// ─────────────────────────────────────────────────────────────────────────────

function display(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value) ?? "";
}

function isSet(value: unknown): boolean {
  return value !== undefined && value !== null;
}

function isTruthy(value: unknown): boolean {
  return isSet(value) && value !== "" && value !== 0 && value !== false;
}

function field(row: SnapshotRow, key: string, fallback: string): string {
  const value = row[key];
  return isSet(value) ? display(value) : fallback;
}

// ─────────────────────────────────────────────────────────────────────────────
// Sections
// ─────────────────────────────────────────────────────────────────────────────

function section(title: string, lines: readonly string[]): string {
  return `### ${title}\n${lines.join("\n")}`;
}

function renderCompanies(rows: readonly SnapshotRow[]): string {
  return section(
    "Companies",
    rows.map((c) => {
      const name = field(c, "name", field(c, "company_name", "?"));
      return `- **${name}** (currency: ${field(c, "default_currency", "")}, country: ${field(c, "country", "")})`;
    })
  );
}

function renderFiscalYears(rows: readonly SnapshotRow[]): string {
  return section(
    "Fiscal Years",
    rows.map(
      (fy) =>
        `- ${field(fy, "name", "?")}: ${field(fy, "year_start_date", "?")} → ${field(fy, "year_end_date", "?")}`
    )
  );
}

function renderAccounts(rows: readonly SnapshotRow[]): string {
  const byRoot = new Map<string, SnapshotRow[]>();
  for (const account of rows) {
    const root = field(account, "root_type", "Other");
    const group = byRoot.get(root) ?? [];
    group.push(account);
    byRoot.set(root, group);
  }

  const lines: string[] = [];
  for (const root of ACCOUNT_ROOT_ORDER) {
    const accounts = byRoot.get(root);
    if (!accounts || accounts.length === 0) continue;
    lines.push(`\n**${root}:**`);
    for (const account of accounts) {
      const type = isTruthy(account.account_type)
        ? ` (${display(account.account_type)})`
        : "";
      lines.push(`- ${field(account, "name", "?")}${type}`);
    }
  }
  return `### Chart of Accounts (leaf accounts)${lines.join("\n")}`;
}

function renderRecentDocuments(
  title: string,
  rows: readonly SnapshotRow[]
): string {
  return section(
    title,
    rows.map((doc) => {
      const parts = [field(doc, "name", "?")];
      for (const key of ["customer", "supplier", "title"]) {
        if (isTruthy(doc[key])) parts.push(display(doc[key]));
      }
      for (const key of ["grand_total", "total_debit"]) {
        if (isSet(doc[key])) parts.push(display(doc[key]));
      }
      if (isTruthy(doc.status)) parts.push(`[${display(doc.status)}]`);
      if (isTruthy(doc.posting_date)) parts.push(display(doc.posting_date));
      return `- ${parts.join(" | ")}`;
    })
  );
}

/**
 * Render a snapshot as markdown sections for the system prompt.
 */
export function formatContextSnapshot(snapshot: ContextSnapshot): string {
  const sections: string[] = [];

  if (snapshot.companies.length > 0) {
    sections.push(renderCompanies(snapshot.companies));
  }
  if (snapshot.fiscalYears.length > 0) {
    sections.push(renderFiscalYears(snapshot.fiscalYears));
  }
  if (snapshot.accounts.length > 0) {
    sections.push(renderAccounts(snapshot.accounts));
  }

  const costCenters = snapshot.costCenters
    .filter((c) => !isTruthy(c.is_group))
    .map((c) => `- ${field(c, "name", "?")}`);
  if (costCenters.length > 0) {
    sections.push(section("Cost Centers", costCenters));
  }

  if (snapshot.modesOfPayment.length > 0) {
    sections.push(
      section(
        "Modes of Payment",
        snapshot.modesOfPayment.map(
          (m) => `- ${field(m, "name", "?")} (type: ${field(m, "type", "?")})`
        )
      )
    );
  }
  if (snapshot.customers.length > 0) {
    sections.push(
      section(
        "Customers",
        snapshot.customers.map(
          (c) => `- ${field(c, "name", "?")} — ${field(c, "customer_name", "")}`
        )
      )
    );
  }
  if (snapshot.suppliers.length > 0) {
    sections.push(
      section(
        "Suppliers",
        snapshot.suppliers.map(
          (s) => `- ${field(s, "name", "?")} — ${field(s, "supplier_name", "")}`
        )
      )
    );
  }
  if (snapshot.items.length > 0) {
    sections.push(
      section(
        "Items",
        snapshot.items.map((item) => {
          const rate = isTruthy(item.standard_rate)
            ? ` @ ${display(item.standard_rate)}`
            : "";
          return `- ${field(item, "name", "?")} — ${field(item, "item_name", "")}${rate}`;
        })
      )
    );
  }

  const recent: ReadonlyArray<readonly [string, readonly SnapshotRow[]]> = [
    ["Recent Sales Invoices", snapshot.recentSalesInvoices],
    ["Recent Purchase Invoices", snapshot.recentPurchaseInvoices],
    ["Recent Journal Entries", snapshot.recentJournalEntries],
  ];
  for (const [title, rows] of recent) {
    if (rows.length > 0) sections.push(renderRecentDocuments(title, rows));
  }

  if (sections.length === 0) return CONTEXT_UNAVAILABLE_TEXT;

  return sections.join("\n\n");
}
