// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ledgerchat/ai-tools/actions/reports`
 * Purpose: Financial statement actions (balance sheet, profit and loss, general ledger).
 * Scope: Read-only contracts; the capability maps them onto whitelisted report methods.
 * Invariants: get_general_ledger defaults to 50 rows
 * Side-effects: IO via capability
 * Links: ../capabilities/document-store.ts
 * @public
 */

import { z } from "zod";

import { bindAction } from "../types";

export const FinancialReportInputSchema = z
  .object({
    fiscal_year: z.string().optional().describe("Fiscal year name, e.g. '2024'"),
    company: z.string().optional().describe("Company name (optional)"),
  })
  .passthrough();

export const GeneralLedgerInputSchema = z
  .object({
    account: z.string().optional().describe("Account name (optional)"),
    from_date: z.string().optional().describe("Start date, YYYY-MM-DD"),
    to_date: z.string().optional().describe("End date, YYYY-MM-DD"),
    company: z.string().optional().describe("Company name (optional)"),
    limit: z
      .number()
      .int()
      .positive()
      .default(50)
      .describe("Max ledger rows (default 50)"),
  })
  .passthrough();

export const getBalanceSheetAction = bindAction(
  {
    name: "get_balance_sheet",
    description:
      "Run the Balance Sheet report, optionally for a fiscal year and/or company.",
    effect: "read_only",
    inputSchema: FinancialReportInputSchema,
  },
  (store, input) =>
    store.getBalanceSheet({
      fiscalYear: input.fiscal_year,
      company: input.company,
    })
);

export const getProfitAndLossAction = bindAction(
  {
    name: "get_profit_and_loss",
    description:
      "Run the Profit and Loss Statement report, optionally for a fiscal year and/or company.",
    effect: "read_only",
    inputSchema: FinancialReportInputSchema,
  },
  (store, input) =>
    store.getProfitAndLoss({
      fiscalYear: input.fiscal_year,
      company: input.company,
    })
);

export const getGeneralLedgerAction = bindAction(
  {
    name: "get_general_ledger",
    description:
      "Get General Ledger entries, optionally filtered by account, date range and company.",
    effect: "read_only",
    inputSchema: GeneralLedgerInputSchema,
  },
  (store, input) =>
    store.getGeneralLedger({
      account: input.account,
      fromDate: input.from_date,
      toDate: input.to_date,
      company: input.company,
      limit: input.limit,
    })
);
