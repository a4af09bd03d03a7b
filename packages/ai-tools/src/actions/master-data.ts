// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ledgerchat/ai-tools/actions/master-data`
 * Purpose: Convenience queries for accounts, companies, customers, suppliers and items.
 * Scope: Read-only contracts over DocumentStoreCapability.
 * Invariants: customer/supplier/item lists default to 50 rows
 * Side-effects: IO via capability
 * Links: ../capabilities/document-store.ts
 * @public
 */

import { z } from "zod";

import { bindAction } from "../types";

const ROOT_TYPES = ["Asset", "Liability", "Equity", "Income", "Expense"] as const;

export const GetAccountsInputSchema = z
  .object({
    company: z.string().optional().describe("Company name (optional)"),
    root_type: z
      .enum(ROOT_TYPES)
      .optional()
      .describe("Root type filter: Asset, Liability, Equity, Income, or Expense"),
  })
  .passthrough();

export const EmptyInputSchema = z.object({}).passthrough();

export const LimitInputSchema = z
  .object({
    limit: z
      .number()
      .int()
      .positive()
      .default(50)
      .describe("Max results (default 50)"),
  })
  .passthrough();

export const getAccountsAction = bindAction(
  {
    name: "get_accounts",
    description:
      "Get the Chart of Accounts. Optionally filter by company and/or root_type " +
      "(Asset, Liability, Equity, Income, Expense).",
    effect: "read_only",
    inputSchema: GetAccountsInputSchema,
  },
  (store, input) =>
    store.getAccounts({ company: input.company, rootType: input.root_type })
);

export const getCompaniesAction = bindAction(
  {
    name: "get_companies",
    description: "Get a list of all companies in ERPNext.",
    effect: "read_only",
    inputSchema: EmptyInputSchema,
  },
  (store) => store.getCompanies()
);

export const getCustomersAction = bindAction(
  {
    name: "get_customers",
    description: "Get a list of customers.",
    effect: "read_only",
    inputSchema: LimitInputSchema,
  },
  (store, input) => store.getCustomers(input.limit)
);

export const getSuppliersAction = bindAction(
  {
    name: "get_suppliers",
    description: "Get a list of suppliers.",
    effect: "read_only",
    inputSchema: LimitInputSchema,
  },
  (store, input) => store.getSuppliers(input.limit)
);

export const getItemsAction = bindAction(
  {
    name: "get_items",
    description: "Get a list of items.",
    effect: "read_only",
    inputSchema: LimitInputSchema,
  },
  (store, input) => store.getItems(input.limit)
);
