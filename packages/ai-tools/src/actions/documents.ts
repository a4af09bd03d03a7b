// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ledgerchat/ai-tools/actions/documents`
 * Purpose: Generic document actions (list/get/create/update/delete/submit/cancel/search).
 * Scope: Contracts and handlers over DocumentStoreCapability. Does NOT implement transport.
 * Invariants:
 *   - EFFECT_TYPED: reads are read_only, writes and docstatus changes are state_change
 *   - list_documents defaults limit to 20
 * Side-effects: IO via capability
 * Links: ../capabilities/document-store.ts
 * @public
 */

import { z } from "zod";

import { bindAction } from "../types";

const doctype = z
  .string()
  .min(1)
  .describe("ERPNext doctype name, e.g. 'Sales Invoice'");
const documentName = z.string().min(1).describe("Document name/ID");
const documentData = z.record(z.unknown());

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ListDocumentsInputSchema = z
  .object({
    doctype,
    fields: z
      .array(z.string())
      .optional()
      .describe("Fields to return. Default: ['name']"),
    filters: z
      .union([z.record(z.unknown()), z.array(z.unknown())])
      .optional()
      .describe("Filters as {field: value} or {field: ['operator', value]}"),
    order_by: z
      .string()
      .optional()
      .describe("Order by clause, e.g. 'creation desc'"),
    limit: z
      .number()
      .int()
      .positive()
      .default(20)
      .describe("Max number of results (default 20)"),
  })
  .passthrough();

export const DocumentRefInputSchema = z
  .object({ doctype, name: documentName })
  .passthrough();

export const CreateDocumentInputSchema = z
  .object({
    doctype,
    data: documentData.describe("Document data with field names as keys"),
  })
  .passthrough();

export const UpdateDocumentInputSchema = z
  .object({
    doctype,
    name: documentName,
    data: documentData.describe("Fields to update"),
  })
  .passthrough();

export const SearchLinkInputSchema = z
  .object({
    doctype: z.string().min(1).describe("Doctype to search in"),
    query: z.string().describe("Search text"),
  })
  .passthrough();

// ─────────────────────────────────────────────────────────────────────────────
// Bound actions
// ─────────────────────────────────────────────────────────────────────────────

export const listDocumentsAction = bindAction(
  {
    name: "list_documents",
    description:
      "List documents of a given ERPNext doctype (e.g. 'Sales Invoice', 'Purchase Invoice', " +
      "'Journal Entry', 'Payment Entry', 'Expense Claim', 'Account', 'Item', 'Customer', " +
      "'Supplier'). Returns a list of matching documents.",
    effect: "read_only",
    inputSchema: ListDocumentsInputSchema,
  },
  (store, input) =>
    store.list(input.doctype, {
      fields: input.fields,
      filters: input.filters,
      orderBy: input.order_by,
      limit: input.limit,
    })
);

export const getDocumentAction = bindAction(
  {
    name: "get_document",
    description:
      "Get the full details of a single ERPNext document by its doctype and name.",
    effect: "read_only",
    inputSchema: DocumentRefInputSchema,
  },
  (store, input) => store.get(input.doctype, input.name)
);

export const createDocumentAction = bindAction(
  {
    name: "create_document",
    description:
      "Create a new ERPNext document. Provide the doctype and the document data as a JSON " +
      "object. Use proper ERPNext field names. For child tables (like items), use the " +
      "appropriate child table field name.",
    effect: "state_change",
    inputSchema: CreateDocumentInputSchema,
  },
  (store, input) => store.create(input.doctype, input.data)
);

export const updateDocumentAction = bindAction(
  {
    name: "update_document",
    description: "Update an existing ERPNext document.",
    effect: "state_change",
    inputSchema: UpdateDocumentInputSchema,
  },
  (store, input) => store.update(input.doctype, input.name, input.data)
);

export const deleteDocumentAction = bindAction(
  {
    name: "delete_document",
    description: "Delete an ERPNext document.",
    effect: "state_change",
    inputSchema: DocumentRefInputSchema,
  },
  (store, input) => store.delete(input.doctype, input.name)
);

export const submitDocumentAction = bindAction(
  {
    name: "submit_document",
    description:
      "Submit a draft ERPNext document (sets docstatus=1). Only for submittable doctypes " +
      "like invoices, journal entries, etc.",
    effect: "state_change",
    inputSchema: DocumentRefInputSchema,
  },
  (store, input) => store.submit(input.doctype, input.name)
);

export const cancelDocumentAction = bindAction(
  {
    name: "cancel_document",
    description: "Cancel a submitted ERPNext document (sets docstatus=2).",
    effect: "state_change",
    inputSchema: DocumentRefInputSchema,
  },
  (store, input) => store.cancel(input.doctype, input.name)
);

export const searchLinkAction = bindAction(
  {
    name: "search_link",
    description:
      "Search for a document by name (autocomplete-style). Useful to find accounts, items, " +
      "customers, suppliers, etc. by partial name.",
    effect: "read_only",
    inputSchema: SearchLinkInputSchema,
  },
  (store, input) => store.searchByNamePrefix(input.doctype, input.query)
);
