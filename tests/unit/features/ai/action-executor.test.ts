// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/ai/action-executor`
 * Purpose: Unit tests for the catalog-backed tool executor.
 * Scope: Dispatch, unknown tools, argument validation, failed envelopes, thrown errors. Does NOT touch HTTP.
 * Invariants: The executor never throws; every outcome is a ToolResult.
 * Side-effects: none
 * Links: src/features/ai/action-executor.ts
 * @public
 */

import { FakeDocumentStore } from "@tests/_fakes";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { createActionExecutor } from "@/features/ai/public";
import { EVENT_NAMES, makeNoopLogger } from "@/shared/observability";
import {
  createActionCatalog,
  getCompaniesAction,
} from "@ledgerchat/ai-tools";

describe("createActionExecutor", () => {
  let store: FakeDocumentStore;

  beforeEach(() => {
    store = new FakeDocumentStore();
  });

  it("dispatches a known tool with schema defaults applied", async () => {
    store.respond("getCustomers", {
      success: true,
      data: [{ name: "Acme" }, { name: "Globex" }],
    });
    const execute = createActionExecutor(store, makeNoopLogger());

    const result = await execute("get_customers", {});

    expect(result).toEqual({
      success: true,
      data: [{ name: "Acme" }, { name: "Globex" }],
    });
    expect(store.callsOf("getCustomers")).toEqual([
      { method: "getCustomers", args: [50] },
    ]);
  });

  it("returns a failed result for an unknown tool and logs it", async () => {
    const logger = makeNoopLogger();
    const warn = vi.spyOn(logger, "warn");
    const execute = createActionExecutor(store, logger);

    const result = await execute("drop_database", {});

    expect(result).toEqual({
      success: false,
      error: "Unknown tool: drop_database",
    });
    expect(store.calls).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      { tool: "drop_database" },
      EVENT_NAMES.AI_TOOL_UNKNOWN
    );
  });

  it("turns invalid arguments into a failed result with detail", async () => {
    const execute = createActionExecutor(store, makeNoopLogger());

    const result = await execute("get_customers", { limit: "many" });

    expect(result.success).toBe(false);
    expect(result).toHaveProperty("detail");
    expect(store.calls).toEqual([]);
  });

  it("carries the store status of a failed envelope", async () => {
    store.respond("get", {
      success: false,
      status: 404,
      error: { exc_type: "DoesNotExistError" },
    });
    const execute = createActionExecutor(store, makeNoopLogger());

    const result = await execute("get_document", {
      doctype: "Customer",
      name: "Nobody",
    });

    expect(result).toEqual({
      success: false,
      error: { exc_type: "DoesNotExistError" },
      status: 404,
    });
  });

  it("catches a thrown store error", async () => {
    store.respond("getCompanies", new Error("socket hang up"));
    const execute = createActionExecutor(store, makeNoopLogger());

    const result = await execute("get_companies", {});

    expect(result).toMatchObject({
      success: false,
      error: "socket hang up",
      detail: expect.stringContaining("socket hang up"),
    });
  });

  it("only resolves tools in the given catalog", async () => {
    const catalog = createActionCatalog([getCompaniesAction]);
    const execute = createActionExecutor(store, makeNoopLogger(), catalog);

    await expect(execute("get_companies", {})).resolves.toEqual({
      success: true,
      data: [],
    });
    await expect(execute("get_customers", {})).resolves.toEqual({
      success: false,
      error: "Unknown tool: get_customers",
    });
  });
});
