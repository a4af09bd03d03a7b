// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/erp/frappe-rest.adapter`
 * Purpose: Unit tests for the Frappe REST client with mocked HTTP calls.
 * Scope: Endpoints, query encoding, envelopes, cookie session, login, snapshot partial failure. Does NOT call a real server.
 * Invariants: No real HTTP calls; deterministic responses.
 * Side-effects: global (fetch stub)
 * Links: src/adapters/server/erp/frappe-rest.adapter.ts
 * @public
 */

import {
  type FetchMock,
  jsonResponse,
  requestBody,
  requestHeaders,
  requestInit,
  requestUrl,
  stubFetch,
  textResponse,
} from "@tests/_fakes";
import { beforeEach, describe, expect, it } from "vitest";

import { FrappeRestClient, REPORT_METHODS } from "@/adapters/server";
import { DocumentStoreAuthError } from "@/ports";
import { makeNoopLogger } from "@/shared/observability";

const CONFIG = {
  baseUrl: "http://erp.test",
  timeoutMs: 1000,
  logger: makeNoopLogger(),
};

describe("FrappeRestClient", () => {
  let mockFetch: FetchMock;
  let client: FrappeRestClient;

  beforeEach(() => {
    mockFetch = stubFetch();
    mockFetch.mockImplementation(async () => jsonResponse({ data: [] }));
    client = new FrappeRestClient(CONFIG);
  });

  describe("list", () => {
    it("always sends paging and nothing else by default", async () => {
      await client.list("Customer");

      const url = requestUrl(mockFetch);
      expect(url.pathname).toBe("/api/resource/Customer");
      expect(Object.fromEntries(url.searchParams)).toEqual({
        limit_page_length: "20",
        limit_start: "0",
      });
      expect(requestInit(mockFetch).method).toBe("GET");
    });

    it("JSON-encodes fields and filters", async () => {
      await client.list("Sales Invoice", {
        fields: ["name", "grand_total"],
        filters: { status: "Unpaid", grand_total: [">", 100] },
        orderBy: "posting_date desc",
        limit: 5,
        offset: 10,
      });

      const url = requestUrl(mockFetch);
      expect(url.pathname).toBe("/api/resource/Sales%20Invoice");
      expect(Object.fromEntries(url.searchParams)).toEqual({
        limit_page_length: "5",
        limit_start: "10",
        fields: '["name","grand_total"]',
        filters: '{"status":"Unpaid","grand_total":[">",100]}',
        order_by: "posting_date desc",
      });
    });

    it("drops empty fields and filters", async () => {
      await client.list("Item", { fields: [], filters: [] });

      expect(requestUrl(mockFetch).searchParams.has("fields")).toBe(false);
      expect(requestUrl(mockFetch).searchParams.has("filters")).toBe(false);
    });
  });

  describe("document operations", () => {
    it("URL-encodes doctype and name", async () => {
      await client.get("Sales Invoice", "ACC-SINV/2024/001");

      expect(requestUrl(mockFetch).pathname).toBe(
        "/api/resource/Sales%20Invoice/ACC-SINV%2F2024%2F001"
      );
    });

    it("creates with POST {data}", async () => {
      await client.create("Journal Entry", { title: "Rent" });

      expect(requestInit(mockFetch).method).toBe("POST");
      expect(requestHeaders(mockFetch).get("content-type")).toBe(
        "application/json"
      );
      expect(requestBody(mockFetch)).toEqual({ data: { title: "Rent" } });
    });

    it("submits and cancels through docstatus updates", async () => {
      await client.submit("Sales Invoice", "SINV-1");
      await client.cancel("Sales Invoice", "SINV-1");

      expect(requestInit(mockFetch, 0).method).toBe("PUT");
      expect(requestBody(mockFetch, 0)).toEqual({ data: { docstatus: 1 } });
      expect(requestBody(mockFetch, 1)).toEqual({ data: { docstatus: 2 } });
      expect(requestUrl(mockFetch, 1).pathname).toBe(
        "/api/resource/Sales%20Invoice/SINV-1"
      );
    });

    it("deletes without a body", async () => {
      await client.delete("Item", "PEN");

      expect(requestInit(mockFetch).method).toBe("DELETE");
      expect(requestInit(mockFetch).body).toBeUndefined();
    });

    it("searches names with a like filter", async () => {
      await client.searchByNamePrefix("Customer", "glo");

      const url = requestUrl(mockFetch);
      expect(url.pathname).toBe("/api/method/frappe.client.get_list");
      expect(Object.fromEntries(url.searchParams)).toEqual({
        doctype: "Customer",
        filters: '{"name":["like","%glo%"]}',
        fields: '["name"]',
        limit_page_length: "10",
      });
    });

    it("posts remote method kwargs", async () => {
      await client.callRemoteMethod("erpnext.custom.do_thing", { x: 1 });

      expect(requestUrl(mockFetch).pathname).toBe(
        "/api/method/erpnext.custom.do_thing"
      );
      expect(requestInit(mockFetch).method).toBe("POST");
      expect(requestBody(mockFetch)).toEqual({ x: 1 });
    });
  });

  describe("convenience queries", () => {
    it("filters accounts by the given company only", async () => {
      await client.getAccounts({ company: "Acme" });

      const params = requestUrl(mockFetch).searchParams;
      expect(params.get("filters")).toBe('{"company":"Acme"}');
      expect(params.get("limit_page_length")).toBe("200");
      expect(params.get("fields")).toBe(
        '["name","account_name","root_type","account_type","parent_account","is_group"]'
      );
    });

    it("sends no account filters when none are given", async () => {
      await client.getAccounts();

      expect(requestUrl(mockFetch).searchParams.has("filters")).toBe(false);
    });

    it("defaults master data limits to 50", async () => {
      await client.getCustomers();

      expect(requestUrl(mockFetch).searchParams.get("limit_page_length")).toBe(
        "50"
      );
    });

    it("sends only the set ledger arguments", async () => {
      await client.getGeneralLedger({ account: "Cash - A" });

      expect(requestUrl(mockFetch).pathname).toBe(
        `/api/method/${REPORT_METHODS.generalLedger}`
      );
      expect(requestBody(mockFetch)).toEqual({
        limit_page_length: 50,
        account: "Cash - A",
      });
    });

    it("sends an empty body for a bare balance sheet", async () => {
      await client.getBalanceSheet();

      expect(requestBody(mockFetch)).toEqual({});
    });
  });

  describe("envelopes", () => {
    it("unwraps data", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ data: [{ name: "A" }] }));

      await expect(client.list("Customer")).resolves.toEqual({
        success: true,
        data: [{ name: "A" }],
      });
    });

    it("falls back to message, then the whole body", async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ message: { ok: 1 } }))
        .mockResolvedValueOnce(jsonResponse({ other: true }));

      await expect(client.callRemoteMethod("m")).resolves.toEqual({
        success: true,
        data: { ok: 1 },
      });
      await expect(client.callRemoteMethod("m")).resolves.toEqual({
        success: true,
        data: { other: true },
      });
    });

    it("returns raw text for a non-JSON success body", async () => {
      mockFetch.mockResolvedValueOnce(textResponse("pong"));

      await expect(client.callRemoteMethod("ping")).resolves.toEqual({
        success: true,
        data: "pong",
      });
    });

    it("carries status and JSON error on HTTP failure", async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ exc_type: "DoesNotExistError" }, { status: 404 })
      );

      await expect(client.get("Customer", "NOPE")).resolves.toEqual({
        success: false,
        status: 404,
        error: { exc_type: "DoesNotExistError" },
      });
    });

    it("carries text error on non-JSON failure", async () => {
      mockFetch.mockResolvedValueOnce(textResponse("Bad Gateway", { status: 502 }));

      await expect(client.get("Customer", "A")).resolves.toEqual({
        success: false,
        status: 502,
        error: "Bad Gateway",
      });
    });

    it("reports status 0 when no response arrives", async () => {
      mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(client.getCompanies()).resolves.toEqual({
        success: false,
        status: 0,
        error: "fetch failed",
      });
    });

    it("reports status 0 on timeout", async () => {
      mockFetch.mockRejectedValueOnce(
        new DOMException("The operation was aborted due to timeout", "TimeoutError")
      );

      await expect(client.getCompanies()).resolves.toEqual({
        success: false,
        status: 0,
        error: "Request timed out after 1000ms",
      });
    });
  });

  describe("session cookie", () => {
    it("sends the initial cookie and applies Set-Cookie updates", async () => {
      client = new FrappeRestClient({
        ...CONFIG,
        cookie: "sid=abc; system_user=yes",
      });
      mockFetch.mockResolvedValueOnce(
        jsonResponse(
          { data: [] },
          { headers: { "Set-Cookie": "sid=rotated; Path=/; HttpOnly" } }
        )
      );

      await client.list("Customer");
      await client.list("Customer");

      expect(requestHeaders(mockFetch, 0).get("cookie")).toBe(
        "sid=abc; system_user=yes"
      );
      expect(requestHeaders(mockFetch, 1).get("cookie")).toBe(
        "sid=rotated; system_user=yes"
      );
      expect(client.sessionCookie).toBe("sid=rotated; system_user=yes");
    });

    it("sends no cookie header without a session", async () => {
      await client.list("Customer");

      expect(requestHeaders(mockFetch).has("cookie")).toBe(false);
    });
  });

  describe("login", () => {
    it("posts credentials and keeps the session cookie", async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse(
          { message: "Logged In" },
          { headers: { "Set-Cookie": "sid=s3ss10n; Path=/" } }
        )
      );

      const loggedIn = await FrappeRestClient.login(
        CONFIG,
        "user@example.com",
        "test-password"
      );

      expect(requestUrl(mockFetch).pathname).toBe("/api/method/login");
      expect(requestBody(mockFetch)).toEqual({
        usr: "user@example.com",
        pwd: "test-password",
      });
      expect(loggedIn.sessionCookie).toBe("sid=s3ss10n");
    });

    it("throws DocumentStoreAuthError with the server message", async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ message: "Invalid Login. Try again." }, { status: 401 })
      );

      const error = await FrappeRestClient.login(
        CONFIG,
        "user@example.com",
        "wrong"
      ).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DocumentStoreAuthError);
      expect(error).toMatchObject({
        message: "Invalid Login. Try again.",
        status: 401,
      });
    });

    it("falls back to a generic message", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, { status: 401 }));

      await expect(
        FrappeRestClient.login(CONFIG, "u", "p")
      ).rejects.toMatchObject({ name: "DocumentStoreAuthError", message: "Login failed" });
    });

    it("throws a plain error when the server is unreachable", async () => {
      mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

      const error = await FrappeRestClient.login(CONFIG, "u", "p").catch(
        (e: unknown) => e
      );

      expect(error).not.toBeInstanceOf(DocumentStoreAuthError);
      expect(error).toMatchObject({
        message: "Could not reach the document store: fetch failed",
      });
    });
  });

  it("reads the logged-in user", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ message: "admin@example.com" }));

    await expect(client.getLoggedInUser()).resolves.toBe("admin@example.com");
    expect(requestUrl(mockFetch).pathname).toBe(
      "/api/method/frappe.auth.get_logged_user"
    );
  });

  it("returns an empty user id on failure", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}, { status: 403 }));

    await expect(client.getLoggedInUser()).resolves.toBe("");
  });

  describe("fetchContextSnapshot", () => {
    function doctypeOf(input: Parameters<typeof fetch>[0]): string {
      const url = new URL(input instanceof Request ? input.url : input);
      return decodeURIComponent(url.pathname.split("/")[3] ?? "");
    }

    it("empties only the failing section", async () => {
      mockFetch.mockImplementation(async (input) => {
        const doctype = doctypeOf(input);
        if (doctype === "Fiscal Year") {
          return textResponse("boom", { status: 500 });
        }
        if (doctype === "Item") throw new TypeError("fetch failed");
        return jsonResponse({ data: [{ name: doctype }] });
      });

      const snapshot = await client.fetchContextSnapshot();

      expect(snapshot).toEqual({
        companies: [{ name: "Company" }],
        fiscalYears: [],
        accounts: [{ name: "Account" }],
        costCenters: [{ name: "Cost Center" }],
        customers: [{ name: "Customer" }],
        suppliers: [{ name: "Supplier" }],
        items: [],
        recentSalesInvoices: [{ name: "Sales Invoice" }],
        recentPurchaseInvoices: [{ name: "Purchase Invoice" }],
        recentJournalEntries: [{ name: "Journal Entry" }],
        modesOfPayment: [{ name: "Mode of Payment" }],
      });
      expect(mockFetch).toHaveBeenCalledTimes(11);
    });

    it("queries leaf accounts and newest documents first", async () => {
      await client.fetchContextSnapshot();

      const accounts = requestUrl(mockFetch, 2).searchParams;
      expect(accounts.get("filters")).toBe('{"is_group":0}');
      expect(accounts.get("limit_page_length")).toBe("200");

      const fiscalYears = requestUrl(mockFetch, 1).searchParams;
      expect(fiscalYears.get("order_by")).toBe("year_start_date desc");
      expect(fiscalYears.get("limit_page_length")).toBe("5");

      expect(requestUrl(mockFetch, 4).searchParams.get("limit_page_length")).toBe(
        "30"
      );
      expect(requestUrl(mockFetch, 7).searchParams.get("order_by")).toBe(
        "posting_date desc"
      );
    });

    it("ignores a non-list payload", async () => {
      mockFetch.mockImplementation(async () => jsonResponse({ data: { x: 1 } }));

      const snapshot = await client.fetchContextSnapshot();

      expect(snapshot.companies).toEqual([]);
    });
  });
});
