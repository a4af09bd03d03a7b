// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/ai/llm-http`
 * Purpose: Unit tests for shared provider HTTP helpers.
 * Scope: Argument decoding, result serialization, round cap, timeout mapping. Does NOT call any provider.
 * Side-effects: global (fetch stub)
 * Links: src/adapters/server/ai/llm-http.ts
 * @public
 */

import { jsonResponse, stubFetch, textResponse } from "@tests/_fakes";
import { describe, expect, it } from "vitest";
import { z } from "zod";

import {
  decodeToolArgs,
  isRoundCapReached,
  postForJson,
  serializeToolResult,
} from "@/adapters/server/ai/llm-http";

describe("decodeToolArgs", () => {
  it.each([
    [{ a: 1 }, { args: { a: 1 }, ok: true }],
    ['{"a":1}', { args: { a: 1 }, ok: true }],
    ["", { args: {}, ok: true }],
    ["  ", { args: {}, ok: true }],
    ["[1,2]", { args: {}, ok: false }],
    ["{broken", { args: {}, ok: false }],
    [null, { args: {}, ok: false }],
    [42, { args: {}, ok: false }],
  ])("decodes %j", (raw, expected) => {
    expect(decodeToolArgs(raw)).toEqual(expected);
  });
});

describe("serializeToolResult", () => {
  it("serializes with JSON.stringify", () => {
    expect(serializeToolResult({ success: true, data: [1] })).toBe(
      '{"success":true,"data":[1]}'
    );
    expect(serializeToolResult(undefined)).toBe("null");
  });
});

describe("isRoundCapReached", () => {
  it("never caps when the limit is 0", () => {
    expect(isRoundCapReached(1000, 0)).toBe(false);
  });

  it("caps once completed rounds reach the limit", () => {
    expect(isRoundCapReached(2, 3)).toBe(false);
    expect(isRoundCapReached(3, 3)).toBe(true);
  });
});

describe("postForJson", () => {
  const request = {
    provider: "Test",
    url: "https://llm.test/x",
    headers: {},
    body: {},
    timeoutMs: 1000,
    schema: z.object({ ok: z.boolean() }),
  };

  it("returns the parsed body", async () => {
    stubFetch().mockResolvedValueOnce(jsonResponse({ ok: true, extra: 1 }));

    await expect(postForJson(request)).resolves.toEqual({ ok: true });
  });

  it("maps a timeout to kind timeout", async () => {
    stubFetch().mockRejectedValueOnce(
      new DOMException("The operation was aborted due to timeout", "TimeoutError")
    );

    await expect(postForJson(request)).rejects.toMatchObject({
      name: "LlmError",
      kind: "timeout",
      status: 408,
      message: "Test request timed out",
    });
  });

  it("maps 503 to provider_5xx", async () => {
    stubFetch().mockResolvedValueOnce(
      textResponse("down", { status: 503, statusText: "Service Unavailable" })
    );

    await expect(postForJson(request)).rejects.toMatchObject({
      kind: "provider_5xx",
      status: 503,
    });
  });

  it("rejects a non-JSON success body", async () => {
    stubFetch().mockResolvedValueOnce(textResponse("<html>"));

    await expect(postForJson(request)).rejects.toMatchObject({
      kind: "unknown",
      message: "Test returned a non-JSON body",
    });
  });

  it("names the failing path of a bad shape", async () => {
    stubFetch().mockResolvedValueOnce(jsonResponse({ ok: "yes" }));

    await expect(postForJson(request)).rejects.toMatchObject({
      kind: "unknown",
      message: "Test returned an unexpected response shape at ok",
    });
  });
});
