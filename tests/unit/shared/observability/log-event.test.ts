// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/observability/log-event`
 * Purpose: Unit tests for structured event logging.
 * Scope: sessionId requirement, level routing, session id truncation.
 * Invariants: Runs under Vitest, where a missing sessionId throws.
 * Side-effects: none
 * Links: src/shared/observability/logging/log-event.ts
 * @public
 */

import { describe, expect, it, vi } from "vitest";

import {
  EVENT_NAMES,
  logEvent,
  makeNoopLogger,
  sessionLogId,
} from "@/shared/observability";

describe("logEvent", () => {
  it("logs the event name with its fields", () => {
    const logger = makeNoopLogger();
    const info = vi.spyOn(logger, "info");

    logEvent(logger, EVENT_NAMES.AI_SESSION_CREATED, { sessionId: "abc" });

    expect(info).toHaveBeenCalledWith(
      { event: "ai.session_created", sessionId: "abc" },
      "ai.session_created"
    );
  });

  it("routes to the requested level", () => {
    const logger = makeNoopLogger();
    const warn = vi.spyOn(logger, "warn");

    logEvent(
      logger,
      EVENT_NAMES.AI_CONTEXT_FAILED,
      { sessionId: "abc", errorType: "TypeError" },
      "warn"
    );

    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("throws without a sessionId under test", () => {
    expect(() =>
      logEvent(makeNoopLogger(), EVENT_NAMES.AI_CHAT_RECEIVED, { sessionId: "" })
    ).toThrow(/without sessionId/);
  });
});

describe("sessionLogId", () => {
  it("keeps the first eight characters", () => {
    expect(sessionLogId("0123456789abcdef")).toBe("01234567");
    expect(sessionLogId("short")).toBe("short");
  });
});
