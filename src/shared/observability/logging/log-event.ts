// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/log-event`
 * Purpose: Type-safe event logger that enforces the event name registry and base fields.
 * Scope: Single function for structured conversation events. Does not create loggers.
 * Invariants: sessionId MUST be present (throws under vitest, logs an invariant error elsewhere); event name MUST be from registry.
 * Side-effects: IO (logging)
 * Links: Uses EVENT_NAMES registry from ../events; called by features/ai.
 * @public
 */

import type { Logger } from "pino";

import type { EventBase, EventName } from "../events";

const SESSION_ID_CHARS = 8;

/**
 * Truncated session key for log correlation.
 */
export function sessionLogId(sessionKey: string): string {
  return sessionKey.slice(0, SESSION_ID_CHARS);
}

/**
 * @param fields - Event-specific bounded metadata (MUST include sessionId)
 * @param level - Defaults to info
 */
export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  level: "info" | "warn" | "error" = "info"
): void {
  if (!fields.sessionId) {
    const isStrict = process.env.VITEST === "true";

    if (isStrict) {
      throw new Error(
        `INVARIANT VIOLATION: logEvent("${eventName}") called without sessionId`
      );
    }
    logger.error(
      { event: eventName, missingField: "sessionId" },
      "inv_missing_sessionId_in_logEvent"
    );
    return;
  }

  logger[level]({ event: eventName, ...fields }, eventName);
}
