// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logger`
 * Purpose: Pino logger factory for the agent process.
 * Scope: Builds the root logger; components derive children with `component` bindings. Does not format output.
 * Invariants: JSON lines on stdout only; secrets and session cookies pass through REDACT_PATHS.
 * Side-effects: none
 * Notes: Reads NODE_ENV, PINO_LOG_LEVEL and SERVICE_NAME from process.env directly so importing it never triggers serverEnv() validation. Pipe through pino-pretty locally.
 * Links: redact.ts, bootstrap/container.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

const APP_NAME = "ledgerchat";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const isProduction = nodeEnv === "production";
  // Silent under vitest and NODE_ENV=test
  const enabled = process.env.VITEST !== "true" && nodeEnv !== "test";

  return pino(
    {
      level: process.env.PINO_LOG_LEVEL ?? "info",
      enabled,
      // Reserved keys last so bindings cannot overwrite them
      base: {
        ...bindings,
        app: APP_NAME,
        service: process.env.SERVICE_NAME ?? APP_NAME,
      },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    // Buffered writes in production only
    pino.destination(
      isProduction ? { dest: 1, sync: false, minLength: 4096 } : { dest: 1, sync: true }
    )
  );
}

/**
 * Disabled pino instance; same type, no output.
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
