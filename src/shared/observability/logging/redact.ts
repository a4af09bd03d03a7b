// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger module.
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "pwd",
  "usr",
  "token",
  "secret",
  "apiKey",
  "api_key",
  "OPENAI_API_KEY",
  "ANTHROPIC_API_KEY",
  // Backend session
  "cookie",
  "sid",
  // HTTP headers
  "headers.authorization",
  "headers.cookie",
  'headers["x-api-key"]',
  'headers["set-cookie"]',
];
