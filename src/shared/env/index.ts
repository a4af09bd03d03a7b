// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for environment configuration with validated env objects.
 * Scope: Re-exports server env. Does not export internal schemas.
 * Invariants: Only re-exports public APIs.
 * Side-effects: process.env
 * @public
 */

export type { AiProvider, EnvValidationMeta, ServerEnv } from "./server";
export {
  AI_PROVIDERS,
  assertProviderSecrets,
  EnvValidationError,
  resetServerEnv,
  serverEnv,
} from "./server";

