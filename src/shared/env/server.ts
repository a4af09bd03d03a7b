// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env; provides lazy cached access and provider secret checks. Does not read files.
 * Invariants: All env vars validated on first access; fails fast on invalid env; provider keys are checked only for the selected provider.
 * Side-effects: process.env
 * Notes: APP_ENV controls adapter wiring (test → fake chat provider); AGENT_MAX_TOOL_ROUNDS=0 disables the round cap.
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const baseUrl = z
  .string()
  .url()
  .transform((url) => url.replace(/\/+$/, ""));

export const AI_PROVIDERS = ["openai", "anthropic", "ollama"] as const;
export type AiProvider = (typeof AI_PROVIDERS)[number];

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]).default("production"),

  // Service identity for observability
  SERVICE_NAME: z.string().default("ledgerchat"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // Document store
  ERPNEXT_URL: baseUrl,
  ERP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Model provider
  AI_PROVIDER: z.enum(AI_PROVIDERS).default("openai"),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: baseUrl.default("https://api.openai.com"),
  OPENAI_MODEL: z.string().min(1).default("gpt-4o"),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  ANTHROPIC_BASE_URL: baseUrl.default("https://api.anthropic.com"),
  ANTHROPIC_MODEL: z.string().min(1).default("claude-sonnet-4-20250514"),
  OLLAMA_URL: baseUrl.default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().min(1).default("llama3"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  // Conversation loop
  AGENT_MAX_TOOL_ROUNDS: z.coerce.number().int().min(0).default(25),
  // Unset means no length cap on user messages
  AGENT_MAX_MESSAGE_CHARS: z.coerce.number().int().positive().optional(),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

function toValidationError(error: ZodError): EnvValidationError {
  const missing = new Set<string>();
  const invalid = new Set<string>();

  for (const issue of error.issues) {
    const key = issue.path[0]?.toString();
    if (!key) continue;

    // Treat all invalid_type as missing (undefined is the common case)
    if (issue.code === "invalid_type") {
      missing.add(key);
    } else {
      invalid.add(key);
    }
  }

  return new EnvValidationError({
    code: "INVALID_ENV",
    missing: [...missing],
    invalid: [...invalid],
  });
}

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);
      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode: parsed.APP_ENV === "test",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        throw toValidationError(error);
      }
      throw error;
    }
  }
  return ENV;
}

/**
 * Drop the cached env so the next serverEnv() re-reads process.env. Tests only.
 */
export function resetServerEnv(): void {
  ENV = null;
}

/**
 * Check the selected provider's credentials at the adapter boundary.
 * Ollama needs none.
 * @throws EnvValidationError listing the missing key
 */
export function assertProviderSecrets(
  env: Pick<
    ServerEnv,
    "AI_PROVIDER" | "OPENAI_API_KEY" | "ANTHROPIC_API_KEY"
  >
): void {
  const missingKey =
    env.AI_PROVIDER === "openai" && !env.OPENAI_API_KEY
      ? "OPENAI_API_KEY"
      : env.AI_PROVIDER === "anthropic" && !env.ANTHROPIC_API_KEY
        ? "ANTHROPIC_API_KEY"
        : undefined;

  if (missingKey) {
    throw new EnvValidationError({
      code: "INVALID_ENV",
      missing: [missingKey],
      invalid: [],
    });
  }
}

export type { ServerEnv };
