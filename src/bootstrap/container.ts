// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for the application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports and build the ChatAgent. Does not handle request-scoped lifecycle.
 * Invariants: Single container instance per process; one session store shared by every request.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire FakeChatAdapter.
 * Links: Used by the front end (excluded) and tests; configure adapters here for DI.
 * @public
 */

import {
  createChatProvider,
  FrappeRestClient,
  InMemorySessionStore,
  SystemClock,
} from "@/adapters/server";
import { FakeChatAdapter } from "@/adapters/test";
import { ChatAgent } from "@/features/ai/public";
import type {
  ChatProvider,
  Clock,
  DocumentStoreClient,
  SessionStore,
} from "@/ports";
import { serverEnv } from "@/shared/env";
import { type Logger, makeLogger } from "@/shared/observability";

export interface Container {
  log: Logger;
  clock: Clock;
  sessions: SessionStore;
  chatProvider: ChatProvider;
  agent: ChatAgent;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ service: env.SERVICE_NAME });

  // Startup log - no URLs/secrets
  log.info(
    {
      env: env.APP_ENV,
      provider: env.isTestMode ? "fake" : env.AI_PROVIDER,
      logLevel: env.PINO_LOG_LEVEL,
      maxToolRounds: env.AGENT_MAX_TOOL_ROUNDS,
    },
    "container initialized"
  );

  // Environment-based adapter wiring - single source of truth
  const chatProvider: ChatProvider = env.isTestMode
    ? new FakeChatAdapter()
    : createChatProvider(env, log);

  const clock = new SystemClock();
  const sessions = new InMemorySessionStore();
  const agent = new ChatAgent({
    provider: chatProvider,
    sessions,
    clock,
    logger: log.child({ component: "ChatAgent" }),
    maxMessageChars: env.AGENT_MAX_MESSAGE_CHARS,
  });

  return { log, clock, sessions, chatProvider, agent };
}

function frappeConfig(log: Logger) {
  const env = serverEnv();
  return {
    baseUrl: env.ERPNEXT_URL,
    timeoutMs: env.ERP_TIMEOUT_MS,
    logger: log.child({ component: "FrappeRestClient" }),
  };
}

/**
 * Client for an existing browser session.
 * @param cookie - Cookie header value from an earlier login
 */
export function createDocumentStoreClient(cookie?: string): FrappeRestClient {
  return new FrappeRestClient({
    ...frappeConfig(getContainer().log),
    cookie,
  });
}

/**
 * @throws DocumentStoreAuthError when the credentials are rejected
 */
export function loginDocumentStore(
  username: string,
  password: string
): Promise<DocumentStoreClient & { readonly sessionCookie: string }> {
  return FrappeRestClient.login(
    frappeConfig(getContainer().log),
    username,
    password
  );
}
