// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export {
  ANTHROPIC_MAX_TOKENS,
  ANTHROPIC_VERSION,
  AnthropicChatAdapter,
} from "./ai/anthropic.adapter";
export type { ChatAdapterConfig } from "./ai/llm-http";
export { OllamaChatAdapter } from "./ai/ollama.adapter";
export { OpenAiChatAdapter } from "./ai/openai.adapter";
export {
  type ChatProviderEnv,
  createChatProvider,
} from "./ai/provider.factory";
export {
  DEFAULT_LIST_LIMIT,
  type FrappeClientConfig,
  FrappeRestClient,
  REPORT_METHODS,
} from "./erp/frappe-rest.adapter";
export { InMemorySessionStore } from "./session/in-memory-session.store";
export { SystemClock } from "./time/system.adapter";
