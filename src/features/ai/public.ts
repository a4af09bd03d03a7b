// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/public`
 * Purpose: Public API surface for the AI feature - barrel export for stable feature boundaries.
 * Scope: Re-exports the conversation agent, executor factory and failure classifier. Does not implement logic.
 * Invariants: Feature consumers import from this file, never from internal modules.
 * Side-effects: none
 * Links: Part of hexagonal architecture boundary enforcement
 * @public
 */

export { createActionExecutor } from "./action-executor";
export { ChatAgent, type ChatAgentDeps } from "./chat-agent";
export { type ChatFailureKind, classifyChatFailure } from "./errors";
