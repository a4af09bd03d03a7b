// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces - canonical import surface.
 * Scope: Re-exports public port interfaces. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export type { Clock } from "./clock.port";
export {
  type ActionEnvelope,
  type CostCenterQuery,
  DocumentStoreAuthError,
  type DocumentStoreCapability,
  type DocumentStoreClient,
  isDocumentStoreAuthError,
  type ListDocumentsParams,
} from "./document-store.port";
export type {
  ChatProvider,
  ChatProviderId,
  Message,
  ProviderReply,
  ProviderTurn,
  ToolExecutor,
} from "./llm.port";
export type { SessionStore } from "./session-store.port";
