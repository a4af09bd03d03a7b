// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/action-executor`
 * Purpose: Bind the action catalog to one document-store client as a ToolExecutor.
 * Scope: Looks up the action, parses arguments, dispatches, converts the outcome to a ToolResult. Does not import adapters.
 * Invariants:
 *   - Never rejects: unknown names, schema failures and thrown errors all become {success:false}
 *   - Unknown names never reach the client
 *   - Logs name, outcome and item counts only; arguments and payloads stay out of logs
 * Side-effects: IO (through the bound client)
 * Links: @ledgerchat/ai-tools catalog, ports/llm.port.ts (ToolExecutor)
 * @public
 */

import type { ToolArgs, ToolResult } from "@/core";
import type { ActionEnvelope, DocumentStoreClient, ToolExecutor } from "@/ports";
import { EVENT_NAMES, type Logger } from "@/shared/observability";
import {
  ACTION_CATALOG,
  type ActionCatalog,
  getActionByName,
} from "@ledgerchat/ai-tools";

function toToolResult(envelope: ActionEnvelope): ToolResult {
  if (envelope.success) return { success: true, data: envelope.data };
  return {
    success: false,
    error: envelope.error,
    status: envelope.status,
  };
}

function itemCount(data: unknown): number | undefined {
  return Array.isArray(data) ? data.length : undefined;
}

/**
 * @param catalog - Defaults to the full action catalog
 */
export function createActionExecutor(
  client: DocumentStoreClient,
  logger: Logger,
  catalog: ActionCatalog = ACTION_CATALOG
): ToolExecutor {
  return async (name: string, args: ToolArgs): Promise<ToolResult> => {
    const action = getActionByName(name, catalog);
    if (!action) {
      logger.warn({ tool: name }, EVENT_NAMES.AI_TOOL_UNKNOWN);
      return { success: false, error: `Unknown tool: ${name}` };
    }

    logger.info(
      { tool: name, effect: action.effect },
      EVENT_NAMES.AI_TOOL_CALL
    );
    const started = Date.now();

    try {
      const result = toToolResult(await action.run(client, args));
      logger.info(
        {
          tool: name,
          success: result.success,
          ...(result.success
            ? { items: itemCount(result.data) }
            : { status: result.status }),
          durationMs: Date.now() - started,
        },
        EVENT_NAMES.AI_TOOL_RESULT
      );
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(
        {
          tool: name,
          success: false,
          errorType: error instanceof Error ? error.name : typeof error,
          durationMs: Date.now() - started,
        },
        EVENT_NAMES.AI_TOOL_RESULT
      );
      return {
        success: false,
        error: message,
        detail: error instanceof Error ? (error.stack ?? message) : message,
      };
    }
  };
}
