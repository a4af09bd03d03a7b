// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/chat-agent`
 * Purpose: Per-session conversation loop: system prompt, history, tool round-trips through the provider.
 * Scope: Owns session lifecycle and ordering. Does not speak any provider wire format or HTTP.
 * Invariants:
 *   - History starts with exactly one system message; getHistory never returns it
 *   - Invalid user text throws before anything is stored
 *   - Provider turns land in history in order, followed by the final assistant message
 *   - Calls for one session key run one after another; different keys never wait on each other
 *   - The context snapshot is fetched once per session until refreshContext drops it
 *   - After refreshContext on a live session, the next chat rebuilds message 0 and keeps every later turn
 *   - A chat in flight across clearSession never writes into the new session
 *   - A snapshot fetched across clearSession or refreshContext is never cached
 *   - Per-key bookkeeping lives only while that key has queued turns
 * Side-effects: IO (provider calls, document-store reads through the client)
 * Notes: Provider and tool-loop errors propagate; the user message stays in history so a retry keeps the thread.
 * Links: ports/llm.port.ts, features/ai/action-executor.ts, core/ai/system-prompt.server.ts
 * @public
 */

import {
  assertValidUserMessage,
  buildSystemMessage,
  contextFailureText,
  type ConversationMessage,
  filterSystemMessages,
  formatContextSnapshot,
  type Message,
} from "@/core";
import type {
  ChatProvider,
  Clock,
  DocumentStoreClient,
  SessionStore,
} from "@/ports";
import {
  EVENT_NAMES,
  type Logger,
  logEvent,
  sessionLogId,
} from "@/shared/observability";
import {
  ACTION_CATALOG,
  type ActionCatalog,
  type ActionDefinition,
  catalogToDefinitions,
} from "@ledgerchat/ai-tools";

import { createActionExecutor } from "./action-executor";
import { classifyChatFailure } from "./errors";

export interface ChatAgentDeps {
  readonly provider: ChatProvider;
  readonly sessions: SessionStore;
  readonly clock: Clock;
  readonly logger: Logger;
  /** Defaults to the full action catalog */
  readonly catalog?: ActionCatalog;
  /** Upper bound on user message length in code points; unlimited when unset */
  readonly maxMessageChars?: number;
}

/**
 * Pending work for one session key.
 * `session` is bumped by clearSession, `context` by clearSession and refreshContext.
 */
interface SessionLane {
  tail: Promise<void>;
  session: number;
  context: number;
}

interface PreparedHistory {
  readonly history: Message[];
  /** Set when the snapshot was fetched for this turn and is not cached yet */
  readonly freshContext?: string;
}

export class ChatAgent {
  private readonly definitions: readonly ActionDefinition[];
  private readonly catalog: ActionCatalog;
  private readonly lanes = new Map<string, SessionLane>();

  constructor(private readonly deps: ChatAgentDeps) {
    this.catalog = deps.catalog ?? ACTION_CATALOG;
    this.definitions = catalogToDefinitions(this.catalog);
  }

  /**
   * Send one user message and run the tool loop to a final answer.
   * @throws ChatValidationError for empty or oversized text
   * @throws LlmError, ToolLoopLimitError from the provider
   */
  async chat(
    sessionKey: string,
    userText: string,
    client: DocumentStoreClient
  ): Promise<string> {
    assertValidUserMessage(userText, this.deps.maxMessageChars);
    return this.serialize(sessionKey, () =>
      this.runTurn(sessionKey, userText, client)
    );
  }

  /** Conversation without the system message, as a copy */
  getHistory(sessionKey: string): ConversationMessage[] {
    return filterSystemMessages(this.deps.sessions.getMessages(sessionKey));
  }

  clearSession(sessionKey: string): void {
    this.deps.sessions.delete(sessionKey);
    const lane = this.lanes.get(sessionKey);
    if (lane) {
      lane.session += 1;
      lane.context += 1;
    }
    logEvent(this.deps.logger, EVENT_NAMES.AI_SESSION_CLEARED, {
      sessionId: sessionLogId(sessionKey),
    });
  }

  /**
   * Drop the cached snapshot. A live session gets a rebuilt system message on its next chat.
   */
  refreshContext(sessionKey: string): void {
    this.deps.sessions.dropContext(sessionKey);
    const lane = this.lanes.get(sessionKey);
    if (lane) lane.context += 1;
    logEvent(this.deps.logger, EVENT_NAMES.AI_CONTEXT_INVALIDATED, {
      sessionId: sessionLogId(sessionKey),
    });
  }

  /** Session keys with queued or running turns */
  get activeSessionCount(): number {
    return this.lanes.size;
  }

  private async runTurn(
    sessionKey: string,
    userText: string,
    client: DocumentStoreClient
  ): Promise<string> {
    const { provider, sessions, logger } = this.deps;
    const sessionId = sessionLogId(sessionKey);
    const startEpochs = this.epochs(sessionKey);
    const started = Date.now();

    logEvent(logger, EVENT_NAMES.AI_CHAT_RECEIVED, {
      sessionId,
      messageLength: userText.length,
    });

    const isCurrent = () =>
      this.epochs(sessionKey).session === startEpochs.session;

    const { history, freshContext } = await this.prepareHistory(
      sessionKey,
      client
    );
    history.push({ role: "user", content: userText });
    if (isCurrent()) {
      if (
        freshContext !== undefined &&
        this.epochs(sessionKey).context === startEpochs.context
      ) {
        sessions.setContext(sessionKey, freshContext);
      }
      sessions.setMessages(sessionKey, history);
    }

    const executor = createActionExecutor(
      client,
      logger.child({ sessionId }),
      this.catalog
    );

    try {
      const reply = await provider.send(history, this.definitions, executor);

      if (isCurrent()) {
        sessions.appendMessages(sessionKey, [
          ...reply.turns,
          { role: "assistant", content: reply.text },
        ]);
      }

      logEvent(logger, EVENT_NAMES.AI_CHAT_COMPLETED, {
        sessionId,
        provider: provider.providerId,
        model: provider.model,
        turns: reply.turns.length,
        responseLength: reply.text.length,
        durationMs: Date.now() - started,
      });
      return reply.text;
    } catch (error) {
      logEvent(
        logger,
        EVENT_NAMES.AI_CHAT_FAILED,
        {
          sessionId,
          provider: provider.providerId,
          errorKind: classifyChatFailure(error),
          durationMs: Date.now() - started,
        },
        "error"
      );
      throw error;
    }
  }

  /**
   * Stored history with a current system message at index 0.
   * Nothing is written to the store here.
   */
  private async prepareHistory(
    sessionKey: string,
    client: DocumentStoreClient
  ): Promise<PreparedHistory> {
    const { sessions, clock, logger } = this.deps;
    const history = sessions.getMessages(sessionKey);
    const cached = sessions.getContext(sessionKey);
    const sessionId = sessionLogId(sessionKey);

    if (history.length === 0) {
      const contextText =
        cached ?? (await this.fetchContext(sessionKey, client));
      logEvent(logger, EVENT_NAMES.AI_SESSION_CREATED, { sessionId });
      return {
        history: [buildSystemMessage(clock.today(), contextText)],
        freshContext: cached === undefined ? contextText : undefined,
      };
    }

    if (cached !== undefined) return { history };

    // Context is only absent on a live session after refreshContext
    const contextText = await this.fetchContext(sessionKey, client);
    const systemMessage = buildSystemMessage(clock.today(), contextText);
    if (history[0]?.role === "system") {
      history[0] = systemMessage;
    } else {
      history.unshift(systemMessage);
    }
    logEvent(logger, EVENT_NAMES.AI_SYSTEM_PROMPT_REBUILT, {
      sessionId,
      historyLength: history.length,
    });
    return { history, freshContext: contextText };
  }

  private async fetchContext(
    sessionKey: string,
    client: DocumentStoreClient
  ): Promise<string> {
    const { logger } = this.deps;
    const sessionId = sessionLogId(sessionKey);
    try {
      const contextText = formatContextSnapshot(
        await client.fetchContextSnapshot()
      );
      logEvent(logger, EVENT_NAMES.AI_CONTEXT_LOADED, {
        sessionId,
        contextLength: contextText.length,
      });
      return contextText;
    } catch (error) {
      logEvent(
        logger,
        EVENT_NAMES.AI_CONTEXT_FAILED,
        {
          sessionId,
          errorType: error instanceof Error ? error.name : typeof error,
        },
        "warn"
      );
      return contextFailureText(error);
    }
  }

  private epochs(sessionKey: string): { session: number; context: number } {
    const lane = this.lanes.get(sessionKey);
    return { session: lane?.session ?? 0, context: lane?.context ?? 0 };
  }

  /**
   * Chain `task` behind earlier work for the same key.
   * A failed task does not block the ones queued after it.
   */
  private serialize<T>(sessionKey: string, task: () => Promise<T>): Promise<T> {
    const lane = this.lanes.get(sessionKey);
    const result = (lane?.tail ?? Promise.resolve()).then(task);
    const tail: Promise<void> = result.then(
      () => this.release(sessionKey, tail),
      () => this.release(sessionKey, tail)
    );
    if (lane) {
      lane.tail = tail;
    } else {
      this.lanes.set(sessionKey, { tail, session: 0, context: 0 });
    }
    return result;
  }

  private release(sessionKey: string, tail: Promise<void>): void {
    if (this.lanes.get(sessionKey)?.tail === tail) this.lanes.delete(sessionKey);
  }
}
