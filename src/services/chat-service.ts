/**
 * Chat Service - runs one conversational turn
 *
 * The user turn is recorded before the model call and the assistant turn
 * only after a successful reply, so a failed or cancelled call leaves the
 * history with the question and without an answer.
 */

import { randomUUID } from 'node:crypto';
import type { ContextBudget } from '../types/index.js';
import type { ModelError } from '../utils/errors.js';
import type { ContextManager } from './context-manager.js';
import type { KnowledgeBaseService } from './knowledge-base.js';
import type { ModelGateway } from './model-gateway.js';
import type { SessionStore } from './session-store.js';

export interface ChatServiceDeps {
  sessions: SessionStore;
  knowledge: KnowledgeBaseService;
  contextManager: ContextManager;
  gateway: ModelGateway;
  budget: ContextBudget;
  debug?: boolean;
  newSessionId?: () => string;
}

export type ChatTurnResult =
  | { ok: true; sessionId: string; response: string; timestamp: number }
  | { ok: false; sessionId: string; error: ModelError };

export class ChatService {
  private readonly newSessionId: () => string;

  constructor(private readonly deps: ChatServiceDeps) {
    this.newSessionId = deps.newSessionId ?? randomUUID;
  }

  async chat(sessionId: string | undefined, message: string, signal?: AbortSignal): Promise<ChatTurnResult> {
    const { sessions, knowledge, contextManager, gateway, budget } = this.deps;
    const id = sessionId || this.newSessionId();

    const session = sessions.append(id, 'user', message);
    const payload = contextManager.build(session, knowledge.currentSnapshot(), message, budget);

    if (payload.knowledge.truncated) {
      console.warn(
        `[Chat] Knowledge exceeds ${budget.maxKnowledgeChars} chars; omitted: ${payload.knowledge.omitted.join(', ')}`
      );
    }
    if (this.deps.debug) {
      console.log(contextManager.describe(payload));
    }

    const result = await gateway.generate(payload, signal);
    if (!result.ok) {
      console.error(`[Chat] Model call failed for session ${id} (${result.error.kind}): ${result.error.message}`);
      return { ok: false, sessionId: id, error: result.error };
    }

    // lastActivity is the timestamp of the turn just appended
    const updated = sessions.append(id, 'assistant', result.text);
    return { ok: true, sessionId: id, response: result.text, timestamp: updated.lastActivity };
  }
}
