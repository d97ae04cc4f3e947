import type { Logger } from 'pino';
import type { ChatMessageSink } from '../db/repositories/chat-messages.js';
import type { ChatMessage } from '../llm/types.js';
import { silentLogger } from '../logger.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { DeterministicRouter, ToolCallRecord } from './intent-router.js';
import type { OrchestrationLoop } from './orchestrator.js';
import type { ChatSession, SessionStore } from './session-store.js';

export const DEFAULT_SYSTEM_PROMPT = [
  'You are a household-finance assistant.',
  'Use the available tools to answer questions about HSA expenses and charitable donations.',
  'Never invent amounts; if a tool fails, say so plainly.'
].join(' ');

export interface ChatRequest {
  message: string;
  sessionId?: string;
  enabledToolServers?: readonly string[];
}

export interface ChatResult {
  response: string;
  sessionId: string;
  toolsCalled: ToolCallRecord[];
  source: 'router' | 'model';
}

export interface ChatServiceOptions {
  sessions: SessionStore;
  registry: ToolRegistry;
  router: DeterministicRouter;
  loop: OrchestrationLoop;
  sink?: ChatMessageSink | null;
  systemPrompt?: string;
  logger?: Logger;
}

export class ChatService {
  private readonly logger: Logger;

  constructor(private readonly options: ChatServiceOptions) {
    this.logger = (options.logger ?? silentLogger).child({ component: 'ChatService' });
  }

  /**
   * Handles one user message. Messages for the same session run one at a
   * time, in arrival order.
   */
  handleMessage(request: ChatRequest): Promise<ChatResult> {
    const session = this.options.sessions.getOrCreate(request.sessionId);
    return this.options.sessions.runExclusive(session.id, () => this.process(session, request));
  }

  private async process(session: ChatSession, request: ChatRequest): Promise<ChatResult> {
    const { sessions, registry, router, loop } = this.options;
    if (request.enabledToolServers !== undefined || !session.toolServersChosen) {
      session.context.enabledToolServerIds = registry.resolveEnabledServerIds(request.enabledToolServers);
      session.toolServersChosen = true;
    }

    const history: ChatMessage[] = session.history.map((entry) => ({ role: entry.role, content: entry.content }));
    sessions.appendMessage(session, 'user', request.message);

    let result: ChatResult;
    const routed = await router.tryResolve(request.message, session.context);
    if (routed) {
      result = { response: routed.response, sessionId: session.id, toolsCalled: routed.toolsCalled, source: 'router' };
    } else {
      const outcome = await loop.run(
        [
          { role: 'system', content: this.options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT },
          ...history,
          { role: 'user', content: request.message }
        ],
        session.context
      );
      if (outcome.terminatedBy === 'round_limit') {
        this.logger.info({ sessionId: session.id, rounds: outcome.rounds }, 'chat turn ended at round limit');
      }
      result = { response: outcome.response, sessionId: session.id, toolsCalled: outcome.toolsCalled, source: 'model' };
    }

    sessions.appendMessage(session, 'assistant', result.response);
    await this.persist(session.id, request.message, result);
    return result;
  }

  private async persist(sessionId: string, message: string, result: ChatResult): Promise<void> {
    const sink = this.options.sink;
    if (!sink) return;
    try {
      await sink.append([
        { sessionId, role: 'user', content: message },
        { sessionId, role: 'assistant', content: result.response, metadata: { toolsCalled: result.toolsCalled, source: result.source } }
      ]);
    } catch (error) {
      // Persistence failures do not fail the turn.
      this.logger.error({ sessionId, err: error }, 'failed to persist chat messages');
    }
  }
}
