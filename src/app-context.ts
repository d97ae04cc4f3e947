import type { Logger } from 'pino';
import { ChatService } from './chat/chat-service.js';
import { DeterministicRouter } from './chat/intent-router.js';
import { OrchestrationLoop } from './chat/orchestrator.js';
import { SessionStore } from './chat/session-store.js';
import type { AppConfig } from './config/schema.js';
import type { ConnectionFactory } from './connectors/connection.js';
import { createStdioConnectionFactory } from './connectors/stdio-client.js';
import type { DatabaseClient } from './db/client.js';
import { ChatMessagesRepository } from './db/repositories/chat-messages.js';
import { OpenRouterModel } from './llm/openrouter.js';
import type { LanguageModel } from './llm/types.js';
import { silentLogger } from './logger.js';
import { loadToolServerDefinitions } from './tools/definitions.js';
import { ToolRegistry } from './tools/registry.js';

export interface Services {
  sessions: SessionStore;
  registry: ToolRegistry;
  router: DeterministicRouter;
  loop: OrchestrationLoop;
  chat: ChatService;
  chatMessages: ChatMessagesRepository | null;
}

export interface AppContext {
  config: AppConfig;
  services: Services;
  logger: Logger;
}

export interface AppContextOverrides {
  logger?: Logger;
  db?: DatabaseClient | null;
  model?: LanguageModel;
  connectionFactory?: ConnectionFactory;
}

export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const logger = overrides.logger ?? silentLogger;
  const registry = new ToolRegistry(loadToolServerDefinitions(config, logger), {
    defaultEnabledServerIds: config.TOOL_DEFAULT_ENABLED_SERVERS
  });
  const connectionFactory =
    overrides.connectionFactory ??
    createStdioConnectionFactory({
      requestTimeoutMs: config.TOOL_REQUEST_TIMEOUT_MS,
      stopGraceMs: config.TOOL_STOP_GRACE_MS,
      logger
    });
  const model =
    overrides.model ??
    new OpenRouterModel({
      apiKey: config.OPENROUTER_API_KEY,
      baseUrl: config.OPENROUTER_BASE_URL,
      model: config.OPENROUTER_MODEL,
      timeoutMs: config.MODEL_TIMEOUT_MS,
      logger
    });

  const sessions = new SessionStore();
  const router = new DeterministicRouter({
    registry,
    connectionFactory,
    followUpWindowMs: config.FOLLOW_UP_WINDOW_MINUTES * 60 * 1000,
    logger
  });
  const loop = new OrchestrationLoop({ model, registry, connectionFactory, maxRounds: config.TOOL_MAX_ROUNDS, logger });
  const chatMessages = overrides.db ? new ChatMessagesRepository(overrides.db) : null;
  const chat = new ChatService({ sessions, registry, router, loop, sink: chatMessages, logger });

  return { config, logger, services: { sessions, registry, router, loop, chat, chatMessages } };
}
