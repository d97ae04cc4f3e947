import Fastify from 'fastify';
import type { AppContext } from '../app-context.js';
import { errorHandlerPlugin } from './middleware/error-handler.js';
import { registerChatRoutes } from './routes/chat.js';
import { registerToolServerRoutes } from './routes/tool-servers.js';

export async function buildServer(ctx: AppContext) {
  const app = Fastify({
    logger:
      ctx.config.LOG_LEVEL === 'silent' || ctx.config.NODE_ENV === 'test'
        ? false
        : { level: ctx.config.LOG_LEVEL, name: 'http' }
  });

  await app.register(errorHandlerPlugin);

  app.get('/health', async () => ({ status: 'ok', uptime: process.uptime() }));

  await registerToolServerRoutes(app, ctx);
  await registerChatRoutes(app, ctx);

  return app;
}
