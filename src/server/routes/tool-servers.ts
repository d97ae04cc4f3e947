import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../../app-context.js';

export async function registerToolServerRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const { registry } = ctx.services;

  app.get('/tool-servers', async () => ({
    servers: registry.listServers().map((server) => ({
      id: server.id,
      name: server.displayName,
      description: server.description,
      tools: server.toolNames,
      source: server.source,
      enabledByDefault: registry.isEnabledByDefault(server.id),
      settingsSchema: server.settingsSchema ?? []
    }))
  }));
}
