import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { AppContext } from '../../app-context.js';

const messageSchema = z.object({
  message: z.string().trim().min(1).max(8000),
  sessionId: z.string().min(1).optional(),
  enabledToolServers: z.array(z.string().min(1)).optional()
});

const sessionParamsSchema = z.object({ id: z.string().min(1) });

export async function registerChatRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const { sessions, chat, chatMessages } = ctx.services;

  app.post('/chat/message', async (request, reply) => {
    const parsed = messageSchema.safeParse(request.body);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });
    return chat.handleMessage(parsed.data);
  });

  app.post('/chat/sessions', async (_request, reply) => {
    const session = sessions.create();
    return reply.code(201).send({ sessionId: session.id, createdAt: new Date(session.createdAt).toISOString() });
  });

  app.get('/chat/sessions/:id', async (request, reply) => {
    const parsed = sessionParamsSchema.safeParse(request.params);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const session = sessions.get(parsed.data.id);
    if (!session) return reply.code(404).send({ error: 'Session not found' });

    const messages = chatMessages
      ? (await chatMessages.listBySession(session.id)).map((message) => ({
          role: message.role,
          content: message.content,
          createdAt: message.createdAt,
          metadata: message.metadata
        }))
      : session.history.map((message) => ({
          role: message.role,
          content: message.content,
          createdAt: new Date(message.createdAt).toISOString()
        }));

    return {
      sessionId: session.id,
      createdAt: new Date(session.createdAt).toISOString(),
      lastIntent: session.context.lastIntent,
      enabledToolServers: session.context.enabledToolServerIds,
      messages
    };
  });

  app.post('/chat/sessions/:id/reset', async (request, reply) => {
    const parsed = sessionParamsSchema.safeParse(request.params);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const { id } = parsed.data;
    const cleared = await sessions.runExclusive(id, async () => {
      if (!sessions.reset(id)) return false;
      if (chatMessages) await chatMessages.deleteBySession(id);
      return true;
    });
    if (!cleared) return reply.code(404).send({ error: 'Session not found' });
    return reply.code(204).send();
  });

  app.delete('/chat/sessions/:id', async (request, reply) => {
    const parsed = sessionParamsSchema.safeParse(request.params);
    if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

    const { id } = parsed.data;
    const removed = await sessions.runExclusive(id, async () => sessions.delete(id));
    if (!removed) return reply.code(404).send({ error: 'Session not found' });
    if (chatMessages) await chatMessages.deleteBySession(id);
    return reply.code(204).send();
  });
}
