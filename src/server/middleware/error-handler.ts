import fp from 'fastify-plugin';
import type { FastifyError } from 'fastify';
import { ModelProviderError, type ModelProviderErrorKind } from '../../llm/types.js';
import { isHardStartFailure } from '../../mcp/error-mapper.js';

const STATUS_BY_KIND: Record<ModelProviderErrorKind, number> = {
  insufficient_credits: 402,
  model_not_found: 404,
  rate_limited: 429,
  timeout: 504,
  upstream: 502
};

/**
 * Maps provider and tool-server start failures to HTTP statuses. Anything
 * else is a 500 with a generic body.
 */
export const errorHandlerPlugin = fp(async (app) => {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ModelProviderError) {
      request.log.warn({ err: error, kind: error.kind }, 'model provider error');
      return reply.code(STATUS_BY_KIND[error.kind]).send({ error: error.message, kind: error.kind });
    }
    if (isHardStartFailure(error)) {
      request.log.error({ err: error }, 'tool server could not be started');
      return reply.code(502).send({ error: error.message, kind: 'tool_server_unavailable' });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message });
    }

    request.log.error({ err: error }, 'unhandled request error');
    return reply.code(500).send({ error: 'Internal server error' });
  });
});
