import type { FastifyError, FastifyInstance } from 'fastify';
import { ErrorCodes, isAppError } from '../shared/errors.js';
import type { Services } from '../services/index.js';
import { registerAccountRoutes } from './accounts.js';
import { statusForError } from './helpers.js';
import { registerMailRoutes } from './mail.js';
import { registerWebhookRoutes } from './webhooks.js';

export const registerErrorHandler = (app: FastifyInstance) => {
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isAppError(error)) {
      const status = statusForError(error);
      if (status >= 500) {
        request.log.error({ err: error, code: error.code }, 'request failed');
      } else {
        request.log.info({ code: error.code, kind: error.kind }, error.message);
      }
      return reply.code(status).send({ error: error.toJSON() });
    }

    const statusCode = typeof error.statusCode === 'number' ? error.statusCode : 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({
        error: { code: ErrorCodes.INVALID_INPUT, kind: 'validation', message: error.message, details: {} },
      });
    }

    request.log.error({ err: error }, 'unhandled request error');
    return reply.code(500).send({
      error: { code: ErrorCodes.INTERNAL_ERROR, kind: 'system', message: 'internal server error', details: {} },
    });
  });
};

export const registerRoutes = async (app: FastifyInstance, services: Services) => {
  app.get('/api/health', async () => ({
    status: 'ok',
    forwarding: services.forwarder.isEnabled(),
    syncQueue: services.config.syncQueueEnabled,
  }));

  await registerAccountRoutes(app, services);
  await registerMailRoutes(app, services);
  await registerWebhookRoutes(app, services);
};
