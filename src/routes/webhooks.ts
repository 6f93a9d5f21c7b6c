import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ErrorCodes, MailError, SystemError } from '../shared/errors.js';
import type { Services } from '../services/index.js';
import { parseInput } from './helpers.js';

const setupBody = z.object({
  accountId: z.string().uuid(),
  folder: z.string().trim().min(1).max(255).optional(),
  changeTypes: z.array(z.enum(['created', 'updated', 'deleted'])).min(1).optional(),
  notificationUrl: z.string().url().optional(),
});

const listQuery = z.object({
  accountId: z.string().uuid().optional(),
});

const subscriptionParams = z.object({ subscriptionId: z.string().min(1) });

const validationQuery = z.object({
  validationToken: z.string().optional(),
});

const notificationBody = z.object({
  value: z.array(z.object({
    subscriptionId: z.string().min(1),
    clientState: z.string().nullish(),
    changeType: z.string().optional(),
    resource: z.string().optional(),
  })).min(1),
});

export const registerWebhookRoutes = async (app: FastifyInstance, services: Services) => {
  const { webhooks } = services;

  app.post('/api/webhooks', async (req, reply) => {
    const body = parseInput(setupBody, req.body, 'body');
    return reply.code(201).send(await webhooks.setup(body));
  });

  app.get('/api/webhooks', async (req) => {
    const { accountId } = parseInput(listQuery, req.query, 'query');
    return { webhooks: await webhooks.list(accountId) };
  });

  app.post('/api/webhooks/:subscriptionId/renew', async (req) => {
    const { subscriptionId } = parseInput(subscriptionParams, req.params, 'params');
    return webhooks.renew(subscriptionId);
  });

  app.delete('/api/webhooks/:subscriptionId', async (req) => {
    const { subscriptionId } = parseInput(subscriptionParams, req.params, 'params');
    return webhooks.remove(subscriptionId);
  });

  app.post('/api/webhooks/notifications', async (req, reply) => {
    // Subscription creation handshake: echo the token back as plain text.
    const { validationToken } = parseInput(validationQuery, req.query, 'query');
    if (validationToken !== undefined) {
      return reply.code(200).type('text/plain').send(validationToken);
    }

    const { value } = parseInput(notificationBody, req.body, 'body');
    const result = await webhooks.handleNotifications(value);
    // A non-2xx answer makes Graph redeliver the batch.
    if (result.accepted.length === 0 && result.failed.length > 0) {
      throw new SystemError(ErrorCodes.SERVICE_UNAVAILABLE, 'Notifications could not be processed', {
        failed: result.failed,
        rejected: result.rejected,
      });
    }
    if (result.accepted.length === 0) {
      throw new MailError(ErrorCodes.INVALID_WEBHOOK_NOTIFICATION, 'Invalid webhook notification', {
        rejected: result.rejected,
      });
    }
    return reply.code(202).send(result);
  });
};
