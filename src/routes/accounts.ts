import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AccountNotFoundError } from '../shared/errors.js';
import type { Services } from '../services/index.js';
import { accountIdParams, booleanParam, dateParam, limitParam, parseInput } from './helpers.js';

const registerBody = z.object({
  email: z.string().trim().email(),
  userId: z.string().trim().min(1),
  authenticationFlow: z.enum(['authorization_code', 'device_code']),
  scopes: z.array(z.string().min(1)).optional(),
});

const updateBody = z.object({
  status: z.enum(['active', 'inactive', 'suspended']).optional(),
  scopes: z.array(z.string().min(1)).min(1).optional(),
}).refine((body) => body.status !== undefined || body.scopes !== undefined, {
  message: 'status or scopes is required',
});

const listQuery = z.object({
  email: z.string().trim().email().optional(),
});

const completeBody = z.object({
  code: z.string().min(1),
  state: z.string().min(1),
});

const callbackQuery = z.object({
  code: z.string().min(1).optional(),
  state: z.string().min(1).optional(),
  error: z.string().min(1).optional(),
  error_description: z.string().optional(),
});

const logsQuery = z.object({
  accountId: z.string().uuid().optional(),
  success: booleanParam.optional(),
  from: dateParam.optional(),
  to: dateParam.optional(),
  limit: limitParam.optional(),
});

export const registerAccountRoutes = async (app: FastifyInstance, services: Services) => {
  const { auth } = services;

  app.post('/api/accounts', async (req, reply) => {
    const body = parseInput(registerBody, req.body, 'body');
    const result = await auth.register(body);
    return reply.code(201).send(result);
  });

  app.get('/api/accounts', async (req) => {
    const { email } = parseInput(listQuery, req.query, 'query');
    if (email) {
      const view = await auth.getAccountByEmail(email);
      return { accounts: view ? [view] : [] };
    }
    return { accounts: await auth.listAccounts() };
  });

  app.get('/api/accounts/:accountId', async (req) => {
    const { accountId } = parseInput(accountIdParams, req.params, 'params');
    const view = await auth.getAccount(accountId);
    if (!view) {
      throw new AccountNotFoundError(accountId);
    }
    return view;
  });

  app.patch('/api/accounts/:accountId', async (req) => {
    const { accountId } = parseInput(accountIdParams, req.params, 'params');
    const patch = parseInput(updateBody, req.body, 'body');
    return auth.updateAccount(accountId, patch);
  });

  app.delete('/api/accounts/:accountId', async (req, reply) => {
    const { accountId } = parseInput(accountIdParams, req.params, 'params');
    await auth.deleteAccount(accountId);
    return reply.code(204).send();
  });

  app.post('/api/accounts/:accountId/authenticate', async (req) => {
    const { accountId } = parseInput(accountIdParams, req.params, 'params');
    return auth.beginAuthentication(accountId);
  });

  app.post('/api/accounts/:accountId/authenticate/complete', async (req) => {
    const { accountId } = parseInput(accountIdParams, req.params, 'params');
    const { code, state } = parseInput(completeBody, req.body, 'body');
    return auth.completeAuthorizationCode(accountId, code, state);
  });

  app.post('/api/accounts/:accountId/device-code/poll', async (req, reply) => {
    const { accountId } = parseInput(accountIdParams, req.params, 'params');
    const outcome = await auth.pollDeviceCode(accountId);
    return reply.code(outcome.status === 'authenticated' ? 200 : 202).send(outcome);
  });

  app.post('/api/accounts/:accountId/token/refresh', async (req) => {
    const { accountId } = parseInput(accountIdParams, req.params, 'params');
    return auth.refreshToken(accountId);
  });

  app.post('/api/accounts/:accountId/token/revoke', async (req) => {
    const { accountId } = parseInput(accountIdParams, req.params, 'params');
    return auth.revoke(accountId);
  });

  app.get('/api/oauth/callback', async (req) => {
    const query = parseInput(callbackQuery, req.query, 'query');
    return auth.completeAuthorizationCallback({
      code: query.code,
      state: query.state,
      error: query.error,
      errorDescription: query.error_description,
    });
  });

  app.get('/api/auth/logs', async (req) => {
    const filter = parseInput(logsQuery, req.query, 'query');
    return { logs: await auth.getAuthenticationLogs(filter) };
  });
};
