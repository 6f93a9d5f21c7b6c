import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Services } from '../services/index.js';
import { MAX_TOP } from '../services/mailSync.js';
import { booleanParam, dateParam, importanceParam, limitParam, parseInput } from './helpers.js';

const folderField = z.string().trim().min(1).max(255);

const queryBody = z.object({
  accountId: z.string().uuid().nullish(),
  folder: folderField.optional(),
  top: z.number().int().min(1).max(MAX_TOP).optional(),
  select: z.array(z.string().min(1)).min(1).optional(),
  dateFrom: dateParam.optional(),
  dateTo: dateParam.optional(),
  senderEmail: z.string().trim().email().optional(),
  isRead: z.boolean().optional(),
  importance: importanceParam.optional(),
  subjectContains: z.string().min(1).optional(),
  search: z.string().min(1).optional(),
});

const sendBody = z.object({
  accountId: z.string().uuid(),
  to: z.array(z.string().trim().email()).default([]),
  cc: z.array(z.string().trim().email()).optional(),
  bcc: z.array(z.string().trim().email()).optional(),
  subject: z.string(),
  body: z.string(),
  bodyType: z.enum(['text', 'html']).default('text'),
  importance: importanceParam.optional(),
  saveToSentItems: z.boolean().optional(),
});

const deltaBody = z.object({
  accountId: z.string().uuid().nullish(),
  folder: folderField.optional(),
});

const historyQuery = z.object({
  accountId: z.string().uuid().optional(),
  queryType: z.enum(['manual', 'delta']).optional(),
  limit: limitParam.optional(),
});

const externalCallsQuery = z.object({
  accountId: z.string().uuid().optional(),
  success: booleanParam.optional(),
  limit: limitParam.optional(),
});

const callIdParams = z.object({ callId: z.string().uuid() });

export const registerMailRoutes = async (app: FastifyInstance, services: Services) => {
  const { mail, forwarder } = services;

  app.post('/api/mail/query', async (req) => {
    const { accountId, folder, top, select, ...filters } = parseInput(queryBody, req.body, 'body');
    return mail.query({ accountId, folder, top, select, filters });
  });

  app.post('/api/mail/send', async (req) => {
    const body = parseInput(sendBody, req.body, 'body');
    return mail.send(body);
  });

  app.post('/api/mail/delta-sync', async (req) => {
    const { accountId, folder } = parseInput(deltaBody, req.body, 'body');
    return mail.deltaSync({ accountId, folder });
  });

  app.get('/api/mail/history', async (req) => {
    const filter = parseInput(historyQuery, req.query, 'query');
    return { history: await mail.listQueryHistory(filter) };
  });

  app.get('/api/mail/external-calls', async (req) => {
    const filter = parseInput(externalCallsQuery, req.query, 'query');
    return { calls: await forwarder.listCalls(filter) };
  });

  app.post('/api/mail/external-calls/:callId/retry', async (req) => {
    const { callId } = parseInput(callIdParams, req.params, 'params');
    return forwarder.retryCall(callId);
  });
};
