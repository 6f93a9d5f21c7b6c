import Fastify from 'fastify';
import type { LoggerOptions } from 'pino';
import { registerErrorHandler, registerRoutes } from './routes/index.js';
import type { Services } from './services/index.js';

export const buildApp = async (services: Services, options: { logger: LoggerOptions | false }) => {
  const app = Fastify({ logger: options.logger });
  registerErrorHandler(app);
  await registerRoutes(app, services);
  return app;
};
