import { buildApp } from './src/app.js';
import { loadConfig, loadEnvFiles } from './src/config/env.js';
import { createLogger, loggerOptions } from './src/config/logger.js';
import { createPool, wrapPool } from './src/db/pool.js';
import { createPorts, createServices } from './src/services/index.js';

loadEnvFiles();
const config = loadConfig();
const logger = createLogger(config);
const pool = createPool(config.databaseUrl);
const services = createServices({ config, logger, ports: createPorts(config, logger, wrapPool(pool)) });
const server = await buildApp(services, { logger: loggerOptions(config, 'mail-gateway-http') });

let stopping = false;
const stop = async () => {
  if (stopping) {
    return;
  }
  stopping = true;
  await server.close();
  await services.trigger.close();
  await pool.end();
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'shutdown failed');
        process.exit(1);
      },
    );
  });
}

await server.listen({ port: config.port, host: '0.0.0.0' });
logger.info({ port: config.port }, 'mail gateway listening');
