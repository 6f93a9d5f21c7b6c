import { run } from 'graphile-worker';
import { loadConfig, loadEnvFiles } from '../config/env.js';
import { createLogger } from '../config/logger.js';
import { createPool, wrapPool } from '../db/pool.js';
import { createPorts, createServices } from '../services/index.js';
import { createTaskList } from './taskHandlers.js';

async function main() {
  loadEnvFiles();
  const config = loadConfig();
  const logger = createLogger(config, 'mail-gateway-worker');
  const pool = createPool(config.databaseUrl);
  const ports = createPorts(config, logger, wrapPool(pool));

  const services = createServices({ config, logger, ports });

  const scheduler = services.createScheduler();
  scheduler.start();

  const runner = await run({
    connectionString: config.databaseUrl,
    taskList: createTaskList(services.mail, logger),
    concurrency: 5,
    pollInterval: 1000,
    schema: 'graphile_worker',
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal }, 'worker shutting down');
    await scheduler.stop();
    await runner.stop();
    await pool.end();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error({ err: error }, 'worker shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  await runner.promise;
}

main().catch((err) => {
  console.error('Worker stopped with error', err);
  process.exit(1);
});
