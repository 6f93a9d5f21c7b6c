import { runMigrations } from 'graphile-worker';
import { loadConfig, loadEnvFiles } from '../config/env.js';
import { createLogger } from '../config/logger.js';

loadEnvFiles();
const config = loadConfig();
const logger = createLogger(config, 'worker-migrate');

runMigrations({
  connectionString: config.databaseUrl,
}).then(() => {
  logger.info('graphile-worker migrations complete');
  process.exit(0);
}).catch((error) => {
  logger.error({ err: error }, 'graphile-worker migrations failed');
  process.exit(1);
});
