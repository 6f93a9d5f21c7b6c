import { readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { loadConfig, loadEnvFiles } from '../src/config/env.js';
import { createLogger } from '../src/config/logger.js';
import { createPool } from '../src/db/pool.js';

const isIgnorableDuplicateObjectError = (error: unknown) =>
  error instanceof Error
  && 'code' in error
  && error.code === '42710'
  && error.message.includes('already exists');

async function run() {
  loadEnvFiles();
  const config = loadConfig();
  const logger = createLogger(config, 'migrate');
  const pool = createPool(config.databaseUrl);

  const files = readdirSync(path.resolve(process.cwd(), 'migrations'))
    .filter((file) => file.endsWith('.sql'))
    .sort();

  try {
    for (const file of files) {
      const sql = readFileSync(path.resolve(process.cwd(), 'migrations', file), 'utf8');
      try {
        await pool.query(sql);
        logger.info({ file }, 'migration applied');
      } catch (error) {
        if (isIgnorableDuplicateObjectError(error)) {
          logger.warn({ file }, 'skipping duplicate object');
          continue;
        }
        throw error;
      }
    }
    logger.info({ count: files.length }, 'database migrations applied');
  } finally {
    await pool.end();
  }
}

run().catch((err) => {
  console.error('Migration failed', err);
  process.exit(1);
});
