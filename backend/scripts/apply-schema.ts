/**
 * Apply backend/sql/schema.sql to the configured database.
 *
 * Usage:
 *   npm run db:schema
 */

import fs from 'node:fs';
import path from 'node:path';
import { loadConfig } from '../src/config/index.js';
import { logger } from '../src/config/logger.js';
import { createDatabase } from '../src/models/db.js';

const log = logger.child({ service: 'apply-schema' });

async function main(): Promise<void> {
  const config = loadConfig();
  const schemaPath = path.resolve(__dirname, '..', 'sql', 'schema.sql');
  const ddl = fs.readFileSync(schemaPath, 'utf-8');

  const database = createDatabase(config.DATABASE_URL, 1);
  try {
    await database.pool.query(ddl);
    log.info({ schemaPath }, 'Schema applied');
  } finally {
    await database.close();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Failed to apply schema');
  process.exit(1);
});
