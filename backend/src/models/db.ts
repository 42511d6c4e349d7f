// models/db.ts — PostgreSQL pool + Drizzle client for the custody tracker

import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { createServiceLogger } from '../config/logger.js';
import { schema, type Schema } from './schema.js';

const log = createServiceLogger('db');

export type Database = NodePgDatabase<Schema>;

export interface DatabaseHandle {
  db: Database;
  pool: Pool;
  close: () => Promise<void>;
}

/**
 * Create the connection pool and the Drizzle client on top of it.
 * Only the server entry point and maintenance scripts call this; everything
 * else receives the store it builds.
 */
export function createDatabase(connectionString: string, maxConnections = 10): DatabaseHandle {
  const pool = new Pool({ connectionString, max: maxConnections });

  pool.on('error', (err) => {
    log.error({ err }, 'PostgreSQL pool error');
  });

  const db = drizzle(pool, { schema });

  return {
    db,
    pool,
    close: async () => {
      await pool.end();
    },
  };
}
