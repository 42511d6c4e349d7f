// server.ts — Custody tracker backend server startup
// Validates configuration, connects to PostgreSQL and starts listening

import { createServer } from 'node:http';
import fs from 'node:fs';
import path from 'node:path';
import { sql } from 'drizzle-orm';

import { loadConfig } from './config/index.js';
import { logger } from './config/logger.js';
import { createApp } from './app.js';
import { createDatabase } from './models/db.js';
import { DrizzleCustodyStore } from './models/drizzle-custody.store.js';
import { DrizzleActivityRecorder } from './services/activity.service.js';
import { CustodyService } from './services/custody.service.js';

const log = logger.child({ service: 'server' });

/**
 * Main server startup sequence.
 */
async function start(): Promise<void> {
  const config = loadConfig();

  log.info(
    {
      nodeEnv: config.NODE_ENV,
      port: config.PORT,
      logLevel: config.LOG_LEVEL,
      receiveSectionCode: config.RECEIVE_SECTION_CODE,
    },
    'Starting custody tracker backend...'
  );

  // ---- 1. PostgreSQL ----
  const database = createDatabase(config.DATABASE_URL, config.DATABASE_POOL_MAX);
  try {
    await database.db.execute(sql`SELECT 1`);
    log.info('PostgreSQL connected');
  } catch (err) {
    log.error({ err }, 'Failed to connect to PostgreSQL');
    await database.close();
    process.exit(1);
  }

  // ---- 2. JWT public key ----
  const keyPath = path.resolve(config.JWT_PUBLIC_KEY_PATH);
  let publicKey: string;
  try {
    publicKey = fs.readFileSync(keyPath, 'utf-8');
  } catch (err) {
    log.error({ err, path: keyPath }, 'Failed to read JWT public key file');
    await database.close();
    process.exit(1);
  }

  // ---- 3. Services ----
  const service = new CustodyService({
    store: new DrizzleCustodyStore(database.db),
    activity: new DrizzleActivityRecorder(database.db),
    receiveSectionCode: config.RECEIVE_SECTION_CODE,
  });

  const app = createApp({
    service,
    health: {
      database: async () => {
        await database.db.execute(sql`SELECT 1`);
      },
    },
    auth: { publicKey, issuer: config.JWT_ISSUER },
    corsOrigins: config.CORS_ORIGINS,
  });

  // ---- 4. HTTP server ----
  const httpServer = createServer(app);
  httpServer.listen(config.PORT, () => {
    log.info(
      {
        port: config.PORT,
        environment: config.NODE_ENV,
        health: `http://localhost:${config.PORT}/v1/admin/health`,
      },
      `Custody tracker listening on port ${config.PORT}`
    );
  });

  // ---- 5. Shutdown ----
  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, 'Shutdown signal received, starting graceful shutdown...');

    await new Promise<void>((resolve) => {
      httpServer.close(() => {
        log.info('HTTP server closed');
        resolve();
      });
    });

    try {
      await database.close();
      log.info('PostgreSQL pool closed');
    } catch (err) {
      log.warn({ err }, 'Error closing PostgreSQL pool');
    }

    log.info('Graceful shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('uncaughtException', (err) => {
    log.fatal({ err }, 'Uncaught exception, shutting down');
    void shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    log.fatal({ err: reason }, 'Unhandled promise rejection');
  });
}

start().catch((err: unknown) => {
  log.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
