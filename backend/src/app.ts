// app.ts — Express application setup for the custody tracker
// Configures middleware, routes, and error handling

import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import pinoHttp from 'pino-http';

import { logger } from './config/logger.js';
import { requestIdMiddleware } from './middleware/requestId.middleware.js';
import { authenticateJWT } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import type { CustodyService } from './services/custody.service.js';

import { createAdminRouter, type HealthProbes } from './controllers/admin.controller.js';
import { createDashboardRouter } from './controllers/dashboard.controller.js';
import { createDocumentsRouter } from './controllers/documents.controller.js';

export interface AppDependencies {
  service: CustodyService;
  health: HealthProbes;
  auth: {
    publicKey: string;
    issuer: string;
  };
  corsOrigins: string[];
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // ---- Security headers ----
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          frameSrc: ["'none'"],
          objectSrc: ["'none'"],
        },
      },
      crossOriginEmbedderPolicy: false,
    })
  );

  // ---- CORS ----
  app.use(
    cors({
      origin: deps.corsOrigins,
      methods: ['GET', 'POST', 'PATCH', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
      exposedHeaders: ['X-Request-ID'],
      credentials: true,
      maxAge: 86400,
    })
  );

  // ---- Body parsing ----
  app.use(express.json({ limit: '1mb' }));

  // ---- Request ID ----
  app.use(requestIdMiddleware);

  // ---- HTTP request logging ----
  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === '/v1/admin/health',
      },
      customProps: (req) => ({
        requestId: req.id,
      }),
      genReqId: (req, res) => {
        const header = res.getHeader('X-Request-ID');
        return typeof header === 'string' ? header : String(req.headers['x-request-id'] ?? '');
      },
      customLogLevel: (_req, res) => {
        if (res.statusCode >= 500) return 'error';
        if (res.statusCode >= 400) return 'warn';
        return 'info';
      },
    })
  );

  // ---- JWT authentication (skips public paths) ----
  app.use(authenticateJWT(deps.auth));

  app.set('trust proxy', 1);

  // ============================================================
  // Routes — all under /v1
  // ============================================================

  // Health is public
  app.use('/v1/admin', createAdminRouter(deps.health));

  app.use('/v1/dashboard', createDashboardRouter(deps.service));
  app.use('/v1/documents', createDocumentsRouter(deps.service));

  // ---- 404 handler for unmatched routes ----
  app.use(notFoundHandler);

  // ---- Global error handler (must be last) ----
  app.use(errorHandler);

  return app;
}
