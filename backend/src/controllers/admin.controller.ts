// controllers/admin.controller.ts — GET /admin/health

import { Router, type Request, type Response } from 'express';
import { createServiceLogger } from '../config/logger.js';

const log = createServiceLogger('admin-controller');

export interface HealthProbes {
  /** Resolves when the database answers a trivial query. */
  database: () => Promise<void>;
}

export function createAdminRouter(probes: HealthProbes): Router {
  const router = Router();

  /**
   * GET /admin/health
   * No auth required. 503 when the database is unreachable.
   */
  router.get('/health', async (_req: Request, res: Response) => {
    const components: Record<string, { status: string; latency?: string; error?: string }> = {};

    const pgStart = Date.now();
    try {
      await probes.database();
      components['postgresql'] = { status: 'up', latency: `${Date.now() - pgStart}ms` };
    } catch (err) {
      log.warn({ err }, 'Database health probe failed');
      components['postgresql'] = { status: 'down', error: err instanceof Error ? err.message : 'Unknown' };
    }

    const healthy = Object.values(components).every((c) => c.status === 'up');

    res.status(healthy ? 200 : 503).json({
      success: healthy,
      data: {
        status: healthy ? 'healthy' : 'degraded',
        uptime: Math.round(process.uptime()),
        timestamp: new Date().toISOString(),
        components,
      },
    });
  });

  return router;
}
