// controllers/dashboard.controller.ts — GET /dashboard

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { CustodyService } from '../services/custody.service.js';
import { requireUser } from '../middleware/auth.js';

export function createDashboardRouter(service: CustodyService): Router {
  const router = Router();

  /**
   * GET /dashboard
   * Per-kind totals, pending work held by the caller, parked counts and
   * pending documents per section.
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = requireUser(req);
      const result = await service.dashboard({ actorId: user.id, requestId: req.requestId });
      if (!result.ok) {
        next(result.error);
        return;
      }
      res.status(200).json({ success: true, data: result.value });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
