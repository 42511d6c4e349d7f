// controllers/documents.controller.ts — Document custody route handlers
// GET /documents/:kind, POST /documents/:kind, GET /documents/:kind/:id,
// POST /documents/:kind/:id/{forward,park,unpark,repair}, PATCH /documents/:kind/:id/status,
// DELETE /documents/:kind/:id, GET /documents/:kind/:id/integrity

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { CustodyService } from '../services/custody.service.js';
import { requireUser } from '../middleware/auth.js';
import { parseBody, parseParams, parseQuery } from '../middleware/validate.js';
import {
  DocumentParamsSchema,
  ForwardDocumentSchema,
  KindParamsSchema,
  ListDocumentsQuerySchema,
  ParkDocumentSchema,
  ReceiveDocumentSchema,
  UnparkDocumentSchema,
  UpdateStatusSchema,
} from '../schemas/index.js';
import type { ApiResponse, OperationContext, PaginatedResponse, DocumentRecord, Result } from '../types/index.js';

function contextOf(req: Request): OperationContext {
  return { actorId: requireUser(req).id, requestId: req.requestId };
}

function send<T>(res: Response, next: NextFunction, result: Result<T>, status = 200): void {
  if (!result.ok) {
    next(result.error);
    return;
  }
  const body: ApiResponse<T> = { success: true, data: result.value };
  res.status(status).json(body);
}

export function createDocumentsRouter(service: CustodyService): Router {
  const router = Router();

  /**
   * GET /documents/:kind
   * Paginated list with optional search, status, holder and parked filters.
   */
  router.get('/:kind', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { kind } = parseParams(KindParamsSchema, req);
      const query = parseQuery(ListDocumentsQuerySchema, req);

      const result = await service.listDocuments(kind, query, contextOf(req));
      if (!result.ok) {
        next(result.error);
        return;
      }

      const body: PaginatedResponse<DocumentRecord> = {
        success: true,
        data: result.value.rows,
        pagination: result.value.pagination,
      };
      res.status(200).json(body);
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /documents/:kind
   * Receive a new document. The caller becomes its first holder.
   */
  router.post('/:kind', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { kind } = parseParams(KindParamsSchema, req);
      const input = parseBody(ReceiveDocumentSchema, req, { kind });

      send(res, next, await service.receive(input, contextOf(req)), 201);
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /documents/:kind/:id
   * Custody view: document, stage durations, candidates and permissions.
   */
  router.get('/:kind/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ref = parseParams(DocumentParamsSchema, req);
      send(res, next, await service.getCustodyView(ref, contextOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:kind/:id/forward', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ref = parseParams(DocumentParamsSchema, req);
      const input = parseBody(ForwardDocumentSchema, req);
      send(res, next, await service.forward(ref, input, contextOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:kind/:id/park', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ref = parseParams(DocumentParamsSchema, req);
      const input = parseBody(ParkDocumentSchema, req);
      send(res, next, await service.park(ref, input, contextOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:kind/:id/unpark', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ref = parseParams(DocumentParamsSchema, req);
      const input = parseBody(UnparkDocumentSchema, req);
      send(res, next, await service.unpark(ref, input, contextOf(req)));
    } catch (err) {
      next(err);
    }
  });

  /**
   * PATCH /documents/:kind/:id/status
   * Current holder or superuser.
   */
  router.patch('/:kind/:id/status', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ref = parseParams(DocumentParamsSchema, req);
      const input = parseBody(UpdateStatusSchema, req);
      send(res, next, await service.updateStatus(ref, input, contextOf(req)));
    } catch (err) {
      next(err);
    }
  });

  /**
   * DELETE /documents/:kind/:id
   * Superuser only. Removes the ledger too.
   */
  router.delete('/:kind/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ref = parseParams(DocumentParamsSchema, req);
      send(res, next, await service.deleteDocument(ref, contextOf(req)));
    } catch (err) {
      next(err);
    }
  });

  router.get('/:kind/:id/integrity', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ref = parseParams(DocumentParamsSchema, req);
      send(res, next, await service.verifyCustody(ref, contextOf(req)));
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /documents/:kind/:id/repair
   * Superuser only. Rebuilds the custody pointer from the ledger head.
   */
  router.post('/:kind/:id/repair', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ref = parseParams(DocumentParamsSchema, req);
      send(res, next, await service.repairCustody(ref, contextOf(req)));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
