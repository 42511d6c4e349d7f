/**
 * Integration Tests - Custody HTTP API
 *
 * Drives the Express app through supertest with the in-process store and a
 * throwaway RSA key pair. Covers auth, the receive/forward/view flow and the
 * error envelope.
 */

import { generateKeyPairSync } from 'node:crypto';
import type { Express } from 'express';
import jwt from 'jsonwebtoken';
import pino from 'pino';
import request from 'supertest';

import { createApp } from '../../backend/src/app.js';
import { CustodyService } from '../../backend/src/services/custody.service.js';
import type { ActivityEvent } from '../../backend/src/types/index.js';
import { MemoryCustodyStore } from '../support/memory-custody.store.js';
import { ALL_USERS, NOW, SECTIONS, USERS, localNoon } from '../fixtures/office-test-data.js';

const ISSUER = 'test-issuer';

const { publicKey, privateKey } = generateKeyPairSync('rsa', {
  modulusLength: 2048,
  publicKeyEncoding: { type: 'spki', format: 'pem' },
  privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
});

function tokenFor(userId: number, overrides: Record<string, unknown> = {}, options: jwt.SignOptions = {}): string {
  return jwt.sign({ sub: String(userId), type: 'access', ...overrides }, privateKey, {
    algorithm: 'RS256',
    issuer: ISSUER,
    expiresIn: '15m',
    ...options,
  });
}

function bearer(userId: number): string {
  return `Bearer ${tokenFor(userId)}`;
}

const NOTESHEET_BODY = {
  documentNumber: 'N-1',
  subject: 'Annual maintenance contract',
  senderName: 'Estates Section',
  receivedDate: '2026-01-01',
};

describe('Custody API', () => {
  let app: Express;
  let store: MemoryCustodyStore;
  let databaseProbe: jest.Mock<Promise<void>, []>;

  beforeEach(() => {
    store = new MemoryCustodyStore(ALL_USERS, Object.values(SECTIONS));
    databaseProbe = jest.fn<Promise<void>, []>().mockResolvedValue(undefined);
    const service = new CustodyService({
      store,
      activity: { record: jest.fn<Promise<void>, [ActivityEvent]>().mockResolvedValue(undefined) },
      receiveSectionCode: 'RCV',
      logger: pino({ level: 'silent' }),
      clock: () => NOW,
    });
    app = createApp({
      service,
      health: { database: databaseProbe },
      auth: { publicKey, issuer: ISSUER },
      corsOrigins: ['http://localhost:3000'],
    });
  });

  async function receiveN1(): Promise<void> {
    await request(app)
      .post('/v1/documents/notesheets')
      .set('Authorization', bearer(USERS.receiptClerk.id))
      .send(NOTESHEET_BODY)
      .expect(201);
  }

  describe('GET /v1/admin/health', () => {
    it('should report healthy without a token', async () => {
      const res = await request(app).get('/v1/admin/health').expect(200);

      expect(res.body.success).toBe(true);
      expect(res.body.data.status).toBe('healthy');
      expect(res.body.data.components.postgresql.status).toBe('up');
    });

    it('should report degraded when the database probe fails', async () => {
      databaseProbe.mockRejectedValueOnce(new Error('connection refused'));

      const res = await request(app).get('/v1/admin/health').expect(503);

      expect(res.body.data.status).toBe('degraded');
      expect(res.body.data.components.postgresql).toEqual({ status: 'down', error: 'connection refused' });
    });
  });

  describe('authentication', () => {
    it('should reject a request without a token', async () => {
      const res = await request(app).get('/v1/documents/notesheets').expect(401);

      expect(res.body.error.code).toBe('AUTH_TOKEN_INVALID');
      expect(res.body.error.message).toBe('Authentication required. Provide a valid Bearer token.');
    });

    it('should report an expired token with its own code', async () => {
      const expired = jwt.sign(
        { sub: String(USERS.receiptClerk.id), type: 'access', exp: Math.floor(Date.now() / 1000) - 60 },
        privateKey,
        { algorithm: 'RS256', issuer: ISSUER }
      );

      const res = await request(app).get('/v1/documents/notesheets').set('Authorization', `Bearer ${expired}`).expect(401);

      expect(res.body.error.code).toBe('AUTH_TOKEN_EXPIRED');
    });

    it('should reject a token from another issuer', async () => {
      const foreign = tokenFor(USERS.receiptClerk.id, {}, { issuer: 'someone-else' });

      const res = await request(app).get('/v1/documents/notesheets').set('Authorization', `Bearer ${foreign}`).expect(401);

      expect(res.body.error.message).toBe('Invalid access token.');
    });

    it('should reject refresh tokens and tokens without a numeric subject', async () => {
      const refresh = tokenFor(USERS.receiptClerk.id, { type: 'refresh' });
      const named = jwt.sign({ sub: 'bina', type: 'access' }, privateKey, { algorithm: 'RS256', issuer: ISSUER });

      const refreshRes = await request(app)
        .get('/v1/documents/notesheets')
        .set('Authorization', `Bearer ${refresh}`)
        .expect(401);
      const namedRes = await request(app).get('/v1/documents/notesheets').set('Authorization', `Bearer ${named}`).expect(401);

      expect(refreshRes.body.error.message).toBe('Invalid token type. Use an access token, not a refresh token.');
      expect(namedRes.body.error.message).toBe('Access token is missing required claims.');
    });
  });

  describe('custody flow', () => {
    it('should receive, forward and show the custody view', async () => {
      const received = await request(app)
        .post('/v1/documents/notesheets')
        .set('Authorization', bearer(USERS.receiptClerk.id))
        .send(NOTESHEET_BODY)
        .expect(201);

      expect(received.body).toEqual({
        success: true,
        data: {
          documentId: 1,
          documentNumber: 'N-1',
          movementId: 1,
          receivedDate: localNoon(2026, 1, 1).toISOString(),
        },
      });

      const forwarded = await request(app)
        .post('/v1/documents/notesheets/1/forward')
        .set('Authorization', bearer(USERS.receiptClerk.id))
        .send({ toUserId: USERS.accountsAssistant.id, date: '2026-01-03', comment: 'For examination' })
        .expect(200);

      expect(forwarded.body.data).toMatchObject({ documentId: 1, movementId: 2, holderId: 4, sectionId: 2 });

      const view = await request(app)
        .get('/v1/documents/notesheets/1')
        .set('Authorization', bearer(USERS.accountsAssistant.id))
        .expect(200);

      expect(view.body.data.stages).toHaveLength(2);
      expect(view.body.data.stages[0]).toMatchObject({
        holderId: 4,
        outDate: 'Present',
        label: '7 days (current)',
        comments: 'For examination',
      });
      expect(view.body.data.stages[1]).toMatchObject({ holderId: 2, label: '2 days', comments: 'Initial receipt' });
      expect(view.body.data.forwardingCase).toBe('holder');
      expect(view.body.data.forwardingCandidates).toEqual([
        { id: 3, fullName: 'Chandan Accounts Head', designation: null, sectionId: 2 },
      ]);
    });

    it('should return the error envelope for a forbidden forward', async () => {
      await receiveN1();
      await request(app)
        .post('/v1/documents/notesheets/1/forward')
        .set('Authorization', bearer(USERS.receiptClerk.id))
        .send({ toUserId: USERS.accountsAssistant.id })
        .expect(200);

      const res = await request(app)
        .post('/v1/documents/notesheets/1/forward')
        .set('Authorization', bearer(USERS.accountsAssistant.id))
        .set('X-Request-ID', 'trace-0042')
        .send({ toUserId: USERS.accountsClerk.id })
        .expect(403);

      expect(res.headers['x-request-id']).toBe('trace-0042');
      expect(res.body.success).toBe(false);
      expect(res.body.error).toMatchObject({
        code: 'RECIPIENT_NOT_ALLOWED',
        message: "User '5' is not a valid recipient for document '1'.",
        details: { documentId: 1, recipientId: 5 },
        requestId: 'trace-0042',
      });
      expect(typeof res.body.error.timestamp).toBe('string');
    });

    it('should park, list and update status over HTTP', async () => {
      await receiveN1();
      const auth = bearer(USERS.receiptClerk.id);

      await request(app).post('/v1/documents/notesheets/1/park').set('Authorization', auth).send({ reason: 'Query raised' }).expect(200);

      const parked = await request(app).get('/v1/documents/notesheets?parked=true').set('Authorization', auth).expect(200);
      expect(parked.body.data.map((d: { documentNumber: string }) => d.documentNumber)).toEqual(['N-1']);
      expect(parked.body.pagination).toEqual({ page: 1, limit: 20, total: 1, totalPages: 1 });

      const blocked = await request(app)
        .post('/v1/documents/notesheets/1/forward')
        .set('Authorization', auth)
        .send({ toUserId: USERS.accountsHead.id })
        .expect(409);
      expect(blocked.body.error.code).toBe('DOCUMENT_PARKED');

      await request(app).post('/v1/documents/notesheets/1/unpark').set('Authorization', auth).send({}).expect(200);

      const status = await request(app)
        .patch('/v1/documents/notesheets/1/status')
        .set('Authorization', auth)
        .send({ status: 'Under Review' })
        .expect(200);
      expect(status.body.data).toMatchObject({ previousStatus: 'Received', currentStatus: 'Under Review' });
    });

    it('should keep deletion and repair to superusers', async () => {
      await receiveN1();

      const denied = await request(app)
        .delete('/v1/documents/notesheets/1')
        .set('Authorization', bearer(USERS.receiptClerk.id))
        .expect(403);
      expect(denied.body.error.code).toBe('AUTH_INSUFFICIENT_ROLE');

      const integrity = await request(app)
        .get('/v1/documents/notesheets/1/integrity')
        .set('Authorization', bearer(USERS.receiptClerk.id))
        .expect(200);
      expect(integrity.body.data.consistent).toBe(true);

      await request(app).delete('/v1/documents/notesheets/1').set('Authorization', bearer(USERS.admin.id)).expect(200);
      expect(store.documentCount).toBe(0);
    });

    it('should serve the dashboard for the signed-in user', async () => {
      await receiveN1();

      const res = await request(app).get('/v1/dashboard').set('Authorization', bearer(USERS.receiptClerk.id)).expect(200);

      expect(res.body.data.totals.NOTESHEET).toEqual({ total: 1, pending: 1, heldByMe: 1, parked: 0 });
    });
  });

  describe('storage failures', () => {
    const originalEnv = process.env['NODE_ENV'];

    afterEach(() => {
      process.env['NODE_ENV'] = originalEnv;
    });

    it('should hide the storage cause from clients in production', async () => {
      process.env['NODE_ENV'] = 'production';
      store.failOn('listCustodySnapshots');

      const res = await request(app).get('/v1/dashboard').set('Authorization', bearer(USERS.admin.id)).expect(500);

      expect(res.body.error.code).toBe('STORAGE_FAILURE');
      expect(res.body.error.message).toBe('An internal error occurred. Please try again later.');
      expect(res.body.error.details).toEqual({});
    });

    it('should include the cause outside production', async () => {
      process.env['NODE_ENV'] = 'development';
      store.failOn('listCustodySnapshots');

      const res = await request(app).get('/v1/dashboard').set('Authorization', bearer(USERS.admin.id)).expect(500);

      expect(res.body.error.details).toMatchObject({ operation: 'dashboard', cause: 'Injected failure in listCustodySnapshots' });
    });
  });

  describe('request validation', () => {
    it('should reject a malformed forward body', async () => {
      await receiveN1();

      const res = await request(app)
        .post('/v1/documents/notesheets/1/forward')
        .set('Authorization', bearer(USERS.receiptClerk.id))
        .send({ toUserId: 'Deepa' })
        .expect(400);

      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(Object.keys(res.body.error.details.validationErrors)).toEqual(['toUserId']);
    });

    it('should report a missing recipient with its own code', async () => {
      await receiveN1();

      const res = await request(app)
        .post('/v1/documents/notesheets/1/forward')
        .set('Authorization', bearer(USERS.receiptClerk.id))
        .send({})
        .expect(400);

      expect(res.body.error.code).toBe('MISSING_RECIPIENT');
    });

    it('should reject an unknown document kind', async () => {
      const res = await request(app).get('/v1/documents/memos').set('Authorization', bearer(USERS.admin.id)).expect(400);

      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('should return 404 for a missing document and an unknown route', async () => {
      const missing = await request(app)
        .get('/v1/documents/bills/9')
        .set('Authorization', bearer(USERS.admin.id))
        .expect(404);
      const route = await request(app).get('/v1/reports').set('Authorization', bearer(USERS.admin.id)).expect(404);

      expect(missing.body.error.code).toBe('DOCUMENT_NOT_FOUND');
      expect(route.body.error).toMatchObject({ code: 'NOT_FOUND', message: "Route 'GET /v1/reports' not found." });
    });
  });
});
