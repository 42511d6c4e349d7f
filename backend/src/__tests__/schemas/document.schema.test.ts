/**
 * Unit Tests - Document Schema Validation
 *
 * Tests the Zod schemas at the API boundary: kind routing, receive bodies
 * per kind, custody action bodies and list queries.
 */

import {
  DocumentParamsSchema,
  ForwardDocumentSchema,
  KindParamsSchema,
  ListDocumentsQuerySchema,
  ParkDocumentSchema,
  ReceiveDocumentSchema,
  UpdateStatusSchema,
} from '../../schemas/index.js';
import { DocumentKind } from '../../types/index.js';

describe('KindParamsSchema / DocumentParamsSchema', () => {
  it('should map URL slugs to document kinds', () => {
    expect(KindParamsSchema.parse({ kind: 'bills' })).toEqual({ kind: DocumentKind.BILL });
    expect(KindParamsSchema.safeParse({ kind: 'memos' }).success).toBe(false);
  });

  it('should coerce the id path segment to a positive integer', () => {
    expect(DocumentParamsSchema.parse({ kind: 'letters', id: '12' })).toEqual({ kind: DocumentKind.LETTER, id: 12 });
    expect(DocumentParamsSchema.safeParse({ kind: 'letters', id: 'abc' }).success).toBe(false);
    expect(DocumentParamsSchema.safeParse({ kind: 'letters', id: '0' }).success).toBe(false);
  });
});

describe('ReceiveDocumentSchema', () => {
  const notesheet = {
    kind: DocumentKind.NOTESHEET,
    documentNumber: ' NS/2026/014 ',
    subject: 'Hiring of contract staff',
    senderName: 'Establishment Section',
  };

  it('should accept a minimal notesheet and apply defaults', () => {
    const result = ReceiveDocumentSchema.safeParse(notesheet);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.priority).toBe('Normal');
      expect(result.data.documentNumber).toBe('NS/2026/014');
      expect(result.data.receivedDate).toBeUndefined();
    }
  });

  it('should require the fields of the selected kind', () => {
    const result = ReceiveDocumentSchema.safeParse({ ...notesheet, kind: DocumentKind.BILL });

    expect(result.success).toBe(false);
    if (!result.success) {
      const paths = result.error.issues.map((i) => i.path.join('.'));
      expect(paths).toEqual(expect.arrayContaining(['vendorName', 'billAmount']));
    }
  });

  it('should validate bill tax identifiers', () => {
    const bill = {
      kind: DocumentKind.BILL,
      documentNumber: 'BL/2026/003',
      subject: 'Printer cartridges',
      vendorName: 'Acme Supplies',
      billAmount: 5900,
    };

    expect(ReceiveDocumentSchema.safeParse({ ...bill, vendorGstin: '27ABCDE1234F1Z5', vendorPan: 'ABCDE1234F' }).success).toBe(
      true
    );
    expect(ReceiveDocumentSchema.safeParse({ ...bill, vendorGstin: '27ABCDE1234F1X5' }).success).toBe(false);
    expect(ReceiveDocumentSchema.safeParse({ ...bill, billAmount: -1 }).success).toBe(false);
  });

  it('should default letter type and reply flag', () => {
    const result = ReceiveDocumentSchema.parse({
      kind: DocumentKind.LETTER,
      documentNumber: 'LT/2026/021',
      subject: 'Audit para reply',
      senderName: 'Audit Office',
    });

    expect(result).toMatchObject({ letterType: 'Incoming', replyRequired: false });
  });

  it('should reject an unknown priority', () => {
    expect(ReceiveDocumentSchema.safeParse({ ...notesheet, priority: 'Whenever' }).success).toBe(false);
  });
});

describe('custody action schemas', () => {
  it('should leave the recipient optional so the service can report it missing', () => {
    expect(ForwardDocumentSchema.parse({})).toEqual({});
    expect(ForwardDocumentSchema.parse({ toUserId: null })).toEqual({ toUserId: null });
    expect(ForwardDocumentSchema.safeParse({ toUserId: '3' }).success).toBe(false);
  });

  it('should require a reason to park', () => {
    expect(ParkDocumentSchema.safeParse({ reason: '   ' }).success).toBe(false);
    expect(ParkDocumentSchema.parse({ reason: 'Awaiting budget ' })).toEqual({ reason: 'Awaiting budget' });
  });

  it('should require a status or a payment status', () => {
    const empty = UpdateStatusSchema.safeParse({});

    expect(empty.success).toBe(false);
    if (!empty.success) {
      expect(empty.error.issues[0]?.message).toBe('Provide status, paymentStatus or both');
    }
    expect(UpdateStatusSchema.parse({ paymentStatus: 'Paid' })).toEqual({ paymentStatus: 'Paid' });
    expect(UpdateStatusSchema.safeParse({ paymentStatus: 'Overpaid' }).success).toBe(false);
  });
});

describe('ListDocumentsQuerySchema', () => {
  it('should apply paging defaults', () => {
    expect(ListDocumentsQuerySchema.parse({})).toEqual({ page: 1, limit: 20 });
  });

  it('should coerce query strings', () => {
    expect(ListDocumentsQuerySchema.parse({ page: '3', limit: '50', holderId: '4', parked: 'true' })).toEqual({
      page: 3,
      limit: 50,
      holderId: 4,
      parked: true,
    });
  });

  it('should cap the page size', () => {
    expect(ListDocumentsQuerySchema.safeParse({ limit: '500' }).success).toBe(false);
  });
});
