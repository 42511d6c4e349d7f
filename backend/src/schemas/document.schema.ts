import { z } from 'zod';
import { DocumentKind, LETTER_TYPES, PAYMENT_STATUSES, PRIORITIES } from '../types/index.js';

/**
 * URL segment → document kind.
 */
export const KIND_SLUGS = {
  notesheets: DocumentKind.NOTESHEET,
  bills: DocumentKind.BILL,
  letters: DocumentKind.LETTER,
} as const;

export type KindSlug = keyof typeof KIND_SLUGS;

const kindSlugSchema = z
  .enum(['notesheets', 'bills', 'letters'])
  .transform((slug): DocumentKind => KIND_SLUGS[slug]);

const documentIdSchema = z.coerce
  .number({ invalid_type_error: 'Document id must be a number' })
  .int('Document id must be an integer')
  .positive('Document id must be positive');

/** Left as a string here; the service parses it so that bad dates surface as INVALID_DATE. */
const custodyDateSchema = z.string().trim().max(40, 'Date too long');

const calendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be YYYY-MM-DD');

const optionalText = (max: number) => z.string().trim().max(max).optional();

export const KindParamsSchema = z.object({
  kind: kindSlugSchema,
});

export type KindParams = z.infer<typeof KindParamsSchema>;

export const DocumentParamsSchema = z.object({
  kind: kindSlugSchema,
  id: documentIdSchema,
});

export type DocumentParams = z.infer<typeof DocumentParamsSchema>;

// ============================================
// Receive
// ============================================

const commonReceiveFields = {
  documentNumber: z.string().trim().min(1, 'Document number is required').max(100, 'Document number too long'),
  subject: z.string().trim().min(1, 'Subject is required').max(500, 'Subject too long'),
  priority: z.enum(PRIORITIES).default('Normal'),
  category: optionalText(100),
  remarks: optionalText(2000),
  /** Defaults to now. YYYY-MM-DD or ISO-8601; may be backdated. */
  receivedDate: custodyDateSchema.optional(),
};

export const ReceiveNotesheetSchema = z.object({
  ...commonReceiveFields,
  kind: z.literal(DocumentKind.NOTESHEET),
  senderName: z.string().trim().min(1, 'Sender name is required').max(200),
  senderOrganization: optionalText(200),
  senderAddress: optionalText(500),
  referenceNumber: optionalText(100),
});

export const ReceiveBillSchema = z.object({
  ...commonReceiveFields,
  kind: z.literal(DocumentKind.BILL),
  vendorName: z.string().trim().min(1, 'Vendor name is required').max(200),
  invoiceNumber: optionalText(100),
  vendorGstin: z
    .string()
    .regex(/^\d{2}[A-Z]{5}\d{4}[A-Z][A-Z\d]Z[A-Z\d]$/, 'Invalid GSTIN format')
    .optional(),
  vendorPan: z
    .string()
    .regex(/^[A-Z]{5}\d{4}[A-Z]$/, 'Invalid PAN format')
    .optional(),
  billDate: calendarDateSchema.optional(),
  billAmount: z.number().nonnegative('Bill amount cannot be negative'),
  taxableAmount: z.number().nonnegative().optional(),
  gstAmount: z.number().nonnegative().optional(),
  tdsAmount: z.number().nonnegative().optional(),
  netPayableAmount: z.number().nonnegative().optional(),
  billType: optionalText(100),
});

export const ReceiveLetterSchema = z.object({
  ...commonReceiveFields,
  kind: z.literal(DocumentKind.LETTER),
  senderName: z.string().trim().min(1, 'Sender name is required').max(200),
  senderOrganization: optionalText(200),
  senderEmail: z.string().email('Invalid email').optional(),
  letterDate: calendarDateSchema.optional(),
  letterType: z.enum(LETTER_TYPES).default('Incoming'),
  replyRequired: z.boolean().default(false),
  replyDeadline: calendarDateSchema.optional(),
});

/**
 * The kind is taken from the URL and merged into the body before parsing.
 */
export const ReceiveDocumentSchema = z.discriminatedUnion('kind', [
  ReceiveNotesheetSchema,
  ReceiveBillSchema,
  ReceiveLetterSchema,
]);

export type ReceiveDocumentInput = z.infer<typeof ReceiveDocumentSchema>;

// ============================================
// Custody actions
// ============================================

export const ForwardDocumentSchema = z.object({
  /** Optional here so that its absence is reported as MISSING_RECIPIENT. */
  toUserId: z.number().int().positive().nullable().optional(),
  date: custodyDateSchema.optional(),
  action: optionalText(100),
  comment: optionalText(2000),
  /** Ledger head the client saw; a mismatch is reported as a conflict. */
  expectedMovementId: z.number().int().positive().optional(),
});

export type ForwardDocumentInput = z.infer<typeof ForwardDocumentSchema>;

export const ParkDocumentSchema = z.object({
  reason: z.string().trim().min(1, 'A reason is required to park a document').max(500),
  comment: optionalText(2000),
  date: custodyDateSchema.optional(),
});

export type ParkDocumentInput = z.infer<typeof ParkDocumentSchema>;

export const UnparkDocumentSchema = z.object({
  comment: optionalText(2000),
  date: custodyDateSchema.optional(),
});

export type UnparkDocumentInput = z.infer<typeof UnparkDocumentSchema>;

export const UpdateStatusSchema = z
  .object({
    status: z.string().trim().min(1).max(50).optional(),
    paymentStatus: z.enum(PAYMENT_STATUSES).optional(),
  })
  .refine((v) => v.status !== undefined || v.paymentStatus !== undefined, {
    message: 'Provide status, paymentStatus or both',
  });

export type UpdateStatusInput = z.infer<typeof UpdateStatusSchema>;

// ============================================
// Listing
// ============================================

export const ListDocumentsQuerySchema = z.object({
  search: z.string().trim().min(1).max(100).optional(),
  status: z.string().trim().min(1).max(50).optional(),
  holderId: z.coerce.number().int().positive().optional(),
  parked: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type ListDocumentsQuery = z.infer<typeof ListDocumentsQuerySchema>;
