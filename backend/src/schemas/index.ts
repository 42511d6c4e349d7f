// schemas/index.ts — Re-export barrel file for all Zod validation schemas

export {
  KIND_SLUGS,
  KindParamsSchema,
  DocumentParamsSchema,
  ReceiveNotesheetSchema,
  ReceiveBillSchema,
  ReceiveLetterSchema,
  ReceiveDocumentSchema,
  ForwardDocumentSchema,
  ParkDocumentSchema,
  UnparkDocumentSchema,
  UpdateStatusSchema,
  ListDocumentsQuerySchema,
  type KindSlug,
  type KindParams,
  type DocumentParams,
  type ReceiveDocumentInput,
  type ForwardDocumentInput,
  type ParkDocumentInput,
  type UnparkDocumentInput,
  type UpdateStatusInput,
  type ListDocumentsQuery,
} from './document.schema.js';
