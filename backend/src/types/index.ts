/**
 * Shared TypeScript types for the document custody tracker.
 *
 * Custody fields on a document are a cache of its ledger head; the
 * movement ledger is the authoritative record.
 */

import type { AppError } from '../utils/errors.js';

// ============================================
// Enumerations
// ============================================

export enum DocumentKind {
  NOTESHEET = 'NOTESHEET',
  BILL = 'BILL',
  LETTER = 'LETTER',
}

export enum RoleName {
  SUPERUSER = 'superuser',
  RECEIVE_SECTION = 'receive_section',
  SECTION_HEAD = 'section_head',
  SECTION_MEMBER = 'section_member',
  VIEWER = 'viewer',
}

export enum MovementAction {
  RECEIVED = 'Received',
  FORWARDED = 'Forwarded',
  PARKED = 'Parked',
  UNPARKED = 'Unparked',
}

export const PRIORITIES = ['Urgent', 'High', 'Normal', 'Low'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const NOTESHEET_STATUSES = ['Received', 'Under Review', 'Approved', 'Returned', 'Closed', 'Archived'] as const;
export const BILL_STATUSES = ['Received', 'Under Review', 'Approved', 'Returned', 'Closed', 'Archived'] as const;
export const LETTER_STATUSES = ['Pending', 'Under Review', 'Replied', 'Closed', 'Archived'] as const;
export const PAYMENT_STATUSES = ['Pending', 'Partially Paid', 'Paid'] as const;
export const LETTER_TYPES = ['Incoming', 'Outgoing', 'Internal'] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

/** Lifecycle vocabulary per kind. The first entry is the status a received document starts in. */
export const STATUS_VOCABULARY: Record<DocumentKind, readonly string[]> = {
  [DocumentKind.NOTESHEET]: NOTESHEET_STATUSES,
  [DocumentKind.BILL]: BILL_STATUSES,
  [DocumentKind.LETTER]: LETTER_STATUSES,
};

export const TERMINAL_STATUSES: Record<DocumentKind, readonly string[]> = {
  [DocumentKind.NOTESHEET]: ['Closed', 'Archived'],
  [DocumentKind.BILL]: ['Closed', 'Archived'],
  [DocumentKind.LETTER]: ['Replied', 'Closed', 'Archived'],
};

// ============================================
// Kind-specific details
// ============================================

export interface NotesheetDetails {
  kind: DocumentKind.NOTESHEET;
  senderName: string;
  senderOrganization?: string;
  senderAddress?: string;
  referenceNumber?: string;
}

export interface BillDetails {
  kind: DocumentKind.BILL;
  vendorName: string;
  invoiceNumber?: string;
  vendorGstin?: string;
  vendorPan?: string;
  billDate?: string;
  billAmount: number;
  taxableAmount?: number;
  gstAmount?: number;
  tdsAmount?: number;
  netPayableAmount?: number;
  billType?: string;
}

export interface LetterDetails {
  kind: DocumentKind.LETTER;
  senderName: string;
  senderOrganization?: string;
  senderEmail?: string;
  letterDate?: string;
  letterType: (typeof LETTER_TYPES)[number];
  replyRequired: boolean;
  replyDeadline?: string;
}

export type DocumentDetails = NotesheetDetails | BillDetails | LetterDetails;

// ============================================
// Records
// ============================================

export interface Custody {
  holderId: number;
  sectionId: number | null;
  subSectionId: number | null;
}

export interface DocumentRecord {
  id: number;
  kind: DocumentKind;
  documentNumber: string;
  subject: string;
  priority: Priority;
  category: string | null;
  remarks: string | null;
  receivedDate: Date;
  receivedBy: number;
  currentStatus: string;
  /** Bills only; null for other kinds. */
  paymentStatus: PaymentStatus | null;
  currentHolderId: number | null;
  currentSectionId: number | null;
  currentSubSectionId: number | null;
  isParked: boolean;
  parkedBy: number | null;
  parkedAt: Date | null;
  parkedReason: string | null;
  details: DocumentDetails;
  createdAt: Date;
  updatedAt: Date;
}

export interface MovementRecord {
  /** Serial id; its order is the authoritative chronological order. */
  id: number;
  documentId: number;
  fromUserId: number | null;
  toUserId: number;
  fromSectionId: number | null;
  toSectionId: number | null;
  fromSubSectionId: number | null;
  toSubSectionId: number | null;
  forwardedBy: number;
  /** Caller-supplied and backdatable; null only on legacy rows. */
  forwardedDate: Date | null;
  actionTaken: string;
  comments: string | null;
  isCurrent: boolean;
  createdAt: Date;
}

export interface UserSnapshot {
  id: number;
  username: string;
  fullName: string;
  designation: string | null;
  sectionId: number | null;
  subSectionId: number | null;
  isActive: boolean;
  isSuperuser: boolean;
  isSectionHead: boolean;
  roles: RoleName[];
}

export interface SectionRecord {
  id: number;
  name: string;
  code: string | null;
}

export interface DocumentRef {
  kind: DocumentKind;
  id: number;
}

// ============================================
// Activity log
// ============================================

export enum ActivityType {
  DOCUMENT_RECEIVED = 'document_received',
  DOCUMENT_FORWARDED = 'document_forwarded',
  DOCUMENT_PARKED = 'document_parked',
  DOCUMENT_UNPARKED = 'document_unparked',
  DOCUMENT_STATUS_CHANGED = 'document_status_changed',
  DOCUMENT_DELETED = 'document_deleted',
  CUSTODY_REPAIRED = 'custody_repaired',
}

export interface ActivityEvent {
  userId: number;
  activityType: ActivityType;
  entityType: DocumentKind;
  entityId: number;
  description: string;
  requestId: string | null;
}

// ============================================
// Results
// ============================================

export type Result<T, E = AppError> = { ok: true; value: T } | { ok: false; error: E };

/** Per-call context handed to service operations by the web layer. */
export interface OperationContext {
  actorId: number;
  requestId: string | null;
}

// ============================================
// API response types
// ============================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface PaginatedResponse<T> {
  success: true;
  data: T[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}

export interface ErrorDetail {
  code: string;
  message: string;
  details: Record<string, unknown>;
  requestId: string;
  timestamp: string;
}

export interface ErrorResponse {
  success: false;
  error: ErrorDetail;
}

// ============================================
// Auth
// ============================================

export interface AuthenticatedUser {
  id: number;
  name: string | null;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
      requestId: string;
    }
  }
}
