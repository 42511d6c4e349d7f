// models/custody.store.ts — Persistence contract consumed by the custody core
// The core only ever talks to this interface; the Drizzle/PostgreSQL implementation
// lives in drizzle-custody.store.ts.

import type {
  Custody,
  DocumentDetails,
  DocumentKind,
  DocumentRecord,
  DocumentRef,
  MovementRecord,
  PaymentStatus,
  Priority,
  SectionRecord,
  UserSnapshot,
} from '../types/index.js';

export interface NewDocument {
  kind: DocumentKind;
  documentNumber: string;
  subject: string;
  priority: Priority;
  category: string | null;
  remarks: string | null;
  receivedDate: Date;
  receivedBy: number;
  currentStatus: string;
  paymentStatus: PaymentStatus | null;
  custody: Custody;
  details: DocumentDetails;
}

export interface NewMovement {
  documentId: number;
  fromUserId: number | null;
  toUserId: number;
  fromSectionId: number | null;
  toSectionId: number | null;
  fromSubSectionId: number | null;
  toSubSectionId: number | null;
  forwardedBy: number;
  forwardedDate: Date;
  actionTaken: string;
  comments: string | null;
}

export interface ParkState {
  isParked: boolean;
  parkedBy: number | null;
  parkedAt: Date | null;
  parkedReason: string | null;
}

export interface StatusChange {
  currentStatus: string;
  paymentStatus: PaymentStatus | null;
}

export interface DocumentFilter {
  search?: string;
  status?: string;
  holderId?: number;
  parked?: boolean;
  offset: number;
  limit: number;
}

/** The columns the dashboard aggregates over. */
export interface CustodySnapshot {
  kind: DocumentKind;
  currentStatus: string;
  paymentStatus: PaymentStatus | null;
  currentHolderId: number | null;
  currentSectionId: number | null;
  isParked: boolean;
}

export interface CustodyRepository {
  findDocument(ref: DocumentRef): Promise<DocumentRecord | null>;
  findDocumentByNumber(kind: DocumentKind, documentNumber: string): Promise<DocumentRecord | null>;
  insertDocument(document: NewDocument): Promise<DocumentRecord>;
  updateCustody(documentId: number, custody: Custody): Promise<void>;
  updateParkState(documentId: number, state: ParkState): Promise<void>;
  updateStatus(documentId: number, change: StatusChange): Promise<void>;
  /** Removes the document together with its ledger. */
  deleteDocument(documentId: number): Promise<void>;
  listDocuments(kind: DocumentKind, filter: DocumentFilter): Promise<{ rows: DocumentRecord[]; total: number }>;
  listCustodySnapshots(): Promise<CustodySnapshot[]>;

  /** Ledger rows in insertion order, oldest first. */
  listMovements(documentId: number): Promise<MovementRecord[]>;
  findCurrentMovement(documentId: number): Promise<MovementRecord | null>;
  insertMovement(movement: NewMovement): Promise<MovementRecord>;
  /**
   * Flag `movementId` non-current, but only if it is still the current row.
   * Returns false when another writer got there first.
   */
  retireMovement(documentId: number, movementId: number): Promise<boolean>;
  /** Repair only: flag `movementId` current without touching other rows. */
  markCurrent(documentId: number, movementId: number): Promise<void>;

  findUser(userId: number): Promise<UserSnapshot | null>;
  listActiveUsers(): Promise<UserSnapshot[]>;
  findSectionByCode(code: string): Promise<SectionRecord | null>;
  listSections(): Promise<SectionRecord[]>;
}

export interface CustodyStore extends CustodyRepository {
  /**
   * Run `work` atomically. Anything thrown inside rolls back every write made
   * through the transaction-scoped repository.
   */
  transaction<T>(work: (tx: CustodyRepository) => Promise<T>): Promise<T>;
}
