// services/custody.service.ts — Document custody workflow orchestration
// Receive, forward, park and unpark documents; build custody views and the dashboard.
// Every mutating operation runs in one store transaction and returns a Result.

import type { Logger } from 'pino';
import { createServiceLogger } from '../config/logger.js';
import type { CustodyRepository, CustodyStore, DocumentFilter } from '../models/custody.store.js';
import type { ActivityRecorder } from './activity.service.js';
import { MovementLedger } from './ledger.service.js';
import { projectCustody, type CustodyStage, type CustodySummary } from './custody-projector.js';
import {
  authorizeForward,
  authorizePark,
  authorizeUnpark,
  evaluateForwarding,
  hasReceiveSectionCapability,
  isTerminal,
  type ForwardingCase,
} from './forwarding-policy.js';
import {
  AppError,
  ConcurrencyConflictError,
  CustodyForbiddenError,
  DocumentNotFoundError,
  DuplicateDocumentNumberError,
  InsufficientRoleError,
  InvalidDateError,
  InvalidStatusError,
  LedgerStateError,
  StorageFailureError,
  UserNotFoundError,
} from '../utils/errors.js';
import { isBeforeReceipt, paginate, parseCustodyDate } from '../utils/helpers.js';
import {
  ActivityType,
  DocumentKind,
  MovementAction,
  STATUS_VOCABULARY,
  type ActivityEvent,
  type Custody,
  type DocumentDetails,
  type DocumentRecord,
  type DocumentRef,
  type MovementRecord,
  type OperationContext,
  type PaymentStatus,
  type Result,
  type UserSnapshot,
} from '../types/index.js';
import type {
  ForwardDocumentInput,
  ListDocumentsQuery,
  ParkDocumentInput,
  ReceiveDocumentInput,
  UnparkDocumentInput,
  UpdateStatusInput,
} from '../schemas/index.js';

export interface CustodyServiceDeps {
  store: CustodyStore;
  activity: ActivityRecorder;
  /** Code of the intake section whose members hold the receive-section capability. */
  receiveSectionCode: string;
  logger?: Logger;
  clock?: () => Date;
}

export interface ReceiveOutcome {
  documentId: number;
  documentNumber: string;
  movementId: number;
  receivedDate: Date;
}

export interface TransferOutcome {
  documentId: number;
  movementId: number;
  holderId: number;
  sectionId: number | null;
  subSectionId: number | null;
  forwardedDate: Date;
}

export interface ParkOutcome {
  documentId: number;
  movementId: number;
  isParked: boolean;
}

export interface StatusOutcome {
  documentId: number;
  previousStatus: string;
  currentStatus: string;
  paymentStatus: PaymentStatus | null;
  terminal: boolean;
}

export interface CandidateView {
  id: number;
  fullName: string;
  designation: string | null;
  sectionId: number | null;
}

export interface CustodyPermissions {
  canForward: boolean;
  canPark: boolean;
  canUnpark: boolean;
  canUpdateStatus: boolean;
  canDelete: boolean;
}

export interface CustodyView {
  document: DocumentRecord;
  currentMovementId: number | null;
  stages: CustodyStage[];
  summary: CustodySummary;
  forwardingCase: ForwardingCase;
  forwardingCandidates: CandidateView[];
  permissions: CustodyPermissions;
}

export interface CustodyIntegrityReport {
  documentId: number;
  movementCount: number;
  currentEntries: number;
  headMovementId: number | null;
  pointer: Custody | null;
  head: Custody | null;
  consistent: boolean;
  problems: string[];
}

export interface RepairOutcome extends CustodyIntegrityReport {
  repaired: boolean;
}

export interface DocumentPage {
  rows: DocumentRecord[];
  pagination: { page: number; limit: number; total: number; totalPages: number };
}

export interface KindTotals {
  total: number;
  pending: number;
  heldByMe: number;
  parked: number;
}

export interface SectionPending {
  sectionId: number;
  sectionName: string;
  pending: number;
}

export interface Dashboard {
  totals: Record<DocumentKind, KindTotals>;
  sections: SectionPending[];
}

function custodyOf(entry: MovementRecord): Custody {
  return { holderId: entry.toUserId, sectionId: entry.toSectionId, subSectionId: entry.toSubSectionId };
}

function custodyOfUser(user: UserSnapshot): Custody {
  return { holderId: user.id, sectionId: user.sectionId, subSectionId: user.subSectionId };
}

function pointerOf(document: DocumentRecord): Custody | null {
  if (document.currentHolderId === null) {
    return null;
  }
  return {
    holderId: document.currentHolderId,
    sectionId: document.currentSectionId,
    subSectionId: document.currentSubSectionId,
  };
}

function sameCustody(a: Custody | null, b: Custody | null): boolean {
  if (!a || !b) {
    return a === b;
  }
  return a.holderId === b.holderId && a.sectionId === b.sectionId && a.subSectionId === b.subSectionId;
}

function detailsOf(input: ReceiveDocumentInput): DocumentDetails {
  switch (input.kind) {
    case DocumentKind.NOTESHEET:
      return {
        kind: input.kind,
        senderName: input.senderName,
        senderOrganization: input.senderOrganization,
        senderAddress: input.senderAddress,
        referenceNumber: input.referenceNumber,
      };
    case DocumentKind.BILL:
      return {
        kind: input.kind,
        vendorName: input.vendorName,
        invoiceNumber: input.invoiceNumber,
        vendorGstin: input.vendorGstin,
        vendorPan: input.vendorPan,
        billDate: input.billDate,
        billAmount: input.billAmount,
        taxableAmount: input.taxableAmount,
        gstAmount: input.gstAmount,
        tdsAmount: input.tdsAmount,
        netPayableAmount: input.netPayableAmount,
        billType: input.billType,
      };
    case DocumentKind.LETTER:
      return {
        kind: input.kind,
        senderName: input.senderName,
        senderOrganization: input.senderOrganization,
        senderEmail: input.senderEmail,
        letterDate: input.letterDate,
        letterType: input.letterType,
        replyRequired: input.replyRequired,
        replyDeadline: input.replyDeadline,
      };
  }
}

/**
 * Inspect a ledger against its document's custody pointer.
 */
export function inspectCustody(document: DocumentRecord, movements: readonly MovementRecord[]): CustodyIntegrityReport {
  const current = movements.filter((m) => m.isCurrent);
  const head = current.length === 1 ? current[0] : undefined;
  const pointer = pointerOf(document);
  const headCustody = head ? custodyOf(head) : null;
  const problems: string[] = [];

  if (movements.length === 0) {
    problems.push('Ledger is empty');
  } else if (current.length === 0) {
    problems.push('No current ledger entry');
  } else if (current.length > 1) {
    problems.push(`${current.length} ledger entries are flagged current`);
  }

  if (headCustody && !sameCustody(pointer, headCustody)) {
    problems.push('Custody pointer does not match the current ledger entry');
  }

  return {
    documentId: document.id,
    movementCount: movements.length,
    currentEntries: current.length,
    headMovementId: head?.id ?? null,
    pointer,
    head: headCustody,
    consistent: problems.length === 0,
    problems,
  };
}

export class CustodyService {
  private readonly store: CustodyStore;
  private readonly activity: ActivityRecorder;
  private readonly receiveSectionCode: string;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(deps: CustodyServiceDeps) {
    this.store = deps.store;
    this.activity = deps.activity;
    this.receiveSectionCode = deps.receiveSectionCode;
    this.log = deps.logger ?? createServiceLogger('custody-service');
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Register a newly received document. The receiving user becomes its
   * first holder and the ledger is seeded with a single current entry.
   */
  async receive(input: ReceiveDocumentInput, ctx: OperationContext): Promise<Result<ReceiveOutcome>> {
    const result = await this.run('receive', ctx, async (tx) => {
      const actor = await this.requireActor(tx, ctx.actorId);
      const receiveSectionId = await this.receiveSectionId(tx);

      if (!actor.isActive || !hasReceiveSectionCapability(actor, receiveSectionId)) {
        throw new InsufficientRoleError(actor.id, 'receive_section');
      }

      const existing = await tx.findDocumentByNumber(input.kind, input.documentNumber);
      if (existing) {
        throw new DuplicateDocumentNumberError(input.kind, input.documentNumber);
      }

      const now = this.clock();
      const receivedDate = unwrap(parseCustodyDate(input.receivedDate, now));
      const custody = custodyOfUser(actor);

      const document = await tx.insertDocument({
        kind: input.kind,
        documentNumber: input.documentNumber,
        subject: input.subject,
        priority: input.priority,
        category: input.category ?? null,
        remarks: input.remarks ?? null,
        receivedDate,
        receivedBy: actor.id,
        currentStatus: STATUS_VOCABULARY[input.kind][0] ?? 'Received',
        paymentStatus: input.kind === DocumentKind.BILL ? 'Pending' : null,
        custody,
        details: detailsOf(input),
      });

      const ledger = new MovementLedger(tx, this.clock);
      const entry = await ledger.appendInitial(document, custody, actor.id, receivedDate);

      return {
        documentId: document.id,
        documentNumber: document.documentNumber,
        movementId: entry.id,
        receivedDate,
      };
    });

    if (result.ok) {
      this.log.info(
        {
          event: 'document.received',
          kind: input.kind,
          documentId: result.value.documentId,
          movementId: result.value.movementId,
          actorId: ctx.actorId,
          requestId: ctx.requestId,
        },
        'Document received'
      );
      await this.notify({
        userId: ctx.actorId,
        activityType: ActivityType.DOCUMENT_RECEIVED,
        entityType: input.kind,
        entityId: result.value.documentId,
        description: `Received ${input.kind.toLowerCase()} ${input.documentNumber}`,
        requestId: ctx.requestId,
      });
    }
    return result;
  }

  /**
   * Hand a document to another user. The policy is evaluated inside the
   * transaction and the retire step is conditional on the head it saw.
   */
  async forward(ref: DocumentRef, input: ForwardDocumentInput, ctx: OperationContext): Promise<Result<TransferOutcome>> {
    const result = await this.run('forward', ctx, async (tx) => {
      const document = await this.requireDocument(tx, ref);
      const actor = await this.requireActor(tx, ctx.actorId);

      const toUserId = input.toUserId ?? null;
      if (toUserId !== null && !(await tx.findUser(toUserId))) {
        throw new UserNotFoundError(toUserId);
      }

      const directory = await tx.listActiveUsers();
      const receiveSectionId = await this.receiveSectionId(tx);
      const { recipient } = unwrap(authorizeForward(actor, document, toUserId, directory, receiveSectionId));

      const date = this.custodyDate(input.date, document);
      const head = await this.requireHead(tx, document, input.expectedMovementId);

      const ledger = new MovementLedger(tx, this.clock);
      const entry = await ledger.appendTransfer({
        document,
        from: custodyOf(head),
        to: custodyOfUser(recipient),
        actorId: actor.id,
        date,
        action: input.action ?? MovementAction.FORWARDED,
        comment: input.comment ?? null,
        expectedMovementId: head.id,
      });

      return {
        documentId: document.id,
        movementId: entry.id,
        holderId: entry.toUserId,
        sectionId: entry.toSectionId,
        subSectionId: entry.toSubSectionId,
        forwardedDate: date,
        fromUserId: head.toUserId,
      };
    });

    if (!result.ok) {
      return result;
    }

    const { fromUserId, ...outcome } = result.value;
    this.log.info(
      {
        event: 'document.forwarded',
        kind: ref.kind,
        documentId: ref.id,
        movementId: outcome.movementId,
        fromUserId,
        toUserId: outcome.holderId,
        actorId: ctx.actorId,
        requestId: ctx.requestId,
      },
      'Document forwarded'
    );
    await this.notify({
      userId: ctx.actorId,
      activityType: ActivityType.DOCUMENT_FORWARDED,
      entityType: ref.kind,
      entityId: ref.id,
      description: `Forwarded from user ${fromUserId} to user ${outcome.holderId}`,
      requestId: ctx.requestId,
    });
    return { ok: true, value: outcome };
  }

  /**
   * Put a document on hold. Custody does not change; a ledger row records
   * the event and the parked flag is set on the document.
   */
  async park(ref: DocumentRef, input: ParkDocumentInput, ctx: OperationContext): Promise<Result<ParkOutcome>> {
    const result = await this.run('park', ctx, async (tx) => {
      const document = await this.requireDocument(tx, ref);
      const actor = await this.requireActor(tx, ctx.actorId);
      const directory = await tx.listActiveUsers();
      unwrap(authorizePark(actor, document, directory, await this.receiveSectionId(tx)));

      const date = this.custodyDate(input.date, document);
      const head = await this.requireHead(tx, document, undefined);
      const custody = custodyOf(head);

      const ledger = new MovementLedger(tx, this.clock);
      const entry = await ledger.appendTransfer({
        document,
        from: custody,
        to: custody,
        actorId: actor.id,
        date,
        action: MovementAction.PARKED,
        comment: input.comment ?? input.reason,
        expectedMovementId: head.id,
      });

      await tx.updateParkState(document.id, {
        isParked: true,
        parkedBy: actor.id,
        parkedAt: this.clock(),
        parkedReason: input.reason,
      });

      return { documentId: document.id, movementId: entry.id, isParked: true };
    });

    if (result.ok) {
      this.log.info(
        {
          event: 'document.parked',
          kind: ref.kind,
          documentId: ref.id,
          movementId: result.value.movementId,
          actorId: ctx.actorId,
          requestId: ctx.requestId,
        },
        'Document parked'
      );
      await this.notify({
        userId: ctx.actorId,
        activityType: ActivityType.DOCUMENT_PARKED,
        entityType: ref.kind,
        entityId: ref.id,
        description: `Parked: ${input.reason}`,
        requestId: ctx.requestId,
      });
    }
    return result;
  }

  async unpark(ref: DocumentRef, input: UnparkDocumentInput, ctx: OperationContext): Promise<Result<ParkOutcome>> {
    const result = await this.run('unpark', ctx, async (tx) => {
      const document = await this.requireDocument(tx, ref);
      const actor = await this.requireActor(tx, ctx.actorId);
      const directory = await tx.listActiveUsers();
      unwrap(authorizeUnpark(actor, document, directory, await this.receiveSectionId(tx)));

      const date = this.custodyDate(input.date, document);
      const head = await this.requireHead(tx, document, undefined);
      const custody = custodyOf(head);

      const ledger = new MovementLedger(tx, this.clock);
      const entry = await ledger.appendTransfer({
        document,
        from: custody,
        to: custody,
        actorId: actor.id,
        date,
        action: MovementAction.UNPARKED,
        comment: input.comment ?? null,
        expectedMovementId: head.id,
      });

      await tx.updateParkState(document.id, { isParked: false, parkedBy: null, parkedAt: null, parkedReason: null });

      return { documentId: document.id, movementId: entry.id, isParked: false };
    });

    if (result.ok) {
      this.log.info(
        {
          event: 'document.unparked',
          kind: ref.kind,
          documentId: ref.id,
          movementId: result.value.movementId,
          actorId: ctx.actorId,
          requestId: ctx.requestId,
        },
        'Document unparked'
      );
      await this.notify({
        userId: ctx.actorId,
        activityType: ActivityType.DOCUMENT_UNPARKED,
        entityType: ref.kind,
        entityId: ref.id,
        description: 'Unparked',
        requestId: ctx.requestId,
      });
    }
    return result;
  }

  /**
   * Detail view: the document, its replayed history with durations and what
   * the viewer may do next.
   */
  async getCustodyView(ref: DocumentRef, ctx: OperationContext): Promise<Result<CustodyView>> {
    return this.run('getCustodyView', ctx, async (tx) => {
      const document = await this.requireDocument(tx, ref);
      const viewer = await this.requireActor(tx, ctx.actorId);
      const directory = await tx.listActiveUsers();
      const receiveSectionId = await this.receiveSectionId(tx);

      const history = await new MovementLedger(tx, this.clock).history(document.id);
      const projection = projectCustody(history, this.clock());
      const decision = evaluateForwarding(viewer, document, directory, receiveSectionId);

      const terminal = isTerminal(document);
      const canMove = decision.allowed && !terminal && !document.isParked;

      return {
        document,
        currentMovementId: history.current?.id ?? null,
        stages: projection.stages,
        summary: projection.summary,
        forwardingCase: decision.case,
        forwardingCandidates: canMove
          ? decision.candidates.map((u) => ({
              id: u.id,
              fullName: u.fullName,
              designation: u.designation,
              sectionId: u.sectionId,
            }))
          : [],
        permissions: {
          canForward: canMove,
          canPark: canMove,
          canUnpark: decision.allowed && document.isParked,
          canUpdateStatus: viewer.isSuperuser || document.currentHolderId === viewer.id,
          canDelete: viewer.isSuperuser,
        },
      };
    });
  }

  /**
   * Lifecycle edit by the current holder or a superuser. Payment status
   * applies to bills only.
   */
  async updateStatus(ref: DocumentRef, input: UpdateStatusInput, ctx: OperationContext): Promise<Result<StatusOutcome>> {
    const result = await this.run('updateStatus', ctx, async (tx) => {
      const document = await this.requireDocument(tx, ref);
      const actor = await this.requireActor(tx, ctx.actorId);

      if (!actor.isActive || (!actor.isSuperuser && document.currentHolderId !== actor.id)) {
        throw new CustodyForbiddenError(document.id, actor.id, 'change the status of');
      }

      const vocabulary = STATUS_VOCABULARY[document.kind];
      if (input.status !== undefined && !vocabulary.includes(input.status)) {
        throw new InvalidStatusError(document.kind, input.status, vocabulary);
      }
      if (input.paymentStatus !== undefined && document.kind !== DocumentKind.BILL) {
        throw new InvalidStatusError(document.kind, `payment status ${input.paymentStatus}`, []);
      }

      const change = {
        currentStatus: input.status ?? document.currentStatus,
        paymentStatus: document.kind === DocumentKind.BILL ? input.paymentStatus ?? document.paymentStatus : null,
      };
      await tx.updateStatus(document.id, change);

      return {
        documentId: document.id,
        previousStatus: document.currentStatus,
        currentStatus: change.currentStatus,
        paymentStatus: change.paymentStatus,
        terminal: isTerminal({ kind: document.kind, ...change }),
      };
    });

    if (result.ok) {
      const { previousStatus, currentStatus } = result.value;
      this.log.info(
        {
          event: 'document.status_changed',
          kind: ref.kind,
          documentId: ref.id,
          previousStatus,
          currentStatus,
          paymentStatus: result.value.paymentStatus,
          actorId: ctx.actorId,
          requestId: ctx.requestId,
        },
        'Document status changed'
      );
      await this.notify({
        userId: ctx.actorId,
        activityType: ActivityType.DOCUMENT_STATUS_CHANGED,
        entityType: ref.kind,
        entityId: ref.id,
        description: `Status ${previousStatus} -> ${currentStatus}`,
        requestId: ctx.requestId,
      });
    }
    return result;
  }

  /**
   * Administrative removal of a document and its ledger. Superusers only.
   */
  async deleteDocument(ref: DocumentRef, ctx: OperationContext): Promise<Result<{ documentId: number; documentNumber: string }>> {
    const result = await this.run('deleteDocument', ctx, async (tx) => {
      const document = await this.requireDocument(tx, ref);
      const actor = await this.requireActor(tx, ctx.actorId);
      if (!actor.isActive || !actor.isSuperuser) {
        throw new InsufficientRoleError(actor.id, 'superuser');
      }
      await tx.deleteDocument(document.id);
      return { documentId: document.id, documentNumber: document.documentNumber };
    });

    if (result.ok) {
      this.log.warn(
        {
          event: 'document.deleted',
          kind: ref.kind,
          documentId: ref.id,
          actorId: ctx.actorId,
          requestId: ctx.requestId,
        },
        'Document deleted'
      );
      await this.notify({
        userId: ctx.actorId,
        activityType: ActivityType.DOCUMENT_DELETED,
        entityType: ref.kind,
        entityId: ref.id,
        description: `Deleted ${result.value.documentNumber}`,
        requestId: ctx.requestId,
      });
    }
    return result;
  }

  /**
   * Compare the document's custody pointer with its ledger head.
   */
  async verifyCustody(ref: DocumentRef, ctx: OperationContext): Promise<Result<CustodyIntegrityReport>> {
    const result = await this.run('verifyCustody', ctx, async (tx) => {
      const document = await this.requireDocument(tx, ref);
      return inspectCustody(document, await tx.listMovements(document.id));
    });

    if (result.ok && !result.value.consistent) {
      this.log.warn(
        { event: 'custody.inconsistent', kind: ref.kind, documentId: ref.id, problems: result.value.problems },
        'Custody integrity check failed'
      );
    }
    return result;
  }

  /**
   * Rebuild the custody pointer from the ledger. If the current flag is
   * missing or duplicated, the newest entry becomes the only current one.
   */
  async repairCustody(ref: DocumentRef, ctx: OperationContext): Promise<Result<RepairOutcome>> {
    const result = await this.run('repairCustody', ctx, async (tx) => {
      const document = await this.requireDocument(tx, ref);
      const actor = await this.requireActor(tx, ctx.actorId);
      if (!actor.isActive || !actor.isSuperuser) {
        throw new InsufficientRoleError(actor.id, 'superuser');
      }

      const movements = await tx.listMovements(document.id);
      const before = inspectCustody(document, movements);
      if (before.consistent) {
        return { ...before, repaired: false };
      }

      const newest = movements.reduce<MovementRecord | null>((acc, m) => (!acc || m.id > acc.id ? m : acc), null);
      if (!newest) {
        throw new LedgerStateError('LEDGER_NOT_INITIALIZED', document.id);
      }

      for (const entry of movements) {
        if (entry.isCurrent && entry.id !== newest.id) {
          await tx.retireMovement(document.id, entry.id);
        }
      }
      if (!newest.isCurrent) {
        await tx.markCurrent(document.id, newest.id);
      }
      await tx.updateCustody(document.id, custodyOf(newest));

      const repairedDocument = await this.requireDocument(tx, ref);
      return { ...inspectCustody(repairedDocument, await tx.listMovements(document.id)), repaired: true };
    });

    if (result.ok && result.value.repaired) {
      this.log.warn(
        {
          event: 'custody.repaired',
          kind: ref.kind,
          documentId: ref.id,
          headMovementId: result.value.headMovementId,
          actorId: ctx.actorId,
          requestId: ctx.requestId,
        },
        'Custody repaired from ledger'
      );
      await this.notify({
        userId: ctx.actorId,
        activityType: ActivityType.CUSTODY_REPAIRED,
        entityType: ref.kind,
        entityId: ref.id,
        description: `Custody pointer rebuilt from movement ${result.value.headMovementId ?? 'none'}`,
        requestId: ctx.requestId,
      });
    }
    return result;
  }

  async listDocuments(kind: DocumentKind, query: ListDocumentsQuery, ctx: OperationContext): Promise<Result<DocumentPage>> {
    return this.run('listDocuments', ctx, async (tx) => {
      const offset = (query.page - 1) * query.limit;
      const filter: DocumentFilter = {
        search: query.search,
        status: query.status,
        holderId: query.holderId,
        parked: query.parked,
        offset,
        limit: query.limit,
      };
      const { rows, total } = await tx.listDocuments(kind, filter);
      const { page, limit, totalPages } = paginate(query.page, query.limit, total);
      return { rows, pagination: { page, limit, total, totalPages } };
    });
  }

  /**
   * Per-kind totals for the signed-in user plus pending work per section.
   */
  async dashboard(ctx: OperationContext): Promise<Result<Dashboard>> {
    return this.run('dashboard', ctx, async (tx) => {
      const [snapshots, sections] = await Promise.all([tx.listCustodySnapshots(), tx.listSections()]);

      const empty = (): KindTotals => ({ total: 0, pending: 0, heldByMe: 0, parked: 0 });
      const totals: Record<DocumentKind, KindTotals> = {
        [DocumentKind.NOTESHEET]: empty(),
        [DocumentKind.BILL]: empty(),
        [DocumentKind.LETTER]: empty(),
      };
      const pendingBySection = new Map<number, number>();

      for (const snapshot of snapshots) {
        const bucket = totals[snapshot.kind];
        bucket.total += 1;
        if (snapshot.isParked) {
          bucket.parked += 1;
        }
        if (isTerminal(snapshot)) {
          continue;
        }
        bucket.pending += 1;
        if (snapshot.currentHolderId === ctx.actorId) {
          bucket.heldByMe += 1;
        }
        if (snapshot.currentSectionId !== null) {
          pendingBySection.set(snapshot.currentSectionId, (pendingBySection.get(snapshot.currentSectionId) ?? 0) + 1);
        }
      }

      return {
        totals,
        sections: sections.map((s) => ({ sectionId: s.id, sectionName: s.name, pending: pendingBySection.get(s.id) ?? 0 })),
      };
    });
  }

  // ============================================
  // Internals
  // ============================================

  private async run<T>(
    operation: string,
    ctx: OperationContext,
    work: (tx: CustodyRepository) => Promise<T>
  ): Promise<Result<T>> {
    try {
      return { ok: true, value: await this.store.transaction(work) };
    } catch (err) {
      if (err instanceof AppError) {
        this.log.info(
          { event: 'custody.rejected', operation, code: err.code, actorId: ctx.actorId, requestId: ctx.requestId },
          err.message
        );
        return { ok: false, error: err };
      }
      this.log.error({ err, operation, actorId: ctx.actorId, requestId: ctx.requestId }, 'Custody operation failed');
      return { ok: false, error: new StorageFailureError(operation, err) };
    }
  }

  private async notify(event: ActivityEvent): Promise<void> {
    try {
      await this.activity.record(event);
    } catch (err) {
      this.log.warn(
        { err, activityType: event.activityType, entityId: event.entityId, requestId: event.requestId },
        'Activity log write failed'
      );
    }
  }

  private async requireDocument(tx: CustodyRepository, ref: DocumentRef): Promise<DocumentRecord> {
    const document = await tx.findDocument(ref);
    if (!document) {
      throw new DocumentNotFoundError(ref.kind, ref.id);
    }
    return document;
  }

  private async requireActor(tx: CustodyRepository, userId: number): Promise<UserSnapshot> {
    const user = await tx.findUser(userId);
    if (!user) {
      throw new UserNotFoundError(userId);
    }
    return user;
  }

  private async requireHead(
    tx: CustodyRepository,
    document: DocumentRecord,
    expectedMovementId: number | undefined
  ): Promise<MovementRecord> {
    const head = await tx.findCurrentMovement(document.id);
    if (!head) {
      throw new LedgerStateError('LEDGER_NOT_INITIALIZED', document.id);
    }
    if (expectedMovementId !== undefined && expectedMovementId !== head.id) {
      throw new ConcurrencyConflictError(document.id, expectedMovementId);
    }
    return head;
  }

  private async receiveSectionId(tx: CustodyRepository): Promise<number | null> {
    const section = await tx.findSectionByCode(this.receiveSectionCode);
    return section?.id ?? null;
  }

  /** Parse a custody date and hold it to the document's receive day. */
  private custodyDate(value: string | undefined, document: DocumentRecord): Date {
    const date = unwrap(parseCustodyDate(value, this.clock()));
    if (isBeforeReceipt(date, document.receivedDate)) {
      throw new InvalidDateError(value ?? date.toISOString(), 'before_receipt');
    }
    return date;
  }
}

/** Throw the error of a failed Result so the surrounding transaction rolls back. */
function unwrap<T>(result: Result<T, AppError>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
