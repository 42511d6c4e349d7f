// services/ledger.service.ts — Append-only custody ledger
// Works against a transaction-scoped repository; every method assumes the
// caller owns the surrounding transaction and rolls it back on a throw.

import { ConcurrencyConflictError, InvalidDateError, LedgerStateError } from '../utils/errors.js';
import { MovementAction, type Custody, type DocumentRecord, type MovementRecord } from '../types/index.js';
import type { CustodyRepository } from '../models/custody.store.js';

export interface TransferInput {
  document: Pick<DocumentRecord, 'id'>;
  from: Custody;
  to: Custody;
  actorId: number;
  date: Date;
  action: string;
  comment: string | null;
  /** Ledger head the caller based its decision on. Defaults to whatever is current now. */
  expectedMovementId?: number;
}

/**
 * One snapshot of a document's ledger, iterated newest first. Each call to
 * `[Symbol.iterator]()` starts a fresh pass over the same snapshot.
 */
export class LedgerHistory implements Iterable<MovementRecord> {
  private readonly entries: readonly MovementRecord[];

  /** `oldestFirst` is the ledger in insertion order. */
  constructor(oldestFirst: readonly MovementRecord[]) {
    this.entries = [...oldestFirst].sort((a, b) => a.id - b.id);
  }

  get length(): number {
    return this.entries.length;
  }

  get current(): MovementRecord | null {
    return this.entries.find((e) => e.isCurrent) ?? null;
  }

  *[Symbol.iterator](): Iterator<MovementRecord> {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry) {
        yield entry;
      }
    }
  }
}

export class MovementLedger {
  constructor(
    private readonly repo: CustodyRepository,
    private readonly clock: () => Date
  ) {}

  /**
   * Seed the ledger for a freshly received document.
   */
  async appendInitial(
    document: Pick<DocumentRecord, 'id'>,
    receiver: Custody,
    actorId: number,
    date: Date
  ): Promise<MovementRecord> {
    const existing = await this.repo.listMovements(document.id);
    if (existing.length > 0) {
      throw new LedgerStateError('LEDGER_ALREADY_INITIALIZED', document.id);
    }

    return this.repo.insertMovement({
      documentId: document.id,
      fromUserId: null,
      toUserId: receiver.holderId,
      fromSectionId: null,
      toSectionId: receiver.sectionId,
      fromSubSectionId: null,
      toSubSectionId: receiver.subSectionId,
      forwardedBy: actorId,
      forwardedDate: date,
      actionTaken: MovementAction.RECEIVED,
      comments: 'Initial receipt',
    });
  }

  /**
   * Retire the current entry, append the new one and move the document's
   * custody pointer. The retire step only succeeds against the expected
   * head, so a concurrent transfer makes exactly one of the two fail.
   */
  async appendTransfer(input: TransferInput): Promise<MovementRecord> {
    const documentId = input.document.id;

    if (input.date.getTime() > this.clock().getTime()) {
      throw new InvalidDateError(input.date.toISOString(), 'future');
    }

    let expectedId = input.expectedMovementId;
    if (expectedId === undefined) {
      const head = await this.repo.findCurrentMovement(documentId);
      if (!head) {
        throw new LedgerStateError('LEDGER_NOT_INITIALIZED', documentId);
      }
      expectedId = head.id;
    }

    const retired = await this.repo.retireMovement(documentId, expectedId);
    if (!retired) {
      throw new ConcurrencyConflictError(documentId, expectedId);
    }

    const entry = await this.repo.insertMovement({
      documentId,
      fromUserId: input.from.holderId,
      toUserId: input.to.holderId,
      fromSectionId: input.from.sectionId,
      toSectionId: input.to.sectionId,
      fromSubSectionId: input.from.subSectionId,
      toSubSectionId: input.to.subSectionId,
      forwardedBy: input.actorId,
      forwardedDate: input.date,
      actionTaken: input.action,
      comments: input.comment,
    });

    await this.repo.updateCustody(documentId, input.to);
    return entry;
  }

  async history(documentId: number): Promise<LedgerHistory> {
    return new LedgerHistory(await this.repo.listMovements(documentId));
  }
}
