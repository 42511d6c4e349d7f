/**
 * Unit Tests - Movement Ledger
 *
 * Runs against the in-process store so that the one-current-entry
 * constraint and conditional retire behave as they do in PostgreSQL.
 */

import { LedgerHistory, MovementLedger } from '../../services/ledger.service.js';
import type { Custody, MovementRecord } from '../../types/index.js';
import { MemoryCustodyStore } from '../../../../tests/support/memory-custody.store.js';
import { ALL_USERS, NOW, SECTIONS, localNoon, newNotesheet } from '../../../../tests/fixtures/office-test-data.js';

const CLERK: Custody = { holderId: 2, sectionId: SECTIONS.receive.id, subSectionId: 10 };
const ASSISTANT: Custody = { holderId: 4, sectionId: SECTIONS.accounts.id, subSectionId: 20 };
const HEAD: Custody = { holderId: 3, sectionId: SECTIONS.accounts.id, subSectionId: null };

async function seeded(): Promise<{ store: MemoryCustodyStore; ledger: MovementLedger; documentId: number }> {
  const store = new MemoryCustodyStore(ALL_USERS, Object.values(SECTIONS));
  const document = await store.insertDocument(newNotesheet());
  const ledger = new MovementLedger(store, () => NOW);
  await ledger.appendInitial(document, CLERK, CLERK.holderId, localNoon(2026, 1, 1));
  return { store, ledger, documentId: document.id };
}

describe('MovementLedger', () => {
  describe('appendInitial', () => {
    it('should seed the ledger with one current receipt entry', async () => {
      const { store, documentId } = await seeded();

      const rows = store.movementsOf(documentId);

      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        fromUserId: null,
        toUserId: 2,
        toSectionId: SECTIONS.receive.id,
        toSubSectionId: 10,
        forwardedBy: 2,
        forwardedDate: localNoon(2026, 1, 1),
        actionTaken: 'Received',
        comments: 'Initial receipt',
        isCurrent: true,
      });
    });

    it('should refuse to seed a ledger twice', async () => {
      const { ledger, documentId } = await seeded();

      await expect(ledger.appendInitial({ id: documentId }, CLERK, 2, NOW)).rejects.toMatchObject({
        code: 'LEDGER_ALREADY_INITIALIZED',
      });
    });
  });

  describe('appendTransfer', () => {
    it('should retire the head, append the new entry and move the custody pointer', async () => {
      const { store, ledger, documentId } = await seeded();

      const entry = await ledger.appendTransfer({
        document: { id: documentId },
        from: CLERK,
        to: ASSISTANT,
        actorId: 2,
        date: localNoon(2026, 1, 3),
        action: 'Forwarded',
        comment: 'Please examine',
      });

      const rows = store.movementsOf(documentId);
      expect(rows.map((r) => r.isCurrent)).toEqual([false, true]);
      expect(entry).toMatchObject({
        fromUserId: 2,
        fromSectionId: SECTIONS.receive.id,
        toUserId: 4,
        toSubSectionId: 20,
        comments: 'Please examine',
      });
      expect(store.documentOf(documentId)).toMatchObject({
        currentHolderId: 4,
        currentSectionId: SECTIONS.accounts.id,
        currentSubSectionId: 20,
      });
    });

    it('should reject a date in the future', async () => {
      const { store, ledger, documentId } = await seeded();

      await expect(
        ledger.appendTransfer({
          document: { id: documentId },
          from: CLERK,
          to: ASSISTANT,
          actorId: 2,
          date: localNoon(2026, 1, 11),
          action: 'Forwarded',
          comment: null,
        })
      ).rejects.toMatchObject({ code: 'INVALID_DATE', details: { reason: 'future' } });
      expect(store.movementsOf(documentId)).toHaveLength(1);
    });

    it('should fail with a conflict when the expected head has already been retired', async () => {
      const { store, ledger, documentId } = await seeded();
      const transfer = {
        document: { id: documentId },
        from: CLERK,
        actorId: 2,
        date: NOW,
        action: 'Forwarded',
        comment: null,
        expectedMovementId: 1,
      };
      await ledger.appendTransfer({ ...transfer, to: ASSISTANT });

      await expect(ledger.appendTransfer({ ...transfer, to: HEAD })).rejects.toMatchObject({
        code: 'CUSTODY_CONFLICT',
        category: 'ConcurrencyConflict',
      });
      expect(store.movementsOf(documentId).filter((r) => r.isCurrent).map((r) => r.toUserId)).toEqual([4]);
    });

    it('should refuse a transfer on a document that was never received', async () => {
      const store = new MemoryCustodyStore(ALL_USERS);
      const document = await store.insertDocument(newNotesheet());
      const ledger = new MovementLedger(store, () => NOW);

      await expect(
        ledger.appendTransfer({
          document,
          from: CLERK,
          to: ASSISTANT,
          actorId: 2,
          date: NOW,
          action: 'Forwarded',
          comment: null,
        })
      ).rejects.toMatchObject({ code: 'LEDGER_NOT_INITIALIZED' });
    });
  });

  describe('history', () => {
    it('should iterate newest first and expose the current entry', async () => {
      const { ledger, documentId } = await seeded();
      await ledger.appendTransfer({
        document: { id: documentId },
        from: CLERK,
        to: ASSISTANT,
        actorId: 2,
        date: localNoon(2026, 1, 3),
        action: 'Forwarded',
        comment: null,
      });

      const history = await ledger.history(documentId);

      expect(history.length).toBe(2);
      expect(history.current?.toUserId).toBe(4);
      expect([...history].map((e) => e.id)).toEqual([2, 1]);
      expect([...history].map((e) => e.id)).toEqual([2, 1]);
    });
  });
});

describe('LedgerHistory', () => {
  it('should order by id regardless of input order or dates', () => {
    const row = (id: number, day: number): MovementRecord => ({
      id,
      documentId: 1,
      fromUserId: null,
      toUserId: id,
      fromSectionId: null,
      toSectionId: null,
      fromSubSectionId: null,
      toSubSectionId: null,
      forwardedBy: 1,
      forwardedDate: localNoon(2026, 1, day),
      actionTaken: 'Forwarded',
      comments: null,
      isCurrent: id === 3,
      createdAt: NOW,
    });

    const history = new LedgerHistory([row(3, 1), row(1, 5), row(2, 2)]);

    expect([...history].map((e) => e.id)).toEqual([3, 2, 1]);
    expect(history.current?.id).toBe(3);
  });

  it('should have no current entry when empty', () => {
    const history = new LedgerHistory([]);

    expect(history.length).toBe(0);
    expect(history.current).toBeNull();
    expect([...history]).toEqual([]);
  });
});
