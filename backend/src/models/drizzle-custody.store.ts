// models/drizzle-custody.store.ts — PostgreSQL implementation of the custody store

import { and, count, desc, eq, ilike, inArray, or, type SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import { documents, movements, sections, userRoleMapping, userRoles, users, type Schema } from './schema.js';
import type { Database } from './db.js';
import { DuplicateDocumentNumberError } from '../utils/errors.js';
import type {
  CustodyRepository,
  CustodySnapshot,
  CustodyStore,
  DocumentFilter,
  NewDocument,
  NewMovement,
  ParkState,
  StatusChange,
} from './custody.store.js';
import {
  RoleName,
  type Custody,
  type DocumentKind,
  type DocumentRecord,
  type DocumentRef,
  type MovementRecord,
  type SectionRecord,
  type UserSnapshot,
} from '../types/index.js';

/** Either the root client or a transaction; both expose the same query builder. */
type Executor = PgDatabase<NodePgQueryResultHKT, Schema>;

type UserRow = typeof users.$inferSelect;

const ROLE_NAMES: ReadonlySet<string> = new Set<string>(Object.values(RoleName));

function isRoleName(value: string): value is RoleName {
  return ROLE_NAMES.has(value);
}

/** PostgreSQL `unique_violation`. */
function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

function toUserSnapshot(row: UserRow, roleNames: string[]): UserSnapshot {
  return {
    id: row.id,
    username: row.username,
    fullName: row.fullName,
    designation: row.designation,
    sectionId: row.sectionId,
    subSectionId: row.subSectionId,
    isActive: row.isActive,
    isSuperuser: row.isSuperuser,
    isSectionHead: row.isSectionHead,
    roles: roleNames.filter(isRoleName),
  };
}

class DrizzleCustodyRepository implements CustodyRepository {
  constructor(protected readonly db: Executor) {}

  async findDocument(ref: DocumentRef): Promise<DocumentRecord | null> {
    const rows = await this.db
      .select()
      .from(documents)
      .where(and(eq(documents.id, ref.id), eq(documents.kind, ref.kind)))
      .limit(1);
    return rows[0] ?? null;
  }

  async findDocumentByNumber(kind: DocumentKind, documentNumber: string): Promise<DocumentRecord | null> {
    const rows = await this.db
      .select()
      .from(documents)
      .where(and(eq(documents.kind, kind), eq(documents.documentNumber, documentNumber)))
      .limit(1);
    return rows[0] ?? null;
  }

  async insertDocument(document: NewDocument): Promise<DocumentRecord> {
    const { custody, ...fields } = document;
    let rows: DocumentRecord[];
    try {
      rows = await this.db
        .insert(documents)
        .values({
          ...fields,
          currentHolderId: custody.holderId,
          currentSectionId: custody.sectionId,
          currentSubSectionId: custody.subSectionId,
        })
        .returning();
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new DuplicateDocumentNumberError(document.kind, document.documentNumber);
      }
      throw err;
    }
    const row = rows[0];
    if (!row) {
      throw new Error('Document insert returned no row');
    }
    return row;
  }

  async updateCustody(documentId: number, custody: Custody): Promise<void> {
    await this.db
      .update(documents)
      .set({
        currentHolderId: custody.holderId,
        currentSectionId: custody.sectionId,
        currentSubSectionId: custody.subSectionId,
        updatedAt: new Date(),
      })
      .where(eq(documents.id, documentId));
  }

  async updateParkState(documentId: number, state: ParkState): Promise<void> {
    await this.db
      .update(documents)
      .set({ ...state, updatedAt: new Date() })
      .where(eq(documents.id, documentId));
  }

  async updateStatus(documentId: number, change: StatusChange): Promise<void> {
    await this.db
      .update(documents)
      .set({ ...change, updatedAt: new Date() })
      .where(eq(documents.id, documentId));
  }

  async deleteDocument(documentId: number): Promise<void> {
    await this.db.delete(movements).where(eq(movements.documentId, documentId));
    await this.db.delete(documents).where(eq(documents.id, documentId));
  }

  async listDocuments(kind: DocumentKind, filter: DocumentFilter): Promise<{ rows: DocumentRecord[]; total: number }> {
    const conditions: SQL[] = [eq(documents.kind, kind)];

    if (filter.search) {
      const pattern = `%${filter.search}%`;
      const match = or(ilike(documents.documentNumber, pattern), ilike(documents.subject, pattern));
      if (match) {
        conditions.push(match);
      }
    }
    if (filter.status) {
      conditions.push(eq(documents.currentStatus, filter.status));
    }
    if (filter.holderId !== undefined) {
      conditions.push(eq(documents.currentHolderId, filter.holderId));
    }
    if (filter.parked !== undefined) {
      conditions.push(eq(documents.isParked, filter.parked));
    }

    const where = and(...conditions);

    const [rows, totals] = await Promise.all([
      this.db
        .select()
        .from(documents)
        .where(where)
        .orderBy(desc(documents.receivedDate), desc(documents.id))
        .limit(filter.limit)
        .offset(filter.offset),
      this.db.select({ value: count() }).from(documents).where(where),
    ]);

    return { rows, total: totals[0]?.value ?? 0 };
  }

  async listCustodySnapshots(): Promise<CustodySnapshot[]> {
    return this.db
      .select({
        kind: documents.kind,
        currentStatus: documents.currentStatus,
        paymentStatus: documents.paymentStatus,
        currentHolderId: documents.currentHolderId,
        currentSectionId: documents.currentSectionId,
        isParked: documents.isParked,
      })
      .from(documents);
  }

  async listMovements(documentId: number): Promise<MovementRecord[]> {
    return this.db.select().from(movements).where(eq(movements.documentId, documentId)).orderBy(movements.id);
  }

  async findCurrentMovement(documentId: number): Promise<MovementRecord | null> {
    const rows = await this.db
      .select()
      .from(movements)
      .where(and(eq(movements.documentId, documentId), eq(movements.isCurrent, true)))
      .limit(1);
    return rows[0] ?? null;
  }

  async insertMovement(movement: NewMovement): Promise<MovementRecord> {
    const rows = await this.db
      .insert(movements)
      .values({ ...movement, isCurrent: true })
      .returning();
    const row = rows[0];
    if (!row) {
      throw new Error('Movement insert returned no row');
    }
    return row;
  }

  async retireMovement(documentId: number, movementId: number): Promise<boolean> {
    const rows = await this.db
      .update(movements)
      .set({ isCurrent: false })
      .where(and(eq(movements.id, movementId), eq(movements.documentId, documentId), eq(movements.isCurrent, true)))
      .returning({ id: movements.id });
    return rows.length === 1;
  }

  async markCurrent(documentId: number, movementId: number): Promise<void> {
    await this.db
      .update(movements)
      .set({ isCurrent: true })
      .where(and(eq(movements.id, movementId), eq(movements.documentId, documentId)));
  }

  async findUser(userId: number): Promise<UserSnapshot | null> {
    const rows = await this.db.select().from(users).where(eq(users.id, userId)).limit(1);
    const row = rows[0];
    if (!row) {
      return null;
    }
    const roles = await this.db
      .select({ name: userRoles.name })
      .from(userRoleMapping)
      .innerJoin(userRoles, eq(userRoleMapping.roleId, userRoles.id))
      .where(eq(userRoleMapping.userId, userId));
    return toUserSnapshot(
      row,
      roles.map((r) => r.name)
    );
  }

  async listActiveUsers(): Promise<UserSnapshot[]> {
    const rows = await this.db.select().from(users).where(eq(users.isActive, true)).orderBy(users.fullName);
    if (rows.length === 0) {
      return [];
    }

    const mappings = await this.db
      .select({ userId: userRoleMapping.userId, name: userRoles.name })
      .from(userRoleMapping)
      .innerJoin(userRoles, eq(userRoleMapping.roleId, userRoles.id))
      .where(
        inArray(
          userRoleMapping.userId,
          rows.map((r) => r.id)
        )
      );

    const rolesByUser = new Map<number, string[]>();
    for (const mapping of mappings) {
      const list = rolesByUser.get(mapping.userId) ?? [];
      list.push(mapping.name);
      rolesByUser.set(mapping.userId, list);
    }

    return rows.map((row) => toUserSnapshot(row, rolesByUser.get(row.id) ?? []));
  }

  async findSectionByCode(code: string): Promise<SectionRecord | null> {
    const rows = await this.db
      .select({ id: sections.id, name: sections.name, code: sections.code })
      .from(sections)
      .where(eq(sections.code, code))
      .limit(1);
    return rows[0] ?? null;
  }

  async listSections(): Promise<SectionRecord[]> {
    return this.db
      .select({ id: sections.id, name: sections.name, code: sections.code })
      .from(sections)
      .orderBy(sections.name);
  }
}

/**
 * Custody store backed by PostgreSQL. `transaction` uses the driver's
 * default isolation (READ COMMITTED); concurrent transfers are serialised
 * by the conditional update in `retireMovement`.
 */
export class DrizzleCustodyStore extends DrizzleCustodyRepository implements CustodyStore {
  constructor(private readonly root: Database) {
    super(root);
  }

  async transaction<T>(work: (tx: CustodyRepository) => Promise<T>): Promise<T> {
    return this.root.transaction(async (tx) => work(new DrizzleCustodyRepository(tx)));
  }
}
