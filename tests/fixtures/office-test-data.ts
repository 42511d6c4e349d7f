/**
 * Custody Tracker Test Fixtures
 *
 * A small office: an intake section, Accounts and Administration.
 * Full names sort in id order, so candidate lists read in id order too.
 */

import { DocumentKind, RoleName, type DocumentRecord, type SectionRecord, type UserSnapshot } from '../../backend/src/types/index.js';
import type { NewDocument } from '../../backend/src/models/custody.store.js';

export const SECTIONS = {
  receive: { id: 1, name: 'Receive Section', code: 'RCV' },
  accounts: { id: 2, name: 'Accounts', code: 'ACC' },
  administration: { id: 3, name: 'Administration', code: 'ADM' },
} satisfies Record<string, SectionRecord>;

function user(overrides: Partial<UserSnapshot> & Pick<UserSnapshot, 'id' | 'username' | 'fullName'>): UserSnapshot {
  return {
    designation: null,
    sectionId: null,
    subSectionId: null,
    isActive: true,
    isSuperuser: false,
    isSectionHead: false,
    roles: [],
    ...overrides,
  };
}

export const USERS = {
  /** Superuser; receive-section capability through the flag. */
  admin: user({ id: 1, username: 'admin', fullName: 'Admin User', isSuperuser: true, roles: [RoleName.SUPERUSER] }),
  /** Receive-section capability through membership of the intake section. */
  receiptClerk: user({ id: 2, username: 'rcv.clerk', fullName: 'Bina Receipt', sectionId: SECTIONS.receive.id, subSectionId: 10 }),
  /** Section head through the flag. */
  accountsHead: user({
    id: 3,
    username: 'acc.head',
    fullName: 'Chandan Accounts Head',
    sectionId: SECTIONS.accounts.id,
    isSectionHead: true,
  }),
  accountsAssistant: user({
    id: 4,
    username: 'acc.assistant',
    fullName: 'Deepa Accounts',
    sectionId: SECTIONS.accounts.id,
    subSectionId: 20,
    roles: [RoleName.SECTION_MEMBER],
  }),
  accountsClerk: user({
    id: 5,
    username: 'acc.clerk',
    fullName: 'Esha Accounts',
    sectionId: SECTIONS.accounts.id,
    roles: [RoleName.SECTION_MEMBER],
  }),
  /** Section head through the role only. */
  adminHead: user({
    id: 6,
    username: 'adm.head',
    fullName: 'Farhan Admin Head',
    sectionId: SECTIONS.administration.id,
    roles: [RoleName.SECTION_HEAD],
  }),
  adminAssistant: user({
    id: 7,
    username: 'adm.assistant',
    fullName: 'Gita Admin',
    sectionId: SECTIONS.administration.id,
  }),
  retired: user({
    id: 8,
    username: 'acc.retired',
    fullName: 'Hari Retired',
    sectionId: SECTIONS.accounts.id,
    isActive: false,
  }),
  /** Receive-section capability through the role, outside the intake section. */
  letterDesk: user({
    id: 9,
    username: 'adm.letters',
    fullName: 'Indu Letters',
    sectionId: SECTIONS.administration.id,
    roles: [RoleName.RECEIVE_SECTION],
  }),
} satisfies Record<string, UserSnapshot>;

export const ALL_USERS: UserSnapshot[] = Object.values(USERS);

/** Local noon, so calendar-day arithmetic is the same in every time zone. */
export function localNoon(year: number, month: number, day: number): Date {
  return new Date(year, month - 1, day, 12, 0, 0, 0);
}

/** The fixed "now" used by service tests. */
export const NOW = localNoon(2026, 1, 10);

export function newNotesheet(overrides: Partial<NewDocument> = {}): NewDocument {
  return {
    kind: DocumentKind.NOTESHEET,
    documentNumber: 'NS/2026/001',
    subject: 'Procurement of office furniture',
    priority: 'Normal',
    category: null,
    remarks: null,
    receivedDate: localNoon(2026, 1, 1),
    receivedBy: USERS.receiptClerk.id,
    currentStatus: 'Received',
    paymentStatus: null,
    custody: { holderId: USERS.receiptClerk.id, sectionId: SECTIONS.receive.id, subSectionId: 10 },
    details: { kind: DocumentKind.NOTESHEET, senderName: 'Stores Department' },
    ...overrides,
  };
}

/** Document snapshot for pure policy tests. */
export function documentSnapshot(overrides: Partial<DocumentRecord> = {}): DocumentRecord {
  return {
    id: 1,
    kind: DocumentKind.NOTESHEET,
    documentNumber: 'NS/2026/001',
    subject: 'Procurement of office furniture',
    priority: 'Normal',
    category: null,
    remarks: null,
    receivedDate: localNoon(2026, 1, 1),
    receivedBy: USERS.receiptClerk.id,
    currentStatus: 'Received',
    paymentStatus: null,
    currentHolderId: USERS.accountsAssistant.id,
    currentSectionId: SECTIONS.accounts.id,
    currentSubSectionId: 20,
    isParked: false,
    parkedBy: null,
    parkedAt: null,
    parkedReason: null,
    details: { kind: DocumentKind.NOTESHEET, senderName: 'Stores Department' },
    createdAt: localNoon(2026, 1, 1),
    updatedAt: localNoon(2026, 1, 1),
    ...overrides,
  };
}
