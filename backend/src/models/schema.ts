// models/schema.ts — Drizzle table definitions (mirrors backend/sql/schema.sql)

import { sql } from 'drizzle-orm';
import { boolean, index, integer, jsonb, pgTable, serial, text, timestamp, uniqueIndex, varchar } from 'drizzle-orm/pg-core';
import type { DocumentDetails, DocumentKind, PaymentStatus, Priority } from '../types/index.js';

/**
 * sections
 *
 * Reference data only. The intake section is identified by its code
 * (RECEIVE_SECTION_CODE).
 */
export const sections = pgTable('sections', {
  id: serial('section_id').primaryKey(),
  name: text('section_name').notNull().unique(),
  code: varchar('section_code', { length: 16 }).unique(),
  description: text('description'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const subSections = pgTable(
  'sub_sections',
  {
    id: serial('sub_section_id').primaryKey(),
    sectionId: integer('section_id')
      .references(() => sections.id)
      .notNull(),
    name: text('sub_section_name').notNull(),
    code: varchar('sub_section_code', { length: 16 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    nameWithinSection: uniqueIndex('sub_sections_section_name_idx').on(table.sectionId, table.name),
  })
);

export const users = pgTable(
  'users',
  {
    id: serial('user_id').primaryKey(),
    username: text('username').notNull().unique(),
    fullName: text('full_name').notNull(),
    email: text('email'),
    designation: text('designation'),
    sectionId: integer('section_id').references(() => sections.id),
    subSectionId: integer('sub_section_id').references(() => subSections.id),
    isSectionHead: boolean('is_section_head').notNull().default(false),
    isActive: boolean('is_active').notNull().default(true),
    isSuperuser: boolean('is_superuser').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    sectionIdx: index('users_section_idx').on(table.sectionId),
  })
);

export const userRoles = pgTable('user_roles', {
  id: serial('role_id').primaryKey(),
  name: text('role_name').notNull().unique(),
  description: text('role_description'),
});

export const userRoleMapping = pgTable(
  'user_role_mapping',
  {
    id: serial('mapping_id').primaryKey(),
    userId: integer('user_id')
      .references(() => users.id, { onDelete: 'cascade' })
      .notNull(),
    roleId: integer('role_id')
      .references(() => userRoles.id, { onDelete: 'cascade' })
      .notNull(),
    assignedAt: timestamp('assigned_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userRole: uniqueIndex('user_role_mapping_user_role_idx').on(table.userId, table.roleId),
  })
);

/**
 * documents
 *
 * One table for notesheets, bills and letters. Custody columns are a
 * denormalised copy of the current movement and are only written in the
 * same transaction as the ledger.
 */
export const documents = pgTable(
  'documents',
  {
    id: serial('document_id').primaryKey(),
    kind: text('kind').$type<DocumentKind>().notNull(),
    documentNumber: text('document_number').notNull(),
    subject: text('subject').notNull(),
    priority: text('priority').$type<Priority>().notNull().default('Normal'),
    category: text('category'),
    remarks: text('remarks'),
    receivedDate: timestamp('received_date', { withTimezone: true }).notNull(),
    receivedBy: integer('received_by')
      .references(() => users.id)
      .notNull(),
    currentStatus: text('current_status').notNull(),
    paymentStatus: text('payment_status').$type<PaymentStatus>(),
    currentHolderId: integer('current_holder').references(() => users.id),
    currentSectionId: integer('current_section_id').references(() => sections.id),
    currentSubSectionId: integer('current_sub_section_id').references(() => subSections.id),
    isParked: boolean('is_parked').notNull().default(false),
    parkedBy: integer('parked_by').references(() => users.id),
    parkedAt: timestamp('parked_date', { withTimezone: true }),
    parkedReason: text('parked_reason'),
    details: jsonb('details').$type<DocumentDetails>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    numberPerKind: uniqueIndex('documents_kind_number_idx').on(table.kind, table.documentNumber),
    holderIdx: index('documents_holder_idx').on(table.currentHolderId),
    sectionIdx: index('documents_section_idx').on(table.currentSectionId),
    statusIdx: index('documents_status_idx').on(table.kind, table.currentStatus),
  })
);

/**
 * movements
 *
 * Append-only custody ledger. `movement_id` order is the chronological
 * order; `forwarded_date` is caller-supplied and may be backdated.
 */
export const movements = pgTable(
  'movements',
  {
    id: serial('movement_id').primaryKey(),
    documentId: integer('document_id')
      .references(() => documents.id, { onDelete: 'cascade' })
      .notNull(),
    fromUserId: integer('from_user').references(() => users.id),
    toUserId: integer('to_user')
      .references(() => users.id)
      .notNull(),
    fromSectionId: integer('from_section_id').references(() => sections.id),
    toSectionId: integer('to_section_id').references(() => sections.id),
    fromSubSectionId: integer('from_sub_section_id').references(() => subSections.id),
    toSubSectionId: integer('to_sub_section_id').references(() => subSections.id),
    forwardedBy: integer('forwarded_by')
      .references(() => users.id)
      .notNull(),
    forwardedDate: timestamp('forwarded_date', { withTimezone: true }),
    actionTaken: text('action_taken').notNull(),
    comments: text('comments'),
    isCurrent: boolean('is_current').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    documentIdx: index('movements_document_idx').on(table.documentId),
    oneCurrent: uniqueIndex('movements_one_current_idx')
      .on(table.documentId)
      .where(sql`${table.isCurrent}`),
  })
);

export const activityLogs = pgTable(
  'activity_logs',
  {
    id: serial('log_id').primaryKey(),
    userId: integer('user_id')
      .references(() => users.id)
      .notNull(),
    activityType: text('activity_type').notNull(),
    entityType: text('entity_type'),
    entityId: integer('entity_id'),
    description: text('description'),
    requestId: text('request_id'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdx: index('activity_logs_user_idx').on(table.userId),
    dateIdx: index('activity_logs_date_idx').on(table.createdAt),
  })
);

export const schema = {
  sections,
  subSections,
  users,
  userRoles,
  userRoleMapping,
  documents,
  movements,
  activityLogs,
};

export type Schema = typeof schema;
