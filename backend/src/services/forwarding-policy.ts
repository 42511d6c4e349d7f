// services/forwarding-policy.ts — Who may move a document, and to whom
// Pure functions over snapshots: no store access, no clock.

import {
  CustodyForbiddenError,
  DocumentNotParkedError,
  DocumentParkedError,
  MissingRecipientError,
  RecipientNotAllowedError,
  TerminalStateError,
  type AppError,
} from '../utils/errors.js';
import {
  DocumentKind,
  RoleName,
  TERMINAL_STATUSES,
  type DocumentRecord,
  type Result,
  type UserSnapshot,
} from '../types/index.js';

/** Which rule admitted the actor. `denied` when none did. */
export type ForwardingCase = 'receive_section' | 'section_head_holder' | 'holder' | 'denied';

export interface ForwardingDecision {
  allowed: boolean;
  case: ForwardingCase;
  /** Valid recipients, sorted by full name. Empty when denied. */
  candidates: UserSnapshot[];
}

export interface ForwardAuthorization {
  decision: ForwardingDecision;
  recipient: UserSnapshot;
}

/** The document fields the policy reads. */
export type PolicyDocument = Pick<
  DocumentRecord,
  'id' | 'kind' | 'currentStatus' | 'paymentStatus' | 'currentHolderId' | 'isParked'
>;

export function hasReceiveSectionCapability(user: UserSnapshot, receiveSectionId: number | null): boolean {
  if (user.isSuperuser || user.roles.includes(RoleName.RECEIVE_SECTION)) {
    return true;
  }
  return receiveSectionId !== null && user.sectionId === receiveSectionId;
}

export function hasSectionHeadCapability(user: UserSnapshot): boolean {
  return user.isSectionHead || user.roles.includes(RoleName.SECTION_HEAD);
}

/**
 * Terminal documents have frozen custody. Bills are also terminal once
 * fully paid, whatever their lifecycle status says.
 */
export function isTerminal(document: Pick<DocumentRecord, 'kind' | 'currentStatus' | 'paymentStatus'>): boolean {
  if (TERMINAL_STATUSES[document.kind].includes(document.currentStatus)) {
    return true;
  }
  return document.kind === DocumentKind.BILL && document.paymentStatus === 'Paid';
}

function byName(a: UserSnapshot, b: UserSnapshot): number {
  return a.fullName.localeCompare(b.fullName) || a.id - b.id;
}

/**
 * Evaluate the forwarding cases in priority order; the first that matches
 * supplies the candidate set.
 */
export function evaluateForwarding(
  actor: UserSnapshot,
  document: PolicyDocument,
  directory: readonly UserSnapshot[],
  receiveSectionId: number | null
): ForwardingDecision {
  if (!actor.isActive) {
    return { allowed: false, case: 'denied', candidates: [] };
  }

  const active = directory.filter((u) => u.isActive);
  const isHolder = document.currentHolderId === actor.id;

  if (hasReceiveSectionCapability(actor, receiveSectionId)) {
    const candidates = active.filter((u) => !u.isSuperuser && u.id !== document.currentHolderId);
    return { allowed: true, case: 'receive_section', candidates: candidates.sort(byName) };
  }

  if (hasSectionHeadCapability(actor) && isHolder) {
    const candidates = active.filter((u) => {
      if (u.id === actor.id || u.isSuperuser) {
        return false;
      }
      const sameSection = actor.sectionId !== null && u.sectionId === actor.sectionId;
      return sameSection || hasSectionHeadCapability(u) || hasReceiveSectionCapability(u, receiveSectionId);
    });
    return { allowed: true, case: 'section_head_holder', candidates: candidates.sort(byName) };
  }

  if (isHolder) {
    const candidates = active.filter(
      (u) =>
        u.id !== actor.id &&
        actor.sectionId !== null &&
        u.sectionId === actor.sectionId &&
        hasSectionHeadCapability(u)
    );
    return { allowed: true, case: 'holder', candidates: candidates.sort(byName) };
  }

  return { allowed: false, case: 'denied', candidates: [] };
}

/**
 * Full forward check: hard gates first, then the case evaluation, then
 * recipient membership.
 */
export function authorizeForward(
  actor: UserSnapshot,
  document: PolicyDocument,
  toUserId: number | null | undefined,
  directory: readonly UserSnapshot[],
  receiveSectionId: number | null
): Result<ForwardAuthorization, AppError> {
  if (toUserId === null || toUserId === undefined) {
    return { ok: false, error: new MissingRecipientError() };
  }
  if (isTerminal(document)) {
    return { ok: false, error: new TerminalStateError(document.id, terminalLabel(document)) };
  }
  if (document.isParked) {
    return { ok: false, error: new DocumentParkedError(document.id) };
  }

  const decision = evaluateForwarding(actor, document, directory, receiveSectionId);
  if (!decision.allowed) {
    return { ok: false, error: new CustodyForbiddenError(document.id, actor.id, 'forward') };
  }
  const recipient = decision.candidates.find((u) => u.id === toUserId);
  if (!recipient) {
    return { ok: false, error: new RecipientNotAllowedError(document.id, toUserId) };
  }
  return { ok: true, value: { decision, recipient } };
}

export function authorizePark(
  actor: UserSnapshot,
  document: PolicyDocument,
  directory: readonly UserSnapshot[],
  receiveSectionId: number | null
): Result<ForwardingDecision, AppError> {
  if (isTerminal(document)) {
    return { ok: false, error: new TerminalStateError(document.id, terminalLabel(document)) };
  }
  if (document.isParked) {
    return { ok: false, error: new DocumentParkedError(document.id) };
  }
  const decision = evaluateForwarding(actor, document, directory, receiveSectionId);
  if (!decision.allowed) {
    return { ok: false, error: new CustodyForbiddenError(document.id, actor.id, 'park') };
  }
  return { ok: true, value: decision };
}

/** Unparking is allowed on terminal documents so that nothing stays parked forever. */
export function authorizeUnpark(
  actor: UserSnapshot,
  document: PolicyDocument,
  directory: readonly UserSnapshot[],
  receiveSectionId: number | null
): Result<ForwardingDecision, AppError> {
  if (!document.isParked) {
    return { ok: false, error: new DocumentNotParkedError(document.id) };
  }
  const decision = evaluateForwarding(actor, document, directory, receiveSectionId);
  if (!decision.allowed) {
    return { ok: false, error: new CustodyForbiddenError(document.id, actor.id, 'unpark') };
  }
  return { ok: true, value: decision };
}

function terminalLabel(document: Pick<DocumentRecord, 'kind' | 'currentStatus' | 'paymentStatus'>): string {
  if (TERMINAL_STATUSES[document.kind].includes(document.currentStatus)) {
    return document.currentStatus;
  }
  return `Payment ${document.paymentStatus ?? 'Paid'}`;
}
