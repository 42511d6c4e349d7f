// services/custody-projector.ts — Stage-by-stage holding durations derived from the ledger
//
// Input is the ledger newest-first. Stage i ran from entry[i].forwardedDate
// until entry[i-1].forwardedDate; stage 0 is still running. Insertion order
// decides which entry follows which, so a backdated entry can produce an
// out-date before its in-date. Such stages are flagged, never clamped.

import { differenceInCalendarDays, differenceInHours } from 'date-fns';
import type { MovementRecord } from '../types/index.js';

export const PRESENT = 'Present';

export type StageKind = 'current' | 'completed' | 'inconsistent' | 'unknown';

export interface CustodyStage {
  movementId: number;
  holderId: number;
  sectionId: number | null;
  subSectionId: number | null;
  fromUserId: number | null;
  forwardedBy: number;
  action: string;
  comments: string | null;
  isCurrent: boolean;
  inDate: Date | null;
  outDate: Date | typeof PRESENT | null;
  kind: StageKind;
  /** Whole calendar days held; null when unknown or inconsistent. */
  days: number | null;
  hours: number | null;
  label: string;
  status: string;
}

export interface CustodySummary {
  totalStages: number;
  currentStageDays: number | null;
  inconsistentStages: number;
  unknownStages: number;
}

export interface CustodyProjection {
  stages: CustodyStage[];
  summary: CustodySummary;
}

function dayLabel(days: number): string {
  return days === 1 ? '1 day' : `${days} days`;
}

function currentStage(entry: MovementRecord, now: Date): Pick<CustodyStage, 'kind' | 'days' | 'hours' | 'label' | 'status'> {
  const status = 'Still here (current)';
  if (!entry.forwardedDate) {
    return { kind: 'unknown', days: null, hours: null, label: 'Unknown (current)', status };
  }
  const days = differenceInCalendarDays(now, entry.forwardedDate);
  if (days < 0) {
    return { kind: 'inconsistent', days: null, hours: null, label: 'Inconsistent dates', status };
  }
  const hours = Math.max(0, differenceInHours(now, entry.forwardedDate));
  const label = days === 0 ? 'Today (current)' : `${dayLabel(days)} (current)`;
  return { kind: 'current', days, hours, label, status };
}

function pastStage(
  inDate: Date | null,
  outDate: Date | null
): Pick<CustodyStage, 'kind' | 'days' | 'hours' | 'label' | 'status'> {
  if (!inDate || !outDate) {
    return { kind: 'unknown', days: null, hours: null, label: 'Unknown', status: 'Duration unknown' };
  }
  // Same-day entries may carry out-of-order clock times; only an earlier day is an error.
  const days = differenceInCalendarDays(outDate, inDate);
  if (days < 0) {
    return { kind: 'inconsistent', days: null, hours: null, label: 'Inconsistent dates', status: 'Data error' };
  }
  const hours = Math.max(0, differenceInHours(outDate, inDate));
  return { kind: 'completed', days, hours, label: days === 0 ? 'Same day' : dayLabel(days), status: 'Moved on' };
}

/**
 * Replay a newest-first ledger into stages. Pure: the same ledger and `now`
 * always yield the same projection.
 */
export function projectCustody(history: Iterable<MovementRecord>, now: Date): CustodyProjection {
  const entries = Array.from(history);

  const stages = entries.map((entry, i): CustodyStage => {
    const base = {
      movementId: entry.id,
      holderId: entry.toUserId,
      sectionId: entry.toSectionId,
      subSectionId: entry.toSubSectionId,
      fromUserId: entry.fromUserId,
      forwardedBy: entry.forwardedBy,
      action: entry.actionTaken,
      comments: entry.comments,
      isCurrent: i === 0,
      inDate: entry.forwardedDate,
    };

    if (i === 0) {
      return { ...base, outDate: PRESENT, ...currentStage(entry, now) };
    }

    const outDate = entries[i - 1]?.forwardedDate ?? null;
    return { ...base, outDate, ...pastStage(entry.forwardedDate, outDate) };
  });

  return {
    stages,
    summary: {
      totalStages: stages.length,
      currentStageDays: stages[0]?.days ?? null,
      inconsistentStages: stages.filter((s) => s.kind === 'inconsistent').length,
      unknownStages: stages.filter((s) => s.kind === 'unknown').length,
    },
  };
}
