// utils/helpers.ts — Utility functions for the custody tracker backend

import { differenceInCalendarDays, isValid, parse, parseISO, set } from 'date-fns';
import { InvalidDateError } from './errors.js';
import type { Result } from '../types/index.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parse a caller-supplied custody date.
 *
 * Accepts `YYYY-MM-DD` (stamped with the current time of day, so that
 * several hand-offs on one day keep their order) or a full ISO-8601
 * date-time; partial forms such as `2026-01` are unparsable. An absent value
 * means "now". Dates after `now` are rejected; backdating is allowed.
 */
export function parseCustodyDate(value: string | null | undefined, now: Date): Result<Date, InvalidDateError> {
  if (value === undefined || value === null || value.trim() === '') {
    return { ok: true, value: now };
  }

  const trimmed = value.trim();
  let parsed: Date;

  if (DATE_ONLY.test(trimmed)) {
    const day = parse(trimmed, 'yyyy-MM-dd', now);
    parsed = set(day, {
      hours: now.getHours(),
      minutes: now.getMinutes(),
      seconds: now.getSeconds(),
      milliseconds: now.getMilliseconds(),
    });
  } else if (DATE_TIME.test(trimmed)) {
    parsed = parseISO(trimmed);
  } else {
    return { ok: false, error: new InvalidDateError(trimmed, 'unparsable') };
  }

  if (!isValid(parsed)) {
    return { ok: false, error: new InvalidDateError(trimmed, 'unparsable') };
  }

  if (parsed.getTime() > now.getTime()) {
    return { ok: false, error: new InvalidDateError(trimmed, 'future') };
  }

  return { ok: true, value: parsed };
}

/**
 * True when `date` falls on a calendar day earlier than `receivedDate`.
 */
export function isBeforeReceipt(date: Date, receivedDate: Date): boolean {
  return differenceInCalendarDays(date, receivedDate) < 0;
}

/**
 * Compute pagination metadata for list endpoints.
 */
export function paginate(page: number, limit: number, total: number): {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
} {
  return {
    page,
    limit,
    total,
    totalPages: Math.ceil(total / limit),
  };
}
