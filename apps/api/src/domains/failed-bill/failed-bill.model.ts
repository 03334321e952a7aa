// ============================================================================
// Failed Bills — Record Model
// Parses a raw upstream payload into the typed bill used by triage and rate
// assignment. Pure; never throws on malformed reasons or dates.
// ============================================================================

import {
  UNKNOWN_GROUP,
  type FailureKind,
} from '@ratedesk/shared/constants/failed-bill.constants.js';
import { isFailureKind } from '@ratedesk/shared/utils/failure-kind.utils.js';
import type { RawFailedBill } from '@ratedesk/shared/schemas/failed-bill.schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FailureReason =
  | {
      type: 'known';
      kind: FailureKind;
      /** Procedure code the reason refers to, if any. */
      detail?: string;
      raw: string;
    }
  | {
      type: 'unrecognized';
      kind: string;
      detail?: string;
      raw: string;
    };

export interface ServiceLine {
  procedureCode: string;
  dateOfService: Date | null;
  units: number | null;
  modifiers: string[];
}

export interface FailedBill {
  filename: string;
  provider: string | null;
  serviceLines: ServiceLine[];
  failureReasons: FailureReason[];
  /** Distinct procedure codes named by failure reasons, in reason order. */
  failingCodes: string[];
  /** Minimum parseable service date; null when no line has one. */
  earliestServiceDate: Date | null;
}

// ---------------------------------------------------------------------------
// Failure reasons
// ---------------------------------------------------------------------------

/**
 * Splits `"KIND: detail"` on the first colon. The kind token is matched
 * case-sensitively; anything outside the closed set passes through as an
 * unrecognized kind. An empty token becomes `Unknown`.
 */
export function parseFailureReason(raw: string): FailureReason {
  const separator = raw.indexOf(':');
  const token = (separator === -1 ? raw : raw.slice(0, separator)).trim();
  const detailText = separator === -1 ? '' : raw.slice(separator + 1).trim();
  const detail = detailText === '' ? undefined : detailText;

  if (isFailureKind(token)) {
    return { type: 'known', kind: token, detail, raw };
  }
  return {
    type: 'unrecognized',
    kind: token === '' ? UNKNOWN_GROUP : token,
    detail,
    raw,
  };
}

// ---------------------------------------------------------------------------
// Service dates
// ---------------------------------------------------------------------------

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function utcCalendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Accepts `YYYY-MM-DD`, ISO-8601 date-times and `MM/DD/YYYY`.
 * Returns null for anything else, including impossible calendar dates.
 */
export function parseServiceDate(value: string | null | undefined): Date | null {
  if (value == null) return null;
  const text = value.trim();

  const iso = ISO_DATE.exec(text);
  if (iso) {
    return utcCalendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  if (ISO_DATE_TIME.test(text)) {
    const date = new Date(text);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  const us = US_DATE.exec(text);
  if (us) {
    return utcCalendarDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  return null;
}

function parseUnits(value: number | string | null | undefined): number | null {
  if (value == null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const text = value.trim();
  if (text === '') return null;
  const units = Number(text);
  return Number.isFinite(units) ? units : null;
}

// ---------------------------------------------------------------------------
// Bill
// ---------------------------------------------------------------------------

export function parseFailedBill(raw: RawFailedBill): FailedBill {
  const serviceLines: ServiceLine[] = raw.serviceLines.map((line) => ({
    procedureCode: line.procedureCode.trim(),
    dateOfService: parseServiceDate(line.dateOfService),
    units: parseUnits(line.units),
    modifiers: (line.modifiers ?? [])
      .map((m) => m.trim())
      .filter((m) => m !== ''),
  }));

  const failureReasons = raw.failureReasons.map(parseFailureReason);

  const failingCodes: string[] = [];
  for (const reason of failureReasons) {
    if (reason.detail !== undefined && !failingCodes.includes(reason.detail)) {
      failingCodes.push(reason.detail);
    }
  }

  let earliestServiceDate: Date | null = null;
  for (const line of serviceLines) {
    if (
      line.dateOfService &&
      (earliestServiceDate === null ||
        line.dateOfService.getTime() < earliestServiceDate.getTime())
    ) {
      earliestServiceDate = line.dateOfService;
    }
  }

  const provider = raw.provider?.trim();

  return {
    filename: raw.filename,
    provider: provider ? provider : null,
    serviceLines,
    failureReasons,
    failingCodes,
    earliestServiceDate,
  };
}
