import { describe, it, expect } from 'vitest';
import {
  parseFailedBill,
  parseFailureReason,
  parseServiceDate,
} from './failed-bill.model.js';

// ---------------------------------------------------------------------------
// parseFailureReason
// ---------------------------------------------------------------------------

describe('parseFailureReason', () => {
  it('splits a known kind from its procedure code', () => {
    expect(parseFailureReason('RATE_MISSING: 70551')).toEqual({
      type: 'known',
      kind: 'RATE_MISSING',
      detail: '70551',
      raw: 'RATE_MISSING: 70551',
    });
  });

  it('passes unknown tokens through as unrecognized kinds', () => {
    const reason = parseFailureReason('PAYER_HOLD: 99213');
    expect(reason.type).toBe('unrecognized');
    expect(reason.kind).toBe('PAYER_HOLD');
    expect(reason.detail).toBe('99213');
  });

  it('matches kind tokens case-sensitively', () => {
    const reason = parseFailureReason('rate_missing: 70551');
    expect(reason.type).toBe('unrecognized');
    expect(reason.kind).toBe('rate_missing');
  });

  it('associates no code when the detail segment is absent or blank', () => {
    expect(parseFailureReason('READ_ERROR').detail).toBeUndefined();
    expect(parseFailureReason('RATE_MISSING:   ').detail).toBeUndefined();
  });

  it('splits on the first colon only', () => {
    expect(parseFailureReason('UNMATCHED_CPT: 70551: see notes').detail).toBe(
      '70551: see notes',
    );
  });

  it('maps an empty kind token to Unknown', () => {
    const reason = parseFailureReason(': 70551');
    expect(reason.type).toBe('unrecognized');
    expect(reason.kind).toBe('Unknown');
    expect(reason.detail).toBe('70551');
  });
});

// ---------------------------------------------------------------------------
// parseServiceDate
// ---------------------------------------------------------------------------

describe('parseServiceDate', () => {
  it('parses ISO calendar dates as UTC midnight', () => {
    expect(parseServiceDate('2026-09-01')).toEqual(new Date(Date.UTC(2026, 8, 1)));
  });

  it('parses US-style dates', () => {
    expect(parseServiceDate('9/15/2026')).toEqual(new Date(Date.UTC(2026, 8, 15)));
  });

  it('parses ISO date-times', () => {
    expect(parseServiceDate('2026-09-01T10:30:00Z')).toEqual(
      new Date('2026-09-01T10:30:00Z'),
    );
  });

  it('rejects impossible and unrecognised dates', () => {
    expect(parseServiceDate('2026-02-30')).toBeNull();
    expect(parseServiceDate('13/01/2026')).toBeNull();
    expect(parseServiceDate('yesterday')).toBeNull();
    expect(parseServiceDate('')).toBeNull();
    expect(parseServiceDate(null)).toBeNull();
    expect(parseServiceDate(undefined)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// parseFailedBill
// ---------------------------------------------------------------------------

describe('parseFailedBill', () => {
  it('derives distinct failing codes in reason order', () => {
    const bill = parseFailedBill({
      filename: 'bill-001.json',
      provider: 'Valley Imaging',
      serviceLines: [],
      failureReasons: [
        'RATE_MISSING: 70551',
        'UNMATCHED_CPT: 99213',
        'TOO_MANY_UNITS: 70551',
        'READ_ERROR',
      ],
    });

    expect(bill.failingCodes).toEqual(['70551', '99213']);
    expect(bill.failureReasons.map((r) => r.kind)).toEqual([
      'RATE_MISSING',
      'UNMATCHED_CPT',
      'TOO_MANY_UNITS',
      'READ_ERROR',
    ]);
  });

  it('takes the earliest parseable service date and skips bad ones', () => {
    const bill = parseFailedBill({
      filename: 'bill-002.json',
      serviceLines: [
        { procedureCode: '70551', dateOfService: '2026-09-10' },
        { procedureCode: '70552', dateOfService: 'pending' },
        { procedureCode: '99213', dateOfService: '08/30/2026' },
        { procedureCode: '99214', dateOfService: null },
      ],
      failureReasons: [],
    });

    expect(bill.earliestServiceDate).toEqual(new Date(Date.UTC(2026, 7, 30)));
  });

  it('leaves the earliest date null without service lines', () => {
    const bill = parseFailedBill({
      filename: 'bill-003.json',
      serviceLines: [],
      failureReasons: ['RATE_MISSING: 70551'],
    });
    expect(bill.earliestServiceDate).toBeNull();
  });

  it('normalizes provider, units and modifiers', () => {
    const bill = parseFailedBill({
      filename: 'bill-004.json',
      provider: '   ',
      serviceLines: [
        { procedureCode: ' 70551 ', units: '2', modifiers: [' 26 ', ''] },
        { procedureCode: '70552', units: 'two' },
        { procedureCode: '70553', units: 3 },
      ],
      failureReasons: [],
    });

    expect(bill.provider).toBeNull();
    expect(bill.serviceLines).toEqual([
      { procedureCode: '70551', dateOfService: null, units: 2, modifiers: ['26'] },
      { procedureCode: '70552', dateOfService: null, units: null, modifiers: [] },
      { procedureCode: '70553', dateOfService: null, units: 3, modifiers: [] },
    ]);
  });
});
