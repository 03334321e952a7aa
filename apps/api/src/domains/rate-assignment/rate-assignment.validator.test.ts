import { describe, it, expect } from 'vitest';
import { RateAssignmentError } from '../../lib/errors.js';
import { parseFailedBill } from '../failed-bill/failed-bill.model.js';
import { parseRate, validateRateAssignment } from './rate-assignment.validator.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const BILL = parseFailedBill({
  filename: 'bill-001.json',
  provider: 'Valley Imaging',
  serviceLines: [
    { procedureCode: '70551', dateOfService: '2026-09-01' },
    { procedureCode: '99213', dateOfService: '2026-09-01' },
  ],
  failureReasons: ['RATE_MISSING: 70551', 'RATE_MISSING: 99213'],
});

const CATEGORY_MAP = {
  mri_wo: ['70551', '70552'],
  ct_abd: ['74150'],
};

function rejectionOf(input: unknown): RateAssignmentError {
  try {
    validateRateAssignment(input, BILL, CATEGORY_MAP);
  } catch (err) {
    if (err instanceof RateAssignmentError) return err;
    throw err;
  }
  throw new Error('expected the submission to be rejected');
}

// ---------------------------------------------------------------------------
// Mode
// ---------------------------------------------------------------------------

describe('mode rules', () => {
  it('rejects a request carrying both payloads', () => {
    const err = rejectionOf({
      mode: 'individual',
      rates: [{ procedureCode: '70551', rate: 150 }],
      categoryRates: { mri_wo: 150 },
    });
    expect(err.code).toBe('MALFORMED_REQUEST');
    expect(err.message).toBe('Individual mode requires rates and no categoryRates');
    expect(err.details).toEqual({ rule: 'MODE_EXCLUSIVE', field: 'mode', value: 'individual' });
  });

  it('rejects a request carrying neither payload', () => {
    const err = rejectionOf({ mode: 'category' });
    expect(err.code).toBe('MALFORMED_REQUEST');
    expect(err.message).toBe('Category mode requires categoryRates and no rates');
  });

  it('rejects an unknown mode', () => {
    const err = rejectionOf({ mode: 'bulk', rates: [] });
    expect(err.code).toBe('MALFORMED_REQUEST');
    expect(err.message).toBe('Unknown rate assignment mode: bulk');
  });

  it('rejects structurally invalid bodies', () => {
    expect(rejectionOf(null).code).toBe('MALFORMED_REQUEST');
    expect(rejectionOf({ rates: [] }).details.field).toBe('mode');
    expect(
      rejectionOf({ mode: 'individual', rates: [{ procedureCode: '70551', rate: { amount: 1 } }] })
        .details.field,
    ).toBe('rates.0.rate');
  });

  it('maps the error codes to HTTP 400', () => {
    expect(rejectionOf(null).statusCode).toBe(400);
  });
});

// ---------------------------------------------------------------------------
// Individual mode
// ---------------------------------------------------------------------------

describe('individual mode', () => {
  it('rejects a zero rate naming the procedure code', () => {
    const err = rejectionOf({
      mode: 'individual',
      rates: [{ procedureCode: '70551', rate: 0 }],
    });
    expect(err.code).toBe('INVALID_RATE');
    expect(err.message).toBe('Invalid rate value for procedure code 70551');
    expect(err.details).toEqual({
      rule: 'INDIVIDUAL_ENTRY',
      field: 'rates[0].rate',
      value: 0,
      procedureCode: '70551',
    });
  });

  it.each([
    ['negative', '-5'],
    ['non-numeric', 'abc'],
    ['blank', '  '],
    ['missing', null],
  ])('rejects a %s rate', (_label, rate) => {
    const err = rejectionOf({
      mode: 'individual',
      rates: [{ procedureCode: '99213', rate }],
    });
    expect(err.code).toBe('INVALID_RATE');
    expect(err.message).toBe('Invalid rate value for procedure code 99213');
  });

  it('rejects a blank procedure code', () => {
    const err = rejectionOf({
      mode: 'individual',
      rates: [
        { procedureCode: '70551', rate: 150 },
        { procedureCode: '   ', rate: 90 },
      ],
    });
    expect(err.code).toBe('INVALID_RATE');
    expect(err.details.field).toBe('rates[1].procedureCode');
  });

  it('rejects an empty rate list', () => {
    const err = rejectionOf({ mode: 'individual', rates: [] });
    expect(err.code).toBe('EMPTY_SUBMISSION');
    expect(err.details).toEqual({ rule: 'NON_EMPTY', field: 'rates' });
  });

  it('normalizes codes, rates and modifiers', () => {
    const { request, warnings } = validateRateAssignment(
      {
        mode: 'individual',
        rates: [
          { procedureCode: ' 70551 ', rate: '150.50', modifier: ' 26 ' },
          { procedureCode: '99213', rate: 80, modifier: '' },
        ],
      },
      BILL,
      CATEGORY_MAP,
    );

    expect(request).toEqual({
      mode: 'individual',
      rates: [
        { procedureCode: '70551', rate: 150.5, modifier: '26' },
        { procedureCode: '99213', rate: 80, modifier: null },
      ],
    });
    expect(warnings).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Category mode
// ---------------------------------------------------------------------------

describe('category mode', () => {
  it('rejects an empty category map', () => {
    const err = rejectionOf({ mode: 'category', categoryRates: {} });
    expect(err.code).toBe('EMPTY_SUBMISSION');
    expect(err.details).toEqual({ rule: 'NON_EMPTY', field: 'categoryRates' });
  });

  it('rejects a missing rate naming the category', () => {
    const err = rejectionOf({ mode: 'category', categoryRates: { MRI_WO: '' } });
    expect(err.code).toBe('INVALID_RATE');
    expect(err.message).toBe('Invalid rate value for category mri_wo');
    expect(err.details.field).toBe('categoryRates.MRI_WO');
  });

  it('rejects a non-positive rate', () => {
    expect(rejectionOf({ mode: 'category', categoryRates: { mri_wo: -1 } }).code).toBe(
      'INVALID_RATE',
    );
  });

  it('rejects keys that collide after normalization', () => {
    const err = rejectionOf({
      mode: 'category',
      categoryRates: { mri_wo: 150, 'MRI_WO ': 175 },
    });
    expect(err.code).toBe('MALFORMED_REQUEST');
    expect(err.message).toBe('Category mri_wo was submitted more than once');
  });

  it('rejects a blank category key', () => {
    expect(rejectionOf({ mode: 'category', categoryRates: { ' ': 150 } }).code).toBe(
      'MALFORMED_REQUEST',
    );
  });

  it('lower-cases category keys', () => {
    const { request } = validateRateAssignment(
      { mode: 'category', categoryRates: { ' MRI_WO': '150' } },
      BILL,
      CATEGORY_MAP,
    );
    expect(request).toEqual({
      mode: 'category',
      categoryRates: [{ category: 'mri_wo', rate: 150 }],
    });
  });

  it('accepts a category matching no failing code and warns about it', () => {
    const { request, warnings } = validateRateAssignment(
      { mode: 'category', categoryRates: { ct_abd: 200 } },
      BILL,
      CATEGORY_MAP,
    );
    expect(request.mode).toBe('category');
    expect(warnings).toEqual([
      'Category ct_abd matches none of the failing procedure codes on bill-001.json',
    ]);
  });

  it('resolves zero-match warnings against mixed-case map keys', () => {
    const { warnings } = validateRateAssignment(
      { mode: 'category', categoryRates: { mri_wo: 150, ct_abd: 200 } },
      BILL,
      { MRI_WO: ['70551'], CT_ABD: ['74150'] },
    );
    expect(warnings).toEqual([
      'Category ct_abd matches none of the failing procedure codes on bill-001.json',
    ]);
  });

  it('leaves categories absent from the map to the applier', () => {
    const { warnings } = validateRateAssignment(
      { mode: 'category', categoryRates: { nuclear: 100 } },
      BILL,
      CATEGORY_MAP,
    );
    expect(warnings).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// parseRate
// ---------------------------------------------------------------------------

describe('parseRate', () => {
  it.each([
    [150, 150],
    [' 42.5 ', 42.5],
    ['.5', 0.5],
    ['+7', 7],
    ['1e3', null],
    ['12abc', null],
    [Number.POSITIVE_INFINITY, null],
    [Number.NaN, null],
    [null, null],
    [undefined, null],
  ])('parseRate(%j) → %j', (input, expected) => {
    expect(parseRate(input)).toBe(expected);
  });
});
