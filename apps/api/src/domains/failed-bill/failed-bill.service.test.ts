import { describe, it, expect, vi } from 'vitest';
import type { RawFailedBill } from '@ratedesk/shared/schemas/failed-bill.schema.js';
import { NotFoundError } from '../../lib/errors.js';
import {
  ingestFailedBill,
  listFailedBills,
  getFilterOptions,
  getFailedBillDetail,
  type FailedBillServiceDeps,
} from './failed-bill.service.js';

// ---------------------------------------------------------------------------
// Test constants
// ---------------------------------------------------------------------------

const NOW = new Date('2026-10-19T00:00:00Z');

const MRI_PAYLOAD: RawFailedBill = {
  filename: 'mri-001.json',
  provider: 'Valley Imaging',
  serviceLines: [{ procedureCode: '70551', dateOfService: '2026-09-18' }],
  failureReasons: ['RATE_MISSING: 70551', 'UNMATCHED_CPT: 99213'],
};

const CLINIC_PAYLOAD: RawFailedBill = {
  filename: 'clinic-002.json',
  provider: 'North Clinic',
  serviceLines: [{ procedureCode: '99214', dateOfService: '2026-10-09' }],
  failureReasons: ['UNMATCHED_CPT: 99214'],
};

const UNDATED_PAYLOAD: RawFailedBill = {
  filename: 'scan-003.json',
  serviceLines: [],
  failureReasons: ['PAYER_HOLD: 70551'],
};

// ---------------------------------------------------------------------------
// Mock factories
// ---------------------------------------------------------------------------

function makeRow(payload: RawFailedBill) {
  return {
    filename: payload.filename,
    provider: payload.provider ?? null,
    payload,
    status: 'FAILED',
    ingestedAt: new Date('2026-10-18T00:00:00Z'),
    resolvedAt: null,
  };
}

function makeDeps(overrides: Partial<FailedBillServiceDeps> = {}): FailedBillServiceDeps {
  return {
    billRepo: {
      upsertFailed: vi.fn().mockResolvedValue(makeRow(MRI_PAYLOAD)),
      listFailed: vi
        .fn()
        .mockResolvedValue([
          makeRow(MRI_PAYLOAD),
          makeRow(CLINIC_PAYLOAD),
          makeRow(UNDATED_PAYLOAD),
        ]),
      findFailedByFilename: vi.fn().mockResolvedValue(makeRow(MRI_PAYLOAD)),
    },
    categoryRepo: {
      getCategoryMap: vi.fn().mockResolvedValue({
        mri_wo: ['70551', '70552'],
        mri_all: ['70551', '70552', '70553'],
        ct_abd: ['74150'],
      }),
    },
    auditRepo: {
      appendAuditLog: vi.fn().mockResolvedValue({}),
    },
    now: () => NOW,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('FailedBillService', () => {
  describe('ingestFailedBill', () => {
    it('stores the payload and returns its triage entry', async () => {
      const deps = makeDeps();

      const entry = await ingestFailedBill(deps, MRI_PAYLOAD);

      expect(deps.billRepo.upsertFailed).toHaveBeenCalledWith(MRI_PAYLOAD);
      expect(entry.bill.failingCodes).toEqual(['70551', '99213']);
      expect(entry.ageDays).toBe(31);
      expect(entry.ageBucket).toBe('31-60');
    });

    it('appends a failed_bill.ingested audit entry', async () => {
      const deps = makeDeps();

      await ingestFailedBill(deps, MRI_PAYLOAD);

      expect(deps.auditRepo.appendAuditLog).toHaveBeenCalledWith({
        action: 'failed_bill.ingested',
        category: 'triage',
        resourceType: 'failed_bill',
        resourceId: 'mri-001.json',
        detail: {
          failureKinds: ['RATE_MISSING', 'UNMATCHED_CPT'],
          failingCodes: ['70551', '99213'],
        },
      });
    });
  });

  describe('listFailedBills', () => {
    it('filters, groups and counts the failed bills', async () => {
      const deps = makeDeps();

      const list = await listFailedBills(deps, { kind: 'UNMATCHED_CPT' }, 'provider');

      expect(list.total).toBe(2);
      expect(list.bills.map((e) => e.bill.filename)).toEqual([
        'mri-001.json',
        'clinic-002.json',
      ]);
      expect(list.groups).toEqual([
        { key: 'Valley Imaging', filenames: ['mri-001.json'] },
        { key: 'North Clinic', filenames: ['clinic-002.json'] },
      ]);
      expect(list.stats.byAgeBucket).toEqual({
        '0-30': 1,
        '31-60': 1,
        '61+': 0,
        Unknown: 0,
      });
    });

    it('builds filter options from every failed bill, not the filtered set', async () => {
      const deps = makeDeps();

      const list = await listFailedBills(deps, { searchText: 'clinic' });

      expect(list.total).toBe(1);
      expect(list.groups).toBeUndefined();
      expect(list.filterOptions.providers).toEqual([
        'North Clinic',
        'Unknown Provider',
        'Valley Imaging',
      ]);
    });
  });

  describe('getFilterOptions', () => {
    it('describes each kind, including unrecognized ones', async () => {
      const options = await getFilterOptions(makeDeps());

      expect(options.kinds).toEqual([
        {
          kind: 'PAYER_HOLD',
          label: 'PAYER_HOLD',
          color: '#6c757d',
          icon: 'fa-exclamation-triangle',
          known: false,
        },
        {
          kind: 'RATE_MISSING',
          label: 'Missing Rate',
          color: '#dc3545',
          icon: 'fa-dollar-sign',
          known: true,
        },
        {
          kind: 'UNMATCHED_CPT',
          label: 'Unmatched CPT',
          color: '#fd7e14',
          icon: 'fa-code',
          known: true,
        },
      ]);
      expect(options.ageBuckets.map((b) => b.bucket)).toEqual(['0-30', '31-60', '61+']);
    });
  });

  describe('getFailedBillDetail', () => {
    it('lists the categories covering each failing code', async () => {
      const detail = await getFailedBillDetail(makeDeps(), 'mri-001.json');

      expect(detail.codeCategories).toEqual({
        '70551': ['mri_wo', 'mri_all'],
        '99213': [],
      });
    });

    it('throws NotFoundError for a missing or resolved bill', async () => {
      const deps = makeDeps({
        billRepo: {
          upsertFailed: vi.fn(),
          listFailed: vi.fn(),
          findFailedByFilename: vi.fn().mockResolvedValue(null),
        },
      });

      await expect(getFailedBillDetail(deps, 'gone.json')).rejects.toBeInstanceOf(
        NotFoundError,
      );
      expect(deps.categoryRepo.getCategoryMap).not.toHaveBeenCalled();
    });
  });
});
