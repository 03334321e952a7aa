import {
  AGE_BUCKETS,
  AGE_BUCKET_CONFIGS,
  FailedBillAuditAction,
  type AgeBucket,
  type GroupDimension,
} from '@ratedesk/shared/constants/failed-bill.constants.js';
import {
  AuditCategory,
  AuditResourceType,
} from '@ratedesk/shared/constants/audit.constants.js';
import type { RawFailedBill } from '@ratedesk/shared/schemas/failed-bill.schema.js';
import {
  describeFailureKind,
  type FailureKindDisplay,
} from '@ratedesk/shared/utils/failure-kind.utils.js';
import { NotFoundError } from '../../lib/errors.js';
import type { AuditRepo } from '../audit/audit.repository.js';
import type { RateCategoryRepository } from '../rate-assignment/rate-assignment.repository.js';
import type { FailedBillRepository } from './failed-bill.repository.js';
import { parseFailedBill, type FailedBill } from './failed-bill.model.js';
import {
  aggregateStats,
  ageBucketFor,
  computeAgeDays,
  distinctFailureKinds,
  distinctProviders,
  filterBills,
  groupBills,
  type AggregateStats,
  type FilterCriteria,
} from './failed-bill.query.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface FailedBillServiceDeps {
  billRepo: Pick<FailedBillRepository, 'upsertFailed' | 'listFailed' | 'findFailedByFilename'>;
  categoryRepo: Pick<RateCategoryRepository, 'getCategoryMap'>;
  auditRepo: AuditRepo;
  /** Clock for age derivation; defaults to the wall clock. */
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface TriageEntry {
  bill: FailedBill;
  ageDays: number | undefined;
  ageBucket: AgeBucket | undefined;
}

export interface BillGroup {
  key: string;
  filenames: string[];
}

export interface FilterOptions {
  kinds: FailureKindDisplay[];
  providers: string[];
  ageBuckets: Array<{ bucket: AgeBucket; label: string }>;
}

export interface FailedBillList {
  bills: TriageEntry[];
  total: number;
  groups?: BillGroup[];
  stats: AggregateStats;
  filterOptions: FilterOptions;
}

export interface FailedBillDetail extends TriageEntry {
  /** Failing code → categories covering it (empty when none). */
  codeCategories: Record<string, string[]>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function clock(deps: FailedBillServiceDeps): Date {
  return deps.now ? deps.now() : new Date();
}

function toTriageEntry(bill: FailedBill, now: Date): TriageEntry {
  const ageDays = computeAgeDays(bill, now);
  return { bill, ageDays, ageBucket: ageBucketFor(ageDays) };
}

function buildFilterOptions(bills: readonly FailedBill[]): FilterOptions {
  return {
    kinds: distinctFailureKinds(bills).map(describeFailureKind),
    providers: distinctProviders(bills),
    ageBuckets: AGE_BUCKETS.map((bucket) => ({
      bucket,
      label: AGE_BUCKET_CONFIGS[bucket].label,
    })),
  };
}

async function loadFailedBills(deps: FailedBillServiceDeps): Promise<FailedBill[]> {
  const rows = await deps.billRepo.listFailed();
  return rows.map((row) => parseFailedBill(row.payload));
}

// ---------------------------------------------------------------------------
// Service functions
// ---------------------------------------------------------------------------

/**
 * Store an upstream failed bill (upsert by filename) and return its triage
 * view. Audit log: failed_bill.ingested.
 */
export async function ingestFailedBill(
  deps: FailedBillServiceDeps,
  payload: RawFailedBill,
): Promise<TriageEntry> {
  const row = await deps.billRepo.upsertFailed(payload);
  const bill = parseFailedBill(row.payload);

  await deps.auditRepo.appendAuditLog({
    action: FailedBillAuditAction.INGESTED,
    category: AuditCategory.TRIAGE,
    resourceType: AuditResourceType.FAILED_BILL,
    resourceId: bill.filename,
    detail: {
      failureKinds: bill.failureReasons.map((r) => r.kind),
      failingCodes: bill.failingCodes,
    },
  });

  return toTriageEntry(bill, clock(deps));
}

/**
 * Filtered triage view. Stats cover the filtered set; filter options always
 * cover every failed bill so choices don't disappear as filters narrow.
 */
export async function listFailedBills(
  deps: FailedBillServiceDeps,
  criteria: FilterCriteria,
  groupBy?: GroupDimension,
): Promise<FailedBillList> {
  const now = clock(deps);
  const all = await loadFailedBills(deps);
  const filtered = filterBills(all, criteria, now);

  const result: FailedBillList = {
    bills: filtered.map((bill) => toTriageEntry(bill, now)),
    total: filtered.length,
    stats: aggregateStats(filtered, now),
    filterOptions: buildFilterOptions(all),
  };

  if (groupBy) {
    result.groups = [...groupBills(filtered, groupBy, now)].map(([key, bills]) => ({
      key,
      filenames: bills.map((b) => b.filename),
    }));
  }

  return result;
}

export async function getFilterOptions(
  deps: FailedBillServiceDeps,
): Promise<FilterOptions> {
  return buildFilterOptions(await loadFailedBills(deps));
}

/**
 * Single failed bill with the categories covering each failing code.
 * Throws NotFoundError when the bill is missing or already resolved.
 */
export async function getFailedBillDetail(
  deps: FailedBillServiceDeps,
  filename: string,
): Promise<FailedBillDetail> {
  const row = await deps.billRepo.findFailedByFilename(filename);
  if (!row) {
    throw new NotFoundError('Failed bill');
  }

  const bill = parseFailedBill(row.payload);
  const categoryMap = await deps.categoryRepo.getCategoryMap();

  const codeCategories: Record<string, string[]> = {};
  for (const code of bill.failingCodes) {
    codeCategories[code] = Object.keys(categoryMap).filter((category) =>
      categoryMap[category].includes(code),
    );
  }

  return { ...toTriageEntry(bill, clock(deps)), codeCategories };
}
