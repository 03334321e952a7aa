// ============================================================================
// Failed Bills — Query Engine
// Filter options, filtering, grouping and stats over an immutable collection
// of parsed bills. Stateless: criteria and the clock are supplied per call.
// ============================================================================

import {
  AGE_BUCKETS,
  AGE_BUCKET_CONFIGS,
  GroupDimension,
  GroupingPolicy,
  MS_PER_DAY,
  UNKNOWN_GROUP,
  UNKNOWN_PROVIDER,
  type AgeBucket,
} from '@ratedesk/shared/constants/failed-bill.constants.js';
import type { FailedBill } from './failed-bill.model.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface FilterCriteria {
  kind?: string;
  provider?: string;
  ageBucket?: AgeBucket;
  searchText?: string;
}

export interface AggregateStats {
  byKind: Record<string, number>;
  byProvider: Record<string, number>;
  byAgeBucket: Record<string, number>;
}

/** Grouping policy applied by the kind dimension. */
export const KIND_GROUPING_POLICY = GroupingPolicy.GROUP_BY_FIRST_REASON;

// ---------------------------------------------------------------------------
// Derived fields
// ---------------------------------------------------------------------------

export function providerName(bill: FailedBill): string {
  return bill.provider ?? UNKNOWN_PROVIDER;
}

/** Whole days from the earliest service date to `now`; undefined without a date. */
export function computeAgeDays(bill: FailedBill, now: Date): number | undefined {
  if (!bill.earliestServiceDate) return undefined;
  return Math.floor(
    (now.getTime() - bill.earliestServiceDate.getTime()) / MS_PER_DAY,
  );
}

export function ageBucketFor(ageDays: number | undefined): AgeBucket | undefined {
  if (ageDays === undefined) return undefined;
  return AGE_BUCKETS.find((bucket) => {
    const { minDays, maxDays } = AGE_BUCKET_CONFIGS[bucket];
    return (
      (minDays === null || ageDays >= minDays) &&
      (maxDays === null || ageDays <= maxDays)
    );
  });
}

/**
 * GroupByFirstReason: a bill is grouped under the kind of its first failure
 * reason only, even when later reasons name other kinds.
 */
export function kindGroupKey(bill: FailedBill): string {
  return bill.failureReasons[0]?.kind ?? UNKNOWN_GROUP;
}

function groupKeyFor(
  bill: FailedBill,
  dimension: GroupDimension,
  now: Date,
): string {
  switch (dimension) {
    case GroupDimension.KIND:
      return kindGroupKey(bill);
    case GroupDimension.PROVIDER:
      return providerName(bill);
    case GroupDimension.AGE_BUCKET:
      return ageBucketFor(computeAgeDays(bill, now)) ?? UNKNOWN_GROUP;
  }
}

// ---------------------------------------------------------------------------
// Filter options
// ---------------------------------------------------------------------------

export function distinctFailureKinds(bills: readonly FailedBill[]): string[] {
  const kinds = new Set<string>();
  for (const bill of bills) {
    for (const reason of bill.failureReasons) {
      kinds.add(reason.kind);
    }
  }
  return [...kinds].sort();
}

export function distinctProviders(bills: readonly FailedBill[]): string[] {
  return [...new Set(bills.map(providerName))].sort();
}

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

/**
 * Conjunctive, order-preserving filter. Absent or empty criteria match
 * everything. `kind` matches when any reason's text starts with it.
 */
export function filterBills(
  bills: readonly FailedBill[],
  criteria: FilterCriteria,
  now: Date,
): FailedBill[] {
  const { kind, provider, ageBucket } = criteria;
  const search = criteria.searchText?.trim().toLowerCase();

  return bills.filter((bill) => {
    if (
      kind &&
      !bill.failureReasons.some((reason) => reason.raw.trimStart().startsWith(kind))
    ) {
      return false;
    }
    if (provider && providerName(bill) !== provider) {
      return false;
    }
    if (ageBucket && ageBucketFor(computeAgeDays(bill, now)) !== ageBucket) {
      return false;
    }
    if (search && !bill.filename.toLowerCase().includes(search)) {
      return false;
    }
    return true;
  });
}

// ---------------------------------------------------------------------------
// Grouping & stats
// ---------------------------------------------------------------------------

/** Partitions `bills`; groups appear in order of first appearance. */
export function groupBills(
  bills: readonly FailedBill[],
  dimension: GroupDimension,
  now: Date,
): Map<string, FailedBill[]> {
  const groups = new Map<string, FailedBill[]>();
  for (const bill of bills) {
    const key = groupKeyFor(bill, dimension, now);
    const group = groups.get(key);
    if (group) {
      group.push(bill);
    } else {
      groups.set(key, [bill]);
    }
  }
  return groups;
}

export function aggregateStats(
  bills: readonly FailedBill[],
  now: Date,
): AggregateStats {
  const byKind = new Map<string, number>();
  const byProvider = new Map<string, number>();
  const byAgeBucket = new Map<string, number>(
    [...AGE_BUCKETS, UNKNOWN_GROUP].map((key): [string, number] => [key, 0]),
  );

  const increment = (counts: Map<string, number>, key: string) => {
    counts.set(key, (counts.get(key) ?? 0) + 1);
  };

  for (const bill of bills) {
    increment(byKind, groupKeyFor(bill, GroupDimension.KIND, now));
    increment(byProvider, groupKeyFor(bill, GroupDimension.PROVIDER, now));
    increment(byAgeBucket, groupKeyFor(bill, GroupDimension.AGE_BUCKET, now));
  }

  return {
    byKind: Object.fromEntries(byKind),
    byProvider: Object.fromEntries(byProvider),
    byAgeBucket: Object.fromEntries(byAgeBucket),
  };
}
