// ============================================================================
// Failed Bills — Constants
// ============================================================================

// --- Failure Kinds ---

export const FailureKind = {
  RATE_MISSING: 'RATE_MISSING',
  UNMATCHED_CPT: 'UNMATCHED_CPT',
  TOO_MANY_UNITS: 'TOO_MANY_UNITS',
  READ_ERROR: 'READ_ERROR',
} as const;

export type FailureKind = (typeof FailureKind)[keyof typeof FailureKind];

interface FailureKindConfig {
  readonly kind: FailureKind;
  readonly label: string;
  readonly color: string;
  readonly icon: string;
}

// Presentation metadata only. Nothing in triage or rate assignment branches on it.
export const FAILURE_KIND_CONFIGS: Readonly<
  Record<FailureKind, FailureKindConfig>
> = Object.freeze({
  [FailureKind.RATE_MISSING]: {
    kind: FailureKind.RATE_MISSING,
    label: 'Missing Rate',
    color: '#dc3545',
    icon: 'fa-dollar-sign',
  },
  [FailureKind.UNMATCHED_CPT]: {
    kind: FailureKind.UNMATCHED_CPT,
    label: 'Unmatched CPT',
    color: '#fd7e14',
    icon: 'fa-code',
  },
  [FailureKind.TOO_MANY_UNITS]: {
    kind: FailureKind.TOO_MANY_UNITS,
    label: 'Too Many Units',
    color: '#ffc107',
    icon: 'fa-list-ol',
  },
  [FailureKind.READ_ERROR]: {
    kind: FailureKind.READ_ERROR,
    label: 'Read Error',
    color: '#6f42c1',
    icon: 'fa-file-circle-exclamation',
  },
});

/** Rendering for kinds outside the closed set (label falls back to the token). */
export const UNKNOWN_FAILURE_KIND_COLOR = '#6c757d';
export const UNKNOWN_FAILURE_KIND_ICON = 'fa-exclamation-triangle';

// --- Age Buckets ---

export const AgeBucket = {
  DAYS_0_30: '0-30',
  DAYS_31_60: '31-60',
  DAYS_61_PLUS: '61+',
} as const;

export type AgeBucket = (typeof AgeBucket)[keyof typeof AgeBucket];

interface AgeBucketConfig {
  readonly bucket: AgeBucket;
  readonly label: string;
  /** Inclusive; null means unbounded (future service dates land in the first bucket). */
  readonly minDays: number | null;
  /** Inclusive; null means unbounded. */
  readonly maxDays: number | null;
}

export const AGE_BUCKET_CONFIGS: Readonly<Record<AgeBucket, AgeBucketConfig>> =
  Object.freeze({
    [AgeBucket.DAYS_0_30]: {
      bucket: AgeBucket.DAYS_0_30,
      label: '0–30 days',
      minDays: null,
      maxDays: 30,
    },
    [AgeBucket.DAYS_31_60]: {
      bucket: AgeBucket.DAYS_31_60,
      label: '31–60 days',
      minDays: 31,
      maxDays: 60,
    },
    [AgeBucket.DAYS_61_PLUS]: {
      bucket: AgeBucket.DAYS_61_PLUS,
      label: '61+ days',
      minDays: 61,
      maxDays: null,
    },
  });

/** Display order for filters, groups and stats. */
export const AGE_BUCKETS = Object.freeze([
  AgeBucket.DAYS_0_30,
  AgeBucket.DAYS_31_60,
  AgeBucket.DAYS_61_PLUS,
] as const);

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// --- Fallback Buckets ---

export const UNKNOWN_GROUP = 'Unknown';
export const UNKNOWN_PROVIDER = 'Unknown Provider';

// --- Grouping ---

export const GroupDimension = {
  KIND: 'kind',
  PROVIDER: 'provider',
  AGE_BUCKET: 'ageBucket',
} as const;

export type GroupDimension =
  (typeof GroupDimension)[keyof typeof GroupDimension];

/**
 * Kind grouping assigns each bill to the kind of its FIRST failure reason only.
 * A bill failing for several kinds appears once, under the first-listed one.
 */
export const GroupingPolicy = {
  GROUP_BY_FIRST_REASON: 'GroupByFirstReason',
} as const;

export type GroupingPolicy =
  (typeof GroupingPolicy)[keyof typeof GroupingPolicy];

// --- Bill Status ---

export const FailedBillStatus = {
  FAILED: 'FAILED',
  RESOLVED: 'RESOLVED',
} as const;

export type FailedBillStatus =
  (typeof FailedBillStatus)[keyof typeof FailedBillStatus];

// --- Audit Action Identifiers ---

export const FailedBillAuditAction = {
  INGESTED: 'failed_bill.ingested',
} as const;

export type FailedBillAuditAction =
  (typeof FailedBillAuditAction)[keyof typeof FailedBillAuditAction];
