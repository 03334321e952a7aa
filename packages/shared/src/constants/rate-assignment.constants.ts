// ============================================================================
// Rate Assignment — Constants
// ============================================================================

// --- Submission Modes ---

export const RateAssignmentMode = {
  INDIVIDUAL: 'individual',
  CATEGORY: 'category',
} as const;

export type RateAssignmentMode =
  (typeof RateAssignmentMode)[keyof typeof RateAssignmentMode];

// --- Error Taxonomy ---

export const RateAssignmentErrorCode = {
  MALFORMED_REQUEST: 'MALFORMED_REQUEST',
  INVALID_RATE: 'INVALID_RATE',
  EMPTY_SUBMISSION: 'EMPTY_SUBMISSION',
  APPLY_FAILED: 'APPLY_FAILED',
} as const;

export type RateAssignmentErrorCode =
  (typeof RateAssignmentErrorCode)[keyof typeof RateAssignmentErrorCode];

export const RATE_ASSIGNMENT_ERROR_STATUS: Readonly<
  Record<RateAssignmentErrorCode, number>
> = Object.freeze({
  [RateAssignmentErrorCode.MALFORMED_REQUEST]: 400,
  [RateAssignmentErrorCode.INVALID_RATE]: 400,
  [RateAssignmentErrorCode.EMPTY_SUBMISSION]: 400,
  [RateAssignmentErrorCode.APPLY_FAILED]: 422,
});

// --- Validation Rules (named in error details) ---

export const RateAssignmentRule = {
  MODE_EXCLUSIVE: 'MODE_EXCLUSIVE',
  INDIVIDUAL_ENTRY: 'INDIVIDUAL_ENTRY',
  CATEGORY_ENTRY: 'CATEGORY_ENTRY',
  NON_EMPTY: 'NON_EMPTY',
  CATEGORY_RESOLVABLE: 'CATEGORY_RESOLVABLE',
} as const;

export type RateAssignmentRule =
  (typeof RateAssignmentRule)[keyof typeof RateAssignmentRule];

// --- Operator Messages ---

export const RATE_ASSIGNMENT_SUCCESS_MESSAGE = 'Rates assigned successfully';
export const CATEGORY_SUMMARY_HEADING = 'Category Update Summary:';

// --- Route-level Limits ---

/** Assignment submissions per minute per client. */
export const ASSIGNMENT_RATE_LIMIT_PER_MINUTE = 30;

// --- Audit Action Identifiers ---

export const RateAssignmentAuditAction = {
  APPLIED: 'rate_assignment.applied',
  REJECTED: 'rate_assignment.rejected',
} as const;

export type RateAssignmentAuditAction =
  (typeof RateAssignmentAuditAction)[keyof typeof RateAssignmentAuditAction];
