// ============================================================================
// Audit — Constants
// ============================================================================

export const AuditCategory = {
  TRIAGE: 'triage',
  RATES: 'rates',
} as const;

export type AuditCategory = (typeof AuditCategory)[keyof typeof AuditCategory];

export const AuditResourceType = {
  FAILED_BILL: 'failed_bill',
} as const;

export type AuditResourceType =
  (typeof AuditResourceType)[keyof typeof AuditResourceType];
