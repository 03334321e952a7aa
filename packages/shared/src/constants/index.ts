export {
  FailureKind,
  FAILURE_KIND_CONFIGS,
  UNKNOWN_FAILURE_KIND_COLOR,
  UNKNOWN_FAILURE_KIND_ICON,
  AgeBucket,
  AGE_BUCKET_CONFIGS,
  AGE_BUCKETS,
  MS_PER_DAY,
  UNKNOWN_GROUP,
  UNKNOWN_PROVIDER,
  GroupDimension,
  GroupingPolicy,
  FailedBillStatus,
  FailedBillAuditAction,
} from './failed-bill.constants.js';

export {
  RateAssignmentMode,
  RateAssignmentErrorCode,
  RATE_ASSIGNMENT_ERROR_STATUS,
  RateAssignmentRule,
  RATE_ASSIGNMENT_SUCCESS_MESSAGE,
  CATEGORY_SUMMARY_HEADING,
  ASSIGNMENT_RATE_LIMIT_PER_MINUTE,
  RateAssignmentAuditAction,
} from './rate-assignment.constants.js';

export { AuditCategory, AuditResourceType } from './audit.constants.js';
