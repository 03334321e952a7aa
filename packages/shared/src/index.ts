export * from './constants/index.js';

export {
  rawServiceLineSchema,
  rawFailedBillSchema,
  failedBillListQuerySchema,
  failedBillFilenameParamSchema,
} from './schemas/failed-bill.schema.js';
export type {
  RawServiceLine,
  RawFailedBill,
  FailedBillListQuery,
  FailedBillFilenameParam,
} from './schemas/failed-bill.schema.js';

export {
  individualRateEntrySchema,
  rateAssignmentRequestSchema,
} from './schemas/rate-assignment.schema.js';
export type {
  IndividualRateEntry,
  RateAssignmentRequest,
  IndividualRate,
  CategoryRate,
  NormalizedRateAssignment,
  CategoryMap,
  CategorySummary,
  UpdatedRate,
  AssignmentResult,
} from './schemas/rate-assignment.schema.js';

export { isFailureKind, describeFailureKind } from './utils/failure-kind.utils.js';
export type { FailureKindDisplay } from './utils/failure-kind.utils.js';
