// Barrel export for Drizzle DB schemas
export { failedBills } from './failed-bill.schema.js';
export type {
  InsertFailedBill,
  SelectFailedBill,
} from './failed-bill.schema.js';

export {
  procedureCategories,
  rateAssignments,
} from './rate-assignment.schema.js';
export type {
  InsertProcedureCategory,
  SelectProcedureCategory,
  InsertRateAssignment,
  SelectRateAssignment,
} from './rate-assignment.schema.js';

export { auditLog } from './audit.schema.js';
export type { InsertAuditLog, SelectAuditLog } from './audit.schema.js';
