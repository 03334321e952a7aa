import {
  RATE_ASSIGNMENT_SUCCESS_MESSAGE,
  RateAssignmentAuditAction,
} from '@ratedesk/shared/constants/rate-assignment.constants.js';
import {
  AuditCategory,
  AuditResourceType,
} from '@ratedesk/shared/constants/audit.constants.js';
import type {
  AssignmentResult,
  CategorySummary,
} from '@ratedesk/shared/schemas/rate-assignment.schema.js';
import type { SelectRateAssignment } from '@ratedesk/shared/schemas/db/rate-assignment.schema.js';
import { NotFoundError, RateAssignmentError } from '../../lib/errors.js';
import type { AuditRepo } from '../audit/audit.repository.js';
import type { FailedBillRepository } from '../failed-bill/failed-bill.repository.js';
import { parseFailedBill } from '../failed-bill/failed-bill.model.js';
import type {
  RateAssignmentRepository,
  RateCategoryRepository,
} from './rate-assignment.repository.js';
import { validateRateAssignment } from './rate-assignment.validator.js';
import {
  applyRateAssignment,
  formatCategorySummary,
  visibleCategorySummary,
} from './rate-assignment.applier.js';

// ---------------------------------------------------------------------------
// Dependency interfaces (injected by handler / test)
// ---------------------------------------------------------------------------

export interface RateAssignmentServiceDeps {
  billRepo: Pick<FailedBillRepository, 'findFailedByFilename'>;
  categoryRepo: Pick<RateCategoryRepository, 'getCategoryMap'>;
  assignmentRepo: Pick<RateAssignmentRepository, 'recordAssignment' | 'findLatestByFilename'>;
  auditRepo: AuditRepo;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface AssignRatesOutcome {
  assignmentId: string;
  filename: string;
  result: AssignmentResult;
  /** Category summary without zero-count lines; undefined in individual mode. */
  visibleSummary?: CategorySummary;
  message: string;
  warnings: string[];
}

export interface RateCategory {
  category: string;
  procedureCodes: string[];
}

// ---------------------------------------------------------------------------
// Service functions
// ---------------------------------------------------------------------------

/**
 * Validate, apply and persist a rate assignment for one failed bill.
 *
 * - NotFoundError when the bill is missing or no longer FAILED.
 * - RateAssignmentError on rejection (audit: rate_assignment.rejected).
 * - ConflictError from the repository when another assignment won the race.
 *
 * On success the bill is RESOLVED; the repository writes the
 * rate_assignment.applied audit entry in the same transaction.
 */
export async function assignRates(
  deps: RateAssignmentServiceDeps,
  filename: string,
  body: unknown,
): Promise<AssignRatesOutcome> {
  const row = await deps.billRepo.findFailedByFilename(filename);
  if (!row) {
    throw new NotFoundError('Failed bill');
  }

  const bill = parseFailedBill(row.payload);
  const categoryMap = await deps.categoryRepo.getCategoryMap();

  let validated: ReturnType<typeof validateRateAssignment>;
  let result: AssignmentResult;
  try {
    validated = validateRateAssignment(body, bill, categoryMap);
    result = applyRateAssignment(
      validated.request,
      bill,
      categoryMap,
      deps.now ? deps.now() : new Date(),
    );
  } catch (err) {
    if (err instanceof RateAssignmentError) {
      await deps.auditRepo.appendAuditLog({
        action: RateAssignmentAuditAction.REJECTED,
        category: AuditCategory.RATES,
        resourceType: AuditResourceType.FAILED_BILL,
        resourceId: filename,
        detail: {
          code: err.code,
          rule: err.details.rule,
          field: err.details.field ?? null,
        },
      });
    }
    throw err;
  }

  const record = await deps.assignmentRepo.recordAssignment({
    filename,
    request: validated.submitted,
    result,
  });

  const summaryText = result.categorySummary
    ? formatCategorySummary(result.categorySummary)
    : '';

  return {
    assignmentId: record.assignmentId,
    filename,
    result,
    visibleSummary: result.categorySummary
      ? visibleCategorySummary(result.categorySummary)
      : undefined,
    message: summaryText
      ? `${RATE_ASSIGNMENT_SUCCESS_MESSAGE}\n\n${summaryText}`
      : RATE_ASSIGNMENT_SUCCESS_MESSAGE,
    warnings: validated.warnings,
  };
}

export async function getLatestAssignment(
  deps: RateAssignmentServiceDeps,
  filename: string,
): Promise<SelectRateAssignment> {
  const record = await deps.assignmentRepo.findLatestByFilename(filename);
  if (!record) {
    throw new NotFoundError('Rate assignment');
  }
  return record;
}

export async function listRateCategories(
  deps: Pick<RateAssignmentServiceDeps, 'categoryRepo'>,
): Promise<RateCategory[]> {
  const categoryMap = await deps.categoryRepo.getCategoryMap();
  return Object.keys(categoryMap)
    .sort()
    .map((category) => ({
      category,
      procedureCodes: [...categoryMap[category]],
    }));
}
