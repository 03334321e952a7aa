import { eq, and, asc, desc } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  procedureCategories,
  rateAssignments,
  type SelectRateAssignment,
} from '@ratedesk/shared/schemas/db/rate-assignment.schema.js';
import { failedBills } from '@ratedesk/shared/schemas/db/failed-bill.schema.js';
import { auditLog } from '@ratedesk/shared/schemas/db/audit.schema.js';
import { FailedBillStatus } from '@ratedesk/shared/constants/failed-bill.constants.js';
import { RateAssignmentAuditAction } from '@ratedesk/shared/constants/rate-assignment.constants.js';
import {
  AuditCategory,
  AuditResourceType,
} from '@ratedesk/shared/constants/audit.constants.js';
import type {
  AssignmentResult,
  CategoryMap,
  RateAssignmentRequest,
} from '@ratedesk/shared/schemas/rate-assignment.schema.js';
import { ConflictError } from '../../lib/errors.js';
import { normalizeCategoryKey } from './rate-assignment.validator.js';

// ---------------------------------------------------------------------------
// Category map
// ---------------------------------------------------------------------------

/**
 * Folds (category, procedureCode) rows into a CategoryMap. Keys are
 * lower-cased; codes are trimmed and de-duplicated in row order.
 */
export function buildCategoryMap(
  rows: ReadonlyArray<{ category: string; procedureCode: string }>,
): CategoryMap {
  const map: Record<string, string[]> = {};
  for (const row of rows) {
    const category = normalizeCategoryKey(row.category);
    const code = row.procedureCode.trim();
    if (category === '' || code === '') continue;
    const codes = Object.prototype.hasOwnProperty.call(map, category)
      ? map[category]
      : (map[category] = []);
    if (!codes.includes(code)) codes.push(code);
  }
  return Object.freeze(map);
}

export function createRateCategoryRepository(db: NodePgDatabase) {
  return {
    async getCategoryMap(): Promise<CategoryMap> {
      const rows = await db
        .select({
          category: procedureCategories.category,
          procedureCode: procedureCategories.procedureCode,
        })
        .from(procedureCategories)
        .orderBy(asc(procedureCategories.category), asc(procedureCategories.procedureCode));
      return buildCategoryMap(rows);
    },
  };
}

export type RateCategoryRepository = ReturnType<typeof createRateCategoryRepository>;

// ---------------------------------------------------------------------------
// Rate assignments
// ---------------------------------------------------------------------------

export interface RecordAssignmentInput {
  filename: string;
  request: RateAssignmentRequest;
  result: AssignmentResult;
}

export function createRateAssignmentRepository(db: NodePgDatabase) {
  return {
    /**
     * Resolve the bill, store the assignment and append the
     * rate_assignment.applied audit entry in one transaction. The status guard
     * makes a second assignment for the same filename lose with ConflictError;
     * a failed audit insert rolls the bill back to FAILED.
     */
    async recordAssignment(input: RecordAssignmentInput): Promise<SelectRateAssignment> {
      const appliedAt = new Date(input.result.appliedAt);

      return db.transaction(async (tx) => {
        const resolved = await tx
          .update(failedBills)
          .set({ status: FailedBillStatus.RESOLVED, resolvedAt: appliedAt })
          .where(
            and(
              eq(failedBills.filename, input.filename),
              eq(failedBills.status, FailedBillStatus.FAILED),
            ),
          )
          .returning({ filename: failedBills.filename });

        if (resolved.length === 0) {
          throw new ConflictError(
            `Rates have already been assigned for ${input.filename}`,
          );
        }

        const rows = await tx
          .insert(rateAssignments)
          .values({
            filename: input.filename,
            mode: input.result.mode,
            request: input.request,
            updatedRates: input.result.updatedRates,
            categorySummary: input.result.categorySummary ?? null,
            unresolvedCodes: input.result.unresolvedCodes,
            appliedAt,
          })
          .returning();
        const record = rows[0];

        await tx.insert(auditLog).values({
          action: RateAssignmentAuditAction.APPLIED,
          category: AuditCategory.RATES,
          resourceType: AuditResourceType.FAILED_BILL,
          resourceId: input.filename,
          detail: {
            assignmentId: record.assignmentId,
            mode: input.result.mode,
            updatedCount: input.result.updatedRates.length,
            categorySummary: input.result.categorySummary ?? null,
            unresolvedCodes: input.result.unresolvedCodes,
          },
        });

        return record;
      });
    },

    async findLatestByFilename(filename: string): Promise<SelectRateAssignment | null> {
      const rows = await db
        .select()
        .from(rateAssignments)
        .where(eq(rateAssignments.filename, filename))
        .orderBy(desc(rateAssignments.appliedAt))
        .limit(1);
      return rows[0] ?? null;
    },
  };
}

export type RateAssignmentRepository = ReturnType<typeof createRateAssignmentRepository>;
