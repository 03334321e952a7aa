// ============================================================================
// Rate Assignment — Applier
// ============================================================================

import {
  CATEGORY_SUMMARY_HEADING,
  RateAssignmentErrorCode,
  RateAssignmentMode,
  RateAssignmentRule,
} from '@ratedesk/shared/constants/rate-assignment.constants.js';
import type {
  AssignmentResult,
  CategoryMap,
  CategorySummary,
  NormalizedRateAssignment,
  UpdatedRate,
} from '@ratedesk/shared/schemas/rate-assignment.schema.js';
import { RateAssignmentError } from '../../lib/errors.js';
import type { FailedBill } from '../failed-bill/failed-bill.model.js';
import { indexCategoryMap } from './rate-assignment.validator.js';

function applyFailed(
  rule: RateAssignmentRule,
  message: string,
  field: string,
  value?: unknown,
): never {
  throw new RateAssignmentError(RateAssignmentErrorCode.APPLY_FAILED, message, {
    rule,
    field,
    value,
  });
}

/** Updates keyed by (procedureCode, modifier); a later write replaces the rate in place. */
class RateUpdates {
  private readonly updates = new Map<string, UpdatedRate>();

  set(
    procedureCode: string,
    rate: number,
    modifier: string | null,
    source: { rule: RateAssignmentRule; field: string },
  ) {
    if (procedureCode === '' || !Number.isFinite(rate) || rate <= 0) {
      applyFailed(
        source.rule,
        `Cannot apply rate ${rate} to procedure code '${procedureCode}'`,
        source.field,
        rate,
      );
    }
    this.updates.set(`${procedureCode}\u0000${modifier ?? ''}`, {
      procedureCode,
      rate,
      modifier,
    });
  }

  toArray(): UpdatedRate[] {
    return [...this.updates.values()];
  }
}

/**
 * Applies a validated request to the bill. All-or-nothing: any inconsistency
 * throws APPLY_FAILED before a result exists.
 *
 * Category mode only touches codes that are both in the category and failing
 * on the bill, in bill order. The per-category count is kept verbatim,
 * zero included.
 */
export function applyRateAssignment(
  request: NormalizedRateAssignment,
  bill: FailedBill,
  categoryMap: CategoryMap,
  appliedAt: Date,
): AssignmentResult {
  const updates = new RateUpdates();

  if (request.mode === RateAssignmentMode.INDIVIDUAL) {
    request.rates.forEach((entry, index) => {
      updates.set(entry.procedureCode, entry.rate, entry.modifier, {
        rule: RateAssignmentRule.INDIVIDUAL_ENTRY,
        field: `rates[${index}]`,
      });
    });

    const updatedRates = updates.toArray();
    return {
      mode: request.mode,
      updatedRates,
      unresolvedCodes: unresolvedCodes(bill, updatedRates),
      appliedAt: appliedAt.toISOString(),
    };
  }

  const index = indexCategoryMap(categoryMap);
  const categorySummary: CategorySummary = {};
  for (const { category, rate } of request.categoryRates) {
    const categoryCodes = index.get(category);
    if (!categoryCodes) {
      return applyFailed(
        RateAssignmentRule.CATEGORY_RESOLVABLE,
        `Unknown category: ${category}`,
        `categoryRates.${category}`,
        category,
      );
    }
    const matched = bill.failingCodes.filter((code) => categoryCodes.includes(code));
    for (const code of matched) {
      updates.set(code, rate, null, {
        rule: RateAssignmentRule.CATEGORY_ENTRY,
        field: `categoryRates.${category}`,
      });
    }
    categorySummary[category] = matched.length;
  }

  const updatedRates = updates.toArray();
  return {
    mode: request.mode,
    updatedRates,
    categorySummary,
    unresolvedCodes: unresolvedCodes(bill, updatedRates),
    appliedAt: appliedAt.toISOString(),
  };
}

/** Failing codes on the bill that received no rate under any modifier. */
export function unresolvedCodes(
  bill: FailedBill,
  updatedRates: readonly UpdatedRate[],
): string[] {
  const rated = new Set(updatedRates.map((u) => u.procedureCode));
  return bill.failingCodes.filter((code) => !rated.has(code));
}

// ---------------------------------------------------------------------------
// Summary presentation
// ---------------------------------------------------------------------------

/** Operator-facing summary: zero-count categories are dropped. */
export function visibleCategorySummary(summary: CategorySummary): CategorySummary {
  return Object.fromEntries(
    Object.entries(summary).filter(([, count]) => count > 0),
  );
}

export function formatCategorySummary(summary: CategorySummary): string {
  const lines = Object.entries(visibleCategorySummary(summary)).map(
    ([category, count]) => `- ${category}: ${count} CPT codes updated`,
  );
  return lines.length === 0 ? '' : [CATEGORY_SUMMARY_HEADING, ...lines].join('\n');
}
