// ============================================================================
// Rate Assignment — Validator
// Gates an operator submission before anything is applied. Rules run in a
// fixed order and the first violation is thrown as a RateAssignmentError.
// ============================================================================

import {
  RateAssignmentErrorCode,
  RateAssignmentMode,
  RateAssignmentRule,
} from '@ratedesk/shared/constants/rate-assignment.constants.js';
import {
  rateAssignmentRequestSchema,
  type CategoryMap,
  type CategoryRate,
  type IndividualRate,
  type IndividualRateEntry,
  type NormalizedRateAssignment,
  type RateAssignmentRequest,
} from '@ratedesk/shared/schemas/rate-assignment.schema.js';
import { RateAssignmentError } from '../../lib/errors.js';
import type { FailedBill } from '../failed-bill/failed-bill.model.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ValidatedRateAssignment {
  /** The submission as received, after structural parsing. */
  submitted: RateAssignmentRequest;
  request: NormalizedRateAssignment;
  /** Non-blocking notices for the operator (e.g. zero-match categories). */
  warnings: string[];
}

type RateValue = IndividualRateEntry['rate'];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NUMERIC_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/** Finite number from a JSON number or numeric string; null otherwise. */
export function parseRate(value: RateValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const text = value.trim();
    return NUMERIC_TEXT.test(text) ? Number(text) : null;
  }
  return null;
}

export function normalizeCategoryKey(key: string): string {
  return key.trim().toLowerCase();
}

/**
 * CategoryMap re-keyed by normalized category. Map keys that normalize to the
 * same category have their codes merged in key order.
 */
export function indexCategoryMap(categoryMap: CategoryMap): Map<string, readonly string[]> {
  const index = new Map<string, string[]>();
  for (const [key, codes] of Object.entries(categoryMap)) {
    const category = normalizeCategoryKey(key);
    const merged = index.get(category) ?? [];
    for (const code of codes) {
      if (!merged.includes(code)) merged.push(code);
    }
    index.set(category, merged);
  }
  return index;
}

function malformed(message: string, field: string, value?: unknown): never {
  throw new RateAssignmentError(RateAssignmentErrorCode.MALFORMED_REQUEST, message, {
    rule: RateAssignmentRule.MODE_EXCLUSIVE,
    field,
    value,
  });
}

// ---------------------------------------------------------------------------
// Mode-specific rules
// ---------------------------------------------------------------------------

function validateIndividualRates(entries: IndividualRateEntry[]): IndividualRate[] {
  if (entries.length === 0) {
    throw new RateAssignmentError(
      RateAssignmentErrorCode.EMPTY_SUBMISSION,
      'No procedure code rates were submitted',
      { rule: RateAssignmentRule.NON_EMPTY, field: 'rates' },
    );
  }

  return entries.map((entry, index) => {
    const procedureCode = entry.procedureCode.trim();
    if (procedureCode === '') {
      throw new RateAssignmentError(
        RateAssignmentErrorCode.INVALID_RATE,
        `Procedure code is required for rate entry ${index + 1}`,
        {
          rule: RateAssignmentRule.INDIVIDUAL_ENTRY,
          field: `rates[${index}].procedureCode`,
          value: entry.procedureCode,
        },
      );
    }

    const rate = parseRate(entry.rate);
    if (rate === null || rate <= 0) {
      throw new RateAssignmentError(
        RateAssignmentErrorCode.INVALID_RATE,
        `Invalid rate value for procedure code ${procedureCode}`,
        {
          rule: RateAssignmentRule.INDIVIDUAL_ENTRY,
          field: `rates[${index}].rate`,
          value: entry.rate ?? null,
          procedureCode,
        },
      );
    }

    const modifier = entry.modifier?.trim();
    return { procedureCode, rate, modifier: modifier ? modifier : null };
  });
}

function validateCategoryRates(
  categoryRates: Record<string, RateValue>,
): CategoryRate[] {
  const entries = Object.entries(categoryRates);
  if (entries.length === 0) {
    throw new RateAssignmentError(
      RateAssignmentErrorCode.EMPTY_SUBMISSION,
      'No categories were selected',
      { rule: RateAssignmentRule.NON_EMPTY, field: 'categoryRates' },
    );
  }

  const seen = new Set<string>();
  return entries.map(([key, value]) => {
    const category = normalizeCategoryKey(key);
    if (category === '') {
      malformed('Category key must not be blank', 'categoryRates', key);
    }
    if (seen.has(category)) {
      malformed(`Category ${category} was submitted more than once`, `categoryRates.${key}`, key);
    }
    seen.add(category);

    const rate = parseRate(value);
    if (rate === null || rate <= 0) {
      throw new RateAssignmentError(
        RateAssignmentErrorCode.INVALID_RATE,
        `Invalid rate value for category ${category}`,
        {
          rule: RateAssignmentRule.CATEGORY_ENTRY,
          field: `categoryRates.${key}`,
          value: value ?? null,
        },
      );
    }
    return { category, rate };
  });
}

function zeroMatchWarnings(
  categoryRates: CategoryRate[],
  bill: FailedBill,
  categoryMap: CategoryMap,
): string[] {
  const index = indexCategoryMap(categoryMap);
  const warnings: string[] = [];
  for (const { category } of categoryRates) {
    const codes = index.get(category);
    if (!codes) continue;
    if (!bill.failingCodes.some((code) => codes.includes(code))) {
      warnings.push(
        `Category ${category} matches none of the failing procedure codes on ${bill.filename}`,
      );
    }
  }
  return warnings;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Validates a raw submission against the target bill.
 *
 * Categories that resolve to zero failing codes are accepted and reported in
 * `warnings`; categories missing from the map are left for the applier.
 *
 * @throws RateAssignmentError MALFORMED_REQUEST, INVALID_RATE or EMPTY_SUBMISSION
 */
export function validateRateAssignment(
  input: unknown,
  bill: FailedBill,
  categoryMap: CategoryMap,
): ValidatedRateAssignment {
  const parsed = rateAssignmentRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    malformed(
      `Malformed rate assignment request: ${issue.message}`,
      issue.path.join('.') || 'body',
    );
  }

  const { mode, rates, categoryRates } = parsed.data;
  const hasRates = rates != null;
  const hasCategoryRates = categoryRates != null;

  if (mode === RateAssignmentMode.INDIVIDUAL && hasRates && !hasCategoryRates) {
    return {
      submitted: parsed.data,
      request: { mode, rates: validateIndividualRates(rates) },
      warnings: [],
    };
  }

  if (mode === RateAssignmentMode.CATEGORY && hasCategoryRates && !hasRates) {
    const normalized = validateCategoryRates(categoryRates);
    return {
      submitted: parsed.data,
      request: { mode, categoryRates: normalized },
      warnings: zeroMatchWarnings(normalized, bill, categoryMap),
    };
  }

  if (mode !== RateAssignmentMode.INDIVIDUAL && mode !== RateAssignmentMode.CATEGORY) {
    malformed(`Unknown rate assignment mode: ${mode}`, 'mode', mode);
  }
  return malformed(
    mode === RateAssignmentMode.INDIVIDUAL
      ? 'Individual mode requires rates and no categoryRates'
      : 'Category mode requires categoryRates and no rates',
    'mode',
    mode,
  );
}
