// ============================================================================
// Rate Assignment — Zod Validation Schemas & Result Shapes
// ============================================================================

import { z } from 'zod';
import { type RateAssignmentMode } from '../constants/rate-assignment.constants.js';

// --- Helpers ---

// Rates arrive from form fields as well as JSON numbers; the validator decides
// whether a value is a usable rate, so anything scalar is structurally accepted.
const rateValue = z.union([z.number(), z.string().max(32), z.null()]).optional();

// ============================================================================
// Submission (structural shape only; rule checks live in the validator)
// ============================================================================

export const individualRateEntrySchema = z.object({
  procedureCode: z.string().max(20),
  rate: rateValue,
  modifier: z.string().max(10).nullish(),
});

export type IndividualRateEntry = z.infer<typeof individualRateEntrySchema>;

export const rateAssignmentRequestSchema = z.object({
  mode: z.string().max(20),
  rates: z.array(individualRateEntrySchema).max(500).nullish(),
  categoryRates: z.record(z.string().max(50), rateValue).nullish(),
});

export type RateAssignmentRequest = z.infer<typeof rateAssignmentRequestSchema>;

// ============================================================================
// Normalized Request (validator output, applier input)
// ============================================================================

export interface IndividualRate {
  procedureCode: string;
  rate: number;
  modifier: string | null;
}

export interface CategoryRate {
  category: string;
  rate: number;
}

export type NormalizedRateAssignment =
  | {
      mode: typeof RateAssignmentMode.INDIVIDUAL;
      rates: IndividualRate[];
    }
  | {
      mode: typeof RateAssignmentMode.CATEGORY;
      categoryRates: CategoryRate[];
    };

// ============================================================================
// Category Map & Assignment Result
// ============================================================================

/** category key → procedure codes it covers. Supplied externally; never mutated. */
export type CategoryMap = Readonly<Record<string, readonly string[]>>;

/** category key → number of procedure codes updated under it (zero retained). */
export type CategorySummary = Record<string, number>;

export interface UpdatedRate {
  procedureCode: string;
  rate: number;
  modifier: string | null;
}

export interface AssignmentResult {
  mode: RateAssignmentMode;
  updatedRates: UpdatedRate[];
  categorySummary?: CategorySummary;
  /** Failing codes on the bill that this submission left without a rate. */
  unresolvedCodes: string[];
  /** ISO 8601 timestamp. */
  appliedAt: string;
}
