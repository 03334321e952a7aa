// ============================================================================
// Rate Assignment — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  text,
  jsonb,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { failedBills } from './failed-bill.schema.js';
import type {
  CategorySummary,
  RateAssignmentRequest,
  UpdatedRate,
} from '../rate-assignment.schema.js';

// --- Procedure Categories Table ---
// Reference data: which procedure codes belong to which rate category.
// Category keys are matched case-insensitively on read.

export const procedureCategories = pgTable(
  'procedure_categories',
  {
    category: varchar('category', { length: 50 }).notNull(),
    procedureCode: varchar('procedure_code', { length: 20 }).notNull(),
    modifier: varchar('modifier', { length: 10 }).notNull().default(''),
    description: text('description'),
  },
  (table) => [
    uniqueIndex('procedure_categories_category_code_modifier_idx').on(
      table.category,
      table.procedureCode,
      table.modifier,
    ),
    index('procedure_categories_code_idx').on(table.procedureCode),
  ],
);

// --- Rate Assignments Table ---
// Append-only record of every applied assignment. The original submission is
// kept alongside the normalized result for audit replay.

export const rateAssignments = pgTable(
  'rate_assignments',
  {
    assignmentId: uuid('assignment_id').primaryKey().defaultRandom(),
    filename: varchar('filename', { length: 255 })
      .notNull()
      .references(() => failedBills.filename),
    mode: varchar('mode', { length: 20 }).notNull(),
    request: jsonb('request').$type<RateAssignmentRequest>().notNull(),
    updatedRates: jsonb('updated_rates').$type<UpdatedRate[]>().notNull(),
    categorySummary: jsonb('category_summary').$type<CategorySummary>(),
    unresolvedCodes: jsonb('unresolved_codes').$type<string[]>().notNull(),
    appliedAt: timestamp('applied_at', { withTimezone: true }).notNull(),
  },
  (table) => [
    index('rate_assignments_filename_applied_idx').on(
      table.filename,
      table.appliedAt,
    ),
  ],
);

// --- Inferred Types ---

export type InsertProcedureCategory = typeof procedureCategories.$inferInsert;
export type SelectProcedureCategory = typeof procedureCategories.$inferSelect;

export type InsertRateAssignment = typeof rateAssignments.$inferInsert;
export type SelectRateAssignment = typeof rateAssignments.$inferSelect;
