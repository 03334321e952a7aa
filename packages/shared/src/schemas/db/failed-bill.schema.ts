// ============================================================================
// Failed Bills — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  varchar,
  jsonb,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';
import type { RawFailedBill } from '../failed-bill.schema.js';

// --- Failed Bills Table ---
// One row per upstream bill file. The raw payload is kept verbatim; parsing
// into the triage model happens on read so new failure kinds need no migration.
// A successful rate assignment flips status to RESOLVED; re-ingesting the same
// filename reopens it.

export const failedBills = pgTable(
  'failed_bills',
  {
    filename: varchar('filename', { length: 255 }).primaryKey(),
    provider: varchar('provider', { length: 200 }),
    payload: jsonb('payload').$type<RawFailedBill>().notNull(),
    status: varchar('status', { length: 20 }).notNull().default('FAILED'),
    ingestedAt: timestamp('ingested_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    resolvedAt: timestamp('resolved_at', { withTimezone: true }),
  },
  (table) => [
    // Triage queue listing (oldest first)
    index('failed_bills_status_ingested_idx').on(table.status, table.ingestedAt),
  ],
);

// --- Inferred Types ---

export type InsertFailedBill = typeof failedBills.$inferInsert;
export type SelectFailedBill = typeof failedBills.$inferSelect;
