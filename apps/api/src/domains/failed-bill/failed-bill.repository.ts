import { eq, and, asc } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  failedBills,
  type SelectFailedBill,
} from '@ratedesk/shared/schemas/db/failed-bill.schema.js';
import { FailedBillStatus } from '@ratedesk/shared/constants/failed-bill.constants.js';
import type { RawFailedBill } from '@ratedesk/shared/schemas/failed-bill.schema.js';

// ---------------------------------------------------------------------------
// Failed Bills Repository
// ---------------------------------------------------------------------------

export function createFailedBillRepository(db: NodePgDatabase) {
  return {
    /**
     * Insert or replace a bill by filename and mark it FAILED.
     * Re-ingesting a RESOLVED bill reopens it.
     */
    async upsertFailed(payload: RawFailedBill): Promise<SelectFailedBill> {
      const provider = payload.provider?.trim() || null;
      const rows = await db
        .insert(failedBills)
        .values({
          filename: payload.filename,
          provider,
          payload,
          status: FailedBillStatus.FAILED,
        })
        .onConflictDoUpdate({
          target: failedBills.filename,
          set: {
            provider,
            payload,
            status: FailedBillStatus.FAILED,
            ingestedAt: new Date(),
            resolvedAt: null,
          },
        })
        .returning();
      return rows[0];
    },

    /**
     * All bills still awaiting resolution, oldest ingestion first.
     */
    async listFailed(): Promise<SelectFailedBill[]> {
      return db
        .select()
        .from(failedBills)
        .where(eq(failedBills.status, FailedBillStatus.FAILED))
        .orderBy(asc(failedBills.ingestedAt), asc(failedBills.filename));
    },

    /**
     * A FAILED bill by filename; null when missing or already resolved.
     */
    async findFailedByFilename(filename: string): Promise<SelectFailedBill | null> {
      const rows = await db
        .select()
        .from(failedBills)
        .where(
          and(
            eq(failedBills.filename, filename),
            eq(failedBills.status, FailedBillStatus.FAILED),
          ),
        )
        .limit(1);
      return rows[0] ?? null;
    },
  };
}

export type FailedBillRepository = ReturnType<typeof createFailedBillRepository>;
