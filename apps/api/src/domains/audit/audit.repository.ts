import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  auditLog,
  type SelectAuditLog,
} from '@ratedesk/shared/schemas/db/audit.schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AppendAuditLogEntry {
  action: string;
  category: string;
  resourceType?: string | null;
  resourceId?: string | null;
  detail?: Record<string, unknown> | null;
}

/** The slice of the audit repository that services depend on. */
export interface AuditRepo {
  appendAuditLog(entry: AppendAuditLogEntry): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// Audit Log Repository
// ---------------------------------------------------------------------------

export function createAuditLogRepository(db: NodePgDatabase) {
  return {
    /**
     * Append a single audit log entry. This is the ONLY write operation
     * on the audit_log table.
     */
    async appendAuditLog(entry: AppendAuditLogEntry): Promise<SelectAuditLog> {
      const rows = await db
        .insert(auditLog)
        .values({
          action: entry.action,
          category: entry.category,
          resourceType: entry.resourceType ?? undefined,
          resourceId: entry.resourceId ?? undefined,
          detail: entry.detail ?? null,
        })
        .returning();
      return rows[0];
    },
  };
}
