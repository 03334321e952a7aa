// ============================================================================
// Audit Log — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  jsonb,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

// Append-only. Rows are never updated or deleted by the application.

export const auditLog = pgTable(
  'audit_log',
  {
    logId: uuid('log_id').primaryKey().defaultRandom(),
    action: varchar('action', { length: 50 }).notNull(),
    category: varchar('category', { length: 20 }).notNull(),
    resourceType: varchar('resource_type', { length: 50 }),
    resourceId: varchar('resource_id', { length: 255 }),
    detail: jsonb('detail').$type<Record<string, unknown>>(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('audit_log_action_created_at_idx').on(table.action, table.createdAt),
    index('audit_log_resource_type_resource_id_created_at_idx').on(
      table.resourceType,
      table.resourceId,
      table.createdAt,
    ),
  ],
);

export type InsertAuditLog = typeof auditLog.$inferInsert;
export type SelectAuditLog = typeof auditLog.$inferSelect;
