import {
  pgTable,
  varchar,
  text,
  timestamp,
  bigint,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';

// Audit logs table - one row per mutating registry operation
export const auditLogs = pgTable(
  'audit_logs',
  {
    id: varchar('id', { length: 64 }).primaryKey(),
    registry: varchar('registry', { length: 32 }).notNull(),
    operation: varchar('operation', { length: 32 }).notNull(),
    actor: varchar('actor', { length: 128 }).notNull(),
    outcome: varchar('outcome', { length: 16 }).notNull(),
    code: varchar('code', { length: 32 }),
    reason: text('reason'),
    authorityId: varchar('authority_id', { length: 128 }),
    recordId: bigint('record_id', { mode: 'number' }),
    subjectId: varchar('subject_id', { length: 128 }),
    requestId: varchar('request_id', { length: 128 }),
    // Ledger time of the operation
    ledgerTime: bigint('ledger_time', { mode: 'number' }).notNull(),
    metadata: jsonb('metadata').$type<Record<string, unknown>>(),
    createdAt: timestamp('created_at').defaultNow(),
  },
  (table) => [
    index('idx_audit_registry_time').on(table.registry, table.ledgerTime),
    index('idx_audit_actor').on(table.actor),
    index('idx_audit_outcome').on(table.outcome),
    index('idx_audit_record').on(table.registry, table.recordId),
  ],
);

// Export TypeScript types
export type AuditLog = typeof auditLogs.$inferSelect;
export type NewAuditLog = typeof auditLogs.$inferInsert;
