import {
  pgTable,
  varchar,
  text,
  bigint,
  jsonb,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

// Records table - qualifications, privileges and panel memberships
export const records = pgTable(
  'records',
  {
    registry: varchar('registry', { length: 32 }).notNull(),
    recordId: bigint('record_id', { mode: 'number' }).notNull(),
    subjectId: varchar('subject_id', { length: 128 }).notNull(),
    authorityId: varchar('authority_id', { length: 128 }).notNull(),
    payload: jsonb('payload').$type<unknown>().notNull(),
    createdAt: bigint('created_at', { mode: 'number' }).notNull(),
    expiresAt: bigint('expires_at', { mode: 'number' }).notNull(),
    verifiedAt: bigint('verified_at', { mode: 'number' }),
    lastUpdatedAt: bigint('last_updated_at', { mode: 'number' }).notNull(),
    status: varchar('status', { length: 20 }).notNull(),
    metadata: text('metadata').notNull().default(''),
  },
  (table) => [
    primaryKey({ columns: [table.registry, table.recordId] }),
    index('idx_records_subject').on(table.registry, table.subjectId),
    index('idx_records_authority').on(table.registry, table.authorityId),
  ],
);

export type RecordRow = typeof records.$inferSelect;
export type NewRecordRow = typeof records.$inferInsert;
