import {
  pgTable,
  serial,
  varchar,
  boolean,
  bigint,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// Authorities table - one row per (registry, identity)
export const authorities = pgTable(
  'authorities',
  {
    // Registration order
    seq: serial('seq').primaryKey(),
    registry: varchar('registry', { length: 32 }).notNull(),
    identity: varchar('identity', { length: 128 }).notNull(),
    name: varchar('name', { length: 100 }).notNull(),
    category: varchar('category', { length: 50 }),
    website: varchar('website', { length: 100 }),
    location: varchar('location', { length: 100 }),
    verified: boolean('verified').notNull().default(false),
    active: boolean('active').notNull().default(true),
    registeredAt: bigint('registered_at', { mode: 'number' }).notNull(),
  },
  (table) => [
    uniqueIndex('idx_authorities_registry_identity').on(
      table.registry,
      table.identity,
    ),
  ],
);

export type AuthorityRow = typeof authorities.$inferSelect;
export type NewAuthorityRow = typeof authorities.$inferInsert;
