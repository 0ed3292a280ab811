import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  index,
} from 'drizzle-orm/pg-core';

// Accounts table - API key holders and the ledger identity they act as
export const accounts = pgTable(
  'accounts',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    identity: varchar('identity', { length: 128 }).notNull().unique(),
    apiKeyHash: varchar('api_key_hash', { length: 128 }).notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    status: varchar('status', { length: 32 }).default('active'),
    createdAt: timestamp('created_at').defaultNow(),
    updatedAt: timestamp('updated_at').defaultNow(),
  },
  (table) => [
    index('idx_accounts_api_key_hash').on(table.apiKeyHash),
    index('idx_accounts_status').on(table.status),
  ],
);

// Export TypeScript types
export type Account = typeof accounts.$inferSelect;
export type NewAccount = typeof accounts.$inferInsert;
