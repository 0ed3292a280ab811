import { pgTable, varchar, bigint } from 'drizzle-orm/pg-core';

// Record id counters. The row is locked for the length of every mutating
// transaction, which serializes writers per registry.
export const registryCounters = pgTable('registry_counters', {
  registry: varchar('registry', { length: 32 }).primaryKey(),
  lastRecordId: bigint('last_record_id', { mode: 'number' })
    .notNull()
    .default(0),
});

export type RegistryCounter = typeof registryCounters.$inferSelect;
