import {
  pgTable,
  varchar,
  timestamp,
  primaryKey,
} from 'drizzle-orm/pg-core';

// Registry admins - presence of a row means the identity is an admin
export const registryAdmins = pgTable(
  'registry_admins',
  {
    registry: varchar('registry', { length: 32 }).notNull(),
    identity: varchar('identity', { length: 128 }).notNull(),
    createdAt: timestamp('created_at').defaultNow(),
  },
  (table) => [primaryKey({ columns: [table.registry, table.identity] })],
);

export type RegistryAdmin = typeof registryAdmins.$inferSelect;
