import { drizzle } from 'drizzle-orm/node-postgres';
import { migrate } from 'drizzle-orm/node-postgres/migrator';
import { Pool } from 'pg';
import { existsSync } from 'fs';
import { join } from 'path';
import { config } from 'dotenv';

/**
 * Load environment variables using the same logic as ConfigModule.
 * Tries both locations: app directory and monorepo root.
 */
function loadEnvConfig(): void {
  const cwd = process.cwd();

  const envPaths = [join(cwd, 'apps/backend/.env'), join(cwd, '.env')];

  for (const envPath of envPaths) {
    config({ path: envPath });
  }
}

// Run from the repository root or from apps/backend
function findMigrationsFolder(): string {
  const cwd = process.cwd();
  const candidates = [join(cwd, 'apps/backend/drizzle'), join(cwd, 'drizzle')];

  const folder = candidates.find((candidate) =>
    existsSync(join(candidate, 'meta/_journal.json')),
  );
  if (!folder) {
    throw new Error(`No migrations found under ${candidates.join(' or ')}`);
  }
  return folder;
}

loadEnvConfig();

async function runMigrations() {
  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set');
  }

  const pool = new Pool({
    connectionString,
  });

  const db = drizzle(pool);

  const migrationsFolder = findMigrationsFolder();

  console.log('Running migrations...');
  console.log(`Migrations folder: ${migrationsFolder}`);
  try {
    await migrate(db, { migrationsFolder });
    console.log('Migrations complete!');
  } finally {
    await pool.end();
  }
}

runMigrations().catch((err: unknown) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
