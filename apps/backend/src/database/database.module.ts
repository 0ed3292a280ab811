import { Module, Global } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import type { Logger } from 'winston';
import { Pool } from 'pg';
import * as schema from './schema';
import { DatabaseService } from './database.service';
import type { Env } from '../config/env.validation';
import { DATABASE_CONNECTION, DATABASE_POOL } from './database.constants';

export { DATABASE_CONNECTION, DATABASE_POOL };

export type Database = NodePgDatabase<typeof schema>;

// The pool-backed database or an open transaction
export type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: DATABASE_POOL,
      useFactory: (
        configService: ConfigService<Env, true>,
        logger: Logger,
      ): Pool => {
        const pool = new Pool({
          connectionString: configService.get('DATABASE_URL', { infer: true }),
          max: 20, // Max connections
          idleTimeoutMillis: 30000, // Close idle connections
          connectionTimeoutMillis: 2000, // Timeout new connections
        });

        pool.on('error', (err) => {
          logger.error('Unexpected database error', {
            error: err.message,
            stack: err.stack,
          });
        });

        return pool;
      },
      inject: [ConfigService, WINSTON_MODULE_PROVIDER],
    },
    {
      provide: DATABASE_CONNECTION,
      useFactory: (pool: Pool): Database => {
        return drizzle(pool, { schema });
      },
      inject: [DATABASE_POOL],
    },
    DatabaseService,
  ],
  exports: [DATABASE_CONNECTION, DATABASE_POOL, DatabaseService],
})
export class DatabaseModule {}
