import { Injectable, Inject } from '@nestjs/common';
import {
  HealthIndicatorService,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import type { Pool } from 'pg';
import {
  DATABASE_CONNECTION,
  DATABASE_POOL,
} from '../database/database.constants';
import type { Database } from '../database/database.module';
import { extractErrorInfo } from '../common/utils/error.utils';

@Injectable()
export class DatabaseHealthIndicator {
  constructor(
    @Inject(DATABASE_CONNECTION)
    private db: Database,
    @Inject(DATABASE_POOL)
    private pool: Pool,
    private healthIndicatorService: HealthIndicatorService,
  ) {}

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const indicator = this.healthIndicatorService.check(key);

    try {
      await this.db.execute('SELECT 1');

      return indicator.up({
        pool: this.poolMetrics(),
        maxConnections: this.pool.options.max,
      });
    } catch (error) {
      // Pool metrics are still reported when the query fails
      return indicator.down({
        message: extractErrorInfo(error).message,
        pool: this.poolMetrics(),
      });
    }
  }

  private poolMetrics(): { total: number; idle: number; waiting: number } {
    return {
      total: this.pool.totalCount,
      idle: this.pool.idleCount,
      waiting: this.pool.waitingCount,
    };
  }
}
