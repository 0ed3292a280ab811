import { Injectable, Inject } from '@nestjs/common';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import type { Logger } from 'winston';
import { eq, and, desc, SQL } from 'drizzle-orm';
import type { AuditEntry, AuditLogger } from '@credentia/core';
import { DATABASE_CONNECTION } from '../database/database.constants';
import type { Database } from '../database/database.module';
import * as schema from '../database/schema';
import { QueryAuditLogDto } from './dto/query-audit-log.dto';
import { extractErrorInfo } from '../common/utils/error.utils';

/**
 * Persists registry audit entries and serves them back.
 *
 * Plugged into every registry as its AuditLogger.
 */
@Injectable()
export class AuditService implements AuditLogger {
  constructor(
    @Inject(DATABASE_CONNECTION)
    private db: Database,
    @Inject(WINSTON_MODULE_PROVIDER) private logger: Logger,
  ) {}

  async log(entry: AuditEntry): Promise<void> {
    this.logger.info(`${entry.registry}.${entry.operation} ${entry.outcome}`, {
      auditId: entry.id,
      actor: entry.actor,
      code: entry.code,
      recordId: entry.recordId,
      requestId: entry.requestId,
    });

    try {
      await this.db.insert(schema.auditLogs).values({
        id: entry.id,
        registry: entry.registry,
        operation: entry.operation,
        actor: entry.actor,
        outcome: entry.outcome,
        code: entry.code,
        reason: entry.reason,
        authorityId: entry.authorityId,
        recordId: entry.recordId,
        subjectId: entry.subjectId,
        requestId: entry.requestId,
        ledgerTime: entry.timestamp,
        metadata: entry.metadata,
      });
    } catch (error) {
      const { message, stack } = extractErrorInfo(error);
      this.logger.error('Failed to persist audit entry', {
        error: message,
        stack,
        auditId: entry.id,
        registry: entry.registry,
        operation: entry.operation,
      });
      throw error;
    }
  }

  /**
   * Query audit logs with filters, newest first
   */
  async query(queryDto: QueryAuditLogDto): Promise<schema.AuditLog[]> {
    const conditions: SQL[] = [];

    if (queryDto.registry) {
      conditions.push(eq(schema.auditLogs.registry, queryDto.registry));
    }
    if (queryDto.operation) {
      conditions.push(eq(schema.auditLogs.operation, queryDto.operation));
    }
    if (queryDto.actor) {
      conditions.push(eq(schema.auditLogs.actor, queryDto.actor));
    }
    if (queryDto.outcome) {
      conditions.push(eq(schema.auditLogs.outcome, queryDto.outcome));
    }
    if (queryDto.recordId !== undefined) {
      conditions.push(eq(schema.auditLogs.recordId, queryDto.recordId));
    }

    const limit = queryDto.limit ?? 100;
    const offset = queryDto.offset ?? 0;

    return await this.db
      .select()
      .from(schema.auditLogs)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(schema.auditLogs.createdAt))
      .limit(limit)
      .offset(offset);
  }
}
