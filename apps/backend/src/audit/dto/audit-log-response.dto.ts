import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import * as schema from '../../database/schema';

export class AuditLogResponseDto {
  @ApiProperty({ example: 'audit-0b6c0f7e-8f8d-4a53-9d51-3c1f1c7d2b10' })
  id!: string;

  @ApiProperty({ example: 'privileges' })
  registry!: string;

  @ApiProperty({ example: 'issue' })
  operation!: string;

  @ApiProperty({ example: 'hospital-1' })
  actor!: string;

  @ApiProperty({ example: 'success', enum: ['success', 'failure'] })
  outcome!: string;

  @ApiPropertyOptional({ example: 'Unauthorized' })
  code?: string;

  @ApiPropertyOptional({ example: 'Authority hospital-1 is not verified' })
  reason?: string;

  @ApiPropertyOptional({ example: 'hospital-1' })
  authorityId?: string;

  @ApiPropertyOptional({ example: 4 })
  recordId?: number;

  @ApiPropertyOptional({ example: 'provider-1' })
  subjectId?: string;

  @ApiPropertyOptional({ example: '7a0e1d5c-2f41-4f0b-b1f5-d6c2a3e9f001' })
  requestId?: string;

  @ApiProperty({
    description: 'When the operation ran, in ledger time (unix seconds, never decreasing)',
    example: 1760745600,
  })
  ledgerTime!: number;

  @ApiProperty({ example: '2026-10-18T00:00:00.000Z' })
  createdAt!: Date;

  static fromEntity(log: schema.AuditLog): AuditLogResponseDto {
    return {
      id: log.id,
      registry: log.registry,
      operation: log.operation,
      actor: log.actor,
      outcome: log.outcome,
      code: log.code ?? undefined,
      reason: log.reason ?? undefined,
      authorityId: log.authorityId ?? undefined,
      recordId: log.recordId ?? undefined,
      subjectId: log.subjectId ?? undefined,
      requestId: log.requestId ?? undefined,
      ledgerTime: log.ledgerTime,
      createdAt: log.createdAt ?? new Date(),
    };
  }
}
