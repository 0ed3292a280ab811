import { ApiProperty } from '@nestjs/swagger';
import type { LedgerRecord, RegistryKind } from '@credentia/core';

export class RecordResponseDto {
  @ApiProperty({ description: 'Registry-scoped record id', example: 1 })
  id!: number;

  @ApiProperty({ example: 'privileges' })
  registry!: RegistryKind;

  @ApiProperty({ description: 'Provider the record is about', example: 'provider-1' })
  subjectId!: string;

  @ApiProperty({
    description: 'Authority that owns the record. Only it may change it.',
    example: 'hospital-1',
  })
  authorityId!: string;

  @ApiProperty({
    description: 'Registry-specific fields',
    type: Object,
    example: {
      procedureCode: 'CPT-33533',
      procedureName: 'Coronary artery bypass',
    },
  })
  payload!: object;

  @ApiProperty({
    description: 'Creation, in ledger time (unix seconds, never decreasing)',
    example: 1760745600,
  })
  createdAt!: number;

  @ApiProperty({
    description: 'Expiration in ledger time (unix seconds, never decreasing). 0 = never.',
    example: 1792281600,
  })
  expiresAt!: number;

  @ApiProperty({
    description: 'Verification, in ledger time (unix seconds, never decreasing)',
    example: 1760745600,
    nullable: true,
    type: Number,
  })
  verifiedAt!: number | null;

  @ApiProperty({
    description: 'Last change, in ledger time (unix seconds, never decreasing)',
    example: 1760745600,
  })
  lastUpdatedAt!: number;

  @ApiProperty({ example: 'active' })
  status!: string;

  @ApiProperty({
    description: 'Restrictions or notes',
    example: 'Supervision required',
  })
  metadata!: string;

  static fromRecord(record: LedgerRecord<object, string>): RecordResponseDto {
    return { ...record };
  }
}
