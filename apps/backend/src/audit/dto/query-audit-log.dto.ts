import { IsOptional, IsString, IsInt, IsIn, Min, Max } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { REGISTRY_KINDS } from '@credentia/core';
import type { RegistryKind } from '@credentia/core';

export class QueryAuditLogDto {
  @ApiPropertyOptional({
    description: 'Filter by registry',
    enum: [...REGISTRY_KINDS],
    example: 'privileges',
  })
  @IsOptional()
  @IsIn(REGISTRY_KINDS)
  registry?: RegistryKind;

  @ApiPropertyOptional({
    description: 'Filter by operation',
    example: 'updateStatus',
  })
  @IsOptional()
  @IsString()
  operation?: string;

  @ApiPropertyOptional({
    description: 'Filter by acting identity',
    example: 'hospital-1',
  })
  @IsOptional()
  @IsString()
  actor?: string;

  @ApiPropertyOptional({
    description: 'Filter by outcome',
    enum: ['success', 'failure'],
    example: 'failure',
  })
  @IsOptional()
  @IsIn(['success', 'failure'])
  outcome?: 'success' | 'failure';

  @ApiPropertyOptional({
    description: 'Filter by record id',
    example: 4,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  recordId?: number;

  @ApiPropertyOptional({
    description: 'Maximum number of results',
    example: 100,
    minimum: 1,
    maximum: 1000,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number;

  @ApiPropertyOptional({
    description: 'Number of results to skip (for pagination)',
    example: 0,
    minimum: 0,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;
}
