import { ApiProperty } from '@nestjs/swagger';
import type { ValidityReason } from '@credentia/core';

export class ValidityResponseDto {
  @ApiProperty({ example: 1 })
  recordId!: number;

  @ApiProperty({
    description: 'Active status and not expired',
    example: true,
  })
  valid!: boolean;

  @ApiProperty({
    enum: ['valid', 'not_found', 'inactive_status', 'expired'],
    example: 'valid',
  })
  reason!: ValidityReason;

  @ApiProperty({
    description: 'When the check was made, in ledger time (unix seconds, never decreasing)',
    example: 1760745600,
  })
  checkedAt!: number;
}
