import { ApiProperty } from '@nestjs/swagger';
import { IsInt, Min } from 'class-validator';

export class RenewRecordDto {
  @ApiProperty({
    description: 'New expiration in ledger time (unix seconds, never decreasing). 0 = never.',
    example: 1823817600,
    minimum: 0,
  })
  @IsInt()
  @Min(0)
  expiresAt!: number;
}
