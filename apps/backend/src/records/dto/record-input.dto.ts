import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, IsString, MaxLength, Min } from 'class-validator';

/**
 * Fields shared by every record-creating request.
 */
export abstract class RecordInputDto {
  @ApiProperty({
    description: 'Expiration in ledger time (unix seconds, never decreasing). 0 = never.',
    example: 1792281600,
    minimum: 0,
  })
  @IsInt()
  @Min(0)
  expiresAt!: number;

  @ApiPropertyOptional({
    description: 'Restrictions or notes',
    example: 'Supervision required',
    maxLength: 500,
  })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  metadata?: string;
}
