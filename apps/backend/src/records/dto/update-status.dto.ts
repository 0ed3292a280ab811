import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, Length, MaxLength } from 'class-validator';

export class UpdateStatusDto {
  @ApiProperty({
    description:
      'New status tag. Only "active" makes a record valid; other values are free text.',
    example: 'suspended',
    maxLength: 20,
  })
  @IsString()
  @Length(1, 20)
  status!: string;

  @ApiPropertyOptional({
    description: 'Replacement restrictions. Omit to keep the current ones.',
    example: 'Pending peer review',
    maxLength: 500,
  })
  @IsOptional()
  @IsString()
  @MaxLength(500)
  restrictions?: string;
}
