import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, Length, MaxLength } from 'class-validator';

export class QualificationPayloadDto {
  @ApiProperty({ example: 'medical-license', maxLength: 50 })
  @IsString()
  @Length(1, 50)
  qualificationType!: string;

  @ApiProperty({ example: 'State Medical License', maxLength: 100 })
  @IsString()
  @Length(1, 100)
  name!: string;

  @ApiPropertyOptional({ example: 'ML-000123', maxLength: 50 })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  licenseNumber?: string;

  @ApiPropertyOptional({ example: 'Springfield', maxLength: 50 })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  jurisdiction?: string;
}
