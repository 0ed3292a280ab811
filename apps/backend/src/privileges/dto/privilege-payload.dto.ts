import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, Length, MaxLength } from 'class-validator';

export class PrivilegePayloadDto {
  @ApiProperty({ example: 'CPT-33533', maxLength: 20 })
  @IsString()
  @Length(1, 20)
  procedureCode!: string;

  @ApiProperty({ example: 'Coronary artery bypass', maxLength: 100 })
  @IsString()
  @Length(1, 100)
  procedureName!: string;

  @ApiPropertyOptional({ example: 'Cardiothoracic surgery', maxLength: 50 })
  @IsOptional()
  @IsString()
  @MaxLength(50)
  department?: string;
}
