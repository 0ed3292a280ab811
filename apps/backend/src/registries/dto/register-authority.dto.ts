import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, Length } from 'class-validator';

export class RegisterAuthorityDto {
  @ApiProperty({
    description: 'Organization name',
    example: 'General Hospital',
    maxLength: 100,
  })
  @IsString()
  @Length(1, 100)
  name!: string;

  @ApiPropertyOptional({
    description: 'Issuer or insurer type',
    example: 'licensing-board',
    maxLength: 50,
  })
  @IsOptional()
  @IsString()
  @Length(1, 50)
  category?: string;

  @ApiPropertyOptional({
    example: 'https://general-hospital.example',
    maxLength: 100,
  })
  @IsOptional()
  @IsString()
  @Length(1, 100)
  website?: string;

  @ApiPropertyOptional({ example: 'Springfield', maxLength: 100 })
  @IsOptional()
  @IsString()
  @Length(1, 100)
  location?: string;
}
