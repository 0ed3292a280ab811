import { ApiProperty } from '@nestjs/swagger';
import {
  ArrayMaxSize,
  IsArray,
  IsString,
  Length,
} from 'class-validator';

export class PanelPayloadDto {
  @ApiProperty({ example: 'Northwind PPO', maxLength: 100 })
  @IsString()
  @Length(1, 100)
  networkName!: string;

  @ApiProperty({ example: 'tier-1', maxLength: 20 })
  @IsString()
  @Length(1, 20)
  tier!: string;

  @ApiProperty({
    description: 'Covered specialties',
    example: ['cardiology', 'internal-medicine'],
    type: [String],
    maxItems: 10,
  })
  @IsArray()
  @ArrayMaxSize(10)
  @IsString({ each: true })
  @Length(1, 50, { each: true })
  specialties!: string[];
}
