import { ApiProperty } from '@nestjs/swagger';
import { IsString, Length } from 'class-validator';

export class CreateAccountDto {
  @ApiProperty({
    description: 'Display name for the account holder',
    example: 'General Hospital credentialing office',
  })
  @IsString()
  @Length(1, 255)
  name!: string;
}
