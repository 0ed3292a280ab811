import { ApiProperty } from '@nestjs/swagger';
import { IsBoolean } from 'class-validator';

export class SetVerificationDto {
  @ApiProperty({
    description: 'Grant (true) or revoke (false) verification',
    example: true,
  })
  @IsBoolean()
  verified!: boolean;
}
