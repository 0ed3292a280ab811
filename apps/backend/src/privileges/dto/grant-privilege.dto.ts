import { ApiProperty } from '@nestjs/swagger';
import { IsString, Length, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { RecordInputDto } from '../../records/dto/record-input.dto';
import { PrivilegePayloadDto } from './privilege-payload.dto';

export class GrantPrivilegeDto extends RecordInputDto {
  @ApiProperty({ description: 'Provider receiving the privilege', example: 'provider-1' })
  @IsString()
  @Length(1, 128)
  subjectId!: string;

  @ApiProperty({ type: PrivilegePayloadDto })
  @ValidateNested()
  @Type(() => PrivilegePayloadDto)
  payload!: PrivilegePayloadDto;
}
