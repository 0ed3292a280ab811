import { ApiProperty } from '@nestjs/swagger';
import { IsString, Length, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { RecordInputDto } from '../../records/dto/record-input.dto';
import { QualificationPayloadDto } from './qualification-payload.dto';

export class SelfReportQualificationDto extends RecordInputDto {
  @ApiProperty({
    description:
      'Authority expected to verify the record. It need not be registered yet.',
    example: 'board-1',
  })
  @IsString()
  @Length(1, 128)
  authorityId!: string;

  @ApiProperty({ type: QualificationPayloadDto })
  @ValidateNested()
  @Type(() => QualificationPayloadDto)
  payload!: QualificationPayloadDto;
}
