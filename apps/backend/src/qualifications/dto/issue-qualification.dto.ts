import { ApiProperty } from '@nestjs/swagger';
import { IsString, Length, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { RecordInputDto } from '../../records/dto/record-input.dto';
import { QualificationPayloadDto } from './qualification-payload.dto';

export class IssueQualificationDto extends RecordInputDto {
  @ApiProperty({ description: 'Provider holding the qualification', example: 'provider-1' })
  @IsString()
  @Length(1, 128)
  subjectId!: string;

  @ApiProperty({ type: QualificationPayloadDto })
  @ValidateNested()
  @Type(() => QualificationPayloadDto)
  payload!: QualificationPayloadDto;
}
