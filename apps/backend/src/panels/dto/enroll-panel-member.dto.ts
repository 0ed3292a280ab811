import { ApiProperty } from '@nestjs/swagger';
import { IsString, Length, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { RecordInputDto } from '../../records/dto/record-input.dto';
import { PanelPayloadDto } from './panel-payload.dto';

export class EnrollPanelMemberDto extends RecordInputDto {
  @ApiProperty({ description: 'Provider joining the panel', example: 'provider-1' })
  @IsString()
  @Length(1, 128)
  subjectId!: string;

  @ApiProperty({ type: PanelPayloadDto })
  @ValidateNested()
  @Type(() => PanelPayloadDto)
  payload!: PanelPayloadDto;
}
