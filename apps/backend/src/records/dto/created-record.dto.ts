import { ApiProperty } from '@nestjs/swagger';

export class CreatedRecordDto {
  @ApiProperty({ description: 'Id of the new record', example: 1 })
  id!: number;
}
