import {
  Controller,
  Get,
  Post,
  Put,
  Body,
  Param,
  ParseIntPipe,
  UseGuards,
  NotFoundException,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiBearerAuth,
} from '@nestjs/swagger';
import type { CallContext } from '@credentia/core';
import { RegistriesService } from '../registries/registries.service';
import { EnrollPanelMemberDto } from './dto/enroll-panel-member.dto';
import { CreatedRecordDto } from '../records/dto/created-record.dto';
import { RecordResponseDto } from '../records/dto/record-response.dto';
import { ValidityResponseDto } from '../records/dto/validity-response.dto';
import { UpdateStatusDto } from '../records/dto/update-status.dto';
import { RenewRecordDto } from '../records/dto/renew-record.dto';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import { Caller } from '../common/decorators/caller.decorator';
import { unwrapResult } from '../common/utils/error.utils';

@ApiTags('panels')
@Controller('panels')
export class PanelsController {
  constructor(private registries: RegistriesService) {}

  @Post()
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Enroll a provider on an insurance panel',
    description: 'The caller must be a verified insurer of this registry.',
  })
  @ApiResponse({ status: 201, type: CreatedRecordDto })
  @ApiResponse({ status: 403, description: 'Insurer not verified' })
  @ApiResponse({ status: 404, description: 'Caller is not a registered insurer' })
  async enroll(
    @Caller() ctx: CallContext,
    @Body() dto: EnrollPanelMemberDto,
  ): Promise<CreatedRecordDto> {
    const id = unwrapResult(
      await this.registries.panels.issue(ctx, dto.subjectId, {
        payload: dto.payload,
        expiresAt: dto.expiresAt,
        metadata: dto.metadata,
      }),
    );
    return { id };
  }

  @Put(':id/status')
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Change panel membership status',
    description:
      'Only the enrolling insurer may change it. Notes are replaced when given.',
  })
  @ApiResponse({ status: 200, type: RecordResponseDto })
  @ApiResponse({ status: 403, description: 'Caller is not the enrolling insurer' })
  @ApiResponse({ status: 404, description: 'Record not found' })
  async updateStatus(
    @Caller() ctx: CallContext,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateStatusDto,
  ): Promise<RecordResponseDto> {
    const record = unwrapResult(
      await this.registries.panels.updateStatus(
        ctx,
        id,
        dto.status,
        dto.restrictions,
      ),
    );
    return RecordResponseDto.fromRecord(record);
  }

  @Put(':id/expiration')
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Renew a panel membership',
    description: 'Replaces the expiration. Only the enrolling insurer may renew.',
  })
  @ApiResponse({ status: 200, type: RecordResponseDto })
  @ApiResponse({ status: 403, description: 'Caller is not the enrolling insurer' })
  @ApiResponse({ status: 404, description: 'Record not found' })
  async renew(
    @Caller() ctx: CallContext,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: RenewRecordDto,
  ): Promise<RecordResponseDto> {
    const record = unwrapResult(
      await this.registries.panels.renew(ctx, id, dto.expiresAt),
    );
    return RecordResponseDto.fromRecord(record);
  }

  @Get('subjects/:identity')
  @ApiOperation({ summary: "List a provider's panel memberships" })
  @ApiResponse({ status: 200, type: [RecordResponseDto] })
  async findBySubject(
    @Param('identity') identity: string,
  ): Promise<RecordResponseDto[]> {
    const records = await this.registries.panels.listBySubject(identity);
    return records.map((record) => RecordResponseDto.fromRecord(record));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a panel membership' })
  @ApiResponse({ status: 200, type: RecordResponseDto })
  @ApiResponse({ status: 404, description: 'Record not found' })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<RecordResponseDto> {
    const record = await this.registries.panels.getRecord(id);
    if (!record) {
      throw new NotFoundException(`Panel membership ${id} not found`);
    }
    return RecordResponseDto.fromRecord(record);
  }

  @Get(':id/validity')
  @ApiOperation({
    summary: 'Check validity',
    description: 'Valid means status "active" and not expired at the current ledger time.',
  })
  @ApiResponse({ status: 200, type: ValidityResponseDto })
  async checkValidity(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<ValidityResponseDto> {
    return this.registries.panels.checkValidity(id);
  }
}
