import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  ParseIntPipe,
  UseGuards,
  HttpCode,
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
import { IssueQualificationDto } from './dto/issue-qualification.dto';
import { SelfReportQualificationDto } from './dto/self-report-qualification.dto';
import { CreatedRecordDto } from '../records/dto/created-record.dto';
import { RecordResponseDto } from '../records/dto/record-response.dto';
import { ValidityResponseDto } from '../records/dto/validity-response.dto';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import { Caller } from '../common/decorators/caller.decorator';
import { unwrapResult } from '../common/utils/error.utils';

@ApiTags('qualifications')
@Controller('qualifications')
export class QualificationsController {
  constructor(private registries: RegistriesService) {}

  @Post()
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Issue a verified qualification',
    description: 'The caller must be a verified authority of this registry.',
  })
  @ApiResponse({ status: 201, type: CreatedRecordDto })
  @ApiResponse({ status: 403, description: 'Authority not verified' })
  @ApiResponse({ status: 404, description: 'Caller is not a registered authority' })
  async issue(
    @Caller() ctx: CallContext,
    @Body() dto: IssueQualificationDto,
  ): Promise<CreatedRecordDto> {
    const id = unwrapResult(
      await this.registries.qualifications.issue(ctx, dto.subjectId, {
        payload: dto.payload,
        expiresAt: dto.expiresAt,
        metadata: dto.metadata,
      }),
    );
    return { id };
  }

  @Post('self-reports')
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Self-report a qualification',
    description:
      'Creates an unverified record held by the caller. It becomes valid once the named authority verifies it.',
  })
  @ApiResponse({ status: 201, type: CreatedRecordDto })
  async selfReport(
    @Caller() ctx: CallContext,
    @Body() dto: SelfReportQualificationDto,
  ): Promise<CreatedRecordDto> {
    const id = unwrapResult(
      await this.registries.qualifications.selfReport(ctx, dto.authorityId, {
        payload: dto.payload,
        expiresAt: dto.expiresAt,
        metadata: dto.metadata,
      }),
    );
    return { id };
  }

  @Post(':id/verify')
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @HttpCode(200)
  @ApiOperation({
    summary: 'Verify a qualification',
    description: 'Only the authority named on the record may verify it.',
  })
  @ApiResponse({ status: 200, type: RecordResponseDto })
  @ApiResponse({ status: 403, description: 'Caller is not the record authority' })
  @ApiResponse({ status: 404, description: 'Record not found' })
  async verify(
    @Caller() ctx: CallContext,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<RecordResponseDto> {
    const record = unwrapResult(
      await this.registries.qualifications.verify(ctx, id),
    );
    return RecordResponseDto.fromRecord(record);
  }

  @Get('subjects/:identity')
  @ApiOperation({ summary: "List a provider's qualifications" })
  @ApiResponse({ status: 200, type: [RecordResponseDto] })
  async findBySubject(
    @Param('identity') identity: string,
  ): Promise<RecordResponseDto[]> {
    const records =
      await this.registries.qualifications.listBySubject(identity);
    return records.map((record) => RecordResponseDto.fromRecord(record));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a qualification' })
  @ApiResponse({ status: 200, type: RecordResponseDto })
  @ApiResponse({ status: 404, description: 'Record not found' })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<RecordResponseDto> {
    const record = await this.registries.qualifications.getRecord(id);
    if (!record) {
      throw new NotFoundException(`Qualification ${id} not found`);
    }
    return RecordResponseDto.fromRecord(record);
  }

  @Get(':id/validity')
  @ApiOperation({
    summary: 'Check validity',
    description: 'Valid means verified and not expired at the current ledger time.',
  })
  @ApiResponse({ status: 200, type: ValidityResponseDto })
  async checkValidity(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<ValidityResponseDto> {
    return this.registries.qualifications.checkValidity(id);
  }
}
