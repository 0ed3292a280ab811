import { Controller, Get, Query } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { AuditService } from './audit.service';
import { QueryAuditLogDto } from './dto/query-audit-log.dto';
import { AuditLogResponseDto } from './dto/audit-log-response.dto';

@ApiTags('audit')
@Controller('audit')
export class AuditController {
  constructor(private auditService: AuditService) {}

  @Get()
  @ApiOperation({
    summary: 'Query audit logs',
    description:
      'Registry operations, successful and rejected, newest first. Returns up to 1000 results per query.',
  })
  @ApiResponse({
    status: 200,
    description: 'Audit logs found',
    type: [AuditLogResponseDto],
  })
  async query(
    @Query() queryDto: QueryAuditLogDto,
  ): Promise<AuditLogResponseDto[]> {
    const logs = await this.auditService.query(queryDto);
    return logs.map((log) => AuditLogResponseDto.fromEntity(log));
  }
}
