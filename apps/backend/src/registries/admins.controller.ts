import {
  Controller,
  Get,
  Put,
  Delete,
  Param,
  UseGuards,
  HttpCode,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiBearerAuth,
  ApiParam,
} from '@nestjs/swagger';
import { REGISTRY_KINDS } from '@credentia/core';
import type { CallContext, RegistryKind } from '@credentia/core';
import { RegistriesService } from './registries.service';
import { RegistryKindPipe } from './pipes/registry-kind.pipe';
import { AdminStatusDto } from './dto/admin-status.dto';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import { Caller } from '../common/decorators/caller.decorator';
import { unwrapResult } from '../common/utils/error.utils';

@ApiTags('admins')
@Controller('registries/:registry/admins')
@ApiParam({ name: 'registry', enum: [...REGISTRY_KINDS] })
export class AdminsController {
  constructor(private registries: RegistriesService) {}

  @Get(':identity')
  @ApiOperation({ summary: 'Check whether an identity is a registry admin' })
  @ApiResponse({ status: 200, type: AdminStatusDto })
  async isAdmin(
    @Param('registry', RegistryKindPipe) registry: RegistryKind,
    @Param('identity') identity: string,
  ): Promise<AdminStatusDto> {
    const admin = await this.registries.registry(registry).isAdmin(identity);
    return { registry, identity, admin };
  }

  @Put(':identity')
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Grant admin rights',
    description: 'Owner only. Granting twice is a no-op.',
  })
  @ApiResponse({ status: 200, type: AdminStatusDto })
  @ApiResponse({ status: 403, description: 'Caller is not the owner' })
  async addAdmin(
    @Caller() ctx: CallContext,
    @Param('registry', RegistryKindPipe) registry: RegistryKind,
    @Param('identity') identity: string,
  ): Promise<AdminStatusDto> {
    unwrapResult(await this.registries.registry(registry).addAdmin(ctx, identity));
    return { registry, identity, admin: true };
  }

  @Delete(':identity')
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @HttpCode(200)
  @ApiOperation({
    summary: 'Revoke admin rights',
    description: 'Owner only. Revoking a non-admin is a no-op.',
  })
  @ApiResponse({ status: 200, type: AdminStatusDto })
  @ApiResponse({ status: 403, description: 'Caller is not the owner' })
  async removeAdmin(
    @Caller() ctx: CallContext,
    @Param('registry', RegistryKindPipe) registry: RegistryKind,
    @Param('identity') identity: string,
  ): Promise<AdminStatusDto> {
    unwrapResult(
      await this.registries.registry(registry).removeAdmin(ctx, identity),
    );
    return { registry, identity, admin: false };
  }
}
