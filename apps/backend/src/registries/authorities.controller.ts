import {
  Controller,
  Get,
  Post,
  Put,
  Body,
  Param,
  UseGuards,
  NotFoundException,
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
import { RegisterAuthorityDto } from './dto/register-authority.dto';
import { SetVerificationDto } from './dto/set-verification.dto';
import { AuthorityResponseDto } from './dto/authority-response.dto';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import { Caller } from '../common/decorators/caller.decorator';
import { unwrapResult } from '../common/utils/error.utils';

@ApiTags('authorities')
@Controller('registries/:registry/authorities')
@ApiParam({ name: 'registry', enum: [...REGISTRY_KINDS] })
export class AuthoritiesController {
  constructor(private registries: RegistriesService) {}

  @Post()
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Register the caller as an authority',
    description:
      'Creates an unverified authority keyed by the calling identity. It cannot issue records until an admin verifies it.',
  })
  @ApiResponse({ status: 201, type: AuthorityResponseDto })
  @ApiResponse({ status: 409, description: 'Already registered' })
  async register(
    @Caller() ctx: CallContext,
    @Param('registry', RegistryKindPipe) registry: RegistryKind,
    @Body() dto: RegisterAuthorityDto,
  ): Promise<AuthorityResponseDto> {
    const authority = unwrapResult(
      await this.registries.registry(registry).registerAuthority(ctx, dto),
    );
    return AuthorityResponseDto.fromAuthority(authority);
  }

  @Get()
  @ApiOperation({ summary: 'List authorities in registration order' })
  @ApiResponse({ status: 200, type: [AuthorityResponseDto] })
  async findAll(
    @Param('registry', RegistryKindPipe) registry: RegistryKind,
  ): Promise<AuthorityResponseDto[]> {
    const authorities = await this.registries
      .registry(registry)
      .listAuthorities();
    return authorities.map((authority) =>
      AuthorityResponseDto.fromAuthority(authority),
    );
  }

  @Get(':identity')
  @ApiOperation({ summary: 'Get an authority' })
  @ApiResponse({ status: 200, type: AuthorityResponseDto })
  @ApiResponse({ status: 404, description: 'Not registered' })
  async findOne(
    @Param('registry', RegistryKindPipe) registry: RegistryKind,
    @Param('identity') identity: string,
  ): Promise<AuthorityResponseDto> {
    const authority = await this.registries
      .registry(registry)
      .getAuthority(identity);
    if (!authority) {
      throw new NotFoundException(`Authority ${identity} not found`);
    }
    return AuthorityResponseDto.fromAuthority(authority);
  }

  @Put(':identity/verification')
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @ApiOperation({
    summary: 'Grant or revoke verification',
    description:
      'Admin only. Revoking stops new issuance; existing records are untouched.',
  })
  @ApiResponse({ status: 200, type: AuthorityResponseDto })
  @ApiResponse({ status: 403, description: 'Caller is not an admin' })
  @ApiResponse({ status: 404, description: 'Not registered' })
  async setVerified(
    @Caller() ctx: CallContext,
    @Param('registry', RegistryKindPipe) registry: RegistryKind,
    @Param('identity') identity: string,
    @Body() dto: SetVerificationDto,
  ): Promise<AuthorityResponseDto> {
    const authority = unwrapResult(
      await this.registries
        .registry(registry)
        .setAuthorityVerified(ctx, identity, dto.verified),
    );
    return AuthorityResponseDto.fromAuthority(authority);
  }
}
