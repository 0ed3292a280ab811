import { Controller, Post, Get, Body, UseGuards, Req } from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiBearerAuth,
} from '@nestjs/swagger';
import { AccountsService } from './accounts.service';
import { CreateAccountDto } from './dto/create-account.dto';
import {
  AccountResponseDto,
  CreateAccountResponseDto,
} from './dto/account-response.dto';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import type { AuthenticatedRequest } from '../common/guards/api-key.guard';

@ApiTags('accounts')
@Controller('accounts')
export class AccountsController {
  constructor(private accountsService: AccountsService) {}

  @Post()
  @ApiOperation({
    summary: 'Create an account',
    description:
      'Creates a ledger identity and returns its API key. The key is shown only once.',
  })
  @ApiResponse({
    status: 201,
    description: 'Account created',
    type: CreateAccountResponseDto,
  })
  async create(
    @Body() dto: CreateAccountDto,
  ): Promise<CreateAccountResponseDto> {
    const { account, apiKey } = await this.accountsService.create(dto);
    return CreateAccountResponseDto.fromEntityWithKey(account, apiKey);
  }

  @Get('me')
  @UseGuards(ApiKeyGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'The calling account' })
  @ApiResponse({ status: 200, type: AccountResponseDto })
  @ApiResponse({ status: 401, description: 'Missing or invalid API key' })
  me(@Req() request: AuthenticatedRequest): AccountResponseDto {
    return AccountResponseDto.fromEntity(request.account);
  }
}
