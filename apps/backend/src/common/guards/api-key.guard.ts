import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
  Inject,
} from '@nestjs/common';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import type { Logger } from 'winston';
import type { Request } from 'express';
import { AccountsService } from '../../accounts/accounts.service';
import type { Account } from '../../database/schema';
import { extractErrorInfo } from '../utils/error.utils';

export type AuthenticatedRequest = Request & {
  account: Account;
  requestId?: string;
};

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(
    private accountsService: AccountsService,
    @Inject(WINSTON_MODULE_PROVIDER) private logger: Logger,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context
      .switchToHttp()
      .getRequest<Request & { account?: Account }>();

    const authHeader = request.headers.authorization;
    if (!authHeader) {
      throw new UnauthorizedException('Missing Authorization header');
    }

    const apiKey = authHeader.replace(/^Bearer\s+/i, '');
    if (!apiKey.startsWith('sk-')) {
      throw new UnauthorizedException('Invalid API key format');
    }

    try {
      request.account = await this.accountsService.findByApiKey(apiKey);
      return true;
    } catch (error) {
      const { message, stack } = extractErrorInfo(error);
      this.logger.warn('API key validation failed', {
        error: message,
        stack,
      });

      throw new UnauthorizedException('Invalid or inactive API key');
    }
  }
}
