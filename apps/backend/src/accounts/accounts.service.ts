import {
  Injectable,
  Inject,
  NotFoundException,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import type { Logger } from 'winston';
import { eq } from 'drizzle-orm';
import { DATABASE_CONNECTION } from '../database/database.constants';
import type { Database } from '../database/database.module';
import * as schema from '../database/schema';
import type { Env } from '../config/env.validation';
import { CreateAccountDto } from './dto/create-account.dto';
import {
  generateAccountIdentity,
  generateApiKey,
  hashApiKey,
} from '../common/utils/crypto.utils';

@Injectable()
export class AccountsService implements OnApplicationBootstrap {
  constructor(
    @Inject(DATABASE_CONNECTION)
    private db: Database,
    private config: ConfigService<Env, true>,
    @Inject(WINSTON_MODULE_PROVIDER) private logger: Logger,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.seedOwner();
  }

  /**
   * Create an account under a fresh identity. The API key is returned once
   * and only its hash is stored.
   */
  async create(dto: CreateAccountDto): Promise<{
    account: schema.Account;
    apiKey: string;
  }> {
    const apiKey = generateApiKey();

    const [account] = await this.db
      .insert(schema.accounts)
      .values({
        identity: generateAccountIdentity(),
        apiKeyHash: hashApiKey(apiKey),
        name: dto.name,
      })
      .returning();

    this.logger.info('Account created', { identity: account.identity });

    return { account, apiKey };
  }

  async findByIdentity(identity: string): Promise<schema.Account> {
    const [account] = await this.db
      .select()
      .from(schema.accounts)
      .where(eq(schema.accounts.identity, identity))
      .limit(1);

    if (!account) {
      throw new NotFoundException(`Account ${identity} not found`);
    }

    return account;
  }

  async findByApiKey(apiKey: string): Promise<schema.Account> {
    const [account] = await this.db
      .select()
      .from(schema.accounts)
      .where(eq(schema.accounts.apiKeyHash, hashApiKey(apiKey)))
      .limit(1);

    if (!account || account.status !== 'active') {
      throw new NotFoundException('Invalid API key');
    }

    return account;
  }

  /**
   * Give the owner identity an account keyed by OWNER_API_KEY. No-op when
   * the key is not configured.
   */
  async seedOwner(): Promise<void> {
    const apiKey = this.config.get('OWNER_API_KEY', { infer: true });
    if (!apiKey) {
      return;
    }

    const identity = this.config.get('OWNER_ID', { infer: true });
    const apiKeyHash = hashApiKey(apiKey);

    await this.db
      .insert(schema.accounts)
      .values({ identity, apiKeyHash, name: 'Registry owner' })
      .onConflictDoUpdate({
        target: schema.accounts.identity,
        set: { apiKeyHash, status: 'active', updatedAt: new Date() },
      });

    this.logger.info('Owner account ready', { identity });
  }
}
