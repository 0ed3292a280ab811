import { ApiProperty } from '@nestjs/swagger';
import { Account } from '../../database/schema';

export class AccountResponseDto {
  @ApiProperty({
    description: 'Ledger identity this account acts as',
    example: 'acct-V1StGXR8_Z5j',
  })
  identity!: string;

  @ApiProperty({
    description: 'Display name for the account holder',
    example: 'General Hospital credentialing office',
  })
  name!: string;

  @ApiProperty({
    description: 'Account status',
    example: 'active',
    enum: ['active', 'inactive'],
  })
  status!: string;

  @ApiProperty({
    description: 'Timestamp when the account was created',
    example: '2026-10-18T10:30:00.000Z',
  })
  createdAt!: Date;

  static fromEntity(account: Account): AccountResponseDto {
    return {
      identity: account.identity,
      name: account.name,
      status: account.status ?? 'active',
      createdAt: account.createdAt ?? new Date(),
    };
  }
}

export class CreateAccountResponseDto extends AccountResponseDto {
  @ApiProperty({
    description:
      'API key for authenticating requests. **IMPORTANT:** This is returned only once on creation. Store it securely.',
    example: 'sk-abc123def456ghi789jkl012mno345pq',
    readOnly: true,
  })
  apiKey!: string;

  static fromEntityWithKey(
    account: Account,
    apiKey: string,
  ): CreateAccountResponseDto {
    return {
      ...AccountResponseDto.fromEntity(account),
      apiKey,
    };
  }
}
