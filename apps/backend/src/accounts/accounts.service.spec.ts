import { Test, TestingModule } from '@nestjs/testing';
import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import { AccountsService } from './accounts.service';
import { DATABASE_CONNECTION } from '../database/database.constants';
import * as schema from '../database/schema';

jest.mock('../common/utils/crypto.utils', () => ({
  generateAccountIdentity: jest.fn(() => 'acct-abc123'),
  generateApiKey: jest.fn(() => 'sk-test-api-key-123'),
  hashApiKey: jest.fn((key: string) => `hashed-${key}`),
}));

describe('AccountsService', () => {
  let service: AccountsService;
  let mockDb: { insert: jest.Mock; select: jest.Mock };
  let mockLogger: { info: jest.Mock };
  let env: Record<string, string | undefined>;

  const mockAccount: schema.Account = {
    id: 'uuid-123',
    identity: 'acct-abc123',
    apiKeyHash: 'hashed-sk-test-api-key-123',
    name: 'General Hospital credentialing office',
    status: 'active',
    createdAt: new Date('2026-10-18T00:00:00.000Z'),
    updatedAt: new Date('2026-10-18T00:00:00.000Z'),
  };

  const mockSelectResult = (rows: schema.Account[]) => {
    const mockLimit = jest.fn().mockResolvedValue(rows);
    const mockWhere = jest.fn().mockReturnValue({ limit: mockLimit });
    const mockFrom = jest.fn().mockReturnValue({ where: mockWhere });
    mockDb.select.mockReturnValue({ from: mockFrom });
  };

  beforeEach(async () => {
    mockDb = { insert: jest.fn(), select: jest.fn() };
    mockLogger = { info: jest.fn() };
    env = { OWNER_ID: 'owner-1', OWNER_API_KEY: undefined };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AccountsService,
        { provide: DATABASE_CONNECTION, useValue: mockDb },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => env[key]) },
        },
        { provide: WINSTON_MODULE_PROVIDER, useValue: mockLogger },
      ],
    }).compile();

    service = module.get<AccountsService>(AccountsService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('create', () => {
    it('should store a generated identity with the hashed key', async () => {
      const mockReturning = jest.fn().mockResolvedValue([mockAccount]);
      const mockValues = jest.fn().mockReturnValue({ returning: mockReturning });
      mockDb.insert.mockReturnValue({ values: mockValues });

      const result = await service.create({
        name: 'General Hospital credentialing office',
      });

      expect(mockDb.insert).toHaveBeenCalledWith(schema.accounts);
      expect(mockValues).toHaveBeenCalledWith({
        identity: 'acct-abc123',
        apiKeyHash: 'hashed-sk-test-api-key-123',
        name: 'General Hospital credentialing office',
      });
      expect(result).toEqual({
        account: mockAccount,
        apiKey: 'sk-test-api-key-123',
      });
    });
  });

  describe('findByIdentity', () => {
    it('should return the account', async () => {
      mockSelectResult([mockAccount]);

      await expect(service.findByIdentity('acct-abc123')).resolves.toEqual(
        mockAccount,
      );
    });

    it('should throw NotFoundException when missing', async () => {
      mockSelectResult([]);

      await expect(service.findByIdentity('acct-missing')).rejects.toThrow(
        new NotFoundException('Account acct-missing not found'),
      );
    });
  });

  describe('findByApiKey', () => {
    it('should return an active account', async () => {
      mockSelectResult([mockAccount]);

      await expect(
        service.findByApiKey('sk-test-api-key-123'),
      ).resolves.toEqual(mockAccount);
    });

    it('should reject an inactive account', async () => {
      mockSelectResult([{ ...mockAccount, status: 'inactive' }]);

      await expect(service.findByApiKey('sk-test-api-key-123')).rejects.toThrow(
        new NotFoundException('Invalid API key'),
      );
    });

    it('should reject an unknown key', async () => {
      mockSelectResult([]);

      await expect(service.findByApiKey('sk-unknown')).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  describe('seedOwner', () => {
    it('should do nothing without OWNER_API_KEY', async () => {
      await service.seedOwner();

      expect(mockDb.insert).not.toHaveBeenCalled();
    });

    it('should upsert the owner account with the configured key', async () => {
      env.OWNER_API_KEY = 'sk-test-owner-key';
      const mockOnConflict = jest.fn().mockResolvedValue([]);
      const mockValues = jest
        .fn()
        .mockReturnValue({ onConflictDoUpdate: mockOnConflict });
      mockDb.insert.mockReturnValue({ values: mockValues });

      await service.onApplicationBootstrap();

      expect(mockValues).toHaveBeenCalledWith({
        identity: 'owner-1',
        apiKeyHash: 'hashed-sk-test-owner-key',
        name: 'Registry owner',
      });
      expect(mockOnConflict).toHaveBeenCalledWith({
        target: schema.accounts.identity,
        set: {
          apiKeyHash: 'hashed-sk-test-owner-key',
          status: 'active',
          updatedAt: expect.any(Date),
        },
      });
      expect(mockLogger.info).toHaveBeenCalledWith('Owner account ready', {
        identity: 'owner-1',
      });
    });
  });
});
