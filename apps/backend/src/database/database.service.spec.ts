import { Test, TestingModule } from '@nestjs/testing';
import { DatabaseService } from './database.service';
import { DATABASE_CONNECTION } from './database.constants';
import type { Executor } from './database.module';

describe('DatabaseService', () => {
  let service: DatabaseService;
  let mockDb: { transaction: jest.Mock; select: jest.Mock };

  beforeEach(async () => {
    mockDb = {
      transaction: jest.fn(),
      select: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DatabaseService,
        {
          provide: DATABASE_CONNECTION,
          useValue: mockDb,
        },
      ],
    }).compile();

    service = module.get<DatabaseService>(DatabaseService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('connection getter', () => {
    it('should return the database connection', () => {
      expect(service.connection).toBe(mockDb);
    });
  });

  describe('transaction', () => {
    it('should run the callback with the transaction handle', async () => {
      const mockTx = { select: jest.fn() };
      const callback = jest.fn().mockResolvedValue('result');

      mockDb.transaction.mockImplementation(
        async (cb: (tx: Executor) => Promise<unknown>) =>
          cb(mockTx as unknown as Executor),
      );

      const result = await service.transaction(callback);

      expect(result).toBe('result');
      expect(mockDb.transaction).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith(mockTx);
    });

    it('should propagate errors from the callback', async () => {
      const callback = jest.fn().mockRejectedValue(new Error('Rollback error'));

      mockDb.transaction.mockImplementation(
        async (cb: (tx: Executor) => Promise<unknown>) =>
          cb({} as unknown as Executor),
      );

      await expect(service.transaction(callback)).rejects.toThrow(
        'Rollback error',
      );
    });
  });
});
