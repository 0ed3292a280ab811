import { Injectable, Inject } from '@nestjs/common';
import { DATABASE_CONNECTION } from './database.constants';
import type { Database, Executor } from './database.module';

@Injectable()
export class DatabaseService {
  constructor(@Inject(DATABASE_CONNECTION) private db: Database) {}

  // Direct access for simple queries
  get connection(): Database {
    return this.db;
  }

  // Everything `callback` runs commits together or not at all
  async transaction<T>(callback: (tx: Executor) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => callback(tx));
  }
}
