import { Database } from '../db/database';
import { SqliteCursorStore } from './cursorStore';
import { SqliteRecordStore } from './recordStore';
import { SqliteTombstoneStore } from './tombstoneStore';
import { SyncStorage, SyncStores } from './types';

export class SqliteStorage implements SyncStorage {
  private stores: SyncStores;

  constructor(private db: Database) {
    this.stores = {
      records: new SqliteRecordStore(db),
      tombstones: new SqliteTombstoneStore(db),
      cursors: new SqliteCursorStore(db),
    };
  }

  static async open(filename: string): Promise<SqliteStorage> {
    return new SqliteStorage(await Database.open(filename));
  }

  transaction<T>(work: (stores: SyncStores) => Promise<T>): Promise<T> {
    return this.db.transaction(() => work(this.stores));
  }

  close(): Promise<void> {
    return this.db.close();
  }
}
