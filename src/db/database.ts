import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { Database as SqliteConnection, RunResult } from 'sqlite3';

export type SqlParam = string | number | null;

export interface RunInfo {
  changes: number;
  lastID: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS lists (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    description TEXT,
    icon TEXT NOT NULL DEFAULT '📋',
    color TEXT,
    is_inbox INTEGER NOT NULL DEFAULT 0,
    sort_order INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    synced_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tags (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    color TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    synced_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT,
    url TEXT,
    priority TEXT NOT NULL DEFAULT 'medium',
    completed INTEGER NOT NULL DEFAULT 0,
    list_id TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    completed_at TEXT,
    due_date TEXT,
    synced_at TEXT NOT NULL,
    FOREIGN KEY (list_id) REFERENCES lists(id)
  );

  CREATE TABLE IF NOT EXISTS task_tags (
    task_id TEXT NOT NULL,
    tag_id TEXT NOT NULL,
    created_at TEXT NOT NULL,
    synced_at TEXT NOT NULL,
    PRIMARY KEY (task_id, tag_id),
    FOREIGN KEY (task_id) REFERENCES tasks(id),
    FOREIGN KEY (tag_id) REFERENCES tags(id)
  );

  CREATE TABLE IF NOT EXISTS tombstones (
    record_type TEXT NOT NULL,
    id TEXT NOT NULL,
    deleted_at TEXT NOT NULL,
    synced_at TEXT NOT NULL,
    PRIMARY KEY (record_type, id)
  );

  CREATE TABLE IF NOT EXISTS device_sync (
    device_id TEXT PRIMARY KEY,
    last_sync TEXT NOT NULL
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_lists_inbox ON lists(is_inbox) WHERE is_inbox = 1;
  CREATE INDEX IF NOT EXISTS idx_lists_updated ON lists(updated_at);
  CREATE INDEX IF NOT EXISTS idx_lists_synced ON lists(synced_at);
  CREATE INDEX IF NOT EXISTS idx_tags_updated ON tags(updated_at);
  CREATE INDEX IF NOT EXISTS idx_tags_synced ON tags(synced_at);
  CREATE INDEX IF NOT EXISTS idx_tasks_list ON tasks(list_id);
  CREATE INDEX IF NOT EXISTS idx_tasks_updated ON tasks(updated_at);
  CREATE INDEX IF NOT EXISTS idx_tasks_synced ON tasks(synced_at);
  CREATE INDEX IF NOT EXISTS idx_task_tags_synced ON task_tags(synced_at);
  CREATE INDEX IF NOT EXISTS idx_tombstones_deleted ON tombstones(deleted_at);
  CREATE INDEX IF NOT EXISTS idx_tombstones_synced ON tombstones(synced_at);
`;

/**
 * Promise wrapper around a single sqlite3 connection.
 *
 * SQLite allows one writer at a time, so `transaction()` queues work on the
 * connection: each callback runs between BEGIN IMMEDIATE and COMMIT with no
 * other transaction interleaved, and is rolled back if it throws.
 */
export class Database {
  private db: SqliteConnection;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly filename: string = ':memory:') {
    this.db = new SqliteConnection(filename);
  }

  static async open(filename: string): Promise<Database> {
    if (filename !== ':memory:') {
      const dir = dirname(filename);
      if (dir && dir !== '.') {
        mkdirSync(dir, { recursive: true });
      }
    }
    const db = new Database(filename);
    await db.initialize();
    return db;
  }

  async initialize(): Promise<void> {
    await this.exec('PRAGMA foreign_keys = ON');
    if (this.filename !== ':memory:') {
      await this.exec('PRAGMA journal_mode = WAL');
    }
    await this.exec(SCHEMA);
  }

  run(sql: string, params: SqlParam[] = []): Promise<RunInfo> {
    return new Promise((resolve, reject) => {
      this.db.run(sql, params, function (this: RunResult, err: Error | null) {
        if (err) {
          reject(err);
        } else {
          resolve({ changes: this.changes, lastID: this.lastID });
        }
      });
    });
  }

  get<T>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.db.get(sql, params, (err: Error | null, row: T | undefined) => {
        if (err) {
          reject(err);
        } else {
          resolve(row);
        }
      });
    });
  }

  all<T>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.db.all(sql, params, (err: Error | null, rows: T[]) => {
        if (err) {
          reject(err);
        } else {
          resolve(rows);
        }
      });
    });
  }

  exec(sql: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.exec(sql, (err: Error | null) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  transaction<T>(work: () => Promise<T>): Promise<T> {
    const result = this.queue.then(async () => {
      await this.exec('BEGIN IMMEDIATE');
      try {
        const value = await work();
        await this.exec('COMMIT');
        return value;
      } catch (error) {
        await this.exec('ROLLBACK');
        throw error;
      }
    });
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err: Error | null) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}
