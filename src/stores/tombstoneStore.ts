import { Database } from '../db/database';
import { supersedesTombstone } from '../services/conflictResolver';
import { RECORD_KINDS, RecordKind, Tombstone, UpsertOutcome } from '../types';
import { TombstoneStore } from './types';

interface TombstoneRow {
  id: string;
  record_type: string;
  deleted_at: string;
}

function isRecordKind(value: string): value is RecordKind {
  return RECORD_KINDS.some((kind) => kind === value);
}

function mapRowToTombstone(row: TombstoneRow): Tombstone {
  if (!isRecordKind(row.record_type)) {
    throw new Error(`Unknown record type in tombstones table: ${row.record_type}`);
  }
  return { id: row.id, record_type: row.record_type, deleted_at: row.deleted_at };
}

export class SqliteTombstoneStore implements TombstoneStore {
  constructor(private db: Database) {}

  async get(kind: RecordKind, id: string): Promise<Tombstone | undefined> {
    const row = await this.db.get<TombstoneRow>(
      'SELECT id, record_type, deleted_at FROM tombstones WHERE record_type = ? AND id = ?',
      [kind, id]
    );
    return row ? mapRowToTombstone(row) : undefined;
  }

  async put(tombstone: Tombstone, serverTime: string): Promise<UpsertOutcome> {
    const existing = await this.get(tombstone.record_type, tombstone.id);
    if (!supersedesTombstone(tombstone, existing)) {
      return 'skipped';
    }
    await this.db.run(
      `INSERT INTO tombstones (record_type, id, deleted_at, synced_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(record_type, id) DO UPDATE SET
         deleted_at = excluded.deleted_at,
         synced_at = excluded.synced_at`,
      [tombstone.record_type, tombstone.id, tombstone.deleted_at, serverTime]
    );
    return 'applied';
  }

  async changedSince(since: string | null): Promise<Tombstone[]> {
    const rows =
      since === null
        ? await this.db.all<TombstoneRow>(
            'SELECT id, record_type, deleted_at FROM tombstones ORDER BY deleted_at, record_type, id'
          )
        : await this.db.all<TombstoneRow>(
            `SELECT id, record_type, deleted_at FROM tombstones
             WHERE deleted_at > ? OR synced_at > ?
             ORDER BY deleted_at, record_type, id`,
            [since, since]
          );
    return rows.map(mapRowToTombstone);
  }
}
