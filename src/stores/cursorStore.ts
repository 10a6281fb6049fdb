import { Database } from '../db/database';
import { InvariantViolationError } from '../errors';
import { CursorStore } from './types';

export class SqliteCursorStore implements CursorStore {
  constructor(private db: Database) {}

  async get(deviceId: string): Promise<string | undefined> {
    const row = await this.db.get<{ last_sync: string }>(
      'SELECT last_sync FROM device_sync WHERE device_id = ?',
      [deviceId]
    );
    return row?.last_sync;
  }

  async set(deviceId: string, timestamp: string): Promise<void> {
    const current = await this.get(deviceId);
    if (current !== undefined && timestamp < current) {
      throw new InvariantViolationError(
        `Cursor for device ${deviceId} would move backwards from ${current} to ${timestamp}`
      );
    }
    await this.db.run(
      `INSERT INTO device_sync (device_id, last_sync) VALUES (?, ?)
       ON CONFLICT(device_id) DO UPDATE SET last_sync = excluded.last_sync`,
      [deviceId, timestamp]
    );
  }

  async latest(): Promise<string | undefined> {
    const row = await this.db.get<{ latest: string | null }>(
      'SELECT MAX(last_sync) AS latest FROM device_sync'
    );
    return row?.latest ?? undefined;
  }
}
