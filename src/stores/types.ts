import { List, LiveRecord, RecordKind, Tombstone, UpsertOutcome } from '../types';

/**
 * Current state of every synced entity. Rows hidden by a tombstone whose
 * `deleted_at` is at or after the row's version are never returned by
 * `get` or `changedSince`, even while they remain stored.
 */
export interface RecordStore {
  get(kind: RecordKind, id: string): Promise<LiveRecord | undefined>;
  /** True when a row is stored for the id, visible or not. */
  exists(kind: RecordKind, id: string): Promise<boolean>;
  /** Writes the record when it wins last-write-wins against the stored row. */
  upsertIfNewer(record: LiveRecord, serverTime: string): Promise<UpsertOutcome>;
  /** Visible rows whose version or server write time is after `since`; every visible row when null. */
  changedSince(kind: RecordKind, since: string | null): Promise<LiveRecord[]>;
  findInbox(): Promise<List | undefined>;
}

export interface TombstoneStore {
  get(kind: RecordKind, id: string): Promise<Tombstone | undefined>;
  /** Records the deletion unless a tombstone at the same or a later time exists. */
  put(tombstone: Tombstone, serverTime: string): Promise<UpsertOutcome>;
  changedSince(since: string | null): Promise<Tombstone[]>;
}

export interface CursorStore {
  get(deviceId: string): Promise<string | undefined>;
  /** Throws InvariantViolationError if `timestamp` is before the stored cursor. */
  set(deviceId: string, timestamp: string): Promise<void>;
  /** Greatest cursor handed to any device. */
  latest(): Promise<string | undefined>;
}

export interface SyncStores {
  records: RecordStore;
  tombstones: TombstoneStore;
  cursors: CursorStore;
}

/** Storage handle injected into the sync engine. */
export interface SyncStorage {
  transaction<T>(work: (stores: SyncStores) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
