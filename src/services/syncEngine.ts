import pino, { Logger } from 'pino';
import { SyncStorage, SyncStores } from '../stores/types';
import {
  LiveRecord,
  RECORD_KINDS,
  RecordKind,
  RejectedChange,
  SyncRecord,
  SyncResponse,
  Tombstone,
  changeKey,
  recordId,
  taskTagId,
  versionOf,
} from '../types';
import { compareVersions, isShadowedBy } from './conflictResolver';

export interface SyncEngineOptions {
  logger?: Logger;
  /** Milliseconds since the epoch; injectable for tests. */
  now?: () => number;
}

// Owners before dependents, deletions last.
const APPLY_ORDER: Record<SyncRecord['type'], number> = {
  list: 0,
  tag: 1,
  task: 2,
  task_tag: 3,
  deleted: 4,
};

interface BatchState {
  serverTime: string;
  /** Changes this device wrote in this call; never echoed back. */
  applied: Set<string>;
  rejected: RejectedChange[];
  /** Records where the device's version lost; the winner is always sent back. */
  contested: Map<string, { kind: RecordKind; id: string }>;
}

export function orderChanges(changes: SyncRecord[]): SyncRecord[] {
  return [...changes].sort((a, b) => APPLY_ORDER[a.type] - APPLY_ORDER[b.type]);
}

function toChange(tombstone: Tombstone): SyncRecord {
  return { type: 'deleted', ...tombstone };
}

export class SyncEngine {
  private logger: Logger;
  private now: () => number;

  constructor(private storage: SyncStorage, options: SyncEngineOptions = {}) {
    this.logger = options.logger ?? pino({ level: 'silent' });
    this.now = options.now ?? Date.now;
  }

  /**
   * Applies a device's changes and returns everything it has not seen yet.
   * Runs as one storage transaction: either the whole batch and the cursor
   * advance commit, or nothing does.
   */
  async sync(deviceId: string, lastSync: string | null, changes: SyncRecord[]): Promise<SyncResponse> {
    const log = this.logger.child({ deviceId });
    log.debug({ lastSync, incoming: changes.length }, 'Sync started');

    const response = await this.storage.transaction(async (stores) => {
      const serverTime = await this.nextServerTime(stores);
      const previous = await stores.cursors.get(deviceId);
      const baseline =
        lastSync === null ? null : previous !== undefined && previous < lastSync ? previous : lastSync;

      const batch: BatchState = {
        serverTime,
        applied: new Set(),
        rejected: [],
        contested: new Map(),
      };
      for (const change of orderChanges(changes)) {
        if (change.type === 'deleted') {
          await this.applyDeletion(stores, change, batch);
        } else {
          await this.applyUpsert(stores, change, batch);
        }
      }

      const outgoing = await this.collectChanges(stores, baseline, batch);
      await stores.cursors.set(deviceId, serverTime);

      return {
        server_time: serverTime,
        changes: outgoing,
        conflicts: [],
        rejected: batch.rejected,
      };
    });

    for (const rejection of response.rejected) {
      log.warn(rejection, 'Change rejected');
    }
    log.info(
      {
        lastSync,
        incoming: changes.length,
        outgoing: response.changes.length,
        rejected: response.rejected.length,
        serverTime: response.server_time,
      },
      'Sync complete'
    );
    return response;
  }

  // Strictly after every cursor already issued, so a change committed after
  // a device synced always carries a later server time than that cursor.
  private async nextServerTime(stores: SyncStores): Promise<string> {
    let ms = this.now();
    const latest = await stores.cursors.latest();
    if (latest !== undefined) {
      ms = Math.max(ms, Date.parse(latest) + 1);
    }
    return new Date(ms).toISOString();
  }

  private async applyUpsert(stores: SyncStores, record: LiveRecord, batch: BatchState): Promise<void> {
    const kind = record.type;
    const id = recordId(record);

    const tombstone = await stores.tombstones.get(kind, id);
    if (isShadowedBy(versionOf(record), tombstone)) {
      this.contest(batch, kind, id);
      return;
    }

    const problem = await this.checkReferences(stores, record);
    if (problem) {
      batch.rejected.push({ type: kind, id, reason: problem });
      return;
    }

    const outcome = await stores.records.upsertIfNewer(record, batch.serverTime);
    if (outcome === 'applied') {
      batch.applied.add(changeKey(record));
      if (record.type === 'task') {
        for (const tagId of record.tag_ids) {
          batch.applied.add(`task_tag/${taskTagId({ task_id: record.id, tag_id: tagId })}`);
        }
      }
      return;
    }

    const stored = await stores.records.get(kind, id);
    if (stored && compareVersions(record, stored) !== 0) {
      this.contest(batch, kind, id);
    }
  }

  private async applyDeletion(
    stores: SyncStores,
    change: Extract<SyncRecord, { type: 'deleted' }>,
    batch: BatchState
  ): Promise<void> {
    const tombstone: Tombstone = {
      id: change.id,
      record_type: change.record_type,
      deleted_at: change.deleted_at,
    };

    if (tombstone.record_type === 'list') {
      const inbox = await stores.records.findInbox();
      if (inbox?.id === tombstone.id) {
        batch.rejected.push({ type: 'deleted', id: tombstone.id, reason: 'The inbox list cannot be deleted' });
        this.contest(batch, 'list', tombstone.id);
        return;
      }
    }

    const outcome = await stores.tombstones.put(tombstone, batch.serverTime);
    if (outcome === 'applied') {
      batch.applied.add(changeKey(change));
    }

    // A record edited after this deletion outlives it.
    const live = await stores.records.get(tombstone.record_type, tombstone.id);
    if (live) {
      this.contest(batch, tombstone.record_type, tombstone.id);
      return;
    }
    if (outcome === 'skipped') {
      const current = await stores.tombstones.get(tombstone.record_type, tombstone.id);
      if (current && current.deleted_at !== tombstone.deleted_at) {
        this.contest(batch, tombstone.record_type, tombstone.id);
      }
    }
  }

  /** Reason the record cannot be stored, or undefined when its owners are known. */
  private async checkReferences(stores: SyncStores, record: LiveRecord): Promise<string | undefined> {
    const { records } = stores;
    switch (record.type) {
      case 'list': {
        if (!record.is_inbox) return undefined;
        const inbox = await records.findInbox();
        return inbox && inbox.id !== record.id
          ? `List ${inbox.id} is already the inbox`
          : undefined;
      }
      case 'tag':
        return undefined;
      case 'task': {
        if (!(await records.exists('list', record.list_id))) {
          return `Unknown list ${record.list_id}`;
        }
        for (const tagId of record.tag_ids) {
          if (!(await records.exists('tag', tagId))) {
            return `Unknown tag ${tagId}`;
          }
        }
        return undefined;
      }
      case 'task_tag': {
        if (!(await records.exists('task', record.task_id))) {
          return `Unknown task ${record.task_id}`;
        }
        if (!(await records.exists('tag', record.tag_id))) {
          return `Unknown tag ${record.tag_id}`;
        }
        return undefined;
      }
    }
  }

  private contest(batch: BatchState, kind: RecordKind, id: string): void {
    batch.contested.set(`${kind}/${id}`, { kind, id });
  }

  private async collectChanges(
    stores: SyncStores,
    baseline: string | null,
    batch: BatchState
  ): Promise<SyncRecord[]> {
    const outgoing: SyncRecord[] = [];
    const seen = new Set<string>();
    const push = (change: SyncRecord) => {
      const key = changeKey(change);
      if (batch.applied.has(key) || seen.has(key)) return;
      seen.add(key);
      outgoing.push(change);
    };

    for (const kind of RECORD_KINDS) {
      for (const record of await stores.records.changedSince(kind, baseline)) {
        push(record);
      }
    }

    for (const tombstone of await stores.tombstones.changedSince(baseline)) {
      // Superseded by a later edit of the same record.
      if (await stores.records.get(tombstone.record_type, tombstone.id)) continue;
      push(toChange(tombstone));
    }

    for (const { kind, id } of batch.contested.values()) {
      const live = await stores.records.get(kind, id);
      if (live) {
        push(live);
        continue;
      }
      const tombstone = await stores.tombstones.get(kind, id);
      if (tombstone) {
        push(toChange(tombstone));
      }
    }

    return outgoing;
  }
}
