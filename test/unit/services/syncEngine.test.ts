import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SyncEngine, orderChanges } from '../../../src/services/syncEngine';
import { SqliteStorage } from '../../../src/stores/sqliteStorage';
import { SyncStorage, SyncStores } from '../../../src/stores/types';
import { SyncRecord } from '../../../src/types';
import { MemoryStorage } from '../../helpers/memoryStorage';
import { NOW, T0, T1, T2, T3, deleted, link, list, serverTime, tag, task } from '../../fixtures/records';

const backends: { name: string; open: () => Promise<SyncStorage> }[] = [
  { name: 'sqlite', open: () => SqliteStorage.open(':memory:') },
  { name: 'memory', open: async () => new MemoryStorage() },
];

// Wraps storage so the cursor write, or any task upsert, fails inside the transaction.
function failingAt(inner: SyncStorage, point: 'cursor' | 'task'): SyncStorage {
  const wrap = (stores: SyncStores): SyncStores => ({
    tombstones: stores.tombstones,
    records: {
      get: (kind, id) => stores.records.get(kind, id),
      exists: (kind, id) => stores.records.exists(kind, id),
      changedSince: (kind, since) => stores.records.changedSince(kind, since),
      findInbox: () => stores.records.findInbox(),
      upsertIfNewer: async (record, serverTime) => {
        if (point === 'task' && record.type === 'task') throw new Error('disk I/O error');
        return stores.records.upsertIfNewer(record, serverTime);
      },
    },
    cursors: {
      get: (deviceId) => stores.cursors.get(deviceId),
      latest: () => stores.cursors.latest(),
      set: async (deviceId, timestamp) => {
        if (point === 'cursor') throw new Error('disk I/O error');
        return stores.cursors.set(deviceId, timestamp);
      },
    },
  });

  return {
    transaction<T>(work: (stores: SyncStores) => Promise<T>): Promise<T> {
      return inner.transaction((stores) => work(wrap(stores)));
    },
    close: () => inner.close(),
  };
}

describe('orderChanges', () => {
  it('puts owners before dependents and deletions last, keeping arrival order within a kind', () => {
    const changes: SyncRecord[] = [
      deleted('tag', 'g9', T1),
      link('t1', 'g1', T1),
      task('t1', 'l1', T1),
      task('t2', 'l1', T1),
      tag('g1', T0),
      list('l1', T0),
    ];

    expect(orderChanges(changes).map((change) => change.type)).toEqual([
      'list',
      'tag',
      'task',
      'task',
      'task_tag',
      'deleted',
    ]);
    expect(orderChanges(changes).filter((c) => c.type === 'task')).toEqual([
      task('t1', 'l1', T1),
      task('t2', 'l1', T1),
    ]);
  });
});

describe.each(backends)('SyncEngine ($name)', ({ open }) => {
  let storage: SyncStorage;
  let engine: SyncEngine;
  let clock: number;

  beforeEach(async () => {
    clock = NOW;
    storage = await open();
    engine = new SyncEngine(storage, { now: () => clock });
  });

  afterEach(async () => {
    await storage.close();
  });

  describe('first sync', () => {
    it('sends a new device the whole live dataset and every tombstone', async () => {
      const first = await engine.sync('device-a', null, [
        list('l1', T0),
        tag('g1', T0),
        task('t1', 'l1', T1, { tag_ids: ['g1'] }),
        deleted('tag', 'g2', T1),
      ]);
      expect(first).toEqual({ server_time: serverTime(0), changes: [], conflicts: [], rejected: [] });

      const second = await engine.sync('device-b', null, []);

      expect(second.server_time).toBe(serverTime(1));
      expect(second.changes).toEqual([
        list('l1', T0),
        tag('g1', T0),
        task('t1', 'l1', T1, { tag_ids: ['g1'] }),
        link('t1', 'g1', T1),
        deleted('tag', 'g2', T1),
      ]);
    });

    it('records the cursor handed out', async () => {
      const response = await engine.sync('device-a', null, []);

      const cursor = await storage.transaction((stores) => stores.cursors.get('device-a'));
      expect(cursor).toBe(response.server_time);
    });
  });

  describe('last-write-wins', () => {
    const older = task('t1', 'l1', T1, { title: 'Old' });
    const newer = task('t1', 'l1', T2, { title: 'New' });

    it.each([
      ['older first', older, newer],
      ['newer first', newer, older],
    ])('converges on the newer version (%s)', async (_label, firstTask, secondTask) => {
      await engine.sync('device-x', null, [list('l1', T0), firstTask]);
      await engine.sync('device-y', null, [list('l1', T0), secondTask]);

      const observer = await engine.sync('device-z', null, []);

      expect(observer.changes).toEqual([list('l1', T0), newer]);
    });

    it('sends the winner back to a device whose write lost', async () => {
      await engine.sync('device-a', null, [list('l1', T0), newer]);
      const catchUp = await engine.sync('device-b', null, []);
      expect(catchUp.changes).toEqual([list('l1', T0), newer]);

      const stale = await engine.sync('device-b', catchUp.server_time, [older]);

      expect(stale.server_time).toBe(serverTime(2));
      expect(stale.changes).toEqual([newer]);
    });

    it('picks the same winner on equal timestamps regardless of arrival order', async () => {
      const alpha = task('t1', 'l1', T1, { title: 'Alpha' });
      const beta = task('t1', 'l1', T1, { title: 'Beta' });

      await engine.sync('device-x', null, [list('l1', T0), alpha]);
      const loser = await engine.sync('device-y', null, [beta]);
      expect(loser.changes).toEqual([list('l1', T0)]);

      const late = await engine.sync('device-x', serverTime(0), [alpha]);
      expect(late.changes).toEqual([beta]);
    });
  });

  describe('idempotence', () => {
    it('leaves state unchanged when the same batch is applied twice', async () => {
      const batch: SyncRecord[] = [list('l1', T0), tag('g1', T0), task('t1', 'l1', T1, { tag_ids: ['g1'] })];

      const first = await engine.sync('device-a', null, batch);
      const retry = await engine.sync('device-a', first.server_time, batch);
      expect(retry).toEqual({ server_time: serverTime(1), changes: [], conflicts: [], rejected: [] });

      const observer = await engine.sync('device-b', null, []);
      expect(observer.changes).toEqual([
        list('l1', T0),
        tag('g1', T0),
        task('t1', 'l1', T1, { tag_ids: ['g1'] }),
        link('t1', 'g1', T1),
      ]);
    });
  });

  describe('failures', () => {
    it.each(['cursor', 'task'] as const)('commits nothing when the %s write fails', async (point) => {
      const broken = new SyncEngine(failingAt(storage, point), { now: () => clock });

      await expect(
        broken.sync('device-a', null, [
          list('l1', T0),
          tag('g1', T0),
          task('t1', 'l1', T1, { tag_ids: ['g1'] }),
          deleted('tag', 'g2', T1),
        ])
      ).rejects.toThrow('disk I/O error');

      expect(await storage.transaction((stores) => stores.cursors.get('device-a'))).toBeUndefined();
      const observer = await engine.sync('device-b', null, []);
      expect(observer).toEqual({ server_time: serverTime(0), changes: [], conflicts: [], rejected: [] });
    });
  });

  describe('retries', () => {
    it('resends a batch the device applied when it retries with the same last_sync', async () => {
      const first = await engine.sync('device-a', null, []);
      const batch: SyncRecord[] = [list('l1', T0), task('t1', 'l1', T1)];

      const applied = await engine.sync('device-a', first.server_time, batch);
      expect(applied.changes).toEqual([]);

      const retry = await engine.sync('device-a', first.server_time, batch);
      expect(retry).toEqual({
        server_time: serverTime(2),
        changes: [list('l1', T0), task('t1', 'l1', T1)],
        conflicts: [],
        rejected: [],
      });

      const next = await engine.sync('device-a', retry.server_time, []);
      expect(next.changes).toEqual([]);
    });
  });

  describe('deletions', () => {
    it('blocks an edit at or before the deletion time and returns the tombstone', async () => {
      const created = await engine.sync('device-a', null, [tag('g1', T1)]);
      const removal = await engine.sync('device-b', null, [deleted('tag', 'g1', T2)]);
      expect(removal.changes).toEqual([]);

      const edit = await engine.sync('device-a', created.server_time, [tag('g1', T2, { name: 'Renamed' })]);

      expect(edit.changes).toEqual([deleted('tag', 'g1', T2)]);
      expect(edit.rejected).toEqual([]);
    });

    it('lets an edit made after the deletion bring the record back', async () => {
      await engine.sync('device-a', null, [tag('g1', T1)]);
      await engine.sync('device-b', null, [deleted('tag', 'g1', T2)]);

      const revive = await engine.sync('device-a', serverTime(1), [tag('g1', T3, { name: 'Revived' })]);
      expect(revive.changes).toEqual([]);

      const observer = await engine.sync('device-c', null, []);
      expect(observer.changes).toEqual([tag('g1', T3, { name: 'Revived' })]);
    });

    it('returns the live record when the deletion is older than the stored edit', async () => {
      await engine.sync('device-a', null, [tag('g1', T2)]);

      const late = await engine.sync('device-b', null, [deleted('tag', 'g1', T1)]);

      expect(late.changes).toEqual([tag('g1', T2)]);
    });

    it('keeps the latest tombstone when deletions arrive out of order', async () => {
      await engine.sync('device-a', null, [deleted('task', 't1', T2)]);
      const older = await engine.sync('device-b', null, [deleted('task', 't1', T1)]);

      expect(older.changes).toEqual([deleted('task', 't1', T2)]);
    });

    it('hides a removed tag link from its task', async () => {
      const setup = await engine.sync('device-a', null, [
        list('l1', T0),
        tag('g1', T0),
        task('t1', 'l1', T1, { tag_ids: ['g1'] }),
      ]);
      const unlink = await engine.sync('device-a', setup.server_time, [deleted('task_tag', 't1:g1', T2)]);
      expect(unlink.changes).toEqual([]);

      const observer = await engine.sync('device-b', null, []);
      expect(observer.changes).toEqual([
        list('l1', T0),
        tag('g1', T0),
        task('t1', 'l1', T1),
        deleted('task_tag', 't1:g1', T2),
      ]);
    });
  });

  describe('tag links of deleted records', () => {
    const setup: SyncRecord[] = [list('l1', T0), tag('g1', T0), task('t1', 'l1', T1, { tag_ids: ['g1'] })];

    it('stops sending the links of a deleted task', async () => {
      const first = await engine.sync('device-a', null, setup);
      const removal = await engine.sync('device-a', first.server_time, [deleted('task', 't1', T2)]);
      expect(removal.changes).toEqual([]);

      const observer = await engine.sync('device-b', null, []);

      expect(observer.changes).toEqual([list('l1', T0), tag('g1', T0), deleted('task', 't1', T2)]);
    });

    it('drops a deleted tag from its tasks', async () => {
      const first = await engine.sync('device-a', null, setup);
      await engine.sync('device-a', first.server_time, [deleted('tag', 'g1', T2)]);

      const observer = await engine.sync('device-b', null, []);

      expect(observer.changes).toEqual([list('l1', T0), task('t1', 'l1', T1), deleted('tag', 'g1', T2)]);
    });

    it('shows the links again when the tag is edited after its deletion', async () => {
      const first = await engine.sync('device-a', null, setup);
      const removal = await engine.sync('device-a', first.server_time, [deleted('tag', 'g1', T2)]);
      await engine.sync('device-a', removal.server_time, [tag('g1', T3)]);

      const observer = await engine.sync('device-b', null, []);

      expect(observer.changes).toEqual([
        list('l1', T0),
        tag('g1', T3),
        task('t1', 'l1', T1, { tag_ids: ['g1'] }),
        link('t1', 'g1', T1),
      ]);
    });
  });

  describe('delta computation', () => {
    it('delivers a write stamped with an old client clock to a device that synced before it', async () => {
      const a = await engine.sync('device-a', null, [list('l1', T0)]);
      const b = await engine.sync('device-b', null, []);
      expect(b.changes).toEqual([list('l1', T0)]);

      await engine.sync('device-a', a.server_time, [task('t1', 'l1', T0)]);
      const next = await engine.sync('device-b', b.server_time, []);

      expect(next.server_time).toBe(serverTime(3));
      expect(next.changes).toEqual([task('t1', 'l1', T0)]);
    });

    it('does not echo a device its own changes', async () => {
      const a = await engine.sync('device-a', null, [list('l1', T0)]);
      const b = await engine.sync('device-b', null, [tag('g1', T1)]);
      expect(b.changes).toEqual([list('l1', T0)]);

      const next = await engine.sync('device-a', a.server_time, [task('t1', 'l1', T1)]);

      expect(next.changes).toEqual([tag('g1', T1)]);
    });

    it('redelivers changes when a device retries with its previous cursor', async () => {
      const a = await engine.sync('device-a', null, [list('l1', T0)]);
      await engine.sync('device-b', null, [tag('g1', T1)]);

      const delivered = await engine.sync('device-a', a.server_time, []);
      const retried = await engine.sync('device-a', a.server_time, []);

      expect(delivered.changes).toEqual([tag('g1', T1)]);
      expect(retried.changes).toEqual([tag('g1', T1)]);
    });

    it('sends a task another device updated after this one last synced', async () => {
      const x = await engine.sync('device-x', null, [list('l1', T0), task('t1', 'l1', T1, { title: 'A' })]);
      await engine.sync('device-y', null, [task('t1', 'l1', T2, { title: 'B' })]);

      const next = await engine.sync('device-x', x.server_time, []);

      expect(next.changes).toEqual([task('t1', 'l1', T2, { title: 'B' })]);
    });

    it('replaces a task tag set with the one it last carried', async () => {
      const setup = await engine.sync('device-a', null, [
        list('l1', T0),
        tag('g1', T0),
        tag('g2', T0),
        task('t1', 'l1', T1, { tag_ids: ['g1', 'g2'] }),
      ]);
      await engine.sync('device-a', setup.server_time, [task('t1', 'l1', T2, { tag_ids: ['g2'] })]);

      const observer = await engine.sync('device-b', null, []);

      expect(observer.changes).toEqual([
        list('l1', T0),
        tag('g1', T0),
        tag('g2', T0),
        task('t1', 'l1', T2, { tag_ids: ['g2'] }),
        link('t1', 'g2', T1),
      ]);
    });
  });

  describe('references', () => {
    it('accepts a task whose list was deleted and leaves it in place', async () => {
      const x = await engine.sync('device-x', null, [list('l1', T0)]);
      await engine.sync('device-x', x.server_time, [deleted('list', 'l1', T3)]);

      const y = await engine.sync('device-y', null, [task('t1', 'l1', T2)]);
      expect(y.rejected).toEqual([]);
      expect(y.changes).toEqual([deleted('list', 'l1', T3)]);

      const observer = await engine.sync('device-z', null, []);
      expect(observer.changes).toEqual([task('t1', 'l1', T2), deleted('list', 'l1', T3)]);
    });

    it('rejects changes that name records the server has never stored', async () => {
      const response = await engine.sync('device-a', null, [
        task('t9', 'missing', T1),
        link('t8', 'g1', T1),
        task('t7', 'l1', T1, { tag_ids: ['nope'] }),
        list('l1', T0),
      ]);

      expect(response.rejected).toEqual([
        { type: 'task', id: 't9', reason: 'Unknown list missing' },
        { type: 'task', id: 't7', reason: 'Unknown tag nope' },
        { type: 'task_tag', id: 't8:g1', reason: 'Unknown task t8' },
      ]);
      expect(response.changes).toEqual([]);

      const observer = await engine.sync('device-b', null, []);
      expect(observer.changes).toEqual([list('l1', T0)]);
    });
  });

  describe('inbox', () => {
    const inbox = list('inbox', T0, { is_inbox: true });

    it('rejects a second inbox list', async () => {
      const response = await engine.sync('device-a', null, [inbox, list('other', T0, { is_inbox: true })]);

      expect(response.rejected).toEqual([
        { type: 'list', id: 'other', reason: 'List inbox is already the inbox' },
      ]);
    });

    it('refuses to delete the inbox and sends it back', async () => {
      const first = await engine.sync('device-a', null, [inbox]);

      const response = await engine.sync('device-a', first.server_time, [deleted('list', 'inbox', T1)]);

      expect(response.rejected).toEqual([
        { type: 'deleted', id: 'inbox', reason: 'The inbox list cannot be deleted' },
      ]);
      expect(response.changes).toEqual([inbox]);
    });
  });

  describe('server time', () => {
    it('never goes backwards when the clock does', async () => {
      const first = await engine.sync('device-a', null, []);
      clock = NOW - 60 * 60 * 1000;
      const second = await engine.sync('device-b', null, []);

      expect(first.server_time).toBe(serverTime(0));
      expect(second.server_time).toBe(serverTime(1));
    });

    it('follows the clock when it is ahead of every cursor', async () => {
      await engine.sync('device-a', null, []);
      clock = NOW + 60 * 1000;

      const response = await engine.sync('device-a', serverTime(0), []);

      expect(response.server_time).toBe('2024-05-01T12:01:00.000Z');
    });
  });
});
