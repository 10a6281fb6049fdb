import { Database, SqlParam } from '../db/database';
import { shouldReplace } from '../services/conflictResolver';
import {
  List,
  LiveRecord,
  Priority,
  RecordKind,
  TASK_TAG_SEPARATOR,
  UpsertOutcome,
  splitTaskTagId,
} from '../types';
import { RecordStore } from './types';

interface ListRow {
  id: string;
  name: string;
  description: string | null;
  icon: string;
  color: string | null;
  is_inbox: number;
  sort_order: number;
  created_at: string;
  updated_at: string;
}

interface TagRow {
  id: string;
  name: string;
  color: string;
  created_at: string;
  updated_at: string;
}

interface TaskRow {
  id: string;
  title: string;
  description: string | null;
  url: string | null;
  priority: string;
  completed: number;
  list_id: string;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
  due_date: string | null;
  tag_ids_json: string | null;
}

interface TaskTagRow {
  task_id: string;
  tag_id: string;
  created_at: string;
}

const LINK_ID = (alias: string) =>
  `${alias}.task_id || '${TASK_TAG_SEPARATOR}' || ${alias}.tag_id`;

const hiddenBy = (kind: RecordKind, idExpr: string, versionExpr: string) =>
  `EXISTS (SELECT 1 FROM tombstones d WHERE d.record_type = '${kind}' AND d.id = ${idExpr} AND d.deleted_at >= ${versionExpr})`;

// A link shows only while it, its task and its tag are all visible.
function linkVisible(alias: string): string {
  return [
    `NOT ${hiddenBy('task_tag', LINK_ID(alias), `${alias}.created_at`)}`,
    `EXISTS (SELECT 1 FROM tasks ot WHERE ot.id = ${alias}.task_id AND NOT ${hiddenBy('task', 'ot.id', 'ot.updated_at')})`,
    `EXISTS (SELECT 1 FROM tags og WHERE og.id = ${alias}.tag_id AND NOT ${hiddenBy('tag', 'og.id', 'og.updated_at')})`,
  ].join(' AND ');
}

interface TableDef {
  table: string;
  columns: string;
  idExpr: string;
  version: string;
}

const TABLES: Record<RecordKind, TableDef> = {
  list: {
    table: 'lists',
    columns:
      'r.id, r.name, r.description, r.icon, r.color, r.is_inbox, r.sort_order, r.created_at, r.updated_at',
    idExpr: 'r.id',
    version: 'r.updated_at',
  },
  tag: {
    table: 'tags',
    columns: 'r.id, r.name, r.color, r.created_at, r.updated_at',
    idExpr: 'r.id',
    version: 'r.updated_at',
  },
  task: {
    table: 'tasks',
    columns: `r.id, r.title, r.description, r.url, r.priority, r.completed, r.list_id,
      r.created_at, r.updated_at, r.completed_at, r.due_date,
      (SELECT json_group_array(tt.tag_id) FROM task_tags tt
        WHERE tt.task_id = r.id AND ${linkVisible('tt')}) AS tag_ids_json`,
    idExpr: 'r.id',
    version: 'r.updated_at',
  },
  task_tag: {
    table: 'task_tags',
    columns: 'r.task_id, r.tag_id, r.created_at',
    idExpr: LINK_ID('r'),
    version: 'r.created_at',
  },
};

function visible(kind: RecordKind): string {
  if (kind === 'task_tag') return linkVisible('r');
  const def = TABLES[kind];
  return `NOT ${hiddenBy(kind, def.idExpr, def.version)}`;
}

function toPriority(value: string): Priority {
  switch (value) {
    case 'low':
    case 'high':
    case 'urgent':
      return value;
    default:
      return 'medium';
  }
}

function parseTagIds(json: string | null): string[] {
  if (!json) return [];
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((value): value is string => typeof value === 'string').sort();
}

function rowToList(row: ListRow): List {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    icon: row.icon,
    color: row.color,
    is_inbox: Boolean(row.is_inbox),
    sort_order: row.sort_order,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

function mapRowToList(row: ListRow): LiveRecord {
  return { type: 'list', ...rowToList(row) };
}

function mapRowToTag(row: TagRow): LiveRecord {
  return {
    type: 'tag',
    id: row.id,
    name: row.name,
    color: row.color,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

function mapRowToTask(row: TaskRow): LiveRecord {
  return {
    type: 'task',
    id: row.id,
    title: row.title,
    description: row.description,
    url: row.url,
    priority: toPriority(row.priority),
    completed: Boolean(row.completed),
    list_id: row.list_id,
    tag_ids: parseTagIds(row.tag_ids_json),
    created_at: row.created_at,
    updated_at: row.updated_at,
    completed_at: row.completed_at,
    due_date: row.due_date,
  };
}

function mapRowToTaskTag(row: TaskTagRow): LiveRecord {
  return {
    type: 'task_tag',
    task_id: row.task_id,
    tag_id: row.tag_id,
    created_at: row.created_at,
  };
}

/**
 * Record store over the SQLite tables. Deleted rows are kept so that the
 * tasks → lists foreign key still holds for orphaned tasks; visibility is
 * decided against the tombstones table on every read.
 */
export class SqliteRecordStore implements RecordStore {
  constructor(private db: Database) {}

  async get(kind: RecordKind, id: string): Promise<LiveRecord | undefined> {
    const key = this.keyFor(kind, id);
    if (!key) return undefined;
    const rows = await this.select(kind, `${key.where} AND ${visible(kind)}`, key.params);
    return rows[0];
  }

  async exists(kind: RecordKind, id: string): Promise<boolean> {
    const key = this.keyFor(kind, id);
    if (!key) return false;
    const row = await this.db.get<{ found: number }>(
      `SELECT 1 AS found FROM ${TABLES[kind].table} r WHERE ${key.where}`,
      key.params
    );
    return row !== undefined;
  }

  async upsertIfNewer(record: LiveRecord, serverTime: string): Promise<UpsertOutcome> {
    const stored = await this.readStored(record);
    if (!shouldReplace(record, stored)) {
      return 'skipped';
    }
    await this.write(record, serverTime);
    return 'applied';
  }

  async changedSince(kind: RecordKind, since: string | null): Promise<LiveRecord[]> {
    if (since === null) {
      return this.select(kind, visible(kind), []);
    }
    const def = TABLES[kind];
    return this.select(
      kind,
      `(${def.version} > ? OR r.synced_at > ?) AND ${visible(kind)}`,
      [since, since]
    );
  }

  async findInbox(): Promise<List | undefined> {
    const row = await this.db.get<ListRow>(
      `SELECT ${TABLES.list.columns} FROM lists r WHERE r.is_inbox = 1 LIMIT 1`
    );
    return row ? rowToList(row) : undefined;
  }

  private keyFor(kind: RecordKind, id: string): { where: string; params: SqlParam[] } | undefined {
    if (kind !== 'task_tag') {
      return { where: 'r.id = ?', params: [id] };
    }
    const link = splitTaskTagId(id);
    if (!link) return undefined;
    return { where: 'r.task_id = ? AND r.tag_id = ?', params: [link.task_id, link.tag_id] };
  }

  private async readStored(record: LiveRecord): Promise<LiveRecord | undefined> {
    const key =
      record.type === 'task_tag'
        ? { where: 'r.task_id = ? AND r.tag_id = ?', params: [record.task_id, record.tag_id] }
        : { where: 'r.id = ?', params: [record.id] };
    const rows = await this.select(record.type, key.where, key.params);
    return rows[0];
  }

  private async select(kind: RecordKind, where: string, params: SqlParam[]): Promise<LiveRecord[]> {
    const def = TABLES[kind];
    const sql = `SELECT ${def.columns} FROM ${def.table} r WHERE ${where} ORDER BY ${def.version}, ${def.idExpr}`;
    switch (kind) {
      case 'list':
        return (await this.db.all<ListRow>(sql, params)).map(mapRowToList);
      case 'tag':
        return (await this.db.all<TagRow>(sql, params)).map(mapRowToTag);
      case 'task':
        return (await this.db.all<TaskRow>(sql, params)).map(mapRowToTask);
      case 'task_tag':
        return (await this.db.all<TaskTagRow>(sql, params)).map(mapRowToTaskTag);
    }
  }

  private async write(record: LiveRecord, serverTime: string): Promise<void> {
    switch (record.type) {
      case 'list':
        await this.db.run(
          `INSERT INTO lists (id, name, description, icon, color, is_inbox, sort_order,
             created_at, updated_at, synced_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             name = excluded.name,
             description = excluded.description,
             icon = excluded.icon,
             color = excluded.color,
             is_inbox = excluded.is_inbox,
             sort_order = excluded.sort_order,
             created_at = excluded.created_at,
             updated_at = excluded.updated_at,
             synced_at = excluded.synced_at`,
          [
            record.id,
            record.name,
            record.description,
            record.icon,
            record.color,
            record.is_inbox ? 1 : 0,
            record.sort_order,
            record.created_at,
            record.updated_at,
            serverTime,
          ]
        );
        return;
      case 'tag':
        await this.db.run(
          `INSERT INTO tags (id, name, color, created_at, updated_at, synced_at)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             name = excluded.name,
             color = excluded.color,
             created_at = excluded.created_at,
             updated_at = excluded.updated_at,
             synced_at = excluded.synced_at`,
          [record.id, record.name, record.color, record.created_at, record.updated_at, serverTime]
        );
        return;
      case 'task':
        await this.db.run(
          `INSERT INTO tasks (id, title, description, url, priority, completed, list_id,
             created_at, updated_at, completed_at, due_date, synced_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             title = excluded.title,
             description = excluded.description,
             url = excluded.url,
             priority = excluded.priority,
             completed = excluded.completed,
             list_id = excluded.list_id,
             created_at = excluded.created_at,
             updated_at = excluded.updated_at,
             completed_at = excluded.completed_at,
             due_date = excluded.due_date,
             synced_at = excluded.synced_at`,
          [
            record.id,
            record.title,
            record.description,
            record.url,
            record.priority,
            record.completed ? 1 : 0,
            record.list_id,
            record.created_at,
            record.updated_at,
            record.completed_at,
            record.due_date,
            serverTime,
          ]
        );
        await this.replaceTaskTags(record.id, record.tag_ids, record.updated_at, serverTime);
        return;
      case 'task_tag':
        await this.db.run(
          `INSERT INTO task_tags (task_id, tag_id, created_at, synced_at)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(task_id, tag_id) DO UPDATE SET
             created_at = excluded.created_at,
             synced_at = excluded.synced_at`,
          [record.task_id, record.tag_id, record.created_at, serverTime]
        );
        return;
    }
  }

  // The task's tag_ids become its link set. A link removed by a tombstone
  // at or after the task's version stays removed.
  private async replaceTaskTags(
    taskId: string,
    tagIds: string[],
    version: string,
    serverTime: string
  ): Promise<void> {
    if (tagIds.length === 0) {
      await this.db.run('DELETE FROM task_tags WHERE task_id = ?', [taskId]);
      return;
    }
    const placeholders = tagIds.map(() => '?').join(', ');
    await this.db.run(
      `DELETE FROM task_tags WHERE task_id = ? AND tag_id NOT IN (${placeholders})`,
      [taskId, ...tagIds]
    );
    for (const tagId of tagIds) {
      const linkId = `${taskId}${TASK_TAG_SEPARATOR}${tagId}`;
      await this.db.run(
        `INSERT INTO task_tags (task_id, tag_id, created_at, synced_at)
         SELECT ?, ?, ?, ?
         WHERE NOT EXISTS (SELECT 1 FROM tombstones d
           WHERE d.record_type = 'task_tag' AND d.id = ? AND d.deleted_at >= ?)
         ON CONFLICT(task_id, tag_id) DO UPDATE SET
           created_at = excluded.created_at,
           synced_at = excluded.synced_at
         WHERE ${hiddenBy('task_tag', LINK_ID('task_tags'), 'task_tags.created_at')}`,
        [taskId, tagId, version, serverTime, linkId, version]
      );
    }
  }
}
