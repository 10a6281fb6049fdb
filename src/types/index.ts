export type Priority = 'low' | 'medium' | 'high' | 'urgent';

export const RECORD_KINDS = ['list', 'tag', 'task', 'task_tag'] as const;

export type RecordKind = (typeof RECORD_KINDS)[number];

export interface Task {
  id: string;
  title: string;
  description: string | null;
  url: string | null;
  priority: Priority;
  completed: boolean;
  list_id: string;
  tag_ids: string[];
  created_at: string;           // ISO string
  updated_at: string;           // ISO string
  completed_at: string | null;
  due_date: string | null;
}

export interface List {
  id: string;
  name: string;
  description: string | null;
  icon: string;
  color: string | null;
  is_inbox: boolean;
  sort_order: number;
  created_at: string;
  updated_at: string;
}

export interface Tag {
  id: string;
  name: string;
  color: string;
  created_at: string;
  updated_at: string;
}

// Present or absent; created_at doubles as its version.
export interface TaskTagLink {
  task_id: string;
  tag_id: string;
  created_at: string;
}

export interface Tombstone {
  id: string;
  record_type: RecordKind;
  deleted_at: string;
}

/**
 * One upsert or deletion as it travels on the wire. The `type` field is
 * the discriminator; `deleted` carries the kind of the record it removes.
 */
export type SyncRecord =
  | ({ type: 'task' } & Task)
  | ({ type: 'list' } & List)
  | ({ type: 'tag' } & Tag)
  | ({ type: 'task_tag' } & TaskTagLink)
  | ({ type: 'deleted' } & Tombstone);

export type LiveRecord = Exclude<SyncRecord, { type: 'deleted' }>;

export type RecordOf<K extends RecordKind> = Extract<LiveRecord, { type: K }>;

export interface SyncRequest {
  device_id: string;
  last_sync: string | null;
  changes: SyncRecord[];
}

export interface RejectedChange {
  type: SyncRecord['type'];
  id: string;
  reason: string;
}

export interface SyncResponse {
  server_time: string;
  changes: SyncRecord[];
  conflicts: string[];
  rejected: RejectedChange[];
}

export type UpsertOutcome = 'applied' | 'skipped';

export const TASK_TAG_SEPARATOR = ':';

export function taskTagId(link: Pick<TaskTagLink, 'task_id' | 'tag_id'>): string {
  return `${link.task_id}${TASK_TAG_SEPARATOR}${link.tag_id}`;
}

/** Identity of a live record within its kind. */
export function recordId(record: LiveRecord): string {
  switch (record.type) {
    case 'task':
    case 'list':
    case 'tag':
      return record.id;
    case 'task_tag':
      return taskTagId(record);
  }
}

/** Timestamp used for last-write-wins comparison. */
export function versionOf(record: LiveRecord): string {
  switch (record.type) {
    case 'task':
    case 'list':
    case 'tag':
      return record.updated_at;
    case 'task_tag':
      return record.created_at;
  }
}

export function changeKey(record: SyncRecord): string {
  if (record.type === 'deleted') {
    return `deleted/${record.record_type}/${record.id}`;
  }
  return `${record.type}/${recordId(record)}`;
}

export function splitTaskTagId(id: string): Pick<TaskTagLink, 'task_id' | 'tag_id'> | undefined {
  const at = id.indexOf(TASK_TAG_SEPARATOR);
  if (at <= 0 || at === id.length - 1) return undefined;
  return { task_id: id.slice(0, at), tag_id: id.slice(at + 1) };
}
