import { z } from 'zod';
import { ValidationError } from '../errors';
import { RECORD_KINDS, SyncRecord, SyncRequest, splitTaskTagId } from '../types';

/** RFC 3339 in, UTC ISO-8601 with millisecond precision out. */
const timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());

const optionalTimestamp = timestamp.nullish().transform((value) => value ?? null);

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

// ':' joins task and tag ids into a link id.
const recordId = z.string().min(1).max(128).regex(/^[^:]+$/, 'must not contain ":"');

const taskSchema = z.object({
  type: z.literal('task'),
  id: recordId,
  title: z.string(),
  description: optionalText,
  url: optionalText,
  priority: z.enum(['low', 'medium', 'high', 'urgent']).default('medium'),
  completed: z.boolean().default(false),
  list_id: recordId,
  tag_ids: z
    .array(recordId)
    .default([])
    .transform((ids) => [...new Set(ids)].sort()),
  created_at: timestamp,
  updated_at: timestamp,
  completed_at: optionalTimestamp,
  due_date: optionalTimestamp,
});

const listSchema = z.object({
  type: z.literal('list'),
  id: recordId,
  name: z.string(),
  description: optionalText,
  icon: z.string().default('📋'),
  color: optionalText,
  is_inbox: z.boolean().default(false),
  sort_order: z.number().int().default(0),
  created_at: timestamp,
  updated_at: timestamp,
});

const tagSchema = z.object({
  type: z.literal('tag'),
  id: recordId,
  name: z.string(),
  color: z.string(),
  created_at: timestamp,
  updated_at: timestamp.optional(),
});

const taskTagSchema = z.object({
  type: z.literal('task_tag'),
  task_id: recordId,
  tag_id: recordId,
  created_at: timestamp,
});

const deletedSchema = z.object({
  type: z.literal('deleted'),
  id: z.string().min(1).max(257),
  record_type: z.enum(RECORD_KINDS),
  deleted_at: timestamp,
});

export const changeSchema = z
  .discriminatedUnion('type', [taskSchema, listSchema, tagSchema, taskTagSchema, deletedSchema])
  .superRefine((change, ctx) => {
    if (change.type !== 'deleted') return;
    const composite = change.record_type === 'task_tag';
    if (composite && !splitTaskTagId(change.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['id'],
        message: 'task_tag deletions must use a "<task_id>:<tag_id>" id',
      });
    }
    if (!composite && change.id.includes(':')) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['id'], message: 'must not contain ":"' });
    }
  })
  .transform((change): SyncRecord =>
    change.type === 'tag' ? { ...change, updated_at: change.updated_at ?? change.created_at } : change
  );

export const syncRequestSchema = z.object({
  device_id: z.string().min(1).max(128),
  last_sync: optionalTimestamp,
  changes: z.array(changeSchema).default([]),
});

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Validates a request body; any malformed change refuses the whole batch. */
export function parseSyncRequest(body: unknown): SyncRequest {
  const result = syncRequestSchema.safeParse(body);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ValidationError('Invalid sync request', issues);
  }
  return result.data;
}
