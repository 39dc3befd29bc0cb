/**
 * Asynchronous task model.
 *
 * Every mutation on the server is queued as a task; the server answers the
 * mutation with a TaskInfo and the task is then observed through its uid.
 * @module types/task
 */

import { z } from 'zod';
import { parseWith } from './parse.js';

// ============================================================================
// Status and type
// ============================================================================

/**
 * Lifecycle state of a task. `enqueued` and `processing` are transient; the rest are terminal.
 */
export type TaskStatus = 'enqueued' | 'processing' | 'succeeded' | 'failed' | 'canceled';

export const TASK_STATUSES: readonly TaskStatus[] = [
  'enqueued',
  'processing',
  'succeeded',
  'failed',
  'canceled',
];

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = ['succeeded', 'failed', 'canceled'];

/**
 * Whether a task in this state will never change again
 */
export function isTerminalStatus(status: TaskStatus): boolean {
  return status === 'succeeded' || status === 'failed' || status === 'canceled';
}

/**
 * Kind of operation a task performs. Unknown kinds reported by newer servers are kept as strings.
 */
export type TaskType =
  | 'documentAdditionOrUpdate'
  | 'documentEdition'
  | 'documentDeletion'
  | 'settingsUpdate'
  | 'indexCreation'
  | 'indexUpdate'
  | 'indexDeletion'
  | 'indexSwap'
  | 'taskCancelation'
  | 'taskDeletion'
  | 'dumpCreation'
  | 'snapshotCreation'
  | (string & {});

// ============================================================================
// Task shapes
// ============================================================================

/**
 * Error reported by the server for a failed task
 */
export interface TaskError {
  message: string;
  code: string;
  type: string;
  link?: string;
}

/**
 * Full state of a task as returned by `GET /tasks/{uid}`
 */
export interface Task {
  uid: number;
  batchUid: number | null;
  indexUid: string | null;
  status: TaskStatus;
  type: TaskType;
  details: Record<string, unknown> | null;
  error: TaskError | null;
  canceledBy: number | null;
  /** ISO-8601 duration, e.g. `PT0.0123S` */
  duration: string | null;
  enqueuedAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
}

/**
 * Handle returned by the server when it accepts a mutation
 */
export interface TaskInfo {
  taskUid: number;
  indexUid: string | null;
  status: TaskStatus;
  type: TaskType;
  enqueuedAt: Date;
}

/**
 * Page of tasks returned by `GET /tasks`
 */
export interface TaskList {
  results: Task[];
  total: number;
  limit: number;
  from: number | null;
  next: number | null;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a server timestamp. The server may send more fractional digits than
 * Date accepts; anything past milliseconds is dropped.
 */
export function parseTimestamp(value: string): Date | undefined {
  const trimmed = value.replace(/(\.\d{3})\d+/, '$1');
  const date = new Date(trimmed);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

const timestampSchema = z.string().transform((value, ctx) => {
  const date = parseTimestamp(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp '${value}'` });
    return z.NEVER;
  }
  return date;
});

const statusSchema = z.enum(['enqueued', 'processing', 'succeeded', 'failed', 'canceled']);

const taskErrorSchema = z.object({
  message: z.string(),
  code: z.string(),
  type: z.string(),
  link: z.string().optional(),
});

const taskSchema: z.ZodType<Task, z.ZodTypeDef, unknown> = z.object({
  uid: z.number().int(),
  batchUid: z.number().int().nullable().default(null),
  indexUid: z.string().nullable().default(null),
  status: statusSchema,
  type: z.string(),
  details: z.record(z.unknown()).nullable().default(null),
  error: taskErrorSchema.nullable().default(null),
  canceledBy: z.number().int().nullable().default(null),
  duration: z.string().nullable().default(null),
  enqueuedAt: timestampSchema,
  startedAt: timestampSchema.nullable().default(null),
  finishedAt: timestampSchema.nullable().default(null),
});

const taskInfoSchema: z.ZodType<TaskInfo, z.ZodTypeDef, unknown> = z.object({
  taskUid: z.number().int(),
  indexUid: z.string().nullable().default(null),
  status: statusSchema,
  type: z.string(),
  enqueuedAt: timestampSchema,
});

const taskListSchema: z.ZodType<TaskList, z.ZodTypeDef, unknown> = z.object({
  results: z.array(taskSchema),
  total: z.number().int().nonnegative(),
  limit: z.number().int().nonnegative(),
  from: z.number().int().nullable().default(null),
  next: z.number().int().nullable().default(null),
});

/**
 * Validate and convert a task payload
 */
export function parseTask(data: unknown): Task {
  return parseWith(taskSchema, data, 'task');
}

/**
 * Validate and convert a task-info payload
 */
export function parseTaskInfo(data: unknown): TaskInfo {
  return parseWith(taskInfoSchema, data, 'task info');
}

/**
 * Validate and convert a task list payload
 */
export function parseTaskList(data: unknown): TaskList {
  return parseWith(taskListSchema, data, 'task list');
}
