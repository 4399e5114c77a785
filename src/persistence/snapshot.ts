/**
 * @fileoverview Workbench snapshot format
 *
 * A snapshot captures the knowledge graph and the scheduler (tasks and
 * workflows) as plain JSON. Imports are validated before anything is
 * restored: a different format version raises SchemaError, malformed content
 * raises ParseError.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { ATOM_TYPES, LINK_TYPES, isAtomKey, type AtomKey, type GraphSnapshot } from '../atomspace/types.js';
import { AGENT_ROLES, TASK_STATUSES, type JsonValue, type SchedulerSnapshot } from '../coordination/types.js';
import { ParseError, SchemaError, TASK_FAILURE_KINDS } from '../core/errors.js';
import { safeJsonParse } from '../core/result.js';

export const SNAPSHOT_VERSION = 1;

// ============================================================================
// SCHEMA
// ============================================================================

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const unit = z.number().min(0).max(1);
const TruthValueSchema = z.object({ strength: unit, confidence: unit });
const AtomKeySchema = z.custom<AtomKey>(
  (value) => typeof value === 'string' && isAtomKey(value),
  'expected an atom key of the form TYPE:name',
);

const GraphSnapshotSchema = z.object({
  atoms: z.array(z.object({
    type: z.enum(ATOM_TYPES),
    name: z.string().min(1),
    truthValue: TruthValueSchema,
    attention: z.object({ sti: z.number().finite(), lti: z.number().finite().nonnegative() }),
    metadata: z.record(z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.number())])),
  })),
  links: z.array(z.object({
    type: z.enum(LINK_TYPES),
    source: AtomKeySchema,
    target: AtomKeySchema,
    truthValue: TruthValueSchema,
  })),
});

const TaskRecordSchema = z.object({
  id: z.string().min(1),
  taskType: z.string(),
  role: z.enum(AGENT_ROLES),
  parameters: z.record(JsonValueSchema),
  dependencies: z.array(z.string()),
  status: z.enum(TASK_STATUSES),
  priority: z.number().finite(),
  effectivePriority: z.number().finite(),
  result: z.record(JsonValueSchema).optional(),
  error: z.object({ kind: z.enum(TASK_FAILURE_KINDS), message: z.string() }).optional(),
  reason: z.string().optional(),
  agentId: z.string().optional(),
  startedAt: z.number().optional(),
  finishedAt: z.number().optional(),
  createdSeq: z.number().int().nonnegative(),
  submitted: z.boolean(),
});

const SchedulerSnapshotSchema = z.object({
  tasks: z.array(TaskRecordSchema),
  workflows: z.array(z.object({
    id: z.string().min(1),
    taskIds: z.array(z.string()),
    topologicalOrder: z.array(z.string()),
    createdAt: z.number(),
  })),
});

export const WorkbenchSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  exportedAt: z.string().datetime(),
  graph: GraphSnapshotSchema,
  scheduler: SchedulerSnapshotSchema,
});

export interface WorkbenchSnapshot {
  version: typeof SNAPSHOT_VERSION;
  exportedAt: string;
  graph: GraphSnapshot;
  scheduler: SchedulerSnapshot;
}

// ============================================================================
// BUILD & PARSE
// ============================================================================

export function createSnapshot(
  graph: GraphSnapshot,
  scheduler: SchedulerSnapshot,
  now: Date = new Date(),
): WorkbenchSnapshot {
  return { version: SNAPSHOT_VERSION, exportedAt: now.toISOString(), graph, scheduler };
}

/**
 * Validate an already-decoded document.
 */
export function parseSnapshot(document: unknown): WorkbenchSnapshot {
  const version = z.object({ version: z.number() }).safeParse(document);
  if (version.success && version.data.version !== SNAPSHOT_VERSION) {
    throw new SchemaError('workbench snapshot', SNAPSHOT_VERSION, version.data.version);
  }
  const parsed = WorkbenchSnapshotSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ParseError('workbench snapshot', `${issues.length} invalid field(s)`, issues);
  }
  return parsed.data;
}

export function serializeSnapshot(snapshot: WorkbenchSnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}

export function deserializeSnapshot(text: string): WorkbenchSnapshot {
  const json = safeJsonParse(text);
  if (!json.ok) {
    throw new ParseError('workbench snapshot', json.error.message);
  }
  return parseSnapshot(json.value);
}

// ============================================================================
// FILES
// ============================================================================

export async function writeSnapshotFile(filePath: string, snapshot: WorkbenchSnapshot): Promise<void> {
  await writeFile(filePath, `${serializeSnapshot(snapshot)}\n`, 'utf8');
}

export async function readSnapshotFile(filePath: string): Promise<WorkbenchSnapshot> {
  return deserializeSnapshot(await readFile(filePath, 'utf8'));
}
