/**
 * @fileoverview Scheduler and agent contract types
 */

import type { AtomSpace } from '../atomspace/atom_space.js';
import type { Atom, MutationBatch } from '../atomspace/types.js';
import type { TaskFailureKind } from '../core/errors.js';
import type { Reasoner } from '../reasoning/reasoner.js';

// ============================================================================
// JSON DATA
// ============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// TASKS
// ============================================================================

export const AGENT_ROLES = ['SIMULATOR', 'VERIFIER', 'ANALYZER', 'OPTIMIZER'] as const;
export type AgentRole = (typeof AGENT_ROLES)[number];

export function isAgentRole(value: string): value is AgentRole {
  return AGENT_ROLES.some((role) => role === value);
}

export const TASK_STATUSES = ['PENDING', 'READY', 'RUNNING', 'COMPLETED', 'FAILED'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface TaskFailure {
  kind: TaskFailureKind;
  message: string;
}

export interface Task {
  readonly id: string;
  readonly taskType: string;
  readonly role: AgentRole;
  readonly parameters: JsonObject;
  readonly dependencies: readonly string[];
  status: TaskStatus;
  /** Caller-assigned base priority; higher runs first */
  readonly priority: number;
  /** Base priority plus the attention bias, recomputed before dispatch */
  effectivePriority: number;
  result?: JsonObject;
  error?: TaskFailure;
  reason?: string;
  agentId?: string;
  startedAt?: number;
  finishedAt?: number;
  /** Creation order; breaks priority ties */
  readonly createdSeq: number;
}

export interface TaskSpec {
  id: string;
  taskType: string;
  role: AgentRole;
  parameters?: JsonObject;
  dependencies?: readonly string[];
  priority?: number;
}

export interface Workflow {
  readonly id: string;
  readonly taskIds: readonly string[];
  readonly topologicalOrder: readonly string[];
  readonly createdAt: number;
}

// ============================================================================
// AGENTS
// ============================================================================

/**
 * Read access to the knowledge graph. Agents stage their writes in the
 * outcome instead.
 */
export type AtomSpaceReader = Pick<
  AtomSpace,
  | 'getAtom'
  | 'getAtomByKey'
  | 'getAtoms'
  | 'getAtomsByType'
  | 'query'
  | 'getLinks'
  | 'getIncomingLinks'
  | 'getOutgoingLinks'
  | 'getNeighbors'
>;

export interface AgentContext {
  atomSpace: AtomSpaceReader;
  reasoner: Reasoner;
}

export type TaskOutcome =
  | { status: 'COMPLETED'; result: JsonObject; mutations?: MutationBatch }
  | { status: 'FAILED'; error: TaskFailure };

export interface Agent {
  readonly id: string;
  readonly role: AgentRole;
  processTask(task: Readonly<Task>, context: AgentContext): Promise<TaskOutcome>;
}

/**
 * Where the scheduler reads the attentional focus from.
 */
export interface AttentionSource {
  updateAttentionalFocus(): Atom[];
}

// ============================================================================
// REPORTS
// ============================================================================

export type WorkflowStatus = 'completed' | 'completed_with_failures' | 'stalled' | 'cancelled';

export interface TaskReport {
  status: TaskStatus;
  role: AgentRole;
  taskType: string;
  agentId?: string;
  result?: JsonObject;
  error?: TaskFailure;
  reason?: string;
  durationMs?: number;
}

export interface WorkflowReport {
  workflowId: string;
  status: WorkflowStatus;
  tasks: Record<string, TaskReport>;
  /** Ids in the order they were dispatched */
  executionOrder: string[];
  completed: string[];
  failed: string[];
  /** Tasks left non-terminal when the run ended */
  blocked: string[];
  durationMs: number;
}

export interface SchedulerStatistics {
  tasks: number;
  byStatus: Record<TaskStatus, number>;
  workflows: number;
  agents: Record<AgentRole, number>;
  ready: number;
}

export interface SchedulerSnapshot {
  tasks: Array<Task & { submitted: boolean }>;
  workflows: Workflow[];
}
