/**
 * @fileoverview Task scheduler
 *
 * Tasks move PENDING → READY → RUNNING → COMPLETED | FAILED. A task becomes
 * READY once every dependency has COMPLETED; a task whose dependency FAILED
 * fails too without ever running. Workflows run one task at a time, each to
 * completion, with the attentional focus biasing which READY task goes next.
 *
 * Agent failures never escape `executeWorkflow`: thrown errors and FAILED
 * outcomes alike are recorded on the task. Only structural problems found
 * while building tasks and workflows are raised.
 */

import type { AtomSpace } from '../atomspace/atom_space.js';
import type { Atom } from '../atomspace/types.js';
import {
  CycleError,
  DependencyError,
  ValidationError,
  classifyTaskFailure,
} from '../core/errors.js';
import {
  createTaskCompletedEvent,
  createTaskFailedEvent,
  createTaskStartedEvent,
  createWorkflowCompletedEvent,
  createWorkflowStartedEvent,
  type WorkbenchEvent,
  type WorkbenchEventBus,
} from '../events.js';
import type { Reasoner } from '../reasoning/reasoner.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { ReadyQueue, SequentialDispatcher, type TaskDispatcher } from './ready_queue.js';
import { findCycle, topologicalOrder } from './task_graph.js';
import {
  AGENT_ROLES,
  isAgentRole,
  type Agent,
  type AgentRole,
  type AttentionSource,
  type JsonObject,
  type JsonValue,
  type SchedulerSnapshot,
  type SchedulerStatistics,
  type Task,
  type TaskFailure,
  type TaskOutcome,
  type TaskReport,
  type TaskSpec,
  type TaskStatus,
  type Workflow,
  type WorkflowReport,
  type WorkflowStatus,
} from './types.js';

const LEGAL_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  PENDING: ['READY', 'FAILED'],
  READY: ['RUNNING'],
  RUNNING: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
};

export const BLOCKED_REASON_PREFIX = 'blocked by dependency: ';

export interface CoordinatorOptions {
  atomSpace: AtomSpace;
  reasoner: Reasoner;
  attention?: AttentionSource;
  eventBus?: WorkbenchEventBus;
  /** Weight of the normalised focus STI in the effective priority */
  attentionWeight?: number;
  /** Constant added to the effective priority of every task of a role */
  roleBoosts?: Partial<Record<AgentRole, number>>;
  dispatcher?: TaskDispatcher;
}

export interface ExecuteWorkflowOptions {
  /** Checked before every dispatch; a running task always finishes */
  signal?: AbortSignal;
}

// ============================================================================
// COORDINATOR
// ============================================================================

export class Coordinator {
  private readonly atomSpace: AtomSpace;
  private readonly reasoner: Reasoner;
  private readonly attention?: AttentionSource;
  private readonly eventBus?: WorkbenchEventBus;
  private readonly attentionWeight: number;
  private readonly roleBoosts: Partial<Record<AgentRole, number>>;
  private readonly dispatcher: TaskDispatcher;

  private readonly agents = new Map<AgentRole, Agent[]>();
  private readonly agentIds = new Set<string>();
  private readonly cursors = new Map<AgentRole, number>();
  private readonly tasks = new Map<string, Task>();
  private readonly submitted = new Set<string>();
  private readonly dependents = new Map<string, string[]>();
  private readonly workflows = new Map<string, Workflow>();
  private readonly ready = new ReadyQueue<Task>();
  private nextSeq = 0;

  constructor(options: CoordinatorOptions) {
    this.atomSpace = options.atomSpace;
    this.reasoner = options.reasoner;
    this.attention = options.attention;
    this.eventBus = options.eventBus;
    this.attentionWeight = options.attentionWeight ?? 1;
    this.dispatcher = options.dispatcher ?? new SequentialDispatcher();
    if (!Number.isFinite(this.attentionWeight) || this.attentionWeight < 0) {
      throw new ValidationError('scheduler.attentionWeight', 'a finite number >= 0', String(this.attentionWeight));
    }
    this.roleBoosts = { ...options.roleBoosts };
    for (const [role, boost] of Object.entries(this.roleBoosts)) {
      if (!isAgentRole(role)) {
        throw new ValidationError('scheduler.roleBoosts', AGENT_ROLES.join(' | '), role);
      }
      if (boost === undefined || !Number.isFinite(boost) || boost < 0) {
        throw new ValidationError(`scheduler.roleBoosts.${role}`, 'a finite number >= 0', String(boost));
      }
    }
  }

  // --------------------------------------------------------------------------
  // Agents
  // --------------------------------------------------------------------------

  registerAgent(agent: Agent): void {
    if (this.agentIds.has(agent.id)) {
      throw new ValidationError('agent.id', 'a unique agent id', agent.id);
    }
    if (!isAgentRole(agent.role)) {
      throw new ValidationError('agent.role', AGENT_ROLES.join(' | '), String(agent.role));
    }
    this.agentIds.add(agent.id);
    this.agents.set(agent.role, [...(this.agents.get(agent.role) ?? []), agent]);
  }

  getAgents(role?: AgentRole): Agent[] {
    if (role) return [...(this.agents.get(role) ?? [])];
    return AGENT_ROLES.flatMap((r) => this.agents.get(r) ?? []);
  }

  // --------------------------------------------------------------------------
  // Tasks
  // --------------------------------------------------------------------------

  createTask(spec: TaskSpec): Task {
    if (!spec.id) {
      throw new ValidationError('task.id', 'a non-empty string', JSON.stringify(spec.id));
    }
    if (this.tasks.has(spec.id)) {
      throw new ValidationError('task.id', 'a unique task id', spec.id);
    }
    if ((this.agents.get(spec.role) ?? []).length === 0) {
      throw new ValidationError('task.role', 'a role with a registered agent', spec.role);
    }
    const priority = spec.priority ?? 0;
    if (!Number.isFinite(priority)) {
      throw new ValidationError('task.priority', 'a finite number', String(priority));
    }
    const task: Task = {
      id: spec.id,
      taskType: spec.taskType,
      role: spec.role,
      parameters: { ...(spec.parameters ?? {}) },
      dependencies: [...new Set(spec.dependencies ?? [])],
      status: 'PENDING',
      priority,
      effectivePriority: priority,
      createdSeq: this.nextSeq++,
    };
    this.tasks.set(task.id, task);
    return cloneTask(task);
  }

  /**
   * Enqueue a created task. With every dependency COMPLETED it becomes READY
   * at once; with a FAILED dependency it is blocked immediately.
   */
  async submitTask(taskOrId: Task | string): Promise<Task> {
    const task = this.requireTask(typeof taskOrId === 'string' ? taskOrId : taskOrId.id);
    for (const dependency of task.dependencies) {
      if (!this.tasks.has(dependency)) {
        throw new DependencyError(task.id, dependency);
      }
    }
    if (this.submitted.has(task.id)) return cloneTask(task);
    this.submitted.add(task.id);
    for (const dependency of task.dependencies) {
      this.dependents.set(dependency, [...(this.dependents.get(dependency) ?? []), task.id]);
    }

    const failed = task.dependencies.find((id) => this.tasks.get(id)?.status === 'FAILED');
    if (failed !== undefined) {
      await this.block(task, failed);
      await this.propagateFailure(task.id);
    } else {
      this.promoteIfReady(task);
    }
    return cloneTask(task);
  }

  getTask(id: string): Task | undefined {
    const task = this.tasks.get(id);
    return task ? cloneTask(task) : undefined;
  }

  getTaskStatus(id: string): TaskStatus | undefined {
    return this.tasks.get(id)?.status;
  }

  getTasks(): Task[] {
    return Array.from(this.tasks.values()).map(cloneTask);
  }

  /** READY tasks in the order they would be dispatched */
  getReadyTasks(): Task[] {
    return this.ready.toArray().map(cloneTask);
  }

  // --------------------------------------------------------------------------
  // Workflows
  // --------------------------------------------------------------------------

  /**
   * Register a workflow over created tasks and submit the ones not yet
   * submitted. The dependency relation among its tasks must be acyclic.
   */
  async createWorkflow(id: string, tasks: ReadonlyArray<Task | string>): Promise<Workflow> {
    if (this.workflows.has(id)) {
      throw new ValidationError('workflow.id', 'a unique workflow id', id);
    }
    const taskIds = [...new Set(tasks.map((task) => (typeof task === 'string' ? task : task.id)))];
    const members: Task[] = [];
    for (const taskId of taskIds) {
      const task = this.tasks.get(taskId);
      if (!task) throw new DependencyError(id, taskId);
      members.push(task);
    }
    for (const task of members) {
      for (const dependency of task.dependencies) {
        if (!this.tasks.has(dependency)) throw new DependencyError(task.id, dependency);
      }
    }
    const cycle = findCycle(members);
    if (cycle) throw new CycleError(id, cycle);

    const order = topologicalOrder(members);
    const workflow: Workflow = Object.freeze({
      id,
      taskIds: Object.freeze(taskIds),
      topologicalOrder: Object.freeze(order),
      createdAt: Date.now(),
    });
    this.workflows.set(id, workflow);
    for (const taskId of order) {
      if (!this.submitted.has(taskId)) await this.submitTask(taskId);
    }
    logDebug('[coordinator] workflow created', { workflowId: id, tasks: taskIds.length });
    return workflow;
  }

  getWorkflow(id: string): Workflow | undefined {
    return this.workflows.get(id);
  }

  /**
   * Run a workflow until every task is terminal, nothing more can become
   * READY, or the signal aborts. Always returns a report.
   */
  async executeWorkflow(id: string, options: ExecuteWorkflowOptions = {}): Promise<WorkflowReport> {
    const workflow = this.workflows.get(id);
    if (!workflow) {
      throw new ValidationError('workflow.id', 'an existing workflow', id);
    }
    const members = new Set(workflow.taskIds);
    const startedAt = Date.now();
    const executionOrder: string[] = [];
    let cancelled = false;

    await this.emit(createWorkflowStartedEvent(id, members.size));
    logInfo('[coordinator] workflow started', { workflowId: id, tasks: members.size });

    for (;;) {
      if (options.signal?.aborted) {
        cancelled = true;
        break;
      }
      this.refreshPriorities(this.readFocus());
      const next = this.ready.pop((task) => members.has(task.id));
      if (!next) break;
      executionOrder.push(next.id);
      await this.runTask(next);
    }

    const report = this.buildReport(workflow, executionOrder, cancelled, Date.now() - startedAt);
    await this.emit(createWorkflowCompletedEvent(id, report.status, report.durationMs));
    const log = report.status === 'completed' ? logInfo : logWarning;
    log('[coordinator] workflow finished', {
      workflowId: id,
      status: report.status,
      completed: report.completed.length,
      failed: report.failed.length,
      blocked: report.blocked.length,
    });
    return report;
  }

  /**
   * One focus update through the attention source, then a fresh attention
   * bias for every READY task.
   */
  allocateAttention(): Atom[] {
    const focus = this.attention?.updateAttentionalFocus() ?? [];
    this.refreshPriorities(focus);
    return focus;
  }

  getStatistics(): SchedulerStatistics {
    const byStatus: Record<TaskStatus, number> = { PENDING: 0, READY: 0, RUNNING: 0, COMPLETED: 0, FAILED: 0 };
    for (const task of this.tasks.values()) byStatus[task.status]++;
    const count = (role: AgentRole): number => this.agents.get(role)?.length ?? 0;
    const agents: Record<AgentRole, number> = {
      SIMULATOR: count('SIMULATOR'),
      VERIFIER: count('VERIFIER'),
      ANALYZER: count('ANALYZER'),
      OPTIMIZER: count('OPTIMIZER'),
    };
    return {
      tasks: this.tasks.size,
      byStatus,
      workflows: this.workflows.size,
      agents,
      ready: this.ready.size,
    };
  }

  // --------------------------------------------------------------------------
  // Snapshots
  // --------------------------------------------------------------------------

  toSnapshot(): SchedulerSnapshot {
    return {
      tasks: Array.from(this.tasks.values()).map((task) => ({
        ...cloneTask(task),
        submitted: this.submitted.has(task.id),
      })),
      workflows: Array.from(this.workflows.values()).map((workflow) => ({
        id: workflow.id,
        taskIds: [...workflow.taskIds],
        topologicalOrder: [...workflow.topologicalOrder],
        createdAt: workflow.createdAt,
      })),
    };
  }

  /**
   * Replace all task and workflow state. Registered agents are kept.
   */
  restore(snapshot: SchedulerSnapshot): void {
    const ids = new Set(snapshot.tasks.map((task) => task.id));
    if (ids.size !== snapshot.tasks.length) {
      throw new ValidationError('snapshot.tasks', 'unique task ids', `${snapshot.tasks.length} tasks, ${ids.size} ids`);
    }
    for (const task of snapshot.tasks) {
      for (const dependency of task.dependencies) {
        if (!ids.has(dependency)) throw new DependencyError(task.id, dependency);
      }
    }

    this.tasks.clear();
    this.submitted.clear();
    this.dependents.clear();
    this.workflows.clear();
    this.ready.clear();
    const ordered = [...snapshot.tasks].sort((a, b) => a.createdSeq - b.createdSeq);
    for (const { submitted, ...record } of ordered) {
      const task = cloneTask(record);
      this.tasks.set(task.id, task);
      if (submitted) {
        this.submitted.add(task.id);
        for (const dependency of task.dependencies) {
          this.dependents.set(dependency, [...(this.dependents.get(dependency) ?? []), task.id]);
        }
      }
      if (task.status === 'READY') this.ready.push(task);
    }
    for (const workflow of snapshot.workflows) {
      this.workflows.set(workflow.id, Object.freeze({
        id: workflow.id,
        taskIds: Object.freeze([...workflow.taskIds]),
        topologicalOrder: Object.freeze([...workflow.topologicalOrder]),
        createdAt: workflow.createdAt,
      }));
    }
    this.nextSeq = ordered.reduce((max, task) => Math.max(max, task.createdSeq + 1), 0);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async runTask(task: Task): Promise<void> {
    const agent = this.nextAgent(task.role);
    if (!agent) {
      // Only reachable after a restore into a coordinator without that role.
      this.transition(task, 'RUNNING');
      await this.fail(task, { kind: 'ValidationError', message: `no agent registered for role ${task.role}` });
      return;
    }

    this.transition(task, 'RUNNING');
    task.agentId = agent.id;
    task.startedAt = Date.now();
    await this.emit(createTaskStartedEvent(task.id, task.role, agent.id));

    const outcome = await this.dispatcher.dispatch(() => this.invokeAgent(agent, task));
    if (outcome.status === 'FAILED') {
      await this.fail(task, outcome.error);
      return;
    }

    try {
      if (outcome.mutations) this.atomSpace.applyMutations(outcome.mutations);
    } catch (error: unknown) {
      await this.fail(task, { kind: classifyTaskFailure(error), message: getErrorMessage(error) });
      return;
    }
    this.transition(task, 'COMPLETED');
    task.result = outcome.result;
    task.finishedAt = Date.now();
    await this.emit(createTaskCompletedEvent(task.id, task.finishedAt - task.startedAt));

    for (const dependentId of this.dependents.get(task.id) ?? []) {
      const dependent = this.tasks.get(dependentId);
      if (dependent) this.promoteIfReady(dependent);
    }
  }

  private async invokeAgent(agent: Agent, task: Task): Promise<TaskOutcome> {
    try {
      return await agent.processTask(cloneTask(task), { atomSpace: this.atomSpace, reasoner: this.reasoner });
    } catch (error: unknown) {
      return { status: 'FAILED', error: { kind: classifyTaskFailure(error), message: getErrorMessage(error) } };
    }
  }

  private async fail(task: Task, error: TaskFailure): Promise<void> {
    this.transition(task, 'FAILED');
    task.error = error;
    task.reason = error.message;
    task.finishedAt = Date.now();
    await this.emit(createTaskFailedEvent(task.id, error.kind, error.message));
    await this.propagateFailure(task.id);
  }

  /**
   * Breadth-first over dependents: every PENDING task downstream of the
   * failure is blocked, naming the dependency that failed before it.
   */
  private async propagateFailure(failedId: string): Promise<void> {
    const queue = [failedId];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const dependentId of this.dependents.get(current) ?? []) {
        const dependent = this.tasks.get(dependentId);
        if (!dependent || dependent.status !== 'PENDING') continue;
        await this.block(dependent, current);
        queue.push(dependentId);
      }
    }
  }

  private async block(task: Task, failedDependency: string): Promise<void> {
    const reason = `${BLOCKED_REASON_PREFIX}${failedDependency}`;
    this.transition(task, 'FAILED');
    task.reason = reason;
    task.error = { kind: 'BlockedByDependency', message: reason };
    task.finishedAt = Date.now();
    await this.emit(createTaskFailedEvent(task.id, 'BlockedByDependency', reason));
  }

  private promoteIfReady(task: Task): void {
    if (task.status !== 'PENDING' || !this.submitted.has(task.id)) return;
    const done = task.dependencies.every((id) => this.tasks.get(id)?.status === 'COMPLETED');
    if (!done) return;
    this.transition(task, 'READY');
    this.ready.push(task);
  }

  private transition(task: Task, next: TaskStatus): void {
    if (!LEGAL_TRANSITIONS[task.status].includes(next)) {
      throw new ValidationError(`task ${task.id}.status`, `one of [${LEGAL_TRANSITIONS[task.status].join(', ')}]`, `${task.status} -> ${next}`);
    }
    task.status = next;
  }

  private nextAgent(role: AgentRole): Agent | undefined {
    const pool = this.agents.get(role) ?? [];
    if (pool.length === 0) return undefined;
    const cursor = this.cursors.get(role) ?? 0;
    this.cursors.set(role, (cursor + 1) % pool.length);
    return pool[cursor % pool.length];
  }

  private readFocus(): Atom[] {
    return this.attention?.updateAttentionalFocus() ?? [];
  }

  /**
   * effective = priority + roleBoost + weight · Σ sti/maxSti over focus atoms
   * the task's parameters name (by atom name or key).
   */
  private refreshPriorities(focus: readonly Atom[]): void {
    const maxSti = focus.reduce((max, atom) => Math.max(max, atom.attention.sti), 0);
    for (const task of this.ready.toArray()) {
      let bias = 0;
      if (maxSti > 0 && this.attentionWeight > 0) {
        const references = collectReferences(task.parameters);
        for (const atom of focus) {
          if (references.has(atom.name) || references.has(atom.key)) {
            bias += Math.max(0, atom.attention.sti) / maxSti;
          }
        }
      }
      task.effectivePriority = task.priority + (this.roleBoosts[task.role] ?? 0) + this.attentionWeight * bias;
    }
  }

  private buildReport(
    workflow: Workflow,
    executionOrder: string[],
    cancelled: boolean,
    durationMs: number,
  ): WorkflowReport {
    const tasks: Record<string, TaskReport> = {};
    const completed: string[] = [];
    const failed: string[] = [];
    const blocked: string[] = [];
    for (const id of workflow.topologicalOrder) {
      const task = this.requireTask(id);
      tasks[id] = toTaskReport(task);
      if (task.status === 'COMPLETED') completed.push(id);
      else if (task.status === 'FAILED') failed.push(id);
      else blocked.push(id);
    }
    let status: WorkflowStatus;
    if (cancelled) status = 'cancelled';
    else if (blocked.length > 0) status = 'stalled';
    else status = failed.length > 0 ? 'completed_with_failures' : 'completed';
    return { workflowId: workflow.id, status, tasks, executionOrder, completed, failed, blocked, durationMs };
  }

  private requireTask(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) {
      throw new ValidationError('task.id', 'an existing task', id);
    }
    return task;
  }

  private async emit(event: WorkbenchEvent): Promise<void> {
    if (this.eventBus) await this.eventBus.emit(event);
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function cloneTask(task: Task): Task {
  return {
    ...task,
    parameters: structuredClone(task.parameters),
    dependencies: [...task.dependencies],
    ...(task.result ? { result: structuredClone(task.result) } : {}),
    ...(task.error ? { error: { ...task.error } } : {}),
  };
}

function collectReferences(parameters: JsonObject): Set<string> {
  const references = new Set<string>();
  const visit = (value: JsonValue): void => {
    if (typeof value === 'string') references.add(value);
    else if (Array.isArray(value)) value.forEach(visit);
  };
  Object.values(parameters).forEach(visit);
  return references;
}

function toTaskReport(task: Task): TaskReport {
  const report: TaskReport = { status: task.status, role: task.role, taskType: task.taskType };
  if (task.agentId !== undefined) report.agentId = task.agentId;
  if (task.result) report.result = task.result;
  if (task.error) report.error = { ...task.error };
  if (task.reason !== undefined) report.reason = task.reason;
  if (task.startedAt !== undefined && task.finishedAt !== undefined) report.durationMs = task.finishedAt - task.startedAt;
  return report;
}
