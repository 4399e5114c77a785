/**
 * @fileoverview Workbench composition root
 *
 * One Workbench is one analysis session. It constructs the AtomSpace once
 * and injects it into the reasoner, the attention allocator and the
 * coordinator, registers the role agents and exposes the session-level
 * operations. Nothing here is process-global: two workbenches never share
 * state.
 *
 * @example
 * ```typescript
 * const workbench = await initializeWorkbench({ configPath: 'workbench.yaml' });
 * await workbench.loadModel('examples/psoriasis_model.yaml');
 * const workflow = await workbench.createAnalysisWorkflow('psoriasis');
 * const report = await workbench.executeWorkflow(workflow.id);
 * const reasoning = workbench.reasonAboutGoal('remission_365');
 * await workbench.shutdown();
 * ```
 *
 * @packageDocumentation
 */

import { createDefaultAgents } from '../agents/tool_agent.js';
import type { ToolRunner } from '../agents/tool_runner.js';
import { AtomSpace } from '../atomspace/atom_space.js';
import type { AtomKey, AtomType, TruthValue } from '../atomspace/types.js';
import { attentionValue } from '../atomspace/values.js';
import {
  AttentionAllocator,
  type AttentionStatistics,
  type EvictionPolicy,
} from '../attention/ecan.js';
import {
  loadWorkbenchConfig,
  type ConfigEnv,
  type WorkbenchConfig,
  type WorkbenchConfigOverrides,
} from '../config/workbench_config.js';
import { Coordinator, type ExecuteWorkflowOptions } from '../coordination/coordinator.js';
import type {
  Agent,
  JsonObject,
  SchedulerStatistics,
  TaskSpec,
  Workflow,
  WorkflowReport,
} from '../coordination/types.js';
import { ValidationError } from '../core/errors.js';
import { WorkbenchEventBus, createModelLoadedEvent, createSnapshotSavedEvent } from '../events.js';
import {
  loadModelDescriptor,
  parseModelDescriptor,
  populateAtomSpace,
  type ModelDescriptorInput,
  type PopulationSummary,
} from '../ingest/model_descriptor.js';
import {
  createSnapshot,
  parseSnapshot,
  readSnapshotFile,
  writeSnapshotFile,
  type WorkbenchSnapshot,
} from '../persistence/snapshot.js';
import { Reasoner, type EvidenceMode, type InferenceExplanation } from '../reasoning/reasoner.js';
import { SnapshotStore, type StoredSnapshotInfo } from '../storage/snapshot_store.js';
import { logInfo, logWarning, setLogLevel } from '../telemetry/logger.js';

// ============================================================================
// PUBLIC TYPES
// ============================================================================

export interface WorkbenchDependencies {
  /** Replaces the default role agents entirely */
  agents?: readonly Agent[];
  /** Tool runner for the default agents */
  runner?: ToolRunner;
  eventBus?: WorkbenchEventBus;
  evictionPolicy?: EvictionPolicy;
  /** Used instead of opening `storage.snapshotDbPath` */
  snapshotStore?: SnapshotStore;
}

export interface InitializeWorkbenchOptions extends WorkbenchDependencies {
  configPath?: string;
  config?: WorkbenchConfigOverrides;
  env?: ConfigEnv;
}

export interface AnalysisWorkflowOptions {
  /** Defaults to the first goal recorded for the model */
  goal?: string;
  workflowName?: string;
  paths?: number;
  depth?: number;
  precision?: number;
  includeOptimization?: boolean;
}

export interface GoalReasoning {
  goal: string;
  reachability: { probability: number; confidence: number };
  evidence: Array<{ name: string; strength: number; confidence: number }>;
  explanation?: InferenceExplanation;
}

export interface OptimizeAttentionOptions {
  /** Atom names or keys to stimulate first */
  focusAtoms?: readonly string[];
  stimulus?: number;
  iterations?: number;
}

export interface ImportantAtom {
  key: AtomKey;
  type: AtomType;
  name: string;
  sti: number;
  lti: number;
  truthValue: TruthValue;
}

export interface WorkbenchStatus {
  atomSpace: {
    atoms: number;
    links: number;
    byType: Record<AtomType, number>;
    models: string[];
  };
  attention: AttentionStatistics;
  scheduler: SchedulerStatistics;
  /** Keys of the current attentional focus, most important first */
  focus: AtomKey[];
  evictionPolicy: string;
  evictionCandidates: AtomKey[];
}

export const DEFAULT_FOCUS_STIMULUS = 50;
export const DEFAULT_FOCUS_ITERATIONS = 10;

// ============================================================================
// WORKBENCH
// ============================================================================

export class Workbench {
  readonly atomSpace: AtomSpace;
  readonly reasoner: Reasoner;
  readonly attention: AttentionAllocator;
  readonly coordinator: Coordinator;
  readonly events: WorkbenchEventBus;

  private snapshotStore?: SnapshotStore;
  private readonly ownsSnapshotStore: boolean;
  private closed = false;

  constructor(readonly config: WorkbenchConfig, deps: WorkbenchDependencies = {}) {
    this.atomSpace = new AtomSpace({
      baselineAttention: attentionValue(config.attention.baselineSti, config.attention.baselineLti),
      stiBounds: { stiMin: config.attention.stiMin, stiMax: config.attention.stiMax },
    });
    this.reasoner = new Reasoner(this.atomSpace, config.reasoner);
    this.attention = new AttentionAllocator(this.atomSpace, config.attention, deps.evictionPolicy);
    this.events = deps.eventBus ?? new WorkbenchEventBus();
    this.coordinator = new Coordinator({
      atomSpace: this.atomSpace,
      reasoner: this.reasoner,
      attention: this.attention,
      eventBus: this.events,
      attentionWeight: config.scheduler.attentionWeight,
      roleBoosts: { VERIFIER: config.scheduler.verifierPriorityBoost },
    });

    const agents = deps.agents ?? createDefaultAgents({
      tools: config.tools,
      analyzerTimeoutMs: config.analyzer.timeoutMs,
      perRole: config.scheduler.agentsPerRole,
      runner: deps.runner,
    });
    for (const agent of agents) this.coordinator.registerAgent(agent);

    this.snapshotStore = deps.snapshotStore;
    this.ownsSnapshotStore = deps.snapshotStore === undefined;
  }

  // --------------------------------------------------------------------------
  // Models & workflows
  // --------------------------------------------------------------------------

  /**
   * Load a descriptor (object or JSON/YAML file path) into the graph and
   * reset attention to the baseline.
   */
  async loadModel(source: string | ModelDescriptorInput): Promise<PopulationSummary> {
    this.assertOpen();
    const descriptor = typeof source === 'string'
      ? await loadModelDescriptor(source)
      : parseModelDescriptor(source);
    const summary = populateAtomSpace(this.atomSpace, descriptor);
    this.attention.initializeAttention();
    logInfo('[workbench] model loaded', { ...summary });
    await this.events.emit(createModelLoadedEvent(summary.model, summary.atoms, summary.links));
    return summary;
  }

  /**
   * simulate → verify → analyze (→ optimize) for one model and goal. The
   * workflow id is `<workflowName>_<model>`.
   */
  async createAnalysisWorkflow(model: string, options: AnalysisWorkflowOptions = {}): Promise<Workflow> {
    this.assertOpen();
    if (!this.atomSpace.getAtom('MODEL', model)) {
      throw new ValidationError('createAnalysisWorkflow.model', 'a loaded model', model);
    }
    const goal = options.goal ?? this.defaultGoalFor(model);
    if (!this.atomSpace.getAtom('GOAL', goal)) {
      throw new ValidationError('createAnalysisWorkflow.goal', 'an existing goal', goal);
    }

    const workflowId = `${options.workflowName ?? 'comprehensive'}_${model}`;
    const simulate: JsonObject = { model, goal };
    if (options.paths !== undefined) simulate.paths = options.paths;
    if (options.depth !== undefined) simulate.depth = options.depth;
    const verify: JsonObject = { model, goal };
    if (options.precision !== undefined) verify.precision = options.precision;

    const specs: TaskSpec[] = [
      { id: `${workflowId}_simulate`, taskType: 'simulate', role: 'SIMULATOR', parameters: simulate, priority: 0.8 },
      {
        id: `${workflowId}_verify`,
        taskType: 'verify',
        role: 'VERIFIER',
        parameters: verify,
        priority: 0.9,
        dependencies: [`${workflowId}_simulate`],
      },
      {
        id: `${workflowId}_analyze`,
        taskType: 'analyze',
        role: 'ANALYZER',
        parameters: { model, goal, analysisType: 'sensitivity' },
        priority: 0.7,
        dependencies: [`${workflowId}_verify`],
      },
    ];
    if (options.includeOptimization) {
      specs.push({
        id: `${workflowId}_optimize`,
        taskType: 'optimize',
        role: 'OPTIMIZER',
        parameters: { model, goal },
        priority: 0.6,
        dependencies: [`${workflowId}_analyze`],
      });
    }

    const tasks = specs.map((spec) => this.coordinator.createTask(spec));
    const workflow = await this.coordinator.createWorkflow(workflowId, tasks);
    logInfo('[workbench] workflow created', { workflowId, tasks: tasks.length });
    return workflow;
  }

  /** The first goal recorded for a model */
  defaultGoalFor(model: string): string {
    const goal = this.atomSpace.query({ type: 'GOAL', metadata: { model } })[0];
    if (!goal) {
      throw new ValidationError('createAnalysisWorkflow.goal', `a goal recorded for model ${model}`, 'none');
    }
    return goal.name;
  }

  /**
   * Run a workflow, then let attention settle for the configured number of
   * cycles.
   */
  async executeWorkflow(workflowId: string, options: ExecuteWorkflowOptions = {}): Promise<WorkflowReport> {
    this.assertOpen();
    const report = await this.coordinator.executeWorkflow(workflowId, options);
    this.attention.runAttentionCycle(this.config.scheduler.attentionCyclesAfterWorkflow);
    return report;
  }

  // --------------------------------------------------------------------------
  // Reasoning & attention
  // --------------------------------------------------------------------------

  /**
   * Reachability of a goal given the propagated uncertainty of the
   * parameters of its model (all parameters for a goal without a model).
   */
  reasonAboutGoal(goalName: string, mode: EvidenceMode = 'independent'): GoalReasoning {
    this.assertOpen();
    const goal = this.atomSpace.getAtom('GOAL', goalName);
    if (!goal) {
      throw new ValidationError('reasonAboutGoal.goal', 'an existing goal', goalName);
    }
    const model = goal.metadata.model;
    const parameters = this.atomSpace
      .getAtomsByType('PARAMETER')
      .filter((atom) => typeof model !== 'string' || atom.metadata.model === undefined || atom.metadata.model === model);
    const evidence = parameters.map((atom) => ({
      source: atom.name,
      truthValue: this.reasoner.propagateUncertainty(atom.name),
    }));

    const assessment = this.reasoner.reasonAboutReachability(goalName, evidence, mode);
    return {
      goal: goalName,
      reachability: { probability: assessment.probability, confidence: assessment.confidence },
      evidence: evidence.map((item) => ({
        name: item.source,
        strength: item.truthValue.strength,
        confidence: item.truthValue.confidence,
      })),
      explanation: this.reasoner.explainInference(goal.key),
    };
  }

  /**
   * Stimulate the named atoms, run diffusion, and re-bias READY tasks.
   */
  optimizeAttention(options: OptimizeAttentionOptions = {}): AttentionStatistics {
    this.assertOpen();
    const stimulus = options.stimulus ?? DEFAULT_FOCUS_STIMULUS;
    for (const ref of options.focusAtoms ?? []) {
      const matches = this.atomSpace.getAtoms().filter((atom) => atom.key === ref || atom.name === ref);
      if (matches.length === 0) {
        logWarning('[workbench] no atom to focus on', { atom: ref });
        continue;
      }
      for (const atom of matches) this.attention.stimulateAtom(atom.key, stimulus);
    }
    this.attention.runAttentionCycle(options.iterations ?? DEFAULT_FOCUS_ITERATIONS);
    this.coordinator.allocateAttention();
    const stats = this.attention.getStatistics();
    logInfo('[workbench] attention optimized', { ...stats });
    return stats;
  }

  getTopImportantAtoms(n = 10, type?: AtomType): ImportantAtom[] {
    return this.attention.getTopAtoms(n, type).map((atom) => ({
      key: atom.key,
      type: atom.type,
      name: atom.name,
      sti: atom.attention.sti,
      lti: atom.attention.lti,
      truthValue: atom.truthValue,
    }));
  }

  // --------------------------------------------------------------------------
  // State
  // --------------------------------------------------------------------------

  exportState(): WorkbenchSnapshot {
    return createSnapshot(this.atomSpace.toSnapshot(), this.coordinator.toSnapshot());
  }

  async exportStateToFile(filePath: string): Promise<WorkbenchSnapshot> {
    const snapshot = this.exportState();
    await writeSnapshotFile(filePath, snapshot);
    logInfo('[workbench] state exported', { filePath });
    return snapshot;
  }

  /**
   * Replace graph and scheduler state. A snapshot that fails validation or
   * restore leaves the current state in place.
   */
  async importState(source: WorkbenchSnapshot | string): Promise<void> {
    this.assertOpen();
    const snapshot = typeof source === 'string' ? await readSnapshotFile(source) : parseSnapshot(source);
    const previousGraph = this.atomSpace.toSnapshot();
    const previousScheduler = this.coordinator.toSnapshot();
    try {
      this.atomSpace.restore(snapshot.graph);
      this.coordinator.restore(snapshot.scheduler);
    } catch (error: unknown) {
      this.atomSpace.restore(previousGraph);
      this.coordinator.restore(previousScheduler);
      throw error;
    }
    logInfo('[workbench] state imported', {
      atoms: snapshot.graph.atoms.length,
      tasks: snapshot.scheduler.tasks.length,
    });
  }

  async saveSnapshot(name: string): Promise<StoredSnapshotInfo> {
    this.assertOpen();
    const info = await this.store().save(name, this.exportState());
    await this.events.emit(createSnapshotSavedEvent(name, info.atoms));
    return info;
  }

  async restoreSnapshot(name: string): Promise<void> {
    this.assertOpen();
    const snapshot = await this.store().load(name);
    if (!snapshot) {
      throw new ValidationError('restoreSnapshot.name', 'a stored snapshot', name);
    }
    await this.importState(snapshot);
  }

  async listSnapshots(): Promise<StoredSnapshotInfo[]> {
    return this.store().list();
  }

  getStatus(): WorkbenchStatus {
    const counts: Record<AtomType, number> = { MODEL: 0, MODE: 0, PARAMETER: 0, FLOW: 0, JUMP: 0, GOAL: 0 };
    for (const atom of this.atomSpace.getAtoms()) counts[atom.type]++;
    return {
      atomSpace: {
        atoms: this.atomSpace.size,
        links: this.atomSpace.linkCount,
        byType: counts,
        models: this.atomSpace.getAtomsByType('MODEL').map((atom) => atom.name),
      },
      attention: this.attention.getStatistics(),
      scheduler: this.coordinator.getStatistics(),
      focus: this.attention.getAttentionalFocus().map((atom) => atom.key),
      evictionPolicy: this.attention.evictionPolicyName,
      evictionCandidates: this.attention.findEvictionCandidates(),
    };
  }

  /**
   * Close the snapshot store the workbench opened and drop event handlers.
   * Idempotent.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsSnapshotStore) this.snapshotStore?.close();
    this.snapshotStore = undefined;
    this.events.clear();
    logInfo('[workbench] shut down');
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private store(): SnapshotStore {
    this.assertOpen();
    if (!this.snapshotStore) {
      this.snapshotStore = SnapshotStore.open(this.config.storage.snapshotDbPath);
    }
    return this.snapshotStore;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ValidationError('workbench', 'an open workbench', 'shut down');
    }
  }
}

/**
 * Resolve configuration (file, overrides, environment), apply its log
 * level and build a workbench.
 */
export async function initializeWorkbench(options: InitializeWorkbenchOptions = {}): Promise<Workbench> {
  const { configPath, config: overrides, env, ...deps } = options;
  const config = await loadWorkbenchConfig(configPath, overrides, env);
  setLogLevel(config.logLevel);
  return new Workbench(config, deps);
}
