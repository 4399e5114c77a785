/**
 * @fileoverview Reachability Workbench - Cognitive orchestration for hybrid-model analysis
 *
 * A knowledge graph of model structure, probabilistic reasoning about goal
 * reachability, attention allocation across competing analyses and
 * dependency-respecting scheduling of analysis tasks over role agents.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { initializeWorkbench } from 'reachability-workbench';
 *
 * const workbench = await initializeWorkbench({ configPath: 'workbench.yaml' });
 * await workbench.loadModel('examples/psoriasis_model.yaml');
 *
 * const workflow = await workbench.createAnalysisWorkflow('psoriasis');
 * const report = await workbench.executeWorkflow(workflow.id);
 *
 * const reasoning = workbench.reasonAboutGoal('remission_365');
 * await workbench.shutdown();
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PRIMARY ENTRY POINT
// ============================================================================

export {
  initializeWorkbench,
  Workbench,
  DEFAULT_FOCUS_ITERATIONS,
  DEFAULT_FOCUS_STIMULUS,
} from './orchestrator/index.js';
export type {
  AnalysisWorkflowOptions,
  GoalReasoning,
  ImportantAtom,
  InitializeWorkbenchOptions,
  OptimizeAttentionOptions,
  WorkbenchDependencies,
  WorkbenchStatus,
} from './orchestrator/index.js';

// ============================================================================
// COMPONENTS
// ============================================================================

// Knowledge graph
export { AtomSpace } from './atomspace/atom_space.js';
export type { AtomSpaceOptions, GoalOptions, ParameterOptions } from './atomspace/atom_space.js';
export {
  ATOM_TYPES,
  LINK_TYPES,
  atomKey,
  isAtomKey,
  isAtomType,
  isLinkType,
  linkId,
} from './atomspace/types.js';
export type {
  Atom,
  AtomInput,
  AtomKey,
  AtomMetadata,
  AtomQuery,
  AtomType,
  AttentionValue,
  GraphSnapshot,
  Link,
  LinkInput,
  LinkType,
  MetadataValue,
  MutationBatch,
  Neighbor,
  TruthValue,
} from './atomspace/types.js';
export { CERTAIN, attentionValue, truthValue } from './atomspace/values.js';

// Reasoning
export {
  DEFAULT_REASONER_CONSTANTS,
  abduction,
  conjunction,
  deduction,
  disjunction,
  induction,
  negation,
  revision,
} from './reasoning/pln.js';
export type { ReasonerConstants } from './reasoning/pln.js';
export { OPERATION_AMPLIFICATION, Reasoner } from './reasoning/reasoner.js';
export type {
  ChainStep,
  Derivation,
  Evidence,
  EvidenceMode,
  ForwardChainOptions,
  ForwardChainResult,
  InferenceExplanation,
  ReachabilityAssessment,
  TrajectorySample,
  UncertaintyOperation,
} from './reasoning/reasoner.js';

// Attention
export {
  AttentionAllocator,
  CONTEXT_CONNECTION_BOOST,
  DEFAULT_ATTENTION_CONFIG,
  NO_EVICTION,
  resolveAttentionConfig,
} from './attention/ecan.js';
export type {
  ActivationStimulus,
  AttentionConfig,
  AttentionStatistics,
  DiffusionReport,
  EvictionPolicy,
  GoalStimulus,
} from './attention/ecan.js';

// Scheduling
export { BLOCKED_REASON_PREFIX, Coordinator } from './coordination/coordinator.js';
export type { CoordinatorOptions, ExecuteWorkflowOptions } from './coordination/coordinator.js';
export { SequentialDispatcher } from './coordination/ready_queue.js';
export type { TaskDispatcher } from './coordination/ready_queue.js';
export { AGENT_ROLES, TASK_STATUSES, isAgentRole } from './coordination/types.js';
export type {
  Agent,
  AgentContext,
  AgentRole,
  AttentionSource,
  JsonObject,
  JsonValue,
  SchedulerSnapshot,
  SchedulerStatistics,
  Task,
  TaskFailure,
  TaskOutcome,
  TaskReport,
  TaskSpec,
  TaskStatus,
  Workflow,
  WorkflowReport,
  WorkflowStatus,
} from './coordination/types.js';

// Agents
export * from './agents/index.js';

// ============================================================================
// INGESTION, PERSISTENCE & CONFIGURATION
// ============================================================================

export {
  ModelDescriptorSchema,
  loadModelDescriptor,
  parseModelDescriptor,
  populateAtomSpace,
} from './ingest/model_descriptor.js';
export type { ModelDescriptor, ModelDescriptorInput, PopulationSummary } from './ingest/model_descriptor.js';

export {
  SNAPSHOT_VERSION,
  WorkbenchSnapshotSchema,
  createSnapshot,
  deserializeSnapshot,
  parseSnapshot,
  readSnapshotFile,
  serializeSnapshot,
  writeSnapshotFile,
} from './persistence/snapshot.js';
export type { WorkbenchSnapshot } from './persistence/snapshot.js';
export * from './storage/index.js';

export * from './config/index.js';

// ============================================================================
// AMBIENT
// ============================================================================

export * from './core/index.js';
export { WorkbenchEventBus } from './events.js';
export type { WorkbenchEvent, WorkbenchEventHandler, WorkbenchEventType } from './events.js';
export { getLogLevel, setLogLevel, logDebug, logError, logInfo, logWarning } from './telemetry/logger.js';
export type { LogLevel } from './telemetry/logger.js';

// ============================================================================
// VERSION
// ============================================================================

/**
 * Increment MAJOR when the snapshot format changes incompatibly.
 */
export const WORKBENCH_VERSION = {
  major: 0,
  minor: 1,
  patch: 0,
  string: '0.1.0',
} as const;
