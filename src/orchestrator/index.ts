/**
 * @fileoverview Workbench Orchestrator Module
 *
 * The primary entry point: one call resolves configuration and builds a
 * workbench session with its graph, reasoner, attention allocator,
 * scheduler and role agents.
 *
 * @example
 * ```typescript
 * import { initializeWorkbench } from 'reachability-workbench';
 *
 * const workbench = await initializeWorkbench();
 * await workbench.loadModel('examples/psoriasis_model.yaml');
 * const workflow = await workbench.createAnalysisWorkflow('psoriasis');
 * await workbench.executeWorkflow(workflow.id);
 * console.log(workbench.getTopImportantAtoms(5));
 * ```
 *
 * @packageDocumentation
 */

export {
  initializeWorkbench,
  Workbench,
  DEFAULT_FOCUS_STIMULUS,
  DEFAULT_FOCUS_ITERATIONS,
  type WorkbenchDependencies,
  type InitializeWorkbenchOptions,
  type AnalysisWorkflowOptions,
  type GoalReasoning,
  type OptimizeAttentionOptions,
  type ImportantAtom,
  type WorkbenchStatus,
} from './workbench.js';
