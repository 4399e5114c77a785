/**
 * @fileoverview Run command - Load a model and execute the analysis workflow
 */

import type { ConfigEnv } from '../../config/workbench_config.js';
import type { JsonObject, TaskFailure, WorkflowReport } from '../../coordination/types.js';
import type { TruthValue } from '../../atomspace/types.js';
import type { StoredSnapshotInfo } from '../../storage/snapshot_store.js';
import {
  initializeWorkbench,
  type ImportantAtom,
  type WorkbenchDependencies,
} from '../../orchestrator/workbench.js';
import { createError, type ErrorCode } from '../errors.js';
import { createProgressBar, formatDuration, formatNumber, printKeyValue, printTable, type ProgressBarHandle } from '../progress.js';
import { parseCommandArgs, readList, readNumber } from './args.js';

export interface RunCommandOptions {
  args: string[];
  configPath?: string;
  json?: boolean;
  env?: ConfigEnv;
  /** Injected collaborators; tests pass a fake tool runner here */
  deps?: WorkbenchDependencies;
}

export interface RunCommandResult {
  model: { name: string; atoms: number; links: number };
  report: WorkflowReport;
  goal: { name: string; truthValue: TruthValue; probabilityBounds?: number[] };
  topAtoms: ImportantAtom[];
  snapshot?: StoredSnapshotInfo;
  exportedTo?: string;
}

const DEFAULT_TOP_ATOMS = 10;

export async function runCommand(options: RunCommandOptions): Promise<RunCommandResult> {
  const args = parseCommandArgs('run', options.args, {
    goal: { type: 'string' },
    workflow: { type: 'string' },
    optimize: { type: 'boolean', default: false },
    paths: { type: 'string' },
    depth: { type: 'string' },
    precision: { type: 'string' },
    focus: { type: 'string' },
    top: { type: 'string' },
    save: { type: 'string' },
    export: { type: 'string' },
  });

  const modelFile = args.positionals[0];
  if (!modelFile) {
    throw createError('EINVALID_ARGUMENT', 'Model file is required. Usage: workbench run <model-file>');
  }
  const json = options.json ?? false;

  const workbench = await initializeWorkbench({ configPath: options.configPath, env: options.env, ...options.deps });
  try {
    const model = await workbench.loadModel(modelFile);
    const goalName = args.string('goal') ?? workbench.defaultGoalFor(model.model);
    const workflow = await workbench.createAnalysisWorkflow(model.model, {
      goal: goalName,
      workflowName: args.string('workflow'),
      includeOptimization: args.flag('optimize'),
      paths: readNumber(args.string('paths'), '--paths', { integer: true }),
      depth: readNumber(args.string('depth'), '--depth', { integer: true }),
      precision: readNumber(args.string('precision'), '--precision'),
    });

    const progress: ProgressBarHandle | undefined = json || !process.stdout.isTTY
      ? undefined
      : createProgressBar({ total: workflow.taskIds.length });
    const unsubscribe = workbench.events.on('*', (event) => {
      if (event.type === 'task_completed' || event.type === 'task_failed') {
        progress?.increment(1, { task: String(event.data.taskId) });
      }
    });
    let report: WorkflowReport;
    try {
      report = await workbench.executeWorkflow(workflow.id);
    } finally {
      unsubscribe();
      progress?.stop();
    }

    const focus = readList(args.string('focus'));
    if (focus.length > 0) workbench.optimizeAttention({ focusAtoms: focus });

    const goalAtom = workbench.atomSpace.getAtom('GOAL', goalName);
    const bounds = goalAtom?.metadata.probabilityBounds;
    const result: RunCommandResult = {
      model: { name: model.model, atoms: model.atoms, links: model.links },
      report,
      goal: {
        name: goalName,
        truthValue: goalAtom?.truthValue ?? { strength: 0.5, confidence: 0 },
        ...(Array.isArray(bounds) ? { probabilityBounds: bounds } : {}),
      },
      topAtoms: workbench.getTopImportantAtoms(readNumber(args.string('top'), '--top', { integer: true }) ?? DEFAULT_TOP_ATOMS),
    };
    const saveAs = args.string('save');
    if (saveAs !== undefined) {
      result.snapshot = await workbench.saveSnapshot(saveAs);
    }
    const exportTo = args.string('export');
    if (exportTo !== undefined) {
      await workbench.exportStateToFile(exportTo);
      result.exportedTo = exportTo;
    }

    if (json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printRunResult(result);
    }

    if (report.status !== 'completed') {
      throw createError(workflowErrorCode(report), `Workflow ${report.workflowId} finished with status ${report.status}`, {
        failed: report.failed,
        blocked: report.blocked,
      });
    }
    return result;
  } finally {
    await workbench.shutdown();
  }
}

/**
 * The first failed task decides the exit code: tool and timeout failures
 * keep their own codes.
 */
function workflowErrorCode(report: WorkflowReport): ErrorCode {
  const first = report.failed[0];
  const error: TaskFailure | undefined = first === undefined ? undefined : report.tasks[first]?.error;
  if (error?.kind === 'ExternalToolError') return 'ETOOL';
  if (error?.kind === 'TimeoutError') return 'ETIMEOUT';
  return 'EWORKFLOW_FAILED';
}

function printRunResult(result: RunCommandResult): void {
  const { report, goal } = result;
  console.log(`\nModel ${result.model.name}: ${result.model.atoms} atoms, ${result.model.links} links`);
  console.log(`Workflow ${report.workflowId}: ${report.status} in ${formatDuration(report.durationMs)}\n`);

  printTable(
    ['Task', 'Role', 'Status', 'Detail'],
    Object.entries(report.tasks).map(([id, task]) => [
      id,
      task.role,
      task.status,
      task.error ? `${task.error.kind}: ${task.error.message}` : task.reason ?? summarizeResult(task.result),
    ]),
  );

  console.log(`\nGoal ${goal.name}:`);
  printKeyValue([
    { key: 'probability', value: formatNumber(goal.truthValue.strength) },
    { key: 'confidence', value: formatNumber(goal.truthValue.confidence) },
    { key: 'bounds', value: goal.probabilityBounds ? `[${goal.probabilityBounds.join(', ')}]` : null },
  ]);

  console.log('\nMost important atoms:');
  printTable(
    ['Atom', 'STI', 'LTI'],
    result.topAtoms.map((atom) => [atom.key, formatNumber(atom.sti), formatNumber(atom.lti)]),
  );

  if (result.snapshot) console.log(`\nSnapshot saved: ${result.snapshot.name}`);
  if (result.exportedTo) console.log(`\nState exported: ${result.exportedTo}`);
}

function summarizeResult(result: JsonObject | undefined): string {
  if (!result) return '';
  const { probability, confidence } = result;
  if (typeof probability === 'number' && typeof confidence === 'number') {
    return `p=${formatNumber(probability)} c=${formatNumber(confidence)}`;
  }
  const ranking = result.ranking;
  if (Array.isArray(ranking)) return `${ranking.length} parameter(s) ranked`;
  const optimum = result.optimum;
  if (optimum && typeof optimum === 'object' && !Array.isArray(optimum)) {
    return `${Object.keys(optimum).length} parameter(s) optimized`;
  }
  return '';
}
