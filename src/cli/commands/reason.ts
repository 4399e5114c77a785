/**
 * @fileoverview Reason command - Reachability of a goal from parameter evidence
 */

import type { ConfigEnv } from '../../config/workbench_config.js';
import type { EvidenceMode } from '../../reasoning/reasoner.js';
import {
  initializeWorkbench,
  type GoalReasoning,
  type WorkbenchDependencies,
} from '../../orchestrator/workbench.js';
import { createError } from '../errors.js';
import { formatNumber, printKeyValue, printTable } from '../progress.js';
import { parseCommandArgs } from './args.js';

export interface ReasonCommandOptions {
  args: string[];
  configPath?: string;
  json?: boolean;
  env?: ConfigEnv;
  deps?: WorkbenchDependencies;
}

export interface ReasonCommandResult extends GoalReasoning {
  mode: EvidenceMode;
}

const EVIDENCE_MODES: readonly EvidenceMode[] = ['independent', 'joint'];

function readMode(value: string | undefined): EvidenceMode {
  if (value === undefined) return 'independent';
  const mode = EVIDENCE_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw createError('EINVALID_ARGUMENT', `--mode expects ${EVIDENCE_MODES.join(' | ')}, got "${value}"`, { flag: '--mode' });
  }
  return mode;
}

export async function reasonCommand(options: ReasonCommandOptions): Promise<ReasonCommandResult> {
  const args = parseCommandArgs('reason', options.args, {
    model: { type: 'string', short: 'm' },
    snapshot: { type: 'string' },
    mode: { type: 'string' },
  });

  const goal = args.positionals[0];
  if (!goal) {
    throw createError('EINVALID_ARGUMENT', 'Goal name is required. Usage: workbench reason <goal> --model <file>');
  }
  const modelFile = args.string('model');
  const snapshot = args.string('snapshot');
  if ((modelFile === undefined) === (snapshot === undefined)) {
    throw createError('EINVALID_ARGUMENT', 'Give exactly one of --model <file> or --snapshot <name>');
  }
  const mode = readMode(args.string('mode'));

  const workbench = await initializeWorkbench({ configPath: options.configPath, env: options.env, ...options.deps });
  try {
    if (modelFile !== undefined) {
      await workbench.loadModel(modelFile);
    } else if (snapshot !== undefined) {
      await workbench.restoreSnapshot(snapshot);
    }
    const result: ReasonCommandResult = { ...workbench.reasonAboutGoal(goal, mode), mode };

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printReasoning(result);
    }
    return result;
  } finally {
    await workbench.shutdown();
  }
}

function printReasoning(result: ReasonCommandResult): void {
  console.log(`\nGoal ${result.goal} (${result.mode} evidence):`);
  printKeyValue([
    { key: 'probability', value: formatNumber(result.reachability.probability) },
    { key: 'confidence', value: formatNumber(result.reachability.confidence) },
    { key: 'evidence', value: result.evidence.length },
  ]);
  if (result.evidence.length > 0) {
    console.log('');
    printTable(
      ['Parameter', 'Strength', 'Confidence'],
      result.evidence.map((item) => [item.name, formatNumber(item.strength), formatNumber(item.confidence)]),
    );
  }
}
