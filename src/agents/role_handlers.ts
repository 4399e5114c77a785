/**
 * @fileoverview Role handlers
 *
 * SIMULATOR, VERIFIER and OPTIMIZER wrap external tools; ANALYZER runs in
 * process. Every handler stages its writes in the outcome and never touches
 * the graph directly.
 */

import type { AtomInput } from '../atomspace/types.js';
import { truthValue } from '../atomspace/values.js';
import type { AgentContext, JsonObject, JsonValue, Task } from '../coordination/types.js';
import { TimeoutError, ValidationError } from '../core/errors.js';
import { OPERATION_AMPLIFICATION, type UncertaintyOperation } from '../reasoning/reasoner.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import {
  OptimizationOutputSchema,
  SimulationOutputSchema,
  VerificationOutputSchema,
  parseProbabilityBounds,
  parseToolOutput,
} from './output_parser.js';
import type { RoleHandler, RoleHandlerTable } from './types.js';

export const DEFAULT_SIMULATION_PATHS = 100;
export const DEFAULT_SIMULATION_DEPTH = 10;
export const DEFAULT_VERIFIER_PRECISION = 0.01;

/** Pseudo-count that turns n trajectories into confidence n/(n+k) */
export const SIMULATION_CONFIDENCE_K = 10;

// ============================================================================
// PARAMETER ACCESS
// ============================================================================

function readString(task: Readonly<Task>, key: string): string {
  const value = task.parameters[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${task.id}.parameters.${key}`, 'a non-empty string', describe(value));
  }
  return value;
}

function readOptionalString(task: Readonly<Task>, key: string): string | undefined {
  return task.parameters[key] === undefined ? undefined : readString(task, key);
}

function readPositive(task: Readonly<Task>, key: string, fallback: number, integer = false): number {
  const value = task.parameters[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ValidationError(
      `${task.id}.parameters.${key}`,
      integer ? 'a positive integer' : 'a positive number',
      describe(value),
    );
  }
  return value;
}

function readStringList(task: Readonly<Task>, key: string): string[] | undefined {
  const value = task.parameters[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ValidationError(`${task.id}.parameters.${key}`, 'an array of strings', describe(value));
  }
  return value.map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new ValidationError(`${task.id}.parameters.${key}[${index}]`, 'a string', describe(entry));
    }
    return entry;
  });
}

function readOperation(task: Readonly<Task>): UncertaintyOperation {
  const value = task.parameters.operation;
  if (value === undefined) return 'identity';
  if (typeof value === 'string' && isOperation(value)) return value;
  throw new ValidationError(
    `${task.id}.parameters.operation`,
    Object.keys(OPERATION_AMPLIFICATION).join(' | '),
    describe(value),
  );
}

function isOperation(value: string): value is UncertaintyOperation {
  return Object.keys(OPERATION_AMPLIFICATION).some((name) => name === value);
}

function describe(value: JsonValue | undefined): string {
  return value === undefined ? 'missing' : JSON.stringify(value);
}

/**
 * `modelFile` from the task, else the one recorded on the named MODEL atom.
 */
function resolveModelFile(task: Readonly<Task>, context: AgentContext): string {
  const explicit = readOptionalString(task, 'modelFile');
  if (explicit) return explicit;
  const model = readOptionalString(task, 'model');
  const recorded = model ? context.atomSpace.getAtom('MODEL', model)?.metadata.modelFile : undefined;
  if (typeof recorded === 'string' && recorded.length > 0) return recorded;
  throw new ValidationError(
    `${task.id}.parameters.modelFile`,
    'a model file, given directly or recorded on the MODEL atom',
    model ? `model ${model} without one` : 'missing',
  );
}

function parametersOf(task: Readonly<Task>, context: AgentContext): string[] {
  const requested = readStringList(task, 'parameters');
  if (requested) return requested;
  const model = readOptionalString(task, 'model');
  return context.atomSpace
    .getAtomsByType('PARAMETER')
    .filter((atom) => model === undefined || atom.metadata.model === undefined || atom.metadata.model === model)
    .map((atom) => atom.name);
}

// ============================================================================
// HANDLERS
// ============================================================================

export const simulate: RoleHandler = async (task, context, deps) => {
  const goal = readString(task, 'goal');
  const modelFile = resolveModelFile(task, context);
  const paths = readPositive(task, 'paths', DEFAULT_SIMULATION_PATHS, true);
  const depth = readPositive(task, 'depth', DEFAULT_SIMULATION_DEPTH, true);

  const run = await deps.runner.run('simulator', deps.tools.simulator, [
    '--model', modelFile,
    '--goal', goal,
    '--paths', String(paths),
    '--depth', String(depth),
  ]);
  const { trajectories } = parseToolOutput('simulator', run.stdout, SimulationOutputSchema);

  const probability = context.reasoner.estimateGoalProbability(trajectories);
  const samples = trajectories.length;
  const confidence = samples / (samples + SIMULATION_CONFIDENCE_K);
  const satisfying = trajectories.filter((trajectory) => trajectory.satisfiesGoal).length;
  logDebug('[agents] simulation parsed', { task: task.id, samples, satisfying });

  return {
    status: 'COMPLETED',
    result: { goal, modelFile, trajectories: samples, satisfying, probability, confidence },
    mutations: {
      atoms: [{
        type: 'GOAL',
        name: goal,
        truthValue: truthValue(probability, confidence),
        metadata: { simulatedTrajectories: samples },
      }],
      links: [],
    },
  };
};

export const verify: RoleHandler = async (task, context, deps) => {
  const goal = readString(task, 'goal');
  const modelFile = resolveModelFile(task, context);
  const precision = readPositive(task, 'precision', DEFAULT_VERIFIER_PRECISION);

  const run = await deps.runner.run('verifier', deps.tools.verifier, [
    '--model', modelFile,
    '--goal', goal,
    '--precision', String(precision),
  ]);
  const output = parseToolOutput('verifier', run.stdout, VerificationOutputSchema, parseProbabilityBounds);
  const [lower, upper] = output.bounds;
  const probability = (lower + upper) / 2;
  const confidence = 1 - (upper - lower);

  return {
    status: 'COMPLETED',
    result: { goal, modelFile, probabilityBounds: [lower, upper], probability, confidence },
    mutations: {
      atoms: [{
        type: 'GOAL',
        name: goal,
        truthValue: truthValue(probability, confidence),
        metadata: { probabilityBounds: [lower, upper] },
      }],
      links: [],
    },
  };
};

/**
 * Ranks parameters by the confidence that survives uncertainty propagation,
 * least confident first: those are the ones worth pinning down. The analyzer
 * timeout is checked before each parameter; 0 disables it.
 */
export const analyze: RoleHandler = async (task, context, deps) => {
  const operation = readOperation(task);
  const names = parametersOf(task, context);

  const ranking = rankParameters(names, operation, context, {
    timeoutMs: deps.analyzerTimeoutMs,
    label: `sensitivity analysis for ${task.id}`,
  });

  const atoms: AtomInput[] = ranking.map((entry, index) => ({
    type: 'PARAMETER',
    name: entry.name,
    metadata: { sensitivityRank: index + 1, propagatedConfidence: entry.confidence },
  }));
  const result: JsonObject = {
    operation,
    ranking: ranking.map((entry) => ({ parameter: entry.name, confidence: entry.confidence })),
  };
  return { status: 'COMPLETED', result, mutations: { atoms, links: [] } };
};

interface RankingBudget {
  timeoutMs: number;
  label: string;
}

function rankParameters(
  names: readonly string[],
  operation: UncertaintyOperation,
  context: AgentContext,
  budget: RankingBudget,
): Array<{ name: string; confidence: number }> {
  const deadline = budget.timeoutMs > 0 ? Date.now() + budget.timeoutMs : undefined;
  const ranking: Array<{ name: string; confidence: number }> = [];
  for (const name of names) {
    if (deadline !== undefined && Date.now() > deadline) {
      throw new TimeoutError(budget.timeoutMs, budget.label);
    }
    ranking.push({ name, confidence: context.reasoner.propagateUncertainty(name, operation).confidence });
  }
  return ranking.sort((a, b) => a.confidence - b.confidence || a.name.localeCompare(b.name));
}

export const optimize: RoleHandler = async (task, context, deps) => {
  const modelFile = resolveModelFile(task, context);
  const goal = readOptionalString(task, 'goal');
  const names = parametersOf(task, context);

  const args = ['--model', modelFile, '--parameters', names.join(',')];
  if (goal) args.push('--goal', goal);
  const run = await deps.runner.run('optimizer', deps.tools.optimizer, args);
  const output = parseToolOutput('optimizer', run.stdout, OptimizationOutputSchema);

  const atoms: AtomInput[] = [];
  const optimum: JsonObject = {};
  for (const [name, value] of Object.entries(output.optimum)) {
    if (!context.atomSpace.getAtom('PARAMETER', name)) {
      logWarning('[agents] optimizer reported an unknown parameter', { task: task.id, parameter: name });
      continue;
    }
    optimum[name] = value;
    atoms.push({ type: 'PARAMETER', name, metadata: { optimum: value } });
  }

  const result: JsonObject = { modelFile, optimum };
  if (goal) result.goal = goal;
  if (output.objective !== undefined) result.objective = output.objective;
  return { status: 'COMPLETED', result, mutations: { atoms, links: [] } };
};

export const ROLE_HANDLERS: RoleHandlerTable = Object.freeze({
  SIMULATOR: simulate,
  VERIFIER: verify,
  ANALYZER: analyze,
  OPTIMIZER: optimize,
});
