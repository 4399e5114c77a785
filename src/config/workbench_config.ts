/**
 * @fileoverview Workbench configuration
 *
 * Resolution order, later wins:
 * 1. DEFAULT_WORKBENCH_CONFIG
 * 2. A YAML or JSON file (any subset of keys)
 * 3. Programmatic overrides
 * 4. Environment: WORKBENCH_LOG_LEVEL, WORKBENCH_TOOL_TIMEOUT_MS,
 *    WORKBENCH_SNAPSHOT_DB
 *
 * The merged result is validated once; any problem surfaces as a
 * ConfigurationError naming the offending key.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { z, type ZodError } from 'zod';
import { DEFAULT_ATTENTION_CONFIG, resolveAttentionConfig } from '../attention/ecan.js';
import { ConfigurationError, ValidationError } from '../core/errors.js';
import { DEFAULT_REASONER_CONSTANTS, assertReasonerConstants } from '../reasoning/pln.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// SCHEMA
// ============================================================================

const ToolSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()),
  timeoutMs: z.number().int().positive(),
}).strict();

export const WorkbenchConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  attention: z.object({
    stiMin: z.number(),
    stiMax: z.number(),
    baselineSti: z.number(),
    baselineLti: z.number(),
    rent: z.number(),
    learningFraction: z.number(),
    focusSize: z.number(),
    focusThreshold: z.number(),
    defaultDecayRate: z.number(),
    focusDecay: z.number(),
    focusMaxHops: z.number(),
    ltiLearningRate: z.number(),
  }).strict(),
  reasoner: z.object({
    neutralPrior: z.number(),
    confidenceReduction: z.number(),
  }).strict(),
  scheduler: z.object({
    attentionWeight: z.number().nonnegative(),
    verifierPriorityBoost: z.number().nonnegative(),
    attentionCyclesAfterWorkflow: z.number().int().nonnegative(),
    agentsPerRole: z.number().int().positive(),
  }).strict(),
  tools: z.object({
    simulator: ToolSchema,
    verifier: ToolSchema,
    optimizer: ToolSchema,
  }).strict(),
  analyzer: z.object({
    timeoutMs: z.number().int().nonnegative(),
  }).strict(),
  storage: z.object({
    snapshotDbPath: z.string().min(1),
  }).strict(),
}).strict();

export type WorkbenchConfig = z.infer<typeof WorkbenchConfigSchema>;

const WorkbenchConfigOverridesSchema = WorkbenchConfigSchema.deepPartial();
export type WorkbenchConfigOverrides = z.infer<typeof WorkbenchConfigOverridesSchema>;

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_TOOL_TIMEOUT_MS = 300_000;

export const DEFAULT_WORKBENCH_CONFIG: WorkbenchConfig = {
  logLevel: 'info',
  attention: { ...DEFAULT_ATTENTION_CONFIG },
  reasoner: { ...DEFAULT_REASONER_CONSTANTS },
  scheduler: {
    attentionWeight: 1,
    verifierPriorityBoost: 0.2,
    attentionCyclesAfterWorkflow: 5,
    agentsPerRole: 1,
  },
  tools: {
    simulator: { command: 'probreach-sim', args: [], timeoutMs: DEFAULT_TOOL_TIMEOUT_MS },
    verifier: { command: 'probreach', args: [], timeoutMs: DEFAULT_TOOL_TIMEOUT_MS },
    optimizer: { command: 'probreach-opt', args: [], timeoutMs: DEFAULT_TOOL_TIMEOUT_MS },
  },
  analyzer: { timeoutMs: 60_000 },
  storage: { snapshotDbPath: '.workbench/snapshots.db' },
};

// ============================================================================
// RESOLUTION
// ============================================================================

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

/**
 * Merge overrides onto the defaults, apply the environment and validate.
 */
export function resolveWorkbenchConfig(
  overrides: WorkbenchConfigOverrides = {},
  env: ConfigEnv = process.env,
): WorkbenchConfig {
  const checked = WorkbenchConfigOverridesSchema.safeParse(overrides);
  if (!checked.success) throw toConfigurationError(checked.error);

  const merged = applyEnv(mergeConfig(DEFAULT_WORKBENCH_CONFIG, checked.data), env);
  const parsed = WorkbenchConfigSchema.safeParse(merged);
  if (!parsed.success) throw toConfigurationError(parsed.error);

  try {
    resolveAttentionConfig(parsed.data.attention);
    assertReasonerConstants(parsed.data.reasoner);
  } catch (error: unknown) {
    if (error instanceof ValidationError) {
      throw new ConfigurationError(error.field, `expected ${error.expected}, got ${error.received}`);
    }
    throw error;
  }
  return parsed.data;
}

/**
 * Read a YAML or JSON file (by extension; anything but `.json` is read as
 * YAML) and resolve it against the defaults. Without a path only the
 * defaults and environment apply.
 */
export async function loadWorkbenchConfig(
  configPath?: string,
  overrides: WorkbenchConfigOverrides = {},
  env: ConfigEnv = process.env,
): Promise<WorkbenchConfig> {
  if (!configPath) return resolveWorkbenchConfig(overrides, env);

  let raw: string;
  try {
    raw = await readFile(configPath, 'utf8');
  } catch (error: unknown) {
    throw new ConfigurationError(configPath, `cannot read config file: ${getErrorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = path.extname(configPath).toLowerCase() === '.json' ? JSON.parse(raw) : YAML.parse(raw);
  } catch (error: unknown) {
    throw new ConfigurationError(configPath, `cannot parse config file: ${getErrorMessage(error)}`);
  }

  // An empty YAML file parses to null
  const fromFile = WorkbenchConfigOverridesSchema.safeParse(document ?? {});
  if (!fromFile.success) throw toConfigurationError(fromFile.error);
  return resolveWorkbenchConfig(mergeOverrides(fromFile.data, overrides), env);
}

// ============================================================================
// HELPERS
// ============================================================================

function mergeConfig(base: WorkbenchConfig, overrides: WorkbenchConfigOverrides): WorkbenchConfig {
  return {
    logLevel: overrides.logLevel ?? base.logLevel,
    attention: { ...base.attention, ...overrides.attention },
    reasoner: { ...base.reasoner, ...overrides.reasoner },
    scheduler: { ...base.scheduler, ...overrides.scheduler },
    tools: {
      simulator: mergeTool(base.tools.simulator, overrides.tools?.simulator),
      verifier: mergeTool(base.tools.verifier, overrides.tools?.verifier),
      optimizer: mergeTool(base.tools.optimizer, overrides.tools?.optimizer),
    },
    analyzer: { ...base.analyzer, ...overrides.analyzer },
    storage: { ...base.storage, ...overrides.storage },
  };
}

type ToolConfig = WorkbenchConfig['tools']['simulator'];
type ToolOverrides = NonNullable<NonNullable<WorkbenchConfigOverrides['tools']>['simulator']>;

function mergeTool(base: ToolConfig, overrides: ToolOverrides | undefined): ToolConfig {
  return {
    command: overrides?.command ?? base.command,
    args: overrides?.args ?? base.args,
    timeoutMs: overrides?.timeoutMs ?? base.timeoutMs,
  };
}

function mergeOverrides(first: WorkbenchConfigOverrides, second: WorkbenchConfigOverrides): WorkbenchConfigOverrides {
  return {
    ...first,
    ...second,
    attention: { ...first.attention, ...second.attention },
    reasoner: { ...first.reasoner, ...second.reasoner },
    scheduler: { ...first.scheduler, ...second.scheduler },
    tools: {
      simulator: { ...first.tools?.simulator, ...second.tools?.simulator },
      verifier: { ...first.tools?.verifier, ...second.tools?.verifier },
      optimizer: { ...first.tools?.optimizer, ...second.tools?.optimizer },
    },
    analyzer: { ...first.analyzer, ...second.analyzer },
    storage: { ...first.storage, ...second.storage },
  };
}

function applyEnv(config: WorkbenchConfig, env: ConfigEnv): WorkbenchConfig {
  let result = config;

  const level = env.WORKBENCH_LOG_LEVEL?.trim();
  if (level) {
    const parsed = WorkbenchConfigSchema.shape.logLevel.safeParse(level);
    if (!parsed.success) {
      throw new ConfigurationError('WORKBENCH_LOG_LEVEL', `unknown log level "${level}"`);
    }
    result = { ...result, logLevel: parsed.data };
  }

  const timeout = env.WORKBENCH_TOOL_TIMEOUT_MS?.trim();
  if (timeout) {
    const timeoutMs = Number(timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError('WORKBENCH_TOOL_TIMEOUT_MS', `expected a positive integer, got "${timeout}"`);
    }
    result = {
      ...result,
      tools: {
        simulator: { ...result.tools.simulator, timeoutMs },
        verifier: { ...result.tools.verifier, timeoutMs },
        optimizer: { ...result.tools.optimizer, timeoutMs },
      },
    };
  }

  const snapshotDb = env.WORKBENCH_SNAPSHOT_DB?.trim();
  if (snapshotDb) {
    result = { ...result, storage: { ...result.storage, snapshotDbPath: snapshotDb } };
  }
  return result;
}

function toConfigurationError(error: ZodError): ConfigurationError {
  const [first] = error.errors;
  const key = first && first.path.length > 0 ? first.path.join('.') : 'config';
  const details = error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return new ConfigurationError(key, details.join('; '));
}
