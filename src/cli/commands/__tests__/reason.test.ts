/**
 * @fileoverview Tests for the reason command
 *
 * Tests for:
 * - Reasoning from a model file and from a named snapshot
 * - Evidence mode selection
 * - Argument validation
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import { reasonCommand, type ReasonCommandOptions } from '../reason.js';
import { initializeWorkbench } from '../../../orchestrator/workbench.js';
import { SnapshotStore } from '../../../storage/snapshot_store.js';
import { ValidationError } from '../../../core/errors.js';

const MODEL_JSON = JSON.stringify({
  name: 'm',
  modelFile: 'models/m.pdrh',
  modes: [{ id: 1, name: 'grow', flows: [{ variable: 'x', equation: 'k * x' }] }],
  parameters: [{ name: 'k', value: 2, bounds: [1, 3], uncertainty: 0.1 }],
  goals: [{ name: 'g', condition: 'x > 10' }],
});

describe('reasonCommand', () => {
  let testDir: string;
  let modelFile: string;
  let store: SnapshotStore;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'workbench-reason-test-'));
    modelFile = join(testDir, 'm.json');
    await writeFile(modelFile, MODEL_JSON);
    store = new SnapshotStore(new Database(':memory:'));
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    store.close();
    await rm(testDir, { recursive: true, force: true });
  });

  function options(args: string[], json = true): ReasonCommandOptions {
    return {
      args,
      json,
      env: { WORKBENCH_LOG_LEVEL: 'silent' },
      deps: { snapshotStore: store },
    };
  }

  it('should combine parameter evidence with the goal prior', async () => {
    const result = await reasonCommand(options(['g', '--model', modelFile]));

    expect(result.goal).toBe('g');
    expect(result.mode).toBe('independent');
    expect(result.evidence.map((item) => item.name)).toEqual(['k']);
    expect(result.reachability.probability).toBeCloseTo(1, 10);
    expect(result.reachability.confidence).toBeCloseTo(1 / 1.2, 10);
  });

  it('should print the assessment as JSON', async () => {
    const result = await reasonCommand(options(['g', '-m', modelFile]));

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(printed).toEqual(JSON.parse(JSON.stringify(result)));
  });

  it('should print a text summary without --json', async () => {
    await reasonCommand(options(['g', '--model', modelFile], false));

    const lines = consoleLogSpy.mock.calls.map((call) => String(call[0]));
    expect(lines[0]).toBe('\nGoal g (independent evidence):');
    expect(lines).toContain('  evidence   : 1');
  });

  it('should accept the joint evidence mode', async () => {
    const result = await reasonCommand(options(['g', '--model', modelFile, '--mode', 'joint']));

    expect(result.mode).toBe('joint');
    expect(result.evidence).toHaveLength(1);
  });

  it('should reason over a restored snapshot', async () => {
    const setup = await initializeWorkbench({ env: {}, config: { logLevel: 'silent' }, snapshotStore: store });
    await setup.loadModel(modelFile);
    await setup.saveSnapshot('base');
    await setup.shutdown();

    const result = await reasonCommand(options(['g', '--snapshot', 'base']));

    expect(result.evidence.map((item) => item.name)).toEqual(['k']);
    expect(result.reachability.confidence).toBeCloseTo(1 / 1.2, 10);
  });

  it('should require a goal', async () => {
    await expect(reasonCommand(options(['--model', modelFile]))).rejects.toMatchObject({ code: 'EINVALID_ARGUMENT' });
  });

  it('should require exactly one state source', async () => {
    await expect(reasonCommand(options(['g']))).rejects.toMatchObject({ code: 'EINVALID_ARGUMENT' });
    await expect(reasonCommand(options(['g', '--model', modelFile, '--snapshot', 'base']))).rejects.toMatchObject({
      code: 'EINVALID_ARGUMENT',
    });
  });

  it('should reject an unknown evidence mode', async () => {
    await expect(reasonCommand(options(['g', '--model', modelFile, '--mode', 'bayes']))).rejects.toMatchObject({
      code: 'EINVALID_ARGUMENT',
      message: '--mode expects independent | joint, got "bayes"',
    });
  });

  it('should reject a goal the model does not define', async () => {
    await expect(reasonCommand(options(['ghost', '--model', modelFile]))).rejects.toBeInstanceOf(ValidationError);
  });
});
