/**
 * @fileoverview Tests for workbench configuration
 *
 * Tests for:
 * - Defaults and nested overrides
 * - YAML and JSON config files
 * - Environment overrides
 * - ConfigurationError on invalid input
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DEFAULT_WORKBENCH_CONFIG,
  loadWorkbenchConfig,
  resolveWorkbenchConfig,
} from '../workbench_config.js';
import { ConfigurationError } from '../../core/errors.js';

describe('resolveWorkbenchConfig', () => {
  it('should return the defaults without overrides', () => {
    expect(resolveWorkbenchConfig({}, {})).toEqual(DEFAULT_WORKBENCH_CONFIG);
  });

  it('should merge nested overrides key by key', () => {
    const config = resolveWorkbenchConfig({
      attention: { rent: 2 },
      tools: { verifier: { command: '/opt/bin/verify' } },
    }, {});

    expect(config.attention.rent).toBe(2);
    expect(config.attention.stiMax).toBe(DEFAULT_WORKBENCH_CONFIG.attention.stiMax);
    expect(config.tools.verifier).toEqual({
      command: '/opt/bin/verify',
      args: [],
      timeoutMs: DEFAULT_WORKBENCH_CONFIG.tools.verifier.timeoutMs,
    });
    expect(config.tools.simulator).toEqual(DEFAULT_WORKBENCH_CONFIG.tools.simulator);
  });

  it('should apply environment overrides last', () => {
    const config = resolveWorkbenchConfig({ logLevel: 'warn' }, {
      WORKBENCH_LOG_LEVEL: 'debug',
      WORKBENCH_TOOL_TIMEOUT_MS: '1500',
      WORKBENCH_SNAPSHOT_DB: '/tmp/snapshots.db',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.tools.simulator.timeoutMs).toBe(1500);
    expect(config.tools.verifier.timeoutMs).toBe(1500);
    expect(config.tools.optimizer.timeoutMs).toBe(1500);
    expect(config.storage.snapshotDbPath).toBe('/tmp/snapshots.db');
  });

  it('should reject a malformed environment value', () => {
    expect(() => resolveWorkbenchConfig({}, { WORKBENCH_TOOL_TIMEOUT_MS: 'soon' }))
      .toThrow(ConfigurationError);
    expect(() => resolveWorkbenchConfig({}, { WORKBENCH_LOG_LEVEL: 'loud' }))
      .toThrow(/WORKBENCH_LOG_LEVEL/);
  });

  it('should name the offending key for invalid values', () => {
    try {
      resolveWorkbenchConfig({ scheduler: { agentsPerRole: 0 } }, {});
      expect.unreachable('config should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ configKey: 'scheduler.agentsPerRole' });
    }
  });

  it('should reject attention settings the allocator would refuse', () => {
    try {
      resolveWorkbenchConfig({ attention: { stiMin: 10, stiMax: 5 } }, {});
      expect.unreachable('config should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ configKey: 'attention.stiMin' });
    }
  });

  it('should default the verifier boost and LTI learning rate', () => {
    const config = resolveWorkbenchConfig({}, {});

    expect(config.scheduler.verifierPriorityBoost).toBe(0.2);
    expect(config.attention.ltiLearningRate).toBe(0.01);
  });

  it('should reject a negative verifier boost', () => {
    try {
      resolveWorkbenchConfig({ scheduler: { verifierPriorityBoost: -0.1 } }, {});
      expect.unreachable('config should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ configKey: 'scheduler.verifierPriorityBoost' });
    }
  });

  it('should reject reasoner constants outside their range', () => {
    expect(() => resolveWorkbenchConfig({ reasoner: { confidenceReduction: 1 } }, {}))
      .toThrow(/reasoner\.confidenceReduction/);
  });
});

describe('loadWorkbenchConfig', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'workbench-config-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should read a YAML file', async () => {
    const file = join(testDir, 'workbench.yaml');
    await writeFile(file, [
      'logLevel: error',
      'scheduler:',
      '  attentionWeight: 2.5',
      'tools:',
      '  simulator:',
      '    command: sim',
      '    args: ["--fast"]',
      '',
    ].join('\n'));

    const config = await loadWorkbenchConfig(file, {}, {});

    expect(config.logLevel).toBe('error');
    expect(config.scheduler.attentionWeight).toBe(2.5);
    expect(config.scheduler.attentionCyclesAfterWorkflow).toBe(5);
    expect(config.tools.simulator).toEqual({ command: 'sim', args: ['--fast'], timeoutMs: 300_000 });
  });

  it('should let programmatic overrides win over the file', async () => {
    const file = join(testDir, 'workbench.json');
    await writeFile(file, JSON.stringify({ analyzer: { timeoutMs: 10 }, storage: { snapshotDbPath: 'a.db' } }));

    const config = await loadWorkbenchConfig(file, { storage: { snapshotDbPath: 'b.db' } }, {});

    expect(config.analyzer.timeoutMs).toBe(10);
    expect(config.storage.snapshotDbPath).toBe('b.db');
  });

  it('should treat an empty YAML file as no overrides', async () => {
    const file = join(testDir, 'empty.yaml');
    await writeFile(file, '');

    await expect(loadWorkbenchConfig(file, {}, {})).resolves.toEqual(DEFAULT_WORKBENCH_CONFIG);
  });

  it('should reject unknown keys', async () => {
    const file = join(testDir, 'typo.yaml');
    await writeFile(file, 'scheduler:\n  attentionWieght: 2\n');

    await expect(loadWorkbenchConfig(file, {}, {})).rejects.toThrow(ConfigurationError);
  });

  it('should report a missing file as ConfigurationError', async () => {
    await expect(loadWorkbenchConfig(join(testDir, 'missing.yaml'), {}, {}))
      .rejects.toThrow(/cannot read config file/);
  });

  it('should report malformed JSON as ConfigurationError', async () => {
    const file = join(testDir, 'broken.json');
    await writeFile(file, '{"logLevel":');

    await expect(loadWorkbenchConfig(file, {}, {})).rejects.toThrow(/cannot parse config file/);
  });
});
