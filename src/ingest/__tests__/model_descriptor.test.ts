/**
 * @fileoverview Tests for model descriptor ingestion
 *
 * Tests for:
 * - Schema validation and ParseError issues
 * - Population of the AtomSpace
 * - Loading the bundled YAML example
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import {
  loadModelDescriptor,
  parseModelDescriptor,
  populateAtomSpace,
  type ModelDescriptorInput,
} from '../model_descriptor.js';
import { AtomSpace } from '../../atomspace/atom_space.js';
import { ParseError } from '../../core/errors.js';

const smallModel: ModelDescriptorInput = {
  name: 'm',
  modelFile: 'm.pdrh',
  modes: [
    { id: 1, name: 'on', flows: [{ variable: 'x', equation: '-x' }] },
    { id: 2, name: 'off' },
  ],
  jumps: [{ from: 1, to: 2, guard: 'x < 1', probability: 0.25 }],
  parameters: [{ name: 'k', value: 2, bounds: [1, 3], uncertainty: 0.1 }],
  goals: [{ name: 'g', condition: 'x < 0.5' }],
};

describe('parseModelDescriptor', () => {
  it('should fill in empty lists for omitted sections', () => {
    const descriptor = parseModelDescriptor({ name: 'bare', modes: [{ id: 0, name: 'only' }] });

    expect(descriptor.jumps).toEqual([]);
    expect(descriptor.parameters).toEqual([]);
    expect(descriptor.goals).toEqual([]);
    expect(descriptor.modes[0]?.flows).toEqual([]);
  });

  it('should list every invalid field', () => {
    try {
      parseModelDescriptor({ name: '', modes: [], parameters: [{ name: 'k', value: 'high' }] });
      expect.unreachable('descriptor should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      const issues = error instanceof ParseError ? error.issues : [];
      expect(issues.some((issue) => issue.startsWith('name:'))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('modes:'))).toBe(true);
      expect(issues.some((issue) => issue.startsWith('parameters.0.value:'))).toBe(true);
    }
  });

  it('should reject jumps between unknown modes', () => {
    try {
      parseModelDescriptor({ ...smallModel, jumps: [{ from: 1, to: 3, guard: 'true' }] });
      expect.unreachable('descriptor should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error instanceof ParseError ? error.issues : []).toEqual(['jumps.0.to: unknown mode id 3']);
    }
  });

  it('should reject duplicate mode ids', () => {
    expect(() => parseModelDescriptor({
      name: 'm',
      modes: [{ id: 1, name: 'a' }, { id: 1, name: 'b' }],
    })).toThrow(/1 invalid field/);
  });
});

describe('populateAtomSpace', () => {
  it('should create atoms and links for the whole model', () => {
    const space = new AtomSpace();

    const summary = populateAtomSpace(space, parseModelDescriptor(smallModel));

    expect(summary).toEqual({ model: 'm', atoms: 7, links: 7 });
    expect(space.getAtoms().map((atom) => atom.key)).toEqual([
      'MODEL:m',
      'MODE:m_mode_1',
      'FLOW:m_mode_1_flow_x',
      'MODE:m_mode_2',
      'JUMP:m_mode_1_to_m_mode_2',
      'PARAMETER:k',
      'GOAL:g',
    ]);
    expect(space.getLink('IMPLICATION:MODE:m_mode_1->MODE:m_mode_2')?.truthValue).toEqual({
      strength: 0.25,
      confidence: 1,
    });
    expect(space.getAtom('PARAMETER', 'k')?.metadata).toEqual({
      value: 2,
      bounds: [1, 3],
      uncertainty: 0.1,
      model: 'm',
    });
    expect(space.getAtom('MODEL', 'm')?.metadata.modelFile).toBe('m.pdrh');
  });
});

describe('loadModelDescriptor', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'workbench-descriptor-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should load the bundled psoriasis example', async () => {
    const file = fileURLToPath(new URL('../../../examples/psoriasis_model.yaml', import.meta.url));

    const descriptor = await loadModelDescriptor(file);
    const space = new AtomSpace();
    const summary = populateAtomSpace(space, descriptor);

    expect(descriptor.name).toBe('psoriasis');
    expect(descriptor.parameters.map((parameter) => parameter.name)).toEqual(['gamma1', 'gamma1d', 'k1as', 'beta1', 'InA']);
    expect(descriptor.parameters[3]?.value).toBe(1.97e-6);
    expect(summary).toEqual({ model: 'psoriasis', atoms: 14, links: 14 });
  });

  it('should read JSON by extension', async () => {
    const file = join(testDir, 'model.json');
    await writeFile(file, JSON.stringify(smallModel));

    const descriptor = await loadModelDescriptor(file);

    expect(descriptor.goals).toEqual([{ name: 'g', condition: 'x < 0.5' }]);
  });

  it('should report malformed YAML as ParseError', async () => {
    const file = join(testDir, 'model.yaml');
    await writeFile(file, 'name: [unclosed\n');

    await expect(loadModelDescriptor(file)).rejects.toThrow(ParseError);
  });
});
