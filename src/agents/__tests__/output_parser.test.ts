/**
 * Tests for tool output parsing
 *
 * Tests for:
 * - JSON outputs validated against the tool schemas
 * - `P = [lo, hi]` fallback for verifiers
 * - Unparsable output errors
 */

import { describe, it, expect } from 'vitest';
import {
  OptimizationOutputSchema,
  SimulationOutputSchema,
  VerificationOutputSchema,
  parseProbabilityBounds,
  parseToolOutput,
} from '../output_parser.js';
import { ExternalToolError } from '../../core/errors.js';

describe('parseToolOutput', () => {
  it('should parse simulator trajectories', () => {
    const stdout = JSON.stringify({
      trajectories: [{ id: 't1', satisfiesGoal: true, length: 12 }, { satisfiesGoal: false }],
    });

    const output = parseToolOutput('simulator', stdout, SimulationOutputSchema);

    expect(output.trajectories).toHaveLength(2);
    expect(output.trajectories[0]).toEqual({ id: 't1', satisfiesGoal: true, length: 12 });
  });

  it('should parse verifier bounds from JSON', () => {
    const output = parseToolOutput('verifier', '{"bounds":[0.2,0.4]}', VerificationOutputSchema, parseProbabilityBounds);

    expect(output.bounds).toEqual([0.2, 0.4]);
  });

  it('should fall back to a bounds line when stdout is not JSON', () => {
    const stdout = 'checking 4 modes\nP = [0.125, 0.375]\ndone';

    const output = parseToolOutput('verifier', stdout, VerificationOutputSchema, parseProbabilityBounds);

    expect(output.bounds).toEqual([0.125, 0.375]);
  });

  it('should fall back to a bounds line when stdout is JSON of the wrong shape', () => {
    const output = parseToolOutput('verifier', '"P = [0.2, 0.4]"', VerificationOutputSchema, parseProbabilityBounds);

    expect(output.bounds).toEqual([0.2, 0.4]);
  });

  it('should report the schema issues when the fallback finds nothing either', () => {
    const attempt = () => parseToolOutput('verifier', '0.5', VerificationOutputSchema, parseProbabilityBounds);

    expect(attempt).toThrow(ExternalToolError);
    expect(attempt).toThrow(/\(root\)/);
  });

  it('should reject JSON that does not match the schema with the failing path', () => {
    const attempt = () => parseToolOutput('optimizer', '{"optimum":{"k":"high"}}', OptimizationOutputSchema);

    expect(attempt).toThrow(ExternalToolError);
    expect(attempt).toThrow(/optimum\.k/);
  });

  it('should reject inverted bounds', () => {
    const attempt = () => parseToolOutput('verifier', '{"bounds":[0.6,0.4]}', VerificationOutputSchema);

    expect(attempt).toThrow(/lower bound exceeds upper bound/);
  });

  it('should report unparsable text without a fallback', () => {
    try {
      parseToolOutput('simulator', 'segfault', SimulationOutputSchema);
      expect.unreachable('parse should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ExternalToolError);
      expect(error).toMatchObject({ tool: 'simulator', failure: 'unparsable_output' });
    }
  });
});

describe('parseProbabilityBounds', () => {
  it('should read scientific notation', () => {
    expect(parseProbabilityBounds('P = [1e-3, 2.5E-1]')).toEqual({ bounds: [0.001, 0.25] });
  });

  it('should ignore bounds outside [0, 1]', () => {
    expect(parseProbabilityBounds('P = [0.5, 1.5]')).toBeUndefined();
  });

  it('should return undefined without a bounds line', () => {
    expect(parseProbabilityBounds('no result')).toBeUndefined();
  });
});
