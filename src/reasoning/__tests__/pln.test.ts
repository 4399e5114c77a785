/**
 * Tests for the truth-value algebra
 */

import { describe, it, expect } from 'vitest';
import {
  abduction,
  conjunction,
  deduction,
  disjunction,
  induction,
  negation,
  revision,
} from '../pln.js';
import { truthValue } from '../../atomspace/values.js';
import { ValidationError } from '../../core/errors.js';
import type { TruthValue } from '../../atomspace/types.js';

const GRID = [0, 0.25, 0.5, 0.9, 1];

function allTruthValues(): TruthValue[] {
  const values: TruthValue[] = [];
  for (const s of GRID) {
    for (const c of GRID) values.push(truthValue(s, c));
  }
  return values;
}

function expectInUnitSquare(tv: TruthValue): void {
  expect(tv.strength).toBeGreaterThanOrEqual(0);
  expect(tv.strength).toBeLessThanOrEqual(1);
  expect(tv.confidence).toBeGreaterThanOrEqual(0);
  expect(tv.confidence).toBeLessThanOrEqual(1);
}

function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) return [[...items]];
  const result: T[][] = [];
  items.forEach((item, index) => {
    const rest = [...items.slice(0, index), ...items.slice(index + 1)];
    for (const tail of permutations(rest)) result.push([item, ...tail]);
  });
  return result;
}

describe('truth-value algebra', () => {
  describe('deduction', () => {
    it('should chain strengths through the neutral prior and multiply confidences', () => {
      const result = deduction(truthValue(0.8, 0.9), truthValue(0.5, 0.5));
      expect(result.strength).toBeCloseTo(0.5, 12);
      expect(result.confidence).toBeCloseTo(0.45, 12);
    });

    it('should honour overridden constants', () => {
      const result = deduction(truthValue(0, 1), truthValue(1, 1), { neutralPrior: 0.2, confidenceReduction: 0.5 });
      expect(result.strength).toBeCloseTo(0.2, 12);
    });
  });

  describe('induction and abduction', () => {
    it('should reverse an implication with reduced confidence', () => {
      expect(induction(truthValue(0.7, 0.8))).toEqual({ strength: 0.7, confidence: 0.4 });
    });

    it('should average strengths and halve the weaker confidence', () => {
      const result = abduction(truthValue(0.6, 0.8), truthValue(0.2, 0.4));
      expect(result.strength).toBeCloseTo(0.4, 12);
      expect(result.confidence).toBeCloseTo(0.2, 12);
    });
  });

  describe('revision', () => {
    it('should weight strengths by confidence and saturate confidence at 1', () => {
      expect(revision(truthValue(1, 0.5), truthValue(0, 0.5))).toEqual({ strength: 0.5, confidence: 1 });
      expect(revision(truthValue(1, 0.9), truthValue(1, 0.8)).confidence).toBe(1);
    });

    it('should fall back to the plain mean when neither side has confidence', () => {
      const result = revision(truthValue(0.2, 0), truthValue(0.6, 0));
      expect(result.strength).toBeCloseTo(0.4, 12);
      expect(result.confidence).toBe(0);
    });

    it('should be idempotent for every valid truth value', () => {
      for (const tv of allTruthValues()) {
        expect(revision(tv, tv)).toEqual(tv);
      }
    });
  });

  describe('conjunction and disjunction', () => {
    it('should use product and co-product with the minimum confidence', () => {
      const operands = [truthValue(0.5, 0.9), truthValue(0.5, 0.6)];
      expect(conjunction(operands)).toEqual({ strength: 0.25, confidence: 0.6 });
      expect(disjunction(operands)).toEqual({ strength: 0.75, confidence: 0.6 });
    });

    it('should return the identities for empty input', () => {
      expect(conjunction([])).toEqual({ strength: 1, confidence: 1 });
      expect(disjunction([])).toEqual({ strength: 0, confidence: 1 });
    });

    it('should give identical results for every ordering of the operands', () => {
      const operands = [truthValue(0.1, 0.9), truthValue(0.7, 0.3), truthValue(0.33, 0.8), truthValue(0.9, 0.95)];
      const expectedAnd = conjunction(operands);
      const expectedOr = disjunction(operands);
      for (const ordering of permutations(operands)) {
        expect(conjunction(ordering)).toEqual(expectedAnd);
        expect(disjunction(ordering)).toEqual(expectedOr);
      }
    });
  });

  describe('negation', () => {
    it('should complement strength and keep confidence', () => {
      expect(negation(truthValue(0.25, 0.4))).toEqual({ strength: 0.75, confidence: 0.4 });
    });
  });

  describe('ranges', () => {
    it('should keep every operator inside the unit square', () => {
      const values = allTruthValues();
      for (const a of values) {
        expectInUnitSquare(induction(a));
        expectInUnitSquare(negation(a));
        for (const b of values) {
          expectInUnitSquare(deduction(a, b));
          expectInUnitSquare(abduction(a, b));
          expectInUnitSquare(revision(a, b));
          expectInUnitSquare(conjunction([a, b]));
          expectInUnitSquare(disjunction([a, b]));
        }
      }
    });

    it('should reject components outside [0, 1]', () => {
      const bad = { strength: 1.2, confidence: 0.5 };
      expect(() => deduction(bad, truthValue(1, 1))).toThrow(ValidationError);
      expect(() => revision(truthValue(1, 1), { strength: 0.5, confidence: -0.1 })).toThrow(ValidationError);
      expect(() => conjunction([truthValue(1, 1), bad])).toThrow(ValidationError);
      expect(() => truthValue(Number.NaN, 0)).toThrow(ValidationError);
    });
  });
});
