/**
 * @fileoverview Truth-value algebra
 *
 * Heuristic inference operators over (strength, confidence) pairs. These are
 * engineered combination rules, not a sound probabilistic logic. Every
 * operator is a pure function: it validates its inputs and returns a new
 * frozen TruthValue without touching the knowledge graph.
 *
 * Constants:
 * - NEUTRAL_PRIOR (0.5): base rate assumed for C when A does not hold in a
 *   deduction chain.
 * - CONFIDENCE_REDUCTION (0.5): factor applied to confidence when an
 *   implication is reversed (induction) or a hypothesis is guessed from a
 *   shared consequence (abduction).
 *
 * @packageDocumentation
 */

import { ValidationError } from '../core/errors.js';
import { assertTruthValue, truthValue } from '../atomspace/values.js';
import type { TruthValue } from '../atomspace/types.js';

export const NEUTRAL_PRIOR = 0.5;
export const CONFIDENCE_REDUCTION = 0.5;

export interface ReasonerConstants {
  neutralPrior: number;
  confidenceReduction: number;
}

export const DEFAULT_REASONER_CONSTANTS: Readonly<ReasonerConstants> = Object.freeze({
  neutralPrior: NEUTRAL_PRIOR,
  confidenceReduction: CONFIDENCE_REDUCTION,
});

export function assertReasonerConstants(constants: ReasonerConstants): ReasonerConstants {
  if (!Number.isFinite(constants.neutralPrior) || constants.neutralPrior < 0 || constants.neutralPrior > 1) {
    throw new ValidationError('reasoner.neutralPrior', 'a number in [0, 1]', String(constants.neutralPrior));
  }
  const r = constants.confidenceReduction;
  if (!Number.isFinite(r) || r <= 0 || r >= 1) {
    throw new ValidationError('reasoner.confidenceReduction', 'a number in (0, 1)', String(r));
  }
  return constants;
}

// ============================================================================
// TWO-PLACE RULES
// ============================================================================

/**
 * A→B, B→C ⊢ A→C.
 * Confidence multiplies, so it never grows along a chain.
 */
export function deduction(
  ab: TruthValue,
  bc: TruthValue,
  constants: ReasonerConstants = DEFAULT_REASONER_CONSTANTS,
): TruthValue {
  assertTruthValue(ab, 'deduction.ab');
  assertTruthValue(bc, 'deduction.bc');
  const strength = ab.strength * bc.strength + (1 - ab.strength) * constants.neutralPrior;
  return truthValue(clampUnit(strength), ab.confidence * bc.confidence);
}

/**
 * A→B ⊢ B→A.
 */
export function induction(
  ab: TruthValue,
  constants: ReasonerConstants = DEFAULT_REASONER_CONSTANTS,
): TruthValue {
  assertTruthValue(ab, 'induction.ab');
  return truthValue(ab.strength, ab.confidence * constants.confidenceReduction);
}

/**
 * A→C, B→C ⊢ A→B.
 */
export function abduction(
  ac: TruthValue,
  bc: TruthValue,
  constants: ReasonerConstants = DEFAULT_REASONER_CONSTANTS,
): TruthValue {
  assertTruthValue(ac, 'abduction.ac');
  assertTruthValue(bc, 'abduction.bc');
  return truthValue(
    (ac.strength + bc.strength) / 2,
    Math.min(ac.confidence, bc.confidence) * constants.confidenceReduction,
  );
}

/**
 * Merge two estimates of the same proposition. Strength is the
 * confidence-weighted mean; confidence accumulates and saturates at 1.
 * The same estimate presented twice is one piece of evidence, so
 * `revision(tv, tv)` returns `tv`.
 */
export function revision(first: TruthValue, second: TruthValue): TruthValue {
  assertTruthValue(first, 'revision.first');
  assertTruthValue(second, 'revision.second');
  if (first.strength === second.strength && first.confidence === second.confidence) {
    return truthValue(first.strength, first.confidence);
  }
  const weight = first.confidence + second.confidence;
  const strength = weight > 0
    ? (first.strength * first.confidence + second.strength * second.confidence) / weight
    : (first.strength + second.strength) / 2;
  return truthValue(clampUnit(strength), Math.min(1, weight));
}

// ============================================================================
// N-PLACE RULES
// ============================================================================

/**
 * Independent AND. Empty input is the identity (1, 1).
 */
export function conjunction(operands: readonly TruthValue[]): TruthValue {
  if (operands.length === 0) return truthValue(1, 1);
  const sorted = sortedOperands(operands, 'conjunction');
  let strength = 1;
  for (const tv of sorted) strength *= tv.strength;
  return truthValue(strength, minConfidence(sorted));
}

/**
 * Independent OR (co-product). Empty input is the identity (0, 1).
 */
export function disjunction(operands: readonly TruthValue[]): TruthValue {
  if (operands.length === 0) return truthValue(0, 1);
  const sorted = sortedOperands(operands, 'disjunction');
  let miss = 1;
  for (const tv of sorted) miss *= 1 - tv.strength;
  return truthValue(clampUnit(1 - miss), minConfidence(sorted));
}

export function negation(tv: TruthValue): TruthValue {
  assertTruthValue(tv, 'negation');
  return truthValue(1 - tv.strength, tv.confidence);
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Products are accumulated in a canonical order so that the result is
 * identical for every permutation of the operands.
 */
function sortedOperands(operands: readonly TruthValue[], field: string): TruthValue[] {
  operands.forEach((tv, index) => assertTruthValue(tv, `${field}[${index}]`));
  return [...operands].sort((a, b) => a.strength - b.strength || a.confidence - b.confidence);
}

function minConfidence(operands: readonly TruthValue[]): number {
  let min = 1;
  for (const tv of operands) if (tv.confidence < min) min = tv.confidence;
  return min;
}

// Floating-point accumulation can land a hair outside [0, 1].
function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}
