/**
 * @fileoverview Truth and attention value constructors
 */

import { ValidationError } from '../core/errors.js';
import type { AttentionValue, TruthValue } from './types.js';

export interface StiBounds {
  stiMin: number;
  stiMax: number;
}

function checkUnit(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError(field, 'a number in [0, 1]', String(value));
  }
}

/**
 * Build a frozen truth value, rejecting components outside [0, 1].
 */
export function truthValue(strength: number, confidence: number): TruthValue {
  checkUnit('truthValue.strength', strength);
  checkUnit('truthValue.confidence', confidence);
  return Object.freeze({ strength, confidence });
}

/**
 * Validate a truth value that arrived from outside the constructor.
 */
export function assertTruthValue(tv: TruthValue, field = 'truthValue'): TruthValue {
  checkUnit(`${field}.strength`, tv.strength);
  checkUnit(`${field}.confidence`, tv.confidence);
  return tv;
}

export function attentionValue(sti: number, lti: number): AttentionValue {
  if (!Number.isFinite(sti)) {
    throw new ValidationError('attention.sti', 'a finite number', String(sti));
  }
  if (!Number.isFinite(lti) || lti < 0) {
    throw new ValidationError('attention.lti', 'a finite number >= 0', String(lti));
  }
  return Object.freeze({ sti, lti });
}

export function clampSti(sti: number, bounds: StiBounds): number {
  return Math.min(bounds.stiMax, Math.max(bounds.stiMin, sti));
}

export function assertStiBounds(bounds: StiBounds): StiBounds {
  if (!Number.isFinite(bounds.stiMin) || !Number.isFinite(bounds.stiMax) || bounds.stiMin > bounds.stiMax) {
    throw new ValidationError('attention.stiBounds', 'finite stiMin <= stiMax', `[${bounds.stiMin}, ${bounds.stiMax}]`);
  }
  return bounds;
}

export const CERTAIN: TruthValue = truthValue(1, 1);
