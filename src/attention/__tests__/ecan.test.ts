/**
 * Tests for economic attention allocation
 *
 * Tests for:
 * - Stimulation bounds and long-term learning
 * - Rent and diffusion, including STI conservation
 * - Focus ranking and tie-breaking
 * - Goal focusing along supporting links
 * - Multi-source activation spreading and context-weighted importance
 * - STI-driven LTI learning in the attention cycle
 * - Statistics, LTI decay and the eviction hook
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  AttentionAllocator,
  CONTEXT_CONNECTION_BOOST,
  NO_EVICTION,
  resolveAttentionConfig,
  type EvictionPolicy,
} from '../ecan.js';
import { AtomSpace } from '../../atomspace/atom_space.js';
import { attentionValue, truthValue } from '../../atomspace/values.js';
import { ValidationError } from '../../core/errors.js';
import type { AtomKey } from '../../atomspace/types.js';

function totalSti(space: AtomSpace): number {
  return space.getAtoms().reduce((sum, atom) => sum + atom.attention.sti, 0);
}

describe('AttentionAllocator', () => {
  let space: AtomSpace;
  let allocator: AttentionAllocator;

  beforeEach(() => {
    space = new AtomSpace({ baselineAttention: attentionValue(10, 0) });
    allocator = new AttentionAllocator(space);
  });

  describe('configuration', () => {
    it('should reject inverted STI bounds and out-of-range rates', () => {
      expect(() => resolveAttentionConfig({ stiMin: 10, stiMax: 0 })).toThrow(ValidationError);
      expect(() => resolveAttentionConfig({ focusDecay: 1.5 })).toThrow(ValidationError);
      expect(() => resolveAttentionConfig({ focusSize: 2.5 })).toThrow(ValidationError);
      expect(() => resolveAttentionConfig({ ltiLearningRate: -0.1 })).toThrow(ValidationError);
    });
  });

  describe('stimulateAtom', () => {
    it('should add to STI and deposit a fraction into LTI', () => {
      const atom = space.addAtom({ type: 'MODE', name: 'a' });
      expect(allocator.stimulateAtom(atom, 50)).toEqual({ sti: 60, lti: 5 });
      expect(space.getAtomByKey(atom.key)?.attention).toEqual({ sti: 60, lti: 5 });
    });

    it('should clamp STI at both bounds', () => {
      space.addAtom({ type: 'MODE', name: 'a' });
      expect(allocator.stimulateAtom('MODE:a', -500).sti).toBe(-100);
      expect(allocator.stimulateAtom('MODE:a', 5000).sti).toBe(1000);
    });

    it('should reject unknown atoms', () => {
      expect(() => allocator.stimulateAtom('MODE:missing', 1)).toThrow(ValidationError);
    });
  });

  describe('diffuseAttention', () => {
    it('should collect rent and push STI along links', () => {
      space.addAtom({ type: 'MODE', name: 'a', attention: attentionValue(100, 0) });
      space.addAtom({ type: 'MODE', name: 'b', attention: attentionValue(0, 0) });
      space.addLink('IMPLICATION', 'MODE:a', 'MODE:b');

      const report = allocator.diffuseAttention(0.5);

      expect(report).toEqual({ rentCollected: 2, transferred: 49.5, stiBefore: 100, stiAfter: 98 });
      expect(space.getAtom('MODE', 'a')?.attention.sti).toBe(49.5);
      expect(space.getAtom('MODE', 'b')?.attention.sti).toBe(48.5);
    });

    it('should never charge rent below the STI floor', () => {
      space.addAtom({ type: 'MODE', name: 'a', attention: attentionValue(-99.5, 0) });
      space.addAtom({ type: 'MODE', name: 'b', attention: attentionValue(-100, 0) });

      const report = allocator.diffuseAttention(0.1);

      expect(report.rentCollected).toBe(0.5);
      expect(space.getAtom('MODE', 'a')?.attention.sti).toBe(-100);
      expect(space.getAtom('MODE', 'b')?.attention.sti).toBe(-100);
    });

    it('should cap transfers at the receiver headroom', () => {
      space.addAtom({ type: 'MODE', name: 'a', attention: attentionValue(500, 0) });
      space.addAtom({ type: 'MODE', name: 'b', attention: attentionValue(999, 0) });
      space.addLink('IMPLICATION', 'MODE:a', 'MODE:b');

      const report = allocator.diffuseAttention(1);

      expect(space.getAtom('MODE', 'a')?.attention.sti).toBe(1000);
      expect(space.getAtom('MODE', 'b')?.attention.sti).toBe(497);
      expect(report.transferred).toBe(505);
      expect(report.stiAfter).toBe(report.stiBefore - report.rentCollected);
    });

    it('should conserve STI apart from rent for every decay rate', () => {
      const names = ['m', 'p1', 'p2', 'p3', 'g'];
      const stis = [120, -40, 7.25, 300, 0];
      names.forEach((name, i) => space.addAtom({ type: 'MODE', name, attention: attentionValue(stis[i], 0) }));
      space.addLink('INHERITANCE', 'MODE:p1', 'MODE:m', truthValue(0.9, 1));
      space.addLink('INHERITANCE', 'MODE:p2', 'MODE:m', truthValue(0.3, 1));
      space.addLink('EVALUATION', 'MODE:m', 'MODE:g', truthValue(0.6, 0.5));
      space.addLink('IMPLICATION', 'MODE:p3', 'MODE:p1', truthValue(1, 1));
      space.addLink('IMPLICATION', 'MODE:g', 'MODE:p3', truthValue(0.2, 1));

      for (const rate of [0, 0.05, 0.1, 0.5, 0.9, 1]) {
        const before = totalSti(space);
        const report = allocator.diffuseAttention(rate);
        expect(report.stiBefore).toBeCloseTo(before, 9);
        expect(totalSti(space)).toBeCloseTo(before - report.rentCollected, 9);
        expect(report.stiAfter).toBeCloseTo(report.stiBefore - report.rentCollected, 9);
      }
    });

    it('should reject a decay rate outside [0, 1]', () => {
      expect(() => allocator.diffuseAttention(1.5)).toThrow(ValidationError);
      expect(() => allocator.diffuseAttention(-0.1)).toThrow(ValidationError);
    });
  });

  describe('focus', () => {
    beforeEach(() => {
      space.addAtom({ type: 'MODE', name: 'a', attention: attentionValue(5, 0) });
      space.addAtom({ type: 'PARAMETER', name: 'b', attention: attentionValue(5, 2) });
      space.addAtom({ type: 'MODE', name: 'c', attention: attentionValue(5, 0) });
      space.addAtom({ type: 'MODE', name: 'd', attention: attentionValue(-1, 0) });
    });

    it('should rank by STI, then LTI, then insertion order', () => {
      const focus = allocator.updateAttentionalFocus();
      expect(focus.map((atom) => atom.name)).toEqual(['b', 'a', 'c']);
      expect(allocator.getAttentionalFocus().map((atom) => atom.name)).toEqual(['b', 'a', 'c']);
    });

    it('should respect the focus size', () => {
      const small = new AttentionAllocator(space, { focusSize: 2 });
      expect(small.updateAttentionalFocus().map((atom) => atom.name)).toEqual(['b', 'a']);
    });

    it('should list top atoms without the threshold and filter by type', () => {
      expect(allocator.getTopAtoms(10).map((atom) => atom.name)).toEqual(['b', 'a', 'c', 'd']);
      expect(allocator.getTopAtoms(1, 'MODE').map((atom) => atom.name)).toEqual(['a']);
    });
  });

  describe('focusOnGoal', () => {
    beforeEach(() => {
      space.addModel('m');
      space.addMode('m', 1, 'on');
      space.addMode('m', 2, 'off');
      space.addGoal('g', 'x < 1', { model: 'm' });
    });

    it('should stimulate supporting atoms with a geometrically decaying stimulus', () => {
      const applied = allocator.focusOnGoal('g', 40);

      expect(applied).toEqual([
        { atom: 'GOAL:g', stimulus: 40, hop: 0 },
        { atom: 'MODEL:m', stimulus: 20, hop: 1 },
        { atom: 'MODE:m_mode_1', stimulus: 10, hop: 2 },
        { atom: 'MODE:m_mode_2', stimulus: 10, hop: 2 },
      ]);
      expect(space.getAtom('GOAL', 'g')?.attention.sti).toBe(50);
      expect(space.getAtom('MODE', 'm_mode_2')?.attention.sti).toBe(20);
    });

    it('should terminate on cyclic graphs and stimulate each atom once', () => {
      space.addJump('m_mode_1', 'm_mode_2', 'x < 1');
      space.addJump('m_mode_2', 'm_mode_1', 'x > 2');

      const applied = allocator.focusOnGoal('g', 8);
      const keys = applied.map((entry) => entry.atom);
      expect(new Set(keys).size).toBe(keys.length);
      expect(Math.max(...applied.map((entry) => entry.hop))).toBeLessThanOrEqual(3);
    });

    it('should reject an unknown goal', () => {
      expect(() => allocator.focusOnGoal('missing', 1)).toThrow(ValidationError);
    });
  });

  describe('spreadActivation', () => {
    beforeEach(() => {
      for (const name of ['a', 'b', 'c', 'd']) space.addAtom({ type: 'MODE', name });
      space.addLink('IMPLICATION', 'MODE:a', 'MODE:b');
      space.addLink('IMPLICATION', 'MODE:b', 'MODE:c');
      space.addLink('IMPLICATION', 'MODE:c', 'MODE:d');
    });

    it('should split the amount by activation decaying per hop', () => {
      const applied = allocator.spreadActivation(['MODE:a'], 70, 2);

      expect(applied.map((entry) => [entry.atom, entry.activation])).toEqual([
        ['MODE:a', 1],
        ['MODE:b', 0.5],
        ['MODE:c', 0.25],
      ]);
      expect(applied[0]?.stimulus).toBeCloseTo(40, 10);
      expect(applied[1]?.stimulus).toBeCloseTo(20, 10);
      expect(applied[2]?.stimulus).toBeCloseTo(10, 10);
      expect(space.getAtom('MODE', 'a')?.attention.sti).toBeCloseTo(50, 10);
      expect(space.getAtom('MODE', 'd')?.attention.sti).toBe(10);
    });

    it('should inject exactly the given amount of STI', () => {
      const before = totalSti(space);

      const applied = allocator.spreadActivation(['MODE:b'], 33);

      expect(applied.reduce((sum, entry) => sum + entry.stimulus, 0)).toBeCloseTo(33, 10);
      expect(totalSti(space) - before).toBeCloseTo(33, 10);
    });

    it('should spread from several sources and reach each atom once', () => {
      const applied = allocator.spreadActivation(['MODE:a', space.getAtom('MODE', 'd') ?? 'MODE:d', 'MODE:a'], 30, 1);

      expect(applied.map((entry) => entry.atom)).toEqual(['MODE:a', 'MODE:d', 'MODE:b', 'MODE:c']);
      expect(applied.map((entry) => entry.activation)).toEqual([1, 1, 0.5, 0.5]);
      expect(applied[0]?.stimulus).toBeCloseTo(10, 10);
      expect(applied[3]?.stimulus).toBeCloseTo(5, 10);
    });

    it('should stay on the sources with zero hops', () => {
      const applied = allocator.spreadActivation(['MODE:c'], 5, 0);

      expect(applied).toEqual([{ atom: 'MODE:c', activation: 1, stimulus: 5 }]);
    });

    it('should reject a negative amount, fractional hops, no sources and unknown atoms', () => {
      expect(() => allocator.spreadActivation(['MODE:a'], -1)).toThrow(ValidationError);
      expect(() => allocator.spreadActivation(['MODE:a'], 1, 1.5)).toThrow(ValidationError);
      expect(() => allocator.spreadActivation([], 1)).toThrow(ValidationError);
      expect(() => allocator.spreadActivation(['MODE:missing'], 1)).toThrow(ValidationError);
    });
  });

  describe('calculateImportance', () => {
    beforeEach(() => {
      space.addAtom({ type: 'PARAMETER', name: 'x', attention: attentionValue(20, 8) });
      space.addAtom({ type: 'PARAMETER', name: 'y' });
      space.addAtom({ type: 'PARAMETER', name: 'z' });
      space.addAtom({ type: 'PARAMETER', name: 'w' });
      space.addLink('EVALUATION', 'PARAMETER:x', 'PARAMETER:y');
      space.addLink('IMPLICATION', 'PARAMETER:x', 'PARAMETER:y');
      space.addLink('IMPLICATION', 'PARAMETER:z', 'PARAMETER:x');
    });

    it('should combine STI with half the LTI without context', () => {
      expect(allocator.calculateImportance('PARAMETER:x')).toBe(24);
    });

    it('should boost once per linked context atom in either direction', () => {
      const importance = allocator.calculateImportance('PARAMETER:x', ['PARAMETER:y', 'PARAMETER:z', 'PARAMETER:w']);

      expect(importance).toBeCloseTo(24 * (1 + 2 * CONTEXT_CONNECTION_BOOST), 10);
    });

    it('should reject an unknown atom', () => {
      expect(() => allocator.calculateImportance('PARAMETER:missing')).toThrow(ValidationError);
    });
  });

  describe('cycles and housekeeping', () => {
    it('should run diffusion and focus updates per iteration', () => {
      space.addAtom({ type: 'MODE', name: 'a', attention: attentionValue(50, 0) });
      space.addAtom({ type: 'MODE', name: 'b' });
      space.addLink('IMPLICATION', 'MODE:a', 'MODE:b');

      const reports = allocator.runAttentionCycle(3);

      expect(reports).toHaveLength(3);
      expect(allocator.getStatistics().totalRentCollected).toBe(6);
      expect(allocator.getAttentionalFocus()).toHaveLength(2);
    });

    it('should grow LTI from STI for focus atoms only during a cycle', () => {
      space.addAtom({ type: 'MODE', name: 'a', attention: attentionValue(50, 0) });
      space.addAtom({ type: 'MODE', name: 'b' });
      space.addAtom({ type: 'MODE', name: 'debtor', attention: attentionValue(-20, 0) });
      space.addLink('IMPLICATION', 'MODE:a', 'MODE:b');

      allocator.runAttentionCycle(1);

      for (const name of ['a', 'b']) {
        const attention = space.getAtom('MODE', name)?.attention;
        expect(attention?.lti).toBeCloseTo(0.01 * (attention?.sti ?? 0), 12);
      }
      expect(space.getAtom('MODE', 'debtor')?.attention.lti).toBe(0);
    });

    it('should never lower LTI when updating long-term importance', () => {
      space.addAtom({ type: 'MODE', name: 'a', attention: attentionValue(40, 2) });
      space.addAtom({ type: 'MODE', name: 'b', attention: attentionValue(0, 3) });
      allocator.updateAttentionalFocus();

      allocator.updateLongTermImportance(0.5);

      expect(space.getAtom('MODE', 'a')?.attention).toEqual({ sti: 40, lti: 22 });
      expect(space.getAtom('MODE', 'b')?.attention).toEqual({ sti: 0, lti: 3 });
      expect(() => allocator.updateLongTermImportance(2)).toThrow(ValidationError);
    });

    it('should reset attention to the baseline', () => {
      const atom = space.addAtom({ type: 'MODE', name: 'a', attention: attentionValue(90, 3) });
      allocator.initializeAttention();
      allocator.initializeAttention();
      expect(space.getAtomByKey(atom.key)?.attention).toEqual({ sti: 10, lti: 0 });
    });

    it('should report statistics and decay LTI', () => {
      space.addAtom({ type: 'MODE', name: 'a', attention: attentionValue(20, 4) });
      space.addAtom({ type: 'MODE', name: 'b', attention: attentionValue(-30, 0) });

      allocator.decayLongTermImportance(0.5);
      const stats = allocator.getStatistics();

      expect(stats.atomCount).toBe(2);
      expect(stats.totalSti).toBe(-10);
      expect(stats.meanSti).toBe(-5);
      expect(stats.maxSti).toBe(20);
      expect(stats.meanLti).toBe(1);
      expect(stats.indebtedCount).toBe(1);
    });

    it('should report eviction candidates only through the policy', () => {
      space.addAtom({ type: 'MODE', name: 'a', attention: attentionValue(-50, 0) });
      expect(allocator.findIndebtedAtoms().map((atom) => atom.name)).toEqual(['a']);
      expect(allocator.findEvictionCandidates()).toEqual([]);
      expect(allocator.evictionPolicyName).toBe(NO_EVICTION.name);

      const everyDebtor: EvictionPolicy = {
        name: 'all-debtors',
        selectCandidates: (indebted): AtomKey[] => indebted.map((atom) => atom.key),
      };
      const evicting = new AttentionAllocator(space, {}, everyDebtor);
      expect(evicting.findEvictionCandidates()).toEqual(['MODE:a']);
      expect(space.size).toBe(1);
    });
  });
});
