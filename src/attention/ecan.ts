/**
 * @fileoverview Economic attention allocation
 *
 * Short-term importance (STI) behaves like a currency: stimulation injects
 * it, every diffusion round charges a fixed rent per atom, and the remainder
 * spreads to linked atoms in proportion to link strength. Apart from rent,
 * diffusion moves STI around without creating or destroying it.
 *
 * The allocator owns no atoms. It reads and writes attention values on the
 * AtomSpace it was given; iteration follows the graph's insertion order, so
 * every cycle is deterministic.
 */

import { ValidationError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { AtomSpace } from '../atomspace/atom_space.js';
import type { Atom, AtomKey, AtomType, AttentionValue } from '../atomspace/types.js';
import { attentionValue, clampSti } from '../atomspace/values.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface AttentionConfig {
  stiMin: number;
  stiMax: number;
  baselineSti: number;
  baselineLti: number;
  /** STI charged to every atom per diffusion round */
  rent: number;
  /** λ: share of a stimulus that also lands in LTI */
  learningFraction: number;
  focusSize: number;
  focusThreshold: number;
  defaultDecayRate: number;
  /** Stimulus multiplier per hop in focusOnGoal and spreadActivation */
  focusDecay: number;
  focusMaxHops: number;
  /** Share of a focus atom's STI added to its LTI once per attention cycle */
  ltiLearningRate: number;
}

export const DEFAULT_ATTENTION_CONFIG: Readonly<AttentionConfig> = Object.freeze({
  stiMin: -100,
  stiMax: 1000,
  baselineSti: 10,
  baselineLti: 0,
  rent: 1,
  learningFraction: 0.1,
  focusSize: 10,
  focusThreshold: 0,
  defaultDecayRate: 0.1,
  focusDecay: 0.5,
  focusMaxHops: 3,
  ltiLearningRate: 0.01,
});

/** Importance multiplier gained per context atom an atom is linked to */
export const CONTEXT_CONNECTION_BOOST = 0.1;

export function resolveAttentionConfig(overrides: Partial<AttentionConfig> = {}): AttentionConfig {
  const config: AttentionConfig = { ...DEFAULT_ATTENTION_CONFIG, ...overrides };
  for (const [key, value] of Object.entries(config)) {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`attention.${key}`, 'a finite number', String(value));
    }
  }
  if (config.stiMin > config.stiMax) {
    throw new ValidationError('attention.stiMin', `<= stiMax (${config.stiMax})`, String(config.stiMin));
  }
  if (config.baselineSti < config.stiMin || config.baselineSti > config.stiMax) {
    throw new ValidationError('attention.baselineSti', `within [${config.stiMin}, ${config.stiMax}]`, String(config.baselineSti));
  }
  if (config.baselineLti < 0 || config.rent < 0 || config.learningFraction < 0) {
    throw new ValidationError('attention', 'baselineLti, rent and learningFraction >= 0', JSON.stringify({
      baselineLti: config.baselineLti,
      rent: config.rent,
      learningFraction: config.learningFraction,
    }));
  }
  if (!Number.isInteger(config.focusSize) || config.focusSize < 0) {
    throw new ValidationError('attention.focusSize', 'a non-negative integer', String(config.focusSize));
  }
  if (!Number.isInteger(config.focusMaxHops) || config.focusMaxHops < 0) {
    throw new ValidationError('attention.focusMaxHops', 'a non-negative integer', String(config.focusMaxHops));
  }
  assertUnitRate('attention.defaultDecayRate', config.defaultDecayRate);
  assertUnitRate('attention.focusDecay', config.focusDecay);
  assertUnitRate('attention.ltiLearningRate', config.ltiLearningRate);
  return config;
}

// ============================================================================
// TYPES
// ============================================================================

export interface DiffusionReport {
  rentCollected: number;
  transferred: number;
  stiBefore: number;
  stiAfter: number;
}

export interface GoalStimulus {
  atom: AtomKey;
  stimulus: number;
  hop: number;
}

export interface ActivationStimulus {
  atom: AtomKey;
  activation: number;
  stimulus: number;
}

export interface AttentionStatistics {
  atomCount: number;
  totalSti: number;
  meanSti: number;
  maxSti: number;
  meanLti: number;
  focusSize: number;
  indebtedCount: number;
  totalRentCollected: number;
}

/**
 * Decides which chronically indebted atoms may be dropped. Atoms are never
 * removed from the graph; candidates are only reported.
 */
export interface EvictionPolicy {
  readonly name: string;
  selectCandidates(indebted: readonly Atom[]): AtomKey[];
}

export const NO_EVICTION: EvictionPolicy = Object.freeze({
  name: 'none',
  selectCandidates: (): AtomKey[] => [],
});

// ============================================================================
// ALLOCATOR
// ============================================================================

export class AttentionAllocator {
  readonly config: Readonly<AttentionConfig>;
  private focus: AtomKey[] = [];
  private totalRentCollected = 0;

  constructor(
    private readonly atomSpace: AtomSpace,
    config: Partial<AttentionConfig> = {},
    private readonly evictionPolicy: EvictionPolicy = NO_EVICTION,
  ) {
    this.config = Object.freeze(resolveAttentionConfig(config));
  }

  /** Reset every atom to the baseline. Idempotent. */
  initializeAttention(): void {
    const baseline = attentionValue(this.config.baselineSti, this.config.baselineLti);
    for (const atom of this.atomSpace.getAtoms()) {
      this.atomSpace.setAttention(atom.key, baseline);
    }
  }

  /**
   * STI moves by `amount` (clamped); LTI grows by λ·|amount|.
   */
  stimulateAtom(ref: AtomKey | Atom, amount: number): AttentionValue {
    if (!Number.isFinite(amount)) {
      throw new ValidationError('stimulateAtom.amount', 'a finite number', String(amount));
    }
    const atom = this.require(typeof ref === 'string' ? ref : ref.key);
    const next = attentionValue(
      clampSti(atom.attention.sti + amount, this.config),
      atom.attention.lti + Math.abs(amount) * this.config.learningFraction,
    );
    this.atomSpace.setAttention(atom.key, next);
    return next;
  }

  /**
   * One round of rent collection followed by diffusion along links.
   */
  diffuseAttention(decayRate: number = this.config.defaultDecayRate): DiffusionReport {
    assertUnitRate('diffuseAttention.decayRate', decayRate);
    const atoms = this.atomSpace.getAtoms();
    const sti = new Map<AtomKey, number>();
    let stiBefore = 0;
    let rentCollected = 0;

    for (const atom of atoms) {
      stiBefore += atom.attention.sti;
      const payable = Math.max(0, atom.attention.sti - this.config.stiMin);
      const paid = Math.min(this.config.rent, payable);
      rentCollected += paid;
      sti.set(atom.key, atom.attention.sti - paid);
    }

    const postRent = new Map(sti);
    let transferred = 0;
    for (const atom of atoms) {
      const available = postRent.get(atom.key) ?? 0;
      if (available <= 0 || decayRate === 0) continue;
      const neighbors = this.atomSpace.getNeighbors(atom.key).filter((n) => n.atom.key !== atom.key);
      const totalWeight = neighbors.reduce((sum, n) => sum + n.link.truthValue.strength, 0);
      if (totalWeight <= 0) continue;

      const budget = decayRate * available;
      for (const neighbor of neighbors) {
        const share = budget * (neighbor.link.truthValue.strength / totalWeight);
        const receiver = sti.get(neighbor.atom.key) ?? 0;
        const sender = sti.get(atom.key) ?? 0;
        const amount = Math.min(
          share,
          Math.max(0, this.config.stiMax - receiver),
          Math.max(0, sender - this.config.stiMin),
        );
        if (amount <= 0) continue;
        sti.set(neighbor.atom.key, receiver + amount);
        sti.set(atom.key, sender - amount);
        transferred += amount;
      }
    }

    let stiAfter = 0;
    for (const atom of atoms) {
      const next = sti.get(atom.key) ?? atom.attention.sti;
      stiAfter += next;
      if (next !== atom.attention.sti) {
        this.atomSpace.setAttention(atom.key, attentionValue(next, atom.attention.lti));
      }
    }
    this.totalRentCollected += rentCollected;

    logDebug('[attention] diffusion round', { decayRate, rentCollected, transferred, atoms: atoms.length });
    return { rentCollected, transferred, stiBefore, stiAfter };
  }

  /**
   * Top-K atoms by STI at or above the focus threshold.
   */
  updateAttentionalFocus(): Atom[] {
    const ranked = this.rank(this.atomSpace.getAtoms())
      .filter((atom) => atom.attention.sti >= this.config.focusThreshold)
      .slice(0, this.config.focusSize);
    this.focus = ranked.map((atom) => atom.key);
    return ranked;
  }

  /** Focus as of the last update, with current attention values */
  getAttentionalFocus(): Atom[] {
    const atoms: Atom[] = [];
    for (const key of this.focus) {
      const atom = this.atomSpace.getAtomByKey(key);
      if (atom) atoms.push(atom);
    }
    return atoms;
  }

  /**
   * Stimulate a goal and, breadth-first along incoming links, the atoms
   * supporting it. The stimulus shrinks by `focusDecay` per hop; each atom is
   * stimulated at most once.
   */
  focusOnGoal(goal: string, intensity: number): GoalStimulus[] {
    const start = this.atomSpace.getAtomByKey(goal) ?? this.atomSpace.getAtom('GOAL', goal);
    if (!start) {
      throw new ValidationError('focusOnGoal.goal', 'an existing goal name or atom key', goal);
    }
    const applied: GoalStimulus[] = [];
    const visited = new Set<string>([start.key]);
    let frontier: AtomKey[] = [start.key];
    for (let hop = 0; frontier.length > 0 && hop <= this.config.focusMaxHops; hop++) {
      const stimulus = intensity * this.config.focusDecay ** hop;
      const next: AtomKey[] = [];
      for (const key of frontier) {
        this.stimulateAtom(key, stimulus);
        applied.push({ atom: key, stimulus, hop });
        for (const link of this.atomSpace.getIncomingLinks(key)) {
          if (visited.has(link.source)) continue;
          visited.add(link.source);
          next.push(link.source);
        }
      }
      frontier = next;
    }
    return applied;
  }

  /**
   * Spread a fixed stimulus outward from several sources at once. Sources
   * carry activation 1 and an atom first reached at hop h carries
   * `focusDecay^h`; `amount` is split across the reached atoms in proportion
   * to activation, so the STI injected in total is `amount` (less anything
   * clamped at stiMax).
   */
  spreadActivation(
    sources: ReadonlyArray<AtomKey | Atom>,
    amount: number,
    hops: number = this.config.focusMaxHops,
  ): ActivationStimulus[] {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ValidationError('spreadActivation.amount', 'a finite number >= 0', String(amount));
    }
    if (!Number.isInteger(hops) || hops < 0) {
      throw new ValidationError('spreadActivation.hops', 'a non-negative integer', String(hops));
    }
    if (sources.length === 0) {
      throw new ValidationError('spreadActivation.sources', 'at least one atom', '[]');
    }

    const activation = new Map<AtomKey, number>();
    let frontier: AtomKey[] = [];
    for (const ref of sources) {
      const atom = this.require(typeof ref === 'string' ? ref : ref.key);
      if (activation.has(atom.key)) continue;
      activation.set(atom.key, 1);
      frontier.push(atom.key);
    }
    for (let hop = 1; hop <= hops && frontier.length > 0; hop++) {
      const weight = this.config.focusDecay ** hop;
      const next: AtomKey[] = [];
      for (const key of frontier) {
        for (const neighbor of this.atomSpace.getNeighbors(key)) {
          if (activation.has(neighbor.atom.key)) continue;
          activation.set(neighbor.atom.key, weight);
          next.push(neighbor.atom.key);
        }
      }
      frontier = next;
    }

    let total = 0;
    for (const value of activation.values()) total += value;
    const applied: ActivationStimulus[] = [];
    for (const [key, value] of activation) {
      if (value <= 0) continue;
      const stimulus = amount * (value / total);
      this.stimulateAtom(key, stimulus);
      applied.push({ atom: key, activation: value, stimulus });
    }
    return applied;
  }

  /**
   * Attention total (`sti + lti/2`) scaled up by
   * CONTEXT_CONNECTION_BOOST for every context atom linked to the atom in
   * either direction.
   */
  calculateImportance(ref: AtomKey | Atom, context: ReadonlyArray<AtomKey | Atom> = []): number {
    const atom = this.require(typeof ref === 'string' ? ref : ref.key);
    const base = atom.attention.sti + 0.5 * atom.attention.lti;
    if (context.length === 0) return base;

    const contextKeys = new Set(context.map((entry) => (typeof entry === 'string' ? entry : entry.key)));
    const connected = new Set<AtomKey>();
    for (const neighbor of this.atomSpace.getNeighbors(atom.key)) {
      if (contextKeys.has(neighbor.atom.key)) connected.add(neighbor.atom.key);
    }
    return base * (1 + CONTEXT_CONNECTION_BOOST * connected.size);
  }

  /**
   * Atoms in the current focus with positive STI gain `rate · sti` LTI.
   * LTI never shrinks here; decayLongTermImportance is the only decay.
   */
  updateLongTermImportance(rate: number = this.config.ltiLearningRate): void {
    assertUnitRate('updateLongTermImportance.rate', rate);
    if (rate === 0) return;
    for (const atom of this.getAttentionalFocus()) {
      if (atom.attention.sti <= 0) continue;
      this.atomSpace.setAttention(
        atom.key,
        attentionValue(atom.attention.sti, atom.attention.lti + rate * atom.attention.sti),
      );
    }
  }

  getTopAtoms(n: number, type?: AtomType): Atom[] {
    const candidates = type ? this.atomSpace.getAtomsByType(type) : this.atomSpace.getAtoms();
    return this.rank(candidates).slice(0, Math.max(0, n));
  }

  runAttentionCycle(iterations: number, decayRate: number = this.config.defaultDecayRate): DiffusionReport[] {
    if (!Number.isInteger(iterations) || iterations < 0) {
      throw new ValidationError('runAttentionCycle.iterations', 'a non-negative integer', String(iterations));
    }
    const reports: DiffusionReport[] = [];
    for (let i = 0; i < iterations; i++) {
      reports.push(this.diffuseAttention(decayRate));
      this.updateAttentionalFocus();
      this.updateLongTermImportance();
    }
    return reports;
  }

  // --------------------------------------------------------------------------
  // Housekeeping
  // --------------------------------------------------------------------------

  getStatistics(): AttentionStatistics {
    const atoms = this.atomSpace.getAtoms();
    let totalSti = 0;
    let totalLti = 0;
    let maxSti = atoms.length > 0 ? Number.NEGATIVE_INFINITY : 0;
    for (const atom of atoms) {
      totalSti += atom.attention.sti;
      totalLti += atom.attention.lti;
      maxSti = Math.max(maxSti, atom.attention.sti);
    }
    return {
      atomCount: atoms.length,
      totalSti,
      meanSti: atoms.length > 0 ? totalSti / atoms.length : 0,
      maxSti,
      meanLti: atoms.length > 0 ? totalLti / atoms.length : 0,
      focusSize: this.focus.length,
      indebtedCount: this.findIndebtedAtoms().length,
      totalRentCollected: this.totalRentCollected,
    };
  }

  /** LTI shrinks by `rate` of itself. */
  decayLongTermImportance(rate: number): void {
    assertUnitRate('decayLongTermImportance.rate', rate);
    for (const atom of this.atomSpace.getAtoms()) {
      if (atom.attention.lti === 0) continue;
      this.atomSpace.setAttention(atom.key, attentionValue(atom.attention.sti, atom.attention.lti * (1 - rate)));
    }
  }

  /** Atoms whose STI is below `threshold` */
  findIndebtedAtoms(threshold = 0): Atom[] {
    return this.atomSpace.getAtoms().filter((atom) => atom.attention.sti < threshold);
  }

  findEvictionCandidates(threshold = 0): AtomKey[] {
    return this.evictionPolicy.selectCandidates(this.findIndebtedAtoms(threshold));
  }

  get evictionPolicyName(): string {
    return this.evictionPolicy.name;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /** STI desc, then LTI desc, then insertion order */
  private rank(atoms: readonly Atom[]): Atom[] {
    return atoms
      .map((atom, index) => ({ atom, index }))
      .sort((a, b) =>
        b.atom.attention.sti - a.atom.attention.sti
        || b.atom.attention.lti - a.atom.attention.lti
        || a.index - b.index)
      .map((entry) => entry.atom);
  }

  private require(key: string): Atom {
    const atom = this.atomSpace.getAtomByKey(key);
    if (!atom) {
      throw new ValidationError('attention.atom', 'an existing atom', key);
    }
    return atom;
  }
}

function assertUnitRate(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError(field, 'a number in [0, 1]', String(value));
  }
}
