/**
 * @fileoverview Graph reasoning over the knowledge graph
 *
 * Wraps the truth-value algebra in `pln.ts` with lookups against an
 * AtomSpace: uncertainty propagation for parameters, goal reachability from
 * evidence, backward and forward chaining. Nothing here writes to the graph
 * unless a caller asks for it (`forwardChain` with `commit: true`).
 */

import { ValidationError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { AtomSpace } from '../atomspace/atom_space.js';
import type { Atom, AtomKey, AttentionValue, Link, LinkType, TruthValue } from '../atomspace/types.js';
import { truthValue } from '../atomspace/values.js';
import {
  DEFAULT_REASONER_CONSTANTS,
  abduction,
  assertReasonerConstants,
  conjunction,
  deduction,
  revision,
  type ReasonerConstants,
} from './pln.js';

// ============================================================================
// TYPES
// ============================================================================

export type UncertaintyOperation = 'identity' | 'add' | 'multiply' | 'power';

/** How strongly each operation amplifies input uncertainty */
export const OPERATION_AMPLIFICATION: Readonly<Record<UncertaintyOperation, number>> = Object.freeze({
  identity: 1,
  add: 1,
  multiply: 2,
  power: 3,
});

/**
 * `independent`: each item re-estimates the goal (revision).
 * `joint`: the items are jointly required (conjunction, then revision
 * against the prior).
 */
export type EvidenceMode = 'independent' | 'joint';

export interface Evidence {
  source: string;
  truthValue: TruthValue;
}

export interface ReachabilityAssessment {
  goal: string;
  truthValue: TruthValue;
  /** Strength of the posterior */
  probability: number;
  /** Confidence of the posterior */
  confidence: number;
  evidenceCount: number;
}

export interface ChainStep {
  atom: Atom;
  /** Link connecting this atom to the one it supports */
  via: Link;
  depth: number;
}

export type InferenceRule = 'deduction' | 'abduction';

export interface Derivation {
  rule: InferenceRule;
  source: AtomKey;
  target: AtomKey;
  /** Ids of the two premise links, derived ones included */
  premises: readonly [string, string];
  truthValue: TruthValue;
}

export interface ForwardChainOptions {
  rules?: readonly InferenceRule[];
  /** Write each derivation to the graph as an IMPLICATION link */
  commit?: boolean;
}

export interface ForwardChainResult {
  derivations: Derivation[];
  steps: number;
  fixpoint: boolean;
}

export interface TrajectorySample {
  satisfiesGoal: boolean;
}

export interface InferenceExplanation {
  atom: AtomKey;
  type: Atom['type'];
  truthValue: TruthValue;
  attention: AttentionValue;
  supportedBy: Array<{ source: AtomKey; linkType: LinkType; truthValue: TruthValue }>;
  chain: ChainStep[];
}

interface KnownLink {
  id: string;
  source: AtomKey;
  target: AtomKey;
  truthValue: TruthValue;
}

// ============================================================================
// REASONER
// ============================================================================

export class Reasoner {
  private readonly constants: ReasonerConstants;

  constructor(
    private readonly atomSpace: AtomSpace,
    constants: ReasonerConstants = DEFAULT_REASONER_CONSTANTS,
  ) {
    this.constants = assertReasonerConstants({ ...constants });
  }

  /**
   * Confidence in a quantity computed from a parameter. Relative bound width
   * and nominal uncertainty both lower it; the strength is the parameter's.
   */
  propagateUncertainty(parameterName: string, operation: UncertaintyOperation = 'identity'): TruthValue {
    const parameter = this.atomSpace.getAtom('PARAMETER', parameterName);
    if (!parameter) {
      throw new ValidationError('propagateUncertainty.parameter', 'an existing PARAMETER atom', parameterName);
    }
    const amplification = OPERATION_AMPLIFICATION[operation];
    if (amplification === undefined) {
      throw new ValidationError('propagateUncertainty.operation', Object.keys(OPERATION_AMPLIFICATION).join(' | '), String(operation));
    }
    const { value, bounds, uncertainty } = parameter.metadata;
    const nominal = typeof uncertainty === 'number' ? uncertainty : 0;
    let width = 0;
    if (Array.isArray(bounds) && bounds.length === 2) {
      const span = bounds[1] - bounds[0];
      const magnitude = typeof value === 'number' ? Math.abs(value) : 0;
      width = magnitude === 0 ? span : span / magnitude;
    }
    const effective = nominal * amplification * (1 + width);
    return truthValue(parameter.truthValue.strength, 1 / (1 + effective));
  }

  /**
   * Posterior belief that a goal is reachable. The prior is the goal atom's
   * current truth value, or (neutral prior, 0) when the goal is unknown.
   */
  reasonAboutReachability(
    goalName: string,
    evidence: readonly Evidence[],
    mode: EvidenceMode = 'independent',
  ): ReachabilityAssessment {
    const goal = this.atomSpace.getAtom('GOAL', goalName);
    const prior = goal?.truthValue ?? truthValue(this.constants.neutralPrior, 0);

    let posterior: TruthValue;
    if (mode === 'joint') {
      posterior = evidence.length === 0
        ? prior
        : revision(prior, conjunction(evidence.map((item) => item.truthValue)));
    } else {
      posterior = evidence.reduce((acc, item) => revision(acc, item.truthValue), prior);
    }

    return {
      goal: goalName,
      truthValue: posterior,
      probability: posterior.strength,
      confidence: posterior.confidence,
      evidenceCount: evidence.length,
    };
  }

  /**
   * Atoms that support `goal`, breadth-first up to `maxDepth` hops. Each atom
   * appears once, at its shallowest depth. An unknown goal has no support.
   */
  backwardChain(goal: string, maxDepth: number): ChainStep[] {
    assertNonNegativeInteger('backwardChain.maxDepth', maxDepth);
    const start = this.resolve(goal);
    if (!start) return [];

    const steps: ChainStep[] = [];
    const visited = new Set<string>([start.key]);
    const queue: Array<{ key: AtomKey; depth: number }> = [{ key: start.key, depth: 0 }];
    while (queue.length > 0) {
      const current = queue.shift();
      if (!current || current.depth >= maxDepth) continue;
      for (const link of this.atomSpace.getIncomingLinks(current.key)) {
        if (visited.has(link.source)) continue;
        visited.add(link.source);
        const atom = this.atomSpace.getAtomByKey(link.source);
        if (!atom) continue;
        steps.push({ atom, via: link, depth: current.depth + 1 });
        queue.push({ key: link.source, depth: current.depth + 1 });
      }
    }
    return steps;
  }

  /**
   * Derive new implications whose source is one of the premises. Every link
   * of the graph reads as an implication source→target. Each step is one
   * pass over the links known when the step began.
   */
  forwardChain(
    premises: readonly string[],
    maxSteps: number,
    options: ForwardChainOptions = {},
  ): ForwardChainResult {
    assertNonNegativeInteger('forwardChain.maxSteps', maxSteps);
    const rules = new Set<InferenceRule>(options.rules ?? ['deduction', 'abduction']);
    const sources = premises.map((premise) => {
      const atom = this.resolve(premise);
      if (!atom) {
        throw new ValidationError('forwardChain.premises', 'existing atom keys or goal names', premise);
      }
      return atom.key;
    });

    const known = new Map<string, KnownLink>();
    const outgoing = new Map<string, KnownLink[]>();
    const incoming = new Map<string, KnownLink[]>();
    const remember = (link: KnownLink): void => {
      known.set(pairKey(link.source, link.target), link);
      outgoing.set(link.source, [...(outgoing.get(link.source) ?? []), link]);
      incoming.set(link.target, [...(incoming.get(link.target) ?? []), link]);
    };
    for (const link of this.atomSpace.getLinks()) {
      if (!known.has(pairKey(link.source, link.target))) remember(link);
    }

    const derivations: Derivation[] = [];
    let steps = 0;
    let fixpoint = false;
    while (steps < maxSteps) {
      steps++;
      const found = new Map<string, Derivation>();
      const propose = (derivation: Derivation): void => {
        const key = pairKey(derivation.source, derivation.target);
        if (derivation.source === derivation.target || known.has(key) || found.has(key)) return;
        found.set(key, derivation);
      };

      for (const a of sources) {
        for (const ab of outgoing.get(a) ?? []) {
          if (rules.has('deduction')) {
            for (const bc of outgoing.get(ab.target) ?? []) {
              propose({
                rule: 'deduction',
                source: a,
                target: bc.target,
                premises: [ab.id, bc.id],
                truthValue: deduction(ab.truthValue, bc.truthValue, this.constants),
              });
            }
          }
          if (rules.has('abduction')) {
            // ab here plays A→C; siblings B→C suggest A→B
            for (const bc of incoming.get(ab.target) ?? []) {
              propose({
                rule: 'abduction',
                source: a,
                target: bc.source,
                premises: [ab.id, bc.id],
                truthValue: abduction(ab.truthValue, bc.truthValue, this.constants),
              });
            }
          }
        }
      }

      if (found.size === 0) {
        fixpoint = true;
        break;
      }
      for (const derivation of found.values()) {
        derivations.push(derivation);
        remember({
          id: `derived:${derivation.rule}:${derivation.source}->${derivation.target}`,
          source: derivation.source,
          target: derivation.target,
          truthValue: derivation.truthValue,
        });
      }
    }

    if (options.commit) {
      for (const derivation of derivations) {
        this.atomSpace.addLink('IMPLICATION', derivation.source, derivation.target, derivation.truthValue);
      }
    }
    logDebug('[reasoner] forward chaining finished', {
      premises: sources.length,
      derivations: derivations.length,
      steps,
      fixpoint,
    });
    return { derivations, steps, fixpoint };
  }

  /**
   * Mean ± two standard deviations of the observations; [0, 1] without any.
   */
  inferParameterBounds(observations: readonly number[]): [number, number] {
    if (observations.length === 0) return [0, 1];
    observations.forEach((value, index) => {
      if (!Number.isFinite(value)) {
        throw new ValidationError(`inferParameterBounds.observations[${index}]`, 'a finite number', String(value));
      }
    });
    const mean = observations.reduce((sum, value) => sum + value, 0) / observations.length;
    const variance = observations.reduce((sum, value) => sum + (value - mean) ** 2, 0) / observations.length;
    const spread = 2 * Math.sqrt(variance);
    return [mean - spread, mean + spread];
  }

  /**
   * Fraction of trajectories that satisfy the goal; the neutral prior when
   * there are none.
   */
  estimateGoalProbability(trajectories: readonly TrajectorySample[]): number {
    if (trajectories.length === 0) return this.constants.neutralPrior;
    const hits = trajectories.filter((trajectory) => trajectory.satisfiesGoal).length;
    return hits / trajectories.length;
  }

  explainInference(ref: string, maxDepth = 3): InferenceExplanation | undefined {
    const atom = this.resolve(ref);
    if (!atom) return undefined;
    return {
      atom: atom.key,
      type: atom.type,
      truthValue: atom.truthValue,
      attention: atom.attention,
      supportedBy: this.atomSpace.getIncomingLinks(atom.key).map((link) => ({
        source: link.source,
        linkType: link.type,
        truthValue: link.truthValue,
      })),
      chain: this.backwardChain(atom.key, maxDepth),
    };
  }

  /** Accepts an atom key, or a bare goal name. */
  private resolve(ref: string): Atom | undefined {
    return this.atomSpace.getAtomByKey(ref) ?? this.atomSpace.getAtom('GOAL', ref);
  }
}

function pairKey(source: string, target: string): string {
  return `${source}->${target}`;
}

function assertNonNegativeInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(field, 'a non-negative integer', String(value));
  }
}
