/**
 * @fileoverview Model knowledge graph
 *
 * Holds the atoms and links describing loaded hybrid models. Every component
 * of a session shares one AtomSpace, constructed by the workbench facade and
 * passed in explicitly.
 *
 * Records are replaced, never edited in place: an atom returned by a lookup
 * is a frozen snapshot, and a merge becomes visible only once the complete
 * merged record has been built.
 *
 * @example
 * ```typescript
 * const space = new AtomSpace();
 * space.addModel('psoriasis', 'models/psoriasis.pdrh');
 * space.addMode('psoriasis', 1, 'treatment');
 * space.addParameter('InA', 0.5, { bounds: [0, 1], uncertainty: 0.1, model: 'psoriasis' });
 * space.query({ type: 'PARAMETER' });
 * ```
 */

import { ValidationError } from '../core/errors.js';
import { revision } from '../reasoning/pln.js';
import {
  ATOM_TYPES,
  LINK_TYPES,
  atomKey,
  isAtomType,
  isLinkType,
  linkId,
  type Atom,
  type AtomInput,
  type AtomKey,
  type AtomQuery,
  type AtomType,
  type AttentionValue,
  type GraphSnapshot,
  type Link,
  type LinkInput,
  type LinkType,
  type MetadataValue,
  type MutationBatch,
  type Neighbor,
  type TruthValue,
} from './types.js';
import { CERTAIN, assertStiBounds, assertTruthValue, attentionValue, clampSti, truthValue, type StiBounds } from './values.js';

// ============================================================================
// OPTIONS
// ============================================================================

export interface AtomSpaceOptions {
  /** Attention given to freshly inserted atoms */
  baselineAttention?: AttentionValue;
  /** Bounds applied to STI when attention values are merged */
  stiBounds?: StiBounds;
}

const DEFAULT_BASELINE: AttentionValue = attentionValue(0, 0);
const DEFAULT_STI_BOUNDS: StiBounds = { stiMin: -100, stiMax: 1000 };

export interface ParameterOptions {
  bounds?: readonly [number, number];
  /** Nominal relative uncertainty, >= 0 */
  uncertainty?: number;
  model?: string;
}

export interface GoalOptions {
  targetProbability?: number;
  model?: string;
}

// ============================================================================
// ATOM SPACE
// ============================================================================

export class AtomSpace {
  private readonly atoms = new Map<string, Atom>();
  private readonly links = new Map<string, Link>();
  private readonly incoming = new Map<string, readonly string[]>();
  private readonly baseline: AttentionValue;
  private readonly stiBounds: StiBounds;

  constructor(options: AtomSpaceOptions = {}) {
    this.baseline = options.baselineAttention ?? DEFAULT_BASELINE;
    this.stiBounds = assertStiBounds(options.stiBounds ?? DEFAULT_STI_BOUNDS);
  }

  get size(): number {
    return this.atoms.size;
  }

  get linkCount(): number {
    return this.links.size;
  }

  // --------------------------------------------------------------------------
  // Atoms
  // --------------------------------------------------------------------------

  /**
   * Insert an atom, or merge it into the atom already stored under the same
   * (type, name): truth values are revised, attention values added and
   * metadata overwritten key by key. A fresh atom takes `input.attention`
   * (STI clamped) in place of the baseline when one is given.
   */
  addAtom(input: AtomInput): Atom {
    validateAtomInput(input);
    const key = atomKey(input.type, input.name);
    const existing = this.atoms.get(key);
    const next = existing ? this.merge(existing, input) : this.fresh(key, input);
    this.atoms.set(key, next);
    return next;
  }

  getAtom(type: AtomType, name: string): Atom | undefined {
    return this.atoms.get(atomKey(type, name));
  }

  getAtomByKey(key: string): Atom | undefined {
    return this.atoms.get(key);
  }

  hasAtom(key: AtomKey): boolean {
    return this.atoms.has(key);
  }

  /** All atoms in insertion order */
  getAtoms(): Atom[] {
    return Array.from(this.atoms.values());
  }

  getAtomsByType(type: AtomType): Atom[] {
    return this.query({ type });
  }

  /**
   * Linear scan in insertion order.
   */
  query(pattern: AtomQuery): Atom[] {
    const results: Atom[] = [];
    for (const atom of this.atoms.values()) {
      if (matchesPattern(atom, pattern)) results.push(atom);
    }
    return results;
  }

  /**
   * Replace an atom's attention value. STI bounds are the caller's concern.
   */
  setAttention(key: AtomKey, attention: AttentionValue): Atom {
    const atom = this.requireAtom(key);
    const next = freezeAtom({ ...atom, attention: attentionValue(attention.sti, attention.lti) });
    this.atoms.set(key, next);
    return next;
  }

  // --------------------------------------------------------------------------
  // Links
  // --------------------------------------------------------------------------

  /**
   * Link two existing atoms. Re-adding a link revises its truth value.
   */
  addLink(type: LinkType, source: AtomKey, target: AtomKey, tv: TruthValue = CERTAIN): Link {
    validateLinkInput({ type, source, target, truthValue: tv }, (key) => this.atoms.has(key));
    const id = linkId(type, source, target);
    const existing = this.links.get(id);
    if (existing) {
      const merged: Link = Object.freeze({ ...existing, truthValue: revision(existing.truthValue, tv) });
      this.links.set(id, merged);
      return merged;
    }
    const link: Link = Object.freeze({ id, type, source, target, truthValue: tv });
    this.links.set(id, link);
    const sourceAtom = this.requireAtom(source);
    this.atoms.set(source, freezeAtom({ ...sourceAtom, outgoing: [...sourceAtom.outgoing, id] }));
    this.incoming.set(target, [...(this.incoming.get(target) ?? []), id]);
    return link;
  }

  getLink(id: string): Link | undefined {
    return this.links.get(id);
  }

  getLinks(): Link[] {
    return Array.from(this.links.values());
  }

  getOutgoingLinks(key: AtomKey): Link[] {
    const atom = this.atoms.get(key);
    if (!atom) return [];
    return atom.outgoing.map((id) => this.requireLink(id));
  }

  getIncomingLinks(key: AtomKey): Link[] {
    return (this.incoming.get(key) ?? []).map((id) => this.requireLink(id));
  }

  /**
   * Atoms directly linked to `key` in either direction, outgoing first.
   */
  getNeighbors(key: AtomKey): Neighbor[] {
    const neighbors: Neighbor[] = [];
    for (const link of this.getOutgoingLinks(key)) {
      neighbors.push({ atom: this.requireAtom(link.target), link, direction: 'outgoing' });
    }
    for (const link of this.getIncomingLinks(key)) {
      neighbors.push({ atom: this.requireAtom(link.source), link, direction: 'incoming' });
    }
    return neighbors;
  }

  // --------------------------------------------------------------------------
  // Model constructors
  // --------------------------------------------------------------------------

  addModel(name: string, modelFile?: string): Atom {
    return this.addAtom({
      type: 'MODEL',
      name,
      truthValue: CERTAIN,
      metadata: { modelFile: modelFile ?? null },
    });
  }

  addMode(modelName: string, modeId: number, modeName: string): Atom {
    const model = this.requireParent('MODEL', modelName, 'addMode.model');
    if (!Number.isInteger(modeId)) {
      throw new ValidationError('addMode.modeId', 'an integer', String(modeId));
    }
    const mode = this.addAtom({
      type: 'MODE',
      name: `${modelName}_mode_${modeId}`,
      metadata: { model: modelName, modeId, modeName },
    });
    this.addLink('INHERITANCE', mode.key, model.key);
    return this.requireAtom(mode.key);
  }

  addParameter(name: string, value: number, options: ParameterOptions = {}): Atom {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`parameter ${name}.value`, 'a finite number', String(value));
    }
    const { bounds, uncertainty, model } = options;
    if (bounds && (!Number.isFinite(bounds[0]) || !Number.isFinite(bounds[1]) || bounds[0] > bounds[1])) {
      throw new ValidationError(`parameter ${name}.bounds`, 'finite [lower, upper] with lower <= upper', `[${bounds[0]}, ${bounds[1]}]`);
    }
    if (uncertainty !== undefined && (!Number.isFinite(uncertainty) || uncertainty < 0)) {
      throw new ValidationError(`parameter ${name}.uncertainty`, 'a finite number >= 0', String(uncertainty));
    }
    const parent = model === undefined ? undefined : this.requireParent('MODEL', model, 'addParameter.model');
    const parameter = this.addAtom({
      type: 'PARAMETER',
      name,
      truthValue: truthValue(1, 1 / (1 + (uncertainty ?? 0))),
      metadata: {
        value,
        bounds: bounds ? [bounds[0], bounds[1]] : null,
        uncertainty: uncertainty ?? null,
        ...(model === undefined ? {} : { model }),
      },
    });
    if (parent) this.addLink('EVALUATION', parameter.key, parent.key);
    return this.requireAtom(parameter.key);
  }

  addFlow(modeName: string, variable: string, equation: string): Atom {
    const mode = this.requireParent('MODE', modeName, 'addFlow.mode');
    const flow = this.addAtom({
      type: 'FLOW',
      name: `${modeName}_flow_${variable}`,
      metadata: { mode: modeName, variable, equation },
    });
    this.addLink('INHERITANCE', flow.key, mode.key);
    return this.requireAtom(flow.key);
  }

  /**
   * A discrete transition between two modes. The jump atom belongs to its
   * source mode; the implication between the modes carries the jump
   * probability.
   */
  addJump(fromMode: string, toMode: string, guard: string, probability?: number): Atom {
    const from = this.requireParent('MODE', fromMode, 'addJump.from');
    const to = this.requireParent('MODE', toMode, 'addJump.to');
    const tv = truthValue(probability ?? 1, 1);
    const jump = this.addAtom({
      type: 'JUMP',
      name: `${fromMode}_to_${toMode}`,
      truthValue: tv,
      metadata: { from: fromMode, to: toMode, guard },
    });
    this.addLink('INHERITANCE', jump.key, from.key);
    this.addLink('IMPLICATION', from.key, to.key, tv);
    return this.requireAtom(jump.key);
  }

  /**
   * A reachability goal starts with no evidence: (0.5, 0).
   */
  addGoal(name: string, condition: string, options: GoalOptions = {}): Atom {
    const { targetProbability, model } = options;
    if (targetProbability !== undefined && (!Number.isFinite(targetProbability) || targetProbability < 0 || targetProbability > 1)) {
      throw new ValidationError(`goal ${name}.targetProbability`, 'a number in [0, 1]', String(targetProbability));
    }
    const parent = model === undefined ? undefined : this.requireParent('MODEL', model, 'addGoal.model');
    const goal = this.addAtom({
      type: 'GOAL',
      name,
      truthValue: truthValue(0.5, 0),
      metadata: {
        condition,
        targetProbability: targetProbability ?? null,
        ...(model === undefined ? {} : { model }),
      },
    });
    if (parent) this.addLink('EVALUATION', parent.key, goal.key);
    return this.requireAtom(goal.key);
  }

  // --------------------------------------------------------------------------
  // Batches & snapshots
  // --------------------------------------------------------------------------

  /**
   * Apply staged writes as one step. The whole batch is validated before
   * anything is written, so either every write lands or none does.
   */
  applyMutations(batch: MutationBatch): void {
    const staged = new Set<AtomKey>();
    for (const input of batch.atoms) {
      validateAtomInput(input);
      staged.add(atomKey(input.type, input.name));
    }
    for (const link of batch.links) {
      validateLinkInput(link, (key) => this.atoms.has(key) || staged.has(key));
    }
    for (const input of batch.atoms) this.addAtom(input);
    for (const link of batch.links) this.addLink(link.type, link.source, link.target, link.truthValue);
  }

  toSnapshot(): GraphSnapshot {
    return {
      atoms: this.getAtoms().map((atom) => ({
        type: atom.type,
        name: atom.name,
        truthValue: { strength: atom.truthValue.strength, confidence: atom.truthValue.confidence },
        attention: { sti: atom.attention.sti, lti: atom.attention.lti },
        metadata: cloneMetadata(atom.metadata),
      })),
      links: this.getLinks().map((link) => ({
        type: link.type,
        source: link.source,
        target: link.target,
        truthValue: { strength: link.truthValue.strength, confidence: link.truthValue.confidence },
      })),
    };
  }

  /**
   * Replace the whole graph with a snapshot. Values are taken verbatim: no
   * baseline attention, no revision.
   */
  restore(snapshot: GraphSnapshot): void {
    const keys = new Set<AtomKey>();
    for (const entry of snapshot.atoms) {
      validateAtomInput(entry);
      const key = atomKey(entry.type, entry.name);
      if (keys.has(key)) {
        throw new ValidationError('snapshot.atoms', 'unique atom keys', key);
      }
      keys.add(key);
    }
    for (const link of snapshot.links) validateLinkInput(link, (key) => keys.has(key));

    this.atoms.clear();
    this.links.clear();
    this.incoming.clear();
    for (const entry of snapshot.atoms) {
      const key = atomKey(entry.type, entry.name);
      this.atoms.set(key, freezeAtom({
        key,
        type: entry.type,
        name: entry.name,
        truthValue: truthValue(entry.truthValue.strength, entry.truthValue.confidence),
        attention: attentionValue(entry.attention.sti, entry.attention.lti),
        metadata: cloneMetadata(entry.metadata),
        outgoing: [],
      }));
    }
    for (const link of snapshot.links) {
      const id = linkId(link.type, link.source, link.target);
      this.links.set(id, Object.freeze({
        id,
        type: link.type,
        source: link.source,
        target: link.target,
        truthValue: truthValue(link.truthValue.strength, link.truthValue.confidence),
      }));
      const source = this.requireAtom(link.source);
      this.atoms.set(link.source, freezeAtom({ ...source, outgoing: [...source.outgoing, id] }));
      this.incoming.set(link.target, [...(this.incoming.get(link.target) ?? []), id]);
    }
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private fresh(key: AtomKey, input: AtomInput): Atom {
    const attention = input.attention ?? this.baseline;
    return freezeAtom({
      key,
      type: input.type,
      name: input.name,
      truthValue: input.truthValue ?? CERTAIN,
      attention: attentionValue(clampSti(attention.sti, this.stiBounds), attention.lti),
      metadata: cloneMetadata(input.metadata ?? {}),
      outgoing: [],
    });
  }

  private merge(existing: Atom, input: AtomInput): Atom {
    const attention = input.attention
      ? attentionValue(
          clampSti(existing.attention.sti + input.attention.sti, this.stiBounds),
          existing.attention.lti + input.attention.lti,
        )
      : existing.attention;
    return freezeAtom({
      ...existing,
      truthValue: input.truthValue ? revision(existing.truthValue, input.truthValue) : existing.truthValue,
      attention,
      metadata: { ...existing.metadata, ...cloneMetadata(input.metadata ?? {}) },
    });
  }

  private requireAtom(key: AtomKey): Atom {
    const atom = this.atoms.get(key);
    if (!atom) {
      throw new ValidationError('atom', 'an existing atom', key);
    }
    return atom;
  }

  private requireLink(id: string): Link {
    const link = this.links.get(id);
    if (!link) {
      throw new ValidationError('link', 'an existing link', id);
    }
    return link;
  }

  private requireParent(type: AtomType, name: string, field: string): Atom {
    const parent = this.getAtom(type, name);
    if (!parent) {
      throw new ValidationError(field, `an existing ${type} atom`, `missing ${atomKey(type, name)}`);
    }
    return parent;
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function freezeAtom(atom: Atom): Atom {
  Object.freeze(atom.metadata);
  Object.freeze(atom.outgoing);
  return Object.freeze(atom);
}

function cloneMetadata(metadata: Readonly<Record<string, MetadataValue>>): Record<string, MetadataValue> {
  const copy: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(metadata)) {
    copy[key] = Array.isArray(value) ? Object.freeze([...value]) : value;
  }
  return copy;
}

function validateAtomInput(input: AtomInput): void {
  if (!isAtomType(input.type)) {
    throw new ValidationError('atom.type', ATOM_TYPES.join(' | '), String(input.type));
  }
  if (typeof input.name !== 'string' || input.name.length === 0) {
    throw new ValidationError('atom.name', 'a non-empty string', JSON.stringify(input.name));
  }
  if (input.truthValue) assertTruthValue(input.truthValue, `${input.type}:${input.name}.truthValue`);
  if (input.attention) attentionValue(input.attention.sti, input.attention.lti);
}

function validateLinkInput(input: LinkInput, exists: (key: AtomKey) => boolean): void {
  if (!isLinkType(input.type)) {
    throw new ValidationError('link.type', LINK_TYPES.join(' | '), String(input.type));
  }
  if (!exists(input.source)) {
    throw new ValidationError('link.source', 'an existing atom', input.source);
  }
  if (!exists(input.target)) {
    throw new ValidationError('link.target', 'an existing atom', input.target);
  }
  if (input.truthValue) assertTruthValue(input.truthValue, `link ${input.source}->${input.target}`);
}

function matchesPattern(atom: Atom, pattern: AtomQuery): boolean {
  if (pattern.type !== undefined && atom.type !== pattern.type) return false;
  if (pattern.namePrefix !== undefined && !atom.name.startsWith(pattern.namePrefix)) return false;
  if (pattern.metadata) {
    for (const [key, expected] of Object.entries(pattern.metadata)) {
      if (!Object.prototype.hasOwnProperty.call(atom.metadata, key)) return false;
      if (!metadataEquals(atom.metadata[key], expected)) return false;
    }
  }
  return true;
}

function metadataEquals(actual: MetadataValue | undefined, expected: MetadataValue): boolean {
  if (Array.isArray(actual) && Array.isArray(expected)) {
    return actual.length === expected.length && actual.every((value, index) => value === expected[index]);
  }
  return actual === expected;
}
