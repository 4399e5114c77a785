/**
 * @fileoverview Knowledge graph types
 *
 * Atoms are typed, named nodes describing a hybrid model (the model itself,
 * its modes, flows, jumps, parameters and reachability goals). Links are
 * typed relations between atoms and read "source supports target".
 */

// ============================================================================
// ATOM & LINK KINDS
// ============================================================================

export const ATOM_TYPES = ['MODEL', 'MODE', 'PARAMETER', 'FLOW', 'JUMP', 'GOAL'] as const;
export type AtomType = (typeof ATOM_TYPES)[number];

export const LINK_TYPES = ['INHERITANCE', 'EVALUATION', 'IMPLICATION'] as const;
export type LinkType = (typeof LINK_TYPES)[number];

/** `${type}:${name}` */
export type AtomKey = `${AtomType}:${string}`;

// ============================================================================
// VALUES
// ============================================================================

/**
 * Uncertain belief. Both components lie in [0, 1]; instances are frozen.
 */
export interface TruthValue {
  readonly strength: number;
  readonly confidence: number;
}

/**
 * Short-term importance (bounded, may be negative) and long-term importance.
 */
export interface AttentionValue {
  readonly sti: number;
  readonly lti: number;
}

export type MetadataValue = string | number | boolean | null | readonly number[];
export type AtomMetadata = Readonly<Record<string, MetadataValue>>;

// ============================================================================
// GRAPH ENTITIES
// ============================================================================

export interface Atom {
  readonly key: AtomKey;
  readonly type: AtomType;
  readonly name: string;
  readonly truthValue: TruthValue;
  readonly attention: AttentionValue;
  readonly metadata: AtomMetadata;
  /** Ids of links whose source is this atom, in insertion order */
  readonly outgoing: readonly string[];
}

export interface Link {
  readonly id: string;
  readonly type: LinkType;
  readonly source: AtomKey;
  readonly target: AtomKey;
  readonly truthValue: TruthValue;
}

/**
 * Caller-supplied atom. Missing values take the graph's defaults.
 */
export interface AtomInput {
  type: AtomType;
  name: string;
  truthValue?: TruthValue;
  attention?: AttentionValue;
  metadata?: Record<string, MetadataValue>;
}

export interface LinkInput {
  type: LinkType;
  source: AtomKey;
  target: AtomKey;
  truthValue?: TruthValue;
}

export interface AtomQuery {
  type?: AtomType;
  namePrefix?: string;
  metadata?: Record<string, MetadataValue>;
}

export interface Neighbor {
  atom: Atom;
  link: Link;
  direction: 'outgoing' | 'incoming';
}

/**
 * Writes staged by an agent while its task runs. Applied to the graph in one
 * step when the task completes.
 */
export interface MutationBatch {
  readonly atoms: readonly AtomInput[];
  readonly links: readonly LinkInput[];
}

export interface GraphSnapshot {
  atoms: Array<{
    type: AtomType;
    name: string;
    truthValue: TruthValue;
    attention: AttentionValue;
    metadata: Record<string, MetadataValue>;
  }>;
  links: Array<{
    type: LinkType;
    source: AtomKey;
    target: AtomKey;
    truthValue: TruthValue;
  }>;
}

export function atomKey(type: AtomType, name: string): AtomKey {
  return `${type}:${name}`;
}

export function linkId(type: LinkType, source: AtomKey, target: AtomKey): string {
  return `${type}:${source}->${target}`;
}

export function isAtomType(value: string): value is AtomType {
  return ATOM_TYPES.some((type) => type === value);
}

export function isLinkType(value: string): value is LinkType {
  return LINK_TYPES.some((type) => type === value);
}

export function isAtomKey(value: string): value is AtomKey {
  const separator = value.indexOf(':');
  return separator > 0 && separator < value.length - 1 && isAtomType(value.slice(0, separator));
}
