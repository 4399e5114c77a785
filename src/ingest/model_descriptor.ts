/**
 * @fileoverview Pre-parsed model descriptors
 *
 * The textual hybrid-system format is parsed elsewhere; this module accepts
 * the structured result (JSON or YAML), validates it and writes it into an
 * AtomSpace through the model constructors.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import type { AtomSpace } from '../atomspace/atom_space.js';
import { ParseError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// SCHEMA
// ============================================================================

const name = z.string().min(1);

export const ModelDescriptorSchema = z.object({
  name,
  modelFile: z.string().min(1).optional(),
  modes: z.array(z.object({
    id: z.number().int(),
    name,
    flows: z.array(z.object({ variable: name, equation: z.string() })).default([]),
  })).min(1),
  jumps: z.array(z.object({
    from: z.number().int(),
    to: z.number().int(),
    guard: z.string(),
    probability: z.number().min(0).max(1).optional(),
  })).default([]),
  parameters: z.array(z.object({
    name,
    value: z.number().finite(),
    bounds: z.tuple([z.number().finite(), z.number().finite()])
      .refine(([lower, upper]) => lower <= upper, 'lower bound exceeds upper bound')
      .optional(),
    uncertainty: z.number().finite().nonnegative().optional(),
  })).default([]),
  goals: z.array(z.object({
    name,
    condition: z.string(),
    targetProbability: z.number().min(0).max(1).optional(),
  })).default([]),
}).superRefine((descriptor, ctx) => {
  const ids = new Set<number>();
  descriptor.modes.forEach((mode, index) => {
    if (ids.has(mode.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['modes', index, 'id'], message: `duplicate mode id ${mode.id}` });
    }
    ids.add(mode.id);
  });
  descriptor.jumps.forEach((jump, index) => {
    for (const end of ['from', 'to'] as const) {
      if (!ids.has(jump[end])) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['jumps', index, end], message: `unknown mode id ${jump[end]}` });
      }
    }
  });
});

export type ModelDescriptor = z.infer<typeof ModelDescriptorSchema>;
export type ModelDescriptorInput = z.input<typeof ModelDescriptorSchema>;

export interface PopulationSummary {
  model: string;
  atoms: number;
  links: number;
}

// ============================================================================
// PARSING
// ============================================================================

export function parseModelDescriptor(document: unknown): ModelDescriptor {
  const parsed = ModelDescriptorSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ParseError('model descriptor', `${issues.length} invalid field(s)`, issues);
  }
  return parsed.data;
}

/**
 * Read a descriptor file. `.json` is parsed as JSON, everything else as
 * YAML.
 */
export async function loadModelDescriptor(filePath: string): Promise<ModelDescriptor> {
  const raw = await readFile(filePath, 'utf8');
  let document: unknown;
  try {
    document = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(raw) : YAML.parse(raw);
  } catch (error: unknown) {
    throw new ParseError('model descriptor', `${filePath}: ${getErrorMessage(error)}`);
  }
  return parseModelDescriptor(document);
}

// ============================================================================
// POPULATION
// ============================================================================

/**
 * Write the model, its modes, flows, jumps, parameters and goals. Mode atoms
 * are named `<model>_mode_<id>`; flows and jumps refer to them by that name.
 */
export function populateAtomSpace(space: AtomSpace, descriptor: ModelDescriptor): PopulationSummary {
  const atomsBefore = space.size;
  const linksBefore = space.linkCount;
  const model = descriptor.name;

  space.addModel(model, descriptor.modelFile);
  const modeNames = new Map<number, string>();
  for (const mode of descriptor.modes) {
    const atom = space.addMode(model, mode.id, mode.name);
    modeNames.set(mode.id, atom.name);
    for (const flow of mode.flows) {
      space.addFlow(atom.name, flow.variable, flow.equation);
    }
  }
  for (const jump of descriptor.jumps) {
    const from = modeNames.get(jump.from);
    const to = modeNames.get(jump.to);
    // Unknown ids were rejected by the schema
    if (from === undefined || to === undefined) continue;
    space.addJump(from, to, jump.guard, jump.probability);
  }
  for (const parameter of descriptor.parameters) {
    space.addParameter(parameter.name, parameter.value, {
      bounds: parameter.bounds,
      uncertainty: parameter.uncertainty,
      model,
    });
  }
  for (const goal of descriptor.goals) {
    space.addGoal(goal.name, goal.condition, { targetProbability: goal.targetProbability, model });
  }

  const summary: PopulationSummary = {
    model,
    atoms: space.size - atomsBefore,
    links: space.linkCount - linksBefore,
  };
  logDebug('[ingest] model populated', { ...summary });
  return summary;
}
