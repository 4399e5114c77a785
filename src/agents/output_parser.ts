/**
 * @fileoverview Tool output parsing
 *
 * Tools print either one JSON document on stdout or, for verifiers that
 * predate the JSON format, a `P = [lower, upper]` line.
 */

import { z, type ZodError, type ZodType } from 'zod';
import { ExternalToolError } from '../core/errors.js';
import { safeJsonParse } from '../core/result.js';

// ============================================================================
// SCHEMAS
// ============================================================================

const unit = z.number().min(0).max(1);

export const SimulationOutputSchema = z.object({
  trajectories: z.array(z.object({
    id: z.string().optional(),
    satisfiesGoal: z.boolean(),
    length: z.number().int().nonnegative().optional(),
  })),
});
export type SimulationOutput = z.infer<typeof SimulationOutputSchema>;

export const VerificationOutputSchema = z.object({
  bounds: z.tuple([unit, unit]).refine(([lo, hi]) => lo <= hi, 'lower bound exceeds upper bound'),
  probability: unit.optional(),
});
export type VerificationOutput = z.infer<typeof VerificationOutputSchema>;

export const OptimizationOutputSchema = z.object({
  optimum: z.record(z.number().finite()),
  objective: z.number().finite().optional(),
});
export type OptimizationOutput = z.infer<typeof OptimizationOutputSchema>;

// ============================================================================
// PARSERS
// ============================================================================

const BOUNDS_LINE = /P\s*=\s*\[\s*([-+]?\d*\.?\d+(?:[eE][-+]?\d+)?)\s*,\s*([-+]?\d*\.?\d+(?:[eE][-+]?\d+)?)\s*\]/;

/**
 * First `P = [lo, hi]` line in the text, if any.
 */
export function parseProbabilityBounds(text: string): VerificationOutput | undefined {
  const match = BOUNDS_LINE.exec(text);
  if (!match) return undefined;
  const candidate = { bounds: [Number(match[1]), Number(match[2])] };
  const parsed = VerificationOutputSchema.safeParse(candidate);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Parse stdout as JSON against `schema`. When stdout is not JSON, or is JSON
 * of the wrong shape (a bare number, say), the optional text fallback gets a
 * chance before the output counts as unparsable.
 */
export function parseToolOutput<T>(
  tool: string,
  stdout: string,
  schema: ZodType<T>,
  fallback?: (text: string) => T | undefined,
): T {
  const json = safeJsonParse(stdout);
  if (!json.ok) {
    const recovered = fallback?.(stdout);
    if (recovered !== undefined) return recovered;
    throw new ExternalToolError(tool, 'unparsable_output', `output is not valid JSON: ${preview(stdout)}`);
  }
  const parsed = schema.safeParse(json.value);
  if (!parsed.success) {
    const recovered = fallback?.(stdout);
    if (recovered !== undefined) return recovered;
    throw new ExternalToolError(tool, 'unparsable_output', formatIssues(parsed.error).join('; '));
  }
  return parsed.data;
}

function formatIssues(error: ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function preview(text: string): string {
  const line = text.split('\n', 1)[0] ?? '';
  return line.length > 80 ? `${line.slice(0, 80)}...` : line || '(empty)';
}
