/**
 * @fileoverview Agents module exports
 */

export type { HandlerDeps, RoleHandler, RoleHandlerTable, ToolName, ToolTable } from './types.js';
export { TOOL_NAMES } from './types.js';

export { ExecaToolRunner } from './tool_runner.js';
export type { ToolRunner, ToolRunResult, ToolSpec } from './tool_runner.js';

export {
  OptimizationOutputSchema,
  SimulationOutputSchema,
  VerificationOutputSchema,
  parseProbabilityBounds,
  parseToolOutput,
} from './output_parser.js';
export type { OptimizationOutput, SimulationOutput, VerificationOutput } from './output_parser.js';

export {
  ROLE_HANDLERS,
  DEFAULT_SIMULATION_DEPTH,
  DEFAULT_SIMULATION_PATHS,
  DEFAULT_VERIFIER_PRECISION,
  SIMULATION_CONFIDENCE_K,
} from './role_handlers.js';

export { ToolAgent, createDefaultAgents } from './tool_agent.js';
export type { DefaultAgentOptions } from './tool_agent.js';
