/**
 * @fileoverview Agent handler contracts
 *
 * One ToolAgent class serves every role; what a role does lives in a handler
 * looked up by role. Handlers read the graph, call out through the tool
 * runner, and return staged writes.
 */

import type { AgentContext, AgentRole, Task, TaskOutcome } from '../coordination/types.js';
import type { ToolRunner, ToolSpec } from './tool_runner.js';

export const TOOL_NAMES = ['simulator', 'verifier', 'optimizer'] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

export type ToolTable = Readonly<Record<ToolName, ToolSpec>>;

export interface HandlerDeps {
  runner: ToolRunner;
  tools: ToolTable;
  /** Bound on in-process analysis; 0 disables the bound */
  analyzerTimeoutMs: number;
}

export type RoleHandler = (
  task: Readonly<Task>,
  context: AgentContext,
  deps: HandlerDeps,
) => Promise<TaskOutcome>;

export type RoleHandlerTable = Readonly<Record<AgentRole, RoleHandler>>;
