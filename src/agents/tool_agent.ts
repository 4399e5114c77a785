/**
 * @fileoverview Role-tagged agent
 */

import type { Agent, AgentContext, AgentRole, Task, TaskOutcome } from '../coordination/types.js';
import { AGENT_ROLES } from '../coordination/types.js';
import { classifyTaskFailure } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { ROLE_HANDLERS } from './role_handlers.js';
import { ExecaToolRunner, type ToolRunner } from './tool_runner.js';
import type { HandlerDeps, RoleHandlerTable, ToolTable } from './types.js';

export class ToolAgent implements Agent {
  constructor(
    readonly id: string,
    readonly role: AgentRole,
    private readonly deps: HandlerDeps,
    private readonly handlers: RoleHandlerTable = ROLE_HANDLERS,
  ) {}

  async processTask(task: Readonly<Task>, context: AgentContext): Promise<TaskOutcome> {
    try {
      return await this.handlers[this.role](task, context, this.deps);
    } catch (error: unknown) {
      const kind = classifyTaskFailure(error);
      const message = getErrorMessage(error);
      logWarning('[agents] task failed', { agent: this.id, task: task.id, kind, error: message });
      return { status: 'FAILED', error: { kind, message } };
    }
  }
}

export interface DefaultAgentOptions {
  tools: ToolTable;
  analyzerTimeoutMs: number;
  /** Agents created per role */
  perRole?: number;
  runner?: ToolRunner;
}

/**
 * `perRole` agents for every role, ids `<role>-<n>` in lower case.
 */
export function createDefaultAgents(options: DefaultAgentOptions): ToolAgent[] {
  const deps: HandlerDeps = {
    runner: options.runner ?? new ExecaToolRunner(),
    tools: options.tools,
    analyzerTimeoutMs: options.analyzerTimeoutMs,
  };
  const perRole = options.perRole ?? 1;
  return AGENT_ROLES.flatMap((role) =>
    Array.from({ length: perRole }, (_, index) => new ToolAgent(`${role.toLowerCase()}-${index + 1}`, role, deps)),
  );
}
