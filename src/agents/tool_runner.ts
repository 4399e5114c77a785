/**
 * @fileoverview External analysis tool invocation
 *
 * Every invocation is bounded by the tool's configured timeout. A timed-out
 * process surfaces as TimeoutError; a process that cannot start or exits
 * non-zero surfaces as ExternalToolError.
 */

import { execa } from 'execa';
import { ExternalToolError, TimeoutError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export interface ToolSpec {
  command: string;
  args: readonly string[];
  timeoutMs: number;
}

export interface ToolRunResult {
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface ToolRunner {
  run(tool: string, spec: ToolSpec, args: readonly string[]): Promise<ToolRunResult>;
}

const STDERR_EXCERPT = 2000;

export class ExecaToolRunner implements ToolRunner {
  async run(tool: string, spec: ToolSpec, args: readonly string[]): Promise<ToolRunResult> {
    const argv = [...spec.args, ...args];
    const started = Date.now();
    logDebug('[tools] invoking', { tool, command: spec.command, args: argv, timeoutMs: spec.timeoutMs });

    const result = await execa(spec.command, argv, {
      timeout: spec.timeoutMs,
      reject: false,
    }).catch((error: unknown): never => {
      throw new ExternalToolError(tool, 'spawn_failed', getErrorMessage(error));
    });

    const stdout = (result.stdout ?? '').toString().trim();
    const stderr = (result.stderr ?? '').toString().trim();
    const durationMs = Date.now() - started;

    if (result.timedOut) {
      throw new TimeoutError(spec.timeoutMs, `${tool} (${spec.command})`);
    }
    if (result.exitCode === undefined) {
      throw new ExternalToolError(tool, 'spawn_failed', `could not start ${spec.command}`, undefined, excerpt(stderr));
    }
    if (result.exitCode !== 0) {
      throw new ExternalToolError(
        tool,
        'non_zero_exit',
        `${spec.command} exited with code ${result.exitCode}`,
        result.exitCode,
        excerpt(stderr),
      );
    }
    logDebug('[tools] finished', { tool, durationMs });
    return { stdout, stderr, durationMs };
  }
}

function excerpt(text: string): string {
  return text.length > STDERR_EXCERPT ? `${text.slice(0, STDERR_EXCERPT)}...` : text;
}
