/**
 * @fileoverview CLI error handling with recovery hints
 *
 * Every failure that reaches the CLI is turned into an ErrorEnvelope: a
 * machine-readable code, a retryability flag and hints for the operator.
 * `--json` prints the envelope as JSON; otherwise it is rendered as text.
 */

import {
  ConfigurationError,
  CycleError,
  DependencyError,
  ExternalToolError,
  ParseError,
  SchemaError,
  TimeoutError,
  ValidationError,
  isWorkbenchError,
} from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

// ============================================================================
// CODES
// ============================================================================

export const ErrorCodes = [
  'EINVALID_ARGUMENT',
  'EVALIDATION',
  'ECONFIG',
  'EPARSE',
  'ESCHEMA',
  'EDEPENDENCY',
  'ECYCLE',
  'ETOOL',
  'ETIMEOUT',
  'ENOTFOUND',
  'EWORKFLOW_FAILED',
  'EUNKNOWN',
] as const;
export type ErrorCode = (typeof ErrorCodes)[number];

export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
  CONFIG: 3,
  INPUT: 4,
  TOOL: 5,
  TIMEOUT: 6,
} as const;
export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export const ErrorMetadata: Readonly<Record<ErrorCode, { retryable: boolean; exitCode: ExitCode; hints: readonly string[] }>> = {
  EINVALID_ARGUMENT: {
    retryable: false,
    exitCode: ExitCodes.USAGE,
    hints: ['Run `workbench help <command>` for usage information.'],
  },
  EVALIDATION: {
    retryable: false,
    exitCode: ExitCodes.INPUT,
    hints: ['Check the model descriptor and the names passed on the command line.'],
  },
  ECONFIG: {
    retryable: false,
    exitCode: ExitCodes.CONFIG,
    hints: ['Check the configuration file and the WORKBENCH_* environment variables.'],
  },
  EPARSE: {
    retryable: false,
    exitCode: ExitCodes.INPUT,
    hints: ['The input file is malformed; the listed fields need fixing.'],
  },
  ESCHEMA: {
    retryable: false,
    exitCode: ExitCodes.INPUT,
    hints: ['The snapshot was written by an incompatible version; export it again.'],
  },
  EDEPENDENCY: {
    retryable: false,
    exitCode: ExitCodes.INPUT,
    hints: ['Every task dependency must name a task that exists.'],
  },
  ECYCLE: {
    retryable: false,
    exitCode: ExitCodes.INPUT,
    hints: ['Remove one of the dependencies on the reported cycle.'],
  },
  ETOOL: {
    retryable: true,
    exitCode: ExitCodes.TOOL,
    hints: [
      'Check that the analysis tools are installed and on PATH.',
      'Tool commands can be changed under `tools` in the configuration file.',
    ],
  },
  ETIMEOUT: {
    retryable: true,
    exitCode: ExitCodes.TIMEOUT,
    hints: ['Raise the timeout with WORKBENCH_TOOL_TIMEOUT_MS or `tools.<name>.timeoutMs`.'],
  },
  ENOTFOUND: {
    retryable: false,
    exitCode: ExitCodes.INPUT,
    hints: ['Check that the file path exists.'],
  },
  EWORKFLOW_FAILED: {
    retryable: true,
    exitCode: ExitCodes.FAILURE,
    hints: ['Inspect the failed tasks in the report; rerun once their cause is fixed.'],
  },
  EUNKNOWN: {
    retryable: false,
    exitCode: ExitCodes.FAILURE,
    hints: ['Rerun with WORKBENCH_LOG_LEVEL=debug for more detail.'],
  },
};

// ============================================================================
// ERRORS & ENVELOPES
// ============================================================================

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export function createError(code: ErrorCode, message: string, details?: Record<string, unknown>): CliError {
  return new CliError(message, code, details);
}

export interface ErrorEnvelope {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

export interface ErrorEnvelopeOverrides {
  retryable?: boolean;
  recoveryHints?: string[];
  context?: Record<string, unknown>;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  overrides: ErrorEnvelopeOverrides = {},
): ErrorEnvelope {
  const metadata = ErrorMetadata[code];
  return {
    code,
    message,
    retryable: overrides.retryable ?? metadata.retryable,
    recoveryHints: overrides.recoveryHints ?? [...metadata.hints],
    context: { ...overrides.context, timestamp: new Date().toISOString() },
  };
}

/**
 * Map anything thrown by a command to an envelope.
 */
export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return createErrorEnvelope(error.code, error.message, { context: { ...error.details } });
  }
  if (isWorkbenchError(error)) {
    const code = workbenchErrorCode(error);
    const details = error.toJSON().details;
    return createErrorEnvelope(code, error.message, {
      retryable: error.retryable,
      context: { errorCode: error.code, ...details },
    });
  }
  const message = getErrorMessage(error);
  if (hasErrnoCode(error, 'ENOENT')) {
    return createErrorEnvelope('ENOTFOUND', message);
  }
  return createErrorEnvelope('EUNKNOWN', message);
}

function workbenchErrorCode(error: unknown): ErrorCode {
  if (error instanceof ValidationError) return 'EVALIDATION';
  if (error instanceof ConfigurationError) return 'ECONFIG';
  if (error instanceof ParseError) return 'EPARSE';
  if (error instanceof SchemaError) return 'ESCHEMA';
  if (error instanceof DependencyError) return 'EDEPENDENCY';
  if (error instanceof CycleError) return 'ECYCLE';
  if (error instanceof TimeoutError) return 'ETIMEOUT';
  if (error instanceof ExternalToolError) return 'ETOOL';
  return 'EUNKNOWN';
}

function hasErrnoCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export function getExitCode(envelope: ErrorEnvelope): ExitCode {
  return ErrorMetadata[envelope.code].exitCode;
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  if (typeof value !== 'object' || value === null) return false;
  if (!('code' in value) || !('message' in value) || !('recoveryHints' in value)) return false;
  const candidate = value.code;
  return ErrorCodes.some((code) => code === candidate)
    && typeof value.message === 'string'
    && Array.isArray(value.recoveryHints);
}

// ============================================================================
// FORMATTING
// ============================================================================

export function formatError(error: unknown): string {
  const envelope = classifyError(error);
  return `Error [${envelope.code}]: ${envelope.message}`;
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Suggestions:');
    for (const hint of envelope.recoveryHints) lines.push(`  - ${hint}`);
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
