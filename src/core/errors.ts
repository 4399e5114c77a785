/**
 * @fileoverview Workbench error hierarchy
 *
 * Structural violations (malformed values, cycles, unknown dependencies) are
 * raised as typed errors. Failures inside a running task are converted to
 * task data by the coordinator and never escape a workflow run.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class WorkbenchError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

/**
 * Kinds recorded on FAILED tasks. Mirrors the error classes below plus the
 * two failure modes that are not exceptions.
 */
export const TASK_FAILURE_KINDS = [
  'ValidationError',
  'ExternalToolError',
  'TimeoutError',
  'BlockedByDependency',
  'AgentError',
] as const;
export type TaskFailureKind = (typeof TASK_FAILURE_KINDS)[number];

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends WorkbenchError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// WORKFLOW STRUCTURE ERRORS
// ============================================================================

export class CycleError extends WorkbenchError {
  readonly code = 'CYCLE_ERROR';
  readonly retryable = false;

  constructor(
    readonly workflowId: string,
    readonly cycle: readonly string[],
  ) {
    super(`Workflow ${workflowId} has a dependency cycle: ${cycle.join(' -> ')}`);
    this.name = 'CycleError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        workflowId: this.workflowId,
        cycle: [...this.cycle],
      },
    };
  }
}

export class DependencyError extends WorkbenchError {
  readonly code = 'DEPENDENCY_ERROR';
  readonly retryable = false;

  constructor(
    readonly taskId: string,
    readonly missingDependency: string,
  ) {
    super(`Task ${taskId} depends on unknown task ${missingDependency}`);
    this.name = 'DependencyError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        taskId: this.taskId,
        missingDependency: this.missingDependency,
      },
    };
  }
}

// ============================================================================
// EXTERNAL TOOL ERRORS
// ============================================================================

export type ExternalToolFailure = 'spawn_failed' | 'non_zero_exit' | 'unparsable_output';

export class ExternalToolError extends WorkbenchError {
  readonly code = 'EXTERNAL_TOOL_ERROR';
  readonly retryable = false;

  constructor(
    readonly tool: string,
    readonly failure: ExternalToolFailure,
    message: string,
    readonly exitCode?: number,
    readonly stderr?: string,
  ) {
    super(`Tool ${tool} failed (${failure}): ${message}`);
    this.name = 'ExternalToolError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        tool: this.tool,
        failure: this.failure,
        exitCode: this.exitCode,
        stderr: this.stderr,
      },
    };
  }
}

export class TimeoutError extends WorkbenchError {
  readonly code = 'TIMEOUT_ERROR';
  readonly retryable = true;

  constructor(
    readonly timeoutMs: number,
    readonly context?: string,
  ) {
    super(context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        timeoutMs: this.timeoutMs,
        context: this.context,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION & SNAPSHOT ERRORS
// ============================================================================

export class ConfigurationError extends WorkbenchError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

export class SchemaError extends WorkbenchError {
  readonly code = 'SCHEMA_ERROR';
  readonly retryable = false;

  constructor(
    readonly schemaType: string,
    readonly expectedVersion: number,
    readonly actualVersion: number,
  ) {
    super(`Schema version mismatch for ${schemaType}: expected v${expectedVersion}, got v${actualVersion}`);
    this.name = 'SchemaError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        schemaType: this.schemaType,
        expectedVersion: this.expectedVersion,
        actualVersion: this.actualVersion,
      },
    };
  }
}

export class ParseError extends WorkbenchError {
  readonly code = 'PARSE_ERROR';
  readonly retryable = false;

  constructor(
    readonly format: string,
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(`Failed to parse ${format}: ${message}`);
    this.name = 'ParseError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        format: this.format,
        issues: [...this.issues],
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isWorkbenchError(error: unknown): error is WorkbenchError {
  return error instanceof WorkbenchError;
}

/**
 * Map a thrown value to the failure kind recorded on a task.
 */
export function classifyTaskFailure(error: unknown): TaskFailureKind {
  if (error instanceof TimeoutError) return 'TimeoutError';
  if (error instanceof ExternalToolError) return 'ExternalToolError';
  if (error instanceof ValidationError) return 'ValidationError';
  return 'AgentError';
}
