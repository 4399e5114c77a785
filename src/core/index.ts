/**
 * @fileoverview Core workbench infrastructure
 *
 * Result types and the error hierarchy shared by every module.
 */

// Result types and helpers
export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  safeSync,
  safeJsonParse,
} from './result.js';

// Errors
export {
  type ErrorJSON,
  type ExternalToolFailure,
  type TaskFailureKind,
  TASK_FAILURE_KINDS,
  WorkbenchError,
  ValidationError,
  CycleError,
  DependencyError,
  ExternalToolError,
  TimeoutError,
  ConfigurationError,
  SchemaError,
  ParseError,
  isWorkbenchError,
  classifyTaskFailure,
} from './errors.js';
