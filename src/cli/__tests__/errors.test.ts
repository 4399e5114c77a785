/**
 * @fileoverview Tests for structured error contracts
 *
 * Validates that the error system provides:
 * 1. Machine-readable error codes and exit codes
 * 2. Retryability taken from the underlying error
 * 3. Classification of workbench, CLI and filesystem errors
 * 4. JSON and text rendering
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCodes,
  ErrorMetadata,
  ExitCodes,
  CliError,
  createError,
  createErrorEnvelope,
  classifyError,
  getExitCode,
  isErrorEnvelope,
  formatError,
  formatErrorWithHints,
  formatErrorJson,
} from '../errors.js';
import {
  ConfigurationError,
  CycleError,
  DependencyError,
  ExternalToolError,
  ParseError,
  SchemaError,
  TimeoutError,
  ValidationError,
} from '../../core/errors.js';

describe('ErrorEnvelope', () => {
  describe('createErrorEnvelope', () => {
    it('should fill retryability and hints from the code metadata', () => {
      const envelope = createErrorEnvelope('ETOOL', 'simulator missing');

      expect(envelope.code).toBe('ETOOL');
      expect(envelope.message).toBe('simulator missing');
      expect(envelope.retryable).toBe(true);
      expect(envelope.recoveryHints).toEqual([...ErrorMetadata.ETOOL.hints]);
      expect(typeof envelope.context?.timestamp).toBe('string');
    });

    it('should apply overrides', () => {
      const envelope = createErrorEnvelope('EUNKNOWN', 'boom', {
        retryable: true,
        recoveryHints: ['try again'],
        context: { command: 'run' },
      });

      expect(envelope.retryable).toBe(true);
      expect(envelope.recoveryHints).toEqual(['try again']);
      expect(envelope.context?.command).toBe('run');
    });

    it('should not share hint arrays with the metadata table', () => {
      const envelope = createErrorEnvelope('ECONFIG', 'bad config');
      envelope.recoveryHints.push('extra');

      expect(ErrorMetadata.ECONFIG.hints).not.toContain('extra');
    });
  });

  describe('metadata', () => {
    it('should describe every code', () => {
      for (const code of ErrorCodes) {
        expect(ErrorMetadata[code].hints.length).toBeGreaterThan(0);
      }
    });

    it('should map codes to exit codes', () => {
      expect(getExitCode(createErrorEnvelope('EINVALID_ARGUMENT', 'x'))).toBe(ExitCodes.USAGE);
      expect(getExitCode(createErrorEnvelope('ECONFIG', 'x'))).toBe(ExitCodes.CONFIG);
      expect(getExitCode(createErrorEnvelope('EPARSE', 'x'))).toBe(ExitCodes.INPUT);
      expect(getExitCode(createErrorEnvelope('ETOOL', 'x'))).toBe(ExitCodes.TOOL);
      expect(getExitCode(createErrorEnvelope('ETIMEOUT', 'x'))).toBe(ExitCodes.TIMEOUT);
      expect(getExitCode(createErrorEnvelope('EWORKFLOW_FAILED', 'x'))).toBe(ExitCodes.FAILURE);
    });
  });
});

describe('classifyError', () => {
  it('should keep the code and details of a CliError', () => {
    const envelope = classifyError(createError('EINVALID_ARGUMENT', 'bad flag', { flag: '--paths' }));

    expect(envelope.code).toBe('EINVALID_ARGUMENT');
    expect(envelope.message).toBe('bad flag');
    expect(envelope.context?.flag).toBe('--paths');
  });

  it.each([
    [new ValidationError('goal', 'an existing goal', 'ghost'), 'EVALIDATION'],
    [new ConfigurationError('tools', 'missing'), 'ECONFIG'],
    [new ParseError('model descriptor', '1 invalid field(s)'), 'EPARSE'],
    [new SchemaError('workbench snapshot', 1, 2), 'ESCHEMA'],
    [new DependencyError('w_verify', 'w_ghost'), 'EDEPENDENCY'],
    [new CycleError('w', ['a', 'b', 'a']), 'ECYCLE'],
    [new TimeoutError(100, 'simulator'), 'ETIMEOUT'],
    [new ExternalToolError('simulator', 'non_zero_exit', 'exit 2', 2), 'ETOOL'],
  ])('should map %s', (error, code) => {
    expect(classifyError(error).code).toBe(code);
  });

  it('should take retryability from the workbench error', () => {
    const envelope = classifyError(new ExternalToolError('verifier', 'spawn_failed', 'not found'));

    expect(envelope.retryable).toBe(false);
    expect(envelope.context).toMatchObject({
      errorCode: 'EXTERNAL_TOOL_ERROR',
      tool: 'verifier',
      failure: 'spawn_failed',
    });
  });

  it('should report missing files as ENOTFOUND', () => {
    const error = Object.assign(new Error("ENOENT: no such file or directory, open 'm.yaml'"), { code: 'ENOENT' });

    expect(classifyError(error).code).toBe('ENOTFOUND');
  });

  it('should fall back to EUNKNOWN', () => {
    const envelope = classifyError('plain string');

    expect(envelope.code).toBe('EUNKNOWN');
    expect(envelope.message).toBe('plain string');
  });
});

describe('CliError', () => {
  it('should carry its code', () => {
    const error = new CliError('nope', 'ENOTFOUND');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('CliError');
    expect(error.code).toBe('ENOTFOUND');
    expect(error.details).toBeUndefined();
  });
});

describe('isErrorEnvelope', () => {
  it('should accept envelopes', () => {
    expect(isErrorEnvelope(createErrorEnvelope('ETOOL', 'x'))).toBe(true);
  });

  it('should reject other values', () => {
    expect(isErrorEnvelope(null)).toBe(false);
    expect(isErrorEnvelope({ code: 'ENOINDEX', message: 'x', recoveryHints: [] })).toBe(false);
    expect(isErrorEnvelope({ code: 'ETOOL', message: 'x' })).toBe(false);
  });
});

describe('formatting', () => {
  it('should format a one-line message', () => {
    expect(formatError(createError('ECYCLE', 'cycle a -> a'))).toBe('Error [ECYCLE]: cycle a -> a');
  });

  it('should list hints below the message', () => {
    const envelope = createErrorEnvelope('EUNKNOWN', 'boom', { recoveryHints: ['first', 'second'] });

    expect(formatErrorWithHints(envelope)).toBe('Error [EUNKNOWN]: boom\n\nSuggestions:\n  - first\n  - second');
  });

  it('should omit the suggestions block without hints', () => {
    const envelope = createErrorEnvelope('EUNKNOWN', 'boom', { recoveryHints: [] });

    expect(formatErrorWithHints(envelope)).toBe('Error [EUNKNOWN]: boom');
  });

  it('should wrap the envelope under an error key for JSON output', () => {
    const envelope = createErrorEnvelope('ETIMEOUT', 'slow');
    const parsed: unknown = JSON.parse(formatErrorJson(envelope));

    expect(parsed).toEqual({ error: envelope });
  });
});
