import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getLogLevel, isLogLevel, logDebug, logError, logInfo, logWarning, setLogLevel, type LogLevel } from '../logger.js';

let previous: LogLevel;

beforeEach(() => {
  previous = getLogLevel();
  setLogLevel('debug');
});

afterEach(() => {
  setLogLevel(previous);
  vi.restoreAllMocks();
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs message only for ${level} when context is undefined`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello');

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { taskId: 'verify-1' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('hello', context);
    });
  }

  it('drops messages below the configured level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    setLogLevel('warn');

    logInfo('quiet');
    logDebug('quieter');
    logError('loud');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('loud');
  });

  it('silences everything at silent', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('silent');

    logError('nope');
    logWarning('nope');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('recognises level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
