/**
 * @fileoverview Tests for terminal output helpers
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatDuration, formatNumber, formatTable, printKeyValue } from '../progress.js';

describe('formatDuration', () => {
  it('should format milliseconds, seconds and minutes', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125_000)).toBe('2m 5s');
  });
});

describe('formatNumber', () => {
  it('should keep integers and fix fractions', () => {
    expect(formatNumber(3)).toBe('3');
    expect(formatNumber(0.83333)).toBe('0.833');
    expect(formatNumber(0.5, 1)).toBe('0.5');
  });
});

describe('formatTable', () => {
  it('should pad columns to the widest cell', () => {
    expect(formatTable(['Atom', 'STI'], [['PARAMETER:k', '12'], ['GOAL:g', '9.5']])).toEqual([
      'Atom        | STI',
      '------------+----',
      'PARAMETER:k | 12 ',
      'GOAL:g      | 9.5',
    ]);
  });
});

describe('printKeyValue', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should align keys and print N/A for null', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    printKeyValue([
      { key: 'probability', value: '0.5' },
      { key: 'bounds', value: null },
    ]);

    expect(log.mock.calls.map((call) => call[0])).toEqual(['  probability: 0.5', '  bounds     : N/A']);
  });
});
