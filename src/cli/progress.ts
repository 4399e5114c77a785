/**
 * @fileoverview Terminal output helpers for CLI commands
 *
 * Progress bar for workflow runs plus plain table and key-value printers.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const format = options.format ?? '{bar} {percentage}% | {value}/{total} tasks | {task}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(options.total, 0, { task: 'starting' });

  return {
    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },

    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Fixed-precision number for tables; integers stay as they are.
 */
export function formatNumber(value: number, digits = 3): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(digits);
}

export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(header.length, maxRowWidth);
  });

  const lines = [
    headers.map((header, i) => header.padEnd(widths[i] ?? 0)).join(' | '),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
  ];
  for (const row of rows) {
    lines.push(headers.map((_, i) => (row[i] ?? '').padEnd(widths[i] ?? 0)).join(' | '));
  }
  return lines;
}

export function printTable(headers: string[], rows: string[][]): void {
  for (const line of formatTable(headers, rows)) console.log(line);
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(0, ...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}
