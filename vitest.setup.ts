/**
 * Centralized Vitest Setup for the workbench
 *
 * Silences the logger unless WORKBENCH_LOG_LEVEL asks for output.
 */

import { beforeAll } from 'vitest';
import { isLogLevel, setLogLevel, type LogLevel } from './src/telemetry/logger.js';

const requested = process.env.WORKBENCH_LOG_LEVEL?.trim();
const testLogLevel: LogLevel = requested && isLogLevel(requested) ? requested : 'silent';

beforeAll(() => {
  setLogLevel(testLogLevel);
});
