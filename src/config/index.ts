/**
 * @fileoverview Configuration exports
 */

export {
  DEFAULT_TOOL_TIMEOUT_MS,
  DEFAULT_WORKBENCH_CONFIG,
  WorkbenchConfigSchema,
  loadWorkbenchConfig,
  resolveWorkbenchConfig,
  type ConfigEnv,
  type WorkbenchConfig,
  type WorkbenchConfigOverrides,
} from './workbench_config.js';
