/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated.
 */

export { TIMEOUTS, LIMITS, EXECUTOR, MONITOR, CONFIG_FILE, REPORT_DIR } from './defaults.js';
export { loadConfigFile, loadPlanFile, resolveRunnerConfig } from './loader.js';
