/**
 * Configuration module.
 * Defaults, config file and console profile loading.
 * Zod-validated at every boundary.
 */

export { TIMEOUTS, POLLING, SETTLE, PATHS, EXIT_CODES, PASSWORD_ENV } from './defaults.js';
export type { ExitCode } from './defaults.js';
export { loadConfigFile, loadProfile, DEFAULT_PROFILE_PATH } from './loader.js';
