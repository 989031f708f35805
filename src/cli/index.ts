/**
 * CLI module. Thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 */

export { configureBackupCommand, runBackup, exitCodeFor } from './run.js';
export type { BackupArgs, BackupIO } from './run.js';
export { resolvePassword, buildRunSettings, parseSeconds } from './options.js';
export type { BackupCliOptions, PasswordSources, SettingsInput } from './options.js';
