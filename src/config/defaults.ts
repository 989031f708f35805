/**
 * Default configuration values.
 * All values are overridable via config file or CLI flags.
 */

import os from 'node:os';
import path from 'node:path';

export const TIMEOUTS = {
  ELEMENT_TIMEOUT: 10_000,
  NAVIGATION_TIMEOUT: 60_000,
  DOWNLOAD_TIMEOUT: 120_000,
  // Browser teardown waits this long for in-flight download saves.
  DOWNLOAD_DRAIN: 5_000,
} as const;

export const POLLING = {
  DOWNLOAD_POLL_INTERVAL: 2_000,
} as const;

// Fixed waits after actions with no observable completion signal.
export const SETTLE = {
  NAVIGATION: 5_000,
  CONSENT: 3_000,
  LOGIN: 20_000,
  CLICK: 2_000,
  SCROLL: 1_000,
  ESCAPE: 1_000,
} as const;

export const PATHS = {
  CONFIG_FILE: '.unisphere-backup.yaml',
  DEBUG_DIR: path.join('unity_backups', 'debug'),
  DOWNLOAD_DIR: path.join(os.homedir(), 'Downloads'),
  ARCHIVE_DIRS: defaultArchiveDirs(process.platform, os.homedir()),
} as const;

export const EXIT_CODES = {
  SUCCESS: 0,
  WORKFLOW_FAILURE: 1,
  INVOCATION_ERROR: 2,
  CONNECTION_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const PASSWORD_ENV = 'UNISPHERE_PASSWORD';

/**
 * Archive directories used when neither the config file nor a flag
 * names one. The console operators' Windows hosts keep them on `E:`;
 * elsewhere they live under the home directory.
 */
export function defaultArchiveDirs(
  platform: NodeJS.Platform,
  home: string,
): { configuration: string; keystore: string } {
  if (platform === 'win32') {
    return {
      configuration: 'E:\\Unity\\Configuration backups',
      keystore: 'E:\\Unity\\Encryption Key Backups',
    };
  }
  return {
    configuration: path.posix.join(home, 'unity_backups', 'Configuration backups'),
    keystore: path.posix.join(home, 'unity_backups', 'Encryption Key Backups'),
  };
}
