import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { ZodError } from 'zod';

import { PATHS, SETTLE, TIMEOUTS, POLLING } from '../config/defaults.js';
import { normalizeTargetUrl } from '../core/urls.js';
import { runSettingsSchema } from '../schema/index.js';
import type { BrowserKind, FileConfig, RunSettings } from '../schema/index.js';
import { InvocationError, errorMessage, formatZodError } from '../utils/errors.js';

// ── CLI option shape ─────────────────────────────────────────

export interface BackupCliOptions {
  passwordFile?: string;
  browser?: BrowserKind;
  headless?: true;
  config?: string;
  profile?: string;
  downloadDir?: string;
  debugDir?: string;
  configArchiveDir?: string;
  keystoreArchiveDir?: string;
  timeout?: string;
  downloadTimeout?: string;
  action?: string[];
  report?: string;
  json?: true;
  verbose?: true;
  loginCapture: boolean;
}

// ── Password ─────────────────────────────────────────────────

export interface PasswordSources {
  inline?: string | undefined;
  file?: string | undefined;
  env?: string | undefined;
}

/**
 * Inline password or `--password-file`, never both. The file's first
 * line is used, trimmed. The environment is the last resort.
 */
export async function resolvePassword(sources: PasswordSources): Promise<string> {
  if (sources.inline !== undefined && sources.file !== undefined) {
    throw new InvocationError('Pass the password inline or with --password-file, not both');
  }

  if (sources.inline !== undefined) {
    if (sources.inline.length === 0) throw new InvocationError('Password is empty');
    return sources.inline;
  }

  if (sources.file !== undefined) {
    let raw: string;
    try {
      raw = await readFile(sources.file, 'utf-8');
    } catch (err) {
      throw new InvocationError(`Error reading password file: ${errorMessage(err)}`, { cause: err });
    }
    const password = (raw.split(/\r?\n/)[0] ?? '').trim();
    if (password.length === 0) {
      throw new InvocationError(`Password file ${sources.file} is empty`);
    }
    return password;
  }

  if (sources.env !== undefined && sources.env.length > 0) return sources.env;

  throw new InvocationError('A password is required (argument, --password-file or environment)');
}

// ── Durations ────────────────────────────────────────────────

/** Seconds from a CLI flag to milliseconds. */
export function parseSeconds(value: string, flag: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvocationError(`${flag} expects a positive number of seconds, got "${value}"`);
  }
  return Math.round(seconds * 1000);
}

const toMs = (seconds: number | undefined): number | undefined =>
  seconds === undefined ? undefined : Math.round(seconds * 1000);

// ── Settings merge ───────────────────────────────────────────

export interface SettingsInput {
  targetUrl: string;
  username: string;
  password: string;
  cli: BackupCliOptions;
  file: FileConfig;
  cwd?: string;
}

/** CLI flags over config file over defaults, validated as a whole. */
export function buildRunSettings(input: SettingsInput): RunSettings {
  const { cli, file } = input;
  const cwd = input.cwd ?? process.cwd();

  const archiveDirs: Record<string, string> = {
    ...PATHS.ARCHIVE_DIRS,
    ...file.archiveDirs,
  };
  if (cli.configArchiveDir !== undefined) archiveDirs['configuration'] = cli.configArchiveDir;
  if (cli.keystoreArchiveDir !== undefined) archiveDirs['keystore'] = cli.keystoreArchiveDir;
  for (const [action, dir] of Object.entries(archiveDirs)) {
    archiveDirs[action] = path.resolve(cwd, dir);
  }

  const actions = cli.action ?? file.actions;

  const candidate = {
    targetUrl: normalizeTargetUrl(input.targetUrl),
    username: input.username,
    password: input.password,
    browser: cli.browser ?? file.browser ?? 'edge',
    headless: cli.headless ?? file.headless ?? false,
    downloadDir: path.resolve(cwd, cli.downloadDir ?? file.downloadDir ?? PATHS.DOWNLOAD_DIR),
    debugDir: path.resolve(cwd, cli.debugDir ?? file.debugDir ?? PATHS.DEBUG_DIR),
    archiveDirs,
    elementTimeoutMs:
      (cli.timeout !== undefined ? parseSeconds(cli.timeout, '--timeout') : undefined) ??
      toMs(file.elementTimeout) ??
      TIMEOUTS.ELEMENT_TIMEOUT,
    navigationTimeoutMs: TIMEOUTS.NAVIGATION_TIMEOUT,
    downloadTimeoutMs:
      (cli.downloadTimeout !== undefined
        ? parseSeconds(cli.downloadTimeout, '--download-timeout')
        : undefined) ??
      toMs(file.downloadTimeout) ??
      TIMEOUTS.DOWNLOAD_TIMEOUT,
    pollIntervalMs: toMs(file.pollInterval) ?? POLLING.DOWNLOAD_POLL_INTERVAL,
    settle: {
      navigationMs: SETTLE.NAVIGATION,
      consentMs: SETTLE.CONSENT,
      loginMs: toMs(file.loginSettle) ?? SETTLE.LOGIN,
      clickMs: SETTLE.CLICK,
      scrollMs: SETTLE.SCROLL,
      escapeMs: SETTLE.ESCAPE,
    },
    captureAfterLogin: cli.loginCapture,
    ...(actions !== undefined ? { actions } : {}),
  };

  try {
    return runSettingsSchema.parse(candidate);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new InvocationError(`Invalid arguments:\n${formatZodError(err)}`, { cause: err });
    }
    throw err;
  }
}
