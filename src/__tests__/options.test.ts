import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { buildRunSettings, parseSeconds, resolvePassword } from '../cli/options.js';
import type { BackupCliOptions } from '../cli/options.js';
import { PATHS, SETTLE, TIMEOUTS, defaultArchiveDirs } from '../config/defaults.js';
import { InvocationError } from '../utils/errors.js';
import { makeTempDir, removeDir } from './helpers/tmp.js';

describe('resolvePassword', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('prefers the inline password', async () => {
    await expect(resolvePassword({ inline: 'test-secret', env: 'other' })).resolves.toBe('test-secret');
  });

  it('reads the first line of the password file, trimmed', async () => {
    const file = path.join(dir, 'pw.txt');
    await writeFile(file, '  test-secret  \r\nsecond line\n');

    await expect(resolvePassword({ file })).resolves.toBe('test-secret');
  });

  it('rejects an inline password together with a file', async () => {
    await expect(resolvePassword({ inline: 'a', file: 'b' })).rejects.toBeInstanceOf(InvocationError);
  });

  it('reports an unreadable password file', async () => {
    await expect(resolvePassword({ file: path.join(dir, 'missing.txt') })).rejects.toThrow(
      /^Error reading password file: ENOENT/,
    );
  });

  it('rejects an empty password file', async () => {
    const file = path.join(dir, 'empty.txt');
    await writeFile(file, '\n');

    await expect(resolvePassword({ file })).rejects.toThrow(`Password file ${file} is empty`);
  });

  it('falls back to the environment', async () => {
    await expect(resolvePassword({ env: 'test-secret' })).resolves.toBe('test-secret');
  });

  it('fails when no source has a password', async () => {
    await expect(resolvePassword({ env: '' })).rejects.toThrow(
      'A password is required (argument, --password-file or environment)',
    );
  });
});

describe('parseSeconds', () => {
  it('converts seconds to milliseconds', () => {
    expect(parseSeconds('15', '--timeout')).toBe(15_000);
    expect(parseSeconds('0.5', '--timeout')).toBe(500);
  });

  it('rejects non-positive or non-numeric values', () => {
    expect(() => parseSeconds('0', '--timeout')).toThrow(
      '--timeout expects a positive number of seconds, got "0"',
    );
    expect(() => parseSeconds('soon', '--download-timeout')).toThrow(InvocationError);
  });
});

describe('buildRunSettings', () => {
  const base = { targetUrl: '10.0.0.5', username: 'admin', password: 'test-secret', cwd: '/work' };
  const cli: BackupCliOptions = { loginCapture: true };

  it('fills in defaults', () => {
    const settings = buildRunSettings({ ...base, cli, file: {} });

    expect(settings).toMatchObject({
      targetUrl: 'https://10.0.0.5',
      browser: 'edge',
      headless: false,
      downloadDir: PATHS.DOWNLOAD_DIR,
      debugDir: path.resolve('/work', PATHS.DEBUG_DIR),
      archiveDirs: PATHS.ARCHIVE_DIRS,
      elementTimeoutMs: TIMEOUTS.ELEMENT_TIMEOUT,
      downloadTimeoutMs: TIMEOUTS.DOWNLOAD_TIMEOUT,
      captureAfterLogin: true,
    });
    expect(settings.settle.loginMs).toBe(SETTLE.LOGIN);
    expect(settings.actions).toBeUndefined();
  });

  it('lets the config file override defaults', () => {
    const settings = buildRunSettings({
      ...base,
      cli,
      file: {
        browser: 'chrome',
        downloadDir: 'dl',
        elementTimeout: 5,
        pollInterval: 0.5,
        loginSettle: 2,
        archiveDirs: { keystore: '/srv/keys' },
        actions: ['keystore'],
      },
    });

    expect(settings.browser).toBe('chrome');
    expect(settings.downloadDir).toBe(path.resolve('/work', 'dl'));
    expect(settings.elementTimeoutMs).toBe(5_000);
    expect(settings.pollIntervalMs).toBe(500);
    expect(settings.settle.loginMs).toBe(2_000);
    expect(settings.archiveDirs).toEqual({
      configuration: PATHS.ARCHIVE_DIRS.configuration,
      keystore: '/srv/keys',
    });
    expect(settings.actions).toEqual(['keystore']);
  });

  it('lets CLI flags override the config file', () => {
    const settings = buildRunSettings({
      ...base,
      cli: {
        loginCapture: false,
        browser: 'edge',
        headless: true,
        timeout: '3',
        downloadTimeout: '30',
        configArchiveDir: '/srv/cfg',
        action: ['configuration'],
      },
      file: { browser: 'chrome', elementTimeout: 5, actions: ['keystore'] },
    });

    expect(settings).toMatchObject({
      browser: 'edge',
      headless: true,
      elementTimeoutMs: 3_000,
      downloadTimeoutMs: 30_000,
      captureAfterLogin: false,
      actions: ['configuration'],
    });
    expect(settings.archiveDirs['configuration']).toBe('/srv/cfg');
  });

  it('rejects an unusable target URL', () => {
    expect(() => buildRunSettings({ ...base, targetUrl: 'https://', cli, file: {} })).toThrow(
      /^Invalid arguments:\ntargetUrl: /,
    );
  });
});

describe('defaultArchiveDirs', () => {
  it('keeps the E: drive folders on Windows', () => {
    expect(defaultArchiveDirs('win32', 'C:\\Users\\ops')).toEqual({
      configuration: 'E:\\Unity\\Configuration backups',
      keystore: 'E:\\Unity\\Encryption Key Backups',
    });
  });

  it('uses absolute folders under the home directory elsewhere', () => {
    expect(defaultArchiveDirs('linux', '/home/ops')).toEqual({
      configuration: '/home/ops/unity_backups/Configuration backups',
      keystore: '/home/ops/unity_backups/Encryption Key Backups',
    });
  });

  it('is absolute on the current platform', () => {
    for (const dir of Object.values(PATHS.ARCHIVE_DIRS)) {
      expect(path.isAbsolute(dir)).toBe(true);
    }
  });
});

describe('archive directory resolution', () => {
  it('resolves relative archive directories against the working directory', () => {
    const settings = buildRunSettings({
      targetUrl: '10.0.0.5',
      username: 'admin',
      password: 'test-secret',
      cwd: '/work',
      cli: { loginCapture: true, keystoreArchiveDir: 'keys' },
      file: {},
    });

    expect(settings.archiveDirs['keystore']).toBe(path.resolve('/work', 'keys'));
  });
});
