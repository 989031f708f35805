import { writeFileSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { matchDownload, watchDownloads } from '../core/downloads.js';
import { makeTempDir, removeDir } from './helpers/tmp.js';

describe('matchDownload', () => {
  const isBackup = matchDownload({ suffixes: ['.cfg', '.html'], substrings: ['backup'] });

  it('matches by suffix, case-insensitively', () => {
    expect(isBackup('unity.CFG')).toBe(true);
    expect(isBackup('export.html')).toBe(true);
  });

  it('matches by substring', () => {
    expect(isBackup('Config_Backup_2024.zip')).toBe(true);
  });

  it('rejects other names', () => {
    expect(isBackup('notes.txt')).toBe(false);
  });

  it('never matches files still being written', () => {
    expect(isBackup('backup.cfg.crdownload')).toBe(false);
    expect(isBackup('backup.cfg.part')).toBe(false);
  });
});

describe('watchDownloads', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('returns the new file that matches the predicate', async () => {
    await writeFile(path.join(dir, 'a.txt'), 'old');
    const watch = await watchDownloads(dir);
    await writeFile(path.join(dir, 'b.cfg'), 'new');

    const result = await watch.waitFor(matchDownload({ suffixes: ['.cfg'], substrings: [] }), {
      timeoutMs: 1_000,
      pollIntervalMs: 20,
    });

    expect(result).toEqual({ status: 'downloaded', fileName: 'b.cfg', path: path.join(dir, 'b.cfg') });
    expect([...watch.baseline]).toEqual(['a.txt']);
  });

  it('picks up a file that lands after a few polls', async () => {
    const watch = await watchDownloads(dir);
    setTimeout(() => {
      writeFileSync(path.join(dir, 'keystore.lbb'), 'key');
    }, 50);

    const result = await watch.waitFor(matchDownload({ suffixes: ['.lbb'], substrings: [] }), {
      timeoutMs: 2_000,
      pollIntervalMs: 20,
    });

    expect(result).toMatchObject({ status: 'downloaded', fileName: 'keystore.lbb' });
  });

  it('ignores matching files that were already there', async () => {
    await writeFile(path.join(dir, 'old.cfg'), 'old');
    const watch = await watchDownloads(dir);

    const result = await watch.waitFor(matchDownload({ suffixes: ['.cfg'], substrings: [] }), {
      timeoutMs: 60,
      pollIntervalMs: 20,
    });

    expect(result.status).toBe('timed_out');
  });

  it('times out without blocking past timeout + poll interval', async () => {
    const watch = await watchDownloads(dir);
    await writeFile(path.join(dir, 'unrelated.txt'), 'x');

    const started = Date.now();
    const result = await watch.waitFor(matchDownload({ suffixes: ['.cfg'], substrings: [] }), {
      timeoutMs: 200,
      pollIntervalMs: 100,
    });
    const elapsed = Date.now() - started;

    expect(result.status).toBe('timed_out');
    expect(elapsed).toBeGreaterThanOrEqual(190);
    expect(elapsed).toBeLessThan(300);
  });

  it('creates a missing download directory before the snapshot', async () => {
    const nested = path.join(dir, 'Downloads');

    const watch = await watchDownloads(nested);

    expect(watch.baseline.size).toBe(0);
  });
});
