import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { captureDiagnostics } from '../core/diagnostics.js';
import { FakeConsolePage } from './helpers/fakeConsole.js';
import { captureLogger, makeTempDir, removeDir } from './helpers/tmp.js';

const AT = new Date(2024, 0, 15, 9, 30, 5);

describe('captureDiagnostics', () => {
  let dir: string;
  let page: FakeConsolePage;

  beforeEach(async () => {
    dir = await makeTempDir();
    page = new FakeConsolePage();
    page.html = '<html><body>login</body></html>';
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('writes markup and screenshot under a timestamped label', async () => {
    const debugDir = path.join(dir, 'unity_backups', 'debug');
    const { logger } = captureLogger();

    const captured = await captureDiagnostics(page, 'login_page', { debugDir, logger, now: () => AT });

    expect(captured).toEqual({
      htmlPath: path.join(debugDir, 'login_page_20240115_093005.html'),
      screenshotPath: path.join(debugDir, 'login_page_20240115_093005.png'),
    });
    expect(await readFile(path.join(debugDir, 'login_page_20240115_093005.html'), 'utf-8')).toBe(
      '<html><body>login</body></html>',
    );
  });

  it('keeps going when the markup cannot be read', async () => {
    page.contentError = new Error('target closed');
    const { logger, lines } = captureLogger();

    const captured = await captureDiagnostics(page, 'execute_button_fail', { debugDir: dir, logger, now: () => AT });

    expect(captured).toEqual({ screenshotPath: path.join(dir, 'execute_button_fail_20240115_093005.png') });
    expect(lines).toContain('❌ [DEBUG] Could not save HTML: target closed');
    expect(await readdir(dir)).toEqual(['execute_button_fail_20240115_093005.png']);
  });

  it('never rejects, even when both halves fail', async () => {
    page.contentError = new Error('gone');
    page.screenshotError = new Error('gone');
    const { logger } = captureLogger();

    await expect(
      captureDiagnostics(page, 'management_not_found', { debugDir: dir, logger }),
    ).resolves.toEqual({});
  });
});
