import { access, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

// ---------------------------------------------------------------------------
// rename(2) always fails with EXDEV here, as it does across volumes
// ---------------------------------------------------------------------------
vi.mock('node:fs/promises', async () => {
  const actual = await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises');
  return {
    ...actual,
    rename: vi.fn(async () => {
      throw Object.assign(new Error('EXDEV: cross-device link not permitted'), { code: 'EXDEV' });
    }),
  };
});

import { moveFile } from '../core/archiver.js';
import { makeTempDir, removeDir } from './helpers/tmp.js';

describe('moveFile across volumes', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('copies the bytes and removes the source', async () => {
    const source = path.join(dir, 'backup.cfg');
    const target = path.join(dir, 'archived.cfg');
    await writeFile(source, 'exact bytes\n');

    await moveFile(source, target);

    expect(await readFile(target, 'utf-8')).toBe('exact bytes\n');
    await expect(access(source)).rejects.toThrow();
  });
});
