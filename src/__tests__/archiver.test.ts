import { access, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  ArchiveError,
  archive,
  archiveFileName,
  extractHostIdentifier,
} from '../core/archiver.js';
import { makeTempDir, removeDir } from './helpers/tmp.js';

const RUN_AT = new Date(2024, 2, 7, 14, 5, 9);

describe('extractHostIdentifier', () => {
  it('takes the IPv4 address from the URL', () => {
    expect(extractHostIdentifier('https://10.0.0.5/cas/login')).toBe('10.0.0.5');
  });

  it('falls back to the host name', () => {
    expect(extractHostIdentifier('https://unity01.lab.local:8443/')).toBe('unity01.lab.local');
  });

  it('reads a leading IPv4 address even when the rest of the URL does not parse', () => {
    expect(extractHostIdentifier('https://10.0.0.5:bad-port/cas/login')).toBe('10.0.0.5');
  });

  it('does not take an address-like prefix of a host name', () => {
    expect(extractHostIdentifier('https://10.0.0.5.nip.io/')).toBe('10.0.0.5.nip.io');
  });

  it('returns unknown_ip for unparseable input', () => {
    expect(extractHostIdentifier('not a url')).toBe('unknown_ip');
  });
});

describe('archiveFileName', () => {
  it('combines prefix, timestamp, host and extension', () => {
    expect(archiveFileName('unity_backup', '10.0.0.5', '.cfg', RUN_AT)).toBe(
      'unity_backup_2024-03-07_140509-IP-10_0_0_5.cfg',
    );
  });

  it('keeps the keystore prefix as given', () => {
    expect(archiveFileName('Unity-Encryption-Backup', '192.168.1.20', '.lbb', RUN_AT)).toBe(
      'Unity-Encryption-Backup_2024-03-07_140509-IP-192_168_1_20.lbb',
    );
  });
});

describe('archive', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('moves the download into the archive directory under its new name', async () => {
    const source = path.join(dir, 'report.cfg');
    await writeFile(source, 'config-bytes');
    const archiveDir = path.join(dir, 'Configuration backups');

    const target = await archive(source, '10.0.0.5', { prefix: 'unity_backup', archiveDir });

    expect(path.dirname(target)).toBe(archiveDir);
    expect(path.basename(target)).toMatch(/^unity_backup_\d{4}-\d{2}-\d{2}_\d{6}-IP-10_0_0_5\.cfg$/);
    expect(await readFile(target, 'utf-8')).toBe('config-bytes');
    await expect(access(source)).rejects.toThrow();
  });

  it('uses the given timestamp', async () => {
    const source = path.join(dir, 'keys.lbb');
    await writeFile(source, 'k');

    const target = await archive(
      source,
      '10.0.0.5',
      { prefix: 'Unity-Encryption-Backup', archiveDir: path.join(dir, 'keys') },
      RUN_AT,
    );

    expect(target).toBe(
      path.join(dir, 'keys', 'Unity-Encryption-Backup_2024-03-07_140509-IP-10_0_0_5.lbb'),
    );
  });

  it('reports a missing source as ArchiveError', async () => {
    const source = path.join(dir, 'gone.cfg');

    const attempt = archive(source, '10.0.0.5', {
      prefix: 'unity_backup',
      archiveDir: path.join(dir, 'out'),
    }, RUN_AT);

    await expect(attempt).rejects.toBeInstanceOf(ArchiveError);
    await expect(attempt).rejects.toMatchObject({
      sourcePath: source,
      targetPath: path.join(dir, 'out', 'unity_backup_2024-03-07_140509-IP-10_0_0_5.cfg'),
    });
  });
});
