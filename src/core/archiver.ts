import { copyFile, mkdir, rename, rm, stat, unlink } from 'node:fs/promises';
import path from 'node:path';

import { errorMessage } from '../utils/errors.js';
import { archiveStamp } from '../utils/time.js';

const UNKNOWN_HOST = 'unknown_ip';
const LEADING_IPV4 = /^https?:\/\/(\d{1,3}(?:\.\d{1,3}){3})(?=[:/?#]|$)/i;

// ── Public types ─────────────────────────────────────────────

export interface ArtifactKind {
  /** File name prefix, e.g. `unity_backup`. */
  prefix: string;
  /** Absolute destination directory. */
  archiveDir: string;
}

export class ArchiveError extends Error {
  readonly sourcePath: string;
  readonly targetPath: string;

  constructor(sourcePath: string, targetPath: string, reason: string, options?: { cause?: unknown }) {
    super(`Failed to move ${sourcePath} to ${targetPath}: ${reason}`, options);
    this.name = 'ArchiveError';
    this.sourcePath = sourcePath;
    this.targetPath = targetPath;
  }
}

// ── Naming ───────────────────────────────────────────────────

/**
 * Host part of the archive name: the IPv4 address the URL starts with,
 * otherwise the parsed host name, otherwise `unknown_ip`.
 */
export function extractHostIdentifier(url: string): string {
  // Read straight off the text: a bad port or path must not lose the address.
  const address = LEADING_IPV4.exec(url.trim())?.[1];
  if (address !== undefined) return address;

  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    return UNKNOWN_HOST;
  }
  return hostname.length > 0 ? hostname : UNKNOWN_HOST;
}

/** `{prefix}_{YYYY-MM-DD_HHMMSS}-IP-{host with dots as underscores}{ext}` */
export function archiveFileName(
  prefix: string,
  hostIdentifier: string,
  extension: string,
  date: Date,
): string {
  const host = hostIdentifier.replace(/[^A-Za-z0-9_-]/g, '_');
  return `${prefix}_${archiveStamp(date)}-IP-${host}${extension}`;
}

// ── Archive ──────────────────────────────────────────────────

/**
 * Move `sourcePath` into `kind.archiveDir` under its archive name.
 * Resolves with the new path; rejects with `ArchiveError`.
 */
export async function archive(
  sourcePath: string,
  hostIdentifier: string,
  kind: ArtifactKind,
  now: Date = new Date(),
): Promise<string> {
  const fileName = archiveFileName(kind.prefix, hostIdentifier, path.extname(sourcePath), now);
  const targetPath = path.join(kind.archiveDir, fileName);

  try {
    await mkdir(kind.archiveDir, { recursive: true });
    await moveFile(sourcePath, targetPath);
  } catch (err) {
    if (err instanceof ArchiveError) throw err;
    throw new ArchiveError(sourcePath, targetPath, errorMessage(err), { cause: err });
  }

  return targetPath;
}

/** rename(2), falling back to copy + verify + unlink across volumes. */
export async function moveFile(sourcePath: string, targetPath: string): Promise<void> {
  try {
    await rename(sourcePath, targetPath);
    return;
  } catch (err) {
    if (!isCrossDevice(err)) throw err;
  }

  await copyFile(sourcePath, targetPath);
  const [source, copy] = await Promise.all([stat(sourcePath), stat(targetPath)]);
  if (source.size !== copy.size) {
    await rm(targetPath, { force: true });
    throw new ArchiveError(
      sourcePath,
      targetPath,
      `copy is ${String(copy.size)} bytes, source is ${String(source.size)}`,
    );
  }
  await unlink(sourcePath);
}

function isCrossDevice(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EXDEV';
}
