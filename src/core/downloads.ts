import { mkdir, readdir } from 'node:fs/promises';
import path from 'node:path';

import type { DownloadMatch } from '../schema/index.js';
import { sleep } from '../utils/time.js';

// Names browsers give files that are still being written.
const IN_PROGRESS_SUFFIXES = ['.crdownload', '.part', '.partial', '.tmp', '.download'];

// ── Public types ─────────────────────────────────────────────

export type DownloadPredicate = (fileName: string) => boolean;

export type DownloadResult =
  | { status: 'downloaded'; fileName: string; path: string }
  | { status: 'timed_out'; waitedMs: number };

export interface WaitOptions {
  timeoutMs: number;
  pollIntervalMs: number;
}

export interface DownloadWatch {
  readonly dir: string;
  readonly baseline: ReadonlySet<string>;
  /**
   * Poll until a file absent from the baseline satisfies `predicate`.
   * Never blocks past `timeoutMs + pollIntervalMs`.
   */
  waitFor(predicate: DownloadPredicate, options: WaitOptions): Promise<DownloadResult>;
}

// ── Predicate ────────────────────────────────────────────────

/** Case-insensitive suffix or substring match; in-progress names never match. */
export function matchDownload(match: DownloadMatch): DownloadPredicate {
  const suffixes = match.suffixes.map((s) => s.toLowerCase());
  const substrings = match.substrings.map((s) => s.toLowerCase());

  return (fileName) => {
    const name = fileName.toLowerCase();
    if (IN_PROGRESS_SUFFIXES.some((s) => name.endsWith(s))) return false;
    return suffixes.some((s) => name.endsWith(s)) || substrings.some((s) => name.includes(s));
  };
}

// ── Watcher ──────────────────────────────────────────────────

/**
 * Snapshot `dir` now. Call before the click that triggers the download,
 * so a fast download cannot land in the baseline.
 *
 * Assumes downloads appear atomically under their final name; a file
 * that grows in place under that name could be picked up early.
 */
export async function watchDownloads(dir: string): Promise<DownloadWatch> {
  await mkdir(dir, { recursive: true });
  const baseline: ReadonlySet<string> = new Set(await readdir(dir));

  async function findNew(predicate: DownloadPredicate): Promise<string | undefined> {
    const current = await readdir(dir);
    return current
      .filter((name) => !baseline.has(name))
      .sort()
      .find(predicate);
  }

  return {
    dir,
    baseline,

    async waitFor(predicate, options) {
      const started = Date.now();
      const deadline = started + options.timeoutMs;

      for (;;) {
        const fileName = await findNew(predicate);
        if (fileName !== undefined) {
          return { status: 'downloaded', fileName, path: path.join(dir, fileName) };
        }

        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          return { status: 'timed_out', waitedMs: Date.now() - started };
        }
        await sleep(Math.min(options.pollIntervalMs, remaining));
      }
    },
  };
}
