import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { consoleProfileSchema, fileConfigSchema } from '../schema/index.js';
import type { ConsoleProfile, FileConfig } from '../schema/index.js';
import { InvocationError, errorMessage, formatZodError } from '../utils/errors.js';

export const DEFAULT_PROFILE_PATH = fileURLToPath(
  new URL('../../profiles/unisphere.yaml', import.meta.url),
);

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.unisphere-backup.yaml` (or JSON) config file.
 *
 * A missing file is only an error when the caller asked for it
 * explicitly (`required`); the default path may simply not exist.
 */
export async function loadConfigFile(
  configPath: string,
  required: boolean,
): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (!required && isNotFound(err)) return {};
    throw new InvocationError(
      `Cannot read config file ${configPath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return validate(configPath, raw, (data) => fileConfigSchema.parse(data ?? {}));
}

/** Load the console profile (navigation map). Defaults to the bundled Unisphere profile. */
export async function loadProfile(
  profilePath: string = DEFAULT_PROFILE_PATH,
): Promise<ConsoleProfile> {
  let raw: string;
  try {
    raw = await readFile(profilePath, 'utf-8');
  } catch (err) {
    throw new InvocationError(
      `Cannot read profile ${profilePath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return validate(profilePath, raw, (data) => consoleProfileSchema.parse(data));
}

// ── Internals ───────────────────────────────────────────────

function validate<T>(
  filePath: string,
  raw: string,
  parse: (data: unknown) => T,
): T {
  try {
    const data: unknown = filePath.endsWith('.json')
      ? JSON.parse(raw)
      : parseYaml(raw);
    return parse(data);
  } catch (err) {
    const detail = err instanceof ZodError ? formatZodError(err) : errorMessage(err);
    throw new InvocationError(`Invalid ${filePath}:\n${detail}`, { cause: err });
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
