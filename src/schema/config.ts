import { z } from 'zod';

// ── Browser choice ──────────────────────────────────────────

export const browserKindSchema = z.enum(['chrome', 'edge']);

export type BrowserKind = z.infer<typeof browserKindSchema>;

// ── Archive block ───────────────────────────────────────────
// Keys are action names from the console profile.

export const archiveDirsSchema = z.record(z.string().min(1), z.string().min(1));

export type ArchiveDirs = z.infer<typeof archiveDirsSchema>;

// ── Full config file ────────────────────────────────────────
// Every field optional: CLI flags override, defaults fill the rest.

export const fileConfigSchema = z
  .object({
    browser: browserKindSchema.optional(),
    headless: z.boolean().optional(),
    profile: z.string().min(1).optional(),
    downloadDir: z.string().min(1).optional(),
    debugDir: z.string().min(1).optional(),
    archiveDirs: archiveDirsSchema.optional(),
    elementTimeout: z.number().positive().optional(),
    downloadTimeout: z.number().positive().optional(),
    pollInterval: z.number().positive().optional(),
    loginSettle: z.number().nonnegative().optional(),
    actions: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Resolved run settings ───────────────────────────────────
// What the session controller actually runs with. All durations in ms.

export const settleDelaysSchema = z.object({
  navigationMs: z.number().int().nonnegative(),
  consentMs: z.number().int().nonnegative(),
  loginMs: z.number().int().nonnegative(),
  clickMs: z.number().int().nonnegative(),
  scrollMs: z.number().int().nonnegative(),
  escapeMs: z.number().int().nonnegative(),
});

export type SettleDelays = z.infer<typeof settleDelaysSchema>;

export const runSettingsSchema = z.object({
  targetUrl: z.string().url(),
  username: z.string().min(1),
  password: z.string().min(1),
  browser: browserKindSchema,
  headless: z.boolean(),
  downloadDir: z.string().min(1),
  debugDir: z.string().min(1),
  archiveDirs: archiveDirsSchema,
  elementTimeoutMs: z.number().int().positive(),
  navigationTimeoutMs: z.number().int().positive(),
  downloadTimeoutMs: z.number().int().positive(),
  pollIntervalMs: z.number().int().positive(),
  settle: settleDelaysSchema,
  captureAfterLogin: z.boolean(),
  actions: z.array(z.string().min(1)).optional(),
});

export type RunSettings = z.infer<typeof runSettingsSchema>;
