import { z } from 'zod';

import { failureKindSchema, sessionStateSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Action output ───────────────────────────────────────────

export const jsonOutputActionSchema = z.object({
  name: z.string().min(1),
  result: z.enum(['PASS', 'FAIL']),
  failure: failureKindSchema.nullable(),
  archivedPath: z.string().nullable(),
  message: z.string(),
  durationMs: z.number().int().nonnegative(),
});

export type JsonOutputAction = z.infer<typeof jsonOutputActionSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  result: z.enum(['PASS', 'FAIL']),
  url: z.string(),
  host: z.string(),
  browser: z.string(),
  authenticated: z.boolean(),
  finalState: sessionStateSchema,
  error: z.string().nullable(),
  startedAt: z.string(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  actions: z.array(jsonOutputActionSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
