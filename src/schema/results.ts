import { z } from 'zod';

import { browserKindSchema } from './config.js';

// ── Failure classification ──────────────────────────────────

export const failureKindSchema = z.enum([
  'resolution',
  'timeout',
  'io',
  'navigation',
  'unexpected',
]);

export type FailureKind = z.infer<typeof failureKindSchema>;

// ── ActionOutcome ───────────────────────────────────────────

export const actionOutcomeSchema = z.object({
  action: z.string().min(1),
  success: z.boolean(),
  failure: failureKindSchema.optional(),
  archivedPath: z.string().min(1).optional(),
  message: z.string(),
  durationMs: z.number().int().nonnegative(),
});

export type ActionOutcome = z.infer<typeof actionOutcomeSchema>;

// ── Session state ───────────────────────────────────────────

export const sessionStateSchema = z.enum([
  'Disconnected',
  'Connected',
  'Authenticated',
  'ActionInProgress',
  'Done',
  'Failed',
]);

export type SessionState = z.infer<typeof sessionStateSchema>;

// ── RunSummary ──────────────────────────────────────────────

export const runSummarySchema = z.object({
  targetUrl: z.string().url(),
  host: z.string().min(1),
  browser: browserKindSchema,
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  authenticated: z.boolean(),
  finalState: sessionStateSchema,
  error: z.string().optional(),
  outcomes: z.array(actionOutcomeSchema),
});

export type RunSummary = z.infer<typeof runSummarySchema>;

// ── Deterministic verdict ───────────────────────────────────

/** A run succeeds only when it ended in `Done` and every action succeeded. */
export function isRunSuccessful(summary: RunSummary): boolean {
  return (
    summary.finalState === 'Done' &&
    summary.outcomes.length > 0 &&
    summary.outcomes.every((o) => o.success)
  );
}
