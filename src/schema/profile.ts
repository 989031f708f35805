import { z } from 'zod';

import { targetSchema } from './locator.js';

// ── Download predicate ──────────────────────────────────────

export const downloadMatchSchema = z
  .object({
    suffixes: z.array(z.string().min(1)).default([]),
    substrings: z.array(z.string().min(1)).default([]),
  })
  .refine((m) => m.suffixes.length + m.substrings.length > 0, {
    message: 'download match needs at least one suffix or substring',
  });

export type DownloadMatch = z.infer<typeof downloadMatchSchema>;

// ── Action ──────────────────────────────────────────────────

export const actionStepSchema = z.object({
  target: targetSchema,
  pressEscapeFirst: z.boolean().optional().default(false),
});

export type ActionStep = z.infer<typeof actionStepSchema>;

export const actionSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9-]*$/, 'lowercase kebab-case name'),
  label: z.string().min(1),
  archivePrefix: z.string().min(1),
  deepLink: z.string().min(1).optional(),
  steps: z.array(actionStepSchema).min(1),
  download: downloadMatchSchema,
});

export type ConsoleAction = z.infer<typeof actionSchema>;

// ── Login ───────────────────────────────────────────────────

export const consentSchema = z.object({
  phrase: z.string().min(1),
  accept: targetSchema,
});

export type ConsentPage = z.infer<typeof consentSchema>;

export const loginSchema = z.object({
  username: targetSchema,
  password: targetSchema,
  submit: targetSchema,
});

export type LoginTargets = z.infer<typeof loginSchema>;

// ── Full profile ────────────────────────────────────────────

export const consoleProfileSchema = z
  .object({
    name: z.string().min(1),
    loginPathMarker: z.string().min(1).optional(),
    consent: consentSchema.optional(),
    login: loginSchema,
    betweenActions: z.string().min(1).optional(),
    actions: z.array(actionSchema).min(1),
  })
  .refine(
    (p) => new Set(p.actions.map((a) => a.name)).size === p.actions.length,
    { message: 'action names must be unique', path: ['actions'] },
  );

export type ConsoleProfile = z.infer<typeof consoleProfileSchema>;

export function parseConsoleProfile(data: unknown): ConsoleProfile {
  return consoleProfileSchema.parse(data);
}
