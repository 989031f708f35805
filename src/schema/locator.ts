import { z } from 'zod';

// ── Locator ───────────────────────────────────────────────────

export const locatorStrategySchema = z.enum(['id', 'css', 'xpath', 'text']);

export type LocatorStrategy = z.infer<typeof locatorStrategySchema>;

export const locatorSchema = z.object({
  strategy: locatorStrategySchema,
  query: z.string().min(1),
});

export type Locator = z.infer<typeof locatorSchema>;

// ── Locator chain ─────────────────────────────────────────────
// Ordered fallback list. Structural (absolute XPath) entries belong
// at the end: they break on the first layout change.

export const locatorChainSchema = z.array(locatorSchema).min(1);

export type LocatorChain = z.infer<typeof locatorChainSchema>;

// ── Target ────────────────────────────────────────────────────

export const targetSchema = z.object({
  name: z.string().min(1),
  chain: locatorChainSchema,
  textFallback: z.string().min(1).optional(),
});

export type Target = z.infer<typeof targetSchema>;

// ── Helpers ───────────────────────────────────────────────────

/** True when the locator is an absolute structural path (`/html/body/...`). */
export function isStructuralLocator(locator: Locator): boolean {
  return locator.strategy === 'xpath' && locator.query.startsWith('/html');
}
