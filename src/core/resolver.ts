import type { ConsoleElement, ConsolePage } from '../browser/driver.js';
import { describeChain, describeLocator } from '../browser/locators.js';
import type { Locator, LocatorChain, SettleDelays, Target } from '../schema/index.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { captureDiagnostics } from './diagnostics.js';

// ── Public types ─────────────────────────────────────────────

export type AttemptOutcome = 'found' | 'not_found' | 'error' | 'skipped';

export interface ResolveAttempt {
  locator: Locator;
  outcome: AttemptOutcome;
  elapsedMs: number;
  error?: string;
}

export type ResolveResult =
  | {
      found: true;
      element: ConsoleElement;
      locator: Locator;
      index: number;
      attempts: ResolveAttempt[];
    }
  | { found: false; attempts: ResolveAttempt[] };

export interface ResolveOptions {
  /** Per-locator wait. */
  timeoutMs: number;
  /** Cap on the whole chain; defaults to `timeoutMs × chain.length`. */
  totalTimeoutMs?: number;
  logger: Logger;
  clock?: () => number;
}

// ── Chain resolution ─────────────────────────────────────────

/**
 * Try each locator in order until one yields a visible element.
 *
 * The first hit short-circuits: later locators are never queried.
 * The chain as a whole never waits longer than
 * `min(timeoutMs × chain.length, totalTimeoutMs)`; locators reached
 * after the budget is spent are recorded as `skipped`.
 */
export async function resolveChain(
  page: ConsolePage,
  chain: LocatorChain,
  options: ResolveOptions,
): Promise<ResolveResult> {
  const clock = options.clock ?? Date.now;
  const { logger, timeoutMs } = options;
  const cap = Math.min(timeoutMs * chain.length, options.totalTimeoutMs ?? Infinity);
  const deadline = clock() + cap;
  const attempts: ResolveAttempt[] = [];

  for (const [index, locator] of chain.entries()) {
    const remaining = deadline - clock();
    if (remaining <= 0) {
      attempts.push({ locator, outcome: 'skipped', elapsedMs: 0 });
      continue;
    }

    const started = clock();
    logger.debug(`Trying ${describeLocator(locator)}`);
    try {
      const element = await page.waitForElement(locator, Math.min(timeoutMs, remaining));
      const elapsedMs = clock() - started;
      if (element !== null) {
        attempts.push({ locator, outcome: 'found', elapsedMs });
        return { found: true, element, locator, index, attempts };
      }
      attempts.push({ locator, outcome: 'not_found', elapsedMs });
      logger.debug(`Not found: ${describeLocator(locator)}`);
    } catch (err) {
      attempts.push({
        locator,
        outcome: 'error',
        elapsedMs: clock() - started,
        error: errorMessage(err),
      });
      logger.debug(`Lookup failed for ${describeLocator(locator)}: ${errorMessage(err)}`);
    }
  }

  return { found: false, attempts };
}

// ── Brute-force text scan ────────────────────────────────────

/**
 * Last resort after a chain is exhausted: the first element whose visible
 * text contains `text` and which is displayed and enabled right now.
 */
export async function scanByText(
  page: ConsolePage,
  text: string,
  logger: Logger,
): Promise<ConsoleElement | null> {
  let candidates: ConsoleElement[];
  try {
    candidates = await page.findByText(text);
  } catch (err) {
    logger.warn(`Text scan for "${text}" failed: ${errorMessage(err)}`);
    return null;
  }

  for (const candidate of candidates) {
    try {
      if (
        (await candidate.isVisible()) &&
        (await candidate.isEnabled()) &&
        (await candidate.text()).includes(text)
      ) {
        logger.info(`Text scan matched ${await candidate.describe()}`);
        return candidate;
      }
    } catch (err) {
      logger.debug(`Skipping text-scan candidate: ${errorMessage(err)}`);
    }
  }

  return null;
}

// ── Targets ──────────────────────────────────────────────────

export interface TargetContext {
  page: ConsolePage;
  timeoutMs: number;
  settle: Pick<SettleDelays, 'clickMs' | 'scrollMs'>;
  debugDir: string;
  logger: Logger;
}

export type TargetResult =
  | { ok: true; via: Locator | 'text-scan' }
  | { ok: false; attempts: ResolveAttempt[] };

/**
 * Locate a target without acting on it: chain first, then the text
 * scan when the target defines one. Captures diagnostics on failure.
 */
export async function locateTarget(
  target: Target,
  ctx: TargetContext,
): Promise<{ element: ConsoleElement; via: Locator | 'text-scan' } | null> {
  const { page, logger } = ctx;
  const result = await resolveChain(page, target.chain, { timeoutMs: ctx.timeoutMs, logger });
  if (result.found) {
    logger.success(`${target.name} found with ${describeLocator(result.locator)}`);
    return { element: result.element, via: result.locator };
  }

  if (target.textFallback !== undefined) {
    logger.info(`Searching visible elements for "${target.textFallback}"`);
    const element = await scanByText(page, target.textFallback, logger);
    if (element !== null) return { element, via: 'text-scan' };
  }

  logger.error(`${target.name} not found, tried ${describeChain(target.chain)}`);
  await captureDiagnostics(page, `${captureLabel(target.name)}_not_found`, {
    debugDir: ctx.debugDir,
    logger,
  });
  return null;
}

/**
 * Resolve a target and click it.
 *
 * A resolved element that refuses the click does not end the search:
 * resolution resumes with the next locator in the chain, and then the
 * text scan. Diagnostics are captured when nothing could be clicked.
 */
export async function activateTarget(
  target: Target,
  ctx: TargetContext,
): Promise<TargetResult> {
  const { page, logger } = ctx;
  const attempts: ResolveAttempt[] = [];
  let remaining: LocatorChain = target.chain;

  while (remaining.length > 0) {
    const result = await resolveChain(page, remaining, { timeoutMs: ctx.timeoutMs, logger });
    attempts.push(...result.attempts);
    if (!result.found) break;

    logger.info(`${target.name} found with ${describeLocator(result.locator)}`);
    if (await clickElement(result.element, ctx)) {
      logger.success(`Clicked ${target.name}`);
      return { ok: true, via: result.locator };
    }
    remaining = remaining.slice(result.index + 1);
  }

  if (target.textFallback !== undefined) {
    logger.info(`Searching visible elements for "${target.textFallback}"`);
    const element = await scanByText(page, target.textFallback, logger);
    if (element !== null && (await clickElement(element, ctx))) {
      logger.success(`Clicked ${target.name} using text search fallback`);
      return { ok: true, via: 'text-scan' };
    }
  }

  logger.error(`Failed to find/click ${target.name} by any method`);
  await captureDiagnostics(page, `${captureLabel(target.name)}_not_found`, {
    debugDir: ctx.debugDir,
    logger,
  });
  return { ok: false, attempts };
}

async function clickElement(element: ConsoleElement, ctx: TargetContext): Promise<boolean> {
  try {
    await element.scrollIntoView(ctx.timeoutMs);
    await ctx.page.sleep(ctx.settle.scrollMs);
    await element.click(ctx.timeoutMs);
    await ctx.page.sleep(ctx.settle.clickMs);
    return true;
  } catch (err) {
    ctx.logger.warn(`Click failed: ${errorMessage(err)}`);
    return false;
  }
}

/** `Backup Keystore File` → `backup_keystore_file`. */
export function captureLabel(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}
