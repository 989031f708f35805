import type { ConsolePage } from '../browser/driver.js';
import type { ConsoleProfile, SettleDelays } from '../schema/index.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { captureDiagnostics } from './diagnostics.js';
import { activateTarget, locateTarget } from './resolver.js';
import type { TargetContext } from './resolver.js';

// ── Public types ─────────────────────────────────────────────

export interface Credentials {
  username: string;
  password: string;
}

export interface LoginContext {
  page: ConsolePage;
  loginUrl: string;
  timeoutMs: number;
  navigationTimeoutMs: number;
  settle: SettleDelays;
  debugDir: string;
  captureAfterLogin: boolean;
  logger: Logger;
}

export type LoginResult = { ok: true } | { ok: false; reason: string };

// ── Navigation ───────────────────────────────────────────────

/**
 * `page.goto`, falling back to assigning `window.location` when the
 * navigation itself errors (certificate interstitials, aborted loads).
 */
export async function navigate(
  page: ConsolePage,
  url: string,
  timeoutMs: number,
  logger: Logger,
): Promise<void> {
  try {
    await page.goto(url, timeoutMs);
  } catch (err) {
    logger.warn(`Navigation to ${url} failed (${errorMessage(err)}); assigning window.location`);
    await page.assignLocation(url);
  }
}

// ── Login flow ──────────────────────────────────────────────

/**
 * Sign in to the console.
 *
 * There is no reliable success marker after submit, so a completed
 * submit counts as authenticated; the first action's own lookups are
 * the real check.
 */
export async function authenticate(
  profile: ConsoleProfile,
  credentials: Credentials,
  ctx: LoginContext,
): Promise<LoginResult> {
  const { page, logger } = ctx;
  const targets: TargetContext = {
    page,
    timeoutMs: ctx.timeoutMs,
    settle: ctx.settle,
    debugDir: ctx.debugDir,
    logger,
  };

  logger.login(`Navigating to ${ctx.loginUrl}`);
  try {
    await navigate(page, ctx.loginUrl, ctx.navigationTimeoutMs, logger);
  } catch (err) {
    return { ok: false, reason: `could not open ${ctx.loginUrl}: ${errorMessage(err)}` };
  }
  await page.sleep(ctx.settle.navigationMs);
  logger.detail(`Current URL: ${page.url()}`);
  logger.detail(`Page title: ${await page.title()}`);

  if (profile.consent !== undefined) {
    const consent = profile.consent;
    let bodyText = '';
    try {
      bodyText = await page.bodyText();
    } catch (err) {
      logger.debug(`No page text to check for a consent banner: ${errorMessage(err)}`);
    }
    if (bodyText.includes(consent.phrase)) {
      logger.login('Consent page detected, accepting');
      const accepted = await activateTarget(consent.accept, targets);
      if (!accepted.ok) {
        return { ok: false, reason: 'consent page could not be accepted' };
      }
      await page.sleep(ctx.settle.consentMs);
    }
  }

  const username = await locateTarget(profile.login.username, targets);
  if (username === null) {
    return { ok: false, reason: `${profile.login.username.name} not found` };
  }
  try {
    await username.element.fill(credentials.username, ctx.timeoutMs);
  } catch (err) {
    return { ok: false, reason: `could not enter username: ${errorMessage(err)}` };
  }

  const password = await locateTarget(profile.login.password, targets);
  if (password === null) {
    return { ok: false, reason: `${profile.login.password.name} not found` };
  }
  try {
    await password.element.fill(credentials.password, ctx.timeoutMs);
  } catch (err) {
    return { ok: false, reason: `could not enter password: ${errorMessage(err)}` };
  }

  const submitted = await activateTarget(profile.login.submit, targets);
  if (!submitted.ok) {
    return { ok: false, reason: `${profile.login.submit.name} not found` };
  }

  logger.login(`Submitted, waiting ${String(Math.round(ctx.settle.loginMs / 1000))}s for the dashboard`);
  await page.sleep(ctx.settle.loginMs);

  if (ctx.captureAfterLogin) {
    await captureDiagnostics(page, 'post_login_page', { debugDir: ctx.debugDir, logger });
  }

  return { ok: true };
}
