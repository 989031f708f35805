import type { ConsolePage } from '../browser/driver.js';
import type { ActionOutcome, ConsoleAction, FailureKind, SettleDelays } from '../schema/index.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { ArchiveError, archive } from './archiver.js';
import { captureDiagnostics } from './diagnostics.js';
import { matchDownload, watchDownloads } from './downloads.js';
import type { DownloadResult, DownloadWatch } from './downloads.js';
import { navigate } from './login.js';
import { activateTarget } from './resolver.js';
import { deepLinkUrl } from './urls.js';

// ── Public types ─────────────────────────────────────────────

export interface ActionContext {
  page: ConsolePage;
  baseUrl: string;
  hostIdentifier: string;
  downloadDir: string;
  archiveDir: string;
  debugDir: string;
  timeoutMs: number;
  navigationTimeoutMs: number;
  downloadTimeoutMs: number;
  pollIntervalMs: number;
  settle: SettleDelays;
  logger: Logger;
  now?: () => Date;
}

// ── Action runner ────────────────────────────────────────────

/**
 * Run one console action: open its deep link, click through its steps,
 * wait for the download, archive it.
 *
 * Expected failures (element missing, no download, move failed) come
 * back as a failed outcome. Anything else propagates to the session.
 */
export async function performAction(
  action: ConsoleAction,
  ctx: ActionContext,
): Promise<ActionOutcome> {
  const { page, logger } = ctx;
  const started = Date.now();
  const finish = (
    success: boolean,
    message: string,
    extra: { failure?: FailureKind; archivedPath?: string } = {},
  ): ActionOutcome => ({
    action: action.name,
    success,
    message,
    durationMs: Date.now() - started,
    ...extra,
  });

  logger.section(action.label);

  if (action.deepLink !== undefined) {
    const url = deepLinkUrl(ctx.baseUrl, action.deepLink);
    logger.info(`Navigating to ${url}`);
    try {
      await navigate(page, url, ctx.navigationTimeoutMs, logger);
    } catch (err) {
      logger.error(`Failed to open ${url}: ${errorMessage(err)}`);
      await captureDiagnostics(page, `${action.name}_navigation_fail`, {
        debugDir: ctx.debugDir,
        logger,
      });
      return finish(false, `could not open ${url}`, { failure: 'navigation' });
    }
    await page.sleep(ctx.settle.navigationMs);
  }

  let watch: DownloadWatch;
  try {
    watch = await watchDownloads(ctx.downloadDir);
  } catch (err) {
    logger.error(`Cannot watch ${ctx.downloadDir}: ${errorMessage(err)}`);
    return finish(false, `download directory unreadable: ${errorMessage(err)}`, { failure: 'io' });
  }

  for (const step of action.steps) {
    if (step.pressEscapeFirst) {
      try {
        await page.pressKey('Escape');
        logger.debug('Sent Escape to close open popups');
        await page.sleep(ctx.settle.escapeMs);
      } catch (err) {
        logger.warn(`Could not send Escape: ${errorMessage(err)}`);
      }
    }

    const clicked = await activateTarget(step.target, {
      page,
      timeoutMs: ctx.timeoutMs,
      settle: ctx.settle,
      debugDir: ctx.debugDir,
      logger,
    });
    if (!clicked.ok) {
      return finish(false, `${step.target.name} not found`, { failure: 'resolution' });
    }
  }

  logger.download(`Waiting up to ${String(Math.round(ctx.downloadTimeoutMs / 1000))}s for ${ctx.downloadDir}`);
  let download: DownloadResult;
  try {
    download = await watch.waitFor(matchDownload(action.download), {
      timeoutMs: ctx.downloadTimeoutMs,
      pollIntervalMs: ctx.pollIntervalMs,
    });
  } catch (err) {
    logger.error(`Download watch failed: ${errorMessage(err)}`);
    return finish(false, `download directory unreadable: ${errorMessage(err)}`, { failure: 'io' });
  }
  if (download.status === 'timed_out') {
    logger.error(`${action.label}: file was not downloaded within timeout`);
    return finish(false, 'download timed out', { failure: 'timeout' });
  }
  logger.download(`Downloaded ${download.fileName}`);

  try {
    const archivedPath = await archive(
      download.path,
      ctx.hostIdentifier,
      { prefix: action.archivePrefix, archiveDir: ctx.archiveDir },
      (ctx.now ?? (() => new Date()))(),
    );
    logger.success(`${action.label} archived to ${archivedPath}`);
    return finish(true, `archived to ${archivedPath}`, { archivedPath });
  } catch (err) {
    if (!(err instanceof ArchiveError)) throw err;
    logger.error(err.message);
    return finish(false, err.message, { failure: 'io' });
  }
}
