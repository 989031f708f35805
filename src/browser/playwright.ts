import { access, mkdir, rename, rm } from 'node:fs/promises';
import path from 'node:path';

import { chromium, errors } from 'playwright';
import type {
  Browser,
  BrowserContext,
  Download,
  Locator as PlaywrightLocator,
  Page,
} from 'playwright';

import { TIMEOUTS } from '../config/defaults.js';
import type { BrowserKind, Locator } from '../schema/index.js';
import { ConnectionError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type {
  BrowserLauncher,
  BrowserSession,
  ConsoleElement,
  ConsolePage,
  LaunchOptions,
} from './driver.js';
import { toSelector } from './locators.js';

const CHANNELS: Record<BrowserKind, string> = {
  chrome: 'chrome',
  edge: 'msedge',
};

// Consoles ship self-signed certificates.
const LAUNCH_ARGS = [
  '--ignore-certificate-errors',
  '--allow-insecure-localhost',
  '--disable-dev-shm-usage',
];

// ── Session launcher ─────────────────────────────────────────

export function createPlaywrightLauncher(logger: Logger): BrowserLauncher {
  return (options) => launchSession(options, logger);
}

export async function launchSession(
  options: LaunchOptions,
  logger: Logger,
  drainTimeoutMs: number = TIMEOUTS.DOWNLOAD_DRAIN,
): Promise<BrowserSession> {
  await mkdir(options.downloadDir, { recursive: true });

  let browser: Browser;
  try {
    browser = await chromium.launch({
      channel: CHANNELS[options.browser],
      headless: options.headless,
      args: LAUNCH_ARGS,
    });
  } catch (err) {
    throw new ConnectionError(options.browser, errorMessage(err), { cause: err });
  }

  let context: BrowserContext;
  let page: Page;
  try {
    context = await browser.newContext({
      ignoreHTTPSErrors: true,
      acceptDownloads: true,
      viewport: null,
    });
    page = await context.newPage();
  } catch (err) {
    await browser.close().catch((closeErr: unknown) => {
      logger.warn(`Browser close after failed start: ${errorMessage(closeErr)}`);
    });
    throw new ConnectionError(options.browser, errorMessage(err), { cause: err });
  }

  // Downloads may start from popups too, so listen on every page.
  const pending = new Set<Promise<void>>();
  const track = (p: Page): void => {
    p.on('download', (download) => {
      const saving = saveDownload(download, options.downloadDir, logger).finally(() => {
        pending.delete(saving);
      });
      pending.add(saving);
    });
  };
  track(page);
  context.on('page', track);

  logger.info(`${options.browser} started (${options.headless ? 'headless' : 'headed'})`);

  return {
    page: wrapPage(page),

    async close(): Promise<void> {
      if (!(await drain(pending, drainTimeoutMs))) {
        logger.warn(
          `Abandoning ${String(pending.size)} unfinished download(s) after ${String(drainTimeoutMs)}ms`,
        );
      }
      try {
        await context.close();
      } finally {
        await browser.close();
      }
    },
  };
}

// ── Downloads ────────────────────────────────────────────────

/** Resolves `true` once every pending save settled, `false` at the deadline. */
async function drain(pending: ReadonlySet<Promise<void>>, timeoutMs: number): Promise<boolean> {
  if (pending.size === 0) return true;
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([Promise.all(pending).then(() => true), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Save a browser download into `dir` under a `.part` name, then rename
 * it into place so the file only ever appears under its final name.
 * Never rejects: the download watcher reports the missing file.
 */
async function saveDownload(
  download: Download,
  dir: string,
  logger: Logger,
): Promise<void> {
  const suggested = download.suggestedFilename();
  let partialPath: string | null = null;
  try {
    const finalPath = await freePath(dir, suggested);
    partialPath = `${finalPath}.part`;
    await download.saveAs(partialPath);
    await rename(partialPath, finalPath);
    logger.download(`Saved ${path.basename(finalPath)}`);
  } catch (err) {
    logger.error(`Download ${suggested} could not be saved: ${errorMessage(err)}`);
    if (partialPath !== null) {
      await rm(partialPath, { force: true }).catch((rmErr: unknown) => {
        logger.debug(`Leftover ${partialPath ?? suggested}: ${errorMessage(rmErr)}`);
      });
    }
  }
}

/** `name.ext`, else `name (1).ext`, `name (2).ext`, … like a browser would. */
async function freePath(dir: string, fileName: string): Promise<string> {
  const ext = path.extname(fileName);
  const stem = fileName.slice(0, fileName.length - ext.length);
  for (let n = 0; ; n++) {
    const candidate = path.join(dir, n === 0 ? fileName : `${stem} (${String(n)})${ext}`);
    if (!(await exists(candidate))) return candidate;
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

// ── Page adapter ─────────────────────────────────────────────

export function wrapPage(page: Page): ConsolePage {
  const locate = (locator: Locator): PlaywrightLocator => {
    const selector = toSelector(locator);
    return (selector === null ? page.getByText(locator.query) : page.locator(selector)).first();
  };

  return {
    async goto(url, timeoutMs) {
      await page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
    },

    async assignLocation(url) {
      await page.evaluate((href) => {
        window.location.href = href;
      }, url);
    },

    url: () => page.url(),
    title: () => page.title(),
    bodyText: () => page.innerText('body'),
    content: () => page.content(),

    async screenshot(filePath) {
      await page.screenshot({ path: filePath, fullPage: true });
    },

    async pressKey(key) {
      await page.keyboard.press(key);
    },

    async waitForElement(locator, timeoutMs) {
      const target = locate(locator);
      try {
        await target.waitFor({ state: 'visible', timeout: timeoutMs });
      } catch (err) {
        if (err instanceof errors.TimeoutError) return null;
        throw err;
      }
      return wrapElement(target);
    },

    async findByText(text) {
      const matches = await page.getByText(text).all();
      return matches.map(wrapElement);
    },

    async sleep(ms) {
      await page.waitForTimeout(ms);
    },
  };
}

function wrapElement(locator: PlaywrightLocator): ConsoleElement {
  return {
    async click(timeoutMs) {
      await locator.click({ timeout: timeoutMs });
    },
    async fill(value, timeoutMs) {
      await locator.fill(value, { timeout: timeoutMs });
    },
    async scrollIntoView(timeoutMs) {
      await locator.scrollIntoViewIfNeeded({ timeout: timeoutMs });
    },
    isVisible: () => locator.isVisible(),
    isEnabled: () => locator.isEnabled(),
    text: () => locator.innerText(),
    describe: () =>
      locator.evaluate(
        (el) => `<${el.tagName.toLowerCase()} class="${el.getAttribute('class') ?? ''}">`,
      ),
  };
}
