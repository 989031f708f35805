import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ConsolePage } from '../browser/driver.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { debugStamp } from '../utils/time.js';

const SNIPPET_CHARS = 500;

export interface DiagnosticCapture {
  htmlPath?: string;
  screenshotPath?: string;
}

export interface CaptureOptions {
  debugDir: string;
  logger: Logger;
  now?: () => Date;
}

/**
 * Save page markup and a screenshot as `{label}_{YYYYMMDD_HHMMSS}.html|.png`.
 *
 * Best effort: never rejects. Each half that fails is logged and
 * left out of the result.
 */
export async function captureDiagnostics(
  page: ConsolePage,
  label: string,
  options: CaptureOptions,
): Promise<DiagnosticCapture> {
  const { debugDir, logger } = options;
  const stamp = debugStamp((options.now ?? (() => new Date()))());
  const base = path.join(debugDir, `${label}_${stamp}`);
  const captured: DiagnosticCapture = {};

  try {
    await mkdir(debugDir, { recursive: true });
  } catch (err) {
    logger.error(`[DEBUG] Could not create ${debugDir}: ${errorMessage(err)}`);
    return captured;
  }

  try {
    const html = await page.content();
    await writeFile(`${base}.html`, html, 'utf-8');
    captured.htmlPath = `${base}.html`;
    logger.error(`[DEBUG] Saved HTML to: ${captured.htmlPath}`);
    logger.debug(
      `Page source snippet: ${html.length > SNIPPET_CHARS ? `${html.slice(0, SNIPPET_CHARS)}...` : html}`,
    );
  } catch (err) {
    logger.error(`[DEBUG] Could not save HTML: ${errorMessage(err)}`);
  }

  try {
    await page.screenshot(`${base}.png`);
    captured.screenshotPath = `${base}.png`;
    logger.error(`[DEBUG] Saved screenshot to: ${captured.screenshotPath}`);
  } catch (err) {
    logger.error(`[DEBUG] Could not save screenshot: ${errorMessage(err)}`);
  }

  return captured;
}
