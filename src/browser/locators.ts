import type { Locator, LocatorChain } from '../schema/index.js';

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner describing the locator for logs. */
export function describeLocator(locator: Locator): string {
  switch (locator.strategy) {
    case 'id':
      return `#${locator.query}`;
    case 'css':
      return `css=${locator.query}`;
    case 'xpath':
      return `xpath=${locator.query}`;
    case 'text':
      return `text~="${locator.query}"`;
  }
}

export function describeChain(chain: LocatorChain): string {
  return chain.map(describeLocator).join(' → ');
}

// ── Playwright selector mapping ───────────────────────────────

/**
 * Maps an `id`, `css` or `xpath` locator to a Playwright selector string.
 * `text` locators go through `page.getByText` instead and return `null`.
 */
export function toSelector(locator: Locator): string | null {
  switch (locator.strategy) {
    case 'id':
      return `[id="${locator.query.replace(/["\\]/g, '\\$&')}"]`;
    case 'css':
      return locator.query;
    case 'xpath':
      return `xpath=${locator.query}`;
    case 'text':
      return null;
  }
}
