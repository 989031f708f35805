import type { BrowserKind, Locator } from '../schema/index.js';

// ── Page port ────────────────────────────────────────────────
// The core drives the console through these two interfaces only.
// Playwright implements them in ./playwright.ts; tests use an
// in-memory fake.

export interface ConsoleElement {
  click(timeoutMs: number): Promise<void>;
  fill(value: string, timeoutMs: number): Promise<void>;
  scrollIntoView(timeoutMs: number): Promise<void>;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  text(): Promise<string>;
  /** Short tag/class summary for log lines. */
  describe(): Promise<string>;
}

export interface ConsolePage {
  goto(url: string, timeoutMs: number): Promise<void>;
  /** Navigate by assigning `window.location` from inside the page. */
  assignLocation(url: string): Promise<void>;
  url(): string;
  title(): Promise<string>;
  bodyText(): Promise<string>;
  content(): Promise<string>;
  screenshot(filePath: string): Promise<void>;
  pressKey(key: string): Promise<void>;
  /**
   * Wait up to `timeoutMs` for the first element matching `locator`
   * to be attached and visible. Resolves `null` on timeout.
   */
  waitForElement(locator: Locator, timeoutMs: number): Promise<ConsoleElement | null>;
  /** Every element whose visible text contains `text`, in document order. */
  findByText(text: string): Promise<ConsoleElement[]>;
  sleep(ms: number): Promise<void>;
}

// ── Session ──────────────────────────────────────────────────

export interface LaunchOptions {
  browser: BrowserKind;
  headless: boolean;
  downloadDir: string;
}

export interface BrowserSession {
  readonly page: ConsolePage;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<BrowserSession>;
