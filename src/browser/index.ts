/**
 * Browser module.
 * Page port consumed by the core, plus its Playwright implementation.
 */

export { describeLocator, describeChain, toSelector } from './locators.js';
export { launchSession, createPlaywrightLauncher, wrapPage } from './playwright.js';
export type {
  BrowserLauncher,
  BrowserSession,
  ConsoleElement,
  ConsolePage,
  LaunchOptions,
} from './driver.js';
