import { chromium, errors, type Browser, type Locator, type Page } from 'playwright-core';
import { ElementNotFoundError, PosterError, getErrorMessage } from './errors.js';
import { logger } from './logger.js';
import { ErrorCodes, LocatorStrategies, type LocatorDescriptor } from './types.js';

export const VIEWPORT = { width: 1280, height: 720 } as const;

const LAUNCH_ARGS = ['--disable-gpu', '--no-sandbox', '--disable-dev-shm-usage'];

// How often page-count waits re-check the context
const PAGE_POLL_INTERVAL_MS = 250;

/**
 * The element operations the posting flow needs; a Playwright Locator satisfies it.
 */
export type SessionElement = Pick<Locator, 'click' | 'clear' | 'fill'>;

/**
 * The slices of Playwright's Locator, Page, BrowserContext and Browser that
 * PlaywrightSession drives.
 */
export type SessionLocator = Pick<Locator, 'click' | 'clear' | 'fill' | 'waitFor'> & {
  first(): SessionLocator;
};

export type SessionPage = Pick<Page, 'goto' | 'bringToFront' | 'url' | 'isClosed' | 'waitForTimeout'> & {
  locator(selector: string, options?: { hasText?: string }): SessionLocator;
};

export interface SessionContext {
  pages(): SessionPage[];
  close(): Promise<void>;
}

export type SessionBrowser = Pick<Browser, 'close'>;

/**
 * Browser session used by the posting workflow
 */
export interface PosterSession {
  goto(url: string): Promise<void>;
  clickLinkByText(text: string, timeoutMs: number): Promise<void>;
  findFirst(descriptors: readonly LocatorDescriptor[], timeoutMs: number): Promise<SessionElement>;
  pageCount(): number;
  switchToLatestPage(): Promise<void>;
  waitForPageCount(count: number, timeoutMs: number): Promise<void>;
  pause(ms: number): Promise<void>;
  close(): Promise<void>;
}

export interface SessionOptions {
  headless: boolean;
  channel?: string;
  executablePath?: string;
}

export type SessionFactory = (options: SessionOptions) => Promise<PosterSession>;

function quoteAttribute(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function describeLocator(descriptor: LocatorDescriptor): string {
  return `${descriptor.strategy}=${descriptor.value}`;
}

/**
 * Maps a locator descriptor onto a Playwright locator
 */
export function resolveLocator(page: Pick<SessionPage, 'locator'>, descriptor: LocatorDescriptor): SessionLocator {
  switch (descriptor.strategy) {
    case LocatorStrategies.ID:
      return page.locator(`[id=${quoteAttribute(descriptor.value)}]`);
    case LocatorStrategies.NAME:
      return page.locator(`[name=${quoteAttribute(descriptor.value)}]`);
    case LocatorStrategies.CSS:
      return page.locator(descriptor.value);
    case LocatorStrategies.LINK_TEXT:
      return page.locator('a', { hasText: descriptor.value });
    default: {
      const unknown: never = descriptor.strategy;
      throw new Error(`Unknown locator strategy: ${String(unknown)}`);
    }
  }
}

/**
 * Returns the first locator in the list that becomes attached within the timeout.
 *
 * Locators are tried in order, each with the full timeout. Only Playwright
 * timeouts fall through to the next one; any other error is rethrown.
 */
export async function findFirst<T extends Pick<Locator, 'waitFor'>>(
  descriptors: readonly LocatorDescriptor[],
  resolve: (descriptor: LocatorDescriptor) => T,
  timeoutMs: number
): Promise<T> {
  let lastError: Error | null = null;

  for (const descriptor of descriptors) {
    const candidate = resolve(descriptor);
    try {
      await candidate.waitFor({ state: 'attached', timeout: timeoutMs });
      logger.debug({ locator: describeLocator(descriptor) }, 'Locator matched');
      return candidate;
    } catch (err) {
      if (!(err instanceof errors.TimeoutError)) {
        throw err;
      }
      logger.debug({ locator: describeLocator(descriptor), timeoutMs }, 'Locator timed out, trying next');
      lastError = err;
    }
  }

  if (lastError) {
    throw new ElementNotFoundError(
      `No element matched any of: ${descriptors.map(describeLocator).join(', ')}`,
      { cause: lastError }
    );
  }
  throw new ElementNotFoundError('No selectors provided');
}

/**
 * PosterSession backed by a Playwright browser. Tracks the page the flow is
 * currently working in; a link opening a new tab moves work to that tab.
 */
export class PlaywrightSession implements PosterSession {
  private page: SessionPage;

  constructor(
    private readonly browser: SessionBrowser,
    private readonly context: SessionContext,
    page: SessionPage
  ) {
    this.page = page;
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  // click() waits for the link to be visible and enabled within the same timeout
  async clickLinkByText(text: string, timeoutMs: number): Promise<void> {
    const link = resolveLocator(this.page, { strategy: LocatorStrategies.LINK_TEXT, value: text }).first();
    try {
      await link.click({ timeout: timeoutMs });
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new ElementNotFoundError(`Link "${text}" was not clickable within ${timeoutMs}ms`, { cause: err });
      }
      throw err;
    }
  }

  findFirst(descriptors: readonly LocatorDescriptor[], timeoutMs: number): Promise<SessionElement> {
    return findFirst(descriptors, (descriptor) => resolveLocator(this.page, descriptor).first(), timeoutMs);
  }

  pageCount(): number {
    return this.context.pages().length;
  }

  async switchToLatestPage(): Promise<void> {
    const latest = this.context.pages().at(-1);
    if (latest && latest !== this.page) {
      this.page = latest;
      await latest.bringToFront();
      logger.debug({ url: latest.url() }, 'Switched to newest page');
    }
  }

  async waitForPageCount(count: number, timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (this.pageCount() !== count) {
      if (Date.now() >= deadline) {
        throw new PosterError(
          ErrorCodes.WINDOW_WAIT_TIMEOUT,
          `Expected ${count} open page(s) within ${timeoutMs}ms, found ${this.pageCount()}`
        );
      }
      this.retrackIfClosed();
      await this.page.waitForTimeout(PAGE_POLL_INTERVAL_MS);
    }
    this.retrackIfClosed();
  }

  // Closed popups leave the tracked page dangling
  private retrackIfClosed(): void {
    if (this.page.isClosed()) {
      const [remaining] = this.context.pages();
      if (remaining) {
        this.page = remaining;
      }
    }
  }

  async pause(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } catch (err) {
      logger.warn({ error: getErrorMessage(err) }, 'Failed to close browser context');
    }
    try {
      await this.browser.close();
      logger.debug('Browser closed');
    } catch (err) {
      logger.warn({ error: getErrorMessage(err) }, 'Failed to close browser');
    }
  }
}

/**
 * Launches Chromium and opens a single page with the fixed viewport
 */
export async function launchBrowserSession(options: SessionOptions): Promise<PosterSession> {
  logger.info(
    { headless: options.headless, channel: options.channel, executablePath: options.executablePath },
    'Launching browser'
  );

  const browser = await chromium.launch({
    headless: options.headless,
    channel: options.channel,
    executablePath: options.executablePath,
    args: LAUNCH_ARGS,
  });

  try {
    const context = await browser.newContext({ viewport: VIEWPORT });
    const page = await context.newPage();
    return new PlaywrightSession(browser, context, page);
  } catch (err) {
    await browser.close();
    throw err;
  }
}
