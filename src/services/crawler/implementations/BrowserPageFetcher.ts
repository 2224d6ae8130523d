import puppeteer, { Browser, BrowserContext, Page, TimeoutError } from 'puppeteer-core';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { FetchErrorKind, FetchOptions, FetchResult, FetchStrategy } from '../interfaces/types';
import { FetcherInitError } from '../errors';
import { DelayUtils } from '../utils/DelayUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';

/**
 * Options for the headless browser fetcher
 */
export interface BrowserFetcherOptions {
  /** Chrome / Chromium binary; puppeteer-core never downloads one */
  executablePath?: string;
  /** Maximum number of viewport-height scrolls used to trigger lazy loading */
  maxScrolls?: number;
  /** Pause after each scroll */
  scrollPauseMs?: number;
  /** Override of the browser launch, mainly for tests */
  launch?: () => Promise<Browser>;
}

const VIEWPORT = { width: 1920, height: 1080 };

/**
 * Page fetcher driving a headless Chromium through puppeteer-core.
 * One browser is shared; every domain gets its own browser context.
 * Pages are scrolled a few screens down before their HTML is read, so lazily
 * rendered product grids are present in the markup.
 */
export class BrowserPageFetcher implements IPageFetcher {
  readonly strategy: FetchStrategy = 'browser';
  private readonly logger = LoggingUtils.createTaggedLogger('browser-fetcher');
  private browser: Browser | null = null;
  private browserInitPromise: Promise<Browser> | null = null;
  private readonly contexts: Map<string, BrowserContext> = new Map();
  private readonly openingContexts: Map<string, Promise<void>> = new Map();
  private readonly maxScrolls: number;
  private readonly scrollPauseMs: number;

  constructor(private readonly options: BrowserFetcherOptions = {}) {
    this.maxScrolls = options.maxScrolls ?? 5;
    this.scrollPauseMs = options.scrollPauseMs ?? 500;
  }

  async open(domain: string): Promise<void> {
    const key = UrlUtils.siteKey(domain);
    if (this.contexts.has(key)) {
      return;
    }

    // `shop.com` and `www.shop.com` opened together share one context
    let opening = this.openingContexts.get(key);
    if (!opening) {
      opening = this.createContext(key);
      this.openingContexts.set(key, opening);
    }

    try {
      await opening;
      this.logger.debug(`Browser context opened for ${domain}`);
    } catch (error) {
      throw new FetcherInitError(domain, error);
    }
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const hostname = UrlUtils.extractDomain(url);
    if (hostname === null || !UrlUtils.isValid(url)) {
      return { ok: false, error: { kind: FetchErrorKind.INVALID_URL, message: `Invalid URL: ${url}` } };
    }

    let page: Page | null = null;

    try {
      const context = this.contexts.get(UrlUtils.siteKey(hostname));
      page = context ? await context.newPage() : await (await this.initBrowser()).newPage();

      if (options.userAgent) {
        await page.setUserAgent(options.userAgent);
      }

      this.logger.debug(`Navigating to ${url}`);
      const response = await page.goto(url, {
        waitUntil: 'networkidle2',
        timeout: options.timeout || 30000,
      });

      if (!response) {
        return { ok: false, error: { kind: FetchErrorKind.TRANSPORT_ERROR, message: `No response for ${url}` } };
      }

      const status = response.status();
      if (status >= 400) {
        return { ok: false, error: { kind: FetchErrorKind.HTTP_ERROR, message: `HTTP ${status} for ${url}`, status } };
      }

      const contentType = (response.headers()['content-type'] ?? '').toLowerCase();
      if (contentType !== '' && !contentType.includes('html')) {
        return {
          ok: false,
          error: { kind: FetchErrorKind.NON_HTML_CONTENT, message: `Non-HTML content at ${url} (Content-Type: ${contentType})`, status }
        };
      }

      await this.scrollPage(page);

      return { ok: true, html: await page.content(), status, finalUrl: page.url() };
    } catch (error) {
      if (error instanceof TimeoutError) {
        return { ok: false, error: { kind: FetchErrorKind.TIMEOUT, message: `Timeout fetching ${url}` } };
      }
      return {
        ok: false,
        error: { kind: FetchErrorKind.TRANSPORT_ERROR, message: `Error fetching ${url}: ${LoggingUtils.describeError(error)}` }
      };
    } finally {
      if (page) {
        await page.close().catch(error => {
          this.logger.debug(`Error closing page for ${url}: ${LoggingUtils.describeError(error)}`);
        });
      }
    }
  }

  async close(domain: string): Promise<void> {
    const key = UrlUtils.siteKey(domain);
    const context = this.contexts.get(key);
    if (!context) {
      return;
    }

    this.contexts.delete(key);
    try {
      await context.close();
      this.logger.debug(`Browser context closed for ${domain}`);
    } catch (error) {
      this.logger.warn(`Error closing browser context for ${domain}: ${LoggingUtils.describeError(error)}`);
    }
  }

  async cleanup(): Promise<void> {
    for (const domain of [...this.contexts.keys()]) {
      await this.close(domain);
    }

    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      this.browserInitPromise = null;
      try {
        await browser.close();
        this.logger.debug('Browser closed');
      } catch (error) {
        this.logger.warn(`Error closing browser: ${LoggingUtils.describeError(error)}`);
      }
    }
  }

  private async createContext(key: string): Promise<void> {
    try {
      const browser = await this.initBrowser();
      this.contexts.set(key, await browser.createBrowserContext());
    } finally {
      this.openingContexts.delete(key);
    }
  }

  /**
   * Initialize the browser instance lazily; concurrent callers share one launch
   */
  private async initBrowser(): Promise<Browser> {
    if (this.browser) {
      return this.browser;
    }

    if (!this.browserInitPromise) {
      this.logger.debug('Launching headless browser');
      this.browserInitPromise = this.options.launch
        ? this.options.launch()
        : puppeteer.launch({
          headless: true,
          executablePath: this.options.executablePath,
          defaultViewport: VIEWPORT,
          args: [
            '--no-sandbox',
            '--disable-setuid-sandbox',
            '--disable-dev-shm-usage',
            '--disable-gpu',
          ]
        });
    }

    try {
      this.browser = await this.browserInitPromise;
      return this.browser;
    } catch (error) {
      this.browserInitPromise = null;
      this.logger.error(`Failed to launch browser: ${LoggingUtils.describeError(error)}`);
      throw error;
    }
  }

  /**
   * Scroll down a few screens and back to the top
   */
  private async scrollPage(page: Page): Promise<void> {
    try {
      const height = Number(await page.evaluate('document.body.scrollHeight'));
      const scrolls = Math.min(Math.floor(height / VIEWPORT.height), this.maxScrolls);

      for (let i = 1; i <= scrolls; i++) {
        await page.evaluate(`window.scrollTo(0, ${i * VIEWPORT.height})`);
        await DelayUtils.delay(this.scrollPauseMs);
      }

      await page.evaluate('window.scrollTo(0, 0)');
    } catch (error) {
      this.logger.warn(`Error during page scrolling: ${LoggingUtils.describeError(error)}`);
    }
  }
}
