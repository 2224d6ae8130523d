import { IPageFetcher } from '../interfaces/IPageFetcher';
import { FetchStrategy } from '../interfaces/types';
import { BrowserFetcherOptions, BrowserPageFetcher } from '../implementations/BrowserPageFetcher';
import { HttpPageFetcher } from '../implementations/HttpPageFetcher';
import { ConfigurationError } from '../errors';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Factory for the page fetcher behind a crawl.
 * Plain HTTP is the lightweight default; the headless browser renders
 * script-driven listing pages and triggers lazy loading by scrolling.
 */
export class FetcherStrategyFactory {
  private readonly logger = LoggingUtils.createTaggedLogger('strategy-factory');

  constructor(private readonly browserOptions: BrowserFetcherOptions = {}) {}

  /**
   * @throws ConfigurationError for an unknown strategy
   */
  create(strategy: FetchStrategy): IPageFetcher {
    this.logger.debug(`Creating ${strategy} fetcher`);

    switch (strategy) {
      case 'http':
        return new HttpPageFetcher();
      case 'browser':
        if (!this.browserOptions.executablePath && !this.browserOptions.launch) {
          this.logger.warn('No browser executable configured, relying on puppeteer-core defaults');
        }
        return new BrowserPageFetcher(this.browserOptions);
      default:
        throw new ConfigurationError(`Unknown fetch strategy: ${String(strategy)}`);
    }
  }
}
