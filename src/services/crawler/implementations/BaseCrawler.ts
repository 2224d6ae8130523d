import { ICrawler } from '../interfaces/ICrawler';
import { IDomainStateStore } from '../interfaces/IDomainStateStore';
import { IFrontier } from '../interfaces/IFrontier';
import { ILinkExtractor } from '../interfaces/ILinkExtractor';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { IPolitenessController } from '../interfaces/IPolitenessController';
import { IResultCollector } from '../interfaces/IResultCollector';
import { IRetryPolicy } from '../interfaces/IRetryPolicy';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { IUrlClassifier } from '../interfaces/IUrlClassifier';
import { CrawlOptions, CrawlProgress, CrawlResult, CrawlTask, CrawlerState, DomainReport } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';
import { resolveCrawlOptions } from '../utils/OptionsUtils';
import { ResultCollector } from './ResultCollector';

/**
 * Collaborators of a crawler
 */
export interface CrawlerServices {
  store: IDomainStateStore;
  frontier: IFrontier;
  classifier: IUrlClassifier;
  politeness: IPolitenessController;
  fetcher: IPageFetcher;
  linkExtractor: ILinkExtractor;
  retryPolicy: IRetryPolicy;
  /** Consulted only when `respectRobotsTxt` is set */
  robotsTxtService?: IRobotsTxtService;
  /** Clock in milliseconds */
  now?: () => number;
}

/**
 * Abstract base class for crawler implementations.
 * Provides option handling, lifecycle state and read access to results.
 */
export abstract class BaseCrawler implements ICrawler, IResultCollector {
  protected state: CrawlerState = CrawlerState.IDLE;
  protected shutdownRequested = false;
  protected readonly options: CrawlOptions;
  protected readonly logger = LoggingUtils.createTaggedLogger('crawler');
  protected readonly resultCollector: ResultCollector;
  protected readonly now: () => number;

  /**
   * @param services Collaborators used by the crawl
   * @param options Overrides of the default crawl options
   * @throws ConfigurationError when the options are invalid
   */
  constructor(
    protected readonly services: CrawlerServices,
    options: Partial<CrawlOptions> = {}
  ) {
    this.options = resolveCrawlOptions(options);
    this.resultCollector = new ResultCollector(services.store);
    this.now = services.now ?? Date.now;
  }

  abstract run(seedTasks: CrawlTask[]): Promise<CrawlResult>;

  abstract getProgress(): CrawlProgress;

  /**
   * Hook for subclasses to wake suspended work once shutdown is requested
   */
  protected abstract onShutdown(): void;

  /**
   * Request a cooperative stop of the current crawl
   */
  shutdown(): void {
    if (this.state !== CrawlerState.RUNNING) {
      this.logger.warn(`Cannot shut down crawler in state: ${this.state}`);
      return;
    }

    this.logger.info('Shutdown requested, no new fetches will be dispatched');
    this.shutdownRequested = true;
    this.state = CrawlerState.STOPPING;
    this.onShutdown();
  }

  getState(): CrawlerState {
    return this.state;
  }

  getOptions(): CrawlOptions {
    return { ...this.options };
  }

  snapshot(): CrawlResult {
    return this.resultCollector.snapshot();
  }

  getDomainReports(): DomainReport[] {
    return this.resultCollector.getDomainReports();
  }
}
