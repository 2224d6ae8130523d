import { BaseCrawler, CrawlerServices } from './BaseCrawler';
import { isTransientFetchError } from './ExponentialRetryPolicy';
import {
  CATEGORY_RANK,
  CrawlOptions,
  CrawlProgress,
  CrawlResult,
  CrawlTask,
  CrawlerState,
  DomainStatus,
  FetchError,
  FetchErrorKind,
  FetchResult
} from '../interfaces/types';
import { CrawlerError } from '../errors';
import { DelayUtils } from '../utils/DelayUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';
import { WorkSignal } from '../utils/WorkSignal';

/**
 * Bounded-concurrency crawl scheduler.
 *
 * A fixed pool of `maxConcurrency` workers claims tasks from the per-domain
 * frontiers, round-robin across domains, never exceeding
 * `maxConcurrentPerDomain` in-flight tasks for one domain. Every state change
 * (claim, visit, enqueue, release) is synchronous, so workers on the event
 * loop observe each other's updates atomically. Workers suspend only on the
 * politeness wait, the fetch itself, and while idle.
 *
 * Task lifecycle: queued, dispatched, fetching, then succeeded or failed.
 * Transient failures go back to the frontier with a backoff until the retry
 * policy gives up; fatal failures are dropped at once.
 */
export class FetchOrchestrator extends BaseCrawler {
  private readonly activeDomains: Set<string> = new Set();
  private readonly inFlight: Map<string, number> = new Map();
  private totalInFlight = 0;
  private cursor = 0;
  private workSignal = new WorkSignal();
  private abortController = new AbortController();
  private sessionCloses: Promise<void>[] = [];

  constructor(services: CrawlerServices, options: Partial<CrawlOptions> = {}) {
    super(services, options);
  }

  /**
   * Crawl from the seed tasks until every domain is finished or shutdown is requested
   * @returns Product URLs per domain; fetch failures never reject this promise
   */
  async run(seedTasks: CrawlTask[]): Promise<CrawlResult> {
    if (this.state === CrawlerState.RUNNING || this.state === CrawlerState.STOPPING) {
      throw new CrawlerError('A crawl is already running on this crawler');
    }

    this.state = CrawlerState.RUNNING;
    this.shutdownRequested = false;
    this.abortController = new AbortController();
    this.workSignal = new WorkSignal();
    this.sessionCloses = [];
    const startTime = this.now();

    this.logger.info(`Starting crawl of ${new Set(seedTasks.map(task => task.domain)).size} domains with ${this.options.maxConcurrency} workers`);

    await this.prepareDomains(seedTasks);

    const workers = Array.from({ length: this.options.maxConcurrency }, (_, id) => this.worker(id));
    await Promise.all(workers);

    this.finishRemainingDomains();
    await Promise.all(this.sessionCloses);
    try {
      await this.services.fetcher.cleanup();
    } catch (error) {
      this.logger.warn(`Error cleaning up ${this.services.fetcher.strategy} fetcher: ${LoggingUtils.describeError(error)}`);
    }

    this.state = this.shutdownRequested ? CrawlerState.STOPPED : CrawlerState.IDLE;
    this.logger.info(`Crawl finished in ${this.now() - startTime}ms`);

    return this.resultCollector.snapshot();
  }

  getProgress(): CrawlProgress {
    const { store, frontier } = this.services;
    const domains = store.domains();

    return {
      domains: domains.length,
      activeDomains: this.activeDomains.size,
      pagesVisited: domains.reduce((sum, domain) => sum + store.pagesVisited(domain), 0),
      queuedTasks: frontier.totalSize(),
      inFlight: this.totalInFlight,
      productUrls: domains.reduce((sum, domain) => sum + store.productUrls(domain).length, 0)
    };
  }

  protected onShutdown(): void {
    this.abortController.abort();
    this.workSignal.notify();
  }

  /**
   * Register seed domains, open a fetch session for each and queue the seeds.
   * A domain whose session cannot be opened is marked failed; the others proceed.
   */
  private async prepareDomains(seedTasks: CrawlTask[]): Promise<void> {
    const { store, frontier, fetcher } = this.services;
    const domains = [...new Set(seedTasks.map(task => task.domain))];

    for (const domain of domains) {
      store.ensure(domain);
    }

    await Promise.all(domains.map(async domain => {
      try {
        await fetcher.open(domain);
      } catch (error) {
        this.failDomain(domain, error);
        return;
      }

      if (this.options.respectRobotsTxt) {
        const seedUrl = seedTasks.find(task => task.domain === domain)?.url;
        if (seedUrl) {
          await this.applyRobotsTxt(domain, seedUrl);
        }
      }

      store.setStatus(domain, DomainStatus.RUNNING);
      this.activeDomains.add(domain);
    }));

    for (const task of seedTasks) {
      if (this.activeDomains.has(task.domain)) {
        frontier.push({ ...task, url: UrlUtils.normalize(task.url) });
      }
    }
  }

  private async applyRobotsTxt(domain: string, seedUrl: string): Promise<void> {
    const { robotsTxtService, politeness } = this.services;
    if (!robotsTxtService) {
      return;
    }

    await robotsTxtService.loadRobotsTxt(seedUrl, this.options.userAgent);
    const crawlDelay = robotsTxtService.getCrawlDelay(seedUrl);
    if (crawlDelay !== null && crawlDelay > politeness.getInterval(domain)) {
      politeness.setInterval(domain, crawlDelay);
    }
  }

  private async worker(id: number): Promise<void> {
    this.logger.debug(`Worker ${id} started`);

    while (!this.shutdownRequested) {
      const task = this.claimNextTask();

      if (task) {
        try {
          await this.processTask(task);
        } catch (error) {
          this.logger.error(`Unexpected error processing ${task.url}: ${LoggingUtils.describeError(error)}`);
        } finally {
          this.releaseTask(task);
        }
        continue;
      }

      if (this.activeDomains.size === 0) {
        break;
      }

      await this.workSignal.wait(this.nextWakeDelay());
    }

    // Let idle workers re-check the exit conditions
    this.workSignal.notify();
    this.logger.debug(`Worker ${id} stopped`);
  }

  /**
   * Pick the next dispatchable task, rotating the starting domain on every claim
   */
  private claimNextTask(): CrawlTask | null {
    const domains = [...this.activeDomains];

    for (let offset = 0; offset < domains.length; offset++) {
      const domain = domains[(this.cursor + offset) % domains.length];
      if ((this.inFlight.get(domain) ?? 0) >= this.options.maxConcurrentPerDomain) {
        continue;
      }

      const task = this.popDispatchable(domain);
      if (task) {
        this.cursor = (this.cursor + offset + 1) % domains.length;
        this.inFlight.set(domain, (this.inFlight.get(domain) ?? 0) + 1);
        this.totalInFlight += 1;
        return task;
      }

      this.completeDomainIfIdle(domain);
    }

    return null;
  }

  /**
   * Pop the next ready task, discarding fresh tasks of a capped domain and robots-disallowed URLs
   */
  private popDispatchable(domain: string): CrawlTask | null {
    const { frontier, store, robotsTxtService } = this.services;

    for (let task = frontier.pop(domain, this.now()); task; task = frontier.pop(domain, this.now())) {
      if (task.attempt > 0) {
        return task;
      }

      if (this.isCapped(domain)) {
        store.increment(domain, 'discarded');
        continue;
      }

      if (this.options.respectRobotsTxt && robotsTxtService && !robotsTxtService.isAllowed(task.url)) {
        this.logger.debug(`URL ${task.url} disallowed by robots.txt`);
        store.increment(domain, 'discarded');
        continue;
      }

      return task;
    }

    return null;
  }

  private async processTask(task: CrawlTask): Promise<void> {
    const { store, classifier, politeness } = this.services;
    const { domain, url } = task;

    if (this.shutdownRequested) {
      return;
    }

    // Retries were counted on their first dispatch
    if (task.attempt === 0) {
      const { isProduct } = classifier.classify(url, domain);
      const outcome = store.tryVisit(domain, url, isProduct, this.options.maxPagesPerDomain);

      if (outcome === 'duplicate') {
        this.logger.debug(`Skipping already visited ${url}`);
        return;
      }
      if (outcome === 'capped') {
        store.increment(domain, 'discarded');
        return;
      }
    }

    if (this.shutdownRequested) {
      return;
    }

    const wait = politeness.reserve(domain);
    await DelayUtils.delay(wait, this.abortController.signal);

    if (this.shutdownRequested) {
      this.logger.debug(`Shutdown before fetching ${url}`);
      return;
    }

    const result = await this.fetchPage(url);

    if (result.ok) {
      store.increment(domain, 'fetched');
      this.expandLinks(task, result.html, result.finalUrl);
    } else {
      this.handleFailure(task, result.error);
    }
  }

  private async fetchPage(url: string): Promise<FetchResult> {
    this.logger.info(`Fetching ${url}`);

    try {
      return await this.services.fetcher.fetch(url, {
        userAgent: this.options.userAgent,
        timeout: this.options.fetchTimeoutMs
      });
    } catch (error) {
      return {
        ok: false,
        error: { kind: FetchErrorKind.TRANSPORT_ERROR, message: LoggingUtils.describeError(error) }
      };
    }
  }

  /**
   * Queue the page's unvisited links one level deeper, pagination and listing pages first.
   * Links resolve against `pageUrl`, the URL the page was served from after redirects.
   */
  private expandLinks(task: CrawlTask, html: string, pageUrl: string): void {
    const { store, frontier, classifier, linkExtractor } = this.services;
    const { domain } = task;
    const depth = task.depth + 1;

    if (this.shutdownRequested || depth > this.options.maxDepth || this.isCapped(domain)) {
      return;
    }

    if (!UrlUtils.isSameSite(pageUrl, task.url)) {
      this.logger.debug(`Not following links of ${task.url}: redirected off site to ${pageUrl}`);
      return;
    }

    let links: string[];
    try {
      links = linkExtractor.extract(html, pageUrl);
    } catch (error) {
      this.logger.warn(`Error extracting links from ${pageUrl}: ${LoggingUtils.describeError(error)}`);
      return;
    }

    const candidates = links
      .filter(link => !store.isVisited(domain, link) && !frontier.has(domain, link))
      .map(link => ({ url: link, category: classifier.categorize(link) }))
      .sort((a, b) => CATEGORY_RANK[a.category] - CATEGORY_RANK[b.category])
      .slice(0, this.options.maxLinksPerPage);

    let queued = 0;
    for (const candidate of candidates) {
      if (frontier.push({ url: candidate.url, domain, depth, category: candidate.category, attempt: 0 })) {
        queued += 1;
      }
    }

    this.logger.debug(`Queued ${queued} of ${links.length} links from ${task.url}`);
  }

  private handleFailure(task: CrawlTask, error: FetchError): void {
    const { store, frontier, retryPolicy } = this.services;
    const { domain, url } = task;

    store.increment(domain, isTransientFetchError(error) ? 'transientErrors' : 'fatalErrors');

    if (retryPolicy.shouldRetry(error, task.attempt) && !this.shutdownRequested) {
      const delay = retryPolicy.backoff(task.attempt);
      store.increment(domain, 'retries');
      frontier.requeue({ ...task, attempt: task.attempt + 1 }, this.now() + delay);
      this.logger.warn(`${error.message}; retry ${task.attempt + 1}/${retryPolicy.maxRetries} in ${delay}ms`);
      return;
    }

    store.increment(domain, 'dropped');
    this.logger.warn(`Dropping ${url} after ${task.attempt + 1} attempt(s): ${error.message}`);
  }

  private releaseTask(task: CrawlTask): void {
    const remaining = (this.inFlight.get(task.domain) ?? 1) - 1;
    this.inFlight.set(task.domain, remaining);
    this.totalInFlight -= 1;

    this.completeDomainIfIdle(task.domain);
    this.workSignal.notify();
  }

  private completeDomainIfIdle(domain: string): void {
    // After shutdown, domains are finished as stopped once the workers exit
    if (this.shutdownRequested || !this.activeDomains.has(domain)) {
      return;
    }
    if ((this.inFlight.get(domain) ?? 0) > 0 || this.services.frontier.size(domain) > 0) {
      return;
    }

    const status = this.isCapped(domain) ? DomainStatus.CAPPED : DomainStatus.COMPLETED;
    this.finishDomain(domain, status);

    const { store } = this.services;
    this.logger.info(`Completed crawl of ${domain}. Visited ${store.pagesVisited(domain)} pages, found ${store.productUrls(domain).length} product URLs.`);
  }

  private failDomain(domain: string, error: unknown): void {
    const message = LoggingUtils.describeError(error);
    this.logger.error(`Crawl of ${domain} failed: ${message}`);
    this.services.store.setStatus(domain, DomainStatus.FAILED, message);
    this.services.store.increment(domain, 'discarded', this.services.frontier.clear(domain));
    this.activeDomains.delete(domain);
  }

  /**
   * Domains still active once the workers stop were interrupted by shutdown
   */
  private finishRemainingDomains(): void {
    for (const domain of [...this.activeDomains]) {
      this.services.store.increment(domain, 'discarded', this.services.frontier.clear(domain));
      this.finishDomain(domain, DomainStatus.STOPPED);
    }
  }

  private finishDomain(domain: string, status: DomainStatus): void {
    this.services.store.setStatus(domain, status);
    this.activeDomains.delete(domain);
    this.sessionCloses.push(this.closeSession(domain));
  }

  private async closeSession(domain: string): Promise<void> {
    try {
      await this.services.fetcher.close(domain);
    } catch (error) {
      this.logger.warn(`Error closing fetch session for ${domain}: ${LoggingUtils.describeError(error)}`);
    }
  }

  private isCapped(domain: string): boolean {
    return this.services.store.pagesVisited(domain) >= this.options.maxPagesPerDomain;
  }

  /**
   * Time until the earliest delayed retry of a claimable domain becomes ready,
   * or undefined to wait for a notification. Domains at their in-flight cap are
   * skipped: releasing a task notifies.
   */
  private nextWakeDelay(): number | undefined {
    const now = this.now();
    let earliest: number | undefined;
    for (const domain of this.activeDomains) {
      if ((this.inFlight.get(domain) ?? 0) >= this.options.maxConcurrentPerDomain) {
        continue;
      }
      const readyAt = this.services.frontier.nextReadyAt(domain);
      if (readyAt !== null && readyAt > now && (earliest === undefined || readyAt < earliest)) {
        earliest = readyAt;
      }
    }
    return earliest === undefined ? undefined : earliest - now;
  }
}
