import { createProductCrawler } from '../../factories/CrawlerFactory';
import { FetchOrchestrator } from '../FetchOrchestrator';
import { SyntheticSiteMock } from '../../test-utils/mocks/SyntheticSiteMock';
import { WorkSignal } from '../../utils/WorkSignal';
import { IRobotsTxtService } from '../../interfaces/IRobotsTxtService';
import { CrawlOptions, CrawlTask, CrawlerState, DomainStatus, FetchErrorKind, UrlCategory } from '../../interfaces/types';

const SHOP = 'https://shop.test';

const seed = (origin: string): CrawlTask => ({
  url: origin,
  domain: new URL(origin).hostname,
  depth: 0,
  category: UrlCategory.NORMAL,
  attempt: 0
});

const fastOptions: Partial<CrawlOptions> = {
  requestIntervalMs: 0,
  retryBaseDelayMs: 1,
  retryMaxDelayMs: 5
};

const crawlerFor = (site: SyntheticSiteMock, options: Partial<CrawlOptions> = {}): FetchOrchestrator =>
  createProductCrawler({ ...fastOptions, ...options }, { fetcher: site });

describe('FetchOrchestrator', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('deduplication', () => {
    it('should fetch every URL of a cyclic link graph exactly once', async () => {
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: ['/a', '/b', '/a#reviews'] },
        { path: '/a', links: ['/', '/b'] },
        { path: '/b', links: ['/a', '/'] }
      ]);

      await crawlerFor(site).run([seed(SHOP)]);

      expect(site.fetches).toHaveLength(3);
      expect(site.fetchCount(SHOP)).toBe(1);
      expect(site.fetchCount(`${SHOP}/a`)).toBe(1);
      expect(site.fetchCount(`${SHOP}/b`)).toBe(1);
    });

    it('should fetch a URL linked from pages crawled in parallel only once', async () => {
      const site = new SyntheticSiteMock({ responseDelay: 5 }).addSite(SHOP, [
        { path: '/', links: ['/a', '/b', '/c'] },
        { path: '/a', links: ['/shared', '/b', '/c'] },
        { path: '/b', links: ['/shared', '/a'] },
        { path: '/c', links: ['/shared', '/a', '/b'] },
        { path: '/shared', links: ['/', '/a'] }
      ]);

      await crawlerFor(site, { maxConcurrency: 4, maxConcurrentPerDomain: 3 }).run([seed(SHOP)]);

      expect(site.peakConcurrency).toBeGreaterThan(1);
      expect(site.fetches).toHaveLength(5);
      for (const path of ['', '/a', '/b', '/c', '/shared']) {
        expect(site.fetchCount(`${SHOP}${path}`)).toBe(1);
      }
    });

    it('should record a product URL once even when linked from many pages', async () => {
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: ['/product/red-dress', '/a'] },
        { path: '/a', links: ['/product/red-dress'] },
        { path: '/product/red-dress', links: ['/product/red-dress'] }
      ]);

      const result = await crawlerFor(site).run([seed(SHOP)]);

      expect(result).toEqual({ 'shop.test': [`${SHOP}/product/red-dress`] });
    });
  });

  describe('bounds', () => {
    it('should never fetch pages deeper than maxDepth', async () => {
      const site = new SyntheticSiteMock().addChain(SHOP, 5);

      const crawler = crawlerFor(site, { maxDepth: 3 });
      const result = await crawler.run([seed(SHOP)]);

      expect(site.fetchedUrls()).toEqual([SHOP, `${SHOP}/level-1`, `${SHOP}/level-2`, `${SHOP}/level-3`]);
      expect(result['shop.test']).toEqual([`${SHOP}/level-1`, `${SHOP}/level-2`, `${SHOP}/level-3`]);
    });

    it('should stop at maxPagesPerDomain and report the domain as capped', async () => {
      const pages = Array.from({ length: 20 }, (_, index) => `/page-${index + 1}`);
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: pages },
        ...pages.map(path => ({ path }))
      ]);

      const crawler = crawlerFor(site, { maxPagesPerDomain: 10 });
      await crawler.run([seed(SHOP)]);

      const [report] = crawler.getDomainReports();
      expect(site.fetches).toHaveLength(10);
      expect(report.pagesVisited).toBe(10);
      expect(report.status).toBe(DomainStatus.CAPPED);
      expect(report.stats.discarded).toBe(11);
    });

    it('should expand at most maxLinksPerPage links of a page', async () => {
      const pages = Array.from({ length: 8 }, (_, index) => `/page-${index + 1}`);
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: pages },
        ...pages.map(path => ({ path }))
      ]);

      await crawlerFor(site, { maxLinksPerPage: 3 }).run([seed(SHOP)]);

      expect(site.fetchedUrls()).toEqual([SHOP, `${SHOP}/page-1`, `${SHOP}/page-2`, `${SHOP}/page-3`]);
    });
  });

  describe('ordering', () => {
    it('should fetch pagination links before listing pages before other pages', async () => {
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: ['/item-a', '/category/shoes', '/listing?page=2'] },
        { path: '/item-a' },
        { path: '/category/shoes' },
        { path: '/listing?page=2' }
      ]);

      await crawlerFor(site).run([seed(SHOP)]);

      expect(site.fetchedUrls()).toEqual([
        SHOP,
        `${SHOP}/listing?page=2`,
        `${SHOP}/category/shoes`,
        `${SHOP}/item-a`
      ]);
    });
  });

  describe('failures', () => {
    it('should attempt a page that keeps timing out maxRetries + 1 times', async () => {
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: ['/flaky'] },
        { path: '/flaky', error: { kind: FetchErrorKind.TIMEOUT, message: 'Timed out' } }
      ]);

      const crawler = crawlerFor(site, { maxRetries: 2 });
      await crawler.run([seed(SHOP)]);

      const [report] = crawler.getDomainReports();
      expect(site.fetchCount(`${SHOP}/flaky`)).toBe(3);
      expect(report.stats).toMatchObject({ transientErrors: 3, retries: 2, dropped: 1, fatalErrors: 0 });
      expect(report.pagesVisited).toBe(2);
    });

    it('should not retry a page answering 404', async () => {
      const site = new SyntheticSiteMock().addSite(SHOP, [{ path: '/', links: ['/missing'] }]);

      const crawler = crawlerFor(site, { maxRetries: 3 });
      await crawler.run([seed(SHOP)]);

      const [report] = crawler.getDomainReports();
      expect(site.fetchCount(`${SHOP}/missing`)).toBe(1);
      expect(report.stats).toMatchObject({ fatalErrors: 1, retries: 0, dropped: 1 });
    });

    it('should follow the links of a page that succeeds on retry', async () => {
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: ['/listing'] },
        {
          path: '/listing',
          links: ['/product/blue-shirt'],
          error: { kind: FetchErrorKind.HTTP_ERROR, status: 503, message: 'HTTP 503' },
          failTimes: 1
        },
        { path: '/product/blue-shirt' }
      ]);

      const result = await crawlerFor(site).run([seed(SHOP)]);

      expect(site.fetchCount(`${SHOP}/listing`)).toBe(2);
      expect(result['shop.test']).toEqual([`${SHOP}/product/blue-shirt`]);
    });

    it('should treat an exception thrown by the fetcher as a transient failure', async () => {
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: ['/reset'] },
        { path: '/reset', throws: true }
      ]);

      const crawler = crawlerFor(site, { maxRetries: 1 });
      await expect(crawler.run([seed(SHOP)])).resolves.toEqual({ 'shop.test': [] });

      expect(site.fetchCount(`${SHOP}/reset`)).toBe(2);
      expect(crawler.getDomainReports()[0].stats.transientErrors).toBe(2);
    });

    it('should mark a domain failed when its fetch session cannot be opened and crawl the others', async () => {
      const site = new SyntheticSiteMock({ failingDomains: ['broken.test'] })
        .addSite(SHOP, [{ path: '/', links: ['/product/red-dress'] }, { path: '/product/red-dress' }]);

      const crawler = crawlerFor(site);
      const result = await crawler.run([seed(SHOP), seed('https://broken.test')]);

      expect(result).toEqual({
        'shop.test': [`${SHOP}/product/red-dress`],
        'broken.test': []
      });

      const broken = crawler.getDomainReports().find(report => report.domain === 'broken.test');
      expect(broken?.status).toBe(DomainStatus.FAILED);
      expect(broken?.error).toBe('Cannot open session for broken.test');
      expect(site.fetches.some(record => record.url.startsWith('https://broken.test'))).toBe(false);
    });
  });

  describe('concurrency', () => {
    it('should keep at most maxConcurrentPerDomain fetches in flight per domain', async () => {
      const site = new SyntheticSiteMock({ responseDelay: 5 }).addChain(SHOP, 3).addChain('https://other.test', 3);

      await crawlerFor(site, { maxConcurrency: 4, maxConcurrentPerDomain: 1 }).run([seed(SHOP), seed('https://other.test')]);

      expect(site.fetches).toHaveLength(8);
      expect(site.peakConcurrency).toBeLessThanOrEqual(2);
    });

    it('should keep idle workers suspended while the only domain is at its in-flight cap', async () => {
      const wait = jest.spyOn(WorkSignal.prototype, 'wait');
      const pages = Array.from({ length: 5 }, (_, index) => `/page-${index + 1}`);
      const site = new SyntheticSiteMock({ responseDelay: 20 }).addSite(SHOP, [
        { path: '/', links: pages },
        ...pages.map(path => ({ path }))
      ]);

      await crawlerFor(site, { maxConcurrency: 4, maxConcurrentPerDomain: 1 }).run([seed(SHOP)]);

      expect(site.fetches).toHaveLength(6);
      expect(wait.mock.calls.length).toBeLessThan(50);
      expect(wait.mock.calls.every(([timeoutMs]) => timeoutMs === undefined)).toBe(true);
    });

    it('should space requests to one domain by the politeness interval', async () => {
      const site = new SyntheticSiteMock().addChain(SHOP, 2);

      await crawlerFor(site, { requestIntervalMs: 30 }).run([seed(SHOP)]);

      const starts = site.fetches.map(record => record.startedAt);
      expect(starts).toHaveLength(3);
      expect(starts[1] - starts[0]).toBeGreaterThanOrEqual(25);
      expect(starts[2] - starts[1]).toBeGreaterThanOrEqual(25);
    });
  });

  describe('redirects', () => {
    it('should resolve relative links against the URL a page was redirected to', async () => {
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: ['/old/list'] },
        { path: '/old/list', redirectTo: '/new/list', links: ['item-123'] },
        { path: '/new/item-123' }
      ]);

      await crawlerFor(site).run([seed(SHOP)]);

      expect(site.fetchedUrls()).toEqual([SHOP, `${SHOP}/old/list`, `${SHOP}/new/item-123`]);
    });

    it('should not follow links of a page redirected to another site', async () => {
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: ['/moved'] },
        { path: '/moved', redirectTo: 'https://elsewhere.test/', links: ['/product/red-dress'] },
        { path: '/product/red-dress' }
      ]);

      await crawlerFor(site).run([seed(SHOP)]);

      expect(site.fetchedUrls()).toEqual([SHOP, `${SHOP}/moved`]);
    });
  });

  describe('robots.txt', () => {
    it('should skip disallowed URLs when respectRobotsTxt is set', async () => {
      const robotsTxtService: IRobotsTxtService = {
        loadRobotsTxt: jest.fn().mockResolvedValue(undefined),
        isAllowed: jest.fn((url: string) => !url.includes('/private')),
        getCrawlDelay: jest.fn().mockReturnValue(null)
      };
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: ['/private/product/secret', '/product/public'] },
        { path: '/private/product/secret' },
        { path: '/product/public' }
      ]);

      const crawler = createProductCrawler({ ...fastOptions, respectRobotsTxt: true }, { fetcher: site, robotsTxtService });
      const result = await crawler.run([seed(SHOP)]);

      expect(robotsTxtService.loadRobotsTxt).toHaveBeenCalledWith(SHOP, 'ProductUrlCrawler/1.0');
      expect(site.fetchCount(`${SHOP}/private/product/secret`)).toBe(0);
      expect(result['shop.test']).toEqual([`${SHOP}/product/public`]);
      expect(crawler.getDomainReports()[0].stats.discarded).toBe(1);
    });
  });

  describe('lifecycle', () => {
    it('should return equal but independent snapshots', async () => {
      const site = new SyntheticSiteMock().addSite(SHOP, [
        { path: '/', links: ['/product/red-dress'] },
        { path: '/product/red-dress' }
      ]);

      const crawler = crawlerFor(site);
      await crawler.run([seed(SHOP)]);

      const first = crawler.snapshot();
      const second = crawler.snapshot();
      expect(second).toEqual(first);
      expect(second['shop.test']).not.toBe(first['shop.test']);
    });

    it('should stop dispatching after shutdown and return the partial result', async () => {
      let crawler: FetchOrchestrator | undefined;
      const site = new SyntheticSiteMock({
        onFetch: url => {
          if (url === `${SHOP}/level-2`) {
            crawler?.shutdown();
          }
        }
      }).addChain(SHOP, 10);

      crawler = crawlerFor(site, { maxDepth: 20 });
      const result = await crawler.run([seed(SHOP)]);

      expect(site.fetchedUrls()).toEqual([SHOP, `${SHOP}/level-1`, `${SHOP}/level-2`]);
      expect(result['shop.test']).toEqual([`${SHOP}/level-1`, `${SHOP}/level-2`]);
      expect(crawler.getState()).toBe(CrawlerState.STOPPED);
      expect(crawler.getDomainReports()[0].status).toBe(DomainStatus.STOPPED);
    });

    it('should cut a politeness wait short on shutdown', async () => {
      let crawler: FetchOrchestrator | undefined;
      const site = new SyntheticSiteMock({
        onFetch: url => {
          if (url === SHOP) {
            setTimeout(() => crawler?.shutdown(), 20);
          }
        }
      }).addChain(SHOP, 3);

      crawler = crawlerFor(site, { requestIntervalMs: 10000 });
      const startedAt = Date.now();
      const result = await crawler.run([seed(SHOP)]);

      expect(Date.now() - startedAt).toBeLessThan(2000);
      expect(site.fetchedUrls()).toEqual([SHOP]);
      // level-1 was visited and classified before its politeness wait began
      expect(result).toEqual({ 'shop.test': [`${SHOP}/level-1`] });
      expect(crawler.getDomainReports()[0].status).toBe(DomainStatus.STOPPED);
    });

    it('should close every session and clean up the fetcher', async () => {
      const site = new SyntheticSiteMock().addChain(SHOP, 1).addChain('https://other.test', 1);

      const crawler = crawlerFor(site);
      await crawler.run([seed(SHOP), seed('https://other.test')]);

      expect([...site.closed].sort()).toEqual(['other.test', 'shop.test']);
      expect(site.cleanedUp).toBe(true);
      expect(crawler.getState()).toBe(CrawlerState.IDLE);
      expect(crawler.getProgress()).toEqual({
        domains: 2,
        activeDomains: 0,
        pagesVisited: 4,
        queuedTasks: 0,
        inFlight: 0,
        productUrls: 2
      });
    });

    it('should ignore shutdown when no crawl is running', () => {
      const crawler = crawlerFor(new SyntheticSiteMock());

      crawler.shutdown();

      expect(crawler.getState()).toBe(CrawlerState.IDLE);
    });
  });
});
