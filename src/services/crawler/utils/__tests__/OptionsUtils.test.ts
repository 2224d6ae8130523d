import { ConfigurationError } from '../../errors';
import { DEFAULT_CRAWL_OPTIONS, resolveCrawlOptions } from '../OptionsUtils';

describe('resolveCrawlOptions', () => {
  it('should return the defaults without overrides', () => {
    expect(resolveCrawlOptions()).toEqual({
      maxPagesPerDomain: 100,
      maxDepth: 3,
      maxConcurrency: 4,
      maxConcurrentPerDomain: 1,
      requestIntervalMs: 1000,
      requestJitterMs: 0,
      maxRetries: 3,
      retryBaseDelayMs: 1000,
      retryMaxDelayMs: 10000,
      maxLinksPerPage: 50,
      maxFrontierSize: 10000,
      fetchTimeoutMs: 30000,
      userAgent: 'ProductUrlCrawler/1.0',
      respectRobotsTxt: false
    });
  });

  it('should apply defined overrides and ignore undefined ones', () => {
    const options = resolveCrawlOptions({ maxDepth: 5, maxRetries: undefined });

    expect(options.maxDepth).toBe(5);
    expect(options.maxRetries).toBe(DEFAULT_CRAWL_OPTIONS.maxRetries);
  });

  it('should allow a depth of zero', () => {
    expect(resolveCrawlOptions({ maxDepth: 0 }).maxDepth).toBe(0);
  });

  it.each([
    [{ maxPagesPerDomain: 0 }, 'maxPagesPerDomain'],
    [{ maxConcurrency: 1.5 }, 'maxConcurrency'],
    [{ requestIntervalMs: -1 }, 'requestIntervalMs'],
    [{ maxDepth: Number.NaN }, 'maxDepth'],
    [{ userAgent: '' }, 'userAgent']
  ])('should reject %o', (overrides, field) => {
    expect(() => resolveCrawlOptions(overrides)).toThrow(ConfigurationError);
    expect(() => resolveCrawlOptions(overrides)).toThrow(field);
  });

  it('should reject a maximum backoff below the base backoff', () => {
    expect(() => resolveCrawlOptions({ retryBaseDelayMs: 2000, retryMaxDelayMs: 1000 }))
      .toThrow('retryMaxDelayMs: retryMaxDelayMs must not be lower than retryBaseDelayMs');
  });
});
