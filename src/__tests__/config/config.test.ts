import { buildConfig } from '../../config';
import { ConfigurationError } from '../../services/crawler/errors';

describe('buildConfig', () => {
  it('should fall back to the defaults for an empty environment', () => {
    const config = buildConfig({});

    expect(config.crawl.maxPagesPerDomain).toBe(100);
    expect(config.crawl.requestIntervalMs).toBe(1000);
    expect(config.fetchStrategy).toBe('http');
    expect(config.outputPath).toBe('product_urls.json');
    expect(config.rulesPath).toBeUndefined();
    expect(config.logging).toEqual({ level: 'info', mutedTags: [] });
  });

  it('should read crawl options from the environment', () => {
    const config = buildConfig({
      CRAWL_MAX_PAGES_PER_DOMAIN: '25',
      CRAWL_MAX_DEPTH: '0',
      CRAWL_REQUEST_INTERVAL_MS: '2500',
      CRAWL_USER_AGENT: 'TestBot/1.0',
      CRAWL_RESPECT_ROBOTS_TXT: 'TRUE',
      CRAWL_FETCH_STRATEGY: 'browser',
      BROWSER_EXECUTABLE_PATH: '/opt/chromium/chrome',
      CRAWL_RULES_PATH: 'rules.json',
      LOG_LEVEL: 'debug',
      LOG_MUTED_TAGS: 'frontier, politeness,'
    });

    expect(config.crawl).toMatchObject({
      maxPagesPerDomain: 25,
      maxDepth: 0,
      requestIntervalMs: 2500,
      userAgent: 'TestBot/1.0',
      respectRobotsTxt: true
    });
    expect(config.fetchStrategy).toBe('browser');
    expect(config.browser.executablePath).toBe('/opt/chromium/chrome');
    expect(config.rulesPath).toBe('rules.json');
    expect(config.logging).toEqual({ level: 'debug', mutedTags: ['frontier', 'politeness'] });
  });

  it('should treat blank variables as unset', () => {
    expect(buildConfig({ CRAWL_MAX_DEPTH: ' ', CRAWL_USER_AGENT: '' }).crawl).toMatchObject({
      maxDepth: 3,
      userAgent: 'ProductUrlCrawler/1.0'
    });
  });

  it('should reject values that are not numbers', () => {
    expect(() => buildConfig({ CRAWL_MAX_RETRIES: 'many' })).toThrow(ConfigurationError);
  });

  it('should reject an unknown fetch strategy', () => {
    expect(() => buildConfig({ CRAWL_FETCH_STRATEGY: 'carrier-pigeon' }))
      .toThrow('Invalid CRAWL_FETCH_STRATEGY: carrier-pigeon');
  });
});
