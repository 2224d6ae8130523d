import logger from '../utils/logger';
import { createProductCrawler, CrawlerFactoryOverrides } from './crawler/factories/CrawlerFactory';
import { FetchOrchestrator } from './crawler/implementations/FetchOrchestrator';
import { PatternUrlClassifier } from './crawler/implementations/PatternUrlClassifier';
import { IUrlClassifier } from './crawler/interfaces/IUrlClassifier';
import { CrawlOptions, CrawlResult, CrawlTask, DomainReport } from './crawler/interfaces/types';
import { DEFAULT_CLASSIFICATION_RULES } from './crawler/rules/ClassificationRules';
import { UrlUtils } from './crawler/utils/UrlUtils';

/**
 * Turn domains such as `shop.com` or `https://www.shop.com/sale` into depth-0 seed tasks.
 * Entries that do not form a valid http(s) URL are skipped; duplicates are kept once.
 */
export function buildSeedTasks(domains: string[], classifier: IUrlClassifier): CrawlTask[] {
  const seen = new Set<string>();
  const seeds: CrawlTask[] = [];

  for (const entry of domains) {
    if (entry.trim() === '') {
      continue;
    }

    const url = UrlUtils.normalize(UrlUtils.toSeedUrl(entry));
    const domain = UrlUtils.extractDomain(url);
    if (domain === null || !UrlUtils.isValid(url)) {
      logger.warn(`Skipping invalid seed: ${entry}`);
      continue;
    }
    if (seen.has(domain)) {
      continue;
    }

    seen.add(domain);
    seeds.push({ url, domain, depth: 0, category: classifier.categorize(url), attempt: 0 });
  }

  return seeds;
}

/**
 * Discovers product URLs on a set of e-commerce domains
 */
export class ProductDiscoveryService {
  private readonly crawler: FetchOrchestrator;
  private readonly classifier: IUrlClassifier;

  /**
   * @throws ConfigurationError when the options are invalid
   */
  constructor(options: Partial<CrawlOptions> = {}, overrides: CrawlerFactoryOverrides = {}) {
    this.classifier = new PatternUrlClassifier(overrides.rules ?? DEFAULT_CLASSIFICATION_RULES);
    this.crawler = createProductCrawler(options, overrides);
  }

  /**
   * Crawl every domain and return its product URLs, keyed by hostname
   */
  async discover(domains: string[]): Promise<CrawlResult> {
    const seeds = buildSeedTasks(domains, this.classifier);
    if (seeds.length === 0) {
      logger.warn('No valid domains to crawl');
      return {};
    }

    logger.info(`Starting product discovery for: ${seeds.map(seed => seed.domain).join(', ')}`, {
      maxPagesPerDomain: this.crawler.getOptions().maxPagesPerDomain,
      maxDepth: this.crawler.getOptions().maxDepth,
      maxConcurrency: this.crawler.getOptions().maxConcurrency
    });

    const result = await this.crawler.run(seeds);

    for (const report of this.crawler.getDomainReports()) {
      logger.info(`${report.domain}: Found ${report.productCount} product URLs (${report.pagesVisited} pages, ${report.status})`);
    }

    return result;
  }

  /**
   * Stop the running discovery; `discover` then resolves with the partial result
   */
  shutdown(): void {
    this.crawler.shutdown();
  }

  getDomainReports(): DomainReport[] {
    return this.crawler.getDomainReports();
  }

  getCrawler(): FetchOrchestrator {
    return this.crawler;
  }
}
