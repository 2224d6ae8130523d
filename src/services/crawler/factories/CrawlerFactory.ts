import { IPageFetcher } from '../interfaces/IPageFetcher';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { CrawlOptions, FetchStrategy } from '../interfaces/types';
import { BrowserFetcherOptions } from '../implementations/BrowserPageFetcher';
import { DefaultLinkExtractor } from '../implementations/DefaultLinkExtractor';
import { ExponentialRetryPolicy } from '../implementations/ExponentialRetryPolicy';
import { FetchOrchestrator } from '../implementations/FetchOrchestrator';
import { InMemoryDomainStateStore } from '../implementations/InMemoryDomainStateStore';
import { IntervalPolitenessController } from '../implementations/IntervalPolitenessController';
import { PatternUrlClassifier } from '../implementations/PatternUrlClassifier';
import { PriorityFrontier } from '../implementations/PriorityFrontier';
import { RobotsTxtService } from '../implementations/RobotsTxtService';
import { ClassificationRuleSet, DEFAULT_CLASSIFICATION_RULES } from '../rules/ClassificationRules';
import { resolveCrawlOptions } from '../utils/OptionsUtils';
import { FetcherStrategyFactory } from './FetcherStrategyFactory';

/**
 * Collaborators that can be swapped when assembling a crawler
 */
export interface CrawlerFactoryOverrides {
  rules?: ClassificationRuleSet;
  /** Defaults to plain HTTP */
  strategy?: FetchStrategy;
  /** Used instead of the fetcher selected by `strategy` */
  fetcher?: IPageFetcher;
  browser?: BrowserFetcherOptions;
  robotsTxtService?: IRobotsTxtService;
  now?: () => number;
  random?: () => number;
}

/**
 * Wire a product crawler with in-memory state and the default components
 * @throws ConfigurationError when the options are invalid
 */
export function createProductCrawler(
  options: Partial<CrawlOptions> = {},
  overrides: CrawlerFactoryOverrides = {}
): FetchOrchestrator {
  const resolved = resolveCrawlOptions(options);
  const now = overrides.now ?? Date.now;

  const store = new InMemoryDomainStateStore();
  const fetcher = overrides.fetcher ?? new FetcherStrategyFactory(overrides.browser).create(overrides.strategy ?? 'http');

  return new FetchOrchestrator(
    {
      store,
      frontier: new PriorityFrontier(store, { maxDepth: resolved.maxDepth, maxSize: resolved.maxFrontierSize, now }),
      classifier: new PatternUrlClassifier(overrides.rules ?? DEFAULT_CLASSIFICATION_RULES),
      politeness: new IntervalPolitenessController(store, {
        intervalMs: resolved.requestIntervalMs,
        jitterMs: resolved.requestJitterMs,
        random: overrides.random,
        now
      }),
      fetcher,
      linkExtractor: new DefaultLinkExtractor(),
      retryPolicy: new ExponentialRetryPolicy(resolved.maxRetries, resolved.retryBaseDelayMs, resolved.retryMaxDelayMs),
      robotsTxtService: resolved.respectRobotsTxt ? overrides.robotsTxtService ?? new RobotsTxtService() : undefined,
      now
    },
    resolved
  );
}
