export { ProductDiscoveryService, buildSeedTasks } from './services/product-discovery.service';
export { createProductCrawler, CrawlerFactoryOverrides } from './services/crawler/factories/CrawlerFactory';
export { FetcherStrategyFactory } from './services/crawler/factories/FetcherStrategyFactory';
export { FetchOrchestrator } from './services/crawler/implementations/FetchOrchestrator';
export { BaseCrawler, CrawlerServices } from './services/crawler/implementations/BaseCrawler';
export { PatternUrlClassifier } from './services/crawler/implementations/PatternUrlClassifier';
export { PriorityFrontier, FrontierOptions } from './services/crawler/implementations/PriorityFrontier';
export { InMemoryDomainStateStore } from './services/crawler/implementations/InMemoryDomainStateStore';
export { IntervalPolitenessController, PolitenessOptions } from './services/crawler/implementations/IntervalPolitenessController';
export { ExponentialRetryPolicy, isTransientFetchError } from './services/crawler/implementations/ExponentialRetryPolicy';
export { DefaultLinkExtractor } from './services/crawler/implementations/DefaultLinkExtractor';
export { HttpPageFetcher } from './services/crawler/implementations/HttpPageFetcher';
export { BrowserPageFetcher, BrowserFetcherOptions } from './services/crawler/implementations/BrowserPageFetcher';
export { RobotsTxtService } from './services/crawler/implementations/RobotsTxtService';
export { ResultCollector } from './services/crawler/implementations/ResultCollector';
export { ResultWriter } from './services/crawler/implementations/ResultWriter';
export {
  ClassificationRuleSet,
  DEFAULT_CLASSIFICATION_RULES,
  loadClassificationRules,
  parseClassificationRules
} from './services/crawler/rules/ClassificationRules';
export { DEFAULT_CRAWL_OPTIONS, resolveCrawlOptions } from './services/crawler/utils/OptionsUtils';
export { CrawlerError, ConfigurationError, FetcherInitError } from './services/crawler/errors';
export * from './services/crawler/interfaces/types';
export { ICrawler } from './services/crawler/interfaces/ICrawler';
export { IDomainStateStore } from './services/crawler/interfaces/IDomainStateStore';
export { IFrontier } from './services/crawler/interfaces/IFrontier';
export { ILinkExtractor } from './services/crawler/interfaces/ILinkExtractor';
export { IPageFetcher } from './services/crawler/interfaces/IPageFetcher';
export { IPolitenessController } from './services/crawler/interfaces/IPolitenessController';
export { IResultCollector } from './services/crawler/interfaces/IResultCollector';
export { IRetryPolicy } from './services/crawler/interfaces/IRetryPolicy';
export { IRobotsTxtService } from './services/crawler/interfaces/IRobotsTxtService';
export { IUrlClassifier } from './services/crawler/interfaces/IUrlClassifier';
