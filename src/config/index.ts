import * as dotenv from 'dotenv';
import { z } from 'zod';
import logger from '../utils/logger';
import { CrawlOptions, FetchStrategy } from '../services/crawler/interfaces/types';
import { resolveCrawlOptions } from '../services/crawler/utils/OptionsUtils';
import { ConfigurationError } from '../services/crawler/errors';
import { LoggingUtils } from '../services/crawler/utils/LoggingUtils';

// Load environment variables always
const result = dotenv.config();
if (result.error) {
  logger.debug(`No .env file loaded: ${result.error.message}`);
} else {
  logger.debug('Environment variables loaded from .env file');
}

type Env = Record<string, string | undefined>;

export interface AppConfig {
  projectName: string;
  projectVersion: string;
  crawl: CrawlOptions;
  fetchStrategy: FetchStrategy;
  browser: {
    executablePath?: string;
  };
  /** JSON file replacing the bundled classification rules */
  rulesPath?: string;
  outputPath: string;
  logging: {
    level: string;
    /** Crawler log tags to silence, e.g. frontier */
    mutedTags: string[];
  };
}

const fetchStrategySchema = z.enum(['http', 'browser']);

const numberFromEnv = (env: Env, name: string): number | undefined => {
  const raw = env[name];
  return raw === undefined || raw.trim() === '' ? undefined : Number(raw);
};

const booleanFromEnv = (env: Env, name: string): boolean | undefined => {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return undefined;
  }
  return raw === 'true' || raw === '1' || raw === 'yes';
};

/**
 * Build the application configuration from environment variables
 * @throws ConfigurationError when a variable holds an invalid value
 */
export function buildConfig(env: Env = process.env): AppConfig {
  const crawl = resolveCrawlOptions({
    maxPagesPerDomain: numberFromEnv(env, 'CRAWL_MAX_PAGES_PER_DOMAIN'),
    maxDepth: numberFromEnv(env, 'CRAWL_MAX_DEPTH'),
    maxConcurrency: numberFromEnv(env, 'CRAWL_MAX_CONCURRENCY'),
    maxConcurrentPerDomain: numberFromEnv(env, 'CRAWL_MAX_CONCURRENT_PER_DOMAIN'),
    requestIntervalMs: numberFromEnv(env, 'CRAWL_REQUEST_INTERVAL_MS'),
    requestJitterMs: numberFromEnv(env, 'CRAWL_REQUEST_JITTER_MS'),
    maxRetries: numberFromEnv(env, 'CRAWL_MAX_RETRIES'),
    retryBaseDelayMs: numberFromEnv(env, 'CRAWL_RETRY_BASE_DELAY_MS'),
    retryMaxDelayMs: numberFromEnv(env, 'CRAWL_RETRY_MAX_DELAY_MS'),
    maxLinksPerPage: numberFromEnv(env, 'CRAWL_MAX_LINKS_PER_PAGE'),
    maxFrontierSize: numberFromEnv(env, 'CRAWL_MAX_FRONTIER_SIZE'),
    fetchTimeoutMs: numberFromEnv(env, 'CRAWL_FETCH_TIMEOUT_MS'),
    userAgent: env.CRAWL_USER_AGENT || undefined,
    respectRobotsTxt: booleanFromEnv(env, 'CRAWL_RESPECT_ROBOTS_TXT')
  });

  const strategy = fetchStrategySchema.safeParse(env.CRAWL_FETCH_STRATEGY || 'http');
  if (!strategy.success) {
    throw new ConfigurationError(`Invalid CRAWL_FETCH_STRATEGY: ${env.CRAWL_FETCH_STRATEGY}`, ['fetchStrategy: expected http or browser']);
  }

  return {
    projectName: env.PROJECT_NAME || 'product-url-crawler',
    projectVersion: env.PROJECT_VERSION || '1.0.0',
    crawl,
    fetchStrategy: strategy.data,
    browser: {
      executablePath: env.BROWSER_EXECUTABLE_PATH || undefined
    },
    rulesPath: env.CRAWL_RULES_PATH || undefined,
    outputPath: env.CRAWL_OUTPUT_PATH || 'product_urls.json',
    logging: {
      level: env.LOG_LEVEL || 'info',
      mutedTags: (env.LOG_MUTED_TAGS ?? '').split(',').map(tag => tag.trim()).filter(tag => tag !== '')
    }
  };
}

const config = buildConfig();
logger.level = config.logging.level;
LoggingUtils.muteTags(config.logging.mutedTags);

export default config;
