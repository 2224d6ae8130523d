import { z } from 'zod';
import { CrawlOptions } from '../interfaces/types';
import { ConfigurationError } from '../errors';

/**
 * Schema of fully resolved crawl options
 */
export const crawlOptionsSchema = z.object({
  maxPagesPerDomain: z.number().int().positive().describe('Maximum pages visited per domain'),
  maxDepth: z.number().int().nonnegative().describe('Maximum link depth from the seed'),
  maxConcurrency: z.number().int().positive().describe('Worker pool size'),
  maxConcurrentPerDomain: z.number().int().positive().describe('In-flight fetches per domain'),
  requestIntervalMs: z.number().nonnegative().describe('Milliseconds between requests to one domain'),
  requestJitterMs: z.number().nonnegative().describe('Upper bound of random extra delay'),
  maxRetries: z.number().int().nonnegative().describe('Retries after a transient fetch error'),
  retryBaseDelayMs: z.number().nonnegative(),
  retryMaxDelayMs: z.number().nonnegative(),
  maxLinksPerPage: z.number().int().positive().describe('Links queued from a single page'),
  maxFrontierSize: z.number().int().positive().describe('Queued tasks per domain'),
  fetchTimeoutMs: z.number().int().positive(),
  userAgent: z.string().min(1),
  respectRobotsTxt: z.boolean()
}).refine(options => options.retryMaxDelayMs >= options.retryBaseDelayMs, {
  message: 'retryMaxDelayMs must not be lower than retryBaseDelayMs',
  path: ['retryMaxDelayMs']
}) satisfies z.ZodType<CrawlOptions>;

export const DEFAULT_CRAWL_OPTIONS: Readonly<CrawlOptions> = {
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
};

/**
 * Merge option overrides onto a base and validate the result.
 * Overrides that are `undefined` leave the base value in place.
 * @throws ConfigurationError when a value is out of range
 */
export function resolveCrawlOptions(
  overrides: Partial<CrawlOptions> = {},
  base: Readonly<CrawlOptions> = DEFAULT_CRAWL_OPTIONS
): CrawlOptions {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const parsed = crawlOptionsSchema.safeParse({ ...base, ...defined });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid crawl options: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}
