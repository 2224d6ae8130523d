/**
 * Common types and enums for the crawler service
 */

/**
 * Listing-page category of a URL. Determines dispatch order inside a domain.
 */
export enum UrlCategory {
  PAGINATION = 'pagination',
  PRIORITY = 'priority',
  NORMAL = 'normal'
}

/**
 * Dispatch rank of each category, lowest first
 */
export const CATEGORY_RANK: Readonly<Record<UrlCategory, number>> = {
  [UrlCategory.PAGINATION]: 0,
  [UrlCategory.PRIORITY]: 1,
  [UrlCategory.NORMAL]: 2
};

/**
 * Categories in dispatch order
 */
export const CATEGORIES_BY_RANK: readonly UrlCategory[] = [
  UrlCategory.PAGINATION,
  UrlCategory.PRIORITY,
  UrlCategory.NORMAL
];

/**
 * A unit of crawl work. Identity is (domain, normalized url).
 */
export interface CrawlTask {
  readonly url: string;
  readonly domain: string;
  readonly depth: number;
  readonly category: UrlCategory;
  /** Number of failed fetch attempts before this one */
  readonly attempt: number;
}

/**
 * Result of URL classification
 */
export interface Classification {
  isProduct: boolean;
  category: UrlCategory;
}

/**
 * Kinds of fetch failure reported by a page fetcher
 */
export enum FetchErrorKind {
  TIMEOUT = 'timeout',
  HTTP_ERROR = 'http_error',
  TRANSPORT_ERROR = 'transport_error',
  NON_HTML_CONTENT = 'non_html_content',
  INVALID_URL = 'invalid_url'
}

export interface FetchError {
  kind: FetchErrorKind;
  message: string;
  /** HTTP status, when the server answered */
  status?: number;
}

export type FetchResult =
  | { ok: true; html: string; status: number; finalUrl: string }
  | { ok: false; error: FetchError };

/**
 * Per-request options passed to a page fetcher
 */
export interface FetchOptions {
  userAgent?: string;
  timeout?: number;
}

export type FetchStrategy = 'http' | 'browser';

/**
 * Lifecycle of a single domain's crawl
 */
export enum DomainStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  CAPPED = 'capped',
  FAILED = 'failed',
  STOPPED = 'stopped'
}

/**
 * Counters recorded while crawling a domain
 */
export interface DomainStats {
  /** Successful fetches */
  fetched: number;
  transientErrors: number;
  fatalErrors: number;
  /** Retries scheduled after transient errors */
  retries: number;
  /** Tasks given up on after a fatal error or exhausted retries */
  dropped: number;
  /** Queued tasks thrown away by a bound (page cap, robots.txt, frontier capacity, failed domain) */
  discarded: number;
}

/**
 * Read-only view of a domain's crawl state
 */
export interface DomainReport {
  domain: string;
  status: DomainStatus;
  pagesVisited: number;
  productCount: number;
  stats: DomainStats;
  error: string | null;
}

/**
 * Mapping of domain to the product URLs found on it, in discovery order
 */
export type CrawlResult = Record<string, string[]>;

/**
 * Outcome of the atomic visit step for a URL
 */
export type VisitOutcome = 'visited' | 'duplicate' | 'capped';

/**
 * Options for crawling
 */
export interface CrawlOptions {
  maxPagesPerDomain: number;
  maxDepth: number;
  /** Size of the worker pool, i.e. the global cap on in-flight fetches */
  maxConcurrency: number;
  maxConcurrentPerDomain: number;
  /** Minimum time between two requests to one domain */
  requestIntervalMs: number;
  /** Upper bound of the random delay added to each politeness wait */
  requestJitterMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxLinksPerPage: number;
  /** Maximum number of queued tasks per domain */
  maxFrontierSize: number;
  fetchTimeoutMs: number;
  userAgent: string;
  respectRobotsTxt: boolean;
}

/**
 * Crawl progress information
 */
export interface CrawlProgress {
  domains: number;
  activeDomains: number;
  pagesVisited: number;
  queuedTasks: number;
  inFlight: number;
  productUrls: number;
}

/**
 * Crawler state enum
 */
export enum CrawlerState {
  IDLE = 'IDLE',
  RUNNING = 'RUNNING',
  STOPPING = 'STOPPING',
  STOPPED = 'STOPPED'
}
