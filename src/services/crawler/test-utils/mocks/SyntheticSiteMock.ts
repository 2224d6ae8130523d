import { IPageFetcher } from '../../interfaces/IPageFetcher';
import { FetchError, FetchErrorKind, FetchOptions, FetchResult, FetchStrategy } from '../../interfaces/types';
import { UrlUtils } from '../../utils/UrlUtils';

/**
 * Route configuration for a synthetic site
 */
export interface SyntheticRoute {
  /** Path of the page, e.g. '/products/123' */
  path: string;
  /** Hrefs rendered as anchors, relative or absolute */
  links?: string[];
  /** Failure returned instead of the page */
  error?: FetchError;
  /** Return `error` only for the first N fetches, then serve the page */
  failTimes?: number;
  /** Throw instead of returning a result */
  throws?: boolean;
  /** Path the page is served from after a redirect; links resolve against it */
  redirectTo?: string;
}

/**
 * Configuration options for the synthetic site mock
 */
export interface SyntheticSiteOptions {
  /** Delay in milliseconds before every fetch resolves */
  responseDelay?: number;
  /** Domains whose `open` rejects */
  failingDomains?: string[];
  /** Called when a fetch starts */
  onFetch?: (url: string) => void;
}

interface FetchRecord {
  url: string;
  startedAt: number;
  finishedAt: number;
}

/**
 * In-process page fetcher serving a link graph of one or more fake sites.
 * Every page not configured as a route answers 404.
 */
export class SyntheticSiteMock implements IPageFetcher {
  readonly strategy: FetchStrategy = 'http';
  readonly fetches: FetchRecord[] = [];
  readonly opened: string[] = [];
  readonly closed: string[] = [];
  cleanedUp = false;

  private readonly routes: Map<string, SyntheticRoute> = new Map();
  private readonly failuresServed: Map<string, number> = new Map();
  private readonly options: Required<Omit<SyntheticSiteOptions, 'onFetch'>>;
  private readonly onFetch?: (url: string) => void;
  private inFlight = 0;
  private maxInFlight = 0;

  constructor(options: SyntheticSiteOptions = {}) {
    this.options = {
      responseDelay: options.responseDelay ?? 0,
      failingDomains: options.failingDomains ?? []
    };
    this.onFetch = options.onFetch;
  }

  /**
   * Add pages of the site at `origin`, e.g. 'https://shop.test'
   */
  addSite(origin: string, routes: SyntheticRoute[]): this {
    for (const route of routes) {
      this.routes.set(UrlUtils.normalize(`${origin}${route.path}`), route);
    }
    return this;
  }

  /**
   * Add a chain of pages `/level-1` ... `/level-N`, each linking to the next
   */
  addChain(origin: string, length: number): this {
    const routes: SyntheticRoute[] = [{ path: '/', links: ['/level-1'] }];
    for (let level = 1; level <= length; level++) {
      routes.push({ path: `/level-${level}`, links: level < length ? [`/level-${level + 1}`] : [] });
    }
    return this.addSite(origin, routes);
  }

  async open(domain: string): Promise<void> {
    if (this.options.failingDomains.includes(domain)) {
      throw new Error(`Cannot open session for ${domain}`);
    }
    this.opened.push(domain);
  }

  async fetch(url: string, _options: FetchOptions = {}): Promise<FetchResult> {
    const startedAt = Date.now();
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    this.onFetch?.(url);

    try {
      if (this.options.responseDelay > 0) {
        await new Promise(resolve => setTimeout(resolve, this.options.responseDelay));
      }
      return this.respond(url);
    } finally {
      this.inFlight -= 1;
      this.fetches.push({ url, startedAt, finishedAt: Date.now() });
    }
  }

  async close(domain: string): Promise<void> {
    this.closed.push(domain);
  }

  async cleanup(): Promise<void> {
    this.cleanedUp = true;
  }

  /**
   * Number of times a URL has been fetched
   */
  fetchCount(url: string): number {
    const normalized = UrlUtils.normalize(url);
    return this.fetches.filter(record => UrlUtils.normalize(record.url) === normalized).length;
  }

  fetchedUrls(): string[] {
    return this.fetches.map(record => record.url);
  }

  get peakConcurrency(): number {
    return this.maxInFlight;
  }

  private respond(url: string): FetchResult {
    const key = UrlUtils.normalize(url);
    const route = this.routes.get(key);

    if (!route) {
      return { ok: false, error: { kind: FetchErrorKind.HTTP_ERROR, status: 404, message: `HTTP 404 for ${url}` } };
    }

    if (route.throws) {
      throw new Error(`Connection reset while fetching ${url}`);
    }

    if (route.error) {
      const served = this.failuresServed.get(key) ?? 0;
      if (route.failTimes === undefined || served < route.failTimes) {
        this.failuresServed.set(key, served + 1);
        return { ok: false, error: route.error };
      }
    }

    const anchors = (route.links ?? []).map(href => `<a href="${href}">${href}</a>`).join('\n');
    return {
      ok: true,
      status: 200,
      finalUrl: route.redirectTo ? new URL(route.redirectTo, url).toString() : url,
      html: `<!DOCTYPE html><html><head><title>${route.path}</title></head><body>${anchors}</body></html>`
    };
  }
}
