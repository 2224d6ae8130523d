import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { IPageFetcher } from '../interfaces/IPageFetcher';
import { FetchError, FetchErrorKind, FetchOptions, FetchResult, FetchStrategy } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';
import { UrlUtils } from '../utils/UrlUtils';

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];
const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT'];

/**
 * Page fetcher using a plain HTTP client (axios).
 * Suited to shops that render their listings on the server.
 */
export class HttpPageFetcher implements IPageFetcher {
  readonly strategy: FetchStrategy = 'http';
  private readonly logger = LoggingUtils.createTaggedLogger('http-fetcher');

  constructor(private readonly client: AxiosInstance = axios.create()) {}

  async open(domain: string): Promise<void> {
    this.logger.debug(`HTTP session ready for ${domain}`);
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    if (!UrlUtils.isValid(url)) {
      return HttpPageFetcher.failure(FetchErrorKind.INVALID_URL, `Invalid URL: ${url}`);
    }

    const startTime = Date.now();
    this.logger.debug(`Fetching ${url}`);

    try {
      const response = await this.client.get<string>(url, {
        headers: {
          'User-Agent': options.userAgent || 'ProductUrlCrawler/1.0',
          'Accept': 'text/html,application/xhtml+xml',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        timeout: options.timeout || 30000,
        maxRedirects: 5,
        responseType: 'text',
        // Status codes are mapped to fetch errors below rather than thrown
        validateStatus: () => true,
      });

      if (response.status >= 400) {
        return HttpPageFetcher.failure(FetchErrorKind.HTTP_ERROR, `HTTP ${response.status} for ${url}`, response.status);
      }

      const contentType = String(response.headers['content-type'] ?? '').toLowerCase();
      if (!HTML_CONTENT_TYPES.some(type => contentType.includes(type))) {
        return HttpPageFetcher.failure(
          FetchErrorKind.NON_HTML_CONTENT,
          `Non-HTML content at ${url} (Content-Type: ${contentType || 'none'})`,
          response.status
        );
      }

      this.logger.debug(`Fetched ${url} in ${Date.now() - startTime}ms`);
      return {
        ok: true,
        html: typeof response.data === 'string' ? response.data : String(response.data),
        status: response.status,
        finalUrl: HttpPageFetcher.responseUrl(response, url)
      };
    } catch (error) {
      return { ok: false, error: HttpPageFetcher.toFetchError(error, url) };
    }
  }

  async close(domain: string): Promise<void> {
    this.logger.debug(`HTTP session closed for ${domain}`);
  }

  /**
   * axios keeps no resources between requests, so this is a no-op
   */
  async cleanup(): Promise<void> {
    return Promise.resolve();
  }

  /**
   * URL of the last response after redirects, as recorded by axios's Node adapter
   */
  private static responseUrl(response: AxiosResponse<string>, requestedUrl: string): string {
    const responseUrl: unknown = response.request?.res?.responseUrl;
    return typeof responseUrl === 'string' && responseUrl !== '' ? responseUrl : requestedUrl;
  }

  private static toFetchError(error: unknown, url: string): FetchError {
    if (axios.isAxiosError(error)) {
      if (error.code && TIMEOUT_CODES.includes(error.code)) {
        return { kind: FetchErrorKind.TIMEOUT, message: `Timeout fetching ${url}` };
      }
      if (error.code === 'ERR_INVALID_URL') {
        return { kind: FetchErrorKind.INVALID_URL, message: error.message };
      }
      if (error.response) {
        return { kind: FetchErrorKind.HTTP_ERROR, message: error.message, status: error.response.status };
      }
    }
    return {
      kind: FetchErrorKind.TRANSPORT_ERROR,
      message: `Error fetching ${url}: ${LoggingUtils.describeError(error)}`
    };
  }

  private static failure(kind: FetchErrorKind, message: string, status?: number): FetchResult {
    return { ok: false, error: status === undefined ? { kind, message } : { kind, message, status } };
  }
}
