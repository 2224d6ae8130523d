import { URL } from 'url';

/**
 * Utilities for handling URLs in the crawler service
 */
export class UrlUtils {
  /**
   * Normalizes a URL by removing the fragment and a trailing slash.
   * Hostnames are lower-cased by the URL parser. Unparseable input is returned unchanged.
   */
  static normalize(url: string): string {
    try {
      const parsedUrl = new URL(url);
      parsedUrl.hash = '';

      let normalizedUrl = parsedUrl.toString();
      if (normalizedUrl.endsWith('/')) {
        normalizedUrl = normalizedUrl.slice(0, -1);
      }

      return normalizedUrl;
    } catch (error) {
      return url;
    }
  }

  /**
   * Extracts the hostname from a URL
   * @returns The hostname, or null if the URL is invalid
   */
  static extractDomain(url: string): string | null {
    try {
      return new URL(url).hostname;
    } catch (error) {
      return null;
    }
  }

  /**
   * Validates that a string is an absolute http(s) URL
   */
  static isValid(url: string): boolean {
    try {
      const { protocol } = new URL(url);
      return protocol === 'http:' || protocol === 'https:';
    } catch (error) {
      return false;
    }
  }

  /**
   * Resolves a relative URL against a base URL
   * @returns The resolved absolute URL, or null when it cannot be resolved
   */
  static resolveUrl(relativeUrl: string, baseUrl: string): string | null {
    try {
      return new URL(relativeUrl, baseUrl).toString();
    } catch (error) {
      return null;
    }
  }

  /**
   * Host used to decide whether two URLs belong to the same shop: `www.` is ignored
   */
  static siteKey(hostname: string): string {
    const lower = hostname.toLowerCase();
    return lower.startsWith('www.') ? lower.slice(4) : lower;
  }

  /**
   * Checks if a URL belongs to the same site as the base URL
   */
  static isSameSite(url: string, baseUrl: string): boolean {
    const urlDomain = this.extractDomain(url);
    const baseDomain = this.extractDomain(baseUrl);
    if (urlDomain === null || baseDomain === null) {
      return false;
    }
    return this.siteKey(urlDomain) === this.siteKey(baseDomain);
  }

  /**
   * Gets the root URL (protocol + host) from a URL
   */
  static getRootUrl(url: string): string {
    try {
      const parsedUrl = new URL(url);
      return `${parsedUrl.protocol}//${parsedUrl.host}`;
    } catch (error) {
      return url;
    }
  }

  /**
   * Turns a seed such as `www.shop.com` or `https://shop.com/sale` into an absolute URL
   */
  static toSeedUrl(domainOrUrl: string): string {
    const trimmed = domainOrUrl.trim().replace(/\/+$/, '');
    if (/^https?:\/\//i.test(trimmed)) {
      return trimmed;
    }
    return `https://${trimmed}`;
  }

  /**
   * Returns the URL path, or the empty string for an unparseable URL
   */
  static getPath(url: string): string {
    try {
      return new URL(url).pathname;
    } catch (error) {
      return '';
    }
  }
}
