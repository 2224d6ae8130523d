import * as cheerio from 'cheerio';
import { ILinkExtractor } from '../interfaces/ILinkExtractor';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

const SKIPPED_SCHEMES = ['javascript:', 'mailto:', 'tel:', 'data:'];

/**
 * Default implementation of the link extractor, backed by cheerio
 */
export class DefaultLinkExtractor implements ILinkExtractor {
  private readonly logger = LoggingUtils.createTaggedLogger('link-extractor');

  /**
   * Extract all same-site links from HTML content
   * @param htmlContent The HTML content to extract links from
   * @param baseUrl The page URL
   * @returns Unique normalized links in document order
   */
  extract(htmlContent: string, baseUrl: string): string[] {
    const links = new Set<string>();

    try {
      const $ = cheerio.load(htmlContent);

      $('a[href]').each((_, element) => {
        const href = ($(element).attr('href') ?? '').trim();
        if (href === '' || href.startsWith('#')) {
          return;
        }

        const lowerHref = href.toLowerCase();
        if (SKIPPED_SCHEMES.some(scheme => lowerHref.startsWith(scheme))) {
          return;
        }

        const resolvedUrl = UrlUtils.resolveUrl(href, baseUrl);
        if (!resolvedUrl || !UrlUtils.isValid(resolvedUrl)) {
          this.logger.debug(`Skipping invalid URL: ${href}`);
          return;
        }

        const normalizedUrl = UrlUtils.normalize(resolvedUrl);
        if (UrlUtils.isSameSite(normalizedUrl, baseUrl)) {
          links.add(normalizedUrl);
        }
      });
    } catch (error) {
      this.logger.error(`Error extracting links from ${baseUrl}: ${LoggingUtils.describeError(error)}`);
      return [];
    }

    return [...links];
  }
}
