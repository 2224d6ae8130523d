import { Classification, UrlCategory } from './types';

/**
 * Interface for URL classification.
 * Implementations must be pure: no I/O and no shared state, so they can be
 * called from any point of the crawl without coordination.
 */
export interface IUrlClassifier {
  /**
   * Classify a URL as product / non-product and assign its listing category
   * @param url The normalized URL
   * @param domain The domain the URL is crawled under
   */
  classify(url: string, domain: string): Classification;

  /**
   * Product decision only
   */
  isProductUrl(url: string, domain: string): boolean;

  /**
   * Category decision only
   */
  categorize(url: string): UrlCategory;
}
