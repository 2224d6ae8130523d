/**
 * Interface for link extraction.
 * Implementations find anchors in HTML and turn them into absolute,
 * normalized URLs of the same site.
 */
export interface ILinkExtractor {
  /**
   * Extract all same-site links from HTML content
   * @param htmlContent The HTML content to extract links from
   * @param baseUrl The page URL, used to resolve relative links and as the site reference
   * @returns Unique normalized absolute URLs
   */
  extract(htmlContent: string, baseUrl: string): string[];
}
