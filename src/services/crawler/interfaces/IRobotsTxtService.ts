/**
 * Interface for robots.txt handling.
 * Implementations keep the parsed rules of every loaded site.
 */
export interface IRobotsTxtService {
  /**
   * Load and parse the robots.txt file for a domain
   * @param baseUrl Any URL of the site
   * @param userAgent The user agent to check permissions for
   */
  loadRobotsTxt(baseUrl: string, userAgent: string): Promise<void>;

  /**
   * Check if a URL is allowed by the loaded rules (allowed when nothing is loaded)
   */
  isAllowed(url: string): boolean;

  /**
   * Get the crawl delay the site asks for
   * @returns The crawl delay in milliseconds, or null if not specified
   */
  getCrawlDelay(url: string): number | null;
}
