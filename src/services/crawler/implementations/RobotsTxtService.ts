import axios from 'axios';
import robotsParser from 'robots-parser';
import { IRobotsTxtService } from '../interfaces/IRobotsTxtService';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';
import { DelayUtils } from '../utils/DelayUtils';

type Robots = ReturnType<typeof robotsParser>;

interface SiteRules {
  robots: Robots | null;
  userAgent: string;
}

/**
 * Implementation of the robots.txt service, keeping one parsed file per site
 */
export class RobotsTxtService implements IRobotsTxtService {
  private readonly sites = new Map<string, SiteRules>();
  private readonly logger = LoggingUtils.createTaggedLogger('robots');

  /**
   * @param maxRetries Retries of the robots.txt download on transport errors
   * @param retryDelayMs Base delay between those retries
   */
  constructor(
    private readonly maxRetries = 2,
    private readonly retryDelayMs = 1000
  ) {}

  async loadRobotsTxt(baseUrl: string, userAgent: string): Promise<void> {
    const key = RobotsTxtService.keyFor(baseUrl);
    if (key === null) {
      return;
    }

    const robotsUrl = `${UrlUtils.getRootUrl(baseUrl)}/robots.txt`;
    this.logger.info(`Loading robots.txt from ${robotsUrl}`);

    try {
      const response = await DelayUtils.withRetry(
        () => axios.get<string>(robotsUrl, {
          headers: { 'User-Agent': userAgent },
          timeout: 10000,
          responseType: 'text',
          validateStatus: status => status < 500
        }),
        this.maxRetries,
        this.retryDelayMs
      );

      if (response.status === 200 && typeof response.data === 'string') {
        this.sites.set(key, { robots: robotsParser(robotsUrl, response.data), userAgent });
        this.logger.info(`Parsed robots.txt from ${robotsUrl}`);
      } else {
        // No robots.txt: everything is allowed
        this.sites.set(key, { robots: null, userAgent });
        this.logger.warn(`No robots.txt found at ${robotsUrl} (HTTP ${response.status})`);
      }
    } catch (error) {
      this.sites.set(key, { robots: null, userAgent });
      this.logger.error(`Error loading robots.txt from ${robotsUrl}: ${LoggingUtils.describeError(error)}`);
    }
  }

  isAllowed(url: string): boolean {
    const site = this.siteFor(url);
    if (!site?.robots) {
      return true;
    }

    // robots-parser answers undefined for URLs of another host
    return site.robots.isAllowed(url, site.userAgent) !== false;
  }

  getCrawlDelay(url: string): number | null {
    const site = this.siteFor(url);
    const delaySeconds = site?.robots?.getCrawlDelay(site.userAgent);
    return delaySeconds === undefined ? null : delaySeconds * 1000;
  }

  private siteFor(url: string): SiteRules | undefined {
    const key = RobotsTxtService.keyFor(url);
    return key === null ? undefined : this.sites.get(key);
  }

  private static keyFor(url: string): string | null {
    const hostname = UrlUtils.extractDomain(url);
    return hostname === null ? null : UrlUtils.siteKey(hostname);
  }
}
