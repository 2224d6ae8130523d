import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { CrawlResult } from '../interfaces/types';
import { CrawlerError } from '../errors';
import { LoggingUtils } from '../utils/LoggingUtils';

const crawlResultSchema = z.record(z.array(z.string()));

const logger = LoggingUtils.createTaggedLogger('results');

/**
 * JSON persistence of crawl results: `{ "<domain>": ["<product url>", ...] }`
 */
export class ResultWriter {
  /**
   * Write the result as pretty-printed JSON, creating parent directories
   */
  static async save(result: CrawlResult, filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(result, null, 2)}\n`, 'utf-8');

    const total = Object.values(result).reduce((sum, urls) => sum + urls.length, 0);
    logger.info(`Saved ${total} product URLs for ${Object.keys(result).length} domains to ${filePath}`);
  }

  /**
   * @throws CrawlerError when the file is not valid JSON or not a crawl result
   */
  static async load(filePath: string): Promise<CrawlResult> {
    const content = await fs.readFile(filePath, 'utf-8');

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new CrawlerError(`Invalid JSON in ${filePath}: ${LoggingUtils.describeError(error)}`);
    }

    const parsed = crawlResultSchema.safeParse(data);
    if (!parsed.success) {
      throw new CrawlerError(`Invalid crawl result in ${filePath}: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
    }
    return parsed.data;
  }
}
