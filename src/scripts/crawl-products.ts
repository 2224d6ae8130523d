#!/usr/bin/env node
/**
 * Product URL discovery CLI
 *
 * Crawls each domain from its home page and writes the product URLs found,
 * keyed by domain, to a JSON file.
 *
 * @example
 * ```
 * npm run crawl -- --domains shop-one.com,shop-two.com --max-pages 200 --output product_urls.json
 * ```
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import config from '../config';
import logger from '../utils/logger';
import { ProductDiscoveryService } from '../services/product-discovery.service';
import { ResultWriter } from '../services/crawler/implementations/ResultWriter';
import { loadClassificationRules } from '../services/crawler/rules/ClassificationRules';
import { ConfigurationError } from '../services/crawler/errors';
import { LoggingUtils } from '../services/crawler/utils/LoggingUtils';

const splitList = (values: Array<string | number>): string[] =>
  values.flatMap(value => String(value).split(',')).map(value => value.trim()).filter(value => value !== '');

async function main(): Promise<void> {
  const argv = yargs(hideBin(process.argv))
    .usage('Usage: $0 [domains..] [options]')
    .option('domains', {
      type: 'string',
      describe: 'Comma-separated list of domains to crawl'
    })
    .option('max-pages', {
      type: 'number',
      default: config.crawl.maxPagesPerDomain,
      describe: 'Maximum pages visited per domain'
    })
    .option('max-depth', {
      type: 'number',
      default: config.crawl.maxDepth,
      describe: 'Maximum link depth from the home page'
    })
    .option('concurrency', {
      type: 'number',
      default: config.crawl.maxConcurrency,
      describe: 'Maximum concurrent fetches across all domains'
    })
    .option('interval', {
      type: 'number',
      default: config.crawl.requestIntervalMs,
      describe: 'Milliseconds between requests to one domain'
    })
    .option('jitter', {
      type: 'number',
      default: config.crawl.requestJitterMs,
      describe: 'Upper bound of a random extra delay per request, in milliseconds'
    })
    .option('max-retries', {
      type: 'number',
      default: config.crawl.maxRetries,
      describe: 'Retries of a page after a transient fetch error'
    })
    .option('strategy', {
      choices: ['http', 'browser'] as const,
      default: config.fetchStrategy,
      describe: 'Fetch pages over plain HTTP or with a headless browser'
    })
    .option('respect-robots-txt', {
      type: 'boolean',
      default: config.crawl.respectRobotsTxt,
      describe: 'Skip URLs disallowed by robots.txt and honor Crawl-delay'
    })
    .option('rules', {
      type: 'string',
      default: config.rulesPath,
      describe: 'JSON file with URL classification rules'
    })
    .option('output', {
      type: 'string',
      alias: 'o',
      default: config.outputPath,
      describe: 'Output JSON file'
    })
    .option('verbose', {
      type: 'boolean',
      alias: 'v',
      default: false,
      describe: 'Enable more detailed logging'
    })
    .epilogue('Press Ctrl+C once to stop and save the product URLs found so far.')
    .help()
    .alias('help', 'h')
    .parseSync();

  if (argv.verbose) {
    logger.level = 'debug';
    logger.debug('Verbose logging enabled');
  }

  const domains = splitList([...(argv.domains ? [argv.domains] : []), ...argv._]);
  if (domains.length === 0) {
    console.error('No domains given. Pass them as arguments or with --domains.');
    process.exitCode = 1;
    return;
  }

  const service = new ProductDiscoveryService(
    {
      ...config.crawl,
      maxPagesPerDomain: argv['max-pages'],
      maxDepth: argv['max-depth'],
      maxConcurrency: argv.concurrency,
      requestIntervalMs: argv.interval,
      requestJitterMs: argv.jitter,
      maxRetries: argv['max-retries'],
      respectRobotsTxt: argv['respect-robots-txt']
    },
    {
      strategy: argv.strategy,
      rules: argv.rules ? loadClassificationRules(argv.rules) : undefined,
      browser: { executablePath: config.browser.executablePath }
    }
  );

  let interrupted = false;
  process.on('SIGINT', () => {
    if (interrupted) {
      logger.warn('Forced exit');
      process.exit(130);
    }
    interrupted = true;
    logger.info('Interrupt received, finishing in-flight requests. Press Ctrl+C again to force exit.');
    service.shutdown();
  });

  const result = await service.discover(domains);
  await ResultWriter.save(result, argv.output);

  for (const [domain, urls] of Object.entries(result)) {
    console.log(`${domain}: Found ${urls.length} product URLs`);
  }
  console.log(`Results saved to ${argv.output}`);

  if (interrupted) {
    process.exitCode = 130;
  }
}

main().catch(error => {
  if (error instanceof ConfigurationError) {
    console.error(error.message);
  } else {
    logger.error(`Unhandled error: ${LoggingUtils.describeError(error)}`);
  }
  process.exit(1);
});
