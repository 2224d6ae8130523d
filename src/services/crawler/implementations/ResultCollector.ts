import { IResultCollector } from '../interfaces/IResultCollector';
import { IDomainStateStore } from '../interfaces/IDomainStateStore';
import { CrawlResult, DomainReport } from '../interfaces/types';

/**
 * Projects the domain state store into crawl results.
 * Every call builds fresh arrays, so callers can never mutate crawl state through a snapshot.
 */
export class ResultCollector implements IResultCollector {
  constructor(private readonly store: IDomainStateStore) {}

  snapshot(): CrawlResult {
    const result: CrawlResult = {};
    for (const domain of this.store.domains()) {
      result[domain] = this.store.productUrls(domain);
    }
    return result;
  }

  getDomainReports(): DomainReport[] {
    return this.store.domains().map(domain => this.store.report(domain));
  }
}
