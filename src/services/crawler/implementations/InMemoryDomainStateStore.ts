import { IDomainStateStore } from '../interfaces/IDomainStateStore';
import { DomainReport, DomainStats, DomainStatus, VisitOutcome } from '../interfaces/types';
import { LoggingUtils } from '../utils/LoggingUtils';

interface DomainState {
  visited: Set<string>;
  productUrls: Set<string>;
  pagesVisited: number;
  lastRequestTime: number | null;
  intervalOverride: number | null;
  status: DomainStatus;
  error: string | null;
  stats: DomainStats;
}

/**
 * In-memory implementation of the domain state store
 */
export class InMemoryDomainStateStore implements IDomainStateStore {
  private readonly states: Map<string, DomainState> = new Map();
  private readonly logger = LoggingUtils.createTaggedLogger('domain-state');

  ensure(domain: string): void {
    this.get(domain);
  }

  domains(): string[] {
    return [...this.states.keys()];
  }

  tryVisit(domain: string, url: string, isProduct: boolean, maxPages: number): VisitOutcome {
    const state = this.get(domain);

    if (state.visited.has(url)) {
      return 'duplicate';
    }
    if (state.pagesVisited >= maxPages) {
      return 'capped';
    }

    state.visited.add(url);
    state.pagesVisited += 1;
    if (isProduct) {
      state.productUrls.add(url);
      this.logger.info(`Found product URL: ${url}`);
    }
    return 'visited';
  }

  isVisited(domain: string, url: string): boolean {
    return this.states.get(domain)?.visited.has(url) ?? false;
  }

  pagesVisited(domain: string): number {
    return this.states.get(domain)?.pagesVisited ?? 0;
  }

  productUrls(domain: string): string[] {
    const state = this.states.get(domain);
    return state ? [...state.productUrls] : [];
  }

  getLastRequestTime(domain: string): number | null {
    return this.states.get(domain)?.lastRequestTime ?? null;
  }

  setLastRequestTime(domain: string, time: number): void {
    this.get(domain).lastRequestTime = time;
  }

  getIntervalOverride(domain: string): number | null {
    return this.states.get(domain)?.intervalOverride ?? null;
  }

  setIntervalOverride(domain: string, intervalMs: number): void {
    this.get(domain).intervalOverride = intervalMs;
  }

  getStatus(domain: string): DomainStatus {
    return this.states.get(domain)?.status ?? DomainStatus.PENDING;
  }

  setStatus(domain: string, status: DomainStatus, error?: string): void {
    const state = this.get(domain);
    state.status = status;
    if (error !== undefined) {
      state.error = error;
    }
  }

  increment(domain: string, stat: keyof DomainStats, by = 1): void {
    this.get(domain).stats[stat] += by;
  }

  report(domain: string): DomainReport {
    const state = this.get(domain);
    return {
      domain,
      status: state.status,
      pagesVisited: state.pagesVisited,
      productCount: state.productUrls.size,
      stats: { ...state.stats },
      error: state.error
    };
  }

  /**
   * Get a domain's state, creating it on first use
   */
  private get(domain: string): DomainState {
    const existing = this.states.get(domain);
    if (existing) {
      return existing;
    }

    const created: DomainState = {
      visited: new Set(),
      productUrls: new Set(),
      pagesVisited: 0,
      lastRequestTime: null,
      intervalOverride: null,
      status: DomainStatus.PENDING,
      error: null,
      stats: {
        fetched: 0,
        transientErrors: 0,
        fatalErrors: 0,
        retries: 0,
        dropped: 0,
        discarded: 0
      }
    };
    this.states.set(domain, created);
    this.logger.debug(`Created state for ${domain}`);
    return created;
  }
}
