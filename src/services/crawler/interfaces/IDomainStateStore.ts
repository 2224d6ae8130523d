import { DomainReport, DomainStats, DomainStatus, VisitOutcome } from './types';

/**
 * Interface for the per-domain visited state.
 * Every method is synchronous: a caller on the event loop can never observe a
 * half-applied update, which is what keeps the dedup invariant.
 */
export interface IDomainStateStore {
  /**
   * Create the state for a domain if it does not exist yet
   */
  ensure(domain: string): void;

  /**
   * Known domains, in registration order
   */
  domains(): string[];

  /**
   * Atomically check the page cap, check-and-insert the URL into the visited
   * set, bump the page counter and, for products, record the product URL
   */
  tryVisit(domain: string, url: string, isProduct: boolean, maxPages: number): VisitOutcome;

  isVisited(domain: string, url: string): boolean;

  pagesVisited(domain: string): number;

  /**
   * Product URLs of a domain in discovery order
   */
  productUrls(domain: string): string[];

  getLastRequestTime(domain: string): number | null;

  setLastRequestTime(domain: string, time: number): void;

  /**
   * Per-domain politeness interval override, or null when the default applies
   */
  getIntervalOverride(domain: string): number | null;

  setIntervalOverride(domain: string, intervalMs: number): void;

  getStatus(domain: string): DomainStatus;

  setStatus(domain: string, status: DomainStatus, error?: string): void;

  /**
   * Add to one of the domain's counters
   */
  increment(domain: string, stat: keyof DomainStats, by?: number): void;

  report(domain: string): DomainReport;
}
