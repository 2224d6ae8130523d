import { IPolitenessController } from '../interfaces/IPolitenessController';
import { IDomainStateStore } from '../interfaces/IDomainStateStore';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Options for the interval politeness controller
 */
export interface PolitenessOptions {
  /** Minimum time between two requests to one domain */
  intervalMs: number;
  /** Upper bound (exclusive) of the random delay added to every wait */
  jitterMs?: number;
  /** Source of randomness in [0, 1) */
  random?: () => number;
  /** Clock in milliseconds */
  now?: () => number;
}

/**
 * Spaces requests to a domain by a minimum interval measured from the
 * domain's last reserved request time, plus optional random jitter.
 */
export class IntervalPolitenessController implements IPolitenessController {
  private readonly defaultInterval: number;
  private readonly jitterMs: number;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly logger = LoggingUtils.createTaggedLogger('politeness');

  constructor(
    private readonly store: IDomainStateStore,
    options: PolitenessOptions
  ) {
    this.defaultInterval = options.intervalMs;
    this.jitterMs = options.jitterMs ?? 0;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.logger.debug(`Initialized with interval ${this.defaultInterval}ms and jitter up to ${this.jitterMs}ms`);
  }

  waitTime(domain: string): number {
    const lastRequestTime = this.store.getLastRequestTime(domain);
    const remaining = lastRequestTime === null
      ? 0
      : Math.max(0, lastRequestTime + this.getInterval(domain) - this.now());

    return remaining + this.jitter();
  }

  reserve(domain: string): number {
    const wait = this.waitTime(domain);
    this.store.setLastRequestTime(domain, this.now() + wait);

    if (wait > 0) {
      this.logger.debug(`Next request to ${domain} in ${wait}ms`);
    }
    return wait;
  }

  setInterval(domain: string, intervalMs: number): void {
    const current = this.getInterval(domain);
    if (current !== intervalMs) {
      this.logger.info(`Updating interval for ${domain} from ${current}ms to ${intervalMs}ms`);
      this.store.setIntervalOverride(domain, intervalMs);
    }
  }

  getInterval(domain: string): number {
    return this.store.getIntervalOverride(domain) ?? this.defaultInterval;
  }

  private jitter(): number {
    return this.jitterMs > 0 ? Math.floor(this.random() * this.jitterMs) : 0;
  }
}
