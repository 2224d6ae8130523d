import { IFrontier } from '../interfaces/IFrontier';
import { IDomainStateStore } from '../interfaces/IDomainStateStore';
import { CATEGORIES_BY_RANK, CrawlTask, UrlCategory } from '../interfaces/types';
import { UrlUtils } from '../utils/UrlUtils';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Options for the priority frontier
 */
export interface FrontierOptions {
  /** Tasks deeper than this are never queued */
  maxDepth: number;
  /** Maximum number of queued tasks per domain */
  maxSize: number;
  /** Clock in milliseconds, used when `pop` is called without a time */
  now?: () => number;
}

interface QueueEntry {
  task: CrawlTask;
  readyAt: number;
}

interface DomainQueue {
  tiers: Record<UrlCategory, QueueEntry[]>;
  queued: Set<string>;
}

/**
 * In-memory, per-domain, three-tier frontier.
 *
 * Over capacity the most recently added fresh task of the lowest non-empty tier
 * is discarded, so pagination tasks only go once both lower tiers are empty.
 */
export class PriorityFrontier implements IFrontier {
  private readonly queues: Map<string, DomainQueue> = new Map();
  private readonly now: () => number;
  private readonly logger = LoggingUtils.createTaggedLogger('frontier');

  constructor(
    private readonly store: IDomainStateStore,
    private readonly options: FrontierOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  push(task: CrawlTask): boolean {
    if (task.depth > this.options.maxDepth) {
      this.logger.debug(`Dropping ${task.url}: depth ${task.depth} exceeds ${this.options.maxDepth}`);
      return false;
    }

    const url = UrlUtils.normalize(task.url);
    const queue = this.queueFor(task.domain);

    // Re-checked here even though callers filter visited URLs before pushing
    if (this.store.isVisited(task.domain, url) || queue.queued.has(url)) {
      return false;
    }

    queue.tiers[task.category].push({ task: { ...task, url }, readyAt: 0 });
    queue.queued.add(url);
    this.logger.debug(`Queued ${url} (${task.category}, depth ${task.depth})`);

    this.enforceCapacity(task.domain, queue);
    return queue.queued.has(url);
  }

  requeue(task: CrawlTask, readyAt: number): void {
    const queue = this.queueFor(task.domain);
    queue.tiers[task.category].push({ task, readyAt });
    queue.queued.add(task.url);
    this.logger.debug(`Requeued ${task.url} for attempt ${task.attempt + 1}`);
  }

  pop(domain: string, now: number = this.now()): CrawlTask | null {
    const queue = this.queues.get(domain);
    if (!queue) {
      return null;
    }

    for (const category of CATEGORIES_BY_RANK) {
      const tier = queue.tiers[category];
      const index = tier.findIndex(entry => entry.readyAt <= now);
      if (index !== -1) {
        const [entry] = tier.splice(index, 1);
        queue.queued.delete(entry.task.url);
        return entry.task;
      }
    }

    return null;
  }

  nextReadyAt(domain: string): number | null {
    const queue = this.queues.get(domain);
    if (!queue) {
      return null;
    }

    let earliest: number | null = null;
    for (const category of CATEGORIES_BY_RANK) {
      for (const entry of queue.tiers[category]) {
        if (earliest === null || entry.readyAt < earliest) {
          earliest = entry.readyAt;
        }
      }
    }
    return earliest;
  }

  size(domain: string): number {
    return this.queues.get(domain)?.queued.size ?? 0;
  }

  totalSize(): number {
    let total = 0;
    for (const queue of this.queues.values()) {
      total += queue.queued.size;
    }
    return total;
  }

  has(domain: string, url: string): boolean {
    return this.queues.get(domain)?.queued.has(UrlUtils.normalize(url)) ?? false;
  }

  clear(domain: string): number {
    const queue = this.queues.get(domain);
    if (!queue) {
      return 0;
    }

    const discarded = queue.queued.size;
    this.queues.delete(domain);
    if (discarded > 0) {
      this.logger.debug(`Discarded ${discarded} queued tasks for ${domain}`);
    }
    return discarded;
  }

  private enforceCapacity(domain: string, queue: DomainQueue): void {
    while (queue.queued.size > this.options.maxSize) {
      const entry = PriorityFrontier.evictNewestFresh(queue);
      if (!entry) {
        return;
      }

      queue.queued.delete(entry.task.url);
      this.store.increment(domain, 'discarded');
      this.logger.debug(`Frontier for ${domain} is full, discarded ${entry.task.url}`);
    }
  }

  /**
   * Remove the most recently added fresh task of the lowest tier holding one.
   * Retries already count as visited pages and are never evicted.
   */
  private static evictNewestFresh(queue: DomainQueue): QueueEntry | null {
    for (const category of [...CATEGORIES_BY_RANK].reverse()) {
      const tier = queue.tiers[category];
      for (let index = tier.length - 1; index >= 0; index--) {
        if (tier[index].task.attempt === 0) {
          return tier.splice(index, 1)[0];
        }
      }
    }
    return null;
  }

  private queueFor(domain: string): DomainQueue {
    let queue = this.queues.get(domain);
    if (!queue) {
      queue = {
        tiers: {
          [UrlCategory.PAGINATION]: [],
          [UrlCategory.PRIORITY]: [],
          [UrlCategory.NORMAL]: []
        },
        queued: new Set()
      };
      this.queues.set(domain, queue);
    }
    return queue;
  }
}
