import { CrawlTask } from './types';

/**
 * Interface for the per-domain pending work queue.
 * Tasks are dispatched by category rank (pagination, priority, normal), FIFO within a rank.
 */
export interface IFrontier {
  /**
   * Queue a fresh task. Tasks that exceed the depth bound, are already visited
   * or already queued are dropped silently.
   * @returns True if the task was queued
   */
  push(task: CrawlTask): boolean;

  /**
   * Put a retried task back at its original rank; it is not dispatched before `readyAt`
   */
  requeue(task: CrawlTask, readyAt: number): void;

  /**
   * Remove and return the next ready task for a domain
   * @param now Clock value used to decide readiness of retried tasks
   * @returns The task, or null when nothing is ready
   */
  pop(domain: string, now?: number): CrawlTask | null;

  /**
   * Earliest time at which a queued task of the domain becomes ready (0 for fresh tasks), or null if none is queued
   */
  nextReadyAt(domain: string): number | null;

  /**
   * Number of queued tasks for a domain
   */
  size(domain: string): number;

  /**
   * Number of queued tasks across all domains
   */
  totalSize(): number;

  /**
   * Check if a URL is queued for a domain
   */
  has(domain: string, url: string): boolean;

  /**
   * Discard every queued task of a domain
   * @returns The number of discarded tasks
   */
  clear(domain: string): number;
}
