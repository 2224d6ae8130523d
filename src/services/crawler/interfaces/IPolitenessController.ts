/**
 * Interface defining the contract for per-domain request spacing
 */
export interface IPolitenessController {
  /**
   * Time a caller must wait before the next request to the domain
   * @returns A non-negative duration in milliseconds
   */
  waitTime(domain: string): number;

  /**
   * Compute the wait and record the resulting request time in one step,
   * so the next caller for the same domain is spaced after this one
   * @returns The duration in milliseconds to wait before issuing the request
   */
  reserve(domain: string): number;

  /**
   * Set the minimum interval for a specific domain
   */
  setInterval(domain: string, intervalMs: number): void;

  /**
   * Get the minimum interval that applies to a domain
   */
  getInterval(domain: string): number;
}
