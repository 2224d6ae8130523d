/**
 * Wakes idle workers when new work may be available.
 * `notify` resolves every pending `wait`; a wait with a timeout also resolves on its own.
 */
export class WorkSignal {
  private waiters: Array<() => void> = [];

  wait(timeoutMs?: number): Promise<void> {
    return new Promise<void>(resolve => {
      let timer: NodeJS.Timeout | undefined;

      const wake = (): void => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        resolve();
      };
      this.waiters.push(wake);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter(waiter => waiter !== wake);
          resolve();
        }, Math.max(0, timeoutMs));
      }
    });
  }

  notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(wake => wake());
  }

  get pending(): number {
    return this.waiters.length;
  }
}
