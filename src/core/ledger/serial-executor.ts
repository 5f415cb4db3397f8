/**
 * Campaign Ledger - Serial Executor
 * Single-writer discipline for ledger mutations.
 *
 * - At most one mutation runs at a time; the rest wait in FIFO order.
 * - A call issued from INSIDE a running mutation (e.g. a transfer gateway
 *   calling back into the ledger) runs inline. Queueing it would deadlock
 *   the outer mutation, which is awaiting it.
 * - The inline scope ends when the mutation settles. Timers or promises it
 *   left behind that call in later are queued like any other caller.
 */

import { AsyncLocalStorage } from 'async_hooks';

interface TaskScope {
  settled: boolean;
}

export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private readonly scope = new AsyncLocalStorage<TaskScope>();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    const current = this.scope.getStore();
    if (current && !current.settled) {
      return task();
    }

    this.pending++;
    const result = this.tail.then(() => {
      const taskScope: TaskScope = { settled: false };
      return this.scope.run(taskScope, async () => {
        try {
          return await task();
        } finally {
          taskScope.settled = true;
        }
      });
    });
    // Failures belong to the caller; the queue keeps moving.
    this.tail = result.then(
      () => { this.pending--; },
      () => { this.pending--; }
    );
    return result;
  }

  /**
   * Run fn outside any mutation scope: ledger calls it makes are queued, never inline
   */
  detached<T>(fn: () => T): T {
    return this.scope.exit(fn);
  }

  /**
   * Mutations queued or running
   */
  get queueDepth(): number {
    return this.pending;
  }

  /**
   * Resolves once every mutation queued so far has settled
   */
  async drain(): Promise<void> {
    await this.tail;
  }
}
