import pLimit, { type LimitFunction } from "p-limit";

/**
 * Process-wide cap on in-flight upstream work. Work abandoned after its deadline keeps its
 * slot until it settles, so the pool bounds what timed-out requests can leave behind.
 */
export class WorkerPool {
  private readonly limit: LimitFunction;

  constructor(readonly capacity: number) {
    this.limit = pLimit(capacity);
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    return this.limit(fn);
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }
}
