import { log } from '../log';

interface WorkItem {
  name: string;
  run: () => Promise<void>;
}

export interface WorkQueueOptions {
  /** Number of items processed at the same time. */
  concurrency: number;
}

/**
 * Inbound event queue drained by a fixed pool of async workers. Items for
 * different sessions run in parallel and items for the same session may
 * too; per-session ordering is the store's compare-and-swap concern.
 */
export class WorkQueue {
  private readonly items: WorkItem[] = [];
  private readonly concurrency: number;
  private running = 0;
  private draining = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: WorkQueueOptions) {
    this.concurrency = Math.max(1, options.concurrency);
  }

  public get depth(): number {
    return this.items.length;
  }

  public get active(): number {
    return this.running;
  }

  /** Resolves or rejects with the task's own result once a worker has run it. */
  public push<T>(name: string, task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error(`work queue closed; rejected ${name}`));
    }

    return new Promise<T>((resolve, reject) => {
      this.items.push({
        name,
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
      });
      this.schedule();
    });
  }

  public whenIdle(): Promise<void> {
    if (this.running === 0 && this.items.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stops accepting work; resolves after queued items have drained. */
  public async close(): Promise<void> {
    this.closed = true;
    await this.whenIdle();
  }

  private schedule(): void {
    if (this.draining) {
      return;
    }
    this.draining = true;
    setImmediate(() => {
      this.draining = false;
      this.fill();
    });
  }

  private fill(): void {
    while (this.running < this.concurrency) {
      const item = this.items.shift();
      if (!item) {
        break;
      }
      this.running += 1;
      void this.runItem(item);
    }
    this.notifyIfIdle();
  }

  private async runItem(item: WorkItem): Promise<void> {
    try {
      await item.run();
    } catch (error) {
      log.error({ err: error, event: 'work_item_failed', task: item.name }, 'work item failed');
    } finally {
      this.running -= 1;
      this.fill();
    }
  }

  private notifyIfIdle(): void {
    if (this.running > 0 || this.items.length > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
