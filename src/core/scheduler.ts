import type { Logger } from "./logger";

export type WorkItem = {
  key: string;
  run(): Promise<void>;
};

export type SchedulerOptions = {
  workers: number;
  logger: Logger;
  onError?(item: WorkItem, error: unknown): void;
};

export type WorkScheduler = {
  submit(item: WorkItem): boolean;
  drain(): Promise<void>;
  pending(): number;
};

export function createScheduler(options: SchedulerOptions): WorkScheduler {
  const workers = Math.max(1, Math.trunc(options.workers));
  const queue: WorkItem[] = [];
  const running = new Set<string>();
  let idleWaiters: (() => void)[] = [];

  function handleError(item: WorkItem, error: unknown): void {
    options.logger.error({ err: error, item: item.key }, "scheduler: work item failed, deferring to next run");
    options.onError?.(item, error);
  }

  function settleIdle(): void {
    if (queue.length || running.size) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  function start(item: WorkItem): void {
    running.add(item.key);
    const task = Promise.resolve()
      .then(() => item.run())
      .catch((error: unknown) => handleError(item, error))
      .finally(() => {
        running.delete(item.key);
        pump();
      });
    void task;
  }

  function pump(): void {
    while (running.size < workers) {
      const index = queue.findIndex((candidate) => !running.has(candidate.key));
      if (index < 0) break;
      const [next] = queue.splice(index, 1);
      if (next) start(next);
    }
    settleIdle();
  }

  return {
    submit(item) {
      if (queue.some((queued) => queued.key === item.key)) {
        options.logger.debug({ item: item.key }, "scheduler: identical work item already queued");
        return false;
      }
      queue.push(item);
      pump();
      return true;
    },

    drain() {
      if (!queue.length && !running.size) return Promise.resolve();
      return new Promise<void>((resolve) => {
        idleWaiters.push(resolve);
      });
    },

    pending() {
      return queue.length + running.size;
    },
  };
}
