export type LockHandle = {
  readonly acquired: boolean;
  release(): void;
};

export type LockService = {
  acquire(key: string, timeoutMs: number): Promise<LockHandle>;
};

type Waiter = {
  grant(): void;
};

type LockEntry = {
  held: boolean;
  waiters: Waiter[];
};

const NOT_ACQUIRED: LockHandle = {
  acquired: false,
  release: () => undefined,
};

export function createInMemoryLockService(): LockService {
  const locks = new Map<string, LockEntry>();

  function entryFor(key: string): LockEntry {
    let entry = locks.get(key);
    if (!entry) {
      entry = { held: false, waiters: [] };
      locks.set(key, entry);
    }
    return entry;
  }

  function handleFor(entry: LockEntry): LockHandle {
    let released = false;
    return {
      acquired: true,
      release() {
        if (released) return;
        released = true;
        const next = entry.waiters.shift();
        if (next) {
          next.grant();
        } else {
          entry.held = false;
        }
      },
    };
  }

  return {
    acquire(key, timeoutMs) {
      const entry = entryFor(key);
      if (!entry.held) {
        entry.held = true;
        return Promise.resolve(handleFor(entry));
      }
      if (timeoutMs <= 0) {
        return Promise.resolve(NOT_ACQUIRED);
      }

      return new Promise<LockHandle>((resolve) => {
        const waiter: Waiter = {
          grant() {
            clearTimeout(timer);
            resolve(handleFor(entry));
          },
        };
        const timer = setTimeout(() => {
          entry.waiters = entry.waiters.filter((candidate) => candidate !== waiter);
          resolve(NOT_ACQUIRED);
        }, timeoutMs);
        entry.waiters.push(waiter);
      });
    },
  };
}

export async function withLock<T>(
  service: LockService,
  key: string,
  timeoutMs: number,
  task: () => Promise<T>,
): Promise<{ acquired: true; value: T } | { acquired: false }> {
  const handle = await service.acquire(key, timeoutMs);
  if (!handle.acquired) {
    return { acquired: false };
  }
  try {
    return { acquired: true, value: await task() };
  } finally {
    handle.release();
  }
}
