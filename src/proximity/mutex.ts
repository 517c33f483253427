/** Simple mutex used to provide coarse grained synchronisation. */
class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get idle(): boolean {
    return this.pending === 0;
  }

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const { ready, release } = this.enqueue();
    this.pending += 1;
    try {
      await ready;
      return await operation();
    } finally {
      this.pending -= 1;
      release();
    }
  }

  private enqueue(): { ready: Promise<void>; release: () => void } {
    let release!: () => void;
    const wait = new Promise<void>((resolve) => {
      release = resolve;
    });
    const ready = this.tail;
    this.tail = ready.then(() => wait);
    return { ready, release };
  }
}

/**
 * One mutex per resource key. Operations on the same key run one after the
 * other; operations on different keys never wait on each other. Idle mutexes
 * are dropped so the map only holds keys with queued work.
 */
export class KeyedMutex {
  private readonly mutexes = new Map<string, AsyncMutex>();

  async runExclusive<T>(key: string, operation: () => Promise<T> | T): Promise<T> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.mutexes.set(key, mutex);
    }
    const active = mutex;
    try {
      return await active.runExclusive(operation);
    } finally {
      if (active.idle && this.mutexes.get(key) === active) {
        this.mutexes.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get activeKeys(): number {
    return this.mutexes.size;
  }
}
