type Waiter = () => void;

class Mutex {
  private queue: Waiter[] = [];
  private locked = false;

  get idle(): boolean {
    return !this.locked && this.queue.length === 0;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve();
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  private release() {
    this.locked = false;
    const next = this.queue.shift();
    if (next) next();
  }
}

/**
 * One FIFO mutex per key. Entries are dropped once their mutex goes idle,
 * so the map only holds keys with work in flight.
 */
export class KeyedMutexes {
  private map = new Map<string, Mutex>();

  get size(): number {
    return this.map.size;
  }

  async runExclusive<T>(key: string | number, fn: () => Promise<T> | T): Promise<T> {
    const k = String(key);
    let m = this.map.get(k);
    if (!m) {
      m = new Mutex();
      this.map.set(k, m);
    }
    try {
      return await m.runExclusive(fn);
    } finally {
      if (m.idle && this.map.get(k) === m) this.map.delete(k);
    }
  }
}

export const customerLocks = new KeyedMutexes();
