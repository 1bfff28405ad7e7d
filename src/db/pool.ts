import { StoreUnavailableError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

const log = logger.child('[db/pool]');

export interface PoolOptions {
  max: number;
  acquireTimeoutMs: number;
}

interface Waiter {
  grant: () => void;
  fail: (err: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Bounded lease pool over one store handle.
 *
 * libsql multiplexes statements over its client, so a "connection" here is a lease:
 * at most `max` operations hold the handle at once, later callers queue and give up
 * with StoreUnavailableError after `acquireTimeoutMs`.
 */
export class ConnectionPool<TConn> {
  private inUse = 0;
  private closed = false;
  private readonly waiters: Waiter[] = [];

  constructor(
    readonly name: string,
    private readonly conn: TConn,
    private readonly options: PoolOptions,
    private readonly onClose: () => void = () => {},
  ) {
    if (options.max < 1) throw new Error(`${name} pool needs at least one connection`);
  }

  get stats() {
    return { name: this.name, inUse: this.inUse, waiting: this.waiters.length, max: this.options.max };
  }

  async withConnection<T>(fn: (conn: TConn) => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn(this.conn);
    } finally {
      this.release();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.fail(new StoreUnavailableError(this.name, `${this.name} store is closed`));
    }
    this.onClose();
    log.info('Pool closed', { pool: this.name });
  }

  private acquire(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new StoreUnavailableError(this.name, `${this.name} store is closed`));
    }
    if (this.inUse < this.options.max) {
      this.inUse++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(waiter.timer);
          resolve();
        },
        fail: (err) => {
          clearTimeout(waiter.timer);
          reject(err);
        },
        timer: setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx >= 0) this.waiters.splice(idx, 1);
          log.warn('Pool exhausted', this.stats);
          reject(new StoreUnavailableError(this.name, `${this.name} store is busy, try again shortly`));
        }, this.options.acquireTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // lease passes straight to the next waiter
      next.grant();
      return;
    }
    this.inUse--;
  }
}
