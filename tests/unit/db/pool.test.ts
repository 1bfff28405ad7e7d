import { ConnectionPool } from '../../../src/db/pool.js';
import { StoreUnavailableError } from '../../../src/lib/errors.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const handle = { name: 'fake-db' };

describe('ConnectionPool', () => {
  it('passes the handle to the callback and returns its result', async () => {
    const pool = new ConnectionPool('test', handle, { max: 2, acquireTimeoutMs: 50 });
    await expect(pool.withConnection(async (conn) => conn.name)).resolves.toBe('fake-db');
    expect(pool.stats).toEqual({ name: 'test', inUse: 0, waiting: 0, max: 2 });
  });

  it('releases the lease when the callback throws', async () => {
    const pool = new ConnectionPool('test', handle, { max: 1, acquireTimeoutMs: 50 });
    await expect(pool.withConnection(async () => {
      throw new Error('query failed');
    })).rejects.toThrow('query failed');
    await expect(pool.withConnection(async () => 'next')).resolves.toBe('next');
  });

  it('gives up with StoreUnavailableError when exhausted', async () => {
    const pool = new ConnectionPool('test', handle, { max: 1, acquireTimeoutMs: 20 });
    const hold = deferred();
    const holder = pool.withConnection(() => hold.promise);

    const waiting = pool.withConnection(async () => 'never');
    await expect(waiting).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(waiting).rejects.toThrow('test store is busy, try again shortly');
    expect(pool.stats.waiting).toBe(0);

    hold.resolve();
    await holder;
    expect(pool.stats.inUse).toBe(0);
  });

  it('hands the lease to the next waiter in order', async () => {
    const pool = new ConnectionPool('test', handle, { max: 1, acquireTimeoutMs: 1000 });
    const order: string[] = [];
    const hold = deferred();

    const first = pool.withConnection(async () => {
      await hold.promise;
      order.push('first');
    });
    const second = pool.withConnection(async () => {
      order.push('second');
    });
    expect(pool.stats).toEqual({ name: 'test', inUse: 1, waiting: 1, max: 1 });

    hold.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
    expect(pool.stats.inUse).toBe(0);
  });

  it('rejects waiters and new callers once closed', async () => {
    const onClose = jest.fn();
    const pool = new ConnectionPool('test', handle, { max: 1, acquireTimeoutMs: 1000 }, onClose);
    const hold = deferred();
    const holder = pool.withConnection(() => hold.promise);
    const waiting = pool.withConnection(async () => 'never');

    pool.close();
    pool.close();

    await expect(waiting).rejects.toThrow('test store is closed');
    await expect(pool.withConnection(async () => 'never')).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(onClose).toHaveBeenCalledTimes(1);

    hold.resolve();
    await holder;
  });

  it('needs at least one connection', () => {
    expect(() => new ConnectionPool('test', handle, { max: 0, acquireTimeoutMs: 10 })).toThrow(
      'test pool needs at least one connection',
    );
  });
});
