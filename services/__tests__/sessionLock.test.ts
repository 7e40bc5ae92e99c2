import { SessionBusyError, SessionLock } from '../sessionLock';

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

describe('SessionLock', () => {
  it('runs tasks one at a time in arrival order', async () => {
    const lock = new SessionLock(5);
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.runExclusive(async () => {
      order.push('second');
    });
    const third = lock.runExclusive(async () => {
      order.push('third');
    });

    expect(lock.locked).toBe(true);
    expect(lock.pending).toBe(2);

    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(['first:start', 'first:end', 'second', 'third']);
    expect(lock.locked).toBe(false);
    expect(lock.pending).toBe(0);
  });

  it('releases the lock when a task throws', async () => {
    const lock = new SessionLock(1);

    await expect(lock.runExclusive(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(lock.runExclusive(async () => 'after')).resolves.toBe('after');
    expect(lock.locked).toBe(false);
  });

  it('rejects callers once the wait queue is full', async () => {
    const lock = new SessionLock(1);
    const gate = deferred();

    const running = lock.runExclusive(() => gate.promise);
    const waiting = lock.runExclusive(async () => 'queued');
    const rejected = lock.runExclusive(async () => 'never');

    await expect(rejected).rejects.toBeInstanceOf(SessionBusyError);
    await expect(rejected).rejects.toThrow('Sesión del agente ocupada (1 solicitudes en espera)');

    gate.resolve();
    await running;
    await expect(waiting).resolves.toBe('queued');
  });

  it('with no queue allowed, only the running task is accepted', async () => {
    const lock = new SessionLock(0);
    const gate = deferred();

    const running = lock.runExclusive(() => gate.promise);

    await expect(lock.runExclusive(async () => undefined)).rejects.toBeInstanceOf(SessionBusyError);
    gate.resolve();
    await running;
    await expect(lock.runExclusive(async () => 'free')).resolves.toBe('free');
  });
});
