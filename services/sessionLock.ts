export class SessionBusyError extends Error {
  constructor(readonly waiting: number) {
    super(`Sesión del agente ocupada (${waiting} solicitudes en espera)`);
    this.name = 'SessionBusyError';
  }
}

type Waiter = () => void;

/**
 * FIFO mutual exclusion for the agent session. At most one task runs at a time;
 * at most `maxQueued` tasks wait behind it, further callers are rejected with
 * {@link SessionBusyError} without being queued.
 */
export class SessionLock {
  private held = false;
  private waiters: Waiter[] = [];

  constructor(private readonly maxQueued: number) {}

  get pending(): number {
    return this.waiters.length;
  }

  get locked(): boolean {
    return this.held;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }
    if (this.waiters.length >= this.maxQueued) {
      return Promise.reject(new SessionBusyError(this.waiters.length));
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release() {
    const next = this.waiters.shift();
    if (next) {
      // ownership passes straight to the next waiter; `held` stays true
      next();
    } else {
      this.held = false;
    }
  }
}
