interface Waiter<M> {
  readonly resolve: (message: M | undefined) => void;
  readonly timer: ReturnType<typeof setTimeout> | undefined;
}

/**
 * Token-addressed message queues with selective receive.
 *
 * A token must be opened before messages sent to it are kept; sends to a
 * token that is not open (never opened, or released) are dropped. Receiving
 * on one token never touches messages of another.
 */
export class Mailbox<M> {
  private readonly queues = new Map<string, M[]>();
  private readonly waiters = new Map<string, Waiter<M>[]>();

  open(token: string): void {
    if (!this.queues.has(token)) {
      this.queues.set(token, []);
    }
  }

  isOpen(token: string): boolean {
    return this.queues.has(token);
  }

  /**
   * @returns false when the token is not open and the message was dropped
   */
  send(token: string, message: M): boolean {
    const queue = this.queues.get(token);
    if (queue === undefined) return false;

    const waiter = this.waiters.get(token)?.shift();
    if (waiter !== undefined) {
      if (waiter.timer !== undefined) clearTimeout(waiter.timer);
      waiter.resolve(message);
      return true;
    }
    queue.push(message);
    return true;
  }

  /**
   * Next message for `token`, or undefined when none arrives within
   * `timeoutMs`. A timeout of 0 only checks what is already queued.
   */
  receive(token: string, timeoutMs: number): Promise<M | undefined> {
    const queued = this.queues.get(token)?.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (timeoutMs <= 0 || !this.queues.has(token)) return Promise.resolve(undefined);

    return new Promise((resolve) => {
      const waiters = this.waiters.get(token) ?? [];
      const waiter: Waiter<M> = {
        resolve,
        timer: setTimeout(() => {
          this.removeWaiter(token, waiter);
          resolve(undefined);
        }, timeoutMs),
      };
      this.waiters.set(token, [...waiters, waiter]);
    });
  }

  /**
   * Discard up to `max` queued messages for `token`.
   * @returns the number discarded
   */
  drain(token: string, max: number): number {
    const queue = this.queues.get(token);
    if (queue === undefined) return 0;
    const count = Math.min(queue.length, Math.max(0, max));
    queue.splice(0, count);
    return count;
  }

  pending(token: string): number {
    return this.queues.get(token)?.length ?? 0;
  }

  /**
   * Close `token`: queued messages are discarded, pending receives resolve
   * undefined and later sends are dropped.
   * @returns the number of queued messages discarded
   */
  release(token: string): number {
    const discarded = this.queues.get(token)?.length ?? 0;
    this.queues.delete(token);
    const waiters = this.waiters.get(token) ?? [];
    this.waiters.delete(token);
    for (const waiter of waiters) {
      if (waiter.timer !== undefined) clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
    return discarded;
  }

  private removeWaiter(token: string, waiter: Waiter<M>): void {
    const remaining = (this.waiters.get(token) ?? []).filter((w) => w !== waiter);
    if (remaining.length === 0) {
      this.waiters.delete(token);
    } else {
      this.waiters.set(token, remaining);
    }
  }
}
