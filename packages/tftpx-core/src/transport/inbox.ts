import type { Datagram } from './types.js';

type Waiter = (datagram: Datagram | null) => void;

/**
 * Queue between a socket's message events and `receive()` callers.
 * Datagrams that arrive while nobody waits are kept in arrival order.
 */
export class DatagramInbox {
  private readonly queue: Datagram[] = [];
  private readonly waiters: Waiter[] = [];
  private closed = false;

  push(datagram: Datagram): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(datagram);
    } else {
      this.queue.push(datagram);
    }
  }

  next(timeoutMs?: number): Promise<Datagram | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const waiter: Waiter = (datagram) => {
        if (timer) clearTimeout(timer);
        resolve(datagram);
      };
      this.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          resolve(null);
        }, Math.max(0, timeoutMs));
      }
    });
  }

  get pending(): number {
    return this.queue.length;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}
