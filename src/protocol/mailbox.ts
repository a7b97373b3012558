import type { Message } from "./types.js";

interface Waiter {
  resolve: (message: Message | null) => void;
  timer?: NodeJS.Timeout;
}

/**
 * Unbounded FIFO queue for one agent.
 * Any number of producers may push; one consumer is expected to receive.
 */
export class Mailbox {
  private items: Message[] = [];
  private waiters: Waiter[] = [];
  private closed = false;

  constructor(public readonly owner: string) {}

  /** Enqueue, or hand directly to a waiting receiver. False once closed. */
  push(message: Message): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(message);
    } else {
      this.items.push(message);
    }
    return true;
  }

  tryReceive(): Message | null {
    return this.items.shift() ?? null;
  }

  /**
   * Next message, waiting up to `timeoutMs` (forever when omitted).
   * Resolves null on timeout or when the mailbox is closed.
   */
  receive(timeoutMs?: number): Promise<Message | null> {
    const next = this.items.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      const waiter: Waiter = { resolve };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          resolve(null);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything queued. */
  drain(): Message[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
    this.waiters = [];
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
