import { setTimeout as sleepFor } from "node:timers/promises";

export interface Permit {
  release(): void;
}

export interface ConcurrencyControllerOptions {
  maxConcurrent: number;
  // Delay per already-active permit, applied after a permit is granted.
  staggerMs?: number;
  name?: string;
}

/**
 * Counting semaphore for in-flight remote work. Waiters are served in
 * arrival order. A permit is released exactly once, however many times
 * release() is called.
 */
export class ConcurrencyController {
  readonly maxConcurrent: number;
  private readonly staggerMs: number;
  private readonly name: string;
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(options: ConcurrencyControllerOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new Error(
        `maxConcurrent must be a positive integer, got ${options.maxConcurrent}`
      );
    }
    this.maxConcurrent = options.maxConcurrent;
    this.staggerMs = Math.max(0, options.staggerMs ?? 0);
    this.name = options.name ?? "default";
  }

  get activeCount(): number {
    return this.active;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<Permit> {
    signal?.throwIfAborted();

    if (this.active < this.maxConcurrent) {
      this.active++;
    } else {
      await this.enqueue(signal);
    }

    // Slots already taken when this permit was granted
    const position = this.active - 1;
    const permit = this.createPermit();

    if (this.staggerMs > 0 && position > 0) {
      try {
        await sleepFor(this.staggerMs * position, undefined, { signal });
      } catch (error) {
        permit.release();
        throw error;
      }
    }

    return permit;
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const permit = await this.acquire(signal);
    try {
      return await task();
    } finally {
      permit.release();
    }
  }

  private enqueue(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const grant = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(grant);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(grant);
    });
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        const next = this.waiters.shift();
        if (next) {
          // Slot handed straight to the next waiter; active count unchanged
          next();
        } else {
          this.active--;
        }
      },
    };
  }

  describe(): string {
    return `${this.name} active=${this.active}/${this.maxConcurrent} waiting=${this.waiters.length}`;
  }
}
