import { LibraryError } from "../library/errors";

export type ReleaseLock = () => void;

/**
 * FIFO async mutex per key. A waiter that gives up after `timeoutMs` fails with
 * `Conflict` and passes its turn through, so later waiters are not stranded.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  constructor(private readonly timeoutMs: number) {}

  async acquire(key: string): Promise<ReleaseLock> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: ReleaseLock = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    const outcome = await new Promise<"acquired" | "timeout">((resolve) => {
      const timer = setTimeout(() => resolve("timeout"), this.timeoutMs);
      void previous.then(() => {
        clearTimeout(timer);
        resolve("acquired");
      });
    });

    if (outcome === "timeout") {
      release();
      throw new LibraryError("Conflict", `Timed out after ${this.timeoutMs}ms waiting for ${key}.`, {
        key,
        timeoutMs: this.timeoutMs,
      });
    }
    return release;
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
