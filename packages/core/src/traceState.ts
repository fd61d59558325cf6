import { AsyncRWLock } from "./rwLock.js";
import type { TraceIndex } from "./traceIndex.js";

/**
 * Owns the one shared trace index. Rendering takes the read side; ingestion,
 * selection changes and replacement take the write side. A null index means no
 * run is installed and every accessor resolves to undefined.
 */
export class TraceState {
  private readonly lock = new AsyncRWLock();
  private index: TraceIndex | null = null;

  async read<T>(fn: (index: TraceIndex) => T): Promise<T | undefined> {
    return this.lock.withRead(() => (this.index ? fn(this.index) : undefined));
  }

  async write<T>(fn: (index: TraceIndex) => T): Promise<T | undefined> {
    return this.lock.withWrite(() => (this.index ? fn(this.index) : undefined));
  }

  /** Swaps the index; `onReplaced` runs before the write lock is released. */
  async replace(next: TraceIndex | null, onReplaced?: (previous: TraceIndex | null) => void): Promise<void> {
    await this.lock.withWrite(() => {
      const previous = this.index;
      this.index = next;
      onReplaced?.(previous);
    });
  }
}
