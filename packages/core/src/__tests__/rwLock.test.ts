import { describe, expect, it } from "vitest";
import { AsyncMutex, AsyncRWLock } from "../rwLock.js";

async function settle(): Promise<void> {
  for (let i = 0; i < 5; i += 1) await Promise.resolve();
}

describe("AsyncRWLock", () => {
  it("admits concurrent readers", async () => {
    const lock = new AsyncRWLock();
    const first = await lock.acquireRead();
    const second = await lock.acquireRead();
    expect(lock.readerCount).toBe(2);
    first();
    second();
    expect(lock.readerCount).toBe(0);
  });

  it("makes a writer wait for readers to leave", async () => {
    const lock = new AsyncRWLock();
    const reader = await lock.acquireRead();
    let acquired = false;
    const writer = lock.acquireWrite().then((release) => {
      acquired = true;
      return release;
    });

    await settle();
    expect(acquired).toBe(false);

    reader();
    const release = await writer;
    expect(lock.isWriteLocked).toBe(true);
    release();
    expect(lock.isWriteLocked).toBe(false);
  });

  it("lets a queued writer go before readers that arrive after it", async () => {
    const lock = new AsyncRWLock();
    const order: string[] = [];
    const reader = await lock.acquireRead();

    const writer = lock.acquireWrite().then((release) => {
      order.push("write");
      release();
    });
    const lateReader = lock.acquireRead().then((release) => {
      order.push("read");
      release();
    });

    reader();
    await Promise.all([writer, lateReader]);
    expect(order).toEqual(["write", "read"]);
  });

  it("never runs two writers at once", async () => {
    const lock = new AsyncRWLock();
    let active = 0;
    let peak = 0;
    const task = () =>
      lock.withWrite(async () => {
        active += 1;
        peak = Math.max(peak, active);
        await settle();
        active -= 1;
      });

    await Promise.all([task(), task(), task()]);
    expect(peak).toBe(1);
  });

  it("ignores a repeated release", async () => {
    const lock = new AsyncRWLock();
    const release = await lock.acquireRead();
    release();
    release();
    expect(lock.readerCount).toBe(0);
  });
});

describe("AsyncMutex", () => {
  it("hands the lock to waiters in arrival order", async () => {
    const mutex = new AsyncMutex();
    const order: string[] = [];
    const release = await mutex.acquire();

    const first = mutex.withLock(() => {
      order.push("first");
    });
    const second = mutex.withLock(() => {
      order.push("second");
    });

    expect(mutex.isLocked).toBe(true);
    release();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
    expect(mutex.isLocked).toBe(false);
  });
});
