import { describe, expect, it } from "vitest";

import { KeyedLock } from "./keyed-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("serializes sections under the same key", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive("job", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.runExclusive("job", () => {
      order.push("second");
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.isLocked("job")).toBe(false);
  });

  it("lets different keys proceed independently", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.runExclusive("a", async () => {
      await gate.promise;
      order.push("a");
    });
    await lock.runExclusive("b", () => {
      order.push("b");
    });

    expect(order).toEqual(["b"]);
    gate.resolve();
    await blocked;
    expect(order).toEqual(["b", "a"]);
  });

  it("releases the key when a section throws", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.runExclusive("job", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.runExclusive("job", () => 42)).resolves.toBe(42);
    expect(lock.isLocked("job")).toBe(false);
  });
});
