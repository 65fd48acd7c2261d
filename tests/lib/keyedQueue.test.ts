/**
 * ModDesk — tests/lib/keyedQueue.test.ts
 * WHAT: Ordering and isolation of per-key task chains.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { KeyedQueue } from "../../src/lib/keyedQueue.js";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("KeyedQueue", () => {
  it("runs tasks for one key one at a time, in arrival order", async () => {
    const queue = new KeyedQueue();
    const log: string[] = [];

    const slow = queue.run("ticket:1", async () => {
      log.push("a:start");
      await tick();
      await tick();
      log.push("a:end");
      return "a";
    });
    const fast = queue.run("ticket:1", () => {
      log.push("b");
      return "b";
    });

    expect(await Promise.all([slow, fast])).toEqual(["a", "b"]);
    expect(log).toEqual(["a:start", "a:end", "b"]);
  });

  it("lets different keys interleave", async () => {
    const queue = new KeyedQueue();
    const log: string[] = [];

    const first = queue.run("ticket:1", async () => {
      log.push("1:start");
      await tick();
      await tick();
      log.push("1:end");
    });
    const second = queue.run("ticket:2", () => {
      log.push("2");
    });

    await Promise.all([first, second]);
    expect(log.indexOf("2")).toBeLessThan(log.indexOf("1:end"));
  });

  it("keeps the chain going after a task rejects", async () => {
    const queue = new KeyedQueue();

    const failing = queue.run("strikes:user-1", () => {
      throw new Error("boom");
    });
    const next = queue.run("strikes:user-1", () => 42);

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });

  it("forgets idle keys once their work settles", async () => {
    const queue = new KeyedQueue();
    const running = queue.run("suggestion:msg-1", () => tick());
    expect(queue.activeKeys).toBe(1);

    await running;
    await tick();
    expect(queue.activeKeys).toBe(0);
  });
});
