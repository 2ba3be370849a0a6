import { describe, it, expect, vi } from "vitest";
import { KeyedLock } from "./lock.js";
import { sleep } from "./utils.js";

describe("KeyedLock", () => {
  it("runs tasks for one key one at a time, in order", async () => {
    const lock = new KeyedLock();
    const log: string[] = [];
    const task = (name: string, ms: number) => async () => {
      log.push(`${name} start`);
      await sleep(ms);
      log.push(`${name} end`);
      return name;
    };

    const results = await Promise.all([lock.run("a", task("first", 20)), lock.run("a", task("second", 1))]);

    expect(results).toEqual(["first", "second"]);
    expect(log).toEqual(["first start", "first end", "second start", "second end"]);
  });

  it("runs different keys independently", async () => {
    const lock = new KeyedLock();
    const log: string[] = [];
    const slow = lock.run("a", async () => {
      await sleep(20);
      log.push("a");
    });
    const fast = lock.run("b", async () => {
      log.push("b");
    });

    await Promise.all([slow, fast]);
    expect(log).toEqual(["b", "a"]);
  });

  it("keeps the queue moving after a failure", async () => {
    const lock = new KeyedLock();
    const failing = lock.run("a", async () => {
      throw new Error("boom");
    });
    const next = lock.run("a", async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("counts running and queued tasks per key", async () => {
    const lock = new KeyedLock();
    expect(lock.pending("a")).toBe(0);

    const first = lock.run("a", () => sleep(10));
    const second = lock.run("a", () => sleep(10));
    expect(lock.pending("a")).toBe(2);
    expect(lock.pending("b")).toBe(0);

    await Promise.all([first, second]);
    await vi.waitFor(() => expect(lock.pending("a")).toBe(0));
  });

  it("forgets keys once their work is done", async () => {
    const lock = new KeyedLock();
    const classes = Array.from({ length: 20 }, (_, i) => `26W|MATH|${i}`);

    await Promise.all(classes.map((key) => lock.run(key, () => sleep(1))));
    await expect(lock.run("a", async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");

    expect(lock.size).toBe(0);
  });

  it("keeps a key while tasks are still queued behind it", async () => {
    const lock = new KeyedLock();
    const first = lock.run("a", () => sleep(10));
    const second = lock.run("a", () => sleep(10));

    await first;
    expect(lock.size).toBe(1);
    await second;
    expect(lock.size).toBe(0);
  });
});
