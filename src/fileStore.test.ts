import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import lockfile from "proper-lockfile";
import { UnknownClassError } from "./errors.js";
import { FileStore } from "./fileStore.js";
import type { ClassState } from "./types.js";
import { sleep } from "./utils.js";

const KEY = "26W|COM SCI|111";

function makeState(overrides: Partial<ClassState> = {}): ClassState {
  return {
    classKey: KEY,
    subject: "COM SCI",
    catalogNumber: "111",
    term: "26W",
    status: "Full",
    enrolled: 30,
    capacity: 30,
    waitlistCount: 2,
    waitlistCapacity: 10,
    lastChecked: "2026-01-10T10:00:00.000Z",
    lastNotifiedEnrolled: null,
    updatedAt: "2026-01-10T10:00:01.000Z",
    ...overrides,
  };
}

describe("FileStore", () => {
  let dir: string;
  let file: string;
  let store: FileStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "seat-watch-"));
    file = path.join(dir, "nested", "state.json");
    store = new FileStore(file);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("class state", () => {
    it("returns null for a class never stored", async () => {
      expect(await store.load(KEY)).toBeNull();
    });

    it("keeps a null marker distinct from a missing row", async () => {
      await store.commit(KEY, makeState());
      const loaded = await store.load(KEY);
      expect(loaded).not.toBeNull();
      expect(loaded?.lastNotifiedEnrolled).toBeNull();
    });

    it("replaces the whole row on commit", async () => {
      await store.commit(KEY, makeState());
      await store.commit(KEY, makeState({ status: "Open", enrolled: 28, lastNotifiedEnrolled: 28 }));
      expect(await store.load(KEY)).toEqual(makeState({ status: "Open", enrolled: 28, lastNotifiedEnrolled: 28 }));
    });

    it("persists across instances", async () => {
      await store.commit(KEY, makeState());
      expect(await new FileStore(file).load(KEY)).toEqual(makeState());
    });

    it("writes what transact decides and returns its result", async () => {
      await store.commit(KEY, makeState());
      const result = await store.transact(KEY, (previous) => ({
        next: previous ? { ...previous, status: "Open", enrolled: 29 } : null,
        result: previous?.status,
      }));
      expect(result).toBe("Full");
      expect((await store.load(KEY))?.status).toBe("Open");
    });

    it("leaves the row alone when transact decides nothing", async () => {
      await store.commit(KEY, makeState());
      await store.transact(KEY, () => ({ next: null, result: undefined }));
      expect(await store.load(KEY)).toEqual(makeState());
    });

    it("lists classes by subject and catalog number", async () => {
      await store.commit("26W|PSYCH|124G", makeState({ classKey: "26W|PSYCH|124G", subject: "PSYCH", catalogNumber: "124G" }));
      await store.commit(KEY, makeState());
      await store.commit("26W|COM SCI|31", makeState({ classKey: "26W|COM SCI|31", catalogNumber: "31" }));
      expect((await store.list()).map((s) => s.classKey)).toEqual(["26W|COM SCI|111", "26W|COM SCI|31", "26W|PSYCH|124G"]);
    });

    it("refuses a corrupted file instead of starting over", async () => {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, JSON.stringify({ classes: { [KEY]: { status: "Unknown" } } }));
      await expect(store.load(KEY)).rejects.toThrow();
    });
  });

  describe("subscriptions", () => {
    beforeEach(async () => {
      await store.commit(KEY, makeState());
    });

    it("subscribes idempotently", async () => {
      await store.subscribe("u1", KEY);
      await store.subscribe("u1", KEY);
      await store.subscribe("u2", KEY);
      expect([...(await store.subscribersOf(KEY))]).toEqual(["u1", "u2"]);
    });

    it("requires the class to exist", async () => {
      await expect(store.subscribe("u1", "26W|MATH|31A")).rejects.toBeInstanceOf(UnknownClassError);
    });

    it("reports whether an unsubscribe removed anything", async () => {
      await store.subscribe("u1", KEY);
      expect(await store.unsubscribe("u1", KEY)).toBe(true);
      expect(await store.unsubscribe("u1", KEY)).toBe(false);
      expect((await store.subscribersOf(KEY)).size).toBe(0);
    });

    it("lists a user's classes and every subscribed class", async () => {
      await store.commit("26W|PSYCH|124G", makeState({ classKey: "26W|PSYCH|124G", subject: "PSYCH", catalogNumber: "124G" }));
      await store.subscribe("u1", KEY);
      await store.subscribe("u1", "26W|PSYCH|124G");
      await store.subscribe("u2", KEY);
      expect(await store.classesOf("u1")).toEqual(new Set([KEY, "26W|PSYCH|124G"]));
      expect(await store.classesOf("u3")).toEqual(new Set());
      expect(await store.subscribedClasses()).toEqual(new Set([KEY, "26W|PSYCH|124G"]));
    });

    it("keeps a subscription another process added while it waited for the lock", async () => {
      const release = await lockfile.lock(file, { realpath: false });
      const subscribing = store.subscribe("u1", KEY);
      fs.writeFileSync(
        file,
        JSON.stringify({
          classes: { [KEY]: makeState() },
          subscriptions: [{ userId: "u9", classKey: KEY, createdAt: "2026-01-10T10:01:00.000Z" }],
        })
      );
      await sleep(30);
      await release();
      await subscribing;

      expect(await store.subscribersOf(KEY)).toEqual(new Set(["u9", "u1"]));
    });

    it("prunes a class only while nobody is subscribed", async () => {
      await store.subscribe("u1", KEY);
      expect(await store.pruneUnsubscribed(KEY)).toBe(false);
      expect(await store.load(KEY)).not.toBeNull();
      expect(await store.subscribersOf(KEY)).toEqual(new Set(["u1"]));

      await store.unsubscribe("u1", KEY);
      expect(await store.pruneUnsubscribed(KEY)).toBe(true);
      expect(await store.load(KEY)).toBeNull();
      expect(await store.pruneUnsubscribed(KEY)).toBe(false);
    });

    it("removes subscriptions together with the class", async () => {
      await store.subscribe("u1", KEY);
      await store.subscribe("u2", KEY);
      await store.remove(KEY);
      expect(await store.load(KEY)).toBeNull();
      expect((await store.subscribersOf(KEY)).size).toBe(0);
      expect((await store.classesOf("u1")).size).toBe(0);
    });
  });
});
