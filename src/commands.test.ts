import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { handleCommand, parseCommand, type CommandDeps } from "./commands.js";
import { makeClassKey } from "./classKey.js";
import { FileStore } from "./fileStore.js";
import type { CheckOutcome } from "./pipeline.js";
import type { ClassState, ClassTarget } from "./types.js";

function makeState(target: ClassTarget): ClassState {
  return {
    ...target,
    classKey: makeClassKey(target),
    status: "Open",
    enrolled: 28,
    capacity: 30,
    waitlistCount: 0,
    waitlistCapacity: 0,
    lastChecked: "2026-01-10T10:05:00.000Z",
    lastNotifiedEnrolled: 28,
    updatedAt: "2026-01-10T10:05:01.000Z",
  };
}

// =============================================================================
// Parsing
// =============================================================================

describe("parseCommand", () => {
  it("splits name and arguments", () => {
    expect(parseCommand("/check@SeatBot  com sci 111 ")).toEqual({ name: "check", args: "com sci 111" });
    expect(parseCommand("/LIST")).toEqual({ name: "list", args: "" });
  });

  it("ignores plain text", () => {
    expect(parseCommand("hello")).toBeNull();
  });
});

// =============================================================================
// Handlers
// =============================================================================

describe("handleCommand", () => {
  let dir: string;
  let deps: CommandDeps;
  let store: FileStore;
  let check: Mock<(target: ClassTarget) => Promise<CheckOutcome>>;
  let replies: string[];

  const run = (text: string, userId = "u1") =>
    handleCommand(deps, { userId, reply: async (html) => void replies.push(html) }, text);

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "seat-watch-"));
    store = new FileStore(path.join(dir, "state.json"));
    replies = [];
    // Behaves like a first successful check
    check = vi.fn(async (target: ClassTarget): Promise<CheckOutcome> => {
      const state = makeState(target);
      await store.commit(state.classKey, state);
      return { kind: "baseline", classKey: state.classKey, state };
    });
    deps = { store, pipeline: { check }, term: "26W" };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("answers help and plain text with the command list", async () => {
    await run("/start");
    await run("what?");
    expect(replies).toHaveLength(2);
    expect(replies[0].split("\n")[0]).toBe("<b>Class seat monitor</b>");
    expect(replies[1]).toBe(replies[0]);
  });

  it("rejects unknown commands and missing arguments", async () => {
    await run("/foo");
    await run("/check PSYCH");
    expect(replies).toEqual([
      "Unknown command /foo. Try /help",
      "Usage: <code>/check SUBJECT CATALOG</code>, e.g. <code>/check COM SCI 111</code>",
    ]);
  });

  it("checks a class and reports its status", async () => {
    await run("/check com sci 111");

    expect(check).toHaveBeenCalledWith({ subject: "COM SCI", catalogNumber: "111", term: "26W" });
    expect(replies[0].split("\n").slice(0, 2)).toEqual(["📚 <b>COM SCI 111</b> (26W)", "Status: ✅ <b>Open</b>"]);
  });

  it("falls back to the stored state when the check is skipped", async () => {
    await store.commit("26W|COM SCI|111", { ...makeState({ subject: "COM SCI", catalogNumber: "111", term: "26W" }), status: "Full" });
    check.mockResolvedValue({ kind: "skipped", classKey: "26W|COM SCI|111", reason: "timeout" });

    await run("/check COM SCI 111");

    expect(replies[0].split("\n")[1]).toBe("Status: 🔴 <b>Full</b>");
  });

  it("says so when a class cannot be found", async () => {
    check.mockResolvedValue({ kind: "skipped", classKey: "26W|COM SCI|999", reason: "scrape_failed" });

    await run("/check COM SCI 999");

    expect(replies).toEqual([
      "❌ Could not find COM SCI 999 for term 26W.\nMake sure the class exists and the term code is correct.",
    ]);
  });

  it("subscribes once and unsubscribes once", async () => {
    await run("/subscribe com sci 111");
    await run("/subscribe COM SCI 111");
    await run("/unsubscribe COM SCI 111");
    await run("/unsubscribe COM SCI 111");

    expect(replies).toEqual([
      "✅ Subscribed to <b>COM SCI 111</b>!\n📊 Current status: <b>Open</b> (28/30)\n\n" +
        "I'll message you when this class has open spots.\n<i>Use /unsubscribe COM SCI 111 to stop notifications.</i>",
      "ℹ️ You're already subscribed to COM SCI 111!",
      "✅ Unsubscribed from COM SCI 111.",
      "ℹ️ You're not subscribed to COM SCI 111.",
    ]);
    expect(check).toHaveBeenCalledTimes(1);
  });

  it("does not subscribe to a class it could not check", async () => {
    check.mockResolvedValue({ kind: "skipped", classKey: "26W|COM SCI|111", reason: "timeout" });

    await run("/subscribe COM SCI 111");

    expect(replies).toEqual(["❌ Could not check COM SCI 111 right now. Please try again."]);
    expect(await store.classesOf("u1")).toEqual(new Set());
  });

  it("lists only the caller's subscriptions", async () => {
    await run("/subscribe MATH 31B", "u1");
    await run("/subscribe COM SCI 111", "u2");
    replies = [];

    await run("/list", "u1");

    expect(replies).toEqual([
      [
        "📚 <b>Your subscribed classes</b> (1)",
        "",
        "✅ <b>MATH 31B</b>: Open (28/30)",
        "<i>Last checked 2026-01-10 10:05</i>",
      ].join("\n"),
    ]);
  });
});
