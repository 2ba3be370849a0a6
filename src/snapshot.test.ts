import { describe, it, expect } from "vitest";
import { InvalidSnapshotError } from "./errors.js";
import { validateSnapshot } from "./snapshot.js";

function raw(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    subject: "com sci",
    catalogNumber: "111",
    term: "26W",
    status: "Open",
    enrolled: 28,
    capacity: 30,
    waitlistCount: 0,
    waitlistCapacity: 10,
    observedAt: "2026-01-10T10:05:00.000Z",
    ...overrides,
  };
}

function issuesOf(input: unknown): string[] {
  try {
    validateSnapshot(input);
  } catch (err) {
    if (err instanceof InvalidSnapshotError) return err.issues;
    throw err;
  }
  return [];
}

describe("validateSnapshot", () => {
  it("accepts a well-formed snapshot and normalizes its identity", () => {
    const snapshot = validateSnapshot(raw());
    expect(snapshot.subject).toBe("COM SCI");
    expect(snapshot.enrolled).toBe(28);
    expect(snapshot.status).toBe("Open");
  });

  it("rejects negative counts", () => {
    expect(() => validateSnapshot(raw({ enrolled: -1 }))).toThrow(InvalidSnapshotError);
    expect(issuesOf(raw({ waitlistCount: -2 }))).toHaveLength(1);
    expect(issuesOf(raw({ waitlistCount: -2 }))[0]).toMatch(/^waitlistCount: /);
  });

  it("rejects more enrolled than capacity", () => {
    expect(issuesOf(raw({ enrolled: 31, capacity: 30 }))).toEqual(["enrolled: enrolled exceeds capacity"]);
  });

  it("takes capacity 0 as no bound on enrolled", () => {
    expect(validateSnapshot(raw({ enrolled: 5, capacity: 0 })).enrolled).toBe(5);
  });

  it("rejects unknown statuses, fractions and bad timestamps", () => {
    expect(() => validateSnapshot(raw({ status: "Unknown" }))).toThrow(InvalidSnapshotError);
    expect(() => validateSnapshot(raw({ enrolled: 2.5 }))).toThrow(InvalidSnapshotError);
    expect(() => validateSnapshot(raw({ observedAt: "yesterday" }))).toThrow(InvalidSnapshotError);
    expect(() => validateSnapshot(null)).toThrow(InvalidSnapshotError);
  });
});
