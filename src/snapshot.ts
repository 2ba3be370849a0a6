import { z } from "zod";
import { normalizeTarget } from "./classKey.js";
import { InvalidSnapshotError } from "./errors.js";
import { CLASS_STATUSES, Snapshot } from "./types.js";

const statusSchema = z.enum(CLASS_STATUSES);

const count = z.number().int().nonnegative();
const isoDate = z.string().refine((v) => !Number.isNaN(Date.parse(v)), { message: "Invalid timestamp" });

export const snapshotSchema = z
  .object({
    subject: z.string().min(1),
    catalogNumber: z.string().min(1),
    term: z.string().min(1),
    status: statusSchema,
    enrolled: count,
    capacity: count,
    waitlistCount: count,
    waitlistCapacity: count,
    observedAt: isoDate,
  })
  .refine((s) => s.capacity === 0 || s.enrolled <= s.capacity, {
    message: "enrolled exceeds capacity",
    path: ["enrolled"],
  });

export const classStateSchema = z.object({
  classKey: z.string().min(1),
  subject: z.string(),
  catalogNumber: z.string(),
  term: z.string(),
  status: statusSchema,
  enrolled: count,
  capacity: count,
  waitlistCount: count,
  waitlistCapacity: count,
  lastChecked: isoDate,
  lastNotifiedEnrolled: count.nullable(),
  updatedAt: isoDate,
});

export const subscriptionSchema = z.object({
  userId: z.string().min(1),
  classKey: z.string().min(1),
  createdAt: isoDate,
});

/** Rejects scraper output that must never reach the evaluator. */
export function validateSnapshot(raw: unknown): Snapshot {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
    throw new InvalidSnapshotError(`Invalid snapshot: ${issues.join(", ")}`, issues);
  }
  return { ...parsed.data, ...normalizeTarget(parsed.data) };
}
