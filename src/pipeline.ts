import { makeClassKey, normalizeTarget } from "./classKey.js";
import { NotificationDispatcher } from "./dispatcher.js";
import { InvalidSnapshotError, TimeoutError } from "./errors.js";
import { Evaluation, evaluate } from "./evaluator.js";
import { KeyedLock } from "./lock.js";
import { validateSnapshot } from "./snapshot.js";
import { ClassStateStore } from "./store.js";
import { ClassState, ClassTarget, DeliveryAttempt, NotificationEvent, Snapshot, SnapshotSource } from "./types.js";
import { errorMessage, withTimeout } from "./utils.js";

export type SkipReason = "scrape_failed" | "timeout" | "invalid_snapshot" | "stale" | "shutting_down";

export type CheckOutcome =
  | { kind: "baseline"; classKey: string; state: ClassState }
  | {
      kind: "evaluated";
      classKey: string;
      state: ClassState;
      events: NotificationEvent[];
      deliveries: DeliveryAttempt[];
    }
  | { kind: "skipped"; classKey: string; reason: SkipReason; detail?: string }
  | { kind: "failed"; classKey: string; error: string };

export interface PipelineOptions {
  scrapeTimeoutMs: number;
  now?: () => Date;
}

/**
 * Scrape, validate, evaluate-and-commit, dispatch for one class at a time per key.
 * Events are only dispatched after their state change is committed.
 */
export class ClassPipeline {
  private readonly lock = new KeyedLock();
  private readonly inFlight = new Set<Promise<CheckOutcome>>();
  private closing = false;

  constructor(
    private readonly store: ClassStateStore,
    private readonly source: SnapshotSource,
    private readonly dispatcher: NotificationDispatcher,
    private readonly options: PipelineOptions
  ) {}

  check(target: ClassTarget): Promise<CheckOutcome> {
    const normalized = normalizeTarget(target);
    const classKey = makeClassKey(normalized);
    if (this.closing) {
      return Promise.resolve({ kind: "skipped", classKey, reason: "shutting_down" });
    }
    const tracked: Promise<CheckOutcome> = this.lock
      .run(classKey, () => this.run(classKey, normalized))
      .finally(() => this.inFlight.delete(tracked));
    this.inFlight.add(tracked);
    return tracked;
  }

  /** Stops taking new work and waits for started checks; queued ones return shutting_down. */
  async drain(): Promise<void> {
    this.closing = true;
    await Promise.allSettled([...this.inFlight]);
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  private async run(classKey: string, target: ClassTarget): Promise<CheckOutcome> {
    if (this.closing) {
      return { kind: "skipped", classKey, reason: "shutting_down" };
    }

    let raw: unknown;
    try {
      raw = await withTimeout(this.source.scrape(target), this.options.scrapeTimeoutMs, `scrape ${classKey}`);
    } catch (err) {
      const reason: SkipReason = err instanceof TimeoutError ? "timeout" : "scrape_failed";
      console.error(`[PIPELINE] ${classKey}: scrape ${reason === "timeout" ? "timed out" : "failed"}: ${errorMessage(err)}`);
      return { kind: "skipped", classKey, reason, detail: errorMessage(err) };
    }

    let snapshot: Snapshot;
    try {
      snapshot = validateSnapshot(raw);
      if (makeClassKey(snapshot) !== classKey) {
        throw new InvalidSnapshotError(`Snapshot is for ${makeClassKey(snapshot)}`);
      }
    } catch (err) {
      console.warn(`[PIPELINE] ${classKey}: data integrity: ${errorMessage(err)}`);
      return { kind: "skipped", classKey, reason: "invalid_snapshot", detail: errorMessage(err) };
    }

    let evaluation: Evaluation;
    let baseline: boolean;
    try {
      const now = (this.options.now ?? (() => new Date()))().toISOString();
      ({ evaluation, baseline } = await this.store.transact(classKey, (previous) => {
        const result = evaluate(previous, snapshot, now);
        return {
          next: result.stale ? null : result.next,
          result: { evaluation: result, baseline: previous === null },
        };
      }));
    } catch (err) {
      console.error(`[PIPELINE] ${classKey}: commit failed, nothing dispatched: ${errorMessage(err)}`);
      return { kind: "failed", classKey, error: errorMessage(err) };
    }

    if (evaluation.stale) {
      console.log(`[PIPELINE] ${classKey}: snapshot from ${snapshot.observedAt} is older than stored state, ignored`);
      return { kind: "skipped", classKey, reason: "stale" };
    }
    if (baseline) {
      console.log(`[PIPELINE] ${classKey}: first check, baseline ${snapshot.status} (${snapshot.enrolled}/${snapshot.capacity})`);
      return { kind: "baseline", classKey, state: evaluation.next };
    }

    const { events, next } = evaluation;
    if (events.length === 0) {
      console.log(`[PIPELINE] ${classKey}: ${next.status} (${next.enrolled}/${next.capacity}), no change`);
      return { kind: "evaluated", classKey, state: next, events, deliveries: [] };
    }

    console.log(`[PIPELINE] ${classKey}: ${events.map((e) => e.kind).join(", ")}`);
    let deliveries: DeliveryAttempt[] = [];
    try {
      deliveries = await this.dispatcher.dispatch(classKey, events);
    } catch (err) {
      // Committed already; delivery is best effort
      console.error(`[PIPELINE] ${classKey}: dispatch failed: ${errorMessage(err)}`);
    }
    return { kind: "evaluated", classKey, state: next, events, deliveries };
  }
}
