import pLimit from "p-limit";
import { makeClassKey, parseClassKey } from "./classKey.js";
import { CheckOutcome, ClassPipeline } from "./pipeline.js";
import { Store } from "./store.js";
import { ClassTarget } from "./types.js";
import { errorMessage } from "./utils.js";

export interface MonitorSummary {
  checked: number;
  baseline: number;
  unchanged: number;
  withEvents: number;
  events: number;
  skipped: number;
  failed: number;
  delivered: number;
  undelivered: number;
  removed: number;
}

export interface MonitorOptions {
  watchClasses: ClassTarget[];
  concurrency: number;
}

/** Configured classes plus every class somebody subscribed to, keyed and de-duplicated. */
export async function resolveWatchList(store: Store, configured: ClassTarget[]): Promise<Map<string, ClassTarget>> {
  const targets = new Map<string, ClassTarget>();
  for (const target of configured) {
    targets.set(makeClassKey(target), target);
  }
  for (const classKey of await store.subscribedClasses()) {
    if (!targets.has(classKey)) targets.set(classKey, parseClassKey(classKey));
  }
  return targets;
}

function summarize(outcomes: CheckOutcome[], removed: number): MonitorSummary {
  const summary: MonitorSummary = {
    checked: outcomes.length,
    baseline: 0,
    unchanged: 0,
    withEvents: 0,
    events: 0,
    skipped: 0,
    failed: 0,
    delivered: 0,
    undelivered: 0,
    removed,
  };
  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case "baseline":
        summary.baseline++;
        break;
      case "evaluated":
        if (outcome.events.length === 0) {
          summary.unchanged++;
          break;
        }
        summary.withEvents++;
        summary.events += outcome.events.length;
        for (const attempt of outcome.deliveries) {
          if (attempt.ok) summary.delivered++;
          else summary.undelivered++;
        }
        break;
      case "skipped":
        summary.skipped++;
        break;
      case "failed":
        summary.failed++;
        break;
    }
  }
  return summary;
}

export async function runMonitorOnce(
  store: Store,
  pipeline: ClassPipeline,
  options: MonitorOptions
): Promise<MonitorSummary> {
  const targets = await resolveWatchList(store, options.watchClasses);

  // Not configured and unsubscribed when the watch list was read. The store re-checks
  // subscribers under its own lock, so a class subscribed since then is kept.
  let removed = 0;
  for (const state of await store.list()) {
    if (targets.has(state.classKey)) continue;
    try {
      if (await store.pruneUnsubscribed(state.classKey)) {
        removed++;
        console.log(`[MONITOR] Removed unwatched class ${state.classKey}`);
      } else {
        console.log(`[MONITOR] ${state.classKey} not removed, it gained a subscriber or is already gone`);
      }
    } catch (err) {
      console.error(`[MONITOR] Could not remove ${state.classKey}: ${errorMessage(err)}`);
    }
  }

  if (targets.size === 0) {
    console.log("[MONITOR] No classes to monitor. Configure WATCH_CLASSES or /subscribe in the bot.");
    return summarize([], removed);
  }

  console.log(`[MONITOR] Checking ${targets.size} class(es)...`);
  const limiter = pLimit(options.concurrency);
  const outcomes = await Promise.all(
    [...targets].map(([classKey, target]) =>
      limiter(async (): Promise<CheckOutcome> => {
        try {
          return await pipeline.check(target);
        } catch (err) {
          console.error(`[MONITOR] ${classKey} failed: ${errorMessage(err)}`);
          return { kind: "failed", classKey, error: errorMessage(err) };
        }
      })
    )
  );

  const summary = summarize(outcomes, removed);
  console.log(
    `[MONITOR] Done: ${summary.checked} checked, ${summary.baseline} baseline, ${summary.withEvents} changed ` +
      `(${summary.events} event(s), ${summary.delivered}/${summary.delivered + summary.undelivered} delivered), ` +
      `${summary.skipped} skipped, ${summary.failed} failed`
  );
  return summary;
}
