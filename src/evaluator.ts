import { formatClass, makeClassKey } from "./classKey.js";
import { ClassState, NotificationEvent, NotificationKind, Snapshot } from "./types.js";

export interface Evaluation {
  events: NotificationEvent[];
  /** State to persist. Equal to `previous` when the snapshot is stale. */
  next: ClassState;
  /** The snapshot was observed before the stored one and was ignored. */
  stale: boolean;
}

function enrollment(enrolled: number, capacity: number): string {
  return capacity > 0 ? `${enrolled}/${capacity} enrolled` : `${enrolled} enrolled`;
}

function describe(kind: NotificationKind, previous: ClassState, current: Snapshot): string {
  const name = formatClass(current);
  switch (kind) {
    case "StatusChanged":
      return `${name} changed from ${previous.status} to ${current.status} (${enrollment(current.enrolled, current.capacity)})`;
    case "SeatsOpenedWhileOpen":
      return `${name} is still Open with ${current.capacity - current.enrolled} seat(s) left (${enrollment(current.enrolled, current.capacity)})`;
    case "WaitlistOpened":
      return `${name} waitlist has room (${current.waitlistCount}/${current.waitlistCapacity})`;
  }
}

function toState(current: Snapshot, lastNotifiedEnrolled: number | null, now: string): ClassState {
  return {
    classKey: makeClassKey(current),
    subject: current.subject,
    catalogNumber: current.catalogNumber,
    term: current.term,
    status: current.status,
    enrolled: current.enrolled,
    capacity: current.capacity,
    waitlistCount: current.waitlistCount,
    waitlistCapacity: current.waitlistCapacity,
    lastChecked: current.observedAt,
    lastNotifiedEnrolled,
    updatedAt: now,
  };
}

/**
 * Decides which notifications a fresh snapshot warrants and the state to store with it.
 * Events and next state come from one call so they can be committed together.
 */
export function evaluate(
  previous: ClassState | null,
  current: Snapshot,
  now: string = new Date().toISOString()
): Evaluation {
  if (!previous) {
    // First observation: baseline only. Nothing was sent, so there is no marker yet.
    return { events: [], next: toState(current, null, now), stale: false };
  }

  if (Date.parse(current.observedAt) < Date.parse(previous.lastChecked)) {
    return { events: [], next: previous, stale: true };
  }

  const events: NotificationEvent[] = [];
  let marker = previous.lastNotifiedEnrolled;

  const emit = (kind: NotificationKind) => {
    events.push({
      classKey: previous.classKey,
      kind,
      previousStatus: previous.status,
      newStatus: current.status,
      enrolled: current.enrolled,
      capacity: current.capacity,
      waitlistCount: current.waitlistCount,
      waitlistCapacity: current.waitlistCapacity,
      description: describe(kind, previous, current),
    });
  };

  if (previous.status !== current.status) {
    emit("StatusChanged");
    marker = current.status === "Open" ? current.enrolled : null;
  } else if (current.status === "Open") {
    const moved = marker === null || current.enrolled !== marker;
    if (moved && current.enrolled < current.capacity) {
      emit("SeatsOpenedWhileOpen");
      marker = current.enrolled;
    }
  }
  // Full, Closed and Waitlisted that stay put are not re-announced.

  const waitlistWasFull = previous.waitlistCount >= previous.waitlistCapacity;
  const waitlistHasRoom = current.waitlistCount < current.waitlistCapacity;
  if (waitlistWasFull && waitlistHasRoom) {
    emit("WaitlistOpened");
  }

  const next = { ...toState(current, marker, now), classKey: previous.classKey };
  return { events, next, stale: false };
}
