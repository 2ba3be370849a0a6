export const CLASS_STATUSES = ["Open", "Waitlisted", "Full", "Closed"] as const;

export type ClassStatus = (typeof CLASS_STATUSES)[number];

export interface ClassTarget {
  subject: string; // e.g. "COM SCI"
  catalogNumber: string; // e.g. "111"
  term: string; // e.g. "26W"
}

export interface Snapshot extends ClassTarget {
  status: ClassStatus;
  enrolled: number;
  capacity: number;
  waitlistCount: number;
  waitlistCapacity: number;
  observedAt: string; // ISO
}

export interface ClassState extends ClassTarget {
  classKey: string;
  status: ClassStatus;
  enrolled: number;
  capacity: number;
  waitlistCount: number;
  waitlistCapacity: number;
  lastChecked: string; // ISO, observedAt of the latest snapshot
  lastNotifiedEnrolled: number | null;
  updatedAt: string; // ISO
}

export interface Subscription {
  userId: string;
  classKey: string;
  createdAt: string; // ISO
}

export type NotificationKind = "StatusChanged" | "SeatsOpenedWhileOpen" | "WaitlistOpened";

export interface NotificationEvent {
  classKey: string;
  kind: NotificationKind;
  previousStatus: ClassStatus;
  newStatus: ClassStatus;
  enrolled: number;
  capacity: number;
  waitlistCount: number;
  waitlistCapacity: number;
  description: string;
}

/** Everything a notifier needs to render a message without reading state again. */
export interface NotificationContext extends ClassTarget {
  previousStatus: ClassStatus;
  newStatus: ClassStatus;
  enrolled: number;
  capacity: number;
  waitlistCount: number;
  waitlistCapacity: number;
  description: string;
}

export interface Notifier {
  notify(
    userId: string,
    classKey: string,
    kind: NotificationKind,
    context: NotificationContext
  ): Promise<boolean>;
}

export interface SnapshotSource {
  /** Raw, unvalidated data; may be stale or wrong. */
  scrape(target: ClassTarget): Promise<unknown>;
}

export interface DeliveryAttempt {
  userId: string;
  kind: NotificationKind;
  ok: boolean;
  error?: string;
}
