import { parseClassKey } from "./classKey.js";
import { SubscriptionIndex } from "./store.js";
import { DeliveryAttempt, NotificationContext, NotificationEvent, Notifier } from "./types.js";
import { errorMessage, sleep, withTimeout } from "./utils.js";

export interface DispatcherOptions {
  /** Upper bound for a single delivery. */
  timeoutMs: number;
  /** Pause between deliveries to stay under the chat platform's rate limit. */
  delayMs?: number;
}

export class NotificationDispatcher {
  constructor(
    private readonly subscriptions: SubscriptionIndex,
    private readonly notifier: Notifier,
    private readonly options: DispatcherOptions
  ) {}

  /**
   * One delivery attempt per (subscriber, event). Failures are logged and reported in the
   * result; they are never retried and never thrown.
   */
  async dispatch(classKey: string, events: NotificationEvent[]): Promise<DeliveryAttempt[]> {
    const attempts: DeliveryAttempt[] = [];
    if (events.length === 0) return attempts;

    const subscribers = [...(await this.subscriptions.subscribersOf(classKey))];
    if (subscribers.length === 0) {
      console.log(`[DISPATCH] ${classKey}: ${events.length} event(s), no subscribers`);
      return attempts;
    }

    const target = parseClassKey(classKey);
    for (const event of events) {
      const context: NotificationContext = {
        subject: target.subject,
        catalogNumber: target.catalogNumber,
        term: target.term,
        previousStatus: event.previousStatus,
        newStatus: event.newStatus,
        enrolled: event.enrolled,
        capacity: event.capacity,
        waitlistCount: event.waitlistCount,
        waitlistCapacity: event.waitlistCapacity,
        description: event.description,
      };

      for (const userId of subscribers) {
        if (attempts.length > 0 && this.options.delayMs) {
          await sleep(this.options.delayMs);
        }
        try {
          const ok = await withTimeout(
            this.notifier.notify(userId, classKey, event.kind, context),
            this.options.timeoutMs,
            `notify ${userId}`
          );
          if (!ok) {
            console.warn(`[DISPATCH] ${event.kind} for ${classKey} not delivered to ${userId}`);
          }
          attempts.push({ userId, kind: event.kind, ok });
        } catch (err) {
          const error = errorMessage(err);
          console.warn(`[DISPATCH] ${event.kind} for ${classKey} failed for ${userId}: ${error}`);
          attempts.push({ userId, kind: event.kind, ok: false, error });
        }
      }
    }

    const delivered = attempts.filter((a) => a.ok).length;
    console.log(`[DISPATCH] ${classKey}: ${delivered}/${attempts.length} delivered`);
    return attempts;
  }
}
