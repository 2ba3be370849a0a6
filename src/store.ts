import path from "node:path";
import { AppConfig } from "./config.js";
import { initializeFirestore } from "./firebase.js";
import { FileStore } from "./fileStore.js";
import { FirestoreStore } from "./firestoreStore.js";
import { ClassState } from "./types.js";

export interface Transition<T> {
  /** Row to write, or null to leave the stored row untouched. */
  next: ClassState | null;
  result: T;
}

export interface ClassStateStore {
  load(classKey: string): Promise<ClassState | null>;
  /** Atomic upsert of the whole row. */
  commit(classKey: string, state: ClassState): Promise<void>;
  /**
   * Load-decide-commit as one critical section for `classKey`. `decide` must be pure:
   * a backend may run it more than once and only the last run's result counts.
   */
  transact<T>(classKey: string, decide: (previous: ClassState | null) => Transition<T>): Promise<T>;
  /** Deletes the row and every subscription to it. */
  remove(classKey: string): Promise<void>;
  /**
   * Deletes the row only if nobody is subscribed to it, decided in the same critical
   * section as the delete. Never touches subscriptions. Returns whether a row was deleted.
   */
  pruneUnsubscribed(classKey: string): Promise<boolean>;
  list(): Promise<ClassState[]>;
}

export interface SubscriptionIndex {
  subscribersOf(classKey: string): Promise<Set<string>>;
  /** Idempotent. Throws UnknownClassError when the class has no state row. */
  subscribe(userId: string, classKey: string): Promise<void>;
  /** Returns false when there was nothing to remove. */
  unsubscribe(userId: string, classKey: string): Promise<boolean>;
  classesOf(userId: string): Promise<Set<string>>;
  /** Every class with at least one subscriber. */
  subscribedClasses(): Promise<Set<string>>;
}

export type Store = ClassStateStore & SubscriptionIndex;

export function createStore(config: AppConfig): Store {
  const firestore = initializeFirestore(config);
  if (firestore) {
    console.log("[STORE] Using Firestore");
    return new FirestoreStore(firestore, {
      statesCollection: config.FIRESTORE_COLLECTION,
      subscriptionsCollection: config.FIRESTORE_SUBSCRIPTIONS_COLLECTION,
    });
  }
  console.log(`[STORE] Firebase not configured, using ${path.resolve(config.STATE_PATH)}`);
  return new FileStore(config.STATE_PATH);
}
