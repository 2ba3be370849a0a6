import admin from "firebase-admin";
import { UnknownClassError } from "./errors.js";
import { classStateSchema, subscriptionSchema } from "./snapshot.js";
import { Store, Transition } from "./store.js";
import { ClassState, Subscription } from "./types.js";

export interface FirestoreStoreOptions {
  statesCollection: string;
  subscriptionsCollection: string;
}

// Firestore ids cannot contain "/"
const docId = (value: string) => encodeURIComponent(value);

/**
 * Shared backend for the scheduled and interactive processes. Read-then-write paths run in
 * Firestore transactions, which retry the callback when a concurrent writer touched the
 * same documents.
 */
export class FirestoreStore implements Store {
  constructor(
    private readonly db: admin.firestore.Firestore,
    private readonly options: FirestoreStoreOptions
  ) {}

  private states() {
    return this.db.collection(this.options.statesCollection);
  }

  private subscriptions() {
    return this.db.collection(this.options.subscriptionsCollection);
  }

  private subscriptionRef(userId: string, classKey: string) {
    return this.subscriptions().doc(`${docId(classKey)}#${docId(userId)}`);
  }

  async load(classKey: string): Promise<ClassState | null> {
    const doc = await this.states().doc(docId(classKey)).get();
    if (!doc.exists) return null;
    return classStateSchema.parse(doc.data());
  }

  async commit(classKey: string, state: ClassState): Promise<void> {
    await this.states().doc(docId(classKey)).set({ ...state, classKey });
  }

  async transact<T>(classKey: string, decide: (previous: ClassState | null) => Transition<T>): Promise<T> {
    const ref = this.states().doc(docId(classKey));
    return this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      const previous = doc.exists ? classStateSchema.parse(doc.data()) : null;
      const { next, result } = decide(previous);
      if (next) {
        tx.set(ref, { ...next, classKey });
      }
      return result;
    });
  }

  async remove(classKey: string): Promise<void> {
    const ref = this.states().doc(docId(classKey));
    const subs = this.subscriptions().where("classKey", "==", classKey);
    await this.db.runTransaction(async (tx) => {
      const snapshot = await tx.get(subs);
      for (const doc of snapshot.docs) {
        tx.delete(doc.ref);
      }
      tx.delete(ref);
    });
  }

  async pruneUnsubscribed(classKey: string): Promise<boolean> {
    const ref = this.states().doc(docId(classKey));
    const subs = this.subscriptions().where("classKey", "==", classKey).limit(1);
    return this.db.runTransaction(async (tx) => {
      // Reading the row makes a concurrent subscribe (which reads it too) conflict with us
      const [state, subscribed] = await Promise.all([tx.get(ref), tx.get(subs)]);
      if (!state.exists || !subscribed.empty) return false;
      tx.delete(ref);
      return true;
    });
  }

  async list(): Promise<ClassState[]> {
    const snapshot = await this.states().orderBy("subject").orderBy("catalogNumber").get();
    return snapshot.docs.map((doc) => classStateSchema.parse(doc.data()));
  }

  async subscribersOf(classKey: string): Promise<Set<string>> {
    const snapshot = await this.subscriptions().where("classKey", "==", classKey).get();
    return new Set(snapshot.docs.map((doc) => subscriptionSchema.parse(doc.data()).userId));
  }

  async subscribe(userId: string, classKey: string): Promise<void> {
    const stateRef = this.states().doc(docId(classKey));
    const subRef = this.subscriptionRef(userId, classKey);
    await this.db.runTransaction(async (tx) => {
      const [state, existing] = await Promise.all([tx.get(stateRef), tx.get(subRef)]);
      if (!state.exists) {
        throw new UnknownClassError(classKey);
      }
      if (existing.exists) return;
      const subscription: Subscription = { userId, classKey, createdAt: new Date().toISOString() };
      tx.set(subRef, subscription);
    });
  }

  async unsubscribe(userId: string, classKey: string): Promise<boolean> {
    const ref = this.subscriptionRef(userId, classKey);
    return this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      if (!doc.exists) return false;
      tx.delete(ref);
      return true;
    });
  }

  async classesOf(userId: string): Promise<Set<string>> {
    const snapshot = await this.subscriptions().where("userId", "==", userId).get();
    return new Set(snapshot.docs.map((doc) => subscriptionSchema.parse(doc.data()).classKey));
  }

  async subscribedClasses(): Promise<Set<string>> {
    const snapshot = await this.subscriptions().select("classKey").get();
    const keys = new Set<string>();
    for (const doc of snapshot.docs) {
      const classKey: unknown = doc.get("classKey");
      if (typeof classKey === "string") keys.add(classKey);
    }
    return keys;
  }
}
