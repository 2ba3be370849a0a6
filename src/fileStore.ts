import fs from "node:fs";
import path from "node:path";
import lockfile, { type LockOptions } from "proper-lockfile";
import { z } from "zod";
import { UnknownClassError } from "./errors.js";
import { classStateSchema, subscriptionSchema } from "./snapshot.js";
import { Store, Transition } from "./store.js";
import { ClassState, Subscription } from "./types.js";

const fileSchema = z.object({
  classes: z.record(classStateSchema).default({}),
  subscriptions: z.array(subscriptionSchema).default([]),
});

type StateFile = z.infer<typeof fileSchema>;

export interface FileStoreOptions {
  /** How long to keep retrying while another process holds the lock. */
  lockRetries?: number;
  /** A lock older than this is considered abandoned by a crashed process. */
  lockStaleMs?: number;
}

interface Change<T> {
  /** Rewritten file, or null when nothing changed. */
  data: StateFile | null;
  result: T;
}

/**
 * JSON file backend shared by the processes of one host. Every read-modify-write holds an
 * exclusive lock on `<file>.lock` for its whole duration, and the rename keeps unlocked
 * readers from seeing a half-written file.
 */
export class FileStore implements Store {
  private readonly lockOptions: LockOptions;

  constructor(
    private readonly filePath: string,
    options: FileStoreOptions = {}
  ) {
    this.lockOptions = {
      realpath: false,
      stale: options.lockStaleMs ?? 10000,
      retries: { retries: options.lockRetries ?? 100, factor: 1.2, minTimeout: 10, maxTimeout: 200 },
    };
  }

  private read(): StateFile {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return { classes: {}, subscriptions: [] };
      }
      throw err;
    }
    return fileSchema.parse(JSON.parse(raw));
  }

  private write(data: StateFile): void {
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2), "utf8");
    fs.renameSync(tmp, this.filePath);
  }

  /** Read, change and write back under the cross-process lock. */
  private async update<T>(change: (data: StateFile) => Change<T>): Promise<T> {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const release = await lockfile.lock(this.filePath, this.lockOptions);
    try {
      const { data, result } = change(this.read());
      if (data) this.write(data);
      return result;
    } finally {
      await release();
    }
  }

  async load(classKey: string): Promise<ClassState | null> {
    return this.read().classes[classKey] ?? null;
  }

  async commit(classKey: string, state: ClassState): Promise<void> {
    await this.update((data) => {
      data.classes[classKey] = { ...state, classKey };
      return { data, result: undefined };
    });
  }

  async transact<T>(classKey: string, decide: (previous: ClassState | null) => Transition<T>): Promise<T> {
    return this.update((data) => {
      const { next, result } = decide(data.classes[classKey] ?? null);
      if (!next) return { data: null, result };
      data.classes[classKey] = { ...next, classKey };
      return { data, result };
    });
  }

  async remove(classKey: string): Promise<void> {
    await this.update((data) => {
      delete data.classes[classKey];
      data.subscriptions = data.subscriptions.filter((s) => s.classKey !== classKey);
      return { data, result: undefined };
    });
  }

  async pruneUnsubscribed(classKey: string): Promise<boolean> {
    return this.update((data) => {
      if (!data.classes[classKey]) return { data: null, result: false };
      if (data.subscriptions.some((s) => s.classKey === classKey)) return { data: null, result: false };
      delete data.classes[classKey];
      return { data, result: true };
    });
  }

  async list(): Promise<ClassState[]> {
    return Object.values(this.read().classes).sort(
      (a, b) => a.subject.localeCompare(b.subject) || a.catalogNumber.localeCompare(b.catalogNumber)
    );
  }

  async subscribersOf(classKey: string): Promise<Set<string>> {
    return new Set(this.read().subscriptions.filter((s) => s.classKey === classKey).map((s) => s.userId));
  }

  async subscribe(userId: string, classKey: string): Promise<void> {
    await this.update((data) => {
      if (!data.classes[classKey]) {
        throw new UnknownClassError(classKey);
      }
      if (data.subscriptions.some((s) => s.userId === userId && s.classKey === classKey)) {
        return { data: null, result: undefined };
      }
      const subscription: Subscription = { userId, classKey, createdAt: new Date().toISOString() };
      data.subscriptions.push(subscription);
      return { data, result: undefined };
    });
  }

  async unsubscribe(userId: string, classKey: string): Promise<boolean> {
    return this.update((data) => {
      const kept = data.subscriptions.filter((s) => !(s.userId === userId && s.classKey === classKey));
      if (kept.length === data.subscriptions.length) return { data: null, result: false };
      data.subscriptions = kept;
      return { data, result: true };
    });
  }

  async classesOf(userId: string): Promise<Set<string>> {
    return new Set(this.read().subscriptions.filter((s) => s.userId === userId).map((s) => s.classKey));
  }

  async subscribedClasses(): Promise<Set<string>> {
    return new Set(this.read().subscriptions.map((s) => s.classKey));
  }
}
