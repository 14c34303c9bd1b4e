import fs from "fs";
import path from "path";
import { z } from "zod";

import { logger } from "../logger.js";

export type SubscriberId = string;

export class PersistenceError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export interface SubscriberFile {
  /** Resolves null when nothing has been persisted yet. */
  read(): Promise<SubscriberId[] | null>;
  write(ids: SubscriberId[]): Promise<void>;
}

const subscriberListSchema = z.array(z.string().min(1));

export class JsonSubscriberFile implements SubscriberFile {
  constructor(readonly filePath: string) {}

  async read(): Promise<SubscriberId[] | null> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return null;
      throw new PersistenceError(`Cannot read ${this.filePath}`, this.filePath, { cause: err });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new PersistenceError(`${this.filePath} is not valid JSON`, this.filePath, { cause: err });
    }
    const parsed = subscriberListSchema.safeParse(data);
    if (!parsed.success) {
      throw new PersistenceError(
        `${this.filePath} must hold a JSON array of chat ids`,
        this.filePath,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  async write(ids: SubscriberId[]): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(tmpPath, JSON.stringify(ids, null, 2));
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (err) {
      throw new PersistenceError(`Cannot write ${this.filePath}`, this.filePath, { cause: err });
    }
  }
}

/**
 * Owned set of subscribed chats. Mutations run one at a time; the new set is
 * swapped in only after it has been written, so `snapshot()` never observes
 * an unpersisted change.
 */
export class SubscriberStore {
  private ids: ReadonlySet<SubscriberId> = new Set();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private file: SubscriberFile) {}

  static async open(file: SubscriberFile): Promise<SubscriberStore> {
    const store = new SubscriberStore(file);
    await store.load();
    return store;
  }

  load(): Promise<ReadonlySet<SubscriberId>> {
    return this.exclusive(async () => {
      const ids = await this.file.read();
      this.ids = new Set(ids ?? []);
      logger.info({ count: this.ids.size }, "Subscribers loaded");
      return this.ids;
    });
  }

  add(id: SubscriberId): Promise<boolean> {
    return this.exclusive(async () => {
      if (this.ids.has(id)) return false;
      const next = new Set(this.ids);
      next.add(id);
      await this.commit(next);
      return true;
    });
  }

  remove(id: SubscriberId): Promise<boolean> {
    return this.exclusive(async () => {
      if (!this.ids.has(id)) return false;
      const next = new Set(this.ids);
      next.delete(id);
      await this.commit(next);
      return true;
    });
  }

  has(id: SubscriberId): boolean {
    return this.ids.has(id);
  }

  get size(): number {
    return this.ids.size;
  }

  snapshot(): SubscriberId[] {
    return Array.from(this.ids);
  }

  private async commit(next: Set<SubscriberId>): Promise<void> {
    await this.file.write(Array.from(next));
    this.ids = next;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }
}

// fs errors raised under a test sandbox come from another realm, so no instanceof here.
function errorCode(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
}
