import { promises as fs } from "fs";
import path from "path";
import { newId } from "../shared/credentials";
import { StorageWriteError } from "../shared/errors";
import { createLogger } from "../shared/logger";
import type { JsonObject } from "../shared/types";
import { CollectionLock } from "./collection-lock";

export const COLLECTIONS = [
  "employees",
  "work_logs",
  "leave_requests",
  "feedback",
  "audit_trails",
  "settings",
] as const;

export type CollectionName = (typeof COLLECTIONS)[number];

export type StoredRecord = JsonObject;

export interface CollectionSection {
  read(): Promise<StoredRecord[]>;
  write(records: StoredRecord[]): Promise<void>;
}

type Snapshot = { ok: true; records: StoredRecord[] } | { ok: false; reason: unknown };

const log = createLogger("record-store");

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function isRecordList(value: unknown): value is StoredRecord[] {
  return (
    Array.isArray(value) &&
    value.every((item) => typeof item === "object" && item !== null && !Array.isArray(item))
  );
}

/**
 * One JSON array file per collection under `dataDir`.
 *
 * Writes go to a temporary file that is renamed over the live one, so a
 * reader sees either the previous or the next state. A file that cannot be
 * read or parsed is moved aside as `<file>.backup-<timestamp>` and the
 * collection continues empty: the rows in the quarantined file are no longer
 * visible to the service and have to be restored by hand.
 */
export class RecordStore {
  private readonly lock = new CollectionLock();

  private constructor(readonly dataDir: string) {}

  static async open(dataDir: string): Promise<RecordStore> {
    await fs.mkdir(dataDir, { recursive: true });
    const store = new RecordStore(dataDir);
    for (const collection of COLLECTIONS) {
      const file = store.pathFor(collection);
      try {
        await fs.access(file);
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
        await store.write(collection, []);
      }
    }
    return store;
  }

  pathFor(collection: CollectionName): string {
    return path.join(this.dataDir, `${collection}.json`);
  }

  /**
   * Unlocked snapshot. A corrupt file is only moved aside under the
   * collection's lock, and only if it is still corrupt by then: a writer may
   * have replaced it in the meantime. Must not be called from inside a
   * section on the same collection; use the section's own `read` there.
   */
  async read(collection: CollectionName): Promise<StoredRecord[]> {
    const snapshot = await this.load(collection);
    if (snapshot.ok) {
      return snapshot.records;
    }
    return this.lock.run(collection, () => this.readOrQuarantine(collection));
  }

  async write(collection: CollectionName, records: StoredRecord[]): Promise<void> {
    const file = this.pathFor(collection);
    const temp = `${file}.${newId()}.tmp`;
    try {
      const payload = JSON.stringify(records, null, 2);
      const handle = await fs.open(temp, "w");
      try {
        await handle.writeFile(payload, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(temp, file);
    } catch (error) {
      await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
        log.warn("Could not remove temporary file", { file: temp, error: String(cleanupError) });
      });
      throw new StorageWriteError(collection, error);
    }
  }

  /**
   * Runs `section` while holding the collection exclusively. Every
   * read-compute-write on a collection must happen inside one section, through
   * the handle it is given.
   */
  scopedExclusive<T>(
    collection: CollectionName,
    section: (handle: CollectionSection) => Promise<T>
  ): Promise<T> {
    return this.lock.run(collection, () =>
      section({
        read: () => this.readOrQuarantine(collection),
        write: (records) => this.write(collection, records),
      })
    );
  }

  private async load(collection: CollectionName): Promise<Snapshot> {
    let content: string;
    try {
      content = await fs.readFile(this.pathFor(collection), "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return { ok: true, records: [] };
      }
      return { ok: false, reason: error };
    }

    if (content.trim() === "") {
      return { ok: true, records: [] };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      return { ok: false, reason: error };
    }

    if (!isRecordList(parsed)) {
      return { ok: false, reason: new Error("expected an array of records") };
    }
    return { ok: true, records: parsed };
  }

  // Caller holds the collection lock.
  private async readOrQuarantine(collection: CollectionName): Promise<StoredRecord[]> {
    const snapshot = await this.load(collection);
    if (snapshot.ok) {
      return snapshot.records;
    }
    await this.quarantine(collection, snapshot.reason);
    return [];
  }

  private async quarantine(collection: CollectionName, reason: unknown): Promise<void> {
    const file = this.pathFor(collection);
    const stamp = new Date().toISOString().replace(/[:.]/g, "-");
    const backup = `${file}.backup-${stamp}`;
    try {
      await fs.rename(file, backup);
      log.warn("Quarantined unreadable collection", {
        collection,
        backup,
        reason: reason instanceof Error ? reason.message : String(reason),
      });
    } catch (error) {
      log.error("Could not quarantine unreadable collection", {
        collection,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
