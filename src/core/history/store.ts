/**
 * JSON-file backed history log with key upsert and bounded retention
 */

import { promises as fs } from "fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { HistoryWriteError, describeError } from "../errors";
import { Logger } from "../utils/logger";

export type HistoryKind = "menu" | "price";

/**
 * How one kind of snapshot is keyed, ordered, merged, retained and encoded
 */
export interface HistoryPolicy<T, R> {
  kind: HistoryKind;
  keyOf(entry: T): string;
  /** Canonical ascending order; the newest entry sorts last */
  compare(a: T, b: T): number;
  /** Applies a re-capture to the stored entry with the same key */
  merge(existing: T, incoming: T): T;
  /** Drops entries outside the retention window from a sorted log */
  retain(sorted: T[]): T[];
  decode(record: unknown): T;
  encode(entry: T): R;
}

export interface StoreResult<T> {
  log: T[];
  /** false when an existing entry was updated in place */
  inserted: boolean;
  evicted: boolean;
  evictedEntries: T[];
}

const isNodeError = (e: unknown): e is NodeJS.ErrnoException =>
  e instanceof Error && "code" in e;

export class HistoryStore<T, R = unknown> {
  private entries: T[] | null = null;

  constructor(
    readonly filePath: string,
    protected readonly policy: HistoryPolicy<T, R>,
  ) {}

  keyOf(entry: T): string {
    return this.policy.keyOf(entry);
  }

  /**
   * Reads the persisted log in canonical order.
   * A missing file is an empty log; an unreadable or malformed one is
   * logged as a warning and also treated as empty.
   */
  async loadAll(): Promise<T[]> {
    this.entries = await this.read();
    return [...this.entries];
  }

  /**
   * Inserts or updates the entry with the snapshot's key, then applies retention.
   * Only the in-memory log changes; call persist() to write it.
   */
  async upsert(snapshot: T): Promise<StoreResult<T>> {
    const { keyOf, compare, merge, retain } = this.policy;
    const log = await this.current();
    const key = keyOf(snapshot);

    const idx = log.findIndex((e) => keyOf(e) === key);
    const next = [...log];
    if (idx >= 0) next[idx] = merge(next[idx], snapshot);
    else next.push(snapshot);
    next.sort(compare);

    const retained = retain(next);
    const kept = new Set(retained.map(keyOf));
    const evictedEntries = next.filter((e) => !kept.has(keyOf(e)));

    this.entries = retained;
    return {
      log: [...retained],
      inserted: idx < 0,
      evicted: evictedEntries.length > 0,
      evictedEntries,
    };
  }

  /**
   * Writes the whole log (default: the current in-memory log). A log passed
   * in is de-duplicated by key and cut to the retention window first.
   * The file is written to a temp file beside the target and renamed over it.
   * @throws HistoryWriteError if anything on the way fails
   */
  async persist(log?: readonly T[]): Promise<void> {
    const entries = log ? this.normalize(log) : await this.current();
    const body =
      JSON.stringify(entries.map((e) => this.policy.encode(e)), null, 2) + "\n";
    const tmp = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;

    let handle: FileHandle | undefined;
    let renamed = false;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      handle = await fs.open(tmp, "w");
      await handle.writeFile(body, "utf8");
      await handle.sync();
      await handle.close();
      handle = undefined;
      await fs.rename(tmp, this.filePath);
      renamed = true;
    } catch (error) {
      throw new HistoryWriteError(this.filePath, error);
    } finally {
      if (handle) await handle.close().catch(logCleanupFailure(tmp));
      if (!renamed) await fs.rm(tmp, { force: true }).catch(logCleanupFailure(tmp));
    }

    this.entries = entries;
  }

  /** Entry with the given key, if present */
  async find(key: string): Promise<T | undefined> {
    const log = await this.current();
    return log.find((e) => this.policy.keyOf(e) === key);
  }

  /** Entry stored immediately before the given key in canonical order */
  async entryBefore(key: string): Promise<T | undefined> {
    const log = await this.current();
    const idx = log.findIndex((e) => this.policy.keyOf(e) === key);
    return idx > 0 ? log[idx - 1] : undefined;
  }

  /**
   * The entry with the given key and the one stored before it,
   * or undefined when the key is not in the log
   */
  async latestPair(key: string): Promise<{ current: T; previous?: T } | undefined> {
    const current = await this.find(key);
    if (!current) return undefined;
    return { current, previous: await this.entryBefore(key) };
  }

  protected async current(): Promise<T[]> {
    if (!this.entries) this.entries = await this.read();
    return this.entries;
  }

  private async read(): Promise<T[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isNodeError(error) && error.code === "ENOENT") {
        Logger.info(`No ${this.policy.kind} history yet`, { file: this.filePath });
        return [];
      }
      Logger.malformedStorage(this.filePath, describeError(error));
      return [];
    }

    if (!raw.trim()) {
      Logger.malformedStorage(this.filePath, "file is empty");
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      Logger.malformedStorage(this.filePath, `invalid JSON: ${describeError(error)}`);
      return [];
    }

    if (!Array.isArray(parsed)) {
      Logger.malformedStorage(this.filePath, "expected a list of records");
      return [];
    }

    const decoded: T[] = [];
    for (let i = 0; i < parsed.length; i++) {
      try {
        decoded.push(this.policy.decode(parsed[i]));
      } catch (error) {
        Logger.malformedStorage(this.filePath, `record ${i}: ${describeError(error)}`);
        return [];
      }
    }

    return this.normalize(decoded);
  }

  /** One entry per key (last wins), canonical order, retention applied */
  private normalize(entries: readonly T[]): T[] {
    const byKey = new Map<string, T>();
    for (const entry of entries) byKey.set(this.policy.keyOf(entry), entry);
    return this.policy.retain([...byKey.values()].sort(this.policy.compare));
  }
}

const logCleanupFailure = (file: string) => (error: unknown) => {
  Logger.debug(`Could not clean up temp file`, { file, error: describeError(error) });
};
