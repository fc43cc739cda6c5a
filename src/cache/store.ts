/**
 * CacheStore
 *
 * One JSON file per source under the cache directory, holding every entry the
 * source has fetched:
 *
 *   { "<key>": { "value": <payload>, "fetchedAt": "<ISO timestamp>" }, ... }
 *
 * Freshness is derived from the file's modification time for entries read
 * from disk, and from the put time for entries written since; nothing in the
 * file states a TTL. It is checked on every read. Entries read from an expired file are kept as stale
 * fallbacks and served only when a refetch fails with a NetworkError.
 *
 * Writes are serialized per store (temp file + rename), and a failed write is
 * logged and otherwise ignored.
 */

import { mkdir, readFile, rename, stat, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { ZodType, ZodTypeDef } from "zod";
import { CacheCorruptionError, NetworkError, errorMessage } from "../errors.js";
import { isRecord } from "../types.js";
import { Inflight } from "./inflight.js";

export const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;

export type CacheLookup<V> =
  | { found: true; value: V }
  | { found: false; stale?: V };

export interface CacheStoreOptions<V> {
  dir: string;
  file: string;
  /** Turns a stored payload back into a value; undefined drops the entry. */
  decode: (raw: unknown) => V | undefined;
  ttlMs?: number;
  label?: string;
  now?: () => number;
}

interface MemoryEntry<V> {
  value: V;
  fetchedAt: string;
  /** Start of the entry's TTL window: the file mtime on load, the put time otherwise. */
  freshSince: number;
}

let tmpCounter = 0;

export class CacheStore<V> {
  readonly path: string;
  readonly ttlMs: number;
  private readonly label: string;
  private readonly decode: (raw: unknown) => V | undefined;
  private readonly now: () => number;
  private readonly entries = new Map<string, MemoryEntry<V>>();
  private readonly inflight = new Inflight<V>();
  private loading: Promise<void> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: CacheStoreOptions<V>) {
    this.path = join(options.dir, options.file);
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.label = options.label ?? options.file;
    this.decode = options.decode;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<CacheLookup<V>> {
    await this.load();
    const entry = this.entries.get(key);
    if (!entry) return { found: false };
    return this.isFresh(entry) ? { found: true, value: entry.value } : { found: false, stale: entry.value };
  }

  put(key: string, value: V): Promise<void> {
    return this.putMany([[key, value]]);
  }

  async putMany(items: Iterable<readonly [string, V]>): Promise<void> {
    await this.load();
    const freshSince = this.now();
    const fetchedAt = new Date(freshSince).toISOString();
    for (const [key, value] of items) {
      this.entries.set(key, { value, fetchedAt, freshSince });
    }
    return this.persist();
  }

  /**
   * Cached value when fresh; otherwise run `fetch`, store and return its
   * result. A NetworkError falls back to the stale value when there is one.
   * Concurrent callers for one key share a single `fetch`.
   */
  resolve(key: string, fetch: () => Promise<V>): Promise<V> {
    return this.inflight.run(key, async () => {
      const hit = await this.get(key);
      if (hit.found) return hit.value;

      try {
        const value = await fetch();
        await this.put(key, value);
        return value;
      } catch (err) {
        if (err instanceof NetworkError && hit.stale !== undefined) {
          console.warn(`[vuln-risk:${this.label}] ${err.message}; serving stale cache for ${key}`);
          return hit.stale;
        }
        throw err;
      }
    });
  }

  /** Entry counts for health reporting. */
  async describe(): Promise<{ path: string; entries: number; fresh: number }> {
    await this.load();
    let fresh = 0;
    for (const entry of this.entries.values()) if (this.isFresh(entry)) fresh++;
    return { path: this.path, entries: this.entries.size, fresh };
  }

  private isFresh(entry: MemoryEntry<V>): boolean {
    return this.now() - entry.freshSince <= this.ttlMs;
  }

  // ── File I/O ──────────────────────────────────────────────────────────────

  private load(): Promise<void> {
    if (!this.loading) this.loading = this.readFromDisk();
    return this.loading;
  }

  private async readFromDisk(): Promise<void> {
    let raw: string;
    let mtimeMs: number;
    try {
      mtimeMs = (await stat(this.path)).mtimeMs;
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (!isMissingFile(err)) {
        console.warn(`[vuln-risk:${this.label}] ${new CacheCorruptionError(this.path, err).message}; treating as empty`);
      }
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.warn(`[vuln-risk:${this.label}] ${new CacheCorruptionError(this.path, err).message}; discarding`);
      return;
    }
    if (!isRecord(parsed)) {
      console.warn(`[vuln-risk:${this.label}] ${new CacheCorruptionError(this.path, "not a JSON object").message}; discarding`);
      return;
    }

    for (const [key, stored] of Object.entries(parsed)) {
      if (!isRecord(stored)) continue;
      const value = this.decode(stored.value);
      if (value === undefined) continue;
      const fetchedAt = typeof stored.fetchedAt === "string" ? stored.fetchedAt : new Date(mtimeMs).toISOString();
      // Entries put before the load finished win over what was on disk.
      if (!this.entries.has(key)) this.entries.set(key, { value, fetchedAt, freshSince: mtimeMs });
    }
  }

  private persist(): Promise<void> {
    this.writeChain = this.writeChain.then(() => this.writeToDisk());
    return this.writeChain;
  }

  private async writeToDisk(): Promise<void> {
    const body: Record<string, { value: V; fetchedAt: string }> = {};
    for (const [key, entry] of this.entries) {
      body[key] = { value: entry.value, fetchedAt: entry.fetchedAt };
    }

    const tmp = `${this.path}.${process.pid}.${++tmpCounter}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmp, JSON.stringify(body, null, 2) + "\n", "utf-8");
      await rename(tmp, this.path);
    } catch (err) {
      console.warn(`[vuln-risk:${this.label}] Failed to persist cache ${this.path}: ${errorMessage(err)}`);
    }
  }
}

/** Adapt a zod schema into a CacheStore decoder. */
export function decodeWith<V>(schema: ZodType<V, ZodTypeDef, unknown>): (raw: unknown) => V | undefined {
  return (raw) => {
    const result = schema.safeParse(raw);
    return result.success ? result.data : undefined;
  };
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}
