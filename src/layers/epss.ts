/**
 * EPSS Layer
 *
 * Exploit Prediction Scoring System probabilities from FIRST.org. Scores are
 * fetched in batches of 100 CVEs per call and cached per CVE. Enrichment is a
 * pipeline-wide step: one fetchScores call covers every finding in the run.
 *
 * Inputs:  CVE ids or a list of findings
 * Outputs: EpssRecord map; EpssAttachment on each finding as `epss`
 */

import { z } from "zod";
import { CacheStore, decodeWith } from "../cache/store.js";
import { Inflight } from "../cache/inflight.js";
import { NetworkError, UpstreamSchemaError, ValidationError, errorMessage } from "../errors.js";
import { fetchJson } from "../adapters/http.js";
import type { EpssBand, EpssRecord, FetchLike } from "../types.js";
import { extractCveId, isCveId, isFinding } from "../types.js";

export const EPSS_API_URL = "https://api.first.org/data/v1/epss";
export const EPSS_BATCH_SIZE = 100;
export const EPSS_CACHE_FILE = "epss_cache.json";

// ── Priority bands ──────────────────────────────────────────────────────────

export function priorityBand(score: unknown): EpssBand {
  if (typeof score !== "number" || Number.isNaN(score)) {
    throw new ValidationError(`EPSS score must be numeric, got ${score === null ? "null" : typeof score}`);
  }
  if (score < 0 || score > 1) {
    throw new ValidationError(`EPSS score must be between 0.0 and 1.0, got ${score}`);
  }

  if (score >= 0.75) return "CRITICAL";
  if (score >= 0.5) return "HIGH";
  if (score >= 0.25) return "MEDIUM";
  return "LOW";
}

export function formatProbability(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

// ── Upstream shapes ─────────────────────────────────────────────────────────

const EpssRecordSchema = z.object({
  score: z.number(),
  percentile: z.number(),
  asOfDate: z.string(),
});

const EpssResponseSchema = z.object({ data: z.array(z.unknown()) }).passthrough();

const numeric = z.union([z.string(), z.number()]);

const EpssEntrySchema = z.object({
  cve: z.string().min(1),
  epss: numeric.optional(),
  percentile: numeric.optional(),
  date: z.string().optional(),
});

function toProbability(value: string | number | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === "number" ? value : value.trim() === "" ? Number.NaN : Number(value);
  return Number.isFinite(n) && n >= 0 && n <= 1 ? n : undefined;
}

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value) => settle(value) };
}

// ── Source ──────────────────────────────────────────────────────────────────

export interface EpssSourceOptions {
  cacheDir: string;
  ttlMs?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  url?: string;
  now?: () => number;
}

interface ScoreCollection {
  scores: Map<string, EpssRecord>;
  error?: NetworkError | UpstreamSchemaError;
  /** True when no uncached id could be served at all. */
  exhausted: boolean;
}

export interface EpssBatchOutcome {
  attached: number;
  error?: string;
}

export class EpssSource {
  private readonly cache: CacheStore<EpssRecord>;
  private readonly inflight = new Inflight<EpssRecord | undefined>();
  private readonly options: EpssSourceOptions;

  constructor(options: EpssSourceOptions) {
    this.options = options;
    this.cache = new CacheStore({
      dir: options.cacheDir,
      file: EPSS_CACHE_FILE,
      ttlMs: options.ttlMs,
      label: "epss",
      decode: decodeWith(EpssRecordSchema),
      now: options.now,
    });
  }

  /** Cache file location and entry counts, for health reporting. */
  describeCache(): Promise<{ path: string; entries: number; fresh: number }> {
    return this.cache.describe();
  }

  /**
   * Scores for every CVE in `cveList`. Every id is validated before any
   * request is made. Uncached ids are requested 100 per call; a failed batch
   * falls back to stale cache entries, and only when nothing at all could be
   * served for the uncached ids does the batch error propagate.
   */
  async fetchScores(cveList: unknown, signal?: AbortSignal): Promise<Map<string, EpssRecord>> {
    const { scores, error, exhausted } = await this.collectScores(cveList, signal);
    if (error && exhausted) throw error;
    return scores;
  }

  /** Everything that could be served, plus the last batch failure, if any. */
  private async collectScores(cveList: unknown, signal?: AbortSignal): Promise<ScoreCollection> {
    if (!Array.isArray(cveList)) {
      throw new ValidationError(`cveList must be an array, got ${typeof cveList}`);
    }
    const ids: string[] = [];
    for (const cve of cveList) {
      if (typeof cve !== "string") throw new ValidationError(`CVE ID must be a string, got ${typeof cve}`);
      if (!isCveId(cve)) throw new ValidationError(`Invalid CVE format: ${cve}`);
      ids.push(cve);
    }

    const scores = new Map<string, EpssRecord>();
    const stale = new Map<string, EpssRecord>();
    const waiting: Array<[string, Promise<EpssRecord | undefined>]> = [];
    const toFetch: string[] = [];

    for (const cve of new Set(ids)) {
      const hit = await this.cache.get(cve);
      if (hit.found) {
        scores.set(cve, hit.value);
        continue;
      }
      if (hit.stale) stale.set(cve, hit.stale);

      const pending = this.inflight.get(cve);
      if (pending) waiting.push([cve, pending]);
      else toFetch.push(cve);
    }

    // Claim every uncached id before the first request so concurrent callers wait instead.
    const slots = new Map<string, (record: EpssRecord | undefined) => void>();
    for (const cve of toFetch) {
      const slot = deferred<EpssRecord | undefined>();
      slots.set(cve, slot.resolve);
      void this.inflight.track(cve, slot.promise);
    }
    const release = (cves: string[], found?: Map<string, EpssRecord>) => {
      for (const cve of cves) slots.get(cve)?.(found?.get(cve));
    };

    let unserved = 0;
    let lastError: NetworkError | UpstreamSchemaError | undefined;
    const batches = chunk(toFetch, EPSS_BATCH_SIZE);

    for (const [i, batch] of batches.entries()) {
      let fetched: Map<string, EpssRecord>;
      try {
        fetched = await this.fetchBatch(batch, signal);
      } catch (err) {
        if (!(err instanceof NetworkError || err instanceof UpstreamSchemaError)) {
          release(batches.slice(i).flat());
          throw err;
        }
        release(batch);

        lastError = err;
        console.warn(`[vuln-risk:epss] Batch ${i + 1}/${batches.length} failed: ${err.message}`);
        for (const cve of batch) {
          const fallback = stale.get(cve);
          if (fallback) scores.set(cve, fallback);
          else unserved++;
        }
        continue;
      }

      await this.cache.putMany(fetched);
      for (const [cve, record] of fetched) scores.set(cve, record);
      release(batch, fetched);
    }

    for (const [cve, pending] of waiting) {
      const record = (await pending) ?? stale.get(cve);
      if (record) scores.set(cve, record);
    }

    return { scores, error: lastError, exhausted: lastError !== undefined && unserved === toFetch.length };
  }

  private async fetchBatch(batch: string[], signal?: AbortSignal): Promise<Map<string, EpssRecord>> {
    const url = `${this.options.url ?? EPSS_API_URL}?cve=${batch.join(",")}`;
    const body = await fetchJson(url, {
      source: "epss",
      fetch: this.options.fetch,
      timeoutMs: this.options.timeoutMs,
      signal,
    });

    const parsed = EpssResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamSchemaError("epss", "Invalid EPSS API response: expected object with a 'data' array");
    }

    const requested = new Set(batch);
    const records = new Map<string, EpssRecord>();
    for (const raw of parsed.data.data) {
      const entry = EpssEntrySchema.safeParse(raw);
      if (!entry.success || !requested.has(entry.data.cve)) continue;

      const score = toProbability(entry.data.epss);
      if (score === undefined) {
        console.warn(`[vuln-risk:epss] Invalid EPSS score for ${entry.data.cve}; dropping entry`);
        continue;
      }
      records.set(entry.data.cve, {
        score,
        percentile: toProbability(entry.data.percentile) ?? 0,
        asOfDate: entry.data.date ?? "",
      });
    }
    return records;
  }

  /**
   * Attach EPSS data to every finding whose CVE id resolves. Findings without
   * one, and non-object elements, pass through untouched. Cached scores are
   * attached even when a batch fails; the failure is reported in the outcome.
   */
  async enrichBatch(findings: unknown[], signal?: AbortSignal): Promise<EpssBatchOutcome> {
    const cves = findings.map(extractCveId).filter((cve): cve is string => cve !== undefined);
    if (cves.length === 0) return { attached: 0 };

    let collected: ScoreCollection;
    try {
      collected = await this.collectScores(cves, signal);
    } catch (err) {
      console.error(`[vuln-risk:epss] Failed to fetch EPSS scores: ${errorMessage(err)}`);
      return { attached: 0, error: errorMessage(err) };
    }
    const { scores, error } = collected;
    if (error) console.error(`[vuln-risk:epss] Failed to fetch EPSS scores: ${error.message}`);

    let attached = 0;
    for (const finding of findings) {
      if (!isFinding(finding)) continue;
      const cve = extractCveId(finding);
      const record = cve ? scores.get(cve) : undefined;
      if (!record) continue;

      finding.epss = {
        ...record,
        exploitationProbability: formatProbability(record.score),
        priority: priorityBand(record.score),
      };
      attached++;
    }
    return error ? { attached, error: error.message } : { attached };
  }
}
