/**
 * Exploit Intelligence Layer
 *
 * Weaponization status from the VulnCheck KEV index. Credential-gated: with no
 * API key every lookup answers the "credential required" record without any
 * I/O, which is a normal mode rather than an error.
 *
 * A weaponized exploit lifts the finding to at least P1-CRITICAL; a finding
 * already at P0-IMMEDIATE keeps it.
 *
 * Inputs:  CVE id or Finding
 * Outputs: ExploitRecord (attached as `exploit`)
 */

import { z } from "zod";
import { CacheStore, decodeWith } from "../cache/store.js";
import { NetworkError, UpstreamSchemaError, ValidationError } from "../errors.js";
import { fetchJson } from "../adapters/http.js";
import type { ExploitRecord, FetchLike, Finding } from "../types.js";
import { addContext, atLeast, extractCveId, isCveId, isPriority, isRecord } from "../types.js";

export const VULNCHECK_API_URL = "https://api.vulncheck.com/v3/index/vulncheck-kev";
export const EXPLOIT_CACHE_FILE = "vulncheck_cache.json";
export const WEAPONIZED_CONTEXT = "[WARNING] WEAPONIZED EXPLOIT AVAILABLE";

const DISABLED: ExploitRecord = {
  available: false,
  weaponized: false,
  maturity: "unknown",
  attackVector: "unknown",
  note: "credential required",
};

function unknownRecord(error?: string): ExploitRecord {
  return {
    available: false,
    weaponized: false,
    maturity: "unknown",
    attackVector: "unknown",
    ...(error ? { error } : {}),
  };
}

// ── Upstream shapes ─────────────────────────────────────────────────────────

const VulnCheckEntrySchema = z.object({
  exploit_available: z.boolean().catch(false),
  weaponized: z.boolean().catch(false),
  exploit_maturity: z.string().catch("unknown"),
  attack_vector: z.string().catch("unknown"),
  exploit_type: z.string().catch(""),
  date_added: z.string().catch(""),
  due_date: z.string().catch(""),
  ransomware_campaign_use: z.boolean().catch(false),
});

const ExploitRecordSchema = z.object({
  available: z.boolean(),
  weaponized: z.boolean(),
  maturity: z.string(),
  attackVector: z.string(),
  exploitType: z.string().optional(),
  ransomwareUse: z.boolean().optional(),
  dateAdded: z.string().optional(),
  dueDate: z.string().optional(),
});

// ── Source ──────────────────────────────────────────────────────────────────

export interface ExploitIntelSourceOptions {
  cacheDir: string;
  apiKey?: string;
  ttlMs?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  url?: string;
  now?: () => number;
}

export class ExploitIntelSource {
  private readonly cache: CacheStore<ExploitRecord>;
  private readonly options: ExploitIntelSourceOptions;

  constructor(options: ExploitIntelSourceOptions) {
    this.options = options;
    this.cache = new CacheStore({
      dir: options.cacheDir,
      file: EXPLOIT_CACHE_FILE,
      ttlMs: options.ttlMs,
      label: "exploit",
      decode: decodeWith(ExploitRecordSchema),
      now: options.now,
    });
  }

  /** Cache file location and entry counts, for health reporting. */
  describeCache(): Promise<{ path: string; entries: number; fresh: number }> {
    return this.cache.describe();
  }

  get enabled(): boolean {
    return Boolean(this.options.apiKey);
  }

  async getExploitStatus(cve: unknown, signal?: AbortSignal): Promise<ExploitRecord> {
    if (typeof cve !== "string") {
      throw new ValidationError(`CVE ID must be a string, got ${cve === null ? "null" : typeof cve}`);
    }
    if (cve.length === 0) throw new ValidationError("CVE ID cannot be empty");
    if (!isCveId(cve)) throw new ValidationError(`Invalid CVE format: ${cve}`);

    if (!this.enabled) return { ...DISABLED };

    try {
      return await this.cache.resolve(cve, () => this.fetchStatus(cve, signal));
    } catch (err) {
      if (!(err instanceof NetworkError)) throw err;
      if (err.status === 429) {
        console.warn(`[vuln-risk:exploit] VulnCheck rate limit exceeded for ${cve}`);
        return unknownRecord("rate limit exceeded");
      }
      console.warn(`[vuln-risk:exploit] VulnCheck query failed for ${cve}: ${err.message}`);
      return unknownRecord(err.message);
    }
  }

  private async fetchStatus(cve: string, signal?: AbortSignal): Promise<ExploitRecord> {
    const url = `${this.options.url ?? VULNCHECK_API_URL}?cve=${encodeURIComponent(cve)}`;
    const body = await fetchJson(url, {
      source: "exploit",
      fetch: this.options.fetch,
      timeoutMs: this.options.timeoutMs,
      signal,
      headers: { Authorization: `Bearer ${this.options.apiKey ?? ""}` },
    });

    if (!isRecord(body)) {
      const shape = Array.isArray(body) ? "array" : body === null ? "null" : typeof body;
      throw new UpstreamSchemaError("exploit", `Invalid VulnCheck response: expected object, got ${shape}`);
    }

    const data = body.data;
    const first = Array.isArray(data) ? data[0] : data;
    if (!isRecord(first)) {
      return { available: false, weaponized: false, maturity: "none", attackVector: "unknown" };
    }

    const entry = VulnCheckEntrySchema.parse(first);
    return {
      available: entry.exploit_available,
      weaponized: entry.weaponized,
      maturity: entry.exploit_maturity,
      attackVector: entry.attack_vector,
      exploitType: entry.exploit_type,
      ransomwareUse: entry.ransomware_campaign_use,
      dateAdded: entry.date_added,
      dueDate: entry.due_date,
    };
  }

  async enrich(finding: Finding, signal?: AbortSignal): Promise<Finding> {
    const cve = extractCveId(finding);
    if (!cve) {
      finding.exploit = unknownRecord();
      return finding;
    }

    const record = await this.getExploitStatus(cve, signal);
    finding.exploit = record;

    if (record.weaponized) {
      if (!isPriority(finding.priority) || !atLeast(finding.priority, "P1-CRITICAL")) {
        finding.priority = "P1-CRITICAL";
      }
      addContext(finding, WEAPONIZED_CONTEXT);
    }
    return finding;
  }
}
