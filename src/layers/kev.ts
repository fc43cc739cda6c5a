/**
 * KEV Layer
 *
 * Answers "is this CVE actively exploited?" from the CISA Known Exploited
 * Vulnerabilities catalog. The full catalog is fetched in one call, cached
 * under a fixed key, and indexed by CVE id for constant-time lookups.
 *
 * A KEV hit is the only short-circuit in the pipeline: the finding becomes
 * CRITICAL / P0-IMMEDIATE regardless of its numeric risk score.
 *
 * Inputs:  CVE id or Finding
 * Outputs: KevRecord (attached to the finding as `kev`)
 */

import { z } from "zod";
import { CacheStore, DEFAULT_TTL_MS, decodeWith } from "../cache/store.js";
import { UpstreamSchemaError, ValidationError } from "../errors.js";
import { fetchJson } from "../adapters/http.js";
import type { FetchLike, Finding, KevRecord } from "../types.js";
import { addContext, extractCveId, isCveId } from "../types.js";

export const KEV_CATALOG_URL =
  "https://www.cisa.gov/sites/default/files/feeds/known_exploited_vulnerabilities.json";
export const KEV_CACHE_FILE = "kev_catalog.json";
const CATALOG_KEY = "catalog";

// ── Upstream shapes ─────────────────────────────────────────────────────────

const optionalText = z.string().optional().catch(undefined);

const KevEntrySchema = z.object({
  cveID: optionalText,
  vendorProject: optionalText,
  product: optionalText,
  vulnerabilityName: optionalText,
  dateAdded: optionalText,
  shortDescription: optionalText,
  requiredAction: optionalText,
  dueDate: optionalText,
  knownRansomwareCampaignUse: optionalText,
  notes: optionalText,
});

export type KevEntry = z.infer<typeof KevEntrySchema>;

const KevCatalogSchema = z
  .object({
    catalogVersion: optionalText,
    dateReleased: optionalText,
    vulnerabilities: z.array(z.unknown()),
  })
  .passthrough();

export type KevCatalog = z.infer<typeof KevCatalogSchema>;

export interface KevIndex {
  entries: Map<string, KevEntry>;
  catalogVersion?: string;
}

// ── Source ──────────────────────────────────────────────────────────────────

export interface KevSourceOptions {
  cacheDir: string;
  ttlMs?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  url?: string;
  now?: () => number;
}

export class KevSource {
  private readonly cache: CacheStore<KevCatalog>;
  private readonly options: KevSourceOptions;
  private readonly now: () => number;
  private index: { promise: Promise<KevIndex>; loadedAt: number } | null = null;

  constructor(options: KevSourceOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.cache = new CacheStore({
      dir: options.cacheDir,
      file: KEV_CACHE_FILE,
      ttlMs: options.ttlMs,
      label: "kev",
      decode: decodeWith(KevCatalogSchema),
      now: options.now,
    });
  }

  /** Cache file location and entry counts, for health reporting. */
  describeCache(): Promise<{ path: string; entries: number; fresh: number }> {
    return this.cache.describe();
  }

  /** One network call for the whole catalog; the shape is checked before anything uses it. */
  async fetchCatalog(signal?: AbortSignal): Promise<KevCatalog> {
    const body = await fetchJson(this.options.url ?? KEV_CATALOG_URL, {
      source: "kev",
      fetch: this.options.fetch,
      timeoutMs: this.options.timeoutMs,
      signal,
    });

    const parsed = KevCatalogSchema.safeParse(body);
    if (!parsed.success) {
      const shape = Array.isArray(body) ? "array" : body === null ? "null" : typeof body;
      throw new UpstreamSchemaError(
        "kev",
        shape === "object"
          ? "Invalid KEV catalog: missing 'vulnerabilities' array"
          : `Invalid KEV catalog format: expected object, got ${shape}`,
      );
    }
    return parsed.data;
  }

  /** Map CVE id → catalog entry. Entries without a CVE id are skipped. */
  buildIndex(catalog: KevCatalog): KevIndex {
    const entries = new Map<string, KevEntry>();
    for (const raw of catalog.vulnerabilities) {
      const entry = KevEntrySchema.safeParse(raw);
      if (!entry.success || !entry.data.cveID) continue;
      entries.set(entry.data.cveID, entry.data);
    }
    return { entries, catalogVersion: catalog.catalogVersion };
  }

  /**
   * Catalog index, from cache when fresh. Built once per TTL window and
   * shared by every concurrent caller; a failed load is not memoized.
   */
  load(signal?: AbortSignal): Promise<KevIndex> {
    const ttl = this.options.ttlMs ?? DEFAULT_TTL_MS;
    if (this.index && this.now() - this.index.loadedAt <= ttl) return this.index.promise;

    const promise = this.cache
      .resolve(CATALOG_KEY, () => this.fetchCatalog(signal))
      .then((catalog) => this.buildIndex(catalog));
    const slot = { promise, loadedAt: this.now() };
    this.index = slot;
    promise.catch(() => {
      if (this.index === slot) this.index = null;
    });
    return promise;
  }

  async isKnownExploited(cve: unknown, signal?: AbortSignal): Promise<KevRecord> {
    if (typeof cve !== "string") {
      throw new ValidationError(`CVE ID must be a string, got ${cve === null ? "null" : typeof cve}`);
    }
    if (cve.length === 0) {
      throw new ValidationError("CVE ID cannot be empty");
    }
    if (!isCveId(cve)) return { inKev: false };

    const { entries, catalogVersion } = await this.load(signal);
    const entry = entries.get(cve);
    if (!entry) return { inKev: false };

    return {
      inKev: true,
      vulnerabilityName: entry.vulnerabilityName ?? "",
      vendorProject: entry.vendorProject ?? "",
      product: entry.product ?? "",
      dateAdded: entry.dateAdded ?? "",
      dueDate: entry.dueDate ?? "",
      requiredAction: entry.requiredAction ?? "",
      shortDescription: entry.shortDescription ?? "",
      knownRansomwareCampaignUse: entry.knownRansomwareCampaignUse ?? "",
      notes: entry.notes ?? "",
      ...(catalogVersion ? { catalogVersion } : {}),
    };
  }

  async enrich(finding: Finding, signal?: AbortSignal): Promise<Finding> {
    const cve = extractCveId(finding);
    if (!cve) {
      finding.kev = { inKev: false };
      return finding;
    }

    const record = await this.isKnownExploited(cve, signal);
    finding.kev = record;

    if (record.inKev) {
      finding.effectiveSeverity = "CRITICAL";
      finding.priority = "P0-IMMEDIATE";
      addContext(finding, `[WARNING] ACTIVELY EXPLOITED: ${record.vulnerabilityName || cve}`);
    }
    return finding;
  }
}
