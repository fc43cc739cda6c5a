/**
 * GHSA Layer
 *
 * GitHub Security Advisory lookups over the GraphQL API, one query per CVE,
 * cached per CVE. Supplies the patched version that becomes the finding's
 * remediation target.
 *
 * A CVE with no advisory yields the zero-value advisory (empty ghsaId), which
 * is cached like any other answer. GraphQL `errors` are raised; transport
 * failures degrade to the zero-value advisory carrying an `error` message.
 *
 * Inputs:  CVE id or Finding
 * Outputs: GhsaAdvisory (attached as `ghsa`), remediation.fixedVersion
 */

import { z } from "zod";
import { CacheStore, decodeWith } from "../cache/store.js";
import { NetworkError, UpstreamSchemaError, ValidationError, errorMessage } from "../errors.js";
import { DEFAULT_TIMEOUT_MS, linkSignals } from "../adapters/http.js";
import type { AdvisoryAdapter, Finding, GhsaAdvisory } from "../types.js";
import { extractCveId, isCveId, isRecord } from "../types.js";

export const GHSA_CACHE_FILE = "ghsa_cache.json";

export const ADVISORY_QUERY = `
  query($cve: String!) {
    securityAdvisories(first: 1, identifier: { type: CVE, value: $cve }) {
      nodes {
        ghsaId
        summary
        description
        severity
        publishedAt
        updatedAt
        withdrawnAt
        permalink
        vulnerabilities(first: 10) {
          nodes {
            package { name ecosystem }
            vulnerableVersionRange
            firstPatchedVersion { identifier }
          }
        }
        references { url }
      }
    }
  }
`;

export function emptyAdvisory(): GhsaAdvisory {
  return {
    ghsaId: "",
    summary: "",
    description: "",
    severity: "",
    publishedAt: "",
    updatedAt: "",
    withdrawnAt: null,
    permalink: "",
    vulnerabilities: [],
    references: [],
  };
}

// ── Upstream shapes ─────────────────────────────────────────────────────────

const text = z.string().nullish().transform((v) => v ?? "");

const VulnerabilityNodeSchema = z.object({
  package: z.object({ name: text, ecosystem: text }).nullish(),
  vulnerableVersionRange: text,
  firstPatchedVersion: z.object({ identifier: text }).nullish(),
});

const AdvisoryNodeSchema = z.object({
  ghsaId: text,
  summary: text,
  description: text,
  severity: text,
  publishedAt: text,
  updatedAt: text,
  withdrawnAt: z.string().nullish().transform((v) => v ?? null),
  permalink: text,
  vulnerabilities: z.object({ nodes: z.array(VulnerabilityNodeSchema).nullish() }).nullish(),
  references: z.array(z.object({ url: text })).nullish(),
});

const AdvisoryResponseSchema = z.object({
  data: z
    .object({
      securityAdvisories: z.object({ nodes: z.array(AdvisoryNodeSchema.nullable()) }).nullish(),
    })
    .nullish(),
});

const GraphqlErrorSchema = z.object({ message: z.string().optional() }).passthrough();

// What we write to the cache file.
const GhsaAdvisorySchema = z.object({
  ghsaId: z.string(),
  summary: z.string(),
  description: z.string(),
  severity: z.string(),
  publishedAt: z.string(),
  updatedAt: z.string(),
  withdrawnAt: z.string().nullable(),
  permalink: z.string(),
  vulnerabilities: z.array(
    z.object({
      packageName: z.string(),
      ecosystem: z.string(),
      vulnerableVersionRange: z.string(),
      firstPatchedVersion: z.string().nullable(),
    }),
  ),
  references: z.array(z.string()),
});

function toAdvisory(node: z.infer<typeof AdvisoryNodeSchema>): GhsaAdvisory {
  return {
    ghsaId: node.ghsaId,
    summary: node.summary,
    description: node.description,
    severity: node.severity,
    publishedAt: node.publishedAt,
    updatedAt: node.updatedAt,
    withdrawnAt: node.withdrawnAt,
    permalink: node.permalink,
    vulnerabilities: (node.vulnerabilities?.nodes ?? []).map((v) => ({
      packageName: v.package?.name ?? "",
      ecosystem: v.package?.ecosystem ?? "",
      vulnerableVersionRange: v.vulnerableVersionRange,
      firstPatchedVersion: v.firstPatchedVersion?.identifier || null,
    })),
    references: (node.references ?? []).map((r) => r.url).filter((url) => url.length > 0),
  };
}

function statusOf(err: unknown): number | undefined {
  return isRecord(err) && typeof err.status === "number" ? err.status : undefined;
}

// ── Source ──────────────────────────────────────────────────────────────────

export interface GhsaSourceOptions {
  cacheDir: string;
  adapter: AdvisoryAdapter;
  ttlMs?: number;
  timeoutMs?: number;
  now?: () => number;
}

export class GhsaSource {
  private readonly cache: CacheStore<GhsaAdvisory>;
  private readonly adapter: AdvisoryAdapter;
  private readonly timeoutMs: number;

  constructor(options: GhsaSourceOptions) {
    this.adapter = options.adapter;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.cache = new CacheStore({
      dir: options.cacheDir,
      file: GHSA_CACHE_FILE,
      ttlMs: options.ttlMs,
      label: "ghsa",
      decode: decodeWith(GhsaAdvisorySchema),
      now: options.now,
    });
  }

  /** Cache file location and entry counts, for health reporting. */
  describeCache(): Promise<{ path: string; entries: number; fresh: number }> {
    return this.cache.describe();
  }

  async queryAdvisory(cve: unknown, signal?: AbortSignal): Promise<GhsaAdvisory> {
    if (typeof cve !== "string") {
      throw new ValidationError(`CVE ID must be a string, got ${cve === null ? "null" : typeof cve}`);
    }
    if (cve.length === 0) throw new ValidationError("CVE ID cannot be empty");
    if (!isCveId(cve)) throw new ValidationError(`Invalid CVE format: ${cve}`);

    try {
      return await this.cache.resolve(cve, () => this.fetchAdvisory(cve, signal));
    } catch (err) {
      if (!(err instanceof NetworkError)) throw err;
      console.warn(`[vuln-risk:ghsa] GHSA query failed for ${cve}: ${err.message}`);
      return { ...emptyAdvisory(), error: err.message };
    }
  }

  private async fetchAdvisory(cve: string, signal?: AbortSignal): Promise<GhsaAdvisory> {
    const linked = linkSignals(this.timeoutMs, signal);
    let body: unknown;
    try {
      body = await this.adapter.query(ADVISORY_QUERY, { cve }, linked.signal);
    } catch (err) {
      const reason = signal?.aborted
        ? "request cancelled"
        : linked.signal.aborted
          ? `timed out after ${this.timeoutMs}ms`
          : errorMessage(err);
      throw new NetworkError("ghsa", `ghsa request failed: ${reason}`, { status: statusOf(err), cause: err });
    } finally {
      linked.dispose();
    }

    if (isRecord(body) && Array.isArray(body.errors) && body.errors.length > 0) {
      const messages = body.errors.map((e) => {
        const parsed = GraphqlErrorSchema.safeParse(e);
        return (parsed.success && parsed.data.message) || "Unknown error";
      });
      throw new UpstreamSchemaError("ghsa", `GraphQL errors: ${messages.join("; ")}`);
    }

    const parsed = AdvisoryResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamSchemaError("ghsa", "Invalid GHSA response: unexpected securityAdvisories shape");
    }

    const node = parsed.data.data?.securityAdvisories?.nodes[0];
    return node ? toAdvisory(node) : emptyAdvisory();
  }

  async enrich(finding: Finding, signal?: AbortSignal): Promise<Finding> {
    const cve = extractCveId(finding);
    if (!cve) {
      finding.ghsa = emptyAdvisory();
      return finding;
    }

    const advisory = await this.queryAdvisory(cve, signal);
    finding.ghsa = advisory;

    const patched = advisory.vulnerabilities.find((v) => v.firstPatchedVersion !== null);
    if (patched?.firstPatchedVersion) {
      finding.remediation = {
        ...(isRecord(finding.remediation) ? finding.remediation : {}),
        fixedVersion: patched.firstPatchedVersion,
        vulnerableRange: patched.vulnerableVersionRange,
      };
    }
    return finding;
  }
}
