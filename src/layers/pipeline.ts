/**
 * Pipeline Layer (RiskAggregator)
 *
 * Runs every source over a batch of findings and scores the result:
 *
 *   EPSS (one batched call for the whole list)
 *     → per finding, on a bounded pool: KEV → exploit intel → GHSA → score
 *
 * One source failing for one finding never stops the other sources or the
 * other findings; each failure is reported once in `failures`. Elements that
 * are not objects pass through untouched. Output order is input order.
 *
 * Inputs:  unknown[] (findings as parsed JSON)
 * Outputs: EnrichmentResult
 */

import { ValidationError, errorMessage } from "../errors.js";
import { runPool } from "../pool.js";
import type { EnrichmentResult, SourceFailure, SourceName } from "../types.js";
import { extractCveId, isFinding } from "../types.js";
import type { EpssSource } from "./epss.js";
import type { ExploitIntelSource } from "./exploit.js";
import type { GhsaSource } from "./ghsa.js";
import type { KevSource } from "./kev.js";
import type { RiskModel } from "./risk.js";
import { DEFAULT_RISK_MODEL, assess, summarize } from "./risk.js";

export const DEFAULT_CONCURRENCY = 8;

export interface RiskAggregatorOptions {
  kev: KevSource;
  epss: EpssSource;
  exploit: ExploitIntelSource;
  /** Omitted when no GitHub token is configured; the GHSA stage is then skipped. */
  ghsa?: GhsaSource;
  concurrency?: number;
  model?: RiskModel;
}

export interface EnrichOptions {
  signal?: AbortSignal;
}

export class RiskAggregator {
  private readonly options: RiskAggregatorOptions;

  constructor(options: RiskAggregatorOptions) {
    this.options = options;
  }

  get model(): RiskModel {
    return this.options.model ?? DEFAULT_RISK_MODEL;
  }

  async enrichAll(findings: unknown, options: EnrichOptions = {}): Promise<EnrichmentResult> {
    if (!Array.isArray(findings)) {
      throw new ValidationError(`findings must be an array, got ${findings === null ? "null" : typeof findings}`);
    }
    const list: unknown[] = findings;
    const { signal } = options;
    const { kev, epss, exploit, ghsa } = this.options;
    const failures: SourceFailure[] = [];

    // ── EPSS: pipeline-wide ─────────────────────────────────────────────────
    if (!signal?.aborted) {
      const outcome = await epss.enrichBatch(list, signal);
      if (outcome.error) failures.push({ source: "epss", message: outcome.error });
    }

    // ── KEV: one catalog load shared by every finding ───────────────────────
    let kevReady = false;
    if (!signal?.aborted) {
      try {
        await kev.load(signal);
        kevReady = true;
      } catch (err) {
        console.error(`[vuln-risk:kev] KEV catalog unavailable, skipping KEV stage: ${errorMessage(err)}`);
        failures.push({ source: "kev", message: errorMessage(err) });
      }
    }

    const stage = async (source: SourceName, cve: string | undefined, run: () => Promise<unknown>) => {
      try {
        await run();
      } catch (err) {
        console.warn(`[vuln-risk:${source}] Enrichment failed for ${cve ?? "finding"}: ${errorMessage(err)}`);
        failures.push({ source, ...(cve ? { cve } : {}), message: errorMessage(err) });
      }
    };

    // ── Per finding ─────────────────────────────────────────────────────────
    const pool = await runPool(
      list,
      this.options.concurrency ?? DEFAULT_CONCURRENCY,
      async (item) => {
        if (!isFinding(item)) return;
        const cve = extractCveId(item);

        if (kevReady) await stage("kev", cve, () => kev.enrich(item, signal));
        await stage("exploit", cve, () => exploit.enrich(item, signal));
        if (ghsa) await stage("ghsa", cve, () => ghsa.enrich(item, signal));

        assess(item, this.model);
      },
      signal,
    );

    return {
      findings: list,
      summary: summarize(list),
      failures,
      cancelled: pool.cancelled,
    };
  }
}
