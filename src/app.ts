/**
 * vuln-risk: App factory
 *
 * Wires the sources from configuration and exposes them as tools.
 * The MCP server and the CLI both consume createApp().
 */

import { z } from "zod";
import { createAdvisoryAdapter, loadConfig } from "./adapters/env.js";
import type { RiskConfig } from "./adapters/env.js";
import { ConfigError, ValidationError } from "./errors.js";
import { EpssSource, formatProbability, priorityBand } from "./layers/epss.js";
import { ExploitIntelSource } from "./layers/exploit.js";
import { GhsaSource } from "./layers/ghsa.js";
import { KevSource } from "./layers/kev.js";
import { RiskAggregator } from "./layers/pipeline.js";
import type { RiskModel } from "./layers/risk.js";
import { summarize } from "./layers/risk.js";
import type { AdvisoryAdapter, FetchLike } from "./types.js";

export const APP_NAME = "vuln-risk";
export const APP_VERSION = "0.1.0";

export interface RiskTool {
  name: string;
  description: string;
  inputSchema: { type: "object"; properties: Record<string, unknown>; required?: string[] };
  execute: (args: Record<string, unknown>) => Promise<string>;
}

export interface RiskApp {
  name: string;
  version: string;
  description: string;
  tools: RiskTool[];
  health: () => Promise<{ app: string; status: "healthy" | "degraded" | "unavailable"; details?: Record<string, unknown> }>;
}

// ── Sources ─────────────────────────────────────────────────────────────────

export interface Sources {
  kev: KevSource;
  epss: EpssSource;
  exploit: ExploitIntelSource;
  ghsa?: GhsaSource;
  aggregator: RiskAggregator;
}

/** Test seams: an injected fetch for the REST sources, an injected GraphQL adapter for GHSA. */
export interface SourceDeps {
  fetch?: FetchLike;
  advisory?: AdvisoryAdapter;
  model?: RiskModel;
}

export function createSources(config: RiskConfig, deps: SourceDeps = {}): Sources {
  const common = {
    cacheDir: config.cacheDir,
    ttlMs: config.cacheTtlMs,
    timeoutMs: config.timeoutMs,
  };

  const kev = new KevSource({ ...common, fetch: deps.fetch });
  const epss = new EpssSource({ ...common, fetch: deps.fetch });
  const exploit = new ExploitIntelSource({ ...common, fetch: deps.fetch, apiKey: config.vulncheckApiKey });

  // GHSA runs only with a token, injected adapters aside.
  const adapter = deps.advisory ?? (config.githubToken ? createAdvisoryAdapter(config.githubToken) : undefined);
  const ghsa = adapter ? new GhsaSource({ ...common, adapter }) : undefined;

  const aggregator = new RiskAggregator({
    kev,
    epss,
    exploit,
    ghsa,
    concurrency: config.concurrency,
    model: deps.model,
  });

  return { kev, epss, exploit, ghsa, aggregator };
}

// ── Tool arguments ──────────────────────────────────────────────────────────

const cveId = z.string().trim().min(1).transform((s) => s.toUpperCase());

const CveArgs = z.object({ cve_id: cveId });
const CveListArgs = z.object({ cve_ids: z.array(cveId).min(1) });
const FindingsArgs = z.object({ findings: z.array(z.unknown()) });

function parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: Record<string, unknown>): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "args"}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid arguments: ${issues}`);
  }
  return parsed.data;
}

const json = (value: unknown) => JSON.stringify(value, null, 2);

// ── App ─────────────────────────────────────────────────────────────────────

export function createApp(config: RiskConfig = loadConfig(), deps: SourceDeps = {}): RiskApp {
  const sources = createSources(config, deps);

  function buildTools(s: Sources): RiskTool[] {
    return [
      {
        name: "risk_enrich",
        description: "Enrich findings with KEV, EPSS, GHSA and exploit intelligence, then score and prioritize them.",
        inputSchema: {
          type: "object",
          properties: {
            findings: { type: "array", items: { type: "object" }, description: "Findings carrying a CVE id in cve, id or vulnerability.id" },
          },
          required: ["findings"],
        },
        async execute(args) {
          const { findings } = parseArgs(FindingsArgs, args);
          return json(await s.aggregator.enrichAll(findings));
        },
      },
      {
        name: "risk_summarize",
        description: "Count already-prioritized findings per priority tier.",
        inputSchema: {
          type: "object",
          properties: { findings: { type: "array", items: { type: "object" } } },
          required: ["findings"],
        },
        async execute(args) {
          const { findings } = parseArgs(FindingsArgs, args);
          return json(summarize(findings));
        },
      },
      {
        name: "risk_kev_lookup",
        description: "Check a CVE against the CISA Known Exploited Vulnerabilities catalog.",
        inputSchema: {
          type: "object",
          properties: { cve_id: { type: "string", description: "CVE ID (e.g. CVE-2021-44228)" } },
          required: ["cve_id"],
        },
        async execute(args) {
          const { cve_id } = parseArgs(CveArgs, args);
          return json({ cve: cve_id, ...(await s.kev.isKnownExploited(cve_id)) });
        },
      },
      {
        name: "risk_epss_scores",
        description: "Fetch EPSS exploitation probabilities for one or more CVEs.",
        inputSchema: {
          type: "object",
          properties: { cve_ids: { type: "array", items: { type: "string" }, description: "CVE IDs; batched 100 per request" } },
          required: ["cve_ids"],
        },
        async execute(args) {
          const { cve_ids } = parseArgs(CveListArgs, args);
          const scores = await s.epss.fetchScores(cve_ids);
          const rows = [...scores].map(([cve, record]) => ({
            cve,
            ...record,
            exploitationProbability: formatProbability(record.score),
            priority: priorityBand(record.score),
          }));
          return json({ requested: cve_ids.length, found: rows.length, scores: rows });
        },
      },
      {
        name: "risk_ghsa_lookup",
        description: "Query the GitHub Security Advisory database for a CVE. Requires GITHUB_TOKEN.",
        inputSchema: {
          type: "object",
          properties: { cve_id: { type: "string" } },
          required: ["cve_id"],
        },
        async execute(args) {
          const { cve_id } = parseArgs(CveArgs, args);
          if (!s.ghsa) throw new ConfigError("GITHUB_TOKEN is not set; GHSA lookups are disabled");
          return json({ cve: cve_id, ...(await s.ghsa.queryAdvisory(cve_id)) });
        },
      },
      {
        name: "risk_exploit_lookup",
        description: "Exploit maturity and weaponization status from VulnCheck. Without VULNCHECK_API_KEY the answer is 'credential required'.",
        inputSchema: {
          type: "object",
          properties: { cve_id: { type: "string" } },
          required: ["cve_id"],
        },
        async execute(args) {
          const { cve_id } = parseArgs(CveArgs, args);
          return json({ cve: cve_id, ...(await s.exploit.getExploitStatus(cve_id)) });
        },
      },
    ];
  }

  return {
    name: APP_NAME,
    version: APP_VERSION,
    description: "Vulnerability risk enrichment: KEV, EPSS, GHSA and exploit intelligence fused into one score and priority tier.",
    tools: buildTools(sources),
    async health() {
      const [kev, epss, ghsa, exploit] = await Promise.all([
        sources.kev.describeCache(),
        sources.epss.describeCache(),
        sources.ghsa?.describeCache(),
        sources.exploit.describeCache(),
      ]);
      const disabled = [
        ...(sources.ghsa ? [] : ["ghsa"]),
        ...(sources.exploit.enabled ? [] : ["exploit"]),
      ];
      return {
        app: APP_NAME,
        status: disabled.length === 0 ? "healthy" : "degraded",
        details: {
          cacheDir: config.cacheDir,
          disabled,
          caches: { kev, epss, exploit, ...(ghsa ? { ghsa } : {}) },
        },
      };
    },
  };
}
