/**
 * Environment adapter
 *
 * Reads configuration from environment variables and builds the GitHub
 * GraphQL adapter. Used by the CLI and the MCP server.
 *
 * Optional env vars:
 *   GITHUB_TOKEN               enables GHSA advisory lookups
 *   VULNCHECK_API_KEY          enables exploit intelligence
 *   VULN_RISK_CACHE_DIR        cache directory (default .cache/vuln-risk)
 *   VULN_RISK_CACHE_TTL_HOURS  cache freshness window (default 24)
 *   VULN_RISK_CONCURRENCY      per-finding worker pool size (default 8)
 *   VULN_RISK_TIMEOUT_MS       per-call network timeout (default 30000)
 */

import { Octokit } from "octokit";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { AdvisoryAdapter } from "../types.js";
import { USER_AGENT } from "./http.js";

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
  GITHUB_TOKEN: z.preprocess(blankToUndefined, z.string().optional()),
  VULNCHECK_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  VULN_RISK_CACHE_DIR: z.preprocess(blankToUndefined, z.string().default(".cache/vuln-risk")),
  VULN_RISK_CACHE_TTL_HOURS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(24)),
  VULN_RISK_CONCURRENCY: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(64).default(8)),
  VULN_RISK_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(30_000)),
});

export interface RiskConfig {
  githubToken?: string;
  vulncheckApiKey?: string;
  cacheDir: string;
  cacheTtlMs: number;
  concurrency: number;
  timeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RiskConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    githubToken: e.GITHUB_TOKEN,
    vulncheckApiKey: e.VULNCHECK_API_KEY,
    cacheDir: e.VULN_RISK_CACHE_DIR,
    cacheTtlMs: e.VULN_RISK_CACHE_TTL_HOURS * 60 * 60 * 1000,
    concurrency: e.VULN_RISK_CONCURRENCY,
    timeoutMs: e.VULN_RISK_TIMEOUT_MS,
  };
}

// ── GitHub GraphQL adapter ──────────────────────────────────────────────────

export function createAdvisoryAdapter(token?: string): AdvisoryAdapter {
  const octokit = new Octokit({
    auth: token,
    userAgent: USER_AGENT,
    throttle: {
      onRateLimit: (retryAfter: number, options: { method: string; url: string }) => {
        console.warn(`[vuln-risk:ghsa] Rate limit hit for ${options.method} ${options.url}; not retrying (reset in ${retryAfter}s)`);
        return false;
      },
      onSecondaryRateLimit: (retryAfter: number, options: { method: string; url: string }) => {
        console.warn(`[vuln-risk:ghsa] Secondary rate limit for ${options.method} ${options.url}; not retrying (backoff ${retryAfter}s)`);
        return false;
      },
    },
    retry: { enabled: false },
  });

  return {
    authenticated: token !== undefined,

    async query(document, variables, signal) {
      // POST /graphql keeps the `errors` array in the body rather than throwing on it.
      const response = await octokit.request("POST /graphql", {
        query: document,
        variables,
        request: { signal },
      });
      const body: unknown = response.data;
      return body;
    },
  };
}
