/**
 * vuln-risk: CLI
 *
 * Thin wrapper over the app's tools. Returns the exit code and the text to
 * print instead of touching the process, so it can be driven from tests.
 *
 * Exit codes: 0 success (including enrichment with upstream failures),
 * 1 invalid input or configuration, 2 usage error.
 */

import { readFile, writeFile } from "node:fs/promises";
import { createApp } from "./app.js";
import type { RiskApp, SourceDeps } from "./app.js";
import { loadConfig } from "./adapters/env.js";
import { ConfigError, RiskError, ValidationError, errorMessage } from "./errors.js";
import { startServer } from "./mcp/server.js";
import { isRecord } from "./types.js";

export const USAGE = `Usage: vuln-risk <command> [arguments] [options]

Commands:
  enrich <findings.json>     Enrich, score and prioritize findings
  summarize <findings.json>  Count prioritized findings per tier
  kev <CVE>                  CISA KEV catalog lookup
  epss <CVE...>              EPSS exploitation probabilities
  ghsa <CVE>                 GitHub Security Advisory lookup (needs GITHUB_TOKEN)
  exploit <CVE>              VulnCheck exploit intelligence (needs VULNCHECK_API_KEY)
  serve                      Run the MCP server on stdio

Options:
  --cache-dir <dir>          Cache directory (VULN_RISK_CACHE_DIR)
  --ttl-hours <n>            Cache TTL in hours (VULN_RISK_CACHE_TTL_HOURS)
  --concurrency <n>          Worker pool size (VULN_RISK_CONCURRENCY)
  --timeout-ms <n>           Per-call network timeout (VULN_RISK_TIMEOUT_MS)
  --output <file>            enrich: write the result to a file
  --help                     Show this help`;

const FLAG_ENV: Record<string, string> = {
  "cache-dir": "VULN_RISK_CACHE_DIR",
  "ttl-hours": "VULN_RISK_CACHE_TTL_HOURS",
  concurrency: "VULN_RISK_CONCURRENCY",
  "timeout-ms": "VULN_RISK_TIMEOUT_MS",
};
const VALUE_FLAGS = new Set([...Object.keys(FLAG_ENV), "output"]);
const BOOLEAN_FLAGS = new Set(["help"]);

const COMMANDS = ["enrich", "summarize", "kev", "epss", "ghsa", "exploit", "serve", "help"] as const;
type Command = (typeof COMMANDS)[number];

type CliArgs = {
  command: Command;
  positionals: string[];
  flags: Map<string, string | boolean>;
};

export interface CliResult {
  exitCode: 0 | 1 | 2;
  output: string;
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  deps?: SourceDeps;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<CliResult> {
  try {
    const args = parseArgs(argv);
    if (args.command === "help" || args.flags.get("help") === true) return { exitCode: 0, output: USAGE };

    const config = loadConfig(withFlagOverrides(options.env ?? process.env, args.flags));
    const app = createApp(config, options.deps);
    return { exitCode: 0, output: await dispatch(app, args) };
  } catch (err) {
    if (err instanceof UsageError) return { exitCode: 2, output: `${err.message}\n\n${USAGE}` };
    if (err instanceof ValidationError || err instanceof ConfigError) {
      return { exitCode: 1, output: `Error: ${err.message}` };
    }
    if (err instanceof RiskError) {
      // Upstream trouble is reported, not turned into a failing exit.
      console.error(`[vuln-risk:cli] ${err.message}`);
      return { exitCode: 0, output: JSON.stringify({ error: err.message, code: err.code }, null, 2) };
    }
    throw err;
  }
}

async function dispatch(app: RiskApp, args: CliArgs): Promise<string> {
  const call = (name: string, input: Record<string, unknown>) => {
    const tool = app.tools.find((t) => t.name === name);
    if (!tool) throw new Error(`Tool ${name} is not registered`);
    return tool.execute(input);
  };

  switch (args.command) {
    case "kev":
      return call("risk_kev_lookup", { cve_id: single(args) });
    case "ghsa":
      return call("risk_ghsa_lookup", { cve_id: single(args) });
    case "exploit":
      return call("risk_exploit_lookup", { cve_id: single(args) });
    case "epss":
      if (args.positionals.length === 0) throw new UsageError("epss needs at least one CVE ID");
      return call("risk_epss_scores", { cve_ids: args.positionals });
    case "summarize":
      return call("risk_summarize", { findings: await readFindings(single(args)) });
    case "enrich": {
      const result = await call("risk_enrich", { findings: await readFindings(single(args)) });
      const output = args.flags.get("output");
      if (typeof output !== "string") return result;
      await writeFile(output, result + "\n", "utf-8");
      return `Wrote enriched findings to ${output}`;
    }
    case "serve":
      await startServer(app);
      return "";
    case "help":
      return USAGE;
  }
}

// ── Arguments ───────────────────────────────────────────────────────────────

function parseArgs(argv: string[]): CliArgs {
  const flags = new Map<string, string | boolean>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }

    const name = token.slice(2);
    if (BOOLEAN_FLAGS.has(name)) {
      flags.set(name, true);
      continue;
    }
    if (!VALUE_FLAGS.has(name)) throw new UsageError(`Unknown option --${name}`);

    const value = argv[i + 1];
    if (!value || value.startsWith("--")) throw new UsageError(`Missing value for --${name}`);
    flags.set(name, value);
    i += 1;
  }

  const [command, ...rest] = positionals;
  if (command === undefined) {
    if (flags.get("help") === true) return { command: "help", positionals: [], flags };
    throw new UsageError("Missing command");
  }
  if (!isCommand(command)) throw new UsageError(`Unknown command: ${command}`);

  return { command, positionals: rest, flags };
}

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

function single(args: CliArgs): string {
  if (args.positionals.length !== 1) {
    throw new UsageError(`${args.command} takes exactly one argument, got ${args.positionals.length}`);
  }
  return args.positionals[0];
}

function withFlagOverrides(env: NodeJS.ProcessEnv, flags: Map<string, string | boolean>): NodeJS.ProcessEnv {
  const merged = { ...env };
  for (const [flag, variable] of Object.entries(FLAG_ENV)) {
    const value = flags.get(flag);
    if (typeof value === "string") merged[variable] = value;
  }
  return merged;
}

/** A findings file holds a JSON array, or an object with a `findings` array. */
async function readFindings(path: string): Promise<unknown[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ValidationError(`Cannot read findings file ${path}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(`Findings file ${path} is not valid JSON: ${errorMessage(err)}`);
  }

  if (Array.isArray(parsed)) return parsed;
  if (isRecord(parsed) && Array.isArray(parsed.findings)) return parsed.findings;
  throw new ValidationError(`Findings file ${path} must contain an array or an object with a "findings" array`);
}
