import { mkdtemp, rm, utimes } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AdvisoryAdapter, FetchLike } from "../src/types.js";

export interface RecordedCall {
  url: string;
  init?: RequestInit;
}

/** In-process stand-in for fetch; every call is recorded. */
export function fakeFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const calls: RecordedCall[] = [];
  const fetch: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return handler(url, init);
  };
  return { fetch, calls };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function fakeAdvisoryAdapter(respond: (variables: Record<string, unknown>) => unknown | Promise<unknown>) {
  const calls: Array<Record<string, unknown>> = [];
  const adapter: AdvisoryAdapter = {
    authenticated: true,
    async query(_document, variables) {
      calls.push(variables);
      return respond(variables);
    },
  };
  return { adapter, calls };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "vuln-risk-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Push a file's mtime into the past. */
export async function ageFile(path: string, hours: number): Promise<void> {
  const past = new Date(Date.now() - hours * 60 * 60 * 1000);
  await utimes(path, past, past);
}

/** CVE ids requested by an EPSS call URL. */
export function requestedCves(url: string): string[] {
  return (new URL(url).searchParams.get("cve") ?? "").split(",").filter(Boolean);
}

export const LOG4J = "CVE-2021-44228";

export const KEV_CATALOG = {
  title: "CISA Catalog of Known Exploited Vulnerabilities",
  catalogVersion: "2024.06.01",
  dateReleased: "2024-06-01T12:00:00.000Z",
  count: 2,
  vulnerabilities: [
    {
      cveID: LOG4J,
      vendorProject: "Apache",
      product: "Log4j2",
      vulnerabilityName: "Apache Log4j2 Remote Code Execution Vulnerability",
      dateAdded: "2021-12-10",
      shortDescription: "JNDI features do not protect against attacker-controlled endpoints.",
      requiredAction: "Apply updates per vendor instructions.",
      dueDate: "2021-12-24",
      knownRansomwareCampaignUse: "Known",
      notes: "",
    },
    { vendorProject: "Example", product: "No identifier" },
  ],
};
