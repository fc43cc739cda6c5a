/**
 * vuln-risk: shared types
 *
 * All layers import from here. No circular dependencies.
 */

// ── Identifiers ─────────────────────────────────────────────────────────────

export const CVE_PATTERN = /^CVE-\d{4}-\d+$/;

export function isCveId(value: unknown): value is string {
  return typeof value === "string" && CVE_PATTERN.test(value);
}

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolve the CVE id of a finding.
 *
 * Candidates are read in order `cve`, `id`, `vulnerability.id`; the first
 * non-empty string wins. The result is returned only when that string is
 * CVE-shaped, so `{ id: "GHSA-…", vulnerability: { id: "CVE-…" } }` yields
 * undefined.
 */
export function extractCveId(finding: unknown): string | undefined {
  if (!isRecord(finding)) return undefined;

  const nested = isRecord(finding.vulnerability) ? finding.vulnerability.id : undefined;
  const candidate = [finding.cve, finding.id, nested].find(
    (v): v is string => typeof v === "string" && v.length > 0,
  );

  return isCveId(candidate) ? candidate : undefined;
}

/** CVSS base score from `cvssScore`, `cvss` or `cvss.score`; undefined when absent or out of range. */
export function extractCvss(finding: Finding): number | undefined {
  const raw = finding.cvssScore ?? (isRecord(finding.cvss) ? finding.cvss.score : finding.cvss);
  if (typeof raw !== "number" || !Number.isFinite(raw) || raw < 0 || raw > 10) return undefined;
  return raw;
}

// ── Priority ────────────────────────────────────────────────────────────────

export type Priority = "P0-IMMEDIATE" | "P1-CRITICAL" | "P2-HIGH" | "P3-MEDIUM" | "P4-LOW";

export const PRIORITY_ORDER: Priority[] = [
  "P0-IMMEDIATE", "P1-CRITICAL", "P2-HIGH", "P3-MEDIUM", "P4-LOW",
];

export function isPriority(value: unknown): value is Priority {
  return typeof value === "string" && (PRIORITY_ORDER as string[]).includes(value);
}

/** True when `priority` is at least as urgent as `floor`. */
export function atLeast(priority: Priority, floor: Priority): boolean {
  return PRIORITY_ORDER.indexOf(priority) <= PRIORITY_ORDER.indexOf(floor);
}

export type PrioritySummary = Record<Priority, number>;

export type EpssBand = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW";

// ── Source records ──────────────────────────────────────────────────────────

export interface KevRecord {
  inKev: boolean;
  vulnerabilityName?: string;
  vendorProject?: string;
  product?: string;
  dateAdded?: string;
  dueDate?: string;
  requiredAction?: string;
  shortDescription?: string;
  knownRansomwareCampaignUse?: string;
  notes?: string;
  catalogVersion?: string;
}

export interface EpssRecord {
  score: number;             // 0..1
  percentile: number;        // 0..1
  asOfDate: string;          // YYYY-MM-DD as reported upstream
}

export interface EpssAttachment extends EpssRecord {
  exploitationProbability: string;   // e.g. "97.5%"
  priority: EpssBand;
}

export interface GhsaAffectedPackage {
  packageName: string;
  ecosystem: string;
  vulnerableVersionRange: string;
  firstPatchedVersion: string | null;
}

/** An empty `ghsaId` is the "no advisory found" result. */
export interface GhsaAdvisory {
  ghsaId: string;
  summary: string;
  description: string;
  severity: string;
  publishedAt: string;
  updatedAt: string;
  withdrawnAt: string | null;
  permalink: string;
  vulnerabilities: GhsaAffectedPackage[];
  references: string[];
  error?: string;
}

export interface ExploitRecord {
  available: boolean;
  weaponized: boolean;
  maturity: string;
  attackVector: string;
  exploitType?: string;
  ransomwareUse?: boolean;
  dateAdded?: string;
  dueDate?: string;
  note?: string;
  error?: string;
}

export interface Remediation {
  fixedVersion?: string;
  vulnerableRange?: string;
  [key: string]: unknown;
}

// ── Finding: the record that flows through every layer ──────────────────────

/**
 * A raw finding as produced by an OSV-style scan, enriched in place.
 * Unknown scanner fields are preserved untouched.
 */
export interface Finding {
  cve?: unknown;
  id?: unknown;
  vulnerability?: unknown;
  package?: unknown;
  cvss?: unknown;
  cvssScore?: unknown;
  severity?: unknown;

  kev?: KevRecord;
  epss?: EpssAttachment;
  ghsa?: GhsaAdvisory;
  exploit?: ExploitRecord;
  remediation?: Remediation;
  effectiveSeverity?: string;
  priority?: Priority;
  riskScore?: number;
  context?: string[];

  [key: string]: unknown;
}

export function isFinding(value: unknown): value is Finding {
  return isRecord(value);
}

/** Append a context line once; re-enrichment must not duplicate it. */
export function addContext(finding: Finding, line: string): void {
  const context = Array.isArray(finding.context) ? finding.context : [];
  if (!context.includes(line)) context.push(line);
  finding.context = context;
}

// ── Pipeline results ────────────────────────────────────────────────────────

export type SourceName = "kev" | "epss" | "ghsa" | "exploit";

export interface SourceFailure {
  source: SourceName;
  cve?: string;
  message: string;
}

export interface EnrichmentResult {
  findings: unknown[];
  summary: PrioritySummary;
  failures: SourceFailure[];
  cancelled: boolean;
}

// ── Adapters: what the sources need from the environment ────────────────────

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** Executes a GraphQL document against the GitHub API and returns the raw body. */
export interface AdvisoryAdapter {
  authenticated: boolean;
  query(document: string, variables: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
}
