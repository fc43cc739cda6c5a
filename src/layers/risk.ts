/**
 * Risk Layer
 *
 * Fuses the four source signals into one 0–100 score and a priority tier.
 *
 * Pure logic. No network calls, no cache access.
 *
 * Inputs:  Finding carrying any subset of cvss / epss / kev / exploit
 * Outputs: riskScore, priority, PrioritySummary
 */

import type { Finding, Priority, PrioritySummary } from "../types.js";
import { atLeast, extractCvss, isPriority, isRecord } from "../types.js";

// ── Model ───────────────────────────────────────────────────────────────────

export interface RiskModel {
  weights: {
    cvss: number;       // applied to cvss / 10
    epss: number;       // applied to the EPSS probability
    kev: number;        // applied when listed in KEV
    exploit: number;    // full when weaponized, half when merely available
  };
  thresholds: {
    critical: number;
    high: number;
    medium: number;
  };
}

/** Default weights and tier thresholds. Overridable per aggregator. */
export const DEFAULT_RISK_MODEL: RiskModel = {
  weights: { cvss: 40, epss: 30, kev: 20, exploit: 10 },
  thresholds: { critical: 80, high: 60, medium: 40 },
};

// ── Signals ─────────────────────────────────────────────────────────────────

function epssScore(finding: Finding): number {
  const attached = isRecord(finding.epss) ? finding.epss.score : undefined;
  const raw = attached ?? finding.epssScore;
  return typeof raw === "number" && raw >= 0 && raw <= 1 ? raw : 0;
}

export function inKev(finding: Finding): boolean {
  return isRecord(finding.kev) && finding.kev.inKev === true;
}

function exploitFactor(finding: Finding): number {
  if (!isRecord(finding.exploit)) return 0;
  if (finding.exploit.weaponized === true) return 1;
  if (finding.exploit.available === true) return 0.5;
  return 0;
}

function isWeaponized(finding: Finding): boolean {
  return isRecord(finding.exploit) && finding.exploit.weaponized === true;
}

// ── Public API ──────────────────────────────────────────────────────────────

/** Composite score in [0, 100], rounded to two decimals. Missing signals count as 0. */
export function score(finding: Finding, model: RiskModel = DEFAULT_RISK_MODEL): number {
  const { weights } = model;
  const raw =
    weights.cvss * ((extractCvss(finding) ?? 0) / 10) +
    weights.epss * epssScore(finding) +
    weights.kev * (inKev(finding) ? 1 : 0) +
    weights.exploit * exploitFactor(finding);

  const clamped = Math.min(100, Math.max(0, raw));
  return Math.round(clamped * 100) / 100;
}

export function priority(finding: Finding, riskScore: number, model: RiskModel = DEFAULT_RISK_MODEL): Priority {
  if (inKev(finding)) return "P0-IMMEDIATE";

  const { thresholds } = model;
  let tier: Priority =
    riskScore >= thresholds.critical ? "P1-CRITICAL"
      : riskScore >= thresholds.high ? "P2-HIGH"
        : riskScore >= thresholds.medium ? "P3-MEDIUM"
          : "P4-LOW";

  if (isWeaponized(finding) && !atLeast(tier, "P1-CRITICAL")) tier = "P1-CRITICAL";
  return tier;
}

/** Score and prioritize in place. */
export function assess(finding: Finding, model: RiskModel = DEFAULT_RISK_MODEL): Finding {
  const riskScore = score(finding, model);
  finding.riskScore = riskScore;
  finding.priority = priority(finding, riskScore, model);
  return finding;
}

/** Count per tier; elements without a recognised `priority` are ignored. */
export function summarize(findings: unknown[]): PrioritySummary {
  const summary: PrioritySummary = {
    "P0-IMMEDIATE": 0,
    "P1-CRITICAL": 0,
    "P2-HIGH": 0,
    "P3-MEDIUM": 0,
    "P4-LOW": 0,
  };
  for (const finding of findings) {
    if (isRecord(finding) && isPriority(finding.priority)) summary[finding.priority]++;
  }
  return summary;
}
