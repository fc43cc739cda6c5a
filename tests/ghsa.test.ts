import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { UpstreamSchemaError, ValidationError } from "../src/errors.js";
import { GhsaSource, emptyAdvisory } from "../src/layers/ghsa.js";
import type { Finding } from "../src/types.js";
import { LOG4J, fakeAdvisoryAdapter, makeTempDir, removeDir } from "./helpers.js";

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

const LOG4J_ADVISORY = {
  data: {
    securityAdvisories: {
      nodes: [
        {
          ghsaId: "GHSA-jfh8-c2jp-5v3q",
          summary: "Remote code injection in Log4j",
          description: "Log4j2 JNDI features do not protect against attacker-controlled LDAP endpoints.",
          severity: "CRITICAL",
          publishedAt: "2021-12-10T00:40:56Z",
          updatedAt: "2024-01-01T00:00:00Z",
          withdrawnAt: null,
          permalink: "https://github.com/advisories/GHSA-jfh8-c2jp-5v3q",
          vulnerabilities: {
            nodes: [
              {
                package: { name: "org.apache.logging.log4j:log4j-api", ecosystem: "MAVEN" },
                vulnerableVersionRange: "< 2.0",
                firstPatchedVersion: null,
              },
              {
                package: { name: "org.apache.logging.log4j:log4j-core", ecosystem: "MAVEN" },
                vulnerableVersionRange: ">= 2.13.0, < 2.15.0",
                firstPatchedVersion: { identifier: "2.15.0" },
              },
            ],
          },
          references: [{ url: "https://nvd.nist.gov/vuln/detail/CVE-2021-44228" }],
        },
      ],
    },
  },
};

const NO_ADVISORY = { data: { securityAdvisories: { nodes: [] } } };

describe("GhsaSource.queryAdvisory", () => {
  it("normalizes an advisory", async () => {
    const { adapter, calls } = fakeAdvisoryAdapter(() => LOG4J_ADVISORY);
    const advisory = await new GhsaSource({ cacheDir: dir, adapter }).queryAdvisory(LOG4J);

    expect(calls).toEqual([{ cve: LOG4J }]);
    expect(advisory).toEqual({
      ghsaId: "GHSA-jfh8-c2jp-5v3q",
      summary: "Remote code injection in Log4j",
      description: "Log4j2 JNDI features do not protect against attacker-controlled LDAP endpoints.",
      severity: "CRITICAL",
      publishedAt: "2021-12-10T00:40:56Z",
      updatedAt: "2024-01-01T00:00:00Z",
      withdrawnAt: null,
      permalink: "https://github.com/advisories/GHSA-jfh8-c2jp-5v3q",
      vulnerabilities: [
        {
          packageName: "org.apache.logging.log4j:log4j-api",
          ecosystem: "MAVEN",
          vulnerableVersionRange: "< 2.0",
          firstPatchedVersion: null,
        },
        {
          packageName: "org.apache.logging.log4j:log4j-core",
          ecosystem: "MAVEN",
          vulnerableVersionRange: ">= 2.13.0, < 2.15.0",
          firstPatchedVersion: "2.15.0",
        },
      ],
      references: ["https://nvd.nist.gov/vuln/detail/CVE-2021-44228"],
    });
  });

  it("returns and caches the zero-value advisory when nothing matches", async () => {
    const { adapter, calls } = fakeAdvisoryAdapter(() => NO_ADVISORY);

    expect(await new GhsaSource({ cacheDir: dir, adapter }).queryAdvisory("CVE-2024-00001")).toEqual(emptyAdvisory());
    expect(await new GhsaSource({ cacheDir: dir, adapter }).queryAdvisory("CVE-2024-00001")).toEqual(emptyAdvisory());
    expect(calls).toHaveLength(1);
  });

  it("queries each CVE once however many callers ask", async () => {
    const { adapter, calls } = fakeAdvisoryAdapter(() => LOG4J_ADVISORY);
    const source = new GhsaSource({ cacheDir: dir, adapter });

    await Promise.all([source.queryAdvisory(LOG4J), source.queryAdvisory(LOG4J), source.queryAdvisory(LOG4J)]);

    expect(calls).toHaveLength(1);
  });

  it("raises GraphQL errors", async () => {
    const { adapter } = fakeAdvisoryAdapter(() => ({
      data: null,
      errors: [{ message: "Bad credentials" }, { type: "RATE_LIMITED" }],
    }));

    await expect(new GhsaSource({ cacheDir: dir, adapter }).queryAdvisory(LOG4J)).rejects.toThrow(
      new UpstreamSchemaError("ghsa", "GraphQL errors: Bad credentials; Unknown error"),
    );
  });

  it("degrades transport failures to the zero-value advisory without caching", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { adapter, calls } = fakeAdvisoryAdapter(() => {
      throw new Error("getaddrinfo ENOTFOUND api.github.com");
    });
    const source = new GhsaSource({ cacheDir: dir, adapter });

    const advisory = await source.queryAdvisory(LOG4J);
    await source.queryAdvisory(LOG4J);

    expect(advisory).toEqual({ ...emptyAdvisory(), error: "ghsa request failed: getaddrinfo ENOTFOUND api.github.com" });
    expect(calls).toHaveLength(2);
    expect(warn).toHaveBeenCalledWith(
      "[vuln-risk:ghsa] GHSA query failed for CVE-2021-44228: ghsa request failed: getaddrinfo ENOTFOUND api.github.com",
    );
  });

  it("rejects malformed ids", async () => {
    const { adapter, calls } = fakeAdvisoryAdapter(() => NO_ADVISORY);
    const source = new GhsaSource({ cacheDir: dir, adapter });

    await expect(source.queryAdvisory("GHSA-jfh8-c2jp-5v3q")).rejects.toThrow(
      new ValidationError("Invalid CVE format: GHSA-jfh8-c2jp-5v3q"),
    );
    await expect(source.queryAdvisory("")).rejects.toThrow(ValidationError);
    expect(calls).toHaveLength(0);
  });
});

describe("GhsaSource.enrich", () => {
  it("takes the fix from the first vulnerability with a patched version", async () => {
    const { adapter } = fakeAdvisoryAdapter(() => LOG4J_ADVISORY);
    const finding: Finding = { cve: LOG4J, remediation: { note: "upgrade log4j-core" } };

    await new GhsaSource({ cacheDir: dir, adapter }).enrich(finding);

    expect(finding.ghsa?.ghsaId).toBe("GHSA-jfh8-c2jp-5v3q");
    expect(finding.remediation).toEqual({
      note: "upgrade log4j-core",
      fixedVersion: "2.15.0",
      vulnerableRange: ">= 2.13.0, < 2.15.0",
    });
  });

  it("leaves remediation alone when no advisory exists", async () => {
    const { adapter } = fakeAdvisoryAdapter(() => NO_ADVISORY);
    const finding: Finding = { cve: "CVE-2024-00001" };

    await new GhsaSource({ cacheDir: dir, adapter }).enrich(finding);

    expect(finding.ghsa).toEqual(emptyAdvisory());
    expect(finding.remediation).toBeUndefined();
  });

  it("attaches the zero-value advisory to findings without a CVE id", async () => {
    const { adapter, calls } = fakeAdvisoryAdapter(() => LOG4J_ADVISORY);
    const finding: Finding = { id: "not-a-cve" };

    await new GhsaSource({ cacheDir: dir, adapter }).enrich(finding);

    expect(finding.ghsa).toEqual(emptyAdvisory());
    expect(calls).toHaveLength(0);
  });
});
