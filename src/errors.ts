import type { SourceName } from "./types.js";

export type RiskErrorCode =
  | "VALIDATION"
  | "NETWORK"
  | "UPSTREAM_SCHEMA"
  | "CACHE_CORRUPTION"
  | "CONFIG";

export class RiskError extends Error {
  readonly code: RiskErrorCode;

  constructor(code: RiskErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RiskError";
    this.code = code;
  }
}

/** Bad caller input: malformed CVE id, wrong type, out-of-range score. */
export class ValidationError extends RiskError {
  constructor(message: string) {
    super("VALIDATION", message);
    this.name = "ValidationError";
  }
}

/** Timeout, connection failure, non-2xx status or an unparseable body. */
export class NetworkError extends RiskError {
  readonly source: SourceName;
  readonly status?: number;

  constructor(source: SourceName, message: string, options?: { status?: number; cause?: unknown }) {
    super("NETWORK", message, { cause: options?.cause });
    this.name = "NetworkError";
    this.source = source;
    this.status = options?.status;
  }
}

/** The upstream answered, but not in the shape the source depends on. */
export class UpstreamSchemaError extends RiskError {
  readonly source: SourceName;

  constructor(source: SourceName, message: string) {
    super("UPSTREAM_SCHEMA", message);
    this.name = "UpstreamSchemaError";
    this.source = source;
  }
}

/** Logged when a cache file cannot be read back; never thrown to callers. */
export class CacheCorruptionError extends RiskError {
  readonly file: string;

  constructor(file: string, cause: unknown) {
    super("CACHE_CORRUPTION", `Unreadable cache file ${file}: ${errorMessage(cause)}`, { cause });
    this.name = "CacheCorruptionError";
    this.file = file;
  }
}

export class ConfigError extends RiskError {
  constructor(message: string) {
    super("CONFIG", message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
