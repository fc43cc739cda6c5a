/**
 * vuln-risk: entry point
 *
 * Re-exports layers and types for programmatic consumption.
 * The MCP server and CLI are separate entry points.
 */

export * from "./types.js";
export * from "./errors.js";
export * as layers from "./layers/index.js";
export { CacheStore } from "./cache/store.js";
export { KevSource } from "./layers/kev.js";
export { EpssSource, priorityBand } from "./layers/epss.js";
export { GhsaSource } from "./layers/ghsa.js";
export { ExploitIntelSource } from "./layers/exploit.js";
export { RiskAggregator } from "./layers/pipeline.js";
export { DEFAULT_RISK_MODEL } from "./layers/risk.js";
export type { RiskModel } from "./layers/risk.js";
export { loadConfig } from "./adapters/env.js";
export type { RiskConfig } from "./adapters/env.js";
export { createApp, createSources } from "./app.js";
