export * as kev from "./kev.js";
export * as epss from "./epss.js";
export * as ghsa from "./ghsa.js";
export * as exploit from "./exploit.js";
export * as risk from "./risk.js";
export * as pipeline from "./pipeline.js";
