export * from "./calculator";
export * from "./collateral-registry";
export * from "./config";
export * from "./engine";
export * from "./errors";
export * from "./in-memory";
export * from "./position-ledger";
export * from "./price-oracle";
export * from "./types";
export { UnitOfWork } from "./unit-of-work";
export { register as metricsRegistry, renderMetrics } from "./metrics";
export { createServiceLogger } from "./logger";
