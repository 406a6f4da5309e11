/**
 * Collateral Engine - Prometheus Metrics
 *
 * Counters and gauges for engine operations.
 * Metrics naming convention:  collateral_engine_<metric>_<unit>
 */

import { Registry, Counter, Gauge, collectDefaultMetrics } from "prom-client";

// ============================================================
//  REGISTRY
// ============================================================

/** Registry shared by every engine instance in this process. */
export const register = new Registry();

// Node.js runtime metrics (GC, event loop lag, memory, etc.)
collectDefaultMetrics({ register, prefix: "collateral_engine_" });

// ============================================================
//  COUNTERS
// ============================================================

/** Mutating operations by outcome. */
export const operationsTotal = new Counter({
  name: "collateral_engine_operations_total",
  help: "Total mutating engine operations",
  labelNames: ["operation", "status"] as const, // status: committed | rejected
  registers: [register],
});

/** Rejections by error code. */
export const failuresTotal = new Counter({
  name: "collateral_engine_failures_total",
  help: "Total rejected operations by error code",
  labelNames: ["code"] as const,
  registers: [register],
});

/** Committed liquidations. */
export const liquidationsTotal = new Counter({
  name: "collateral_engine_liquidations_total",
  help: "Total committed liquidations",
  labelNames: ["asset"] as const,
  registers: [register],
});

/** Compensating actions that failed while unwinding an operation. */
export const compensationFailuresTotal = new Counter({
  name: "collateral_engine_compensation_failures_total",
  help: "Compensating collaborator calls that failed during rollback",
  registers: [register],
});

/** Event listeners that threw after an operation committed. */
export const listenerFailuresTotal = new Counter({
  name: "collateral_engine_listener_failures_total",
  help: "Event listeners that threw while an event was published",
  labelNames: ["event"] as const,
  registers: [register],
});

// ============================================================
//  GAUGES
// ============================================================

/** Sum of all account debt, in whole debt units. */
export const outstandingDebt = new Gauge({
  name: "collateral_engine_outstanding_debt",
  help: "Total minted debt tracked by the ledger",
  registers: [register],
});

/** Prometheus text-format payload for the whole registry. */
export function renderMetrics(): Promise<string> {
  return register.metrics();
}
