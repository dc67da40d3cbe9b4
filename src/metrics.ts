/**
 * Stable Engine - Prometheus Metrics
 *
 * Each engine owns a registry so that several engines (and tests) can run
 * in one process without colliding on metric names.
 *
 * Metrics naming convention:  <prefix><metric>_<unit>
 */

import { Registry, Counter, Histogram, collectDefaultMetrics } from "prom-client";
import { DEFAULT_CONFIG, EngineConfig } from "./config";
import { EngineOperation } from "./types";

export type OperationStatus = "success" | "rejected" | "failed";

export interface EngineMetrics {
  readonly register: Registry;
  readonly operationsTotal: Counter<"operation" | "status">;
  readonly liquidationsTotal: Counter<"asset">;
  readonly stalePriceRejectionsTotal: Counter<"feed">;
  readonly operationDurationSeconds: Histogram<"operation">;
}

export function createEngineMetrics(
  config: Pick<EngineConfig, "metricsPrefix" | "collectDefaultMetrics"> = DEFAULT_CONFIG,
  register: Registry = new Registry(),
): EngineMetrics {
  const prefix = config.metricsPrefix;

  if (config.collectDefaultMetrics) {
    collectDefaultMetrics({ register, prefix });
  }

  return {
    register,

    /** Engine entry points by outcome. */
    operationsTotal: new Counter({
      name: `${prefix}operations_total`,
      help: "Engine operations by outcome",
      labelNames: ["operation", "status"] as const, // status: success | rejected | failed
      registers: [register],
    }),

    liquidationsTotal: new Counter({
      name: `${prefix}liquidations_total`,
      help: "Successful liquidations by seized collateral asset",
      labelNames: ["asset"] as const,
      registers: [register],
    }),

    stalePriceRejectionsTotal: new Counter({
      name: `${prefix}stale_price_rejections_total`,
      help: "Price readings rejected by the staleness guard",
      labelNames: ["feed"] as const,
      registers: [register],
    }),

    operationDurationSeconds: new Histogram({
      name: `${prefix}operation_duration_seconds`,
      help: "Wall-clock duration of engine operations",
      labelNames: ["operation"] as const,
      buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
      registers: [register],
    }),
  };
}

export function recordOperation(
  metrics: EngineMetrics,
  operation: EngineOperation,
  status: OperationStatus,
  durationSeconds: number,
): void {
  metrics.operationsTotal.inc({ operation, status });
  metrics.operationDurationSeconds.observe({ operation }, durationSeconds);
}
