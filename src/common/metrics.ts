import { Counter, Histogram, Registry } from "prom-client";

// Registry for generator metrics
const registry = new Registry();

export const GENERATED_TARGETS = new Counter({
  name: "bxp_generated_targets_total",
  help: "Number of Xcode targets created",
  labelNames: ["kind"],
  registers: [registry],
});

export const MERGED_INDEXERS = new Counter({
  name: "bxp_merged_indexers_total",
  help: "Number of indexer records folded into another indexer",
  registers: [registry],
});

export const DIAGNOSTICS = new Counter({
  name: "bxp_diagnostics_total",
  help: "Number of recoverable problems reported during generation",
  labelNames: ["level", "key"],
  registers: [registry],
});

export const GENERATION_DURATION = new Histogram({
  name: "bxp_generation_duration_seconds",
  help: "Project generation latency in seconds",
  labelNames: ["status"],
  registers: [registry],
});

export function getMetrics(): Registry {
  return registry;
}

/**
 * Observe the duration of `fn` under the given status label
 */
export async function measureGeneration<T>(fn: () => Promise<T>): Promise<T> {
  const start = process.hrtime.bigint();
  let status = "error";
  try {
    const result = await fn();
    status = "success";
    return result;
  } finally {
    const duration = Number(process.hrtime.bigint() - start) / 1_000_000_000;
    GENERATION_DURATION.labels(status).observe(duration);
  }
}
