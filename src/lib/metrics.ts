import client from "prom-client";

type EngineMetrics = {
  storeRequestsTotal: client.Counter<"store" | "op" | "outcome">;
  storeRequestDurationSeconds: client.Histogram<"store" | "op" | "outcome">;
  cacheLookupsTotal: client.Counter<"cache" | "result">;
  notifierDroppedTotal: client.Counter<"channel">;
  reconcilePassesTotal: client.Counter<"mode" | "outcome">;
  backfillWritesTotal: client.Counter<"fragment">;
  denormalizedPersistFailuresTotal: client.Counter<string>;
};

// One registry per process, even when the module is evaluated more than once (test isolation, hot reload).
const g = globalThis as unknown as {
  __dojoJournalProm?: { registry: client.Registry; metrics: EngineMetrics };
};

function createMetrics() {
  const registry = new client.Registry();
  client.collectDefaultMetrics({ register: registry });

  const storeLabels = ["store", "op", "outcome"] as const;

  const storeRequestsTotal = new client.Counter({
    name: "dojo_engine_store_requests_total",
    help: "Remote store calls by store, operation and outcome",
    labelNames: storeLabels,
    registers: [registry],
  });

  const storeRequestDurationSeconds = new client.Histogram({
    name: "dojo_engine_store_request_duration_seconds",
    help: "Remote store call duration in seconds",
    labelNames: storeLabels,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
    registers: [registry],
  });

  const cacheLookupsTotal = new client.Counter({
    name: "dojo_engine_cache_lookups_total",
    help: "Entity cache lookups by cache and hit/miss",
    labelNames: ["cache", "result"] as const,
    registers: [registry],
  });

  const notifierDroppedTotal = new client.Counter({
    name: "dojo_engine_notifier_dropped_total",
    help: "Change events dropped from a lagging subscriber buffer",
    labelNames: ["channel"] as const,
    registers: [registry],
  });

  const reconcilePassesTotal = new client.Counter({
    name: "dojo_engine_reconcile_passes_total",
    help: "Profile reconciliation passes by mode (load/refresh) and outcome (ok/stale/failed)",
    labelNames: ["mode", "outcome"] as const,
    registers: [registry],
  });

  const backfillWritesTotal = new client.Counter({
    name: "dojo_engine_backfill_writes_total",
    help: "Records synthesized on read by the profile backfill",
    labelNames: ["fragment"] as const,
    registers: [registry],
  });

  const denormalizedPersistFailuresTotal = new client.Counter({
    name: "dojo_engine_denormalized_persist_failures_total",
    help: "Failed writes of the denormalized composite profile to the primary store",
    registers: [registry],
  });

  return {
    registry,
    metrics: {
      storeRequestsTotal,
      storeRequestDurationSeconds,
      cacheLookupsTotal,
      notifierDroppedTotal,
      reconcilePassesTotal,
      backfillWritesTotal,
      denormalizedPersistFailuresTotal,
    },
  };
}

const state = g.__dojoJournalProm ?? (g.__dojoJournalProm = createMetrics());

export const promRegistry: client.Registry = state.registry;
export const metrics: EngineMetrics = state.metrics;
