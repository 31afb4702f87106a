// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/observability/metrics`
 * Purpose: Prometheus registry and the agent's run, item and ledger metrics.
 * Scope: Metric definitions and recording helpers. Does not serve /metrics (health.ts does).
 * Invariants: Labels are low-cardinality (source keys are operator-configured, outcomes are a closed set).
 * Side-effects: collectDefaultMetrics registers process collectors when asked to
 * Notes: A registry per container instead of a global, so tests build isolated registries.
 * @public
 */

import type { RunSummary } from "@attestor/run-core";
import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

export type RunResult = "success" | "aborted";
export type ForwardResult = "success" | "reverted" | "unconfirmed" | "error";

export interface AgentMetrics {
  readonly registry: Registry;
  readonly runsTotal: Counter<"source_key" | "result">;
  readonly itemsTotal: Counter<"outcome">;
  readonly runDurationMs: Histogram<"source_key">;
  readonly ledgerForwardsTotal: Counter<"result">;
}

export function createMetrics(options?: {
  defaultMetrics?: boolean;
  serviceName?: string;
}): AgentMetrics {
  const registry = new client.Registry();
  registry.setDefaultLabels({
    app: "decision-attestor",
    service: options?.serviceName ?? "agent-worker",
  });
  if (options?.defaultMetrics) {
    client.collectDefaultMetrics({ register: registry });
  }

  return {
    registry,
    runsTotal: new client.Counter({
      name: "agent_runs_total",
      help: "Agent runs by source key and result",
      labelNames: ["source_key", "result"],
      registers: [registry],
    }),
    itemsTotal: new client.Counter({
      name: "agent_items_total",
      help: "Items reaching an outcome within a run",
      labelNames: ["outcome"],
      registers: [registry],
    }),
    runDurationMs: new client.Histogram({
      name: "agent_run_duration_ms",
      help: "Wall-clock duration of one run",
      labelNames: ["source_key"],
      buckets: [100, 500, 1_000, 5_000, 15_000, 60_000, 300_000],
      registers: [registry],
    }),
    ledgerForwardsTotal: new client.Counter({
      name: "agent_ledger_forwards_total",
      help: "Attestations forwarded through the ledger counter",
      labelNames: ["result"],
      registers: [registry],
    }),
  };
}

export function recordRun(
  metrics: AgentMetrics,
  summary: RunSummary,
  durationMs: number
): void {
  metrics.runsTotal.inc({ source_key: summary.sourceKey, result: "success" });
  metrics.runDurationMs.observe({ source_key: summary.sourceKey }, durationMs);
  for (const outcome of Object.values(summary.outcomes)) {
    metrics.itemsTotal.inc({ outcome });
  }
  if (summary.filtered > 0) {
    metrics.itemsTotal.inc({ outcome: "filtered" }, summary.filtered);
  }
}

export function recordAbortedRun(
  metrics: AgentMetrics,
  sourceKey: string,
  durationMs: number
): void {
  metrics.runsTotal.inc({ source_key: sourceKey, result: "aborted" });
  metrics.runDurationMs.observe({ source_key: sourceKey }, durationMs);
}
