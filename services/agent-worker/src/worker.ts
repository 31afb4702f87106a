// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/worker`
 * Purpose: Interval loop that runs the coordinator once per source key per cycle.
 * Scope: Scheduling, per-run metrics and post-cycle statistics. Does not decide, vote or attest itself.
 * Invariants:
 * - At most one cycle in flight; the next is scheduled only after the current one settles
 * - A failed run for one key never stops runs for other keys or later cycles
 * - quiesce() cancels the pending timer and resolves once the current cycle has settled
 * Side-effects: Timers; IO through the coordinator and checkpoint store
 * Links: packages/run-core/src/run-coordinator.ts
 * @internal
 */

import { type Participant, STEP_OK, type StepResult } from "@attestor/lifecycle";
import {
  type CheckpointStore,
  computeRunStatistics,
  isCoordinatorQuiescedError,
  type RunCheckpoint,
  type RunCoordinator,
  type RunStatistics,
  type RunSummary,
} from "@attestor/run-core";

import { EVENT_NAMES } from "./observability/events.js";
import type { Logger } from "./observability/logger.js";
import {
  type AgentMetrics,
  recordAbortedRun,
  recordRun,
} from "./observability/metrics.js";

export interface AgentWorkerDeps {
  readonly coordinator: Pick<RunCoordinator, "run">;
  readonly checkpoints: CheckpointStore;
  readonly sourceKeys: readonly string[];
  readonly intervalMs: number;
  readonly metrics: AgentMetrics;
  readonly logger: Logger;
  readonly now?: () => number;
}

export interface CycleReport {
  readonly summaries: readonly RunSummary[];
  /** Source keys whose run threw instead of returning a summary */
  readonly aborted: readonly string[];
  readonly statistics: RunStatistics | null;
}

export class AgentWorker implements Participant {
  readonly name = "agent-worker";

  private readonly log: Logger;
  private readonly now: () => number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private current: Promise<CycleReport> | null = null;
  private stopped = false;

  constructor(private readonly deps: AgentWorkerDeps) {
    this.log = deps.logger.child({ component: "agent-worker" });
    this.now = deps.now ?? Date.now;
  }

  /** First cycle runs immediately, then one per interval after each settles. */
  start(): void {
    this.log.info(
      {
        event: EVENT_NAMES.WORKER_STARTED,
        sourceKeys: this.deps.sourceKeys,
        intervalMs: this.deps.intervalMs,
      },
      EVENT_NAMES.WORKER_STARTED
    );
    this.schedule(0);
  }

  async runCycle(): Promise<CycleReport> {
    const results = await Promise.all(
      this.deps.sourceKeys.map((sourceKey) => this.runOne(sourceKey))
    );
    const summaries = results.flatMap((r) => (r.summary ? [r.summary] : []));
    const aborted = results.flatMap((r) => (r.summary ? [] : [r.sourceKey]));
    const statistics = await this.collectStatistics();

    this.log.info(
      {
        event: EVENT_NAMES.WORKER_CYCLE_FINISHED,
        runs: summaries.length,
        aborted,
      },
      EVENT_NAMES.WORKER_CYCLE_FINISHED
    );
    return { summaries, aborted, statistics };
  }

  async quiesce(): Promise<StepResult> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.current;
    this.log.info(
      { event: EVENT_NAMES.WORKER_STOPPED },
      EVENT_NAMES.WORKER_STOPPED
    );
    return STEP_OK;
  }

  async persist(): Promise<StepResult> {
    return STEP_OK;
  }

  async release(): Promise<StepResult> {
    return STEP_OK;
  }

  private schedule(delayMs: number): void {
    if (this.stopped) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      const cycle = this.runCycle();
      this.current = cycle;
      cycle.then(
        () => {
          this.current = null;
          this.schedule(this.deps.intervalMs);
        },
        (error: unknown) => {
          this.current = null;
          this.log.error({ err: error }, "Worker cycle failed");
          this.schedule(this.deps.intervalMs);
        }
      );
    }, delayMs);
  }

  private async runOne(
    sourceKey: string
  ): Promise<{ sourceKey: string; summary: RunSummary | null }> {
    const startedAt = this.now();
    try {
      const summary = await this.deps.coordinator.run(sourceKey);
      recordRun(this.deps.metrics, summary, this.now() - startedAt);
      return { sourceKey, summary };
    } catch (error) {
      recordAbortedRun(this.deps.metrics, sourceKey, this.now() - startedAt);
      if (isCoordinatorQuiescedError(error)) {
        this.log.info({ sourceKey }, "Run skipped; coordinator is stopping");
      } else {
        this.log.error(
          {
            event: EVENT_NAMES.WORKER_RUN_ABORTED,
            sourceKey,
            err: error,
          },
          EVENT_NAMES.WORKER_RUN_ABORTED
        );
      }
      return { sourceKey, summary: null };
    }
  }

  private async collectStatistics(): Promise<RunStatistics | null> {
    const { checkpoints } = this.deps;
    try {
      const keys = await checkpoints.list();
      const loaded = await Promise.all(keys.map((key) => checkpoints.load(key)));
      const statistics = computeRunStatistics(
        loaded.filter((c): c is RunCheckpoint => c !== null)
      );
      this.log.info(
        { event: EVENT_NAMES.WORKER_STATISTICS, ...statistics },
        EVENT_NAMES.WORKER_STATISTICS
      );
      return statistics;
    } catch (error) {
      this.log.warn(
        { err: error },
        "Statistics unavailable; checkpoint store could not be read"
      );
      return null;
    }
  }
}
