// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/lifecycle/shutdown-coordinator`
 * Purpose: Drives the ordered stop sequence across registered participants.
 * Scope: Ordering, grace timeout and failure collection. Does not install signal handlers or exit the process.
 * Invariants:
 * - quiesce is invoked on every participant in registration order, then awaited together up to graceMs.
 * - persist runs in registration order; release runs in reverse registration order.
 * - BEST_EFFORT: a failing or throwing participant is logged and recorded; the others still run.
 * - shutdown() is idempotent: repeat calls return the same drain.
 * Side-effects: timers
 * Links: packages/lifecycle/src/signals.ts
 * @public
 */

import type { LoggerLike } from "./logger";
import {
  type Participant,
  type ShutdownPhase,
  type StepResult,
  stepFailed,
} from "./participant";

export interface ShutdownFailure {
  readonly participant: string;
  readonly phase: ShutdownPhase;
  readonly error: string;
}

export interface ShutdownReport {
  readonly reason: string;
  /** Grace period elapsed before every quiesce settled */
  readonly timedOut: boolean;
  readonly failures: readonly ShutdownFailure[];
  readonly durationMs: number;
}

export interface ShutdownCoordinatorConfig {
  readonly graceMs: number;
  readonly logger: LoggerLike;
  readonly now?: () => number;
}

const TIMED_OUT = Symbol("timed-out");

export class ShutdownCoordinator {
  private readonly participants: Participant[] = [];
  private drain: Promise<ShutdownReport> | null = null;

  constructor(private readonly config: ShutdownCoordinatorConfig) {}

  register(participant: Participant): void {
    if (this.drain) {
      throw new Error(
        `Cannot register participant "${participant.name}" after shutdown started`
      );
    }
    if (this.participants.some((p) => p.name === participant.name)) {
      throw new Error(`Participant "${participant.name}" already registered`);
    }
    this.participants.push(participant);
  }

  get isShuttingDown(): boolean {
    return this.drain !== null;
  }

  get registered(): readonly string[] {
    return this.participants.map((p) => p.name);
  }

  shutdown(reason: string): Promise<ShutdownReport> {
    if (!this.drain) {
      this.drain = this.run(reason);
    }
    return this.drain;
  }

  private async run(reason: string): Promise<ShutdownReport> {
    const now = this.config.now ?? Date.now;
    const startedAt = now();
    const { logger } = this.config;
    const failures: ShutdownFailure[] = [];
    const participants = [...this.participants];

    logger.info(
      { reason, participants: participants.map((p) => p.name) },
      "Shutdown started"
    );

    const record = (
      participant: Participant,
      phase: ShutdownPhase,
      result: StepResult
    ): void => {
      if (result.ok) return;
      failures.push({
        participant: participant.name,
        phase,
        error: result.error,
      });
      logger.error(
        { participant: participant.name, phase, error: result.error },
        "Shutdown step failed"
      );
    };

    // 1-2. quiesce all, bounded by the grace period
    const settled: (StepResult | undefined)[] = participants.map(
      () => undefined
    );
    const quiescing = participants.map((p, i) =>
      invoke(p, "quiesce").then((result) => {
        settled[i] = result;
      })
    );

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.config.graceMs);
    });
    const outcome = await Promise.race([
      Promise.all(quiescing).then(() => "settled" as const),
      timeout,
    ]);
    clearTimeout(timer);

    const timedOut = outcome === TIMED_OUT;
    participants.forEach((p, i) => {
      record(
        p,
        "quiesce",
        settled[i] ?? {
          ok: false,
          error: `quiesce did not settle within ${this.config.graceMs}ms`,
        }
      );
    });
    if (timedOut) {
      logger.warn(
        { reason, graceMs: this.config.graceMs },
        "Grace period elapsed; proceeding with persist"
      );
    }

    // 3. persist in registration order
    for (const p of participants) {
      record(p, "persist", await invoke(p, "persist"));
    }

    // 4. release in reverse order
    for (const p of [...participants].reverse()) {
      record(p, "release", await invoke(p, "release"));
    }

    const report: ShutdownReport = {
      reason,
      timedOut,
      failures,
      durationMs: now() - startedAt,
    };
    logger.info(
      {
        reason,
        timedOut,
        failureCount: failures.length,
        durationMs: report.durationMs,
      },
      "Shutdown complete"
    );
    return report;
  }
}

async function invoke(
  participant: Participant,
  phase: ShutdownPhase
): Promise<StepResult> {
  try {
    return await participant[phase]();
  } catch (error) {
    return stepFailed(error);
  }
}
