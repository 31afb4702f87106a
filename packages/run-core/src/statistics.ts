// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/statistics`
 * Purpose: Aggregate statistics across every source key's checkpoint.
 * Scope: Pure aggregation over loaded checkpoints. Does not read storage.
 * Invariants: successRate = submitted / (submitted + failed), 0 when both are 0; averages exclude items without confidence.
 * Side-effects: none
 * @public
 */

import type { RunCheckpoint } from "./model";

export interface RunStatistics {
  readonly sourceKeys: number;
  readonly totalRuns: number;
  readonly itemsEvaluated: number;
  readonly submitted: number;
  readonly skipped: number;
  readonly simulated: number;
  readonly failed: number;
  readonly inFlight: number;
  /** Mean confidence of submitted decisions, null when none */
  readonly averageSubmittedConfidence: number | null;
  readonly successRate: number;
  readonly lastRunFinishedAt: string | null;
}

export function computeRunStatistics(
  checkpoints: readonly RunCheckpoint[]
): RunStatistics {
  let totalRuns = 0;
  let itemsEvaluated = 0;
  let submitted = 0;
  let skipped = 0;
  let simulated = 0;
  let failed = 0;
  let inFlight = 0;
  let confidenceSum = 0;
  let confidenceCount = 0;
  let lastRunFinishedAt: string | null = null;

  for (const checkpoint of checkpoints) {
    totalRuns += checkpoint.runCount;
    inFlight += checkpoint.inFlightItemIds.length;
    if (
      checkpoint.lastRunFinishedAt !== null &&
      (lastRunFinishedAt === null ||
        checkpoint.lastRunFinishedAt > lastRunFinishedAt)
    ) {
      lastRunFinishedAt = checkpoint.lastRunFinishedAt;
    }

    for (const outcome of Object.values(checkpoint.outcomes)) {
      itemsEvaluated += 1;
      switch (outcome.status) {
        case "completed_submitted":
          submitted += 1;
          if (outcome.confidence !== undefined) {
            confidenceSum += outcome.confidence;
            confidenceCount += 1;
          }
          break;
        case "completed_skipped":
          skipped += 1;
          break;
        case "completed_simulated":
          simulated += 1;
          break;
        case "completed_failed":
          failed += 1;
          break;
      }
    }
  }

  const attempted = submitted + failed;
  return {
    sourceKeys: checkpoints.length,
    totalRuns,
    itemsEvaluated,
    submitted,
    skipped,
    simulated,
    failed,
    inFlight,
    averageSubmittedConfidence:
      confidenceCount > 0 ? confidenceSum / confidenceCount : null,
    successRate: attempted > 0 ? submitted / attempted : 0,
    lastRunFinishedAt,
  };
}
