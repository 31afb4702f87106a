// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/checkpoint`
 * Purpose: Pure state transitions over RunCheckpoint.
 * Scope: Immutable updates only; every function returns a new checkpoint. Does not persist.
 * Invariants:
 * - markCompleted removes the item from in-flight and pending in the same step.
 * - No transition moves a completed item back to in-flight.
 * - reconcile() restores in-flight ∩ completed = ∅ and pending ⊆ in-flight.
 * Side-effects: none
 * Links: packages/run-core/src/run-coordinator.ts
 * @public
 */

import type { Decision } from "@attestor/attestation-core";

import {
  CHECKPOINT_SCHEMA_VERSION,
  type ItemOutcomeRecord,
  type PendingEntry,
  type RunCheckpoint,
} from "./model";

export function emptyCheckpoint(sourceKey: string): RunCheckpoint {
  return {
    schemaVersion: CHECKPOINT_SCHEMA_VERSION,
    sourceKey,
    inFlightItemIds: [],
    completedItemIds: [],
    lastRunStartedAt: null,
    lastRunFinishedAt: null,
    runCount: 0,
    pending: {},
    outcomes: {},
  };
}

/**
 * True when the previous run started but never stamped its finish.
 */
export function isUncleanShutdown(checkpoint: RunCheckpoint): boolean {
  const { lastRunStartedAt: started, lastRunFinishedAt: finished } =
    checkpoint;
  if (started === null) return false;
  if (finished === null) return true;
  return Date.parse(started) > Date.parse(finished);
}

export function markRunStarted(
  checkpoint: RunCheckpoint,
  at: string
): RunCheckpoint {
  return {
    ...checkpoint,
    lastRunStartedAt: at,
    runCount: checkpoint.runCount + 1,
  };
}

export function markRunFinished(
  checkpoint: RunCheckpoint,
  at: string
): RunCheckpoint {
  return { ...checkpoint, lastRunFinishedAt: at };
}

export function markInFlight(
  checkpoint: RunCheckpoint,
  itemId: string
): RunCheckpoint {
  if (checkpoint.completedItemIds.includes(itemId)) {
    throw new Error(`Item ${itemId} is already completed`);
  }
  if (checkpoint.inFlightItemIds.includes(itemId)) return checkpoint;
  return {
    ...checkpoint,
    inFlightItemIds: [...checkpoint.inFlightItemIds, itemId],
    pending: {
      ...checkpoint.pending,
      [itemId]: { attestationAttempts: 0 },
    },
  };
}

function updatePending(
  checkpoint: RunCheckpoint,
  itemId: string,
  update: (entry: PendingEntry) => PendingEntry
): RunCheckpoint {
  if (!checkpoint.inFlightItemIds.includes(itemId)) {
    throw new Error(`Item ${itemId} is not in flight`);
  }
  const entry = checkpoint.pending[itemId] ?? { attestationAttempts: 0 };
  return {
    ...checkpoint,
    pending: { ...checkpoint.pending, [itemId]: update(entry) },
  };
}

export function recordDecision(
  checkpoint: RunCheckpoint,
  itemId: string,
  decision: Decision
): RunCheckpoint {
  return updatePending(checkpoint, itemId, (entry) => ({ ...entry, decision }));
}

export function recordSubmission(
  checkpoint: RunCheckpoint,
  itemId: string,
  submissionReference: string
): RunCheckpoint {
  return updatePending(checkpoint, itemId, (entry) => ({
    ...entry,
    submissionReference,
  }));
}

export function recordAttestationSent(
  checkpoint: RunCheckpoint,
  itemId: string,
  attestationTransaction: string
): RunCheckpoint {
  return updatePending(checkpoint, itemId, (entry) => ({
    ...entry,
    attestationTransaction,
  }));
}

/** Counts a failed write; a sent transaction known not to have landed counts too. */
export function recordAttestationFailure(
  checkpoint: RunCheckpoint,
  itemId: string
): RunCheckpoint {
  return updatePending(
    checkpoint,
    itemId,
    ({ attestationTransaction: _sent, ...entry }) => ({
      ...entry,
      attestationAttempts: entry.attestationAttempts + 1,
    })
  );
}

export function markCompleted(
  checkpoint: RunCheckpoint,
  itemId: string,
  outcome: ItemOutcomeRecord
): RunCheckpoint {
  const { [itemId]: _done, ...pending } = checkpoint.pending;
  return {
    ...checkpoint,
    inFlightItemIds: checkpoint.inFlightItemIds.filter((id) => id !== itemId),
    completedItemIds: checkpoint.completedItemIds.includes(itemId)
      ? checkpoint.completedItemIds
      : [...checkpoint.completedItemIds, itemId],
    pending,
    outcomes: { ...checkpoint.outcomes, [itemId]: outcome },
  };
}

export interface ReconcileResult {
  readonly checkpoint: RunCheckpoint;
  /** Item ids that were both in flight and completed; completion wins */
  readonly repaired: readonly string[];
}

/**
 * Repairs a checkpoint loaded from storage. Completion wins over in-flight,
 * since completion is only ever written after the side effects landed.
 */
export function reconcile(checkpoint: RunCheckpoint): ReconcileResult {
  const completed = [...new Set(checkpoint.completedItemIds)];
  const completedSet = new Set(completed);
  const inFlightUnique = [...new Set(checkpoint.inFlightItemIds)];
  const repaired = inFlightUnique.filter((id) => completedSet.has(id));
  const inFlight = inFlightUnique.filter((id) => !completedSet.has(id));
  const inFlightSet = new Set(inFlight);

  const pending: Record<string, PendingEntry> = {};
  for (const [id, entry] of Object.entries(checkpoint.pending)) {
    if (inFlightSet.has(id)) pending[id] = entry;
  }

  return {
    checkpoint: {
      ...checkpoint,
      inFlightItemIds: inFlight,
      completedItemIds: completed,
      pending,
    },
    repaired,
  };
}

export function checkInvariants(checkpoint: RunCheckpoint): string[] {
  const violations: string[] = [];
  const completed = new Set(checkpoint.completedItemIds);
  const inFlight = new Set(checkpoint.inFlightItemIds);
  for (const id of inFlight) {
    if (completed.has(id)) violations.push(`${id} is in flight and completed`);
  }
  for (const id of Object.keys(checkpoint.pending)) {
    if (!inFlight.has(id)) violations.push(`${id} is pending but not in flight`);
  }
  return violations;
}
