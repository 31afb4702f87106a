// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/model`
 * Purpose: Checkpoint, proposal item and run summary types.
 * Scope: Types and constants only. Transitions live in checkpoint.ts.
 * Invariants:
 * - inFlightItemIds ∩ completedItemIds = ∅ once reconcile() has run.
 * - Keys of `pending` are a subset of inFlightItemIds.
 * - Field evolution is additive; loaders default absent fields.
 * Side-effects: none
 * Links: packages/run-core/src/checkpoint.ts
 * @public
 */

import type { Decision, Verdict } from "@attestor/attestation-core";

export const CHECKPOINT_SCHEMA_VERSION = 1;

export const COMPLETED_STATUSES = [
  "completed_submitted",
  "completed_skipped",
  "completed_simulated",
  "completed_failed",
] as const;

export type CompletedStatus = (typeof COMPLETED_STATUSES)[number];

/** Progress of an in-flight item, persisted before each side effect. */
export interface PendingEntry {
  readonly decision?: Decision;
  readonly submissionReference?: string;
  /** Ledger write sent but not confirmed; looked up before writing again */
  readonly attestationTransaction?: string;
  readonly attestationAttempts: number;
}

export interface ItemOutcomeRecord {
  readonly status: CompletedStatus;
  readonly verdict?: Verdict;
  readonly confidence?: number;
  readonly submissionReference?: string;
  readonly recordId?: string;
  readonly reason?: string;
  readonly completedAt: string;
}

export interface RunCheckpoint {
  readonly schemaVersion: number;
  readonly sourceKey: string;
  readonly inFlightItemIds: readonly string[];
  readonly completedItemIds: readonly string[];
  readonly lastRunStartedAt: string | null;
  readonly lastRunFinishedAt: string | null;
  readonly runCount: number;
  readonly pending: Readonly<Record<string, PendingEntry>>;
  readonly outcomes: Readonly<Record<string, ItemOutcomeRecord>>;
}

export interface ProposalItem {
  readonly itemId: string;
  /** Author/proposer identity used by allow/deny filtering */
  readonly origin: string;
  readonly payload: Readonly<Record<string, unknown>>;
}

export type RunPhase = "decision" | "submission" | "attestation" | "recovery";

export type ErrorDisposition = "failed" | "pending_recovery";

export interface RunError {
  readonly itemId: string;
  readonly phase: RunPhase;
  readonly reason: string;
  readonly disposition: ErrorDisposition;
}

export type RunItemOutcome = CompletedStatus | "pending_recovery";

export interface FilteredItem {
  readonly itemId: string;
  readonly reason: "denied_origin" | "origin_not_allowed" | "over_run_cap";
}

export interface RunSummary {
  readonly sourceKey: string;
  readonly dryRun: boolean;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly decided: number;
  readonly submitted: number;
  readonly skipped: number;
  readonly simulated: number;
  readonly failed: number;
  readonly filtered: number;
  readonly recovered: number;
  readonly pendingRecovery: number;
  /** Stopped early because the coordinator was quiesced */
  readonly interrupted: boolean;
  readonly errors: readonly RunError[];
  readonly outcomes: Readonly<Record<string, RunItemOutcome>>;
  readonly filteredItems: readonly FilteredItem[];
}
