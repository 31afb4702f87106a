// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/events`
 * Purpose: Event names emitted by the run coordinator's structured logs.
 * Scope: Const registry only. The worker service merges these into its own EVENT_NAMES.
 * Side-effects: none
 * @public
 */

export const RUN_EVENTS = {
  RUN_STARTED: "agent.run.started",
  RUN_FINISHED: "agent.run.finished",
  RUN_UNCLEAN_SHUTDOWN_DETECTED: "agent.run.unclean_shutdown_detected",
  RUN_CHECKPOINT_REPAIRED: "agent.run.checkpoint_repaired",
  RUN_INTERRUPTED: "agent.run.interrupted",
  ITEM_COMPLETED: "agent.item.completed",
  ITEM_FAILED: "agent.item.failed",
  ITEM_RETRY: "agent.item.retry",
  ITEM_PENDING_RECOVERY: "agent.item.pending_recovery",
  ITEM_SUBMISSION_FOUND: "agent.item.submission_found",
  ITEM_ATTESTATION_UNCONFIRMED: "agent.item.attestation_unconfirmed",
  RECOVERY_STARTED: "agent.recovery.started",
  RECOVERY_ITEM_RESOLVED: "agent.recovery.item_resolved",
} as const;

export type RunEventName = (typeof RUN_EVENTS)[keyof typeof RUN_EVENTS];
