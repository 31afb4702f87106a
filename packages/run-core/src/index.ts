// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core`
 * Purpose: Checkpointed run coordination shared by the worker service and its tests.
 * Scope: Re-exports model, transitions, ports, retry, filters, coordinator and statistics. Does not contain adapters.
 * Invariants: No imports from services/.
 * Side-effects: none
 * @public
 */

// Checkpoint transitions
export {
  checkInvariants,
  emptyCheckpoint,
  isUncleanShutdown,
  markCompleted,
  markInFlight,
  markRunFinished,
  markRunStarted,
  type ReconcileResult,
  reconcile,
  recordAttestationFailure,
  recordAttestationSent,
  recordDecision,
  recordSubmission,
} from "./checkpoint";
// Errors
export {
  CheckpointStoreUnavailableError,
  CoordinatorQuiescedError,
  isCheckpointStoreUnavailableError,
  isCoordinatorQuiescedError,
  isProposalFeedUnavailableError,
  isRunAlreadyInProgressError,
  ProposalFeedUnavailableError,
  RunAlreadyInProgressError,
} from "./errors";
export { RUN_EVENTS, type RunEventName } from "./events";
// Filters
export {
  applyOriginFilters,
  type FilterResult,
  type OriginFilterConfig,
  type OriginRejection,
  originRejection,
} from "./filters";
// Model
export type {
  CompletedStatus,
  ErrorDisposition,
  FilteredItem,
  ItemOutcomeRecord,
  PendingEntry,
  ProposalItem,
  RunCheckpoint,
  RunError,
  RunItemOutcome,
  RunPhase,
  RunSummary,
} from "./model";
export { CHECKPOINT_SCHEMA_VERSION, COMPLETED_STATUSES } from "./model";
// Outcome
export {
  type CollaboratorError,
  type CollaboratorErrorKind,
  describeError,
  fail,
  type Outcome,
  ok,
  unconfirmed,
} from "./outcome";
// Ports
export type {
  AttestationInput,
  AttestationReceipt,
  AttestationWriter,
  CheckpointStore,
  DecisionEngine,
  ExecutionSurface,
  ExistingSubmission,
  ProposalSource,
  SubmissionReceipt,
} from "./ports";
// Retry
export {
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  realSleep,
  type Sleep,
  settle,
  withRetry,
} from "./retry";
// Coordinator
export {
  RunCoordinator,
  type RunCoordinatorConfig,
  type RunCoordinatorDeps,
} from "./run-coordinator";
// Statistics
export { computeRunStatistics, type RunStatistics } from "./statistics";
