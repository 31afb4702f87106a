// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/errors`
 * Purpose: Run-fatal error classes.
 * Scope: Error definitions and type guards. Item-level failures are RunError entries, never exceptions.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

export class CheckpointStoreUnavailableError extends Error {
  public readonly code = "CHECKPOINT_STORE_UNAVAILABLE" as const;
  constructor(
    public readonly sourceKey: string,
    public readonly operation: "load" | "save" | "list",
    options?: { cause?: unknown }
  ) {
    super(
      `Checkpoint store unavailable during ${operation} for ${sourceKey}`,
      options
    );
    this.name = "CheckpointStoreUnavailableError";
  }
}

export class ProposalFeedUnavailableError extends Error {
  public readonly code = "PROPOSAL_FEED_UNAVAILABLE" as const;
  constructor(
    public readonly sourceKey: string,
    public readonly detail: string
  ) {
    super(`Proposal feed unavailable for ${sourceKey}: ${detail}`);
    this.name = "ProposalFeedUnavailableError";
  }
}

export class RunAlreadyInProgressError extends Error {
  public readonly code = "RUN_ALREADY_IN_PROGRESS" as const;
  constructor(public readonly sourceKey: string) {
    super(`A run for ${sourceKey} is already in progress`);
    this.name = "RunAlreadyInProgressError";
  }
}

export class CoordinatorQuiescedError extends Error {
  public readonly code = "COORDINATOR_QUIESCED" as const;
  constructor() {
    super("Run coordinator is shutting down and accepts no new runs");
    this.name = "CoordinatorQuiescedError";
  }
}

// Type guards

export function isCheckpointStoreUnavailableError(
  error: unknown
): error is CheckpointStoreUnavailableError {
  return (
    error instanceof Error && error.name === "CheckpointStoreUnavailableError"
  );
}

export function isProposalFeedUnavailableError(
  error: unknown
): error is ProposalFeedUnavailableError {
  return error instanceof Error && error.name === "ProposalFeedUnavailableError";
}

export function isRunAlreadyInProgressError(
  error: unknown
): error is RunAlreadyInProgressError {
  return error instanceof Error && error.name === "RunAlreadyInProgressError";
}

export function isCoordinatorQuiescedError(
  error: unknown
): error is CoordinatorQuiescedError {
  return error instanceof Error && error.name === "CoordinatorQuiescedError";
}
