// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/ports`
 * Purpose: Narrow contracts the run coordinator requires from its collaborators.
 * Scope: Interfaces only. Adapters live in the worker service.
 * Invariants:
 * - Collaborators return Outcome values; the coordinator never relies on their exceptions.
 * - DecisionEngine has no external side effects.
 * - CheckpointStore.save is atomic and durable once it resolves; load of an unknown key returns null.
 * Side-effects: none (interface definitions only)
 * Links: services/agent-worker/src/adapters
 * @public
 */

import type { Decision, Verdict } from "@attestor/attestation-core";

import type { ProposalItem, RunCheckpoint } from "./model";
import type { Outcome } from "./outcome";

export interface ProposalSource {
  listPending(sourceKey: string): Promise<Outcome<ProposalItem[]>>;
}

export interface DecisionEngine {
  decide(item: ProposalItem): Promise<Outcome<Decision>>;
}

export interface SubmissionReceipt {
  readonly submissionReference: string;
}

export interface ExistingSubmission {
  readonly submissionReference: string;
  readonly verdict: Verdict;
}

export interface ExecutionSurface {
  submit(
    item: ProposalItem,
    sourceKey: string,
    decision: Decision
  ): Promise<Outcome<SubmissionReceipt>>;
  /** Looks up a prior submission for (itemId, sourceKey) by this agent. */
  findSubmission(
    itemId: string,
    sourceKey: string
  ): Promise<Outcome<ExistingSubmission | null>>;
}

export interface AttestationInput {
  readonly decision: Decision;
  readonly sourceKey: string;
  readonly submissionReference: string;
}

export interface AttestationReceipt {
  readonly recordId: string;
  readonly transactionReference: string;
}

/** Signs and writes one attestation through the ledger counter. */
export interface AttestationWriter {
  /** `unconfirmed` when the write was sent but its result is unknown */
  write(input: AttestationInput): Promise<Outcome<AttestationReceipt>>;
  /**
   * Resolves an earlier unconfirmed write: the receipt when it landed, null
   * when it is known not to have, transient while it is still pending.
   */
  confirm(
    transactionReference: string
  ): Promise<Outcome<AttestationReceipt | null>>;
}

export interface CheckpointStore {
  /** null when no checkpoint exists for the key; throws when storage is unreachable */
  load(sourceKey: string): Promise<RunCheckpoint | null>;
  save(sourceKey: string, checkpoint: RunCheckpoint): Promise<void>;
  list(): Promise<string[]>;
  flush?(): Promise<void>;
}
