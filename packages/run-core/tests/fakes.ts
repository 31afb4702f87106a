// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/tests/fakes`
 * Purpose: In-process collaborators with failure and crash injection for coordinator tests.
 * Scope: Test doubles only. State survives a simulated restart by reusing the same instances.
 * Invariants: Checkpoints are stored as structured clones, so callers never share references with the store.
 * Side-effects: none
 * @internal
 */

import type { Decision } from "@attestor/attestation-core";
import {
  type AttestationInput,
  type AttestationReceipt,
  type AttestationWriter,
  type CheckpointStore,
  type CollaboratorError,
  type DecisionEngine,
  type ExecutionSurface,
  type ExistingSubmission,
  fail,
  ok,
  type Outcome,
  type ProposalItem,
  type ProposalSource,
  type RunCheckpoint,
  type SubmissionReceipt,
  unconfirmed,
} from "@attestor/run-core";

export class SimulatedCrash extends Error {
  constructor(at: string) {
    super(`simulated crash ${at}`);
    this.name = "SimulatedCrash";
  }
}

/** Checkpoint store that can crash right before or after a chosen save. */
export class CrashingCheckpointStore implements CheckpointStore {
  private readonly data = new Map<string, RunCheckpoint>();
  saves = 0;
  crash: { atSave: number; mode: "before" | "after" } | null = null;
  unavailable = false;

  async load(sourceKey: string): Promise<RunCheckpoint | null> {
    if (this.unavailable) throw new Error("storage offline");
    const stored = this.data.get(sourceKey);
    return stored ? structuredClone(stored) : null;
  }

  async save(sourceKey: string, checkpoint: RunCheckpoint): Promise<void> {
    if (this.unavailable) throw new Error("storage offline");
    this.saves += 1;
    const crash = this.crash;
    if (crash && crash.atSave === this.saves && crash.mode === "before") {
      throw new SimulatedCrash(`before save ${this.saves}`);
    }
    this.data.set(sourceKey, structuredClone(checkpoint));
    if (crash && crash.atSave === this.saves && crash.mode === "after") {
      throw new SimulatedCrash(`after save ${this.saves}`);
    }
  }

  async list(): Promise<string[]> {
    return [...this.data.keys()];
  }

  peek(sourceKey: string): RunCheckpoint | undefined {
    return this.data.get(sourceKey);
  }

  seed(checkpoint: RunCheckpoint): void {
    this.data.set(checkpoint.sourceKey, structuredClone(checkpoint));
  }
}

export class FakeProposalSource implements ProposalSource {
  calls = 0;
  failures: CollaboratorError[] = [];

  constructor(public items: ProposalItem[]) {}

  async listPending(): Promise<Outcome<ProposalItem[]>> {
    this.calls += 1;
    const failure = this.failures.shift();
    if (failure) return { ok: false, error: failure };
    return ok([...this.items]);
  }
}

export type ScriptedDecision = Decision | CollaboratorError;

function isCollaboratorError(
  value: ScriptedDecision
): value is CollaboratorError {
  return "kind" in value;
}

/** Returns scripted results per item; a list is consumed one entry per call. */
export class FakeDecisionEngine implements DecisionEngine {
  readonly calls: string[] = [];
  /** When set, every decision waits for it to settle */
  gate: Promise<void> | null = null;

  constructor(
    private readonly script: Record<string, ScriptedDecision | ScriptedDecision[]>
  ) {}

  async decide(item: ProposalItem): Promise<Outcome<Decision>> {
    this.calls.push(item.itemId);
    if (this.gate) await this.gate;
    const entry = this.script[item.itemId];
    const next = Array.isArray(entry)
      ? entry.length > 1
        ? entry.shift()
        : entry[0]
      : entry;
    if (!next) return fail("permanent", `no scripted decision for ${item.itemId}`);
    if (isCollaboratorError(next)) return { ok: false, error: next };
    return ok(next);
  }
}

export class FakeExecutionSurface implements ExecutionSurface {
  readonly submitCalls: string[] = [];
  readonly findCalls: string[] = [];
  private readonly submissions = new Map<string, ExistingSubmission>();
  submitFailures = new Map<string, CollaboratorError>();
  /** Lands the submission, then reports this error; consumed once */
  landThenFail = new Map<string, CollaboratorError>();
  findFailure: CollaboratorError | null = null;

  async submit(
    item: ProposalItem,
    sourceKey: string,
    decision: Decision
  ): Promise<Outcome<SubmissionReceipt>> {
    this.submitCalls.push(item.itemId);
    const failure = this.submitFailures.get(item.itemId);
    if (failure) return { ok: false, error: failure };
    const submissionReference = `sub-${item.itemId}`;
    this.submissions.set(`${sourceKey}/${item.itemId}`, {
      submissionReference,
      verdict: decision.verdict,
    });
    const lost = this.landThenFail.get(item.itemId);
    if (lost) {
      this.landThenFail.delete(item.itemId);
      return { ok: false, error: lost };
    }
    return ok({ submissionReference });
  }

  async findSubmission(
    itemId: string,
    sourceKey: string
  ): Promise<Outcome<ExistingSubmission | null>> {
    this.findCalls.push(itemId);
    if (this.findFailure) return { ok: false, error: this.findFailure };
    return ok(this.submissions.get(`${sourceKey}/${itemId}`) ?? null);
  }

  /** Simulates a submission that landed remotely before a crash. */
  preload(sourceKey: string, itemId: string, found: ExistingSubmission): void {
    this.submissions.set(`${sourceKey}/${itemId}`, found);
  }

  submitCount(itemId: string): number {
    return this.submitCalls.filter((id) => id === itemId).length;
  }
}

export class FakeAttestationWriter implements AttestationWriter {
  readonly writes: AttestationInput[] = [];
  readonly successes: AttestationInput[] = [];
  readonly confirmCalls: string[] = [];
  /** Failures consumed in order, per item */
  failures = new Map<string, CollaboratorError[]>();
  /** Next write for the item is sent but reported unconfirmed; consumed once */
  unconfirmedWrites = new Map<string, "landed" | "dropped">();
  confirmFailure: CollaboratorError | null = null;
  private readonly sent = new Map<string, AttestationReceipt | null>();

  async write(input: AttestationInput): Promise<Outcome<AttestationReceipt>> {
    this.writes.push(input);
    const { itemId } = input.decision;
    const queued = this.failures.get(itemId);
    const failure = queued?.shift();
    if (failure) return { ok: false, error: failure };

    const fate = this.unconfirmedWrites.get(itemId);
    if (fate) {
      this.unconfirmedWrites.delete(itemId);
      const transactionReference = `tx-sent-${this.writes.length}`;
      this.sent.set(
        transactionReference,
        fate === "landed" ? this.land(input) : null
      );
      return unconfirmed("receipt timed out", transactionReference);
    }
    return ok(this.land(input));
  }

  async confirm(
    transactionReference: string
  ): Promise<Outcome<AttestationReceipt | null>> {
    this.confirmCalls.push(transactionReference);
    if (this.confirmFailure) return { ok: false, error: this.confirmFailure };
    return ok(this.sent.get(transactionReference) ?? null);
  }

  private land(input: AttestationInput): AttestationReceipt {
    this.successes.push(input);
    return {
      recordId: `rec-${this.successes.length}`,
      transactionReference: `tx-${this.successes.length}`,
    };
  }

  successCount(itemId: string): number {
    return this.successes.filter((w) => w.decision.itemId === itemId).length;
  }
}

/** Clock that advances one second per reading. */
export function steppingClock(start = "2025-03-01T00:00:00.000Z") {
  let ms = Date.parse(start);
  return {
    now: () => {
      const value = new Date(ms).toISOString();
      ms += 1_000;
      return value;
    },
  };
}

export const noSleep = async (): Promise<void> => undefined;
