// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/run-coordinator`
 * Purpose: Orchestrates one agent run per source key: recovery, feed, filters, decide, submit, attest, checkpoint.
 * Scope: Sequencing and durability only. Collaborators are injected ports; no I/O of its own.
 * Invariants:
 * - NO_DOUBLE_SUBMIT: an item is added to in-flight and persisted (point A) before the decision engine is called;
 *   the decision is persisted before submit; the submission reference is persisted before attesting.
 *   A recorded submission is never submitted again; recovery only retries the attestation.
 * - A transient submit failure is followed by a submission lookup before any further attempt.
 * - An unconfirmed ledger write is never re-sent in the same run; recovery confirms it first.
 * - Recovered items pass the origin allow/deny check again before a new decision.
 * - Completion is persisted only after the ledger acknowledges (point C) or the item reaches another terminal state (B).
 * - Recovery of in-flight items finishes before new feed items are considered.
 * - Item failures never throw; only checkpoint-store or proposal-feed unavailability aborts a run.
 * - One run per source key at a time; different keys may run concurrently.
 * - Once quiesced, no new item starts; the in-progress item finishes.
 * Side-effects: none directly (all effects go through injected ports)
 * Links: packages/run-core/src/checkpoint.ts, packages/run-core/src/ports.ts
 * @public
 */

import type { Clock, Decision } from "@attestor/attestation-core";
import {
  type LoggerLike,
  type Participant,
  STEP_OK,
  type StepResult,
  stepFailed,
} from "@attestor/lifecycle";

import {
  emptyCheckpoint,
  isUncleanShutdown,
  markCompleted,
  markInFlight,
  markRunFinished,
  markRunStarted,
  reconcile,
  recordAttestationFailure,
  recordAttestationSent,
  recordDecision,
  recordSubmission,
} from "./checkpoint";
import {
  CheckpointStoreUnavailableError,
  CoordinatorQuiescedError,
  ProposalFeedUnavailableError,
  RunAlreadyInProgressError,
} from "./errors";
import { RUN_EVENTS, type RunEventName } from "./events";
import {
  applyOriginFilters,
  type OriginFilterConfig,
  originRejection,
} from "./filters";
import type {
  ErrorDisposition,
  FilteredItem,
  ItemOutcomeRecord,
  ProposalItem,
  RunCheckpoint,
  RunError,
  RunItemOutcome,
  PendingEntry,
  RunPhase,
  RunSummary,
} from "./model";
import { describeError, type Outcome } from "./outcome";
import type {
  AttestationWriter,
  CheckpointStore,
  DecisionEngine,
  ExecutionSurface,
  ProposalSource,
} from "./ports";
import {
  backoffDelay,
  type RetryPolicy,
  realSleep,
  type Sleep,
  settle,
  withRetry,
} from "./retry";

export interface RunCoordinatorConfig extends OriginFilterConfig {
  /** Decisions below this confidence are skipped, not submitted */
  readonly confidenceThreshold: number;
  readonly dryRun: boolean;
  /** Failed ledger writes tolerated before an item is completed as failed */
  readonly maxAttestationAttempts: number;
  readonly retry: RetryPolicy;
}

export interface RunCoordinatorDeps {
  readonly proposals: ProposalSource;
  readonly decisions: DecisionEngine;
  readonly execution: ExecutionSurface;
  readonly attestations: AttestationWriter;
  readonly checkpoints: CheckpointStore;
  readonly clock: Clock;
  readonly logger: LoggerLike;
  readonly sleep?: Sleep;
}

type SubmitResult =
  | { readonly status: "submitted"; readonly submissionReference: string }
  | { readonly status: "failed"; readonly reason: string }
  /** Neither confirmed nor ruled out; recovery looks it up */
  | { readonly status: "unknown"; readonly reason: string };

/** Mutable per-run state; only the coordinator touches it. */
interface RunContext {
  readonly sourceKey: string;
  readonly startedAt: string;
  readonly log: LoggerLike;
  checkpoint: RunCheckpoint;
  feed: readonly ProposalItem[] | null;
  decided: number;
  submitted: number;
  skipped: number;
  simulated: number;
  failed: number;
  recovered: number;
  pendingRecovery: number;
  interrupted: boolean;
  readonly errors: RunError[];
  readonly outcomes: Record<string, RunItemOutcome>;
}

export class RunCoordinator implements Participant {
  readonly name = "run-coordinator";

  private readonly active = new Map<string, Promise<RunSummary>>();
  private stopping = false;
  private readonly sleep: Sleep;

  constructor(
    private readonly config: RunCoordinatorConfig,
    private readonly deps: RunCoordinatorDeps
  ) {
    this.sleep = deps.sleep ?? realSleep;
  }

  get activeSourceKeys(): string[] {
    return [...this.active.keys()];
  }

  async run(sourceKey: string): Promise<RunSummary> {
    if (this.stopping) {
      throw new CoordinatorQuiescedError();
    }
    if (this.active.has(sourceKey)) {
      throw new RunAlreadyInProgressError(sourceKey);
    }
    const running = this.execute(sourceKey);
    this.active.set(sourceKey, running);
    try {
      return await running;
    } finally {
      this.active.delete(sourceKey);
    }
  }

  // ---------------------------------------------------------------------------
  // Participant
  // ---------------------------------------------------------------------------

  async quiesce(): Promise<StepResult> {
    this.stopping = true;
    await Promise.allSettled([...this.active.values()]);
    return STEP_OK;
  }

  async persist(): Promise<StepResult> {
    // Every transition is saved as it happens; only buffered stores need a flush
    try {
      await this.deps.checkpoints.flush?.();
      return STEP_OK;
    } catch (error) {
      return stepFailed(error);
    }
  }

  async release(): Promise<StepResult> {
    this.active.clear();
    return STEP_OK;
  }

  // ---------------------------------------------------------------------------
  // Run
  // ---------------------------------------------------------------------------

  private async execute(sourceKey: string): Promise<RunSummary> {
    const { logger, clock } = this.deps;
    const log = logger.child?.({ sourceKey }) ?? logger;
    const startedAt = clock.now();

    const loaded = await this.load(sourceKey);
    const { checkpoint, repaired } = reconcile(loaded);
    if (repaired.length > 0) {
      log.warn(
        { event: RUN_EVENTS.RUN_CHECKPOINT_REPAIRED, sourceKey, repaired },
        RUN_EVENTS.RUN_CHECKPOINT_REPAIRED
      );
    }
    if (isUncleanShutdown(loaded)) {
      log.warn(
        {
          event: RUN_EVENTS.RUN_UNCLEAN_SHUTDOWN_DETECTED,
          sourceKey,
          lastRunStartedAt: loaded.lastRunStartedAt,
          lastRunFinishedAt: loaded.lastRunFinishedAt,
          inFlight: checkpoint.inFlightItemIds.length,
        },
        RUN_EVENTS.RUN_UNCLEAN_SHUTDOWN_DETECTED
      );
    }

    const ctx: RunContext = {
      sourceKey,
      startedAt,
      log,
      checkpoint: markRunStarted(checkpoint, startedAt),
      feed: null,
      decided: 0,
      submitted: 0,
      skipped: 0,
      simulated: 0,
      failed: 0,
      recovered: 0,
      pendingRecovery: 0,
      interrupted: false,
      errors: [],
      outcomes: {},
    };
    await this.save(ctx);

    log.info(
      {
        event: RUN_EVENTS.RUN_STARTED,
        sourceKey,
        dryRun: this.config.dryRun,
        inFlight: ctx.checkpoint.inFlightItemIds.length,
        completed: ctx.checkpoint.completedItemIds.length,
      },
      RUN_EVENTS.RUN_STARTED
    );

    // 1. Recovery before anything new
    const recovering = [...ctx.checkpoint.inFlightItemIds];
    if (recovering.length > 0) {
      log.info(
        { event: RUN_EVENTS.RECOVERY_STARTED, sourceKey, items: recovering },
        RUN_EVENTS.RECOVERY_STARTED
      );
    }
    for (const itemId of recovering) {
      if (this.stopping) {
        ctx.interrupted = true;
        break;
      }
      await this.recoverItem(ctx, itemId);
    }

    // 2-4. New items in feed order
    let filteredItems: readonly FilteredItem[] = [];
    if (!ctx.interrupted) {
      const feed = await this.fetchFeed(ctx);
      const completed = new Set(ctx.checkpoint.completedItemIds);
      const inFlight = new Set(ctx.checkpoint.inFlightItemIds);
      const candidates = feed.filter(
        (item) => !completed.has(item.itemId) && !inFlight.has(item.itemId)
      );
      const { selected, filtered } = applyOriginFilters(
        candidates,
        this.config
      );
      filteredItems = filtered;

      for (const item of selected) {
        if (this.stopping) {
          ctx.interrupted = true;
          break;
        }
        ctx.checkpoint = markInFlight(ctx.checkpoint, item.itemId);
        await this.save(ctx); // A
        await this.decideAndExecute(ctx, item);
      }
    }

    if (ctx.interrupted) {
      log.warn(
        { event: RUN_EVENTS.RUN_INTERRUPTED, sourceKey },
        RUN_EVENTS.RUN_INTERRUPTED
      );
    }

    const finishedAt = clock.now();
    ctx.checkpoint = markRunFinished(ctx.checkpoint, finishedAt);
    await this.save(ctx);

    const summary: RunSummary = {
      sourceKey,
      dryRun: this.config.dryRun,
      startedAt,
      finishedAt,
      decided: ctx.decided,
      submitted: ctx.submitted,
      skipped: ctx.skipped,
      simulated: ctx.simulated,
      failed: ctx.failed,
      filtered: filteredItems.length,
      recovered: ctx.recovered,
      pendingRecovery: ctx.pendingRecovery,
      interrupted: ctx.interrupted,
      errors: ctx.errors,
      outcomes: ctx.outcomes,
      filteredItems,
    };

    log.info(
      {
        event: RUN_EVENTS.RUN_FINISHED,
        sourceKey,
        decided: summary.decided,
        submitted: summary.submitted,
        skipped: summary.skipped,
        simulated: summary.simulated,
        failed: summary.failed,
        filtered: summary.filtered,
        recovered: summary.recovered,
        pendingRecovery: summary.pendingRecovery,
        errorCount: summary.errors.length,
      },
      RUN_EVENTS.RUN_FINISHED
    );
    return summary;
  }

  /**
   * Steps 4-6 for one item already persisted as in-flight.
   */
  private async decideAndExecute(
    ctx: RunContext,
    item: ProposalItem
  ): Promise<void> {
    const { itemId } = item;
    const decided = await this.retrying(ctx, itemId, () =>
      this.deps.decisions.decide(item)
    );
    if (!decided.ok) {
      await this.fail(ctx, itemId, "decision", describeError(decided.error));
      return;
    }
    const decision = decided.value;
    ctx.decided += 1;

    const threshold = this.config.confidenceThreshold;
    if (decision.verdict === "no_action" || decision.confidence < threshold) {
      await this.complete(ctx, itemId, {
        status: "completed_skipped",
        verdict: decision.verdict,
        confidence: decision.confidence,
        reason:
          decision.verdict === "no_action"
            ? "no_action verdict"
            : `confidence ${decision.confidence} below threshold ${threshold}`,
        completedAt: this.deps.clock.now(),
      });
      return;
    }

    if (this.config.dryRun) {
      await this.complete(ctx, itemId, {
        status: "completed_simulated",
        verdict: decision.verdict,
        confidence: decision.confidence,
        completedAt: this.deps.clock.now(),
      });
      return;
    }

    ctx.checkpoint = recordDecision(ctx.checkpoint, itemId, decision);
    await this.save(ctx);

    const submitted = await this.submit(ctx, item, decision);
    if (submitted.status === "unknown") {
      this.holdForRecovery(ctx, itemId, "submission", submitted.reason);
      return;
    }
    if (submitted.status === "failed") {
      await this.fail(ctx, itemId, "submission", submitted.reason, decision);
      return;
    }
    const { submissionReference } = submitted;
    ctx.checkpoint = recordSubmission(
      ctx.checkpoint,
      itemId,
      submissionReference
    );
    await this.save(ctx);
    ctx.submitted += 1;

    await this.attest(
      ctx,
      itemId,
      decision,
      submissionReference,
      "attestation"
    );
  }

  /**
   * Submits with backoff. A transient failure may hide a submission that
   * landed, so the surface is asked before the next attempt.
   */
  private async submit(
    ctx: RunContext,
    item: ProposalItem,
    decision: Decision
  ): Promise<SubmitResult> {
    const { execution } = this.deps;
    const { itemId } = item;
    const policy = this.config.retry;
    const attempts = Math.max(1, policy.attempts);
    let reason = "not attempted";

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        await this.sleep(backoffDelay(policy, attempt));
      }
      const outcome = await settle(() =>
        execution.submit(item, ctx.sourceKey, decision)
      );
      if (outcome.ok) {
        return {
          status: "submitted",
          submissionReference: outcome.value.submissionReference,
        };
      }
      reason = describeError(outcome.error);
      if (
        outcome.error.kind !== "transient" &&
        outcome.error.kind !== "unconfirmed"
      ) {
        return { status: "failed", reason };
      }

      const found = await this.retrying(ctx, itemId, () =>
        execution.findSubmission(itemId, ctx.sourceKey)
      );
      if (!found.ok) {
        return {
          status: "unknown",
          reason: `${reason}; lookup failed: ${describeError(found.error)}`,
        };
      }
      if (found.value) {
        ctx.log.info(
          {
            event: RUN_EVENTS.ITEM_SUBMISSION_FOUND,
            itemId,
            submissionReference: found.value.submissionReference,
            after: reason,
          },
          RUN_EVENTS.ITEM_SUBMISSION_FOUND
        );
        return {
          status: "submitted",
          submissionReference: found.value.submissionReference,
        };
      }
      if (attempt < attempts) {
        ctx.log.warn(
          { event: RUN_EVENTS.ITEM_RETRY, itemId, attempt, message: reason },
          RUN_EVENTS.ITEM_RETRY
        );
      }
    }
    return { status: "failed", reason };
  }

  /**
   * Signs and writes the attestation for a recorded submission. Success
   * completes the item (C); failure keeps it in flight until the attempt cap.
   * A write that was sent but not confirmed is held with its transaction.
   */
  private async attest(
    ctx: RunContext,
    itemId: string,
    decision: Decision,
    submissionReference: string,
    phase: RunPhase
  ): Promise<boolean> {
    const written = await this.retrying(ctx, itemId, () =>
      this.deps.attestations.write({
        decision,
        sourceKey: ctx.sourceKey,
        submissionReference,
      })
    );

    if (written.ok) {
      await this.completeSubmitted(
        ctx,
        itemId,
        decision,
        submissionReference,
        written.value.recordId
      );
      return true;
    }

    const reason = describeError(written.error);
    const sent = written.error.reference;
    if (written.error.kind === "unconfirmed" && sent !== undefined) {
      ctx.checkpoint = recordAttestationSent(ctx.checkpoint, itemId, sent);
      await this.save(ctx);
      this.holdForRecovery(
        ctx,
        itemId,
        phase,
        reason,
        RUN_EVENTS.ITEM_ATTESTATION_UNCONFIRMED,
        { transactionReference: sent }
      );
      return false;
    }

    const capped = await this.countAttestationFailure(
      ctx,
      itemId,
      decision,
      submissionReference,
      phase,
      reason
    );
    if (capped) return true;
    this.holdForRecovery(ctx, itemId, phase, reason, undefined, {
      attempts: ctx.checkpoint.pending[itemId]?.attestationAttempts ?? 0,
      maxAttempts: this.config.maxAttestationAttempts,
    });
    return false;
  }

  /**
   * Looks up a ledger write left unconfirmed. Only a write known not to have
   * landed is followed by a fresh one.
   */
  private async confirmSent(
    ctx: RunContext,
    itemId: string,
    decision: Decision,
    submissionReference: string,
    transactionReference: string
  ): Promise<boolean> {
    const confirmed = await this.retrying(ctx, itemId, () =>
      this.deps.attestations.confirm(transactionReference)
    );
    if (!confirmed.ok) {
      this.holdForRecovery(
        ctx,
        itemId,
        "recovery",
        describeError(confirmed.error),
        RUN_EVENTS.ITEM_ATTESTATION_UNCONFIRMED,
        { transactionReference }
      );
      return false;
    }
    if (confirmed.value) {
      await this.completeSubmitted(
        ctx,
        itemId,
        decision,
        submissionReference,
        confirmed.value.recordId
      );
      return true;
    }

    const capped = await this.countAttestationFailure(
      ctx,
      itemId,
      decision,
      submissionReference,
      "recovery",
      `transaction ${transactionReference} did not land`
    );
    if (capped) return true;
    return this.attest(ctx, itemId, decision, submissionReference, "recovery");
  }

  /**
   * Records one failed write. Returns true when the cap was reached and the
   * item is completed as failed; otherwise the item stays in flight.
   */
  private async countAttestationFailure(
    ctx: RunContext,
    itemId: string,
    decision: Decision,
    submissionReference: string,
    phase: RunPhase,
    reason: string
  ): Promise<boolean> {
    ctx.checkpoint = recordAttestationFailure(ctx.checkpoint, itemId);
    const attempts = ctx.checkpoint.pending[itemId]?.attestationAttempts ?? 0;

    if (attempts >= this.config.maxAttestationAttempts) {
      await this.fail(
        ctx,
        itemId,
        phase,
        `attestation failed after ${attempts} attempts: ${reason}`,
        decision,
        submissionReference
      );
      return true;
    }

    await this.save(ctx);
    return false;
  }

  /**
   * Resolves one in-flight item left by a previous run.
   */
  private async recoverItem(ctx: RunContext, itemId: string): Promise<void> {
    const entry = ctx.checkpoint.pending[itemId] ?? { attestationAttempts: 0 };
    let resolved: boolean;

    if (entry.submissionReference !== undefined) {
      resolved = await this.recoverSubmitted(
        ctx,
        itemId,
        entry,
        entry.submissionReference
      );
    } else {
      resolved = await this.recoverUnsubmitted(ctx, itemId, entry);
    }

    if (resolved && !ctx.checkpoint.inFlightItemIds.includes(itemId)) {
      ctx.recovered += 1;
      ctx.log.info(
        {
          event: RUN_EVENTS.RECOVERY_ITEM_RESOLVED,
          itemId,
          outcome: ctx.outcomes[itemId],
        },
        RUN_EVENTS.RECOVERY_ITEM_RESOLVED
      );
    }
  }

  private async recoverSubmitted(
    ctx: RunContext,
    itemId: string,
    entry: PendingEntry,
    submissionReference: string
  ): Promise<boolean> {
    if (!entry.decision) {
      await this.fail(
        ctx,
        itemId,
        "recovery",
        "submission recorded without its decision",
        undefined,
        submissionReference
      );
      return true;
    }
    if (entry.attestationTransaction !== undefined) {
      return this.confirmSent(
        ctx,
        itemId,
        entry.decision,
        submissionReference,
        entry.attestationTransaction
      );
    }
    return this.attest(
      ctx,
      itemId,
      entry.decision,
      submissionReference,
      "recovery"
    );
  }

  private async recoverUnsubmitted(
    ctx: RunContext,
    itemId: string,
    entry: PendingEntry
  ): Promise<boolean> {
    const found = await this.retrying(ctx, itemId, () =>
      this.deps.execution.findSubmission(itemId, ctx.sourceKey)
    );
    if (!found.ok) {
      // Unknown outcome stays unknown; re-deciding could submit twice
      this.holdForRecovery(ctx, itemId, "recovery", describeError(found.error));
      return false;
    }

    if (found.value) {
      const existing = found.value;
      const decision: Decision = entry.decision ?? {
        itemId,
        verdict: existing.verdict,
        confidence: 0,
        rationale: "Reconstructed from an existing submission during recovery",
        strategyApplied: "recovered",
      };
      ctx.checkpoint = recordSubmission(
        recordDecision(ctx.checkpoint, itemId, decision),
        itemId,
        existing.submissionReference
      );
      await this.save(ctx);
      return this.attest(
        ctx,
        itemId,
        decision,
        existing.submissionReference,
        "recovery"
      );
    }

    const feed = await this.fetchFeed(ctx);
    const item = feed.find((candidate) => candidate.itemId === itemId);
    if (!item) {
      await this.fail(
        ctx,
        itemId,
        "recovery",
        "item is no longer pending in the feed"
      );
      return true;
    }
    const rejection = originRejection(item.origin, this.config);
    if (rejection) {
      await this.fail(ctx, itemId, "recovery", `origin filtered: ${rejection}`);
      return true;
    }
    await this.decideAndExecute(ctx, item);
    return !ctx.checkpoint.inFlightItemIds.includes(itemId);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async complete(
    ctx: RunContext,
    itemId: string,
    record: ItemOutcomeRecord
  ): Promise<void> {
    ctx.checkpoint = markCompleted(ctx.checkpoint, itemId, record);
    await this.save(ctx); // B / C
    ctx.outcomes[itemId] = record.status;

    switch (record.status) {
      case "completed_skipped":
        ctx.skipped += 1;
        break;
      case "completed_simulated":
        ctx.simulated += 1;
        break;
      case "completed_failed":
        ctx.failed += 1;
        break;
      case "completed_submitted":
        break;
    }

    ctx.log.info(
      {
        event: RUN_EVENTS.ITEM_COMPLETED,
        itemId,
        status: record.status,
        verdict: record.verdict,
        confidence: record.confidence,
        recordId: record.recordId,
      },
      RUN_EVENTS.ITEM_COMPLETED
    );
  }

  private async fail(
    ctx: RunContext,
    itemId: string,
    phase: RunPhase,
    reason: string,
    decision?: Decision,
    submissionReference?: string
  ): Promise<void> {
    this.recordError(ctx, itemId, phase, reason, "failed");
    ctx.log.error(
      { event: RUN_EVENTS.ITEM_FAILED, itemId, phase, reason },
      RUN_EVENTS.ITEM_FAILED
    );
    await this.complete(ctx, itemId, {
      status: "completed_failed",
      verdict: decision?.verdict,
      confidence: decision?.confidence,
      submissionReference,
      reason: `${phase}: ${reason}`,
      completedAt: this.deps.clock.now(),
    });
  }

  private async completeSubmitted(
    ctx: RunContext,
    itemId: string,
    decision: Decision,
    submissionReference: string,
    recordId: string
  ): Promise<void> {
    await this.complete(ctx, itemId, {
      status: "completed_submitted",
      verdict: decision.verdict,
      confidence: decision.confidence,
      submissionReference,
      recordId,
      completedAt: this.deps.clock.now(),
    });
  }

  /** Leaves the item in flight for the next run's recovery. */
  private holdForRecovery(
    ctx: RunContext,
    itemId: string,
    phase: RunPhase,
    reason: string,
    event: RunEventName = RUN_EVENTS.ITEM_PENDING_RECOVERY,
    fields: Readonly<Record<string, unknown>> = {}
  ): void {
    ctx.pendingRecovery += 1;
    ctx.outcomes[itemId] = "pending_recovery";
    this.recordError(ctx, itemId, phase, reason, "pending_recovery");
    ctx.log.warn({ event, itemId, phase, reason, ...fields }, event);
  }

  private recordError(
    ctx: RunContext,
    itemId: string,
    phase: RunPhase,
    reason: string,
    disposition: ErrorDisposition
  ): void {
    ctx.errors.push({ itemId, phase, reason, disposition });
  }

  private retrying<T>(
    ctx: RunContext,
    itemId: string,
    call: () => Promise<Outcome<T>>
  ): Promise<Outcome<T>> {
    const onRetry = (attempt: number, message: string): void => {
      ctx.log.warn(
        { event: RUN_EVENTS.ITEM_RETRY, itemId, attempt, message },
        RUN_EVENTS.ITEM_RETRY
      );
    };
    return withRetry(call, this.config.retry, this.sleep, onRetry);
  }

  private async fetchFeed(ctx: RunContext): Promise<readonly ProposalItem[]> {
    if (ctx.feed) return ctx.feed;
    const listed = await withRetry(
      () => this.deps.proposals.listPending(ctx.sourceKey),
      this.config.retry,
      this.sleep
    );
    if (!listed.ok) {
      throw new ProposalFeedUnavailableError(
        ctx.sourceKey,
        describeError(listed.error)
      );
    }
    ctx.feed = listed.value;
    return listed.value;
  }

  private async load(sourceKey: string): Promise<RunCheckpoint> {
    try {
      return (
        (await this.deps.checkpoints.load(sourceKey)) ??
        emptyCheckpoint(sourceKey)
      );
    } catch (error) {
      throw new CheckpointStoreUnavailableError(sourceKey, "load", {
        cause: error,
      });
    }
  }

  private async save(ctx: RunContext): Promise<void> {
    try {
      await this.deps.checkpoints.save(ctx.sourceKey, ctx.checkpoint);
    } catch (error) {
      throw new CheckpointStoreUnavailableError(ctx.sourceKey, "save", {
        cause: error,
      });
    }
  }
}
