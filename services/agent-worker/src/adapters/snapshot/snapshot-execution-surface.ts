// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/snapshot/snapshot-execution-surface`
 * Purpose: ExecutionSurface that casts signed Snapshot votes and finds this agent's earlier votes.
 * Scope: Vote signing, sequencer submission and the voter lookup used by crash recovery.
 * Invariants:
 * - The submission reference is the sequencer's vote id
 * - findSubmission only reports votes cast by this agent's address
 * Side-effects: IO (HTTP to the sequencer and hub)
 * Links: adapters/snapshot/vote-typed-data.ts
 * @public
 */

import {
  type Clock,
  type Decision,
  toUnixSeconds,
} from "@attestor/attestation-core";
import {
  type ExecutionSurface,
  type ExistingSubmission,
  fail,
  ok,
  type Outcome,
  type ProposalItem,
  type SubmissionReceipt,
} from "@attestor/run-core";
import type { LocalAccount } from "viem";
import { z } from "zod";

import { EVENT_NAMES } from "../../observability/events.js";
import type { Logger } from "../../observability/logger.js";
import { postJson } from "../http.js";
import type { SnapshotGraphqlClient } from "./graphql.js";
import { VOTER_VOTES_QUERY } from "./queries.js";
import { isVotable, signVote, VOTE_CHOICES, verdictForChoice } from "./vote-typed-data.js";

const SequencerReceiptSchema = z.object({ id: z.string().min(1) });

const VotesSchema = z.object({
  votes: z.array(z.object({ id: z.string(), choice: z.unknown() })),
});

/** Snapshot caps vote reasons; longer rationales are cut. */
const MAX_REASON_LENGTH = 140;

export interface SnapshotExecutionSurfaceConfig {
  readonly account: LocalAccount;
  readonly sequencerUrl: string;
  readonly graphql: SnapshotGraphqlClient;
  readonly clock: Clock;
  readonly timeoutMs: number;
  readonly logger: Logger;
  readonly app?: string;
}

export class SnapshotExecutionSurface implements ExecutionSurface {
  constructor(private readonly config: SnapshotExecutionSurfaceConfig) {}

  async submit(
    item: ProposalItem,
    space: string,
    decision: Decision
  ): Promise<Outcome<SubmissionReceipt>> {
    const { verdict } = decision;
    if (!isVotable(verdict)) {
      return fail("permanent", `verdict ${verdict} cannot be cast as a vote`);
    }

    const vote = await signVote(this.config.account, {
      space,
      proposal: item.itemId,
      choice: VOTE_CHOICES[verdict],
      reason: decision.rationale.slice(0, MAX_REASON_LENGTH),
      app: this.config.app ?? "decision-attestor",
      timestamp: toUnixSeconds(this.config.clock.now()),
    });

    const receipt = await postJson(
      {
        url: this.config.sequencerUrl,
        body: vote,
        timeoutMs: this.config.timeoutMs,
      },
      SequencerReceiptSchema
    );
    if (!receipt.ok) {
      this.logFailure("submit", space, item.itemId, receipt.error.reason);
      return receipt;
    }

    this.config.logger.info(
      {
        event: EVENT_NAMES.SNAPSHOT_VOTE_SUBMITTED,
        space,
        itemId: item.itemId,
        choice: vote.data.message.choice,
        voteId: receipt.value.id,
      },
      EVENT_NAMES.SNAPSHOT_VOTE_SUBMITTED
    );
    return ok({ submissionReference: receipt.value.id });
  }

  async findSubmission(
    itemId: string,
    space: string
  ): Promise<Outcome<ExistingSubmission | null>> {
    const result = await this.config.graphql.query(
      VOTER_VOTES_QUERY,
      { space, proposal: itemId, voter: this.config.account.address },
      VotesSchema
    );
    if (!result.ok) {
      this.logFailure("findSubmission", space, itemId, result.error.reason);
      return result;
    }

    const [vote] = result.value.votes;
    if (!vote) return ok(null);

    const verdict =
      typeof vote.choice === "number" ? verdictForChoice(vote.choice) : null;
    if (!verdict) {
      return fail(
        "permanent",
        `vote ${vote.id} has a choice this agent never casts`,
        "UnrecognizedChoice"
      );
    }
    return ok({ submissionReference: vote.id, verdict });
  }

  private logFailure(
    operation: string,
    space: string,
    itemId: string,
    reason: string | undefined
  ): void {
    this.config.logger.warn(
      {
        event: EVENT_NAMES.SNAPSHOT_REQUEST_FAILED,
        operation,
        space,
        itemId,
        reason,
      },
      EVENT_NAMES.SNAPSHOT_REQUEST_FAILED
    );
  }
}
