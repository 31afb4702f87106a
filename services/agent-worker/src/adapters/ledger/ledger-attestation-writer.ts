// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/ledger/ledger-attestation-writer`
 * Purpose: AttestationWriter that signs a decision attestation and forwards it through the ledger counter.
 * Scope: Builds the payload, signs, forwards, classifies the result and confirms earlier unconfirmed forwards. Retry and attempt caps belong to the coordinator.
 * Invariants:
 * - Every write signs afresh (new deadline), so a retried write never replays an old signature
 * - Contract reverts are "rejected" with the revert name as reason
 * - A forward sent but not confirmed is "unconfirmed" with its transaction as reference; only failures before sending are transient
 * Side-effects: IO (through the injected LedgerCounterClient)
 * @public
 */

import {
  type AttestationSigner,
  computeDecisionDigest,
} from "@attestor/attestation-core";
import {
  isContractRevertError,
  isForwardUnconfirmedError,
  type LedgerCounterClient,
} from "@attestor/ledger-counter";
import {
  type AttestationInput,
  type AttestationReceipt,
  type AttestationWriter,
  fail,
  ok,
  type Outcome,
  unconfirmed,
} from "@attestor/run-core";

import { EVENT_NAMES } from "../../observability/events.js";
import type { Logger } from "../../observability/logger.js";
import type { AgentMetrics } from "../../observability/metrics.js";

export interface LedgerAttestationWriterConfig {
  readonly signer: AttestationSigner;
  readonly client: LedgerCounterClient;
  readonly logger: Logger;
  readonly metrics?: AgentMetrics;
}

export class LedgerAttestationWriter implements AttestationWriter {
  constructor(private readonly config: LedgerAttestationWriterConfig) {}

  async write(input: AttestationInput): Promise<Outcome<AttestationReceipt>> {
    const { signer, client, logger, metrics } = this.config;
    const { decision, sourceKey, submissionReference } = input;

    const signed = await signer.sign({
      itemId: decision.itemId,
      sourceKey,
      verdict: decision.verdict,
      decisionDigest: computeDecisionDigest(decision),
      submissionReference,
    });

    try {
      const receipt = await client.forwardAttestation(signed.request);
      metrics?.ledgerForwardsTotal.inc({ result: "success" });
      logger.info(
        {
          event: EVENT_NAMES.LEDGER_FORWARDED,
          itemId: decision.itemId,
          sourceKey,
          recordId: receipt.recordId,
          transactionReference: receipt.transactionReference,
        },
        EVENT_NAMES.LEDGER_FORWARDED
      );
      return ok({
        recordId: receipt.recordId,
        transactionReference: receipt.transactionReference,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const reverted = isContractRevertError(error);
      const sent = isForwardUnconfirmedError(error);
      metrics?.ledgerForwardsTotal.inc({
        result: reverted ? "reverted" : sent ? "unconfirmed" : "error",
      });
      logger.warn(
        {
          event: EVENT_NAMES.LEDGER_FORWARD_FAILED,
          itemId: decision.itemId,
          sourceKey,
          reverted,
          unconfirmed: sent,
          err: error,
        },
        EVENT_NAMES.LEDGER_FORWARD_FAILED
      );
      if (isContractRevertError(error)) {
        return fail("rejected", message, error.reason);
      }
      if (isForwardUnconfirmedError(error)) {
        return unconfirmed(message, error.transactionReference);
      }
      return fail("transient", message, "LedgerUnavailable");
    }
  }

  async confirm(
    transactionReference: string
  ): Promise<Outcome<AttestationReceipt | null>> {
    const { client, logger } = this.config;
    try {
      const status = await client.getForwardStatus(transactionReference);
      logger.info(
        {
          event: EVENT_NAMES.LEDGER_FORWARD_CONFIRMED,
          transactionReference,
          state: status.state,
        },
        EVENT_NAMES.LEDGER_FORWARD_CONFIRMED
      );
      switch (status.state) {
        case "confirmed":
          return ok({
            recordId: status.receipt.recordId,
            transactionReference: status.receipt.transactionReference,
          });
        case "reverted":
        case "unknown":
          return ok(null);
        case "pending":
          return fail(
            "transient",
            `transaction ${transactionReference} is still pending`
          );
      }
    } catch (error) {
      return fail(
        "transient",
        error instanceof Error ? error.message : String(error),
        "LedgerUnavailable"
      );
    }
  }
}
