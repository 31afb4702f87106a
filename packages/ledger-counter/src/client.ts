// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/ledger-counter/client`
 * Purpose: Port for talking to a LedgerCounter, plus the in-process implementation backed by the contract model.
 * Scope: Interface and model-backed adapter. The viem-backed adapter lives in the worker service.
 * Invariants:
 * - Rejections surface as ContractRevertError with the revert name preserved.
 * - A forward that was sent but not confirmed surfaces as ForwardUnconfirmedError; getForwardStatus resolves it later.
 * Side-effects: none
 * Links: packages/ledger-counter/src/contract.ts, services/agent-worker/src/adapters/ledger
 * @public
 */

import type { DelegatedAttestationRequest } from "@attestor/attestation-core";
import type { Address, Hex } from "viem";

import type { LedgerCounterContract } from "./contract";
import type { CounterInfo } from "./packing";

export interface ForwardReceipt {
  readonly recordId: Hex;
  /** Transaction hash on-chain; synthetic id in-process */
  readonly transactionReference: string;
}

/**
 * What the chain knows about a previously sent forward.
 * `unknown` means the node has neither a receipt nor the transaction.
 */
export type ForwardStatus =
  | { readonly state: "confirmed"; readonly receipt: ForwardReceipt }
  | { readonly state: "reverted"; readonly reason: string }
  | { readonly state: "pending" }
  | { readonly state: "unknown" };

export interface LedgerCounterClient {
  forwardAttestation(
    request: DelegatedAttestationRequest
  ): Promise<ForwardReceipt>;
  getForwardStatus(transactionReference: string): Promise<ForwardStatus>;
  getInfo(signer: Address): Promise<CounterInfo>;
}

/**
 * Calls the contract model as a fixed sender.
 */
export class InProcessLedgerCounterClient implements LedgerCounterClient {
  private sequence = 0;
  private readonly receipts = new Map<string, ForwardReceipt>();

  constructor(
    private readonly contract: LedgerCounterContract,
    private readonly sender: Address
  ) {}

  async forwardAttestation(
    request: DelegatedAttestationRequest
  ): Promise<ForwardReceipt> {
    const recordId = await this.contract.forwardAttestation(
      this.sender,
      request
    );
    this.sequence += 1;
    const receipt = {
      recordId,
      transactionReference: `inproc-${this.sequence}`,
    };
    this.receipts.set(receipt.transactionReference, receipt);
    return receipt;
  }

  /** Reverted calls leave no trace in-process, so they read as unknown. */
  async getForwardStatus(transactionReference: string): Promise<ForwardStatus> {
    const receipt = this.receipts.get(transactionReference);
    return receipt ? { state: "confirmed", receipt } : { state: "unknown" };
  }

  async getInfo(signer: Address): Promise<CounterInfo> {
    return this.contract.getInfo(signer);
  }
}
