// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/ledger-counter/contract`
 * Purpose: In-process model of the LedgerCounter contract with the deployed contract's revert semantics.
 * Scope: Per-signer packed words, controller-gated active flag, atomic counted forwarding. Does not talk to a chain.
 * Invariants:
 * - One 256-bit word per signer, zero on first reference.
 * - ATOMIC_FORWARD: a ledger rejection restores the caller's word and rethrows the ledger's error unchanged.
 * - Mutations are serialized like transactions in a block.
 * Side-effects: none (in-memory state only)
 * Links: packages/ledger-counter/src/packing.ts, packages/ledger-counter/src/abi.ts
 * @public
 */

import type { DelegatedAttestationRequest } from "@attestor/attestation-core";
import { type Address, getAddress, type Hex, zeroAddress } from "viem";

import { COUNTER_REVERTS, ContractRevertError } from "./errors";
import type { AttestationLedger } from "./ledger";
import {
  type CounterInfo,
  CounterOverflowError,
  incrementCount,
  unpack,
  withActive,
} from "./packing";

export interface LedgerCounterContractConfig {
  readonly controller: Address;
  readonly ledger: AttestationLedger;
  readonly ledgerAddress: Address;
}

export class LedgerCounterContract {
  private readonly words = new Map<Address, bigint>();
  private tail: Promise<unknown> = Promise.resolve();

  readonly controller: Address;
  readonly ledgerAddress: Address;
  private readonly ledger: AttestationLedger;

  constructor(config: LedgerCounterContractConfig) {
    if (config.ledgerAddress === zeroAddress) {
      throw new ContractRevertError(COUNTER_REVERTS.ZERO_ADDRESS);
    }
    this.controller = getAddress(config.controller);
    this.ledgerAddress = getAddress(config.ledgerAddress);
    this.ledger = config.ledger;
  }

  /** Controller-only; touches bit 255 of the signer's word and nothing else. */
  setActive(caller: Address, signer: Address, active: boolean): Promise<void> {
    return this.serialize(async () => {
      if (getAddress(caller) !== this.controller) {
        throw new ContractRevertError(COUNTER_REVERTS.UNAUTHORIZED);
      }
      const key = getAddress(signer);
      this.words.set(key, withActive(this.word(key), active));
    });
  }

  /**
   * Increments the caller's count, then forwards to the ledger. Any ledger
   * rejection reverts the whole call.
   */
  forwardAttestation(
    caller: Address,
    request: DelegatedAttestationRequest
  ): Promise<Hex> {
    return this.serialize(async () => {
      const key = getAddress(caller);
      const before = this.word(key);

      let after: bigint;
      try {
        after = incrementCount(before);
      } catch (error) {
        if (error instanceof CounterOverflowError) {
          throw new ContractRevertError(COUNTER_REVERTS.COUNTER_OVERFLOW);
        }
        throw error;
      }

      this.words.set(key, after);
      try {
        return await this.ledger.attestByDelegation(request);
      } catch (error) {
        this.words.set(key, before);
        throw error;
      }
    });
  }

  getCount(signer: Address): bigint {
    return unpack(this.word(getAddress(signer))).count;
  }

  isActive(signer: Address): boolean {
    return unpack(this.word(getAddress(signer))).active;
  }

  getInfo(signer: Address): CounterInfo {
    return unpack(this.word(getAddress(signer)));
  }

  /** Raw storage word, for inspection. */
  wordOf(signer: Address): bigint {
    return this.word(getAddress(signer));
  }

  /** Test seam: preload a word, as a storage cheatcode would. */
  setWordForTesting(signer: Address, word: bigint): void {
    unpack(word);
    this.words.set(getAddress(signer), word);
  }

  private word(key: Address): bigint {
    return this.words.get(key) ?? 0n;
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn);
    this.tail = run.catch(() => undefined);
    return run;
  }
}
