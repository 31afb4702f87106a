// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/ledger-counter`
 * Purpose: Bit-packed per-signer attestation counter: packing helpers, contract model, ABI and client port.
 * Scope: Re-exports. Does not contain RPC code.
 * Invariants: No imports from services/.
 * Side-effects: none
 * @public
 */

export { LEDGER_COUNTER_ABI } from "./abi";
export {
  type ForwardReceipt,
  type ForwardStatus,
  InProcessLedgerCounterClient,
  type LedgerCounterClient,
} from "./client";
export {
  LedgerCounterContract,
  type LedgerCounterContractConfig,
} from "./contract";
export {
  COUNTER_REVERTS,
  ContractRevertError,
  ForwardUnconfirmedError,
  isContractRevertError,
  isForwardUnconfirmedError,
  LEDGER_REVERTS,
} from "./errors";
export {
  type AttestationLedger,
  InMemoryAttestationLedger,
  type InMemoryAttestationLedgerConfig,
  type StoredAttestation,
  toAttestMessage,
} from "./ledger";
export {
  ACTIVE_BIT,
  COUNT_MASK,
  type CounterInfo,
  CounterOverflowError,
  incrementCount,
  MAX_COUNT,
  pack,
  unpack,
  WORD_MAX,
  withActive,
} from "./packing";
