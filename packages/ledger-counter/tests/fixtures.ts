// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/ledger-counter/tests/fixtures`
 * Purpose: Deterministic accounts, schema and wiring for counter/ledger tests.
 * Scope: Test helpers only.
 * Side-effects: none
 * @internal
 */

import {
  AttestationSigner,
  computeDecisionDigest,
} from "@attestor/attestation-core";
import {
  InMemoryAttestationLedger,
  LedgerCounterContract,
} from "@attestor/ledger-counter";
import type { Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";

/** Placeholder keys, never funded. */
export const SIGNER_KEY =
  "0x2222222222222222222222222222222222222222222222222222222222222222" as const;
export const OTHER_KEY =
  "0x3333333333333333333333333333333333333333333333333333333333333333" as const;

export const FIXED_ADDRESSES = {
  controller: "0x000000000000000000000000000000000000c0de",
  ledger: "0x4200000000000000000000000000000000000021",
  stranger: "0x000000000000000000000000000000000000beef",
} as const;

export const CHAIN_ID = 11155111;
export const SCHEMA_UID: Hex =
  "0xabababababababababababababababababababababababababababababababab";
export const UNKNOWN_SCHEMA_UID: Hex =
  "0xcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcdcd";

export const NOW = "2025-06-01T12:00:00.000Z";

export function mutableClock(initial = NOW) {
  let current = initial;
  return {
    now: () => current,
    set: (iso: string) => {
      current = iso;
    },
  };
}

export function createHarness(opts?: { schemaUid?: Hex; key?: Hex }) {
  const clock = mutableClock();
  const account = privateKeyToAccount(opts?.key ?? SIGNER_KEY);
  const ledger = new InMemoryAttestationLedger({
    chainId: CHAIN_ID,
    address: FIXED_ADDRESSES.ledger,
    registeredSchemas: [SCHEMA_UID],
    clock,
  });
  const contract = new LedgerCounterContract({
    controller: FIXED_ADDRESSES.controller,
    ledger,
    ledgerAddress: FIXED_ADDRESSES.ledger,
  });
  const signer = new AttestationSigner({
    account,
    chainId: CHAIN_ID,
    verifyingContract: FIXED_ADDRESSES.ledger,
    schemaUid: opts?.schemaUid ?? SCHEMA_UID,
    recipient: "0x0000000000000000000000000000000000000000",
    deadlineSeconds: 600,
    clock,
  });
  return { clock, account, ledger, contract, signer };
}

export function payloadFor(itemId: string) {
  return {
    itemId,
    sourceKey: "spaceA",
    verdict: "approve",
    decisionDigest: computeDecisionDigest({
      itemId,
      verdict: "approve",
      confidence: 0.9,
      rationale: "test",
      strategyApplied: "balanced",
    }),
    submissionReference: `vote-${itemId}`,
  } as const;
}

/** Small deterministic PRNG for property-style sequences. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
