// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/attestation-core/model`
 * Purpose: Decision and attestation types shared by the signer, the ledger model and the run coordinator.
 * Scope: Types, verdict enum and verdict codes. Does not perform hashing, encoding or I/O.
 * Invariants:
 * - Decision is immutable once produced by a decision engine.
 * - VERDICT_CODES are stable: they are written into signed attestation payloads.
 * Side-effects: none
 * Links: packages/attestation-core/src/encoding.ts, packages/attestation-core/src/signer.ts
 * @public
 */

import type { Address, Hex } from "viem";

export const VERDICTS = ["approve", "reject", "abstain", "no_action"] as const;

export type Verdict = (typeof VERDICTS)[number];

/**
 * On-payload verdict codes. Match the execution surface's vote choices
 * (1 = for, 2 = against, 3 = abstain); `no_action` is never attested.
 */
export const VERDICT_CODES: Readonly<Record<Verdict, number>> = {
  no_action: 0,
  approve: 1,
  reject: 2,
  abstain: 3,
};

export function verdictFromCode(code: number): Verdict | null {
  for (const verdict of VERDICTS) {
    if (VERDICT_CODES[verdict] === code) return verdict;
  }
  return null;
}

export interface Decision {
  readonly itemId: string;
  readonly verdict: Verdict;
  /** 0.0 - 1.0 */
  readonly confidence: number;
  readonly rationale: string;
  readonly strategyApplied: string;
}

/** Proof of a completed decision, signed once per ledger write attempt. */
export interface AttestationRecord {
  readonly signerAddress: Address;
  readonly itemId: string;
  readonly sourceKey: string;
  readonly verdict: Verdict;
  readonly decisionDigest: Hex;
  readonly submissionReference: string;
  readonly createdAt: string;
}

// ---------------------------------------------------------------------------
// Delegated attestation request (ledger wire shape)
// ---------------------------------------------------------------------------

export interface AttestationRequestData {
  readonly recipient: Address;
  readonly expirationTime: bigint;
  readonly revocable: boolean;
  readonly refUID: Hex;
  readonly data: Hex;
  readonly value: bigint;
}

export interface SignatureParts {
  readonly v: number;
  readonly r: Hex;
  readonly s: Hex;
}

export interface DelegatedAttestationRequest {
  readonly schema: Hex;
  readonly data: AttestationRequestData;
  readonly signature: SignatureParts;
  readonly attester: Address;
  readonly deadline: bigint;
}
