// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/attestation-core/typed-data`
 * Purpose: EIP-712 domain and `Attest` struct definition for delegated ledger writes.
 * Scope: Constants and pure builders. Does not hold keys.
 * Invariants:
 * - ATTESTER_FIRST: `attester` is the first member of `Attest`; the verifying proxy hashes this exact order.
 * - Domain name/version match the deployed proxy ("EIP712Proxy", "1.2.0").
 * Side-effects: none
 * Links: packages/attestation-core/src/signer.ts, packages/attestation-core/src/verify.ts
 * @public
 */

import type { Address, Hex, TypedDataDomain } from "viem";

export const ATTESTATION_DOMAIN_NAME = "EIP712Proxy";
export const ATTESTATION_DOMAIN_VERSION = "1.2.0";

export const ATTEST_PRIMARY_TYPE = "Attest";

export const ATTEST_TYPES = {
  Attest: [
    { name: "attester", type: "address" },
    { name: "schema", type: "bytes32" },
    { name: "recipient", type: "address" },
    { name: "expirationTime", type: "uint64" },
    { name: "revocable", type: "bool" },
    { name: "refUID", type: "bytes32" },
    { name: "data", type: "bytes" },
    { name: "value", type: "uint256" },
    { name: "deadline", type: "uint64" },
  ],
} as const;

export const ZERO_BYTES32: Hex =
  "0x0000000000000000000000000000000000000000000000000000000000000000";

export interface AttestationDomainParams {
  readonly chainId: number;
  readonly verifyingContract: Address;
}

export function buildAttestationDomain(
  params: AttestationDomainParams
): TypedDataDomain {
  return {
    name: ATTESTATION_DOMAIN_NAME,
    version: ATTESTATION_DOMAIN_VERSION,
    chainId: params.chainId,
    verifyingContract: params.verifyingContract,
  };
}

/** Message fields of the `Attest` struct. */
export interface AttestMessage {
  readonly attester: Address;
  readonly schema: Hex;
  readonly recipient: Address;
  readonly expirationTime: bigint;
  readonly revocable: boolean;
  readonly refUID: Hex;
  readonly data: Hex;
  readonly value: bigint;
  readonly deadline: bigint;
}
