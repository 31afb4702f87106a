// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/attestation-core/verify`
 * Purpose: Recover the signer of an `Attest` message and check it equals the claimed attester.
 * Scope: Pure verification against the canonical struct. Does not accept caller-supplied type lists.
 * Invariants: A signature over any other field order or field set recovers a different address and is rejected.
 * Side-effects: none
 * Links: packages/attestation-core/src/typed-data.ts
 * @public
 */

import {
  type Hex,
  isAddressEqual,
  recoverTypedDataAddress,
  type TypedDataDomain,
} from "viem";

import {
  ATTEST_PRIMARY_TYPE,
  ATTEST_TYPES,
  type AttestMessage,
} from "./typed-data";

export async function verifyAttestationSignature(params: {
  domain: TypedDataDomain;
  message: AttestMessage;
  signature: Hex;
}): Promise<boolean> {
  let recovered: Hex;
  try {
    recovered = await recoverTypedDataAddress({
      domain: params.domain,
      types: ATTEST_TYPES,
      primaryType: ATTEST_PRIMARY_TYPE,
      message: params.message,
      signature: params.signature,
    });
  } catch (error) {
    // Malformed signature bytes are an invalid signature, not a fault
    if (error instanceof Error) return false;
    throw error;
  }
  return isAddressEqual(recovered, params.message.attester);
}
