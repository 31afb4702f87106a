// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/attestation-core/encoding`
 * Purpose: ABI encoding of the attestation payload carried in the signed `data` field.
 * Scope: Encode/decode only. Does not sign or submit.
 * Invariants:
 * - Payload layout: (string itemId, string sourceKey, uint8 verdictCode, bytes32 decisionDigest, string submissionReference).
 * - Layout is part of the ledger schema; changing it requires a new schema UID.
 * Side-effects: none
 * Links: packages/attestation-core/src/typed-data.ts
 * @public
 */

import { decodeAbiParameters, encodeAbiParameters, type Hex } from "viem";

import { VERDICT_CODES, type Verdict, verdictFromCode } from "./model";

export const ATTESTATION_DATA_PARAMS = [
  { name: "itemId", type: "string" },
  { name: "sourceKey", type: "string" },
  { name: "verdictCode", type: "uint8" },
  { name: "decisionDigest", type: "bytes32" },
  { name: "submissionReference", type: "string" },
] as const;

export interface AttestationPayload {
  readonly itemId: string;
  readonly sourceKey: string;
  readonly verdict: Verdict;
  readonly decisionDigest: Hex;
  readonly submissionReference: string;
}

export function encodeAttestationData(payload: AttestationPayload): Hex {
  return encodeAbiParameters(ATTESTATION_DATA_PARAMS, [
    payload.itemId,
    payload.sourceKey,
    VERDICT_CODES[payload.verdict],
    payload.decisionDigest,
    payload.submissionReference,
  ]);
}

/**
 * Inverse of encodeAttestationData. Throws on an unknown verdict code.
 */
export function decodeAttestationData(data: Hex): AttestationPayload {
  const [itemId, sourceKey, verdictCode, decisionDigest, submissionReference] =
    decodeAbiParameters(ATTESTATION_DATA_PARAMS, data);
  const verdict = verdictFromCode(verdictCode);
  if (!verdict) {
    throw new Error(`Unknown verdict code in attestation data: ${verdictCode}`);
  }
  return { itemId, sourceKey, verdict, decisionDigest, submissionReference };
}
