// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/attestation-core`
 * Purpose: Decision model and EIP-712 attestation signing shared by the ledger model, run coordinator and worker.
 * Scope: Re-exports model types, digest, encoding, typed data, signer and verification. Does not contain I/O.
 * Invariants: No imports from services/. Pure domain logic plus local signing only.
 * Side-effects: none
 * @public
 */

// Clock
export { type Clock, systemClock, toUnixSeconds } from "./clock";
// Digest
export {
  type CanonicalValue,
  canonicalJson,
  computeDecisionDigest,
} from "./digest";
// Encoding
export {
  ATTESTATION_DATA_PARAMS,
  type AttestationPayload,
  decodeAttestationData,
  encodeAttestationData,
} from "./encoding";
// Model
export type {
  AttestationRecord,
  AttestationRequestData,
  Decision,
  DelegatedAttestationRequest,
  SignatureParts,
  Verdict,
} from "./model";
export { VERDICT_CODES, VERDICTS, verdictFromCode } from "./model";
// Signing
export {
  AttestationSigner,
  type AttestationSignerConfig,
  type SignedAttestation,
  toSignatureParts,
} from "./signer";
// Typed data
export {
  ATTEST_PRIMARY_TYPE,
  ATTEST_TYPES,
  ATTESTATION_DOMAIN_NAME,
  ATTESTATION_DOMAIN_VERSION,
  type AttestationDomainParams,
  type AttestMessage,
  buildAttestationDomain,
  ZERO_BYTES32,
} from "./typed-data";
export { verifyAttestationSignature } from "./verify";
