// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/attestation-core/signer`
 * Purpose: Builds and signs the EIP-712 `Attest` message authorizing one delegated ledger write.
 * Scope: Message construction and signing with a key fixed at construction. Does not submit transactions.
 * Invariants:
 * - Deterministic: identical payload, clock reading and key → identical signature (RFC 6979).
 * - Item-specific: the payload (itemId, sourceKey, verdict, digest, submission) is inside the signed `data`.
 * - attester is always the signing account's own address.
 * Side-effects: none (signing is local)
 * Links: packages/attestation-core/src/typed-data.ts, packages/ledger-counter/src/contract.ts
 * @public
 */

import {
  type Address,
  type Hex,
  hashTypedData,
  type LocalAccount,
  parseSignature,
} from "viem";

import { type Clock, toUnixSeconds } from "./clock";
import { type AttestationPayload, encodeAttestationData } from "./encoding";
import type {
  AttestationRecord,
  DelegatedAttestationRequest,
  SignatureParts,
} from "./model";
import {
  ATTEST_PRIMARY_TYPE,
  ATTEST_TYPES,
  type AttestMessage,
  buildAttestationDomain,
  ZERO_BYTES32,
} from "./typed-data";

export interface AttestationSignerConfig {
  readonly account: LocalAccount;
  readonly chainId: number;
  /** Proxy contract that validates the signature */
  readonly verifyingContract: Address;
  readonly schemaUid: Hex;
  readonly recipient: Address;
  /** Signature validity window, added to clock.now() */
  readonly deadlineSeconds: number;
  readonly revocable?: boolean;
  readonly clock: Clock;
}

export interface SignedAttestation {
  readonly record: AttestationRecord;
  readonly message: AttestMessage;
  readonly request: DelegatedAttestationRequest;
  readonly signature: Hex;
  readonly typedDataHash: Hex;
}

export function toSignatureParts(signature: Hex): SignatureParts {
  const { r, s, v, yParity } = parseSignature(signature);
  return { v: Number(v ?? 27n + BigInt(yParity)), r, s };
}

export class AttestationSigner {
  constructor(private readonly config: AttestationSignerConfig) {}

  get address(): Address {
    return this.config.account.address;
  }

  /**
   * Sign one attestation. A fresh deadline is derived from the clock on
   * every call, so retries produce a new signature.
   */
  async sign(payload: AttestationPayload): Promise<SignedAttestation> {
    const createdAt = this.config.clock.now();
    const deadline =
      toUnixSeconds(createdAt) + BigInt(this.config.deadlineSeconds);

    const message: AttestMessage = {
      attester: this.config.account.address,
      schema: this.config.schemaUid,
      recipient: this.config.recipient,
      expirationTime: 0n,
      revocable: this.config.revocable ?? true,
      refUID: ZERO_BYTES32,
      data: encodeAttestationData(payload),
      value: 0n,
      deadline,
    };

    const typedData = {
      domain: buildAttestationDomain(this.config),
      types: ATTEST_TYPES,
      primaryType: ATTEST_PRIMARY_TYPE,
      message,
    } as const;

    const signature = await this.config.account.signTypedData(typedData);

    return {
      record: {
        signerAddress: message.attester,
        itemId: payload.itemId,
        sourceKey: payload.sourceKey,
        verdict: payload.verdict,
        decisionDigest: payload.decisionDigest,
        submissionReference: payload.submissionReference,
        createdAt,
      },
      message,
      request: {
        schema: message.schema,
        data: {
          recipient: message.recipient,
          expirationTime: message.expirationTime,
          revocable: message.revocable,
          refUID: message.refUID,
          data: message.data,
          value: message.value,
        },
        signature: toSignatureParts(signature),
        attester: message.attester,
        deadline: message.deadline,
      },
      signature,
      typedDataHash: hashTypedData(typedData),
    };
  }
}
