// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/ledger-counter/ledger`
 * Purpose: Append-only attestation ledger contract and its in-process model.
 * Scope: Delegated-attestation validation (schema, deadline, signature, replay) and record storage. Does not count per signer.
 * Invariants:
 * - Records are append-only; no update or revoke path exists.
 * - Each signature is accepted at most once (UsedSignature on replay).
 * - Rejections throw ContractRevertError with the ledger's revert name.
 * Side-effects: none (in-memory state only)
 * Links: packages/ledger-counter/src/contract.ts
 * @public
 */

import {
  type AttestMessage,
  buildAttestationDomain,
  type Clock,
  type DelegatedAttestationRequest,
  toUnixSeconds,
  verifyAttestationSignature,
} from "@attestor/attestation-core";
import {
  type Address,
  encodeAbiParameters,
  type Hex,
  keccak256,
  serializeSignature,
} from "viem";

import { ContractRevertError, LEDGER_REVERTS } from "./errors";

export interface AttestationLedger {
  /** Validates and stores one delegated attestation; resolves to its record id. */
  attestByDelegation(request: DelegatedAttestationRequest): Promise<Hex>;
}

export interface StoredAttestation {
  readonly uid: Hex;
  readonly request: DelegatedAttestationRequest;
  readonly time: string;
}

export interface InMemoryAttestationLedgerConfig {
  readonly chainId: number;
  /** Address the signatures are bound to (EIP-712 verifyingContract) */
  readonly address: Address;
  readonly registeredSchemas: readonly Hex[];
  readonly clock: Clock;
}

export function toAttestMessage(
  request: DelegatedAttestationRequest
): AttestMessage {
  return {
    attester: request.attester,
    schema: request.schema,
    recipient: request.data.recipient,
    expirationTime: request.data.expirationTime,
    revocable: request.data.revocable,
    refUID: request.data.refUID,
    data: request.data.data,
    value: request.data.value,
    deadline: request.deadline,
  };
}

export class InMemoryAttestationLedger implements AttestationLedger {
  private readonly records = new Map<Hex, StoredAttestation>();
  private readonly usedSignatures = new Set<Hex>();

  constructor(private readonly config: InMemoryAttestationLedgerConfig) {}

  get address(): Address {
    return this.config.address;
  }

  async attestByDelegation(request: DelegatedAttestationRequest): Promise<Hex> {
    if (!this.config.registeredSchemas.includes(request.schema)) {
      throw new ContractRevertError(LEDGER_REVERTS.INVALID_SCHEMA);
    }

    const now = this.config.clock.now();
    if (request.deadline !== 0n && request.deadline < toUnixSeconds(now)) {
      throw new ContractRevertError(LEDGER_REVERTS.DEADLINE_EXPIRED);
    }

    const signature = serializeSignature({
      r: request.signature.r,
      s: request.signature.s,
      v: BigInt(request.signature.v),
    });
    const valid = await verifyAttestationSignature({
      domain: buildAttestationDomain({
        chainId: this.config.chainId,
        verifyingContract: this.config.address,
      }),
      message: toAttestMessage(request),
      signature,
    });
    if (!valid) {
      throw new ContractRevertError(LEDGER_REVERTS.INVALID_SIGNATURE);
    }

    const signatureHash = keccak256(signature);
    if (this.usedSignatures.has(signatureHash)) {
      throw new ContractRevertError(LEDGER_REVERTS.USED_SIGNATURE);
    }
    this.usedSignatures.add(signatureHash);

    const uid = keccak256(
      encodeAbiParameters(
        [
          { type: "bytes32" },
          { type: "address" },
          { type: "bytes" },
          { type: "uint256" },
        ],
        [
          request.schema,
          request.attester,
          request.data.data,
          BigInt(this.records.size),
        ]
      )
    );
    this.records.set(uid, { uid, request, time: now });
    return uid;
  }

  getAttestation(uid: Hex): StoredAttestation | undefined {
    return this.records.get(uid);
  }

  get size(): number {
    return this.records.size;
  }
}
