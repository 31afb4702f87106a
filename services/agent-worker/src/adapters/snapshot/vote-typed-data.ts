// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/snapshot/vote-typed-data`
 * Purpose: Snapshot `Vote` EIP-712 types, verdict/choice mapping and vote signing.
 * Scope: Message construction and signing only. Does not send anything.
 * Invariants:
 * - Domain is { name: "snapshot", version: "0.1.4" } with no chain id or verifying contract
 * - proposal is typed bytes32 for 0x-prefixed 32-byte ids, string otherwise
 * - approve → 1, reject → 2, abstain → 3; no_action has no choice
 * Side-effects: none
 * @public
 */

import type { Verdict } from "@attestor/attestation-core";
import type { Address, Hex, LocalAccount } from "viem";

export const SNAPSHOT_DOMAIN = { name: "snapshot", version: "0.1.4" } as const;

export const VOTE_CHOICES = {
  approve: 1,
  reject: 2,
  abstain: 3,
} as const satisfies Partial<Record<Verdict, number>>;

export type VotableVerdict = keyof typeof VOTE_CHOICES;

export function isVotable(verdict: Verdict): verdict is VotableVerdict {
  return verdict in VOTE_CHOICES;
}

export function verdictForChoice(choice: number): VotableVerdict | null {
  switch (choice) {
    case VOTE_CHOICES.approve:
      return "approve";
    case VOTE_CHOICES.reject:
      return "reject";
    case VOTE_CHOICES.abstain:
      return "abstain";
    default:
      return null;
  }
}

const voteFields = <P extends "string" | "bytes32">(proposalType: P) =>
  ({
    Vote: [
      { name: "from", type: "address" },
      { name: "space", type: "string" },
      { name: "timestamp", type: "uint64" },
      { name: "proposal", type: proposalType },
      { name: "choice", type: "uint32" },
      { name: "reason", type: "string" },
      { name: "app", type: "string" },
      { name: "metadata", type: "string" },
    ],
  }) as const;

export const VOTE_TYPES_STRING_PROPOSAL = voteFields("string");
export const VOTE_TYPES_BYTES32_PROPOSAL = voteFields("bytes32");

const BYTES32 = /^0x[0-9a-fA-F]{64}$/;

function isBytes32(value: string): value is Hex {
  return BYTES32.test(value);
}

export interface VoteInput {
  readonly space: string;
  readonly proposal: string;
  readonly choice: number;
  readonly reason: string;
  readonly app: string;
  /** Unix seconds */
  readonly timestamp: bigint;
}

/** JSON-ready envelope the sequencer accepts. */
export interface SignedVote {
  readonly address: Address;
  readonly sig: Hex;
  readonly data: {
    readonly domain: typeof SNAPSHOT_DOMAIN;
    readonly types:
      | typeof VOTE_TYPES_STRING_PROPOSAL
      | typeof VOTE_TYPES_BYTES32_PROPOSAL;
    readonly message: {
      readonly from: Address;
      readonly space: string;
      readonly timestamp: number;
      readonly proposal: string;
      readonly choice: number;
      readonly reason: string;
      readonly app: string;
      readonly metadata: string;
    };
  };
}

export async function signVote(
  account: LocalAccount,
  input: VoteInput
): Promise<SignedVote> {
  const base = {
    from: account.address,
    space: input.space,
    timestamp: input.timestamp,
    choice: input.choice,
    reason: input.reason,
    app: input.app,
    metadata: "{}",
  };

  const { proposal } = input;
  let sig: Hex;
  let types: SignedVote["data"]["types"];
  if (isBytes32(proposal)) {
    types = VOTE_TYPES_BYTES32_PROPOSAL;
    sig = await account.signTypedData({
      domain: SNAPSHOT_DOMAIN,
      types: VOTE_TYPES_BYTES32_PROPOSAL,
      primaryType: "Vote",
      message: { ...base, proposal },
    });
  } else {
    types = VOTE_TYPES_STRING_PROPOSAL;
    sig = await account.signTypedData({
      domain: SNAPSHOT_DOMAIN,
      types: VOTE_TYPES_STRING_PROPOSAL,
      primaryType: "Vote",
      message: { ...base, proposal },
    });
  }

  return {
    address: account.address,
    sig,
    data: {
      domain: SNAPSHOT_DOMAIN,
      types,
      message: { ...base, proposal, timestamp: Number(input.timestamp) },
    },
  };
}
