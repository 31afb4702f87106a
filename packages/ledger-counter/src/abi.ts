// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/ledger-counter/abi`
 * Purpose: LedgerCounter contract ABI for reads, forwarding and revert decoding.
 * Scope: ABI constant only; does not include bytecode or addresses.
 * Invariants: forwardAttestation takes the ledger's DelegatedProxyAttestationRequest tuple unchanged.
 * Side-effects: none
 * Links: packages/ledger-counter/src/contract.ts
 * @public
 */

const ATTESTATION_REQUEST_TUPLE = {
  name: "request",
  type: "tuple",
  internalType: "struct DelegatedProxyAttestationRequest",
  components: [
    { name: "schema", type: "bytes32", internalType: "bytes32" },
    {
      name: "data",
      type: "tuple",
      internalType: "struct AttestationRequestData",
      components: [
        { name: "recipient", type: "address", internalType: "address" },
        { name: "expirationTime", type: "uint64", internalType: "uint64" },
        { name: "revocable", type: "bool", internalType: "bool" },
        { name: "refUID", type: "bytes32", internalType: "bytes32" },
        { name: "data", type: "bytes", internalType: "bytes" },
        { name: "value", type: "uint256", internalType: "uint256" },
      ],
    },
    {
      name: "signature",
      type: "tuple",
      internalType: "struct Signature",
      components: [
        { name: "v", type: "uint8", internalType: "uint8" },
        { name: "r", type: "bytes32", internalType: "bytes32" },
        { name: "s", type: "bytes32", internalType: "bytes32" },
      ],
    },
    { name: "attester", type: "address", internalType: "address" },
    { name: "deadline", type: "uint64", internalType: "uint64" },
  ],
} as const;

export const LEDGER_COUNTER_ABI = [
  {
    type: "constructor",
    inputs: [
      { name: "controller", type: "address", internalType: "address" },
      { name: "ledger", type: "address", internalType: "address" },
    ],
    stateMutability: "nonpayable",
  },
  {
    type: "function",
    name: "forwardAttestation",
    inputs: [ATTESTATION_REQUEST_TUPLE],
    outputs: [{ name: "uid", type: "bytes32", internalType: "bytes32" }],
    stateMutability: "payable",
  },
  {
    type: "function",
    name: "setActive",
    inputs: [
      { name: "signer", type: "address", internalType: "address" },
      { name: "active", type: "bool", internalType: "bool" },
    ],
    outputs: [],
    stateMutability: "nonpayable",
  },
  {
    type: "function",
    name: "getCount",
    inputs: [{ name: "signer", type: "address", internalType: "address" }],
    outputs: [{ name: "", type: "uint256", internalType: "uint256" }],
    stateMutability: "view",
  },
  {
    type: "function",
    name: "isActive",
    inputs: [{ name: "signer", type: "address", internalType: "address" }],
    outputs: [{ name: "", type: "bool", internalType: "bool" }],
    stateMutability: "view",
  },
  {
    type: "function",
    name: "getInfo",
    inputs: [{ name: "signer", type: "address", internalType: "address" }],
    outputs: [
      { name: "active", type: "bool", internalType: "bool" },
      { name: "count", type: "uint256", internalType: "uint256" },
    ],
    stateMutability: "view",
  },
  {
    type: "event",
    name: "AttestationForwarded",
    inputs: [
      { name: "attester", type: "address", indexed: true },
      { name: "uid", type: "bytes32", indexed: false },
      { name: "count", type: "uint256", indexed: false },
    ],
    anonymous: false,
  },
  {
    type: "event",
    name: "ActiveStatusChanged",
    inputs: [
      { name: "signer", type: "address", indexed: true },
      { name: "active", type: "bool", indexed: false },
    ],
    anonymous: false,
  },
  { type: "error", name: "Unauthorized", inputs: [] },
  { type: "error", name: "ZeroAddress", inputs: [] },
  { type: "error", name: "CounterOverflow", inputs: [] },
  // Bubbled up unchanged from the ledger
  { type: "error", name: "InvalidSignature", inputs: [] },
  { type: "error", name: "DeadlineExpired", inputs: [] },
  { type: "error", name: "InvalidSchema", inputs: [] },
  { type: "error", name: "UsedSignature", inputs: [] },
] as const;
