// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/attestation-core/tests/fixtures`
 * Purpose: Fixed key, domain and decision for attestation signing tests, with expected golden outputs.
 * Scope: Test data only. Does not import from src/.
 * Invariants: Golden values were produced by an independent EIP-712 implementation over exactly these inputs.
 * Side-effects: none
 * @internal
 */

/** Placeholder key, never funded. */
export const TEST_PRIVATE_KEY =
  "0x1111111111111111111111111111111111111111111111111111111111111111" as const;

export const TEST_ATTESTER = "0x19E7E376E7C213B7E7e7e46cc70A5dD086DAff2A";

export const TEST_DOMAIN = {
  chainId: 11155111,
  verifyingContract: "0x4200000000000000000000000000000000000021",
} as const;

export const TEST_SCHEMA_UID =
  "0xabababababababababababababababababababababababababababababababab" as const;

export const TEST_RECIPIENT =
  "0x0000000000000000000000000000000000000000" as const;

export const TEST_NOW = "2025-12-31T23:00:00.000Z";
export const TEST_DEADLINE_SECONDS = 3600;

export const TEST_DECISION = {
  itemId: "proposal-1",
  verdict: "approve",
  confidence: 0.9,
  rationale: "Aligned with treasury policy",
  strategyApplied: "balanced",
} as const;

export const GOLDEN = {
  canonicalDecision:
    '{"confidence":0.9,"itemId":"proposal-1","rationale":"Aligned with treasury policy","strategyApplied":"balanced","verdict":"approve"}',
  decisionDigest:
    "0x573b6ae61405ede88a386ed361fd413e2bba622fd9abbcce3c711bfbc31848f5",
  data: "0x00000000000000000000000000000000000000000000000000000000000000a000000000000000000000000000000000000000000000000000000000000000e00000000000000000000000000000000000000000000000000000000000000001573b6ae61405ede88a386ed361fd413e2bba622fd9abbcce3c711bfbc31848f50000000000000000000000000000000000000000000000000000000000000120000000000000000000000000000000000000000000000000000000000000000a70726f706f73616c2d310000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000067370616365410000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000000a766f74652d7265662d3100000000000000000000000000000000000000000000",
  deadline: 1767225600n,
  typedDataHash:
    "0x492d661dac7fadc093f0ec88ee9898dccb5aca5bcb989fed9502d8bf6b603438",
  signature:
    "0x3d713a1035bc0aaab6fae2d99f49e0921792bb5f9074804ebeebc904469a757e5c1bbdb12a29772ae6b9e84ac255b75717c8a5c7e42e673a40e7c326e469f01a1c",
  r: "0x3d713a1035bc0aaab6fae2d99f49e0921792bb5f9074804ebeebc904469a757e",
  s: "0x5c1bbdb12a29772ae6b9e84ac255b75717c8a5c7e42e673a40e7c326e469f01a",
  v: 28,
} as const;

export function fixedClock(now = TEST_NOW) {
  return { now: () => now };
}
