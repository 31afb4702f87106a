// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/attestation-core/digest`
 * Purpose: Deterministic keccak-256 digest of a Decision.
 * Scope: Pure functions. Does not sign or perform I/O.
 * Invariants:
 * - DIGEST_DETERMINISTIC: Same decision → byte-for-byte identical digest.
 * - Object keys are sorted at every depth before serialization; no whitespace.
 * Side-effects: none
 * Links: packages/attestation-core/src/encoding.ts
 * @public
 */

import { type Hex, keccak256, stringToBytes } from "viem";

import type { Decision } from "./model";

export type CanonicalValue =
  | string
  | number
  | boolean
  | null
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

/**
 * Serialize a JSON-compatible value with keys sorted at every level.
 * Rejects non-finite numbers since JSON cannot represent them.
 */
export function canonicalJson(value: CanonicalValue): string {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean"
  ) {
    return JSON.stringify(value);
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`Cannot canonicalize non-finite number: ${value}`);
    }
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => canonicalJson(v)).join(",")}]`;
  }
  const entries = Object.entries(value).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0
  );
  return `{${entries
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`)
    .join(",")}}`;
}

/**
 * keccak-256 over the canonical JSON of the decision's five fields.
 */
export function computeDecisionDigest(decision: Decision): Hex {
  const canonical = canonicalJson({
    itemId: decision.itemId,
    verdict: decision.verdict,
    confidence: decision.confidence,
    rationale: decision.rationale,
    strategyApplied: decision.strategyApplied,
  });
  return keccak256(stringToBytes(canonical));
}
