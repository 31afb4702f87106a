// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/attestation-core/tests/digest`
 * Purpose: Canonical JSON, decision digest and payload encoding tests.
 * Scope: Pure functions only.
 * Side-effects: none
 * Links: src/digest.ts, src/encoding.ts
 * @internal
 */

import {
  canonicalJson,
  computeDecisionDigest,
  decodeAttestationData,
  encodeAttestationData,
  VERDICT_CODES,
  verdictFromCode,
} from "@attestor/attestation-core";
import { encodeAbiParameters } from "viem";
import { describe, expect, it } from "vitest";

import { GOLDEN, TEST_DECISION } from "./fixtures";

describe("canonicalJson", () => {
  it("sorts keys at every depth without whitespace", () => {
    expect(canonicalJson({ b: 1, a: { d: [true, null], c: "x" } })).toBe(
      '{"a":{"c":"x","d":[true,null]},"b":1}'
    );
  });

  it("rejects non-finite numbers", () => {
    expect(() => canonicalJson({ x: Number.NaN })).toThrow(
      "Cannot canonicalize non-finite number: NaN"
    );
  });

  it("serializes the fixture decision to the golden form", () => {
    expect(canonicalJson({ ...TEST_DECISION })).toBe(GOLDEN.canonicalDecision);
  });
});

describe("computeDecisionDigest", () => {
  it("matches the golden digest", () => {
    expect(computeDecisionDigest(TEST_DECISION)).toBe(GOLDEN.decisionDigest);
  });

  it("is independent of property order", () => {
    const reordered = {
      strategyApplied: "balanced",
      rationale: "Aligned with treasury policy",
      confidence: 0.9,
      verdict: "approve",
      itemId: "proposal-1",
    } as const;
    expect(computeDecisionDigest(reordered)).toBe(GOLDEN.decisionDigest);
  });

  it("changes when the confidence changes", () => {
    expect(
      computeDecisionDigest({ ...TEST_DECISION, confidence: 0.91 })
    ).not.toBe(GOLDEN.decisionDigest);
  });
});

describe("attestation payload encoding", () => {
  const payload = {
    itemId: "proposal-1",
    sourceKey: "spaceA",
    verdict: "approve",
    decisionDigest: GOLDEN.decisionDigest,
    submissionReference: "vote-ref-1",
  } as const;

  it("matches the golden bytes", () => {
    expect(encodeAttestationData(payload)).toBe(GOLDEN.data);
  });

  it("decodes back to the payload", () => {
    expect(decodeAttestationData(GOLDEN.data)).toEqual(payload);
  });

  it("rejects an unknown verdict code", () => {
    const data = encodeAbiParameters(
      [
        { type: "string" },
        { type: "string" },
        { type: "uint8" },
        { type: "bytes32" },
        { type: "string" },
      ],
      ["proposal-1", "spaceA", 9, GOLDEN.decisionDigest, "vote-ref-1"]
    );
    expect(() => decodeAttestationData(data)).toThrow(
      "Unknown verdict code in attestation data: 9"
    );
  });

  it("maps verdict codes to vote choices", () => {
    expect(VERDICT_CODES).toEqual({
      no_action: 0,
      approve: 1,
      reject: 2,
      abstain: 3,
    });
    expect(verdictFromCode(2)).toBe("reject");
    expect(verdictFromCode(7)).toBeNull();
  });
});
