// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/tests/ledger-attestation-writer`
 * Purpose: Attestation writer against the in-process counter and ledger models.
 * Scope: Signing + forwarding, revert mapping, counter atomicity, unconfirmed forwards through a coordinator run, metrics. No chain.
 * Side-effects: none
 * @internal
 */

import {
  AttestationSigner,
  type Clock,
  computeDecisionDigest,
  decodeAttestationData,
} from "@attestor/attestation-core";
import type { DelegatedAttestationRequest } from "@attestor/attestation-core";
import {
  type CounterInfo,
  type ForwardReceipt,
  type ForwardStatus,
  ForwardUnconfirmedError,
  InMemoryAttestationLedger,
  InProcessLedgerCounterClient,
  LedgerCounterContract,
  type LedgerCounterClient,
  MAX_COUNT,
} from "@attestor/ledger-counter";
import { RunCoordinator } from "@attestor/run-core";
import { type Address, type Hex, isHex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { describe, expect, it } from "vitest";

import { LedgerAttestationWriter } from "../src/adapters/ledger/ledger-attestation-writer.js";
import {
  FakeDecisionEngine,
  FakeExecutionSurface,
  FakeProposalSource,
  MemoryCheckpointStore,
} from "../src/adapters/test/index.js";
import { EVENT_NAMES } from "../src/observability/events.js";
import { createMetrics } from "../src/observability/metrics.js";
import {
  approveDecision,
  createCapturingLogger,
  fixedClock,
  TEST_KEYS,
} from "./fixtures.js";

const SCHEMA: Hex = `0x${"5c".repeat(32)}`;
const PROXY: Address = "0x4200000000000000000000000000000000000021";
const COUNTER: Address = "0x00000000000000000000000000000000000c0de1";
const agent = privateKeyToAccount(TEST_KEYS.agent);

/** Mines the first forward, then loses its receipt as a flaky RPC would. */
class ReceiptTimeoutClient implements LedgerCounterClient {
  private timedOut = false;

  constructor(private readonly inner: InProcessLedgerCounterClient) {}

  async forwardAttestation(
    request: DelegatedAttestationRequest
  ): Promise<ForwardReceipt> {
    const receipt = await this.inner.forwardAttestation(request);
    if (this.timedOut) return receipt;
    this.timedOut = true;
    throw new ForwardUnconfirmedError(receipt.transactionReference, {
      cause: new Error("Timed out while waiting for transaction receipt"),
    });
  }

  getForwardStatus(transactionReference: string): Promise<ForwardStatus> {
    return this.inner.getForwardStatus(transactionReference);
  }

  getInfo(signer: Address): Promise<CounterInfo> {
    return this.inner.getInfo(signer);
  }
}

/** Advances five seconds per reading. */
function steppingClock(): Clock {
  let seconds = 0;
  return {
    now: () => {
      const value = new Date(Date.UTC(2025, 5, 1, 12, 0, seconds)).toISOString();
      seconds += 5;
      return value;
    },
  };
}

function setup(
  options: {
    registeredSchemas?: Hex[];
    wrapClient?: (inner: InProcessLedgerCounterClient) => LedgerCounterClient;
    clock?: Clock;
  } = {}
) {
  const clock = options.clock ?? fixedClock;
  const ledger = new InMemoryAttestationLedger({
    chainId: 8453,
    address: PROXY,
    registeredSchemas: options.registeredSchemas ?? [SCHEMA],
    clock,
  });
  const contract = new LedgerCounterContract({
    controller: agent.address,
    ledger,
    ledgerAddress: COUNTER,
  });
  const signer = new AttestationSigner({
    account: agent,
    chainId: 8453,
    verifyingContract: PROXY,
    schemaUid: SCHEMA,
    recipient: "0x0000000000000000000000000000000000000000",
    deadlineSeconds: 3600,
    clock,
  });
  const metrics = createMetrics();
  const capture = createCapturingLogger();
  const inner = new InProcessLedgerCounterClient(contract, agent.address);
  const writer = new LedgerAttestationWriter({
    signer,
    client: options.wrapClient?.(inner) ?? inner,
    logger: capture.logger,
    metrics,
  });
  return { ledger, contract, writer, metrics, ...capture };
}

async function forwardResults(metrics: ReturnType<typeof createMetrics>) {
  const { values } = await metrics.ledgerForwardsTotal.get();
  return Object.fromEntries(values.map((v) => [String(v.labels.result), v.value]));
}

const input = {
  decision: approveDecision("p1"),
  sourceKey: "spaceA",
  submissionReference: "vote-1",
};

describe("LedgerAttestationWriter", () => {
  it("signs, forwards and counts one attestation", async () => {
    const { ledger, contract, writer, metrics, events } = setup();

    const result = await writer.write(input);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.transactionReference).toBe("inproc-1");
    expect(contract.getInfo(agent.address)).toEqual({ active: false, count: 1n });

    const { recordId } = result.value;
    if (!isHex(recordId)) throw new Error(`recordId ${recordId} is not hex`);
    const stored = ledger.getAttestation(recordId);
    expect(stored?.request.attester).toBe(agent.address);
    expect(decodeAttestationData(stored?.request.data.data ?? "0x")).toEqual({
      itemId: "p1",
      sourceKey: "spaceA",
      verdict: "approve",
      decisionDigest: computeDecisionDigest(input.decision),
      submissionReference: "vote-1",
    });
    expect(events()).toEqual([EVENT_NAMES.LEDGER_FORWARDED]);
    expect(await forwardResults(metrics)).toEqual({ success: 1 });
  });

  it("signs a fresh request for every attempt", async () => {
    let seconds = 0;
    const ticking: Clock = {
      now: () => new Date(Date.UTC(2025, 5, 1, 12, 0, seconds++)).toISOString(),
    };
    const { contract, writer } = setup({ clock: ticking });

    const first = await writer.write(input);
    const second = await writer.write(input);

    expect(first.ok && second.ok).toBe(true);
    expect(contract.getCount(agent.address)).toBe(2n);
  });

  it("maps a ledger revert to a rejected outcome and leaves the count unchanged", async () => {
    const { contract, writer, metrics, events } = setup({ registeredSchemas: [] });

    const result = await writer.write(input);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "rejected",
        message: "Reverted: InvalidSchema",
        reason: "InvalidSchema",
      },
    });
    expect(contract.getCount(agent.address)).toBe(0n);
    expect(events()).toEqual([EVENT_NAMES.LEDGER_FORWARD_FAILED]);
    expect(await forwardResults(metrics)).toEqual({ reverted: 1 });
  });

  it("rejects forwarding once the count is saturated", async () => {
    const { contract, writer } = setup();
    contract.setWordForTesting(agent.address, MAX_COUNT);

    const result = await writer.write(input);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "rejected",
        message: "Reverted: CounterOverflow",
        reason: "CounterOverflow",
      },
    });
    expect(contract.getCount(agent.address)).toBe(MAX_COUNT);
  });

  it("treats non-revert client errors as transient", async () => {
    const unreachable: LedgerCounterClient = {
      forwardAttestation: async () => {
        throw new Error("socket hang up");
      },
      getForwardStatus: async () => ({ state: "unknown" }),
      getInfo: async () => ({ active: false, count: 0n }),
    };
    const { writer, metrics } = setup({ wrapClient: () => unreachable });

    await expect(writer.write(input)).resolves.toEqual({
      ok: false,
      error: {
        kind: "transient",
        message: "socket hang up",
        reason: "LedgerUnavailable",
      },
    });
    expect(await forwardResults(metrics)).toEqual({ error: 1 });
  });

  it("reports a sent forward without a receipt as unconfirmed, never transient", async () => {
    const { contract, writer, metrics } = setup({
      wrapClient: (inner) => new ReceiptTimeoutClient(inner),
    });

    const result = await writer.write(input);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "unconfirmed",
        message: "Forward inproc-1 sent but not confirmed",
        reference: "inproc-1",
      },
    });
    expect(contract.getCount(agent.address)).toBe(1n);
    expect(await forwardResults(metrics)).toEqual({ unconfirmed: 1 });
  });

  it("confirms a landed forward by its transaction and reads unknown ones as absent", async () => {
    const { ledger, writer } = setup({
      wrapClient: (inner) => new ReceiptTimeoutClient(inner),
    });
    await writer.write(input);

    const landed = await writer.confirm("inproc-1");
    const missing = await writer.confirm("inproc-9");

    expect(landed.ok).toBe(true);
    if (!landed.ok || !landed.value) throw new Error("expected a receipt");
    expect(landed.value.transactionReference).toBe("inproc-1");
    const { recordId } = landed.value;
    if (!isHex(recordId)) throw new Error(`recordId ${recordId} is not hex`);
    expect(ledger.getAttestation(recordId)?.request.attester).toBe(agent.address);
    expect(missing).toEqual({ ok: true, value: null });
  });

  it("reads a pending forward as transient", async () => {
    const pending: LedgerCounterClient = {
      forwardAttestation: async () => {
        throw new Error("not used");
      },
      getForwardStatus: async () => ({ state: "pending" }),
      getInfo: async () => ({ active: false, count: 0n }),
    };
    const { writer } = setup({ wrapClient: () => pending });

    await expect(writer.confirm("0xabc")).resolves.toEqual({
      ok: false,
      error: {
        kind: "transient",
        message: "transaction 0xabc is still pending",
      },
    });
  });

  it("never writes a second attestation when a receipt is lost mid-run", async () => {
    const clock = steppingClock();
    const { ledger, contract, writer, logger } = setup({
      clock,
      wrapClient: (inner) => new ReceiptTimeoutClient(inner),
    });
    const proposals = new FakeProposalSource();
    proposals.setItems("spaceA", [
      {
        itemId: "p1",
        origin: "0x00000000000000000000000000000000000000aa",
        payload: { title: "Fund the community garden" },
      },
    ]);
    const execution = new FakeExecutionSurface();
    const checkpoints = new MemoryCheckpointStore();
    const coordinator = () =>
      new RunCoordinator(
        {
          allowedOrigins: [],
          deniedOrigins: [],
          maxItemsPerRun: 10,
          confidenceThreshold: 0.7,
          dryRun: false,
          maxAttestationAttempts: 3,
          retry: { attempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
        },
        {
          proposals,
          decisions: new FakeDecisionEngine({ strategy: "balanced" }),
          execution,
          attestations: writer,
          checkpoints,
          clock,
          logger,
          sleep: async () => undefined,
        }
      );

    const first = await coordinator().run("spaceA");

    expect(first.outcomes).toEqual({ p1: "pending_recovery" });
    expect(contract.getCount(agent.address)).toBe(1n);
    expect(ledger.size).toBe(1);

    const second = await coordinator().run("spaceA");

    expect(second.outcomes).toEqual({ p1: "completed_submitted" });
    expect(contract.getCount(agent.address)).toBe(1n);
    expect(ledger.size).toBe(1);
    const saved = await checkpoints.load("spaceA");
    expect(saved?.inFlightItemIds).toEqual([]);
  });
});
