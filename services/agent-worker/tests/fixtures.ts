// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/tests/fixtures`
 * Purpose: Reusable fixtures for agent-worker tests: capturing logger, env records, checkpoints, fetch stubs.
 * Scope: Test helpers only. Keys are placeholders, never real secrets.
 * Side-effects: none (pure functions)
 * Links: tests/*.test.ts
 * @internal
 */

import type { Clock, Decision } from "@attestor/attestation-core";
import { emptyCheckpoint, type ProposalItem, type RunCheckpoint } from "@attestor/run-core";
import pino, { type Logger } from "pino";
import type { Hex } from "viem";
import { vi } from "vitest";

/** Placeholder keys; deterministic, not secrets. */
export const TEST_KEYS = {
  agent: "0x1111111111111111111111111111111111111111111111111111111111111111",
  other: "0x3333333333333333333333333333333333333333333333333333333333333333",
} as const satisfies Record<string, Hex>;

export const FIXED_TIME = "2025-06-01T12:00:00.000Z";
/** FIXED_TIME in unix seconds */
export const FIXED_UNIX = 1_748_779_200;

export const fixedClock: Clock = { now: () => FIXED_TIME };

/** pino logger that keeps every line as parsed JSON. */
export function createCapturingLogger(): {
  logger: Logger;
  lines: Array<Record<string, unknown>>;
  events: () => unknown[];
} {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "debug" },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    }
  );
  return { logger, lines, events: () => lines.map((l) => l.event) };
}

/** Minimal valid env record for parseEnv. */
export function testEnv(
  overrides: Record<string, string | undefined> = {}
): Record<string, string | undefined> {
  return { APP_ENV: "test", SOURCE_KEYS: "spaceA", ...overrides };
}

export function checkpointWith(
  sourceKey: string,
  overrides: Partial<RunCheckpoint> = {}
): RunCheckpoint {
  return { ...emptyCheckpoint(sourceKey), ...overrides };
}

export function proposalItem(itemId: string): ProposalItem {
  return {
    itemId,
    origin: "0x00000000000000000000000000000000000000aa",
    payload: {
      title: `Proposal ${itemId}`,
      body: "Fund the community garden",
      choices: ["For", "Against", "Abstain"],
    },
  };
}

export function approveDecision(itemId: string): Decision {
  return {
    itemId,
    verdict: "approve",
    confidence: 0.9,
    rationale: "Aligned with treasury policy",
    strategyApplied: "balanced",
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** Replaces global fetch with a queue of canned responses (or thrown errors). */
export function stubFetch(...responses: Array<Response | Error>) {
  const queue = [...responses];
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = queue.shift();
    if (!next) throw new Error("unexpected fetch");
    if (next instanceof Error) throw next;
    return next;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

/** Parsed JSON body of the nth fetch call. */
export function requestBody(
  fetchMock: ReturnType<typeof stubFetch>,
  call = 0
): unknown {
  const init = fetchMock.mock.calls[call]?.[1];
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}
