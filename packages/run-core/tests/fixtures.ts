// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/tests/fixtures`
 * Purpose: Builders for items, decisions and a fully faked coordinator.
 * Scope: Test helpers only.
 * Side-effects: none
 * @internal
 */

import type { Decision, Verdict } from "@attestor/attestation-core";
import {
  type ProposalItem,
  RunCoordinator,
  type RunCoordinatorConfig,
} from "@attestor/run-core";
import { vi } from "vitest";

import {
  CrashingCheckpointStore,
  FakeAttestationWriter,
  FakeDecisionEngine,
  FakeExecutionSurface,
  FakeProposalSource,
  noSleep,
  type ScriptedDecision,
  steppingClock,
} from "./fakes";

export const SOURCE_KEY = "spaceA";

export function createMockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function item(itemId: string, origin = "0xproposer"): ProposalItem {
  return { itemId, origin, payload: { title: `Proposal ${itemId}` } };
}

export function decision(
  itemId: string,
  verdict: Verdict,
  confidence: number
): Decision {
  return {
    itemId,
    verdict,
    confidence,
    rationale: `${verdict} at ${confidence}`,
    strategyApplied: "balanced",
  };
}

export const BASE_CONFIG: RunCoordinatorConfig = {
  allowedOrigins: [],
  deniedOrigins: [],
  maxItemsPerRun: 10,
  confidenceThreshold: 0.7,
  dryRun: false,
  maxAttestationAttempts: 3,
  retry: { attempts: 3, baseDelayMs: 10, maxDelayMs: 100 },
};

/** Collaborators that outlive a coordinator, so a restart sees the same world. */
export interface World {
  readonly proposals: FakeProposalSource;
  readonly decisions: FakeDecisionEngine;
  readonly execution: FakeExecutionSurface;
  readonly attestations: FakeAttestationWriter;
  readonly checkpoints: CrashingCheckpointStore;
}

export function createWorld(
  items: ProposalItem[],
  script: Record<string, ScriptedDecision | ScriptedDecision[]>
): World {
  return {
    proposals: new FakeProposalSource(items),
    decisions: new FakeDecisionEngine(script),
    execution: new FakeExecutionSurface(),
    attestations: new FakeAttestationWriter(),
    checkpoints: new CrashingCheckpointStore(),
  };
}

export function createCoordinator(
  world: World,
  config: Partial<RunCoordinatorConfig> = {}
) {
  const logger = createMockLogger();
  const coordinator = new RunCoordinator(
    { ...BASE_CONFIG, ...config },
    {
      ...world,
      clock: steppingClock(),
      logger,
      sleep: noSleep,
    }
  );
  return { coordinator, logger };
}

/** The three-item scenario: one confident approve, one low-confidence approve, one confident reject. */
export function spaceAWorld(): World {
  return createWorld([item("p1"), item("p2"), item("p3")], {
    p1: decision("p1", "approve", 0.9),
    p2: decision("p2", "approve", 0.5),
    p3: decision("p3", "reject", 0.8),
  });
}
