// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/lifecycle/tests/signals`
 * Purpose: Signal wiring tests against an injected EventEmitter target.
 * Scope: Does not send real signals to the test process.
 * Side-effects: none
 * Links: src/signals.ts
 * @internal
 */

import { EventEmitter } from "node:events";

import {
  exitCodeFor,
  installSignalHandlers,
  type ShutdownReport,
  ShutdownCoordinator,
} from "@attestor/lifecycle";
import { describe, expect, it, vi } from "vitest";

import { createMockLogger, recordingParticipant } from "./fixtures";

function setup(
  onComplete = vi.fn<(report: ShutdownReport) => void>()
) {
  const target = new EventEmitter();
  const logger = createMockLogger();
  const coordinator = new ShutdownCoordinator({ graceMs: 1_000, logger });
  const journal: string[] = [];
  coordinator.register(recordingParticipant("worker", journal));
  const uninstall = installSignalHandlers({
    coordinator,
    logger,
    onComplete,
    target,
  });
  return { target, logger, coordinator, journal, onComplete, uninstall };
}

describe("installSignalHandlers", () => {
  it("starts the drain on SIGTERM and reports once", async () => {
    const { target, onComplete, journal } = setup();

    target.emit("SIGTERM");
    await vi.waitFor(() => expect(onComplete).toHaveBeenCalledTimes(1));

    expect(onComplete.mock.calls[0]?.[0]).toMatchObject({
      reason: "SIGTERM",
      timedOut: false,
      failures: [],
    });
    expect(journal).toEqual([
      "worker:quiesce",
      "worker:persist",
      "worker:release",
    ]);
  });

  it("logs and ignores a second signal", async () => {
    const { target, onComplete, logger } = setup();

    target.emit("SIGINT");
    target.emit("SIGTERM");
    await vi.waitFor(() => expect(onComplete).toHaveBeenCalledTimes(1));

    expect(logger.warn).toHaveBeenCalledWith(
      { signal: "SIGTERM" },
      "Shutdown already in progress"
    );
    expect(onComplete.mock.calls[0]?.[0]?.reason).toBe("SIGINT");
  });

  it("logs an error thrown by the completion callback", async () => {
    const failure = new Error("exit hook failed");
    const { target, logger } = setup(
      vi.fn<(report: ShutdownReport) => void>(() => {
        throw failure;
      })
    );

    target.emit("SIGTERM");

    await vi.waitFor(() =>
      expect(logger.error).toHaveBeenCalledWith(
        { err: failure, signal: "SIGTERM" },
        "Shutdown onComplete failed"
      )
    );
  });

  it("removes its listeners on uninstall", () => {
    const { target, uninstall } = setup();
    expect(target.listenerCount("SIGTERM")).toBe(1);
    uninstall();
    expect(target.listenerCount("SIGTERM")).toBe(0);
    expect(target.listenerCount("SIGINT")).toBe(0);
  });
});

describe("exitCodeFor", () => {
  const base: ShutdownReport = {
    reason: "SIGTERM",
    timedOut: false,
    failures: [],
    durationMs: 5,
  };

  it("is 0 only for a clean drain", () => {
    expect(exitCodeFor(base)).toBe(0);
    expect(exitCodeFor({ ...base, timedOut: true })).toBe(1);
    expect(
      exitCodeFor({
        ...base,
        failures: [{ participant: "a", phase: "persist", error: "x" }],
      })
    ).toBe(1);
  });
});
