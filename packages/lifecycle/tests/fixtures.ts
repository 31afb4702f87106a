// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/lifecycle/tests/fixtures`
 * Purpose: Recording participants and a mock logger for shutdown tests.
 * Scope: Test helpers only.
 * Side-effects: none
 * @internal
 */

import type { Participant, StepResult } from "@attestor/lifecycle";
import { vi } from "vitest";

export function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

type Step = () => Promise<StepResult>;

/**
 * Participant that appends `${name}:${phase}` to a shared journal.
 */
export function recordingParticipant(
  name: string,
  journal: string[],
  overrides?: Partial<Record<"quiesce" | "persist" | "release", Step>>
): Participant {
  const step =
    (phase: "quiesce" | "persist" | "release"): Step =>
    async () => {
      journal.push(`${name}:${phase}`);
      const override = overrides?.[phase];
      return override ? override() : { ok: true };
    };
  return {
    name,
    quiesce: step("quiesce"),
    persist: step("persist"),
    release: step("release"),
  };
}
