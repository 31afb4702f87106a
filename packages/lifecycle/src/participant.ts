// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/lifecycle/participant`
 * Purpose: Three-step stop contract implemented by every long-lived subsystem.
 * Scope: Interface and result helpers. Does not schedule anything.
 * Invariants:
 * - quiesce: stop accepting new work; resolve once in-progress work has settled.
 * - persist: flush state needed for restart.
 * - release: close handles. Called in reverse registration order.
 * Side-effects: none
 * Links: packages/lifecycle/src/shutdown-coordinator.ts
 * @public
 */

export type StepResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: string };

export type ShutdownPhase = "quiesce" | "persist" | "release";

export interface Participant {
  readonly name: string;
  quiesce(): Promise<StepResult>;
  persist(): Promise<StepResult>;
  release(): Promise<StepResult>;
}

export const STEP_OK: StepResult = { ok: true };

export function stepFailed(error: unknown): StepResult {
  return {
    ok: false,
    error: error instanceof Error ? error.message : String(error),
  };
}
