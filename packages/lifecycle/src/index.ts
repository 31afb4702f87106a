// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/lifecycle`
 * Purpose: Graceful-shutdown protocol shared by the run coordinator and the worker service.
 * Scope: Re-exports. Does not exit the process.
 * Side-effects: none
 * @public
 */

export type { LoggerLike } from "./logger";
export {
  type Participant,
  STEP_OK,
  type ShutdownPhase,
  type StepResult,
  stepFailed,
} from "./participant";
export {
  ShutdownCoordinator,
  type ShutdownCoordinatorConfig,
  type ShutdownFailure,
  type ShutdownReport,
} from "./shutdown-coordinator";
export {
  exitCodeFor,
  type InstallSignalHandlersOptions,
  installSignalHandlers,
  type SignalTarget,
} from "./signals";
