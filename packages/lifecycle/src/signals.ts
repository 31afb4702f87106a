// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/lifecycle/signals`
 * Purpose: Wires SIGTERM/SIGINT to a ShutdownCoordinator.
 * Scope: Signal subscription only. Exit codes are chosen by the caller's onComplete.
 * Invariants:
 * - The first signal starts the drain; later signals are logged and ignored.
 * - onComplete runs exactly once with the drain's report; if it throws, the error is logged.
 * Side-effects: process signal listeners (or the injected target's)
 * Links: services/agent-worker/src/main.ts
 * @public
 */

import type { LoggerLike } from "./logger";
import type {
  ShutdownCoordinator,
  ShutdownReport,
} from "./shutdown-coordinator";

export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface InstallSignalHandlersOptions {
  readonly coordinator: ShutdownCoordinator;
  readonly logger: LoggerLike;
  readonly onComplete: (report: ShutdownReport) => void;
  readonly signals?: readonly NodeJS.Signals[];
  readonly target?: SignalTarget;
}

/** Exit code for a finished drain: 0 only when every step succeeded in time. */
export function exitCodeFor(report: ShutdownReport): number {
  return report.timedOut || report.failures.length > 0 ? 1 : 0;
}

/**
 * Subscribes to termination signals. Returns an uninstall function.
 */
export function installSignalHandlers(
  options: InstallSignalHandlersOptions
): () => void {
  const { coordinator, logger, onComplete } = options;
  const target: SignalTarget = options.target ?? process;
  const signals = options.signals ?? ["SIGTERM", "SIGINT"];

  const listeners = signals.map((signal) => {
    const listener = (): void => {
      if (coordinator.isShuttingDown) {
        logger.warn({ signal }, "Shutdown already in progress");
        return;
      }
      logger.info({ signal }, "Received signal, shutting down");
      void coordinator
        .shutdown(signal)
        .catch((error: unknown): ShutdownReport => {
          logger.error({ err: error, signal }, "Shutdown drain failed");
          return {
            reason: signal,
            timedOut: false,
            failures: [
              {
                participant: "coordinator",
                phase: "release",
                error: error instanceof Error ? error.message : String(error),
              },
            ],
            durationMs: 0,
          };
        })
        .then(onComplete)
        .catch((error: unknown) => {
          logger.error({ err: error, signal }, "Shutdown onComplete failed");
        });
    };
    target.on(signal, listener);
    return { signal, listener };
  });

  return () => {
    for (const { signal, listener } of listeners) {
      target.off(signal, listener);
    }
  };
}
