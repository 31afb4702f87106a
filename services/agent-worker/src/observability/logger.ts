// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not handle per-run bindings (callers use child()).
 * Invariants: Always emits JSON to stdout; no worker transports. Safe to call at module scope (no env validation).
 * Side-effects: none until the first log line
 * Notes: Reads logging-specific env vars directly (NODE_ENV, LOG_LEVEL, SERVICE_NAME) so a boot logger exists before env() validates.
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

const destination = pino.destination({
  dest: 1,
  sync: (process.env.NODE_ENV ?? "development") !== "production",
  minLength: 4096,
});

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "agent-worker";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  return pino(
    {
      level,
      enabled: !isTestTooling,
      // Stable base: bindings first, then reserved keys (prevents overwrite)
      base: { ...bindings, app: "decision-attestor", service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    destination
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Flush buffered output before the process exits. */
export function flushLogger(): void {
  destination.flushSync();
}
