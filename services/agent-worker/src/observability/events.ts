// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Run and item events come from run-core.
 * Invariants: Every `event` field logged by the service is a value of EVENT_NAMES.
 * Side-effects: none
 * @public
 */

import { RUN_EVENTS } from "@attestor/run-core";

export const EVENT_NAMES = {
  ...RUN_EVENTS,

  // Worker lifecycle
  WORKER_STARTED: "agent.worker.started",
  WORKER_CYCLE_FINISHED: "agent.worker.cycle_finished",
  WORKER_RUN_ABORTED: "agent.worker.run_aborted",
  WORKER_STATISTICS: "agent.worker.statistics",
  WORKER_STOPPED: "agent.worker.stopped",

  // Adapters
  SNAPSHOT_REQUEST_FAILED: "adapter.snapshot.request_failed",
  SNAPSHOT_VOTE_SUBMITTED: "adapter.snapshot.vote_submitted",
  LLM_CALL_FAILED: "adapter.llm.call_failed",
  LLM_RESPONSE_INVALID: "adapter.llm.response_invalid",
  LEDGER_FORWARDED: "adapter.ledger.forwarded",
  LEDGER_FORWARD_FAILED: "adapter.ledger.forward_failed",
  LEDGER_FORWARD_CONFIRMED: "adapter.ledger.forward_confirmed",
  CHECKPOINT_BACKUP_RESTORED: "adapter.checkpoint.backup_restored",
  CHECKPOINT_CORRUPT: "adapter.checkpoint.corrupt",

  // Shutdown
  SHUTDOWN_COMPLETED: "agent.shutdown.completed",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
