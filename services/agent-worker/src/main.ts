// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/main`
 * Purpose: Service entry point with graceful shutdown. Starts health server and the run loop.
 * Scope: Entry point that calls env() and wires the shutdown coordinator. Does not contain business logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - SIGTERM/SIGINT drain participants: health (ready=false) -> worker -> run coordinator
 *   - Exit code is 0 only when every shutdown step succeeded within SHUTDOWN_GRACE_MS
 *   - ready=true only after the container is built and the loop has started
 * Side-effects: IO (HTTP listener, process signals, process exit)
 * Links: packages/lifecycle/src/signals.ts
 * @public
 */

import {
  exitCodeFor,
  installSignalHandlers,
  ShutdownCoordinator,
} from "@attestor/lifecycle";

import { createContainer } from "./bootstrap/container.js";
import { env } from "./bootstrap/env.js";
import {
  type HealthState,
  healthParticipant,
  startHealthServer,
} from "./health.js";
import { EVENT_NAMES } from "./observability/events.js";
import { flushLogger, makeLogger } from "./observability/logger.js";
import { createMetrics } from "./observability/metrics.js";
import { AgentWorker } from "./worker.js";

async function main(): Promise<void> {
  const config = env();

  // Composition root owns logger creation
  const logger = makeLogger();
  const metrics = createMetrics({
    defaultMetrics: true,
    serviceName: config.SERVICE_NAME,
  });

  logger.info(
    {
      appEnv: config.APP_ENV,
      logLevel: config.LOG_LEVEL,
      dryRun: config.DRY_RUN,
    },
    "Starting agent worker"
  );

  const healthState: HealthState = { ready: false };
  const server = startHealthServer(
    healthState,
    config.HEALTH_PORT,
    metrics.registry
  );
  logger.info({ port: config.HEALTH_PORT }, "Health server started");

  const container = await createContainer(config, logger, metrics);
  const worker = new AgentWorker(container);

  const shutdown = new ShutdownCoordinator({
    graceMs: config.SHUTDOWN_GRACE_MS,
    logger,
  });
  shutdown.register(healthParticipant(healthState, server));
  shutdown.register(worker);
  shutdown.register(container.coordinator);

  installSignalHandlers({
    coordinator: shutdown,
    logger,
    onComplete: (report) => {
      logger.info(
        { event: EVENT_NAMES.SHUTDOWN_COMPLETED, ...report },
        EVENT_NAMES.SHUTDOWN_COMPLETED
      );
      flushLogger();
      process.exit(exitCodeFor(report));
    },
  });

  worker.start();
  healthState.ready = true;
  logger.info(
    {
      signer: container.signerAddress,
      sourceKeys: container.sourceKeys,
    },
    "Agent worker started, ready for traffic"
  );
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
