// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/health`
 * Purpose: Health endpoint HTTP server for orchestrator probes and Prometheus scrapes.
 * Scope: /livez (liveness), /readyz (readiness), /version, /metrics endpoints; shutdown participant.
 * Invariants:
 * - /livez always returns 200 (process alive)
 * - /readyz returns 200 only when ready=true, 503 otherwise
 * - /version returns build metadata (sha, service, buildTs)
 * - Quiesce flips readiness off first; release closes the listener last
 * Side-effects: Binds HTTP server to HEALTH_PORT
 * @internal
 */

import { createServer, type Server } from "node:http";

import { type Participant, STEP_OK, stepFailed } from "@attestor/lifecycle";
import type { Registry } from "prom-client";

export interface HealthState {
  ready: boolean;
}

/** Build metadata from env vars (set at build time or runtime) */
const versionInfo = {
  sha: process.env.GIT_SHA ?? "unknown",
  service: "agent-worker",
  buildTs: process.env.BUILD_TS ?? "unknown",
};

export interface HealthResponse {
  readonly status: number;
  readonly contentType: string;
  readonly body: string;
}

function text(status: number, body: string): HealthResponse {
  return { status, contentType: "text/plain", body };
}

/** Routes one probe or scrape request. */
export async function healthResponse(
  state: HealthState,
  registry: Registry,
  url: string | undefined
): Promise<HealthResponse> {
  switch (url) {
    case "/livez":
      return text(200, "ok");
    case "/readyz":
      return state.ready ? text(200, "ok") : text(503, "not ready");
    case "/version":
      return {
        status: 200,
        contentType: "application/json",
        body: JSON.stringify(versionInfo),
      };
    case "/metrics":
      return {
        status: 200,
        contentType: registry.contentType,
        body: await registry.metrics(),
      };
    default:
      return text(404, "not found");
  }
}

export function createHealthServer(
  state: HealthState,
  registry: Registry
): Server {
  return createServer((req, res) => {
    healthResponse(state, registry, req.url).then(
      ({ status, contentType, body }) => {
        res.writeHead(status, { "Content-Type": contentType });
        res.end(body);
      },
      (error: unknown) => {
        res.writeHead(500, { "Content-Type": "text/plain" });
        res.end(error instanceof Error ? error.message : "internal error");
      }
    );
  });
}

export function startHealthServer(
  state: HealthState,
  port: number,
  registry: Registry
): Server {
  const server = createHealthServer(state, registry);
  server.listen(port);
  return server;
}

export function healthParticipant(
  state: HealthState,
  server: Server
): Participant {
  return {
    name: "health",
    quiesce: async () => {
      state.ready = false;
      return STEP_OK;
    },
    persist: async () => STEP_OK,
    release: () =>
      new Promise((resolve) => {
        if (!server.listening) {
          resolve(STEP_OK);
          return;
        }
        server.close((error) => resolve(error ? stepFailed(error) : STEP_OK));
      }),
  };
}
