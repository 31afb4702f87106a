// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/tests/health`
 * Purpose: Health route handling and the health shutdown participant.
 * Scope: Calls the router directly; never binds a port.
 * Side-effects: none
 * @internal
 */

import { createServer } from "node:http";

import { describe, expect, it } from "vitest";

import {
  type HealthState,
  healthParticipant,
  healthResponse,
} from "../src/health.js";
import { createMetrics } from "../src/observability/metrics.js";

describe("healthResponse", () => {
  const { registry, runsTotal } = createMetrics();

  it("reports liveness regardless of readiness", async () => {
    await expect(
      healthResponse({ ready: false }, registry, "/livez")
    ).resolves.toEqual({ status: 200, contentType: "text/plain", body: "ok" });
  });

  it("gates readiness on state", async () => {
    const state: HealthState = { ready: false };
    await expect(healthResponse(state, registry, "/readyz")).resolves.toEqual({
      status: 503,
      contentType: "text/plain",
      body: "not ready",
    });
    state.ready = true;
    await expect(healthResponse(state, registry, "/readyz")).resolves.toEqual({
      status: 200,
      contentType: "text/plain",
      body: "ok",
    });
  });

  it("serves version metadata", async () => {
    const response = await healthResponse({ ready: true }, registry, "/version");
    expect(response.status).toBe(200);
    expect(JSON.parse(response.body)).toMatchObject({ service: "agent-worker" });
  });

  it("exposes the agent metrics in Prometheus text format", async () => {
    runsTotal.inc({ source_key: "spaceA", result: "success" });

    const response = await healthResponse({ ready: true }, registry, "/metrics");

    expect(response.contentType).toBe(registry.contentType);
    expect(response.body).toMatch(
      /^agent_runs_total\{source_key="spaceA",result="success",[^}]*\} 1$/m
    );
  });

  it("returns 404 for anything else", async () => {
    const response = await healthResponse({ ready: true }, registry, "/nope");
    expect(response.status).toBe(404);
  });
});

describe("healthParticipant", () => {
  it("drops readiness on quiesce and tolerates a server that never listened", async () => {
    const state: HealthState = { ready: true };
    const participant = healthParticipant(state, createServer());

    await expect(participant.quiesce()).resolves.toEqual({ ok: true });
    expect(state.ready).toBe(false);
    await expect(participant.release()).resolves.toEqual({ ok: true });
  });
});
