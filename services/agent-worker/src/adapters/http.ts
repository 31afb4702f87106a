// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/http`
 * Purpose: JSON-over-fetch helper that classifies failures into collaborator Outcome kinds.
 * Scope: Transport and classification only. Callers own request shapes and response schemas.
 * Invariants:
 * - 408, 429 and 5xx are transient; other non-2xx statuses are permanent
 * - Network errors and timeouts are transient
 * - A body that fails its schema is permanent
 * Side-effects: IO (HTTP via global fetch)
 * @internal
 */

import { fail, ok, type Outcome } from "@attestor/run-core";
import type { z } from "zod";

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export interface JsonRequest {
  readonly url: string;
  readonly body: unknown;
  readonly headers?: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
}

/**
 * POSTs JSON and validates the response body against `schema`.
 */
export async function postJson<T>(
  request: JsonRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<Outcome<T>> {
  let response: Response;
  try {
    response = await fetch(request.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...request.headers },
      body: JSON.stringify(request.body),
      signal: AbortSignal.timeout(request.timeoutMs),
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail("transient", message, "NetworkError");
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    return fail(
      isTransientStatus(response.status) ? "transient" : "permanent",
      text.slice(0, 200) || response.statusText,
      `HTTP ${response.status}`
    );
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch {
    return fail("permanent", "response body is not JSON", "InvalidResponse");
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    return fail(
      "permanent",
      issue ? `${issue.path.join(".")}: ${issue.message}` : "unexpected shape",
      "InvalidResponse"
    );
  }
  return ok(parsed.data);
}
