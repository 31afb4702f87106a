// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/snapshot/graphql`
 * Purpose: Minimal Snapshot hub GraphQL client returning classified Outcomes.
 * Scope: POSTs a query, surfaces GraphQL errors, validates `data` with the caller's schema.
 * Invariants: GraphQL-level errors are permanent; transport failures follow http.ts classification.
 * Side-effects: IO (HTTP)
 * @internal
 */

import { fail, type Outcome } from "@attestor/run-core";
import { z } from "zod";

import { postJson } from "../http.js";

const GraphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export interface SnapshotGraphqlConfig {
  readonly url: string;
  readonly timeoutMs: number;
}

export class SnapshotGraphqlClient {
  constructor(private readonly config: SnapshotGraphqlConfig) {}

  async query<T>(
    query: string,
    variables: Record<string, unknown>,
    dataSchema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<Outcome<T>> {
    const response = await postJson(
      {
        url: this.config.url,
        body: { query, variables },
        timeoutMs: this.config.timeoutMs,
      },
      GraphqlEnvelopeSchema
    );
    if (!response.ok) return response;

    const { data, errors } = response.value;
    if (errors && errors.length > 0) {
      return fail(
        "permanent",
        errors.map((e) => e.message).join("; "),
        "GraphQLError"
      );
    }

    const parsed = dataSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      return fail(
        "permanent",
        issue ? `${issue.path.join(".")}: ${issue.message}` : "unexpected shape",
        "InvalidResponse"
      );
    }
    return { ok: true, value: parsed.data };
  }
}
