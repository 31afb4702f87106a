// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/snapshot/snapshot-proposal-source`
 * Purpose: ProposalSource over the Snapshot hub: active proposals of one space, oldest first.
 * Scope: Query and mapping only. The proposal author is the item's origin for allow/deny filtering.
 * Side-effects: IO (HTTP)
 * @public
 */

import {
  ok,
  type Outcome,
  type ProposalItem,
  type ProposalSource,
} from "@attestor/run-core";
import { z } from "zod";

import { EVENT_NAMES } from "../../observability/events.js";
import type { Logger } from "../../observability/logger.js";
import type { SnapshotGraphqlClient } from "./graphql.js";
import { ACTIVE_PROPOSALS_QUERY } from "./queries.js";

const ProposalsSchema = z.object({
  proposals: z.array(
    z.object({
      id: z.string(),
      title: z.string(),
      body: z.string().default(""),
      choices: z.array(z.string()),
      start: z.number(),
      end: z.number(),
      author: z.string(),
    })
  ),
});

export class SnapshotProposalSource implements ProposalSource {
  constructor(
    private readonly graphql: SnapshotGraphqlClient,
    private readonly logger: Logger,
    private readonly pageSize = 50
  ) {}

  async listPending(space: string): Promise<Outcome<ProposalItem[]>> {
    const result = await this.graphql.query(
      ACTIVE_PROPOSALS_QUERY,
      { space, first: this.pageSize },
      ProposalsSchema
    );
    if (!result.ok) {
      this.logger.warn(
        {
          event: EVENT_NAMES.SNAPSHOT_REQUEST_FAILED,
          operation: "listPending",
          space,
          kind: result.error.kind,
          reason: result.error.reason,
        },
        EVENT_NAMES.SNAPSHOT_REQUEST_FAILED
      );
      return result;
    }

    return ok(
      result.value.proposals.map((p) => ({
        itemId: p.id,
        origin: p.author,
        payload: {
          title: p.title,
          body: p.body,
          choices: p.choices,
          start: p.start,
          end: p.end,
        },
      }))
    );
  }
}
