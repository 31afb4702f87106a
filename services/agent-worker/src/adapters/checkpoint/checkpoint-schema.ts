// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/checkpoint/checkpoint-schema`
 * Purpose: Zod schemas for the on-disk checkpoint envelope and its RunCheckpoint payload.
 * Scope: Validation and defaults only. Does not touch the filesystem.
 * Invariants: Evolution is additive; every field added after version 1 must carry a default.
 * Side-effects: none
 * @internal
 */

import { VERDICTS } from "@attestor/attestation-core";
import { CHECKPOINT_SCHEMA_VERSION, COMPLETED_STATUSES } from "@attestor/run-core";
import { z } from "zod";

const DecisionSchema = z.object({
  itemId: z.string(),
  verdict: z.enum(VERDICTS),
  confidence: z.number(),
  rationale: z.string(),
  strategyApplied: z.string(),
});

const PendingEntrySchema = z.object({
  decision: DecisionSchema.optional(),
  submissionReference: z.string().optional(),
  attestationTransaction: z.string().optional(),
  attestationAttempts: z.number().int().min(0).default(0),
});

const OutcomeSchema = z.object({
  status: z.enum(COMPLETED_STATUSES),
  verdict: z.enum(VERDICTS).optional(),
  confidence: z.number().optional(),
  submissionReference: z.string().optional(),
  recordId: z.string().optional(),
  reason: z.string().optional(),
  completedAt: z.string(),
});

export const RunCheckpointSchema = z.object({
  schemaVersion: z.number().int().default(CHECKPOINT_SCHEMA_VERSION),
  sourceKey: z.string(),
  inFlightItemIds: z.array(z.string()).default([]),
  completedItemIds: z.array(z.string()).default([]),
  lastRunStartedAt: z.string().nullable().default(null),
  lastRunFinishedAt: z.string().nullable().default(null),
  runCount: z.number().int().min(0).default(0),
  pending: z.record(PendingEntrySchema).default({}),
  outcomes: z.record(OutcomeSchema).default({}),
});

export const CheckpointEnvelopeSchema = z.object({
  schemaVersion: z.number().int(),
  savedAt: z.string(),
  /** SHA-256 hex over JSON.stringify(data) */
  checksum: z.string(),
  data: z.unknown(),
});

export type CheckpointEnvelope = z.infer<typeof CheckpointEnvelopeSchema>;
