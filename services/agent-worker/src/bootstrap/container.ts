// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/bootstrap/container`
 * Purpose: Composition root; wires concrete adapters to the run-core ports.
 * Scope: All adapter construction lives here. Returns a typed container against port interfaces.
 * Invariants:
 * - Only file that chooses between production and APP_ENV=test adapters
 * - APP_ENV=production fails fast via requireProductionSettings before any client is built
 * - The agent signs votes and attestations with the same key
 * Side-effects: Creates HTTP transports (no connections until first call)
 * Links: packages/run-core/src/ports.ts
 * @internal
 */

import {
  AttestationSigner,
  type Clock,
  systemClock,
} from "@attestor/attestation-core";
import {
  InMemoryAttestationLedger,
  InProcessLedgerCounterClient,
  LedgerCounterContract,
} from "@attestor/ledger-counter";
import {
  type CheckpointStore,
  DEFAULT_RETRY_POLICY,
  type DecisionEngine,
  type ExecutionSurface,
  type ProposalSource,
  RunCoordinator,
  type RunCoordinatorConfig,
} from "@attestor/run-core";
import { type Address, type Hex, http } from "viem";
import { privateKeyToAccount } from "viem/accounts";

import { FileCheckpointStore } from "../adapters/checkpoint/file-checkpoint-store.js";
import { LlmDecisionEngine } from "../adapters/decision/llm-decision-engine.js";
import { LedgerAttestationWriter } from "../adapters/ledger/ledger-attestation-writer.js";
import {
  chainFor,
  ViemLedgerCounterClient,
} from "../adapters/ledger/viem-ledger-counter-client.js";
import {
  SnapshotExecutionSurface,
  SnapshotGraphqlClient,
  SnapshotProposalSource,
} from "../adapters/snapshot/index.js";
import {
  FakeDecisionEngine,
  FakeExecutionSurface,
  FakeProposalSource,
  MemoryCheckpointStore,
} from "../adapters/test/index.js";
import type { Logger } from "../observability/logger.js";
import type { AgentMetrics } from "../observability/metrics.js";
import { type Env, requireProductionSettings } from "./env.js";

/** Placeholder agent key for APP_ENV=test when SIGNER_PRIVATE_KEY is unset. */
const TEST_SIGNER_KEY: Hex =
  "0x1111111111111111111111111111111111111111111111111111111111111111";
const TEST_SCHEMA_UID: Hex =
  "0x2222222222222222222222222222222222222222222222222222222222222222";
const TEST_PROXY_ADDRESS: Address = "0x000000000000000000000000000000000000a77e";
const TEST_LEDGER_ADDRESS: Address = "0x000000000000000000000000000000000000ed6e";

export interface ServiceContainer {
  readonly coordinator: RunCoordinator;
  readonly checkpoints: CheckpointStore;
  readonly signerAddress: Address;
  readonly sourceKeys: readonly string[];
  readonly intervalMs: number;
  readonly metrics: AgentMetrics;
  readonly logger: Logger;
}

interface Collaborators {
  readonly proposals: ProposalSource;
  readonly decisions: DecisionEngine;
  readonly execution: ExecutionSurface;
  readonly attestations: LedgerAttestationWriter;
  readonly checkpoints: CheckpointStore;
  readonly signerAddress: Address;
}

export function coordinatorConfigFrom(config: Env): RunCoordinatorConfig {
  return {
    confidenceThreshold: config.CONFIDENCE_THRESHOLD,
    dryRun: config.DRY_RUN,
    maxItemsPerRun: config.MAX_ITEMS_PER_RUN,
    maxAttestationAttempts: config.MAX_ATTESTATION_ATTEMPTS,
    allowedOrigins: config.ALLOWED_ORIGINS,
    deniedOrigins: config.DENIED_ORIGINS,
    retry: {
      attempts: config.RETRY_ATTEMPTS,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      maxDelayMs: DEFAULT_RETRY_POLICY.maxDelayMs,
    },
  };
}

function productionCollaborators(
  config: Env,
  logger: Logger,
  metrics: AgentMetrics,
  clock: Clock
): Collaborators {
  const settings = requireProductionSettings(config);
  const account = privateKeyToAccount(settings.signerPrivateKey);
  const graphql = new SnapshotGraphqlClient({
    url: config.SNAPSHOT_GRAPHQL_URL,
    timeoutMs: config.SNAPSHOT_TIMEOUT_MS,
  });

  const signer = new AttestationSigner({
    account,
    chainId: config.CHAIN_ID,
    verifyingContract: settings.attestationProxyAddress,
    schemaUid: settings.schemaUid,
    recipient: config.ATTESTATION_RECIPIENT,
    deadlineSeconds: config.ATTESTATION_DEADLINE_SECONDS,
    clock,
  });
  const client = new ViemLedgerCounterClient({
    address: settings.ledgerCounterAddress,
    account,
    chain: chainFor(config.CHAIN_ID, settings.rpcUrl),
    transport: http(settings.rpcUrl),
  });

  return {
    proposals: new SnapshotProposalSource(graphql, logger),
    decisions: new LlmDecisionEngine({
      baseUrl: config.LLM_BASE_URL,
      apiKey: settings.llmApiKey,
      model: config.LLM_MODEL,
      strategy: config.VOTING_STRATEGY,
      timeoutMs: config.LLM_TIMEOUT_MS,
      logger,
    }),
    execution: new SnapshotExecutionSurface({
      account,
      sequencerUrl: config.SNAPSHOT_SEQUENCER_URL,
      graphql,
      clock,
      timeoutMs: config.SNAPSHOT_TIMEOUT_MS,
      logger,
    }),
    attestations: new LedgerAttestationWriter({
      signer,
      client,
      logger,
      metrics,
    }),
    checkpoints: new FileCheckpointStore({
      directory: config.CHECKPOINT_DIR,
      logger,
    }),
    signerAddress: account.address,
  };
}

async function testCollaborators(
  config: Env,
  logger: Logger,
  metrics: AgentMetrics,
  clock: Clock
): Promise<Collaborators> {
  const account = privateKeyToAccount(
    config.SIGNER_PRIVATE_KEY ?? TEST_SIGNER_KEY
  );
  const schemaUid = config.ATTESTATION_SCHEMA_UID ?? TEST_SCHEMA_UID;
  const verifyingContract =
    config.ATTESTATION_PROXY_ADDRESS ?? TEST_PROXY_ADDRESS;

  const ledger = new InMemoryAttestationLedger({
    chainId: config.CHAIN_ID,
    address: verifyingContract,
    registeredSchemas: [schemaUid],
    clock,
  });
  // Agent acts as its own controller so the in-process counter can be activated.
  const contract = new LedgerCounterContract({
    controller: account.address,
    ledger,
    ledgerAddress: TEST_LEDGER_ADDRESS,
  });
  await contract.setActive(account.address, account.address, true);

  const signer = new AttestationSigner({
    account,
    chainId: config.CHAIN_ID,
    verifyingContract,
    schemaUid,
    recipient: config.ATTESTATION_RECIPIENT,
    deadlineSeconds: config.ATTESTATION_DEADLINE_SECONDS,
    clock,
  });

  return {
    proposals: new FakeProposalSource(),
    decisions: new FakeDecisionEngine({ strategy: config.VOTING_STRATEGY }),
    execution: new FakeExecutionSurface(),
    attestations: new LedgerAttestationWriter({
      signer,
      client: new InProcessLedgerCounterClient(contract, account.address),
      logger,
      metrics,
    }),
    checkpoints: new MemoryCheckpointStore(),
    signerAddress: account.address,
  };
}

/**
 * Creates the service container with all dependencies wired.
 * Throws RuntimeConfigError when APP_ENV=production lacks chain or LLM settings.
 */
export async function createContainer(
  config: Env,
  logger: Logger,
  metrics: AgentMetrics,
  clock: Clock = systemClock
): Promise<ServiceContainer> {
  const collaborators =
    config.APP_ENV === "test"
      ? await testCollaborators(config, logger, metrics, clock)
      : productionCollaborators(config, logger, metrics, clock);

  const coordinator = new RunCoordinator(coordinatorConfigFrom(config), {
    proposals: collaborators.proposals,
    decisions: collaborators.decisions,
    execution: collaborators.execution,
    attestations: collaborators.attestations,
    checkpoints: collaborators.checkpoints,
    clock,
    logger,
  });

  return {
    coordinator,
    checkpoints: collaborators.checkpoints,
    signerAddress: collaborators.signerAddress,
    sourceKeys: config.SOURCE_KEYS,
    intervalMs: config.RUN_INTERVAL_MS,
    metrics,
    logger,
  };
}
