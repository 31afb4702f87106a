// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No client construction, no side-effects beyond process.env read.
 * Invariants:
 * - SOURCE_KEYS is required and non-empty
 * - SIGNER_PRIVATE_KEY and LLM_API_KEY are secrets (never log)
 * - APP_ENV=production additionally requires chain and LLM settings (see requireProductionSettings)
 * - Fails fast with clear errors on invalid config
 * Side-effects: Reads process.env
 * @internal
 */

import { type Address, type Hex, isAddress, zeroAddress } from "viem";
import { z } from "zod";

const BYTES32 = /^0x[0-9a-fA-F]{64}$/;

/** Comma-separated list; blanks dropped */
const csv = z
  .string()
  .default("")
  .transform((raw) =>
    raw
      .split(",")
      .map((part) => part.trim())
      .filter(Boolean)
  );

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((raw) => raw === "true" || raw === "1");

const optionalString = z
  .string()
  .min(1)
  .optional()
  .or(z.literal("").transform(() => undefined));

const bytes32 = (name: string) =>
  z
    .string()
    .refine(
      (v): v is Hex => BYTES32.test(v),
      `${name} must be 0x-prefixed 32 bytes`
    );

const address = (name: string) =>
  z
    .string()
    .refine(
      (v): v is Address => isAddress(v),
      `${name} must be a valid address`
    );

const EnvSchema = z.object({
  /** test wires in-process fakes; production requires chain + LLM settings */
  APP_ENV: z.enum(["test", "production"]).default("production"),

  /** Comma-separated source keys (Snapshot space ids), one run each per cycle */
  SOURCE_KEYS: csv.refine((keys) => keys.length > 0, "SOURCE_KEYS is required"),

  RUN_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
  DRY_RUN: flag,
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  MAX_ITEMS_PER_RUN: z.coerce.number().int().positive().default(10),
  ALLOWED_ORIGINS: csv,
  DENIED_ORIGINS: csv,
  VOTING_STRATEGY: z
    .enum(["conservative", "balanced", "aggressive"])
    .default("balanced"),

  CHECKPOINT_DIR: z.string().min(1).default("./data/checkpoints"),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().positive().default(30_000),

  RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  MAX_ATTESTATION_ATTEMPTS: z.coerce.number().int().min(1).default(3),

  /** Agent EOA key (secret - never log) */
  SIGNER_PRIVATE_KEY: bytes32("SIGNER_PRIVATE_KEY")
    .optional()
    .or(z.literal("").transform(() => undefined)),
  CHAIN_ID: z.coerce.number().int().positive().default(8453),
  EVM_RPC_URL: z
    .string()
    .url("EVM_RPC_URL must be a valid URL")
    .optional()
    .or(z.literal("").transform(() => undefined)),
  LEDGER_COUNTER_ADDRESS: address("LEDGER_COUNTER_ADDRESS")
    .optional()
    .or(z.literal("").transform(() => undefined)),
  /** EIP-712 verifying contract of the delegated-attestation proxy */
  ATTESTATION_PROXY_ADDRESS: address("ATTESTATION_PROXY_ADDRESS")
    .optional()
    .or(z.literal("").transform(() => undefined)),
  ATTESTATION_SCHEMA_UID: bytes32("ATTESTATION_SCHEMA_UID")
    .optional()
    .or(z.literal("").transform(() => undefined)),
  ATTESTATION_RECIPIENT: address("ATTESTATION_RECIPIENT").default(zeroAddress),
  ATTESTATION_DEADLINE_SECONDS: z.coerce.number().int().positive().default(3600),

  SNAPSHOT_GRAPHQL_URL: z
    .string()
    .url()
    .default("https://hub.snapshot.org/graphql"),
  SNAPSHOT_SEQUENCER_URL: z.string().url().default("https://seq.snapshot.org/"),
  SNAPSHOT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  LLM_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
  /** LLM provider key (secret - never log) */
  LLM_API_KEY: optionalString,
  LLM_MODEL: z.string().min(1).default("openai/gpt-4o-mini"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: agent-worker) */
  SERVICE_NAME: z.string().default("agent-worker"),

  /** Health endpoint port (default: 9000) */
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).default(9000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Parses an env record. Throws with one line per invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

export class RuntimeConfigError extends Error {
  public readonly code = "RUNTIME_CONFIG_ERROR" as const;
  constructor(public readonly missing: readonly string[]) {
    super(
      `Missing required configuration for APP_ENV=production: ${missing.join(", ")}`
    );
    this.name = "RuntimeConfigError";
  }
}

export function isRuntimeConfigError(
  error: unknown
): error is RuntimeConfigError {
  return error instanceof Error && error.name === "RuntimeConfigError";
}

export interface ProductionSettings {
  readonly signerPrivateKey: Hex;
  readonly rpcUrl: string;
  readonly ledgerCounterAddress: Address;
  readonly attestationProxyAddress: Address;
  readonly schemaUid: Hex;
  readonly llmApiKey: string;
}

/**
 * Cross-field check for production wiring; every missing variable is reported at once.
 */
export function requireProductionSettings(config: Env): ProductionSettings {
  const {
    SIGNER_PRIVATE_KEY: signerPrivateKey,
    EVM_RPC_URL: rpcUrl,
    LEDGER_COUNTER_ADDRESS: ledgerCounterAddress,
    ATTESTATION_PROXY_ADDRESS: attestationProxyAddress,
    ATTESTATION_SCHEMA_UID: schemaUid,
    LLM_API_KEY: llmApiKey,
  } = config;

  if (
    signerPrivateKey &&
    rpcUrl &&
    ledgerCounterAddress &&
    attestationProxyAddress &&
    schemaUid &&
    llmApiKey
  ) {
    return {
      signerPrivateKey,
      rpcUrl,
      ledgerCounterAddress,
      attestationProxyAddress,
      schemaUid,
      llmApiKey,
    };
  }

  const required: ReadonlyArray<readonly [string, unknown]> = [
    ["SIGNER_PRIVATE_KEY", signerPrivateKey],
    ["EVM_RPC_URL", rpcUrl],
    ["LEDGER_COUNTER_ADDRESS", ledgerCounterAddress],
    ["ATTESTATION_PROXY_ADDRESS", attestationProxyAddress],
    ["ATTESTATION_SCHEMA_UID", schemaUid],
    ["LLM_API_KEY", llmApiKey],
  ];
  throw new RuntimeConfigError(
    required.flatMap(([name, value]) => (value ? [] : [name]))
  );
}
