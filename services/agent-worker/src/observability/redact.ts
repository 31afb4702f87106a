// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: Imported by logger module
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  "llmApiKey",
  "config.llmApiKey",
  // HTTP headers
  "headers.authorization",
  "req.headers.authorization",
  "request.headers.authorization",
  // Wallet/crypto
  "privateKey",
  "signerPrivateKey",
  "config.signerPrivateKey",
  "mnemonic",
  "seed",
];
