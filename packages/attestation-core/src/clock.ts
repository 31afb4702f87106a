// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/attestation-core/clock`
 * Purpose: Time abstraction for deterministic signing deadlines and checkpoint timestamps.
 * Scope: Interface plus the system implementation. Does not handle timezone conversion.
 * Invariants: Always returns ISO 8601 string format
 * Side-effects: none (interface only)
 * @public
 */

export interface Clock {
  /** Current time as ISO 8601 string */
  now(): string;
}

export const systemClock: Clock = {
  now: () => new Date().toISOString(),
};

/** Whole seconds since epoch for an ISO timestamp. */
export function toUnixSeconds(iso: string): bigint {
  const ms = Date.parse(iso);
  if (Number.isNaN(ms)) {
    throw new Error(`Invalid ISO timestamp: ${iso}`);
  }
  return BigInt(Math.floor(ms / 1000));
}
