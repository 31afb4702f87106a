// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/ledger-counter/packing`
 * Purpose: The only mask/shift site for the 256-bit per-signer counter word.
 * Scope: Pure bigint arithmetic. Does not hold state.
 * Invariants:
 * - Bit 255 is the active flag; bits 0..254 are the attestation count.
 * - withActive never changes the count; incrementCount never changes the flag.
 * - incrementCount throws at MAX_COUNT rather than wrapping into the flag bit.
 * Side-effects: none
 * @public
 */

export const ACTIVE_BIT = 1n << 255n;
export const COUNT_MASK = ACTIVE_BIT - 1n;
export const MAX_COUNT = COUNT_MASK;
export const WORD_MAX = (1n << 256n) - 1n;

export interface CounterInfo {
  readonly active: boolean;
  readonly count: bigint;
}

export class CounterOverflowError extends Error {
  public readonly code = "COUNTER_OVERFLOW" as const;
  constructor() {
    super("Attestation counter would overflow into the active flag");
    this.name = "CounterOverflowError";
  }
}

export function pack(active: boolean, count: bigint): bigint {
  if (count < 0n || count > MAX_COUNT) {
    throw new RangeError(`Count out of range: ${count}`);
  }
  return (active ? ACTIVE_BIT : 0n) | count;
}

export function unpack(word: bigint): CounterInfo {
  if (word < 0n || word > WORD_MAX) {
    throw new RangeError(`Word out of range: ${word}`);
  }
  return { active: (word & ACTIVE_BIT) !== 0n, count: word & COUNT_MASK };
}

export function withActive(word: bigint, active: boolean): bigint {
  return pack(active, unpack(word).count);
}

export function incrementCount(word: bigint): bigint {
  const { active, count } = unpack(word);
  if (count === MAX_COUNT) {
    throw new CounterOverflowError();
  }
  return pack(active, count + 1n);
}
