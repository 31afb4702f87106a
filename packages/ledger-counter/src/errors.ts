// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/ledger-counter/errors`
 * Purpose: Revert error carrying the contract's custom error name, and the error for a forward whose outcome is unknown.
 * Scope: Error definitions and type guards. Does not perform I/O.
 * Invariants:
 * - `reason` is the revert name exactly as the reverting contract reported it; wrappers never rename it.
 * - ForwardUnconfirmedError is only raised after the transaction left the client; it always names that transaction.
 * Side-effects: none
 * @public
 */

/** Revert names raised by the counter itself. */
export const COUNTER_REVERTS = {
  UNAUTHORIZED: "Unauthorized",
  ZERO_ADDRESS: "ZeroAddress",
  COUNTER_OVERFLOW: "CounterOverflow",
} as const;

/** Revert names raised by the underlying attestation ledger. */
export const LEDGER_REVERTS = {
  INVALID_SIGNATURE: "InvalidSignature",
  DEADLINE_EXPIRED: "DeadlineExpired",
  INVALID_SCHEMA: "InvalidSchema",
  USED_SIGNATURE: "UsedSignature",
} as const;

export class ContractRevertError extends Error {
  public readonly code = "CONTRACT_REVERT" as const;
  constructor(
    public readonly reason: string,
    details?: string
  ) {
    super(details ? `Reverted: ${reason} (${details})` : `Reverted: ${reason}`);
    this.name = "ContractRevertError";
  }
}

export function isContractRevertError(
  error: unknown
): error is ContractRevertError {
  return error instanceof Error && error.name === "ContractRevertError";
}

/**
 * The forward was broadcast but its receipt could not be read. The
 * transaction may still land, so it must be looked up, never re-sent.
 */
export class ForwardUnconfirmedError extends Error {
  public readonly code = "FORWARD_UNCONFIRMED" as const;
  constructor(
    public readonly transactionReference: string,
    options?: { cause?: unknown }
  ) {
    super(`Forward ${transactionReference} sent but not confirmed`, options);
    this.name = "ForwardUnconfirmedError";
  }
}

export function isForwardUnconfirmedError(
  error: unknown
): error is ForwardUnconfirmedError {
  return error instanceof Error && error.name === "ForwardUnconfirmedError";
}
