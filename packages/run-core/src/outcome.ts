// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/outcome`
 * Purpose: Result type returned by every collaborator port.
 * Scope: Types and constructors. Does not retry.
 * Invariants:
 * - transient: safe to retry (network, timeout, 429, 5xx).
 * - permanent: retrying cannot help (4xx, malformed response).
 * - rejected: the remote system refused on its own rules (revert, policy); `reason` carries its name unchanged.
 * - unconfirmed: the side effect was sent and may still land; `reference` names it. Never retried blindly.
 * Side-effects: none
 * @public
 */

export type CollaboratorErrorKind =
  | "transient"
  | "permanent"
  | "rejected"
  | "unconfirmed";

export interface CollaboratorError {
  readonly kind: CollaboratorErrorKind;
  readonly message: string;
  readonly reason?: string;
  /** Set for `unconfirmed`: what to look up before trying again */
  readonly reference?: string;
}

export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: CollaboratorError };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: CollaboratorErrorKind,
  message: string,
  reason?: string
): Outcome<T> {
  return {
    ok: false,
    error: reason === undefined ? { kind, message } : { kind, message, reason },
  };
}

export function unconfirmed<T = never>(
  message: string,
  reference: string
): Outcome<T> {
  return { ok: false, error: { kind: "unconfirmed", message, reference } };
}

export function describeError(error: CollaboratorError): string {
  return error.reason ? `${error.reason}: ${error.message}` : error.message;
}
