// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/lifecycle/logger`
 * Purpose: Structural logger contract used by every package.
 * Scope: Interface only. Packages never construct loggers; the service injects pino.
 * Side-effects: none
 * @public
 */

/**
 * Logger interface expected by packages.
 * Compatible with pino's Logger type.
 */
export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug?(obj: Record<string, unknown>, msg?: string): void;
  child?(bindings: Record<string, unknown>): LoggerLike;
}
