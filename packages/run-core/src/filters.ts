// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/run-core/filters`
 * Purpose: Origin allow/deny filtering and the per-run cap, applied before any decision call.
 * Scope: Pure selection. Does not mark filtered items completed; they are reconsidered next run.
 * Invariants:
 * - Deny wins over allow.
 * - Empty allow list admits every origin not denied.
 * - Origins compare case-insensitively (addresses).
 * - Feed order is preserved; the cap keeps the first maxItems survivors.
 * Side-effects: none
 * @public
 */

import type { FilteredItem, ProposalItem } from "./model";

export interface OriginFilterConfig {
  readonly allowedOrigins: readonly string[];
  readonly deniedOrigins: readonly string[];
  readonly maxItemsPerRun: number;
}

export interface FilterResult {
  readonly selected: readonly ProposalItem[];
  readonly filtered: readonly FilteredItem[];
}

export type OriginRejection = Exclude<FilteredItem["reason"], "over_run_cap">;

/** Allow/deny verdict for one origin; the run cap does not apply. */
export function originRejection(
  origin: string,
  config: Pick<OriginFilterConfig, "allowedOrigins" | "deniedOrigins">
): OriginRejection | null {
  const normalized = origin.toLowerCase();
  if (config.deniedOrigins.some((o) => o.toLowerCase() === normalized)) {
    return "denied_origin";
  }
  if (
    config.allowedOrigins.length > 0 &&
    !config.allowedOrigins.some((o) => o.toLowerCase() === normalized)
  ) {
    return "origin_not_allowed";
  }
  return null;
}

export function applyOriginFilters(
  items: readonly ProposalItem[],
  config: OriginFilterConfig
): FilterResult {
  const selected: ProposalItem[] = [];
  const filtered: FilteredItem[] = [];

  for (const item of items) {
    const rejection = originRejection(item.origin, config);
    if (rejection) {
      filtered.push({ itemId: item.itemId, reason: rejection });
    } else if (selected.length >= config.maxItemsPerRun) {
      filtered.push({ itemId: item.itemId, reason: "over_run_cap" });
    } else {
      selected.push(item);
    }
  }

  return { selected, filtered };
}
