// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/decision/prompts`
 * Purpose: Strategy-specific system prompts and the per-proposal user prompt.
 * Scope: Pure string construction.
 * Side-effects: none
 * @internal
 */

import type { ProposalItem } from "@attestor/run-core";

export const VOTING_STRATEGIES = [
  "conservative",
  "balanced",
  "aggressive",
] as const;

export type VotingStrategy = (typeof VOTING_STRATEGIES)[number];

const STRATEGY_GUIDANCE: Record<VotingStrategy, string> = {
  conservative: [
    "You are a conservative governance voter. Prioritize treasury protection,",
    "minimal risk and proven track records. Reject proposals with high risk or unproven teams.",
  ].join(" "),
  balanced: [
    "You are a balanced governance voter. Weigh risk against reward,",
    "community benefit and long-term sustainability.",
  ].join(" "),
  aggressive: [
    "You are a growth-oriented governance voter. Favor innovation, experimentation",
    "and new initiatives. Approve proposals that could drive growth.",
  ].join(" "),
};

const RESPONSE_CONTRACT = [
  "Answer with a single JSON object and nothing else:",
  '{"verdict": "approve" | "reject" | "abstain" | "no_action", "confidence": number between 0 and 1, "rationale": string}.',
  'Use "no_action" when the proposal is out of scope or cannot be judged.',
].join(" ");

/** Proposal bodies beyond this are truncated before prompting. */
export const MAX_BODY_CHARS = 8_000;

export function systemPrompt(strategy: VotingStrategy): string {
  return `${STRATEGY_GUIDANCE[strategy]}\n\n${RESPONSE_CONTRACT}`;
}

function text(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function userPrompt(item: ProposalItem): string {
  const { title, body, choices } = item.payload;
  const choiceList = Array.isArray(choices)
    ? choices.filter((c): c is string => typeof c === "string").join(", ")
    : "";
  const fullBody = text(body);
  const shownBody =
    fullBody.length > MAX_BODY_CHARS
      ? `${fullBody.slice(0, MAX_BODY_CHARS)}\n[truncated]`
      : fullBody;

  return [
    `Proposal ${item.itemId}`,
    `Title: ${text(title)}`,
    `Author: ${item.origin}`,
    choiceList ? `Choices: ${choiceList}` : null,
    "",
    shownBody,
  ]
    .filter((line): line is string => line !== null)
    .join("\n");
}
