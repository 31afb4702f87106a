// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/decision/llm-decision-engine`
 * Purpose: DecisionEngine backed by an OpenAI-compatible chat completions endpoint.
 * Scope: Prompting, JSON-mode response parsing and mapping to Decision. No side effects beyond the model call.
 * Invariants:
 * - Temperature 0 for repeatable verdicts
 * - A reply that is not the expected JSON object is a permanent failure for that item
 * - strategyApplied records the configured strategy
 * Side-effects: IO (HTTP to the LLM provider)
 * Links: adapters/decision/prompts.ts
 * @public
 */

import { type Decision, VERDICTS } from "@attestor/attestation-core";
import {
  type DecisionEngine,
  fail,
  ok,
  type Outcome,
  type ProposalItem,
} from "@attestor/run-core";
import { z } from "zod";

import { EVENT_NAMES } from "../../observability/events.js";
import type { Logger } from "../../observability/logger.js";
import { postJson } from "../http.js";
import { systemPrompt, userPrompt, type VotingStrategy } from "./prompts.js";

const CompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1),
});

export const ModelVerdictSchema = z.object({
  verdict: z.enum(VERDICTS),
  confidence: z.number().min(0).max(1),
  rationale: z.string().min(1),
});

export interface LlmDecisionEngineConfig {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly model: string;
  readonly strategy: VotingStrategy;
  readonly timeoutMs: number;
  readonly logger: Logger;
}

export class LlmDecisionEngine implements DecisionEngine {
  constructor(private readonly config: LlmDecisionEngineConfig) {}

  async decide(item: ProposalItem): Promise<Outcome<Decision>> {
    const { baseUrl, apiKey, model, strategy, timeoutMs, logger } = this.config;

    const completion = await postJson(
      {
        url: `${baseUrl.replace(/\/$/, "")}/chat/completions`,
        headers: { Authorization: `Bearer ${apiKey}` },
        timeoutMs,
        body: {
          model,
          temperature: 0,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: systemPrompt(strategy) },
            { role: "user", content: userPrompt(item) },
          ],
        },
      },
      CompletionSchema
    );
    if (!completion.ok) {
      logger.warn(
        {
          event: EVENT_NAMES.LLM_CALL_FAILED,
          itemId: item.itemId,
          kind: completion.error.kind,
          reason: completion.error.reason,
        },
        EVENT_NAMES.LLM_CALL_FAILED
      );
      return completion;
    }

    const content = completion.value.choices[0]?.message.content ?? "";
    const parsed = parseModelVerdict(content);
    if (!parsed.ok) {
      logger.warn(
        {
          event: EVENT_NAMES.LLM_RESPONSE_INVALID,
          itemId: item.itemId,
          message: parsed.error.message,
        },
        EVENT_NAMES.LLM_RESPONSE_INVALID
      );
      return parsed;
    }

    return ok({
      itemId: item.itemId,
      verdict: parsed.value.verdict,
      confidence: parsed.value.confidence,
      rationale: parsed.value.rationale,
      strategyApplied: strategy,
    });
  }
}

/**
 * Extracts the verdict object from a model reply, tolerating a fenced code block.
 */
export function parseModelVerdict(
  content: string
): Outcome<z.infer<typeof ModelVerdictSchema>> {
  const unfenced = content
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");

  let json: unknown;
  try {
    json = JSON.parse(unfenced);
  } catch {
    return fail("permanent", "model reply is not JSON", "InvalidModelOutput");
  }

  const parsed = ModelVerdictSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    return fail(
      "permanent",
      issue ? `${issue.path.join(".")}: ${issue.message}` : "unexpected shape",
      "InvalidModelOutput"
    );
  }
  return ok(parsed.data);
}
