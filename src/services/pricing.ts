/**
 * Usage accounting: token cost from a static price table, plus running
 * totals for the /stats endpoint.
 */

import type { ErrorKind, ResponseEnvelope, TokenUsage } from '../types/models.js';

export interface ModelPricing {
  /** USD per million prompt tokens */
  inputPerMTokens: number;
  /** USD per million completion tokens */
  outputPerMTokens: number;
}

export const PRICING: Readonly<Record<string, ModelPricing>> = Object.freeze({
  'gpt-4o': { inputPerMTokens: 2.5, outputPerMTokens: 10 },
  'gpt-4o-mini': { inputPerMTokens: 0.15, outputPerMTokens: 0.6 },
  'gpt-4.1': { inputPerMTokens: 2, outputPerMTokens: 8 },
  'gpt-4.1-mini': { inputPerMTokens: 0.4, outputPerMTokens: 1.6 },
  'gpt-4.1-nano': { inputPerMTokens: 0.1, outputPerMTokens: 0.4 },
  'o3-mini': { inputPerMTokens: 1.1, outputPerMTokens: 4.4 },
  'claude-sonnet-4-5': { inputPerMTokens: 3, outputPerMTokens: 15 },
  'claude-haiku-4-5': { inputPerMTokens: 1, outputPerMTokens: 5 },
  'claude-opus-4-1': { inputPerMTokens: 15, outputPerMTokens: 75 },
});

/**
 * Resolve pricing for a model id. Dated snapshots such as
 * `gpt-4o-mini-2024-07-18` resolve to the longest priced prefix.
 */
export function getModelPricing(
  model: string,
  table: Readonly<Record<string, ModelPricing>> = PRICING
): ModelPricing | undefined {
  const exact = table[model];
  if (exact) {
    return exact;
  }

  let match: string | undefined;
  for (const name of Object.keys(table)) {
    if (model.startsWith(`${name}-`) && (!match || name.length > match.length)) {
      match = name;
    }
  }
  return match ? table[match] : undefined;
}

/**
 * Compute token totals and cost. Unknown models cost 0.
 */
export function account(
  promptTokens: number,
  completionTokens: number,
  model: string,
  table: Readonly<Record<string, ModelPricing>> = PRICING
): TokenUsage {
  const pricing = getModelPricing(model, table);
  const cost = pricing
    ? (promptTokens * pricing.inputPerMTokens + completionTokens * pricing.outputPerMTokens) / 1_000_000
    : 0;

  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: promptTokens + completionTokens,
    total_cost_usd: cost,
  };
}

export interface UsageStats {
  requests: number;
  succeeded: number;
  failed: Partial<Record<ErrorKind, number>>;
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  total_cost_usd: number;
  total_latency_ms: number;
  average_latency_ms: number;
}

/**
 * Process-wide running totals over every envelope the pipeline returns.
 */
export class UsageLedger {
  private requests = 0;
  private succeeded = 0;
  private failed: Partial<Record<ErrorKind, number>> = {};
  private promptTokens = 0;
  private completionTokens = 0;
  private costUsd = 0;
  private latencyMs = 0;

  record(envelope: ResponseEnvelope): void {
    this.requests += 1;
    this.latencyMs += envelope.latency_ms;

    if (envelope.ok) {
      this.succeeded += 1;
    } else if (envelope.error) {
      const kind = envelope.error.kind;
      this.failed[kind] = (this.failed[kind] ?? 0) + 1;
    }

    if (envelope.token_usage) {
      this.promptTokens += envelope.token_usage.prompt_tokens;
      this.completionTokens += envelope.token_usage.completion_tokens;
      this.costUsd += envelope.token_usage.total_cost_usd;
    }
  }

  snapshot(): UsageStats {
    return {
      requests: this.requests,
      succeeded: this.succeeded,
      failed: { ...this.failed },
      prompt_tokens: this.promptTokens,
      completion_tokens: this.completionTokens,
      total_tokens: this.promptTokens + this.completionTokens,
      total_cost_usd: this.costUsd,
      total_latency_ms: this.latencyMs,
      average_latency_ms: this.requests > 0 ? this.latencyMs / this.requests : 0,
    };
  }
}
