/**
 * Type definitions and Zod schemas for the sql_agent tool.
 * Wire-facing shapes use snake_case field names.
 */

import { z } from 'zod';

// ============================================================================
// ERROR TAXONOMY
// ============================================================================

const ERROR_KINDS = [
	'validation_error',
	'rate_limited',
	'database_error',
	'llm_provider_error',
	'planning_error',
	'internal_error',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/**
 * Failure kinds a SQL agent may report. Closed set.
 */
export type AgentFailureKind = Extract<
	ErrorKind,
	'database_error' | 'llm_provider_error' | 'planning_error'
>;

/**
 * Structured error descriptor carried by failed envelopes.
 */
export interface ToolError {
	kind: ErrorKind;
	message: string;
	retry_after_ms?: number;
	suggestions?: string[];
}

// ============================================================================
// REQUEST
// ============================================================================

/**
 * Builds the request schema. Bounds come from configuration.
 */
export function createToolRequestSchema(bounds: {
	maxQuestionLength: number;
	maxLimit: number;
}) {
	return z
		.object({
			question: z
				.string({
					required_error: 'question is required',
					invalid_type_error: 'question must be a string',
				})
				.trim()
				.min(1, 'question must not be empty')
				.max(bounds.maxQuestionLength, `question must be at most ${bounds.maxQuestionLength} characters`)
				.describe('Natural language question'),
			limit: z
				.number()
				.int('limit must be an integer')
				.positive('limit must be a positive integer')
				.max(bounds.maxLimit, `limit must be at most ${bounds.maxLimit}`)
				.optional()
				.describe('Maximum rows the agent may read back from one query'),
			rate_limit: z
				.number()
				.int('rate_limit must be an integer')
				.positive('rate_limit must be a positive integer')
				.optional()
				.describe('Max requests per minute for this client'),
			stream: z
				.boolean()
				.default(false)
				.describe('Collect agent steps in streamed_events'),
			caller_key: z
				.string()
				.trim()
				.min(1)
				.optional()
				.describe('Identity used to bucket rate limits'),
		});
}

export type ToolRequestSchema = ReturnType<typeof createToolRequestSchema>;

/**
 * Validated, immutable request owned by one pipeline invocation.
 */
export type ToolRequest = Readonly<z.infer<ToolRequestSchema>>;

// ============================================================================
// AGENT
// ============================================================================

/**
 * Raw prompt/completion token counts reported by the language model.
 */
export interface UsageCounts {
	readonly promptTokens: number;
	readonly completionTokens: number;
}

/**
 * Output of a successful SQL agent run.
 */
export interface AgentResult extends UsageCounts {
	readonly answer: string;
	/** Last query error the agent recovered from during the run. */
	readonly rawError?: string;
}

/**
 * Single event from an agent run (collected when stream=true).
 */
export interface StreamEvent {
	type: 'action' | 'step' | 'finish';
	tool?: string;
	message: string;
}

// ============================================================================
// RESPONSE
// ============================================================================

export interface TokenUsage {
	prompt_tokens: number;
	completion_tokens: number;
	total_tokens: number;
	total_cost_usd: number;
}

/**
 * The single outward-facing result for every outcome.
 * Exactly one of `answer` and `error` is non-null.
 */
export interface ResponseEnvelope {
	ok: boolean;
	request_id: string;
	model: string;
	version: string;
	latency_ms: number;
	question: string;
	answer: string | null;
	token_usage: TokenUsage | null;
	error: ToolError | null;
	streamed_events?: StreamEvent[];
}

/**
 * Tagged result carried through the pipeline up to the normalizer.
 */
export type Outcome =
	| { readonly ok: true; readonly answer: string; readonly usage: TokenUsage }
	| { readonly ok: false; readonly error: ToolError; readonly usage: TokenUsage | null };
