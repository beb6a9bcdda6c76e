/**
 * Response normalizer: the one place where the envelope shape is fixed.
 */

import { InternalConsistencyError } from '../types/errors.js';
import type {
  Outcome,
  ResponseEnvelope,
  StreamEvent,
  TokenUsage,
  ToolError,
} from '../types/models.js';

/**
 * Per-request metadata shared by every outcome.
 */
export interface EnvelopeMeta {
  requestId: string;
  model: string;
  version: string;
  latencyMs: number;
  question: string;
  streamedEvents?: StreamEvent[];
}

export interface EnvelopeFields extends EnvelopeMeta {
  ok: boolean;
  answer: string | null;
  usage: TokenUsage | null;
  error: ToolError | null;
}

/**
 * Build a terminal envelope.
 *
 * @throws InternalConsistencyError when answer and error are both set or
 *   both missing, or `ok` disagrees with the one that is set.
 */
export function buildEnvelope(fields: EnvelopeFields): ResponseEnvelope {
  const hasAnswer = fields.answer !== null;
  const hasError = fields.error !== null;

  if (hasAnswer && hasError) {
    throw new InternalConsistencyError('Envelope cannot carry both an answer and an error');
  }
  if (!hasAnswer && !hasError) {
    throw new InternalConsistencyError('Envelope must carry either an answer or an error');
  }
  if (fields.ok !== hasAnswer) {
    throw new InternalConsistencyError(
      `Envelope ok=${fields.ok} does not match its ${hasAnswer ? 'answer' : 'error'}`
    );
  }

  const envelope: ResponseEnvelope = {
    ok: fields.ok,
    request_id: fields.requestId,
    model: fields.model,
    version: fields.version,
    latency_ms: Math.max(0, Math.floor(fields.latencyMs)),
    question: fields.question,
    answer: fields.answer,
    token_usage: fields.usage,
    error: fields.error,
  };

  if (fields.streamedEvents) {
    envelope.streamed_events = fields.streamedEvents;
  }

  return envelope;
}

/**
 * Convert a pipeline outcome into its envelope.
 */
export function envelopeFromOutcome(outcome: Outcome, meta: EnvelopeMeta): ResponseEnvelope {
  if (outcome.ok) {
    return buildEnvelope({
      ...meta,
      ok: true,
      answer: outcome.answer,
      usage: outcome.usage,
      error: null,
    });
  }

  return buildEnvelope({
    ...meta,
    ok: false,
    answer: null,
    usage: outcome.usage,
    error: outcome.error,
  });
}

/**
 * Envelope for a defect inside the pipeline. Built directly so it cannot
 * fail the way the envelope it replaces did.
 */
export function internalErrorEnvelope(meta: EnvelopeMeta, message: string): ResponseEnvelope {
  return {
    ok: false,
    request_id: meta.requestId,
    model: meta.model,
    version: meta.version,
    latency_ms: Math.max(0, Math.floor(meta.latencyMs)),
    question: meta.question,
    answer: null,
    token_usage: null,
    error: { kind: 'internal_error', message },
  };
}
