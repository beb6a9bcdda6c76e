/**
 * Tool invocation pipeline for the sql_agent tool.
 *
 * Received -> Validated -> RateChecked -> AgentInvoked -> Accounted -> Normalized.
 * Any state may jump straight to Normalized with a classified error, so every
 * call ends in exactly one envelope (or RequestCancelledError when the caller
 * went away).
 */

import { randomUUID } from 'crypto';
import type { ZodError } from 'zod';
import { RequestCancelledError, SqlAgentError } from '../types/errors.js';
import type {
  AgentResult,
  Outcome,
  ResponseEnvelope,
  StreamEvent,
  ToolRequest,
  ToolRequestSchema,
  UsageCounts,
  TokenUsage,
} from '../types/models.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { envelopeFromOutcome, internalErrorEnvelope } from './normalizer.js';
import type { EnvelopeMeta } from './normalizer.js';
import { PRICING, account } from './pricing.js';
import type { ModelPricing, UsageLedger } from './pricing.js';
import type { RateLimiter } from './rate-limit/index.js';
import type { SqlAgent } from './sql-agent.js';

export interface ToolPipelineOptions {
  agent: SqlAgent;
  rateLimiter: RateLimiter;
  schema: ToolRequestSchema;
  version: string;
  ledger?: UsageLedger;
  pricing?: Readonly<Record<string, ModelPricing>>;
  logger?: Logger;
  now?: () => number;
  generateId?: () => string;
}

export interface InvokeOptions {
  /** Aborted by the transport when the caller cancels or times out. */
  signal?: AbortSignal;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'input'}: ${issue.message}`)
    .join('; ');
}

function questionOf(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'question' in input) {
    return typeof input.question === 'string' ? input.question : '';
  }
  return '';
}

/**
 * Start `work` unless `signal` has already aborted, and stop waiting on it
 * once `signal` aborts. Started work is left to settle on its own.
 */
function raceAbort<T>(work: () => Promise<T>, signal: AbortSignal | undefined, requestId: string): Promise<T> {
  if (!signal) {
    return work();
  }
  if (signal.aborted) {
    return Promise.reject(new RequestCancelledError(requestId));
  }

  const promise = work();
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RequestCancelledError(requestId));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class ToolPipeline {
  private readonly agent: SqlAgent;
  private readonly rateLimiter: RateLimiter;
  private readonly schema: ToolRequestSchema;
  private readonly version: string;
  private readonly ledger?: UsageLedger;
  private readonly pricing: Readonly<Record<string, ModelPricing>>;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: ToolPipelineOptions) {
    this.agent = options.agent;
    this.rateLimiter = options.rateLimiter;
    this.schema = options.schema;
    this.version = options.version;
    this.ledger = options.ledger;
    this.pricing = options.pricing ?? PRICING;
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => performance.now());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Run one sql_agent call from deserialized input to envelope.
   *
   * @throws RequestCancelledError if `options.signal` aborts before the
   *   envelope is built. Nothing else escapes.
   */
  async invoke(input: unknown, options: InvokeOptions = {}): Promise<ResponseEnvelope> {
    const requestId = this.generateId();
    const model = this.agent.model;
    const log = this.logger.child({ request_id: requestId });

    const parsed = this.schema.safeParse(input);
    if (!parsed.success) {
      const message = formatIssues(parsed.error);
      log.info({ reason: message }, 'Rejected invalid sql_agent request');
      return this.finish(
        log,
        { ok: false, error: { kind: 'validation_error', message }, usage: null },
        { requestId, model, version: this.version, latencyMs: 0, question: questionOf(input) }
      );
    }

    const request: ToolRequest = Object.freeze(parsed.data);
    const startedAt = this.now();
    const events: StreamEvent[] | undefined = request.stream ? [] : undefined;
    const meta = (): EnvelopeMeta => ({
      requestId,
      model,
      version: this.version,
      latencyMs: this.now() - startedAt,
      question: request.question,
      ...(events ? { streamedEvents: events } : {}),
    });

    try {
      if (options.signal?.aborted) {
        throw new RequestCancelledError(requestId);
      }

      const admission = await this.rateLimiter.admit(request.caller_key, request.rate_limit);
      if (options.signal?.aborted) {
        throw new RequestCancelledError(requestId);
      }
      if (!admission.admitted) {
        log.info({ retry_after_ms: admission.retryAfterMs }, 'Rate limit exceeded');
        return this.finish(
          log,
          {
            ok: false,
            error: {
              kind: 'rate_limited',
              message: 'Rate limit exceeded',
              retry_after_ms: admission.retryAfterMs,
            },
            usage: null,
          },
          meta()
        );
      }

      const outcome = await this.runAgent(request, events, options.signal, requestId, log);
      return this.finish(log, outcome, meta());
    } catch (error) {
      if (error instanceof RequestCancelledError) {
        log.info('Request cancelled by caller');
        throw error;
      }
      log.error({ err: error }, 'Unexpected failure in tool pipeline');
      return this.record(internalErrorEnvelope(meta(), 'An unexpected internal error occurred'));
    }
  }

  private async runAgent(
    request: ToolRequest,
    events: StreamEvent[] | undefined,
    signal: AbortSignal | undefined,
    requestId: string,
    log: Logger
  ): Promise<Outcome> {
    let result: AgentResult;
    try {
      result = await raceAbort(
        () =>
          this.agent.invoke(request.question, {
            rowLimit: request.limit,
            signal,
            onEvent: events ? (event) => events.push(event) : undefined,
          }),
        signal,
        requestId
      );
    } catch (error) {
      if (!(error instanceof SqlAgentError)) {
        throw error;
      }
      log.warn({ kind: error.kind, err: error }, 'SQL agent failed');
      return {
        ok: false,
        error: { kind: error.kind, message: error.detail, suggestions: error.suggestions },
        usage: error.usage ? this.account(error.usage) : null,
      };
    }

    if (result.rawError) {
      log.debug({ raw_error: result.rawError }, 'SQL agent recovered from a query error');
    }

    return { ok: true, answer: result.answer, usage: this.account(result) };
  }

  private account(counts: UsageCounts): TokenUsage {
    return account(counts.promptTokens, counts.completionTokens, this.agent.model, this.pricing);
  }

  private finish(log: Logger, outcome: Outcome, meta: EnvelopeMeta): ResponseEnvelope {
    let envelope: ResponseEnvelope;
    try {
      envelope = envelopeFromOutcome(outcome, meta);
    } catch (error) {
      log.error({ err: error }, 'Failed to build response envelope');
      envelope = internalErrorEnvelope(
        meta,
        error instanceof Error ? error.message : 'Failed to build response envelope'
      );
    }

    if (envelope.ok) {
      log.info(
        { latency_ms: envelope.latency_ms, total_tokens: envelope.token_usage?.total_tokens },
        'sql_agent completed'
      );
    }
    return this.record(envelope);
  }

  private record(envelope: ResponseEnvelope): ResponseEnvelope {
    this.ledger?.record(envelope);
    return envelope;
  }
}
