/**
 * Tool invocation pipeline tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { ToolPipeline } from '../../services/pipeline.js';
import { UsageLedger } from '../../services/pricing.js';
import { MemoryRateLimitStore, RateLimiter } from '../../services/rate-limit/index.js';
import type { Admission, RateLimitStore } from '../../services/rate-limit/index.js';
import type { AgentInvokeOptions, SqlAgent } from '../../services/sql-agent.js';
import { RequestCancelledError, SqlAgentError } from '../../types/errors.js';
import { createToolRequestSchema } from '../../types/models.js';
import type { AgentResult } from '../../types/models.js';

type AgentBehaviour = (question: string, options: AgentInvokeOptions) => Promise<AgentResult>;

// Admissions stay pending until the test settles them.
class DeferredStore implements RateLimitStore {
  readonly pending: Array<(admission: Admission) => void> = [];

  admit(): Promise<Admission> {
    return new Promise((resolve) => this.pending.push(resolve));
  }

  async close(): Promise<void> {}

  getType(): string {
    return 'deferred';
  }
}

class FakeAgent implements SqlAgent {
  readonly model = 'gpt-4o-mini';
  readonly calls: Array<{ question: string; options: AgentInvokeOptions }> = [];

  constructor(private readonly behaviour: AgentBehaviour) {}

  invoke(question: string, options: AgentInvokeOptions = {}): Promise<AgentResult> {
    this.calls.push({ question, options });
    return this.behaviour(question, options);
  }
}

describe('ToolPipeline', () => {
  let clock: number;
  let storeClock: number;
  let store: MemoryRateLimitStore;
  let ledger: UsageLedger;
  let ids: number;

  const answering = (answer: string, promptTokens = 100, completionTokens = 20): AgentBehaviour =>
    async () => {
      clock += 250;
      return { answer, promptTokens, completionTokens };
    };

  function createPipeline(agent: SqlAgent, options: { generateId?: () => string } = {}): ToolPipeline {
    return new ToolPipeline({
      agent,
      rateLimiter: new RateLimiter(store, 60),
      schema: createToolRequestSchema({ maxQuestionLength: 200, maxLimit: 100 }),
      version: 'v:test',
      ledger,
      logger: pino({ level: 'silent' }),
      now: () => clock,
      generateId: options.generateId ?? (() => `req-${++ids}`),
    });
  }

  beforeEach(() => {
    clock = 1_000;
    storeClock = 0;
    ids = 0;
    store = new MemoryRateLimitStore({ idleWindows: 5, now: () => storeClock });
    ledger = new UsageLedger();
  });

  describe('successful calls', () => {
    it('should return an answer envelope with accounted usage', async () => {
      const agent = new FakeAgent(answering('There are 3 customers.'));
      const pipeline = createPipeline(agent);

      const envelope = await pipeline.invoke({ question: 'How many customers are there?' });

      expect(envelope.ok).toBe(true);
      expect(envelope.request_id).toBe('req-1');
      expect(envelope.model).toBe('gpt-4o-mini');
      expect(envelope.version).toBe('v:test');
      expect(envelope.latency_ms).toBe(250);
      expect(envelope.question).toBe('How many customers are there?');
      expect(envelope.answer).toBe('There are 3 customers.');
      expect(envelope.error).toBeNull();
      expect(envelope.token_usage?.prompt_tokens).toBe(100);
      expect(envelope.token_usage?.completion_tokens).toBe(20);
      expect(envelope.token_usage?.total_tokens).toBe(120);
      expect(envelope.token_usage?.total_cost_usd).toBeCloseTo(0.000027, 12);
      expect(envelope.streamed_events).toBeUndefined();
    });

    it('should mint a distinct request id per call', async () => {
      const pipeline = createPipeline(new FakeAgent(answering('ok')), {});
      const defaultIds = new ToolPipeline({
        agent: new FakeAgent(answering('ok')),
        rateLimiter: new RateLimiter(store, 60),
        schema: createToolRequestSchema({ maxQuestionLength: 200, maxLimit: 100 }),
        version: 'v:test',
        logger: pino({ level: 'silent' }),
      });

      const first = await pipeline.invoke({ question: 'a' });
      const second = await pipeline.invoke({ question: 'a' });
      const third = await defaultIds.invoke({ question: 'a' });
      const fourth = await defaultIds.invoke({ question: 'a' });

      expect(first.request_id).toBe('req-1');
      expect(second.request_id).toBe('req-2');
      expect(third.request_id).not.toBe(fourth.request_id);
    });

    it('should trim the question and pass the row limit through', async () => {
      const agent = new FakeAgent(answering('Five rows.'));
      const pipeline = createPipeline(agent);

      const envelope = await pipeline.invoke({ question: '  List five orders  ', limit: 5 });

      expect(envelope.question).toBe('List five orders');
      expect(agent.calls).toHaveLength(1);
      expect(agent.calls[0]?.question).toBe('List five orders');
      expect(agent.calls[0]?.options.rowLimit).toBe(5);
      expect(agent.calls[0]?.options.onEvent).toBeUndefined();
    });

    it('should ignore unknown fields', async () => {
      const pipeline = createPipeline(new FakeAgent(answering('ok')));

      const envelope = await pipeline.invoke({ question: 'q', verbose: true });

      expect(envelope.ok).toBe(true);
    });

    it('should collect streamed events when stream is set', async () => {
      const agent = new FakeAgent(async (_question, options) => {
        options.onEvent?.({
          type: 'action',
          tool: 'sql_db_list_tables',
          message: 'Calling tool: sql_db_list_tables',
        });
        options.onEvent?.({ type: 'finish', message: 'Done' });
        return { answer: 'done', promptTokens: 1, completionTokens: 1 };
      });
      const pipeline = createPipeline(agent);

      const envelope = await pipeline.invoke({ question: 'q', stream: true });

      expect(envelope.streamed_events).toEqual([
        { type: 'action', tool: 'sql_db_list_tables', message: 'Calling tool: sql_db_list_tables' },
        { type: 'finish', message: 'Done' },
      ]);
    });
  });

  describe('validation', () => {
    it('should reject an empty question without calling the agent', async () => {
      const agent = new FakeAgent(answering('never'));
      const pipeline = createPipeline(agent);

      const envelope = await pipeline.invoke({ question: '   ' });

      expect(envelope).toEqual({
        ok: false,
        request_id: 'req-1',
        model: 'gpt-4o-mini',
        version: 'v:test',
        latency_ms: 0,
        question: '   ',
        answer: null,
        token_usage: null,
        error: { kind: 'validation_error', message: 'question: question must not be empty' },
      });
      expect(agent.calls).toHaveLength(0);
    });

    it('should reject a missing question', async () => {
      const envelope = await createPipeline(new FakeAgent(answering('never'))).invoke({});

      expect(envelope.error).toEqual({ kind: 'validation_error', message: 'question: question is required' });
      expect(envelope.question).toBe('');
    });

    it('should reject input that is not an object', async () => {
      const envelope = await createPipeline(new FakeAgent(answering('never'))).invoke('hello');

      expect(envelope.error).toEqual({
        kind: 'validation_error',
        message: 'input: Expected object, received string',
      });
    });

    it('should reject out of range limits', async () => {
      const pipeline = createPipeline(new FakeAgent(answering('never')));

      const zero = await pipeline.invoke({ question: 'q', limit: 0 });
      const fractional = await pipeline.invoke({ question: 'q', limit: 1.5 });
      const tooLarge = await pipeline.invoke({ question: 'q', limit: 101 });

      expect(zero.error?.message).toBe('limit: limit must be a positive integer');
      expect(fractional.error?.message).toBe('limit: limit must be an integer');
      expect(tooLarge.error?.message).toBe('limit: limit must be at most 100');
    });

    it('should not consume rate limit quota', async () => {
      const pipeline = createPipeline(new FakeAgent(answering('never')));

      await pipeline.invoke({ question: '', caller_key: 'client-a' });

      expect(store.peek('client-a')).toBeUndefined();
    });
  });

  describe('rate limiting', () => {
    it('should reject the second call within a window of one', async () => {
      const agent = new FakeAgent(answering('ok'));
      const pipeline = createPipeline(agent);

      const first = await pipeline.invoke({ question: 'q', rate_limit: 1, caller_key: 'client-a' });
      storeClock = 15_000;
      const second = await pipeline.invoke({ question: 'q', rate_limit: 1, caller_key: 'client-a' });

      expect(first.ok).toBe(true);
      expect(second.ok).toBe(false);
      expect(second.error).toEqual({
        kind: 'rate_limited',
        message: 'Rate limit exceeded',
        retry_after_ms: 45_000,
      });
      expect(second.token_usage).toBeNull();
      expect(agent.calls).toHaveLength(1);
    });

    it('should bucket callers separately', async () => {
      const pipeline = createPipeline(new FakeAgent(answering('ok')));

      await pipeline.invoke({ question: 'q', rate_limit: 1, caller_key: 'client-a' });
      const other = await pipeline.invoke({ question: 'q', rate_limit: 1, caller_key: 'client-b' });

      expect(other.ok).toBe(true);
    });

    it('should share one bucket between anonymous callers', async () => {
      const pipeline = createPipeline(new FakeAgent(answering('ok')));

      await pipeline.invoke({ question: 'q' });
      await pipeline.invoke({ question: 'q' });

      expect(store.peek('global')?.count).toBe(2);
    });
  });

  describe('agent failures', () => {
    it('should report database errors without usage when the model never ran', async () => {
      const pipeline = createPipeline(
        new FakeAgent(async () => {
          throw new SqlAgentError('database_error', 'Database unreachable: connect ECONNREFUSED');
        })
      );

      const envelope = await pipeline.invoke({ question: 'q' });

      expect(envelope.ok).toBe(false);
      expect(envelope.answer).toBeNull();
      expect(envelope.token_usage).toBeNull();
      expect(envelope.error?.kind).toBe('database_error');
      expect(envelope.error?.message).toBe('Database unreachable: connect ECONNREFUSED');
      expect(envelope.error?.suggestions).toEqual([
        'Verify the database is reachable and the credentials are valid',
        'Ask about tables and columns that exist in the database',
      ]);
    });

    it('should account the partial usage of a failed run', async () => {
      const pipeline = createPipeline(
        new FakeAgent(async () => {
          throw new SqlAgentError('llm_provider_error', 'Language model request timed out', {
            usage: { promptTokens: 50, completionTokens: 0 },
          });
        })
      );

      const envelope = await pipeline.invoke({ question: 'q' });

      expect(envelope.error?.kind).toBe('llm_provider_error');
      expect(envelope.token_usage?.prompt_tokens).toBe(50);
      expect(envelope.token_usage?.completion_tokens).toBe(0);
      expect(envelope.token_usage?.total_tokens).toBe(50);
      expect(envelope.token_usage?.total_cost_usd).toBeCloseTo(0.0000075, 12);
    });

    it('should pass planning errors through', async () => {
      const pipeline = createPipeline(
        new FakeAgent(async () => {
          throw new SqlAgentError('planning_error', 'The agent produced an invalid plan: bad tool', {
            usage: { promptTokens: 10, completionTokens: 5 },
          });
        })
      );

      const envelope = await pipeline.invoke({ question: 'q' });

      expect(envelope.error?.kind).toBe('planning_error');
      expect(envelope.error?.message).toBe('The agent produced an invalid plan: bad tool');
    });

    it('should map unexpected failures to internal_error', async () => {
      const pipeline = createPipeline(
        new FakeAgent(async () => {
          throw new TypeError('cannot read properties of undefined');
        })
      );

      const envelope = await pipeline.invoke({ question: 'q' });

      expect(envelope.ok).toBe(false);
      expect(envelope.token_usage).toBeNull();
      expect(envelope.error).toEqual({
        kind: 'internal_error',
        message: 'An unexpected internal error occurred',
      });
    });
  });

  describe('cancellation', () => {
    it('should throw when the signal is already aborted', async () => {
      const agent = new FakeAgent(answering('never'));
      const controller = new AbortController();
      controller.abort();

      await expect(
        createPipeline(agent).invoke({ question: 'q' }, { signal: controller.signal })
      ).rejects.toBeInstanceOf(RequestCancelledError);
      expect(agent.calls).toHaveLength(0);
      expect(ledger.snapshot().requests).toBe(0);
    });

    it('should stop waiting on the agent once the caller goes away', async () => {
      const controller = new AbortController();
      const agent = new FakeAgent((_question, options) => {
        expect(options.signal).toBe(controller.signal);
        controller.abort();
        return new Promise<AgentResult>(() => undefined);
      });
      const pipeline = createPipeline(agent);

      await expect(
        pipeline.invoke({ question: 'q', caller_key: 'client-a' }, { signal: controller.signal })
      ).rejects.toThrow('Request req-1 was cancelled by the caller');
      expect(store.peek('client-a')?.count).toBe(1);
      expect(ledger.snapshot().requests).toBe(0);
    });
  });

  describe('cancellation during admission', () => {
    function createDeferredPipeline(agent: SqlAgent, deferred: DeferredStore): ToolPipeline {
      return new ToolPipeline({
        agent,
        rateLimiter: new RateLimiter(deferred, 60),
        schema: createToolRequestSchema({ maxQuestionLength: 200, maxLimit: 100 }),
        version: 'v:test',
        ledger,
        logger: pino({ level: 'silent' }),
        now: () => clock,
        generateId: () => `req-${++ids}`,
      });
    }

    it('should not return a rate_limited envelope after the caller went away', async () => {
      const deferred = new DeferredStore();
      const controller = new AbortController();
      const pending = createDeferredPipeline(new FakeAgent(answering('never')), deferred).invoke(
        { question: 'q' },
        { signal: controller.signal }
      );

      controller.abort();
      deferred.pending[0]?.({ admitted: false, count: 1, retryAfterMs: 30_000 });

      await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
      expect(ledger.snapshot().requests).toBe(0);
    });

    it('should not start the agent once the caller went away', async () => {
      const deferred = new DeferredStore();
      const controller = new AbortController();
      const agent = new FakeAgent(answering('never'));
      const pending = createDeferredPipeline(agent, deferred).invoke(
        { question: 'q' },
        { signal: controller.signal }
      );

      controller.abort();
      deferred.pending[0]?.({ admitted: true, count: 1, remaining: 59 });

      await expect(pending).rejects.toBeInstanceOf(RequestCancelledError);
      expect(agent.calls).toHaveLength(0);
    });
  });

  describe('request ids', () => {
    it('should mint distinct ids for failing calls', async () => {
      const pipeline = new ToolPipeline({
        agent: new FakeAgent(answering('never')),
        rateLimiter: new RateLimiter(store, 60),
        schema: createToolRequestSchema({ maxQuestionLength: 200, maxLimit: 100 }),
        version: 'v:test',
        logger: pino({ level: 'silent' }),
      });

      const first = await pipeline.invoke({ question: '' });
      const second = await pipeline.invoke({ question: '' });

      expect(first.error?.kind).toBe('validation_error');
      expect(second.error?.kind).toBe('validation_error');
      expect(first.request_id).not.toBe(second.request_id);
    });
  });

  describe('usage ledger', () => {
    it('should record every envelope returned', async () => {
      const pipeline = createPipeline(new FakeAgent(answering('ok')));

      await pipeline.invoke({ question: 'q' });
      await pipeline.invoke({ question: '' });

      const stats = ledger.snapshot();
      expect(stats.requests).toBe(2);
      expect(stats.succeeded).toBe(1);
      expect(stats.failed).toEqual({ validation_error: 1 });
      expect(stats.total_tokens).toBe(120);
      expect(stats.total_latency_ms).toBe(250);
    });
  });
});
