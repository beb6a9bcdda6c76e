/**
 * Utility endpoints (health, stats).
 */

import { FastifyInstance } from 'fastify';
import type { UsageLedger } from '../services/pricing.js';
import type { RateLimiter } from '../services/rate-limit/index.js';

export interface UtilityRoutesOptions {
  ledger: UsageLedger;
  rateLimiter: RateLimiter;
  database: { readonly label: string; ping(): Promise<void> };
  model: string;
  version: string;
}

export async function utilityRoutes(fastify: FastifyInstance, options: UtilityRoutesOptions) {
  const { ledger, rateLimiter, database, model, version } = options;

  // GET /stats - Usage totals since process start
  fastify.get('/stats', async () => {
    return {
      usage: ledger.snapshot(),
      rate_limit_store: rateLimiter.getStoreType(),
    };
  });

  // GET /health - Health check
  fastify.get('/health', async (_request, reply) => {
    let databaseStatus: 'connected' | 'disconnected' = 'connected';
    try {
      await database.ping();
    } catch (error) {
      fastify.log.warn({ err: error }, 'Health check could not reach the database');
      databaseStatus = 'disconnected';
    }

    return reply.status(databaseStatus === 'connected' ? 200 : 503).send({
      status: databaseStatus === 'connected' ? 'ok' : 'error',
      version,
      model,
      database: {
        name: database.label,
        status: databaseStatus,
      },
    });
  });

  // GET / - Root endpoint
  fastify.get('/', async () => {
    return {
      name: 'SQL Agent Tool',
      version,
      description: 'Ask a relational database questions in natural language',
      tools: ['sql_agent'],
      docs: '/docs',
    };
  });
}
