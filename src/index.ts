/**
 * SQL Agent Tool Server - Main Entry Point
 */

import { config } from './config.js';
import { buildApp } from './app.js';
import { logger } from './utils/logger.js';
import { SqlDatabase } from './services/database.js';
import { initializeModel } from './services/llm.js';
import { ToolPipeline } from './services/pipeline.js';
import { UsageLedger } from './services/pricing.js';
import { createRateLimiter } from './services/rate-limit/index.js';
import { LlmSqlAgent } from './services/sql-agent.js';
import { createToolRequestSchema } from './types/models.js';

const database = SqlDatabase.fromConfig(
  config.KNEX_CONFIG,
  config.DATABASE_LABEL,
  config.ALLOWED_TABLES
);
const languageModel = await initializeModel();
const rateLimiter = createRateLimiter();
const ledger = new UsageLedger();

const agent = new LlmSqlAgent(database, languageModel, {
  modelId: config.LLM_CONFIG.model,
  temperature: config.LLM_CONFIG.temperature,
  timeoutMs: config.LLM_CONFIG.timeoutMs,
  maxRetries: config.LLM_CONFIG.maxRetries,
  maxSteps: config.AGENT_MAX_STEPS,
  defaultLimit: config.DEFAULT_LIMIT,
  maxLimit: config.MAX_LIMIT,
});

const pipeline = new ToolPipeline({
  agent,
  rateLimiter,
  ledger,
  version: config.APP_VERSION,
  schema: createToolRequestSchema({
    maxQuestionLength: config.MAX_QUESTION_LENGTH,
    maxLimit: config.MAX_LIMIT,
  }),
});

const fastify = await buildApp({
  pipeline,
  ledger,
  rateLimiter,
  database,
  model: config.LLM_CONFIG.model,
  version: config.APP_VERSION,
});

/**
 * Lifecycle hooks.
 */
fastify.addHook('onReady', async () => {
  logger.info('Starting SQL agent tool server...');
  try {
    await database.ping();
    logger.info(`Database reachable: ${config.DATABASE_LABEL}`);
  } catch (error) {
    // The agent reports database_error per call until the database is back.
    logger.warn({ err: error }, 'Database not reachable at startup');
  }
});

fastify.addHook('onClose', async () => {
  logger.info('Shutting down SQL agent tool server...');
  await rateLimiter.close();
  await database.close();
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    fastify.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  });
}

/**
 * Start the server.
 */
const start = async () => {
  try {
    await fastify.listen({ port: config.PORT, host: config.HOST });
    logger.info(`Server running at http://localhost:${config.PORT}`);
    logger.info(`API docs at http://localhost:${config.PORT}/docs`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
