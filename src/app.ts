/**
 * Fastify application setup.
 */

import Fastify, { FastifyInstance } from 'fastify';
import type { FastifyError } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { loggerConfig } from './utils/logger.js';
import { toolRoutes } from './routes/tools.js';
import { utilityRoutes } from './routes/utility.js';
import type { UtilityRoutesOptions } from './routes/utility.js';
import type { ToolPipeline } from './services/pipeline.js';
import { LLMError, SQLExecutionError } from './types/errors.js';

export interface AppDependencies extends UtilityRoutesOptions {
  pipeline: ToolPipeline;
}

export interface BuildAppOptions {
  /** Serve Swagger UI at /docs. */
  docs?: boolean;
  logger?: boolean;
}

export async function buildApp(
  deps: AppDependencies,
  options: BuildAppOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger === false ? false : loggerConfig,
  });

  await fastify.register(cors, {
    origin: '*',
  });

  if (options.docs ?? true) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'SQL Agent Tool API',
          description: 'Ask a relational database questions in natural language',
          version: deps.version,
        },
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });
  }

  /**
   * Global error handler. Set before the routes are registered so they
   * inherit it. Tool calls never reach it with expected failures:
   * those are answered with an envelope.
   */
  fastify.setErrorHandler<FastifyError>((error, _request, reply) => {
    if (error instanceof SQLExecutionError) {
      reply.status(500).send({
        error: 'SQLExecutionError',
        message: error.message,
      });
    } else if (error instanceof LLMError) {
      reply.status(502).send({
        error: 'LLMError',
        message: 'Language model service unavailable',
        detail: error.message,
      });
    } else if (error.validation) {
      reply.status(400).send({
        error: 'ValidationError',
        message: error.message,
      });
    } else if (error.statusCode !== undefined && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        error: 'BadRequest',
        message: error.message,
      });
    } else {
      reply.status(500).send({
        error: 'InternalServerError',
        message: error.message || 'An unexpected error occurred',
      });
    }
  });

  await fastify.register(toolRoutes, { pipeline: deps.pipeline });
  await fastify.register(utilityRoutes, deps);

  return fastify;
}
