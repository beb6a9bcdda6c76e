/**
 * Tool endpoint for natural language database questions.
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { RequestCancelledError } from '../types/errors.js';
import type { ToolPipeline } from '../services/pipeline.js';

export interface ToolRoutesOptions {
  pipeline: ToolPipeline;
}

// Shape is checked by the pipeline, not by Fastify.
type SqlAgentBody = unknown;

/**
 * Header carrying the caller identity used for rate limiting.
 */
export const CALLER_KEY_HEADER = 'x-client-id';

function callerKeyFrom(request: FastifyRequest): string | undefined {
  const header = request.headers[CALLER_KEY_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

// Anything but a plain object goes through untouched and fails validation.
function withCallerKey(body: unknown, callerKey: string | undefined): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body) || !callerKey) {
    return body;
  }
  return { ...body, caller_key: callerKey };
}

export async function toolRoutes(fastify: FastifyInstance, options: ToolRoutesOptions) {
  const { pipeline } = options;

  // POST /tools/sql_agent - Ask a question, always answered with an envelope.
  // Field validation happens in the pipeline so that bad input still gets one.
  fastify.post<{ Body: SqlAgentBody }>(
    '/tools/sql_agent',
    {
      schema: {
        description: 'Answer a natural language question with the SQL agent',
        body: {
          properties: {
            question: { description: 'Natural language question' },
            limit: { description: 'Maximum rows the agent may read back from one query' },
            rate_limit: { description: 'Max requests per minute for this client' },
            stream: { description: 'Collect agent steps in streamed_events' },
          },
        },
      },
    },
    async (request: FastifyRequest<{ Body: SqlAgentBody }>, reply: FastifyReply) => {
      const controller = new AbortController();
      const onClose = () => {
        if (!reply.raw.writableFinished) {
          controller.abort();
        }
      };
      reply.raw.once('close', onClose);

      try {
        return await pipeline.invoke(withCallerKey(request.body, callerKeyFrom(request)), {
          signal: controller.signal,
        });
      } catch (error) {
        if (error instanceof RequestCancelledError) {
          request.log.info({ request_id: error.requestId }, 'Client went away, dropping response');
          return reply.hijack();
        }
        throw error;
      } finally {
        reply.raw.off('close', onClose);
      }
    }
  );
}
