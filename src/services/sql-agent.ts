/**
 * SQL agent: plans and runs read-only SQL for a natural language question.
 *
 * The model drives a tool-calling loop over three tools (list tables,
 * describe tables, run query). Query errors go back to the model so it can
 * rewrite the query; whatever is left unresolved when the loop stops is
 * reported as one classified `SqlAgentError`.
 */

import {
  APICallError,
  InvalidToolInputError,
  LoadAPIKeyError,
  NoSuchToolError,
  RetryError,
  generateText,
  stepCountIs,
  tool,
} from 'ai';
import type { LanguageModel } from 'ai';
import { z } from 'zod';
import { SQLExecutionError, SQLGenerationError, SqlAgentError } from '../types/errors.js';
import type { AgentResult, StreamEvent, UsageCounts } from '../types/models.js';
import type { QueryableDatabase, Row } from './database.js';

export interface AgentInvokeOptions {
  /** Upper bound on rows read back from any one query. */
  rowLimit?: number;
  signal?: AbortSignal;
  onEvent?: (event: StreamEvent) => void;
}

/**
 * Anything that can answer a question by planning and executing SQL.
 * Implementations must stay read-only and reject with `SqlAgentError`.
 */
export interface SqlAgent {
  readonly model: string;
  invoke(question: string, options?: AgentInvokeOptions): Promise<AgentResult>;
}

export interface LlmSqlAgentOptions {
  modelId: string;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
  maxSteps: number;
  defaultLimit: number;
  maxLimit: number;
}

interface RunState {
  promptTokens: number;
  completionTokens: number;
  queries: number;
  /** Cleared by the next successful database call. */
  pendingDatabaseError: { message: string; rejected: boolean } | null;
  lastDatabaseError: string | null;
}

export function buildSqlSystemPrompt(dbName: string, topK: number): string {
  return `You are an agent designed to interact with a SQL database.
Given an input question, create a syntactically correct ${dbName} query to run,
then look at the results of the query and return the answer. Unless the user
specifies a specific number of examples they wish to obtain, always limit your
query to at most ${topK} results.

You can order the results by a relevant column to return the most interesting
examples in the database. Never query for all the columns from a specific table,
only ask for the relevant columns given the question.

You MUST double check your query before executing it. If you get an error while
executing a query, rewrite the query and try again.

DO NOT make any DML statements (INSERT, UPDATE, DELETE, DROP etc.) to the
database.

To start you should ALWAYS look at the tables in the database to see what you
can query. Do NOT skip this step.

Then you should query the schema of the most relevant tables.`;
}

function describeError(error: unknown): string {
  if (error instanceof SQLExecutionError || error instanceof SQLGenerationError) {
    return error.message.split('\n')[0] ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

function formatRows(rows: Row[], truncated: boolean, rowLimit: number): string {
  const json = JSON.stringify(rows, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
  return truncated ? `${json}\n(Result truncated to ${rowLimit} rows.)` : json;
}

const DRIVER_ERROR_CODE = /^(ECONN|ENOTFOUND|ETIMEDOUT|EHOSTUNREACH|EPIPE|ER_|SQLITE_|PROTOCOL_)/;

function isDatabaseDriverError(error: unknown): boolean {
  if (error instanceof SQLExecutionError) {
    return true;
  }
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  return (typeof code === 'string' && DRIVER_ERROR_CODE.test(code)) || 'sqlState' in error;
}

/**
 * Map any failure raised while running the agent onto the closed set of
 * agent failure kinds.
 */
export function classifyAgentFailure(error: unknown, usage: UsageCounts | null): SqlAgentError {
  if (error instanceof SqlAgentError) {
    return error;
  }

  const message = describeError(error);

  if (isDatabaseDriverError(error)) {
    return new SqlAgentError('database_error', `Database error: ${message}`, { usage, cause: error });
  }

  if (NoSuchToolError.isInstance(error) || InvalidToolInputError.isInstance(error)) {
    return new SqlAgentError('planning_error', `The agent produced an invalid plan: ${message}`, {
      usage,
      cause: error,
    });
  }

  if (APICallError.isInstance(error)) {
    const status = error.statusCode ? ` (HTTP ${error.statusCode})` : '';
    return new SqlAgentError('llm_provider_error', `Language model request failed${status}: ${message}`, {
      usage,
      cause: error,
    });
  }

  if (error instanceof Error && error.name === 'TimeoutError') {
    return new SqlAgentError('llm_provider_error', 'Language model request timed out', {
      usage,
      cause: error,
    });
  }

  if (RetryError.isInstance(error) || LoadAPIKeyError.isInstance(error)) {
    return new SqlAgentError('llm_provider_error', `Language model unavailable: ${message}`, {
      usage,
      cause: error,
    });
  }

  // Everything else surfaced from inside the model loop.
  return new SqlAgentError('llm_provider_error', `Language model error: ${message}`, {
    usage,
    cause: error,
  });
}

/**
 * SQL agent backed by a language model with database tools.
 */
export class LlmSqlAgent implements SqlAgent {
  constructor(
    private readonly db: QueryableDatabase,
    private readonly languageModel: LanguageModel,
    private readonly options: LlmSqlAgentOptions
  ) {}

  get model(): string {
    return this.options.modelId;
  }

  async invoke(question: string, options: AgentInvokeOptions = {}): Promise<AgentResult> {
    const rowLimit = Math.min(options.rowLimit ?? this.options.defaultLimit, this.options.maxLimit);
    const emit = options.onEvent ?? (() => undefined);

    try {
      await this.db.ping();
    } catch (error) {
      throw new SqlAgentError('database_error', `Database unreachable: ${describeError(error)}`, {
        cause: error,
      });
    }

    const state: RunState = {
      promptTokens: 0,
      completionTokens: 0,
      queries: 0,
      pendingDatabaseError: null,
      lastDatabaseError: null,
    };
    const usage = (): UsageCounts => ({
      promptTokens: state.promptTokens,
      completionTokens: state.completionTokens,
    });

    const signals = [AbortSignal.timeout(this.options.timeoutMs)];
    if (options.signal) {
      signals.push(options.signal);
    }

    let answer: string;
    try {
      const result = await generateText({
        model: this.languageModel,
        system: buildSqlSystemPrompt(this.db.label, rowLimit),
        prompt: `${question}\n(Use LIMIT <= ${rowLimit}.)`,
        tools: this.buildTools(rowLimit, state),
        stopWhen: stepCountIs(this.options.maxSteps),
        temperature: this.options.temperature,
        maxRetries: this.options.maxRetries,
        abortSignal: AbortSignal.any(signals),
        onStepFinish: (step) => {
          state.promptTokens += step.usage.inputTokens ?? 0;
          state.completionTokens += step.usage.outputTokens ?? 0;

          for (const call of step.toolCalls) {
            emit({ type: 'action', tool: call.toolName, message: `Calling tool: ${call.toolName}` });
          }
          for (const toolResult of step.toolResults) {
            emit({ type: 'step', tool: toolResult.toolName, message: `Completed: ${toolResult.toolName}` });
          }
        },
      });
      answer = result.text.trim();
    } catch (error) {
      throw classifyAgentFailure(error, usage());
    }

    if (answer.length === 0) {
      const pending = state.pendingDatabaseError;
      if (pending?.rejected) {
        throw new SqlAgentError(
          'planning_error',
          `The agent did not produce a read-only query: ${pending.message}`,
          { usage: usage() }
        );
      }
      if (pending) {
        throw new SqlAgentError(
          'database_error',
          `Query failed after ${state.queries} attempt(s): ${pending.message}`,
          { usage: usage() }
        );
      }
      throw new SqlAgentError(
        'planning_error',
        'The question could not be answered from the database within the allowed steps',
        { usage: usage() }
      );
    }

    emit({ type: 'finish', message: 'Done' });

    return {
      answer,
      promptTokens: state.promptTokens,
      completionTokens: state.completionTokens,
      ...(state.lastDatabaseError ? { rawError: state.lastDatabaseError } : {}),
    };
  }

  private buildTools(rowLimit: number, state: RunState) {
    // Database failures go back to the model as tool output.
    const guarded = async (run: () => Promise<string>): Promise<string> => {
      try {
        const output = await run();
        state.pendingDatabaseError = null;
        return output;
      } catch (error) {
        const message = describeError(error);
        state.pendingDatabaseError = { message, rejected: error instanceof SQLGenerationError };
        state.lastDatabaseError = message;
        return `Error: ${message}`;
      }
    };

    return {
      sql_db_list_tables: tool({
        description:
          'Input is an empty object, output is a comma-separated list of tables in the database.',
        inputSchema: z.object({}),
        execute: async () => guarded(async () => (await this.db.listTables()).join(', ')),
      }),
      sql_db_schema: tool({
        description:
          'Input is a list of tables, output is the schema of those tables. ' +
          'Be sure that the tables actually exist by calling sql_db_list_tables first.',
        inputSchema: z.object({
          tables: z.array(z.string()).min(1).describe('Table names to describe'),
        }),
        execute: async ({ tables }) => guarded(() => this.db.describeTables(tables)),
      }),
      sql_db_query: tool({
        description:
          'Input is a single read-only SQL query, output is the resulting rows as JSON. ' +
          'If the query is not correct, an error message is returned; rewrite the query and try again.',
        inputSchema: z.object({
          query: z.string().min(1).describe('A detailed and correct SQL query'),
        }),
        execute: async ({ query }) => {
          state.queries += 1;
          return guarded(async () => {
            const { rows, truncated } = await this.db.runReadOnlyQuery(query, rowLimit);
            return formatRows(rows, truncated, rowLimit);
          });
        },
      }),
    };
  }
}
