/**
 * Custom error classes for the SQL agent tool.
 * Each error carries a list of suggestions that callers can show next to the message.
 */

import type { AgentFailureKind, UsageCounts } from './models.js';

function formatSuggestions(message: string, suggestions: string[]): string {
  if (suggestions.length === 0) {
    return message;
  }
  return `${message}\n\nSuggested fixes:\n${suggestions.map((s) => `  • ${s}`).join('\n')}`;
}

/**
 * Error thrown when generated SQL is rejected before it reaches the database.
 *
 * Raised by the read-only guard: write or DDL statements, several statements
 * in one call, or anything that is not a query.
 */
export class SQLGenerationError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions ?? SQLGenerationError.getDefaultSuggestions();
    super(formatSuggestions(message, suggestionList));
    this.name = 'SQLGenerationError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, SQLGenerationError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Only a single SELECT (or WITH ... SELECT) statement is allowed',
      'Rewrite the query without INSERT, UPDATE, DELETE, DROP or ALTER',
    ];
  }
}

/**
 * Error thrown when the database rejects a query.
 */
export class SQLExecutionError extends Error {
  public readonly sql?: string;
  public readonly suggestions: string[];

  constructor(message: string, sql?: string, suggestions?: string[]) {
    const suggestionList = suggestions ?? SQLExecutionError.getDefaultSuggestions();
    let formatted = message;
    if (sql) {
      formatted += `\n\nGenerated SQL:\n${sql}`;
    }
    super(formatSuggestions(formatted, suggestionList));
    this.name = 'SQLExecutionError';
    this.sql = sql;
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, SQLExecutionError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Check table and column names against the schema',
      'Verify the database connection (DATABASE_URL)',
    ];
  }
}

/**
 * Error thrown when the language model cannot be initialized.
 */
export class LLMError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions ?? LLMError.getDefaultSuggestions();
    super(formatSuggestions(message, suggestionList));
    this.name = 'LLMError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, LLMError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Verify API key is correct (check OPENAI_API_KEY or ANTHROPIC_API_KEY)',
      'Check that LLM_MODEL is available for the configured LLM_PROVIDER',
    ];
  }
}

const AGENT_SUGGESTIONS: Record<AgentFailureKind, string[]> = {
  database_error: [
    'Verify the database is reachable and the credentials are valid',
    'Ask about tables and columns that exist in the database',
  ],
  llm_provider_error: [
    'Check API quota and rate limits with your provider',
    'Wait a moment and retry the request',
  ],
  planning_error: [
    'Rephrase the question so it refers to data stored in the database',
    'Ask for one thing at a time',
  ],
};

/**
 * Classified failure reported by a SQL agent.
 *
 * `usage` holds the tokens consumed before the failure, or null when the
 * language model was never called.
 */
export class SqlAgentError extends Error {
  public readonly kind: AgentFailureKind;
  public readonly usage: UsageCounts | null;
  public readonly suggestions: string[];
  public readonly detail: string;

  constructor(
    kind: AgentFailureKind,
    message: string,
    options: { usage?: UsageCounts | null; cause?: unknown; suggestions?: string[] } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'SqlAgentError';
    this.kind = kind;
    this.detail = message;
    this.usage = options.usage ?? null;
    this.suggestions = options.suggestions ?? AGENT_SUGGESTIONS[kind];
    Object.setPrototypeOf(this, SqlAgentError.prototype);
  }
}

/**
 * Raised when a response envelope would break the answer/error invariant.
 * Always a defect in the pipeline, never a caller problem.
 */
export class InternalConsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalConsistencyError';
    Object.setPrototypeOf(this, InternalConsistencyError.prototype);
  }
}

/**
 * Raised instead of an envelope when the caller cancelled the request.
 */
export class RequestCancelledError extends Error {
  public readonly requestId: string;

  constructor(requestId: string) {
    super(`Request ${requestId} was cancelled by the caller`);
    this.name = 'RequestCancelledError';
    this.requestId = requestId;
    Object.setPrototypeOf(this, RequestCancelledError.prototype);
  }
}
