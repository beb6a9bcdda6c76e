/**
 * Database service using Knex.js for multi-database support.
 * Supports PostgreSQL, MySQL and SQLite.
 *
 * The agent only ever reaches the database through `SqlDatabase`, which
 * refuses anything but a single read query.
 */

import knex, { Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import { SQLExecutionError, SQLGenerationError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export type Row = Record<string, unknown>;

export interface QueryResult {
  rows: Row[];
  /** True when the database returned more rows than were kept. */
  truncated: boolean;
}

/**
 * Database capabilities the SQL agent relies on.
 */
export interface QueryableDatabase {
  /** Dialect or database name shown to the model. */
  readonly label: string;
  ping(): Promise<void>;
  listTables(): Promise<string[]>;
  describeTables(tables: string[]): Promise<string>;
  runReadOnlyQuery(sql: string, maxRows: number): Promise<QueryResult>;
}

const READ_STATEMENT = /^(SELECT|WITH|SHOW|DESCRIBE|DESC|EXPLAIN)\b/i;

const WRITE_KEYWORDS = [
  /\bINSERT\b/i,
  /\bUPDATE\b/i,
  /\bDELETE\b/i,
  /\bDROP\b/i,
  /\bALTER\b/i,
  /\bCREATE\b/i,
  /\bTRUNCATE\b/i,
  /\bMERGE\b/i,
  /\bGRANT\b/i,
  /\bREVOKE\b/i,
  /\bATTACH\b/i,
  /\bPRAGMA\b/i,
];

/**
 * Validate SQL safety (read-only, single statement).
 * Returns the statement without its trailing semicolon.
 */
export function validateReadOnlySql(sql: string): string {
  const statement = sql.trim().replace(/;\s*$/, '').trim();

  if (statement.length === 0) {
    throw new SQLGenerationError('SQL statement is empty');
  }

  if (statement.includes(';')) {
    throw new SQLGenerationError('Only one SQL statement may be executed at a time');
  }

  if (!READ_STATEMENT.test(statement)) {
    throw new SQLGenerationError('SQL must be a read-only query (SELECT, WITH, SHOW, DESCRIBE or EXPLAIN)');
  }

  for (const pattern of WRITE_KEYWORDS) {
    if (pattern.test(statement)) {
      throw new SQLGenerationError(`Dangerous SQL operation detected: ${pattern.source}`);
    }
  }

  return statement;
}

/**
 * Normalize the dialect-specific result of `knex.raw` into rows.
 */
export function extractRows(result: unknown): Row[] {
  // MySQL: [[rows], [fields]]
  if (Array.isArray(result) && result.length === 2 && Array.isArray(result[0])) {
    return result[0].filter(isRow);
  }

  // SQLite: array of rows directly
  if (Array.isArray(result)) {
    return result.filter(isRow);
  }

  // PostgreSQL: { rows: [...] }
  if (isRow(result) && Array.isArray(result.rows)) {
    return result.rows.filter(isRow);
  }

  return [];
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SqlDatabase implements QueryableDatabase {
  private schemaInspector: ReturnType<typeof SchemaInspector> | null = null;

  constructor(
    private readonly db: Knex,
    readonly label: string,
    private readonly allowedTables: string[] | null = null
  ) {}

  private get inspector(): ReturnType<typeof SchemaInspector> {
    if (!this.schemaInspector) {
      this.schemaInspector = SchemaInspector(this.db);
    }
    return this.schemaInspector;
  }

  static fromConfig(
    knexConfig: Knex.Config,
    label: string,
    allowedTables: string[] | null
  ): SqlDatabase {
    return new SqlDatabase(knex(knexConfig), label, allowedTables);
  }

  async ping(): Promise<void> {
    await this.db.raw('SELECT 1');
  }

  /**
   * Get all table names visible to the agent.
   */
  async listTables(): Promise<string[]> {
    const tables = await this.inspector.tables();
    if (!this.allowedTables) {
      return tables;
    }
    const allowed = new Set(this.allowedTables);
    return tables.filter((table) => allowed.has(table));
  }

  /**
   * Describe columns of the given tables for the model.
   * Unknown or hidden tables are reported instead of described.
   */
  async describeTables(tables: string[]): Promise<string> {
    const visible = new Set(await this.listTables());
    const sections: string[] = [];

    for (const table of tables) {
      if (!visible.has(table)) {
        sections.push(`Table "${table}" does not exist.`);
        continue;
      }

      const columns = await this.inspector.columnInfo(table);
      const lines = columns.map(
        (col) => `  - ${col.name} ${col.data_type}${col.is_nullable ? '' : ' NOT NULL'}`
      );
      sections.push(`Table ${table}:\n${lines.join('\n')}`);

      try {
        const fks = await this.inspector.foreignKeys(table);
        for (const fk of fks) {
          sections.push(
            `  ${fk.table}.${fk.column} -> ${fk.foreign_key_table}.${fk.foreign_key_column}`
          );
        }
      } catch (error) {
        // Foreign keys might not be supported in all databases
        logger.debug(`Could not fetch foreign keys for ${table}: ${error}`);
      }
    }

    return sections.join('\n\n');
  }

  /**
   * Execute one read-only statement, keeping at most `maxRows` rows.
   */
  async runReadOnlyQuery(sql: string, maxRows: number): Promise<QueryResult> {
    const statement = validateReadOnlySql(sql);

    let result: unknown;
    try {
      result = await this.db.raw(statement);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SQLExecutionError(`Query failed: ${message}`, statement);
    }

    const rows = extractRows(result);
    return {
      rows: rows.slice(0, maxRows),
      truncated: rows.length > maxRows,
    };
  }

  async close(): Promise<void> {
    await this.db.destroy();
    logger.info('Database connection closed');
  }
}
