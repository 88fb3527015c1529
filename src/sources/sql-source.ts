/**
 * SQL Source
 *
 * Runs one query against PostgreSQL and renders the result the way psql
 * prints an aligned table.
 */

import pg from 'pg';
import type { QueryArrayResult } from 'pg';
import { LoadFailureError } from '../core/errors.ts';
import { debugLog } from '../debug.ts';
import type { DescriptorOf, SourceResult, TextSource } from './text-source.ts';

export interface SqlResult {
  /** Statement tag such as SELECT, INSERT or UPDATE */
  command: string;
  rowCount: number | null;
  columns: string[];
  rows: unknown[][];
}

export type SqlExecutor = (connectionString: string, query: string) => Promise<SqlResult>;

/**
 * A query string holding several statements yields one result per
 * statement; the last one is shown.
 */
export function toSqlResult(result: QueryArrayResult | QueryArrayResult[]): SqlResult {
  const last = Array.isArray(result) ? result[result.length - 1] : result;
  if (last === undefined) {
    throw new Error('query returned no result');
  }
  return {
    command: last.command,
    rowCount: last.rowCount,
    columns: last.fields.map((field) => field.name),
    rows: last.rows,
  };
}

/**
 * Executor backed by a short-lived pg client.
 */
export async function runPgQuery(connectionString: string, query: string): Promise<SqlResult> {
  const client = new pg.Client({ connectionString });
  await client.connect();
  try {
    const result: QueryArrayResult | QueryArrayResult[] = await client.query({ text: query, rowMode: 'array' });
    return toSqlResult(result);
  } finally {
    await client.end();
  }
}

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return `\\x${value.toString('hex')}`;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value).replace(/\r?\n/g, ' ');
}

/**
 * Aligned table: header, separator, one line per row, row count footer.
 * Results without columns print the statement tag and row count.
 */
export function formatTable(result: SqlResult): string {
  if (result.columns.length === 0) {
    return result.rowCount === null ? result.command : `${result.command} ${result.rowCount}`;
  }

  const cells = result.rows.map((row) => result.columns.map((_, index) => formatCell(row[index])));
  const widths = result.columns.map((name, index) =>
    Math.max(name.length, ...cells.map((row) => (row[index] ?? '').length))
  );

  const header = result.columns
    .map((name, index) => {
      const width = widths[index] ?? name.length;
      const left = Math.floor((width - name.length) / 2);
      return ` ${' '.repeat(left)}${name}`.padEnd(width + 1) + ' ';
    })
    .join('|')
    .trimEnd();
  const separator = widths.map((width) => '-'.repeat(width + 2)).join('+');
  const body = cells.map((row) =>
    row
      .map((cell, index) => ` ${cell.padEnd(widths[index] ?? cell.length)} `)
      .join('|')
      .trimEnd()
  );

  const count = result.rows.length;
  const footer = `(${count} ${count === 1 ? 'row' : 'rows'})`;
  return [header, separator, ...body, footer].join('\n');
}

export class SqlSource implements TextSource<DescriptorOf<'sql'>> {
  constructor(private readonly execute: SqlExecutor = runPgQuery) {}

  async read(descriptor: DescriptorOf<'sql'>): Promise<SourceResult> {
    if (!descriptor.connectionString) {
      throw new LoadFailureError(descriptor.query, 'no connection string (set sql.connectionString)');
    }

    try {
      const result = await this.execute(descriptor.connectionString, descriptor.query);
      debugLog(`[SqlSource] ${result.command} returned ${result.rows.length} rows`);
      return { text: formatTable(result) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new LoadFailureError(descriptor.query, reason, { cause: error });
    }
  }
}
