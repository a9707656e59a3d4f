import postgres, { type Sql } from 'postgres';
import type { Row, TabularRowSet } from '../types/table.js';
import type { Logger } from '../utils/logger.js';
import { inferColumns, quoteIdent, toStorageValue, type ColumnDef, type ColumnType } from './schema.js';
import type { Store } from './store.js';

// Postgres caps bind parameters per statement at 65535.
const MAX_PARAMS = 65_000;

const SQL_TYPES: Record<ColumnType, string> = {
  integer: 'BIGINT',
  double: 'DOUBLE PRECISION',
  boolean: 'BOOLEAN',
  text: 'TEXT',
  json: 'TEXT',
};

type Param = string | number | boolean | null;

export interface InsertStatement {
  text: string;
  params: Param[];
}

/** Multi-row INSERTs, split so no statement binds more than `maxParams` values. */
export function insertStatements(
  target: string,
  columns: ColumnDef[],
  rows: Row[],
  maxParams = MAX_PARAMS,
): InsertStatement[] {
  if (columns.length === 0) return [];
  const names = columns.map((c) => quoteIdent(c.name)).join(', ');
  const chunkSize = Math.max(1, Math.floor(maxParams / columns.length));
  const statements: InsertStatement[] = [];

  for (let start = 0; start < rows.length; start += chunkSize) {
    const params: Param[] = [];
    const tuples = rows.slice(start, start + chunkSize).map((row) => {
      const slots = columns.map((c) => {
        params.push(toStorageValue(row[c.name] ?? null, c.type));
        return `$${params.length}`;
      });
      return `(${slots.join(', ')})`;
    });
    statements.push({ text: `INSERT INTO ${target} (${names}) VALUES ${tuples.join(', ')}`, params });
  }

  return statements;
}

/** Networked warehouse store over a single postgres.js connection. */
export class PostgresStore implements Store {
  readonly kind = 'postgres' as const;

  private constructor(
    private readonly sql: Sql,
    private readonly schema: string | undefined,
    private readonly log: Logger,
  ) {}

  static async open(url: string, schema: string | undefined, log: Logger): Promise<PostgresStore> {
    const sql = postgres(url, {
      max: 1,
      connect_timeout: 10,
      onnotice: () => {},
    });

    try {
      await sql`SELECT 1`;
      if (schema) await sql.unsafe(`CREATE SCHEMA IF NOT EXISTS ${quoteIdent(schema)}`);
    } catch (err) {
      await sql.end({ timeout: 5 });
      throw err;
    }

    log.info({ schema: schema ?? 'public' }, 'Connected to Postgres');
    return new PostgresStore(sql, schema, log);
  }

  private target(table: string): string {
    return this.schema ? `${quoteIdent(this.schema)}.${quoteIdent(table)}` : quoteIdent(table);
  }

  async replaceTable(table: string, rowSet: TabularRowSet): Promise<void> {
    const columns = inferColumns(rowSet);
    const target = this.target(table);

    await this.sql.begin(async (tx) => {
      await tx.unsafe(`DROP TABLE IF EXISTS ${target}`);
      if (columns.length === 0) return;

      const defs = columns.map((c) => `${quoteIdent(c.name)} ${SQL_TYPES[c.type]}`).join(', ');
      await tx.unsafe(`CREATE TABLE ${target} (${defs})`);

      for (const statement of insertStatements(target, columns, rowSet.rows)) {
        await tx.unsafe(statement.text, statement.params);
      }
    });

    this.log.info({ table, rows: rowSet.rows.length, columns: columns.length }, `Table ${table} replaced`);
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }
}
