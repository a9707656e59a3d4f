import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { TabularRowSet } from '../types/table.js';
import type { Logger } from '../utils/logger.js';
import { inferColumns, quoteIdent, toStorageValue, type ColumnType } from './schema.js';
import type { Store } from './store.js';

const SQL_TYPES: Record<ColumnType, string> = {
  integer: 'INTEGER',
  double: 'REAL',
  boolean: 'INTEGER',
  text: 'TEXT',
  json: 'TEXT',
};

/** Embedded single-file analytical store. */
export class SqliteStore implements Store {
  readonly kind = 'sqlite' as const;

  private constructor(
    private readonly db: Database.Database,
    private readonly log: Logger,
  ) {}

  static open(filePath: string, log: Logger): SqliteStore {
    if (filePath !== ':memory:') {
      fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    }
    const db = new Database(filePath);
    log.info({ path: filePath }, 'Connected to SQLite');
    return new SqliteStore(db, log);
  }

  async replaceTable(table: string, rowSet: TabularRowSet): Promise<void> {
    const columns = inferColumns(rowSet);
    const target = quoteIdent(table);

    const replace = this.db.transaction(() => {
      this.db.exec(`DROP TABLE IF EXISTS ${target}`);
      if (columns.length === 0) return;

      const defs = columns.map((c) => `${quoteIdent(c.name)} ${SQL_TYPES[c.type]}`).join(', ');
      this.db.exec(`CREATE TABLE ${target} (${defs})`);

      const names = columns.map((c) => quoteIdent(c.name)).join(', ');
      const placeholders = columns.map(() => '?').join(', ');
      const insert = this.db.prepare(`INSERT INTO ${target} (${names}) VALUES (${placeholders})`);

      for (const row of rowSet.rows) {
        insert.run(
          columns.map((c) => {
            const value = toStorageValue(row[c.name] ?? null, c.type);
            return typeof value === 'boolean' ? Number(value) : value;
          }),
        );
      }
    });

    replace();
    this.log.info({ table, rows: rowSet.rows.length, columns: columns.length }, `Table ${table} replaced`);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
