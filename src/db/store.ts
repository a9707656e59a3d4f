import type { TabularRowSet } from '../types/table.js';
import type { DatabaseConfig } from '../etl/run-config.js';
import type { Logger } from '../utils/logger.js';

export type StoreKind = DatabaseConfig['type'];

/** Destination for normalized tables. Each write fully replaces the named table. */
export interface Store {
  readonly kind: StoreKind;
  replaceTable(table: string, rowSet: TabularRowSet): Promise<void>;
  close(): Promise<void>;
}

export type OpenStore = (database: DatabaseConfig, log: Logger) => Promise<Store>;

export const openStore: OpenStore = async (database, log) => {
  switch (database.type) {
    case 'sqlite': {
      const { SqliteStore } = await import('./sqlite-store.js');
      return SqliteStore.open(database.path, log);
    }
    case 'postgres': {
      const { PostgresStore } = await import('./postgres-store.js');
      return PostgresStore.open(database.url, database.schema, log);
    }
  }
};
