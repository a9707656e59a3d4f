import type { Store } from '../../src/db/store.js';
import type { TabularRowSet } from '../../src/types/table.js';

export interface MemoryStoreOptions {
  failOnReplace?: string;
  failOnClose?: boolean;
}

/** In-process stand-in for a real store. */
export class MemoryStore implements Store {
  readonly kind = 'sqlite' as const;
  readonly tables = new Map<string, TabularRowSet>();
  readonly writes: string[] = [];
  closeCalls = 0;

  constructor(private readonly options: MemoryStoreOptions = {}) {}

  async replaceTable(table: string, rowSet: TabularRowSet): Promise<void> {
    if (this.options.failOnReplace === table) {
      throw new Error(`cannot write ${table}`);
    }
    this.writes.push(table);
    this.tables.set(table, rowSet);
  }

  async close(): Promise<void> {
    this.closeCalls++;
    if (this.options.failOnClose) {
      throw new Error('connection already closed');
    }
  }
}
