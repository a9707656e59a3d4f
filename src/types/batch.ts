import type { TabularRowSet } from './table.js';

export type ResourceIdentifier = number;

export interface BatchOutcome<Id = ResourceIdentifier> {
  rows: TabularRowSet;
  /** Identifiers that contributed at least one record. */
  succeeded: Id[];
  /** Identifiers whose fetch failed or came back empty. */
  failed: Id[];
}
