import type { JsonValue } from './json.js';

/** A flattened cell. Arrays are kept whole; objects never survive flattening. */
export type CellValue = string | number | boolean | null | JsonValue[];

export type Row = Record<string, CellValue>;

export interface TabularRowSet {
  /** Union of all fields across the input records, in first-seen order. */
  columns: string[];
  rows: Row[];
}
