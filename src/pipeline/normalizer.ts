import { isJsonObject, type JsonObject } from '../types/json.js';
import type { CellValue, Row, TabularRowSet } from '../types/table.js';
import type { Logger } from '../utils/logger.js';
import { dedupeRows } from './dedup.js';

export interface NormalizeOptions {
  /** Keep only the first row per value of this column. */
  dedupeKey?: string;
  /** Joins nested field names into a column name. */
  separator?: string;
  /** Receives one warning listing flattened column names that collided. */
  log?: Logger;
}

function flattenInto(
  out: Row,
  record: JsonObject,
  prefix: string,
  separator: string,
  onCollision: ((column: string) => void) | undefined,
): void {
  for (const [field, value] of Object.entries(record)) {
    const column = prefix ? `${prefix}${separator}${field}` : field;
    if (isJsonObject(value)) {
      flattenInto(out, value, column, separator, onCollision);
    } else if (Object.hasOwn(out, column)) {
      onCollision?.(column);
    } else {
      out[column] = value;
    }
  }
}

/**
 * Flattens one nested record; `{ area: { name: 'England' } }` becomes `{ area_name: 'England' }`.
 * When two paths flatten to the same column (`a_b` and `a.b`), the first value
 * in field order is kept and `onCollision` is told about the column.
 */
export function flattenRecord(
  record: JsonObject,
  separator = '_',
  onCollision?: (column: string) => void,
): Row {
  const row: Row = {};
  flattenInto(row, record, '', separator, onCollision);
  return row;
}

/**
 * Turns nested JSON records into a flat row set. Columns are the union of
 * every record's fields in first-seen order and missing cells are null.
 */
export function normalize(records: readonly JsonObject[], options: NormalizeOptions = {}): TabularRowSet {
  const separator = options.separator ?? '_';
  const collisions = new Set<string>();
  const flat = records.map((record) => flattenRecord(record, separator, (column) => collisions.add(column)));
  if (collisions.size > 0) {
    options.log?.warn({ columns: [...collisions] }, 'Nested fields collide with existing columns, kept the first value');
  }

  const columnSet = new Set<string>();
  for (const row of flat) {
    for (const column of Object.keys(row)) columnSet.add(column);
  }
  const columns = [...columnSet];

  const rows = flat.map((row) => {
    const full: Row = {};
    for (const column of columns) {
      const cell: CellValue | undefined = row[column];
      full[column] = cell ?? null;
    }
    return full;
  });

  const rowSet: TabularRowSet = { columns, rows };
  return options.dedupeKey ? dedupeRows(rowSet, options.dedupeKey) : rowSet;
}
