import type { CellValue, TabularRowSet } from '../types/table.js';

export type ColumnType = 'integer' | 'double' | 'boolean' | 'text' | 'json';

export interface ColumnDef {
  name: string;
  type: ColumnType;
}

function kindOf(cell: Exclude<CellValue, null>): ColumnType {
  if (Array.isArray(cell)) return 'json';
  switch (typeof cell) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return Number.isInteger(cell) ? 'integer' : 'double';
    default:
      return 'text';
  }
}

function widen(current: ColumnType | null, next: ColumnType): ColumnType {
  if (current === null || current === next) return next;
  if ((current === 'integer' && next === 'double') || (current === 'double' && next === 'integer')) {
    return 'double';
  }
  return 'json';
}

/** Picks a storage type per column from its non-null cells; all-null columns are text. */
export function inferColumns(rowSet: TabularRowSet): ColumnDef[] {
  return rowSet.columns.map((name) => {
    let type: ColumnType | null = null;
    for (const row of rowSet.rows) {
      const cell = row[name] ?? null;
      if (cell === null) continue;
      type = widen(type, kindOf(cell));
    }
    return { name, type: type ?? 'text' };
  });
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Converts a cell to what a driver can bind: JSON columns hold serialized
 * text, including scalars that ended up in a mixed column.
 */
export function toStorageValue(cell: CellValue, type: ColumnType): string | number | boolean | null {
  if (cell === null) return null;
  if (type === 'json') return JSON.stringify(cell);
  if (Array.isArray(cell)) return JSON.stringify(cell);
  return cell;
}
