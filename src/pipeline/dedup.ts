import type { CellValue, TabularRowSet } from '../types/table.js';

function keyOf(value: CellValue): string | null {
  if (value === null) return null;
  if (Array.isArray(value)) return `json:${JSON.stringify(value)}`;
  return `${typeof value}:${String(value)}`;
}

/**
 * Keeps the first row for each value of `key`, preserving input order.
 * A key column that does not exist leaves the rows untouched, and rows
 * whose key cell is null are always kept.
 */
export function dedupeRows(rowSet: TabularRowSet, key: string): TabularRowSet {
  if (!rowSet.columns.includes(key)) return rowSet;

  const seen = new Set<string>();
  const rows = rowSet.rows.filter((row) => {
    const k = keyOf(row[key] ?? null);
    if (k === null) return true;
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });

  return { columns: rowSet.columns, rows };
}
