/**
 * Purpose: Build and query the immutable tables the composition engine reads.
 * Intent: Enforce the shared-row-index invariant once, at construction.
 */

import { ConfigurationError } from "./errors.js";
import type { Cell, ColumnGroup, DataColumn, DataTable } from "./types.js";

export interface DataTableInit {
  name?: string;
  indexName?: string;
  index: readonly string[];
  columns: readonly { name: string; cells: readonly Cell[] }[];
}

export function deepFreeze<T>(value: T, seen = new WeakSet<object>()): T {
  if (typeof value !== "object" || value === null) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  for (const child of Object.values(value)) deepFreeze(child, seen);
  Object.freeze(value);
  return value;
}

export function createDataTable(init: DataTableInit): DataTable {
  const rowCount = init.index.length;
  const seen = new Set<string>();
  const columns: DataColumn[] = [];

  for (const col of init.columns) {
    const key = `columns.${col.name}`;
    if (!col.name.trim()) throw new ConfigurationError("Column names must be non-empty", key);
    if (seen.has(col.name)) throw new ConfigurationError(`Duplicate column name: ${col.name}`, key);
    if (col.cells.length !== rowCount) {
      throw new ConfigurationError(
        `Column ${JSON.stringify(col.name)} has ${col.cells.length} rows but the index has ${rowCount}`,
        key
      );
    }
    seen.add(col.name);
    columns.push({ name: col.name, cells: [...col.cells] });
  }

  return deepFreeze({
    ...(init.name !== undefined ? { name: init.name } : {}),
    indexName: init.indexName ?? "Category",
    index: [...init.index],
    columns,
  });
}

export function columnNames(table: DataTable): string[] {
  return table.columns.map((c) => c.name);
}

export function findColumn(table: DataTable, name: string): DataColumn | undefined {
  return table.columns.find((c) => c.name === name);
}

export function withoutRows(table: DataTable, labels: readonly string[]): DataTable {
  const drop = new Set(labels.map((l) => l.trim()));
  const keep: number[] = [];
  table.index.forEach((label, i) => {
    if (!drop.has(label.trim())) keep.push(i);
  });
  if (keep.length === table.index.length) return table;

  return createDataTable({
    ...(table.name !== undefined ? { name: table.name } : {}),
    indexName: table.indexName,
    index: keep.map((i) => table.index[i] ?? ""),
    columns: table.columns.map((c) => ({ name: c.name, cells: keep.map((i) => c.cells[i] ?? null) })),
  });
}

/** Splits column names, in order, into consecutive groups of at most `size`. */
export function groupColumns(names: readonly string[], size = 4): ColumnGroup[] {
  if (!Number.isInteger(size) || size < 1) throw new ConfigurationError("Group size must be a positive integer", "groupSize");
  const groups: ColumnGroup[] = [];
  for (let i = 0; i < names.length; i += size) groups.push(names.slice(i, i + size));
  return groups;
}
