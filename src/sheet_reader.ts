/**
 * Purpose: Read workbook sheets into immutable data tables.
 * Intent: Stay a thin adapter; all number handling happens in the formatter.
 */

import { readFileSync } from "node:fs";
import * as XLSX from "xlsx";
import { createDataTable, withoutRows } from "./data_table.js";
import { ConfigurationError } from "./errors.js";
import type { Cell, DataTable } from "./types.js";

export const DEFAULT_INDEX_COLUMN = "Category";
export const DEFAULT_DROP_ROWS: readonly string[] = Object.freeze(["Sub total"]);

export interface SheetReadOptions {
  indexColumn?: string;
  dropRows?: readonly string[];
}

export function parseWorkbook(data: Uint8Array): XLSX.WorkBook {
  try {
    return XLSX.read(data, { type: "buffer" });
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError(`Cannot parse workbook: ${reason}`, "file");
  }
}

export function readWorkbook(path: string): XLSX.WorkBook {
  let data: Buffer;
  try {
    data = readFileSync(path);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError(`Cannot read workbook ${path}: ${reason}`, "file");
  }
  return parseWorkbook(data);
}

export function sheetNames(workbook: XLSX.WorkBook): string[] {
  return [...workbook.SheetNames];
}

function toCell(v: unknown): Cell {
  if (v === null || v === undefined) return null;
  if (typeof v === "number" || typeof v === "string" || typeof v === "boolean") return v;
  if (v instanceof Date) return v.toISOString();
  return String(v);
}

function headerText(v: unknown): string {
  return v === null || v === undefined ? "" : String(v).trim();
}

/** Repeated headers get ".1", ".2", ... in order of appearance. */
function uniqueHeaders(headers: readonly string[]): string[] {
  const counts = new Map<string, number>();
  return headers.map((h) => {
    if (!h) return h;
    const n = counts.get(h) ?? 0;
    counts.set(h, n + 1);
    return n === 0 ? h : `${h}.${n}`;
  });
}

export function sheetToTable(workbook: XLSX.WorkBook, sheetName: string, options: SheetReadOptions = {}): DataTable {
  const sheet = Object.hasOwn(workbook.Sheets, sheetName) ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new ConfigurationError(
      `Sheet ${JSON.stringify(sheetName)} not found (available: ${workbook.SheetNames.join(", ")})`,
      "sheet"
    );
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
  const [headerRow = [], ...rows] = matrix;
  const headers = uniqueHeaders(headerRow.map(headerText));

  const wanted = options.indexColumn ?? DEFAULT_INDEX_COLUMN;
  const found = headers.indexOf(wanted);
  const indexAt = found >= 0 ? found : 0;
  const indexName = headers[indexAt] || wanted;

  const dataRows = rows.filter((row) => row.some((v) => v !== null && v !== undefined && v !== ""));
  const index = dataRows.map((row) => headerText(row[indexAt]));

  const columns: { name: string; cells: Cell[] }[] = [];
  headers.forEach((name, j) => {
    if (j === indexAt || !name) return;
    columns.push({ name, cells: dataRows.map((row) => toCell(row[j])) });
  });

  const table = createDataTable({ name: sheetName, indexName, index, columns });
  const drop = options.dropRows ?? [];
  return drop.length > 0 ? withoutRows(table, drop) : table;
}
