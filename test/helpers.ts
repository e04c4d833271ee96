import { createDataTable } from "../src/data_table.js";
import { loadStyleTables } from "../src/style_tables.js";
import type { DataTable } from "../src/types.js";

export const styleTables = loadStyleTables();

export function catchError<E extends Error>(ctor: new (...args: never[]) => E, fn: () => unknown): E {
  try {
    fn();
  } catch (e) {
    if (e instanceof ctor) return e;
    throw e;
  }
  throw new Error(`expected ${ctor.name} to be thrown`);
}

export function salesTable(): DataTable {
  return createDataTable({
    name: "Q1",
    indexName: "Region",
    index: ["North", "South", "East"],
    columns: [
      { name: "Win rate", cells: [0.25, 0.5, 0.75] },
      { name: "Deals", cells: [12, 30, 7] },
      { name: "Revenue", cells: [1200, 34567.8, 980] },
      { name: "Notes", cells: ["10", "n/a", "5"] },
    ],
  });
}
