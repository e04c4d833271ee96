/**
 * Purpose: Decide per column whether values read as percentages or counts, and at what precision.
 * Intent: Keep inference a pure function of data shape and column name, with overrides winning field by field.
 */

import { ConfigurationError, DataTypeError } from "./errors.js";
import type { Cell, FormatClass, ResolvedValueFormat, ValueFormatSpec } from "./types.js";

export const PERCENT_MARKERS: readonly string[] = Object.freeze(["%", "percent", "pct", "rate"]);

export const MAX_PRECISION = 12;

// Plain decimal or exponent notation; hex, binary and "Infinity" stay text.
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export type CellReading =
  | { kind: "number"; value: number }
  | { kind: "missing" }
  | { kind: "invalid"; text: string };

export type ColumnFormatResult =
  | {
      ok: true;
      column: string;
      values: (number | null)[];
      format: ResolvedValueFormat;
      labels: string[];
    }
  | {
      ok: false;
      column: string;
      values: (number | null)[];
      error: DataTypeError;
      labels: string[];
    };

export function readCell(cell: Cell | undefined): CellReading {
  if (cell === null || cell === undefined) return { kind: "missing" };
  if (typeof cell === "number") {
    if (Number.isNaN(cell)) return { kind: "missing" };
    if (!Number.isFinite(cell)) return { kind: "invalid", text: String(cell) };
    return { kind: "number", value: cell };
  }
  if (typeof cell === "string") {
    const trimmed = cell.trim();
    if (!trimmed) return { kind: "missing" };
    if (!DECIMAL_TEXT.test(trimmed)) return { kind: "invalid", text: cell };
    const n = Number(trimmed);
    return Number.isFinite(n) ? { kind: "number", value: n } : { kind: "invalid", text: cell };
  }
  return { kind: "invalid", text: String(cell) };
}

export function hasPercentMarker(columnName: string): boolean {
  const lower = columnName.toLowerCase();
  return PERCENT_MARKERS.some((m) => lower.includes(m));
}

function present(values: readonly (number | null)[]): number[] {
  return values.filter((v): v is number => v !== null);
}

function maxAbs(values: readonly number[]): number {
  let out = 0;
  for (const v of values) out = Math.max(out, Math.abs(v));
  return out;
}

/** Every observed value lies in the closed range [0, 1]. */
export function isFractionalRange(values: readonly number[]): boolean {
  return values.length > 0 && values.every((v) => v >= 0 && v <= 1);
}

export function isPercentPointRange(values: readonly number[]): boolean {
  return values.length > 0 && values.every((v) => v >= 0 && v <= 100);
}

/**
 * Range first: fractional data is a percentage whatever the name says.
 * The name marker only settles data that sits in [0, 100]; anything else stays a count.
 */
export function inferPercentage(values: readonly number[], columnName: string): { isPercentage: boolean; scale: 1 | 100 } {
  if (isFractionalRange(values)) return { isPercentage: true, scale: 100 };
  if (isPercentPointRange(values) && hasPercentMarker(columnName)) return { isPercentage: true, scale: 1 };
  return { isPercentage: false, scale: 1 };
}

export function inferPrecision(maxAbsDisplayed: number, isPercentage: boolean): number {
  if (maxAbsDisplayed >= 1000) return 0;
  if (maxAbsDisplayed >= 1) return isPercentage ? 1 : 0;
  return 2;
}

const valueFormatFields: ReadonlySet<string> = new Set(["isPercentage", "precision"]);

export function validateValueFormatSpec(raw: ValueFormatSpec, key: string): ValueFormatSpec {
  for (const field of Object.keys(raw)) {
    if (!valueFormatFields.has(field)) throw new ConfigurationError(`Unknown value format field: ${field}`, `${key}.${field}`);
  }
  const out: ValueFormatSpec = {};
  if (raw.isPercentage !== undefined) {
    if (typeof raw.isPercentage !== "boolean") {
      throw new ConfigurationError("isPercentage must be a boolean", `${key}.isPercentage`);
    }
    out.isPercentage = raw.isPercentage;
  }
  if (raw.precision !== undefined) {
    const p = raw.precision;
    if (typeof p !== "number" || !Number.isInteger(p) || p < 0 || p > MAX_PRECISION) {
      throw new ConfigurationError(`precision must be an integer between 0 and ${MAX_PRECISION}`, `${key}.precision`);
    }
    out.precision = p;
  }
  return out;
}

/** Field-wise merge; earlier specs win. */
export function mergeValueFormatSpecs(...specs: (ValueFormatSpec | undefined)[]): ValueFormatSpec {
  const out: ValueFormatSpec = {};
  for (const spec of specs) {
    if (!spec) continue;
    if (out.isPercentage === undefined && spec.isPercentage !== undefined) out.isPercentage = spec.isPercentage;
    if (out.precision === undefined && spec.precision !== undefined) out.precision = spec.precision;
  }
  return out;
}

export function resolveColumnFormat(
  values: readonly (number | null)[],
  columnName: string,
  override?: ValueFormatSpec
): ResolvedValueFormat {
  const observed = present(values);

  let isPercentage: boolean;
  let scale: 1 | 100;
  if (override?.isPercentage === undefined) {
    ({ isPercentage, scale } = inferPercentage(observed, columnName));
  } else if (override.isPercentage) {
    isPercentage = true;
    scale = observed.every((v) => Math.abs(v) <= 1) ? 100 : 1;
  } else {
    isPercentage = false;
    scale = 1;
  }

  const precision = override?.precision ?? inferPrecision(maxAbs(observed) * scale, isPercentage);
  const formatClass: FormatClass = isPercentage ? "percentage" : "count";

  return {
    formatClass,
    isPercentage,
    scale,
    precision,
    inferred: {
      isPercentage: override?.isPercentage === undefined,
      precision: override?.precision === undefined,
    },
  };
}

const numberFormats = new Map<number, Intl.NumberFormat>();

function numberFormat(precision: number): Intl.NumberFormat {
  const cached = numberFormats.get(precision);
  if (cached) return cached;
  const nf = new Intl.NumberFormat("en-US", {
    minimumFractionDigits: precision,
    maximumFractionDigits: precision,
    useGrouping: true,
  });
  numberFormats.set(precision, nf);
  return nf;
}

export function formatNumber(value: number, precision: number): string {
  return numberFormat(Math.max(0, Math.min(MAX_PRECISION, precision))).format(value);
}

export function formatValue(value: number | null, format: ResolvedValueFormat): string {
  if (value === null || !Number.isFinite(value)) return "N/A";
  const text = formatNumber(value * format.scale, format.precision);
  return format.isPercentage ? `${text}%` : text;
}

function literalText(cell: Cell | undefined): string {
  if (cell === null || cell === undefined) return "N/A";
  if (typeof cell === "number" && Number.isNaN(cell)) return "N/A";
  return String(cell);
}

export function formatColumn(cells: readonly Cell[], columnName: string, override?: ValueFormatSpec): ColumnFormatResult {
  const values: (number | null)[] = [];
  const offending: { row: number; text: string }[] = [];

  cells.forEach((cell, row) => {
    const reading = readCell(cell);
    if (reading.kind === "number") {
      values.push(reading.value);
    } else {
      values.push(null);
      if (reading.kind === "invalid") offending.push({ row, text: reading.text });
    }
  });

  if (offending.length > 0) {
    return {
      ok: false,
      column: columnName,
      values,
      error: new DataTypeError(columnName, offending),
      labels: cells.map(literalText),
    };
  }

  const format = resolveColumnFormat(values, columnName, override);
  return { ok: true, column: columnName, values, format, labels: values.map((v) => formatValue(v, format)) };
}
