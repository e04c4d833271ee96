/**
 * Purpose: Resolve a scheme name and background variant into a concrete per-group style.
 * Intent: Keep color assignment a deterministic function of column order.
 */

import { ConfigurationError } from "./errors.js";
import type { StyleTables } from "./style_tables.js";
import type { ColumnGroup, ColumnStyle, ColumnStyleOverride, StyleSpec } from "./types.js";

const overrideFields: ReadonlySet<string> = new Set(["barFill", "barEdgeColor", "barEdgeWidth", "barAlpha"]);

export function availableSchemes(tables: StyleTables): string[] {
  return Object.keys(tables.schemes).sort();
}

export function availableBackgrounds(tables: StyleTables): string[] {
  return Object.keys(tables.backgrounds).sort();
}

function validateOverride(column: string, o: ColumnStyleOverride, keyPrefix: string): void {
  const key = `${keyPrefix}.${column}`;
  for (const field of Object.keys(o)) {
    if (!overrideFields.has(field)) {
      throw new ConfigurationError(`Unknown bar style field: ${field}`, `${key}.${field}`);
    }
  }
  for (const field of ["barFill", "barEdgeColor"] as const) {
    const v = o[field];
    if (v !== undefined && (typeof v !== "string" || !v.trim())) {
      throw new ConfigurationError(`${field} must be a non-empty color string`, `${key}.${field}`);
    }
  }
  const w = o.barEdgeWidth;
  if (w !== undefined && (typeof w !== "number" || !Number.isFinite(w) || w < 0)) {
    throw new ConfigurationError("barEdgeWidth must be a finite number >= 0", `${key}.barEdgeWidth`);
  }
  const a = o.barAlpha;
  if (a !== undefined && (typeof a !== "number" || !Number.isFinite(a) || a < 0 || a > 1)) {
    throw new ConfigurationError("barAlpha must be a number in [0, 1]", `${key}.barAlpha`);
  }
}

export function resolveStyle(
  tables: StyleTables,
  schemeName: string,
  bgVariant: string,
  columns: ColumnGroup,
  perColumnOverrides?: Readonly<Record<string, ColumnStyleOverride>>,
  keyPrefix = "barStyles"
): StyleSpec {
  const palette = Object.hasOwn(tables.schemes, schemeName) ? tables.schemes[schemeName] : undefined;
  if (!palette || palette.length === 0) {
    throw new ConfigurationError(
      `Unknown color scheme: ${schemeName} (expected one of ${availableSchemes(tables).join(", ")})`,
      "colorScheme"
    );
  }
  const background = Object.hasOwn(tables.backgrounds, bgVariant) ? tables.backgrounds[bgVariant] : undefined;
  if (!background) {
    throw new ConfigurationError(
      `Unknown background style: ${bgVariant} (expected one of ${availableBackgrounds(tables).join(", ")})`,
      "bgStyle"
    );
  }

  const overrides = perColumnOverrides ?? {};
  for (const [column, o] of Object.entries(overrides)) {
    if (!columns.includes(column)) {
      throw new ConfigurationError(`Bar style names a column outside the group: ${column}`, `${keyPrefix}.${column}`);
    }
    validateOverride(column, o, keyPrefix);
  }

  const columnStyles: ColumnStyle[] = columns.map((column, i) => {
    const o = Object.hasOwn(overrides, column) ? overrides[column] : undefined;
    return {
      column,
      barFill: o?.barFill ?? palette[i % palette.length] ?? "#000000",
      barEdgeColor: o?.barEdgeColor ?? tables.bar.edgeColor,
      barEdgeWidth: o?.barEdgeWidth ?? tables.bar.edgeWidth,
      barAlpha: o?.barAlpha ?? tables.bar.alpha,
    };
  });

  return Object.freeze({
    scheme: schemeName,
    background: bgVariant,
    palette,
    gridVisible: background.gridVisible,
    gridAlpha: background.gridAlpha,
    fontWeightTitle: background.fontWeightTitle,
    plotBackground: background.plotBackground,
    columns: Object.freeze(columnStyles.map((c) => Object.freeze(c))),
  });
}
