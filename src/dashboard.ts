/**
 * Purpose: Compose a dashboard artifact from a table, column groups, and layered overrides.
 * Intent: Validate every override up front, then render groups in order with no shared state.
 */

import { renderChartGroup } from "./chart_group.js";
import { columnNames, findColumn, groupColumns } from "./data_table.js";
import { isPlainObject, parseIndexKey, safeEntries, warn } from "./diagnostics.js";
import { ConfigurationError } from "./errors.js";
import { planLayout } from "./layout_plan.js";
import { availableBackgrounds, availableSchemes, resolveStyle } from "./style_resolve.js";
import type { StyleTables } from "./style_tables.js";
import type {
  ColumnGroup,
  ColumnStyleOverride,
  DashboardArtifact,
  DashboardMessage,
  DashboardUnit,
  DataTable,
  FormatClass,
  LayoutHints,
  ValueFormatSpec,
  YLabelSpec,
} from "./types.js";
import {
  formatColumn,
  mergeValueFormatSpecs,
  validateValueFormatSpec,
  type ColumnFormatResult,
} from "./value_format.js";

export const DEFAULT_COLOR_SCHEME = "corporate";
export const DEFAULT_BG_STYLE = "presentation";

/** Keyed by group index ("0", "1", ...). */
export type IndexedOverrides<T> = Readonly<Record<string, T>>;

export interface ValueFormatOverrides {
  byGroup?: IndexedOverrides<Readonly<Record<string, ValueFormatSpec>>>;
  byColumn?: Readonly<Record<string, ValueFormatSpec>>;
}

export interface ComposeOptions {
  titlePrefix?: string;
  customTitles?: IndexedOverrides<string>;
  customSubtitles?: IndexedOverrides<string>;
  customColumnTitles?: IndexedOverrides<Readonly<Record<string, string>>>;
  valueFormats?: ValueFormatOverrides;
  colorScheme?: string;
  colorSchemes?: IndexedOverrides<string>;
  /** Used for groups without an entry in colorSchemes, cycling by group index. */
  colorSchemeCycle?: readonly string[];
  bgStyle?: string;
  layouts?: IndexedOverrides<LayoutHints>;
  barStyles?: IndexedOverrides<Readonly<Record<string, ColumnStyleOverride>>>;
  xLabel?: string;
  yLabels?: YLabelSpec;
  showValues?: boolean;
  valueRotation?: number;
}

interface GroupOverride {
  title?: string;
  subtitle?: string;
  columnTitles: Record<string, string>;
  valueFormats: Record<string, ValueFormatSpec>;
  colorScheme?: string;
  layout: LayoutHints;
  barStyles: Record<string, ColumnStyleOverride>;
}

export interface DashboardComposer {
  readonly styleTables: StyleTables;
  compose(
    table: DataTable,
    sheetName: string,
    columnGroups?: readonly ColumnGroup[],
    options?: ComposeOptions
  ): DashboardArtifact;
}

const layoutHintFields: ReadonlySet<string> = new Set(["rows", "cols", "shareY"]);

export function defaultTitle(sheetName: string, groupIndex: number, titlePrefix?: string): string {
  const prefix = (titlePrefix ?? "").trim();
  return `${prefix ? `${prefix} ` : ""}${sheetName} Analysis - Group ${groupIndex + 1}`;
}

function validateGroups(table: DataTable, groups: readonly ColumnGroup[]): void {
  groups.forEach((group, i) => {
    const key = `columnGroups[${i}]`;
    if (!Array.isArray(group) || group.length === 0) {
      throw new ConfigurationError(`Column group ${i} must be a non-empty list of column names`, key);
    }
    const seen = new Set<string>();
    for (const column of group) {
      if (typeof column !== "string" || !findColumn(table, column)) {
        throw new ConfigurationError(`Column group ${i} names an unknown column: ${String(column)}`, key);
      }
      if (seen.has(column)) throw new ConfigurationError(`Column group ${i} repeats column ${column}`, key);
      seen.add(column);
    }
  });
}

/** Visits every entry of an index-keyed map after checking the key is a group in range. */
function eachIndexed<T>(
  map: IndexedOverrides<T> | undefined,
  name: string,
  groupCount: number,
  visit: (index: number, value: T, key: string) => void
): void {
  if (map === undefined) return;
  if (!isPlainObject(map)) throw new ConfigurationError(`${name} must be an object keyed by group index`, name);
  for (const [rawKey, value] of safeEntries(map)) {
    const key = `${name}[${rawKey}]`;
    const index = parseIndexKey(rawKey);
    if (index === null) throw new ConfigurationError(`${name} key ${JSON.stringify(rawKey)} is not a group index`, key);
    if (index >= groupCount) {
      throw new ConfigurationError(`${name} key ${index} is out of range for ${groupCount} group(s)`, key);
    }
    visit(index, value, key);
  }
}

function requireText(value: unknown, key: string): string {
  if (typeof value !== "string") throw new ConfigurationError("Expected a string", key);
  return value;
}

function requireGroupColumn(group: ColumnGroup, column: string, key: string): void {
  if (!group.includes(column)) {
    throw new ConfigurationError(`Column ${JSON.stringify(column)} is not in this group`, key);
  }
}

function requireScheme(tables: StyleTables, name: unknown, key: string): string {
  if (typeof name !== "string" || !Object.hasOwn(tables.schemes, name)) {
    throw new ConfigurationError(
      `Unknown color scheme: ${String(name)} (expected one of ${availableSchemes(tables).join(", ")})`,
      key
    );
  }
  return name;
}

function validateLayoutHints(raw: LayoutHints, key: string): LayoutHints {
  if (!isPlainObject(raw)) throw new ConfigurationError("Layout hints must be an object", key);
  for (const field of Object.keys(raw)) {
    if (!layoutHintFields.has(field)) throw new ConfigurationError(`Unknown layout field: ${field}`, `${key}.${field}`);
  }
  for (const field of ["rows", "cols"] as const) {
    const v = raw[field];
    if (v !== undefined && typeof v !== "number") {
      throw new ConfigurationError(`${field} must be a number`, `${key}.${field}`);
    }
  }
  if (raw.shareY !== undefined && typeof raw.shareY !== "boolean") {
    throw new ConfigurationError("shareY must be a boolean", `${key}.shareY`);
  }
  return { ...raw };
}

function buildGroupOverrides(
  tables: StyleTables,
  table: DataTable,
  groups: readonly ColumnGroup[],
  options: ComposeOptions
): GroupOverride[] {
  const overrides: GroupOverride[] = groups.map(() => ({
    columnTitles: Object.create(null),
    valueFormats: Object.create(null),
    layout: {},
    barStyles: Object.create(null),
  }));
  const at = (i: number): GroupOverride => {
    const o = overrides[i];
    if (!o) throw new ConfigurationError(`Group ${i} is out of range`, `groups[${i}]`);
    return o;
  };
  const groupAt = (i: number): ColumnGroup => groups[i] ?? [];

  eachIndexed(options.customTitles, "customTitles", groups.length, (i, v, key) => {
    at(i).title = requireText(v, key);
  });
  eachIndexed(options.customSubtitles, "customSubtitles", groups.length, (i, v, key) => {
    at(i).subtitle = requireText(v, key);
  });
  eachIndexed(options.customColumnTitles, "customColumnTitles", groups.length, (i, map, key) => {
    if (!isPlainObject(map)) throw new ConfigurationError("Expected an object of column titles", key);
    for (const [column, title] of safeEntries(map)) {
      requireGroupColumn(groupAt(i), column, `${key}.${column}`);
      at(i).columnTitles[column] = requireText(title, `${key}.${column}`);
    }
  });
  eachIndexed(options.valueFormats?.byGroup, "valueFormats.byGroup", groups.length, (i, map, key) => {
    if (!isPlainObject(map)) throw new ConfigurationError("Expected an object of value formats", key);
    for (const [column, spec] of safeEntries(map)) {
      const specKey = `${key}.${column}`;
      requireGroupColumn(groupAt(i), column, specKey);
      if (!isPlainObject(spec)) throw new ConfigurationError("Value format must be an object", specKey);
      at(i).valueFormats[column] = validateValueFormatSpec(spec, specKey);
    }
  });
  eachIndexed(options.colorSchemes, "colorSchemes", groups.length, (i, name, key) => {
    at(i).colorScheme = requireScheme(tables, name, key);
  });
  eachIndexed(options.layouts, "layouts", groups.length, (i, hints, key) => {
    at(i).layout = validateLayoutHints(hints, key);
  });
  eachIndexed(options.barStyles, "barStyles", groups.length, (i, map, key) => {
    if (!isPlainObject(map)) throw new ConfigurationError("Expected an object of bar styles", key);
    for (const [column, style] of safeEntries(map)) {
      requireGroupColumn(groupAt(i), column, `${key}.${column}`);
      if (!isPlainObject(style)) throw new ConfigurationError("Bar style must be an object", `${key}.${column}`);
      at(i).barStyles[column] = style;
    }
  });

  const cycle = options.colorSchemeCycle ?? [];
  cycle.forEach((name, j) => requireScheme(tables, name, `colorSchemeCycle[${j}]`));
  overrides.forEach((o, i) => {
    if (o.colorScheme === undefined && cycle.length > 0) o.colorScheme = cycle[i % cycle.length];
  });

  const known = new Set(columnNames(table));
  for (const [column, spec] of safeEntries(options.valueFormats?.byColumn ?? {})) {
    const key = `valueFormats.byColumn.${column}`;
    if (!known.has(column)) throw new ConfigurationError(`Unknown column: ${column}`, key);
    if (!isPlainObject(spec)) throw new ConfigurationError("Value format must be an object", key);
    validateValueFormatSpec(spec, key);
  }

  return overrides;
}

function formatClassesOf(formats: readonly ColumnFormatResult[]): FormatClass[] {
  const out: FormatClass[] = [];
  for (const f of formats) if (f.ok) out.push(f.format.formatClass);
  return out;
}

export function createDashboardComposer(styleTables: StyleTables): DashboardComposer {
  function compose(
    table: DataTable,
    sheetName: string,
    columnGroups?: readonly ColumnGroup[],
    options: ComposeOptions = {}
  ): DashboardArtifact {
    const warnings: DashboardMessage[] = [];
    const groups = columnGroups ?? groupColumns(columnNames(table));
    validateGroups(table, groups);

    const globalScheme = requireScheme(styleTables, options.colorScheme ?? DEFAULT_COLOR_SCHEME, "colorScheme");
    const bgStyle = options.bgStyle ?? DEFAULT_BG_STYLE;
    if (!Object.hasOwn(styleTables.backgrounds, bgStyle)) {
      throw new ConfigurationError(
        `Unknown background style: ${bgStyle} (expected one of ${availableBackgrounds(styleTables).join(", ")})`,
        "bgStyle"
      );
    }
    const overrides = buildGroupOverrides(styleTables, table, groups, options);
    const byColumn = options.valueFormats?.byColumn ?? {};

    if (groups.length === 0) {
      warn(warnings, "BD_NO_COLUMNS", `Sheet ${JSON.stringify(sheetName)} has no data columns to chart`);
    }

    const units: DashboardUnit[] = groups.map((columns, i) => {
      const o = overrides[i];
      if (!o) throw new ConfigurationError(`Group ${i} is out of range`, `groups[${i}]`);

      const formats = columns.map((name) => {
        const cells = findColumn(table, name)?.cells ?? [];
        const columnSpec = Object.hasOwn(byColumn, name) ? byColumn[name] : undefined;
        const result = formatColumn(cells, name, mergeValueFormatSpecs(o.valueFormats[name], columnSpec));
        if (!result.ok) {
          warn(warnings, result.error.code, result.error.message, { groupIndex: i, column: name });
        }
        return result;
      });

      const layout = planLayout({
        slotCount: columns.length,
        ...o.layout,
        formatClasses: formatClassesOf(formats),
      });
      const style = resolveStyle(styleTables, o.colorScheme ?? globalScheme, bgStyle, columns, o.barStyles, `barStyles[${i}]`);
      const title = o.title ?? defaultTitle(sheetName, i, options.titlePrefix);

      const chart = renderChartGroup({
        groupIndex: i,
        columns,
        table,
        title,
        ...(o.subtitle !== undefined ? { subtitle: o.subtitle } : {}),
        columnTitles: o.columnTitles,
        ...(options.xLabel !== undefined ? { xLabel: options.xLabel } : {}),
        ...(options.yLabels !== undefined ? { yLabels: options.yLabels } : {}),
        style,
        formats,
        layout,
        showValues: options.showValues ?? true,
        valueRotation: options.valueRotation ?? 0,
      });

      return {
        provenance: {
          sheetName,
          groupIndex: i,
          title,
          ...(o.subtitle !== undefined ? { subtitle: o.subtitle } : {}),
        },
        chart,
      };
    });

    return { sheetName, units, warnings };
  }

  return Object.freeze({ styleTables, compose });
}
