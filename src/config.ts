/**
 * Purpose: Validate dashboard configuration JSON into compose and export options.
 * Intent: Collect every problem as a diagnostic before anything renders.
 */

import { readFileSync } from "node:fs";
import type { ComposeOptions } from "./dashboard.js";
import { asString, err, hasErrors, isPlainObject, parseIndexKey, safeEntries, warn } from "./diagnostics.js";
import { ConfigurationError } from "./errors.js";
import type { ExportFormat } from "./export.js";
import type { ColumnStyleOverride, DashboardMessage, LayoutHints, ValueFormatSpec, YLabelSpec } from "./types.js";
import { MAX_PRECISION } from "./value_format.js";

export interface ExportSettings {
  outputPath?: string;
  dpi?: number;
  format?: ExportFormat;
}

export interface DashboardConfig {
  sheetName?: string;
  indexColumn?: string;
  dropRows?: string[];
  columnGroups?: string[][];
  compose: ComposeOptions;
  export: ExportSettings;
}

const knownKeys: ReadonlySet<string> = new Set([
  "sheet_name",
  "index_column",
  "drop_rows",
  "column_groups",
  "title_prefix",
  "custom_titles",
  "custom_subtitles",
  "custom_column_titles",
  "value_formats",
  "color_scheme",
  "color_schemes",
  "bg_style",
  "layouts",
  "bar_styles",
  "x_label",
  "y_labels",
  "show_values",
  "value_rotation",
  "export",
]);

const fragmentKeys: ReadonlySet<string> = new Set(["is_percentage", "precision"]);

const barStyleKeys = Object.freeze({
  bar_fill: "barFill",
  bar_edge_color: "barEdgeColor",
  bar_edge_width: "barEdgeWidth",
  bar_alpha: "barAlpha",
} as const);

function optionalString(raw: unknown, key: string, messages: DashboardMessage[]): string | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw !== "string") {
    err(messages, "BD_CONFIG_TYPE", "expected a string", { key });
    return undefined;
  }
  return raw;
}

function optionalBoolean(raw: unknown, key: string, messages: DashboardMessage[]): boolean | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw !== "boolean") {
    err(messages, "BD_CONFIG_TYPE", "expected a boolean", { key });
    return undefined;
  }
  return raw;
}

function optionalPositiveInt(raw: unknown, key: string, messages: DashboardMessage[]): number | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw !== "number" || !Number.isInteger(raw) || raw < 1) {
    err(messages, "BD_CONFIG_TYPE", "expected a positive integer", { key });
    return undefined;
  }
  return raw;
}

function stringList(raw: unknown, key: string, messages: DashboardMessage[]): string[] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw) || raw.some((v) => typeof v !== "string")) {
    err(messages, "BD_CONFIG_TYPE", "expected an array of strings", { key });
    return undefined;
  }
  return raw.filter((v): v is string => typeof v === "string");
}

function stringMap(raw: unknown, key: string, messages: DashboardMessage[]): Record<string, string> | undefined {
  if (raw === undefined) return undefined;
  if (!isPlainObject(raw)) {
    err(messages, "BD_CONFIG_TYPE", "expected an object of strings", { key });
    return undefined;
  }
  const out: Record<string, string> = Object.create(null);
  for (const [k, v] of safeEntries(raw)) {
    if (typeof v !== "string") {
      err(messages, "BD_CONFIG_TYPE", "expected a string", { key: `${key}.${k}` });
      continue;
    }
    out[k] = v;
  }
  return out;
}

/** Index-keyed maps: keys must look like group indexes; ranges are checked at compose time. */
function indexedMap<T>(
  raw: unknown,
  key: string,
  messages: DashboardMessage[],
  parseValue: (value: unknown, entryKey: string) => T | undefined
): Record<string, T> | undefined {
  if (raw === undefined) return undefined;
  if (!isPlainObject(raw)) {
    err(messages, "BD_CONFIG_TYPE", "expected an object keyed by group index", { key });
    return undefined;
  }
  const out: Record<string, T> = Object.create(null);
  for (const [k, v] of safeEntries(raw)) {
    const entryKey = `${key}[${k}]`;
    if (parseIndexKey(k) === null) {
      err(messages, "BD_CONFIG_INDEX", `${JSON.stringify(k)} is not a group index`, { key: entryKey });
      continue;
    }
    const parsed = parseValue(v, entryKey);
    if (parsed !== undefined) out[k] = parsed;
  }
  return out;
}

function looksLikeFragment(v: unknown): v is Record<string, unknown> {
  return isPlainObject(v) && Object.keys(v).every((k) => fragmentKeys.has(k));
}

function parseFragment(raw: Record<string, unknown>, key: string, messages: DashboardMessage[]): ValueFormatSpec {
  const out: ValueFormatSpec = {};
  const isPercentage = optionalBoolean(raw.is_percentage, `${key}.is_percentage`, messages);
  if (isPercentage !== undefined) out.isPercentage = isPercentage;
  const p = raw.precision;
  if (p !== undefined) {
    if (typeof p !== "number" || !Number.isInteger(p) || p < 0 || p > MAX_PRECISION) {
      err(messages, "BD_CONFIG_PRECISION", `precision must be an integer between 0 and ${MAX_PRECISION}`, {
        key: `${key}.precision`,
      });
    } else {
      out.precision = p;
    }
  }
  return out;
}

function parseValueFormats(raw: unknown, messages: DashboardMessage[]): ComposeOptions["valueFormats"] {
  if (raw === undefined) return undefined;
  if (!isPlainObject(raw)) {
    err(messages, "BD_CONFIG_TYPE", "value_formats must be an object", { key: "value_formats" });
    return undefined;
  }
  const byColumn: Record<string, ValueFormatSpec> = Object.create(null);
  const byGroup: Record<string, Record<string, ValueFormatSpec>> = Object.create(null);

  for (const [k, v] of safeEntries(raw)) {
    // "0": {} is an empty group entry, not a column named "0".
    const emptyGroup = parseIndexKey(k) !== null && isPlainObject(v) && Object.keys(v).length === 0;
    if (!emptyGroup && looksLikeFragment(v)) {
      byColumn[k] = parseFragment(v, `value_formats.${k}`, messages);
      continue;
    }
    const groupKey = `value_formats[${k}]`;
    if (parseIndexKey(k) === null || !isPlainObject(v)) {
      err(
        messages,
        "BD_CONFIG_VALUE_FORMATS",
        "entries must be a column format ({is_percentage, precision}) or a group index mapping columns to formats",
        { key: groupKey }
      );
      continue;
    }
    const columns: Record<string, ValueFormatSpec> = Object.create(null);
    for (const [column, fragment] of safeEntries(v)) {
      const fragmentKey = `${groupKey}.${column}`;
      if (!looksLikeFragment(fragment)) {
        err(messages, "BD_CONFIG_VALUE_FORMATS", "expected {is_percentage, precision}", { key: fragmentKey });
        continue;
      }
      columns[column] = parseFragment(fragment, fragmentKey, messages);
    }
    byGroup[k] = columns;
  }
  return { byColumn, byGroup };
}

function parseLayoutHints(raw: unknown, key: string, messages: DashboardMessage[]): LayoutHints | undefined {
  if (!isPlainObject(raw)) {
    err(messages, "BD_CONFIG_TYPE", "expected {rows, cols, share_y}", { key });
    return undefined;
  }
  for (const k of Object.keys(raw)) {
    if (k !== "rows" && k !== "cols" && k !== "share_y") {
      err(messages, "BD_CONFIG_LAYOUT", `unknown layout field: ${k}`, { key: `${key}.${k}` });
    }
  }
  const hints: LayoutHints = {};
  const rows = optionalPositiveInt(raw.rows, `${key}.rows`, messages);
  const cols = optionalPositiveInt(raw.cols, `${key}.cols`, messages);
  const shareY = optionalBoolean(raw.share_y, `${key}.share_y`, messages);
  if (rows !== undefined) hints.rows = rows;
  if (cols !== undefined) hints.cols = cols;
  if (shareY !== undefined) hints.shareY = shareY;
  return hints;
}

function parseBarStyle(raw: unknown, key: string, messages: DashboardMessage[]): ColumnStyleOverride | undefined {
  if (!isPlainObject(raw)) {
    err(messages, "BD_CONFIG_TYPE", "expected a bar style object", { key });
    return undefined;
  }
  const out: ColumnStyleOverride = {};
  for (const [k, v] of safeEntries(raw)) {
    const fieldKey = `${key}.${k}`;
    switch (k) {
      case "bar_fill":
      case "bar_edge_color": {
        const color = asString(v);
        if (color === null) err(messages, "BD_CONFIG_TYPE", "expected a color string", { key: fieldKey });
        else out[barStyleKeys[k]] = color;
        break;
      }
      case "bar_edge_width":
      case "bar_alpha":
        if (typeof v !== "number" || !Number.isFinite(v)) err(messages, "BD_CONFIG_TYPE", "expected a number", { key: fieldKey });
        else out[barStyleKeys[k]] = v;
        break;
      default:
        err(messages, "BD_CONFIG_BAR_STYLE", `unknown bar style field: ${k}`, { key: fieldKey });
    }
  }
  return out;
}

function parseYLabels(raw: unknown, messages: DashboardMessage[]): YLabelSpec | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw === "string") return { kind: "global", label: raw };
  const labels = stringMap(raw, "y_labels", messages);
  return labels ? { kind: "per_column", labels } : undefined;
}

function parseColumnGroups(raw: unknown, messages: DashboardMessage[]): string[][] | undefined {
  if (raw === undefined) return undefined;
  if (!Array.isArray(raw)) {
    err(messages, "BD_CONFIG_TYPE", "column_groups must be an array of column lists", { key: "column_groups" });
    return undefined;
  }
  const groups: string[][] = [];
  raw.forEach((group: unknown, i) => {
    const list = stringList(group, `column_groups[${i}]`, messages);
    if (list && list.length === 0) {
      err(messages, "BD_CONFIG_GROUP", "column group must not be empty", { key: `column_groups[${i}]` });
    }
    if (list) groups.push(list);
  });
  return groups;
}

function parseExport(raw: unknown, messages: DashboardMessage[]): ExportSettings {
  if (raw === undefined) return {};
  if (!isPlainObject(raw)) {
    err(messages, "BD_CONFIG_TYPE", "export must be an object", { key: "export" });
    return {};
  }
  const out: ExportSettings = {};
  const outputPath = optionalString(raw.output_path, "export.output_path", messages);
  if (outputPath !== undefined) out.outputPath = outputPath;
  const dpi = optionalPositiveInt(raw.dpi, "export.dpi", messages);
  if (dpi !== undefined) out.dpi = dpi;
  if (raw.format !== undefined) {
    if (raw.format === "png" || raw.format === "svg") out.format = raw.format;
    else err(messages, "BD_CONFIG_EXPORT_FORMAT", "format must be \"png\" or \"svg\"", { key: "export.format" });
  }
  return out;
}

export function parseDashboardConfig(raw: unknown): { config: DashboardConfig | null; messages: DashboardMessage[] } {
  const messages: DashboardMessage[] = [];
  if (!isPlainObject(raw)) {
    err(messages, "BD_CONFIG_ROOT", "configuration must be a JSON object");
    return { config: null, messages };
  }

  for (const k of Object.keys(raw)) {
    if (!knownKeys.has(k)) warn(messages, "BD_CONFIG_UNKNOWN_KEY", `unknown configuration key: ${k}`, { key: k });
  }

  const compose: ComposeOptions = {};
  const titlePrefix = optionalString(raw.title_prefix, "title_prefix", messages);
  if (titlePrefix !== undefined) compose.titlePrefix = titlePrefix;
  const customTitles = indexedMap(raw.custom_titles, "custom_titles", messages, (v, k) => optionalString(v, k, messages));
  if (customTitles) compose.customTitles = customTitles;
  const customSubtitles = indexedMap(raw.custom_subtitles, "custom_subtitles", messages, (v, k) =>
    optionalString(v, k, messages)
  );
  if (customSubtitles) compose.customSubtitles = customSubtitles;
  const customColumnTitles = indexedMap(raw.custom_column_titles, "custom_column_titles", messages, (v, k) =>
    stringMap(v, k, messages)
  );
  if (customColumnTitles) compose.customColumnTitles = customColumnTitles;
  const valueFormats = parseValueFormats(raw.value_formats, messages);
  if (valueFormats) compose.valueFormats = valueFormats;

  const colorScheme = optionalString(raw.color_scheme, "color_scheme", messages);
  if (colorScheme !== undefined) compose.colorScheme = colorScheme;
  if (Array.isArray(raw.color_schemes)) {
    const cycle = stringList(raw.color_schemes, "color_schemes", messages);
    if (cycle) compose.colorSchemeCycle = cycle;
  } else {
    const schemes = indexedMap(raw.color_schemes, "color_schemes", messages, (v, k) => optionalString(v, k, messages));
    if (schemes) compose.colorSchemes = schemes;
  }
  const bgStyle = optionalString(raw.bg_style, "bg_style", messages);
  if (bgStyle !== undefined) compose.bgStyle = bgStyle;

  const layouts = indexedMap(raw.layouts, "layouts", messages, (v, k) => parseLayoutHints(v, k, messages));
  if (layouts) compose.layouts = layouts;
  const barStyles = indexedMap(raw.bar_styles, "bar_styles", messages, (v, k) => {
    if (!isPlainObject(v)) {
      err(messages, "BD_CONFIG_TYPE", "expected an object of column bar styles", { key: k });
      return undefined;
    }
    const columns: Record<string, ColumnStyleOverride> = Object.create(null);
    for (const [column, style] of safeEntries(v)) {
      const parsed = parseBarStyle(style, `${k}.${column}`, messages);
      if (parsed) columns[column] = parsed;
    }
    return columns;
  });
  if (barStyles) compose.barStyles = barStyles;

  const xLabel = optionalString(raw.x_label, "x_label", messages);
  if (xLabel !== undefined) compose.xLabel = xLabel;
  const yLabels = parseYLabels(raw.y_labels, messages);
  if (yLabels) compose.yLabels = yLabels;
  const showValues = optionalBoolean(raw.show_values, "show_values", messages);
  if (showValues !== undefined) compose.showValues = showValues;
  if (raw.value_rotation !== undefined) {
    if (typeof raw.value_rotation === "number" && Number.isFinite(raw.value_rotation)) {
      compose.valueRotation = raw.value_rotation;
    } else {
      err(messages, "BD_CONFIG_TYPE", "expected a number", { key: "value_rotation" });
    }
  }

  const config: DashboardConfig = { compose, export: parseExport(raw.export, messages) };
  const sheetName = optionalString(raw.sheet_name, "sheet_name", messages);
  if (sheetName !== undefined) config.sheetName = sheetName;
  const indexColumn = optionalString(raw.index_column, "index_column", messages);
  if (indexColumn !== undefined) config.indexColumn = indexColumn;
  const dropRows = stringList(raw.drop_rows, "drop_rows", messages);
  if (dropRows) config.dropRows = dropRows;
  const columnGroups = parseColumnGroups(raw.column_groups, messages);
  if (columnGroups) config.columnGroups = columnGroups;

  if (hasErrors(messages)) return { config: null, messages };
  return { config, messages };
}

export function loadDashboardConfig(path: string): { config: DashboardConfig; messages: DashboardMessage[] } {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError(`Cannot read configuration from ${path}: ${reason}`, "config");
  }
  const { config, messages } = parseDashboardConfig(raw);
  if (!config) throw ConfigurationError.fromMessages(`Invalid configuration in ${path}`, messages);
  return { config, messages };
}
